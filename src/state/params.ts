import { z } from 'zod';
import type { Assumptions } from '../model/types';
import { InvalidInputError } from '../model/errors';

/**
 * Default assumptions - every number the model leans on lives here.
 * Swap them through buildAssumptions() rather than editing formulas.
 */
export const defaults: Assumptions = freezeAssumptions({
  // Emissions
  jetEmissionFactor: 3.16, // t CO2 per t Jet A-1
  safLifecycleReduction: 0.80, // 80% lifecycle cut, so SAF sits at 0.632 t/t

  // Efficiency
  techEfficiencyGain: 0.015, // 1.5%/yr from newer aircraft
  operationalGainMax: 0.07, // 7% total from ATM programmes
  operationalRampYears: 15, // reached by 2040

  // Prices (per tonne of fuel)
  jetPricePerTonne: 1000,
  safPricePremium: 2.5, // SAF costs 2.5x conventional

  // Carbon price: ~80 in 2025 to ~150 in 2050
  carbonPriceBase: 80,
  carbonPriceSlope: 2.8,

  // Adoption
  voluntaryAdoptionShare: 0.01, // what the market does on its own
  mandateSchedule: [
    { year: 2025, share: 0.02 },
    { year: 2030, share: 0.06 },
    { year: 2035, share: 0.20 },
    { year: 2040, share: 0.34 },
    { year: 2045, share: 0.42 },
    { year: 2050, share: 0.70 }
  ]
});

const fraction = z.number().finite().min(0).max(1);

export const MandatePointSchema = z.object({
  year: z.number().int(),
  share: fraction
});

export const AssumptionsSchema = z.object({
  jetEmissionFactor: z.number().finite().nonnegative(),
  safLifecycleReduction: fraction,
  techEfficiencyGain: z.number().finite().min(0).lt(1),
  operationalGainMax: fraction,
  operationalRampYears: z.number().finite().positive(),
  jetPricePerTonne: z.number().finite().nonnegative(),
  safPricePremium: z.number().finite().nonnegative(),
  carbonPriceBase: z.number().finite(),
  carbonPriceSlope: z.number().finite(),
  voluntaryAdoptionShare: fraction,
  mandateSchedule: z
    .array(MandatePointSchema)
    .min(1)
    .refine(
      (points) => new Set(points.map((p) => p.year)).size === points.length,
      { message: 'Mandate years must be unique' }
    )
});

export type AssumptionOverrides = Partial<Assumptions>;

/**
 * Merge overrides onto the defaults and validate the result.
 * The returned value is frozen, mandates sorted by year.
 */
export function buildAssumptions(overrides: AssumptionOverrides = {}): Assumptions {
  const parsed = AssumptionsSchema.safeParse({ ...defaults, ...overrides });
  if (!parsed.success) {
    throw new InvalidInputError('Invalid model assumptions', {
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    });
  }
  return freezeAssumptions(parsed.data);
}

function freezeAssumptions(a: Assumptions): Assumptions {
  const mandateSchedule = Object.freeze(
    [...a.mandateSchedule]
      .sort((x, y) => x.year - y.year)
      .map((p) => Object.freeze({ year: p.year, share: p.share }))
  );
  return Object.freeze({ ...a, mandateSchedule });
}
