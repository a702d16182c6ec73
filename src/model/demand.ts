import { z } from 'zod';
import { HORIZON_START, YEARS } from './constants';
import { InvalidInputError } from './errors';
import type { Assumptions, ForecastPoint } from './types';
import { defaults } from '../state/params';

/**
 * FUEL DEMAND FORECAST
 *
 * Traffic compounds, the fleet gets better every year regardless,
 * and ATM programmes shave off a bit more if you count on them.
 */

export const ForecastInputSchema = z.object({
  baseDemandMt: z.number().finite().nonnegative(),
  // Below -1 the compounding term goes negative
  annualGrowthRate: z.number().finite().min(-1),
  applyOperationalGains: z.boolean()
});

export type ForecastInput = z.infer<typeof ForecastInputSchema>;

export function getTechFactor(year: number, a: Assumptions): number {
  return Math.pow(1 - a.techEfficiencyGain, year - HORIZON_START);
}

// Linear ramp up to the ceiling, then flat
export function getOperationalFactor(year: number, a: Assumptions): number {
  const elapsed = year - HORIZON_START;
  const gain = Math.min(a.operationalGainMax, (a.operationalGainMax / a.operationalRampYears) * elapsed);
  return 1 - gain;
}

export function projectDemand(
  baseDemandMt: number,
  annualGrowthRate: number,
  applyOperationalGains: boolean,
  a: Assumptions = defaults
): readonly ForecastPoint[] {
  const parsed = ForecastInputSchema.safeParse({ baseDemandMt, annualGrowthRate, applyOperationalGains });
  if (!parsed.success) {
    throw new InvalidInputError('Invalid forecast input', {
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    });
  }

  const series = YEARS.map((year): ForecastPoint => {
    const rawDemandMt = baseDemandMt * Math.pow(1 + annualGrowthRate, year - HORIZON_START);
    const techFactor = getTechFactor(year, a);
    const operationalFactor = applyOperationalGains ? getOperationalFactor(year, a) : 1;
    return Object.freeze({
      year,
      rawDemandMt,
      techFactor,
      operationalFactor,
      totalDemandMt: rawDemandMt * techFactor * operationalFactor
    });
  });

  return Object.freeze(series);
}
