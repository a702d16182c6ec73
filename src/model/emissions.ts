import type { Assumptions } from './types';

/**
 * Lifecycle emissions. SAF still burns like jet fuel, the credit comes
 * from the feedstock side, hence a factor rather than zero.
 */
export function getSafEmissionFactor(a: Assumptions): number {
  return a.jetEmissionFactor * (1 - a.safLifecycleReduction);
}

export interface EmissionsResult {
  generatedMt: number;
  counterfactualMt: number;
  avoidedMt: number;
}

export function calcEmissions(
  totalDemandMt: number,
  jetVolumeMt: number,
  safVolumeMt: number,
  a: Assumptions
): EmissionsResult {
  const generatedMt = jetVolumeMt * a.jetEmissionFactor + safVolumeMt * getSafEmissionFactor(a);
  // What the same demand would emit with no SAF at all
  const counterfactualMt = totalDemandMt * a.jetEmissionFactor;
  // Rounding can push this a hair below zero when the share is ~0
  const avoidedMt = Math.max(0, counterfactualMt - generatedMt);
  return { generatedMt, counterfactualMt, avoidedMt };
}
