import { BILLION, HORIZON_START } from './constants';
import type { Assumptions } from './types';

// Straight line from the base price, one slope step per year
export function getCarbonPrice(year: number, a: Assumptions): number {
  return a.carbonPriceBase + a.carbonPriceSlope * (year - HORIZON_START);
}

export function getSafPricePerTonne(a: Assumptions): number {
  return a.jetPricePerTonne * a.safPricePremium;
}

export interface CostResult {
  fuelCostBn: number;
  carbonCostBn: number;
  totalCostBn: number;
}

/**
 * Cost of compliance for one year, in billions of the price currency.
 * Fuel bill plus the carbon bill on whatever is still emitted.
 */
export function calcCosts(
  jetVolumeMt: number,
  safVolumeMt: number,
  co2GeneratedMt: number,
  carbonPrice: number,
  a: Assumptions
): CostResult {
  const fuelCostBn = (jetVolumeMt * a.jetPricePerTonne + safVolumeMt * getSafPricePerTonne(a)) / BILLION;
  const carbonCostBn = (co2GeneratedMt * carbonPrice) / BILLION;
  return { fuelCostBn, carbonCostBn, totalCostBn: fuelCostBn + carbonCostBn };
}
