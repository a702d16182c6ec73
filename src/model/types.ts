// Core types for the SAF pathways model

import type { SCENARIO_IDS } from './constants';

export type ScenarioId = (typeof SCENARIO_IDS)[number];

export interface MandatePoint {
  year: number;
  share: number;  // 0-1
}

export type MandateSchedule = readonly MandatePoint[];

export interface Assumptions {
  // Emissions
  jetEmissionFactor: number;       // t CO2 per t conventional jet fuel
  safLifecycleReduction: number;   // Lifecycle cut of SAF vs conventional (0-1)

  // Efficiency
  techEfficiencyGain: number;      // Annual fleet technology gain (0-1)
  operationalGainMax: number;      // Ceiling of operational (ATM) gains (0-1)
  operationalRampYears: number;    // Years to ramp operational gains to the ceiling

  // Prices
  jetPricePerTonne: number;
  safPricePremium: number;         // SAF price as a multiple of conventional

  // Carbon price: base + slope * (year - HORIZON_START)
  carbonPriceBase: number;
  carbonPriceSlope: number;

  // Adoption
  voluntaryAdoptionShare: number;  // S0 constant share (0-1)
  mandateSchedule: MandateSchedule;
}

export interface ScenarioDefinition {
  label: string;
  description: string;
  share: 'voluntary' | 'mandate';
  operationalGains: boolean;
}

export interface DemandPoint {
  year: number;
  totalDemandMt: number;
}

export interface ForecastPoint extends DemandPoint {
  rawDemandMt: number;
  techFactor: number;
  operationalFactor: number;
}

export type DemandSeries = readonly DemandPoint[];

export interface ScenarioYearResult {
  year: number;
  totalDemandMt: number;
  safSharePct: number;
  safVolumeMt: number;
  jetVolumeMt: number;
  co2GeneratedMt: number;
  co2AvoidedMt: number;
  carbonPrice: number;     // per tonne CO2
  fuelCostBn: number;
  carbonCostBn: number;
  totalCostBn: number;
}

export type ResultMetric = Exclude<keyof ScenarioYearResult, 'year'>;

export interface ScenarioResult {
  scenario: ScenarioId;
  rows: readonly Readonly<ScenarioYearResult>[];
}

export type ScenarioResults = Record<ScenarioId, ScenarioResult>;

export interface ScenarioSummary {
  scenario: ScenarioId;
  cumulativeSafMt: number;
  cumulativeCo2GeneratedMt: number;
  cumulativeCo2AvoidedMt: number;
  cumulativeFuelCostBn: number;
  cumulativeCarbonCostBn: number;
  cumulativeTotalCostBn: number;
  finalSharePct: number;
}

export interface BaselineComparison {
  scenario: ScenarioId;
  baseline: ScenarioId;
  incrementalCostBn: number;
  co2ReductionMt: number;
  abatementCostPerTonne: number | null;  // null when nothing is abated
}

export interface CorrelationMatrix {
  metrics: ResultMetric[];
  values: (number | null)[][];  // null where a metric never moves
}
