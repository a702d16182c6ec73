import { SCENARIOS } from './constants';
import { projectDemand } from './demand';
import { evaluateScenario } from './scenario';
import type { Assumptions, ForecastPoint, ScenarioId, ScenarioResult, ScenarioResults } from './types';
import { defaults } from '../state/params';

export interface DemandPaths {
  standard: readonly ForecastPoint[];
  efficient: readonly ForecastPoint[];
}

/**
 * Both demand paths the scenarios draw from: with and without ATM gains
 */
export function getDemandPaths(
  baseDemandMt: number,
  annualGrowthRate: number,
  a: Assumptions = defaults
): DemandPaths {
  return {
    standard: projectDemand(baseDemandMt, annualGrowthRate, false, a),
    efficient: projectDemand(baseDemandMt, annualGrowthRate, true, a)
  };
}

/**
 * Run a scenario on the demand path it is defined against
 */
export function runScenario(scenario: ScenarioId, paths: DemandPaths, a: Assumptions = defaults): ScenarioResult {
  const demand = SCENARIOS[scenario].operationalGains ? paths.efficient : paths.standard;
  return evaluateScenario(demand, scenario, a);
}

/**
 * Compute all three scenarios
 */
export function computeAll(
  baseDemandMt: number,
  annualGrowthRate: number,
  a: Assumptions = defaults
): ScenarioResults {
  const paths = getDemandPaths(baseDemandMt, annualGrowthRate, a);
  return {
    S0: runScenario('S0', paths, a),
    S1: runScenario('S1', paths, a),
    S2: runScenario('S2', paths, a)
  };
}
