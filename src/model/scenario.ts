import { SCENARIO_IDS, SCENARIOS, YEARS } from './constants';
import { MalformedSeriesError, UnknownScenarioError } from './errors';
import { calcEmissions } from './emissions';
import { calcCosts, getCarbonPrice } from './finance';
import { clampShare, getMandateShare } from './mandates';
import type { Assumptions, DemandSeries, ScenarioId, ScenarioResult, ScenarioYearResult } from './types';
import { defaults } from '../state/params';

export function isScenarioId(value: string): value is ScenarioId {
  return SCENARIO_IDS.some((id) => id === value);
}

export function parseScenarioId(value: string): ScenarioId {
  if (!isScenarioId(value)) {
    throw new UnknownScenarioError(value, SCENARIO_IDS);
  }
  return value;
}

/**
 * SAF blending share (0-1) a scenario asks for in a given year
 */
export function getScenarioShare(scenario: ScenarioId, year: number, a: Assumptions): number {
  switch (SCENARIOS[scenario].share) {
    case 'voluntary':
      return clampShare(a.voluntaryAdoptionShare);
    case 'mandate':
      return getMandateShare(a.mandateSchedule, year);
  }
}

/**
 * A series from anywhere other than projectDemand() has to prove
 * it covers the horizon before we price it.
 */
export function assertHorizonCoverage(demand: DemandSeries): void {
  if (demand.length !== YEARS.length) {
    throw new MalformedSeriesError(
      `Demand series has ${demand.length} points, expected ${YEARS.length}`,
      { expected: YEARS.length, received: demand.length }
    );
  }
  YEARS.forEach((year, i) => {
    const point = demand[i];
    if (!point || typeof point !== 'object') {
      throw new MalformedSeriesError(`Demand series point ${i} is not a demand point`, { index: i });
    }
    if (point.year !== year) {
      throw new MalformedSeriesError(`Demand series point ${i} is year ${point.year}, expected ${year}`, {
        index: i,
        year: point.year
      });
    }
    if (!Number.isFinite(point.totalDemandMt) || point.totalDemandMt < 0) {
      throw new MalformedSeriesError(`Demand for ${year} must be a finite non-negative number`, {
        year,
        value: point.totalDemandMt
      });
    }
  });
}

/**
 * Run one policy scenario over a demand series
 */
export function evaluateScenario(
  demand: DemandSeries,
  scenarioId: string,
  a: Assumptions = defaults
): ScenarioResult {
  const scenario = parseScenarioId(scenarioId);
  assertHorizonCoverage(demand);

  const rows = demand.map(({ year, totalDemandMt }): Readonly<ScenarioYearResult> => {
    const share = getScenarioShare(scenario, year, a);

    const safVolumeMt = totalDemandMt * share;
    const jetVolumeMt = totalDemandMt - safVolumeMt;

    const emissions = calcEmissions(totalDemandMt, jetVolumeMt, safVolumeMt, a);
    const carbonPrice = getCarbonPrice(year, a);
    const costs = calcCosts(jetVolumeMt, safVolumeMt, emissions.generatedMt, carbonPrice, a);

    return Object.freeze({
      year,
      totalDemandMt,
      safSharePct: share * 100,
      safVolumeMt,
      jetVolumeMt,
      co2GeneratedMt: emissions.generatedMt,
      co2AvoidedMt: emissions.avoidedMt,
      carbonPrice,
      ...costs
    });
  });

  return Object.freeze({ scenario, rows: Object.freeze(rows) });
}
