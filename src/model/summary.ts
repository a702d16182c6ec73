import { BILLION, YEARS } from './constants';
import { InvalidInputError } from './errors';
import type {
  BaselineComparison,
  CorrelationMatrix,
  ResultMetric,
  ScenarioResult,
  ScenarioSummary,
  ScenarioYearResult
} from './types';

function sum(result: ScenarioResult, pick: (row: ScenarioYearResult) => number): number {
  return result.rows.reduce((acc, row) => acc + pick(row), 0);
}

export function getRow(result: ScenarioResult, year: number): Readonly<ScenarioYearResult> {
  const row = result.rows.find((r) => r.year === year);
  if (!row) {
    throw new InvalidInputError(`Year ${year} is outside the ${YEARS[0]}-${YEARS[YEARS.length - 1]} horizon`, {
      year
    });
  }
  return row;
}

/**
 * Horizon totals for one scenario
 */
export function summarizeScenario(result: ScenarioResult): ScenarioSummary {
  const last = result.rows[result.rows.length - 1];
  return {
    scenario: result.scenario,
    cumulativeSafMt: sum(result, (r) => r.safVolumeMt),
    cumulativeCo2GeneratedMt: sum(result, (r) => r.co2GeneratedMt),
    cumulativeCo2AvoidedMt: sum(result, (r) => r.co2AvoidedMt),
    cumulativeFuelCostBn: sum(result, (r) => r.fuelCostBn),
    cumulativeCarbonCostBn: sum(result, (r) => r.carbonCostBn),
    cumulativeTotalCostBn: sum(result, (r) => r.totalCostBn),
    finalSharePct: last ? last.safSharePct : 0
  };
}

/**
 * What a scenario costs over the baseline per tonne of CO2 it takes off the table.
 * The incremental cost is in billions, so scale it back before dividing.
 */
export function compareToBaseline(result: ScenarioResult, baseline: ScenarioResult): BaselineComparison {
  const s = summarizeScenario(result);
  const b = summarizeScenario(baseline);

  const incrementalCostBn = s.cumulativeTotalCostBn - b.cumulativeTotalCostBn;
  const co2ReductionMt = b.cumulativeCo2GeneratedMt - s.cumulativeCo2GeneratedMt;

  return {
    scenario: result.scenario,
    baseline: baseline.scenario,
    incrementalCostBn,
    co2ReductionMt,
    abatementCostPerTonne: co2ReductionMt > 0 ? (incrementalCostBn * BILLION) / co2ReductionMt : null
  };
}

function pearson(xs: number[], ys: number[]): number | null {
  const n = xs.length;
  if (n === 0) return null;
  const mx = xs.reduce((a, v) => a + v, 0) / n;
  const my = ys.reduce((a, v) => a + v, 0) / n;
  let cov = 0;
  let vx = 0;
  let vy = 0;
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - mx;
    const dy = ys[i] - my;
    cov += dx * dy;
    vx += dx * dx;
    vy += dy * dy;
  }
  if (vx === 0 || vy === 0) return null;
  return cov / Math.sqrt(vx * vy);
}

/**
 * Pearson correlation between result columns across the horizon.
 * values[i][j] pairs metrics[i] with metrics[j].
 */
export function correlationMatrix(result: ScenarioResult, metrics: readonly ResultMetric[]): CorrelationMatrix {
  const columns = metrics.map((m) => result.rows.map((r) => r[m]));
  return {
    metrics: [...metrics],
    values: columns.map((xs) => columns.map((ys) => pearson(xs, ys)))
  };
}
