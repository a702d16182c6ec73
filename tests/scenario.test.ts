import { describe, it, expect } from 'vitest';
import { computeAll } from '../src/model/computeAll';
import { YEARS } from '../src/model/constants';
import { projectDemand } from '../src/model/demand';
import { getSafEmissionFactor } from '../src/model/emissions';
import { MalformedSeriesError, UnknownScenarioError } from '../src/model/errors';
import { getCarbonPrice, getSafPricePerTonne } from '../src/model/finance';
import { evaluateScenario, getScenarioShare, isScenarioId, parseScenarioId } from '../src/model/scenario';
import { getRow } from '../src/model/summary';
import type { DemandSeries } from '../src/model/types';
import { buildAssumptions, defaults } from '../src/state/params';

function flatSeries(totalDemandMt: number): DemandSeries {
  return YEARS.map((year) => ({ year, totalDemandMt }));
}

describe('Scenario - Identifiers', () => {
  it('accepts the three known scenarios', () => {
    expect(['S0', 'S1', 'S2'].every(isScenarioId)).toBe(true);
    expect(parseScenarioId('S2')).toBe('S2');
  });

  it('rejects anything else', () => {
    expect(isScenarioId('s1')).toBe(false);
    expect(() => parseScenarioId('S9')).toThrow(UnknownScenarioError);
  });

  it('unknown scenario fails with no result', () => {
    const series = projectDemand(100, 0, false);
    expect(() => evaluateScenario(series, 'S9')).toThrow(UnknownScenarioError);
  });

  it('scenario is checked before the series', () => {
    expect(() => evaluateScenario([], 'S9')).toThrow(UnknownScenarioError);
  });

  it('error names the bad scenario', () => {
    try {
      evaluateScenario(flatSeries(1), 'BAU');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(UnknownScenarioError);
      if (err instanceof UnknownScenarioError) {
        expect(err.scenario).toBe('BAU');
        expect(err.message).toBe("Unknown scenario 'BAU'. Expected one of: S0, S1, S2");
      }
    }
  });
});

describe('Scenario - Blending share', () => {
  it('S0 is a flat voluntary share', () => {
    expect(YEARS.every((y) => getScenarioShare('S0', y, defaults) === 0.01)).toBe(true);
  });

  it('S1 hits mandate control points exactly', () => {
    for (const point of defaults.mandateSchedule) {
      expect(getScenarioShare('S1', point.year, defaults)).toBe(point.share);
    }
    const result = evaluateScenario(flatSeries(50), 'S1');
    expect(getRow(result, 2030).safSharePct).toBe(0.06 * 100);
    expect(getRow(result, 2050).safSharePct).toBe(0.7 * 100);
  });

  it('S1 interpolates between control points', () => {
    expect(getScenarioShare('S1', 2026, defaults)).toBeCloseTo(0.028, 12);
    expect(getScenarioShare('S1', 2047, defaults)).toBeCloseTo(0.42 + (0.28 * 2) / 5, 12);
  });

  it('S1 and S2 share the mandate schedule', () => {
    expect(YEARS.every((y) => getScenarioShare('S1', y, defaults) === getScenarioShare('S2', y, defaults))).toBe(true);
  });
});

describe('Scenario - Worked year', () => {
  // 100 Mt, flat traffic, no ATM gains, S0, year 2026
  const row = getRow(evaluateScenario(projectDemand(100, 0, false), 'S0'), 2026);

  const close = (actual: number, expected: number) =>
    expect(Math.abs(actual - expected) / Math.abs(expected)).toBeLessThan(1e-3);

  it('volumes', () => {
    close(row.totalDemandMt, 98.5);
    close(row.safVolumeMt, 0.985);
    close(row.jetVolumeMt, 97.515);
    expect(row.safSharePct).toBe(1);
  });

  it('emissions', () => {
    close(row.co2GeneratedMt, 308.77);
    close(row.co2AvoidedMt, 2.49);
  });

  it('carbon price and costs', () => {
    expect(row.carbonPrice).toBeCloseTo(82.8, 10);
    close(row.carbonCostBn, 0.000025566);
    close(row.fuelCostBn, 0.0001);
    close(row.totalCostBn, 0.0001256);
  });
});

describe('Scenario - Hand-built assumptions', () => {
  it('mandate order in the schedule does not change the shares', () => {
    const reversed = { ...defaults, mandateSchedule: [...defaults.mandateSchedule].reverse() };
    const demand = projectDemand(100, 0, false, reversed);
    const fromReversed = evaluateScenario(demand, 'S1', reversed);
    const fromSorted = evaluateScenario(demand, 'S1', buildAssumptions());
    expect(getRow(fromReversed, 2025).safSharePct).toBe(0.02 * 100);
    expect(getRow(fromReversed, 2030).safSharePct).toBe(0.06 * 100);
    expect(fromReversed.rows).toEqual(fromSorted.rows);
  });
});

describe('Scenario - Assumptions', () => {
  it('SAF emission factor is 80% below jet fuel', () => {
    expect(getSafEmissionFactor(defaults)).toBeCloseTo(0.632, 12);
  });

  it('SAF price carries the premium', () => {
    expect(getSafPricePerTonne(defaults)).toBe(2500);
  });

  it('carbon price runs from 80 to 150', () => {
    expect(getCarbonPrice(2025, defaults)).toBe(80);
    expect(getCarbonPrice(2050, defaults)).toBeCloseTo(150, 10);
  });

  it('carbon price does not depend on the scenario', () => {
    const series = projectDemand(80, 0.025, false);
    const s0 = evaluateScenario(series, 'S0');
    const s1 = evaluateScenario(series, 'S1');
    expect(s0.rows.map((r) => r.carbonPrice)).toEqual(s1.rows.map((r) => r.carbonPrice));
  });
});

describe('Scenario - Malformed series', () => {
  it('rejects a short series', () => {
    expect(() => evaluateScenario(flatSeries(10).slice(1), 'S0')).toThrow(MalformedSeriesError);
  });

  it('rejects out-of-order years', () => {
    const series = [...flatSeries(10)].reverse();
    expect(() => evaluateScenario(series, 'S1')).toThrow(MalformedSeriesError);
  });

  it('rejects negative or non-finite demand', () => {
    const negative = flatSeries(10).map((p) => (p.year === 2030 ? { ...p, totalDemandMt: -1 } : p));
    const nan = flatSeries(10).map((p) => (p.year === 2030 ? { ...p, totalDemandMt: Number.NaN } : p));
    expect(() => evaluateScenario(negative, 'S0')).toThrow(MalformedSeriesError);
    expect(() => evaluateScenario(nan, 'S0')).toThrow(MalformedSeriesError);
  });

  it('rejects holes in a series handed over from untyped code', () => {
    const raw: string = JSON.stringify(flatSeries(10).map((p) => (p.year === 2028 ? null : p)));
    const series: DemandSeries = JSON.parse(raw);
    expect(() => evaluateScenario(series, 'S0')).toThrow(MalformedSeriesError);
    expect(() => evaluateScenario(series, 'S0')).toThrow('Demand series point 3 is not a demand point');
  });

  it('accepts a series from outside the forecast', () => {
    const result = evaluateScenario(flatSeries(10), 'S0');
    expect(result.rows).toHaveLength(YEARS.length);
    expect(result.rows[0].safVolumeMt).toBeCloseTo(0.1, 12);
  });
});

describe('Scenario - Standard runs', () => {
  const results = computeAll(80, 0.025);

  it('tags each result with its scenario', () => {
    expect(results.S0.scenario).toBe('S0');
    expect(results.S1.scenario).toBe('S1');
    expect(results.S2.scenario).toBe('S2');
  });

  it('S0 and S1 price the same demand', () => {
    expect(results.S0.rows.map((r) => r.totalDemandMt)).toEqual(results.S1.rows.map((r) => r.totalDemandMt));
  });

  it('S2 runs on the operationally efficient demand path', () => {
    const efficient = projectDemand(80, 0.025, true);
    expect(results.S2.rows.map((r) => r.totalDemandMt)).toEqual(efficient.map((p) => p.totalDemandMt));
    expect(getRow(results.S2, 2040).totalDemandMt).toBeLessThan(getRow(results.S1, 2040).totalDemandMt);
  });

  it('S2 emits less than S1 from 2026 on', () => {
    for (const year of YEARS.slice(1)) {
      expect(getRow(results.S2, year).co2GeneratedMt).toBeLessThan(getRow(results.S1, year).co2GeneratedMt);
    }
  });
});
