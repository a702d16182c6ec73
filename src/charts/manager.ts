import type { ChartConfiguration } from 'chart.js';
import { SCENARIOS, YEARS } from '../model/constants';
import type { ResultMetric, ScenarioResult } from '../model/types';
import { COLORS, SCENARIO_COLORS, getLineOptions, getStackedOptions } from './config';

export type LineChartConfig = ChartConfiguration<'line', number[], number>;

/**
 * One metric, one line per scenario. Whoever draws it owns the canvas.
 */
export function buildComparisonChart(
  results: readonly ScenarioResult[],
  metric: ResultMetric,
  yLabel: string,
  title?: string
): LineChartConfig {
  const datasets = results.map((result) => ({
    label: `${result.scenario}: ${SCENARIOS[result.scenario].label}`,
    data: result.rows.map((row) => row[metric]),
    borderColor: SCENARIO_COLORS[result.scenario],
    borderWidth: 2.5,
    tension: 0.3,
    pointRadius: 0
  }));

  return {
    type: 'line',
    data: { labels: [...YEARS], datasets },
    options: getLineOptions(yLabel, title)
  };
}

/**
 * Conventional at the bottom, SAF stacked on top
 */
export function buildFuelMixChart(result: ScenarioResult, title?: string): LineChartConfig {
  return {
    type: 'line',
    data: {
      labels: [...YEARS],
      datasets: [
        {
          label: 'Conventional Jet Fuel',
          data: result.rows.map((row) => row.jetVolumeMt),
          borderColor: COLORS.jet,
          backgroundColor: COLORS.jetFill,
          fill: true,
          tension: 0.3,
          pointRadius: 0
        },
        {
          label: 'Sustainable Aviation Fuel (SAF)',
          data: result.rows.map((row) => row.safVolumeMt),
          borderColor: COLORS.saf,
          backgroundColor: COLORS.safFill,
          fill: '-1',
          tension: 0.3,
          pointRadius: 0
        }
      ]
    },
    options: getStackedOptions('Fuel Volume (Mt)', title)
  };
}
