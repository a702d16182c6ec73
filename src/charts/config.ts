import type { ChartOptions } from 'chart.js';
import type { ScenarioId } from '../model/types';

export function getLineOptions(yLabel: string, title?: string): ChartOptions<'line'> {
  return {
    responsive: true,
    maintainAspectRatio: false,
    plugins: {
      legend: { display: true, title: { display: true, text: 'Scenario' } },
      title: { display: title !== undefined, text: title ?? '' }
    },
    scales: {
      x: { title: { display: true, text: 'Year' } },
      y: { type: 'linear', title: { display: true, text: yLabel } }
    }
  };
}

// Stacked area: a line chart with fill and stacked axes
export function getStackedOptions(yLabel: string, title?: string): ChartOptions<'line'> {
  const base = getLineOptions(yLabel, title);
  return {
    ...base,
    plugins: { ...base.plugins, legend: { display: true, position: 'top' } },
    scales: {
      x: { stacked: true, title: { display: true, text: 'Year' } },
      y: { stacked: true, beginAtZero: true, title: { display: true, text: yLabel } }
    }
  };
}

// Colors
export const SCENARIO_COLORS: Record<ScenarioId, string> = {
  S0: '#1f77b4',
  S1: '#ff7f0e',
  S2: '#2ca02c'
};

export const COLORS = {
  jet: '#6c757d',
  jetFill: 'rgba(108,117,125,0.8)',
  saf: '#2ca02c',
  safFill: 'rgba(44,160,44,0.8)'
};
