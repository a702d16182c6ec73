import type { ScenarioDefinition, ScenarioId } from './types';

/**
 * SAF PATHWAYS CONSTANTS
 *
 * The horizon is fixed. Every series in the model has exactly one value
 * per year in it, in order.
 */

export const HORIZON_START = 2025;
export const HORIZON_END = 2050;

// Simulation years: 2025-2050
export const YEARS: readonly number[] = Object.freeze(
  Array.from({ length: HORIZON_END - HORIZON_START + 1 }, (_, i) => HORIZON_START + i)
);

// Costs come out of the per-tonne prices in raw currency units
export const BILLION = 1e9;

export const SCENARIO_IDS = ['S0', 'S1', 'S2'] as const;

/*
Policy scenarios.
- S0: airlines buy SAF when they feel like it (a flat voluntary share)
- S1: the blending mandate, nothing else
- S2: the same mandate on a demand path with air-traffic-management gains
*/
export const SCENARIOS: Record<ScenarioId, ScenarioDefinition> = {
  S0: {
    label: 'Market-driven',
    description: 'Voluntary SAF uptake at a constant low share',
    share: 'voluntary',
    operationalGains: false
  },
  S1: {
    label: 'Mandate',
    description: 'Blending share follows the mandate schedule',
    share: 'mandate',
    operationalGains: false
  },
  S2: {
    label: 'Accelerated abatement',
    description: 'Mandate schedule plus operational efficiency gains',
    share: 'mandate',
    operationalGains: true
  }
};
