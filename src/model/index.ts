/**
 * Model index - the library surface
 */

// Constants
export {
  HORIZON_START,
  HORIZON_END,
  YEARS,
  BILLION,
  SCENARIO_IDS,
  SCENARIOS
} from './constants';

// Types
export type {
  Assumptions,
  MandatePoint,
  MandateSchedule,
  ScenarioId,
  ScenarioDefinition,
  DemandPoint,
  ForecastPoint,
  DemandSeries,
  ScenarioYearResult,
  ResultMetric,
  ScenarioResult,
  ScenarioResults,
  ScenarioSummary,
  BaselineComparison,
  CorrelationMatrix
} from './types';

// Errors
export {
  ModelError,
  InvalidInputError,
  UnknownScenarioError,
  MalformedSeriesError
} from './errors';

// Configuration
export { defaults, buildAssumptions, AssumptionsSchema } from '../state/params';
export type { AssumptionOverrides } from '../state/params';

// Demand forecast
export { ForecastInputSchema, getTechFactor, getOperationalFactor, projectDemand } from './demand';
export type { ForecastInput } from './demand';

// Mandates
export { interpolateControlPoints, clampShare, getMandateShare } from './mandates';

// Emissions & finance
export { getSafEmissionFactor, calcEmissions } from './emissions';
export type { EmissionsResult } from './emissions';
export { getCarbonPrice, getSafPricePerTonne, calcCosts } from './finance';
export type { CostResult } from './finance';

// Scenario evaluation
export {
  isScenarioId,
  parseScenarioId,
  getScenarioShare,
  assertHorizonCoverage,
  evaluateScenario
} from './scenario';

// Scenario runner
export { getDemandPaths, runScenario, computeAll } from './computeAll';
export type { DemandPaths } from './computeAll';

// Summary metrics
export { getRow, summarizeScenario, compareToBaseline, correlationMatrix } from './summary';
