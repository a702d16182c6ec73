export class ModelError extends Error {
  public details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ModelError';
    this.details = details;
  }
}

export class InvalidInputError extends ModelError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'InvalidInputError';
  }
}

export class UnknownScenarioError extends ModelError {
  public scenario: string;

  constructor(scenario: string, known: readonly string[]) {
    super(`Unknown scenario '${scenario}'. Expected one of: ${known.join(', ')}`, { known });
    this.name = 'UnknownScenarioError';
    this.scenario = scenario;
  }
}

export class MalformedSeriesError extends ModelError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'MalformedSeriesError';
  }
}
