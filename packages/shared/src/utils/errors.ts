export class GraphgateError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'GraphgateError';
  }
}

export class GraphLoadError extends GraphgateError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: Error,
  ) {
    super(message, 'GRAPH_LOAD_ERROR', cause);
    this.name = 'GraphLoadError';
  }
}

export class ConstraintLoadError extends GraphgateError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: Error,
  ) {
    super(message, 'CONSTRAINT_LOAD_ERROR', cause);
    this.name = 'ConstraintLoadError';
  }
}

export class DataFormatError extends GraphgateError {
  constructor(
    message: string,
    public readonly lineNumber?: number,
    cause?: Error,
  ) {
    super(message, 'DATA_FORMAT_ERROR', cause);
    this.name = 'DataFormatError';
  }
}

export class AgentError extends GraphgateError {
  constructor(message: string, cause?: Error) {
    super(message, 'AGENT_ERROR', cause);
    this.name = 'AgentError';
  }
}

export class LlmError extends GraphgateError {
  constructor(
    message: string,
    public readonly retryable: boolean,
    cause?: Error,
  ) {
    super(message, 'LLM_ERROR', cause);
    this.name = 'LlmError';
  }
}

export class SchemaValidationError extends GraphgateError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

export class ConfigurationError extends GraphgateError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
