export class IdeationError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'IdeationError';
  }
}

export class IngestionError extends IdeationError {
  constructor(message: string, cause?: Error) {
    super(message, 'INGESTION_ERROR', cause);
    this.name = 'IngestionError';
  }
}

export class ExtractionError extends IdeationError {
  constructor(
    message: string,
    public readonly documentId: string,
    cause?: Error,
  ) {
    super(message, 'EXTRACTION_ERROR', cause);
    this.name = 'ExtractionError';
  }
}

export class EmptyCorpusError extends IdeationError {
  constructor(message: string) {
    super(message, 'EMPTY_CORPUS');
    this.name = 'EmptyCorpusError';
  }
}

export type OracleFailureKind = 'timeout' | 'rate-limit' | 'unavailable' | 'malformed' | 'refusal';

const TRANSIENT_KINDS: ReadonlySet<OracleFailureKind> = new Set<OracleFailureKind>([
  'timeout',
  'rate-limit',
  'unavailable',
]);

export class OracleError extends IdeationError {
  public readonly transient: boolean;

  constructor(
    message: string,
    public readonly kind: OracleFailureKind,
    cause?: Error,
  ) {
    super(message, 'ORACLE_ERROR', cause);
    this.name = 'OracleError';
    this.transient = TRANSIENT_KINDS.has(kind);
  }
}

export class DeadlineExceededError extends IdeationError {
  constructor(message = 'deadline exceeded') {
    super(message, 'DEADLINE_EXCEEDED');
    this.name = 'DeadlineExceededError';
  }
}

export class GraphInconsistencyError extends IdeationError {
  constructor(
    message: string,
    public readonly missingNodeIds: readonly string[],
  ) {
    super(message, 'GRAPH_INCONSISTENCY');
    this.name = 'GraphInconsistencyError';
  }
}

export class InvalidTransitionError extends IdeationError {
  constructor(message: string) {
    super(message, 'INVALID_TRANSITION');
    this.name = 'InvalidTransitionError';
  }
}

export class SchemaValidationError extends IdeationError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

export class ConfigurationError extends IdeationError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
