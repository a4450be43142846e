export enum ErrorCode {
  INVALID_CONFIG = 'INVALID_CONFIG',
  UNKNOWN_GENERATOR = 'UNKNOWN_GENERATOR',
  UNKNOWN_PARAMETER = 'UNKNOWN_PARAMETER',
  INVALID_SINKS = 'INVALID_SINKS',
  DUPLICATE_ANALYSIS = 'DUPLICATE_ANALYSIS',
  UNSUPPORTED_DIMENSIONALITY = 'UNSUPPORTED_DIMENSIONALITY',
  INTERRUPTED = 'INTERRUPTED',
  INVALID_STATE = 'INVALID_STATE',
  INVALID_RESULT = 'INVALID_RESULT',
  EXHAUSTED = 'EXHAUSTED'
}

export enum WarningCode {
  MISSING_RESULT = 'MISSING_RESULT',
  DUPLICATE_RESULT = 'DUPLICATE_RESULT'
}

export enum RunStatus {
  IDLE = 'IDLE',
  RUNNING = 'RUNNING',
  PAUSED = 'PAUSED',
  COMPLETED = 'COMPLETED',
  CANCELLED = 'CANCELLED',
  FAILED = 'FAILED'
}

export enum ExecutionMode {
  HOST = 'HOST',
  REMOTE = 'REMOTE'
}

export enum GeneratorKind {
  LINEAR = 'linear',
  LINEAR_STEP = 'linear_step',
  REFINING = 'refining',
  LIST = 'list',
  CENTRE_SPAN = 'centre_span',
  EXPANDING = 'expanding'
}

export enum ResultType {
  FLOAT = 'float',
  INT = 'int',
  BOOL = 'bool',
  OPAQUE = 'opaque'
}
