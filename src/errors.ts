import { ErrorCode } from './types/enums.js';

export class ScanError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'ScanError';
    this.code = code;
  }
}

export class ConfigError extends ScanError {
  constructor(message: string, code: ErrorCode = ErrorCode.INVALID_CONFIG) {
    super(code, message);
    this.name = 'ConfigError';
  }
}

export class UnsupportedDimensionalityError extends ConfigError {
  readonly axisCount: number;

  constructor(axisCount: number, maxAxes: number) {
    super(
      `${axisCount}-dimensional scans are not supported on a remote target (at most ${maxAxes} axes)`,
      ErrorCode.UNSUPPORTED_DIMENSIONALITY
    );
    this.name = 'UnsupportedDimensionalityError';
    this.axisCount = axisCount;
  }
}

export class ScanInterruptedError extends ScanError {
  constructor(message = 'Scan interrupted') {
    super(ErrorCode.INTERRUPTED, message);
    this.name = 'ScanInterruptedError';
  }
}

export class ScanStateError extends ScanError {
  constructor(message: string) {
    super(ErrorCode.INVALID_STATE, message);
    this.name = 'ScanStateError';
  }
}

export class ResultTypeError extends ScanError {
  constructor(message: string) {
    super(ErrorCode.INVALID_RESULT, message);
    this.name = 'ResultTypeError';
  }
}

/**
 * Raised by the chunk source when no points are left. Never leaves the runner.
 */
export class ScanExhausted extends ScanError {
  constructor() {
    super(ErrorCode.EXHAUSTED, 'Scan points exhausted');
    this.name = 'ScanExhausted';
  }
}

export function isInterruption(err: unknown): err is ScanInterruptedError {
  return err instanceof ScanInterruptedError;
}
