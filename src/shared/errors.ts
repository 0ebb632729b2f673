export enum HarnessErrorCode {
  SETUP_FAILED = 'SETUP_FAILED',
  BINARY_NOT_FOUND = 'BINARY_NOT_FOUND',
  IMAGE_BUILD_FAILED = 'IMAGE_BUILD_FAILED',
  PORT_EXHAUSTED = 'PORT_EXHAUSTED',
  RESULTS_DIR_FAILED = 'RESULTS_DIR_FAILED',
  READINESS_TIMEOUT = 'READINESS_TIMEOUT',
  ENVIRONMENT_UNAVAILABLE = 'ENVIRONMENT_UNAVAILABLE',
  REQUEST_TIMEOUT = 'REQUEST_TIMEOUT',
  REQUEST_FAILED = 'REQUEST_FAILED',
  PROTOCOL_ERROR = 'PROTOCOL_ERROR',
  PROTOCOL_VIOLATION = 'PROTOCOL_VIOLATION',
  INVALID_STATE = 'INVALID_STATE',
  COMMAND_FAILED = 'COMMAND_FAILED',
  CANCELLED = 'CANCELLED',
}

export class HarnessError extends Error {
  readonly code: HarnessErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(
    code: HarnessErrorCode,
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'HarnessError';
    this.code = code;
    this.context = context;
  }
}

// Environmental conditions: the test should be reported as skipped, not failed.
export function isSkippable(err: unknown): boolean {
  return err instanceof HarnessError && err.code === HarnessErrorCode.ENVIRONMENT_UNAVAILABLE;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
