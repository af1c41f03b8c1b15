export enum OracleErrorCode {
  INVALID_DIFF = 'INVALID_DIFF',
  NO_TEST_CHANGES = 'NO_TEST_CHANGES',
  NO_FIX_CHANGES = 'NO_FIX_CHANGES',
  PATCH_CONFLICT = 'PATCH_CONFLICT',
  SETUP_FAILURE = 'SETUP_FAILURE',
  ENVIRONMENT_FAILURE = 'ENVIRONMENT_FAILURE',
  GIT_ERROR = 'GIT_ERROR',
  INVALID_TRANSITION = 'INVALID_TRANSITION',
  WORKSPACE_BUSY = 'WORKSPACE_BUSY',
  WORKSPACE_DISPOSED = 'WORKSPACE_DISPOSED',
  CONFIG_INVALID = 'CONFIG_INVALID',
  TASK_NOT_FOUND = 'TASK_NOT_FOUND',
}

export class OracleError extends Error {
  readonly code: OracleErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: OracleErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'OracleError';
    this.code = code;
    this.context = context;
  }
}

export function isOracleError(err: unknown, code?: OracleErrorCode): err is OracleError {
  return err instanceof OracleError && (code === undefined || err.code === code);
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
