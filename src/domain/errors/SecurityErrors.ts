/**
 * SECURITY ERRORS
 *
 * Every failure the security core can run into maps to one of these classes.
 * Only ActionExecutionError is surfaced to callers; detector and store
 * failures are recovered locally and show up in logs, metrics and the
 * outcome's `degradedDetectors` / `persisted` fields.
 */

export enum SecurityErrorCode {
  DETECTOR_FAILED = 'VIGIL_E100',
  DETECTOR_TIMEOUT = 'VIGIL_E101',
  STORE_UNAVAILABLE = 'VIGIL_E200',
  ACTION_FAILED = 'VIGIL_E300',
  INVALID_CONFIGURATION = 'VIGIL_E400',
  INVALID_PROFILE = 'VIGIL_E401',
}

export class SecurityError extends Error {
  readonly code: SecurityErrorCode;

  constructor(code: SecurityErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'SecurityError';
    this.code = code;
  }
}

/**
 * A single detector crashed or ran out of time. The pipeline treats it as
 * "no finding" for that detector.
 */
export class DetectorFailure extends SecurityError {
  readonly detector: string;
  readonly timedOut: boolean;

  constructor(detector: string, message: string, options: { timedOut?: boolean; cause?: unknown } = {}) {
    super(
      options.timedOut ? SecurityErrorCode.DETECTOR_TIMEOUT : SecurityErrorCode.DETECTOR_FAILED,
      `Detector "${detector}" failed: ${message}`,
      options.cause
    );
    this.name = 'DetectorFailure';
    this.detector = detector;
    this.timedOut = options.timedOut ?? false;
  }
}

/**
 * Profile load/save failed after retries.
 */
export class StoreUnavailableError extends SecurityError {
  readonly operation: 'load' | 'save';

  constructor(operation: 'load' | 'save', message: string, cause?: unknown) {
    super(SecurityErrorCode.STORE_UNAVAILABLE, `Profile store ${operation} failed: ${message}`, cause);
    this.name = 'StoreUnavailableError';
    this.operation = operation;
  }
}

/**
 * A decided punishment could not be carried out on the platform.
 */
export class ActionExecutionError extends SecurityError {
  readonly action: string;
  readonly userId: string;

  constructor(action: string, userId: string, message: string, cause?: unknown) {
    super(SecurityErrorCode.ACTION_FAILED, `Failed to apply ${action} to ${userId}: ${message}`, cause);
    this.name = 'ActionExecutionError';
    this.action = action;
    this.userId = userId;
  }
}

/**
 * Invalid thresholds, tables or patterns. Raised at startup only.
 */
export class ConfigurationError extends SecurityError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(
      SecurityErrorCode.INVALID_CONFIGURATION,
      issues.length > 0 ? `${message}: ${issues.join('; ')}` : message
    );
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
