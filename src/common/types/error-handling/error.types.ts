export enum ErrorSeverity {
  LOW = "low",
  MEDIUM = "medium",
  HIGH = "high",
  CRITICAL = "critical",
}

export enum ErrorCode {
  UNKNOWN_ERROR = "UNKNOWN_ERROR",
  VALIDATION_ERROR = "VALIDATION_ERROR",
  CONFIGURATION_ERROR = "CONFIGURATION_ERROR",

  // registry
  INVALID_REPORTER_ID = "INVALID_REPORTER_ID",
  REPORTER_NOT_FOUND = "REPORTER_NOT_FOUND",
  REPORTER_ALREADY_REGISTERED = "REPORTER_ALREADY_REGISTERED",
  INVALID_AMOUNT = "INVALID_AMOUNT",
  STAKE_BELOW_MINIMUM = "STAKE_BELOW_MINIMUM",
  INVALID_STATUS_TRANSITION = "INVALID_STATUS_TRANSITION",

  // feeds and rounds
  FEED_NOT_FOUND = "FEED_NOT_FOUND",
  FEED_ALREADY_REGISTERED = "FEED_ALREADY_REGISTERED",
  ROUND_NOT_FOUND = "ROUND_NOT_FOUND",
  ILLEGAL_ROUND_TRANSITION = "ILLEGAL_ROUND_TRANSITION",

  // published state
  FEED_STATE_CORRUPTION = "FEED_STATE_CORRUPTION",
  WRITER_CONFLICT = "WRITER_CONFLICT",

  MALFORMED_SUBMISSION = "MALFORMED_SUBMISSION",
}

/**
 * Error payload carried in every failed HTTP response. `code` is an ErrorCode for engine errors and
 * `HTTP_<status>` for framework exceptions that have no engine counterpart.
 */
export interface IErrorDetails {
  code: string;
  message: string;
  severity: ErrorSeverity;
  module?: string;
  timestamp: number;
  context?: Record<string, unknown>;
}

export interface HttpErrorResponse {
  success: false;
  error: IErrorDetails;
  timestamp: number;
  requestId?: string;
  statusCode: number;
  path: string;
  method: string;
}

export function createError(
  code: string,
  message: string,
  severity: ErrorSeverity = ErrorSeverity.HIGH,
  extra: Pick<IErrorDetails, "module" | "context"> = {}
): IErrorDetails {
  return { code, message, severity, timestamp: Date.now(), ...extra };
}

export function createHttpErrorResponse(
  statusCode: number,
  error: IErrorDetails,
  requestId: string | undefined,
  path: string,
  method: string
): HttpErrorResponse {
  return { success: false, error, timestamp: Date.now(), requestId, statusCode, path, method };
}
