import { ErrorCode, ErrorSeverity, createError, type IErrorDetails } from "../types/error-handling";

/**
 * Base class for every error the engine throws. Carries the details the HTTP filter turns into a response.
 */
export class ConsensusEngineError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    public readonly context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = "ConsensusEngineError";
  }

  toErrorDetails(module?: string): IErrorDetails {
    return createError(this.code, this.message, this.severity, { module, context: this.context });
  }
}

export class RegistryError extends ConsensusEngineError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>) {
    super(code, message, ErrorSeverity.MEDIUM, context);
    this.name = "RegistryError";
  }
}

export class UnknownFeedError extends ConsensusEngineError {
  constructor(feedKey: string, context?: Record<string, unknown>) {
    super(ErrorCode.FEED_NOT_FOUND, `Feed not registered: ${feedKey}`, ErrorSeverity.LOW, { feedKey, ...context });
    this.name = "UnknownFeedError";
  }
}

/**
 * Structural corruption of published feed state. Fatal for the feed: it stays halted until an operator resumes it.
 */
export class FeedStateCorruptionError extends ConsensusEngineError {
  constructor(feedKey: string, message: string, context?: Record<string, unknown>) {
    super(ErrorCode.FEED_STATE_CORRUPTION, message, ErrorSeverity.CRITICAL, { feedKey, ...context });
    this.name = "FeedStateCorruptionError";
  }
}

export class WriterConflictError extends ConsensusEngineError {
  constructor(feedKey: string, holder: string, requester: string) {
    super(
      ErrorCode.WRITER_CONFLICT,
      `Feed ${feedKey} already has a writer (${holder}), ${requester} cannot acquire it`,
      ErrorSeverity.HIGH,
      { feedKey, holder, requester }
    );
    this.name = "WriterConflictError";
  }
}

export class IllegalRoundTransitionError extends ConsensusEngineError {
  constructor(feedKey: string, sequence: number, from: string, to: string) {
    super(
      ErrorCode.ILLEGAL_ROUND_TRANSITION,
      `Round ${sequence} of ${feedKey} cannot move from ${from} to ${to}`,
      ErrorSeverity.CRITICAL,
      { feedKey, sequence, from, to }
    );
    this.name = "IllegalRoundTransitionError";
  }
}

export class ConfigurationError extends ConsensusEngineError {
  constructor(message: string, public readonly errors: string[] = []) {
    super(ErrorCode.CONFIGURATION_ERROR, message, ErrorSeverity.CRITICAL, { errors });
    this.name = "ConfigurationError";
  }
}

export class MalformedSubmissionError extends ConsensusEngineError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCode.MALFORMED_SUBMISSION, message, ErrorSeverity.LOW, context);
    this.name = "MalformedSubmissionError";
  }
}
