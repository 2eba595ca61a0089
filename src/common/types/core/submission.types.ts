import type { CoreFeedId } from "./feed.types";
import type { ReporterId } from "./reporter.types";

/**
 * The signed tuple. Field order matches the wire layout.
 */
export interface SubmissionPayload {
  reporter: ReporterId;
  feed: CoreFeedId;
  round: number;
  value: number;
  timestamp: number; // unix seconds
}

export interface Submission extends SubmissionPayload {
  signature: string; // 0x-prefixed, 65 bytes
}

export interface AcceptedSubmission extends Submission {
  arrivalIndex: number;
  receivedAt: number; // ms
}

export enum RejectionReason {
  Malformed = "malformed",
  UnknownFeed = "unknown-feed",
  FeedHalted = "feed-halted",
  UnknownReporter = "unknown-reporter",
  ReporterInactive = "reporter-inactive",
  InsufficientStake = "insufficient-stake",
  BadSignature = "bad-signature",
  WrongRound = "wrong-round",
  Duplicate = "duplicate",
  Stale = "stale",
}

export type ValidationResult = { accepted: true } | { accepted: false; reason: RejectionReason; message: string };

export interface SubmissionReceipt {
  accepted: boolean;
  reason?: RejectionReason;
  message?: string;
  feedKey?: string;
  round?: number;
  submissionCount?: number;
}
