import type { CoreFeedId, FeedParameters } from "./feed.types";
import type { RegistrySnapshot, ReporterId } from "./reporter.types";
import type { AcceptedSubmission } from "./submission.types";

export type RoundPhase = "collecting" | "finalizing" | "finalized";

export type CloseReason = "quorum" | "deadline";

export enum RoundOutcomeKind {
  Published = "published",
  InsufficientQuorum = "insufficient-quorum",
  InsufficientAgreement = "insufficient-agreement",
}

export interface ScoredSubmission {
  submission: AcceptedSubmission;
  weight: number;
  deviation: number;
  outlier: boolean;
}

export interface AggregationStatistics {
  median: number;
  mad: number;
  threshold: number;
  inlierCount: number;
  scored: ScoredSubmission[]; // arrival order
}

export type PublishedAggregation = AggregationStatistics & {
  kind: RoundOutcomeKind.Published;
  value: number;
  confidenceInterval: number;
};

export type DisagreedAggregation = AggregationStatistics & {
  kind: RoundOutcomeKind.InsufficientAgreement;
};

export type AggregationResult = PublishedAggregation | DisagreedAggregation;

export interface InsufficientQuorumOutcome {
  kind: RoundOutcomeKind.InsufficientQuorum;
  submissionCount: number;
}

export type RoundOutcome = AggregationResult | InsufficientQuorumOutcome;

interface RoundBase {
  readonly feed: CoreFeedId;
  readonly feedKey: string;
  readonly sequence: number;
  readonly startTime: number; // ms
  readonly deadline: number; // ms
  readonly parameters: Readonly<FeedParameters>;
  readonly snapshot: RegistrySnapshot;
  readonly submissions: AcceptedSubmission[];
  readonly reporters: Set<ReporterId>;
}

export interface CollectingRound extends RoundBase {
  readonly phase: "collecting";
}

export interface FinalizingRound extends RoundBase {
  readonly phase: "finalizing";
  readonly closedAt: number;
  readonly closeReason: CloseReason;
}

export interface FinalizedRound extends RoundBase {
  readonly phase: "finalized";
  readonly closedAt: number;
  readonly closeReason: CloseReason;
  readonly outcome: RoundOutcome;
}

export type Round = CollectingRound | FinalizingRound | FinalizedRound;

/**
 * What the engine hands to listeners once a round is finalized
 */
export interface FinalizedRoundReport {
  feed: CoreFeedId;
  feedKey: string;
  sequence: number;
  closedAt: number;
  closeReason: CloseReason;
  outcome: RoundOutcome;
  submissions: readonly AcceptedSubmission[];
}
