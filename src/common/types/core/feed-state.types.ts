import type { CoreFeedId } from "./feed.types";
import type { ReporterId } from "./reporter.types";
import type { CloseReason, RoundOutcomeKind } from "./round.types";

/**
 * The published triplet plus its round. Readable by anyone, replaced whole on every publish.
 */
export interface PublishedFeedRecord {
  readonly feed: Readonly<CoreFeedId>;
  readonly feedKey: string;
  readonly value: number;
  readonly confidenceInterval: number;
  readonly timestamp: number; // unix seconds, round close time
  readonly round: number;
}

export interface RoundHistoryPointer {
  readonly sequence: number;
  readonly outcome: RoundOutcomeKind;
  readonly closedAt: number; // ms
}

export interface AuditedSubmission {
  readonly reporter: ReporterId;
  readonly value: number;
  readonly timestamp: number;
  readonly signature: string;
  readonly arrivalIndex: number;
  readonly weight?: number;
  readonly deviation?: number;
  readonly outlier: boolean;
}

export interface RoundAuditRecord {
  readonly feed: Readonly<CoreFeedId>;
  readonly feedKey: string;
  readonly sequence: number;
  readonly outcome: RoundOutcomeKind;
  readonly closeReason: CloseReason;
  readonly closedAt: number;
  readonly median?: number;
  readonly threshold?: number;
  readonly value?: number;
  readonly confidenceInterval?: number;
  readonly submissions: readonly AuditedSubmission[];
}

export interface AuditSettings {
  retentionRounds: number;
  historyLength: number;
}
