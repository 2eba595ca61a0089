import { Inject, Injectable } from "@nestjs/common";
import { LifecycleService } from "@/common/base/composed.service";
import {
  ConfigurationError,
  ConsensusEngineError,
  FeedStateCorruptionError,
  MalformedSubmissionError,
  UnknownFeedError,
} from "@/common/errors/consensus-engine.errors";
import { ErrorCode, ErrorSeverity } from "@/common/types/error-handling";
import {
  RejectionReason,
  RoundOutcomeKind,
  type AcceptedSubmission,
  type AuditedSubmission,
  type CloseReason,
  type CoreFeedId,
  type FeedDefinition,
  type FinalizedRound,
  type FinalizedRoundReport,
  type FinalizingRound,
  type PublishedFeedRecord,
  type ReporterId,
  type Round,
  type RoundHistoryPointer,
  type RoundAuditRecord,
  type RoundOutcome,
  type RoundPhase,
  type Submission,
  type SubmissionReceipt,
} from "@/common/types/core";
import { CLOCK, toUnixSeconds, type Clock } from "@/common/utils/clock";
import { FeedIdEncoder } from "@/common/utils/feed-id.utils";
import { ConfigService } from "@/config/config.service";
import { ConsensusAggregator } from "@/aggregators/consensus-aggregator";
import { FeedStateStoreService, type FeedWriter } from "@/feed-store/feed-state-store.service";
import { ReporterRegistryService } from "@/registry/reporter-registry.service";
import { AnomalySlashingService } from "@/slashing/anomaly-slashing.service";
import { SubmissionCodec } from "@/submissions/submission-codec";
import { SubmissionValidatorService } from "@/submissions/submission-validator.service";
import { beginFinalizing, completeRound, openRound } from "./round-state";

export const ROUND_EVENTS = {
  ROUND_FINALIZED: "round.finalized",
  FEED_HALTED: "feed.halted",
} as const;

const WRITER_OWNER = "ConsensusRoundEngine";

export type RejectionCounters = Record<RejectionReason, number>;
export type OutcomeCounters = Record<RoundOutcomeKind, number>;

export interface FeedCounters {
  accepted: number;
  rejected: RejectionCounters;
  outcomes: OutcomeCounters;
}

export interface RoundStatus {
  feed: CoreFeedId;
  feedKey: string;
  sequence: number;
  phase: RoundPhase;
  startTime: number;
  deadline: number;
  minQuorum: number;
  submissionCount: number;
  reporters: ReporterId[];
}

export interface FeedStatus {
  feed: CoreFeedId;
  feedKey: string;
  halted: boolean;
  haltReason?: string;
  round: RoundStatus;
  lastOutcome?: RoundOutcomeKind;
  published?: PublishedFeedRecord;
  history: readonly RoundHistoryPointer[];
}

export interface FeedHaltedEvent {
  feed: CoreFeedId;
  feedKey: string;
  sequence: number;
  reason: string;
  at: number;
}

export interface EngineMetrics {
  feeds: { feed: CoreFeedId; feedKey: string; halted: boolean; counters: FeedCounters }[];
  unroutedRejections: RejectionCounters;
}

interface FeedRuntime {
  definition: FeedDefinition;
  feedKey: string;
  writer: FeedWriter;
  round: Round;
  lastFinalized?: FinalizedRound;
  halted?: { reason: string; at: number };
  timer?: NodeJS.Timeout;
  nextArrival: number;
  counters: FeedCounters;
}

function emptyRejections(): RejectionCounters {
  return {
    [RejectionReason.Malformed]: 0,
    [RejectionReason.UnknownFeed]: 0,
    [RejectionReason.FeedHalted]: 0,
    [RejectionReason.UnknownReporter]: 0,
    [RejectionReason.ReporterInactive]: 0,
    [RejectionReason.InsufficientStake]: 0,
    [RejectionReason.BadSignature]: 0,
    [RejectionReason.WrongRound]: 0,
    [RejectionReason.Duplicate]: 0,
    [RejectionReason.Stale]: 0,
  };
}

function emptyOutcomes(): OutcomeCounters {
  return {
    [RoundOutcomeKind.Published]: 0,
    [RoundOutcomeKind.InsufficientQuorum]: 0,
    [RoundOutcomeKind.InsufficientAgreement]: 0,
  };
}

/**
 * Per-feed round state machine: collecting → finalizing → finalized, then the next sequence opens.
 *
 * Admission and finalization are synchronous, so each runs to completion on the event loop before
 * any other submission for the same feed is looked at. Deadlines are enforced by managed timers and
 * by `expireDueRounds`, which also runs before every submission.
 */
@Injectable()
export class ConsensusRoundEngineService extends LifecycleService {
  private readonly feeds = new Map<string, FeedRuntime>();
  private readonly unroutedRejections = emptyRejections();
  private readonly scheduleDeadlines: boolean;

  constructor(
    private readonly configService: ConfigService,
    private readonly registry: ReporterRegistryService,
    private readonly validator: SubmissionValidatorService,
    private readonly aggregator: ConsensusAggregator,
    private readonly store: FeedStateStoreService,
    private readonly slashing: AnomalySlashingService,
    @Inject(CLOCK) private readonly clock: Clock
  ) {
    super({ useEnhancedLogging: true });
    this.scheduleDeadlines = configService.getEngineSettings().scheduleDeadlines;
  }

  override async initialize(): Promise<void> {
    for (const definition of this.configService.getFeedDefinitions()) {
      this.registerFeed(definition);
    }
  }

  override async cleanup(): Promise<void> {
    for (const runtime of this.feeds.values()) {
      runtime.timer = undefined;
      runtime.writer.release();
    }
  }

  /**
   * Adds a feed and opens its first round. Feed parameters are fixed from here on.
   */
  registerFeed(definition: FeedDefinition): FeedStatus {
    const label = FeedIdEncoder.describe(definition.feed);
    const errors = ConfigService.validateParameters(label, definition.parameters);
    if (errors.length > 0) {
      throw new ConfigurationError(`Invalid parameters for feed ${label}`, errors);
    }

    const feedKey = FeedIdEncoder.toKey(definition.feed);
    if (this.feeds.has(feedKey)) {
      throw new ConsensusEngineError(ErrorCode.FEED_ALREADY_REGISTERED, `Feed ${label} is already registered`, ErrorSeverity.LOW, {
        feedKey,
      });
    }

    this.store.registerFeed(definition.feed);
    const writer = this.store.acquireWriter(definition.feed, WRITER_OWNER);
    const runtime: FeedRuntime = {
      definition: { feed: { ...definition.feed }, parameters: { ...definition.parameters } },
      feedKey,
      writer,
      round: this.createRound(definition, feedKey, 1, this.clock.now()),
      nextArrival: 0,
      counters: { accepted: 0, rejected: emptyRejections(), outcomes: emptyOutcomes() },
    };
    this.feeds.set(feedKey, runtime);
    this.scheduleDeadline(runtime);

    this.logger.log(`Feed ${label} registered, round 1 open until ${runtime.round.deadline}`);
    return this.toFeedStatus(runtime);
  }

  submit(submission: Submission): SubmissionReceipt {
    const now = this.clock.now();
    this.expireDueRounds(now);

    const shape = this.validator.checkWellFormed(submission);
    if (!shape.accepted) {
      return this.rejectUnrouted(shape.reason, shape.message);
    }

    let feedKey: string;
    try {
      feedKey = FeedIdEncoder.toKey(submission.feed);
    } catch (error) {
      if (error instanceof MalformedSubmissionError) {
        return this.rejectUnrouted(RejectionReason.Malformed, error.message);
      }
      throw error;
    }

    const runtime = this.feeds.get(feedKey);
    if (!runtime) {
      return this.rejectUnrouted(RejectionReason.UnknownFeed, `Feed ${FeedIdEncoder.describe(submission.feed)} is not registered`);
    }
    if (runtime.halted) {
      return this.reject(runtime, RejectionReason.FeedHalted, `Feed is halted: ${runtime.halted.reason}`);
    }

    const round = runtime.round;
    if (round.phase !== "collecting") {
      return this.reject(runtime, RejectionReason.WrongRound, `Round ${round.sequence} is ${round.phase}`);
    }

    const result = this.validator.validate(submission, {
      round,
      minimumStake: this.registry.getPolicy().minimumStake,
    });
    if (!result.accepted) {
      return this.reject(runtime, result.reason, result.message);
    }

    const accepted: AcceptedSubmission = {
      ...SubmissionCodec.payloadOf(submission),
      signature: submission.signature,
      arrivalIndex: runtime.nextArrival++,
      receivedAt: now,
    };
    round.submissions.push(accepted);
    round.reporters.add(accepted.reporter);
    runtime.counters.accepted++;

    const receipt: SubmissionReceipt = {
      accepted: true,
      feedKey,
      round: round.sequence,
      submissionCount: round.submissions.length,
    };

    if (round.reporters.size >= round.parameters.minQuorum) {
      this.closeRound(runtime, "quorum", now, now);
    }
    return receipt;
  }

  /**
   * Wire-format intake: 130 bytes, as raw bytes or hex
   */
  submitRaw(raw: string | Uint8Array): SubmissionReceipt {
    let submission: Submission;
    try {
      submission = typeof raw === "string" ? SubmissionCodec.fromHex(raw) : SubmissionCodec.decode(raw);
    } catch (error) {
      if (error instanceof MalformedSubmissionError) {
        return this.rejectUnrouted(RejectionReason.Malformed, error.message);
      }
      throw error;
    }
    return this.submit(submission);
  }

  /**
   * Closes every open round whose deadline has passed. Returns the reports of the rounds it closed.
   */
  expireDueRounds(now: number = this.clock.now()): FinalizedRoundReport[] {
    const reports: FinalizedRoundReport[] = [];
    for (const runtime of this.feeds.values()) {
      const round = runtime.round;
      if (runtime.halted || round.phase !== "collecting" || round.deadline > now) {
        continue;
      }
      const report = this.closeRound(runtime, "deadline", round.deadline, now);
      if (report) reports.push(report);
    }
    return reports;
  }

  /**
   * Stops a feed: the open round is abandoned and submissions are rejected until `resumeFeed`
   */
  haltFeed(feed: CoreFeedId, reason: string): FeedStatus {
    const runtime = this.requireRuntime(feed);
    if (!runtime.halted) {
      this.haltRuntime(runtime, reason, this.clock.now());
    }
    return this.toFeedStatus(runtime);
  }

  resumeFeed(feed: CoreFeedId): FeedStatus {
    const runtime = this.requireRuntime(feed);
    if (!runtime.halted) {
      throw new ConsensusEngineError(
        ErrorCode.INVALID_STATUS_TRANSITION,
        `Feed ${FeedIdEncoder.describe(feed)} is not halted`,
        ErrorSeverity.LOW,
        { feedKey: runtime.feedKey }
      );
    }

    const previous = runtime.halted;
    runtime.halted = undefined;
    this.openNextRound(runtime, runtime.round.sequence + 1, this.clock.now());

    this.logCriticalOperation("feed_resumed", {
      feed: FeedIdEncoder.describe(feed),
      haltReason: previous.reason,
      round: runtime.round.sequence,
    });
    return this.toFeedStatus(runtime);
  }

  getRoundStatus(feed: CoreFeedId): RoundStatus {
    this.expireDueRounds();
    return this.toRoundStatus(this.requireRuntime(feed).round);
  }

  getFeedStatus(feed: CoreFeedId): FeedStatus {
    return this.toFeedStatus(this.requireRuntime(feed));
  }

  listFeedStatuses(): FeedStatus[] {
    return [...this.feeds.values()].map(runtime => this.toFeedStatus(runtime));
  }

  getLastFinalized(feed: CoreFeedId): FinalizedRound | undefined {
    const round = this.requireRuntime(feed).lastFinalized;
    if (!round) return undefined;
    return {
      ...round,
      feed: { ...round.feed },
      submissions: round.submissions.map(submission => ({ ...submission, feed: { ...submission.feed } })),
      reporters: new Set(round.reporters),
    };
  }

  getPublished(feed: CoreFeedId): PublishedFeedRecord | undefined {
    this.requireRuntime(feed);
    return this.store.getPublished(feed);
  }

  getRoundAudit(feed: CoreFeedId, sequence: number): RoundAuditRecord {
    this.requireRuntime(feed);
    const record = this.store.getAudit(feed, sequence);
    if (!record) {
      throw new ConsensusEngineError(
        ErrorCode.ROUND_NOT_FOUND,
        `No audit record for round ${sequence} of ${FeedIdEncoder.describe(feed)}`,
        ErrorSeverity.LOW,
        { sequence }
      );
    }
    return record;
  }

  isHalted(feed: CoreFeedId): boolean {
    return this.requireRuntime(feed).halted !== undefined;
  }

  getMetrics(): EngineMetrics {
    return {
      feeds: [...this.feeds.values()].map(runtime => ({
        feed: { ...runtime.definition.feed },
        feedKey: runtime.feedKey,
        halted: runtime.halted !== undefined,
        counters: {
          accepted: runtime.counters.accepted,
          rejected: { ...runtime.counters.rejected },
          outcomes: { ...runtime.counters.outcomes },
        },
      })),
      unroutedRejections: { ...this.unroutedRejections },
    };
  }

  private closeRound(
    runtime: FeedRuntime,
    reason: CloseReason,
    closedAt: number,
    now: number
  ): FinalizedRoundReport | undefined {
    this.clearRoundTimer(runtime);

    const sequence = runtime.round.sequence;
    const timerId = `finalize:${runtime.feedKey}:${sequence}`;
    this.startPerformanceTimer(timerId, "round_finalization", { feedKey: runtime.feedKey, sequence });

    const finalizing = beginFinalizing(runtime.round, closedAt, reason);
    runtime.round = finalizing;
    const finalized = completeRound(finalizing, this.computeOutcome(finalizing));
    runtime.round = finalized;
    runtime.lastFinalized = finalized;

    const outcome = finalized.outcome;
    runtime.counters.outcomes[outcome.kind]++;

    const report: FinalizedRoundReport = {
      feed: { ...finalized.feed },
      feedKey: finalized.feedKey,
      sequence,
      closedAt,
      closeReason: reason,
      outcome,
      submissions: [...finalized.submissions],
    };

    try {
      if (outcome.kind === RoundOutcomeKind.Published) {
        runtime.writer.publish({
          value: outcome.value,
          confidenceInterval: outcome.confidenceInterval,
          timestamp: toUnixSeconds(closedAt),
          round: sequence,
        });
      }
      runtime.writer.recordRound({ sequence, outcome: outcome.kind, closedAt }, this.buildAudit(finalized));
    } catch (error) {
      if (error instanceof FeedStateCorruptionError) {
        this.endPerformanceTimer(timerId, false);
        this.haltRuntime(runtime, error.message, closedAt);
        return undefined;
      }
      throw error;
    }

    const label = FeedIdEncoder.describe(finalized.feed);
    switch (outcome.kind) {
      case RoundOutcomeKind.Published:
        this.logCriticalOperation("round_finalized", {
          feed: label,
          round: sequence,
          closeReason: reason,
          value: outcome.value,
          confidenceInterval: outcome.confidenceInterval,
          inliers: outcome.inlierCount,
          submissions: finalized.submissions.length,
        });
        this.slashing.applyRoundReport(report);
        break;
      case RoundOutcomeKind.InsufficientQuorum:
        this.logWarning(
          `Round ${sequence} of ${label} closed with ${outcome.submissionCount} of ${finalized.parameters.minQuorum} required reporters`,
          "insufficient-quorum"
        );
        break;
      case RoundOutcomeKind.InsufficientAgreement:
        this.logWarning(
          `Round ${sequence} of ${label} has ${outcome.inlierCount} agreeing submissions, ${finalized.parameters.minAgreement} required`,
          "insufficient-agreement"
        );
        break;
    }

    this.endPerformanceTimer(timerId, true, { outcome: outcome.kind });
    this.emitWithLogging(ROUND_EVENTS.ROUND_FINALIZED, report);

    this.openNextRound(runtime, sequence + 1, Math.max(closedAt, now));
    return report;
  }

  private computeOutcome(round: FinalizingRound): RoundOutcome {
    if (round.closeReason === "deadline" && round.reporters.size < round.parameters.minQuorum) {
      return { kind: RoundOutcomeKind.InsufficientQuorum, submissionCount: round.submissions.length };
    }
    return this.aggregator.aggregate({
      submissions: round.submissions,
      snapshot: round.snapshot,
      parameters: round.parameters,
    });
  }

  private buildAudit(round: FinalizedRound): RoundAuditRecord {
    const base = {
      feed: { ...round.feed },
      feedKey: round.feedKey,
      sequence: round.sequence,
      outcome: round.outcome.kind,
      closeReason: round.closeReason,
      closedAt: round.closedAt,
    };
    const outcome = round.outcome;

    if (outcome.kind === RoundOutcomeKind.InsufficientQuorum) {
      return {
        ...base,
        submissions: round.submissions.map(submission => ({ ...this.auditedSubmission(submission), outlier: false })),
      };
    }

    const submissions: AuditedSubmission[] = outcome.scored.map(entry => ({
      ...this.auditedSubmission(entry.submission),
      weight: entry.weight,
      deviation: entry.deviation,
      outlier: entry.outlier,
    }));

    if (outcome.kind === RoundOutcomeKind.Published) {
      return {
        ...base,
        median: outcome.median,
        threshold: outcome.threshold,
        value: outcome.value,
        confidenceInterval: outcome.confidenceInterval,
        submissions,
      };
    }
    return { ...base, median: outcome.median, threshold: outcome.threshold, submissions };
  }

  private auditedSubmission(submission: AcceptedSubmission): Omit<AuditedSubmission, "outlier"> {
    return {
      reporter: submission.reporter,
      value: submission.value,
      timestamp: submission.timestamp,
      signature: submission.signature,
      arrivalIndex: submission.arrivalIndex,
    };
  }

  private createRound(definition: FeedDefinition, feedKey: string, sequence: number, startTime: number): Round {
    return openRound({
      feed: definition.feed,
      feedKey,
      sequence,
      startTime,
      parameters: definition.parameters,
      snapshot: this.registry.snapshot(),
    });
  }

  private openNextRound(runtime: FeedRuntime, sequence: number, startTime: number): void {
    runtime.round = this.createRound(runtime.definition, runtime.feedKey, sequence, startTime);
    runtime.nextArrival = 0;
    this.scheduleDeadline(runtime);
  }

  private scheduleDeadline(runtime: FeedRuntime): void {
    if (!this.scheduleDeadlines) {
      return;
    }
    const { sequence, deadline } = runtime.round;
    runtime.timer = this.createTimeout(
      () => this.onDeadline(runtime.feedKey, sequence),
      deadline - this.clock.now()
    );
  }

  private onDeadline(feedKey: string, sequence: number): void {
    const runtime = this.feeds.get(feedKey);
    if (!runtime || runtime.halted || runtime.round.sequence !== sequence || runtime.round.phase !== "collecting") {
      return;
    }
    runtime.timer = undefined;

    // Timers may fire a little before the clock reaches the deadline
    if (this.clock.now() < runtime.round.deadline) {
      this.scheduleDeadline(runtime);
      return;
    }

    try {
      this.expireDueRounds();
    } catch (error) {
      this.logError(error, "deadline", { feedKey, sequence });
    }
  }

  private clearRoundTimer(runtime: FeedRuntime): void {
    if (runtime.timer) {
      this.clearTimer(runtime.timer);
      runtime.timer = undefined;
    }
  }

  private haltRuntime(runtime: FeedRuntime, reason: string, at: number): void {
    this.clearRoundTimer(runtime);
    runtime.halted = { reason, at };

    const event: FeedHaltedEvent = {
      feed: { ...runtime.definition.feed },
      feedKey: runtime.feedKey,
      sequence: runtime.round.sequence,
      reason,
      at,
    };
    this.logCriticalOperation("feed_halted", { ...event }, false);
    this.emitWithLogging(ROUND_EVENTS.FEED_HALTED, event);
  }

  private reject(runtime: FeedRuntime, reason: RejectionReason, message: string): SubmissionReceipt {
    runtime.counters.rejected[reason]++;
    this.logDebug(message, reason);
    return { accepted: false, reason, message, feedKey: runtime.feedKey, round: runtime.round.sequence };
  }

  private rejectUnrouted(reason: RejectionReason, message: string): SubmissionReceipt {
    this.unroutedRejections[reason]++;
    this.logDebug(message, reason);
    return { accepted: false, reason, message };
  }

  private requireRuntime(feed: CoreFeedId): FeedRuntime {
    const feedKey = FeedIdEncoder.toKey(feed);
    const runtime = this.feeds.get(feedKey);
    if (!runtime) {
      throw new UnknownFeedError(feedKey, { feed: FeedIdEncoder.describe(feed) });
    }
    return runtime;
  }

  private toRoundStatus(round: Round): RoundStatus {
    return {
      feed: { ...round.feed },
      feedKey: round.feedKey,
      sequence: round.sequence,
      phase: round.phase,
      startTime: round.startTime,
      deadline: round.deadline,
      minQuorum: round.parameters.minQuorum,
      submissionCount: round.submissions.length,
      reporters: [...round.reporters],
    };
  }

  private toFeedStatus(runtime: FeedRuntime): FeedStatus {
    return {
      feed: { ...runtime.definition.feed },
      feedKey: runtime.feedKey,
      halted: runtime.halted !== undefined,
      haltReason: runtime.halted?.reason,
      round: this.toRoundStatus(runtime.round),
      lastOutcome: runtime.lastFinalized?.outcome.kind,
      published: this.store.getPublished(runtime.definition.feed),
      history: this.store.getHistory(runtime.definition.feed),
    };
  }
}
