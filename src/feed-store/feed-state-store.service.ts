import { Injectable } from "@nestjs/common";
import { BaseService } from "@/common/base/base.service";
import {
  ConsensusEngineError,
  FeedStateCorruptionError,
  UnknownFeedError,
  WriterConflictError,
} from "@/common/errors/consensus-engine.errors";
import { ErrorCode } from "@/common/types/error-handling";
import type {
  AuditSettings,
  CoreFeedId,
  PublishedFeedRecord,
  RoundAuditRecord,
  RoundHistoryPointer,
} from "@/common/types/core";
import { FeedIdEncoder } from "@/common/utils/feed-id.utils";
import { ConfigService } from "@/config/config.service";

export interface PublishInput {
  value: number;
  confidenceInterval: number;
  timestamp: number; // unix seconds
  round: number;
}

/**
 * Exclusive write handle for one feed. Only the holder can publish or append round history.
 */
export interface FeedWriter {
  readonly feedKey: string;
  readonly owner: string;
  publish(input: PublishInput): PublishedFeedRecord;
  recordRound(pointer: RoundHistoryPointer, audit: RoundAuditRecord): void;
  release(): void;
}

interface FeedSlot {
  feed: Readonly<CoreFeedId>;
  feedKey: string;
  record?: PublishedFeedRecord;
  writer?: string;
  history: RoundHistoryPointer[];
  audits: RoundAuditRecord[];
}

@Injectable()
export class FeedStateStoreService extends BaseService {
  private readonly slots = new Map<string, FeedSlot>();
  private readonly audit: AuditSettings;

  constructor(configService: ConfigService) {
    super({ useEnhancedLogging: true });
    this.audit = { ...configService.getAuditSettings() };
  }

  registerFeed(feed: CoreFeedId): string {
    const feedKey = FeedIdEncoder.toKey(feed);
    if (!this.slots.has(feedKey)) {
      this.slots.set(feedKey, {
        feed: Object.freeze({ category: feed.category, name: feed.name }),
        feedKey,
        history: [],
        audits: [],
      });
    }
    return feedKey;
  }

  /**
   * Hands out the single writer for a feed. A second acquire, by anyone, throws until the first is released.
   */
  acquireWriter(feed: CoreFeedId, owner: string): FeedWriter {
    const slot = this.requireSlot(FeedIdEncoder.toKey(feed));
    if (slot.writer !== undefined) {
      throw new WriterConflictError(slot.feedKey, slot.writer, owner);
    }
    slot.writer = owner;

    let released = false;
    const assertHeld = (): void => {
      if (released) {
        throw new ConsensusEngineError(ErrorCode.WRITER_CONFLICT, `Writer ${owner} for ${slot.feedKey} was released`);
      }
    };

    return {
      feedKey: slot.feedKey,
      owner,
      publish: (input: PublishInput): PublishedFeedRecord => {
        assertHeld();
        return this.publish(slot, input);
      },
      recordRound: (pointer: RoundHistoryPointer, audit: RoundAuditRecord): void => {
        assertHeld();
        this.recordRound(slot, pointer, audit);
      },
      release: (): void => {
        if (!released) {
          released = true;
          slot.writer = undefined;
        }
      },
    };
  }

  getPublished(feed: CoreFeedId): PublishedFeedRecord | undefined {
    return this.requireSlot(FeedIdEncoder.toKey(feed)).record;
  }

  getHistory(feed: CoreFeedId): readonly RoundHistoryPointer[] {
    return [...this.requireSlot(FeedIdEncoder.toKey(feed)).history];
  }

  getAudit(feed: CoreFeedId, sequence: number): RoundAuditRecord | undefined {
    return this.requireSlot(FeedIdEncoder.toKey(feed)).audits.find(record => record.sequence === sequence);
  }

  private publish(slot: FeedSlot, input: PublishInput): PublishedFeedRecord {
    this.checkIntegrity(slot, input);

    const record: PublishedFeedRecord = Object.freeze({
      feed: slot.feed,
      feedKey: slot.feedKey,
      value: input.value,
      confidenceInterval: input.confidenceInterval,
      timestamp: input.timestamp,
      round: input.round,
    });
    slot.record = record;

    this.logCriticalOperation("feed_value_published", {
      feed: FeedIdEncoder.describe(slot.feed),
      round: record.round,
      value: record.value,
      confidenceInterval: record.confidenceInterval,
    });
    return record;
  }

  private checkIntegrity(slot: FeedSlot, input: PublishInput): void {
    const previous = slot.record;
    const label = FeedIdEncoder.describe(slot.feed);

    if (!Number.isFinite(input.value) || !Number.isFinite(input.confidenceInterval) || input.confidenceInterval < 0) {
      throw new FeedStateCorruptionError(slot.feedKey, `Non-finite value or interval for ${label}`, {
        value: input.value,
        confidenceInterval: input.confidenceInterval,
      });
    }
    if (!Number.isSafeInteger(input.round) || (previous !== undefined && input.round <= previous.round)) {
      throw new FeedStateCorruptionError(slot.feedKey, `Round sequence for ${label} did not advance`, {
        previous: previous?.round,
        next: input.round,
      });
    }
    if (previous !== undefined && input.timestamp < previous.timestamp) {
      throw new FeedStateCorruptionError(slot.feedKey, `Timestamp for ${label} went backwards`, {
        previous: previous.timestamp,
        next: input.timestamp,
      });
    }
  }

  private recordRound(slot: FeedSlot, pointer: RoundHistoryPointer, audit: RoundAuditRecord): void {
    const last = slot.history[slot.history.length - 1];
    if (last !== undefined && pointer.sequence <= last.sequence) {
      throw new FeedStateCorruptionError(slot.feedKey, `Round history for ${FeedIdEncoder.describe(slot.feed)} did not advance`, {
        previous: last.sequence,
        next: pointer.sequence,
      });
    }

    slot.history.push(Object.freeze({ ...pointer }));
    if (slot.history.length > this.audit.historyLength) {
      slot.history.splice(0, slot.history.length - this.audit.historyLength);
    }

    slot.audits.push(Object.freeze({ ...audit, submissions: Object.freeze([...audit.submissions]) }));
    if (slot.audits.length > this.audit.retentionRounds) {
      slot.audits.splice(0, slot.audits.length - this.audit.retentionRounds);
    }
  }

  private requireSlot(feedKey: string): FeedSlot {
    const slot = this.slots.get(feedKey);
    if (!slot) {
      throw new UnknownFeedError(feedKey);
    }
    return slot;
  }
}
