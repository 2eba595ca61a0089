import { setTimeout as sleep } from "timers/promises";
import type { ethers } from "ethers";
import { BaseService } from "@/common/base/base.service";
import type { CoreFeedId, Submission, SubmissionReceipt } from "@/common/types/core";
import { toUnixSeconds } from "@/common/utils/clock";
import { FeedIdEncoder } from "@/common/utils/feed-id.utils";
import { SubmissionSigner } from "@/submissions/submission-signer";

export interface DataSourceObservation {
  value: number;
  observedAt: number; // ms
}

/**
 * Where a reporter gets its value from. The engine never sees adapters; only agents call them.
 */
export interface DataSourceAdapter {
  readonly name: string;
  fetch(signal?: AbortSignal): Promise<DataSourceObservation>;
}

/**
 * The part of the engine an agent talks to
 */
export interface ReporterAgentTarget {
  getRoundStatus(feed: CoreFeedId): { sequence: number };
  submit(submission: Submission): SubmissionReceipt;
}

export interface ReporterAgentOptions {
  wallet: ethers.Signer;
  feed: CoreFeedId;
  adapter: DataSourceAdapter;
  target: ReporterAgentTarget;
}

/**
 * One reporting node for one feed: fetch → sign → submit. Aborting between steps drops the
 * attempt before anything reaches the engine.
 */
export class ReporterAgent extends BaseService {
  private readonly wallet: ethers.Signer;
  private readonly feed: CoreFeedId;
  private readonly adapter: DataSourceAdapter;
  private readonly target: ReporterAgentTarget;
  private attempts = 0;
  private lastReceipt?: SubmissionReceipt;

  constructor(options: ReporterAgentOptions) {
    super();
    this.wallet = options.wallet;
    this.feed = { ...options.feed };
    this.adapter = options.adapter;
    this.target = options.target;
  }

  async runOnce(signal?: AbortSignal): Promise<SubmissionReceipt> {
    signal?.throwIfAborted();
    this.attempts++;

    const { sequence } = this.target.getRoundStatus(this.feed);
    const observation = await this.adapter.fetch(signal);
    signal?.throwIfAborted();

    const submission = await SubmissionSigner.sign(this.wallet, {
      reporter: await this.wallet.getAddress(),
      feed: this.feed,
      round: sequence,
      value: observation.value,
      timestamp: toUnixSeconds(observation.observedAt),
    });
    signal?.throwIfAborted();

    const receipt = this.target.submit(submission);
    this.lastReceipt = receipt;
    if (!receipt.accepted) {
      this.logWarning(
        `Submission for ${FeedIdEncoder.describe(this.feed)} round ${sequence} rejected: ${receipt.reason}`,
        this.adapter.name
      );
    }
    return receipt;
  }

  /**
   * Submits every `intervalMs` until the signal aborts. Failed attempts are logged and the loop carries on.
   */
  async run(intervalMs: number, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.runOnce(signal);
      } catch (error) {
        if (signal.aborted) break;
        this.logError(error, "runOnce", { adapter: this.adapter.name });
      }

      try {
        await sleep(intervalMs, undefined, { signal });
      } catch (error) {
        if (signal.aborted) break;
        throw error;
      }
    }
  }

  getAttemptCount(): number {
    return this.attempts;
  }

  getLastReceipt(): SubmissionReceipt | undefined {
    return this.lastReceipt;
  }
}
