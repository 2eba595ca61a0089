import { ethers } from "ethers";
import {
  FeedCategory,
  ReporterStatus,
  type AcceptedSubmission,
  type CoreFeedId,
  type RegistrySnapshot,
  type ReporterView,
  type FeedDefinition,
  type FeedParameters,
  type Submission,
  type SubmissionPayload,
} from "@/common/types/core";
import { SubmissionSigner } from "@/submissions/submission-signer";

/**
 * Builder pattern for creating test data objects
 */
export class TestDataBuilder {
  /**
   * Create a valid CoreFeedId for testing
   */
  static createCoreFeedId(overrides: Partial<CoreFeedId> = {}): CoreFeedId {
    return {
      category: FeedCategory.Crypto,
      name: "TEST/USD",
      ...overrides,
    };
  }

  static createFeedParameters(overrides: Partial<FeedParameters> = {}): FeedParameters {
    return {
      minQuorum: 3,
      roundDurationMs: 60000,
      toleranceMultiplier: 3,
      madFloor: 0.000001,
      minAgreement: 3,
      maxClockSkewMs: 5000,
      ...overrides,
    };
  }

  static createFeedDefinition(
    parameterOverrides: Partial<FeedParameters> = {},
    feed: Partial<CoreFeedId> = {}
  ): FeedDefinition {
    return {
      feed: TestDataBuilder.createCoreFeedId(feed),
      parameters: TestDataBuilder.createFeedParameters(parameterOverrides),
    };
  }

  /**
   * Deterministic wallet for reporter `index` (1-based). The key is the index itself, zero-padded.
   */
  static createWallet(index: number): ethers.Wallet {
    if (!Number.isInteger(index) || index < 1) {
      throw new RangeError(`Wallet index must be a positive integer, got ${index}`);
    }
    return new ethers.Wallet(ethers.zeroPadValue(ethers.toBeHex(index), 32));
  }

  static createWallets(count: number): ethers.Wallet[] {
    return Array.from({ length: count }, (_, index) => TestDataBuilder.createWallet(index + 1));
  }

  /**
   * Signed submission from `wallet`. Payload fields default to round 1 of TEST/USD at value 100.
   */
  static createSignedSubmission(
    wallet: ethers.BaseWallet,
    overrides: Partial<Omit<SubmissionPayload, "reporter">> = {}
  ): Submission {
    return SubmissionSigner.signSync(wallet, {
      reporter: wallet.address,
      feed: TestDataBuilder.createCoreFeedId(),
      round: 1,
      value: 100,
      timestamp: 1_700_000_000,
      ...overrides,
    });
  }

  /**
   * Accepted submission with a placeholder signature, for code that never checks signatures
   */
  static createAcceptedSubmission(
    reporter: string,
    value: number,
    arrivalIndex: number,
    overrides: Partial<AcceptedSubmission> = {}
  ): AcceptedSubmission {
    return {
      reporter,
      feed: TestDataBuilder.createCoreFeedId(),
      round: 1,
      value,
      timestamp: 1_700_000_000,
      signature: `0x${"11".repeat(65)}`,
      arrivalIndex,
      receivedAt: 1_700_000_000_000 + arrivalIndex,
      ...overrides,
    };
  }

  static createReporterView(id: string, overrides: Partial<ReporterView> = {}): ReporterView {
    return {
      id,
      stake: 10,
      reputation: 50,
      status: ReporterStatus.Active,
      registeredAt: 0,
      updatedAt: 0,
      participation: [],
      ...overrides,
    };
  }

  static createSnapshot(entries: ReadonlyArray<{ id: string; stake: number }>): RegistrySnapshot {
    return new Map(entries.map(entry => [entry.id, TestDataBuilder.createReporterView(entry.id, { stake: entry.stake })]));
  }
}
