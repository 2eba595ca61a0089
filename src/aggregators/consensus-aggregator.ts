import { Injectable } from "@nestjs/common";
import { BaseService } from "@/common/base/base.service";
import {
  RoundOutcomeKind,
  type AcceptedSubmission,
  type AggregationResult,
  type FeedParameters,
  type RegistrySnapshot,
  type ScoredSubmission,
} from "@/common/types/core";
import { absoluteDeviations, median, totalWeight, weightedMean, weightedStdDev, type WeightedValue } from "@/common/utils/statistics.utils";

export type AggregationParameters = Pick<FeedParameters, "toleranceMultiplier" | "madFloor" | "minAgreement">;

export interface AggregationInput {
  submissions: readonly AcceptedSubmission[];
  snapshot: RegistrySnapshot;
  parameters: AggregationParameters;
}

/**
 * Value, then reporter. Summing inliers in this order makes the result independent of arrival order.
 */
export function compareCanonical(a: ScoredSubmission, b: ScoredSubmission): number {
  if (a.submission.value !== b.submission.value) {
    return a.submission.value < b.submission.value ? -1 : 1;
  }
  if (a.submission.reporter === b.submission.reporter) {
    return 0;
  }
  return a.submission.reporter < b.submission.reporter ? -1 : 1;
}

/**
 * Median/MAD outlier filter followed by a stake-weighted mean of the inliers.
 * Reads no clock and no shared state: the same input always gives the same result.
 */
@Injectable()
export class ConsensusAggregator extends BaseService {
  aggregate(input: AggregationInput): AggregationResult {
    const { submissions, snapshot, parameters } = input;
    if (submissions.length === 0) {
      throw new RangeError("Cannot aggregate a round without submissions");
    }

    const values = submissions.map(submission => submission.value);
    const center = median(values);
    const deviations = absoluteDeviations(values, center);
    const mad = median(deviations);
    const threshold = parameters.toleranceMultiplier * Math.max(mad, parameters.madFloor);

    const scored: ScoredSubmission[] = submissions.map((submission, index) => ({
      submission,
      weight: snapshot.get(submission.reporter)?.stake ?? 0,
      deviation: deviations[index],
      outlier: deviations[index] > threshold,
    }));

    const inliers = scored.filter(entry => !entry.outlier).sort(compareCanonical);
    const statistics = { median: center, mad, threshold, inlierCount: inliers.length, scored };

    if (inliers.length < parameters.minAgreement) {
      this.logDebug(
        `Only ${inliers.length} of ${submissions.length} submissions agree, ${parameters.minAgreement} required`,
        "aggregate"
      );
      return { kind: RoundOutcomeKind.InsufficientAgreement, ...statistics };
    }

    let weighted: WeightedValue[] = inliers.map(entry => ({ value: entry.submission.value, weight: entry.weight }));
    if (totalWeight(weighted) <= 0) {
      weighted = weighted.map(entry => ({ value: entry.value, weight: 1 }));
    }

    const value = weightedMean(weighted);
    const confidenceInterval = weightedStdDev(weighted, value);

    return { kind: RoundOutcomeKind.Published, ...statistics, value, confidenceInterval };
  }
}
