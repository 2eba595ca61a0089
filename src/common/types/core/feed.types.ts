/**
 * Core feed type definitions
 */

export enum FeedCategory {
  Crypto = 1,
  Forex = 2,
  Commodity = 3,
  Stock = 4,
}

export interface CoreFeedId {
  category: FeedCategory;
  name: string;
}

/**
 * Consensus parameters a feed is registered with. Set by governance, read by the round engine.
 */
export interface FeedParameters {
  minQuorum: number; // Distinct reporters that close a round early
  roundDurationMs: number;
  toleranceMultiplier: number; // Outlier threshold as a multiple of the MAD
  madFloor: number; // Lower bound for the MAD on very stable feeds
  minAgreement: number; // Inliers required to publish
  maxClockSkewMs: number;
}

export interface FeedDefinition {
  feed: CoreFeedId;
  parameters: FeedParameters;
}

export function isValidFeedCategory(category: unknown): category is FeedCategory {
  return typeof category === "number" && Object.values(FeedCategory).includes(category);
}

export function isValidCoreFeedId(feedId: unknown): feedId is CoreFeedId {
  return (
    typeof feedId === "object" &&
    feedId !== null &&
    "category" in feedId &&
    "name" in feedId &&
    isValidFeedCategory(feedId.category) &&
    typeof feedId.name === "string" &&
    feedId.name.length > 0
  );
}
