import type {
  CloseReason,
  CollectingRound,
  CoreFeedId,
  FeedParameters,
  FinalizedRound,
  FinalizingRound,
  RegistrySnapshot,
  Round,
  RoundOutcome,
} from "@/common/types/core";
import { IllegalRoundTransitionError } from "@/common/errors/consensus-engine.errors";

function assertNever(value: never): never {
  throw new Error(`Unexpected round state: ${JSON.stringify(value)}`);
}

export interface OpenRoundInput {
  feed: CoreFeedId;
  feedKey: string;
  sequence: number;
  startTime: number;
  parameters: FeedParameters;
  snapshot: RegistrySnapshot;
}

export function openRound(input: OpenRoundInput): CollectingRound {
  return {
    phase: "collecting",
    feed: { category: input.feed.category, name: input.feed.name },
    feedKey: input.feedKey,
    sequence: input.sequence,
    startTime: input.startTime,
    deadline: input.startTime + input.parameters.roundDurationMs,
    parameters: Object.freeze({ ...input.parameters }),
    snapshot: input.snapshot,
    submissions: [],
    reporters: new Set(),
  };
}

/**
 * collecting → finalizing. Any other starting phase is a bug in the caller.
 */
export function beginFinalizing(round: Round, closedAt: number, closeReason: CloseReason): FinalizingRound {
  switch (round.phase) {
    case "collecting":
      return { ...round, phase: "finalizing", closedAt, closeReason };
    case "finalizing":
    case "finalized":
      throw new IllegalRoundTransitionError(round.feedKey, round.sequence, round.phase, "finalizing");
    default:
      return assertNever(round);
  }
}

/**
 * finalizing → finalized, carrying the outcome
 */
export function completeRound(round: Round, outcome: RoundOutcome): FinalizedRound {
  switch (round.phase) {
    case "finalizing":
      return { ...round, phase: "finalized", outcome };
    case "collecting":
    case "finalized":
      throw new IllegalRoundTransitionError(round.feedKey, round.sequence, round.phase, "finalized");
    default:
      return assertNever(round);
  }
}
