/**
 * Unified index for core type definitions.
 *
 * Feeds, reporters, submissions, rounds and published feed state make up the
 * engine's domain model.
 */

export * from "./feed.types";
export * from "./feed-state.types";
export * from "./reporter.types";
export * from "./round.types";
export * from "./submission.types";
