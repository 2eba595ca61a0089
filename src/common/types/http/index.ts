/**
 * Unified index for HTTP-related type definitions.
 */

export * from "./http.types";
