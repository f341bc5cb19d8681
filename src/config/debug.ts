/**
 * Debug flags for development. Defaults must be false for production.
 * Scoring logging is gated by DEBUG_ASSESSMENT (env: DEBUG_ASSESSMENT=1).
 */
export const DEBUG_ASSESSMENT = ["1", "true"].includes((process.env.DEBUG_ASSESSMENT ?? "").toLowerCase());
