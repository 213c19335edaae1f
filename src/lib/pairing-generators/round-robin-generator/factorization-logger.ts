/**
 * Logger for the round-robin factorization
 *
 * Usage: Enable via environment variable
 *   DEBUG=factorization npm run verify
 *
 * Or set LOG_LEVEL=debug for all logs
 */

import { ConsoleTransport, LogLayer } from 'loglayer';

// ============================================================================
// Constants
// ============================================================================

/** Logger prefix for factorization logs */
const LOGGER_PREFIX = '[FACTORIZATION]';

/** Environment variable keyword for enabling factorization logs */
const DEBUG_KEYWORD = 'factorization';

/** Log level value that enables debug output everywhere */
const LOG_LEVEL_DEBUG = 'debug';

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Debug output is on when DEBUG mentions 'factorization' or LOG_LEVEL is
 * 'debug'.
 */
export function isDebugRequested(env: NodeJS.ProcessEnv): boolean {
  const debugEnvContainsKeyword = env.DEBUG?.includes(DEBUG_KEYWORD) ?? false;
  const logLevelIsDebug = env.LOG_LEVEL === LOG_LEVEL_DEBUG;

  return debugEnvContainsKeyword || logLevelIsDebug;
}

// ============================================================================
// Logger Instance
// ============================================================================

/** Console transport for the factorization logger */
const consoleTransport = new ConsoleTransport({
  logger: console,
});

/**
 * Logger instance for generation and verification
 *
 * Debug calls are guarded by {@link IS_FACTORIZATION_DEBUG_ENABLED}; info,
 * warn and error always go through.
 */
export const factorizationLogger = new LogLayer({
  transport: consoleTransport,
  prefix: LOGGER_PREFIX,
});

/**
 * Whether debug logging is currently enabled
 *
 * Use this to conditionally create debug-only metadata to avoid overhead
 * when logging is disabled
 */
export const IS_FACTORIZATION_DEBUG_ENABLED = isDebugRequested(process.env);

// ============================================================================
// Debug Logging Interfaces
// ============================================================================

/**
 * Generation start information for logging
 */
export interface GenerationStartInfo {
  /** Number of vertices */
  readonly vertexCount: number;

  /** Exponent of the largest power of two dividing the vertex count */
  readonly twoAdicValuation: number;

  /** Matchings produced by stepping around the vertex circle */
  readonly offsetMatchingCount: number;

  /** Matchings produced by the rotation construction */
  readonly rotationMatchingCount: number;

  /** Residue subgraphs the rotation construction runs on */
  readonly subgraphCount: number;
}

/**
 * Per-vertex-count verification information for logging
 */
export interface VerificationInfo {
  /** Number of vertices checked */
  readonly vertexCount: number;

  /** Matchings consumed */
  readonly matchingCount: number;

  /** Distinct pairs seen */
  readonly pairCount: number;
}

/**
 * Verification range summary for logging
 */
export interface VerificationRangeInfo {
  readonly minVertexCount: number;
  readonly maxVertexCount: number;
  readonly failedVertexCounts: number[];
}
