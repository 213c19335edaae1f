/**
 * Shared constants for the round-robin factorization.
 *
 * Centralises values used by the generator, the verifier and the
 * name-list collaborators so the scripts and tests agree on them.
 */

// ============================================================================
// Vertex Counts
// ============================================================================

/** Smallest vertex count with a non-empty factorization */
export const MIN_VERTEX_COUNT = 2;

/** Vertex counts advance in steps of two (only even counts are factorable) */
export const VERTEX_COUNT_STEP = 2;

/** Upper bound (exclusive) of the default verification range */
export const DEFAULT_VERIFY_MAX_VERTICES = 100;

// ============================================================================
// Presentation
// ============================================================================

/**
 * Label given to the extra vertex that brings an odd participant list up to
 * an even vertex count. Whoever is paired with it sits the round out.
 */
export const SPACER = '';

/**
 * Width the first name of each pair is right-aligned to. Longer names are
 * printed in full and only shift that line.
 */
export const DEFAULT_NAME_PADDING = 25;

/** Separator printed between the two names of a pair */
export const PAIR_SEPARATOR = ' --- ';

/** Default location of the newline-separated participant list */
export const DEFAULT_NAMES_FILE = 'names.txt';
