/**
 * Interactive pairing session
 *
 * Shows one matching per prompt until the factorization is exhausted, then
 * offers to start over. Input and output are injected so the session can be
 * driven by a terminal or by a test.
 */

import { generateDisjointMatchings } from '@/lib/pairing-generators/round-robin-generator';

import { DEFAULT_NAME_PADDING } from '../constants';
import { formatRound } from './formatting';

// ============================================================================
// Constants
// ============================================================================

export const NEXT_MATCHING_PROMPT = 'Press enter for the next matching.';
export const START_AGAIN_PROMPT = 'All matchings complete. Start again? Y/N: ';
export const START_AGAIN_MESSAGE = 'Starting again!';

/** Printed after the restart message to separate the passes */
const PASS_SEPARATOR = '.\n.\n.\n';

/** Blank lines printed after each matching */
const MATCHING_TRAILER = '\n';

const ANSWER_YES = 'y';
const ANSWER_NO = 'n';

// ============================================================================
// Types
// ============================================================================

/**
 * Terminal the session talks to.
 */
export interface SessionIo {
  /** Shows `question` and resolves with the line typed in reply */
  prompt(question: string): Promise<string>;

  /** Prints one line */
  write(line: string): void;
}

export interface PairingSessionOptions {
  /** Width the first name of each pair is right-aligned to */
  readonly padding?: number;
}

// ============================================================================
// Session
// ============================================================================

/**
 * Asks until the reply is 'y' or 'n', ignoring case and surrounding space.
 */
async function askStartAgain(io: SessionIo): Promise<boolean> {
  while (true) {
    const answer = (await io.prompt(START_AGAIN_PROMPT)).trim().toLowerCase();
    if (answer === ANSWER_YES) {
      return true;
    }
    if (answer === ANSWER_NO) {
      return false;
    }
  }
}

/**
 * Walks the factorization for `labels`, one matching per prompt, for as
 * many passes as the user asks for.
 *
 * @param labels - One label per vertex; the count must be even
 * @returns Number of complete passes shown
 * @throws InvalidInputError if the label count is odd or zero
 */
export async function runPairingSession(
  labels: readonly string[],
  io: SessionIo,
  options: PairingSessionOptions = {},
): Promise<number> {
  const padding = options.padding ?? DEFAULT_NAME_PADDING;
  const matchings = generateDisjointMatchings(labels.length);

  let passCount = 0;
  let startAgain = true;

  while (startAgain) {
    let roundIndex = 0;
    for (const matching of matchings) {
      await io.prompt(NEXT_MATCHING_PROMPT);
      for (const line of formatRound(roundIndex, matching, labels, padding)) {
        io.write(line);
      }
      io.write(MATCHING_TRAILER);
      roundIndex++;
    }
    passCount++;

    startAgain = await askStartAgain(io);
    if (startAgain) {
      io.write(START_AGAIN_MESSAGE);
      io.write(PASS_SEPARATOR);
    }
  }

  return passCount;
}
