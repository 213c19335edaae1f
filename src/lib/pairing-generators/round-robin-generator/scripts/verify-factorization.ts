/**
 * Factorization Verification Script
 *
 * Generates the factorization for every even vertex count in a range and
 * checks that every pair of vertices appears in exactly one matching.
 *
 * Usage: npm run verify -- [min] [max]
 *   no bounds  → 2 up to (not including) VERIFY_MAX_VERTICES, default 100
 *   one bound  → 2 up to (not including) that bound
 *   two bounds → min up to (not including) max
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import * as z from 'zod';

import { loadCliConfig } from '@/lib/config/env';
import { InvalidInputError } from '@/lib/pairing-generators/round-robin-generator/errors';
import { isEntryPoint } from '@/lib/pairing-generators/round-robin-generator/scripts/entry-point';
import type { VerificationReport } from '@/lib/pairing-generators/round-robin-generator/types';
import {
  resolveVerificationRange,
  verifyRange,
} from '@/lib/pairing-generators/round-robin-generator/verifier';
import type { VerificationRangeArgs } from '@/lib/pairing-generators/round-robin-generator/verifier';

// ============================================================================
// Constants
// ============================================================================

// CLI Constants (yargs configuration)
const CLI_SCRIPT_NAME = 'verify-factorization';
const CLI_USAGE = '$0 [min] [max]';
const CLI_OPTION_HELP = 'help';
const CLI_HELP_ALIAS = 'h';

/** At most two positional bounds */
const MAX_BOUND_COUNT = 2;

const boundsSchema = z
  .array(z.coerce.number().int('Bounds must be integers'))
  .max(MAX_BOUND_COUNT, 'Expected at most two bounds: [min] [max]');

const EXIT_CODE_FAILURE = 1;

// ============================================================================
// Argument Parsing
// ============================================================================

/**
 * Parses the positional bounds.
 *
 * Pattern: hideBin() strips executable and script path from process.argv.
 * parseSync() is used since we have no async commands.
 *
 * @param processArgs - Arguments after the script path
 * @throws InvalidInputError if a bound is not an integer or there are more than two
 */
export function parseVerifyArgs(processArgs: string[]): VerificationRangeArgs {
  const argv = yargs(processArgs)
    .scriptName(CLI_SCRIPT_NAME)
    .usage(CLI_USAGE)
    .help()
    .alias(CLI_OPTION_HELP, CLI_HELP_ALIAS)
    .version(false)
    .strictOptions()
    .parseSync();

  const parsed = boundsSchema.safeParse(argv._);
  if (!parsed.success) {
    const [firstIssue] = parsed.error.issues;
    throw new InvalidInputError(
      firstIssue?.message ?? 'Invalid bounds',
      argv._,
    );
  }

  const bounds = parsed.data;
  if (bounds.length === MAX_BOUND_COUNT) {
    return { min: bounds[0], max: bounds[1] };
  }
  if (bounds.length === 1) {
    return { max: bounds[0] };
  }
  return {};
}

// ============================================================================
// Verification
// ============================================================================

/**
 * Verifies [min, max), writing one line per vertex count and a summary.
 */
export function runVerification(
  args: VerificationRangeArgs,
  write: (line: string) => void,
  defaultMax?: number,
): VerificationReport {
  const { minVertexCount, maxVertexCount } = resolveVerificationRange(
    args,
    defaultMax,
  );

  const report = verifyRange(minVertexCount, maxVertexCount, {
    onProgress: (outcome) => {
      if (outcome.passed) {
        write(`${outcome.vertexCount} vertices passed`);
      } else {
        write(`${outcome.vertexCount} vertices failed: ${outcome.error.message}`);
      }
    },
  });

  const failedCount = report.outcomes.filter((outcome) => !outcome.passed).length;
  write(
    `Verification complete: vertices from ${report.minVertexCount} to ${report.maxVertexCount} tested, ${failedCount} failed.`,
  );

  return report;
}

/**
 * Main entry point for CLI execution.
 */
function main(): void {
  const config = loadCliConfig();
  const args = parseVerifyArgs(hideBin(process.argv));
  const report = runVerification(
    args,
    (line) => console.log(line),
    config.verifyMaxVertices,
  );

  if (!report.passed) {
    process.exitCode = EXIT_CODE_FAILURE;
  }
}

if (isEntryPoint(import.meta.url)) {
  main();
}
