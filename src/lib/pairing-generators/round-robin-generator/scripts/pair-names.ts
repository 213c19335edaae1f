/**
 * Name Pairing Script
 *
 * Reads a newline-separated list of names and shows a round-robin of them,
 * one round per press of enter. An odd list gets a blank partner who marks
 * the person sitting out.
 *
 * Usage: npm run pair -- [--names names.txt] [--padding 25]
 */

import { stdin, stdout } from 'node:process';
import { createInterface } from 'node:readline/promises';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { loadCliConfig } from '@/lib/config/env';
import type { CliConfig } from '@/lib/config/env';
import { NameListError } from '@/lib/pairing-generators/round-robin-generator/errors';
import { factorizationLogger } from '@/lib/pairing-generators/round-robin-generator/factorization-logger';
import {
  buildVertexLabels,
  readNameList,
} from '@/lib/pairing-generators/round-robin-generator/schedule/name-list';
import { runPairingSession } from '@/lib/pairing-generators/round-robin-generator/schedule/session';
import { isEntryPoint } from '@/lib/pairing-generators/round-robin-generator/scripts/entry-point';

// ============================================================================
// Constants
// ============================================================================

// CLI Constants (yargs configuration)
const CLI_SCRIPT_NAME = 'pair-names';
const CLI_USAGE = '$0 [options]';
const CLI_OPTION_NAMES = 'names';
const CLI_NAMES_ALIAS = 'n';
const CLI_NAMES_DESCRIPTION = 'File with one name per line';
const CLI_OPTION_PADDING = 'padding';
const CLI_PADDING_ALIAS = 'p';
const CLI_PADDING_DESCRIPTION = 'Width the first name of each pair is aligned to';
const CLI_OPTION_HELP = 'help';
const CLI_HELP_ALIAS = 'h';
const YARGS_TYPE_STRING = 'string' as const;
const YARGS_TYPE_NUMBER = 'number' as const;

const INTRO_PROMPT =
  'Each round pairs everyone up; after the last round everyone has met everyone once.\n' +
  'Press Control-C at any time to quit. Press enter to continue.';

const EXIT_CODE_FAILURE = 1;

/** Conventional exit status after SIGINT */
const EXIT_CODE_INTERRUPTED = 130;

// ============================================================================
// Argument Parsing
// ============================================================================

/** Parsed CLI arguments */
export interface PairNamesArgs {
  readonly names: string;
  readonly padding: number;
}

/**
 * Parses CLI arguments, falling back to the configured defaults.
 *
 * @param processArgs - Arguments after the script path
 * @param config - Defaults from the environment
 */
export function parsePairNamesArgs(
  processArgs: string[],
  config: CliConfig,
): PairNamesArgs {
  const argv = yargs(processArgs)
    .scriptName(CLI_SCRIPT_NAME)
    .usage(CLI_USAGE)
    .option(CLI_OPTION_NAMES, {
      alias: CLI_NAMES_ALIAS,
      type: YARGS_TYPE_STRING,
      description: CLI_NAMES_DESCRIPTION,
      default: config.namesFile,
    })
    .option(CLI_OPTION_PADDING, {
      alias: CLI_PADDING_ALIAS,
      type: YARGS_TYPE_NUMBER,
      description: CLI_PADDING_DESCRIPTION,
      default: config.namePadding,
    })
    .help()
    .alias(CLI_OPTION_HELP, CLI_HELP_ALIAS)
    .version(false)
    .strict()
    .parseSync();

  return {
    names: argv[CLI_OPTION_NAMES],
    padding: argv[CLI_OPTION_PADDING],
  };
}

// ============================================================================
// Main
// ============================================================================

/**
 * Main entry point for CLI execution.
 *
 * Loads the names, then hands the terminal to the pairing session.
 */
async function main(): Promise<void> {
  const args = parsePairNamesArgs(hideBin(process.argv), loadCliConfig());

  const terminal = createInterface({ input: stdin, output: stdout });
  terminal.on('SIGINT', () => {
    terminal.close();
    process.exit(EXIT_CODE_INTERRUPTED);
  });

  try {
    await terminal.question(INTRO_PROMPT);
    const names = await readNameList(args.names);
    const labels = buildVertexLabels(names);

    await runPairingSession(
      labels,
      {
        prompt: (question) => terminal.question(question),
        write: (line) => console.log(line),
      },
      { padding: args.padding },
    );
  } catch (error) {
    if (!(error instanceof NameListError)) {
      throw error;
    }
    factorizationLogger.withError(error).error(error.message);
    process.exitCode = EXIT_CODE_FAILURE;
  } finally {
    terminal.close();
  }
}

if (isEntryPoint(import.meta.url)) {
  main().catch((error: unknown) => {
    factorizationLogger.errorOnly(error);
    process.exitCode = EXIT_CODE_FAILURE;
  });
}
