import * as z from 'zod';

import {
  DEFAULT_NAME_PADDING,
  DEFAULT_NAMES_FILE,
  DEFAULT_VERIFY_MAX_VERTICES,
  MIN_VERTEX_COUNT,
} from '@/lib/pairing-generators/round-robin-generator/constants';
import { InvalidInputError } from '@/lib/pairing-generators/round-robin-generator/errors';

/**
 * Environment read by the scripts. Command-line flags take precedence over
 * every value here.
 */
export const cliEnvSchema = z.object({
  NAMES_FILE: z.string().min(1).default(DEFAULT_NAMES_FILE),
  NAME_PADDING: z.coerce.number().int().nonnegative().default(DEFAULT_NAME_PADDING),
  VERIFY_MAX_VERTICES: z.coerce
    .number()
    .int()
    .min(MIN_VERTEX_COUNT)
    .default(DEFAULT_VERIFY_MAX_VERTICES),
});

export type CliConfig = {
  namesFile: string;
  namePadding: number;
  verifyMaxVertices: number;
};

/**
 * Parses the script settings out of `env`.
 *
 * @throws InvalidInputError naming the first variable that failed
 */
export const loadCliConfig = (
  env: Record<string, string | undefined> = process.env,
): CliConfig => {
  const parsed = cliEnvSchema.safeParse(env);

  if (!parsed.success) {
    const [firstIssue] = parsed.error.issues;
    const variable = firstIssue?.path.join('.') ?? 'environment';
    throw new InvalidInputError(
      `Invalid ${variable}: ${firstIssue?.message ?? 'unknown problem'}`,
      firstIssue === undefined ? undefined : env[variable],
    );
  }

  return {
    namesFile: parsed.data.NAMES_FILE,
    namePadding: parsed.data.NAME_PADDING,
    verifyMaxVertices: parsed.data.VERIFY_MAX_VERTICES,
  };
};
