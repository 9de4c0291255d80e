/**
 * Environment configuration for linecount commands.
 *
 * Values come from process.env, optionally seeded from a .env file in the
 * working directory (see annotate.ts, which imports dotenv/config).
 */

import { z } from 'zod';

const EnvSchema = z.object({
  CI: z.string().optional(),
  NO_COLOR: z.string().optional(),
});

type LinecountEnv = z.infer<typeof EnvSchema>;

export interface LinecountConfig {
  /** Plain output with no ANSI colors */
  ciMode: boolean;
}

/**
 * Resolve configuration from the environment and the --ci flag.
 * Unknown environment variables are ignored.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  ciFlag: boolean = false,
): LinecountConfig {
  const parsed: LinecountEnv = EnvSchema.parse(env);
  const ciMode = ciFlag || parsed.CI === 'true' || Boolean(parsed.NO_COLOR);
  return { ciMode };
}
