import { z } from 'zod';

import { BUILTIN_QUIRK_PROFILE_NAMES } from './QuirkProfile.ts';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const LOG_LEVEL_VARIABLE = 'SIM_XHR_LOG_LEVEL';
export const QUIRK_PROFILE_VARIABLE = 'SIM_XHR_QUIRK_PROFILE';

export const SimXhrConfigSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).default('warn'),
  quirkProfile: z.enum(BUILTIN_QUIRK_PROFILE_NAMES).default('default'),
});

export type SimXhrConfig = z.infer<typeof SimXhrConfigSchema>;

/**
 * Read the process-wide defaults from environment variables. Unset or empty variables take their
 * default value.
 *
 * @param env Environment (defaults to process.env)
 * @returns Validated configuration
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): SimXhrConfig {
  const result = SimXhrConfigSchema.safeParse({
    logLevel: env[LOG_LEVEL_VARIABLE] || undefined,
    quirkProfile: env[QUIRK_PROFILE_VARIABLE] || undefined,
  });
  if (!result.success) {
    const details = result.error.issues.map((issue) => {
      const variable = issue.path[0] === 'logLevel' ? LOG_LEVEL_VARIABLE : QUIRK_PROFILE_VARIABLE;
      return `${variable}: ${issue.message}`;
    }).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  return result.data;
}
