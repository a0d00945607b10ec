/**
 * Session configuration.
 *
 * Precedence: explicit options > environment variables > defaults.
 *
 *   DOM_TETHER_MAX_WAIT_MS        defaultMaxWaitTimeMs
 *   DOM_TETHER_POLL_INTERVAL_MS   pollIntervalMs
 *   DOM_TETHER_IGNORE_HIDDEN      ignoreHiddenElements ("true"/"false")
 *   DOM_TETHER_AUTOMATIC_RELOAD   automaticReload ("true"/"false")
 */

import { z } from 'zod';

import { ConfigError } from './errors';

const booleanFromEnv = z.enum(['true', 'false', '1', '0']).transform(v => v === 'true' || v === '1');

export const SessionConfigSchema = z.object({
  /** Wait budget for synchronize, in milliseconds */
  defaultMaxWaitTimeMs: z.number().int().nonnegative().default(2000),
  /** Delay between retries, in milliseconds */
  pollIntervalMs: z.number().int().positive().default(10),
  /** Lookups skip hidden nodes and text() defaults to visible text */
  ignoreHiddenElements: z.boolean().default(true),
  /** text() defaults to visible text even when hidden nodes are matched */
  visibleTextOnly: z.boolean().default(false),
  /** Reload reloadable handles between retries */
  automaticReload: z.boolean().default(true),
  /** What set() does with options the driver cannot take */
  unsupportedSetOptions: z.enum(['error', 'warn']).default('error'),
});

export type SessionConfig = z.infer<typeof SessionConfigSchema>;
export type SessionConfigInput = z.input<typeof SessionConfigSchema>;

const EnvSchema = z.object({
  DOM_TETHER_MAX_WAIT_MS: z.coerce.number().int().nonnegative().optional(),
  DOM_TETHER_POLL_INTERVAL_MS: z.coerce.number().int().positive().optional(),
  DOM_TETHER_IGNORE_HIDDEN: booleanFromEnv.optional(),
  DOM_TETHER_AUTOMATIC_RELOAD: booleanFromEnv.optional(),
});

function fromEnv(env: NodeJS.ProcessEnv): SessionConfigInput {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues);
  }
  const vars = parsed.data;
  const result: SessionConfigInput = {};
  if (vars.DOM_TETHER_MAX_WAIT_MS !== undefined) {
    result.defaultMaxWaitTimeMs = vars.DOM_TETHER_MAX_WAIT_MS;
  }
  if (vars.DOM_TETHER_POLL_INTERVAL_MS !== undefined) {
    result.pollIntervalMs = vars.DOM_TETHER_POLL_INTERVAL_MS;
  }
  if (vars.DOM_TETHER_IGNORE_HIDDEN !== undefined) {
    result.ignoreHiddenElements = vars.DOM_TETHER_IGNORE_HIDDEN;
  }
  if (vars.DOM_TETHER_AUTOMATIC_RELOAD !== undefined) {
    result.automaticReload = vars.DOM_TETHER_AUTOMATIC_RELOAD;
  }
  return result;
}

/**
 * Merge options over environment over defaults and validate the result.
 *
 * @throws ConfigError when any value is out of range
 */
export function resolveSessionConfig(
  options: SessionConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): SessionConfig {
  const defined = Object.fromEntries(
    Object.entries(options).filter(([, value]) => value !== undefined)
  );
  const parsed = SessionConfigSchema.safeParse({ ...fromEnv(env), ...defined });
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues);
  }
  return parsed.data;
}
