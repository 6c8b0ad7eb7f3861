import { z } from 'zod';

// ── Env schema ───────────────────────────────────────────────

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export type LogLevel = z.infer<typeof logLevelSchema>;

export const envConfigSchema = z.object({
  logLevel: logLevelSchema.default('silent'),
});

export type EnvConfig = z.infer<typeof envConfigSchema>;

// ── Env loader ───────────────────────────────────────────────

/**
 * Read `ADD_LOG_LEVEL` from the given environment.
 * An unknown level falls back to `silent`.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const raw = env['ADD_LOG_LEVEL'];

  const parsed = envConfigSchema.safeParse({
    logLevel: raw === undefined || raw === '' ? undefined : raw,
  });

  return parsed.success ? parsed.data : { logLevel: 'silent' };
}
