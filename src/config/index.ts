/**
 * Configuration module.
 * Constants plus a zod-validated environment loader. No config file.
 */

export { PROGRAM, EXIT_CODES, INT32, INT64 } from './defaults.js';
export { loadEnvConfig, envConfigSchema, logLevelSchema } from './env.js';
export type { EnvConfig, LogLevel } from './env.js';
