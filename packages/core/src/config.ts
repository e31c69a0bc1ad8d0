/**
 * Configuration: defaults, environment overrides, explicit overrides.
 *
 * Nothing here is mutable global state. Callers resolve a config once and
 * pass it to the operations that take one.
 */

export type LogLevel = 'silent' | 'warn' | 'debug';

export type StrataConfig = {
  /** Minimum level the library logger emits */
  logLevel: LogLevel;
  /** Maximum cells `count` walks on a lazy sequence before giving up */
  countLimit: number;
};

export const DEFAULT_CONFIG: StrataConfig = {
  logLevel: 'silent',
  countLimit: Number.POSITIVE_INFINITY,
};

const LOG_LEVELS: readonly LogLevel[] = ['silent', 'warn', 'debug'];

function parseLogLevel(raw: string | undefined): LogLevel | undefined {
  if (raw === undefined) return undefined;
  const normalized = raw.trim().toLowerCase();
  return LOG_LEVELS.find(level => level === normalized);
}

/**
 * Load configuration from environment variables (`<PREFIX>_LOG_LEVEL`,
 * `<PREFIX>_COUNT_LIMIT`). Unset or unparsable values fall back to defaults.
 */
export function configFromEnv(
  prefix = 'STRATA',
  env: Record<string, string | undefined> = process.env
): StrataConfig {
  const logLevel = parseLogLevel(env[`${prefix}_LOG_LEVEL`]) ?? DEFAULT_CONFIG.logLevel;
  const limit = parseInt(env[`${prefix}_COUNT_LIMIT`] || '', 10);
  const countLimit = Number.isFinite(limit) && limit > 0 ? limit : DEFAULT_CONFIG.countLimit;
  return { logLevel, countLimit };
}

export function resolveConfig(
  overrides: Partial<StrataConfig> = {},
  env: Record<string, string | undefined> = process.env
): StrataConfig {
  return { ...configFromEnv('STRATA', env), ...overrides };
}
