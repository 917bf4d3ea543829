/**
 * Runtime configuration of the harness.
 */
export type HarnessConfig = {
  /**
   * Rejects duplicate `--file:` paths and repeated `--return-code:`
   * directives, and reports unknown directives as warnings.
   *
   * When `false`, the last declaration wins and unknown directives are
   * ignored without a trace.
   */
  strict: boolean;

  /**
   * Upper bound (in UTF-8 bytes) for a single scheme line.
   * Longer lines fail fast instead of being truncated.
   */
  maxLineBytes: number;

  /**
   * Explicit winston level, or `undefined` to use the default policy
   * (see `resolveLogLevel`).
   */
  logLevel: string | undefined;
};

export const DEFAULT_MAX_LINE_BYTES = 1024 * 1024;

export const defaultConfig: HarnessConfig = {
  strict: false,
  maxLineBytes: DEFAULT_MAX_LINE_BYTES,
  logLevel: undefined
};

/**
 * Environment variables recognized by `loadConfig`.
 */
export const CONFIG_ENV = {
  strict: 'EXEC_SCHEME_STRICT',
  maxLineBytes: 'EXEC_SCHEME_MAX_LINE_BYTES',
  logLevel: 'EXEC_SCHEME_LOG_LEVEL',
  genericLogLevel: 'LOG_LEVEL'
} as const;

type Environment = Readonly<Record<string, string | undefined>>;

function parseFlag(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined) return fallback;
  const normalized = raw.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true') return true;
  if (normalized === '0' || normalized === 'false') return false;
  return fallback;
}

function parsePositiveInteger(raw: string | undefined, fallback: number): number {
  if (raw === undefined || !/^\d+$/.test(raw.trim())) return fallback;
  const value = Number.parseInt(raw.trim(), 10);
  return Number.isSafeInteger(value) && value > 0 ? value : fallback;
}

/**
 * Builds the configuration from defaults overridden by environment variables.
 *
 * Unparseable values fall back to the defaults. `overrides` win over both.
 */
export function loadConfig(
  env: Environment = process.env,
  overrides: Partial<HarnessConfig> = {}
): HarnessConfig {
  const logLevel =
    env[CONFIG_ENV.logLevel] || env[CONFIG_ENV.genericLogLevel] || undefined;

  return {
    strict: parseFlag(env[CONFIG_ENV.strict], defaultConfig.strict),
    maxLineBytes: parsePositiveInteger(
      env[CONFIG_ENV.maxLineBytes],
      defaultConfig.maxLineBytes
    ),
    logLevel,
    ...overrides
  };
}
