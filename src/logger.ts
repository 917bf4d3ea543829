import winston from 'winston';

import { loadConfig } from './config';

export type ServiceName =
  | 'interpreter'
  | 'fixture'
  | 'process'
  | 'assertion'
  | 'executor';

export const loggingConfig = {
  levels: winston.config.npm.levels,
  defaultLevel: 'warn',
  timestampFormat: 'YYYY-MM-DD HH:mm:ss'
} as const;

/**
 * Resolves the effective level.
 *
 * Order: explicit configuration (`EXEC_SCHEME_LOG_LEVEL`, then `LOG_LEVEL`),
 * otherwise the default level.
 */
export function resolveLogLevel(explicit: string | undefined): string {
  if (explicit && explicit in loggingConfig.levels) return explicit;
  return loggingConfig.defaultLevel;
}

/**
 * Console output stays silent while the harness runs inside a test runner,
 * unless a level was requested explicitly.
 */
function isSilent(explicit: string | undefined): boolean {
  return process.env.NODE_ENV === 'test' && !explicit;
}

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.timestampFormat }),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
    let line = `${String(timestamp)} [${level}]`;
    if (typeof service === 'string') line += ` [${service}]`;
    line += ` ${String(message)}`;
    if (Object.keys(metadata).length > 0) {
      line += ` ${JSON.stringify(metadata)}`;
    }
    return line;
  })
);

/**
 * Creates a winston logger tagged with the given service name.
 */
export function createServiceLogger(
  service: ServiceName,
  explicitLevel: string | undefined = loadConfig().logLevel
): winston.Logger {
  return winston.createLogger({
    level: resolveLogLevel(explicitLevel),
    levels: loggingConfig.levels,
    defaultMeta: { service },
    transports: [
      new winston.transports.Console({
        format: consoleFormat,
        silent: isSilent(explicitLevel),
        stderrLevels: ['error', 'warn']
      })
    ]
  });
}

export const interpreterLogger = createServiceLogger('interpreter');
export const fixtureLogger = createServiceLogger('fixture');
export const processLogger = createServiceLogger('process');
export const assertionLogger = createServiceLogger('assertion');
export const executorLogger = createServiceLogger('executor');
