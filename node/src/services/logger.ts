// node/src/services/logger.ts — structured logging for the pipeline and its host
import { Logger } from 'tslog';

const LOG_LEVELS = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
} as const;

export type LogLevelName = keyof typeof LOG_LEVELS;

export function isLogLevelName(value: string): value is LogLevelName {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function resolveMinLevel(raw: string | undefined): number {
  const name = raw?.trim().toLowerCase() ?? '';
  return isLogLevelName(name) ? LOG_LEVELS[name] : LOG_LEVELS.info;
}

export const logger = new Logger({
  name: 'planet-chart-rag',
  minLevel: resolveMinLevel(process.env.LOG_LEVEL),
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} ',
  type: 'pretty',
});

export function setLogLevel(level: LogLevelName): void {
  logger.settings.minLevel = LOG_LEVELS[level];
}
