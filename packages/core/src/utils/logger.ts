import pino from 'pino';

const isBrowser = 'window' in globalThis;

/**
 * Level to start the logger at. Unknown values fall back to 'info' so a bad
 * LOG_LEVEL cannot break module loading; validateEnv reports it instead.
 */
export function resolveLogLevel(raw: string | undefined): string {
  if (raw === 'silent' || (raw !== undefined && Object.hasOwn(pino.levels.values, raw))) {
    return raw;
  }
  return 'info';
}

// Browsers have no process.env; fall back to 'info' there.
const logLevel = resolveLogLevel(!isBrowser && typeof process !== 'undefined' ? process.env.LOG_LEVEL : undefined);

export const logger = pino({
  name: 'typehash',
  level: logLevel,
  browser: {
    asObject: true
  }
});

export type Logger = typeof logger;
