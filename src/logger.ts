/**
 * Structured logging with pino.
 * Logs go to stderr so CLI output on stdout stays machine-readable.
 */
import { createRequire } from 'node:module';
import pino, { type Logger } from 'pino';

const require = createRequire(import.meta.url);

const VALID_LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevel = (typeof VALID_LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return VALID_LOG_LEVELS.some((level) => level === value);
}

/** Resolve LOG_LEVEL (case-insensitive); unknown values fall back to info. */
export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const envLevel = env.LOG_LEVEL?.toLowerCase();
  return envLevel && isLogLevel(envLevel) ? envLevel : 'info';
}

/** pino-pretty is a dev dependency, so only use it when it actually resolves. */
function canUsePrettyTransport(): boolean {
  if (process.env.NODE_ENV !== 'development') return false;
  try {
    require.resolve('pino-pretty');
    return true;
  } catch {
    return false;
  }
}

const options = {
  level: getLogLevel(),
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  base: {
    service: 'pdf-fetch-cache',
  },
};

export const logger: Logger = canUsePrettyTransport()
  ? pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
          destination: 2,
        },
      },
    })
  : pino(options, pino.destination(2));

