import pino, { type Logger } from 'pino';

export type { Logger };

const defaultLevel = process.env['NODE_ENV'] === 'test' ? 'silent' : 'info';

// stdout is left to callers; all diagnostics go to stderr.
export const logger: Logger = pino(
  {
    name: 'regression-oracle',
    level: process.env['LOG_LEVEL'] ?? defaultLevel,
  },
  pino.destination(2)
);

export function childLogger(component: string, parent?: Logger): Logger {
  return (parent ?? logger).child({ component });
}
