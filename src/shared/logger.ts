import pino from 'pino';

export const logger = pino(
  {
    name: 'service-testbed',
    level: process.env['TESTBED_LOG_LEVEL'] ?? 'info',
  },
  pino.destination({ dest: 2, sync: true })
);

export type Logger = pino.Logger;

export function componentLogger(component: string): Logger {
  return logger.child({ component });
}
