import pino from 'pino';

let level = process.env.LOG_LEVEL ?? 'info';

// stderr, so that --json output on stdout stays parseable
const destination = pino.destination(2);

const loggers: pino.Logger[] = [];

export function createLogger(name: string): pino.Logger {
  const logger = pino({ name, level }, destination);
  loggers.push(logger);
  return logger;
}

/**
 * Change the level of every module logger, e.g. from loaded config
 */
export function setLogLevel(next: string): void {
  level = next;
  for (const logger of loggers) {
    logger.level = next;
  }
}
