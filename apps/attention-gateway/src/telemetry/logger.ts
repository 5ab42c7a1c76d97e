import pino, { type Logger, type LoggerOptions } from 'pino';

export type AppLogger = Logger;

export interface LoggerConfig {
  level?: string;
  name?: string;
}

/** Request headers that must never reach the log output. */
const REDACTED_PATHS = [
  'req.headers.authorization',
  'req.headers["x-attention-signature"]',
];

/** Create the root Pino logger for the gateway. */
export function createLogger(config: LoggerConfig = {}): AppLogger {
  const options: LoggerOptions = {
    name: config.name ?? 'attention-gateway',
    level: config.level ?? inferDefaultLevel(),
    redact: REDACTED_PATHS,
  };

  return pino(options);
}

/** Child logger tagging every line with the attention component that wrote it. */
export function createComponentLogger(logger: AppLogger, component: string): AppLogger {
  return logger.child({ component });
}

function inferDefaultLevel(): string {
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}
