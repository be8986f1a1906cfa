import winston from 'winston';

const level = process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'error' : 'info');

const lineFormat = winston.format.printf(({ level: lvl, message, timestamp, scope, stack }) => {
  const prefix = typeof scope === 'string' ? `[${scope}] ` : '';
  const trace = typeof stack === 'string' ? `\n${stack}` : '';
  return `${String(timestamp)} ${lvl}: ${prefix}${String(message)}${trace}`;
});

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(winston.format.colorize(), lineFormat)
  })
];

if (process.env.LOG_TO_FILE === 'true') {
  transports.push(
    new winston.transports.File({ filename: 'logs/error.log', level: 'error' }),
    new winston.transports.File({ filename: 'logs/combined.log' })
  );
}

export const logger = winston.createLogger({
  level,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    lineFormat
  ),
  transports
});

export type Logger = winston.Logger;

/** Child logger whose lines carry a `[scope]` prefix. */
export function createLogger(scope: string): Logger {
  return logger.child({ scope });
}
