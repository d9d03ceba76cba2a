import winston from 'winston';

const logLevel = process.env.LOG_LEVEL || 'info';

/**
 * Package logger. JSON lines on stderr; quiet under the test runner unless LOG_LEVEL is set.
 */
export function createLogger(service = 'rawscheduler-client'): winston.Logger {
  return winston.createLogger({
    level: logLevel,
    silent: process.env.NODE_ENV === 'test' && !process.env.LOG_LEVEL,
    defaultMeta: { service },
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    transports: [
      new winston.transports.Console({
        stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']
      })
    ]
  });
}

export const logger = createLogger();
