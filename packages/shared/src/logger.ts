import winston from 'winston';

const level = process.env.LOG_LEVEL ?? 'info';

export const logger = winston.createLogger({
  level,
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'stratum' },
  transports: [new winston.transports.Console()],
});

export function createLogger(component: string): winston.Logger {
  return logger.child({ component });
}

export default logger;
