import pino from 'pino';

// Create logger instance with Lambda-friendly settings
export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  // Lambda already adds timestamp
  timestamp: false,
  // Structured logging for CloudWatch
  formatters: {
    level: (label) => ({ level: label }),
  },
  redact: {
    paths: ['authorization', 'Authorization', 'headers.authorization', 'headers.cookie'],
    censor: '[REDACTED]',
  },
});

// Create child logger with request context
export function createRequestLogger(requestId: string) {
  return logger.child({ requestId });
}

// Create child logger for one ingestion run
export function createRunLogger(importId: string, source: string) {
  return logger.child({ importId, source });
}

export type Logger = typeof logger;
