import pino from 'pino';

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

/**
 * Process-wide JSON logger. Customer emails never reach the log stream under
 * these keys; free text goes through the PII redactor before it is logged.
 */
export const logger = pino({
  level: resolveLevel(),
  base: { service: 'support-desk-assistant' },
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
  },
  redact: {
    paths: ['email', 'customerEmail', '*.email'],
    censor: '[REDACTED_EMAIL]',
  },
});

/** Child logger bound to one request */
export function childLogger(requestId: string, extra?: Record<string, unknown>): pino.Logger {
  return logger.child({ requestId, ...extra });
}
