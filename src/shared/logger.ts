import pino from 'pino';

const isTest = process.env['NODE_ENV'] === 'test' || process.env['VITEST'] !== undefined;

export const logger = pino({
  level: process.env['LOG_LEVEL'] ?? (isTest ? 'silent' : 'info'),
  transport:
    process.env['NODE_ENV'] !== 'production' && !isTest
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
  redact: {
    paths: ['api_key', 'apiKey', 'password', 'secret', '*.api_key', '*.apiKey'],
    censor: '***REDACTED***',
  },
});
