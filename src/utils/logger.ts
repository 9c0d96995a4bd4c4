import pino from 'pino';
import { getEnvironment, resolveLogLevel } from '../config/environment';
import { getTransport } from './getTransport';

// Sensitive keys to redact from logs
const SENSITIVE_KEYS = ['password', 'token', 'secret', 'api_key', 'apikey', 'authorization', 'cookie'];

function createRedactor(): (obj: Record<string, unknown>) => Record<string, unknown> {
  return (obj: Record<string, unknown>) => {
    const redacted = { ...obj };

    Object.keys(redacted).forEach(key => {
      const lowerKey = key.toLowerCase();
      if (SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive))) {
        redacted[key] = '[REDACTED]';
      }
    });

    return redacted;
  };
}

function createLogger(): pino.Logger {
  const env = getEnvironment();
  const transport = getTransport();
  const options: pino.LoggerOptions = {
    name: 'page-distill',
    level: resolveLogLevel(env),
    redact: {
      paths: SENSITIVE_KEYS,
      censor: '[REDACTED]',
    },
    formatters: {
      log: createRedactor(),
    },
  };

  if (transport) {
    return pino({ ...options, transport });
  }
  // Synchronous stderr when running without a transport worker
  return pino(options, pino.destination({ dest: 2, sync: true }));
}

let cachedLogger: pino.Logger | null = null;
export function getLogger(): pino.Logger {
  if (!cachedLogger) cachedLogger = createLogger();
  return cachedLogger;
}

// Helper function to create child loggers with correlation IDs
export function createChildLogger(correlationId: string): pino.Logger {
  return getLogger().child({ correlationId });
}

// Helper function to generate correlation IDs
export function generateCorrelationId(): string {
  return `distill-${Date.now()}-${Math.random().toString(36).substring(2, 15)}`;
}

export async function withTiming<T>(
  log: pino.Logger,
  event: string,
  fn: () => Promise<T>,
  fields?: Record<string, unknown>
): Promise<T> {
  const start = Date.now();
  try {
    const result = await fn();
    log.info({ event, durationMs: Date.now() - start, status: 'ok', ...(fields ?? {}) });
    return result;
  } catch (error) {
    log.error({ event, durationMs: Date.now() - start, error, ...(fields ?? {}) }, 'failed');
    throw error;
  }
}

export function withTimingSync<T>(
  log: pino.Logger,
  event: string,
  fn: () => T,
  fields?: Record<string, unknown>
): T {
  const start = Date.now();
  try {
    const result = fn();
    log.debug({ event, durationMs: Date.now() - start, status: 'ok', ...(fields ?? {}) });
    return result;
  } catch (error) {
    log.error({ event, durationMs: Date.now() - start, error, ...(fields ?? {}) }, 'failed');
    throw error;
  }
}
