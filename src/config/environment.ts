import { z } from 'zod';
import fs from 'fs';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const EnvironmentSchema = z.object({
  // Result cache capacity; 0 disables storage (in-flight sharing still applies)
  PAGE_DISTILL_CACHE_SIZE: z.coerce.number().int().min(0).default(1000),

  // Defaults applied by the CLI and MCP surfaces when a request omits them
  PAGE_DISTILL_MIN_WORD_COUNT: z.coerce.number().int().min(0).default(150),
  PAGE_DISTILL_MAX_OUTPUT_CHARS: z.coerce.number().int().min(0).default(1_000_000),

  PAGE_DISTILL_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),

  // Node environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Environment = z.infer<typeof EnvironmentSchema>;
export type LogLevel = (typeof LOG_LEVELS)[number];

let cachedEnvironment: Environment | null = null;

export function getEnvironment(): Environment {
  if (cachedEnvironment) {
    return cachedEnvironment;
  }

  try {
    const env = EnvironmentSchema.parse(process.env);
    cachedEnvironment = env;
    return env;
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new Error(`Environment validation failed:\n${issues.join('\n')}`);
    }
    throw error;
  }
}

// Check if running in Docker container
export function isRunningInDocker(): boolean {
  if (process.env.DOCKER_CONTAINER) {
    return true;
  }

  // Check for .dockerenv file (Linux containers)
  try {
    fs.accessSync('/.dockerenv');
    return true;
  } catch {
    return false;
  }
}

export function validateEnvironment(): void {
  getEnvironment(); // This will throw if validation fails
}

export function resolveLogLevel(env: Environment = getEnvironment()): LogLevel {
  if (env.PAGE_DISTILL_LOG_LEVEL) return env.PAGE_DISTILL_LOG_LEVEL;
  return env.NODE_ENV === 'development' ? 'debug' : 'info';
}

// For testing purposes
export function clearEnvironmentCache(): void {
  cachedEnvironment = null;
}
