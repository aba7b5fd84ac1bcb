import { availableParallelism } from 'os';
import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

const MIB = 1024 * 1024;

// Zod schema for complete config validation
const ConfigSchema = z.object({
  env: z.enum(['development', 'production', 'test']).default('development'),

  server: z.object({
    host: z.string().min(1).default('0.0.0.0'),
    port: z.number().int().min(1).max(65535).default(8080),
    maxUploadBytes: z.number().int().min(1024).default(250 * MIB),
  }),

  fonts: z.object({
    directory: z.string().min(1).default('./fonts'),
  }),

  scheduler: z.object({
    workers: z.number().int().min(1).max(256),
    queueCapacity: z.number().int().min(0).max(100_000).optional(),
    jobTimeoutMs: z.number().int().min(1).default(30_000),
  }),

  pipeline: z.object({
    maxDimension: z.number().int().min(1).max(65_535).default(8192),
    maxOperations: z.number().int().min(1).max(1024).default(32),
    defaultQuality: z.number().int().min(1).max(100).default(80),
  }),

  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

type ParsedConfig = z.infer<typeof ConfigSchema>;

export interface AppConfig extends Omit<ParsedConfig, 'scheduler'> {
  scheduler: {
    workers: number;
    queueCapacity: number;
    jobTimeoutMs: number;
  };
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

function int(value: string | undefined): number | undefined {
  return value === undefined || value === '' ? undefined : Number(value);
}

function str(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

// Parse and validate configuration from environment
export function loadConfig(env: Env = process.env): AppConfig {
  const rawConfig = {
    env: str(env.NODE_ENV),

    server: {
      host: str(env.HOST),
      port: int(env.PORT),
      maxUploadBytes: int(env.MAX_UPLOAD_BYTES),
    },

    fonts: {
      directory: str(env.FONT_DIR),
    },

    scheduler: {
      workers: int(env.WORKER_COUNT) ?? availableParallelism(),
      queueCapacity: int(env.QUEUE_CAPACITY),
      jobTimeoutMs: int(env.JOB_TIMEOUT_MS),
    },

    pipeline: {
      maxDimension: int(env.MAX_DIMENSION),
      maxOperations: int(env.MAX_OPERATIONS),
      defaultQuality: int(env.DEFAULT_QUALITY),
    },

    logLevel: str(env.LOG_LEVEL),
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const parsed = result.data;
  return {
    ...parsed,
    scheduler: {
      ...parsed.scheduler,
      queueCapacity: parsed.scheduler.queueCapacity ?? parsed.scheduler.workers * 4,
    },
  };
}
