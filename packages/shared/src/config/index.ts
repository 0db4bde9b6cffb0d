import path from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';

const DEFAULT_MIGRATIONS_DIR = path.resolve(process.cwd(), 'migrations');
const DEFAULT_WEATHER_API_URL = 'https://api.open-meteo.com/v1/forecast';

loadDotenv();

const booleanFlag = z
  .string()
  .optional()
  .transform((value) => {
    if (value === undefined) return undefined;
    return value !== 'false';
  });

const configSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    PERSISTENCE_DRIVER: z.enum(['postgres', 'memory']).default('postgres'),
    DATABASE_URL: z.string().optional(),
    DATABASE_MAX_POOL: z.coerce.number().int().positive().optional(),
    LOG_LEVEL: z.string().default('info'),
    MIGRATIONS_DIR: z.string().optional(),
    SERVICE_NAME: z.string().default('observatory-booking'),
    WEATHER_API_URL: z.string().url().default(DEFAULT_WEATHER_API_URL),
    WEATHER_ENABLED: booleanFlag,
    WEATHER_CACHE_TTL_HOURS: z.coerce.number().positive().default(3),
    WEATHER_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    WEATHER_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
    WEATHER_BACKOFF_MS: z.coerce.number().int().nonnegative().default(1000),
    WEATHER_REFRESH_INTERVAL_HOURS: z.coerce.number().positive().default(3),
    WEATHER_REFRESH_ENABLED: booleanFlag,
    RATE_LIMIT_WINDOW_SECONDS: z.coerce.number().int().positive().default(20),
    RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(10),
    EVENT_BUS_URL: z.string().optional(),
    EVENT_BUS_DRIVER: z.enum(['in-memory', 'rabbitmq']).optional(),
    EVENT_BUS_EXCHANGE: z.string().optional(),
    TRACING_EXPORT_JSON: booleanFlag,
    JWT_SECRET: z.string().min(8, 'JWT_SECRET must be at least 8 characters').default('change-me'),
    JWT_ACCESS_TTL_SECONDS: z.coerce.number().int().positive().default(900),
    JWT_REFRESH_TTL_SECONDS: z.coerce.number().int().positive().default(604800),
    DEFAULT_ADMIN_EMAIL: z.string().email().default('admin@example.com'),
    DEFAULT_ADMIN_PASSWORD: z.string().optional(),
    METRICS_ENABLED: booleanFlag
  })
  .superRefine((values, ctx) => {
    if (values.PERSISTENCE_DRIVER === 'postgres' && !values.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when PERSISTENCE_DRIVER is postgres'
      });
    }
  })
  .transform((values) => ({
    ...values,
    DATABASE_URL: values.DATABASE_URL ?? '',
    MIGRATIONS_DIR: values.MIGRATIONS_DIR ?? DEFAULT_MIGRATIONS_DIR,
    METRICS_ENABLED: values.METRICS_ENABLED ?? true,
    DATABASE_MAX_POOL: values.DATABASE_MAX_POOL ?? 10,
    WEATHER_ENABLED: values.WEATHER_ENABLED ?? true,
    WEATHER_REFRESH_ENABLED: values.WEATHER_REFRESH_ENABLED ?? true,
    EVENT_BUS_DRIVER:
      values.EVENT_BUS_DRIVER ??
      (values.EVENT_BUS_URL && values.EVENT_BUS_URL.startsWith('amqp')
        ? 'rabbitmq'
        : 'in-memory'),
    EVENT_BUS_EXCHANGE: values.EVENT_BUS_EXCHANGE ?? 'observatory.events',
    TRACING_EXPORT_JSON: values.TRACING_EXPORT_JSON ?? false
  }));

export type AppConfig = z.infer<typeof configSchema>;

export class ConfigError extends Error {
  constructor(public readonly issues: z.ZodIssue[]) {
    super('Invalid configuration');
    this.name = 'ConfigError';
  }
}

let cachedConfig: AppConfig | null = null;

function parseEnvironment(
  source: NodeJS.ProcessEnv,
  { exitOnError }: { exitOnError: boolean }
): AppConfig {
  const result = configSchema.safeParse(source);

  if (!result.success) {
    if (exitOnError) {
      // eslint-disable-next-line no-console
      console.error('Invalid configuration', result.error.flatten().fieldErrors);
      process.exit(1);
    }

    throw new ConfigError(result.error.issues);
  }

  return Object.freeze(result.data);
}

export function loadConfig(overrides?: Partial<NodeJS.ProcessEnv>): AppConfig {
  if (overrides) {
    return parseEnvironment(
      {
        ...process.env,
        ...overrides
      },
      { exitOnError: false }
    );
  }

  if (!cachedConfig) {
    cachedConfig = parseEnvironment(process.env, { exitOnError: true });
  }

  return cachedConfig;
}

export const config = loadConfig();
