import { z } from 'zod';

const optionalString = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string().optional(),
);

const envSchema = z.object({
  // Server Configuration
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().transform(Number).pipe(z.number().int().positive()).default('8080'),
  HOST: z.string().default('0.0.0.0'),
  CORS_ORIGIN: z.string().default('*'),

  // Rate Limiting
  RATE_LIMIT_MAX: z.string().transform(Number).pipe(z.number().int().positive()).default('100'),
  RATE_LIMIT_WINDOW: z.string().transform(Number).pipe(z.number().int().positive()).default('60000'),

  // Object Storage
  WEATHER_BUCKET_NAME: z.string().min(1).default('your-bucket-name'),
  STORAGE_TYPE: z.enum(['s3', 'local']).default('s3'),
  STORAGE_S3_ENDPOINT: z.string().url().default('https://storage.googleapis.com'),
  STORAGE_S3_REGION: z.string().default('auto'),
  STORAGE_S3_ACCESS_KEY: optionalString,
  STORAGE_S3_SECRET_KEY: optionalString,
  STORAGE_S3_FORCE_PATH_STYLE: z
    .string()
    .transform((val) => val === 'true')
    .pipe(z.boolean())
    .default('false'),
  STORAGE_TIMEOUT_MS: z
    .string()
    .transform(Number)
    .pipe(z.number().int().positive())
    .default('30000'),
  LOCAL_STORAGE_PATH: z.string().default('./storage'),

  // Open-Meteo Archive API
  OPEN_METEO_ARCHIVE_URL: z
    .string()
    .url()
    .default('https://archive-api.open-meteo.com/v1/archive'),
  UPSTREAM_TIMEOUT_MS: z
    .string()
    .transform(Number)
    .pipe(z.number().int().positive())
    .default('30000'),

  // Logging
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
});

export type Environment = z.infer<typeof envSchema>;

let _env: Environment | null = null;

export function parseEnvironment(source: NodeJS.ProcessEnv): Environment {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    console.error('❌ Invalid environment variables:');
    console.error(parsed.error.format());
    throw new Error('Invalid environment configuration');
  }

  return parsed.data;
}

export function loadEnvironment(): Environment {
  if (_env) {
    return _env;
  }

  _env = parseEnvironment(process.env);
  return _env;
}

export function getEnvironment(): Environment {
  if (!_env) {
    throw new Error('Environment not loaded. Call loadEnvironment() first.');
  }
  return _env;
}
