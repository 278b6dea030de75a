import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

dotenv.config({ path: path.resolve(__dirname, '../../.env') });

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

const envSchema = z.object({
  PORT: intFromEnv(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PUBLIC_BASE_URL: z.string().url().default('http://localhost:3000'),

  DATABASE_URL: z.string().min(1),
  DB_POOL_MAX: intFromEnv(20),

  WHATSAPP_API_TOKEN: z.string().default(''),
  WHATSAPP_PHONE_NUMBER_ID: z.string().default(''),
  WHATSAPP_API_VERSION: z.string().default('v18.0'),
  WHATSAPP_WEBHOOK_VERIFY_TOKEN: z.string().min(1),
  WHATSAPP_APP_SECRET: z.string().optional(),

  CATALOG_BASE_URL: z.string().url().default('http://localhost:3000/catalog'),
  DEFAULT_CURRENCY: z.string().length(3).default('USD'),
  DEFAULT_COUNTRY_CODE: z.string().regex(/^\d{1,3}$/).default('1'),

  UPLOAD_DIR: z.string().default('uploads'),
  MAX_UPLOAD_SIZE: intFromEnv(10 * 1024 * 1024),

  HTTP_TIMEOUT_MS: intFromEnv(30000),

  UNDO_WINDOW_MS: intFromEnv(30000),
  ASSET_SWEEP_INTERVAL_MS: intFromEnv(0),
  ASSET_RETENTION_MS: intFromEnv(24 * 60 * 60 * 1000),

  AUDIT_RETRY_CAPACITY: intFromEnv(500),
  AUDIT_RETRY_INTERVAL_MS: intFromEnv(60000),

  JWT_SECRET: z.string().min(1),
  JWT_EXPIRES_IN_SECONDS: intFromEnv(24 * 60 * 60),

  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  LOG_DIR: z.string().optional()
});

export type Env = z.infer<typeof envSchema>;

export const loadConfig = (env: NodeJS.ProcessEnv = process.env) => {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  const e = parsed.data;

  return {
    server: {
      port: e.PORT,
      env: e.NODE_ENV,
      publicBaseUrl: e.PUBLIC_BASE_URL.replace(/\/$/, ''),
    },
    database: {
      url: e.DATABASE_URL,
      poolMax: e.DB_POOL_MAX,
    },
    whatsapp: {
      apiToken: e.WHATSAPP_API_TOKEN,
      phoneNumberId: e.WHATSAPP_PHONE_NUMBER_ID,
      apiBaseUrl: `https://graph.facebook.com/${e.WHATSAPP_API_VERSION}`,
      verifyToken: e.WHATSAPP_WEBHOOK_VERIFY_TOKEN,
      appSecret: e.WHATSAPP_APP_SECRET,
    },
    catalog: {
      baseUrl: e.CATALOG_BASE_URL.replace(/\/$/, ''),
      defaultCurrency: e.DEFAULT_CURRENCY.toUpperCase(),
      defaultCountryCode: e.DEFAULT_COUNTRY_CODE,
    },
    uploads: {
      dir: e.UPLOAD_DIR,
      maxSize: e.MAX_UPLOAD_SIZE,
      allowedTypes: ['image/jpeg', 'image/jpg', 'image/png', 'image/webp'],
    },
    http: {
      timeoutMs: e.HTTP_TIMEOUT_MS,
    },
    lifecycle: {
      undoWindowMs: e.UNDO_WINDOW_MS,
      sweepIntervalMs: e.ASSET_SWEEP_INTERVAL_MS,
      assetRetentionMs: e.ASSET_RETENTION_MS,
    },
    audit: {
      retryCapacity: e.AUDIT_RETRY_CAPACITY,
      retryIntervalMs: e.AUDIT_RETRY_INTERVAL_MS,
    },
    jwt: {
      secret: e.JWT_SECRET,
      expiresInSeconds: e.JWT_EXPIRES_IN_SECONDS,
    },
    logging: {
      level: e.LOG_LEVEL,
      dir: e.LOG_DIR,
    },
  };
};

export type AppConfig = ReturnType<typeof loadConfig>;

export const config: AppConfig = loadConfig();

export default config;
