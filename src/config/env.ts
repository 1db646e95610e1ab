import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

// Numbers arrive as strings from the environment
const intFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: intFromEnv(3000),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),

  STORAGE_DRIVER: z.enum(['redis', 'memory']).default('redis'),
  REDIS_URL: z.string().default('redis://localhost:6379'),
  DATABASE_URL: z.string().optional(),

  WA_API_VERSION: z.string().default('v18.0'),
  WA_PHONE_NUMBER_ID: z.string().default(''),
  WA_ACCESS_TOKEN: z.string().default(''),
  WA_VERIFY_TOKEN: z.string().default(''),

  ADMIN_PHONE_NUMBERS: z.string().default(''),

  SESSION_IDLE_MINUTES: intFromEnv(30),
  SESSION_TTL_SECONDS: intFromEnv(86400),
  STORAGE_TIMEOUT_MS: intFromEnv(5000),
  LOCK_TTL_MS: intFromEnv(10000),
  LOCK_WAIT_MS: intFromEnv(5000),

  BUS_TOTAL_SEATS: intFromEnv(45),
  SERVICE_ORIGIN: z.string().default('Campus'),
  APP_URL: z.string().url().default('https://example.com'),
  PAYMENT_ACCOUNT_DETAILS: z
    .string()
    .default('Bank: Example Bank | Title: Seatline Transport | Account: 0000-0000000000'),
});

export type Env = z.infer<typeof envSchema>;

const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  // Logger depends on this module, so report straight to stderr
  console.error('Invalid environment variables:', parseResult.error.flatten().fieldErrors);
  process.exit(1);
}

const env: Env = parseResult.data;

/**
 * Application configuration singleton
 */
export const config = {
  nodeEnv: env.NODE_ENV,
  isProduction: env.NODE_ENV === 'production',
  isTest: env.NODE_ENV === 'test',
  port: env.PORT,
  logLevel: env.LOG_LEVEL,

  storageDriver: env.STORAGE_DRIVER,
  redisUrl: env.REDIS_URL,
  databaseUrl: env.DATABASE_URL,

  whatsapp: {
    apiVersion: env.WA_API_VERSION,
    phoneNumberId: env.WA_PHONE_NUMBER_ID,
    accessToken: env.WA_ACCESS_TOKEN,
    verifyToken: env.WA_VERIFY_TOKEN,
  },

  adminPhoneNumbers: env.ADMIN_PHONE_NUMBERS.split(',')
    .map((phone) => phone.trim())
    .filter((phone) => phone.length > 0),

  session: {
    idleMs: env.SESSION_IDLE_MINUTES * 60 * 1000,
    ttlSeconds: env.SESSION_TTL_SECONDS,
  },

  storageTimeoutMs: env.STORAGE_TIMEOUT_MS,
  lock: {
    ttlMs: env.LOCK_TTL_MS,
    waitMs: env.LOCK_WAIT_MS,
  },

  booking: {
    totalSeats: env.BUS_TOTAL_SEATS,
    origin: env.SERVICE_ORIGIN,
    uploadBaseUrl: env.APP_URL.replace(/\/+$/, ''),
    paymentAccountDetails: env.PAYMENT_ACCOUNT_DETAILS,
  },
} as const;

export type AppConfig = typeof config;
