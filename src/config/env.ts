import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

const booleanFlag = z
  .union([z.boolean(), z.string()])
  .transform((value) => (typeof value === 'boolean' ? value : ['true', '1', 'yes'].includes(value.toLowerCase())));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(5000),
  API_PREFIX: z.string().default('/api/v1'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // MongoDB
  MONGODB_URI: z.string().min(1, 'MONGODB_URI is required'),

  // JWT
  JWT_ACCESS_SECRET: z.string().min(16),
  JWT_ACCESS_EXPIRY_SECONDS: z.coerce.number().int().positive().default(12 * 60 * 60),

  // Cookies
  COOKIE_DOMAIN: z.string().default('localhost'),
  COOKIE_SECURE: booleanFlag.default(false),
  COOKIE_SAMESITE: z.enum(['lax', 'strict', 'none']).default('lax'),

  // CORS
  CORS_ORIGIN: z.string().default('http://localhost:5173'),

  // Shop identity (receipts, SMS)
  SHOP_NAME: z.string().default('Tailor Shop'),
  SHOP_ADDRESS: z.string().default(''),
  SHOP_PHONE: z.string().default(''),

  // Semaphore SMS gateway; empty key disables sending
  SEMAPHORE_API_KEY: z.string().default(''),
  SEMAPHORE_SENDER_NAME: z.string().default(''),
  SEMAPHORE_API_URL: z.string().url().default('https://api.semaphore.co/api/v4/messages'),

  // Business rules
  DEPOSIT_PERCENTAGE: z.coerce.number().min(0).max(100).default(50),
  DEFAULT_COMMISSION_RATE: z.coerce.number().min(0).max(100).default(10),
  LOW_STOCK_FABRIC_METERS: z.coerce.number().min(0).default(5),
  LOW_STOCK_ACCESSORY_QUANTITY: z.coerce.number().min(0).default(10),
  TIMEZONE: z.string().default('Asia/Manila'),

  // Seed admin
  SEED_ADMIN_USERNAME: z.string().default('admin'),
  SEED_ADMIN_EMAIL: z.string().email().default('admin@example.com'),
  SEED_ADMIN_PASSWORD: z.string().min(8).default('Admin@12345'),
  SEED_TAILOR_PASSWORD: z.string().min(8).default('Tailor@12345'),

  // CSRF
  CSRF_SECRET: z.string().min(16).default('change-me-csrf-secret-32chars!!'),
});

export type Env = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Invalid environment variables:');
  console.error(parsed.error.flatten().fieldErrors);
  process.exit(1);
}

const envData = parsed.data;

if (envData.NODE_ENV === 'production') {
  const prodConfigErrors: string[] = [];

  if (envData.CSRF_SECRET === 'change-me-csrf-secret-32chars!!') {
    prodConfigErrors.push('CSRF_SECRET must be overridden in production');
  }

  if (envData.SEED_ADMIN_PASSWORD === 'Admin@12345') {
    prodConfigErrors.push('SEED_ADMIN_PASSWORD must be overridden in production');
  }

  if (!envData.COOKIE_SECURE) {
    prodConfigErrors.push('COOKIE_SECURE must be true in production');
  }

  if (envData.COOKIE_DOMAIN === 'localhost') {
    prodConfigErrors.push('COOKIE_DOMAIN cannot be localhost in production');
  }

  if (prodConfigErrors.length > 0) {
    console.error('Invalid production environment variables:');
    for (const message of prodConfigErrors) {
      console.error(`- ${message}`);
    }
    process.exit(1);
  }
}

export const env = envData;
