import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

const envSchema = z.object({
  PORT: z.coerce.number().default(3001),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  CLIENT_URL: z.string().default('http://localhost:5173'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  TRUST_PROXY: z.string().optional(),

  // Default Odoo connection; can be changed at runtime through /connection
  ODOO_URL: z.string().min(1).default('http://localhost:8069'),
  ODOO_DB: z.string().min(1).default('hr'),
  ODOO_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  ODOO_WRITE_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  FACE_SUBMIT_PATH: z.string().startsWith('/').default('/submit_face'),
  // Required to change or test the connection; unset disables those routes
  CONNECTION_ADMIN_TOKEN: z.string().min(16).optional(),

  JWT_SECRET: z.string().min(16),
  JWT_EXPIRES_IN: z.coerce.number().int().positive().default(12 * 60 * 60), // seconds

  LOGIN_RATE_LIMIT_MAX: z.coerce.number().int().positive().default(50),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Invalid environment variables:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env = parsed.data;
