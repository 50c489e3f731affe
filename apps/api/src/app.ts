import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { env } from './config/env.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import routes from './routes/index.js';

function parseTrustProxySetting(value: string | undefined): boolean | number | string {
  const raw = (value ?? '').trim();
  if (!raw) return false;

  const lowered = raw.toLowerCase();
  if (lowered === 'true') return true;
  if (lowered === 'false') return false;
  if (/^\d+$/.test(raw)) return Number(raw);

  // Allow Express named values like "loopback", "linklocal", "uniquelocal" or CSV.
  return raw;
}

export function createApp() {
  const app = express();

  app.set('trust proxy', parseTrustProxySetting(env.TRUST_PROXY));

  // Security
  app.use(helmet());
  app.use(
    cors({
      origin: env.CLIENT_URL,
      credentials: true,
    }),
  );

  // Rate limiting
  const credentialLimiter = rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    max: env.LOGIN_RATE_LIMIT_MAX,
    message: { success: false, error: 'Too many requests, please try again later' },
  });
  app.use('/api/v1/auth', credentialLimiter);
  app.use('/api/v1/connection', credentialLimiter);

  // Body parsing; face photos arrive as base64
  app.use(express.json({ limit: '10mb' }));

  // Routes
  app.use('/api/v1', routes);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
