import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { env } from '../config/env.js';

const accessTokenPayloadSchema = z.object({
  sub: z.string().regex(/^\d+$/),
  login: z.string(),
  baseUrl: z.string(),
  database: z.string(),
  employeeId: z.number().int(),
  employeeName: z.string(),
  /** Odoo password sealed with `encryptText`. */
  secret: z.string(),
});

export type AccessTokenPayload = z.infer<typeof accessTokenPayloadSchema>;

export function signAccessToken(payload: AccessTokenPayload): string {
  return jwt.sign(payload, env.JWT_SECRET, {
    algorithm: 'HS256',
    expiresIn: env.JWT_EXPIRES_IN,
  });
}

export function verifyAccessToken(token: string): AccessTokenPayload {
  const decoded = jwt.verify(token, env.JWT_SECRET, { algorithms: ['HS256'] });
  return accessTokenPayloadSchema.parse(decoded);
}
