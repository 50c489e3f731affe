import crypto from 'crypto';
import { env } from '../config/env.js';

// Odoo's execute_kw wants the raw password on every call, so the session
// token carries it sealed with a key derived from the JWT secret.
function getCipherKey(): Buffer {
  return crypto.createHash('sha256').update(`odoo-session:${env.JWT_SECRET}`).digest();
}

export function encryptText(value: string): string {
  const iv = crypto.randomBytes(12);
  const cipher = crypto.createCipheriv('aes-256-gcm', getCipherKey(), iv);
  const ciphertext = Buffer.concat([cipher.update(value, 'utf8'), cipher.final()]);
  const tag = cipher.getAuthTag();
  return [iv, tag, ciphertext].map((part) => part.toString('base64url')).join('.');
}

export function decryptText(payload: string): string {
  const parts = payload.split('.');
  if (parts.length !== 3 || parts.some((part) => part.length === 0)) {
    throw new Error('Invalid encrypted payload');
  }
  const [iv, tag, encrypted] = parts.map((part) => Buffer.from(part, 'base64url'));

  const decipher = crypto.createDecipheriv('aes-256-gcm', getCipherKey(), iv);
  decipher.setAuthTag(tag);
  return Buffer.concat([decipher.update(encrypted), decipher.final()]).toString('utf8');
}
