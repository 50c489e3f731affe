import type { FaceVerificationResult, OdooConnection } from '@punchcard/shared';
import { env } from '../config/env.js';
import { logger } from '../utils/logger.js';
import { normalizeBaseUrl } from './odooRpc.service.js';

export interface FaceSubmission {
  photo: string;
  latitude?: number;
  longitude?: number;
}

const MESSAGE_PATTERN = /<p[^>]*class="message"[^>]*>([\s\S]*?)<\/p>/i;

/** Pulls the `<p class="message">` text out of the face controller's HTML page. */
export function extractMessageFromHtml(html: string): string {
  const match = MESSAGE_PATTERN.exec(html);
  return (match?.[1] ?? html)
    .replace(/<[^>]+>/g, '')
    .replace(/&nbsp;/g, ' ')
    .replace(/&amp;/g, '&')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .trim();
}

/**
 * Posts a face photo to the Odoo website controller that matches the face
 * and records attendance server-side.
 */
export async function submitFaceViaController(
  connection: OdooConnection,
  submission: FaceSubmission,
): Promise<FaceVerificationResult> {
  const url = `${normalizeBaseUrl(connection.baseUrl)}${env.FACE_SUBMIT_PATH}`;
  const body = new URLSearchParams({
    face_image: `data:image/jpeg;base64,${submission.photo}`,
    latitude: submission.latitude?.toString() ?? '',
    longitude: submission.longitude?.toString() ?? '',
  });

  try {
    const response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body,
      signal: AbortSignal.timeout(env.ODOO_WRITE_TIMEOUT_MS),
    });

    if (response.status !== 200) {
      logger.warn({ url, status: response.status }, 'Face controller returned an error status');
      return { success: false, error: `HTTP ${response.status}` };
    }

    const message = extractMessageFromHtml(await response.text());
    const isSuccess = message.includes('Success') || message.includes('✅');
    logger.info({ url, isSuccess, photoLength: submission.photo.length }, 'Face controller responded');
    return isSuccess ? { success: true, message } : { success: false, error: message };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    logger.error({ url, err: reason }, 'Face verification request failed');
    return { success: false, error: `Face verification failed: ${reason}` };
  }
}
