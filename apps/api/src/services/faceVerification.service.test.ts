import { beforeEach, describe, expect, it, vi } from 'vitest';
import { extractMessageFromHtml, submitFaceViaController } from './faceVerification.service.js';

const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => new Response(''));
const connection = { baseUrl: 'http://odoo.test/', database: 'testdb' };

describe('extractMessageFromHtml', () => {
  it('reads the message paragraph and decodes entities', () => {
    const html = `
      <html><body>
        <h1>Attendance</h1>
        <p id="result" class="message">
          <strong>Success</strong>&nbsp;checked in at 08:15 &amp; recorded
        </p>
      </body></html>`;

    expect(extractMessageFromHtml(html)).toBe('Success checked in at 08:15 & recorded');
  });

  it('falls back to the whole document without a message paragraph', () => {
    expect(extractMessageFromHtml('<div>Face &lt;not&gt; recognized</div>')).toBe('Face <not> recognized');
  });
});

describe('submitFaceViaController', () => {
  beforeEach(() => {
    fetchMock.mockClear();
    vi.stubGlobal('fetch', fetchMock);
  });

  it('posts the photo as a data URL with the coordinates', async () => {
    fetchMock.mockResolvedValueOnce(new Response('<p class="message">✅ Check-in recorded</p>'));

    const result = await submitFaceViaController(connection, { photo: 'QUJD', latitude: 1.5, longitude: 2.25 });

    expect(result).toEqual({ success: true, message: '✅ Check-in recorded' });
    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://odoo.test/submit_face');
    const body = new URLSearchParams(String(fetchMock.mock.calls[0]?.[1]?.body));
    expect(body.get('face_image')).toBe('data:image/jpeg;base64,QUJD');
    expect(body.get('latitude')).toBe('1.5');
    expect(body.get('longitude')).toBe('2.25');
  });

  it('sends empty coordinates when none are known', async () => {
    fetchMock.mockResolvedValueOnce(new Response('<p class="message">Success</p>'));

    await submitFaceViaController(connection, { photo: 'QUJD' });

    const body = new URLSearchParams(String(fetchMock.mock.calls[0]?.[1]?.body));
    expect(body.get('latitude')).toBe('');
    expect(body.get('longitude')).toBe('');
  });

  it('treats a page without a success marker as a failure', async () => {
    fetchMock.mockResolvedValueOnce(new Response('<p class="message">Face not recognized</p>'));

    await expect(submitFaceViaController(connection, { photo: 'QUJD' })).resolves.toEqual({
      success: false,
      error: 'Face not recognized',
    });
  });

  it('reports the status code of a failed request', async () => {
    fetchMock.mockResolvedValueOnce(new Response('nope', { status: 404 }));

    await expect(submitFaceViaController(connection, { photo: 'QUJD' })).resolves.toEqual({
      success: false,
      error: 'HTTP 404',
    });
  });

  it('wraps network errors', async () => {
    fetchMock.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

    await expect(submitFaceViaController(connection, { photo: 'QUJD' })).resolves.toEqual({
      success: false,
      error: 'Face verification failed: connect ECONNREFUSED',
    });
  });
});
