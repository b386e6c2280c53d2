/**
 * Report Server Tests
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { writeFile, mkdir, rm } from 'fs/promises';
import { join } from 'path';
import { connect } from 'net';
import {
  ReportServer,
  createReportServer,
  FlashQueue,
  MESSAGES,
  escapeHtml,
  formatTimestamp,
  flashesFor,
  type SubmissionRunner,
} from '../src/lib/server/index.js';
import { createReportPipeline } from '../src/lib/pipeline/index.js';
import { z } from 'zod';
import { createReportStore, ReportSchema, type ReportStore } from '../src/lib/store/index.js';
import { URL_ERROR, CATEGORY_ERROR } from '../src/lib/validation/index.js';
import { StaticCapturer } from './helpers/fakes.js';

const TEST_DATA_DIR = './test-server-data';
const SCREENSHOTS_DIR = join(TEST_DATA_DIR, 'screenshots');

function form(fields: Record<string, string>): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    body: new URLSearchParams(fields).toString(),
    redirect: 'manual',
  };
}

function json(body: unknown): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  };
}

const CreatedSchema = z.object({ status: z.literal('succeeded'), report: ReportSchema });

/** Send a request line as written, bypassing client-side URL normalization */
function rawRequest(baseUrl: string, requestLine: string): Promise<string> {
  const { hostname, port } = new URL(baseUrl);

  return new Promise((resolve, reject) => {
    const socket = connect(Number(port), hostname, () => {
      socket.write(`${requestLine}\r\nHost: ${hostname}\r\nConnection: close\r\n\r\n`);
    });
    let reply = '';
    socket.on('data', (data: Buffer) => {
      reply += data.toString('utf-8');
    });
    socket.on('end', () => resolve(reply));
    socket.on('error', reject);
  });
}

function flashCookie(response: Response): string {
  const header = response.headers.get('set-cookie') ?? '';
  return header.split(';')[0];
}

describe('ReportServer', () => {
  let server: ReportServer;
  let store: ReportStore;
  let baseUrl: string;

  beforeAll(async () => {
    await rm(TEST_DATA_DIR, { recursive: true, force: true });
    await mkdir(SCREENSHOTS_DIR, { recursive: true });
    await writeFile(join(SCREENSHOTS_DIR, 'dQw4w9WgXcQ_1_abcdef.png'), 'png-bytes');

    store = createReportStore(TEST_DATA_DIR);
    const pipeline = createReportPipeline(new StaticCapturer(SCREENSHOTS_DIR), store);
    server = createReportServer(pipeline, store, {
      port: 0,
      host: '127.0.0.1',
      screenshotsDir: SCREENSHOTS_DIR,
    });

    await server.start();
    baseUrl = server.getUrl();
  });

  afterAll(async () => {
    await server.stop();
    await rm(TEST_DATA_DIR, { recursive: true, force: true });
  });

  describe('submission page', () => {
    it('should serve the form with every category', async () => {
      const response = await fetch(`${baseUrl}/`);

      expect(response.status).toBe(200);
      expect(response.headers.get('content-type')).toContain('text/html');

      const html = await response.text();
      expect(html).toContain('<form method="post" action="/submit_report">');
      expect(html).toContain('<option value="spam">Spam or misleading</option>');
      expect(html).toContain('<option value="terrorism">Promotes terrorism</option>');
    });
  });

  describe('form submission', () => {
    it('should redirect and show the success message exactly once', async () => {
      const response = await fetch(
        `${baseUrl}/submit_report`,
        form({
          video_url: 'https://youtu.be/dQw4w9WgXcQ',
          report_category: 'spam',
          report_details: 'same video reuploaded',
        })
      );

      expect(response.status).toBe(303);
      expect(response.headers.get('location')).toBe('/');

      const cookie = flashCookie(response);
      expect(cookie).toMatch(/^flash=[a-f0-9]{32}$/);

      const first = await (await fetch(`${baseUrl}/`, { headers: { cookie } })).text();
      expect(first).toContain(`<div class="flash flash-success">${MESSAGES.submitted}</div>`);
      expect(first).toContain('same video reuploaded');

      const second = await (await fetch(`${baseUrl}/`, { headers: { cookie } })).text();
      expect(second).not.toContain(MESSAGES.submitted);
    });

    it('should show field errors for an invalid submission and store nothing', async () => {
      const before = store.count();

      const response = await fetch(
        `${baseUrl}/submit_report`,
        form({ video_url: 'not-a-url', report_category: '' })
      );
      const cookie = flashCookie(response);
      const html = await (await fetch(`${baseUrl}/`, { headers: { cookie } })).text();

      expect(html).toContain(`<div class="flash flash-danger">${escapeHtml(URL_ERROR)}</div>`);
      expect(html).toContain(`<div class="flash flash-danger">${escapeHtml(CATEGORY_ERROR)}</div>`);
      expect(store.count()).toBe(before);
    });

    it('should redirect an oversized post with an error message and store nothing', async () => {
      const before = store.count();

      const response = await fetch(
        `${baseUrl}/submit_report`,
        form({
          video_url: 'https://youtu.be/dQw4w9WgXcQ',
          report_category: 'spam',
          report_details: 'x'.repeat(70 * 1024),
        })
      );

      expect(response.status).toBe(303);
      expect(response.headers.get('location')).toBe('/');

      const cookie = flashCookie(response);
      const html = await (await fetch(`${baseUrl}/`, { headers: { cookie } })).text();
      expect(html).toContain(`<div class="flash flash-danger">${MESSAGES.tooLarge}</div>`);
      expect(store.count()).toBe(before);
    });

    it('should answer 413 to an oversized API post', async () => {
      const response = await fetch(`${baseUrl}/api/reports`, json({ report_details: 'x'.repeat(70 * 1024) }));

      expect(response.status).toBe(413);
      expect(await response.json()).toEqual({ error: 'Request body too large' });
    });
  });

  describe('history', () => {
    it('should list reports in submission order', async () => {
      await fetch(`${baseUrl}/api/reports`, json({
        video_url: 'https://youtu.be/aaaaaaaaaaa',
        report_category: 'violent',
      }));
      await fetch(`${baseUrl}/api/reports`, json({
        video_url: 'https://youtu.be/bbbbbbbbbbb',
        report_category: 'hateful',
      }));

      const html = await (await fetch(`${baseUrl}/history`)).text();

      expect(html.indexOf('https://youtu.be/aaaaaaaaaaa')).toBeGreaterThan(-1);
      expect(html.indexOf('https://youtu.be/aaaaaaaaaaa')).toBeLessThan(
        html.indexOf('https://youtu.be/bbbbbbbbbbb')
      );
      expect(html).toContain(`All reports (${store.count()})`);
    });
  });

  describe('API', () => {
    it('should create a report from JSON', async () => {
      const response = await fetch(`${baseUrl}/api/reports`, json({
        video_url: 'https://www.youtube.com/watch?v=ccccccccccc',
        report_category: 'harassment',
        report_details: '<script>alert(1)</script>',
      }));

      expect(response.status).toBe(201);
      const body = CreatedSchema.parse(await response.json());
      expect(body.report.video_url).toBe('https://www.youtube.com/watch?v=ccccccccccc');
      expect(body.report.report_category).toBe('harassment');
      expect(body.report.screenshot_path).toMatch(/^screenshots\/shot_\d+\.png$/);

      const page = await (await fetch(`${baseUrl}/`)).text();
      expect(page).toContain('&lt;script&gt;alert(1)&lt;/script&gt;');
      expect(page).not.toContain('<script>alert(1)</script>');
    });

    it('should return field errors for an invalid body', async () => {
      const response = await fetch(`${baseUrl}/api/reports`, json({ video_url: 'nope' }));

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        status: 'rejected',
        fieldErrors: { video_url: URL_ERROR, report_category: CATEGORY_ERROR },
      });
    });

    it('should reject malformed JSON', async () => {
      const response = await fetch(`${baseUrl}/api/reports`, json('{ nope'));

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ error: 'Request body must be valid JSON' });
    });

    it('should list reports newest first by default', async () => {
      const response = await fetch(`${baseUrl}/api/reports`);
      const reports = ReportSchema.array().parse(await response.json());

      expect(response.headers.get('content-type')).toContain('application/json');
      expect(reports.length).toBe(store.count());
      expect(reports.map((r) => r.id)).toEqual(store.list('desc').map((r) => r.id));
    });

    it('should list in ascending order on request', async () => {
      const response = await fetch(`${baseUrl}/api/reports?order=asc`);
      const reports = ReportSchema.array().parse(await response.json());

      expect(reports.map((r) => r.id)).toEqual(store.list('asc').map((r) => r.id));
    });

    it('should reject an unknown order', async () => {
      const response = await fetch(`${baseUrl}/api/reports?order=random`);
      expect(response.status).toBe(400);
    });

    it('should fetch a report by id', async () => {
      const response = await fetch(`${baseUrl}/api/reports/1`);

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual(store.get(1));
    });

    it('should return 404 for an unknown id', async () => {
      const missing = await fetch(`${baseUrl}/api/reports/9999`);
      const garbage = await fetch(`${baseUrl}/api/reports/abc`);

      expect(missing.status).toBe(404);
      expect(await missing.json()).toEqual({ error: 'Report not found' });
      expect(garbage.status).toBe(404);
    });
  });

  describe('screenshots', () => {
    it('should serve a captured PNG', async () => {
      const response = await fetch(`${baseUrl}/screenshots/dQw4w9WgXcQ_1_abcdef.png`);

      expect(response.status).toBe(200);
      expect(response.headers.get('content-type')).toBe('image/png');
      expect(await response.text()).toBe('png-bytes');
    });

    it('should refuse names outside the screenshot pattern', async () => {
      const response = await fetch(`${baseUrl}/screenshots/..%2Freports.json`);
      expect(response.status).toBe(404);
    });

    it('should return 404 for a missing screenshot', async () => {
      const response = await fetch(`${baseUrl}/screenshots/missing.png`);
      expect(response.status).toBe(404);
    });
  });

  it('should return 404 for unknown routes', async () => {
    const response = await fetch(`${baseUrl}/admin`);
    expect(response.status).toBe(404);
  });

  it('should answer 404 to an unparseable request target and keep serving', async () => {
    const reply = await rawRequest(baseUrl, 'GET // HTTP/1.1');
    expect(reply.split('\r\n')[0]).toBe('HTTP/1.1 404 Not Found');

    const response = await fetch(`${baseUrl}/`);
    expect(response.status).toBe(200);
  });
});

describe('ReportServer with a failing store', () => {
  const failing: SubmissionRunner = {
    run: async () => ({ status: 'failed', failureReason: 'disk full' }),
  };
  let server: ReportServer;
  let store: ReportStore;

  beforeAll(async () => {
    store = createReportStore(join(TEST_DATA_DIR, 'failing'));
    server = createReportServer(failing, store, { port: 0, host: '127.0.0.1' });
    await server.start();
  });

  afterAll(async () => {
    await server.stop();
    await rm(TEST_DATA_DIR, { recursive: true, force: true });
  });

  it('should answer 500 with a retry message', async () => {
    const response = await fetch(`${server.getUrl()}/api/reports`, json({}));

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ status: 'failed', error: MESSAGES.storageFailed });
  });

  it('should flash the retry message after a form post', async () => {
    const response = await fetch(
      `${server.getUrl()}/submit_report`,
      form({ video_url: 'https://youtu.be/dQw4w9WgXcQ', report_category: 'spam' })
    );
    const cookie = flashCookie(response);
    const html = await (await fetch(`${server.getUrl()}/`, { headers: { cookie } })).text();

    expect(html).toContain(`<div class="flash flash-danger">${MESSAGES.storageFailed}</div>`);
  });
});

describe('flashesFor', () => {
  it('should not surface capture failures to the user', () => {
    expect(
      flashesFor({
        status: 'succeeded',
        report: {
          id: 1,
          video_url: 'https://youtu.be/dQw4w9WgXcQ',
          report_category: 'spam',
          timestamp: '2025-03-01T09:15:00.000Z',
        },
        captureFailureReason: 'timed out',
      })
    ).toEqual([{ category: 'success', message: MESSAGES.submitted }]);
  });
});

describe('FlashQueue', () => {
  it('should hand messages out once', () => {
    const queue = new FlashQueue();
    queue.push('a', { category: 'success', message: 'one' });
    queue.push('a', { category: 'danger', message: 'two' });

    expect(queue.consume('a').map((m) => m.message)).toEqual(['one', 'two']);
    expect(queue.consume('a')).toEqual([]);
  });

  it('should evict the oldest key past its capacity', () => {
    const queue = new FlashQueue(2);
    queue.push('a', { category: 'success', message: 'a' });
    queue.push('b', { category: 'success', message: 'b' });
    queue.push('c', { category: 'success', message: 'c' });

    expect(queue.size()).toBe(2);
    expect(queue.consume('a')).toEqual([]);
    expect(queue.consume('c')).toHaveLength(1);
  });
});

describe('view helpers', () => {
  it('should escape markup', () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;');
  });

  it('should format timestamps for display', () => {
    expect(formatTimestamp('2025-03-01T09:15:00.000Z')).toBe('2025-03-01 09:15:00');
  });
});
