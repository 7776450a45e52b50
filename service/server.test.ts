import http from 'node:http';
import sharp from 'sharp';
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { createRemovalServer, listen } from './server';
import { RemovalPipeline } from './pipeline';
import { createRegistry } from './registry';
import type { RemovalEvent } from './protocol';
import { createFakeRemover, solidPng } from './testUtils';

const { remover } = createFakeRemover();
let server: http.Server;
let baseUrl = '';

beforeAll(async () => {
  server = createRemovalServer({
    pipeline: new RemovalPipeline({ remover }),
    registry: createRegistry([remover]),
    maxFileSize: 64 * 1024,
  });
  const port = await listen(server, 0, '127.0.0.1');
  baseUrl = `http://127.0.0.1:${port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((e) => (e ? reject(e) : resolve())));
});

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  return () => vi.restoreAllMocks();
});

function upload(bytes: Buffer, contentType = 'image/png'): Promise<Response> {
  return fetch(`${baseUrl}/api/remove-background`, {
    method: 'POST',
    headers: { 'Content-Type': contentType, 'X-File-Name': encodeURIComponent('photo 1.png') },
    body: new Uint8Array(bytes),
  });
}

/** 分块发送，请求头里没有 Content-Length */
function uploadChunked(chunks: Buffer[]): Promise<{ status: number; body: string }> {
  return new Promise((resolve, reject) => {
    const req = http.request(
      `${baseUrl}/api/remove-background`,
      { method: 'POST', headers: { 'Content-Type': 'image/png', 'Transfer-Encoding': 'chunked' } },
      (res) => {
        const parts: Buffer[] = [];
        res.on('data', (c: Buffer) => parts.push(c));
        res.on('end', () => resolve({ status: res.statusCode ?? 0, body: Buffer.concat(parts).toString('utf8') }));
        res.on('error', reject);
      }
    );
    req.on('error', reject);
    for (const chunk of chunks) req.write(chunk);
    req.end();
  });
}

async function readEvents(res: Response): Promise<RemovalEvent[]> {
  const text = await res.text();
  return text
    .split('\n')
    .filter((line) => line.trim())
    .map((line) => JSON.parse(line) as RemovalEvent);
}

describe('removal service', () => {
  it('answers health checks', async () => {
    const res = await fetch(`${baseUrl}/api/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true });
  });

  it('lists models and the active one', async () => {
    const res = await fetch(`${baseUrl}/api/models`);
    expect(await res.json()).toEqual({ models: [{ id: 'fake', name: 'Fake' }], active: 'fake' });
  });

  it('publishes upload limits', async () => {
    const res = await fetch(`${baseUrl}/api/limits`);
    expect(await res.json()).toEqual({
      maxFileSize: 64 * 1024,
      maxDimension: 2000,
      acceptedTypes: ['image/png', 'image/jpeg', 'image/jpg'],
    });
  });

  it('streams progress followed by the PNG result', async () => {
    const res = await upload(await solidPng(12, 10));
    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('application/x-ndjson');

    const events = await readEvents(res);
    expect(events.slice(0, -1).map((e) => (e.type === 'progress' ? e.percent : -1))).toEqual([10, 30, 90, 100]);

    const last = events[events.length - 1];
    if (last?.type !== 'result') throw new Error(`unexpected terminal event ${JSON.stringify(last)}`);
    expect(last).toMatchObject({
      width: 12,
      height: 10,
      originalWidth: 12,
      originalHeight: 10,
      fromCache: false,
      modelId: 'fake',
    });
    const meta = await sharp(Buffer.from(last.pngBase64, 'base64')).metadata();
    expect(meta).toMatchObject({ format: 'png', width: 12, height: 10 });
  });

  it('ends the stream with an error line for undecodable bytes', async () => {
    const res = await upload(Buffer.from('not an image'));
    expect(res.status).toBe(200);
    const events = await readEvents(res);
    expect(events[events.length - 1]).toMatchObject({ type: 'error', code: 'DECODE_FAILED' });
  });

  it('rejects oversized uploads with 413', async () => {
    const res = await upload(Buffer.alloc(64 * 1024 + 1));
    expect(res.status).toBe(413);
    expect(await res.json()).toMatchObject({ ok: false, code: 'VALIDATION_FAILED' });
  });

  it('rejects a chunked upload once the received bytes pass the limit', async () => {
    const chunks = Array.from({ length: 9 }, () => Buffer.alloc(8 * 1024));
    const res = await uploadChunked(chunks);
    expect(res.status).toBe(413);
    expect(JSON.parse(res.body)).toEqual({
      ok: false,
      code: 'VALIDATION_FAILED',
      error: 'File too large. Please upload an image smaller than 64KB.',
    });
  });

  it('accepts a chunked upload under the limit', async () => {
    const png = await solidPng(6, 6);
    const res = await uploadChunked([png.subarray(0, 10), png.subarray(10)]);
    expect(res.status).toBe(200);
    const lines = res.body.split('\n').filter((line) => line.trim());
    expect(lines[lines.length - 1]).toContain('"type":"result"');
  });

  it('rejects unsupported content types with 415', async () => {
    const res = await upload(Buffer.from('GIF89a'), 'image/gif');
    expect(res.status).toBe(415);
    expect(await res.json()).toEqual({
      ok: false,
      code: 'VALIDATION_FAILED',
      error: 'Unsupported file type. Please upload a PNG or JPEG image.',
    });
  });

  it('returns 404 for unknown routes', async () => {
    const res = await fetch(`${baseUrl}/api/unknown`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ ok: false, error: 'Not Found' });
  });
});
