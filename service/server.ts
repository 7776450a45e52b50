/**
 * 去背景服务 - HTTP API
 * 上传原始字节，流式返回进度与结果（NDJSON）
 */
import http from 'node:http';
import type { RemoverRegistry } from './registry';
import type { RemovalFailure } from './types';
import { describeError, removalError, RemovalErrorCode } from './types';
import {
  ACCEPTED_MIME_TYPES,
  GENERIC_ERROR_MESSAGE,
  MAX_FILE_SIZE,
  MAX_IMAGE_DIMENSION,
  tooLargeMessage,
} from './constants';
import { ProgressTracker } from './progress';
import type { RemovalPipeline } from './pipeline';
import {
  FILE_NAME_HEADER,
  NDJSON_CONTENT_TYPE,
  REMOVE_BACKGROUND_PATH,
  type LimitsResponse,
  type ModelsResponse,
  type RemovalEvent,
} from './protocol';

const LOG_TAG = '[Removal Service]';

export interface RemovalServerDeps {
  pipeline: RemovalPipeline;
  registry: RemoverRegistry;
  maxFileSize?: number;
}

type BodyResult = { ok: true; bytes: Buffer } | { ok: false; tooLarge: true };

/** 读取请求体；超过上限后丢弃剩余数据，仍读到结束再返回 */
function readBody(req: http.IncomingMessage, limit: number): Promise<BodyResult> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let received = 0;
    let tooLarge = false;
    req.on('data', (c: Buffer) => {
      received += c.length;
      if (received > limit) {
        tooLarge = true;
        chunks.length = 0;
        return;
      }
      chunks.push(c);
    });
    req.on('end', () => resolve(tooLarge ? { ok: false, tooLarge: true } : { ok: true, bytes: Buffer.concat(chunks) }));
    req.on('error', reject);
  });
}

function sendJson(res: http.ServerResponse, status: number, data: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(data));
}

function sendFailure(res: http.ServerResponse, status: number, failure: RemovalFailure): void {
  sendJson(res, status, { ok: false, code: failure.code, error: failure.message });
}

function writeEvent(res: http.ServerResponse, event: RemovalEvent): void {
  res.write(JSON.stringify(event) + '\n');
}

function readFileName(req: http.IncomingMessage): string | undefined {
  const raw = req.headers[FILE_NAME_HEADER];
  if (typeof raw !== 'string' || !raw) return undefined;
  try {
    return decodeURIComponent(raw);
  } catch {
    return raw;
  }
}

function readMimeType(req: http.IncomingMessage): string | undefined {
  const raw = req.headers['content-type'];
  if (!raw) return undefined;
  return raw.split(';')[0]?.trim().toLowerCase() || undefined;
}

function isAcceptedMimeType(mimeType: string | undefined): boolean {
  if (!mimeType || mimeType === 'application/octet-stream') return true;
  return ACCEPTED_MIME_TYPES.some((t) => t === mimeType);
}

async function handleRemove(
  req: http.IncomingMessage,
  res: http.ServerResponse,
  deps: RemovalServerDeps,
  maxFileSize: number
): Promise<void> {
  const declared = parseInt(req.headers['content-length'] ?? '', 10);
  if (Number.isFinite(declared) && declared > maxFileSize) {
    req.resume();
    sendFailure(res, 413, removalError(RemovalErrorCode.VALIDATION_FAILED, tooLargeMessage(maxFileSize)));
    return;
  }

  const mimeType = readMimeType(req);
  if (!isAcceptedMimeType(mimeType)) {
    req.resume();
    sendFailure(
      res,
      415,
      removalError(RemovalErrorCode.VALIDATION_FAILED, 'Unsupported file type. Please upload a PNG or JPEG image.')
    );
    return;
  }

  const body = await readBody(req, maxFileSize);
  if (!body.ok) {
    sendFailure(res, 413, removalError(RemovalErrorCode.VALIDATION_FAILED, tooLargeMessage(maxFileSize)));
    return;
  }

  res.writeHead(200, { 'Content-Type': NDJSON_CONTENT_TYPE, 'Cache-Control': 'no-store' });
  const progress = new ProgressTracker((state) => writeEvent(res, { type: 'progress', ...state }));
  const result = await deps.pipeline.run({ bytes: body.bytes, mimeType, fileName: readFileName(req) }, progress);
  if (result.ok) {
    const { original, processed, png, elapsedMs, fromCache, modelId } = result.outcome;
    writeEvent(res, {
      type: 'result',
      width: processed.width,
      height: processed.height,
      originalWidth: original.width,
      originalHeight: original.height,
      elapsedMs,
      fromCache,
      modelId,
      pngBase64: png.toString('base64'),
    });
  } else {
    writeEvent(res, { type: 'error', code: result.code, message: result.message });
  }
  res.end();
}

export function createRemovalServer(deps: RemovalServerDeps): http.Server {
  const maxFileSize = deps.maxFileSize ?? MAX_FILE_SIZE;

  return http.createServer((req, res) => {
    const parsed = new URL(req.url ?? '/', 'http://localhost');

    if (req.method === 'GET' && parsed.pathname === '/api/health') {
      sendJson(res, 200, { ok: true });
      return;
    }

    if (req.method === 'GET' && parsed.pathname === '/api/models') {
      const body: ModelsResponse = { models: deps.registry.list(), active: deps.pipeline.modelId };
      sendJson(res, 200, body);
      return;
    }

    if (req.method === 'GET' && parsed.pathname === '/api/limits') {
      const body: LimitsResponse = {
        maxFileSize,
        maxDimension: MAX_IMAGE_DIMENSION,
        acceptedTypes: [...ACCEPTED_MIME_TYPES],
      };
      sendJson(res, 200, body);
      return;
    }

    if (req.method === 'POST' && parsed.pathname === REMOVE_BACKGROUND_PATH) {
      handleRemove(req, res, deps, maxFileSize).catch((e: unknown) => {
        console.error(LOG_TAG, '请求处理异常:', describeError(e));
        if (res.headersSent) {
          res.end();
        } else {
          sendJson(res, 500, { ok: false, code: RemovalErrorCode.PROCESSING_FAILED, error: GENERIC_ERROR_MESSAGE });
        }
      });
      return;
    }

    sendJson(res, 404, { ok: false, error: 'Not Found' });
  });
}

/** 监听指定地址，返回实际端口（port=0 时由系统分配） */
export function listen(server: http.Server, port: number, host: string): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      const address = server.address();
      const actualPort = typeof address === 'object' && address ? address.port : port;
      resolve(actualPort);
    });
  });
}
