/**
 * 去背景服务客户端：上传图片，逐行读取 NDJSON 进度与结果
 */
import {
  FILE_NAME_HEADER,
  REMOVE_BACKGROUND_PATH,
  type ProgressEvent,
  type RemovalEvent,
  type ResultEvent,
} from '../../service/protocol';
import { DOWNLOAD_MIME_TYPE, GENERIC_ERROR_MESSAGE } from '../../service/constants';
import { RemovalErrorCode } from '../../service/types';

export type RemovalClientResult =
  | { ok: true; result: ResultEvent; png: Blob }
  | { ok: false; code?: string; message: string };

export interface RemoveBackgroundOptions {
  onProgress?: (event: ProgressEvent) => void;
  /** 测试时注入 */
  fetchImpl?: typeof fetch;
  baseUrl?: string;
}

type FieldKind = 'number' | 'string' | 'boolean';

const EVENT_FIELDS: Record<RemovalEvent['type'], Record<string, FieldKind>> = {
  progress: { percent: 'number', status: 'string' },
  result: {
    width: 'number',
    height: 'number',
    originalWidth: 'number',
    originalHeight: 'number',
    elapsedMs: 'number',
    fromCache: 'boolean',
    modelId: 'string',
    pngBase64: 'string',
  },
  error: { code: 'string', message: 'string' },
};

const ERROR_CODES: readonly unknown[] = Object.values(RemovalErrorCode);

/** 按事件类型逐字段检查，缺字段或类型不符的行视为无效 */
function isRemovalEvent(value: unknown): value is RemovalEvent {
  if (typeof value !== 'object' || value === null || !('type' in value)) return false;
  const { type } = value;
  if (type !== 'progress' && type !== 'result' && type !== 'error') return false;
  const fieldsOk = Object.entries(EVENT_FIELDS[type]).every(([key, kind]) => typeof Reflect.get(value, key) === kind);
  if (!fieldsOk) return false;
  return type !== 'error' || ERROR_CODES.includes(Reflect.get(value, 'code'));
}

/** 解析一行 NDJSON；空行或非事件对象返回 null */
export function parseEventLine(line: string): RemovalEvent | null {
  const trimmed = line.trim();
  if (!trimmed) return null;
  const parsed: unknown = JSON.parse(trimmed);
  return isRemovalEvent(parsed) ? parsed : null;
}

/** 逐块读取响应体，按换行切分事件 */
export async function readEvents(body: ReadableStream<Uint8Array>, onEvent: (event: RemovalEvent) => void): Promise<void> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let pending = '';
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    pending += decoder.decode(value, { stream: true });
    let newline = pending.indexOf('\n');
    while (newline >= 0) {
      const event = parseEventLine(pending.slice(0, newline));
      if (event) onEvent(event);
      pending = pending.slice(newline + 1);
      newline = pending.indexOf('\n');
    }
  }
  pending += decoder.decode();
  const last = parseEventLine(pending);
  if (last) onEvent(last);
}

export function base64ToBlob(base64: string, type: string): Blob {
  const binary = atob(base64);
  const bytes = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) bytes[i] = binary.charCodeAt(i);
  return new Blob([bytes], { type });
}

async function readFailure(res: Response): Promise<{ code?: string; message: string }> {
  try {
    const json: unknown = await res.json();
    if (typeof json === 'object' && json !== null) {
      const code = 'code' in json && typeof json.code === 'string' ? json.code : undefined;
      const message = 'error' in json && typeof json.error === 'string' ? json.error : GENERIC_ERROR_MESSAGE;
      return { code, message };
    }
  } catch (e) {
    console.error('[removalClient] 无法解析错误响应:', res.status, e);
  }
  return { message: GENERIC_ERROR_MESSAGE };
}

export async function removeBackground(
  file: Blob,
  fileName: string,
  options: RemoveBackgroundOptions = {}
): Promise<RemovalClientResult> {
  const { onProgress, fetchImpl = fetch, baseUrl = '' } = options;
  const res = await fetchImpl(`${baseUrl}${REMOVE_BACKGROUND_PATH}`, {
    method: 'POST',
    headers: {
      'Content-Type': file.type || 'application/octet-stream',
      [FILE_NAME_HEADER]: encodeURIComponent(fileName),
    },
    body: file,
  });
  if (!res.ok) {
    return { ok: false, ...(await readFailure(res)) };
  }
  if (!res.body) {
    return { ok: false, message: GENERIC_ERROR_MESSAGE };
  }

  const terminal: RemovalEvent[] = [];
  await readEvents(res.body, (event) => {
    if (event.type === 'progress') onProgress?.(event);
    else terminal.push(event);
  });

  const final = terminal[terminal.length - 1];
  if (!final || final.type === 'progress') return { ok: false, message: GENERIC_ERROR_MESSAGE };
  if (final.type === 'error') return { ok: false, code: final.code, message: final.message };
  return { ok: true, result: final, png: base64ToBlob(final.pngBase64, DOWNLOAD_MIME_TYPE) };
}
