/**
 * HTTP 接口的数据结构，服务端与页面共用
 * POST /api/remove-background 的响应为 NDJSON：若干 progress 行 + 一行 result 或 error
 */
import type { RemovalErrorCodeValue } from './types';

export const REMOVE_BACKGROUND_PATH = '/api/remove-background';
export const NDJSON_CONTENT_TYPE = 'application/x-ndjson';
/** 上传文件名放在请求头里，值经 encodeURIComponent 编码 */
export const FILE_NAME_HEADER = 'x-file-name';

export interface ProgressEvent {
  type: 'progress';
  percent: number;
  status: string;
}

export interface ResultEvent {
  type: 'result';
  width: number;
  height: number;
  originalWidth: number;
  originalHeight: number;
  elapsedMs: number;
  fromCache: boolean;
  modelId: string;
  pngBase64: string;
}

export interface ErrorEvent {
  type: 'error';
  code: RemovalErrorCodeValue;
  message: string;
}

export type RemovalEvent = ProgressEvent | ResultEvent | ErrorEvent;

export interface LimitsResponse {
  maxFileSize: number;
  maxDimension: number;
  acceptedTypes: string[];
}

export interface ModelsResponse {
  models: { id: string; name: string }[];
  active: string;
}
