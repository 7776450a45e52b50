/**
 * 去背景服务 - 环境变量配置
 * 启动时读取一次，之后只读
 */
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_PORT = 19816;
export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_MODEL_ID = 'u2net';
export const DEFAULT_CACHE_ENTRIES = 16;
export const DEFAULT_CACHE_MAX_MB = 512;
/** 源码与打包产物（dist-service/）都位于仓库根下一层 */
export const DEFAULT_MODELS_DIR = path.resolve(__dirname, '../models');

export interface ServiceConfig {
  port: number;
  host: string;
  /** 使用的去背景模型 id */
  modelId: string;
  /** .onnx 模型所在目录 */
  modelsDir: string;
  /** 指纹缓存条数上限，0 表示不缓存 */
  cacheEntries: number;
  /** 指纹缓存字节总量上限（原图、结果栅格与 PNG 合计） */
  cacheMaxBytes: number;
}

function parseNonNegativeInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const n = parseInt(raw, 10);
  return Number.isFinite(n) && n >= 0 ? n : fallback;
}

export function loadServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  return {
    port: parseNonNegativeInt(env.BG_REMOVER_PORT, DEFAULT_PORT),
    host: env.BG_REMOVER_HOST?.trim() || DEFAULT_HOST,
    modelId: env.BG_REMOVER_MODEL?.trim() || DEFAULT_MODEL_ID,
    modelsDir: env.BG_REMOVER_MODELS_DIR?.trim()
      ? path.resolve(env.BG_REMOVER_MODELS_DIR.trim())
      : DEFAULT_MODELS_DIR,
    cacheEntries: parseNonNegativeInt(env.BG_REMOVER_CACHE_ENTRIES, DEFAULT_CACHE_ENTRIES),
    cacheMaxBytes: parseNonNegativeInt(env.BG_REMOVER_CACHE_MAX_MB, DEFAULT_CACHE_MAX_MB) * 1024 * 1024,
  };
}
