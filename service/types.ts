/**
 * 去背景服务 - 统一类型定义
 */

/** RGBA 像素栅格，data 长度为 width * height * 4，按行存储 */
export interface RgbaRaster {
  width: number;
  height: number;
  data: Buffer;
}

/** 上传的原始图片，仅在当前请求内有效 */
export interface UploadedImage {
  bytes: Buffer;
  /** 声明的 MIME 类型，如 image/png */
  mimeType?: string;
  fileName?: string;
}

/** 进度状态：percent 0–100 单调不减 */
export interface ProgressState {
  percent: number;
  status: string;
}

/**
 * 背景移除能力接口：输入 RGBA，输出同尺寸、alpha 为前景 mask 的 RGBA
 * 模型异常直接抛出，由流水线统一处理
 */
export interface BackgroundRemover {
  /** 模型唯一 ID，用于 registry 查找 */
  readonly id: string;
  /** 显示名称 */
  readonly name: string;
  remove(raster: RgbaRaster): Promise<RgbaRaster>;
}

/** 一次成功处理的结果 */
export interface RemovalOutcome {
  /** 缩放前的原图 */
  original: RgbaRaster;
  /** 去背景后的栅格（可能已缩放） */
  processed: RgbaRaster;
  /** processed 编码后的 PNG */
  png: Buffer;
  elapsedMs: number;
  modelId: string;
  /** 是否命中指纹缓存 */
  fromCache: boolean;
}

export interface RemovalSuccess {
  ok: true;
  outcome: RemovalOutcome;
}

/** 处理失败；detail 只写入运维日志，不返回给用户 */
export interface RemovalFailure {
  ok: false;
  code: RemovalErrorCodeValue;
  message: string;
  detail?: string;
}

export type RemovalResult = RemovalSuccess | RemovalFailure;

/** 错误码 */
export const RemovalErrorCode = {
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  DECODE_FAILED: 'DECODE_FAILED',
  PROCESSING_FAILED: 'PROCESSING_FAILED',
  MODEL_NOT_FOUND: 'MODEL_NOT_FOUND',
  INVALID_INPUT: 'INVALID_INPUT',
} as const;

export type RemovalErrorCodeValue = (typeof RemovalErrorCode)[keyof typeof RemovalErrorCode];

export function removalError(code: RemovalErrorCodeValue, message: string, detail?: string): RemovalFailure {
  return { ok: false, code, message, detail };
}

/** 把任意抛出值转成日志可用的详情 */
export function describeError(e: unknown): string {
  if (e instanceof Error) return e.stack ?? e.message;
  return String(e);
}
