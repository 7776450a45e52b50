/**
 * 去背景流水线：校验 → 解码 → 缩放 → 去背景 → 编码
 * 每次请求独立运行；唯一跨请求的状态是指纹缓存
 */
import type {
  BackgroundRemover,
  RemovalFailure,
  RemovalOutcome,
  RemovalResult,
  RgbaRaster,
  UploadedImage,
} from './types';
import { describeError, removalError, RemovalErrorCode } from './types';
import {
  GENERIC_ERROR_MESSAGE,
  MAX_FILE_SIZE,
  MAX_IMAGE_DIMENSION,
  PROCESSING_FAILED_STATUS,
  tooLargeMessage,
} from './constants';
import { decodeImage, encodePng, type DecodeResult } from './codec';
import { resizeRaster } from './resize';
import { FingerprintCache, fingerprint } from './cache';
import { ProgressTracker } from './progress';

const LOG_TAG = '[Removal Pipeline]';

/** 可替换的处理阶段，测试中注入以统计调用 */
export interface PipelineStages {
  decode(bytes: Buffer): Promise<DecodeResult>;
  resize(raster: RgbaRaster, max: number): Promise<RgbaRaster>;
  encode(raster: RgbaRaster): Promise<Buffer>;
}

export interface PipelineOptions {
  remover: BackgroundRemover;
  /** 不传则不缓存 */
  cache?: FingerprintCache<RemovalOutcome>;
  maxFileSize?: number;
  maxDimension?: number;
  stages?: Partial<PipelineStages>;
  /** 毫秒时钟 */
  now?: () => number;
}

/** 缓存条目占用：原图、结果栅格与 PNG */
export function outcomeBytes(outcome: RemovalOutcome): number {
  return outcome.original.data.length + outcome.processed.data.length + outcome.png.length;
}

function isUsableRaster(raster: RgbaRaster): boolean {
  return raster.width > 0 && raster.height > 0 && raster.data.length === raster.width * raster.height * 4;
}

export function completedStatus(elapsedMs: number): string {
  return `Completed in ${(elapsedMs / 1000).toFixed(2)} seconds`;
}

export class RemovalPipeline {
  private readonly remover: BackgroundRemover;
  private readonly cache: FingerprintCache<RemovalOutcome> | undefined;
  private readonly maxFileSize: number;
  private readonly maxDimension: number;
  private readonly stages: PipelineStages;
  private readonly now: () => number;

  constructor(options: PipelineOptions) {
    this.remover = options.remover;
    this.cache = options.cache;
    this.maxFileSize = options.maxFileSize ?? MAX_FILE_SIZE;
    this.maxDimension = options.maxDimension ?? MAX_IMAGE_DIMENSION;
    this.stages = {
      decode: decodeImage,
      resize: resizeRaster,
      encode: encodePng,
      ...options.stages,
    };
    this.now = options.now ?? (() => performance.now());
  }

  get modelId(): string {
    return this.remover.id;
  }

  /** 超过大小上限时直接拒绝，不进入后续阶段 */
  validate(upload: UploadedImage): RemovalFailure | null {
    if (upload.bytes.length > this.maxFileSize) {
      return removalError(
        RemovalErrorCode.VALIDATION_FAILED,
        tooLargeMessage(this.maxFileSize),
        `${upload.fileName ?? 'upload'}: ${upload.bytes.length} bytes`
      );
    }
    return null;
  }

  async run(upload: UploadedImage, progress: ProgressTracker = new ProgressTracker()): Promise<RemovalResult> {
    const rejected = this.validate(upload);
    if (rejected) {
      progress.fail(PROCESSING_FAILED_STATUS);
      return rejected;
    }

    const start = this.now();
    progress.report(10, 'Reading image...');
    const key = fingerprint(upload.bytes);
    const cached = this.cache?.get(key);
    if (cached) {
      const elapsedMs = this.now() - start;
      progress.report(100, completedStatus(elapsedMs));
      return { ok: true, outcome: { ...cached, elapsedMs, fromCache: true } };
    }

    progress.report(30, 'Processing image...');
    try {
      const decoded = await this.stages.decode(upload.bytes);
      if (!decoded.ok) {
        console.warn(LOG_TAG, '解码失败:', upload.fileName ?? '', decoded.detail ?? decoded.message);
        progress.fail(PROCESSING_FAILED_STATUS);
        return decoded;
      }
      const original = decoded.raster;
      const resized = await this.stages.resize(original, this.maxDimension);
      if (!isUsableRaster(resized)) {
        console.warn(LOG_TAG, '无效的栅格:', `${resized.width}x${resized.height}`, resized.data.length);
        progress.fail(PROCESSING_FAILED_STATUS);
        return removalError(
          RemovalErrorCode.INVALID_INPUT,
          GENERIC_ERROR_MESSAGE,
          `${resized.width}x${resized.height} raster with ${resized.data.length} bytes`
        );
      }
      const processed = await this.remover.remove(resized);
      if (processed.width !== resized.width || processed.height !== resized.height) {
        throw new Error(
          `${this.remover.name} returned ${processed.width}x${processed.height}, expected ${resized.width}x${resized.height}`
        );
      }

      progress.report(90, 'Preparing result...');
      const png = await this.stages.encode(processed);
      const elapsedMs = this.now() - start;
      const outcome: RemovalOutcome = {
        original,
        processed,
        png,
        elapsedMs,
        modelId: this.remover.id,
        fromCache: false,
      };
      this.cache?.set(key, outcome);
      progress.report(100, completedStatus(elapsedMs));
      return { ok: true, outcome };
    } catch (e) {
      const detail = describeError(e);
      console.error(LOG_TAG, '处理失败:', upload.fileName ?? '', detail);
      progress.fail(PROCESSING_FAILED_STATUS);
      return removalError(RemovalErrorCode.PROCESSING_FAILED, GENERIC_ERROR_MESSAGE, detail);
    }
  }
}
