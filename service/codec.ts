/**
 * 图片编解码：上传字节 ⇄ RGBA 栅格，基于 sharp
 */
import sharp from 'sharp';
import type { RgbaRaster, RemovalFailure } from './types';
import { describeError, removalError, RemovalErrorCode } from './types';

/** 允许的输入格式（sharp metadata.format） */
const SUPPORTED_FORMATS = new Set(['png', 'jpeg']);

export interface ImageDescription {
  format: string;
  width: number;
  height: number;
}

export type DecodeResult = { ok: true; raster: RgbaRaster } | RemovalFailure;

/** 读取格式与尺寸，不解码像素；非图片时抛出 */
export async function describeImage(bytes: Buffer): Promise<ImageDescription> {
  const meta = await sharp(bytes).metadata();
  return {
    format: meta.format ?? 'unknown',
    width: meta.width ?? 0,
    height: meta.height ?? 0,
  };
}

/**
 * 解码 PNG / JPEG 为 RGBA
 * - 按 EXIF 方向摆正，与浏览器预览一致
 * - 灰度、调色板图统一转 sRGB 并补 alpha
 */
export async function decodeImage(bytes: Buffer): Promise<DecodeResult> {
  if (!bytes.length) {
    return removalError(RemovalErrorCode.DECODE_FAILED, 'The uploaded file is empty.');
  }
  try {
    const { format } = await describeImage(bytes);
    if (!SUPPORTED_FORMATS.has(format)) {
      return removalError(
        RemovalErrorCode.DECODE_FAILED,
        'Unsupported image format. Please upload a PNG or JPEG image.',
        `format=${format}`
      );
    }
    const { data, info } = await sharp(bytes)
      .rotate()
      .toColourspace('srgb')
      .ensureAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });
    if (info.channels !== 4) {
      return removalError(
        RemovalErrorCode.DECODE_FAILED,
        'The uploaded file could not be read as an image.',
        `unexpected channel count ${info.channels}`
      );
    }
    return { ok: true, raster: { width: info.width, height: info.height, data } };
  } catch (e) {
    return removalError(
      RemovalErrorCode.DECODE_FAILED,
      'The uploaded file could not be read as an image.',
      describeError(e)
    );
  }
}

/** RGBA 编码为 PNG（无损） */
export async function encodePng(raster: RgbaRaster): Promise<Buffer> {
  return sharp(raster.data, {
    raw: { width: raster.width, height: raster.height, channels: 4 },
  })
    .png()
    .toBuffer();
}
