/**
 * 等比缩放：长边超过上限时缩到上限，短边按同比例四舍五入
 */
import sharp from 'sharp';
import type { RgbaRaster } from './types';

export interface Size {
  width: number;
  height: number;
}

/** 计算缩放后尺寸；两边都不超过 max 时原样返回 */
export function fitWithin(width: number, height: number, max: number): Size {
  if (width <= max && height <= max) return { width, height };
  if (width >= height) {
    return { width: max, height: Math.max(1, Math.round((height * max) / width)) };
  }
  return { width: Math.max(1, Math.round((width * max) / height)), height: max };
}

/**
 * 缩放栅格，lanczos3 重采样
 * 不需要缩放时返回同一个对象
 */
export async function resizeRaster(raster: RgbaRaster, max: number): Promise<RgbaRaster> {
  const target = fitWithin(raster.width, raster.height, max);
  if (target.width === raster.width && target.height === raster.height) return raster;
  const { data, info } = await sharp(raster.data, {
    raw: { width: raster.width, height: raster.height, channels: 4 },
  })
    .resize(target.width, target.height, { fit: 'fill', kernel: 'lanczos3' })
    .raw()
    .toBuffer({ resolveWithObject: true });
  return { width: info.width, height: info.height, data };
}
