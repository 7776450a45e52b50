/**
 * 测试辅助：生成图片、构造假的去背景模型
 */
import sharp from 'sharp';
import { vi } from 'vitest';
import type { BackgroundRemover, RgbaRaster } from './types';
import { applyAlphaMask } from './base';

export interface Rgba {
  r: number;
  g: number;
  b: number;
  alpha: number;
}

export const OPAQUE_RED: Rgba = { r: 255, g: 0, b: 0, alpha: 1 };

export function solidImage(width: number, height: number, color: Rgba = OPAQUE_RED) {
  return sharp({ create: { width, height, channels: 4, background: color } });
}

export function solidPng(width: number, height: number, color: Rgba = OPAQUE_RED): Promise<Buffer> {
  return solidImage(width, height, color).png().toBuffer();
}

export function solidRaster(width: number, height: number, rgba: [number, number, number, number]): RgbaRaster {
  const data = Buffer.alloc(width * height * 4);
  for (let i = 0; i < width * height; i++) data.set(rgba, i * 4);
  return { width, height, data };
}

/** 假模型：左半边保留，右半边透明 */
export function createFakeRemover(id = 'fake') {
  const remove = vi.fn(async (raster: RgbaRaster): Promise<RgbaRaster> => {
    const mask = new Uint8Array(raster.width * raster.height);
    for (let y = 0; y < raster.height; y++) {
      for (let x = 0; x < raster.width; x++) {
        mask[y * raster.width + x] = x < raster.width / 2 ? 255 : 0;
      }
    }
    return applyAlphaMask(raster, mask);
  });
  const remover: BackgroundRemover = { id, name: 'Fake', remove };
  return { remover, remove };
}
