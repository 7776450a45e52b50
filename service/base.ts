/**
 * 去背景服务 - 模型前后处理共享函数
 */
import sharp from 'sharp';
import type { RgbaRaster } from './types';

export const IMAGENET_MEAN = [0.485, 0.456, 0.406] as const;
export const IMAGENET_STD = [0.229, 0.224, 0.225] as const;

export interface PreprocessOptions {
  inputW: number;
  inputH: number;
  /** U2Net 系列：先除以整图最大像素值，而非固定 255 */
  scaleByMax?: boolean;
}

/**
 * ImageNet 归一化预处理：丢弃 alpha，拉伸到模型输入尺寸，输出 NCHW Float32
 */
export async function preprocessImageNet(raster: RgbaRaster, options: PreprocessOptions): Promise<Float32Array> {
  const { inputW, inputH, scaleByMax = false } = options;
  const resized = await sharp(raster.data, {
    raw: { width: raster.width, height: raster.height, channels: 4 },
  })
    .removeAlpha()
    .resize(inputW, inputH, { fit: 'fill', kernel: 'lanczos3' }) // fill=拉伸整图，mask 与输入对齐
    .raw()
    .toBuffer({ resolveWithObject: true });
  const data = resized.data;
  const ch = resized.info.channels;
  const nPixels = inputW * inputH;

  let scale = 255;
  if (scaleByMax) {
    let max = 0;
    for (let i = 0; i < data.length; i++) {
      if ((data[i] ?? 0) > max) max = data[i] ?? 0;
    }
    scale = Math.max(max, 1e-6);
  }

  const [meanR, meanG, meanB] = IMAGENET_MEAN;
  const [stdR, stdG, stdB] = IMAGENET_STD;
  const tensor = new Float32Array(3 * nPixels);
  for (let i = 0; i < nPixels; i++) {
    const si = i * ch;
    const r = (data[si] ?? 0) / scale;
    const g = (data[si + 1] ?? 0) / scale;
    const b = (data[si + 2] ?? 0) / scale;
    tensor[i] = (r - meanR) / stdR;
    tensor[nPixels + i] = (g - meanG) / stdG;
    tensor[2 * nPixels + i] = (b - meanB) / stdB;
  }
  return tensor;
}

/** sigmoid 输出（logits）转 0–255 mask */
export function sigmoidToMask(outData: Float32Array, len: number): Uint8Array {
  const maskBuf = new Uint8Array(len);
  for (let i = 0; i < len; i++) {
    const v = 1 / (1 + Math.exp(-(outData[i] ?? 0)));
    maskBuf[i] = Math.round(Math.max(0, Math.min(1, v)) * 255);
  }
  return maskBuf;
}

/** 已在 0–1 区间的概率图转 mask，越界截断 */
export function clampToMask(outData: Float32Array, len: number): Uint8Array {
  const maskBuf = new Uint8Array(len);
  for (let i = 0; i < len; i++) {
    maskBuf[i] = Math.round(Math.max(0, Math.min(1, outData[i] ?? 0)) * 255);
  }
  return maskBuf;
}

/** 按最小/最大值拉伸到 0–255（U2Net 系列的后处理） */
export function minMaxToMask(outData: Float32Array, len: number): Uint8Array {
  let min = Infinity;
  let max = -Infinity;
  for (let i = 0; i < len; i++) {
    const v = outData[i] ?? 0;
    if (v < min) min = v;
    if (v > max) max = v;
  }
  const range = max - min;
  const maskBuf = new Uint8Array(len);
  if (!(range > 0)) return maskBuf;
  for (let i = 0; i < len; i++) {
    maskBuf[i] = Math.round((((outData[i] ?? 0) - min) / range) * 255);
  }
  return maskBuf;
}

/**
 * 将模型输出的 mask（任意尺寸）双线性插值到目标尺寸
 * 使用像素中心映射，避免边缘偏移
 */
export function resizeMask(
  maskBuf: Uint8Array,
  maskW: number,
  maskH: number,
  width: number,
  height: number
): Uint8Array {
  if (maskW === width && maskH === height) return maskBuf;
  const out = new Uint8Array(width * height);
  for (let y = 0; y < height; y++) {
    const fy = height > 1 ? ((y + 0.5) / height) * maskH - 0.5 : (maskH - 1) / 2;
    const sy0 = Math.max(0, Math.min(Math.floor(fy), maskH - 1));
    const sy1 = Math.min(sy0 + 1, maskH - 1);
    const wy = Math.max(0, Math.min(1, fy - sy0));
    for (let x = 0; x < width; x++) {
      const fx = width > 1 ? ((x + 0.5) / width) * maskW - 0.5 : (maskW - 1) / 2;
      const sx0 = Math.max(0, Math.min(Math.floor(fx), maskW - 1));
      const sx1 = Math.min(sx0 + 1, maskW - 1);
      const wx = Math.max(0, Math.min(1, fx - sx0));
      const m00 = maskBuf[sy0 * maskW + sx0] ?? 0;
      const m10 = maskBuf[sy0 * maskW + sx1] ?? 0;
      const m01 = maskBuf[sy1 * maskW + sx0] ?? 0;
      const m11 = maskBuf[sy1 * maskW + sx1] ?? 0;
      const v = m00 * (1 - wx) * (1 - wy) + m10 * wx * (1 - wy) + m01 * (1 - wx) * wy + m11 * wx * wy;
      out[y * width + x] = Math.max(0, Math.min(255, Math.round(v)));
    }
  }
  return out;
}

/**
 * 将 mask 乘进 alpha，RGB 保持不变
 * mask 需与栅格同尺寸
 */
export function applyAlphaMask(raster: RgbaRaster, maskBuf: Uint8Array): RgbaRaster {
  const { width, height } = raster;
  if (maskBuf.length !== width * height) {
    throw new Error(`mask 尺寸不匹配: ${maskBuf.length} != ${width}x${height}`);
  }
  const data = Buffer.from(raster.data);
  for (let i = 0; i < maskBuf.length; i++) {
    const ai = i * 4 + 3;
    data[ai] = Math.round(((data[ai] ?? 0) * (maskBuf[i] ?? 0)) / 255);
  }
  return { width, height, data };
}
