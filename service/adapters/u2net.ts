/**
 * U2Net / U2NetP 去背景适配器
 * 输入 320×320，先按整图最大值缩放再做 ImageNet 归一化；
 * 输出 d0 经 min-max 拉伸为 mask，再双线性插值回原图尺寸
 */
import * as ort from 'onnxruntime-node';
import type { BackgroundRemover, RgbaRaster } from '../types';
import { applyAlphaMask, minMaxToMask, preprocessImageNet, resizeMask } from '../base';
import { createSessionLoader, readFloatOutput } from './session';

const INPUT_SIZE = 320;

export type U2NetVariant = 'u2net' | 'u2netp';

const VARIANTS: Record<U2NetVariant, { name: string; files: readonly string[] }> = {
  u2net: { name: 'U2Net', files: ['u2net.onnx'] },
  u2netp: { name: 'U2NetP', files: ['u2netp.onnx'] },
};

export function createU2NetRemover(variant: U2NetVariant, modelsDir: string): BackgroundRemover {
  const { name, files } = VARIANTS[variant];
  const getSession = createSessionLoader(name, modelsDir, files);

  return {
    id: variant,
    name,
    async remove(raster: RgbaRaster): Promise<RgbaRaster> {
      const sess = await getSession();
      const tensor = await preprocessImageNet(raster, {
        inputW: INPUT_SIZE,
        inputH: INPUT_SIZE,
        scaleByMax: true,
      });
      const inputName = sess.inputNames[0];
      if (!inputName) throw new Error(`${name} model declares no inputs`);
      const result = await sess.run({
        [inputName]: new ort.Tensor('float32', tensor, [1, 3, INPUT_SIZE, INPUT_SIZE]),
      });
      const outputName = sess.outputNames.find((n) => n === 'd0') ?? sess.outputNames[0] ?? 'd0';
      const { data, maskW, maskH } = readFloatOutput(result, outputName, name, INPUT_SIZE);
      const mask = minMaxToMask(data, maskW * maskH);
      return applyAlphaMask(raster, resizeMask(mask, maskW, maskH, raster.width, raster.height));
    },
  };
}
