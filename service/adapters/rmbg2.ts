/**
 * RMBG-2 去背景适配器
 * BRIA Background Removal v2.0，基于 BiRefNet 架构
 * 输入 1024×1024 ImageNet 归一化；输出 alphas（0–1）或 output_image（logits）
 */
import * as ort from 'onnxruntime-node';
import type { BackgroundRemover, RgbaRaster } from '../types';
import { applyAlphaMask, clampToMask, preprocessImageNet, resizeMask, sigmoidToMask } from '../base';
import { createSessionLoader, readFloatOutput } from './session';

const INPUT_SIZE = 1024;
const NAME = 'RMBG-2';
/** 优先 fp32（CPU 兼容性好） */
const MODEL_FILES = ['RMBG-2-Matting-model.onnx', 'model.onnx', 'RMBG-2-Matting-model_fp16.onnx'] as const;

export function createRmbg2Remover(modelsDir: string): BackgroundRemover {
  const getSession = createSessionLoader(NAME, modelsDir, MODEL_FILES);

  return {
    id: 'rmbg2',
    name: NAME,
    async remove(raster: RgbaRaster): Promise<RgbaRaster> {
      const sess = await getSession();
      const tensor = await preprocessImageNet(raster, { inputW: INPUT_SIZE, inputH: INPUT_SIZE });
      const inputName = sess.inputNames[0];
      if (!inputName) throw new Error(`${NAME} model declares no inputs`);
      const result = await sess.run({
        [inputName]: new ort.Tensor('float32', tensor, [1, 3, INPUT_SIZE, INPUT_SIZE]),
      });
      const outputName =
        sess.outputNames.find((n) => n === 'alphas' || n === 'output_image') ?? sess.outputNames[0] ?? 'alphas';
      const { data, maskW, maskH } = readFloatOutput(result, outputName, NAME, INPUT_SIZE);
      const len = maskW * maskH;
      const mask = outputName === 'alphas' ? clampToMask(data, len) : sigmoidToMask(data, len);
      return applyAlphaMask(raster, resizeMask(mask, maskW, maskH, raster.width, raster.height));
    },
  };
}
