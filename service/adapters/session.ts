/**
 * ONNX 会话懒加载：首次推理时创建，之后复用
 */
import path from 'node:path';
import fs from 'node:fs';
import * as ort from 'onnxruntime-node';

/** 按顺序查找第一个存在的模型文件 */
export function resolveModelPath(modelsDir: string, files: readonly string[]): string | null {
  for (const file of files) {
    const p = path.join(modelsDir, file);
    if (fs.existsSync(p)) return p;
  }
  return null;
}

/**
 * 返回一个获取会话的函数；创建失败不缓存，下次请求会重新尝试
 */
export function createSessionLoader(
  label: string,
  modelsDir: string,
  files: readonly string[]
): () => Promise<ort.InferenceSession> {
  let session: ort.InferenceSession | null = null;
  return async () => {
    if (!session) {
      const modelPath = resolveModelPath(modelsDir, files);
      if (!modelPath) {
        throw new Error(`${label} model not found. Put one of ${files.join(', ')} into ${modelsDir}`);
      }
      // fp16 模型在 CPU 上易触发图优化错误，禁用图优化规避
      const isFp16 = modelPath.includes('fp16');
      session = await ort.InferenceSession.create(modelPath, {
        executionProviders: ['cpu'],
        ...(isFp16 && { graphOptimizationLevel: 'disabled' as const }),
      });
    }
    return session;
  };
}

/** 取单个输出张量，并要求是 float32 NCHW */
export function readFloatOutput(
  result: ort.InferenceSession.OnnxValueMapType,
  outputName: string,
  label: string,
  fallbackSize: number
): { data: Float32Array; maskW: number; maskH: number } {
  const out = result[outputName];
  if (!out) {
    throw new Error(`${label} produced no "${outputName}" output`);
  }
  if (!(out.data instanceof Float32Array)) {
    throw new Error(`${label} output "${outputName}" is ${out.type}, expected float32`);
  }
  return {
    data: out.data,
    maskH: out.dims[2] ?? fallbackSize,
    maskW: out.dims[3] ?? fallbackSize,
  };
}
