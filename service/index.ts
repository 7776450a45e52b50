/**
 * 去背景服务 - 统一入口
 */
import type http from 'node:http';
import type { ServiceConfig } from './config';
import type { RemovalOutcome } from './types';
import { createDefaultRegistry, resolveRemover, type RemoverRegistry } from './registry';
import { FingerprintCache } from './cache';
import { outcomeBytes, RemovalPipeline } from './pipeline';
import { createRemovalServer, listen } from './server';

export { RemovalPipeline } from './pipeline';
export { createRegistry, createDefaultRegistry, resolveRemover } from './registry';
export { createRemovalServer } from './server';
export { loadServiceConfig } from './config';
export type { BackgroundRemover, RgbaRaster, RemovalOutcome, RemovalResult, ProgressState } from './types';
export { RemovalErrorCode, removalError } from './types';

/** 按配置组装流水线；模型 id 未注册时抛出 */
export function buildPipeline(
  config: ServiceConfig,
  registry: RemoverRegistry = createDefaultRegistry(config.modelsDir)
): { pipeline: RemovalPipeline; registry: RemoverRegistry } {
  const lookup = resolveRemover(registry, config.modelId);
  if (!lookup.ok) throw new Error(lookup.message);
  const cache =
    config.cacheEntries > 0
      ? new FingerprintCache<RemovalOutcome>(config.cacheEntries, {
          maxBytes: config.cacheMaxBytes,
          sizeOf: outcomeBytes,
        })
      : undefined;
  return { pipeline: new RemovalPipeline({ remover: lookup.remover, cache }), registry };
}

export async function startService(
  config: ServiceConfig,
  registry?: RemoverRegistry
): Promise<{ server: http.Server; port: number }> {
  const { pipeline, registry: resolved } = buildPipeline(config, registry);
  const server = createRemovalServer({ pipeline, registry: resolved });
  const port = await listen(server, config.port, config.host);
  return { server, port };
}
