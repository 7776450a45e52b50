/**
 * 去背景服务 - 模型注册与查找
 */
import type { BackgroundRemover, RemovalFailure } from './types';
import { removalError, RemovalErrorCode } from './types';
import { createU2NetRemover } from './adapters/u2net';
import { createRmbg2Remover } from './adapters/rmbg2';

export interface RemoverRegistry {
  /** 按 id 获取适配器，不存在时返回 null */
  get(id: string): BackgroundRemover | null;
  list(): { id: string; name: string }[];
}

export function createRegistry(removers: BackgroundRemover[]): RemoverRegistry {
  const byId = new Map<string, BackgroundRemover>();
  for (const remover of removers) {
    if (byId.has(remover.id)) throw new Error(`Duplicate background remover id: ${remover.id}`);
    byId.set(remover.id, remover);
  }
  return {
    get: (id) => byId.get(id) ?? null,
    list: () => Array.from(byId.values()).map((r) => ({ id: r.id, name: r.name })),
  };
}

export type RemoverLookup = { ok: true; remover: BackgroundRemover } | RemovalFailure;

export function resolveRemover(registry: RemoverRegistry, id: string): RemoverLookup {
  const remover = registry.get(id);
  if (!remover) {
    const known = registry.list().map((m) => m.id).join(', ');
    return removalError(
      RemovalErrorCode.MODEL_NOT_FOUND,
      `Unknown background removal model "${id}" (available: ${known})`
    );
  }
  return { ok: true, remover };
}

/** 注册 U2Net（默认）、U2NetP、RMBG-2 */
export function createDefaultRegistry(modelsDir: string): RemoverRegistry {
  return createRegistry([
    createU2NetRemover('u2net', modelsDir),
    createU2NetRemover('u2netp', modelsDir),
    createRmbg2Remover(modelsDir),
  ]);
}
