import { describe, expect, it } from 'vitest';
import { buildPipeline, createDefaultRegistry, createRegistry, resolveRemover } from './index';
import { loadServiceConfig } from './config';
import { createFakeRemover, solidPng } from './testUtils';

describe('createDefaultRegistry', () => {
  it('registers the bundled models', () => {
    expect(createDefaultRegistry('/tmp/models').list()).toEqual([
      { id: 'u2net', name: 'U2Net' },
      { id: 'u2netp', name: 'U2NetP' },
      { id: 'rmbg2', name: 'RMBG-2' },
    ]);
  });
});

describe('createRegistry', () => {
  it('refuses duplicate ids', () => {
    const { remover } = createFakeRemover();
    expect(() => createRegistry([remover, remover])).toThrow('Duplicate background remover id: fake');
  });

  it('returns null for unknown ids', () => {
    expect(createRegistry([]).get('missing')).toBeNull();
  });
});

describe('resolveRemover', () => {
  it('finds a registered remover', () => {
    const { remover } = createFakeRemover();
    expect(resolveRemover(createRegistry([remover]), 'fake')).toEqual({ ok: true, remover });
  });

  it('reports MODEL_NOT_FOUND with the available ids', () => {
    const registry = createRegistry([createFakeRemover('a').remover, createFakeRemover('b').remover]);
    expect(resolveRemover(registry, 'c')).toMatchObject({
      ok: false,
      code: 'MODEL_NOT_FOUND',
      message: 'Unknown background removal model "c" (available: a, b)',
    });
  });
});

describe('buildPipeline', () => {
  it('fails fast on an unknown model id', () => {
    const config = { ...loadServiceConfig({}), modelId: 'nope' };
    expect(() => buildPipeline(config, createRegistry([createFakeRemover().remover]))).toThrow(
      'Unknown background removal model "nope" (available: fake)'
    );
  });

  it('caches results when cacheEntries is positive', async () => {
    const { remover, remove } = createFakeRemover();
    const config = { ...loadServiceConfig({}), modelId: 'fake', cacheEntries: 2 };
    const { pipeline } = buildPipeline(config, createRegistry([remover]));
    const bytes = await solidPng(3, 3);

    await pipeline.run({ bytes });
    const second = await pipeline.run({ bytes });

    expect(pipeline.modelId).toBe('fake');
    expect(remove).toHaveBeenCalledTimes(1);
    expect(second.ok && second.outcome.fromCache).toBe(true);
  });

  it('does not cache outcomes larger than cacheMaxBytes', async () => {
    const { remover, remove } = createFakeRemover();
    const config = { ...loadServiceConfig({}), modelId: 'fake', cacheEntries: 2, cacheMaxBytes: 64 };
    const { pipeline } = buildPipeline(config, createRegistry([remover]));
    const bytes = await solidPng(3, 3);

    await pipeline.run({ bytes });
    await pipeline.run({ bytes });

    expect(remove).toHaveBeenCalledTimes(2);
  });

  it('skips the cache when cacheEntries is 0', async () => {
    const { remover, remove } = createFakeRemover();
    const config = { ...loadServiceConfig({}), modelId: 'fake', cacheEntries: 0 };
    const { pipeline } = buildPipeline(config, createRegistry([remover]));
    const bytes = await solidPng(3, 3);

    await pipeline.run({ bytes });
    await pipeline.run({ bytes });

    expect(remove).toHaveBeenCalledTimes(2);
  });
});
