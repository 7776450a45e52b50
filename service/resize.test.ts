import { describe, expect, it } from 'vitest';
import { fitWithin, resizeRaster } from './resize';
import { solidRaster } from './testUtils';

describe('fitWithin', () => {
  it('keeps sizes that already fit', () => {
    expect(fitWithin(500, 500, 2000)).toEqual({ width: 500, height: 500 });
    expect(fitWithin(2000, 1999, 2000)).toEqual({ width: 2000, height: 1999 });
  });

  it('scales the longer side to the bound and rounds the shorter side', () => {
    expect(fitWithin(4000, 3000, 2000)).toEqual({ width: 2000, height: 1500 });
    expect(fitWithin(3000, 4001, 2000)).toEqual({ width: 1500, height: 2000 });
    expect(fitWithin(2001, 1000, 2000)).toEqual({ width: 2000, height: 1000 });
  });

  it('maps a square to max x max', () => {
    expect(fitWithin(2001, 2001, 2000)).toEqual({ width: 2000, height: 2000 });
  });

  it('never produces a zero-length side', () => {
    expect(fitWithin(5000, 1, 2000)).toEqual({ width: 2000, height: 1 });
  });

  it('preserves the aspect ratio within rounding', () => {
    for (const [w, h] of [
      [4321, 1234],
      [999, 3333],
      [2500, 2499],
    ] as const) {
      const out = fitWithin(w, h, 2000);
      expect(Math.max(out.width, out.height)).toBe(2000);
      const shorter = w >= h ? out.height : out.width;
      const exact = (Math.min(w, h) * 2000) / Math.max(w, h);
      expect(Math.abs(shorter - exact)).toBeLessThanOrEqual(0.5);
    }
  });
});

describe('resizeRaster', () => {
  it('returns the same raster when no resize is needed', async () => {
    const raster = solidRaster(40, 30, [255, 0, 0, 255]);
    await expect(resizeRaster(raster, 40)).resolves.toBe(raster);
  });

  it('downsamples an oversized raster', async () => {
    const raster = solidRaster(300, 150, [0, 128, 255, 255]);
    const out = await resizeRaster(raster, 100);
    expect(out.width).toBe(100);
    expect(out.height).toBe(50);
    expect(out.data.length).toBe(100 * 50 * 4);
    const [r, g, b, a] = out.data.subarray(0, 4);
    expect(r).toBeLessThanOrEqual(1);
    expect(Math.abs((g ?? 0) - 128)).toBeLessThanOrEqual(1);
    expect(b).toBeGreaterThanOrEqual(254);
    expect(a).toBeGreaterThanOrEqual(254);
  });
});
