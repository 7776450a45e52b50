import { describe, expect, it } from 'vitest';
import {
  IMAGENET_MEAN,
  IMAGENET_STD,
  applyAlphaMask,
  clampToMask,
  minMaxToMask,
  preprocessImageNet,
  resizeMask,
  sigmoidToMask,
} from './base';
import { solidRaster } from './testUtils';

describe('mask conversion', () => {
  it('stretches model output between its min and max', () => {
    expect([...minMaxToMask(new Float32Array([0, 0.5, 1]), 3)]).toEqual([0, 128, 255]);
    expect([...minMaxToMask(new Float32Array([-2, 2]), 2)]).toEqual([0, 255]);
  });

  it('yields an empty mask for constant output', () => {
    expect([...minMaxToMask(new Float32Array([0.3, 0.3]), 2)]).toEqual([0, 0]);
  });

  it('applies sigmoid to logits', () => {
    expect([...sigmoidToMask(new Float32Array([0]), 1)]).toEqual([128]);
  });

  it('clamps probabilities into range', () => {
    expect([...clampToMask(new Float32Array([-1, 2, 0.25]), 3)]).toEqual([0, 255, 64]);
  });
});

describe('resizeMask', () => {
  it('returns the input when sizes already match', () => {
    const mask = new Uint8Array([1, 2, 3, 4]);
    expect(resizeMask(mask, 2, 2, 2, 2)).toBe(mask);
  });

  it('interpolates bilinearly with pixel-centre mapping', () => {
    expect([...resizeMask(new Uint8Array([0, 255]), 2, 1, 4, 1)]).toEqual([0, 64, 191, 255]);
  });

  it('spreads a single value across the target', () => {
    expect([...resizeMask(new Uint8Array([200]), 1, 1, 3, 2)]).toEqual([200, 200, 200, 200, 200, 200]);
  });
});

describe('applyAlphaMask', () => {
  it('multiplies the mask into alpha and leaves RGB alone', () => {
    const raster = { width: 2, height: 1, data: Buffer.from([10, 20, 30, 255, 40, 50, 60, 128]) };
    const out = applyAlphaMask(raster, new Uint8Array([0, 255]));
    expect([...out.data]).toEqual([10, 20, 30, 0, 40, 50, 60, 128]);
    expect([...raster.data]).toEqual([10, 20, 30, 255, 40, 50, 60, 128]);
  });

  it('rejects a mask of the wrong size', () => {
    expect(() => applyAlphaMask(solidRaster(2, 2, [0, 0, 0, 255]), new Uint8Array(3))).toThrow('mask');
  });
});

describe('preprocessImageNet', () => {
  const [meanR, meanG, meanB] = IMAGENET_MEAN;
  const [stdR, stdG, stdB] = IMAGENET_STD;

  it('normalises a white image channel by channel in NCHW order', async () => {
    const tensor = await preprocessImageNet(solidRaster(2, 2, [255, 255, 255, 255]), { inputW: 2, inputH: 2 });
    expect(tensor.length).toBe(12);
    expect(tensor[0]).toBeCloseTo((1 - meanR) / stdR, 4);
    expect(tensor[4]).toBeCloseTo((1 - meanG) / stdG, 4);
    expect(tensor[8]).toBeCloseTo((1 - meanB) / stdB, 4);
  });

  it('divides by the brightest value when scaleByMax is set', async () => {
    const tensor = await preprocessImageNet(solidRaster(2, 2, [100, 100, 100, 255]), {
      inputW: 2,
      inputH: 2,
      scaleByMax: true,
    });
    expect(tensor[0]).toBeCloseTo((1 - meanR) / stdR, 4);
    expect(tensor[11]).toBeCloseTo((1 - meanB) / stdB, 4);
  });
});
