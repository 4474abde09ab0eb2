/**
 * NCC Template Scorer Tests
 */

import type { Raster } from '../../types/navigation';
import { createRaster, rasterFromRows } from '../../utils/raster';
import { NccTemplateScorer } from '../vision/templateScorer';

const CROSS = [
  [10, 200, 10],
  [200, 10, 200],
  [10, 200, 10]
];

function paste(target: Raster, source: Raster, x: number, y: number): Raster {
  for (let row = 0; row < source.height; row++) {
    target.data.set(source.data.subarray(row * source.width, (row + 1) * source.width), (y + row) * target.width + x);
  }
  return target;
}

/** 16x16 template made of four 8x8 blocks */
function blockTemplate(): Raster {
  const rows: number[][] = [];
  for (let y = 0; y < 16; y++) {
    const row: number[] = [];
    for (let x = 0; x < 16; x++) {
      row.push((x < 8) === (y < 8) ? 40 : 220);
    }
    rows.push(row);
  }
  return rasterFromRows(rows);
}

describe('NccTemplateScorer', () => {
  const exact = new NccTemplateScorer({ pyramidFactor: 1 });

  it('locates an exact copy of the template with confidence 1', () => {
    const template = rasterFromRows(CROSS);
    const screen = paste(createRaster(10, 8), template, 4, 3);

    const score = exact.score(screen, template);

    expect(score.position).toEqual({ x: 4, y: 3 });
    expect(score.confidence).toBeCloseTo(1, 6);
  });

  it('is insensitive to brightness and contrast changes', () => {
    const template = rasterFromRows(CROSS);
    const brighter = rasterFromRows(CROSS.map(row => row.map(v => Math.round(v / 2) + 30)));
    const screen = paste(createRaster(10, 8, 30), brighter, 2, 1);

    const score = exact.score(screen, template);

    expect(score.position).toEqual({ x: 2, y: 1 });
    expect(score.confidence).toBeCloseTo(1, 6);
  });

  it('scores an inverted pattern as 0', () => {
    const template = rasterFromRows(CROSS);
    const inverted = rasterFromRows(CROSS.map(row => row.map(v => 210 - v)));

    expect(exact.score(inverted, template).confidence).toBe(0);
  });

  it('returns confidence 0 at the origin for a template larger than the screen', () => {
    const template = createRaster(12, 4, 100);
    const screen = createRaster(10, 8, 100);

    expect(exact.score(screen, template)).toEqual({ position: { x: 0, y: 0 }, confidence: 0 });
  });

  it('scores a flat template against a flat window as 1', () => {
    const score = exact.score(createRaster(6, 6, 80), createRaster(2, 2, 50));

    expect(score).toEqual({ position: { x: 0, y: 0 }, confidence: 1 });
  });

  it('scores a flat template against textured windows as 0', () => {
    const checker = rasterFromRows([
      [0, 255, 0, 255],
      [255, 0, 255, 0],
      [0, 255, 0, 255],
      [255, 0, 255, 0]
    ]);

    expect(exact.score(checker, createRaster(2, 2, 50))).toEqual({ position: { x: 0, y: 0 }, confidence: 0 });
  });

  it('scores a textured template against a flat screen as 0', () => {
    expect(exact.score(createRaster(8, 8, 120), rasterFromRows(CROSS)).confidence).toBe(0);
  });

  describe('coarse-to-fine search', () => {
    it('shrinks the pyramid factor for small templates', () => {
      const scorer = new NccTemplateScorer({ pyramidFactor: 4 });

      expect(scorer.coarseFactor(createRaster(16, 16))).toBe(4);
      expect(scorer.coarseFactor(createRaster(10, 10))).toBe(2);
      expect(scorer.coarseFactor(createRaster(3, 3))).toBe(1);
    });

    it('finds an unaligned placement the same as a full-resolution search', () => {
      const template = blockTemplate();
      const screen = paste(createRaster(64, 48), template, 33, 20);
      const pyramid = new NccTemplateScorer({ pyramidFactor: 4 });

      const coarse = pyramid.score(screen, template);
      const full = exact.score(screen, template);

      expect(coarse.position).toEqual({ x: 33, y: 20 });
      expect(full.position).toEqual({ x: 33, y: 20 });
      expect(coarse.confidence).toBeCloseTo(1, 6);
    });
  });
});
