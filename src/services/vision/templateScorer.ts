/**
 * Normalised Cross-Correlation Scorer
 *
 * Mean-subtracted normalised cross-correlation (the TM_CCOEFF_NORMED score)
 * over every placement of the template inside the screen. Window sums come
 * from integral images; an optional coarse pass on downsampled rasters picks
 * candidate areas that are then refined at full resolution.
 */

import type { Point, Raster, TemplateScore, TemplateScorer } from '../../types/navigation';
import { downsampleRaster } from '../../utils/raster';

export interface NccScorerOptions {
  /** Downsampling factor of the coarse pass; 1 searches at full resolution only */
  pyramidFactor: number;
  /** Smallest template side allowed in the coarse pass */
  minCoarseSide: number;
  /** Coarse candidates refined at full resolution */
  coarseCandidates: number;
}

const DEFAULT_OPTIONS: NccScorerOptions = {
  pyramidFactor: 4,
  minCoarseSide: 4,
  coarseCandidates: 3
};

interface IntegralImages {
  stride: number;
  sum: Float64Array;
  sumSq: Float64Array;
}

interface TemplateStats {
  n: number;
  mean: number;
  /** Sum of squared deviations from the mean */
  ss: number;
}

interface Candidate extends Point {
  score: number;
}

function buildIntegrals(raster: Raster): IntegralImages {
  const stride = raster.width + 1;
  const sum = new Float64Array(stride * (raster.height + 1));
  const sumSq = new Float64Array(stride * (raster.height + 1));

  for (let y = 0; y < raster.height; y++) {
    let rowSum = 0;
    let rowSumSq = 0;
    for (let x = 0; x < raster.width; x++) {
      const v = raster.data[y * raster.width + x];
      rowSum += v;
      rowSumSq += v * v;
      const idx = (y + 1) * stride + x + 1;
      sum[idx] = sum[idx - stride] + rowSum;
      sumSq[idx] = sumSq[idx - stride] + rowSumSq;
    }
  }

  return { stride, sum, sumSq };
}

function windowSum(table: Float64Array, stride: number, x: number, y: number, w: number, h: number): number {
  return table[(y + h) * stride + x + w] - table[y * stride + x + w] - table[(y + h) * stride + x] + table[y * stride + x];
}

function templateStats(template: Raster): TemplateStats {
  const n = template.data.length;
  let total = 0;
  for (let i = 0; i < n; i++) total += template.data[i];
  const mean = total / n;
  let ss = 0;
  for (let i = 0; i < n; i++) {
    const d = template.data[i] - mean;
    ss += d * d;
  }
  return { n, mean, ss };
}

function clamp01(value: number): number {
  if (!Number.isFinite(value) || value < 0) return 0;
  return value > 1 ? 1 : value;
}

/**
 * Score of the template placed with its top-left corner at (x, y)
 */
function scoreAt(
  screen: Raster,
  integrals: IntegralImages,
  template: Raster,
  stats: TemplateStats,
  x: number,
  y: number
): number {
  const { width: tw, height: th } = template;
  const s = windowSum(integrals.sum, integrals.stride, x, y, tw, th);
  const sq = windowSum(integrals.sumSq, integrals.stride, x, y, tw, th);
  const windowSs = (stats.n * sq - s * s) / stats.n;
  const windowFlat = windowSs <= 1e-9;
  const templateFlat = stats.ss <= 1e-9;

  if (templateFlat || windowFlat) {
    return templateFlat && windowFlat ? 1 : 0;
  }

  let cross = 0;
  for (let ty = 0; ty < th; ty++) {
    const screenRow = (y + ty) * screen.width + x;
    const templateRow = ty * tw;
    for (let tx = 0; tx < tw; tx++) {
      cross += (template.data[templateRow + tx] - stats.mean) * screen.data[screenRow + tx];
    }
  }

  return clamp01(cross / Math.sqrt(stats.ss * windowSs));
}

/**
 * Exhaustive search over [x0, x1] x [y0, y1]; keeps the `keep` best
 * placements, earliest in row-major order on ties.
 */
function search(
  screen: Raster,
  integrals: IntegralImages,
  template: Raster,
  stats: TemplateStats,
  bounds: { x0: number; y0: number; x1: number; y1: number },
  keep: number
): Candidate[] {
  const best: Candidate[] = [];

  for (let y = bounds.y0; y <= bounds.y1; y++) {
    for (let x = bounds.x0; x <= bounds.x1; x++) {
      const score = scoreAt(screen, integrals, template, stats, x, y);
      if (best.length < keep || score > best[best.length - 1].score) {
        let i = best.length;
        while (i > 0 && best[i - 1].score < score) i--;
        best.splice(i, 0, { x, y, score });
        if (best.length > keep) best.pop();
      }
    }
  }

  return best;
}

export class NccTemplateScorer implements TemplateScorer {
  private readonly options: NccScorerOptions;

  constructor(options: Partial<NccScorerOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Largest usable coarse factor for this template, or 1 when the template
   * would become too small to carry any structure.
   */
  coarseFactor(template: Raster): number {
    let factor = Math.max(1, Math.floor(this.options.pyramidFactor));
    const side = Math.min(template.width, template.height);
    while (factor > 1 && Math.floor(side / factor) < this.options.minCoarseSide) {
      factor--;
    }
    return factor;
  }

  score(screen: Raster, template: Raster): TemplateScore {
    if (
      template.width === 0 ||
      template.height === 0 ||
      template.width > screen.width ||
      template.height > screen.height
    ) {
      return { position: { x: 0, y: 0 }, confidence: 0 };
    }

    const maxX = screen.width - template.width;
    const maxY = screen.height - template.height;
    const factor = this.coarseFactor(template);
    const integrals = buildIntegrals(screen);
    const stats = templateStats(template);

    if (factor === 1) {
      const [best] = search(screen, integrals, template, stats, { x0: 0, y0: 0, x1: maxX, y1: maxY }, 1);
      return { position: { x: best.x, y: best.y }, confidence: best.score };
    }

    const coarseScreen = downsampleRaster(screen, factor);
    const coarseTemplate = downsampleRaster(template, factor);
    const coarse = search(
      coarseScreen,
      buildIntegrals(coarseScreen),
      coarseTemplate,
      templateStats(coarseTemplate),
      {
        x0: 0,
        y0: 0,
        x1: coarseScreen.width - coarseTemplate.width,
        y1: coarseScreen.height - coarseTemplate.height
      },
      this.options.coarseCandidates
    );

    let best: Candidate | undefined;
    for (const candidate of coarse) {
      const cx = candidate.x * factor;
      const cy = candidate.y * factor;
      const [refined] = search(
        screen,
        integrals,
        template,
        stats,
        {
          x0: Math.max(0, cx - factor),
          y0: Math.max(0, cy - factor),
          x1: Math.min(maxX, cx + factor),
          y1: Math.min(maxY, cy + factor)
        },
        1
      );
      if (!best || refined.score > best.score) {
        best = refined;
      }
    }

    if (!best) {
      return { position: { x: 0, y: 0 }, confidence: 0 };
    }
    return { position: { x: best.x, y: best.y }, confidence: best.score };
  }
}
