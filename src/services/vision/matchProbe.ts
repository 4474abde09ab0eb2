/**
 * Match Probe
 *
 * Polls the screen until a template appears with enough confidence or the
 * timeout elapses. Expected misses are reported in the MatchResult; nothing
 * here throws for a template that is simply not on screen.
 */

import type { VisionConfig } from '../../config/environment';
import { toError } from '../../types/errors';
import type {
  MatchResult,
  ProbeOptions,
  Raster,
  ScreenCaptureProvider,
  TemplateLoader,
  TemplateScore,
  TemplateScorer
} from '../../types/navigation';
import { systemClock, type Clock } from '../../utils/clock';
import { cropRaster } from '../../utils/raster';
import { createServiceLogger, type ServiceLogger } from '../logger';

export const PRESENCE_TIMEOUT_MS = 1000;

export interface MatchProbeDependencies {
  capture: ScreenCaptureProvider;
  scorer: TemplateScorer;
  loader: TemplateLoader;
  vision: VisionConfig;
  clock?: Clock;
  logger?: ServiceLogger;
}

export class MatchProbe {
  private readonly capture: ScreenCaptureProvider;
  private readonly scorer: TemplateScorer;
  private readonly loader: TemplateLoader;
  private readonly vision: VisionConfig;
  private readonly clock: Clock;
  private readonly logger: ServiceLogger;

  constructor(deps: MatchProbeDependencies) {
    this.capture = deps.capture;
    this.scorer = deps.scorer;
    this.loader = deps.loader;
    this.vision = deps.vision;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createServiceLogger('match-probe');
  }

  /**
   * Poll for a template until it is found, the timeout elapses or the signal
   * is aborted.
   */
  async probe(templateId: string, options: ProbeOptions = {}): Promise<MatchResult> {
    const timeoutMs = options.timeoutMs ?? this.vision.timeoutMs;
    const checkIntervalMs = options.checkIntervalMs ?? this.vision.checkIntervalMs;
    const threshold = options.threshold ?? this.vision.threshold;
    const { region, signal } = options;
    const start = this.clock.now();

    let template: Raster;
    try {
      template = await this.loader.loadTemplate(templateId);
    } catch (error) {
      this.logger.error('template_load_failed', `Template ${templateId} could not be loaded`, toError(error), undefined, {
        templateId
      });
      return {
        found: false,
        confidence: 0,
        templateSize: { width: 0, height: 0 },
        elapsedMs: this.clock.now() - start,
        polls: 0,
        cancelled: false
      };
    }

    const templateSize = { width: template.width, height: template.height };
    let polls = 0;
    let confidence = 0;

    while (this.clock.now() - start < timeoutMs) {
      if (signal?.aborted) {
        return { found: false, confidence, templateSize, elapsedMs: this.clock.now() - start, polls, cancelled: true };
      }

      polls++;
      try {
        const screen = await this.capture.captureScreen();
        const { score, offsetX, offsetY } = this.scoreScreen(screen, template, region);
        confidence = score.confidence;

        if (confidence >= threshold) {
          const position = {
            x: score.position.x + Math.floor(template.width / 2) + offsetX,
            y: score.position.y + Math.floor(template.height / 2) + offsetY
          };
          const elapsedMs = this.clock.now() - start;
          this.logger.debug('template_found', `Found ${templateId} at (${position.x}, ${position.y})`, undefined, {
            templateId,
            confidence,
            polls,
            elapsedMs
          });
          return { found: true, position, confidence, templateSize, elapsedMs, polls, cancelled: false };
        }
      } catch (error) {
        confidence = 0;
        this.logger.warn('poll_failed', `Poll ${polls} for ${templateId} failed: ${toError(error).message}`, undefined, {
          templateId,
          poll: polls,
          elapsedMs: this.clock.now() - start
        });
      }

      await this.clock.sleep(checkIntervalMs, signal);
    }

    const elapsedMs = this.clock.now() - start;
    const cancelled = signal?.aborted ?? false;
    this.logger.debug('template_not_found', `${templateId} not found after ${polls} polls`, undefined, {
      templateId,
      confidence,
      polls,
      elapsedMs,
      cancelled
    });
    return { found: false, confidence, templateSize, elapsedMs, polls, cancelled };
  }

  /**
   * Quick presence check
   */
  async isPresent(templateId: string, timeoutMs: number = PRESENCE_TIMEOUT_MS, signal?: AbortSignal): Promise<boolean> {
    const result = await this.probe(templateId, { timeoutMs, signal });
    return result.found;
  }

  /**
   * Poll several templates against the same capture until one appears.
   * Returns the first matching id in list order, or null on timeout.
   */
  async waitForAny(
    templateIds: string[],
    timeoutMs: number = this.vision.timeoutMs,
    signal?: AbortSignal
  ): Promise<string | null> {
    const start = this.clock.now();
    const templates: Array<{ id: string; raster: Raster }> = [];

    for (const id of templateIds) {
      try {
        templates.push({ id, raster: await this.loader.loadTemplate(id) });
      } catch (error) {
        this.logger.error('template_load_failed', `Template ${id} could not be loaded`, toError(error), undefined, {
          templateId: id
        });
      }
    }

    if (templates.length === 0) {
      return null;
    }

    let polls = 0;
    while (this.clock.now() - start < timeoutMs && !signal?.aborted) {
      polls++;
      try {
        const screen = await this.capture.captureScreen();
        for (const { id, raster } of templates) {
          if (this.scorer.score(screen, raster).confidence >= this.vision.threshold) {
            return id;
          }
        }
      } catch (error) {
        this.logger.warn('poll_failed', `Poll ${polls} failed: ${toError(error).message}`, undefined, {
          templateIds,
          poll: polls
        });
      }

      await this.clock.sleep(this.vision.checkIntervalMs, signal);
    }

    return null;
  }

  private scoreScreen(
    screen: Raster,
    template: Raster,
    region: ProbeOptions['region']
  ): { score: TemplateScore; offsetX: number; offsetY: number } {
    if (!region) {
      return { score: this.scorer.score(screen, template), offsetX: 0, offsetY: 0 };
    }

    const cropped = cropRaster(screen, region);
    return {
      score: this.scorer.score(cropped.raster, template),
      offsetX: cropped.offsetX,
      offsetY: cropped.offsetY
    };
  }
}
