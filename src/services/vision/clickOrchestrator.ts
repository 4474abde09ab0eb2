/**
 * Click Orchestrator
 *
 * Find-and-click with retries. Each attempt probes the candidate templates
 * in order and clicks the first match; a failed attempt presses the fallback
 * key and backs off before the next one.
 */

import type { VisionConfig } from '../../config/environment';
import { toError } from '../../types/errors';
import type { FindAndClickOptions, InputInjector, Point } from '../../types/navigation';
import { systemClock, type Clock } from '../../utils/clock';
import { createServiceLogger, type ServiceLogger } from '../logger';
import type { MatchProbe } from './matchProbe';

export interface ClickOrchestratorDependencies {
  probe: MatchProbe;
  input: InputInjector;
  vision: VisionConfig;
  fallbackKey: string;
  clock?: Clock;
  logger?: ServiceLogger;
}

type AttemptResult = 'clicked' | 'missed' | 'cancelled';

export class ClickOrchestrator {
  private readonly probe: MatchProbe;
  private readonly input: InputInjector;
  private readonly vision: VisionConfig;
  private readonly fallbackKey: string;
  private readonly clock: Clock;
  private readonly logger: ServiceLogger;

  constructor(deps: ClickOrchestratorDependencies) {
    this.probe = deps.probe;
    this.input = deps.input;
    this.vision = deps.vision;
    this.fallbackKey = deps.fallbackKey;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createServiceLogger('click-orchestrator');
  }

  /**
   * Click the first of `templateIds` that appears, retrying up to
   * `retries` times. Returns false when every attempt missed or the signal
   * was aborted.
   */
  async findAndClick(templateIds: string[], options: FindAndClickOptions = {}): Promise<boolean> {
    const retries = options.retries ?? this.vision.retries;
    const offset = options.clickOffset ?? { x: 0, y: 0 };
    const { signal } = options;
    const start = this.clock.now();

    for (let attempt = 1; attempt <= retries; attempt++) {
      const result = await this.attempt(templateIds, offset, attempt, options);
      if (result === 'clicked') {
        return true;
      }
      if (result === 'cancelled' || signal?.aborted) {
        this.logger.info('find_and_click_cancelled', `Stopped looking for ${templateIds.join(' | ')}`, undefined, {
          templateIds,
          attempt
        });
        return false;
      }

      this.logger.warn(
        'attempt_failed',
        `Attempt ${attempt}/${retries} for ${templateIds.join(' | ')} failed, pressing ${this.fallbackKey}`,
        undefined,
        { templateIds, attempt, elapsedMs: this.clock.now() - start }
      );
      await this.pressFallbackKey();
      await this.clock.sleep(this.vision.delayBetweenRetriesMs, signal);
    }

    this.logger.error('find_and_click_exhausted', `None of ${templateIds.join(' | ')} found after ${retries} attempts`, undefined, undefined, {
      templateIds,
      retries,
      elapsedMs: this.clock.now() - start
    });
    return false;
  }

  private async attempt(
    templateIds: string[],
    offset: Point,
    attempt: number,
    options: FindAndClickOptions
  ): Promise<AttemptResult> {
    const { signal, timeoutMs } = options;

    for (const templateId of templateIds) {
      if (signal?.aborted) {
        return 'cancelled';
      }

      const match = await this.probe.probe(templateId, { timeoutMs, signal });
      if (match.cancelled) {
        return 'cancelled';
      }
      if (!match.found || !match.position) {
        continue;
      }

      const target = { x: match.position.x + offset.x, y: match.position.y + offset.y };
      if (!(await this.clickAt(target, templateId, attempt))) {
        return 'missed';
      }

      this.logger.info('clicked', `Clicked ${templateId} at (${target.x}, ${target.y})`, undefined, {
        templateId,
        attempt,
        confidence: match.confidence
      });
      await this.clock.sleep(this.vision.postClickDelayMs, signal);
      return 'clicked';
    }

    return 'missed';
  }

  private async clickAt(target: Point, templateId: string, attempt: number): Promise<boolean> {
    try {
      const moved = await this.input.movePointer(target.x, target.y, this.vision.clickDurationMs);
      const clicked = moved && (await this.input.click('left'));
      if (!clicked) {
        this.logger.warn('click_failed', `Input injection refused the click on ${templateId}`, undefined, {
          templateId,
          attempt,
          target
        });
      }
      return clicked;
    } catch (error) {
      this.logger.error('click_failed', `Input injection failed for ${templateId}`, toError(error), undefined, {
        templateId,
        attempt,
        target
      });
      return false;
    }
  }

  private async pressFallbackKey(): Promise<void> {
    try {
      if (!(await this.input.pressKey(this.fallbackKey))) {
        this.logger.warn('fallback_key_failed', `Pressing ${this.fallbackKey} was refused`);
      }
    } catch (error) {
      this.logger.error('fallback_key_failed', `Pressing ${this.fallbackKey} failed`, toError(error));
    }
  }
}
