/**
 * Navigation States
 *
 * One screen of the target UI per state. A state executes against the
 * current display and reports where the navigation should go next; the
 * engine owns the loop, the bookkeeping and the error routing.
 */

import type { NavigatorConfig } from '../config/environment';
import { createServiceLogger, type ServiceLogger } from '../services/logger';
import type { ClickOrchestrator } from '../services/vision/clickOrchestrator';
import { PRESENCE_TIMEOUT_MS, type MatchProbe } from '../services/vision/matchProbe';
import { toError } from '../types/errors';
import type { InputInjector, Point } from '../types/navigation';
import type { Clock } from '../utils/clock';
import { StateStats } from './transition';

// ============================================================================
// Contracts
// ============================================================================

export const RECOVERY_STATE_ID = 'undefined_menu';

export type StateOutcome =
  | { kind: 'next'; stateId: string }
  | { kind: 'terminal' }
  | { kind: 'failed'; reason: string };

/**
 * Everything a state may use while executing, scoped to one run
 */
export interface StateContext {
  orchestrator: ClickOrchestrator;
  probe: MatchProbe;
  input: InputInjector;
  clock: Clock;
  config: NavigatorConfig;
  signal: AbortSignal;
  previousStateId?: string;
  traceId?: string;
}

export interface NavigationState {
  readonly id: string;
  readonly description: string;
  readonly stats: StateStats;
  execute(context: StateContext): Promise<StateOutcome>;
  onEnter(context: StateContext): void | Promise<void>;
  onExit(nextStateId: string | undefined, context: StateContext): void | Promise<void>;
  /** Log the fault and name the state to continue from, if any */
  onError(error: Error, context: StateContext): string | undefined;
  canEnterFrom(previousStateId: string | undefined): boolean;
  getExpectedImages(): string[];
}

export interface BaseStateOptions {
  description?: string;
  /** Where onError routes; the recovery state by default */
  recoveryStateId?: string;
  logger?: ServiceLogger;
}

// ============================================================================
// Base
// ============================================================================

export abstract class BaseState implements NavigationState {
  readonly stats = new StateStats();
  readonly description: string;
  readonly recoveryStateId: string;
  protected readonly logger: ServiceLogger;

  protected constructor(readonly id: string, options: BaseStateOptions = {}) {
    this.description = options.description ?? id;
    this.recoveryStateId = options.recoveryStateId ?? RECOVERY_STATE_ID;
    this.logger = options.logger ?? createServiceLogger(`state.${id}`);
  }

  abstract execute(context: StateContext): Promise<StateOutcome>;

  onEnter(context: StateContext): void {
    this.logger.debug('state_enter', `Entering ${this.id}`, context.traceId, {
      previousState: context.previousStateId
    });
  }

  onExit(nextStateId: string | undefined, context: StateContext): void {
    this.logger.debug('state_exit', `Leaving ${this.id} for ${nextStateId ?? 'END'}`, context.traceId);
  }

  onError(error: Error, context: StateContext): string | undefined {
    this.logger.error('state_error', `Error in ${this.id}, routing to ${this.recoveryStateId}`, error, context.traceId, {
      stateId: this.id
    });
    return this.recoveryStateId;
  }

  canEnterFrom(_previousStateId: string | undefined): boolean {
    return true;
  }

  getExpectedImages(): string[] {
    return [];
  }
}

// ============================================================================
// Image transition
// ============================================================================

export interface ImageTransitionStateOptions extends BaseStateOptions {
  target: string;
  alternatives?: string[];
  nextState: string;
  timeoutMs?: number;
  clickOffset?: Point;
  retries?: number;
}

/**
 * Clicks the target (or an alternative) and moves on. Exhausted retries end
 * the run with a failed transition; there is no automatic recovery.
 */
export class ImageTransitionState extends BaseState {
  readonly target: string;
  readonly alternatives: string[];
  readonly nextState: string;
  readonly timeoutMs?: number;
  readonly clickOffset?: Point;
  readonly retries?: number;

  constructor(id: string, options: ImageTransitionStateOptions) {
    super(id, options);
    this.target = options.target;
    this.alternatives = options.alternatives ?? [];
    this.nextState = options.nextState;
    this.timeoutMs = options.timeoutMs;
    this.clickOffset = options.clickOffset;
    this.retries = options.retries;
  }

  async execute(context: StateContext): Promise<StateOutcome> {
    const templates = this.getExpectedImages();
    const clicked = await context.orchestrator.findAndClick(templates, {
      timeoutMs: this.timeoutMs,
      clickOffset: this.clickOffset,
      retries: this.retries,
      signal: context.signal
    });

    if (clicked) {
      return { kind: 'next', stateId: this.nextState };
    }

    const reason = context.signal.aborted ? 'stop requested' : `none of ${templates.join(', ')} found`;
    this.logger.warn('transition_failed', `${this.id}: ${reason}`, context.traceId, { stateId: this.id, templates });
    return { kind: 'failed', reason };
  }

  getExpectedImages(): string[] {
    return [this.target, ...this.alternatives];
  }
}

// ============================================================================
// Recovery
// ============================================================================

export interface RecoverySignature {
  templateId: string;
  stateId: string;
}

export const DEFAULT_RECOVERY_SIGNATURES: readonly RecoverySignature[] = [
  { templateId: 'btn_solo.png', stateId: 'start_menu' },
  { templateId: 'btn_train.png', stateId: 'solo_menu' },
  { templateId: 'train_menu.png', stateId: 'train_menu' }
];

export const SAFE_POINTER_POSITION: Point = { x: 10, y: 10 };

export interface UndefinedRecoveryStateOptions extends BaseStateOptions {
  signatures?: readonly RecoverySignature[];
  probeTimeoutMs?: number;
  safePosition?: Point;
}

/**
 * Works out where the UI currently is by probing a table of screen
 * signatures. Returns itself after a fallback key press when nothing matches.
 */
export class UndefinedRecoveryState extends BaseState {
  readonly signatures: readonly RecoverySignature[];
  readonly probeTimeoutMs: number;
  readonly safePosition: Point;

  constructor(id: string = RECOVERY_STATE_ID, options: UndefinedRecoveryStateOptions = {}) {
    super(id, { ...options, description: options.description ?? 'Unknown screen, locating a known menu' });
    this.signatures = options.signatures ?? DEFAULT_RECOVERY_SIGNATURES;
    this.probeTimeoutMs = options.probeTimeoutMs ?? PRESENCE_TIMEOUT_MS;
    this.safePosition = options.safePosition ?? SAFE_POINTER_POSITION;
  }

  async execute(context: StateContext): Promise<StateOutcome> {
    const { input, probe, clock, config, signal } = context;

    try {
      await input.movePointer(this.safePosition.x, this.safePosition.y, config.vision.clickDurationMs);
    } catch (error) {
      this.logger.warn('pointer_reset_failed', `Could not move pointer: ${toError(error).message}`, context.traceId);
    }

    for (const signature of this.signatures) {
      if (signal.aborted) {
        return { kind: 'failed', reason: 'stop requested' };
      }
      if (await probe.isPresent(signature.templateId, this.probeTimeoutMs, signal)) {
        this.logger.info('screen_identified', `${signature.templateId} visible, continuing at ${signature.stateId}`, context.traceId, {
          templateId: signature.templateId,
          stateId: signature.stateId
        });
        return { kind: 'next', stateId: signature.stateId };
      }
    }

    if (signal.aborted) {
      return { kind: 'failed', reason: 'stop requested' };
    }

    const fallbackKey = config.stateMachine.fallbackKey;
    this.logger.warn('screen_unknown', `No known screen visible, pressing ${fallbackKey}`, context.traceId);
    try {
      if (!(await input.pressKey(fallbackKey))) {
        this.logger.warn('fallback_key_failed', `Pressing ${fallbackKey} was refused`, context.traceId);
      }
    } catch (error) {
      this.logger.error('fallback_key_failed', `Pressing ${fallbackKey} failed`, toError(error), context.traceId);
    }
    await clock.sleep(config.stateMachine.recoveryPauseMs, signal);
    return { kind: 'next', stateId: this.id };
  }

  getExpectedImages(): string[] {
    return this.signatures.map(signature => signature.templateId);
  }
}

// ============================================================================
// Terminal & callback
// ============================================================================

export class TerminalState extends BaseState {
  constructor(id: string, options: BaseStateOptions = {}) {
    super(id, options);
  }

  async execute(context: StateContext): Promise<StateOutcome> {
    this.logger.info('terminal_reached', `Reached ${this.id}`, context.traceId);
    return { kind: 'terminal' };
  }
}

export type StateHandler = (context: StateContext) => Promise<string | null>;

export interface CallbackStateOptions extends BaseStateOptions {
  handler: StateHandler;
  expectedImages?: string[];
}

/**
 * State driven by a plain async function returning the next state id, or
 * null when there is nowhere to go.
 */
export class CallbackState extends BaseState {
  private readonly handler: StateHandler;
  private readonly expectedImages: string[];

  constructor(id: string, options: CallbackStateOptions) {
    super(id, options);
    this.handler = options.handler;
    this.expectedImages = options.expectedImages ?? [];
  }

  async execute(context: StateContext): Promise<StateOutcome> {
    const next = await this.handler(context);
    return next === null ? { kind: 'failed', reason: 'handler returned no successor' } : { kind: 'next', stateId: next };
  }

  getExpectedImages(): string[] {
    return [...this.expectedImages];
  }
}
