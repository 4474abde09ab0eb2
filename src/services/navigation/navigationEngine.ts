/**
 * Navigation Engine
 *
 * Drives the state registry from an initial state until a terminal state,
 * a dead end, the iteration budget, a stuck loop or a stop request ends the
 * run. Every execution is recorded as exactly one transition before the next
 * state runs, and no state fault escapes the loop.
 */

import { EventEmitter } from 'events';
import type { NavigatorConfig } from '../../config/environment';
import { RECOVERY_STATE_ID, type NavigationState, type StateContext, type StateOutcome } from '../../models/state';
import { createTransition, type Transition, type TransitionOutcome } from '../../models/transition';
import {
  EngineBusyError,
  RegistryLockedError,
  StateEntryRefusedError,
  toError
} from '../../types/errors';
import type { AbortReason, InputInjector, RunOptions, RunResult } from '../../types/navigation';
import { systemClock, type Clock } from '../../utils/clock';
import { createServiceLogger, type ServiceLogger } from '../logger';
import type { ClickOrchestrator } from '../vision/clickOrchestrator';
import type { MatchProbe } from '../vision/matchProbe';
import { NavigationTelemetry, type NavigationStatistics } from './telemetry';

export interface NavigationEngineDependencies {
  config: NavigatorConfig;
  orchestrator: ClickOrchestrator;
  probe: MatchProbe;
  input: InputInjector;
  clock?: Clock;
  logger?: ServiceLogger;
  telemetry?: NavigationTelemetry;
}

/**
 * Payloads of the events the engine emits
 */
export interface NavigationEngineEvents {
  runStart: { initialState: string; maxIterations: number; traceId: string };
  transition: Transition;
  repeat: { stateId: string; repeatCount: number };
  nudge: { stateId: string; repeatCount: number; key: string };
  runComplete: RunResult;
}

export class NavigationEngine extends EventEmitter {
  private readonly config: NavigatorConfig;
  private readonly orchestrator: ClickOrchestrator;
  private readonly probe: MatchProbe;
  private readonly input: InputInjector;
  private readonly clock: Clock;
  private readonly logger: ServiceLogger;
  private readonly telemetry: NavigationTelemetry;
  private readonly registry = new Map<string, NavigationState>();

  private current?: string;
  private readonly visited = new Set<string>();
  private repeatCount = 0;
  private running = false;
  private stopRequested = false;
  private abortController?: AbortController;
  private lastRun?: RunResult;

  constructor(deps: NavigationEngineDependencies) {
    super();
    this.config = deps.config;
    this.orchestrator = deps.orchestrator;
    this.probe = deps.probe;
    this.input = deps.input;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createServiceLogger('engine');
    this.telemetry = deps.telemetry ?? new NavigationTelemetry();
  }

  // ==========================================================================
  // Registry
  // ==========================================================================

  /**
   * Add a state; a state with the same id is replaced
   */
  register(state: NavigationState): void {
    if (this.running) {
      throw new RegistryLockedError('register', state.id);
    }
    if (this.registry.has(state.id)) {
      this.logger.warn('state_overwritten', `State ${state.id} was already registered and has been replaced`, undefined, {
        stateId: state.id
      });
    }
    this.registry.set(state.id, state);
    this.logger.debug('state_registered', `Registered ${state.id}`, undefined, { stateId: state.id });
  }

  registerAll(states: Iterable<NavigationState>): void {
    for (const state of states) {
      this.register(state);
    }
  }

  unregister(stateId: string): boolean {
    if (this.running) {
      throw new RegistryLockedError('unregister', stateId);
    }
    return this.registry.delete(stateId);
  }

  getState(stateId: string): NavigationState | undefined {
    return this.registry.get(stateId);
  }

  listStates(): NavigationState[] {
    return [...this.registry.values()];
  }

  // ==========================================================================
  // Run lifecycle
  // ==========================================================================

  isRunning(): boolean {
    return this.running;
  }

  get currentState(): string | undefined {
    return this.current;
  }

  /**
   * Run the state machine. Rejects with EngineBusyError when a run is
   * already in progress; every other failure is reported in the result.
   */
  async run(options: RunOptions = {}): Promise<RunResult> {
    if (this.running) {
      throw new EngineBusyError();
    }

    const machine = this.config.stateMachine;
    const initialState = options.initialState ?? machine.initialState;
    const maxIterations = options.maxIterations ?? machine.maxIterations;
    const controller = new AbortController();
    const traceId = this.logger.generateTraceId();
    const start = this.clock.now();
    const transitions: Transition[] = [];

    this.current = initialState;
    this.visited.clear();
    this.repeatCount = 0;
    this.stopRequested = false;
    this.abortController = controller;
    this.running = true;

    let iterations = 0;
    let previous: string | undefined;
    let stuck = false;

    this.logger.info('run_start', `Starting navigation at ${initialState}`, traceId, { initialState, maxIterations });
    this.emitEvent('runStart', { initialState, maxIterations, traceId });

    try {
      while (this.current !== undefined && iterations < maxIterations && !this.stopRequested) {
        const stateId: string = this.current;

        if (this.visited.has(stateId)) {
          this.repeatCount++;
          this.logger.warn('state_repeat', `State ${stateId} revisited (${this.repeatCount} in a row)`, traceId, {
            stateId,
            repeatCount: this.repeatCount
          });
          this.emitEvent('repeat', { stateId, repeatCount: this.repeatCount });

          if (this.repeatCount === machine.maxStopCount) {
            await this.nudge(stateId, traceId, controller.signal);
          }
          if (this.repeatCount >= machine.breakCount) {
            this.logger.error('stuck_loop', `Stuck in ${stateId} after ${this.repeatCount} repeats, stopping`, undefined, traceId, {
              stateId,
              repeatCount: this.repeatCount,
              elapsedMs: this.clock.now() - start
            });
            stuck = true;
            break;
          }
          if (this.stopRequested) {
            break;
          }
        } else {
          this.repeatCount = 0;
        }

        this.visited.add(stateId);

        const state = this.registry.get(stateId);
        const transition = await this.executeState(stateId, state, {
          orchestrator: this.orchestrator,
          probe: this.probe,
          input: this.input,
          clock: this.clock,
          config: this.config,
          signal: controller.signal,
          previousStateId: previous,
          traceId
        });
        iterations++;

        this.telemetry.record(state, transition);
        transitions.push(transition);
        this.emitEvent('transition', transition);

        previous = stateId;
        this.current = transition.toState;

        if (this.current !== undefined && machine.stateTransitionDelayMs > 0 && !this.stopRequested) {
          await this.clock.sleep(machine.stateTransitionDelayMs, controller.signal);
        }
      }
    } finally {
      this.running = false;
      this.abortController = undefined;
    }

    const result = this.classify({
      iterations,
      stuck,
      transitions,
      durationMs: this.clock.now() - start
    });
    this.lastRun = result;

    this.logger.info('run_complete', `Navigation ${result.outcome}${result.reason ? ` (${result.reason})` : ''}`, traceId, {
      outcome: result.outcome,
      reason: result.reason,
      iterations: result.iterations,
      finalState: result.finalState,
      terminalReached: result.terminalReached,
      durationMs: result.durationMs
    });
    this.emitEvent('runComplete', result);
    return result;
  }

  /**
   * Request the current run to stop. Probes in flight return at their next
   * poll; returns false when nothing is running.
   */
  stop(): boolean {
    if (!this.running) {
      return false;
    }
    this.stopRequested = true;
    this.abortController?.abort();
    this.logger.info('stop_requested', 'Stop requested, finishing the current step');
    return true;
  }

  // ==========================================================================
  // Telemetry
  // ==========================================================================

  getStatistics(): NavigationStatistics {
    return this.telemetry.snapshot(this.registry, {
      current: this.current,
      visited: this.visited,
      repeatCount: this.repeatCount,
      running: this.running,
      lastRun: this.lastRun
    });
  }

  get history(): readonly Transition[] {
    return this.telemetry.history;
  }

  clearHistory(): void {
    this.telemetry.clear(this.registry.values());
    this.lastRun = undefined;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async executeState(
    stateId: string,
    state: NavigationState | undefined,
    context: StateContext
  ): Promise<Transition> {
    const timer = this.logger.startTimer('execute_state', context.traceId, { stateId });
    const transition = await this.attemptState(stateId, state, context);
    timer.end({ outcome: transition.outcome });
    return transition;
  }

  private async attemptState(
    stateId: string,
    state: NavigationState | undefined,
    context: StateContext
  ): Promise<Transition> {
    const startedAt = this.clock.now();
    const timestamp = new Date(startedAt).toISOString();
    const elapsed = () => this.clock.now() - startedAt;

    if (!state) {
      this.logger.error('unknown_state', `State ${stateId} is not registered`, undefined, context.traceId, { stateId });
      return createTransition({
        fromState: stateId,
        timestamp,
        durationMs: 0,
        outcome: 'failed',
        errorDetail: `unknown state: ${stateId}`
      });
    }

    try {
      if (!state.canEnterFrom(context.previousStateId)) {
        throw new StateEntryRefusedError(stateId, context.previousStateId);
      }

      await state.onEnter(context);
      const outcome = await state.execute(context);
      const toState = outcome.kind === 'next' ? outcome.stateId : undefined;
      await state.onExit(toState, context);

      return createTransition({
        fromState: stateId,
        toState,
        timestamp,
        durationMs: elapsed(),
        outcome: this.outcomeOf(stateId, outcome),
        errorDetail: outcome.kind === 'failed' ? outcome.reason : undefined
      });
    } catch (caught) {
      const error = toError(caught);
      return createTransition({
        fromState: stateId,
        toState: this.routeError(state, error, context),
        timestamp,
        durationMs: elapsed(),
        outcome: 'failed',
        errorDetail: error.message
      });
    }
  }

  private outcomeOf(stateId: string, outcome: StateOutcome): TransitionOutcome {
    switch (outcome.kind) {
      case 'next':
        return outcome.stateId === stateId ? 'retry' : 'success';
      case 'terminal':
        return 'terminated';
      case 'failed':
        return 'failed';
    }
  }

  private routeError(state: NavigationState, error: Error, context: StateContext): string | undefined {
    try {
      return state.onError(error, context);
    } catch (hookError) {
      this.logger.error('error_hook_failed', `onError of ${state.id} threw`, toError(hookError), context.traceId, {
        stateId: state.id
      });
      return RECOVERY_STATE_ID;
    }
  }

  private async nudge(stateId: string, traceId: string, signal: AbortSignal): Promise<void> {
    const key = this.config.stateMachine.fallbackKey;
    this.logger.warn('stuck_nudge', `Pressing ${key} to dislodge ${stateId}`, traceId, {
      stateId,
      repeatCount: this.repeatCount
    });
    this.emitEvent('nudge', { stateId, repeatCount: this.repeatCount, key });

    try {
      if (!(await this.input.pressKey(key))) {
        this.logger.warn('fallback_key_failed', `Pressing ${key} was refused`, traceId);
      }
    } catch (error) {
      this.logger.error('fallback_key_failed', `Pressing ${key} failed`, toError(error), traceId);
    }
    await this.clock.sleep(this.config.stateMachine.nudgePauseMs, signal);
  }

  private classify(run: { iterations: number; stuck: boolean; transitions: Transition[]; durationMs: number }): RunResult {
    let reason: AbortReason | undefined;
    if (this.stopRequested) {
      reason = 'stop_requested';
    } else if (run.stuck) {
      reason = 'stuck_loop';
    }

    const last = run.transitions[run.transitions.length - 1];
    const outcome = reason ? 'aborted' : this.current === undefined ? 'completed' : 'interrupted';

    return {
      outcome,
      ...(reason ? { reason } : {}),
      iterations: run.iterations,
      ...(this.current !== undefined ? { finalState: this.current } : {}),
      terminalReached: outcome === 'completed' && last?.outcome === 'terminated',
      durationMs: run.durationMs,
      transitions: run.transitions
    };
  }

  private emitEvent<K extends keyof NavigationEngineEvents>(event: K, payload: NavigationEngineEvents[K]): void {
    this.emit(event, payload);
  }
}
