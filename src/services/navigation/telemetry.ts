/**
 * Navigation Telemetry
 *
 * Records every transition (state stats first, then the global history) and
 * produces statistics snapshots. Snapshots are copies; reading them never
 * changes the recorded data.
 */

import type { NavigationState } from '../../models/state';
import { isSuccessfulOutcome, type Transition } from '../../models/transition';
import type { RunResult } from '../../types/navigation';

export interface StateDetail {
  description: string;
  executionCount: number;
  successCount: number;
  failureCount: number;
  totalTimeMs: number;
  averageTimeMs: number;
  expectedImages: string[];
  lastTransition?: Transition;
}

export type RunSummary = Omit<RunResult, 'transitions'> & { transitionCount: number };

export interface NavigationStatistics {
  totalStates: number;
  totalTransitions: number;
  successfulTransitions: number;
  successRate: number;
  currentState?: string;
  visitedStates: string[];
  repeatCount: number;
  running: boolean;
  lastRun?: RunSummary;
  stateDetails: Record<string, StateDetail>;
}

/**
 * Engine run state as seen by the telemetry snapshot
 */
export interface RunStateView {
  current?: string;
  visited: ReadonlySet<string>;
  repeatCount: number;
  running: boolean;
  lastRun?: RunResult;
}

export class NavigationTelemetry {
  private readonly transitions: Transition[] = [];

  get history(): readonly Transition[] {
    return this.transitions;
  }

  /**
   * Append a transition to the executing state's stats (when the state is
   * known) and to the global history.
   */
  record(state: NavigationState | undefined, transition: Transition): void {
    state?.stats.record(transition);
    this.transitions.push(transition);
  }

  snapshot(registry: ReadonlyMap<string, NavigationState>, run: RunStateView): NavigationStatistics {
    const successfulTransitions = this.transitions.filter(t => isSuccessfulOutcome(t.outcome)).length;
    const totalTransitions = this.transitions.length;

    const stateDetails: Record<string, StateDetail> = {};
    for (const [id, state] of registry) {
      const stats = state.stats.snapshot();
      stateDetails[id] = {
        description: state.description,
        executionCount: stats.executionCount,
        successCount: stats.successCount,
        failureCount: stats.failureCount,
        totalTimeMs: stats.totalTimeMs,
        averageTimeMs: stats.averageTimeMs,
        expectedImages: state.getExpectedImages(),
        ...(stats.transitions.length > 0 ? { lastTransition: stats.transitions[stats.transitions.length - 1] } : {})
      };
    }

    let lastRun: RunSummary | undefined;
    if (run.lastRun) {
      const { transitions, ...summary } = run.lastRun;
      lastRun = { ...summary, transitionCount: transitions.length };
    }

    return {
      totalStates: registry.size,
      totalTransitions,
      successfulTransitions,
      successRate: totalTransitions === 0 ? 0 : successfulTransitions / totalTransitions,
      currentState: run.current,
      visitedStates: [...run.visited],
      repeatCount: run.repeatCount,
      running: run.running,
      lastRun,
      stateDetails
    };
  }

  /**
   * Empty the global history and the stats of every given state
   */
  clear(states: Iterable<NavigationState>): void {
    this.transitions.length = 0;
    for (const state of states) {
      state.stats.clear();
    }
  }
}
