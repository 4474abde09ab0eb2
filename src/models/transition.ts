/**
 * Transition & StateStats Models
 *
 * A Transition records one state execution. Transitions are immutable and
 * appended, never edited; StateStats aggregates the transitions of one state.
 */

import { v4 as uuidv4 } from 'uuid';

// ============================================================================
// Transition
// ============================================================================

export type TransitionOutcome = 'success' | 'failed' | 'retry' | 'terminated';

export const SUCCESSFUL_OUTCOMES: readonly TransitionOutcome[] = ['success', 'retry', 'terminated'];

export interface Transition {
  readonly id: string;
  readonly fromState: string;
  /** Absent when the run ends here (terminal state or failure with no successor) */
  readonly toState?: string;
  /** ISO timestamp of execution start */
  readonly timestamp: string;
  readonly durationMs: number;
  readonly outcome: TransitionOutcome;
  readonly errorDetail?: string;
}

export interface CreateTransitionRequest {
  fromState: string;
  toState?: string;
  timestamp?: string;
  durationMs: number;
  outcome: TransitionOutcome;
  errorDetail?: string;
}

export function createTransition(request: CreateTransitionRequest): Transition {
  const transition: Transition = {
    id: uuidv4(),
    fromState: request.fromState,
    ...(request.toState !== undefined ? { toState: request.toState } : {}),
    timestamp: request.timestamp ?? new Date().toISOString(),
    durationMs: Math.max(0, request.durationMs),
    outcome: request.outcome,
    ...(request.errorDetail !== undefined ? { errorDetail: request.errorDetail } : {})
  };
  return Object.freeze(transition);
}

export function isSuccessfulOutcome(outcome: TransitionOutcome): boolean {
  return SUCCESSFUL_OUTCOMES.includes(outcome);
}

// ============================================================================
// StateStats
// ============================================================================

export interface StateStatsSnapshot {
  executionCount: number;
  successCount: number;
  failureCount: number;
  totalTimeMs: number;
  averageTimeMs: number;
  transitions: Transition[];
}

/**
 * Per-state counters. Mutated only through `record`, which the telemetry
 * aggregator calls once per execution.
 */
export class StateStats {
  private executions = 0;
  private successes = 0;
  private failures = 0;
  private totalTime = 0;
  private readonly history: Transition[] = [];

  get executionCount(): number {
    return this.executions;
  }

  get successCount(): number {
    return this.successes;
  }

  get failureCount(): number {
    return this.failures;
  }

  get totalTimeMs(): number {
    return this.totalTime;
  }

  get averageTimeMs(): number {
    return this.executions === 0 ? 0 : this.totalTime / this.executions;
  }

  get transitions(): readonly Transition[] {
    return this.history;
  }

  record(transition: Transition): void {
    this.executions++;
    this.totalTime += transition.durationMs;
    if (isSuccessfulOutcome(transition.outcome)) {
      this.successes++;
    } else {
      this.failures++;
    }
    this.history.push(transition);
  }

  clear(): void {
    this.executions = 0;
    this.successes = 0;
    this.failures = 0;
    this.totalTime = 0;
    this.history.length = 0;
  }

  snapshot(): StateStatsSnapshot {
    return {
      executionCount: this.executions,
      successCount: this.successes,
      failureCount: this.failures,
      totalTimeMs: this.totalTime,
      averageTimeMs: this.averageTimeMs,
      transitions: [...this.history]
    };
  }
}
