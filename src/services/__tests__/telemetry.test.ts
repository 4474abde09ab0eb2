/**
 * Navigation Telemetry Tests
 */

import { TerminalState, type NavigationState } from '../../models/state';
import { createTransition } from '../../models/transition';
import { NavigationTelemetry, type RunStateView } from '../navigation/telemetry';

describe('NavigationTelemetry', () => {
  let telemetry: NavigationTelemetry;
  let registry: Map<string, NavigationState>;
  let idle: RunStateView;

  beforeEach(() => {
    telemetry = new NavigationTelemetry();
    registry = new Map<string, NavigationState>([
      ['a', new TerminalState('a', { description: 'First' })],
      ['b', new TerminalState('b')]
    ]);
    idle = { visited: new Set<string>(), repeatCount: 0, running: false };
  });

  it('reports a zero success rate without transitions', () => {
    const stats = telemetry.snapshot(registry, idle);

    expect(stats.totalStates).toBe(2);
    expect(stats.totalTransitions).toBe(0);
    expect(stats.successRate).toBe(0);
  });

  it('records into the state stats and the global history', () => {
    const state = registry.get('a');
    telemetry.record(state, createTransition({ fromState: 'a', toState: 'b', durationMs: 40, outcome: 'success' }));
    telemetry.record(state, createTransition({ fromState: 'a', durationMs: 20, outcome: 'failed' }));
    telemetry.record(undefined, createTransition({ fromState: 'ghost', durationMs: 0, outcome: 'failed' }));

    const stats = telemetry.snapshot(registry, idle);

    expect(telemetry.history).toHaveLength(3);
    expect(stats.totalTransitions).toBe(3);
    expect(stats.successfulTransitions).toBe(1);
    expect(stats.successRate).toBeCloseTo(1 / 3);
    expect(stats.stateDetails.a).toMatchObject({
      description: 'First',
      executionCount: 2,
      successCount: 1,
      failureCount: 1,
      totalTimeMs: 60,
      averageTimeMs: 30
    });
    expect(stats.stateDetails.a.lastTransition?.outcome).toBe('failed');
    expect(stats.stateDetails.b.executionCount).toBe(0);
    expect(stats.stateDetails.b.lastTransition).toBeUndefined();
  });

  it('copies the run state into the snapshot', () => {
    const visited = new Set(['a', 'b']);
    const stats = telemetry.snapshot(registry, { current: 'b', visited, repeatCount: 2, running: true });

    visited.add('c');

    expect(stats.currentState).toBe('b');
    expect(stats.visitedStates).toEqual(['a', 'b']);
    expect(stats.repeatCount).toBe(2);
    expect(stats.running).toBe(true);
  });

  it('summarises the last run without its transitions', () => {
    const transition = createTransition({ fromState: 'a', durationMs: 5, outcome: 'terminated' });
    const stats = telemetry.snapshot(registry, {
      ...idle,
      lastRun: {
        outcome: 'completed',
        iterations: 1,
        terminalReached: true,
        durationMs: 5,
        transitions: [transition]
      }
    });

    expect(stats.lastRun).toEqual({
      outcome: 'completed',
      iterations: 1,
      terminalReached: true,
      durationMs: 5,
      transitionCount: 1
    });
  });

  it('clears the history and every state', () => {
    telemetry.record(registry.get('a'), createTransition({ fromState: 'a', durationMs: 5, outcome: 'success' }));

    telemetry.clear(registry.values());

    expect(telemetry.history).toHaveLength(0);
    expect(telemetry.snapshot(registry, idle).stateDetails.a.executionCount).toBe(0);
  });
});
