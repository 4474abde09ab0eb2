/**
 * Console rendering of run results and statistics snapshots
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { RunResult } from '../../types/navigation';
import type { NavigationStatistics } from './telemetry';

const plainStyle = { head: [], border: [] };

export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

export function formatStatistics(stats: NavigationStatistics): string {
  const summary = new Table({ head: ['Metric', 'Value'], style: plainStyle });
  summary.push(
    ['States', String(stats.totalStates)],
    ['Transitions', String(stats.totalTransitions)],
    ['Successful', String(stats.successfulTransitions)],
    ['Success rate', formatPercent(stats.successRate)],
    ['Current state', stats.currentState ?? '-'],
    ['Visited', stats.visitedStates.length > 0 ? stats.visitedStates.join(', ') : '-'],
    ['Repeat count', String(stats.repeatCount)],
    ['Running', stats.running ? 'yes' : 'no']
  );

  const states = new Table({
    head: ['State', 'Runs', 'OK', 'Failed', 'Avg ms'],
    style: plainStyle
  });
  for (const [id, detail] of Object.entries(stats.stateDetails)) {
    states.push([
      id,
      String(detail.executionCount),
      String(detail.successCount),
      String(detail.failureCount),
      detail.averageTimeMs.toFixed(0)
    ]);
  }

  return [chalk.blue('Navigation statistics'), summary.toString(), chalk.blue('States'), states.toString()].join('\n');
}

export function formatRunResult(result: RunResult): string {
  const headline =
    result.outcome === 'completed' && result.terminalReached
      ? chalk.green('Navigation completed')
      : result.outcome === 'completed'
        ? chalk.yellow('Navigation ended without reaching a terminal state')
        : result.outcome === 'aborted'
          ? chalk.red(`Navigation aborted (${result.reason ?? 'unknown'})`)
          : chalk.yellow('Navigation interrupted: iteration budget exhausted');

  const table = new Table({ head: ['From', 'To', 'Outcome', 'ms'], style: plainStyle });
  for (const transition of result.transitions) {
    table.push([
      transition.fromState,
      transition.toState ?? '-',
      transition.errorDetail ? `${transition.outcome}: ${transition.errorDetail}` : transition.outcome,
      String(transition.durationMs)
    ]);
  }

  const details = [
    `iterations: ${result.iterations}`,
    `duration: ${result.durationMs}ms`,
    ...(result.finalState ? [`stopped at: ${result.finalState}`] : [])
  ];

  return [headline, chalk.gray(details.join(', ')), table.toString()].join('\n');
}
