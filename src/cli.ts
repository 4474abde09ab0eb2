#!/usr/bin/env node

/**
 * Menu Navigator CLI
 *
 * run          navigate from the initial state until the menu graph ends
 * validate     check configuration, template files and the device
 * states       list (or export) the registered states
 * interactive  small REPL around one engine
 */

import readline from 'readline';
import { Command } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import {
  getConfigSummary,
  loadNavigatorConfig,
  resolveLogFile,
  saveNavigatorConfig,
  validateNavigatorConfig,
  type DeviceConfig,
  type NavigatorConfig
} from './config/environment';
import type { NavigationState } from './models/state';
import { createServiceLogger, isLogLevel, StructuredLogger, type ServiceLogger } from './services/logger';
import { buildDefaultStates } from './services/navigation/defaultStates';
import { createNavigator, type Navigator } from './services/navigation/navigator';
import { formatRunResult, formatStatistics } from './services/navigation/report';
import { StateGraphRepository } from './services/navigation/stateGraphRepository';
import { findMissingTemplates } from './services/vision/templateStore';
import { ConfigValidationError, StateGraphError, toError } from './types/errors';
import type { InputInjector, RunResult, ScreenCaptureProvider } from './types/navigation';
import { AdbDevice } from './utils/adb';

interface CommonOptions {
  config?: string;
  graph?: string;
  logLevel?: string;
}

interface RunCommandOptions extends CommonOptions {
  state?: string;
  maxIterations?: string;
  stats: boolean;
}

interface StatesCommandOptions extends CommonOptions {
  export?: string;
}

export type NavigatorDevice = ScreenCaptureProvider & InputInjector & { isConnected(): Promise<boolean> };

export interface ProgramDependencies {
  /** adb-backed device by default */
  createDevice?: (config: DeviceConfig, logger: ServiceLogger) => NavigatorDevice;
}

interface Session {
  config: NavigatorConfig;
  baseLogger: StructuredLogger;
  states: NavigationState[];
  device: NavigatorDevice;
}

const createAdbDevice = (config: DeviceConfig, logger: ServiceLogger): NavigatorDevice =>
  new AdbDevice(config, undefined, logger);

// ============================================================================
// Helpers
// ============================================================================

/**
 * 0 only when the run reached a terminal state
 */
export function exitCodeFor(result: RunResult): number {
  return result.outcome === 'completed' && result.terminalReached ? 0 : 1;
}

export function parseMaxIterations(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigValidationError([`--max-iterations must be a positive integer (got "${value}")`], 'command line');
  }
  return parsed;
}

/**
 * Checks made before navigating: the configuration including its paths,
 * then one screen capture. Throws with every problem found.
 */
export async function preflight(config: NavigatorConfig, device: ScreenCaptureProvider): Promise<void> {
  const errors = validateNavigatorConfig(config, { checkPaths: true });
  try {
    await device.captureScreen();
  } catch (error) {
    errors.push(`screen capture failed: ${toError(error).message}`);
  }
  if (errors.length > 0) {
    throw new ConfigValidationError(errors, 'startup checks');
  }
}

function reportError(error: unknown): void {
  if (error instanceof ConfigValidationError || error instanceof StateGraphError) {
    console.error(chalk.red(error.message.split('\n')[0]));
    error.errors.forEach(item => console.error(chalk.red(`  - ${item}`)));
    return;
  }
  console.error(chalk.red('Error:'), toError(error).message);
}

async function openSession(options: CommonOptions, deps: ProgramDependencies): Promise<Session> {
  const config = await loadNavigatorConfig({ configFile: options.config });

  if (options.logLevel !== undefined) {
    const level = options.logLevel.toLowerCase();
    if (!isLogLevel(level)) {
      throw new ConfigValidationError([`--log-level must be one of debug, info, warn, error (got "${options.logLevel}")`], 'command line');
    }
    config.logging.level = level;
  }

  const baseLogger = new StructuredLogger({
    level: config.logging.level,
    format: config.logging.format,
    filePath: resolveLogFile(config)
  });

  const stateLogger = createServiceLogger('state', baseLogger);
  const states = options.graph
    ? await new StateGraphRepository(
        { defaultStates: buildDefaultStates, stateLogger },
        createServiceLogger('state-graph', baseLogger)
      ).loadGraph(options.graph)
    : buildDefaultStates(stateLogger);

  const device = (deps.createDevice ?? createAdbDevice)(config.device, createServiceLogger('adb-device', baseLogger));
  return { config, baseLogger, states, device };
}

function openNavigator(session: Session): Navigator {
  return createNavigator(session.config, {
    capture: session.device,
    input: session.device,
    logger: session.baseLogger,
    states: session.states
  });
}

async function warnMissingTemplates(session: Session): Promise<string[]> {
  const missing = await findMissingTemplates(session.states, session.config.paths.imagesDir);
  if (missing.length > 0) {
    console.warn(chalk.yellow(`Missing template images in ${session.config.paths.imagesDir}:`));
    missing.forEach(file => console.warn(chalk.yellow(`  - ${file}`)));
  }
  return missing;
}

function statesTable(states: NavigationState[]): string {
  const table = new Table({ head: ['State', 'Description', 'Templates'], style: { head: [], border: [] } });
  for (const state of states) {
    table.push([state.id, state.description, state.getExpectedImages().join(', ') || '-']);
  }
  return table.toString();
}

/**
 * Stop the engine on SIGINT/SIGTERM; returns the function that removes the
 * handlers.
 */
function installSignalHandlers(navigator: Navigator): () => void {
  const onSignal = (signal: NodeJS.Signals) => {
    console.log(chalk.yellow(`\n${signal} received, stopping after the current step`));
    navigator.engine.stop();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
  return () => {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  };
}

// ============================================================================
// Commands
// ============================================================================

async function runCommand(options: RunCommandOptions, deps: ProgramDependencies): Promise<number> {
  const session = await openSession(options, deps);
  const maxIterations = parseMaxIterations(options.maxIterations);
  await preflight(session.config, session.device);
  await warnMissingTemplates(session);

  const navigator = openNavigator(session);
  const removeHandlers = installSignalHandlers(navigator);

  console.log(chalk.blue('Menu navigator'));
  console.log(chalk.gray(JSON.stringify(getConfigSummary(session.config))));

  try {
    const result = await navigator.engine.run({ initialState: options.state, maxIterations });
    console.log(formatRunResult(result));
    if (options.stats) {
      console.log(formatStatistics(navigator.engine.getStatistics()));
    }
    return exitCodeFor(result);
  } finally {
    removeHandlers();
  }
}

async function validateCommand(options: CommonOptions, deps: ProgramDependencies): Promise<number> {
  const session = await openSession(options, deps);
  let problems = 0;

  const configErrors = validateNavigatorConfig(session.config, { checkPaths: true });
  if (configErrors.length > 0) {
    problems += configErrors.length;
    configErrors.forEach(item => console.error(chalk.red(`✗ ${item}`)));
  } else {
    console.log(chalk.green('✓ Configuration is valid'));
  }

  const missing = await warnMissingTemplates(session);
  if (missing.length === 0) {
    console.log(chalk.green(`✓ All ${session.states.length} states have their template images`));
  }

  const { device } = session;
  if (!(await device.isConnected())) {
    problems++;
    console.error(chalk.red(`✗ Device ${session.config.device.serial || '(default)'} is not connected`));
  } else {
    try {
      const frame = await device.captureScreen();
      console.log(chalk.green(`✓ Screen capture works (${frame.width}x${frame.height})`));
    } catch (error) {
      problems++;
      console.error(chalk.red(`✗ ${toError(error).message}`));
    }
  }

  return problems === 0 ? 0 : 1;
}

async function statesCommand(options: StatesCommandOptions, deps: ProgramDependencies): Promise<number> {
  const session = await openSession(options, deps);
  console.log(statesTable(session.states));

  if (options.export) {
    const repository = new StateGraphRepository({}, createServiceLogger('state-graph', session.baseLogger));
    const file = await repository.saveGraph(session.states, options.export);
    console.log(chalk.green(`Graph written to ${file}`));
  }
  return 0;
}

const REPL_HELP = [
  'start [state]   run the navigator (optionally from a given state)',
  'stop            stop the current run',
  'status          show whether a run is in progress',
  'stats           show statistics',
  'states          list registered states',
  'config          show configuration (config save <file> writes it)',
  'help            show this help',
  'quit            exit'
].join('\n');

async function interactiveCommand(options: CommonOptions, deps: ProgramDependencies): Promise<number> {
  const session = await openSession(options, deps);
  await preflight(session.config, session.device);
  await warnMissingTemplates(session);
  const navigator = openNavigator(session);
  const removeHandlers = installSignalHandlers(navigator);
  const { engine } = navigator;

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: 'navigator> ' });
  console.log(chalk.blue('Menu navigator interactive mode'));
  console.log(REPL_HELP);
  rl.prompt();

  const startRun = (initialState?: string) => {
    if (engine.isRunning()) {
      console.log(chalk.yellow('A run is already in progress'));
      return;
    }
    engine
      .run({ initialState })
      .then(result => console.log(`\n${formatRunResult(result)}`))
      .catch(error => reportError(error))
      .finally(() => rl.prompt());
  };

  const handleLine = async (line: string): Promise<boolean> => {
    const [command = '', ...args] = line.trim().split(/\s+/);
    switch (command.toLowerCase()) {
      case '':
        return true;
      case 'start':
        startRun(args[0]);
        return true;
      case 'stop':
        console.log(engine.stop() ? 'Stopping...' : 'Nothing is running');
        return true;
      case 'status':
        console.log(engine.isRunning() ? `Running (current: ${engine.currentState ?? '-'})` : 'Idle');
        return true;
      case 'stats':
        console.log(formatStatistics(engine.getStatistics()));
        return true;
      case 'states':
        console.log(statesTable(engine.listStates()));
        return true;
      case 'config':
        if (args[0] === 'save') {
          console.log(chalk.green(`Saved to ${await saveNavigatorConfig(session.config, args[1])}`));
        } else {
          console.log(JSON.stringify(session.config, null, 2));
        }
        return true;
      case 'help':
        console.log(REPL_HELP);
        return true;
      case 'quit':
      case 'exit':
        return false;
      default:
        console.log(chalk.yellow(`Unknown command "${command}", type help`));
        return true;
    }
  };

  return new Promise(resolve => {
    rl.on('line', line => {
      handleLine(line)
        .then(keepGoing => {
          if (keepGoing) {
            rl.prompt();
          } else {
            rl.close();
          }
        })
        .catch(error => {
          reportError(error);
          rl.prompt();
        });
    });

    rl.on('close', () => {
      engine.stop();
      removeHandlers();
      resolve(0);
    });
  });
}

// ============================================================================
// Program
// ============================================================================

function withExitCode<T>(
  action: (options: T, deps: ProgramDependencies) => Promise<number>,
  deps: ProgramDependencies
): (options: T) => Promise<void> {
  return async options => {
    try {
      process.exitCode = await action(options, deps);
    } catch (error) {
      reportError(error);
      process.exitCode = 1;
    }
  };
}

export function buildProgram(deps: ProgramDependencies = {}): Command {
  const program = new Command();

  program
    .name('menu-navigator')
    .description('Navigate game menus by matching template images on screen')
    .version('1.0.0');

  program
    .command('run')
    .description('Navigate from the initial state until the graph ends')
    .option('-c, --config <file>', 'Configuration file (YAML or JSON)')
    .option('-s, --state <id>', 'Initial state')
    .option('-g, --graph <file>', 'State graph file')
    .option('-m, --max-iterations <n>', 'Maximum state executions')
    .option('--stats', 'Print statistics after the run', false)
    .option('-l, --log-level <level>', 'debug, info, warn or error')
    .action(withExitCode<RunCommandOptions>(runCommand, deps));

  program
    .command('validate')
    .description('Validate configuration, template images and the device')
    .option('-c, --config <file>', 'Configuration file (YAML or JSON)')
    .option('-g, --graph <file>', 'State graph file')
    .option('-l, --log-level <level>', 'debug, info, warn or error')
    .action(withExitCode<CommonOptions>(validateCommand, deps));

  program
    .command('states')
    .description('List the registered states')
    .option('-c, --config <file>', 'Configuration file (YAML or JSON)')
    .option('-g, --graph <file>', 'State graph file')
    .option('-e, --export <file>', 'Write the states as a graph file')
    .option('-l, --log-level <level>', 'debug, info, warn or error')
    .action(withExitCode<StatesCommandOptions>(statesCommand, deps));

  program
    .command('interactive')
    .description('Interactive shell around the navigator')
    .option('-c, --config <file>', 'Configuration file (YAML or JSON)')
    .option('-g, --graph <file>', 'State graph file')
    .option('-l, --log-level <level>', 'debug, info, warn or error')
    .action(withExitCode<CommonOptions>(interactiveCommand, deps));

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch(error => {
      console.error(chalk.red('Unhandled error:'), toError(error).message);
      process.exit(1);
    });
}
