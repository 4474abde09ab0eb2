/**
 * Navigator Configuration
 *
 * Defaults, configuration files (YAML or JSON), environment overrides and
 * itemised validation for every tunable the navigator consumes. Invalid
 * values are reported, never silently corrected.
 */

import { existsSync, promises as fs } from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigValidationError } from '../types/errors';
import { LOG_LEVELS, isLogFormat, isLogLevel, type LogFormat, type LogLevel } from '../services/logger';

// =============================================================================
// TYPE DEFINITIONS
// =============================================================================

/**
 * Template matching and clicking
 */
export interface VisionConfig {
  /** Minimum confidence for a match (0-1, inclusive) */
  threshold: number;
  /** How long a single probe keeps polling */
  timeoutMs: number;
  /** Pause between polls */
  checkIntervalMs: number;
  /** Find-and-click attempts */
  retries: number;
  delayBetweenRetriesMs: number;
  /** Pointer travel time before a click */
  clickDurationMs: number;
  postClickDelayMs: number;
  /** Coarse-to-fine downsampling factor for the scorer (1 disables) */
  pyramidFactor: number;
}

export interface StateMachineConfig {
  initialState: string;
  /** Consecutive revisits before the fallback-key nudge */
  maxStopCount: number;
  /** Consecutive revisits before the run is aborted; must exceed maxStopCount */
  breakCount: number;
  fallbackKey: string;
  stateTransitionDelayMs: number;
  maxIterations: number;
  /** Pause after a stuck-loop nudge */
  nudgePauseMs: number;
  /** Pause after the recovery state presses the fallback key */
  recoveryPauseMs: number;
}

export interface PathConfig {
  imagesDir: string;
  logsDir: string;
  configFile: string;
}

export interface LoggingConfig {
  level: LogLevel;
  format: LogFormat;
  file?: string;
}

export interface DeviceConfig {
  /** adb device serial; empty selects the only attached device */
  serial: string;
  adbPath: string;
  commandTimeoutMs: number;
}

export interface NavigatorConfig {
  vision: VisionConfig;
  stateMachine: StateMachineConfig;
  paths: PathConfig;
  logging: LoggingConfig;
  device: DeviceConfig;
}

// =============================================================================
// DEFAULTS
// =============================================================================

export const DEFAULT_CONFIG_FILE = 'navigator.config.yaml';

export const defaultNavigatorConfig: NavigatorConfig = {
  vision: {
    threshold: 0.8,
    timeoutMs: 5000,
    checkIntervalMs: 500,
    retries: 3,
    delayBetweenRetriesMs: 2000,
    clickDurationMs: 200,
    postClickDelayMs: 1000,
    pyramidFactor: 4
  },
  stateMachine: {
    initialState: 'undefined_menu',
    maxStopCount: 5,
    breakCount: 8,
    fallbackKey: 'escape',
    stateTransitionDelayMs: 100,
    maxIterations: 100,
    nudgePauseMs: 2000,
    recoveryPauseMs: 1000
  },
  paths: {
    imagesDir: 'images',
    logsDir: 'logs',
    configFile: DEFAULT_CONFIG_FILE
  },
  logging: {
    level: 'info',
    format: 'text'
  },
  device: {
    serial: 'emulator-5554',
    adbPath: 'adb',
    commandTimeoutMs: 10000
  }
};

/**
 * Fresh copy of the defaults; sections are never shared between configs
 */
export function createDefaultConfig(): NavigatorConfig {
  return {
    vision: { ...defaultNavigatorConfig.vision },
    stateMachine: { ...defaultNavigatorConfig.stateMachine },
    paths: { ...defaultNavigatorConfig.paths },
    logging: { ...defaultNavigatorConfig.logging },
    device: { ...defaultNavigatorConfig.device }
  };
}

// =============================================================================
// FILE SCHEMA
// =============================================================================

const configFileSchema = z.object({
  vision: z.object({
    threshold: z.number(),
    timeoutMs: z.number(),
    checkIntervalMs: z.number(),
    retries: z.number(),
    delayBetweenRetriesMs: z.number(),
    clickDurationMs: z.number(),
    postClickDelayMs: z.number(),
    pyramidFactor: z.number()
  }).partial().optional(),
  stateMachine: z.object({
    initialState: z.string(),
    maxStopCount: z.number(),
    breakCount: z.number(),
    fallbackKey: z.string(),
    stateTransitionDelayMs: z.number(),
    maxIterations: z.number(),
    nudgePauseMs: z.number(),
    recoveryPauseMs: z.number()
  }).partial().optional(),
  paths: z.object({
    imagesDir: z.string(),
    logsDir: z.string()
  }).partial().optional(),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
    format: z.enum(['json', 'text']),
    file: z.string()
  }).partial().optional(),
  device: z.object({
    serial: z.string(),
    adbPath: z.string(),
    commandTimeoutMs: z.number()
  }).partial().optional()
});

export type NavigatorConfigFile = z.infer<typeof configFileSchema>;

/**
 * Parse configuration file text (YAML, which also accepts JSON)
 */
export function parseConfigDocument(content: string, source = 'config'): NavigatorConfigFile {
  let document: unknown;
  try {
    document = yaml.load(content);
  } catch (error) {
    throw new ConfigValidationError([`unable to parse: ${error instanceof Error ? error.message : String(error)}`], source);
  }

  if (document === undefined || document === null) {
    return {};
  }

  const parsed = configFileSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigValidationError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      source
    );
  }

  return parsed.data;
}

/**
 * Overlay a parsed configuration file onto a base configuration
 */
export function mergeConfig(base: NavigatorConfig, overrides: NavigatorConfigFile): NavigatorConfig {
  return {
    vision: { ...base.vision, ...overrides.vision },
    stateMachine: { ...base.stateMachine, ...overrides.stateMachine },
    paths: { ...base.paths, ...overrides.paths },
    logging: { ...base.logging, ...overrides.logging },
    device: { ...base.device, ...overrides.device }
  };
}

// =============================================================================
// ENVIRONMENT OVERRIDES
// =============================================================================

type Env = Record<string, string | undefined>;

function readNumber(env: Env, name: string, errors: string[]): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (Number.isNaN(value)) {
    errors.push(`${name} must be a number (got "${raw}")`);
    return undefined;
  }
  return value;
}

function readString(env: Env, name: string): string | undefined {
  const raw = env[name];
  return raw === undefined || raw.trim() === '' ? undefined : raw.trim();
}

function definedOnly<T extends object>(values: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key in values) {
    if (values[key] !== undefined) {
      result[key] = values[key];
    }
  }
  return result;
}

/**
 * Apply NAV_* / LOG_* / ADB environment variables on top of a configuration
 */
export function applyEnvironmentOverrides(config: NavigatorConfig, env: Env = process.env): NavigatorConfig {
  const errors: string[] = [];

  const level = readString(env, 'LOG_LEVEL')?.toLowerCase();
  const format = readString(env, 'LOG_FORMAT')?.toLowerCase();
  if (level !== undefined && !isLogLevel(level)) {
    errors.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')} (got "${level}")`);
  }
  if (format !== undefined && !isLogFormat(format)) {
    errors.push(`LOG_FORMAT must be json or text (got "${format}")`);
  }

  const overrides: NavigatorConfigFile = {
    vision: definedOnly({
      threshold: readNumber(env, 'NAV_THRESHOLD', errors),
      timeoutMs: readNumber(env, 'NAV_TIMEOUT_MS', errors),
      checkIntervalMs: readNumber(env, 'NAV_CHECK_INTERVAL_MS', errors),
      retries: readNumber(env, 'NAV_RETRIES', errors)
    }),
    stateMachine: definedOnly({
      initialState: readString(env, 'NAV_INITIAL_STATE'),
      maxStopCount: readNumber(env, 'NAV_MAX_STOP_COUNT', errors),
      breakCount: readNumber(env, 'NAV_BREAK_COUNT', errors),
      fallbackKey: readString(env, 'NAV_FALLBACK_KEY')
    }),
    paths: definedOnly({
      imagesDir: readString(env, 'NAV_IMAGES_DIR')
    }),
    logging: definedOnly({
      level: isLogLevel(level) ? level : undefined,
      format: isLogFormat(format) ? format : undefined,
      file: readString(env, 'LOG_FILE')
    }),
    device: definedOnly({
      serial: readString(env, 'ANDROID_SERIAL'),
      adbPath: readString(env, 'ADB_PATH')
    })
  };

  if (errors.length > 0) {
    throw new ConfigValidationError(errors, 'environment');
  }

  return mergeConfig(config, overrides);
}

// =============================================================================
// VALIDATION
// =============================================================================

export interface ValidationOptions {
  /** Also require paths.imagesDir to exist on disk */
  checkPaths?: boolean;
}

function requireInteger(errors: string[], name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    errors.push(`${name} must be an integer >= ${min} (got ${value})`);
  }
}

function requireNonNegative(errors: string[], name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    errors.push(`${name} must be >= 0 (got ${value})`);
  }
}

function requirePositive(errors: string[], name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    errors.push(`${name} must be > 0 (got ${value})`);
  }
}

/**
 * Validate a configuration and return every problem found
 */
export function validateNavigatorConfig(config: NavigatorConfig, options: ValidationOptions = {}): string[] {
  const errors: string[] = [];
  const { vision, stateMachine, paths, device } = config;

  if (!Number.isFinite(vision.threshold) || vision.threshold < 0 || vision.threshold > 1) {
    errors.push(`vision.threshold must be between 0 and 1 (got ${vision.threshold})`);
  }
  requirePositive(errors, 'vision.timeoutMs', vision.timeoutMs);
  requirePositive(errors, 'vision.checkIntervalMs', vision.checkIntervalMs);
  requireInteger(errors, 'vision.retries', vision.retries, 1);
  requireNonNegative(errors, 'vision.delayBetweenRetriesMs', vision.delayBetweenRetriesMs);
  requireNonNegative(errors, 'vision.clickDurationMs', vision.clickDurationMs);
  requireNonNegative(errors, 'vision.postClickDelayMs', vision.postClickDelayMs);
  requireInteger(errors, 'vision.pyramidFactor', vision.pyramidFactor, 1);

  requireInteger(errors, 'stateMachine.maxStopCount', stateMachine.maxStopCount, 1);
  requireInteger(errors, 'stateMachine.breakCount', stateMachine.breakCount, 1);
  if (stateMachine.breakCount <= stateMachine.maxStopCount) {
    errors.push(
      `stateMachine.breakCount (${stateMachine.breakCount}) must be greater than stateMachine.maxStopCount (${stateMachine.maxStopCount})`
    );
  }
  requireInteger(errors, 'stateMachine.maxIterations', stateMachine.maxIterations, 1);
  requireNonNegative(errors, 'stateMachine.stateTransitionDelayMs', stateMachine.stateTransitionDelayMs);
  requireNonNegative(errors, 'stateMachine.nudgePauseMs', stateMachine.nudgePauseMs);
  requireNonNegative(errors, 'stateMachine.recoveryPauseMs', stateMachine.recoveryPauseMs);
  if (!stateMachine.initialState.trim()) {
    errors.push('stateMachine.initialState must not be empty');
  }
  if (!stateMachine.fallbackKey.trim()) {
    errors.push('stateMachine.fallbackKey must not be empty');
  }

  if (!paths.imagesDir.trim()) {
    errors.push('paths.imagesDir must not be empty');
  } else if (options.checkPaths && !existsSync(path.resolve(paths.imagesDir))) {
    errors.push(`paths.imagesDir does not exist: ${path.resolve(paths.imagesDir)}`);
  }

  if (!device.adbPath.trim()) {
    errors.push('device.adbPath must not be empty');
  }
  requirePositive(errors, 'device.commandTimeoutMs', device.commandTimeoutMs);

  return errors;
}

export function assertValidConfig(config: NavigatorConfig, options: ValidationOptions = {}): void {
  const errors = validateNavigatorConfig(config, options);
  if (errors.length > 0) {
    throw new ConfigValidationError(errors);
  }
}

// =============================================================================
// LOAD / SAVE
// =============================================================================

export interface LoadConfigOptions {
  /** Explicit configuration file; must exist when given */
  configFile?: string;
  env?: Env;
  /** Validation options applied after loading */
  validation?: ValidationOptions;
}

/**
 * Load defaults, then the configuration file (explicit, or the default file
 * when present), then environment overrides; validate the result.
 */
export async function loadNavigatorConfig(options: LoadConfigOptions = {}): Promise<NavigatorConfig> {
  const configFile = options.configFile ?? DEFAULT_CONFIG_FILE;
  const resolved = path.resolve(configFile);
  let config = createDefaultConfig();

  if (existsSync(resolved)) {
    const content = await fs.readFile(resolved, 'utf-8');
    config = mergeConfig(config, parseConfigDocument(content, resolved));
  } else if (options.configFile) {
    throw new ConfigValidationError([`configuration file not found: ${resolved}`], resolved);
  }

  config.paths.configFile = configFile;
  config = applyEnvironmentOverrides(config, options.env ?? process.env);
  assertValidConfig(config, options.validation);
  return config;
}

/**
 * Write a configuration as YAML, or as JSON when the file name ends in .json
 */
export async function saveNavigatorConfig(config: NavigatorConfig, filePath: string = config.paths.configFile): Promise<string> {
  const resolved = path.resolve(filePath);
  const { configFile: _configFile, ...paths } = config.paths;
  const document = { ...config, paths };
  const content = resolved.endsWith('.json')
    ? JSON.stringify(document, null, 2) + '\n'
    : yaml.dump(document, { lineWidth: 120 });

  await fs.mkdir(path.dirname(resolved), { recursive: true });
  await fs.writeFile(resolved, content, 'utf-8');
  return resolved;
}

export const DEFAULT_LOG_FILE_NAME = 'navigator.log';

/**
 * Log file for a configuration: logging.file when set, otherwise
 * navigator.log inside paths.logsDir. An empty logsDir disables the default.
 */
export function resolveLogFile(config: NavigatorConfig): string | undefined {
  if (config.logging.file) {
    return config.logging.file;
  }
  return config.paths.logsDir.trim() ? path.join(config.paths.logsDir, DEFAULT_LOG_FILE_NAME) : undefined;
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: NavigatorConfig): Record<string, unknown> {
  return {
    configFile: config.paths.configFile,
    imagesDir: config.paths.imagesDir,
    initialState: config.stateMachine.initialState,
    threshold: config.vision.threshold,
    timeoutMs: config.vision.timeoutMs,
    retries: config.vision.retries,
    maxStopCount: config.stateMachine.maxStopCount,
    breakCount: config.stateMachine.breakCount,
    fallbackKey: config.stateMachine.fallbackKey,
    device: config.device.serial || '(default)',
    logFile: resolveLogFile(config) ?? '(none)'
  };
}
