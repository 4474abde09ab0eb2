/**
 * Navigator Error Types
 *
 * Error hierarchy for the menu navigator. Expected perception failures are
 * reported as values (MatchResult, Transition outcomes); these classes are
 * reserved for configuration problems, collaborator faults and misuse of the
 * engine API.
 */

export class NavigatorError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'NavigatorError';
  }
}

/**
 * Raised when configuration validation fails. Carries every problem found,
 * not only the first one.
 */
export class ConfigValidationError extends NavigatorError {
  constructor(public readonly errors: string[], public readonly source?: string) {
    super(
      `Invalid configuration${source ? ` (${source})` : ''}:\n${errors.map(e => `  - ${e}`).join('\n')}`,
      'CONFIG_INVALID',
      { errors, source }
    );
    this.name = 'ConfigValidationError';
  }
}

export class TemplateLoadError extends NavigatorError {
  constructor(templateId: string, filePath: string, cause?: string) {
    super(`Unable to load template ${templateId} from ${filePath}${cause ? `: ${cause}` : ''}`, 'TEMPLATE_LOAD_FAILED', {
      templateId,
      filePath,
      cause
    });
    this.name = 'TemplateLoadError';
  }
}

export class CaptureError extends NavigatorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CAPTURE_FAILED', details);
    this.name = 'CaptureError';
  }
}

export class InjectionError extends NavigatorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INJECTION_FAILED', details);
    this.name = 'InjectionError';
  }
}

export class EngineBusyError extends NavigatorError {
  constructor() {
    super('Navigation engine is already running', 'ENGINE_BUSY');
    this.name = 'EngineBusyError';
  }
}

export class RegistryLockedError extends NavigatorError {
  constructor(operation: 'register' | 'unregister', stateId: string) {
    super(`Cannot ${operation} state ${stateId} while a run is in progress`, 'REGISTRY_LOCKED', {
      operation,
      stateId
    });
    this.name = 'RegistryLockedError';
  }
}

export class StateEntryRefusedError extends NavigatorError {
  constructor(stateId: string, previousStateId: string | undefined) {
    super(`State ${stateId} refused entry from ${previousStateId ?? 'START'}`, 'STATE_ENTRY_REFUSED', {
      stateId,
      previousStateId
    });
    this.name = 'StateEntryRefusedError';
  }
}

export class StateGraphError extends NavigatorError {
  constructor(public readonly errors: string[], source?: string) {
    super(
      `Invalid state graph${source ? ` (${source})` : ''}:\n${errors.map(e => `  - ${e}`).join('\n')}`,
      'STATE_GRAPH_INVALID',
      { errors, source }
    );
    this.name = 'StateGraphError';
  }
}

/**
 * Normalise an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
