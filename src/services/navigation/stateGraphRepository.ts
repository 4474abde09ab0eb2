/**
 * State Graph Repository
 *
 * Loads and saves state graphs as YAML (or JSON) documents and turns them
 * into state objects. A graph lists image, terminal and recovery states;
 * by default it extends the built-in menu graph, replacing states that share
 * an id.
 */

import fs from 'fs/promises';
import path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import {
  BaseState,
  ImageTransitionState,
  RECOVERY_STATE_ID,
  TerminalState,
  UndefinedRecoveryState,
  type NavigationState
} from '../../models/state';
import { StateGraphError } from '../../types/errors';
import { createServiceLogger, type ServiceLogger } from '../logger';

// ============================================================================
// Schema
// ============================================================================

const pointSchema = z.object({ x: z.number(), y: z.number() });

const baseStateSchema = z.object({
  id: z.string().min(1),
  description: z.string().optional(),
  recoveryState: z.string().min(1).optional()
});

const imageStateSchema = baseStateSchema.extend({
  type: z.literal('image'),
  target: z.string().min(1),
  alternatives: z.array(z.string().min(1)).optional(),
  next: z.string().min(1),
  timeoutMs: z.number().positive().optional(),
  clickOffset: pointSchema.optional(),
  retries: z.number().int().min(1).optional()
});

const terminalStateSchema = baseStateSchema.extend({
  type: z.literal('terminal')
});

const recoveryStateSchema = baseStateSchema.extend({
  type: z.literal('recovery'),
  signatures: z.array(z.object({ template: z.string().min(1), state: z.string().min(1) })).optional(),
  probeTimeoutMs: z.number().positive().optional(),
  safePosition: pointSchema.optional()
});

const stateDefinitionSchema = z.discriminatedUnion('type', [imageStateSchema, terminalStateSchema, recoveryStateSchema]);

const stateGraphSchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  includeDefaults: z.boolean().default(true),
  states: z.array(stateDefinitionSchema)
});

export type StateDefinition = z.infer<typeof stateDefinitionSchema>;
export type StateGraphDocument = z.infer<typeof stateGraphSchema>;

// ============================================================================
// Parsing, validation, building
// ============================================================================

export function parseStateGraph(content: string, source = 'graph'): StateGraphDocument {
  let document: unknown;
  try {
    document = yaml.load(content);
  } catch (error) {
    throw new StateGraphError([`unable to parse: ${error instanceof Error ? error.message : String(error)}`], source);
  }

  const parsed = stateGraphSchema.safeParse(document);
  if (!parsed.success) {
    throw new StateGraphError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      source
    );
  }
  return parsed.data;
}

/**
 * Check ids are unique and every referenced state exists, either in the
 * graph itself or among `knownIds`.
 */
export function validateStateGraph(graph: StateGraphDocument, knownIds: Iterable<string> = []): string[] {
  const errors: string[] = [];
  const declared = new Set<string>();

  graph.states.forEach((state, index) => {
    if (declared.has(state.id)) {
      errors.push(`states.${index}: duplicate state id "${state.id}"`);
    }
    declared.add(state.id);
  });

  const resolvable = new Set([...knownIds, ...declared]);
  const requireState = (where: string, stateId: string) => {
    if (!resolvable.has(stateId)) {
      errors.push(`${where}: unknown state "${stateId}"`);
    }
  };

  graph.states.forEach((state, index) => {
    if (state.recoveryState) {
      requireState(`states.${index}.recoveryState`, state.recoveryState);
    }
    if (state.type === 'image') {
      requireState(`states.${index}.next`, state.next);
    }
    if (state.type === 'recovery') {
      state.signatures?.forEach((signature, i) => requireState(`states.${index}.signatures.${i}.state`, signature.state));
    }
  });

  return errors;
}

/**
 * Build one state. With `logger` (the states' parent logger) the state logs
 * under `<service>.<state id>`.
 */
export function buildState(definition: StateDefinition, logger?: ServiceLogger): NavigationState {
  const common = {
    description: definition.description,
    recoveryStateId: definition.recoveryState,
    logger: logger?.child(definition.id)
  };

  switch (definition.type) {
    case 'image':
      return new ImageTransitionState(definition.id, {
        ...common,
        target: definition.target,
        alternatives: definition.alternatives,
        nextState: definition.next,
        timeoutMs: definition.timeoutMs,
        clickOffset: definition.clickOffset,
        retries: definition.retries
      });
    case 'terminal':
      return new TerminalState(definition.id, common);
    case 'recovery':
      return new UndefinedRecoveryState(definition.id, {
        ...common,
        signatures: definition.signatures?.map(signature => ({
          templateId: signature.template,
          stateId: signature.state
        })),
        probeTimeoutMs: definition.probeTimeoutMs,
        safePosition: definition.safePosition
      });
  }
}

export function buildStatesFromGraph(graph: StateGraphDocument, logger?: ServiceLogger): NavigationState[] {
  return graph.states.map(definition => buildState(definition, logger));
}

/**
 * Describe a state as a graph entry, for export
 */
export function describeState(state: NavigationState): StateDefinition | undefined {
  const base = {
    id: state.id,
    description: state.description,
    ...(state instanceof BaseState && state.recoveryStateId !== RECOVERY_STATE_ID
      ? { recoveryState: state.recoveryStateId }
      : {})
  };

  if (state instanceof ImageTransitionState) {
    return {
      ...base,
      type: 'image',
      target: state.target,
      ...(state.alternatives.length > 0 ? { alternatives: [...state.alternatives] } : {}),
      next: state.nextState,
      ...(state.timeoutMs !== undefined ? { timeoutMs: state.timeoutMs } : {}),
      ...(state.clickOffset ? { clickOffset: { ...state.clickOffset } } : {}),
      ...(state.retries !== undefined ? { retries: state.retries } : {})
    };
  }
  if (state instanceof TerminalState) {
    return { ...base, type: 'terminal' };
  }
  if (state instanceof UndefinedRecoveryState) {
    return {
      ...base,
      type: 'recovery',
      signatures: state.signatures.map(signature => ({ template: signature.templateId, state: signature.stateId })),
      probeTimeoutMs: state.probeTimeoutMs,
      safePosition: { ...state.safePosition }
    };
  }
  return undefined;
}

// ============================================================================
// Repository
// ============================================================================

export interface StateGraphRepositoryConfig {
  /** Base directory for relative graph paths */
  graphsDirectory: string;
  /** States a graph extends when includeDefaults is set */
  defaultStates: (logger?: ServiceLogger) => NavigationState[];
  /** Parent logger of the states built from a graph */
  stateLogger?: ServiceLogger;
}

export class StateGraphRepository {
  private config: StateGraphRepositoryConfig;
  private logger: ServiceLogger;

  constructor(config: Partial<StateGraphRepositoryConfig> = {}, logger: ServiceLogger = createServiceLogger('state-graph')) {
    this.config = {
      graphsDirectory: process.cwd(),
      defaultStates: () => [],
      ...config
    };
    this.logger = logger;
  }

  resolvePath(filePath: string): string {
    return path.resolve(this.config.graphsDirectory, filePath);
  }

  /**
   * Load a graph file and return the states to register, defaults first
   * when the graph extends them.
   */
  async loadGraph(filePath: string): Promise<NavigationState[]> {
    const resolved = this.resolvePath(filePath);

    let content: string;
    try {
      content = await fs.readFile(resolved, 'utf-8');
    } catch (error) {
      throw new StateGraphError([`cannot read file: ${error instanceof Error ? error.message : String(error)}`], resolved);
    }

    const graph = parseStateGraph(content, resolved);
    const stateLogger = this.config.stateLogger;
    const defaults = graph.includeDefaults ? this.config.defaultStates(stateLogger) : [];
    const errors = validateStateGraph(
      graph,
      defaults.map(state => state.id)
    );
    if (errors.length > 0) {
      throw new StateGraphError(errors, resolved);
    }

    const overridden = new Set(graph.states.map(state => state.id));
    const states = [...defaults.filter(state => !overridden.has(state.id)), ...buildStatesFromGraph(graph, stateLogger)];

    this.logger.info('graph_loaded', `Loaded ${graph.states.length} states from ${resolved}`, undefined, {
      file: resolved,
      declared: graph.states.length,
      total: states.length,
      includeDefaults: graph.includeDefaults
    });
    return states;
  }

  /**
   * Write states as a standalone graph document (YAML, or JSON by extension)
   */
  async saveGraph(states: Iterable<NavigationState>, filePath: string, name?: string): Promise<string> {
    const resolved = this.resolvePath(filePath);
    const definitions: StateDefinition[] = [];

    for (const state of states) {
      const definition = describeState(state);
      if (definition) {
        definitions.push(definition);
      } else {
        this.logger.warn('graph_state_skipped', `State ${state.id} has no graph representation`, undefined, {
          stateId: state.id
        });
      }
    }

    const document: StateGraphDocument = {
      ...(name ? { name } : {}),
      includeDefaults: false,
      states: definitions
    };
    const content = resolved.endsWith('.json') ? JSON.stringify(document, null, 2) + '\n' : yaml.dump(document, { lineWidth: 120 });

    await fs.mkdir(path.dirname(resolved), { recursive: true });
    await fs.writeFile(resolved, content, 'utf-8');
    this.logger.info('graph_saved', `Saved ${definitions.length} states to ${resolved}`);
    return resolved;
  }
}
