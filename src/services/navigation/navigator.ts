/**
 * Navigator Assembly
 *
 * Wires configuration, collaborators and loggers into a ready engine with
 * its probe and click orchestrator.
 */

import type { NavigatorConfig } from '../../config/environment';
import type { NavigationState } from '../../models/state';
import type { InputInjector, ScreenCaptureProvider, TemplateLoader, TemplateScorer } from '../../types/navigation';
import { systemClock, type Clock } from '../../utils/clock';
import { createServiceLogger, logger as defaultLogger, type StructuredLogger } from '../logger';
import { ClickOrchestrator } from '../vision/clickOrchestrator';
import { MatchProbe } from '../vision/matchProbe';
import { NccTemplateScorer } from '../vision/templateScorer';
import { TemplateStore } from '../vision/templateStore';
import { buildDefaultStates } from './defaultStates';
import { NavigationEngine } from './navigationEngine';

export interface NavigatorDependencies {
  capture: ScreenCaptureProvider;
  input: InputInjector;
  scorer?: TemplateScorer;
  loader?: TemplateLoader;
  clock?: Clock;
  logger?: StructuredLogger;
  /** States to register; the built-in menu graph, logging under `state.<id>`, when omitted */
  states?: NavigationState[];
}

export interface Navigator {
  config: NavigatorConfig;
  engine: NavigationEngine;
  probe: MatchProbe;
  orchestrator: ClickOrchestrator;
  loader: TemplateLoader;
}

export function createNavigator(config: NavigatorConfig, deps: NavigatorDependencies): Navigator {
  const base = deps.logger ?? defaultLogger;
  const clock = deps.clock ?? systemClock;
  const loader = deps.loader ?? new TemplateStore(config.paths.imagesDir, createServiceLogger('template-store', base));
  const scorer = deps.scorer ?? new NccTemplateScorer({ pyramidFactor: config.vision.pyramidFactor });

  const probe = new MatchProbe({
    capture: deps.capture,
    scorer,
    loader,
    vision: config.vision,
    clock,
    logger: createServiceLogger('match-probe', base)
  });

  const orchestrator = new ClickOrchestrator({
    probe,
    input: deps.input,
    vision: config.vision,
    fallbackKey: config.stateMachine.fallbackKey,
    clock,
    logger: createServiceLogger('click-orchestrator', base)
  });

  const engine = new NavigationEngine({
    config,
    orchestrator,
    probe,
    input: deps.input,
    clock,
    logger: createServiceLogger('engine', base)
  });
  engine.registerAll(deps.states ?? buildDefaultStates(createServiceLogger('state', base)));

  return { config, engine, probe, orchestrator, loader };
}
