/**
 * Built-in menu graph: from the start menu down to a running level, with the
 * recovery state as the entry point.
 */

import type { NavigationState } from '../../models/state';
import type { ServiceLogger } from '../logger';
import { buildStatesFromGraph, type StateGraphDocument } from './stateGraphRepository';

export const DEFAULT_STATE_GRAPH: StateGraphDocument = {
  name: 'menu',
  description: 'Start menu to level play',
  includeDefaults: false,
  states: [
    {
      id: 'undefined_menu',
      type: 'recovery',
      description: 'Unknown screen, locating a known menu',
      signatures: [
        { template: 'btn_solo.png', state: 'start_menu' },
        { template: 'btn_train.png', state: 'solo_menu' },
        { template: 'train_menu.png', state: 'train_menu' }
      ]
    },
    {
      id: 'start_menu',
      type: 'image',
      description: 'Start menu',
      target: 'btn_solo.png',
      alternatives: ['btn_solo2.png'],
      next: 'solo_menu'
    },
    { id: 'solo_menu', type: 'image', description: 'Single player menu', target: 'btn_train.png', next: 'train_menu' },
    { id: 'train_menu', type: 'image', description: 'Training menu', target: 'btn_challenge.png', next: 'challenge_menu' },
    { id: 'challenge_menu', type: 'image', description: 'Challenge menu', target: 'btn_play.png', next: 'sp_challenge_menu' },
    { id: 'sp_challenge_menu', type: 'image', description: 'Special challenge menu', target: 'btn_level.png', next: 'level_menu' },
    { id: 'level_menu', type: 'image', description: 'Level selection', target: 'btn_play.png', next: 'play_menu' },
    { id: 'play_menu', type: 'terminal', description: 'Level running' }
  ]
};

export function buildDefaultStates(logger?: ServiceLogger): NavigationState[] {
  return buildStatesFromGraph(DEFAULT_STATE_GRAPH, logger);
}
