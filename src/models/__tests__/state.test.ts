/**
 * Navigation State Tests
 */

import {
  CallbackState,
  ImageTransitionState,
  RECOVERY_STATE_ID,
  TerminalState,
  UndefinedRecoveryState
} from '../state';
import { createHarness, type Harness } from '../../../tests/helpers/harness';
import { silentLogger, testConfig } from '../../../tests/helpers/fakes';
import { createServiceLogger } from '../../services/logger';

describe('Navigation states', () => {
  let harness: Harness;

  beforeEach(() => {
    harness = createHarness({ config: testConfig(config => (config.vision.timeoutMs = 1000)), states: [] });
  });

  describe('ImageTransitionState', () => {
    const state = () =>
      new ImageTransitionState('start_menu', {
        description: 'Start menu',
        target: 'btn_solo.png',
        alternatives: ['btn_solo2.png'],
        nextState: 'solo_menu'
      });

    it('lists the target before its alternatives', () => {
      expect(state().getExpectedImages()).toEqual(['btn_solo.png', 'btn_solo2.png']);
    });

    it('moves to the next state after clicking', async () => {
      harness.scene.show('btn_solo2.png');

      await expect(state().execute(harness.context())).resolves.toEqual({ kind: 'next', stateId: 'solo_menu' });
      expect(harness.input.clicks).toHaveLength(1);
    });

    it('fails closed when no template can be clicked', async () => {
      const outcome = await state().execute(harness.context());

      expect(outcome).toEqual({ kind: 'failed', reason: 'none of btn_solo.png, btn_solo2.png found' });
      expect(harness.input.keys).toEqual(['escape', 'escape', 'escape']);
    });

    it('passes its own retries, timeout and click offset to the orchestrator', async () => {
      const custom = new ImageTransitionState('level_menu', {
        target: 'btn_play.png',
        nextState: 'play_menu',
        retries: 1,
        timeoutMs: 500,
        clickOffset: { x: 0, y: 4 }
      });

      await expect(custom.execute(harness.context())).resolves.toMatchObject({ kind: 'failed' });
      expect(harness.input.keys).toEqual(['escape']);
      expect(harness.scene.captures).toBe(1);

      harness.scene.show('btn_play.png', { x: 100, y: 50 });
      await custom.execute(harness.context());
      expect(harness.input.clicks).toEqual([{ x: 110, y: 59 }]);
    });

    it('reports a stop request instead of a miss', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(state().execute(harness.context(controller.signal))).resolves.toEqual({
        kind: 'failed',
        reason: 'stop requested'
      });
      expect(harness.input.keys).toEqual([]);
    });
  });

  describe('UndefinedRecoveryState', () => {
    it('uses the recovery id and the default signature table', () => {
      const recovery = new UndefinedRecoveryState();

      expect(recovery.id).toBe(RECOVERY_STATE_ID);
      expect(recovery.getExpectedImages()).toEqual(['btn_solo.png', 'btn_train.png', 'train_menu.png']);
    });

    it('parks the pointer, then returns the first matching signature', async () => {
      harness.scene.show('btn_train.png').show('train_menu.png');

      const outcome = await new UndefinedRecoveryState().execute(harness.context());

      expect(outcome).toEqual({ kind: 'next', stateId: 'solo_menu' });
      expect(harness.input.calls[0]).toEqual({ type: 'move', x: 10, y: 10, durationMs: 200 });
      // btn_solo.png is probed for one second first
      expect(harness.clock.now()).toBe(1000);
      expect(harness.input.keys).toEqual([]);
    });

    it('presses the fallback key and returns itself when nothing matches', async () => {
      const outcome = await new UndefinedRecoveryState().execute(harness.context());

      expect(outcome).toEqual({ kind: 'next', stateId: RECOVERY_STATE_ID });
      expect(harness.input.keys).toEqual(['escape']);
      // three one-second probes and the recovery pause
      expect(harness.clock.now()).toBe(4000);
    });

    it('logs a refused fallback key press', async () => {
      const logger = createServiceLogger('state', silentLogger());
      const warn = jest.spyOn(logger, 'warn');
      harness.input.keyResult = false;

      const outcome = await new UndefinedRecoveryState(RECOVERY_STATE_ID, { logger }).execute(harness.context());

      expect(outcome).toEqual({ kind: 'next', stateId: RECOVERY_STATE_ID });
      expect(warn).toHaveBeenCalledWith('fallback_key_failed', 'Pressing escape was refused', undefined);
    });

    it('accepts a custom signature table', async () => {
      harness.scene.show('btn_close.png');
      const recovery = new UndefinedRecoveryState(RECOVERY_STATE_ID, {
        signatures: [{ templateId: 'btn_close.png', stateId: 'event_popup' }]
      });

      await expect(recovery.execute(harness.context())).resolves.toEqual({ kind: 'next', stateId: 'event_popup' });
    });
  });

  describe('TerminalState', () => {
    it('always signals the end of navigation', async () => {
      await expect(new TerminalState('play_menu').execute(harness.context())).resolves.toEqual({ kind: 'terminal' });
      expect(harness.input.calls).toEqual([]);
    });
  });

  describe('CallbackState', () => {
    it('maps the returned id to the next state', async () => {
      const state = new CallbackState('custom', { handler: async () => 'play_menu' });

      await expect(state.execute(harness.context())).resolves.toEqual({ kind: 'next', stateId: 'play_menu' });
    });

    it('maps null to a failure', async () => {
      const state = new CallbackState('custom', { handler: async () => null });

      await expect(state.execute(harness.context())).resolves.toEqual({
        kind: 'failed',
        reason: 'handler returned no successor'
      });
    });

    it('gives the handler the run context', async () => {
      const handler = jest.fn(async () => 'next');
      const context = harness.context();

      await new CallbackState('custom', { handler, expectedImages: ['a.png'] }).execute(context);

      expect(handler).toHaveBeenCalledWith(context);
    });
  });

  describe('hooks', () => {
    it('route errors to the recovery state by default', () => {
      const state = new TerminalState('play_menu');

      expect(state.onError(new Error('boom'), harness.context())).toBe(RECOVERY_STATE_ID);
    });

    it('route errors to a configured recovery state', () => {
      const state = new TerminalState('play_menu', { recoveryStateId: 'rescue' });

      expect(state.onError(new Error('boom'), harness.context())).toBe('rescue');
    });

    it('allow entry from anywhere by default', () => {
      const state = new TerminalState('play_menu');

      expect(state.canEnterFrom(undefined)).toBe(true);
      expect(state.canEnterFrom('level_menu')).toBe(true);
    });

    it('default the description to the id', () => {
      expect(new TerminalState('play_menu').description).toBe('play_menu');
      expect(new TerminalState('play_menu', { description: 'Level running' }).description).toBe('Level running');
    });
  });
});
