/**
 * Match Probe Tests
 */

import { createDefaultConfig } from '../../config/environment';
import { createServiceLogger } from '../logger';
import { MatchProbe } from '../vision/matchProbe';
import { FakeScene, VirtualClock, silentLogger } from '../../../tests/helpers/fakes';

describe('MatchProbe', () => {
  let scene: FakeScene;
  let clock: VirtualClock;
  let probe: MatchProbe;

  beforeEach(() => {
    scene = new FakeScene();
    clock = new VirtualClock();
    probe = new MatchProbe({
      capture: scene,
      scorer: scene,
      loader: scene,
      vision: createDefaultConfig().vision,
      clock,
      logger: createServiceLogger('match-probe', silentLogger())
    });
  });

  describe('probe', () => {
    it('returns the template centre on the first poll when confidence clears the threshold', async () => {
      scene.show('btn_play.png', { x: 100, y: 50 }, 0.92);

      const result = await probe.probe('btn_play.png');

      expect(result).toEqual({
        found: true,
        position: { x: 110, y: 55 },
        confidence: 0.92,
        templateSize: { width: 20, height: 10 },
        elapsedMs: 0,
        polls: 1,
        cancelled: false
      });
      expect(scene.captures).toBe(1);
    });

    it('polls ten times over a 5s timeout at a 500ms interval', async () => {
      const result = await probe.probe('btn_play.png');

      expect(result.found).toBe(false);
      expect(result.position).toBeUndefined();
      expect(result.polls).toBe(10);
      expect(result.elapsedMs).toBe(5000);
      expect(result.confidence).toBe(FakeScene.BACKGROUND_CONFIDENCE);
      expect(clock.sleeps).toEqual(Array(10).fill(500));
    });

    it('accepts a confidence exactly at the threshold', async () => {
      scene.show('btn_play.png', { x: 0, y: 0 }, 0.8);

      const result = await probe.probe('btn_play.png');

      expect(result.found).toBe(true);
      expect(result.position).toEqual({ x: 10, y: 5 });
    });

    it('rejects a confidence just below the threshold', async () => {
      scene.show('btn_play.png', { x: 0, y: 0 }, 0.79);

      const result = await probe.probe('btn_play.png', { timeoutMs: 1000 });

      expect(result.found).toBe(false);
      expect(result.confidence).toBe(0.79);
      expect(result.polls).toBe(2);
    });

    it('honours per-call threshold and interval overrides', async () => {
      scene.show('btn_play.png', { x: 0, y: 0 }, 0.6);

      const result = await probe.probe('btn_play.png', { threshold: 0.5 });
      expect(result.found).toBe(true);

      scene.hide('btn_play.png');
      const missed = await probe.probe('btn_play.png', { timeoutMs: 1000, checkIntervalMs: 250 });
      expect(missed.polls).toBe(4);
    });

    it('returns immediately without polling when the template cannot be loaded', async () => {
      scene.missing.add('btn_gone.png');

      const result = await probe.probe('btn_gone.png');

      expect(result).toEqual({
        found: false,
        confidence: 0,
        templateSize: { width: 0, height: 0 },
        elapsedMs: 0,
        polls: 0,
        cancelled: false
      });
      expect(scene.captures).toBe(0);
    });

    it('counts a failed capture as a missed poll', async () => {
      scene.show('btn_play.png');
      scene.failingCaptures = 2;

      const result = await probe.probe('btn_play.png');

      expect(result.found).toBe(true);
      expect(result.polls).toBe(3);
      expect(result.elapsedMs).toBe(1000);
    });

    it('finds a template that appears part way through the timeout', async () => {
      scene.onCapture = capture => {
        if (capture === 4) scene.show('btn_play.png');
      };

      const result = await probe.probe('btn_play.png');

      expect(result.found).toBe(true);
      expect(result.polls).toBe(4);
      expect(result.elapsedMs).toBe(1500);
    });

    it('adds the region offset to the match position', async () => {
      scene.show('btn_play.png', { x: 5, y: 5 });

      const result = await probe.probe('btn_play.png', { region: { x: 40, y: 30, width: 100, height: 100 } });

      expect(result.position).toEqual({ x: 55, y: 40 });
    });

    it('does not capture when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      const result = await probe.probe('btn_play.png', { signal: controller.signal });

      expect(result.cancelled).toBe(true);
      expect(result.polls).toBe(0);
      expect(scene.captures).toBe(0);
    });

    it('stops at the next poll after an abort', async () => {
      const controller = new AbortController();
      scene.onCapture = capture => {
        if (capture === 3) controller.abort();
      };

      const result = await probe.probe('btn_play.png', { signal: controller.signal });

      expect(result.found).toBe(false);
      expect(result.cancelled).toBe(true);
      expect(result.polls).toBe(3);
      expect(result.elapsedMs).toBe(1000);
      expect(clock.sleeps).toEqual([500, 500]);
    });
  });

  describe('isPresent', () => {
    it('uses a one second timeout by default', async () => {
      await expect(probe.isPresent('btn_solo.png')).resolves.toBe(false);
      expect(scene.captures).toBe(2);
      expect(clock.now()).toBe(1000);
    });

    it('reports a visible template', async () => {
      scene.show('btn_solo.png');
      await expect(probe.isPresent('btn_solo.png')).resolves.toBe(true);
    });
  });

  describe('waitForAny', () => {
    it('returns the first visible template in list order', async () => {
      scene.show('b.png').show('c.png');

      await expect(probe.waitForAny(['a.png', 'b.png', 'c.png'])).resolves.toBe('b.png');
      expect(scene.captures).toBe(1);
    });

    it('returns null when nothing appears before the timeout', async () => {
      await expect(probe.waitForAny(['a.png', 'b.png'], 1000)).resolves.toBeNull();
      expect(scene.captures).toBe(2);
    });

    it('skips templates that cannot be loaded', async () => {
      scene.missing.add('a.png');
      scene.show('b.png');

      await expect(probe.waitForAny(['a.png', 'b.png'])).resolves.toBe('b.png');
    });

    it('returns null without capturing when no template loads', async () => {
      scene.missing.add('a.png');

      await expect(probe.waitForAny(['a.png'])).resolves.toBeNull();
      expect(scene.captures).toBe(0);
    });
  });
});
