/**
 * Click Orchestrator Tests
 */

import { createDefaultConfig, type VisionConfig } from '../../config/environment';
import { createServiceLogger } from '../logger';
import { ClickOrchestrator } from '../vision/clickOrchestrator';
import { MatchProbe } from '../vision/matchProbe';
import { FakeScene, RecordingInput, VirtualClock, silentLogger } from '../../../tests/helpers/fakes';

describe('ClickOrchestrator', () => {
  let scene: FakeScene;
  let clock: VirtualClock;
  let input: RecordingInput;
  let vision: VisionConfig;

  const orchestrator = (fallbackKey = 'escape') => {
    const base = silentLogger();
    const probe = new MatchProbe({
      capture: scene,
      scorer: scene,
      loader: scene,
      vision,
      clock,
      logger: createServiceLogger('match-probe', base)
    });
    return new ClickOrchestrator({
      probe,
      input,
      vision,
      fallbackKey,
      clock,
      logger: createServiceLogger('click-orchestrator', base)
    });
  };

  beforeEach(() => {
    scene = new FakeScene();
    clock = new VirtualClock();
    input = new RecordingInput();
    vision = { ...createDefaultConfig().vision, timeoutMs: 1000 };
  });

  it('moves to the match centre, clicks and waits the post-click delay', async () => {
    scene.show('btn_play.png', { x: 100, y: 50 });

    await expect(orchestrator().findAndClick(['btn_play.png'])).resolves.toBe(true);

    expect(input.calls).toEqual([
      { type: 'move', x: 110, y: 55, durationMs: 200 },
      { type: 'click', button: 'left', at: { x: 110, y: 55 } }
    ]);
    expect(clock.sleeps).toEqual([1000]);
  });

  it('applies the click offset', async () => {
    scene.show('btn_play.png', { x: 100, y: 50 });

    await orchestrator().findAndClick(['btn_play.png'], { clickOffset: { x: 5, y: -3 } });

    expect(input.clicks).toEqual([{ x: 115, y: 52 }]);
  });

  it('falls through to an alternative template within the same attempt', async () => {
    scene.show('btn_solo2.png', { x: 0, y: 0 });

    await expect(orchestrator().findAndClick(['btn_solo.png', 'btn_solo2.png'])).resolves.toBe(true);

    expect(input.clicks).toEqual([{ x: 10, y: 5 }]);
    expect(input.keys).toEqual([]);
    expect(scene.loads).toEqual(['btn_solo.png', 'btn_solo2.png']);
  });

  it('prefers the first listed template when several are visible', async () => {
    scene.show('a.png', { x: 0, y: 0 }).show('b.png', { x: 50, y: 50 });

    await orchestrator().findAndClick(['a.png', 'b.png']);

    expect(input.clicks).toEqual([{ x: 10, y: 5 }]);
  });

  it('presses the fallback key once per failed attempt, including the last', async () => {
    await expect(orchestrator().findAndClick(['btn_play.png'])).resolves.toBe(false);

    expect(input.keys).toEqual(['escape', 'escape', 'escape']);
    expect(input.clicks).toEqual([]);
    // three attempts of a 1s probe followed by a 2s back-off
    expect(clock.now()).toBe(9000);
  });

  it('uses the configured fallback key and retry override', async () => {
    await orchestrator('back').findAndClick(['btn_play.png'], { retries: 1 });

    expect(input.keys).toEqual(['back']);
  });

  it('succeeds on a later attempt once the target appears', async () => {
    input.onKey = () => scene.show('btn_play.png');

    await expect(orchestrator().findAndClick(['btn_play.png'])).resolves.toBe(true);

    expect(input.keys).toEqual(['escape']);
    expect(input.clicks).toHaveLength(1);
  });

  it('treats a refused click as a failed attempt', async () => {
    scene.show('btn_play.png');
    input.clickResult = false;

    await expect(orchestrator().findAndClick(['btn_play.png'], { retries: 2 })).resolves.toBe(false);

    expect(input.clicks).toHaveLength(2);
    expect(input.keys).toEqual(['escape', 'escape']);
  });

  it('treats a thrown injection error as a failed attempt', async () => {
    scene.show('btn_play.png');
    input.clickError = new Error('device offline');

    await expect(orchestrator().findAndClick(['btn_play.png'], { retries: 2 })).resolves.toBe(false);

    expect(input.keys).toEqual(['escape', 'escape']);
  });

  it('does nothing when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(orchestrator().findAndClick(['btn_play.png'], { signal: controller.signal })).resolves.toBe(false);

    expect(scene.captures).toBe(0);
    expect(input.calls).toEqual([]);
  });

  it('stops without further keystrokes when aborted mid-probe', async () => {
    const controller = new AbortController();
    scene.onCapture = capture => {
      if (capture === 2) controller.abort();
    };

    await expect(orchestrator().findAndClick(['btn_play.png'], { signal: controller.signal })).resolves.toBe(false);

    expect(input.keys).toEqual([]);
    expect(scene.captures).toBe(2);
  });
});
