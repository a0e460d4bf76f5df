import path from 'path';
import { AudioCueDispatcher, type CueRequest } from '../../src/app/AudioCueDispatcher';
import { SimpleEventBus } from '../../src/adapters/sys/SimpleEventBus';
import { CueCatalog } from '../../src/domain/cues/CueCatalog';
import { Topics } from '../../src/domain/events/EventBus';
import type {
  CuePlayerPort,
  CueRequestOptions,
  PlaybackState,
  PlayRequestOutcome,
} from '../../src/ports/audio/CuePlayerPort';

class FakePlayer implements CuePlayerPort {
  state: PlaybackState = 'Idle';
  readonly requests: Array<{ resource: string; options?: CueRequestOptions }> = [];

  request(resource: string, options?: CueRequestOptions): PlayRequestOutcome {
    this.requests.push({ resource, options });
    if (this.state === 'Playing') return 'busy';
    this.state = 'Playing';
    return 'started';
  }

  finish() {
    this.state = 'Idle';
  }
}

const AUDIO_DIR = path.join('/srv', 'cues');

function makeDispatcher() {
  const player = new FakePlayer();
  const bus = new SimpleEventBus();
  const dispatcher = new AudioCueDispatcher(player, new CueCatalog(AUDIO_DIR), bus);
  return { player, bus, dispatcher };
}

describe('AudioCueDispatcher', () => {
  test('requests a threshold cue once however often it is polled', () => {
    const { player, dispatcher } = makeDispatcher();

    expect(dispatcher.dispatch({ status: 'Running', remaining: 60 })).toEqual({
      cue: '60',
      resource: path.join(AUDIO_DIR, '60.mp3'),
      outcome: 'started',
    });
    for (let i = 0; i < 50; i++) {
      expect(dispatcher.dispatch({ status: 'Running', remaining: 60 })).toBeNull();
    }

    expect(player.requests).toHaveLength(1);
    expect(player.requests[0].options).toEqual({
      fallbackTone: { frequency: 494, ms: 350 },
    });
  });

  test('drops a cue reached while another is still playing', () => {
    const { player, dispatcher } = makeDispatcher();

    dispatcher.dispatch({ status: 'Running', remaining: 60 });
    expect(dispatcher.dispatch({ status: 'Running', remaining: 59 })).toBeNull();

    expect(dispatcher.dispatch({ status: 'Running', remaining: 30 })?.outcome).toBe('busy');

    player.finish();
    // Same second, not retried after the player frees up.
    expect(dispatcher.dispatch({ status: 'Running', remaining: 30 })).toBeNull();

    expect(dispatcher.dispatch({ status: 'Running', remaining: 10 })?.outcome).toBe('started');
    expect(player.requests.map((r) => path.basename(r.resource))).toEqual([
      '60.mp3',
      '30.mp3',
      '10.mp3',
    ]);
  });

  test('work end and rest end map to their cues', () => {
    const { player, dispatcher } = makeDispatcher();

    expect(dispatcher.dispatch({ status: 'Running', remaining: 0 })?.cue).toBe('rest');
    player.finish();
    expect(dispatcher.dispatch({ status: 'Rest', remaining: 0 })).toBeNull();
    expect(dispatcher.dispatch({ status: 'RestRunning', remaining: 0 })?.cue).toBe('next');
  });

  test('plays nothing when the snapshot is unavailable', () => {
    const { player, dispatcher } = makeDispatcher();
    expect(dispatcher.dispatch(null)).toBeNull();
    expect(player.requests).toHaveLength(0);
  });

  test('a threshold visited again after leaving it is cued again', () => {
    const { player, dispatcher } = makeDispatcher();
    dispatcher.dispatch({ status: 'Running', remaining: 5 });
    player.finish();
    dispatcher.dispatch({ status: 'Stop', remaining: 5 });
    expect(dispatcher.dispatch({ status: 'Running', remaining: 5 })?.outcome).toBe('started');
    expect(player.requests).toHaveLength(2);
  });

  test('a restart on the threshold second cues it again', () => {
    const { player, dispatcher } = makeDispatcher();
    const running60 = { status: 'Running' as const, remaining: 60 };

    dispatcher.dispatch(running60);
    player.finish();
    dispatcher.handleTransition({
      event: { type: 'start', runSecs: 60 },
      previous: running60,
      next: running60,
      changed: false,
    });

    expect(dispatcher.dispatch(running60)?.cue).toBe('60');
    expect(player.requests).toHaveLength(2);
  });

  test('only a start transition clears the remembered threshold', () => {
    const { player, dispatcher } = makeDispatcher();
    const running60 = { status: 'Running' as const, remaining: 60 };

    dispatcher.dispatch(running60);
    dispatcher.handleTransition({
      event: { type: 'resume' },
      previous: { status: 'Stop', remaining: 60 },
      next: running60,
      changed: true,
    });

    expect(dispatcher.dispatch(running60)).toBeNull();
    expect(player.requests).toHaveLength(1);
  });

  test('player failures are swallowed', () => {
    const player: CuePlayerPort = {
      state: 'Idle',
      request: () => {
        throw new Error('decoder exploded');
      },
    };
    const dispatcher = new AudioCueDispatcher(player, new CueCatalog(AUDIO_DIR));
    expect(dispatcher.dispatch({ status: 'Running', remaining: 90 })?.outcome).toBe('unavailable');
  });

  test('publishes each request on the bus', () => {
    const { bus, dispatcher } = makeDispatcher();
    const seen: CueRequest[] = [];
    bus.subscribe<CueRequest>(Topics.CueRequested, (request) => seen.push(request));

    dispatcher.dispatch({ status: 'RestRunning', remaining: 0 });

    expect(seen).toEqual([
      { cue: 'next', resource: path.join(AUDIO_DIR, 'next.mp3'), outcome: 'started' },
    ]);
  });
});
