import path from 'path';
import { CueCatalog, selectCue } from '../../../src/domain/cues/CueCatalog';

describe('selectCue', () => {
  test.each([
    [90, '90'],
    [60, '60'],
    [30, '30'],
    [10, '10'],
    [5, '5'],
    [0, 'rest'],
  ])('work phase at %i s plays cue %s', (remaining, cue) => {
    expect(selectCue({ status: 'Running', remaining })).toBe(cue);
  });

  test('work phase between thresholds plays nothing', () => {
    for (const remaining of [91, 89, 61, 45, 31, 11, 6, 4, 1]) {
      expect(selectCue({ status: 'Running', remaining })).toBeNull();
    }
  });

  test('rest phase only cues at zero', () => {
    expect(selectCue({ status: 'RestRunning', remaining: 0 })).toBe('next');
    expect(selectCue({ status: 'RestRunning', remaining: 60 })).toBeNull();
    expect(selectCue({ status: 'RestRunning', remaining: 5 })).toBeNull();
  });

  test('other statuses never cue', () => {
    for (const status of ['Wait', 'Stop', 'Rest', 'RestWait'] as const) {
      expect(selectCue({ status, remaining: 0 })).toBeNull();
      expect(selectCue({ status, remaining: 60 })).toBeNull();
    }
  });
});

describe('CueCatalog', () => {
  test('resolves cue files inside the audio directory', () => {
    const catalog = new CueCatalog(path.join('/opt', 'clock', 'audio'));
    expect(catalog.resolve('5')).toBe(path.join('/opt', 'clock', 'audio', '05.mp3'));
    expect(catalog.resolve('rest')).toBe(path.join('/opt', 'clock', 'audio', 'rest.mp3'));
    expect(catalog.resolve('next')).toBe(path.join('/opt', 'clock', 'audio', 'next.mp3'));
  });

  test('every cue has its own tone pitch', () => {
    const catalog = new CueCatalog('audio');
    const ids = ['90', '60', '30', '10', '5', 'rest', 'next'] as const;
    const pitches = new Set(ids.map((id) => catalog.definition(id).toneFrequency));
    expect(pitches.size).toBe(ids.length);
  });
});
