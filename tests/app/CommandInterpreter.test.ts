import { CommandInterpreter, HELP_TEXT } from '../../src/app/CommandInterpreter';
import { SettingsStore } from '../../src/app/SettingsStore';
import { Ticker } from '../../src/app/Ticker';
import { TimerEngine } from '../../src/app/TimerEngine';
import { DEFAULT_SETTINGS } from '../../src/config';
import { CountdownState } from '../../src/domain/countdown/CountdownState';

function makeInterpreter(saveResult = true) {
  const state = new CountdownState();
  const save = jest.fn(() => saveResult);
  const settings = new SettingsStore(DEFAULT_SETTINGS, save);
  const ticker = new Ticker(state);
  const engine = new TimerEngine(state, settings, ticker);
  return { state, settings, save, ticker, engine, cli: new CommandInterpreter(engine, settings) };
}

describe('CommandInterpreter', () => {
  test('start, pause and resume drive the engine', () => {
    const { cli, engine } = makeInterpreter();

    expect(cli.execute('start')).toEqual({ kind: 'ok', message: 'Work phase started (45s).' });
    expect(cli.execute('p')).toEqual({ kind: 'ok', message: 'Paused.' });
    expect(engine.snapshot()).toEqual({ status: 'Stop', remaining: 45 });
    expect(cli.execute('pause')).toEqual({ kind: 'ok', message: 'Nothing to pause.' });
    expect(cli.execute('  R  ')).toEqual({ kind: 'ok', message: 'Resumed.' });
    expect(cli.execute('resume')).toEqual({ kind: 'ok', message: 'Nothing to resume.' });
  });

  test('toggle pauses or resumes whichever applies', () => {
    const { cli, engine } = makeInterpreter();
    expect(cli.execute('t')).toEqual({ kind: 'ok', message: 'Nothing to pause or resume.' });
    cli.execute('s');
    expect(cli.execute('t').message).toBe('Paused.');
    expect(engine.snapshot()?.status).toBe('Stop');
    expect(cli.execute('toggle').message).toBe('Resumed.');
    expect(engine.snapshot()?.status).toBe('Running');
  });

  test('run and rest parse seconds like the duration fields', () => {
    const { cli, settings, save } = makeInterpreter();

    expect(cli.execute('run 90')).toEqual({ kind: 'ok', message: 'Work phase set to 90s.' });
    expect(cli.execute('rest +15')).toEqual({ kind: 'ok', message: 'Rest phase set to 15s.' });
    expect(cli.execute('rest')).toEqual({ kind: 'ok', message: 'Rest phase set to 0s.' });
    expect(cli.execute('run ten')).toEqual({
      kind: 'error',
      message: 'Invalid number of seconds: "ten".',
    });
    expect(cli.execute('run -5')).toEqual({
      kind: 'error',
      message: 'Invalid number of seconds: "-5".',
    });

    expect(settings.current()).toMatchObject({ runSecs: 90, restSecs: 0 });
    expect(save).toHaveBeenCalledTimes(3);
  });

  test('a new work length applies on the next start', () => {
    const { cli, engine } = makeInterpreter();
    cli.execute('start');
    cli.execute('run 20');
    expect(engine.snapshot()).toEqual({ status: 'Running', remaining: 45 });
    cli.execute('start');
    expect(engine.snapshot()).toEqual({ status: 'Running', remaining: 20 });
  });

  test('auto toggles or sets auto-next', () => {
    const { cli, settings } = makeInterpreter();
    expect(cli.execute('auto').message).toBe('Auto-next on.');
    expect(settings.current().autoNext).toBe(true);
    expect(cli.execute('auto on').message).toBe('Auto-next on.');
    expect(cli.execute('AUTO OFF').message).toBe('Auto-next off.');
    expect(settings.current().autoNext).toBe(false);
    expect(cli.execute('auto maybe')).toEqual({ kind: 'error', message: 'Usage: auto [on|off]' });
  });

  test('unsaved edits say so', () => {
    const { cli } = makeInterpreter(false);
    expect(cli.execute('run 30').message).toBe('Work phase set to 30s. (not saved)');
  });

  test('status summarises state and settings', () => {
    const { cli } = makeInterpreter();
    cli.execute('start');
    expect(cli.execute('status')).toEqual({
      kind: 'ok',
      message: 'Running, 45s remaining; work 45s, rest 30s, auto-next off.',
    });
  });

  test('reports a busy clock instead of waiting', () => {
    const { cli, state } = makeInterpreter();
    const release = state.tryHold();
    expect(cli.execute('start')).toEqual({ kind: 'error', message: 'Clock busy, try again.' });
    expect(cli.execute('toggle')).toEqual({ kind: 'error', message: 'Clock busy, try again.' });
    expect(cli.execute('status')).toEqual({ kind: 'error', message: 'Clock busy, try again.' });
    release?.();
  });

  test('help, quit, blank and unknown input', () => {
    const { cli } = makeInterpreter();
    expect(cli.execute('?')).toEqual({ kind: 'ok', message: HELP_TEXT });
    expect(cli.execute('q')).toEqual({ kind: 'quit', message: 'Bye.' });
    expect(cli.execute('   ')).toEqual({ kind: 'ok', message: '' });
    expect(cli.execute('jump')).toEqual({
      kind: 'error',
      message: 'Unknown command "jump". Type "help" for commands.',
    });
  });
});
