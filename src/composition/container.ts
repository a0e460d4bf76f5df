import path from 'path';
import { loadSettings, saveSettings } from '../config';
import {
  ASSETS_DIR,
  AUTO_NEXT_OVERRIDE,
  CONFIG_PATH,
  CUE_FALLBACK,
  DEBUG_MODE,
  IDLE_POLL_MS,
} from '../env';
import { SimpleEventBus } from '../adapters/sys/SimpleEventBus';
import { ConsoleLogger } from '../adapters/sys/ConsoleLogger';
import { ProcessCuePlayer } from '../adapters/audio/ProcessCuePlayer';
import { TerminalRenderer } from '../adapters/ui/TerminalRenderer';
import { ReadlineCommandInput } from '../adapters/ui/ReadlineCommandInput';
import { CountdownState, type CountdownTransition } from '../domain/countdown/CountdownState';
import { CueCatalog } from '../domain/cues/CueCatalog';
import { Topics } from '../domain/events/EventBus';
import { SettingsStore, type SettingsChange } from '../app/SettingsStore';
import { Ticker } from '../app/Ticker';
import { TimerEngine } from '../app/TimerEngine';
import { AudioCueDispatcher, type CueRequest } from '../app/AudioCueDispatcher';
import { HostLoop } from '../app/HostLoop';
import { CommandInterpreter, HELP_TEXT } from '../app/CommandInterpreter';

export interface ApplicationInstance {
  start(): Promise<void>;
  shutdown(): Promise<void>;
}

export interface BuildOptions {
  onQuit: () => void;
}

export async function buildApplication(options: BuildOptions): Promise<ApplicationInstance> {
  const logger = new ConsoleLogger({ minLevel: DEBUG_MODE ? 'debug' : 'info' });

  const { settings: initialSettings, path: settingsPath, fromFile } = loadSettings(CONFIG_PATH);
  if (fromFile) {
    logger.info(`Loaded settings from ${settingsPath}`);
  }

  const bus = new SimpleEventBus();
  const settings = new SettingsStore(
    initialSettings,
    (next) => saveSettings(settingsPath, next),
    bus,
  );
  if (AUTO_NEXT_OVERRIDE !== undefined && AUTO_NEXT_OVERRIDE !== initialSettings.autoNext) {
    settings.update({ autoNext: AUTO_NEXT_OVERRIDE });
  }

  const state = new CountdownState();
  const ticker = new Ticker(state, { logger });
  const engine = new TimerEngine(state, settings, ticker);

  const player = new ProcessCuePlayer({ toneFallback: CUE_FALLBACK === 'tone', logger });
  const catalog = new CueCatalog(path.resolve(ASSETS_DIR, 'audio'));
  const cues = new AudioCueDispatcher(player, catalog, bus, logger);

  const display = new TerminalRenderer();
  const loop = new HostLoop(engine, cues, display, settings, { idlePollMs: IDLE_POLL_MS });
  const input = new ReadlineCommandInput(new CommandInterpreter(engine, settings), {
    onQuit: options.onQuit,
  });

  state.onTransition((change) => {
    cues.handleTransition(change);
    bus.publish(Topics.CountdownTransition, change);
  });

  bus.subscribe<CountdownTransition>(Topics.CountdownTransition, ({ event, previous, next }) => {
    if (previous.status === next.status) return;
    logger.debug(`${previous.status} -> ${next.status}`, {
      event: event.type,
      remaining: next.remaining,
    });
  });

  bus.subscribe<CueRequest>(Topics.CueRequested, ({ cue, outcome }) => {
    logger.debug(`Cue ${cue}: ${outcome}`);
  });

  bus.subscribe<SettingsChange>(Topics.SettingsChanged, ({ next, saved }) => {
    logger.debug('Settings updated', {
      runSecs: next.runSecs,
      restSecs: next.restSecs,
      autoNext: next.autoNext,
      saved,
    });
  });

  return {
    start: async () => {
      engine.init();
      console.log(HELP_TEXT);
      input.start();
      loop.start();
    },
    shutdown: async () => {
      input.stop();
      loop.stop();
      ticker.stop();
      player.stop();
      display.close();
    },
  };
}
