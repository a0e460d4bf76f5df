import { config } from 'dotenv';

config();

export type CueFallback = 'tone' | 'silent';

export let CONFIG_PATH = process.env.CLOCK_CONFIG || undefined;
export let ASSETS_DIR = process.env.CLOCK_ASSETS_DIR || 'assets';
export let DEBUG_MODE = process.env.DEBUG_MODE === 'true';
export const CUE_FALLBACK: CueFallback = process.env.CLOCK_CUE_FALLBACK === 'tone' ? 'tone' : 'silent';
export const IDLE_POLL_MS = parsePositiveInt(process.env.CLOCK_IDLE_POLL_MS, 200);

const cliArgs = process.argv.slice(2);
let logFileArg: string | undefined;
let autoNextArg: boolean | undefined;

for (let i = 0; i < cliArgs.length; i++) {
  const arg = cliArgs[i];
  switch (arg) {
    case '--config':
      if (cliArgs[i + 1]) {
        CONFIG_PATH = cliArgs[++i];
      }
      break;
    case '--log-file':
      if (cliArgs[i + 1]) {
        logFileArg = cliArgs[++i];
      }
      break;
    case '--assets':
      if (cliArgs[i + 1]) {
        ASSETS_DIR = cliArgs[++i];
      }
      break;
    case '--debug':
      DEBUG_MODE = true;
      break;
    case '--no-debug':
      DEBUG_MODE = false;
      break;
    case '--auto-next':
      autoNextArg = true;
      break;
    case '--no-auto-next':
      autoNextArg = false;
      break;
    default:
      break;
  }
}

export const LOG_FILE = logFileArg;
export const AUTO_NEXT_OVERRIDE = autoNextArg;

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}
