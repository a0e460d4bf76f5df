import fs from "fs";
import path from "path";
import type { PhaseSettings } from "./domain/countdown/types";

export interface Settings extends PhaseSettings {
  /** Kept for the settings file; the terminal display does not use it. */
  fontSize: number;
  /** Kept for the settings file; the terminal display does not use it. */
  transparent: number;
}

/** On-disk shape, shared with earlier releases of the clock. */
interface StoredSettings {
  run_secs: number;
  rest_secs: number;
  auto_next: boolean;
  font_size: number;
  transparent: number;
}

export const DEFAULT_SETTINGS: Settings = {
  runSecs: 45,
  restSecs: 30,
  autoNext: false,
  fontSize: 50,
  transparent: 1,
};

export const DEFAULT_SETTINGS_PATH = path.join("data", "config.json");

export interface LoadedSettings {
  settings: Settings;
  path: string;
  fromFile: boolean;
}

export function resolveSettingsPath(settingsPath?: string): string {
  return path.resolve(process.cwd(), settingsPath ?? DEFAULT_SETTINGS_PATH);
}

export function loadSettings(settingsPath?: string): LoadedSettings {
  const resolved = resolveSettingsPath(settingsPath);
  const dir = path.dirname(resolved);
  try {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  } catch (err) {
    console.warn(`Failed to create settings directory ${dir}:`, err);
  }

  if (!fs.existsSync(resolved)) {
    return { settings: { ...DEFAULT_SETTINGS }, path: resolved, fromFile: false };
  }

  try {
    const raw = fs.readFileSync(resolved, "utf8");
    const parsed: unknown = JSON.parse(raw);
    return { settings: normalizeSettings(parsed), path: resolved, fromFile: true };
  } catch (err) {
    console.warn(`Failed to load settings from ${resolved}:`, err);
    return { settings: { ...DEFAULT_SETTINGS }, path: resolved, fromFile: false };
  }
}

export function saveSettings(settingsPath: string, settings: Settings): boolean {
  const stored: StoredSettings = {
    run_secs: settings.runSecs,
    rest_secs: settings.restSecs,
    auto_next: settings.autoNext,
    font_size: settings.fontSize,
    transparent: settings.transparent,
  };

  try {
    fs.mkdirSync(path.dirname(settingsPath), { recursive: true });
    fs.writeFileSync(settingsPath, JSON.stringify(stored));
    return true;
  } catch (err) {
    console.warn(`Failed to save settings to ${settingsPath}:`, err);
    return false;
  }
}

export function normalizeSettings(input: unknown): Settings {
  if (!isRecord(input)) return { ...DEFAULT_SETTINGS };

  return {
    runSecs: wholeSeconds(input.run_secs, DEFAULT_SETTINGS.runSecs),
    restSecs: wholeSeconds(input.rest_secs, DEFAULT_SETTINGS.restSecs),
    autoNext:
      typeof input.auto_next === "boolean" ? input.auto_next : DEFAULT_SETTINGS.autoNext,
    fontSize:
      typeof input.font_size === "number" && Number.isFinite(input.font_size)
        ? input.font_size
        : DEFAULT_SETTINGS.fontSize,
    transparent:
      typeof input.transparent === "number" && Number.isFinite(input.transparent)
        ? input.transparent
        : DEFAULT_SETTINGS.transparent,
  };
}

/**
 * Text-field rule for the two duration inputs: blank means zero, an unsigned
 * integer is taken as-is, anything else is rejected and the caller keeps the
 * previous value.
 */
export function parseSecondsInput(text: string): number | null {
  if (text.trim() === "") return 0;
  if (!/^\+?\d+$/.test(text)) return null;
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : null;
}

function wholeSeconds(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0
    ? value
    : fallback;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
