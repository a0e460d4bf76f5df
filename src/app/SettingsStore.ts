import type { Settings } from "../config";
import type { EventBus } from "../domain/events/EventBus";
import { Topics } from "../domain/events/EventBus";
import type { PhaseSettings } from "../domain/countdown/types";

export interface SettingsSource {
  current(): PhaseSettings;
}

export type SaveHook = (settings: Settings) => boolean;

export interface SettingsChange {
  previous: Settings;
  next: Settings;
  saved: boolean;
}

export class SettingsStore implements SettingsSource {
  private value: Settings;

  constructor(
    initial: Settings,
    private readonly save: SaveHook,
    private readonly bus?: EventBus
  ) {
    this.value = { ...initial };
  }

  current(): Settings {
    return { ...this.value };
  }

  update(patch: Partial<Settings>): SettingsChange {
    const previous = this.value;
    const next: Settings = { ...previous, ...patch };
    this.value = next;
    const saved = this.save({ ...next });
    const change: SettingsChange = { previous: { ...previous }, next: { ...next }, saved };
    this.bus?.publish(Topics.SettingsChanged, change);
    return change;
  }
}
