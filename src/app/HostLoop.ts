import { isPhaseActive } from "../domain/countdown/types";
import type { DisplayPort } from "../ports/ui/DisplayPort";
import type { AudioCueDispatcher } from "./AudioCueDispatcher";
import type { SettingsSource } from "./SettingsStore";
import type { TimerEngine } from "./TimerEngine";

export const ACTIVE_POLL_MS = 10;
export const DEFAULT_IDLE_POLL_MS = 200;

export interface HostLoopOptions {
  activePollMs?: number;
  idlePollMs?: number;
}

/**
 * The redraw cycle: advance host-driven transitions, play cues, draw.
 * Polls fast while a phase is counting down and slowly otherwise.
 */
export class HostLoop {
  private timeout: NodeJS.Timeout | null = null;

  constructor(
    private readonly engine: TimerEngine,
    private readonly cues: AudioCueDispatcher,
    private readonly display: DisplayPort,
    private readonly settings: SettingsSource,
    private readonly options: HostLoopOptions = {}
  ) {}

  get running(): boolean {
    return this.timeout !== null;
  }

  start(): void {
    if (this.timeout) return;
    this.schedule(0);
  }

  stop(): void {
    if (this.timeout) {
      clearTimeout(this.timeout);
      this.timeout = null;
    }
  }

  /** Runs one poll cycle and returns the delay before the next one. */
  cycle(): number {
    this.engine.checkStatus();
    const snapshot = this.engine.snapshot();
    this.cues.dispatch(snapshot);

    if (!snapshot) return this.activeDelay();

    this.display.render({ snapshot, autoNext: this.settings.current().autoNext });
    return isPhaseActive(snapshot.status) ? this.activeDelay() : this.idleDelay();
  }

  private schedule(delayMs: number) {
    this.timeout = setTimeout(() => {
      let next = this.idleDelay();
      try {
        next = this.cycle();
      } catch (err) {
        console.error("Host loop cycle failed:", err);
      }
      if (this.timeout) this.schedule(next);
    }, delayMs);
  }

  private activeDelay(): number {
    return this.options.activePollMs ?? ACTIVE_POLL_MS;
  }

  private idleDelay(): number {
    return this.options.idlePollMs ?? DEFAULT_IDLE_POLL_MS;
  }
}
