import type { CountdownState, CountdownTransition } from "../domain/countdown/CountdownState";
import type { CountdownSnapshot } from "../domain/countdown/types";
import type { SettingsSource } from "./SettingsStore";
import type { Ticker } from "./Ticker";

export type CommandOutcome = "applied" | "ignored" | "busy";

export class TimerEngine {
  constructor(
    private readonly state: CountdownState,
    private readonly settings: SettingsSource,
    private readonly ticker: Ticker
  ) {}

  /** Spawns the background ticker. Calling it again has no effect. */
  init(): void {
    this.ticker.start();
  }

  /** Resets the work phase from any status. */
  start(): CommandOutcome {
    const { runSecs } = this.settings.current();
    const change = this.state.tryApply({ type: "start", runSecs });
    return change ? "applied" : "busy";
  }

  pause(): CommandOutcome {
    return outcome(this.state.tryApply({ type: "pause" }));
  }

  resume(): CommandOutcome {
    return outcome(this.state.tryApply({ type: "resume" }));
  }

  /**
   * Called by the host on every poll. Starts the rest phase with the rest
   * length configured right now, and restarts work when the rest phase is
   * over and auto-next is on.
   */
  checkStatus(): void {
    this.state.tryApply({ type: "check", settings: this.settings.current() });
  }

  snapshot(): CountdownSnapshot | null {
    return this.state.trySnapshot();
  }
}

function outcome(change: CountdownTransition | null): CommandOutcome {
  if (!change) return "busy";
  return change.changed ? "applied" : "ignored";
}
