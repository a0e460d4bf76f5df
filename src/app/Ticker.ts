import type { CountdownState } from "../domain/countdown/CountdownState";
import type { LoggerPort } from "../ports/sys/LoggerPort";

export const TICK_INTERVAL_MS = 1000;

/**
 * `skipped` means the countdown state was held by another actor when the
 * tick fired. The second is lost: nothing is retried or made up later.
 */
export type TickOutcome = "applied" | "skipped";

export interface TickerOptions {
  intervalMs?: number;
  logger?: LoggerPort;
}

export class Ticker {
  private timeout: NodeJS.Timeout | null = null;
  private skipped = 0;
  private readonly intervalMs: number;

  constructor(
    private readonly state: CountdownState,
    private readonly options: TickerOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? TICK_INTERVAL_MS;
  }

  get running(): boolean {
    return this.timeout !== null;
  }

  get skippedTicks(): number {
    return this.skipped;
  }

  start(): void {
    if (this.timeout) return;
    this.schedule();
  }

  stop(): void {
    if (!this.timeout) return;
    clearTimeout(this.timeout);
    this.timeout = null;
  }

  tick(): TickOutcome {
    const change = this.state.tryApply({ type: "tick" });
    if (!change) {
      this.skipped += 1;
      this.options.logger?.debug("Tick skipped: countdown state busy", {
        skippedTicks: this.skipped,
      });
      return "skipped";
    }
    return "applied";
  }

  private schedule() {
    this.timeout = setTimeout(() => {
      this.tick();
      if (this.timeout) this.schedule();
    }, this.intervalMs);
    // The process may exit mid-iteration; nothing is persisted during a tick.
    if (typeof this.timeout.unref === "function") {
      this.timeout.unref();
    }
  }
}
