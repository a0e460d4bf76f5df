import { ExclusiveCell } from "../../shared/ExclusiveCell";
import { transition, sameSnapshot } from "./transitions";
import {
  INITIAL_COUNTDOWN,
  type CountdownEvent,
  type CountdownSnapshot,
} from "./types";

export interface CountdownTransition {
  event: CountdownEvent;
  previous: CountdownSnapshot;
  next: CountdownSnapshot;
  changed: boolean;
}

type TransitionListener = (change: CountdownTransition) => void;

/**
 * Remaining seconds and status, owned together so that every transition is
 * applied in one step. Access attempts never wait: `null` means another
 * holder has the state and the caller skips this cycle.
 */
export class CountdownState {
  private readonly cell = new ExclusiveCell<CountdownSnapshot>(INITIAL_COUNTDOWN);
  private readonly listeners = new Set<TransitionListener>();

  tryApply(event: CountdownEvent): CountdownTransition | null {
    const lease = this.cell.tryAcquire();
    if (!lease) return null;

    let change: CountdownTransition;
    try {
      const previous = lease.value;
      const next = transition(previous, event);
      lease.set(next);
      change = { event, previous, next, changed: !sameSnapshot(previous, next) };
    } finally {
      lease.release();
    }

    // A start always begins a new phase, even when it lands on the same snapshot.
    if (change.changed || event.type === "start") this.notify(change);
    return change;
  }

  trySnapshot(): CountdownSnapshot | null {
    return this.cell.tryRead();
  }

  /**
   * Holds the state exclusively until the lease is released. Ticks and
   * commands attempted meanwhile are skipped, not deferred.
   */
  tryHold(): (() => void) | null {
    const lease = this.cell.tryAcquire();
    return lease ? () => lease.release() : null;
  }

  onTransition(handler: TransitionListener): () => void {
    this.listeners.add(handler);
    return () => {
      this.listeners.delete(handler);
    };
  }

  private notify(change: CountdownTransition) {
    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (err) {
        console.warn("Countdown listener failed:", err);
      }
    }
  }
}
