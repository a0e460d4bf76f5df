import type { CountdownEvent, CountdownSnapshot } from "./types";
import { isPhaseActive } from "./types";

export function transition(
  state: CountdownSnapshot,
  event: CountdownEvent
): CountdownSnapshot {
  switch (event.type) {
    case "start":
      return { status: "Running", remaining: toSeconds(event.runSecs) };
    case "tick":
      return tick(state);
    case "pause":
      return state.status === "Running" ? { ...state, status: "Stop" } : state;
    case "resume":
      return state.status === "Stop" ? { ...state, status: "Running" } : state;
    case "check":
      if (state.status === "Rest") {
        return {
          status: "RestRunning",
          remaining: toSeconds(event.settings.restSecs),
        };
      }
      if (state.status === "RestWait" && event.settings.autoNext) {
        return transition(state, { type: "start", runSecs: event.settings.runSecs });
      }
      return state;
    default: {
      const unreachable: never = event;
      throw new Error(`Unknown countdown event: ${JSON.stringify(unreachable)}`);
    }
  }
}

function tick(state: CountdownSnapshot): CountdownSnapshot {
  if (state.remaining > 0) {
    return isPhaseActive(state.status)
      ? { ...state, remaining: state.remaining - 1 }
      : state;
  }

  switch (state.status) {
    case "Running":
      return { status: "Rest", remaining: 0 };
    case "RestRunning":
      return { status: "RestWait", remaining: 0 };
    case "Wait":
      return state;
    default:
      return { status: "Wait", remaining: 0 };
  }
}

// Settings arrive already parsed; this only keeps the counter a whole, non-negative number.
function toSeconds(value: number): number {
  if (!Number.isFinite(value) || value <= 0) return 0;
  return Math.floor(value);
}

export function sameSnapshot(a: CountdownSnapshot, b: CountdownSnapshot): boolean {
  return a.status === b.status && a.remaining === b.remaining;
}
