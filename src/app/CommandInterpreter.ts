import { parseSecondsInput } from "../config";
import type { SettingsStore } from "./SettingsStore";
import type { CommandOutcome, TimerEngine } from "./TimerEngine";

export type CommandResult =
  | { kind: "ok"; message: string }
  | { kind: "error"; message: string }
  | { kind: "quit"; message: string };

export const HELP_TEXT = [
  "Commands:",
  "  start | s           start (or restart) the work phase",
  "  pause | p           pause the work phase",
  "  resume | r          resume a paused work phase",
  "  toggle | t          pause or resume, whichever applies",
  "  auto [on|off]       toggle or set auto-start of the next work phase",
  "  run <secs>          set the work phase length",
  "  rest <secs>         set the rest phase length",
  "  status              show the clock state and settings",
  "  help | h | ?        show this help",
  "  quit | q            exit",
].join("\n");

const BUSY = "Clock busy, try again.";

export class CommandInterpreter {
  constructor(
    private readonly engine: TimerEngine,
    private readonly settings: SettingsStore
  ) {}

  execute(line: string): CommandResult {
    const [name = "", ...rest] = line.trim().split(/\s+/);
    const arg = rest.join(" ");

    switch (name.toLowerCase()) {
      case "":
        return ok("");
      case "start":
      case "s":
        return this.start();
      case "pause":
      case "p":
        return reportOutcome(this.engine.pause(), "Paused.", "Nothing to pause.");
      case "resume":
      case "r":
        return reportOutcome(this.engine.resume(), "Resumed.", "Nothing to resume.");
      case "toggle":
      case "t":
        return this.toggle();
      case "auto":
        return this.auto(arg);
      case "run":
        return this.setDuration("runSecs", "Work", arg);
      case "rest":
        return this.setDuration("restSecs", "Rest", arg);
      case "status":
        return this.status();
      case "help":
      case "h":
      case "?":
        return ok(HELP_TEXT);
      case "quit":
      case "q":
      case "exit":
        return { kind: "quit", message: "Bye." };
      default:
        return {
          kind: "error",
          message: `Unknown command "${name}". Type "help" for commands.`,
        };
    }
  }

  private start(): CommandResult {
    if (this.engine.start() === "busy") return { kind: "error", message: BUSY };
    return ok(`Work phase started (${this.settings.current().runSecs}s).`);
  }

  private toggle(): CommandResult {
    const snapshot = this.engine.snapshot();
    if (!snapshot) return { kind: "error", message: BUSY };
    if (snapshot.status === "Running") {
      return reportOutcome(this.engine.pause(), "Paused.", "Nothing to pause.");
    }
    if (snapshot.status === "Stop") {
      return reportOutcome(this.engine.resume(), "Resumed.", "Nothing to resume.");
    }
    return ok("Nothing to pause or resume.");
  }

  private auto(arg: string): CommandResult {
    let autoNext: boolean;
    switch (arg.toLowerCase()) {
      case "":
        autoNext = !this.settings.current().autoNext;
        break;
      case "on":
        autoNext = true;
        break;
      case "off":
        autoNext = false;
        break;
      default:
        return { kind: "error", message: "Usage: auto [on|off]" };
    }

    const { saved } = this.settings.update({ autoNext });
    return ok(`Auto-next ${autoNext ? "on" : "off"}.${saved ? "" : " (not saved)"}`);
  }

  private setDuration(key: "runSecs" | "restSecs", label: string, arg: string): CommandResult {
    const seconds = parseSecondsInput(arg);
    if (seconds === null) {
      return { kind: "error", message: `Invalid number of seconds: "${arg}".` };
    }
    const patch = key === "runSecs" ? { runSecs: seconds } : { restSecs: seconds };
    const { saved } = this.settings.update(patch);
    return ok(`${label} phase set to ${seconds}s.${saved ? "" : " (not saved)"}`);
  }

  private status(): CommandResult {
    const snapshot = this.engine.snapshot();
    if (!snapshot) return { kind: "error", message: BUSY };
    const { runSecs, restSecs, autoNext } = this.settings.current();
    return ok(
      `${snapshot.status}, ${snapshot.remaining}s remaining; work ${runSecs}s, rest ${restSecs}s, auto-next ${
        autoNext ? "on" : "off"
      }.`
    );
  }
}

function ok(message: string): CommandResult {
  return { kind: "ok", message };
}

function reportOutcome(outcome: CommandOutcome, applied: string, ignored: string): CommandResult {
  switch (outcome) {
    case "applied":
      return ok(applied);
    case "ignored":
      return ok(ignored);
    case "busy":
      return { kind: "error", message: BUSY };
  }
}
