import type { CountdownSnapshot, Status } from "../../domain/countdown/types";
import type { DisplayPort, DisplayTone, DisplayView } from "../../ports/ui/DisplayPort";

const STATUS_LABELS: Record<Status, string> = {
  Wait: "ready",
  Running: "work",
  Stop: "paused",
  Rest: "rest",
  RestRunning: "rest",
  RestWait: "rest done",
};

const ANSI: Record<DisplayTone, string> = {
  normal: "",
  rest: "\x1b[32m",
  warning: "\x1b[31m",
};
const RESET = "\x1b[0m";
const CLEAR_LINE = "\r\x1b[2K";

export interface FormattedDisplay {
  text: string;
  tone: DisplayTone;
}

export function displayTone({ status, remaining }: CountdownSnapshot): DisplayTone {
  if (status === "RestRunning") return "rest";
  if (status === "Running" && remaining <= 5) return "warning";
  return "normal";
}

export function formatDisplay({ snapshot, autoNext }: DisplayView): FormattedDisplay {
  const seconds = String(snapshot.remaining).padStart(4);
  const suffix = autoNext ? "  (auto-next)" : "";
  return {
    text: `${seconds}  ${STATUS_LABELS[snapshot.status]}${suffix}`,
    tone: displayTone(snapshot),
  };
}

export interface OutputStream {
  write(chunk: string): boolean;
  isTTY?: boolean;
}

export class TerminalRenderer implements DisplayPort {
  private lastLine: string | null = null;

  constructor(private readonly out: OutputStream = process.stdout) {}

  render(view: DisplayView): void {
    const { text, tone } = formatDisplay(view);
    const line = `${tone}:${text}`;
    if (line === this.lastLine) return;
    this.lastLine = line;

    if (this.out.isTTY) {
      const color = ANSI[tone];
      this.out.write(`${CLEAR_LINE}${color}${text}${color ? RESET : ""}`);
    } else {
      this.out.write(`${text}\n`);
    }
  }

  close(): void {
    if (this.out.isTTY && this.lastLine !== null) {
      this.out.write("\n");
    }
    this.lastLine = null;
  }
}
