export type Status =
  | "Wait"
  | "Running"
  | "Stop"
  | "Rest"
  | "RestRunning"
  | "RestWait";

export const STATUSES: readonly Status[] = [
  "Wait",
  "Running",
  "Stop",
  "Rest",
  "RestRunning",
  "RestWait",
];

export interface CountdownSnapshot {
  readonly status: Status;
  /** Whole seconds left in the current phase. */
  readonly remaining: number;
}

export const INITIAL_COUNTDOWN: CountdownSnapshot = {
  status: "Wait",
  remaining: 0,
};

export interface PhaseSettings {
  runSecs: number;
  restSecs: number;
  autoNext: boolean;
}

export type CountdownEvent =
  | { type: "start"; runSecs: number }
  | { type: "tick" }
  | { type: "pause" }
  | { type: "resume" }
  | { type: "check"; settings: PhaseSettings };

export function isPhaseActive(status: Status): boolean {
  return status === "Running" || status === "RestRunning";
}
