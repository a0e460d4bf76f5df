import path from "path";
import type { CountdownSnapshot } from "../countdown/types";

export type CueId = "90" | "60" | "30" | "10" | "5" | "rest" | "next";

export interface CueDefinition {
  id: CueId;
  fileName: string;
  /** Pitch of the synthesized stand-in used when the file is missing. */
  toneFrequency: number;
}

export const CUES: Record<CueId, CueDefinition> = {
  "90": { id: "90", fileName: "90.mp3", toneFrequency: 440 },
  "60": { id: "60", fileName: "60.mp3", toneFrequency: 494 },
  "30": { id: "30", fileName: "30.mp3", toneFrequency: 554 },
  "10": { id: "10", fileName: "10.mp3", toneFrequency: 659 },
  "5": { id: "5", fileName: "05.mp3", toneFrequency: 784 },
  rest: { id: "rest", fileName: "rest.mp3", toneFrequency: 880 },
  next: { id: "next", fileName: "next.mp3", toneFrequency: 988 },
};

const WORK_THRESHOLDS = new Map<number, CueId>([
  [90, "90"],
  [60, "60"],
  [30, "30"],
  [10, "10"],
  [5, "5"],
  [0, "rest"],
]);

export function selectCue({ status, remaining }: CountdownSnapshot): CueId | null {
  if (status === "Running") {
    return WORK_THRESHOLDS.get(remaining) ?? null;
  }
  if (status === "RestRunning" && remaining === 0) {
    return "next";
  }
  return null;
}

export class CueCatalog {
  constructor(private readonly audioDir: string) {}

  resolve(id: CueId): string {
    return path.join(this.audioDir, CUES[id].fileName);
  }

  definition(id: CueId): CueDefinition {
    return CUES[id];
  }
}
