import type { CountdownSnapshot } from "../../domain/countdown/types";

export type DisplayTone = "normal" | "rest" | "warning";

export interface DisplayView {
  snapshot: CountdownSnapshot;
  autoNext: boolean;
}

export interface DisplayPort {
  render(view: DisplayView): void;
  close?(): void;
}
