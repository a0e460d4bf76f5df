import { selectCue, type CueCatalog, type CueId } from "../domain/cues/CueCatalog";
import type { CountdownTransition } from "../domain/countdown/CountdownState";
import type { CountdownSnapshot } from "../domain/countdown/types";
import type { EventBus } from "../domain/events/EventBus";
import { Topics } from "../domain/events/EventBus";
import type { CuePlayerPort, PlayRequestOutcome } from "../ports/audio/CuePlayerPort";
import type { LoggerPort } from "../ports/sys/LoggerPort";

const CUE_TONE_MS = 350;

export interface CueRequest {
  cue: CueId;
  resource: string;
  outcome: PlayRequestOutcome;
}

/**
 * Turns countdown snapshots into cue requests. A threshold is requested once
 * per visit: later polls during the same second do not ask again, whether the
 * first request started, was dropped or failed. A start opens a new visit.
 */
export class AudioCueDispatcher {
  private lastKey: string | null = null;

  constructor(
    private readonly player: CuePlayerPort,
    private readonly catalog: CueCatalog,
    private readonly bus?: EventBus,
    private readonly logger?: LoggerPort
  ) {}

  handleTransition({ event }: CountdownTransition): void {
    if (event.type === "start") this.lastKey = null;
  }

  dispatch(snapshot: CountdownSnapshot | null): CueRequest | null {
    // State held elsewhere this cycle.
    if (!snapshot) return null;

    const cue = selectCue(snapshot);
    if (!cue) {
      this.lastKey = null;
      return null;
    }

    const key = `${snapshot.status}:${snapshot.remaining}`;
    if (key === this.lastKey) return null;
    this.lastKey = key;

    const resource = this.catalog.resolve(cue);
    let outcome: PlayRequestOutcome;
    try {
      const { toneFrequency } = this.catalog.definition(cue);
      outcome = this.player.request(resource, {
        fallbackTone: { frequency: toneFrequency, ms: CUE_TONE_MS },
      });
    } catch (err) {
      this.logger?.debug("Cue playback failed", { cue, error: String(err) });
      outcome = "unavailable";
    }

    if (outcome !== "started") {
      this.logger?.debug(`Cue ${cue} not played`, { outcome });
    }

    const request: CueRequest = { cue, resource, outcome };
    this.bus?.publish(Topics.CueRequested, request);
    return request;
  }
}
