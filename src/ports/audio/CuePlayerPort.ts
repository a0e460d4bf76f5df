export type PlaybackState = "Idle" | "Playing";

/**
 * `busy`: another cue is still playing, the request is dropped.
 * `unavailable`: the resource could not be loaded or no player exists.
 */
export type PlayRequestOutcome = "started" | "busy" | "unavailable";

export interface ToneOptions {
  frequency: number;
  ms: number;
  volume?: number;
}

export interface CueRequestOptions {
  /** Played instead when the resource is missing, if the player allows it. */
  fallbackTone?: ToneOptions;
}

export interface CuePlayerPort {
  readonly state: PlaybackState;
  request(resource: string, options?: CueRequestOptions): PlayRequestOutcome;
  stop?(): void;
}
