import fs from "fs";
import { tmpdir } from "os";
import path from "path";
import { spawn, spawnSync, type ChildProcess } from "child_process";
import type {
  CuePlayerPort,
  CueRequestOptions,
  PlaybackState,
  PlayRequestOutcome,
  ToneOptions,
} from "../../ports/audio/CuePlayerPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";

interface AudioPlayerCandidate {
  command: string;
  /** File extensions the command can decode; `null` means anything. */
  formats: readonly string[] | null;
  makeArgs: (file: string) => string[];
}

const ffplay: AudioPlayerCandidate = {
  command: "ffplay",
  formats: null,
  makeArgs: (file) => ["-autoexit", "-nodisp", "-loglevel", "error", file],
};

function candidates(): AudioPlayerCandidate[] {
  if (process.platform === "darwin") {
    return [
      { command: "afplay", formats: [".mp3", ".wav"], makeArgs: (file) => [file] },
      ffplay,
    ];
  }

  return [
    ffplay,
    { command: "mpg123", formats: [".mp3"], makeArgs: (file) => ["-q", file] },
    { command: "play", formats: [".mp3", ".wav"], makeArgs: (file) => ["-q", file] },
    { command: "paplay", formats: [".wav"], makeArgs: (file) => [file] },
    { command: "aplay", formats: [".wav"], makeArgs: (file) => ["-q", file] },
  ];
}

export interface ProcessCuePlayerOptions {
  /** Synthesize a short tone when a cue file is missing. */
  toneFallback?: boolean;
  logger?: LoggerPort;
}

/**
 * Plays one cue at a time through a command-line audio player. A request
 * made while a cue is still playing is dropped.
 */
export class ProcessCuePlayer implements CuePlayerPort {
  private readonly detected = new Map<string, AudioPlayerCandidate | null>();
  private readonly toneCache = new Map<string, string>();
  private child: ChildProcess | null = null;

  constructor(private readonly options: ProcessCuePlayerOptions = {}) {}

  get state(): PlaybackState {
    return this.child ? "Playing" : "Idle";
  }

  request(resource: string, options: CueRequestOptions = {}): PlayRequestOutcome {
    if (this.child) return "busy";

    if (fs.existsSync(resource)) {
      return this.launch(resource);
    }

    if (this.options.toneFallback && options.fallbackTone) {
      try {
        return this.launch(this.prepareTone(options.fallbackTone));
      } catch (err) {
        this.options.logger?.debug("Cue tone could not be written", {
          error: String(err),
        });
        return "unavailable";
      }
    }

    this.options.logger?.debug("Cue resource missing", { resource });
    return "unavailable";
  }

  stop(): void {
    const child = this.child;
    if (child && child.exitCode === null && child.signalCode === null) {
      child.kill("SIGTERM");
    }
  }

  prepareTone(options: ToneOptions): string {
    const cacheKey = `${options.frequency}-${options.ms}-${options.volume ?? ""}`;
    const cached = this.toneCache.get(cacheKey);
    if (cached) return cached;

    const filePath = path.join(tmpdir(), `interval-clock-tone-${cacheKey}.wav`);
    fs.writeFileSync(filePath, createToneBuffer(options));
    this.toneCache.set(cacheKey, filePath);
    return filePath;
  }

  private launch(file: string): PlayRequestOutcome {
    const player = this.findPlayer(path.extname(file).toLowerCase());
    if (!player) return "unavailable";

    let child: ChildProcess;
    try {
      child = spawn(player.command, player.makeArgs(file), { stdio: "ignore" });
    } catch (err) {
      this.options.logger?.debug("Cue player failed to start", {
        command: player.command,
        error: String(err),
      });
      return "unavailable";
    }

    this.child = child;
    const finish = () => {
      if (this.child === child) this.child = null;
    };

    child.on("error", (err) => {
      this.options.logger?.debug("Cue player error", {
        command: player.command,
        error: err.message,
      });
      finish();
    });
    child.on("exit", (code, signalName) => {
      if (code !== 0 && !(code === null && signalName === "SIGTERM")) {
        this.options.logger?.debug(
          `Cue player exited with code ${code}${signalName ? ` (signal ${signalName})` : ""}`,
          { file }
        );
      }
      finish();
    });

    return "started";
  }

  private findPlayer(extension: string): AudioPlayerCandidate | null {
    const known = this.detected.get(extension);
    if (known !== undefined) return known;

    for (const candidate of candidates()) {
      if (candidate.formats && !candidate.formats.includes(extension)) continue;
      const lookup = spawnSync("which", [candidate.command], { stdio: "ignore" });
      if (lookup.status === 0) {
        this.detected.set(extension, candidate);
        this.options.logger?.info(`Audio player for ${extension || "cues"}: ${candidate.command}`);
        return candidate;
      }
    }

    this.options.logger?.warn(
      `No audio player found for ${extension || "cue"} files. Cues disabled for this format.`
    );
    this.detected.set(extension, null);
    return null;
  }
}

export function createToneBuffer({
  frequency,
  ms,
  volume = 0.3,
}: ToneOptions): Buffer {
  const sampleRate = 24000;
  const sampleCount = Math.max(1, Math.round((sampleRate * ms) / 1000));
  const dataSize = sampleCount * 2;
  const buffer = Buffer.alloc(44 + dataSize);

  buffer.write("RIFF", 0);
  buffer.writeUInt32LE(36 + dataSize, 4);
  buffer.write("WAVE", 8);
  buffer.write("fmt ", 12);
  buffer.writeUInt32LE(16, 16);
  buffer.writeUInt16LE(1, 20);
  buffer.writeUInt16LE(1, 22);
  buffer.writeUInt32LE(sampleRate, 24);
  buffer.writeUInt32LE(sampleRate * 2, 28);
  buffer.writeUInt16LE(2, 32);
  buffer.writeUInt16LE(16, 34);
  buffer.write("data", 36);
  buffer.writeUInt32LE(dataSize, 40);

  const amplitude = Math.max(0, Math.min(1, volume)) * 0.8 * 0x7fff;
  const fadeSamples = Math.min(sampleCount / 4, Math.round((sampleRate * 10) / 1000));

  for (let i = 0; i < sampleCount; i++) {
    const t = i / sampleRate;
    let sample = Math.sin(2 * Math.PI * frequency * t);
    if (fadeSamples > 0) {
      const fadeIn = Math.min(1, i / fadeSamples);
      const fadeOut = Math.min(1, (sampleCount - i - 1) / fadeSamples);
      sample *= Math.min(fadeIn, fadeOut);
    }
    const value = Math.round(sample * amplitude);
    buffer.writeInt16LE(value, 44 + i * 2);
  }

  return buffer;
}
