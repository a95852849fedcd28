import { Buffer } from "node:buffer";
import { spawn } from "node:child_process";
import type { EventEmitter } from "node:events";
import type { Readable } from "node:stream";
import { createLogger, type Logger } from "@/lib/logger";
import { VoiceCaptureError } from "./errors";
import type { AudioInputEngine, AudioTap } from "./ports";

const DEFAULT_SAMPLE_RATE = 16000;
const STDERR_LIMIT = 4096;

export interface CaptureProcess extends EventEmitter {
  stdout: Readable;
  stderr: Readable;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnCaptureProcess = (executable: string, args: string[]) => CaptureProcess;

export interface FfmpegAudioEngineOptions {
  executable?: string;
  inputFormat?: string;
  inputDevice?: string;
  sampleRate?: number;
  platform?: NodeJS.Platform;
  spawnProcess?: SpawnCaptureProcess;
  logger?: Logger;
}

/** Captures the default microphone through ffmpeg as 16-bit mono PCM on stdout. */
export class FfmpegAudioEngine implements AudioInputEngine {
  private readonly executable: string;
  private readonly inputFormat: string;
  private readonly inputDevice: string;
  private readonly sampleRate: number;
  private readonly spawnProcess: SpawnCaptureProcess;
  private readonly logger: Logger;

  private tap: AudioTap | null = null;
  private process: CaptureProcess | null = null;
  private remainder = Buffer.alloc(0);

  constructor(options?: FfmpegAudioEngineOptions) {
    const defaults = resolveInputDefaults(options?.platform ?? process.platform);
    this.executable = options?.executable?.trim() || "ffmpeg";
    this.inputFormat = options?.inputFormat ?? defaults.format;
    this.inputDevice = options?.inputDevice ?? defaults.device;
    this.sampleRate = options?.sampleRate ?? DEFAULT_SAMPLE_RATE;
    this.spawnProcess =
      options?.spawnProcess ??
      ((executable, args) => spawn(executable, args, { stdio: ["ignore", "pipe", "pipe"] }));
    this.logger = options?.logger ?? createLogger("voice");
  }

  installTap(tap: AudioTap) {
    if (this.tap) {
      throw new VoiceCaptureError("audio_engine", "音频采集回调已安装，请先移除");
    }
    this.tap = tap;
  }

  removeTap() {
    this.tap = null;
  }

  start(): Promise<void> {
    if (this.process) {
      return Promise.resolve();
    }

    const args = buildCaptureArgs(this.inputFormat, this.inputDevice, this.sampleRate);
    this.logger.debug("spawn_ffmpeg", { executable: this.executable, args });

    return new Promise<void>((resolve, reject) => {
      let spawned = false;
      let stderr = "";
      const child = this.spawnProcess(this.executable, args);
      this.process = child;
      this.remainder = Buffer.alloc(0);

      child.stdout.on("data", (chunk: Buffer) => {
        if (this.process === child) {
          this.handleChunk(chunk);
        }
      });

      child.stderr.on("data", (chunk: Buffer) => {
        stderr = `${stderr}${chunk.toString("utf-8")}`.slice(-STDERR_LIMIT);
      });

      child.once("spawn", () => {
        spawned = true;
        resolve();
      });

      child.on("error", (error: Error) => {
        if (!spawned) {
          if (this.process === child) {
            this.process = null;
          }
          reject(
            new VoiceCaptureError("audio_engine", "无法启动 ffmpeg 录音，请确认已安装 ffmpeg。", {
              cause: error,
            })
          );
          return;
        }
        this.logger.error("ffmpeg 录音进程异常", { message: error.message });
        if (this.process === child) {
          this.tap?.onInterrupted(error);
        }
      });

      child.on("close", (code: number | null) => {
        if (this.process !== child) {
          return;
        }
        this.process = null;
        const message = `ffmpeg 录音进程意外退出（代码 ${code ?? "未知"}）`;
        this.logger.error(message, { stderr: stderr.trim() });
        this.tap?.onInterrupted(
          new VoiceCaptureError("interrupted", message, { details: stderr.trim() || undefined })
        );
      });
    });
  }

  stop() {
    const child = this.process;
    if (!child) {
      return;
    }
    this.process = null;
    this.remainder = Buffer.alloc(0);
    child.kill("SIGTERM");
  }

  private handleChunk(chunk: Buffer) {
    const combined = this.remainder.length > 0 ? Buffer.concat([this.remainder, chunk]) : chunk;
    const usable = combined.length - (combined.length % 2);
    this.remainder = Buffer.from(combined.subarray(usable));
    if (usable === 0) {
      return;
    }

    const samples = new Float32Array(usable / 2);
    for (let index = 0; index < samples.length; index += 1) {
      samples[index] = combined.readInt16LE(index * 2) / 32768;
    }
    this.tap?.onBuffer({ samples, sampleRate: this.sampleRate });
  }
}

export function buildCaptureArgs(inputFormat: string, inputDevice: string, sampleRate: number) {
  return [
    "-hide_banner",
    "-loglevel",
    "error",
    "-f",
    inputFormat,
    "-i",
    inputDevice,
    "-ac",
    "1",
    "-ar",
    String(sampleRate),
    "-f",
    "s16le",
    "-acodec",
    "pcm_s16le",
    "pipe:1",
  ];
}

function resolveInputDefaults(platform: NodeJS.Platform) {
  if (platform === "darwin") {
    return { format: "avfoundation", device: ":0" };
  }
  if (platform === "win32") {
    return { format: "dshow", device: "audio=default" };
  }
  return { format: "pulse", device: "default" };
}
