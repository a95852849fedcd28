import { Buffer } from "node:buffer";
import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";
import { describe, expect, it, vi } from "vitest";
import { silentLogger } from "@/lib/logger";
import { VoiceCaptureError } from "@/lib/voice/errors";
import { FfmpegAudioEngine, buildCaptureArgs, type CaptureProcess } from "@/lib/voice/ffmpeg-engine";
import type { AudioBuffer } from "@/lib/voice/ports";

class FakeProcess extends EventEmitter implements CaptureProcess {
  stdout = new PassThrough();
  stderr = new PassThrough();
  signals: Array<NodeJS.Signals | undefined> = [];

  kill(signal?: NodeJS.Signals) {
    this.signals.push(signal);
    return true;
  }
}

function setup() {
  const child = new FakeProcess();
  const spawnProcess = vi.fn((_executable: string, _args: string[]) => child);
  const engine = new FfmpegAudioEngine({
    executable: "/usr/local/bin/ffmpeg",
    platform: "linux",
    spawnProcess,
    logger: silentLogger,
  });
  const buffers: AudioBuffer[] = [];
  const interruptions: Error[] = [];
  engine.installTap({
    onBuffer: (buffer) => buffers.push(buffer),
    onInterrupted: (error) => interruptions.push(error),
  });
  return { child, spawnProcess, engine, buffers, interruptions };
}

function waitForData() {
  return new Promise<void>((resolve) => {
    setImmediate(resolve);
  });
}

describe("ffmpeg 音频采集", () => {
  it("使用平台默认设备启动采集进程", async () => {
    const { child, spawnProcess, engine } = setup();

    const started = engine.start();
    child.emit("spawn");
    await started;

    expect(spawnProcess).toHaveBeenCalledWith(
      "/usr/local/bin/ffmpeg",
      buildCaptureArgs("pulse", "default", 16000)
    );
    expect(buildCaptureArgs("pulse", "default", 16000)).toEqual([
      "-hide_banner",
      "-loglevel",
      "error",
      "-f",
      "pulse",
      "-i",
      "default",
      "-ac",
      "1",
      "-ar",
      "16000",
      "-f",
      "s16le",
      "-acodec",
      "pcm_s16le",
      "pipe:1",
    ]);
  });

  it("将 16 位 PCM 转换为浮点采样并保留不完整的字节", async () => {
    const { child, engine, buffers } = setup();
    const started = engine.start();
    child.emit("spawn");
    await started;

    child.stdout.write(Buffer.from([0x00, 0x40, 0x00]));
    await waitForData();
    child.stdout.write(Buffer.from([0xc0]));
    await waitForData();

    expect(buffers.map((buffer) => Array.from(buffer.samples))).toEqual([[0.5], [-0.5]]);
    expect(buffers[0].sampleRate).toBe(16000);
  });

  it("进程无法启动时报错", async () => {
    const { child, engine } = setup();

    const started = engine.start();
    child.emit("error", new Error("spawn ffmpeg ENOENT"));

    await expect(started).rejects.toBeInstanceOf(VoiceCaptureError);
    await expect(started).rejects.toThrow("无法启动 ffmpeg 录音，请确认已安装 ffmpeg。");
  });

  it("进程意外退出时通知中断", async () => {
    const { child, engine, interruptions } = setup();
    const started = engine.start();
    child.emit("spawn");
    await started;

    child.emit("close", 1);

    expect(interruptions).toHaveLength(1);
    expect(interruptions[0].message).toBe("ffmpeg 录音进程意外退出（代码 1）");
  });

  it("主动停止时结束进程且不通知中断", async () => {
    const { child, engine, interruptions } = setup();
    const started = engine.start();
    child.emit("spawn");
    await started;

    engine.stop();
    child.emit("close", null);

    expect(child.signals).toEqual(["SIGTERM"]);
    expect(interruptions).toHaveLength(0);
  });

  it("不允许重复安装采集回调", () => {
    const { engine } = setup();

    expect(() =>
      engine.installTap({ onBuffer: () => undefined, onInterrupted: () => undefined })
    ).toThrow(VoiceCaptureError);
    engine.removeTap();
    expect(() =>
      engine.installTap({ onBuffer: () => undefined, onInterrupted: () => undefined })
    ).not.toThrow();
  });
});
