import { beforeEach, describe, expect, it } from "vitest";
import { silentLogger } from "@/lib/logger";
import { AudioCaptureSession } from "@/lib/voice/capture-session";
import { RECOGNITION_CODES, VoiceCaptureError, recognitionError } from "@/lib/voice/errors";
import {
  FakeAudioEngine,
  FakeAudioSession,
  FakePermissions,
  ScriptedRecognizer,
  flushAsync,
} from "./utils/fakes";

const RELEASED = {
  engineRunning: false,
  tapInstalled: false,
  hasActiveRecognitionRequest: false,
  hasActiveRecognitionTask: false,
  audioSessionActive: false,
};

describe("音频采集会话", () => {
  let engine: FakeAudioEngine;
  let audioSession: FakeAudioSession;
  let permissions: FakePermissions;
  let recognizer: ScriptedRecognizer;
  let clock: number;
  let session: AudioCaptureSession;

  beforeEach(() => {
    engine = new FakeAudioEngine();
    audioSession = new FakeAudioSession();
    permissions = new FakePermissions();
    recognizer = new ScriptedRecognizer();
    clock = 1000;
    session = new AudioCaptureSession({
      engine,
      audioSession,
      permissions,
      recognizer,
      stopGraceMs: 50,
      now: () => clock,
      logger: silentLogger,
    });
  });

  async function captureStartError() {
    try {
      await session.start();
    } catch (error) {
      if (error instanceof VoiceCaptureError) {
        return error;
      }
      throw error;
    }
    throw new Error("expected start() to fail");
  }

  it("开始录音时申请全部资源", async () => {
    await session.start();

    expect(session.getState().recordingState).toEqual({ status: "recording" });
    expect(session.getResourceStatus()).toEqual({
      engineRunning: true,
      tapInstalled: true,
      hasActiveRecognitionRequest: true,
      hasActiveRecognitionTask: true,
      audioSessionActive: true,
    });
    expect(audioSession.configured).toEqual({ duckOthers: true, allowBluetooth: true });
  });

  it("停止后返回最终文本并释放资源", async () => {
    recognizer.finalTranscript = "我今天花了25元买午餐";
    await session.start();
    clock = 3500;

    const recording = await session.stop();

    expect(recording).toEqual({
      sessionId: 1,
      text: "我今天花了25元买午餐",
      durationMs: 2500,
      startedAt: new Date(1000),
    });
    expect(session.getState()).toMatchObject({
      recordingState: { status: "completed" },
      transcript: { text: "我今天花了25元买午餐", isFinal: true },
      audioLevel: 0,
      lastRecording: recording,
    });
    expect(session.getResourceStatus()).toEqual(RELEASED);
    expect(recognizer.latest.request.endCount).toBe(1);
    expect(recognizer.latest.cancelCount).toBe(1);
    expect(audioSession.activations).toEqual([true, false]);
  });

  it("没有最终结果时在宽限期后使用已有文本", async () => {
    await session.start();
    recognizer.emit({ type: "result", transcript: { text: " 打车15元 ", isFinal: false } });
    await flushAsync();

    const recording = await session.stop();

    expect(recording?.text).toBe("打车15元");
  });

  it("连续两次停止只清理一次", async () => {
    recognizer.finalTranscript = "午餐";
    await session.start();

    const [first, second] = await Promise.all([session.stop(), session.stop()]);
    const third = await session.stop();

    expect(first?.text).toBe("午餐");
    expect(second).toBeNull();
    expect(third).toBeNull();
    expect(engine.stopCount).toBe(1);
    expect(recognizer.latest.cancelCount).toBe(1);
    expect(audioSession.activations).toEqual([true, false]);
  });

  it("连续两次开始不会产生两个采集回调", async () => {
    await Promise.all([session.start(), session.start()]);

    expect(engine.installCount).toBe(2);
    expect(engine.stopCount).toBe(1);
    expect(engine.tap).not.toBeNull();
    expect(recognizer.tasks).toHaveLength(2);
    expect(recognizer.tasks[0].cancelCount).toBe(1);
    expect(session.getState().recordingState).toEqual({ status: "recording" });
  });

  it("忽略已被取代的会话的迟到回调", async () => {
    await session.start();
    await session.start();

    recognizer.emit({ type: "result", transcript: { text: "旧的文本", isFinal: true } }, 0);
    recognizer.emit(
      { type: "error", error: recognitionError("transport", RECOGNITION_CODES.transportFailed, "x") },
      0
    );
    await flushAsync();

    expect(session.getState().transcript.text).toBe("");
    expect(session.getState().recordingState).toEqual({ status: "recording" });
  });

  it("停止之后到达的回调不会改变结果", async () => {
    recognizer.finalTranscript = "午餐";
    await session.start();
    await session.stop();

    recognizer.emit({ type: "result", transcript: { text: "迟到的文本", isFinal: true } });
    await flushAsync();

    expect(session.getState().transcript.text).toBe("午餐");
    expect(session.getState().recordingState).toEqual({ status: "completed" });
  });

  it("缺少权限时进入错误状态", async () => {
    permissions.snapshot = { microphone: false, speechRecognition: true };

    const error = await captureStartError();

    expect(error.kind).toBe("permission_denied");
    expect(error.message).toBe("需要麦克风和语音识别权限");
    expect(session.getState().recordingState).toEqual({
      status: "error",
      message: "需要麦克风和语音识别权限",
    });
    expect(session.getResourceStatus()).toEqual(RELEASED);
    expect(engine.installCount).toBe(0);
  });

  it("识别服务不可用时进入错误状态", async () => {
    recognizer.available = false;

    const error = await captureStartError();

    expect(error.kind).toBe("recognizer_unavailable");
    expect(error.message).toBe("语音识别服务不可用");
  });

  it("音频引擎启动失败时释放已申请的资源", async () => {
    engine.failStart = new Error("device busy");

    const error = await captureStartError();

    expect(error.kind).toBe("audio_engine");
    expect(error.message).toBe("音频引擎配置失败");
    expect(session.getResourceStatus()).toEqual(RELEASED);
    expect(engine.tap).toBeNull();
    expect(engine.stopCount).toBe(0);
    expect(recognizer.latest.cancelCount).toBe(1);
    expect(audioSession.activations).toEqual([true, false]);
  });

  it("录音中的识别错误会结束会话", async () => {
    await session.start();

    recognizer.emit({
      type: "error",
      error: recognitionError("transport", RECOGNITION_CODES.transportFailed, "连接失败"),
    });
    await flushAsync();

    expect(session.getState().recordingState).toEqual({
      status: "error",
      message: "网络连接失败，请检查网络连接",
    });
    expect(session.getResourceStatus()).toEqual(RELEASED);
  });

  it("停止等待期间的识别错误同样结束会话", async () => {
    await session.start();
    recognizer.emit({ type: "result", transcript: { text: "午餐", isFinal: false } });
    await flushAsync();

    const stopping = session.stop();
    await flushAsync();
    recognizer.emit({
      type: "error",
      error: recognitionError("provider", 10165, "鉴权失败"),
    });

    expect(await stopping).toBeNull();
    expect(session.getState().recordingState).toEqual({
      status: "error",
      message: "录制过程中发生错误：鉴权失败",
    });
    expect(session.getState().lastRecording).toBeNull();
    expect(session.getResourceStatus()).toEqual(RELEASED);
    expect(engine.stopCount).toBe(1);
  });

  it("可忽略的识别错误不影响录音", async () => {
    await session.start();

    recognizer.emit({
      type: "error",
      error: recognitionError("assistant", RECOGNITION_CODES.noSpeechDetected, "no speech"),
    });
    await flushAsync();

    expect(session.getState().recordingState).toEqual({ status: "recording" });
  });

  it("系统中断时结束会话", async () => {
    await session.start();

    engine.interrupt();
    await flushAsync();

    expect(session.getState().recordingState).toEqual({
      status: "error",
      message: "录音被系统中断，请重新开始",
    });
    expect(engine.stopCount).toBe(1);
  });

  it("转发音频并发布平滑后的音量", async () => {
    await session.start();

    engine.emit([0.05, -0.05]);
    await flushAsync();

    expect(recognizer.latest.request.buffers).toHaveLength(1);
    expect(session.getState().audioLevel).toBeCloseTo(0.15, 5);
  });

  it("健康检查反映权限与资源状态", async () => {
    expect(await session.performHealthCheck()).toEqual({ status: "healthy" });

    await session.start();
    expect(await session.performHealthCheck()).toEqual({ status: "healthy" });

    permissions.snapshot = { microphone: false, speechRecognition: true };
    expect(await session.performHealthCheck()).toEqual({
      status: "critical",
      message: "麦克风权限未授权",
    });

    recognizer.available = false;
    expect(await session.performHealthCheck()).toEqual({
      status: "degraded",
      message: "语音识别服务不可用",
    });
  });
});
