import { createStore, type StoreApi } from "zustand/vanilla";
import type {
  HealthStatus,
  RecordingState,
  ResourceStatus,
  Transcript,
  VoiceRecording,
} from "@/types/voice";
import { createLogger, type Logger } from "@/lib/logger";
import { computeRms, normalizeLevel, smoothLevel } from "./audio-level";
import { classifyRecognitionError, describeRecognitionError } from "./error-classifier";
import { VoiceCaptureError } from "./errors";
import type {
  AudioBuffer,
  AudioInputEngine,
  AudioSessionPort,
  PermissionPort,
  RecognitionEvent,
  RecognitionRequest,
  RecognitionTask,
  SpeechRecognizer,
} from "./ports";
import { SerialExecutor } from "./serial-executor";

export const DEFAULT_STOP_GRACE_MS = 250;
const MAX_STOP_GRACE_MS = 300;

export interface CaptureSessionState {
  recordingState: RecordingState;
  transcript: Transcript;
  audioLevel: number;
  lastRecording: VoiceRecording | null;
}

export interface AudioCaptureSessionOptions {
  engine: AudioInputEngine;
  audioSession: AudioSessionPort;
  permissions: PermissionPort;
  recognizer: SpeechRecognizer;
  executor?: SerialExecutor;
  stopGraceMs?: number;
  now?: () => number;
  logger?: Logger;
}

const EMPTY_TRANSCRIPT: Transcript = { text: "", isFinal: false };

export class AudioCaptureSession {
  readonly store: StoreApi<CaptureSessionState>;

  private readonly engine: AudioInputEngine;
  private readonly audioSession: AudioSessionPort;
  private readonly permissions: PermissionPort;
  private readonly recognizer: SpeechRecognizer;
  private readonly executor: SerialExecutor;
  private readonly stopGraceMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  private engineRunning = false;
  private tapInstalled = false;
  private audioSessionActive = false;
  private request: RecognitionRequest | null = null;
  private task: RecognitionTask | null = null;
  private inputEnded = false;

  private generation = 0;
  private activeGeneration: number | null = null;
  private startedAt = 0;
  private smoothedLevel = 0;
  private levelPublishPending = false;
  private finalTranscriptWaiter: (() => void) | null = null;

  constructor(options: AudioCaptureSessionOptions) {
    this.engine = options.engine;
    this.audioSession = options.audioSession;
    this.permissions = options.permissions;
    this.recognizer = options.recognizer;
    this.executor = options.executor ?? new SerialExecutor();
    this.stopGraceMs = Math.min(
      Math.max(options.stopGraceMs ?? DEFAULT_STOP_GRACE_MS, 0),
      MAX_STOP_GRACE_MS
    );
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger("voice");
    this.store = createStore<CaptureSessionState>()(() => ({
      recordingState: { status: "idle" },
      transcript: EMPTY_TRANSCRIPT,
      audioLevel: 0,
      lastRecording: null,
    }));
  }

  getState() {
    return this.store.getState();
  }

  start(): Promise<void> {
    return this.executor.run(() => this.performStart());
  }

  /**
   * Ends recognition input, waits up to the grace delay for the final transcript, then tears
   * everything down. Resolves null when the session was not recording.
   */
  async stop(): Promise<VoiceRecording | null> {
    const generation = await this.executor.run(() => this.beginStop());
    if (generation === null) {
      return null;
    }
    await this.waitForFinalTranscript();
    return this.executor.run(() => this.finishStop(generation));
  }

  getResourceStatus(): ResourceStatus {
    return {
      engineRunning: this.engineRunning,
      tapInstalled: this.tapInstalled,
      hasActiveRecognitionRequest: this.request !== null,
      hasActiveRecognitionTask: this.task !== null,
      audioSessionActive: this.audioSessionActive,
    };
  }

  async performHealthCheck(): Promise<HealthStatus> {
    if (!(await this.recognizer.isAvailable())) {
      return { status: "degraded", message: "语音识别服务不可用" };
    }

    const permissions = await this.permissions.currentStatus();
    if (!permissions.speechRecognition) {
      return { status: "critical", message: "语音识别权限未授权" };
    }
    if (!permissions.microphone) {
      return { status: "critical", message: "麦克风权限未授权" };
    }

    const { status } = this.getState().recordingState;
    if (status === "recording" && (!this.engineRunning || !this.tapInstalled)) {
      return { status: "degraded", message: "音频引擎状态异常" };
    }
    if (status !== "recording" && status !== "processing" && this.hasLiveResources()) {
      return { status: "degraded", message: "存在未释放的录音资源" };
    }
    return { status: "healthy" };
  }

  private async performStart() {
    if (this.hasLiveResources()) {
      this.logger.warn("检测到上一次录音资源未释放，先执行清理。", this.getResourceStatus());
      await this.teardown();
    }

    this.generation += 1;
    const generation = this.generation;
    this.activeGeneration = generation;

    try {
      const microphone = await this.permissions.requestMicrophoneAccess();
      const speech = await this.permissions.requestSpeechRecognitionAccess();
      if (!microphone || !speech) {
        throw new VoiceCaptureError("permission_denied", "需要麦克风和语音识别权限");
      }

      if (!(await this.recognizer.isAvailable())) {
        throw new VoiceCaptureError("recognizer_unavailable", "语音识别服务不可用");
      }

      await this.audioSession.configure({ duckOthers: true, allowBluetooth: true });
      await this.audioSession.setActive(true);
      this.audioSessionActive = true;

      const request = this.recognizer.createRequest({ partialResults: true });
      this.request = request;
      this.inputEnded = false;
      this.task = this.recognizer.recognitionTask(request, (event) =>
        this.executor.post(() => this.handleRecognitionEvent(generation, event))
      );

      this.engine.installTap({
        onBuffer: (buffer) => this.handleBuffer(generation, request, buffer),
        onInterrupted: (error) =>
          this.executor.post(() => this.handleInterruption(generation, error)),
      });
      this.tapInstalled = true;

      try {
        await this.engine.start();
      } catch (error) {
        throw new VoiceCaptureError("audio_engine", "音频引擎配置失败", { cause: error });
      }
      this.engineRunning = true;

      this.startedAt = this.now();
      this.smoothedLevel = 0;
      this.store.setState({
        recordingState: { status: "recording" },
        transcript: EMPTY_TRANSCRIPT,
        audioLevel: 0,
      });
      this.logger.info("开始录音", { session: generation });
    } catch (error) {
      await this.teardown();
      this.activeGeneration = null;
      const captureError =
        error instanceof VoiceCaptureError
          ? error
          : new VoiceCaptureError("audio_engine", "音频引擎配置失败", { cause: error });
      this.logger.error("录音启动失败", { kind: captureError.kind, message: captureError.message });
      this.store.setState({
        recordingState: { status: "error", message: captureError.message },
        audioLevel: 0,
      });
      throw captureError;
    }
  }

  private beginStop() {
    if (this.getState().recordingState.status !== "recording" || this.activeGeneration === null) {
      return null;
    }

    this.store.setState({ recordingState: { status: "processing" } });
    this.endRequestInput();
    return this.activeGeneration;
  }

  private waitForFinalTranscript() {
    if (this.getState().transcript.isFinal || this.stopGraceMs === 0) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      const done = () => {
        clearTimeout(timer);
        if (this.finalTranscriptWaiter === done) {
          this.finalTranscriptWaiter = null;
        }
        resolve();
      };
      const timer = setTimeout(done, this.stopGraceMs);
      this.finalTranscriptWaiter = done;
    });
  }

  private async finishStop(generation: number) {
    if (generation !== this.activeGeneration) {
      this.logger.debug("录音会话已结束或被取代，跳过收尾。", { session: generation });
      return null;
    }

    await this.teardown();
    this.activeGeneration = null;

    const { transcript } = this.getState();
    const recording: VoiceRecording = {
      sessionId: generation,
      text: transcript.text.trim(),
      durationMs: Math.max(0, this.now() - this.startedAt),
      startedAt: new Date(this.startedAt),
    };
    this.store.setState({
      recordingState: { status: "completed" },
      transcript: { text: transcript.text, isFinal: true },
      audioLevel: 0,
      lastRecording: recording,
    });
    this.logger.info("录音结束", {
      session: generation,
      durationMs: recording.durationMs,
      characters: recording.text.length,
    });
    return recording;
  }

  private handleBuffer(generation: number, request: RecognitionRequest, buffer: AudioBuffer) {
    if (generation !== this.activeGeneration || this.request !== request) {
      return;
    }
    if (!this.inputEnded) {
      request.append(buffer);
    }

    this.smoothedLevel = smoothLevel(this.smoothedLevel, normalizeLevel(computeRms(buffer.samples)));
    if (this.levelPublishPending) {
      return;
    }
    this.levelPublishPending = true;
    this.executor.post(() => {
      this.levelPublishPending = false;
      if (
        generation === this.activeGeneration &&
        this.getState().recordingState.status === "recording"
      ) {
        this.store.setState({ audioLevel: this.smoothedLevel });
      }
    });
  }

  private async handleRecognitionEvent(generation: number, event: RecognitionEvent) {
    if (generation !== this.activeGeneration) {
      this.logger.debug("忽略已结束会话的识别回调", { session: generation, type: event.type });
      return;
    }

    if (event.type === "result") {
      this.store.setState({ transcript: event.transcript });
      if (event.transcript.isFinal) {
        this.finalTranscriptWaiter?.();
      }
      return;
    }

    const { error } = event;
    if (classifyRecognitionError(error.domain, error.code) === "ignore") {
      this.logger.debug("忽略预期内的识别错误", error);
      this.finalTranscriptWaiter?.();
      return;
    }

    this.logger.error("语音识别失败", error);
    await this.failSession(describeRecognitionError(error));
  }

  private async handleInterruption(generation: number, error: Error) {
    if (generation !== this.activeGeneration) {
      return;
    }
    const { status } = this.getState().recordingState;
    if (status !== "recording" && status !== "processing") {
      return;
    }
    this.logger.error("录音被中断", error);
    await this.failSession("录音被系统中断，请重新开始");
  }

  private async failSession(message: string) {
    await this.teardown();
    this.activeGeneration = null;
    this.store.setState({
      recordingState: { status: "error", message },
      audioLevel: 0,
    });
  }

  private endRequestInput() {
    if (!this.request || this.inputEnded) {
      return;
    }
    this.inputEnded = true;
    try {
      this.request.endAudio();
    } catch (error) {
      this.logger.warn("结束识别输入失败", error);
    }
  }

  private hasLiveResources() {
    return (
      this.engineRunning ||
      this.tapInstalled ||
      this.request !== null ||
      this.task !== null ||
      this.audioSessionActive
    );
  }

  private async teardown() {
    if (this.engineRunning) {
      this.engineRunning = false;
      try {
        this.engine.stop();
      } catch (error) {
        this.logger.warn("停止音频引擎失败", error);
      }
    }

    if (this.tapInstalled) {
      this.tapInstalled = false;
      try {
        this.engine.removeTap();
      } catch (error) {
        this.logger.warn("移除音频采集回调失败", error);
      }
    }

    this.endRequestInput();
    this.request = null;
    this.inputEnded = false;

    const task = this.task;
    this.task = null;
    if (task) {
      try {
        task.cancel();
      } catch (error) {
        this.logger.warn("取消识别任务失败", error);
      }
    }

    this.finalTranscriptWaiter?.();
    this.smoothedLevel = 0;

    if (this.audioSessionActive) {
      this.audioSessionActive = false;
      try {
        await this.audioSession.setActive(false);
      } catch (error) {
        this.logger.warn("释放音频会话失败", error);
      }
    }
  }
}
