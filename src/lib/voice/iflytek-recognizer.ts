import { Buffer } from "node:buffer";
import { createHmac } from "node:crypto";
import WebSocket from "ws";
import type { IflytekConfig } from "@/lib/config";
import { createLogger, type Logger } from "@/lib/logger";
import { RECOGNITION_CODES, recognitionError, type RecognitionError } from "./errors";
import type {
  AudioBuffer,
  RecognitionListener,
  RecognitionRequest,
  RecognitionTask,
  SpeechRecognizer,
} from "./ports";

const AUDIO_FORMAT = "audio/L16;rate=16000";
const EXPECTED_SAMPLE_RATE = 16000;
const DEFAULT_FRAME_BYTES = 1280;
const DEFAULT_FINAL_TIMEOUT_MS = 10000;

type AnyRecord = Record<string, unknown>;

export interface SocketHandlers {
  onOpen: () => void;
  onMessage: (data: string) => void;
  onError: (error: Error) => void;
  onClose: () => void;
}

export interface RecognizerSocket {
  send(data: string): void;
  close(): void;
}

export type SocketFactory = (url: string, handlers: SocketHandlers) => RecognizerSocket;

interface IflytekSpeechRecognizerOptions {
  config: IflytekConfig | null;
  connect?: SocketFactory;
  now?: () => Date;
  frameBytes?: number;
  finalTimeoutMs?: number;
  logger?: Logger;
}

interface PcmSink {
  write: (pcm: Buffer) => void;
  end: () => void;
}

class IflytekRecognitionRequest implements RecognitionRequest {
  readonly partialResults: boolean;
  private pending: Buffer[] = [];
  private ended = false;
  private sink: PcmSink | null = null;
  private sampleRateWarned = false;
  private readonly logger: Logger;

  constructor(partialResults: boolean, logger: Logger) {
    this.partialResults = partialResults;
    this.logger = logger;
  }

  append(buffer: AudioBuffer) {
    if (this.ended) {
      return;
    }
    if (buffer.sampleRate !== EXPECTED_SAMPLE_RATE && !this.sampleRateWarned) {
      this.sampleRateWarned = true;
      this.logger.warn(`讯飞识别需要 16kHz 单声道音频，当前采样率为 ${buffer.sampleRate}`);
    }
    const pcm = encodePcm16(buffer.samples);
    if (this.sink) {
      this.sink.write(pcm);
    } else {
      this.pending.push(pcm);
    }
  }

  endAudio() {
    if (this.ended) {
      return;
    }
    this.ended = true;
    this.sink?.end();
  }

  attach(sink: PcmSink) {
    this.sink = sink;
    const pending = this.pending;
    this.pending = [];
    pending.forEach((pcm) => sink.write(pcm));
    if (this.ended) {
      sink.end();
    }
  }
}

/** Streams captured audio to the iFlytek dictation WebSocket API. */
export class IflytekSpeechRecognizer implements SpeechRecognizer {
  private readonly config: IflytekConfig | null;
  private readonly connect: SocketFactory;
  private readonly now: () => Date;
  private readonly frameBytes: number;
  private readonly finalTimeoutMs: number;
  private readonly logger: Logger;

  constructor(options: IflytekSpeechRecognizerOptions) {
    this.config = options.config;
    this.connect = options.connect ?? connectWebSocket;
    this.now = options.now ?? (() => new Date());
    this.frameBytes = options.frameBytes ?? DEFAULT_FRAME_BYTES;
    this.finalTimeoutMs = options.finalTimeoutMs ?? DEFAULT_FINAL_TIMEOUT_MS;
    this.logger = options.logger ?? createLogger("voice");
  }

  async isAvailable() {
    return this.config !== null;
  }

  createRequest(options: { partialResults: boolean }): RecognitionRequest {
    return new IflytekRecognitionRequest(options.partialResults, this.logger);
  }

  recognitionTask(request: RecognitionRequest, listener: RecognitionListener): RecognitionTask {
    if (!(request instanceof IflytekRecognitionRequest)) {
      throw new TypeError("IflytekSpeechRecognizer 只能处理自身创建的识别请求");
    }
    const config = this.config;
    if (!config) {
      throw new Error(
        "未配置讯飞语音识别密钥，请设置 IFLYTEK_APP_ID、IFLYTEK_API_KEY、IFLYTEK_API_SECRET。"
      );
    }

    const aggregator = new IflytekTranscriptAggregator();
    const business: AnyRecord = {
      language: config.language,
      accent: config.accent,
      domain: "iat",
      vad_eos: config.vadEos,
    };
    if (request.partialResults) {
      business.dwa = "wpgs";
    }

    let finished = false;
    let opened = false;
    let firstFrameSent = false;
    let inputEnded = false;
    let finalTimer: ReturnType<typeof setTimeout> | null = null;
    let remainder = Buffer.alloc(0);
    let socket: RecognizerSocket | null = null;
    const queued: string[] = [];

    const flush = () => {
      if (!opened || !socket) {
        return;
      }
      const target = socket;
      queued.splice(0).forEach((frame) => target.send(frame));
    };

    const finish = (error?: RecognitionError) => {
      if (finished) {
        return;
      }
      finished = true;
      if (finalTimer) {
        clearTimeout(finalTimer);
      }
      socket?.close();
      if (error) {
        listener({ type: "error", error });
      }
    };

    const sendFrame = (status: 1 | 2, audio: Buffer) => {
      const frameStatus = firstFrameSent ? status : 0;
      const payload: AnyRecord = {
        data: {
          status: frameStatus,
          format: AUDIO_FORMAT,
          encoding: "raw",
          audio: audio.length > 0 ? audio.toString("base64") : "",
        },
      };
      if (!firstFrameSent) {
        payload.common = { app_id: config.appId };
        payload.business = business;
        firstFrameSent = true;
      }
      queued.push(JSON.stringify(payload));
      flush();
    };

    const url = buildIflytekWsUrl(config.endpoint, config.apiKey, config.apiSecret, this.now());
    socket = this.connect(url, {
      onOpen: () => {
        opened = true;
        flush();
      },
      onMessage: (data) => {
        if (finished) {
          return;
        }
        const outcome = readRecognitionMessage(data, aggregator);
        if (outcome.type === "error") {
          finish(outcome.error);
          return;
        }
        const transcript = aggregator.buildTranscript().trim();
        if (outcome.isFinal) {
          if (!transcript) {
            finish(
              recognitionError("assistant", RECOGNITION_CODES.noSpeechDetected, "未检测到语音")
            );
            return;
          }
          listener({ type: "result", transcript: { text: transcript, isFinal: true } });
          finish();
          return;
        }
        if (request.partialResults && transcript) {
          listener({ type: "result", transcript: { text: transcript, isFinal: false } });
        }
      },
      onError: (error) => {
        this.logger.warn("讯飞识别连接异常", { message: error.message });
        finish(
          recognitionError("transport", RECOGNITION_CODES.transportFailed, "语音识别服务连接失败")
        );
      },
      onClose: () => {
        finish(
          recognitionError("transport", RECOGNITION_CODES.transportClosed, "语音识别服务连接已关闭")
        );
      },
    });
    if (finished) {
      socket.close();
    }
    flush();

    request.attach({
      write: (pcm) => {
        if (finished || inputEnded) {
          return;
        }
        let combined = remainder.length > 0 ? Buffer.concat([remainder, pcm]) : pcm;
        while (combined.length >= this.frameBytes) {
          sendFrame(1, combined.subarray(0, this.frameBytes));
          combined = combined.subarray(this.frameBytes);
        }
        remainder = Buffer.from(combined);
      },
      end: () => {
        if (finished || inputEnded) {
          return;
        }
        inputEnded = true;
        if (remainder.length > 0) {
          sendFrame(1, remainder);
          remainder = Buffer.alloc(0);
        }
        if (!firstFrameSent) {
          sendFrame(1, Buffer.alloc(0));
        }
        sendFrame(2, Buffer.alloc(0));
        finalTimer = setTimeout(() => {
          finish(
            recognitionError("transport", RECOGNITION_CODES.transportTimeout, "语音识别超时")
          );
        }, this.finalTimeoutMs);
      },
    });

    return {
      cancel: () => {
        finish(recognitionError("request", RECOGNITION_CODES.requestCanceled, "识别请求已取消"));
      },
    };
  }
}

type RecognitionMessageOutcome =
  | { type: "progress"; isFinal: boolean }
  | { type: "error"; error: RecognitionError };

function readRecognitionMessage(
  raw: string,
  aggregator: IflytekTranscriptAggregator
): RecognitionMessageOutcome {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    return {
      type: "error",
      error: recognitionError(
        "transport",
        RECOGNITION_CODES.invalidPayload,
        "语音识别服务返回异常数据"
      ),
    };
  }
  if (!isRecord(payload)) {
    return {
      type: "error",
      error: recognitionError(
        "transport",
        RECOGNITION_CODES.invalidPayload,
        "语音识别服务返回异常数据"
      ),
    };
  }

  const code = typeof payload.code === "number" ? payload.code : -1;
  if (code !== 0) {
    const message =
      typeof payload.message === "string" ? payload.message : "语音识别服务调用失败，请稍后重试。";
    return { type: "error", error: recognitionError("provider", code, message) };
  }

  const data = isRecord(payload.data) ? payload.data : null;
  if (data?.result) {
    const results = Array.isArray(data.result) ? data.result : [data.result];
    results.forEach((result: unknown) => aggregator.add(result));
  }
  return { type: "progress", isFinal: data?.status === 2 };
}

export class IflytekTranscriptAggregator {
  private segments = new Map<number, string>();

  add(result: unknown) {
    if (!isRecord(result)) {
      return;
    }

    const text = readWords(result.ws);
    const range = readRange(result.rg);
    if (result.pgs === "rpl" && range) {
      for (let sn = range[0]; sn <= range[1]; sn += 1) {
        this.segments.delete(sn);
      }
    }

    if (!text) {
      return;
    }
    const key = typeof result.sn === "number" ? result.sn : this.segments.size;
    this.segments.set(key, text);
  }

  buildTranscript() {
    return Array.from(this.segments.entries())
      .sort((a, b) => a[0] - b[0])
      .map(([, value]) => value)
      .join("");
  }
}

export function buildIflytekWsUrl(
  baseUrlRaw: string,
  apiKey: string,
  apiSecret: string,
  now: Date
) {
  const url = new URL(normalizeWsUrl(baseUrlRaw));
  const host = url.host;
  const date = now.toUTCString();
  const signatureOrigin = `host: ${host}\ndate: ${date}\nGET ${url.pathname} HTTP/1.1`;
  const signatureSha = createHmac("sha256", apiSecret).update(signatureOrigin).digest("base64");
  const authorization = Buffer.from(
    `api_key="${apiKey}", algorithm="hmac-sha256", headers="host date request-line", signature="${signatureSha}"`
  ).toString("base64");
  url.searchParams.set("authorization", authorization);
  url.searchParams.set("date", date);
  url.searchParams.set("host", host);
  return url.toString();
}

export function encodePcm16(samples: Float32Array) {
  const pcm = Buffer.alloc(samples.length * 2);
  for (let index = 0; index < samples.length; index += 1) {
    const clamped = Math.max(-1, Math.min(1, samples[index]));
    pcm.writeInt16LE(Math.round(clamped < 0 ? clamped * 0x8000 : clamped * 0x7fff), index * 2);
  }
  return pcm;
}

const connectWebSocket: SocketFactory = (url, handlers) => {
  const socket = new WebSocket(url);
  socket.on("open", () => handlers.onOpen());
  socket.on("message", (data) => handlers.onMessage(rawDataToString(data)));
  socket.on("error", (error) => handlers.onError(error));
  socket.on("close", () => handlers.onClose());

  return {
    send: (data) => socket.send(data),
    close: () => {
      if (socket.readyState === WebSocket.OPEN || socket.readyState === WebSocket.CONNECTING) {
        socket.close();
      }
    },
  };
};

function rawDataToString(data: WebSocket.RawData) {
  if (Buffer.isBuffer(data)) {
    return data.toString("utf-8");
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf-8");
  }
  return Buffer.from(data).toString("utf-8");
}

function normalizeWsUrl(candidate: string) {
  if (candidate.startsWith("ws://") || candidate.startsWith("wss://")) {
    return candidate;
  }
  if (candidate.startsWith("http://")) {
    return `ws://${candidate.slice("http://".length)}`;
  }
  if (candidate.startsWith("https://")) {
    return `wss://${candidate.slice("https://".length)}`;
  }
  return candidate.includes("://") ? candidate : `wss://${candidate}`;
}

function readWords(value: unknown) {
  if (!Array.isArray(value)) {
    return "";
  }
  return value
    .map((item: unknown) => {
      if (!isRecord(item) || !Array.isArray(item.cw)) {
        return "";
      }
      const [best] = item.cw;
      return isRecord(best) && typeof best.w === "string" ? best.w : "";
    })
    .join("");
}

function readRange(value: unknown): [number, number] | null {
  if (!Array.isArray(value) || value.length !== 2) {
    return null;
  }
  const [from, to] = value;
  return typeof from === "number" && typeof to === "number" ? [from, to] : null;
}

function isRecord(value: unknown): value is AnyRecord {
  return typeof value === "object" && value !== null;
}
