import { Buffer } from "node:buffer";
import { createHmac } from "node:crypto";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { IflytekConfig } from "@/lib/config";
import { silentLogger } from "@/lib/logger";
import {
  IflytekSpeechRecognizer,
  IflytekTranscriptAggregator,
  buildIflytekWsUrl,
  encodePcm16,
  type SocketHandlers,
} from "@/lib/voice/iflytek-recognizer";
import type { RecognitionEvent } from "@/lib/voice/ports";

const CONFIG: IflytekConfig = {
  appId: "test-app",
  apiKey: "test-key",
  apiSecret: "test-secret",
  endpoint: "wss://iat.example.test/v2/iat",
  language: "zh_cn",
  accent: "mandarin",
  vadEos: 3000,
};

const NOW = new Date("2024-05-01T00:00:00Z");

class FakeSocket {
  url = "";
  handlers: SocketHandlers | null = null;
  sent: string[] = [];
  closeCount = 0;

  get frames() {
    return this.sent.map((raw) => {
      const frame: unknown = JSON.parse(raw);
      return frame;
    });
  }

  open() {
    this.handlers?.onOpen();
  }

  message(payload: unknown) {
    this.handlers?.onMessage(JSON.stringify(payload));
  }
}

function setup(partialResults = true) {
  const socket = new FakeSocket();
  const recognizer = new IflytekSpeechRecognizer({
    config: CONFIG,
    connect: (url, handlers) => {
      socket.url = url;
      socket.handlers = handlers;
      return {
        send: (data) => socket.sent.push(data),
        close: () => {
          socket.closeCount += 1;
        },
      };
    },
    now: () => NOW,
    frameBytes: 4,
    finalTimeoutMs: 1000,
    logger: silentLogger,
  });
  const events: RecognitionEvent[] = [];
  const request = recognizer.createRequest({ partialResults });
  const task = recognizer.recognitionTask(request, (event) => events.push(event));
  return { socket, recognizer, request, task, events };
}

function words(sn: number, text: string, extra: Record<string, unknown> = {}) {
  return { sn, ws: [{ cw: [{ w: text }] }], ...extra };
}

describe("讯飞语音识别", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("连接建立后按帧发送音频", () => {
    const { socket, request } = setup();
    request.append({ samples: Float32Array.from([0.5, -0.5, 0, 1]), sampleRate: 16000 });

    expect(socket.sent).toHaveLength(0);
    socket.open();
    request.endAudio();

    expect(socket.frames).toEqual([
      {
        common: { app_id: "test-app" },
        business: {
          language: "zh_cn",
          accent: "mandarin",
          domain: "iat",
          vad_eos: 3000,
          dwa: "wpgs",
        },
        data: {
          status: 0,
          format: "audio/L16;rate=16000",
          encoding: "raw",
          audio: "AEAAwA==",
        },
      },
      {
        data: {
          status: 1,
          format: "audio/L16;rate=16000",
          encoding: "raw",
          audio: Buffer.from([0x00, 0x00, 0xff, 0x7f]).toString("base64"),
        },
      },
      {
        data: { status: 2, format: "audio/L16;rate=16000", encoding: "raw", audio: "" },
      },
    ]);
  });

  it("未采集到音频时也会发送首帧和结束帧", () => {
    const { socket, request } = setup(false);
    socket.open();
    request.endAudio();

    const statuses = socket.frames.map((frame) =>
      typeof frame === "object" && frame !== null && "data" in frame ? frame.data : null
    );
    expect(statuses).toMatchObject([{ status: 0 }, { status: 2 }]);
  });

  it("推送中间结果并在结束时给出最终文本", () => {
    const { socket, request, events } = setup();
    socket.open();

    socket.message({ code: 0, data: { status: 1, result: words(1, "午餐") } });
    request.endAudio();
    socket.message({ code: 0, data: { status: 2, result: words(2, "25元") } });
    socket.handlers?.onClose();

    expect(events).toEqual([
      { type: "result", transcript: { text: "午餐", isFinal: false } },
      { type: "result", transcript: { text: "午餐25元", isFinal: true } },
    ]);
    expect(socket.closeCount).toBe(1);
  });

  it("最终结果为空时报告未检测到语音", () => {
    const { socket, events } = setup();
    socket.open();
    socket.message({ code: 0, data: { status: 2 } });

    expect(events).toEqual([
      {
        type: "error",
        error: { domain: "assistant", code: 1110, message: "未检测到语音" },
      },
    ]);
  });

  it("服务返回错误码时上报", () => {
    const { socket, events } = setup();
    socket.message({ code: 10165, message: "invalid handle" });

    expect(events).toEqual([
      { type: "error", error: { domain: "provider", code: 10165, message: "invalid handle" } },
    ]);
  });

  it("连接提前关闭时上报传输错误", () => {
    const { socket, events } = setup();
    socket.open();
    socket.handlers?.onClose();

    expect(events).toEqual([
      { type: "error", error: { domain: "transport", code: 2, message: "语音识别服务连接已关闭" } },
    ]);
  });

  it("取消任务时上报取消并关闭连接", () => {
    const { socket, task, events } = setup();
    task.cancel();
    task.cancel();

    expect(events).toEqual([
      { type: "error", error: { domain: "request", code: 301, message: "识别请求已取消" } },
    ]);
    expect(socket.closeCount).toBe(1);
  });

  it("等待最终结果超时", () => {
    vi.useFakeTimers();
    const { socket, request, events } = setup();
    socket.open();
    request.endAudio();

    vi.advanceTimersByTime(999);
    expect(events).toHaveLength(0);
    vi.advanceTimersByTime(1);
    expect(events).toEqual([
      { type: "error", error: { domain: "transport", code: 3, message: "语音识别超时" } },
    ]);
  });

  it("未配置密钥时服务不可用", async () => {
    const recognizer = new IflytekSpeechRecognizer({ config: null, logger: silentLogger });
    expect(await recognizer.isAvailable()).toBe(false);
  });
});

describe("讯飞识别结果拼接", () => {
  it("rpl 结果替换指定范围的片段", () => {
    const aggregator = new IflytekTranscriptAggregator();
    aggregator.add(words(1, "我今天"));
    aggregator.add(words(2, "花了"));
    aggregator.add(words(3, "花了25元", { pgs: "rpl", rg: [2, 2] }));
    aggregator.add(words(4, "买午餐", { pgs: "apd" }));

    expect(aggregator.buildTranscript()).toBe("我今天花了25元买午餐");
  });

  it("忽略格式不正确的结果", () => {
    const aggregator = new IflytekTranscriptAggregator();
    aggregator.add(null);
    aggregator.add({ sn: 1, ws: "oops" });
    aggregator.add({ sn: 2, ws: [{ cw: [] }, { cw: [{ w: "好" }] }] });

    expect(aggregator.buildTranscript()).toBe("好");
  });
});

describe("讯飞鉴权地址", () => {
  it("使用 HMAC-SHA256 签名", () => {
    const url = new URL(buildIflytekWsUrl("https://iat.example.test/v2/iat", "test-key", "test-secret", NOW));
    const date = NOW.toUTCString();
    const signature = createHmac("sha256", "test-secret")
      .update(`host: iat.example.test\ndate: ${date}\nGET /v2/iat HTTP/1.1`)
      .digest("base64");

    expect(url.protocol).toBe("wss:");
    expect(url.searchParams.get("host")).toBe("iat.example.test");
    expect(url.searchParams.get("date")).toBe(date);
    expect(Buffer.from(url.searchParams.get("authorization") ?? "", "base64").toString("utf-8")).toBe(
      `api_key="test-key", algorithm="hmac-sha256", headers="host date request-line", signature="${signature}"`
    );
  });

  it("将浮点采样编码为 16 位 PCM", () => {
    const pcm = encodePcm16(Float32Array.from([1, -1, 0, 2]));
    expect([0, 2, 4, 6].map((offset) => pcm.readInt16LE(offset))).toEqual([32767, -32768, 0, 32767]);
  });
});
