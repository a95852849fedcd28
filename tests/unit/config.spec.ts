import { describe, expect, it } from "vitest";
import { loadConfig, resolveTimeout } from "@/lib/config";
import { resolveBooleanEnv, safeSamplePayload } from "@/lib/logger";

describe("环境变量配置", () => {
  it("未设置时使用默认值", () => {
    const config = loadConfig({});

    expect(config.llm).toEqual({
      apiKey: "",
      endpoint: "https://api.deepseek.com/v1/chat/completions",
      model: "deepseek-chat",
      temperature: 0.1,
      maxTokens: 1000,
      timeoutMs: 30000,
      maxAttempts: 3,
    });
    expect(config.voice.provider).toBe("mock");
    expect(config.voice.stopGraceMs).toBe(250);
    expect(config.voice.iflytek).toBeNull();
    expect(config.voice.ffmpeg.executable).toBe("ffmpeg");
    expect(config.storage.table).toBe("expenses");
    expect(config.defaultCurrency).toBe("CNY");
    expect(config.debug).toBe(false);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.llm)).toBe(true);
    expect(Object.isFrozen(config.voice.ffmpeg)).toBe(true);
    expect(Object.isFrozen(config.storage)).toBe(true);
  });

  it("读取讯飞与模型配置", () => {
    const config = loadConfig({
      DEEPSEEK_API_KEY: "test-secret",
      LLM_TIMEOUT_MS: "1000",
      LLM_MAX_ATTEMPTS: "5",
      VOICE_RECOGNIZER_PROVIDER: " XFYUN ",
      VOICE_STOP_GRACE_MS: "900",
      IFLYTEK_APP_ID: "test-app",
      IFLYTEK_API_KEY: "test-key",
      IFLYTEK_API_SECRET: "test-secret",
      EXPENSE_DEBUG: "yes",
    });

    expect(config.llm.apiKey).toBe("test-secret");
    expect(config.llm.timeoutMs).toBe(5000);
    expect(config.llm.maxAttempts).toBe(5);
    expect(config.voice.provider).toBe("iflytek");
    expect(config.voice.stopGraceMs).toBe(300);
    expect(config.voice.iflytek).toEqual({
      appId: "test-app",
      apiKey: "test-key",
      apiSecret: "test-secret",
      endpoint: "wss://iat-api.xfyun.cn/v2/iat",
      language: "zh_cn",
      accent: "mandarin",
      vadEos: 3000,
    });
    expect(config.debug).toBe(true);
    expect(Object.isFrozen(config.voice.iflytek)).toBe(true);
  });

  it("非法取值时报错", () => {
    expect(() => loadConfig({ LLM_MAX_TOKENS: "很多" })).toThrow(
      "环境变量配置不合法：LLM_MAX_TOKENS: 不是合法的数字：很多"
    );
    expect(() => loadConfig({ VOICE_RECOGNIZER_PROVIDER: "whisper" })).toThrow(
      /^环境变量配置不合法：VOICE_RECOGNIZER_PROVIDER/
    );
  });

  it("超时时间限制在 5 到 120 秒之间", () => {
    expect(resolveTimeout(0, 30000)).toBe(30000);
    expect(resolveTimeout(200000, 30000)).toBe(120000);
    expect(resolveTimeout(45000, 30000)).toBe(45000);
  });
});

describe("日志工具", () => {
  it("解析布尔环境变量", () => {
    expect(resolveBooleanEnv("ON")).toBe(true);
    expect(resolveBooleanEnv("0")).toBe(false);
    expect(resolveBooleanEnv(undefined)).toBe(false);
  });

  it("截断过长的日志字段", () => {
    const sample = safeSamplePayload({ content: "a".repeat(700), attempt: 2 });
    expect(sample).toEqual({ content: `${"a".repeat(600)}…`, attempt: 2 });
  });
});
