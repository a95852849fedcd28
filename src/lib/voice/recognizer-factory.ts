import type { AppConfig } from "@/lib/config";
import type { Logger } from "@/lib/logger";
import { IflytekSpeechRecognizer } from "./iflytek-recognizer";
import { MockSpeechRecognizer } from "./mock-recognizer";
import type { SpeechRecognizer } from "./ports";

export function createSpeechRecognizer(
  voice: AppConfig["voice"],
  logger?: Logger
): SpeechRecognizer {
  if (voice.provider === "mock") {
    return new MockSpeechRecognizer({ transcript: voice.mockTranscript, logger });
  }
  if (!voice.iflytek) {
    logger?.warn(
      "未配置讯飞语音识别密钥，请设置 IFLYTEK_APP_ID、IFLYTEK_API_KEY、IFLYTEK_API_SECRET。"
    );
  }
  return new IflytekSpeechRecognizer({ config: voice.iflytek, logger });
}
