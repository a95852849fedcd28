import { RECOGNITION_CODES, type RecognitionError, type RecognitionErrorDomain } from "./errors";

export type RecognitionErrorDisposition = "ignore" | "surface";

const BENIGN_ERRORS: ReadonlyArray<{ domain: RecognitionErrorDomain; code: number }> = [
  { domain: "request", code: RECOGNITION_CODES.requestCanceled },
  { domain: "assistant", code: RECOGNITION_CODES.noSpeechDetected },
  { domain: "assistant", code: RECOGNITION_CODES.assistantTransient },
];

export function classifyRecognitionError(
  domain: RecognitionErrorDomain,
  code: number
): RecognitionErrorDisposition {
  return BENIGN_ERRORS.some((entry) => entry.domain === domain && entry.code === code)
    ? "ignore"
    : "surface";
}

export function describeRecognitionError(error: RecognitionError) {
  if (error.domain === "assistant") {
    switch (error.code) {
      case RECOGNITION_CODES.assistantTransient:
        return "语音识别服务暂时不可用，请稍后重试";
      case RECOGNITION_CODES.noSpeechDetected:
        return "未检测到语音，请重新录制";
      case RECOGNITION_CODES.assistantNetwork:
        return "网络连接问题，请检查网络设置";
      default:
        return "语音识别失败，请重新尝试";
    }
  }
  if (error.domain === "transport") {
    return error.code === RECOGNITION_CODES.transportTimeout
      ? "语音识别超时，请稍后重试"
      : "网络连接失败，请检查网络连接";
  }
  return `录制过程中发生错误：${error.message}`;
}
