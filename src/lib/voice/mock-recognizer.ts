import { createLogger, type Logger } from "@/lib/logger";
import { RECOGNITION_CODES, recognitionError } from "./errors";
import type {
  AudioBuffer,
  RecognitionListener,
  RecognitionRequest,
  RecognitionTask,
  SpeechRecognizer,
} from "./ports";

class MockRecognitionRequest implements RecognitionRequest {
  bufferCount = 0;
  ended = false;
  onEnd: (() => void) | null = null;

  append(_buffer: AudioBuffer) {
    if (!this.ended) {
      this.bufferCount += 1;
    }
  }

  endAudio() {
    if (this.ended) {
      return;
    }
    this.ended = true;
    this.onEnd?.();
  }
}

interface MockSpeechRecognizerOptions {
  transcript: string;
  available?: boolean;
  logger?: Logger;
}

/** Returns a configured transcript once input ends; used when no recognition provider is set up. */
export class MockSpeechRecognizer implements SpeechRecognizer {
  private readonly transcript: string;
  private readonly available: boolean;
  private readonly logger: Logger;

  constructor(options: MockSpeechRecognizerOptions) {
    this.transcript = options.transcript.trim();
    this.available = options.available ?? true;
    this.logger = options.logger ?? createLogger("voice");
  }

  async isAvailable() {
    return this.available;
  }

  createRequest(_options: { partialResults: boolean }): RecognitionRequest {
    return new MockRecognitionRequest();
  }

  recognitionTask(request: RecognitionRequest, listener: RecognitionListener): RecognitionTask {
    if (!(request instanceof MockRecognitionRequest)) {
      throw new TypeError("MockSpeechRecognizer 只能处理自身创建的识别请求");
    }

    let finished = false;
    request.onEnd = () => {
      setTimeout(() => {
        if (finished) {
          return;
        }
        finished = true;
        this.logger.debug("mock 识别完成", { buffers: request.bufferCount });
        if (!this.transcript) {
          listener({
            type: "error",
            error: recognitionError("assistant", RECOGNITION_CODES.noSpeechDetected, "未检测到语音"),
          });
          return;
        }
        listener({ type: "result", transcript: { text: this.transcript, isFinal: true } });
      }, 0);
    };

    return {
      cancel: () => {
        if (finished) {
          return;
        }
        finished = true;
        listener({
          type: "error",
          error: recognitionError("request", RECOGNITION_CODES.requestCanceled, "识别请求已取消"),
        });
      },
    };
  }
}
