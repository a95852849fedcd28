export type VoiceCaptureErrorKind =
  | "permission_denied"
  | "recognizer_unavailable"
  | "audio_engine"
  | "recognition_failed"
  | "interrupted";

interface VoiceCaptureErrorOptions {
  cause?: unknown;
  details?: string;
}

export class VoiceCaptureError extends Error {
  public readonly kind: VoiceCaptureErrorKind;
  public readonly details?: string;

  constructor(kind: VoiceCaptureErrorKind, message: string, options?: VoiceCaptureErrorOptions) {
    super(message);
    this.name = "VoiceCaptureError";
    this.kind = kind;
    this.details = options?.details;
    if (options?.cause) {
      this.cause = options.cause;
    }
  }
}

/**
 * Where a recognition error came from:
 * - request: the recognition request itself (301 means it was canceled by its owner)
 * - assistant: the speech service session (1110 no speech, 1101 transient, 203 network)
 * - transport: the connection to the recognizer
 * - provider: an error code reported by the recognition provider
 */
export type RecognitionErrorDomain = "request" | "assistant" | "transport" | "provider";

export interface RecognitionError {
  domain: RecognitionErrorDomain;
  code: number;
  message: string;
}

export const RECOGNITION_CODES = {
  requestCanceled: 301,
  assistantTransient: 1101,
  noSpeechDetected: 1110,
  assistantNetwork: 203,
  transportFailed: 1,
  transportClosed: 2,
  transportTimeout: 3,
  invalidPayload: 4,
} as const;

export function recognitionError(
  domain: RecognitionErrorDomain,
  code: number,
  message: string
): RecognitionError {
  return { domain, code, message };
}
