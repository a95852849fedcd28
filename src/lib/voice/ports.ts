import type { Transcript } from "@/types/voice";
import type { RecognitionError } from "./errors";

export interface AudioBuffer {
  samples: Float32Array;
  sampleRate: number;
}

export interface AudioTap {
  onBuffer: (buffer: AudioBuffer) => void;
  onInterrupted: (error: Error) => void;
}

/** Hardware input. Tap callbacks fire outside the session's executor. */
export interface AudioInputEngine {
  installTap(tap: AudioTap): void;
  removeTap(): void;
  start(): Promise<void>;
  stop(): void;
}

export interface AudioSessionOptions {
  duckOthers: boolean;
  allowBluetooth: boolean;
}

export interface AudioSessionPort {
  configure(options: AudioSessionOptions): Promise<void>;
  setActive(active: boolean): Promise<void>;
}

export interface PermissionSnapshot {
  microphone: boolean;
  speechRecognition: boolean;
}

export interface PermissionPort {
  requestMicrophoneAccess(): Promise<boolean>;
  requestSpeechRecognitionAccess(): Promise<boolean>;
  currentStatus(): Promise<PermissionSnapshot>;
}

export interface RecognitionRequest {
  append(buffer: AudioBuffer): void;
  endAudio(): void;
}

export type RecognitionEvent =
  | { type: "result"; transcript: Transcript }
  | { type: "error"; error: RecognitionError };

export type RecognitionListener = (event: RecognitionEvent) => void;

export interface RecognitionTask {
  cancel(): void;
}

export interface SpeechRecognizer {
  isAvailable(): Promise<boolean>;
  createRequest(options: { partialResults: boolean }): RecognitionRequest;
  recognitionTask(request: RecognitionRequest, listener: RecognitionListener): RecognitionTask;
}
