export type RecordingState =
  | { status: "idle" }
  | { status: "recording" }
  | { status: "processing" }
  | { status: "completed" }
  | { status: "error"; message: string };

export interface Transcript {
  text: string;
  isFinal: boolean;
}

export interface VoiceRecording {
  sessionId: number;
  text: string;
  durationMs: number;
  startedAt: Date;
}

export interface ResourceStatus {
  engineRunning: boolean;
  tapInstalled: boolean;
  hasActiveRecognitionRequest: boolean;
  hasActiveRecognitionTask: boolean;
  audioSessionActive: boolean;
}

export type HealthStatus =
  | { status: "healthy" }
  | { status: "degraded"; message: string }
  | { status: "critical"; message: string };
