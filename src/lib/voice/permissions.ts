import type { PermissionPort, PermissionSnapshot } from "./ports";

/**
 * Desktop processes have no runtime permission prompt; access is whatever the configuration
 * grants. Speech recognition counts as granted once a recognition provider is configured.
 */
export class ConfiguredPermissions implements PermissionPort {
  private readonly snapshot: PermissionSnapshot;

  constructor(snapshot: PermissionSnapshot) {
    this.snapshot = { ...snapshot };
  }

  async requestMicrophoneAccess() {
    return this.snapshot.microphone;
  }

  async requestSpeechRecognitionAccess() {
    return this.snapshot.speechRecognition;
  }

  async currentStatus(): Promise<PermissionSnapshot> {
    return { ...this.snapshot };
  }
}
