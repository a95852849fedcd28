import { createLogger, type Logger } from "@/lib/logger";
import type { AudioSessionOptions, AudioSessionPort } from "./ports";

export class DesktopAudioSession implements AudioSessionPort {
  private options: AudioSessionOptions | null = null;
  private active = false;
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger("voice");
  }

  async configure(options: AudioSessionOptions) {
    this.options = { ...options };
    this.logger.debug("audio_session_configured", this.options);
  }

  async setActive(active: boolean) {
    if (active && !this.options) {
      throw new Error("音频会话尚未配置");
    }
    this.active = active;
    this.logger.debug("audio_session_active", { active });
  }

  isActive() {
    return this.active;
  }
}
