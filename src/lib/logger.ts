export interface Logger {
  debug: (message: string, payload?: unknown) => void;
  info: (message: string, payload?: unknown) => void;
  warn: (message: string, payload?: unknown) => void;
  error: (message: string, payload?: unknown) => void;
}

interface LoggerOptions {
  debug?: boolean;
}

const DEBUG_ENABLED = resolveBooleanEnv(process.env.EXPENSE_DEBUG);
const SAMPLE_LIMIT = 600;

export function createLogger(scope: string, options?: LoggerOptions): Logger {
  const prefix = `[${scope}]`;
  const debugEnabled = options?.debug ?? DEBUG_ENABLED;

  return {
    debug(message, payload) {
      if (!debugEnabled) {
        return;
      }
      write(console.debug, `${prefix}[debug] ${message}`, payload);
    },
    info(message, payload) {
      write(console.info, `${prefix} ${message}`, payload);
    },
    warn(message, payload) {
      write(console.warn, `${prefix} ${message}`, payload);
    },
    error(message, payload) {
      write(console.error, `${prefix} ${message}`, payload);
    },
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function resolveBooleanEnv(value?: string | null) {
  if (!value) {
    return false;
  }
  const normalized = value.trim().toLowerCase();
  return ["1", "true", "yes", "debug", "on"].includes(normalized);
}

export function safeSamplePayload(payload: unknown): unknown {
  try {
    const serialized = JSON.stringify(payload, (_key, value: unknown) => {
      if (typeof value === "string" && value.length > SAMPLE_LIMIT) {
        return `${value.slice(0, SAMPLE_LIMIT)}…`;
      }
      return value;
    });
    return serialized === undefined ? null : JSON.parse(serialized);
  } catch {
    return "[unserializable payload]";
  }
}

function write(sink: (...args: unknown[]) => void, line: string, payload: unknown) {
  if (payload === undefined) {
    sink(line);
    return;
  }
  sink(line, payload instanceof Error ? payload : safeSamplePayload(payload));
}
