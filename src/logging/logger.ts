export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type SubsystemLogger = {
  subsystem: string;
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

const state: { level: LogLevel; sink: LogSink; secrets: Set<string> } = {
  level: "info",
  sink: consoleSink,
  secrets: new Set(),
};

// Short values would mask ordinary words in log lines.
const MIN_SECRET_LENGTH = 4;

export function setLogLevel(level: LogLevel): void {
  state.level = level;
}

export function setLogSink(sink: LogSink | null): void {
  state.sink = sink ?? consoleSink;
}

export function registerSecrets(values: Array<string | undefined>): void {
  for (const value of values) {
    const trimmed = value?.trim();
    if (trimmed && trimmed.length >= MIN_SECRET_LENGTH) {
      state.secrets.add(trimmed);
    }
  }
}

export function clearSecrets(): void {
  state.secrets.clear();
}

export function maskSecrets(message: string): string {
  let masked = message;
  for (const secret of state.secrets) {
    masked = masked.split(secret).join("***");
  }
  return masked;
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const write = (level: LogLevel, message: string) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[state.level]) {
      return;
    }
    state.sink(level, `[${subsystem}] ${maskSecrets(message)}`);
  };
  return {
    subsystem,
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
  };
}
