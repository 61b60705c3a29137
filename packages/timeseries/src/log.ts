// stderr only; stdout is reserved for CSV rows and reports.

export type LogLevel = "info" | "warn" | "error";

export type Logger = {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
};

export type LogSink = { write(chunk: string): unknown };

export function createLogger(prefix = "waitq", sink: LogSink = process.stderr): Logger {
  const line = (level: LogLevel, msg: string) => {
    const tag = level === "info" ? "" : `${level.toUpperCase()}: `;
    sink.write(`[${prefix}] ${tag}${msg}\n`);
  };
  return {
    info: (msg) => line("info", msg),
    warn: (msg) => line("warn", msg),
    error: (msg) => line("error", msg),
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
