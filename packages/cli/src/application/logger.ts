export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

type MessageLevel = Exclude<LogLevel, "silent">;

const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug"];

const severity: Readonly<Record<LogLevel, number>> = {
  silent: -1,
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export type Logger = {
  error: (message: string) => void;
  warn: (message: string) => void;
  info: (message: string) => void;
  debug: (message: string) => void;
  /** Logger whose lines carry `context` after the level; nested contexts are joined with `/`. */
  child: (context: string) => Logger;
};

export type LogSink = (line: string) => void;

const writeToStderr: LogSink = (line) => {
  process.stderr.write(line);
};

export const formatLogLine = (
  level: MessageLevel,
  message: string,
  context: string | null = null,
): string => `[orgdeps] ${level.toUpperCase()} ${context === null ? "" : `${context}: `}${message}\n`;

const createLogger = (level: LogLevel, sink: LogSink, context: string | null): Logger => {
  const emit = (messageLevel: MessageLevel) => (message: string) => {
    if (severity[messageLevel] <= severity[level]) {
      sink(formatLogLine(messageLevel, message, context));
    }
  };

  return {
    error: emit("error"),
    warn: emit("warn"),
    info: emit("info"),
    debug: emit("debug"),
    child: (childContext) =>
      createLogger(level, sink, context === null ? childContext : `${context}/${childContext}`),
  };
};

export const createSilentLogger = (): Logger => createLogger("silent", () => undefined, null);

export const createStderrLogger = (level: LogLevel, sink: LogSink = writeToStderr): Logger =>
  createLogger(level, sink, null);

export const parseLogLevel = (value: string | undefined): LogLevel =>
  LOG_LEVELS.find((level) => level === value) ?? "info";
