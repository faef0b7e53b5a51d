export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

export type LogSink = (line: string) => void;

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
  fatal(message: string, err?: unknown): void;
  child(scope: string): Logger;
}

export type LoggerOptions = {
  debug?: boolean;
  stdout?: LogSink;
  stderr?: LogSink;
};

const defaultStdout: LogSink = (line) => {
  process.stdout.write(line);
};
const defaultStderr: LogSink = (line) => {
  process.stderr.write(line);
};

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

function formatLine(scope: string, level: LogLevel, message: string, err?: unknown): string {
  const tag = level === "info" || level === "debug" ? "" : ` ${level}:`;
  const suffix = err === undefined ? "" : ` ${describeError(err)}`;
  return `[tracker][${scope}]${tag} ${message}${suffix}\n`;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const stdout = options.stdout ?? defaultStdout;
  const stderr = options.stderr ?? defaultStderr;
  const debugEnabled = options.debug ?? false;
  return {
    debug(message) {
      if (!debugEnabled) return;
      stdout(formatLine(scope, "debug", message));
    },
    info(message) {
      stdout(formatLine(scope, "info", message));
    },
    warn(message) {
      stderr(formatLine(scope, "warn", message));
    },
    error(message, err) {
      stderr(formatLine(scope, "error", message, err));
    },
    fatal(message, err) {
      stderr(formatLine(scope, "fatal", message, err));
    },
    child(childScope) {
      return createLogger(`${scope}:${childScope}`, options);
    },
  };
}

/** Discards everything; for tests that do not assert on output. */
export const silentLogger: Logger = createLogger("silent", {
  stdout: () => undefined,
  stderr: () => undefined,
});
