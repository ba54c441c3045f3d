import { Writable } from "node:stream";
import pino from "pino";
import pinoPretty from "pino-pretty";

export type Logger = pino.Logger;
export type LogLevel = "error" | "warn" | "info" | "debug";
export type LogFormat = "text" | "json" | "plain";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];
export const LOG_FORMATS: readonly LogFormat[] = ["text", "json", "plain"];

export function redactSecrets(input: string): string {
  return input
    .replace(/\b([a-z][a-z0-9+.-]*:\/\/[^:/@\s]+):[^@\s]+@/gi, "$1:[REDACTED]@")
    .replace(
      /\b(password|passwd|pwd|token|secret)(["']?)\s*:\s*["'][^"']*["']/gi,
      (_match, name: string, quote: string) => `${name}${quote}:"[REDACTED]"`
    )
    .replace(
      /\b(password|passwd|pwd|token|secret)\s*=\s*([^\s&;]+)/gi,
      (_match, name: string) => `${name}=[REDACTED]`
    );
}

export function isLogLevel(s: string): s is LogLevel {
  return LOG_LEVELS.some((level) => level === s);
}

export function isLogFormat(s: string): s is LogFormat {
  return LOG_FORMATS.some((format) => format === s);
}

function redactingStderr(): Writable {
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      const s = typeof chunk === "string" ? chunk : chunk.toString("utf8");
      process.stderr.write(redactSecrets(s));
      cb();
    },
  });
}

/** Writable that parses pino JSON lines and writes only the message (no time/level). */
function plainMessageStderr(): Writable {
  let buffer = "";
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      buffer += typeof chunk === "string" ? chunk : chunk.toString("utf8");
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";
      for (const line of lines) {
        if (!line.trim()) continue;
        try {
          const o: unknown = JSON.parse(line);
          const msg = o && typeof o === "object" && "msg" in o ? o.msg : undefined;
          if (typeof msg === "string") {
            process.stderr.write(redactSecrets(msg) + "\n");
          }
        } catch {
          process.stderr.write(redactSecrets(line) + "\n");
        }
      }
      cb();
    },
  });
}

let rootLogger: Logger | null = null;

export function initLogger(level = "info", format: LogFormat = "text"): Logger {
  const logLevel = isLogLevel(level) ? level : "info";
  if (format === "plain") {
    rootLogger = pino({ level: logLevel, name: "docbridge" }, plainMessageStderr());
  } else if (format === "text") {
    const prettyStream = pinoPretty({ colorize: true, destination: redactingStderr() });
    rootLogger = pino({ level: logLevel, name: "docbridge" }, prettyStream);
  } else {
    rootLogger = pino({ level: logLevel, name: "docbridge" }, redactingStderr());
  }
  return rootLogger;
}

/** Replace the root logger, e.g. with `pino({ level: "silent" })` in tests. */
export function setLogger(logger: Logger): void {
  rootLogger = logger;
}

export function getLogger(): Logger {
  return rootLogger ?? initLogger("info", "plain");
}
