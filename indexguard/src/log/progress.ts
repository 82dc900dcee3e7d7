import { redactSensitiveInfo, sanitizeLogMessage } from "../security/paths.js";

export type OutputFormat = "human" | "jsonl";

export type ProgressEvent = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  details?: Record<string, unknown>;
};

export type ProgressLog = (event: ProgressEvent) => void;

export type WritableText = { write(chunk: string): unknown };

/**
 * Progress log for a run. Written to stderr so stdout only ever carries the report.
 *
 * jsonl: one JSON object per event. human: `[level] CODE message`.
 */
export function createProgressLog(format: OutputFormat, out: WritableText = process.stderr): ProgressLog {
  return (event) => {
    const message = sanitizeLogMessage(redactSensitiveInfo(event.message));
    if (format === "jsonl") {
      out.write(JSON.stringify({ ...event, message }) + "\n");
    } else {
      out.write(`[${event.level}] ${event.code} ${message}\n`);
    }
  };
}

/** Discards everything; the default for library callers and tests. */
export const silentLog: ProgressLog = () => {};
