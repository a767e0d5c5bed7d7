import { createLogger, type Logger } from "./logger.js";

export interface CapturedLog {
  level: number;
  msg: string;
  [key: string]: unknown;
}

/**
 * A debug-level logger that keeps every emitted line in memory.
 */
export function createCapturingLogger(): { logger: Logger; logs: CapturedLog[] } {
  const logs: CapturedLog[] = [];
  const logger = createLogger({
    level: "debug",
    service: "test",
    destination: {
      write(line: string) {
        const parsed: unknown = JSON.parse(line);
        if (isCapturedLog(parsed)) logs.push(parsed);
      },
    },
  });
  return { logger, logs };
}

function isCapturedLog(value: unknown): value is CapturedLog {
  return (
    typeof value === "object" &&
    value !== null &&
    typeof Reflect.get(value, "level") === "number" &&
    typeof Reflect.get(value, "msg") === "string"
  );
}
