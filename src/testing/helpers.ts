import { setTimeout as delay } from "node:timers/promises";
import { createLogger, type Logger } from "../logger.js";

export interface LogLine {
  level: number;
  msg: string;
  err?: { type: string; message: string };
  [field: string]: unknown;
}

/** A debug-level logger whose JSON lines are parsed into `lines`. */
export function captureLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = createLogger({
    level: "debug",
    destination: {
      write(line: string) {
        lines.push(JSON.parse(line));
      },
    },
  });
  return { logger, lines };
}

export function linesWithMsg(lines: LogLine[], msg: string): LogLine[] {
  return lines.filter((line) => line.msg === msg);
}

export async function waitFor(condition: () => boolean, timeoutMs = 2_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error(`condition not met within ${timeoutMs}ms`);
    await delay(5);
  }
}

/** A promise plus the function that settles it. */
export function gate(): { opened: Promise<void>; open: () => void } {
  let open = () => {};
  const opened = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { opened, open };
}
