import fs from "node:fs";
import path from "node:path";
import type { DebugEvent, DebugListener } from "./chat-types.js";

/**
 * Appends debug events to a JSONL file, one `{ at, stage, data }` record per
 * line. Write failures are dropped so diagnostics never fail a turn.
 */
export function createDebugLogger(filePath: string, now: () => Date = () => new Date()): DebugListener {
  let directoryReady = false;

  return (event: DebugEvent) => {
    const record = {
      at: now().toISOString(),
      stage: event.stage,
      data: event.data,
    };

    let line: string;
    try {
      line = `${JSON.stringify(record)}\n`;
    } catch {
      line = `${JSON.stringify({ at: record.at, stage: record.stage, data: "[unserializable]" })}\n`;
    }

    try {
      if (!directoryReady) {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        directoryReady = true;
      }
      fs.appendFileSync(filePath, line, "utf8");
    } catch {
      // best-effort diagnostics
    }
  };
}

export function combineDebugListeners(...listeners: Array<DebugListener | undefined>): DebugListener {
  const active = listeners.filter((listener): listener is DebugListener => typeof listener === "function");
  return (event) => {
    for (const listener of active) {
      listener(event);
    }
  };
}
