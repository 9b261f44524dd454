import type { LogEntry, LogSink } from '../src/types.js';

export interface CapturedSink {
  sink: LogSink;
  entries(): LogEntry[];
}

/** Sink that keeps every line for inspection */
export function captureSink(): CapturedSink {
  const lines: string[] = [];
  return {
    sink: (line) => {
      lines.push(line);
    },
    entries: () => lines.map((line): LogEntry => JSON.parse(line)),
  };
}
