/**
 * Tests for the pino-backed log sink.
 *
 * Records are written to an in-memory destination and parsed back from
 * pino's newline-delimited JSON.
 */

import { describe, it, expect } from "vitest";
import { pino } from "pino";
import { createPinoSink, pinoSinkFor } from "./sink.js";
import { LogSeverity } from "./severity.js";
import { createMemorySink } from "./memory-sink.js";

const LOCATION = { file: "/srv/app/jobs.ts", line: 12, column: 5 };

function captureLines(): { lines: string[]; write: (line: string) => void } {
  const lines: string[] = [];
  return {
    lines,
    write: (line: string) => {
      lines.push(line);
    },
  };
}

describe("createPinoSink", () => {
  it("writes one JSON record with the location fields", () => {
    const destination = captureLines();
    const sink = createPinoSink({ destination });
    sink.emit(LogSeverity.WARNING, "queue is backing up", LOCATION);

    expect(destination.lines).toHaveLength(1);
    const record: unknown = JSON.parse(destination.lines[0] ?? "");
    expect(record).toMatchObject({
      level: 40,
      msg: "queue is backing up",
      severity: "W",
      file: "/srv/app/jobs.ts",
      line: 12,
      column: 5,
    });
  });

  it("maps each severity to its pino level", () => {
    const destination = captureLines();
    const sink = createPinoSink({ destination });
    sink.emit(LogSeverity.INFO, "i", LOCATION);
    sink.emit(LogSeverity.WARNING, "w", LOCATION);
    sink.emit(LogSeverity.ERROR, "e", LOCATION);
    sink.emit(LogSeverity.FATAL, "f", LOCATION);

    const levels = destination.lines.map((line) => {
      const record: unknown = JSON.parse(line);
      return typeof record === "object" && record !== null && "level" in record
        ? record.level
        : undefined;
    });
    expect(levels).toEqual([30, 40, 50, 60]);
  });

  it("drops records below the configured level", () => {
    const destination = captureLines();
    const sink = createPinoSink({ level: "error", destination });
    sink.emit(LogSeverity.INFO, "quiet", LOCATION);
    sink.emit(LogSeverity.WARNING, "quiet", LOCATION);
    sink.emit(LogSeverity.FATAL, "loud", LOCATION);
    expect(destination.lines).toHaveLength(1);
  });

  it("adds the logger name when given", () => {
    const destination = captureLines();
    createPinoSink({ name: "billing", destination }).emit(
      LogSeverity.ERROR,
      "charge failed",
      LOCATION,
    );
    const record: unknown = JSON.parse(destination.lines[0] ?? "");
    expect(record).toMatchObject({ name: "billing", msg: "charge failed" });
  });
});

describe("pinoSinkFor", () => {
  it("writes through an existing logger", () => {
    const destination = captureLines();
    const sink = pinoSinkFor(pino({ level: "info" }, destination));
    sink.emit(LogSeverity.FATAL, "state corrupted", LOCATION);
    const record: unknown = JSON.parse(destination.lines[0] ?? "");
    expect(record).toMatchObject({ level: 60, msg: "state corrupted", severity: "F" });
  });
});

describe("createMemorySink", () => {
  it("records entries in order and clears them", () => {
    const sink = createMemorySink();
    sink.emit(LogSeverity.INFO, "first", LOCATION);
    sink.emit(LogSeverity.ERROR, "second", LOCATION);
    expect(sink.records.map((record) => record.message)).toEqual([
      "first",
      "second",
    ]);
    sink.clear();
    expect(sink.records).toEqual([]);
  });
});
