/**
 * Tests for the AStatusOrElse<T> contract helpers.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { configureChecks, resetChecks, FatalCheckError } from "../log/check.js";
import { createMemorySink, type MemorySink } from "../log/memory-sink.js";
import { LogSeverity } from "../log/severity.js";
import { StatusCode } from "./status-code.js";
import { notFoundError, okStatus, Status } from "./status.js";
import {
  success,
  failure,
  toStatusOrElse,
  isStatusOrElse,
  type AStatusOrElse,
} from "./status-or-else.js";

let sink: MemorySink;
let exitCodes: number[];

beforeEach(() => {
  sink = createMemorySink();
  exitCodes = [];
  configureChecks({
    sink,
    terminate: (code) => {
      exitCodes.push(code);
    },
    exitCode: 1,
  });
});

afterEach(() => {
  resetChecks();
});

function parsePort(raw: string): AStatusOrElse<number> {
  const port = Number(raw);
  if (!Number.isInteger(port) || port <= 0) {
    return failure(Status.fromStatusCode(StatusCode.INVALID_ARGUMENT, `bad port: ${raw}`));
  }
  return success(port);
}

describe("success / failure", () => {
  it("success() builds the value arm", () => {
    const result = success(42);
    expect(result.ok).toBe(true);
    expect(result.value).toBe(42);
  });

  it("failure() builds the status arm", () => {
    const status = notFoundError("missing");
    const result = failure(status);
    expect(result.ok).toBe(false);
    expect(result.error).toBe(status);
  });

  it("narrows on the ok tag", () => {
    const good = parsePort("8080");
    const bad = parsePort("http");

    if (good.ok) {
      const port: number = good.value;
      expect(port).toBe(8080);
    }
    if (!bad.ok) {
      expect(bad.error.code()).toBe(StatusCode.INVALID_ARGUMENT);
      expect(bad.error.message()).toBe("bad port: http");
    }
    expect(good.ok).toBe(true);
    expect(bad.ok).toBe(false);
  });

  it("failure() with an OK status is a fatal contract violation", () => {
    expect(() => failure(okStatus())).toThrow(FatalCheckError);
    expect(exitCodes).toEqual([1]);
    expect(sink.records).toHaveLength(1);
    expect(sink.records[0]?.severity).toBe(LogSeverity.FATAL);
    expect(sink.records[0]?.message).toBe(
      "Check failed: failure() requires a non-OK status",
    );
  });
});

describe("toStatusOrElse", () => {
  it("turns a plain value into the success arm", () => {
    expect(toStatusOrElse<number>(2)).toEqual({ ok: true, value: 2 });
  });

  it("turns a failing Status into the failure arm", () => {
    const status = notFoundError("x");
    const result = toStatusOrElse<number>(status);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBe(status);
    }
  });

  it("rejects an OK status through the fatal check", () => {
    expect(() => toStatusOrElse<number>(okStatus())).toThrow(FatalCheckError);
    expect(exitCodes).toEqual([1]);
  });
});

describe("isStatusOrElse", () => {
  it("recognizes both arms", () => {
    expect(isStatusOrElse(success("a"))).toBe(true);
    expect(isStatusOrElse(failure(notFoundError()))).toBe(true);
  });

  it("rejects look-alikes", () => {
    expect(isStatusOrElse(null)).toBe(false);
    expect(isStatusOrElse(42)).toBe(false);
    expect(isStatusOrElse({ ok: true })).toBe(false);
    expect(isStatusOrElse({ ok: false, error: "nope" })).toBe(false);
    expect(isStatusOrElse(notFoundError())).toBe(false);
  });

  it("rejects a failure arm holding an OK status", () => {
    expect(isStatusOrElse({ ok: false, error: okStatus() })).toBe(false);
    expect(isStatusOrElse({ ok: false, error: new Status() })).toBe(false);
  });
});
