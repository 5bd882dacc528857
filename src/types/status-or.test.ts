/**
 * Tests for StatusOr<T>.
 *
 * Reading the value of a failed StatusOr and building a failure from an
 * OK status are programming errors: both go through the fatal check,
 * which in these tests records the exit instead of ending the process.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { configureChecks, resetChecks, FatalCheckError } from "../log/check.js";
import { createMemorySink, type MemorySink } from "../log/memory-sink.js";
import { LogSeverity } from "../log/severity.js";
import { StatusCode } from "./status-code.js";
import { invalidArgumentError, okStatus, zeroDivisionError } from "./status.js";
import { success, failure } from "./status-or-else.js";
import { StatusOr } from "./status-or.js";

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
    exitCode: 3,
  });
});

afterEach(() => {
  resetChecks();
});

describe("StatusOr holding a value", () => {
  it("is ok and returns the value", () => {
    const holder = StatusOr.fromValue(42);
    expect(holder.ok()).toBe(true);
    expect(holder.val()).toBe(42);
  });

  it("reports an OK status", () => {
    const holder = StatusOr.fromValue("text");
    expect(holder.status().ok()).toBe(true);
    expect(holder.status()).toBe(okStatus());
  });

  it("keeps falsy values as values", () => {
    expect(StatusOr.fromValue(0).val()).toBe(0);
    expect(StatusOr.fromValue("").val()).toBe("");
    expect(StatusOr.fromValue(null).ok()).toBe(true);
  });

  it("returns the same object it was given", () => {
    const data = { metrics: [1, 2, 3] };
    expect(StatusOr.fromValue(data).val()).toBe(data);
  });
});

describe("StatusOr holding a status", () => {
  it("is not ok and returns the held status", () => {
    const status = invalidArgumentError("bad input");
    const holder = StatusOr.fromStatus<number>(status);
    expect(holder.ok()).toBe(false);
    expect(holder.status()).toBe(status);
    expect(exitCodes).toEqual([]);
  });

  it("val() trips the fatal check instead of returning", () => {
    const holder = StatusOr.fromStatus<number>(zeroDivisionError("b was 0"));
    expect(() => holder.val()).toThrow(FatalCheckError);
    expect(exitCodes).toEqual([3]);
    expect(sink.records).toHaveLength(1);
    expect(sink.records[0]?.severity).toBe(LogSeverity.FATAL);
    expect(sink.records[0]?.message).toBe(
      "Check failed: val() called on a failed StatusOr (ZERO_DIVISION: b was 0)",
    );
  });

  it("valueOr() returns the fallback", () => {
    const holder = StatusOr.fromStatus<number>(invalidArgumentError());
    expect(holder.valueOr(7)).toBe(7);
    expect(StatusOr.fromValue(1).valueOr(7)).toBe(1);
  });
});

describe("StatusOr construction from an OK status", () => {
  it("is rejected through the fatal check", () => {
    expect(() => StatusOr.fromStatus(okStatus())).toThrow(FatalCheckError);
    expect(exitCodes).toEqual([3]);
    expect(sink.records[0]?.message).toBe(
      "Check failed: StatusOr cannot be built from an OK status",
    );
  });
});

describe("StatusOr.from", () => {
  it("wraps both arms of AStatusOrElse", () => {
    const good = StatusOr.from(success(2));
    const bad = StatusOr.from<number>(failure(invalidArgumentError("no")));
    expect(good.ok()).toBe(true);
    expect(good.val()).toBe(2);
    expect(bad.ok()).toBe(false);
    expect(bad.status().code()).toBe(StatusCode.INVALID_ARGUMENT);
  });

  it("round-trips through toResult()", () => {
    const result = success("x");
    expect(StatusOr.from(result).toResult()).toBe(result);
  });

  it("rejects a hand-built failure arm holding OK", () => {
    expect(() => StatusOr.from({ ok: false, error: okStatus() })).toThrow(
      FatalCheckError,
    );
    expect(exitCodes).toEqual([3]);
  });
});
