import {
  type CurveError,
  describeCurveError,
  err,
  flatMapResult,
  mapResult,
  ok,
  type Result,
  unwrap,
  unwrapCurve,
} from "@/errors";
import { describe, expect, it } from "vitest";

describe("Result", () => {
  it("should build success and failure values", () => {
    expect(ok(3)).toEqual({ ok: true, value: 3 });
    expect(err("bad")).toEqual({ ok: false, error: "bad" });
  });

  describe("mapResult", () => {
    it("should transform a success", () => {
      const result: Result<number, string> = ok(3);
      expect(mapResult(result, (n) => n * 2)).toEqual({ ok: true, value: 6 });
    });

    it("should pass a failure through", () => {
      const result: Result<number, string> = err("bad");
      expect(mapResult(result, (n: number) => n * 2)).toEqual({ ok: false, error: "bad" });
    });
  });

  describe("flatMapResult", () => {
    const half = (n: number): Result<number, string> => (n % 2 === 0 ? ok(n / 2) : err("odd"));

    it("should chain successes", () => {
      expect(flatMapResult(ok(8), half)).toEqual({ ok: true, value: 4 });
    });

    it("should stop at the first failure", () => {
      expect(flatMapResult(ok(3), half)).toEqual({ ok: false, error: "odd" });
    });
  });

  describe("unwrap", () => {
    it("should return the value of a success", () => {
      expect(unwrap(ok("value"), String)).toBe("value");
    });

    it("should throw the described error of a failure", () => {
      expect(() => unwrap(err(42), (code) => `code ${code}`)).toThrow("code 42");
    });
  });
});

describe("CurveError", () => {
  it("should describe an invalid segment count", () => {
    expect(describeCurveError({ type: "invalid_segment_count", count: 0 })).toBe(
      "Segment count must be a positive integer, got 0"
    );
  });

  it("should describe an invalid tolerance", () => {
    expect(describeCurveError({ type: "invalid_tolerance", maxError: -1 })).toBe(
      "Approximation tolerance must be strictly positive, got -1"
    );
  });

  it("should describe an exceeded segment limit", () => {
    expect(
      describeCurveError({ type: "segment_limit_exceeded", count: 2000, limit: 1000 })
    ).toBe("Approximation needs 2000 segments, above the limit of 1000");
  });

  it("should throw from unwrapCurve with the description", () => {
    expect(() => unwrapCurve(err<CurveError>({ type: "invalid_tolerance", maxError: 0 }))).toThrow(
      "Approximation tolerance must be strictly positive, got 0"
    );
  });
});
