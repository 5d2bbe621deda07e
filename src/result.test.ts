import { describe, it, expect } from "vitest";
import { ok, err, isOk, isErr, unwrap, unwrapOr, UnwrapError } from "./result";

describe("Result", () => {
  it("should build ok and err results", () => {
    expect(ok(1)).toEqual({ ok: true, value: 1 });
    expect(err("NOT_FOUND")).toEqual({ ok: false, error: "NOT_FOUND" });
    expect(err("FAILED", { cause: "disk" })).toEqual({
      ok: false,
      error: "FAILED",
      cause: "disk",
    });
  });

  it("should narrow with isOk and isErr", () => {
    expect(isOk(ok("x"))).toBe(true);
    expect(isErr(ok("x"))).toBe(false);
    expect(isErr(err("x"))).toBe(true);
  });

  it("should unwrap values and throw UnwrapError on failures", () => {
    expect(unwrap(ok(5))).toBe(5);
    expect(() => unwrap(err("NOPE", { cause: 404 }))).toThrow(UnwrapError);
    expect(() => unwrap(err("NOPE"))).toThrow(
      "Unwrap called on an error result: NOPE"
    );
  });

  it("should fall back with unwrapOr", () => {
    expect(unwrapOr(ok(5), 0)).toBe(5);
    expect(unwrapOr(err("x"), 0)).toBe(0);
  });
});
