import { describe, it, expect } from "vitest";
import { Ok, Err, map, andThen, unwrapOr, type Result } from "../src/result.js";

function parseDepth(raw: string): Result<number, string> {
  const depth = Number(raw);
  return Number.isInteger(depth) ? Ok(depth) : Err(`not a depth: ${raw}`);
}

describe("Result", () => {
  it("Ok carries a value", () => {
    const result = Ok(3);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toBe(3);
  });

  it("Err carries an error", () => {
    const result = Err("boom");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBe("boom");
  });

  describe("map", () => {
    it("transforms success values", () => {
      expect(map(parseDepth("2"), (d) => d * 10)).toEqual({ ok: true, value: 20 });
    });

    it("passes errors through untouched", () => {
      expect(map(parseDepth("x"), (d) => d * 10)).toEqual({ ok: false, error: "not a depth: x" });
    });
  });

  describe("andThen", () => {
    const clamp = (d: number): Result<number, string> => (d > 5 ? Err("too deep") : Ok(d));

    it("chains successful steps", () => {
      expect(andThen(parseDepth("4"), clamp)).toEqual({ ok: true, value: 4 });
    });

    it("stops at the first failing step", () => {
      expect(andThen(parseDepth("9"), clamp)).toEqual({ ok: false, error: "too deep" });
      expect(andThen(parseDepth("?"), clamp)).toEqual({ ok: false, error: "not a depth: ?" });
    });
  });

  describe("unwrapOr", () => {
    it("returns the value or the fallback", () => {
      expect(unwrapOr(parseDepth("1"), 3)).toBe(1);
      expect(unwrapOr(parseDepth("one"), 3)).toBe(3);
    });
  });
});
