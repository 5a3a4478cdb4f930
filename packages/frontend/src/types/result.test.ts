/**
 * Tests for Result type
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { ok, error, flatMap, collect, Result } from "./result.js";

describe("Result", () => {
  describe("ok and error constructors", () => {
    it("should create ok result", () => {
      const result = ok<number, string>(42);
      expect(result).to.deep.equal({ ok: true, value: 42 });
    });

    it("should create error result", () => {
      const result = error<number, string>("Something went wrong");
      expect(result).to.deep.equal({ ok: false, error: "Something went wrong" });
    });
  });

  describe("flatMap", () => {
    it("should flatMap ok value", () => {
      const mapped = flatMap(ok<number, string>(5), (x) => ok(x.toString()));
      expect(mapped).to.deep.equal({ ok: true, value: "5" });
    });

    it("should handle flatMap returning error", () => {
      const mapped = flatMap(ok<number, string>(5), (x) =>
        x > 10 ? ok(x) : error("Too small")
      );
      expect(mapped).to.deep.equal({ ok: false, error: "Too small" });
    });

    it("should pass through original error", () => {
      const mapped = flatMap(error<number, string>("Original error"), (x) => ok(x * 2));
      expect(mapped).to.deep.equal({ ok: false, error: "Original error" });
    });
  });

  describe("collect", () => {
    it("should return every value when all succeed", () => {
      const results: Result<number, readonly string[]>[] = [ok(1), ok(2)];
      expect(collect(results)).to.deep.equal({ ok: true, value: [1, 2] });
    });

    it("should keep every error in order", () => {
      const results: Result<number, readonly string[]>[] = [
        error(["a", "b"]),
        ok(2),
        error(["c"]),
      ];
      expect(collect(results)).to.deep.equal({ ok: false, error: ["a", "b", "c"] });
    });
  });
});
