import { describe, it, expect } from "vitest";
import {
  Ok,
  Err,
  isOk,
  isErr,
  map,
  mapErr,
  andThen,
  unwrapOr,
  unwrap,
  fromNullable,
  tryCatch,
  tryCatchAsync,
  type Result,
} from "../src/result.js";

describe("Result", () => {
  describe("constructors", () => {
    it("Ok wraps a value", () => {
      expect(Ok(42)).toEqual({ ok: true, value: 42 });
    });

    it("Err wraps an error", () => {
      const error = new Error("boom");
      expect(Err(error)).toEqual({ ok: false, error });
    });
  });

  describe("guards", () => {
    it("isOk and isErr discriminate", () => {
      expect(isOk(Ok(1))).toBe(true);
      expect(isErr(Ok(1))).toBe(false);
      expect(isOk(Err("x"))).toBe(false);
      expect(isErr(Err("x"))).toBe(true);
    });
  });

  describe("map / mapErr", () => {
    it("map transforms successes only", () => {
      expect(map(Ok(2), (n) => n * 3)).toEqual(Ok(6));
      const failed: Result<number, string> = Err("no");
      expect(map(failed, (n) => n * 3)).toEqual(Err("no"));
    });

    it("mapErr transforms failures only", () => {
      const failed: Result<number, string> = Err("no");
      expect(mapErr(failed, (e) => e.toUpperCase())).toEqual(Err("NO"));
      expect(mapErr(Ok(1), (e: string) => e.toUpperCase())).toEqual(Ok(1));
    });
  });

  describe("andThen", () => {
    const half = (n: number): Result<number, string> =>
      n % 2 === 0 ? Ok(n / 2) : Err(`${n} is odd`);

    it("chains successful steps", () => {
      expect(andThen(Ok(8), half)).toEqual(Ok(4));
    });

    it("stops at the first failure", () => {
      expect(andThen(Ok(3), half)).toEqual(Err("3 is odd"));
      expect(andThen(Err("earlier"), half)).toEqual(Err("earlier"));
    });
  });

  describe("unwrap", () => {
    it("unwrapOr falls back on failure", () => {
      expect(unwrapOr(Err("x"), 7)).toBe(7);
      expect(unwrapOr(Ok(3), 7)).toBe(3);
    });

    it("unwrap throws the carried error", () => {
      const error = new Error("kaput");
      expect(unwrap(Ok("v"))).toBe("v");
      expect(() => unwrap(Err(error))).toThrow(error);
    });
  });

  describe("fromNullable", () => {
    it("maps null and undefined to the error", () => {
      expect(fromNullable(null, "missing")).toEqual(Err("missing"));
      expect(fromNullable(undefined, "missing")).toEqual(Err("missing"));
    });

    it("keeps falsy values that are not nullish", () => {
      expect(fromNullable(0, "missing")).toEqual(Ok(0));
      expect(fromNullable("", "missing")).toEqual(Ok(""));
    });
  });

  describe("tryCatch", () => {
    it("captures thrown errors", () => {
      const result = tryCatch(() => {
        throw new Error("bad");
      });
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe("bad");
    });

    it("normalizes thrown non-errors", () => {
      const result = tryCatch(() => {
        throw "plain";
      });
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(Error);
      expect(result.error.message).toBe("plain");
    });

    it("applies the error mapper", () => {
      const result = tryCatch(
        () => {
          throw new RangeError("out of range");
        },
        (thrown) => (thrown instanceof RangeError ? "range" : "other")
      );
      expect(result).toEqual(Err("range"));
    });

    it("returns Ok for normal completion", () => {
      expect(tryCatch(() => 5)).toEqual(Ok(5));
    });
  });

  describe("tryCatchAsync", () => {
    it("captures rejections", async () => {
      const result = await tryCatchAsync(() => Promise.reject(new Error("async bad")));
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe("async bad");
    });

    it("resolves to Ok", async () => {
      expect(await tryCatchAsync(async () => "done")).toEqual(Ok("done"));
    });
  });
});
