import { describe, expect, it } from "vitest";
import { Err, isErr, isOk, map, mapErr, Ok, tryCatchAsync, unwrap, unwrapOr } from "../index.js";

describe("Result", () => {
  it("creates Ok and Err values", () => {
    expect(Ok(5)).toEqual({ ok: true, value: 5 });
    expect(Err("bad")).toEqual({ ok: false, error: "bad" });
  });

  it("narrows with isOk and isErr", () => {
    const ok = Ok(1);
    const err = Err(new Error("x"));
    expect(isOk(ok)).toBe(true);
    expect(isErr(ok)).toBe(false);
    expect(isErr(err)).toBe(true);
  });

  it("maps values and errors", () => {
    expect(map(Ok(2), (v) => v * 10)).toEqual({ ok: true, value: 20 });
    expect(map(Err<string>("e"), (v: number) => v * 10)).toEqual({ ok: false, error: "e" });
    expect(mapErr(Err("e"), (e) => `${e}!`)).toEqual({ ok: false, error: "e!" });
  });

  it("unwraps or throws", () => {
    expect(unwrap(Ok("v"))).toBe("v");
    expect(() => unwrap(Err(new Error("boom")))).toThrow("boom");
    expect(() => unwrap(Err("plain"))).toThrow("plain");
    expect(unwrapOr(Err("e"), 7)).toBe(7);
  });

  it("captures async failures", async () => {
    const ok = await tryCatchAsync(async () => 3);
    expect(ok).toEqual({ ok: true, value: 3 });

    const failed = await tryCatchAsync(async () => {
      throw new Error("read failed");
    });
    expect(failed.ok).toBe(false);
    if (!failed.ok) {
      expect(failed.error.message).toBe("read failed");
    }
  });
});
