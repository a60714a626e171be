import { describe, expect, it } from "vitest";
import { Err, Ok, Result } from "../src/types/result";

describe("Result", () => {
  it("maps ok values and skips err values", () => {
    expect(Ok<number, string>(2).map((n) => n * 3).value).toBe(6);

    const failed = Err<number, string>("boom").map((n) => n * 3);
    expect(failed.isErr()).toBe(true);
    expect(failed.error).toBe("boom");
  });

  it("maps errors only on err", () => {
    expect(Err<number, string>("boom").mapErr((e) => e.length).error).toBe(4);
    expect(Ok<number, string>(1).mapErr((e) => e.length).value).toBe(1);
  });

  it("chains with flatMap", () => {
    const half = (n: number): Result<number, string> =>
      n % 2 === 0 ? Ok(n / 2) : Err(`${n} is odd`);

    expect(Ok<number, string>(8).flatMap(half).flatMap(half).value).toBe(2);
    expect(Ok<number, string>(6).flatMap(half).flatMap(half).error).toBe(
      "3 is odd",
    );
  });

  it("falls back with getOrElse and throws with getOrThrow", () => {
    expect(Err<number, Error>(new Error("x")).getOrElse(7)).toBe(7);
    expect(Ok<number, Error>(1).getOrElse(7)).toBe(1);
    expect(() => Err<number, Error>(new Error("nope")).getOrThrow()).toThrow(
      "nope",
    );
  });

  it("matches both branches", () => {
    const render = (r: Result<number, string>) =>
      r.match(
        (v) => `ok:${v}`,
        (e) => `err:${e}`,
      );
    expect(render(Ok(1))).toBe("ok:1");
    expect(render(Err("bad"))).toBe("err:bad");
  });

  it("captures thrown values with fromThrowable", () => {
    const ok = Result.fromThrowable(
      () => 5,
      () => "unreachable",
    );
    expect(ok.success).toBe(true);
    expect(ok.value).toBe(5);

    const err = Result.fromThrowable(
      () => {
        throw new Error("kaput");
      },
      (e) => (e instanceof Error ? e.message : "unknown"),
    );
    expect(err.success).toBe(false);
    expect(err.error).toBe("kaput");
  });

  it("guards accessors on the wrong branch", () => {
    expect(() => Ok(1).error).toThrow("Cannot access error of Ok Result");
    expect(() => Err("e").value).toThrow("Cannot access value of Err Result");
  });
});
