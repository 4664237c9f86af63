import { describe, it, expect } from "vitest";
import { Extensions, RejectionError } from "./middleware.ts";

describe("Extensions", () => {
  it("stores values by symbol", () => {
    const ext = new Extensions();
    const a = Symbol("a");
    const b = Symbol("a");
    ext.set(a, 1);
    expect(ext.get<number>(a)).toBe(1);
    expect(ext.has(b)).toBe(false);
    expect(ext.delete(a)).toBe(true);
    expect(ext.has(a)).toBe(false);
  });
});

describe("RejectionError", () => {
  it("carries the rejection code and message", () => {
    const error = RejectionError.from({ code: "call-quota", message: "slow down" });
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("RejectionError");
    expect(error.code).toBe("call-quota");
    expect(error.message).toBe("slow down");
  });
});
