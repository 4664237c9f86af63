// Tests for logging middleware

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { BridgeError, wireInt32, wireTuple } from "@busline/wire";
import { createDebugLogger, isEnabled, loggingMiddleware } from "./logging.ts";
import { Extensions } from "./middleware.ts";
import type { CallContext, CallRequest, CallOutcome } from "./middleware.ts";

function request(args = wireTuple()): CallRequest {
  return {
    method: "Add",
    exposedName: "calc-add",
    service: "org.example.Calc",
    objectPath: "/org/example/Calc",
    interfaceName: "org.example.Calc",
    args,
  };
}

describe("isEnabled", () => {
  it("matches exact names and wildcards", () => {
    expect(isEnabled("busline:call", "busline:call")).toBe(true);
    expect(isEnabled("busline:call", "busline:*")).toBe(true);
    expect(isEnabled("busline:call", "*")).toBe(true);
    expect(isEnabled("busline:call", "other:*")).toBe(false);
  });

  it("is off without a pattern", () => {
    expect(isEnabled("busline:call", undefined)).toBe(false);
    expect(isEnabled("busline:call", "")).toBe(false);
  });

  it("honors exclusions", () => {
    expect(isEnabled("busline:call", "busline:*,-busline:call")).toBe(false);
    expect(isEnabled("busline:handle", "busline:*,-busline:call")).toBe(true);
  });

  it("treats other characters literally", () => {
    expect(isEnabled("a.b", "a.b")).toBe(true);
    expect(isEnabled("axb", "a.b")).toBe(false);
  });
});

describe("logging", () => {
  let consoleLogs: Array<{ message: string; data: unknown }> = [];
  const originalConsoleLog = console.log;
  const originalDebug = process.env.DEBUG;

  beforeEach(() => {
    consoleLogs = [];
    console.log = (message: string, data?: unknown) => {
      consoleLogs.push({ message, data });
    };
    process.env.DEBUG = "busline:*";
  });

  afterEach(() => {
    console.log = originalConsoleLog;
    if (originalDebug === undefined) {
      delete process.env.DEBUG;
    } else {
      process.env.DEBUG = originalDebug;
    }
  });

  describe("loggingMiddleware", () => {
    it("logs request and response", async () => {
      const middleware = loggingMiddleware();
      const ctx: CallContext = { extensions: new Extensions() };
      const req = request(wireTuple(wireInt32(1), wireInt32(2)));

      middleware.pre?.(ctx, req);
      expect(consoleLogs).toHaveLength(1);
      expect(consoleLogs[0].message).toBe("→ calc-add");
      expect(consoleLogs[0].data).toEqual({
        type: "request",
        method: "Add",
        target: "org.example.Calc /org/example/Calc org.example.Calc",
        args: "(1, 2)",
      });

      const outcome: CallOutcome = { ok: true, value: 3 };
      middleware.post?.(ctx, req, outcome);
      expect(consoleLogs).toHaveLength(2);
      expect(consoleLogs[1].message).toMatch(/^← calc-add: ✓ \d+\.\d{2}ms$/);
      expect(consoleLogs[1].data).toMatchObject({ type: "response", method: "Add", ok: true, result: 3 });
    });

    it("leaves out empty and disabled arguments", () => {
      const ctx: CallContext = { extensions: new Extensions() };
      loggingMiddleware().pre?.(ctx, request());
      loggingMiddleware({ logArgs: false }).pre?.(ctx, request(wireTuple(wireInt32(1))));
      expect(consoleLogs[0].data).not.toHaveProperty("args");
      expect(consoleLogs[1].data).not.toHaveProperty("args");
    });

    it("does not log results when disabled", () => {
      const middleware = loggingMiddleware({ logResults: false });
      const ctx: CallContext = { extensions: new Extensions() };
      middleware.pre?.(ctx, request());
      middleware.post?.(ctx, request(), { ok: true, value: 3 });
      expect(consoleLogs[1].data).not.toHaveProperty("result");
    });

    it("logs failures with their code", () => {
      const middleware = loggingMiddleware();
      const ctx: CallContext = { extensions: new Extensions() };
      const error = BridgeError.remoteCallFailed("calc-add", new Error("boom"));
      middleware.pre?.(ctx, request());
      middleware.post?.(ctx, request(), { ok: false, error });
      expect(consoleLogs[1].message).toMatch(/^← calc-add: ✗ /);
      expect(consoleLogs[1].data).toMatchObject({
        ok: false,
        errorCode: "remote_call_failed",
        error: { name: "BridgeError", message: "calc-add: call failed because boom" },
      });
    });

    it("skips calls faster than minDuration", () => {
      const middleware = loggingMiddleware({ minDuration: 60_000 });
      const ctx: CallContext = { extensions: new Extensions() };
      middleware.pre?.(ctx, request());
      middleware.post?.(ctx, request(), { ok: true, value: 3 });
      expect(consoleLogs).toHaveLength(1);
    });

    it("is silent when its namespace is not enabled", () => {
      process.env.DEBUG = "busline:*,-busline:call";
      const middleware = loggingMiddleware();
      const ctx: CallContext = { extensions: new Extensions() };
      middleware.pre?.(ctx, request());
      middleware.post?.(ctx, request(), { ok: true, value: 3 });
      expect(consoleLogs).toHaveLength(0);
    });

    it("uses a custom namespace", () => {
      process.env.DEBUG = "app:rpc";
      const ctx: CallContext = { extensions: new Extensions() };
      loggingMiddleware().pre?.(ctx, request());
      loggingMiddleware({ namespace: "app:rpc" }).pre?.(ctx, request());
      expect(consoleLogs).toHaveLength(1);
    });
  });

  describe("createDebugLogger", () => {
    it("prefixes messages with the namespace", () => {
      const log = createDebugLogger("busline:handle");
      log("opened", { service: "org.example.Calc" });
      log("released");
      expect(consoleLogs).toEqual([
        { message: "busline:handle opened", data: { service: "org.example.Calc" } },
        { message: "busline:handle released", data: undefined },
      ]);
    });

    it("reads DEBUG on every call", () => {
      const log = createDebugLogger("busline:handle");
      process.env.DEBUG = "";
      log("hidden");
      process.env.DEBUG = "busline:handle";
      log("shown");
      expect(consoleLogs.map((entry) => entry.message)).toEqual(["busline:handle shown"]);
    });
  });
});
