import { describe, it, expect } from "vitest";
import { bridgeOptionsFromEnv, resolveBridgeOptions } from "./config.ts";
import { JsHost } from "./js_host.ts";
import { StubTransport, TaggedHost, singleInterface } from "./test-utils/index.ts";

describe("resolveBridgeOptions", () => {
  const transport = new StubTransport(singleInterface("org.example.Calc", []));

  it("fills defaults", () => {
    const resolved = resolveBridgeOptions({ transport });
    expect(resolved.transport).toBe(transport);
    expect(resolved.host).toBeInstanceOf(JsHost);
    expect(resolved.bus).toBe("session");
    expect(resolved.timeoutMs).toBe(-1);
    expect(resolved.middleware).toEqual([]);
    expect(resolved.finalize).toBe(true);
  });

  it("keeps what was given", () => {
    const host = new TaggedHost();
    const resolved = resolveBridgeOptions({
      transport,
      host,
      bus: "system",
      timeoutMs: 250,
      finalize: false,
    });
    expect(resolved.host).toBe(host);
    expect(resolved.bus).toBe("system");
    expect(resolved.timeoutMs).toBe(250);
    expect(resolved.finalize).toBe(false);
  });
});

describe("bridgeOptionsFromEnv", () => {
  it("returns nothing for an empty environment", () => {
    expect(bridgeOptionsFromEnv({})).toEqual({});
    expect(bridgeOptionsFromEnv({ BUSLINE_BUS: "", BUSLINE_TIMEOUT_MS: " " })).toEqual({});
  });

  it("reads bus and timeout", () => {
    expect(bridgeOptionsFromEnv({ BUSLINE_BUS: "system", BUSLINE_TIMEOUT_MS: "2500" })).toEqual({
      bus: "system",
      timeoutMs: 2500,
    });
    expect(bridgeOptionsFromEnv({ BUSLINE_TIMEOUT_MS: "-1" })).toEqual({ timeoutMs: -1 });
  });

  it("rejects unknown buses", () => {
    expect(() => bridgeOptionsFromEnv({ BUSLINE_BUS: "tcp" })).toThrow(
      'BUSLINE_BUS must be "session" or "system", got "tcp"',
    );
  });

  it("rejects malformed timeouts", () => {
    for (const value of ["0", "-5", "1.5", "abc"]) {
      expect(() => bridgeOptionsFromEnv({ BUSLINE_TIMEOUT_MS: value })).toThrow(
        `BUSLINE_TIMEOUT_MS must be a positive integer or -1, got "${value}"`,
      );
    }
  });
});
