// Tests for BridgeError

import { describe, it, expect } from "vitest";
import { BridgeError, BridgeErrorCode, errorMessage } from "./bridge_error.ts";

const target = {
  service: "org.example.Calc",
  objectPath: "/org/example/Calc",
  interfaceName: "org.example.Calc",
};

describe("BridgeError", () => {
  it("is an Error instance", () => {
    const error = BridgeError.invalidHandle("bus-call");
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("BridgeError");
    expect(error.code).toBe(BridgeErrorCode.INVALID_HANDLE);
    expect(error.operation).toBe("bus-call");
    expect(error.position).toBe(0);
  });

  it("formats connect failures with and without a reason", () => {
    const cause = new Error("name has no owner");
    const withReason = BridgeError.connectFailure("bus-proxy", target, cause);
    expect(withReason.message).toBe(
      "bus-proxy: could not connect to org.example.Calc /org/example/Calc (org.example.Calc) because name has no owner",
    );
    expect(withReason.cause).toBe(cause);

    const withoutReason = BridgeError.connectFailure("bus-proxy", target, undefined);
    expect(withoutReason.message).toBe(
      "bus-proxy: could not connect to org.example.Calc /org/example/Calc (org.example.Calc) for an unknown reason",
    );
  });

  it("formats introspection and interface lookup failures", () => {
    expect(BridgeError.introspectFailure("bus-proxy", target, "bad xml").message).toBe(
      "bus-proxy: could not introspect org.example.Calc /org/example/Calc because bad xml",
    );
    const missing = BridgeError.interfaceNotFound("bus-proxy", target);
    expect(missing.code).toBe(BridgeErrorCode.INTERFACE_NOT_FOUND);
    expect(missing.message).toBe(
      "bus-proxy: org.example.Calc /org/example/Calc has no interface org.example.Calc",
    );
  });

  it("records arity details", () => {
    const error = BridgeError.arityMismatch("calc-add", 2, 3);
    expect(error.message).toBe("calc-add expected 2 params, received 3");
    expect(error.arity).toBe(2);
    expect(error.received).toBe(3);
  });

  it("records parameter type details", () => {
    const error = BridgeError.parameterTypeMismatch("calc-sum", 1, 2, "list/vector of integers", "ai");
    expect(error.code).toBe(BridgeErrorCode.PARAMETER_TYPE_MISMATCH);
    expect(error.message).toBe("calc-sum: expected list/vector of integers for parameter 1 of 2");
    expect(error.position).toBe(1);
    expect(error.arity).toBe(2);
    expect(error.expected).toBe("list/vector of integers");
    expect(error.signature).toBe("ai");
  });

  it("formats remote call failures", () => {
    expect(BridgeError.remoteCallFailed("Add", new Error("boom")).message).toBe(
      "Add: call failed because boom",
    );
    expect(BridgeError.remoteCallFailed("Add", new Error("")).message).toBe(
      "Add: call failed for unknown reason",
    );
  });

  it("formats lookup and decode failures", () => {
    const noMethod = BridgeError.noSuchMethod("bus-call", "Frobnicate");
    expect(noMethod.message).toBe("bus-call: no such method: Frobnicate");
    expect(noMethod.method).toBe("Frobnicate");

    const decode = BridgeError.internalDecodeError("calc-add", "Add", "unrecognized wire value");
    expect(decode.code).toBe(BridgeErrorCode.INTERNAL_DECODE_ERROR);
    expect(decode.message).toBe("calc-add: could not convert return values (unrecognized wire value)");
  });

  it("formats wrong argument types", () => {
    const error = BridgeError.wrongArgumentType("bus-import", 2, 3, "boolean");
    expect(error.message).toBe("bus-import: expected boolean for argument 2 of 3");
  });
});

describe("errorMessage", () => {
  it("extracts messages from errors and strings", () => {
    expect(errorMessage(new Error("x"))).toBe("x");
    expect(errorMessage("y")).toBe("y");
    expect(errorMessage(new Error(""))).toBeNull();
    expect(errorMessage(42)).toBeNull();
    expect(errorMessage(null)).toBeNull();
  });
});
