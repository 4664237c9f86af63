import { describe, it, expect, beforeEach } from "vitest";
import {
  BridgeError,
  BridgeErrorCode,
  wireArray,
  wireInt32,
  wireString,
  wireTuple,
  type WireValue,
} from "@busline/wire";
import { RemoteHandle } from "./handle.ts";
import { CallKernel } from "./kernel.ts";
import { RejectionError, type CallMiddleware, type CallOutcome } from "./middleware.ts";
import {
  StubTransport,
  TaggedHost,
  VOID,
  list,
  method,
  singleInterface,
  vector,
} from "./test-utils/index.ts";

function int(value: WireValue | undefined): number {
  if (value?.type !== "int32") throw new Error("expected int32");
  return value.value;
}

function reply(name: string, args: { elements: WireValue[] }): WireValue | null {
  switch (name) {
    case "Add":
      return wireTuple(wireInt32(int(args.elements[0]) + int(args.elements[1])));
    case "Pair":
      return wireTuple(wireInt32(1), wireString("a"));
    case "Split":
      return wireTuple(wireArray("s", [wireString("a"), wireString("b")]));
    case "Fail":
      throw new Error("boom");
    case "Silent":
      throw {};
    case "Bogus":
      return JSON.parse('{"type":"variant"}');
    default:
      return wireTuple();
  }
}

describe("CallKernel", () => {
  const host = new TaggedHost();
  let transport: StubTransport;
  let handle: RemoteHandle;

  beforeEach(async () => {
    transport = new StubTransport(
      singleInterface("org.example.Calc", [
        method("Add", ["i", "i"], ["i"]),
        method("Reset", []),
        method("Pair", [], ["i", "s"]),
        method("Split", ["s"], ["as"]),
        method("Fail", []),
        method("Silent", []),
        method("Bogus", []),
      ]),
      reply,
    );
    handle = await RemoteHandle.open(transport, {
      service: "org.example.Calc",
      objectPath: "/org/example/Calc",
      interfaceName: "org.example.Calc",
    });
  });

  describe("invoke", () => {
    it("encodes arguments, calls the transport and decodes the reply", async () => {
      const kernel = new CallKernel(host);
      await expect(kernel.invoke(handle, "Add", "add", [2, 3])).resolves.toBe(5);
      expect(transport.calls).toHaveLength(1);
      expect(transport.calls[0].method).toBe("Add");
      expect(transport.calls[0].args).toEqual(wireTuple(wireInt32(2), wireInt32(3)));
      expect(transport.calls[0].timeoutMs).toBe(-1);
    });

    it("passes its timeout to the transport", async () => {
      const kernel = new CallKernel(host, 500);
      await kernel.invoke(handle, "Reset", "Reset", []);
      expect(transport.calls[0].timeoutMs).toBe(500);
    });

    it("decodes zero, one and several outputs", async () => {
      const kernel = new CallKernel(host);
      await expect(kernel.invoke(handle, "Reset", "Reset", [])).resolves.toBe(VOID);
      await expect(kernel.invoke(handle, "Split", "Split", ["a b"])).resolves.toEqual(vector("a", "b"));
      await expect(kernel.invoke(handle, "Pair", "Pair", [])).resolves.toEqual(list(1, "a"));
    });

    it("rejects an arity mismatch before calling the transport", async () => {
      const kernel = new CallKernel(host);
      await expect(kernel.invoke(handle, "Add", "add", [1])).rejects.toMatchObject({
        code: BridgeErrorCode.ARITY_MISMATCH,
        message: "add expected 2 params, received 1",
        arity: 2,
        received: 1,
      });
      expect(transport.calls).toHaveLength(0);
    });

    it("rejects unknown methods", async () => {
      const kernel = new CallKernel(host);
      await expect(kernel.invoke(handle, "Nope", "nope", [])).rejects.toMatchObject({
        code: BridgeErrorCode.NO_SUCH_METHOD,
        message: "nope: no such method: Nope",
        method: "Nope",
      });
    });

    it("names the first argument that does not encode", async () => {
      const kernel = new CallKernel(host);
      await expect(kernel.invoke(handle, "Add", "add", [1, "x"])).rejects.toMatchObject({
        code: BridgeErrorCode.PARAMETER_TYPE_MISMATCH,
        message: "add: expected integer for parameter 1 of 2",
        position: 1,
        arity: 2,
        expected: "integer",
        signature: "i",
      });
      expect(transport.calls).toHaveLength(0);
    });

    it("rejects released handles and foreign values", async () => {
      const kernel = new CallKernel(host);
      handle.release();
      await expect(kernel.invoke(handle, "Reset", "reset", [])).rejects.toMatchObject({
        code: BridgeErrorCode.INVALID_HANDLE,
        message: "reset: could not obtain a live proxy handle",
      });
      await expect(kernel.invoke({}, "Reset", "reset", [])).rejects.toMatchObject({
        code: BridgeErrorCode.INVALID_HANDLE,
      });
      expect(transport.calls).toHaveLength(0);
    });

    it("wraps transport failures", async () => {
      const kernel = new CallKernel(host);
      const error = await kernel.invoke(handle, "Fail", "fail", []).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(BridgeError);
      expect(error).toMatchObject({
        code: BridgeErrorCode.REMOTE_CALL_FAILED,
        message: "fail: call failed because boom",
      });
      expect(error instanceof Error && error.cause instanceof Error && error.cause.message).toBe("boom");

      await expect(kernel.invoke(handle, "Silent", "silent", [])).rejects.toMatchObject({
        message: "silent: call failed for unknown reason",
      });
    });

    it("reports replies it cannot decode", async () => {
      const kernel = new CallKernel(host);
      await expect(kernel.invoke(handle, "Bogus", "bogus", [])).rejects.toMatchObject({
        code: BridgeErrorCode.INTERNAL_DECODE_ERROR,
        message: "bogus: could not convert return values (unrecognized wire value)",
        method: "Bogus",
      });
    });
  });

  describe("middleware", () => {
    function recorder(name: string, events: string[]): CallMiddleware {
      return {
        pre() {
          events.push(`${name}:pre`);
        },
        post() {
          events.push(`${name}:post`);
        },
      };
    }

    it("runs pre hooks in order and post hooks in reverse", async () => {
      const events: string[] = [];
      const kernel = new CallKernel(host).with(recorder("a", events)).with(recorder("b", events));
      await kernel.invoke(handle, "Reset", "Reset", []);
      expect(events).toEqual(["a:pre", "b:pre", "b:post", "a:post"]);
    });

    it("leaves the original kernel unchanged", async () => {
      const events: string[] = [];
      const kernel = new CallKernel(host);
      kernel.with(recorder("a", events));
      await kernel.invoke(handle, "Reset", "Reset", []);
      expect(events).toEqual([]);
    });

    it("shows the encoded request to pre hooks", async () => {
      const seen: unknown[] = [];
      const kernel = new CallKernel(host).with({
        pre(_ctx, request) {
          seen.push(request);
        },
      });
      await kernel.invoke(handle, "Add", "add", [1, 2]);
      expect(seen).toEqual([
        {
          method: "Add",
          exposedName: "add",
          service: "org.example.Calc",
          objectPath: "/org/example/Calc",
          interfaceName: "org.example.Calc",
          args: wireTuple(wireInt32(1), wireInt32(2)),
        },
      ]);
    });

    it("aborts the call when a pre hook rejects", async () => {
      const outcomes: CallOutcome[] = [];
      const kernel = new CallKernel(host).with({
        pre: () => ({ code: "read-only", message: "read only" }),
        post: (_ctx, _request, outcome) => {
          outcomes.push(outcome);
        },
      });

      const error = await kernel.invoke(handle, "Reset", "Reset", []).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(RejectionError);
      expect(error).toMatchObject({ code: "read-only", message: "read only" });
      expect(transport.calls).toHaveLength(0);
      expect(outcomes).toHaveLength(1);
      expect(outcomes[0].ok).toBe(false);
    });

    it("shows failures to post hooks", async () => {
      const outcomes: CallOutcome[] = [];
      const kernel = new CallKernel(host).with({
        post: (_ctx, _request, outcome) => {
          outcomes.push(outcome);
        },
      });
      await expect(kernel.invoke(handle, "Fail", "fail", [])).rejects.toBeInstanceOf(BridgeError);
      const [outcome] = outcomes;
      expect(outcome.ok).toBe(false);
      if (!outcome.ok) {
        expect(outcome.error).toMatchObject({ code: BridgeErrorCode.REMOTE_CALL_FAILED });
      }
    });

    it("does not let a failing post hook mask the result", async () => {
      const kernel = new CallKernel(host).with({
        post() {
          throw new Error("post hook failure");
        },
      });
      await expect(kernel.invoke(handle, "Add", "add", [2, 2])).resolves.toBe(4);
    });

    it("is not consulted when the arguments are wrong", async () => {
      const events: string[] = [];
      const kernel = new CallKernel(host).with(recorder("a", events));
      await expect(kernel.invoke(handle, "Add", "add", [])).rejects.toBeInstanceOf(BridgeError);
      expect(events).toEqual([]);
    });

    it("shares extensions between pre and post of one call", async () => {
      const key = Symbol("started");
      const seen: Array<string | undefined> = [];
      const kernel = new CallKernel(host).with({
        pre(ctx) {
          ctx.extensions.set(key, "yes");
        },
        post(ctx) {
          seen.push(ctx.extensions.get<string>(key));
        },
      });
      await kernel.invoke(handle, "Reset", "Reset", []);
      await kernel.invoke(handle, "Reset", "Reset", []);
      expect(seen).toEqual(["yes", "yes"]);
    });
  });
});
