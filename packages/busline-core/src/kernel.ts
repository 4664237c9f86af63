// Call kernel.
//
// Resolves a method against a handle, checks and encodes the arguments,
// sends the call through the transport and decodes the reply. Middleware
// wraps the round trip via the with() method.

import { BridgeError, errorMessage, type WireValue } from "@busline/wire";
import type { HostRuntime, HostValue } from "./host.ts";
import { requireHandle, type RemoteHandle } from "./handle.ts";
import { createDebugLogger } from "./logging.ts";
import { decodeResult, encodeArguments } from "./marshal.ts";
import { Extensions, RejectionError } from "./middleware.ts";
import type { CallContext, CallMiddleware, CallOutcome, CallRequest } from "./middleware.ts";

const log = createDebugLogger("busline:middleware");

export class CallKernel {
  private readonly middlewares: readonly CallMiddleware[];

  /**
   * @param timeoutMs - Passed to the transport on every call; -1 for its default
   */
  constructor(
    readonly host: HostRuntime,
    readonly timeoutMs: number = -1,
    middlewares: readonly CallMiddleware[] = [],
  ) {
    this.middlewares = middlewares;
  }

  /**
   * Call `wireName` on `handle` with host-value arguments.
   *
   * Handle, method and arity are checked and every argument is encoded before
   * the transport is involved. Errors name `exposedName`.
   */
  async invoke(
    handle: unknown,
    wireName: string,
    exposedName: string,
    args: readonly HostValue[],
  ): Promise<HostValue> {
    const live = requireHandle(handle, exposedName);

    const method = live.lookupMethod(wireName);
    if (method === undefined) {
      throw BridgeError.noSuchMethod(exposedName, wireName);
    }

    const formals = method.inArgs.map((arg) => arg.signature);
    if (formals.length !== args.length) {
      throw BridgeError.arityMismatch(exposedName, formals.length, args.length);
    }

    const encoded = encodeArguments(this.host, args, formals);
    if (!encoded.ok) {
      throw BridgeError.parameterTypeMismatch(
        exposedName,
        encoded.position,
        formals.length,
        encoded.expected,
        encoded.signature,
      );
    }

    const request: CallRequest = {
      method: wireName,
      exposedName,
      service: live.service,
      objectPath: live.objectPath,
      interfaceName: live.interfaceName,
      args: encoded.value,
    };
    return this.dispatch(live, request);
  }

  /**
   * Returns a kernel that runs `middleware` around every call, after the
   * middleware this kernel already has (onion model).
   */
  with(middleware: CallMiddleware): CallKernel {
    return new CallKernel(this.host, this.timeoutMs, [...this.middlewares, middleware]);
  }

  private async dispatch(handle: RemoteHandle, request: CallRequest): Promise<HostValue> {
    const ctx: CallContext = { extensions: new Extensions() };

    for (const mw of this.middlewares) {
      if (mw.pre) {
        const rejection = await mw.pre(ctx, request);
        if (rejection) {
          const error = RejectionError.from(rejection);
          await this.runPostHooks(ctx, request, { ok: false, error });
          throw error;
        }
      }
    }

    let outcome: CallOutcome;
    try {
      outcome = { ok: true, value: await this.roundTrip(handle, request) };
    } catch (e) {
      const error = e instanceof Error ? e : new Error(String(e));
      await this.runPostHooks(ctx, request, { ok: false, error });
      throw e;
    }

    await this.runPostHooks(ctx, request, outcome);
    return outcome.value;
  }

  private async roundTrip(handle: RemoteHandle, request: CallRequest): Promise<HostValue> {
    let reply: WireValue | null;
    try {
      reply = await handle.transport.call(handle.proxy, request.method, request.args, this.timeoutMs);
    } catch (err) {
      throw BridgeError.remoteCallFailed(request.exposedName, err);
    }

    const decoded = decodeResult(this.host, reply);
    if (!decoded.ok) {
      throw BridgeError.internalDecodeError(request.exposedName, request.method, decoded.reason);
    }
    return decoded.value;
  }

  private async runPostHooks(
    ctx: CallContext,
    request: CallRequest,
    outcome: CallOutcome,
  ): Promise<void> {
    // Reverse order (onion model)
    for (let i = this.middlewares.length - 1; i >= 0; i--) {
      const mw = this.middlewares[i];
      if (mw.post) {
        try {
          await mw.post(ctx, request, outcome);
        } catch (err) {
          log("post hook failed", { method: request.method, error: errorMessage(err) });
        }
      }
    }
  }
}
