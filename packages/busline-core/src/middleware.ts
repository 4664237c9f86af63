// Call middleware.
//
// Middleware wraps the remote round trip of every call made through a
// CallKernel, enabling patterns like logging, tracing and call policy.

import type { WireTuple } from "@busline/wire";
import type { HostValue } from "./host.ts";

/**
 * Extensions provide type-safe, symbol-keyed storage for middleware state.
 *
 * Each middleware can define a unique symbol and store/retrieve typed data
 * without conflicts with other middleware.
 *
 * @example
 * ```typescript
 * const STARTED = Symbol("started");
 * ctx.extensions.set(STARTED, Date.now());
 * const started = ctx.extensions.get<number>(STARTED);
 * ```
 */
export class Extensions {
  private data = new Map<symbol, unknown>();

  set<T>(key: symbol, value: T): void {
    this.data.set(key, value);
  }

  get<T>(key: symbol): T | undefined {
    return this.data.get(key) as T | undefined;
  }

  has(key: symbol): boolean {
    return this.data.has(key);
  }

  delete(key: symbol): boolean {
    return this.data.delete(key);
  }
}

/**
 * Context passed to middleware hooks. Lives for a single call.
 */
export interface CallContext {
  extensions: Extensions;
}

/**
 * An outgoing call, after its arguments were encoded.
 */
export interface CallRequest {
  /** Method name as sent on the wire. */
  readonly method: string;
  /** Name the caller used; the one error messages report. */
  readonly exposedName: string;
  readonly service: string;
  readonly objectPath: string;
  readonly interfaceName: string;
  /** Encoded arguments. */
  readonly args: WireTuple;
}

export type CallOutcome = { ok: true; value: HostValue } | { ok: false; error: Error };

/** Code chosen by the middleware that rejects a call. */
export type RejectionCode = string;

/**
 * Rejection returned by middleware to abort a call before it is sent.
 */
export interface Rejection {
  code: RejectionCode;
  message: string;
}

/**
 * Error thrown when middleware rejects a call.
 */
export class RejectionError extends Error {
  readonly code: RejectionCode;

  constructor(rejection: Rejection) {
    super(rejection.message);
    this.name = "RejectionError";
    this.code = rejection.code;
  }

  static from(rejection: Rejection): RejectionError {
    return new RejectionError(rejection);
  }
}

/**
 * Call middleware.
 *
 * `pre` runs before the transport is invoked and may reject the call;
 * `post` observes the outcome. Post hooks run in reverse order (onion model).
 *
 * @example
 * ```typescript
 * const readOnly: CallMiddleware = {
 *   pre(ctx, request) {
 *     if (request.method.startsWith("Set")) {
 *       return { code: "read-only", message: `${request.method} is read-only here` };
 *     }
 *   },
 * };
 * ```
 */
export interface CallMiddleware {
  pre?(ctx: CallContext, request: CallRequest): Promise<Rejection | void> | Rejection | void;

  post?(ctx: CallContext, request: CallRequest, outcome: CallOutcome): Promise<void> | void;
}
