// Bridge configuration.

import type { HostRuntime } from "./host.ts";
import { JsHost } from "./js_host.ts";
import type { CallMiddleware } from "./middleware.ts";
import type { BusKind, BusTransport } from "./transport.ts";

/** Options for creating a Bridge. */
export interface BridgeOptions {
  transport: BusTransport;
  /** Host the bridge converts values for. Default: a new JsHost. */
  host?: HostRuntime;
  /** Default: "session". */
  bus?: BusKind;
  /** Reply timeout passed to the transport. Default: -1 (transport default). */
  timeoutMs?: number;
  /** Applied in order around every call. */
  middleware?: CallMiddleware[];
  /** Release proxies of unreachable handles. Default: true. */
  finalize?: boolean;
}

export type ResolvedBridgeOptions = Required<BridgeOptions>;

export function resolveBridgeOptions(options: BridgeOptions): ResolvedBridgeOptions {
  return {
    transport: options.transport,
    host: options.host ?? new JsHost(),
    bus: options.bus ?? "session",
    timeoutMs: options.timeoutMs ?? -1,
    middleware: options.middleware ?? [],
    finalize: options.finalize ?? true,
  };
}

/**
 * Read bus and timeout settings from the environment.
 *
 * - `BUSLINE_BUS`: "session" or "system"
 * - `BUSLINE_TIMEOUT_MS`: a positive integer, or -1
 *
 * Unset or empty variables are left out of the result.
 */
export function bridgeOptionsFromEnv(
  env: Record<string, string | undefined> = process.env,
): Pick<BridgeOptions, "bus" | "timeoutMs"> {
  const result: Pick<BridgeOptions, "bus" | "timeoutMs"> = {};

  const bus = env.BUSLINE_BUS?.trim();
  if (bus) {
    if (bus !== "session" && bus !== "system") {
      throw new Error(`BUSLINE_BUS must be "session" or "system", got "${bus}"`);
    }
    result.bus = bus;
  }

  const timeout = env.BUSLINE_TIMEOUT_MS?.trim();
  if (timeout) {
    const value = /^-?\d+$/.test(timeout) ? Number(timeout) : NaN;
    if (!Number.isSafeInteger(value) || (value <= 0 && value !== -1)) {
      throw new Error(`BUSLINE_TIMEOUT_MS must be a positive integer or -1, got "${timeout}"`);
    }
    result.timeoutMs = value;
  }

  return result;
}
