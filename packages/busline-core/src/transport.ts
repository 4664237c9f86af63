/**
 * Bus transport abstraction.
 *
 * The bridge does not speak the bus protocol itself. A BusTransport opens
 * proxies to remote objects, fetches and parses their introspection data,
 * performs calls, and releases proxies.
 *
 * Implementations:
 * - MemoryBus (@busline/memory) for in-process services
 */

import type { WireTuple, WireValue } from "@busline/wire";
import type { NodeMetadata } from "./metadata.ts";

/** Which bus to connect to. */
export type BusKind = "session" | "system";

/** Well-known name, path and interface of the bus itself. */
export const BUS_SERVICE = "org.freedesktop.DBus";
export const BUS_PATH = "/";
export const BUS_INTERFACE = "org.freedesktop.DBus";
export const INTROSPECTABLE_INTERFACE = "org.freedesktop.DBus.Introspectable";

/**
 * A live proxy opened by a transport.
 *
 * Only the transport that opened it knows what else it holds.
 */
export interface TransportProxy {
  readonly bus: BusKind;
  readonly service: string;
  readonly objectPath: string;
  readonly interfaceName: string;
}

export interface BusTransport {
  /**
   * Open a proxy to an object on a bus.
   *
   * Rejects if the service cannot be reached.
   */
  connect(
    bus: BusKind,
    service: string,
    objectPath: string,
    interfaceName: string,
  ): Promise<TransportProxy>;

  /**
   * Fetch the raw introspection document for the proxy's object.
   */
  introspect(proxy: TransportProxy): Promise<string>;

  /**
   * Parse a raw introspection document.
   *
   * Throws if the document is malformed.
   */
  parseIntrospection(raw: string): NodeMetadata;

  /**
   * Call a method on the proxy's interface.
   *
   * Resolves with the reply tuple (or null when the reply carries nothing);
   * rejects with the remote error otherwise.
   *
   * @param timeoutMs - Reply timeout; -1 selects the transport default
   */
  call(
    proxy: TransportProxy,
    method: string,
    args: WireTuple,
    timeoutMs: number,
  ): Promise<WireValue | null>;

  /**
   * Release a proxy. The bridge releases each proxy it opened exactly once.
   */
  release(proxy: TransportProxy): void;
}
