// A transport that records what the bridge asks of it.

import type { WireTuple, WireValue } from "@busline/wire";
import type { MethodMetadata, NodeMetadata } from "../metadata.ts";
import type { BusKind, BusTransport, TransportProxy } from "../transport.ts";

export interface RecordedCall {
  proxy: TransportProxy;
  method: string;
  args: WireTuple;
  timeoutMs: number;
}

export type StubReply = (method: string, args: WireTuple) => WireValue | null | Promise<WireValue | null>;

/** Build method metadata from `name`, input signatures and output signatures. */
export function method(
  name: string,
  inputs: string[],
  outputs: string[] = [],
  annotations: Array<[string, string]> = [],
): MethodMetadata {
  return {
    name,
    inArgs: inputs.map((signature, i) => ({ name: `in${i}`, signature })),
    outArgs: outputs.map((signature, i) => ({ name: `out${i}`, signature })),
    annotations: annotations.map(([name, value]) => ({ name, value })),
  };
}

export class StubTransport implements BusTransport {
  readonly calls: RecordedCall[] = [];
  readonly connects: Array<{ bus: BusKind; service: string; objectPath: string; interfaceName: string }> = [];
  readonly released: TransportProxy[] = [];

  connectError: unknown = undefined;
  introspectError: unknown = undefined;
  releaseError: unknown = undefined;

  constructor(
    public node: NodeMetadata,
    public reply: StubReply = () => null,
  ) {}

  async connect(
    bus: BusKind,
    service: string,
    objectPath: string,
    interfaceName: string,
  ): Promise<TransportProxy> {
    this.connects.push({ bus, service, objectPath, interfaceName });
    if (this.connectError !== undefined) throw this.connectError;
    return { bus, service, objectPath, interfaceName };
  }

  async introspect(_proxy: TransportProxy): Promise<string> {
    if (this.introspectError !== undefined) throw this.introspectError;
    return "stub";
  }

  parseIntrospection(_raw: string): NodeMetadata {
    return this.node;
  }

  async call(
    proxy: TransportProxy,
    method: string,
    args: WireTuple,
    timeoutMs: number,
  ): Promise<WireValue | null> {
    this.calls.push({ proxy, method, args, timeoutMs });
    return this.reply(method, args);
  }

  release(proxy: TransportProxy): void {
    this.released.push(proxy);
    if (this.releaseError !== undefined) throw this.releaseError;
  }
}

/** A node with one interface holding `methods`. */
export function singleInterface(interfaceName: string, methods: MethodMetadata[]): NodeMetadata {
  return { interfaces: [{ name: interfaceName, methods }], nodes: [] };
}
