// In-process bus.
//
// Services export objects at paths; each object implements interfaces whose
// methods are plain handlers over wire values. MemoryBus implements
// BusTransport, so a Bridge can talk to these objects exactly as it would to
// remote ones.

import {
  matchesSignatureList,
  signatureOf,
  wireArray,
  wireString,
  wireTuple,
  type WireTuple,
  type WireValue,
} from "@busline/wire";
import {
  BUS_INTERFACE,
  BUS_PATH,
  BUS_SERVICE,
  childPath,
  type BusKind,
  type BusTransport,
  type InterfaceMetadata,
  type MethodMetadata,
  type NodeMetadata,
  type TransportProxy,
} from "@busline/core";
import { parseIntrospectionDocument } from "./schema.ts";

// ============================================================================
// Definitions
// ============================================================================

export type MethodHandler = (args: WireValue[]) => WireValue[] | Promise<WireValue[]>;

export interface MethodDefinition {
  /** Input parameters as `[name, signature]`, in order. */
  inputs?: Array<[name: string, signature: string]>;
  /** Output parameters as `[name, signature]`, in order. */
  outputs?: Array<[name: string, signature: string]>;
  /** Annotation name → value. */
  annotations?: Record<string, string>;
  handler: MethodHandler;
}

/** Method name → definition. */
export type InterfaceDefinition = Record<string, MethodDefinition>;

/** Error names reported by MemoryBus, following the bus's own. */
export const MemoryBusErrorName = {
  SERVICE_UNKNOWN: "org.freedesktop.DBus.Error.ServiceUnknown",
  UNKNOWN_METHOD: "org.freedesktop.DBus.Error.UnknownMethod",
  INVALID_ARGS: "org.freedesktop.DBus.Error.InvalidArgs",
  NO_REPLY: "org.freedesktop.DBus.Error.NoReply",
  FAILED: "org.freedesktop.DBus.Error.Failed",
} as const;

export class MemoryBusError extends Error {
  constructor(
    readonly errorName: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "MemoryBusError";
  }
}

interface ExportedInterface {
  metadata: InterfaceMetadata;
  definitions: InterfaceDefinition;
}

/** path → interface name → interface */
type ServiceObjects = Map<string, Map<string, ExportedInterface>>;

interface MemoryProxy extends TransportProxy {
  readonly id: number;
}

function toMethodMetadata(name: string, definition: MethodDefinition): MethodMetadata {
  return {
    name,
    inArgs: (definition.inputs ?? []).map(([arg, signature]) => ({ name: arg, signature })),
    outArgs: (definition.outputs ?? []).map(([arg, signature]) => ({ name: arg, signature })),
    annotations: Object.entries(definition.annotations ?? {}).map(([annotation, value]) => ({
      name: annotation,
      value,
    })),
  };
}

function joinSignatures(args: Array<[string, string]> | undefined): string {
  return (args ?? []).map(([, signature]) => signature).join("");
}

const LIST_NAMES: MethodMetadata = {
  name: "ListNames",
  inArgs: [],
  outArgs: [{ name: "names", signature: "as" }],
  annotations: [],
};

// ============================================================================
// MemoryBus
// ============================================================================

export class MemoryBus implements BusTransport {
  private readonly services: Record<BusKind, Map<string, ServiceObjects>> = {
    session: new Map(),
    system: new Map(),
  };
  private readonly proxies = new Map<number, MemoryProxy>();
  private nextProxyId = 1;

  /**
   * Export `methods` as interface `interfaceName` of the object at
   * `objectPath` in `service`. Exporting the same interface again replaces it.
   */
  exportObject(
    service: string,
    objectPath: string,
    interfaceName: string,
    methods: InterfaceDefinition,
    bus: BusKind = "session",
  ): void {
    let objects = this.services[bus].get(service);
    if (objects === undefined) {
      objects = new Map();
      this.services[bus].set(service, objects);
    }
    let interfaces = objects.get(objectPath);
    if (interfaces === undefined) {
      interfaces = new Map();
      objects.set(objectPath, interfaces);
    }
    interfaces.set(interfaceName, {
      metadata: {
        name: interfaceName,
        methods: Object.entries(methods).map(([name, definition]) => toMethodMetadata(name, definition)),
      },
      definitions: methods,
    });
  }

  /** Remove a service and every object it exports. */
  removeService(service: string, bus: BusKind = "session"): boolean {
    return this.services[bus].delete(service);
  }

  /** Number of proxies connected and not yet released. */
  get openProxies(): number {
    return this.proxies.size;
  }

  // ==========================================================================
  // BusTransport
  // ==========================================================================

  async connect(
    bus: BusKind,
    service: string,
    objectPath: string,
    interfaceName: string,
  ): Promise<TransportProxy> {
    if (service !== BUS_SERVICE && !this.services[bus].has(service)) {
      throw new MemoryBusError(
        MemoryBusErrorName.SERVICE_UNKNOWN,
        `The name ${service} was not provided by any service`,
      );
    }
    const proxy: MemoryProxy = { id: this.nextProxyId++, bus, service, objectPath, interfaceName };
    this.proxies.set(proxy.id, proxy);
    return proxy;
  }

  async introspect(proxy: TransportProxy): Promise<string> {
    const open = this.requireOpen(proxy);
    const document: NodeMetadata =
      open.service === BUS_SERVICE
        ? this.describeBusService(open.objectPath)
        : this.describeObject(open.bus, open.service, open.objectPath);
    return JSON.stringify(document);
  }

  parseIntrospection(raw: string): NodeMetadata {
    return parseIntrospectionDocument(raw);
  }

  async call(
    proxy: TransportProxy,
    method: string,
    args: WireTuple,
    timeoutMs: number,
  ): Promise<WireValue | null> {
    const open = this.requireOpen(proxy);
    if (timeoutMs !== -1 && !(timeoutMs > 0)) {
      throw new MemoryBusError(MemoryBusErrorName.FAILED, `Invalid timeout ${timeoutMs}`);
    }

    if (
      open.service === BUS_SERVICE &&
      open.objectPath === BUS_PATH &&
      open.interfaceName === BUS_INTERFACE &&
      method === "ListNames"
    ) {
      this.checkArguments(method, args.elements, "");
      return wireTuple(wireArray("s", this.listNames(open.bus).map(wireString)));
    }

    const exported = this.services[open.bus]
      .get(open.service)
      ?.get(open.objectPath)
      ?.get(open.interfaceName);
    const definition =
      exported !== undefined && Object.hasOwn(exported.definitions, method)
        ? exported.definitions[method]
        : undefined;
    if (definition === undefined) {
      throw new MemoryBusError(
        MemoryBusErrorName.UNKNOWN_METHOD,
        `No such method '${method}' in interface '${open.interfaceName}' at object path '${open.objectPath}'`,
      );
    }

    this.checkArguments(method, args.elements, joinSignatures(definition.inputs));

    const outputs = await withTimeout(
      Promise.resolve().then(() => definition.handler(args.elements)),
      timeoutMs,
      method,
    );

    const outSignature = joinSignatures(definition.outputs);
    if (!matchesSignatureList(outputs, outSignature)) {
      throw new MemoryBusError(
        MemoryBusErrorName.FAILED,
        `Reply to '${method}' has signature '${outputs.map(signatureOf).join("")}', expected '${outSignature}'`,
      );
    }
    return wireTuple(...outputs);
  }

  release(proxy: TransportProxy): void {
    const open = this.requireOpen(proxy);
    this.proxies.delete(open.id);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private requireOpen(proxy: TransportProxy): MemoryProxy {
    for (const open of this.proxies.values()) {
      if (open === proxy) return open;
    }
    throw new MemoryBusError(MemoryBusErrorName.FAILED, "Proxy is not connected to this bus");
  }

  private checkArguments(method: string, args: WireValue[], signature: string): void {
    if (!matchesSignatureList(args, signature)) {
      throw new MemoryBusError(
        MemoryBusErrorName.INVALID_ARGS,
        `Arguments to '${method}' have signature '${args.map(signatureOf).join("")}', expected '${signature}'`,
      );
    }
  }

  private listNames(bus: BusKind): string[] {
    return [BUS_SERVICE, ...this.services[bus].keys()];
  }

  private describeBusService(objectPath: string): NodeMetadata {
    if (objectPath !== BUS_PATH) {
      return { interfaces: [], nodes: [] };
    }
    return { interfaces: [{ name: BUS_INTERFACE, methods: [LIST_NAMES] }], nodes: [] };
  }

  private describeObject(bus: BusKind, service: string, objectPath: string): NodeMetadata {
    const objects = this.services[bus].get(service);
    if (objects === undefined) {
      return { interfaces: [], nodes: [] };
    }

    const interfaces = [...(objects.get(objectPath)?.values() ?? [])].map((iface) => iface.metadata);

    // Direct children, including intermediate nodes of deeper objects.
    const prefix = childPath(objectPath, "");
    const nodes = new Set<string>();
    for (const path of objects.keys()) {
      if (path !== objectPath && path.startsWith(prefix)) {
        nodes.add(path.slice(prefix.length).split("/")[0]);
      }
    }
    return { interfaces, nodes: [...nodes] };
  }
}

/** Resolve with `promise`, or fail with NoReply after `timeoutMs` (-1: never). */
async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, method: string): Promise<T> {
  if (timeoutMs === -1) {
    return promise;
  }
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(
        new MemoryBusError(
          MemoryBusErrorName.NO_REPLY,
          `Did not receive a reply to '${method}' within ${timeoutMs}ms`,
        ),
      );
    }, timeoutMs);
  });
  try {
    return await Promise.race([promise, expired]);
  } finally {
    clearTimeout(timer);
  }
}
