// Remote handles.
//
// A RemoteHandle owns one transport proxy and the method table of one
// interface. It is valid while its state carries the process-wide proxy
// signature; release clears the signature, so a released handle is
// recognized instead of used.

import { randomInt } from "node:crypto";
import { BridgeError, errorMessage, type ProxyTarget } from "@busline/wire";
import { createDebugLogger } from "./logging.ts";
import {
  buildMethodIndex,
  describeMethod,
  findInterface,
  type MethodInfo,
  type MethodMetadata,
  type NodeMetadata,
} from "./metadata.ts";
import type { BusKind, BusTransport, TransportProxy } from "./transport.ts";

const log = createDebugLogger("busline:handle");

const RELEASED = 0;

let signature = RELEASED;

/** The tag every live handle carries. Drawn on first use. */
function proxySignature(): number {
  if (signature === RELEASED) {
    signature = randomInt(1, 0x7fffffff);
  }
  return signature;
}

export interface HandleState {
  tag: number;
  readonly transport: BusTransport;
  readonly proxy: TransportProxy;
  methods: Map<string, MethodMetadata> | null;
}

/**
 * Release a handle's resources: the transport proxy first, then the method
 * table. Returns false if the state was already released.
 */
function releaseState(state: HandleState): boolean {
  if (state.tag !== proxySignature()) {
    return false;
  }
  state.tag = RELEASED;
  try {
    state.transport.release(state.proxy);
  } finally {
    state.methods = null;
  }
  return true;
}

/**
 * Release a collected handle's state. Does nothing when the handle was
 * released explicitly; a failing transport release is logged.
 */
export function finalizeState(state: HandleState): void {
  const { service, objectPath } = state.proxy;
  try {
    if (releaseState(state)) {
      log("finalized", { service, objectPath });
    }
  } catch (err) {
    log("finalizer could not release proxy", { service, objectPath, error: errorMessage(err) });
  }
}

const finalizers = new FinalizationRegistry<HandleState>(finalizeState);

/** Release a proxy while another error is on its way out. */
export function discardProxy(transport: BusTransport, proxy: TransportProxy): void {
  try {
    transport.release(proxy);
  } catch (err) {
    log("could not release proxy", {
      service: proxy.service,
      objectPath: proxy.objectPath,
      error: errorMessage(err),
    });
  }
}

export interface OpenHandleOptions {
  /** Bus to connect to. Defaults to "session". */
  bus?: BusKind;
  /** Exposed operation name used in errors. Defaults to "proxy". */
  operation?: string;
  /** Release the proxy when the handle is garbage collected. Defaults to true. */
  finalize?: boolean;
}

export class RemoteHandle {
  private constructor(private readonly state: HandleState) {}

  /**
   * Connect to an object, introspect it and index the methods of one of its
   * interfaces.
   *
   * Fails with CONNECT_FAILURE, INTROSPECT_FAILURE or INTERFACE_NOT_FOUND.
   * Whatever was acquired before the failure is released.
   */
  static async open(
    transport: BusTransport,
    target: ProxyTarget,
    options: OpenHandleOptions = {},
  ): Promise<RemoteHandle> {
    const operation = options.operation ?? "proxy";
    const bus = options.bus ?? "session";

    let proxy: TransportProxy;
    try {
      proxy = await transport.connect(bus, target.service, target.objectPath, target.interfaceName);
    } catch (err) {
      throw BridgeError.connectFailure(operation, target, err);
    }

    let node: NodeMetadata;
    try {
      node = transport.parseIntrospection(await transport.introspect(proxy));
    } catch (err) {
      discardProxy(transport, proxy);
      throw BridgeError.introspectFailure(operation, target, err);
    }

    const iface = findInterface(node, target.interfaceName);
    if (iface === undefined) {
      discardProxy(transport, proxy);
      throw BridgeError.interfaceNotFound(operation, target);
    }

    const state: HandleState = {
      tag: proxySignature(),
      transport,
      proxy,
      methods: buildMethodIndex(iface),
    };
    const handle = new RemoteHandle(state);
    if (options.finalize ?? true) {
      finalizers.register(handle, state, handle);
    }
    log("opened", { service: target.service, objectPath: target.objectPath, methods: iface.methods.length });
    return handle;
  }

  get service(): string {
    return this.state.proxy.service;
  }

  get objectPath(): string {
    return this.state.proxy.objectPath;
  }

  get interfaceName(): string {
    return this.state.proxy.interfaceName;
  }

  get bus(): BusKind {
    return this.state.proxy.bus;
  }

  get transport(): BusTransport {
    return this.state.transport;
  }

  get proxy(): TransportProxy {
    return this.state.proxy;
  }

  isValid(): boolean {
    return this.state.tag === proxySignature();
  }

  /**
   * Release the proxy and the method table.
   *
   * Returns false when the handle was already released. A failure to release
   * the transport proxy is rethrown; the handle is released regardless.
   */
  release(): boolean {
    if (!this.isValid()) {
      return false;
    }
    finalizers.unregister(this);
    log("released", { service: this.service, objectPath: this.objectPath });
    return releaseState(this.state);
  }

  /** Method names in introspection order. Empty once released. */
  methodNames(): string[] {
    return this.state.methods === null ? [] : [...this.state.methods.keys()];
  }

  lookupMethod(name: string): MethodMetadata | undefined {
    return this.state.methods?.get(name);
  }

  describeMethod(name: string): MethodInfo | undefined {
    const method = this.lookupMethod(name);
    return method === undefined ? undefined : describeMethod(method);
  }
}

/** True for a live handle; false for released handles and anything else. */
export function isRemoteHandle(value: unknown): value is RemoteHandle {
  return value instanceof RemoteHandle && value.isValid();
}

/**
 * Return `value` as a live handle, or throw INVALID_HANDLE naming `operation`.
 */
export function requireHandle(value: unknown, operation: string): RemoteHandle {
  if (!isRemoteHandle(value)) {
    throw BridgeError.invalidHandle(operation);
  }
  return value;
}

/**
 * Release a handle. Released handles and non-handles are left alone.
 */
export function releaseHandle(value: unknown): boolean {
  return value instanceof RemoteHandle ? value.release() : false;
}
