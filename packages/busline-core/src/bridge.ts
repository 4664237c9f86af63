// The operations a host program sees.
//
// Every operation takes and returns host values. install() defines them all
// in the host's namespace under a common prefix.

import { BridgeError, wireTuple, type ProxyTarget, type WireValue } from "@busline/wire";
import { importMethods, wireMethodName } from "./binding.ts";
import { resolveBridgeOptions, type BridgeOptions, type ResolvedBridgeOptions } from "./config.ts";
import { RemoteHandle, discardProxy, releaseHandle, requireHandle } from "./handle.ts";
import type { HostProcedure, HostRuntime, HostValue, ProcedureArity } from "./host.ts";
import { CallKernel } from "./kernel.ts";
import { decodeResult } from "./marshal.ts";
import { childPath, type NodeMetadata } from "./metadata.ts";
import {
  BUS_INTERFACE,
  BUS_PATH,
  BUS_SERVICE,
  INTROSPECTABLE_INTERFACE,
  type BusTransport,
  type TransportProxy,
} from "./transport.ts";

const ROOT_PATH = "/";

export class Bridge {
  readonly host: HostRuntime;
  readonly transport: BusTransport;
  readonly kernel: CallKernel;
  private readonly options: ResolvedBridgeOptions;
  private prefix = "bus-";

  constructor(options: BridgeOptions) {
    this.options = resolveBridgeOptions(options);
    this.host = this.options.host;
    this.transport = this.options.transport;
    let kernel = new CallKernel(this.host, this.options.timeoutMs);
    for (const mw of this.options.middleware) {
      kernel = kernel.with(mw);
    }
    this.kernel = kernel;
  }

  /** Exposed name of an operation. */
  operationName(operation: string): string {
    return `${this.prefix}${operation}`;
  }

  // ==========================================================================
  // Operations
  // ==========================================================================

  /** Open a handle to `interfaceName` of the object at `objectPath` in `service`. */
  async proxy(service: HostValue, objectPath: HostValue, interfaceName: HostValue): Promise<HostValue> {
    const operation = this.operationName("proxy");
    const target: ProxyTarget = {
      service: this.text(service, operation, 0, 3),
      objectPath: this.text(objectPath, operation, 1, 3),
      interfaceName: this.text(interfaceName, operation, 2, 3),
    };
    return RemoteHandle.open(this.transport, target, {
      bus: this.options.bus,
      operation,
      finalize: this.options.finalize,
    });
  }

  /**
   * Call a method by name without importing it. Dashes in the name stand for
   * underscores.
   */
  async call(handle: HostValue, method: HostValue, ...args: HostValue[]): Promise<HostValue> {
    const operation = this.operationName("call");
    const live = requireHandle(handle, operation);
    const name = this.text(method, operation, 1, 2 + args.length);
    return this.kernel.invoke(live, wireMethodName(name), name, args);
  }

  /** Define a binding for every method of the handle. */
  async import(handle: HostValue, prefix: HostValue, renameDashes: HostValue): Promise<HostValue> {
    const operation = this.operationName("import");
    const live = requireHandle(handle, operation);
    const namePrefix = this.text(prefix, operation, 1, 3);
    const dashes = this.host.toBoolean(renameDashes);
    if (dashes === undefined) {
      throw BridgeError.wrongArgumentType(operation, 2, 3, "boolean");
    }
    importMethods(this.kernel, live, namePrefix, dashes);
    return this.host.voidValue;
  }

  /** Method names of the handle's interface, as a host list of strings. */
  async methods(handle: HostValue): Promise<HostValue> {
    const live = requireHandle(handle, this.operationName("methods"));
    return this.host.makeList(live.methodNames().map((name) => this.host.fromString(name)));
  }

  /**
   * Describe a method as `[name, inputs, outputs, annotations]`, where inputs
   * and outputs are lists of `[name, signature]`.
   */
  async methodInfo(handle: HostValue, method: HostValue): Promise<HostValue> {
    const operation = this.operationName("method-info");
    const live = requireHandle(handle, operation);
    const name = wireMethodName(this.text(method, operation, 1, 2));
    const info = live.describeMethod(name);
    if (info === undefined) {
      throw BridgeError.noSuchMethod(operation, name);
    }

    const host = this.host;
    const params = (pairs: Array<[string, string]>): HostValue =>
      host.makeList(
        pairs.map(([param, signature]) =>
          host.makeList([host.fromString(param), host.fromString(signature)]),
        ),
      );
    return host.makeList([
      host.fromString(info.name),
      params(info.inputs),
      params(info.outputs),
      host.makeList(info.annotations.map((annotation) => host.fromString(annotation))),
    ]);
  }

  /** Names known to the bus, from the bus service's ListNames. */
  async services(): Promise<HostValue> {
    const operation = this.operationName("services");
    const target: ProxyTarget = {
      service: BUS_SERVICE,
      objectPath: BUS_PATH,
      interfaceName: BUS_INTERFACE,
    };
    const proxy = await this.connect(operation, target);

    let reply: WireValue | null;
    try {
      reply = await this.transport.call(proxy, "ListNames", wireTuple(), this.options.timeoutMs);
    } catch (err) {
      throw BridgeError.remoteCallFailed(operation, err);
    } finally {
      discardProxy(this.transport, proxy);
    }

    const decoded = decodeResult(this.host, reply);
    if (!decoded.ok) {
      throw BridgeError.internalDecodeError(operation, "ListNames", decoded.reason);
    }
    return decoded.value;
  }

  /**
   * Object paths directly below the service's root object.
   *
   * Best effort: only one level is listed, and only what the root's
   * introspection data names.
   */
  async objects(service: HostValue): Promise<HostValue> {
    const operation = this.operationName("objects");
    const target: ProxyTarget = {
      service: this.text(service, operation, 0, 1),
      objectPath: ROOT_PATH,
      interfaceName: INTROSPECTABLE_INTERFACE,
    };
    const proxy = await this.connect(operation, target);

    let node: NodeMetadata;
    try {
      node = this.transport.parseIntrospection(await this.transport.introspect(proxy));
    } catch (err) {
      throw BridgeError.introspectFailure(operation, target, err);
    } finally {
      discardProxy(this.transport, proxy);
    }

    return this.host.makeList(
      node.nodes.map((child) => this.host.fromString(childPath(ROOT_PATH, child))),
    );
  }

  /** Release a handle. Releasing it again does nothing. */
  async release(handle: HostValue): Promise<HostValue> {
    if (!(handle instanceof RemoteHandle)) {
      throw BridgeError.invalidHandle(this.operationName("release"));
    }
    releaseHandle(handle);
    return this.host.voidValue;
  }

  // ==========================================================================
  // Installation
  // ==========================================================================

  /**
   * Define every operation in the host namespace: `${prefix}proxy`,
   * `${prefix}call`, `${prefix}import`, `${prefix}methods`,
   * `${prefix}method-info`, `${prefix}services`, `${prefix}objects` and
   * `${prefix}release`.
   */
  install(prefix = "bus-"): void {
    this.prefix = prefix;
    this.define("proxy", { min: 3, max: 3 }, (args) => this.proxy(args[0], args[1], args[2]));
    this.define("call", { min: 2 }, (args) => this.call(args[0], args[1], ...args.slice(2)));
    this.define("import", { min: 3, max: 3 }, (args) => this.import(args[0], args[1], args[2]));
    this.define("methods", { min: 1, max: 1 }, (args) => this.methods(args[0]));
    this.define("method-info", { min: 2, max: 2 }, (args) => this.methodInfo(args[0], args[1]));
    this.define("services", { min: 0, max: 0 }, () => this.services());
    this.define("objects", { min: 1, max: 1 }, (args) => this.objects(args[0]));
    this.define("release", { min: 1, max: 1 }, (args) => this.release(args[0]));
  }

  private define(
    operation: string,
    arity: ProcedureArity,
    body: (args: HostValue[]) => Promise<HostValue>,
  ): void {
    const name = this.operationName(operation);
    const procedure: HostProcedure = async (...args) => {
      if (args.length < arity.min || (arity.max !== undefined && args.length > arity.max)) {
        throw BridgeError.arityMismatch(name, arity.min, args.length);
      }
      return body(args);
    };
    this.host.define(name, procedure, arity);
  }

  private async connect(operation: string, target: ProxyTarget): Promise<TransportProxy> {
    try {
      return await this.transport.connect(
        this.options.bus,
        target.service,
        target.objectPath,
        target.interfaceName,
      );
    } catch (err) {
      throw BridgeError.connectFailure(operation, target, err);
    }
  }

  private text(value: HostValue, operation: string, position: number, arity: number): string {
    const text = this.host.toText(value);
    if (text === undefined) {
      throw BridgeError.wrongArgumentType(operation, position, arity, "string");
    }
    return text;
  }
}
