// Default host: plain JavaScript values.
//
// Integers are integral numbers (or bigints that fit a number exactly),
// strings are strings, byte strings are Uint8Arrays, lists are arrays and
// vectors are the numeric typed arrays. Decoded lists and vectors both come
// back as arrays. There are no rationals.

import type { HostNumber, HostProcedure, HostRuntime, HostValue, ProcedureArity } from "./host.ts";

const NUMERIC_VECTORS = [
  Int8Array,
  Int16Array,
  Int32Array,
  Uint16Array,
  Uint32Array,
  Float32Array,
  Float64Array,
] as const;

const utf8 = new TextDecoder("utf-8", { fatal: true });

/** A host procedure installed in a JsHost namespace, with its declared arity. */
export interface DefinedProcedure {
  procedure: HostProcedure;
  arity: ProcedureArity;
}

export class JsHost implements HostRuntime {
  readonly name = "javascript";
  readonly voidValue: HostValue = undefined;

  /** Procedures installed through define(), by name. */
  readonly definitions = new Map<string, DefinedProcedure>();

  /**
   * @param namespace - Object receiving defined procedures as properties
   */
  constructor(readonly namespace: Record<string, HostProcedure> = {}) {}

  toNumber(value: HostValue): HostNumber | undefined {
    if (typeof value === "number") {
      return { kind: Number.isInteger(value) ? "integer" : "double", value };
    }
    if (typeof value === "bigint") {
      const asNumber = Number(value);
      return BigInt(asNumber) === value ? { kind: "integer", value: asNumber } : undefined;
    }
    return undefined;
  }

  toText(value: HostValue): string | undefined {
    if (typeof value === "string") {
      return value;
    }
    if (typeof value === "symbol") {
      return Symbol.keyFor(value) ?? value.description;
    }
    if (value instanceof Uint8Array) {
      try {
        return utf8.decode(value);
      } catch {
        // Not UTF-8, so not text.
        return undefined;
      }
    }
    return undefined;
  }

  toBytes(value: HostValue): Uint8Array | undefined {
    return value instanceof Uint8Array ? value : undefined;
  }

  toBoolean(value: HostValue): boolean | undefined {
    return typeof value === "boolean" ? value : undefined;
  }

  listItems(value: HostValue): readonly HostValue[] | undefined {
    return Array.isArray(value) ? value : undefined;
  }

  vectorItems(value: HostValue): readonly HostValue[] | undefined {
    for (const ctor of NUMERIC_VECTORS) {
      if (value instanceof ctor) {
        return Array.from(value);
      }
    }
    return undefined;
  }

  fromInteger(value: number): HostValue {
    return value;
  }

  fromDouble(value: number): HostValue {
    return value;
  }

  fromString(value: string): HostValue {
    return value;
  }

  fromBytes(value: Uint8Array): HostValue {
    return value;
  }

  makeList(items: readonly HostValue[]): HostValue {
    return [...items];
  }

  makeVector(items: readonly HostValue[]): HostValue {
    return [...items];
  }

  define(name: string, procedure: HostProcedure, arity: ProcedureArity): void {
    this.namespace[name] = procedure;
    this.definitions.set(name, { procedure, arity });
  }
}
