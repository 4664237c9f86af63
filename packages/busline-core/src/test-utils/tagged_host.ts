// A host whose values say what they are.
//
// Plain numbers are integers or doubles by value, `{ double }` is a double
// that stays a double, `{ rational: [n, d] }` a fraction, strings are
// character strings, Uint8Arrays byte strings, `{ symbol }` a symbol,
// `{ list }` a proper list and `{ vector }` a vector. Decoding keeps the
// list/vector split visible.

import type { HostNumber, HostProcedure, HostRuntime, HostValue, ProcedureArity } from "../host.ts";

export const VOID = Object.freeze({ void: true });

export interface TaggedList {
  list: HostValue[];
}

export interface TaggedVector {
  vector: HostValue[];
}

export const list = (...items: HostValue[]): TaggedList => ({ list: items });
export const vector = (...items: HostValue[]): TaggedVector => ({ vector: items });
export const double = (value: number) => ({ double: value });
export const rational = (numerator: number, denominator: number) => ({
  rational: [numerator, denominator],
});
export const symbol = (name: string) => ({ symbol: name });

function hasTag<K extends string>(value: HostValue, tag: K): value is Record<K, unknown> {
  return typeof value === "object" && value !== null && tag in value;
}

export class TaggedHost implements HostRuntime {
  readonly name = "tagged";
  readonly voidValue: HostValue = VOID;
  readonly procedures = new Map<string, { procedure: HostProcedure; arity: ProcedureArity }>();

  toNumber(value: HostValue): HostNumber | undefined {
    if (typeof value === "number") {
      return { kind: Number.isInteger(value) ? "integer" : "double", value };
    }
    if (hasTag(value, "double") && typeof value.double === "number") {
      return { kind: "double", value: value.double };
    }
    if (hasTag(value, "rational") && Array.isArray(value.rational)) {
      const [numerator, denominator] = value.rational;
      if (typeof numerator === "number" && typeof denominator === "number") {
        return { kind: "rational", value: numerator / denominator };
      }
    }
    return undefined;
  }

  toText(value: HostValue): string | undefined {
    if (typeof value === "string") return value;
    if (value instanceof Uint8Array) return new TextDecoder().decode(value);
    if (hasTag(value, "symbol") && typeof value.symbol === "string") return value.symbol;
    return undefined;
  }

  toBytes(value: HostValue): Uint8Array | undefined {
    return value instanceof Uint8Array ? value : undefined;
  }

  toBoolean(value: HostValue): boolean | undefined {
    return typeof value === "boolean" ? value : undefined;
  }

  listItems(value: HostValue): readonly HostValue[] | undefined {
    return hasTag(value, "list") && Array.isArray(value.list) ? value.list : undefined;
  }

  vectorItems(value: HostValue): readonly HostValue[] | undefined {
    return hasTag(value, "vector") && Array.isArray(value.vector) ? value.vector : undefined;
  }

  fromInteger(value: number): HostValue {
    return value;
  }

  fromDouble(value: number): HostValue {
    return double(value);
  }

  fromString(value: string): HostValue {
    return value;
  }

  fromBytes(value: Uint8Array): HostValue {
    return value;
  }

  makeList(items: readonly HostValue[]): HostValue {
    return list(...items);
  }

  makeVector(items: readonly HostValue[]): HostValue {
    return vector(...items);
  }

  define(name: string, procedure: HostProcedure, arity: ProcedureArity): void {
    this.procedures.set(name, { procedure, arity });
  }
}
