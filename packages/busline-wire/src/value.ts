// Wire values: the typed representation the transport sends and receives.
//
// A wire value carries its own type, so decoding never needs the signature.

import { tryParseSignature, formatSignature, type SignatureType } from "./signature.ts";

// ============================================================================
// Wire Value Types
// ============================================================================

export interface WireInt32 {
  type: "int32";
  value: number;
}

export interface WireUint32 {
  type: "uint32";
  value: number;
}

export interface WireDouble {
  type: "double";
  value: number;
}

export interface WireString {
  type: "string";
  value: string;
}

/** An array whose element type is byte (`ay`), held as one buffer. */
export interface WireBytes {
  type: "bytes";
  value: Uint8Array;
}

export interface WireTuple {
  type: "tuple";
  elements: WireValue[];
}

export interface WireArray {
  type: "array";
  /** Declared element type; kept so an empty array still knows its type. */
  elementSignature: string;
  elements: WireValue[];
}

export type WireValue =
  | WireInt32
  | WireUint32
  | WireDouble
  | WireString
  | WireBytes
  | WireTuple
  | WireArray;

// ============================================================================
// Factory Functions
// ============================================================================

export function wireInt32(value: number): WireInt32 {
  return { type: "int32", value: value | 0 };
}

export function wireUint32(value: number): WireUint32 {
  return { type: "uint32", value: value >>> 0 };
}

export function wireDouble(value: number): WireDouble {
  return { type: "double", value };
}

export function wireString(value: string): WireString {
  return { type: "string", value };
}

export function wireBytes(value: Uint8Array): WireBytes {
  return { type: "bytes", value };
}

export function wireTuple(...elements: WireValue[]): WireTuple {
  return { type: "tuple", elements };
}

export function wireArray(elementSignature: string, elements: WireValue[]): WireArray {
  return { type: "array", elementSignature, elements };
}

// ============================================================================
// Type inspection
// ============================================================================

/** The signature a wire value carries. */
export function signatureOf(value: WireValue): string {
  switch (value.type) {
    case "int32":
      return "i";
    case "uint32":
      return "u";
    case "double":
      return "d";
    case "string":
      return "s";
    case "bytes":
      return "ay";
    case "tuple":
      return `(${value.elements.map(signatureOf).join("")})`;
    case "array":
      return `a${value.elementSignature}`;
  }
}

/**
 * Check that a wire value conforms to a signature.
 *
 * Arrays must declare the expected element type and every element must
 * conform to it. An empty `array` declared with element `y` matches `ay`.
 */
export function matchesSignature(value: WireValue, signature: string): boolean {
  const parsed = tryParseSignature(signature);
  return parsed.ok && matchesType(value, parsed.type);
}

/** Check a list of values against a concatenation of complete types. */
export function matchesSignatureList(values: readonly WireValue[], signatures: string): boolean {
  const parsed = tryParseSignature(`(${signatures})`);
  if (!parsed.ok || parsed.type.kind !== "tuple") {
    return false;
  }
  const members = parsed.type.members;
  return values.length === members.length && values.every((v, i) => matchesType(v, members[i]));
}

function matchesType(value: WireValue, type: SignatureType): boolean {
  switch (type.kind) {
    case "int32":
    case "uint32":
    case "double":
    case "string":
      return value.type === type.kind;
    case "byte":
      // Bytes only exist inside a byte array.
      return false;
    case "array":
      if (type.element.kind === "byte" && value.type === "bytes") {
        return true;
      }
      return (
        value.type === "array" &&
        value.elementSignature === formatSignature(type.element) &&
        value.elements.every((element) => matchesType(element, type.element))
      );
    case "tuple":
      return (
        value.type === "tuple" &&
        value.elements.length === type.members.length &&
        value.elements.every((element, i) => matchesType(element, type.members[i]))
      );
  }
}

// ============================================================================
// Text form
// ============================================================================

/**
 * Render a wire value compactly for logs.
 *
 * `(42, 'hi', [1, 2], b'\x01\x02')`
 */
export function formatWireValue(value: WireValue): string {
  switch (value.type) {
    case "int32":
    case "uint32":
    case "double":
      return String(value.value);
    case "string":
      return `'${value.value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
    case "bytes": {
      const hex = Array.from(value.value, (b) => `\\x${b.toString(16).padStart(2, "0")}`);
      return `b'${hex.join("")}'`;
    }
    case "tuple":
      if (value.elements.length === 1) {
        return `(${formatWireValue(value.elements[0])},)`;
      }
      return `(${value.elements.map(formatWireValue).join(", ")})`;
    case "array":
      if (value.elements.length === 0) {
        return `@a${value.elementSignature} []`;
      }
      return `[${value.elements.map(formatWireValue).join(", ")}]`;
  }
}

