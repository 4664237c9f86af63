// Signature-driven conversion between host values and wire values.
//
// Encoding dispatches on the signature's first character; decoding
// dispatches on the wire value's own type. Neither direction throws:
// failures come back as results so the call kernel can name the position.

import {
  describeSignature,
  tryParseSignature,
  tupleMembers,
  wireArray,
  wireBytes,
  wireDouble,
  wireInt32,
  wireString,
  wireTuple,
  wireUint32,
  type WireTuple,
  type WireValue,
} from "@busline/wire";
import type { HostRuntime, HostValue } from "./host.ts";

/** Result of encoding one host value. `signature` names the type that failed. */
export type EncodeResult = { ok: true; value: WireValue } | { ok: false; signature: string };

/** Result of encoding a whole argument list against its formals. */
export type EncodeArgumentsResult =
  | { ok: true; value: WireTuple }
  | { ok: false; position: number; signature: string; expected: string };

export type DecodeResult = { ok: true; value: HostValue } | { ok: false; reason: string };

// ============================================================================
// Host → Wire
// ============================================================================

/**
 * Encode a host value against a signature.
 *
 * Numeric targets accept any host number that converts without losing what
 * matters: `i` truncates doubles, `d` widens integers and rationals, `u` takes
 * integers only. Strings accept character strings, byte strings and symbols.
 */
export function encodeValue(host: HostRuntime, value: HostValue, signature: string): EncodeResult {
  const mismatch: EncodeResult = { ok: false, signature };

  switch (signature.charAt(0)) {
    case "a":
      return encodeArray(host, value, signature);

    case "(":
      return encodeTuple(host, value, signature);

    case "d": {
      const num = host.toNumber(value);
      if (num === undefined) return mismatch;
      return { ok: true, value: wireDouble(num.value) };
    }

    case "i": {
      const num = host.toNumber(value);
      if (num === undefined || num.kind === "rational" || !Number.isFinite(num.value)) {
        return mismatch;
      }
      return { ok: true, value: wireInt32(Math.trunc(num.value)) };
    }

    case "u": {
      const num = host.toNumber(value);
      if (num === undefined || num.kind !== "integer") return mismatch;
      return { ok: true, value: wireUint32(num.value) };
    }

    case "s": {
      const text = host.toText(value);
      if (text === undefined) return mismatch;
      return { ok: true, value: wireString(text) };
    }

    // Everything else, including a lone byte, is unsupported.
    default:
      return mismatch;
  }
}

function encodeArray(host: HostRuntime, value: HostValue, signature: string): EncodeResult {
  const mismatch: EncodeResult = { ok: false, signature };
  const element = signature.slice(1);

  // Byte strings go across as one buffer instead of element by element.
  if (element === "y") {
    const bytes = host.toBytes(value);
    if (bytes !== undefined) {
      return { ok: true, value: wireBytes(new Uint8Array(bytes)) };
    }
  }

  if (!tryParseSignature(signature).ok) {
    return mismatch;
  }

  const items = host.listItems(value) ?? host.vectorItems(value);
  if (items === undefined) {
    return mismatch;
  }

  const elements: WireValue[] = [];
  for (const item of items) {
    const encoded = encodeValue(host, item, element);
    if (!encoded.ok) {
      // Drop whatever was built so far.
      return mismatch;
    }
    elements.push(encoded.value);
  }
  return { ok: true, value: wireArray(element, elements) };
}

function encodeTuple(host: HostRuntime, value: HostValue, signature: string): EncodeResult {
  const mismatch: EncodeResult = { ok: false, signature };
  if (!tryParseSignature(signature).ok) {
    return mismatch;
  }
  const members = tupleMembers(signature);
  const items = host.listItems(value) ?? host.vectorItems(value);
  if (items === undefined || items.length !== members.length) {
    return mismatch;
  }

  const elements: WireValue[] = [];
  for (let i = 0; i < members.length; i++) {
    const encoded = encodeValue(host, items[i], members[i]);
    if (!encoded.ok) return mismatch;
    elements.push(encoded.value);
  }
  return { ok: true, value: wireTuple(...elements) };
}

/**
 * Encode positional actuals against positional formal signatures into the
 * tuple a call sends. Stops at the first actual that does not encode.
 *
 * The caller checks that both lists have the same length.
 */
export function encodeArguments(
  host: HostRuntime,
  actuals: readonly HostValue[],
  formals: readonly string[],
): EncodeArgumentsResult {
  const elements: WireValue[] = [];
  for (let i = 0; i < formals.length; i++) {
    const encoded = encodeValue(host, actuals[i], formals[i]);
    if (!encoded.ok) {
      return {
        ok: false,
        position: i,
        signature: formals[i],
        expected: describeSignature(formals[i]),
      };
    }
    elements.push(encoded.value);
  }
  return { ok: true, value: wireTuple(...elements) };
}

// ============================================================================
// Wire → Host
// ============================================================================

/**
 * Decode a wire value into a host value.
 *
 * Tuples become lists; arrays become vectors; byte arrays become byte strings.
 */
export function decodeValue(host: HostRuntime, wire: WireValue): DecodeResult {
  switch (wire.type) {
    case "int32":
    case "uint32":
      return { ok: true, value: host.fromInteger(wire.value) };
    case "double":
      return { ok: true, value: host.fromDouble(wire.value) };
    case "string":
      return { ok: true, value: host.fromString(wire.value) };
    case "bytes":
      return { ok: true, value: host.fromBytes(wire.value) };
    case "array":
      if (wire.elementSignature === "y") {
        return decodeByteArray(host, wire.elements);
      }
      return decodeElements(host, wire.elements, (items) => host.makeVector(items));
    case "tuple":
      return decodeElements(host, wire.elements, (items) => host.makeList(items));
    default:
      return { ok: false, reason: "unrecognized wire value" };
  }
}

function decodeElements(
  host: HostRuntime,
  elements: readonly WireValue[],
  build: (items: HostValue[]) => HostValue,
): DecodeResult {
  const items: HostValue[] = new Array<HostValue>(elements.length);
  for (let i = elements.length - 1; i >= 0; i--) {
    const child = decodeValue(host, elements[i]);
    if (!child.ok) return child;
    items[i] = child.value;
  }
  return { ok: true, value: build(items) };
}

// An array declared as bytes but sent element by element.
function decodeByteArray(host: HostRuntime, elements: readonly WireValue[]): DecodeResult {
  const bytes = new Uint8Array(elements.length);
  for (let i = 0; i < elements.length; i++) {
    const element = elements[i];
    if (element.type !== "int32" && element.type !== "uint32") {
      return { ok: false, reason: `byte array holds a ${element.type} value` };
    }
    if (element.value < 0 || element.value > 255) {
      return { ok: false, reason: `byte array holds ${element.value}` };
    }
    bytes[i] = element.value;
  }
  return { ok: true, value: host.fromBytes(bytes) };
}

/**
 * Decode the reply of a method call.
 *
 * Replies are always tuples of the output parameters: an empty tuple (or no
 * reply at all) is the host's void, a one-element tuple is its only element,
 * anything wider is a list in declared output order.
 */
export function decodeResult(host: HostRuntime, wire: WireValue | null | undefined): DecodeResult {
  if (wire === null || wire === undefined) {
    return { ok: true, value: host.voidValue };
  }
  if (wire.type === "tuple") {
    if (wire.elements.length === 0) {
      return { ok: true, value: host.voidValue };
    }
    if (wire.elements.length === 1) {
      return decodeValue(host, wire.elements[0]);
    }
  }
  return decodeValue(host, wire);
}
