// Type signature grammar.
//
// Signatures use bus notation: one character per scalar, `a` followed by the
// element type for arrays, and parentheses around the members of a tuple.
//
//   i  signed 32-bit integer      u  unsigned 32-bit integer
//   d  double                     s  UTF-8 string
//   y  byte (array element)       aT homogeneous array of T
//   (T1..Tn) tuple

import { BridgeError } from "./bridge_error.ts";

// ============================================================================
// Signature Types
// ============================================================================

export type ScalarKind = "int32" | "uint32" | "double" | "string" | "byte";

export interface ScalarSignature {
  kind: ScalarKind;
}

export interface ArraySignature {
  kind: "array";
  element: SignatureType;
}

export interface TupleSignature {
  kind: "tuple";
  members: SignatureType[];
}

export type SignatureType = ScalarSignature | ArraySignature | TupleSignature;

/** The kind a signature's first character announces. */
export type SignatureKind = ScalarKind | "array" | "tuple" | "unsupported";

const SCALAR_CODES: Record<string, ScalarKind> = {
  i: "int32",
  u: "uint32",
  d: "double",
  s: "string",
  y: "byte",
};

const SCALAR_CHARS: Record<ScalarKind, string> = {
  int32: "i",
  uint32: "u",
  double: "d",
  string: "s",
  byte: "y",
};

// Bus signatures nest at most 32 arrays and 32 tuples deep.
const MAX_DEPTH = 64;

// ============================================================================
// Parsing
// ============================================================================

export type ParseResult =
  | { ok: true; type: SignatureType }
  | { ok: false; error: BridgeError };

class SignatureReader {
  private pos = 0;

  constructor(readonly source: string) {}

  get done(): boolean {
    return this.pos >= this.source.length;
  }

  get offset(): number {
    return this.pos;
  }

  /** Read one complete type. Bytes are only valid directly inside an array. */
  readType(depth: number, arrayElement = false): SignatureType {
    if (depth > MAX_DEPTH) {
      throw this.fail("nesting too deep");
    }
    if (this.done) {
      throw this.fail("unexpected end of signature");
    }
    const ch = this.source[this.pos];
    this.pos++;

    const scalar = SCALAR_CODES[ch];
    if (scalar !== undefined) {
      if (scalar === "byte" && !arrayElement) {
        this.pos--;
        throw this.fail("byte outside an array");
      }
      return { kind: scalar };
    }

    switch (ch) {
      case "a":
        if (this.done) {
          throw this.fail("array without element type");
        }
        return { kind: "array", element: this.readType(depth + 1, true) };
      case "(": {
        const members: SignatureType[] = [];
        while (!this.done && this.source[this.pos] !== ")") {
          members.push(this.readType(depth + 1));
        }
        if (this.done) {
          throw this.fail("unterminated tuple");
        }
        this.pos++;
        return { kind: "tuple", members };
      }
      default:
        this.pos--;
        throw this.fail(`unknown type code '${ch}'`);
    }
  }

  fail(detail: string): BridgeError {
    return BridgeError.unsupportedSignature(this.source, `${detail} at offset ${this.pos}`);
  }
}

/**
 * Parse a signature holding exactly one complete type.
 *
 * Returns a result instead of throwing so callers on hot paths can turn the
 * failure into their own error.
 */
export function tryParseSignature(signature: string): ParseResult {
  const reader = new SignatureReader(signature);
  try {
    const type = reader.readType(0);
    if (!reader.done) {
      return { ok: false, error: reader.fail("trailing characters after complete type") };
    }
    return { ok: true, type };
  } catch (e) {
    if (e instanceof BridgeError) {
      return { ok: false, error: e };
    }
    throw e;
  }
}

/**
 * Parse a signature holding exactly one complete type.
 *
 * @throws BridgeError (unsupported_signature) if the signature is malformed
 */
export function parseSignature(signature: string): SignatureType {
  const result = tryParseSignature(signature);
  if (!result.ok) {
    throw result.error;
  }
  return result.type;
}

/**
 * Split a concatenation of complete types into its members.
 *
 * `"i(is)as"` gives `["i", "(is)", "as"]`; the empty string gives `[]`.
 *
 * @throws BridgeError (unsupported_signature) if any member is malformed
 */
export function splitSignatures(list: string): string[] {
  const reader = new SignatureReader(list);
  const members: string[] = [];
  while (!reader.done) {
    const start = reader.offset;
    reader.readType(0);
    members.push(list.slice(start, reader.offset));
  }
  return members;
}

// ============================================================================
// Formatting and inspection
// ============================================================================

export function formatSignature(type: SignatureType): string {
  switch (type.kind) {
    case "array":
      return `a${formatSignature(type.element)}`;
    case "tuple":
      return `(${type.members.map(formatSignature).join("")})`;
    default:
      return SCALAR_CHARS[type.kind];
  }
}

/** Build the signature of a tuple from its member signatures. */
export function tupleSignature(members: readonly string[]): string {
  return `(${members.join("")})`;
}

/**
 * Report the kind announced by the first character, without checking the rest.
 */
export function leadingKind(signature: string): SignatureKind {
  const ch = signature.charAt(0);
  const scalar = SCALAR_CODES[ch];
  if (scalar !== undefined && scalar !== "byte") {
    return scalar;
  }
  if (ch === "a") return "array";
  if (ch === "(") return "tuple";
  return "unsupported";
}

/**
 * Element signature of an array signature (the tail after `a`).
 *
 * @throws BridgeError if the signature is not an array signature
 */
export function elementSignature(signature: string): string {
  if (leadingKind(signature) !== "array" || signature.length < 2) {
    throw BridgeError.unsupportedSignature(signature, "not an array signature");
  }
  return signature.slice(1);
}

/** Member signatures of a tuple signature. */
export function tupleMembers(signature: string): string[] {
  if (leadingKind(signature) !== "tuple" || !signature.endsWith(")")) {
    throw BridgeError.unsupportedSignature(signature, "not a tuple signature");
  }
  return splitSignatures(signature.slice(1, -1));
}

/**
 * Describe what a signature expects, in words, for error messages.
 *
 * Unknown shapes fall back to the raw signature.
 */
export function describeSignature(signature: string): string {
  switch (signature) {
    case "i":
      return "integer";
    case "u":
      return "unsigned integer";
    case "d":
      return "real number";
    case "s":
      return "string";
    case "ay":
      return "bytes";
    case "ai":
      return "list/vector of integers";
    case "as":
      return "list/vector of strings";
    case "ad":
      return "list/vector of real numbers";
    default:
      return signature;
  }
}
