// Bus wire layer: type signatures, typed wire values and the bridge error
// taxonomy shared by the marshaler and the transports.

// ============================================================================
// Errors
// ============================================================================

export {
  BridgeError,
  BridgeErrorCode,
  errorMessage,
  type BridgeErrorDetails,
  type ProxyTarget,
} from "./bridge_error.ts";

// ============================================================================
// Signature Grammar
// ============================================================================

export type {
  ScalarKind,
  ScalarSignature,
  ArraySignature,
  TupleSignature,
  SignatureType,
  SignatureKind,
  ParseResult,
} from "./signature.ts";

export {
  tryParseSignature,
  parseSignature,
  splitSignatures,
  formatSignature,
  tupleSignature,
  leadingKind,
  elementSignature,
  tupleMembers,
  describeSignature,
} from "./signature.ts";

// ============================================================================
// Wire Values
// ============================================================================

export type {
  WireInt32,
  WireUint32,
  WireDouble,
  WireString,
  WireBytes,
  WireTuple,
  WireArray,
  WireValue,
} from "./value.ts";

export {
  wireInt32,
  wireUint32,
  wireDouble,
  wireString,
  wireBytes,
  wireTuple,
  wireArray,
  signatureOf,
  matchesSignature,
  matchesSignatureList,
  formatWireValue,
} from "./value.ts";
