// Error taxonomy for the bridge.
//
// Every failure the bridge reports is a BridgeError carrying one of the codes
// below. Factories build the message so the same failure always reads the same.

/** Bridge error codes */
export const BridgeErrorCode = {
  /** The transport could not open a proxy to the remote object */
  CONNECT_FAILURE: "connect_failure",
  /** Introspection data could not be fetched or parsed */
  INTROSPECT_FAILURE: "introspect_failure",
  /** The introspected object does not implement the requested interface */
  INTERFACE_NOT_FOUND: "interface_not_found",
  /** A value passed where a proxy handle was expected is not a live handle */
  INVALID_HANDLE: "invalid_handle",
  /** The interface has no method with the requested name */
  NO_SUCH_METHOD: "no_such_method",
  /** Actual argument count differs from the method's input arity */
  ARITY_MISMATCH: "arity_mismatch",
  /** An actual argument could not be encoded against its formal signature */
  PARAMETER_TYPE_MISMATCH: "parameter_type_mismatch",
  /** The transport reported a failed remote call */
  REMOTE_CALL_FAILED: "remote_call_failed",
  /** A reply could not be converted to a host value */
  INTERNAL_DECODE_ERROR: "internal_decode_error",
  /** A type signature uses a form the grammar does not know */
  UNSUPPORTED_SIGNATURE: "unsupported_signature",
  /** An operand of a bridge operation has the wrong host type */
  WRONG_ARGUMENT_TYPE: "wrong_argument_type",
} as const;

export type BridgeErrorCode = (typeof BridgeErrorCode)[keyof typeof BridgeErrorCode];

/** Where a proxy was meant to point. */
export interface ProxyTarget {
  service: string;
  objectPath: string;
  interfaceName: string;
}

export interface BridgeErrorDetails {
  /** Exposed name of the operation that failed */
  operation?: string;
  /** Zero-based position of the offending argument */
  position?: number;
  /** Number of arguments the operation takes */
  arity?: number;
  /** Human-readable description of what was expected */
  expected?: string;
  /** Number of arguments actually supplied */
  received?: number;
  signature?: string;
  method?: string;
  cause?: unknown;
}

/**
 * A failure reported by the bridge.
 *
 * The optional fields are filled in according to the code: type and arity
 * errors carry `position`, `arity` and `expected`; lookup errors carry `method`.
 */
export class BridgeError extends Error {
  readonly code: BridgeErrorCode;
  readonly operation: string | null;
  readonly position: number | null;
  readonly arity: number | null;
  readonly expected: string | null;
  readonly received: number | null;
  readonly signature: string | null;
  readonly method: string | null;

  constructor(code: BridgeErrorCode, message: string, details: BridgeErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "BridgeError";
    this.code = code;
    this.operation = details.operation ?? null;
    this.position = details.position ?? null;
    this.arity = details.arity ?? null;
    this.expected = details.expected ?? null;
    this.received = details.received ?? null;
    this.signature = details.signature ?? null;
    this.method = details.method ?? null;
  }

  static connectFailure(operation: string, target: ProxyTarget, cause: unknown): BridgeError {
    const reason = errorMessage(cause);
    const where = `${target.service} ${target.objectPath} (${target.interfaceName})`;
    const message = reason
      ? `${operation}: could not connect to ${where} because ${reason}`
      : `${operation}: could not connect to ${where} for an unknown reason`;
    return new BridgeError(BridgeErrorCode.CONNECT_FAILURE, message, { operation, cause });
  }

  static introspectFailure(operation: string, target: ProxyTarget, cause: unknown): BridgeError {
    const reason = errorMessage(cause);
    const where = `${target.service} ${target.objectPath}`;
    const message = reason
      ? `${operation}: could not introspect ${where} because ${reason}`
      : `${operation}: could not introspect ${where}`;
    return new BridgeError(BridgeErrorCode.INTROSPECT_FAILURE, message, { operation, cause });
  }

  static interfaceNotFound(operation: string, target: ProxyTarget): BridgeError {
    return new BridgeError(
      BridgeErrorCode.INTERFACE_NOT_FOUND,
      `${operation}: ${target.service} ${target.objectPath} has no interface ${target.interfaceName}`,
      { operation },
    );
  }

  static invalidHandle(operation: string): BridgeError {
    return new BridgeError(
      BridgeErrorCode.INVALID_HANDLE,
      `${operation}: could not obtain a live proxy handle`,
      { operation, position: 0, expected: "proxy handle" },
    );
  }

  static noSuchMethod(operation: string, method: string): BridgeError {
    return new BridgeError(BridgeErrorCode.NO_SUCH_METHOD, `${operation}: no such method: ${method}`, {
      operation,
      method,
    });
  }

  static arityMismatch(operation: string, expected: number, received: number): BridgeError {
    return new BridgeError(
      BridgeErrorCode.ARITY_MISMATCH,
      `${operation} expected ${expected} params, received ${received}`,
      { operation, arity: expected, received },
    );
  }

  static parameterTypeMismatch(
    operation: string,
    position: number,
    arity: number,
    expected: string,
    signature: string,
  ): BridgeError {
    return new BridgeError(
      BridgeErrorCode.PARAMETER_TYPE_MISMATCH,
      `${operation}: expected ${expected} for parameter ${position} of ${arity}`,
      { operation, position, arity, expected, signature },
    );
  }

  static remoteCallFailed(operation: string, cause: unknown): BridgeError {
    const reason = errorMessage(cause);
    const message = reason
      ? `${operation}: call failed because ${reason}`
      : `${operation}: call failed for unknown reason`;
    return new BridgeError(BridgeErrorCode.REMOTE_CALL_FAILED, message, { operation, cause });
  }

  static internalDecodeError(operation: string, method: string, reason: string): BridgeError {
    return new BridgeError(
      BridgeErrorCode.INTERNAL_DECODE_ERROR,
      `${operation}: could not convert return values (${reason})`,
      { operation, method },
    );
  }

  static unsupportedSignature(signature: string, detail: string): BridgeError {
    return new BridgeError(
      BridgeErrorCode.UNSUPPORTED_SIGNATURE,
      `unsupported type signature "${signature}": ${detail}`,
      { signature },
    );
  }

  static wrongArgumentType(
    operation: string,
    position: number,
    arity: number,
    expected: string,
  ): BridgeError {
    return new BridgeError(
      BridgeErrorCode.WRONG_ARGUMENT_TYPE,
      `${operation}: expected ${expected} for argument ${position} of ${arity}`,
      { operation, position, arity, expected },
    );
  }
}

/** The message carried by a thrown value, or null when it carries none. */
export function errorMessage(cause: unknown): string | null {
  if (cause instanceof Error) {
    return cause.message === "" ? null : cause.message;
  }
  if (typeof cause === "string" && cause !== "") {
    return cause;
  }
  return null;
}
