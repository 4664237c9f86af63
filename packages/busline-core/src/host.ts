// Host runtime abstraction.
//
// The bridge never inspects host values directly. A HostRuntime answers the
// few questions the marshaler asks ("is this an integer?", "is this a proper
// list?") and builds the values it returns.

/** A value owned by the host runtime. Opaque to the bridge. */
export type HostValue = unknown;

/**
 * Numeric classification of a host value.
 *
 * `value` is the number as a double; rationals arrive already divided.
 */
export interface HostNumber {
  kind: "integer" | "double" | "rational";
  value: number;
}

/** How many arguments a host procedure takes; `max` absent means variadic. */
export interface ProcedureArity {
  min: number;
  max?: number;
}

/** A procedure the bridge installs into the host. */
export type HostProcedure = (...args: HostValue[]) => Promise<HostValue>;

export interface HostRuntime {
  /** Name of the host, for diagnostics. */
  readonly name: string;

  /** The host's "no useful value" marker. */
  readonly voidValue: HostValue;

  // Predicates. Each returns undefined when the value is not of that kind.

  toNumber(value: HostValue): HostNumber | undefined;

  /**
   * Text of a character string, a byte string or a symbol's name.
   */
  toText(value: HostValue): string | undefined;

  /** Contents of a byte string. */
  toBytes(value: HostValue): Uint8Array | undefined;

  toBoolean(value: HostValue): boolean | undefined;

  /** Elements of a proper list; undefined for anything else. */
  listItems(value: HostValue): readonly HostValue[] | undefined;

  /** Elements of a vector; undefined for anything else. */
  vectorItems(value: HostValue): readonly HostValue[] | undefined;

  // Constructors.

  fromInteger(value: number): HostValue;
  fromDouble(value: number): HostValue;
  fromString(value: string): HostValue;
  fromBytes(value: Uint8Array): HostValue;

  /** Build an ordered list holding `items` left to right. */
  makeList(items: readonly HostValue[]): HostValue;

  /** Build an index-addressable vector holding `items`. */
  makeVector(items: readonly HostValue[]): HostValue;

  /** Install a procedure into the host's global namespace. */
  define(name: string, procedure: HostProcedure, arity: ProcedureArity): void;
}
