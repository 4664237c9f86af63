// Introspection metadata.
//
// The transport parses its introspection format into these shapes; the
// bridge only reads them.

export interface ArgMetadata {
  readonly name: string;
  readonly signature: string;
}

export interface AnnotationMetadata {
  readonly name: string;
  readonly value: string;
}

export interface MethodMetadata {
  readonly name: string;
  readonly inArgs: readonly ArgMetadata[];
  readonly outArgs: readonly ArgMetadata[];
  readonly annotations: readonly AnnotationMetadata[];
}

export interface InterfaceMetadata {
  name: string;
  methods: MethodMetadata[];
}

/** One introspected object: its interfaces and the names of its children. */
export interface NodeMetadata {
  interfaces: InterfaceMetadata[];
  /** Child node names, relative to this node. */
  nodes: string[];
}

/** What methodInfo reports about a method. */
export interface MethodInfo {
  name: string;
  inputs: Array<[name: string, signature: string]>;
  outputs: Array<[name: string, signature: string]>;
  annotations: string[];
}

export function findInterface(node: NodeMetadata, name: string): InterfaceMetadata | undefined {
  return node.interfaces.find((iface) => iface.name === name);
}

/**
 * Index an interface's methods by name. The index holds frozen copies, so
 * later changes to `iface` do not reach it.
 */
export function buildMethodIndex(iface: InterfaceMetadata): Map<string, MethodMetadata> {
  const index = new Map<string, MethodMetadata>();
  for (const method of iface.methods) {
    index.set(method.name, freezeMethod(method));
  }
  return index;
}

function freezeMethod(method: MethodMetadata): MethodMetadata {
  return Object.freeze({
    name: method.name,
    inArgs: Object.freeze(method.inArgs.map((arg) => Object.freeze({ ...arg }))),
    outArgs: Object.freeze(method.outArgs.map((arg) => Object.freeze({ ...arg }))),
    annotations: Object.freeze(method.annotations.map((annotation) => Object.freeze({ ...annotation }))),
  });
}

export function describeMethod(method: MethodMetadata): MethodInfo {
  return {
    name: method.name,
    inputs: method.inArgs.map((arg) => [arg.name, arg.signature]),
    outputs: method.outArgs.map((arg) => [arg.name, arg.signature]),
    annotations: method.annotations.map((annotation) => annotation.value),
  };
}

/** Join a parent object path and a child node name. */
export function childPath(parent: string, child: string): string {
  return parent.endsWith("/") ? `${parent}${child}` : `${parent}/${child}`;
}
