// Dynamic bindings: one host procedure per remote method.

import type { HostValue } from "./host.ts";
import type { RemoteHandle } from "./handle.ts";
import type { CallKernel } from "./kernel.ts";

/**
 * A procedure bound to one method of one handle.
 *
 * Its `name` is the exposed name and its `length` the method's input count.
 * The handle is checked on every invocation, so a binding outliving its
 * handle fails with INVALID_HANDLE.
 */
export interface Binding {
  (...args: HostValue[]): Promise<HostValue>;
  readonly wireName: string;
  readonly exposedName: string;
  readonly arity: number;
}

/** The name a method is installed under. */
export function exposedMethodName(prefix: string, name: string, renameDashes: boolean): string {
  const exposed = `${prefix}${name}`;
  return renameDashes ? exposed.replace(/_/g, "-") : exposed;
}

/** Map a host-style method name back to the wire name: dashes become underscores. */
export function wireMethodName(name: string): string {
  return name.replace(/-/g, "_");
}

export function createBinding(
  kernel: CallKernel,
  handle: RemoteHandle,
  wireName: string,
  exposedName: string,
  arity: number,
): Binding {
  const call = (...args: HostValue[]): Promise<HostValue> =>
    kernel.invoke(handle, wireName, exposedName, args);
  Object.defineProperty(call, "name", { value: exposedName });
  Object.defineProperty(call, "length", { value: arity });
  return Object.assign(call, { wireName, exposedName, arity });
}

/**
 * Create a binding for every method of `handle` and define each in the
 * kernel's host under `prefix` + method name.
 *
 * @returns The bindings, in introspection order
 */
export function importMethods(
  kernel: CallKernel,
  handle: RemoteHandle,
  prefix: string,
  renameDashes: boolean,
): Binding[] {
  const bindings: Binding[] = [];
  for (const name of handle.methodNames()) {
    const method = handle.lookupMethod(name);
    if (method === undefined) continue;

    const arity = method.inArgs.length;
    const binding = createBinding(
      kernel,
      handle,
      name,
      exposedMethodName(prefix, name, renameDashes),
      arity,
    );
    kernel.host.define(binding.exposedName, binding, { min: arity, max: arity });
    bindings.push(binding);
  }
  return bindings;
}
