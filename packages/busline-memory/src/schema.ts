// Introspection document schema.
//
// MemoryBus describes an object as JSON; parseIntrospection checks the
// document against these schemas before the bridge reads it.

import { z } from "zod";
import type { NodeMetadata } from "@busline/core";

/**
 * A type signature as the object declares it. Signatures the grammar does not
 * support are kept; the bridge rejects them when a call uses them.
 */
export const SignatureSchema = z.string();

export const ArgSchema = z.object({
  name: z.string(),
  signature: SignatureSchema,
});

export const AnnotationSchema = z.object({
  name: z.string().min(1),
  value: z.string(),
});

export const MethodSchema = z.object({
  name: z.string().min(1),
  inArgs: z.array(ArgSchema),
  outArgs: z.array(ArgSchema),
  annotations: z.array(AnnotationSchema),
});

export const InterfaceSchema = z.object({
  name: z.string().min(1),
  methods: z.array(MethodSchema),
});

export const NodeSchema = z.object({
  interfaces: z.array(InterfaceSchema),
  /** Child node names, relative to the node */
  nodes: z.array(z.string().regex(/^[A-Za-z0-9_]+$/, "Invalid child node name")),
});

export type IntrospectionDocument = z.infer<typeof NodeSchema>;

/**
 * Parse and validate an introspection document.
 *
 * Throws a SyntaxError for malformed JSON and a ZodError for a document of
 * the wrong shape.
 */
export function parseIntrospectionDocument(raw: string): NodeMetadata {
  const json: unknown = JSON.parse(raw);
  return NodeSchema.parse(json);
}
