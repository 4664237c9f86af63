// In-process bus transport for @busline/core.

export {
  MemoryBus,
  MemoryBusError,
  MemoryBusErrorName,
  type MethodHandler,
  type MethodDefinition,
  type InterfaceDefinition,
} from "./bus.ts";

export {
  NodeSchema,
  InterfaceSchema,
  MethodSchema,
  ArgSchema,
  AnnotationSchema,
  SignatureSchema,
  parseIntrospectionDocument,
  type IntrospectionDocument,
} from "./schema.ts";
