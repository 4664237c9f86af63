// Bus bridge core: host values, marshaling, remote handles, call dispatch
// and dynamic bindings.

// ============================================================================
// Host Runtime
// ============================================================================

export type {
  HostValue,
  HostNumber,
  HostProcedure,
  HostRuntime,
  ProcedureArity,
} from "./host.ts";

export { JsHost, type DefinedProcedure } from "./js_host.ts";

// ============================================================================
// Marshaling
// ============================================================================

export {
  encodeValue,
  encodeArguments,
  decodeValue,
  decodeResult,
  type EncodeResult,
  type EncodeArgumentsResult,
  type DecodeResult,
} from "./marshal.ts";

// ============================================================================
// Transport & Metadata
// ============================================================================

export {
  BUS_SERVICE,
  BUS_PATH,
  BUS_INTERFACE,
  INTROSPECTABLE_INTERFACE,
  type BusKind,
  type BusTransport,
  type TransportProxy,
} from "./transport.ts";

export {
  findInterface,
  buildMethodIndex,
  describeMethod,
  childPath,
  type ArgMetadata,
  type AnnotationMetadata,
  type MethodMetadata,
  type InterfaceMetadata,
  type NodeMetadata,
  type MethodInfo,
} from "./metadata.ts";

// ============================================================================
// Handles, Calls & Bindings
// ============================================================================

export {
  RemoteHandle,
  isRemoteHandle,
  requireHandle,
  releaseHandle,
  type OpenHandleOptions,
} from "./handle.ts";

export { CallKernel } from "./kernel.ts";

export {
  createBinding,
  importMethods,
  exposedMethodName,
  wireMethodName,
  type Binding,
} from "./binding.ts";

// ============================================================================
// Middleware & Logging
// ============================================================================

export {
  Extensions,
  RejectionError,
  type CallContext,
  type CallRequest,
  type CallOutcome,
  type CallMiddleware,
  type Rejection,
  type RejectionCode,
} from "./middleware.ts";

export {
  isEnabled,
  createDebugLogger,
  loggingMiddleware,
  type DebugLogger,
  type LoggingOptions,
} from "./logging.ts";

// ============================================================================
// Bridge
// ============================================================================

export {
  resolveBridgeOptions,
  bridgeOptionsFromEnv,
  type BridgeOptions,
  type ResolvedBridgeOptions,
} from "./config.ts";

export { Bridge } from "./bridge.ts";
