// Debug logging.
//
// Provides call logging with timing information, plus namespaced debug
// loggers for the rest of the bridge. Output is controlled by the DEBUG
// environment variable, matched the way npm's debug package matches it.

import { BridgeError, formatWireValue } from "@busline/wire";
import type { CallMiddleware, CallContext, CallRequest, CallOutcome } from "./middleware.ts";

const START_TIME = Symbol("logging:start-time");

export interface LoggingOptions {
  /**
   * Namespace for debug matching. Defaults to "busline:call".
   * Logging is enabled when DEBUG matches this namespace.
   * Supports patterns like "busline:*" or "*".
   */
  namespace?: string;

  /**
   * Log encoded call arguments. Defaults to true.
   */
  logArgs?: boolean;

  /**
   * Log decoded results. Defaults to true.
   */
  logResults?: boolean;

  /**
   * Minimum duration (ms) to log. Calls faster than this are skipped.
   * Defaults to 0 (log all calls).
   */
  minDuration?: number;
}

/**
 * Check if a namespace is enabled by the DEBUG pattern list.
 * Supports wildcards (*) and exclusions (-prefix).
 */
export function isEnabled(namespace: string, debug: string | undefined = process.env.DEBUG): boolean {
  if (!debug) return false;

  const patterns = debug.split(/[\s,]+/).filter(Boolean);
  let enabled = false;

  for (const pattern of patterns) {
    if (pattern.startsWith("-")) {
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }

  return enabled;
}

/**
 * Match a namespace against a pattern with wildcard support.
 */
function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+?^${}()|[\]\\]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

export type DebugLogger = (message: string, data?: Record<string, unknown>) => void;

/**
 * Create a logger that writes to the console when its namespace is enabled.
 *
 * The DEBUG variable is read on every call, so it can be changed at runtime.
 */
export function createDebugLogger(namespace: string): DebugLogger {
  return (message, data) => {
    if (!isEnabled(namespace)) return;
    if (data === undefined) {
      console.log(`${namespace} ${message}`);
    } else {
      console.log(`${namespace} ${message}`, data);
    }
  };
}

/**
 * Create a logging middleware that logs every call with timing information.
 *
 * To enable it:
 * ```sh
 * DEBUG='busline:*' node app.js   # all bridge logging
 * DEBUG='busline:call' node app.js  # calls only
 * ```
 *
 * Logs structured objects to the console:
 * - Request: { type: "request", method, target, args? }
 * - Response: { type: "response", method, duration, result?, error? }
 */
export function loggingMiddleware(options: LoggingOptions = {}): CallMiddleware {
  const namespace = options.namespace ?? "busline:call";
  const logArgs = options.logArgs ?? true;
  const logResults = options.logResults ?? true;
  const minDuration = options.minDuration ?? 0;

  return {
    pre(ctx: CallContext, request: CallRequest): void {
      ctx.extensions.set(START_TIME, performance.now());

      if (!isEnabled(namespace)) return;

      const logObj: Record<string, unknown> = {
        type: "request",
        method: request.method,
        target: `${request.service} ${request.objectPath} ${request.interfaceName}`,
      };

      if (logArgs && request.args.elements.length > 0) {
        logObj.args = formatWireValue(request.args);
      }

      console.log(`→ ${request.exposedName}`, logObj);
    },

    post(ctx: CallContext, request: CallRequest, outcome: CallOutcome): void {
      const startTime = ctx.extensions.get<number>(START_TIME);
      if (startTime === undefined) return;

      const duration = performance.now() - startTime;
      if (duration < minDuration) return;

      if (!isEnabled(namespace)) return;

      const logObj: Record<string, unknown> = {
        type: "response",
        method: request.method,
        duration: `${duration.toFixed(2)}ms`,
      };

      if (outcome.ok) {
        logObj.ok = true;
        if (logResults && outcome.value !== undefined) {
          logObj.result = outcome.value;
        }
        console.log(`← ${request.exposedName}: ✓ ${duration.toFixed(2)}ms`, logObj);
        return;
      }

      logObj.ok = false;
      const error = outcome.error;
      if (error instanceof BridgeError) {
        logObj.errorCode = error.code;
      }
      logObj.error = { name: error.name, message: error.message };
      console.log(`← ${request.exposedName}: ✗ ${duration.toFixed(2)}ms`, logObj);
    },
  };
}
