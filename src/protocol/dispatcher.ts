import debug from "debug";
import { ErrorCode, McpError, type RequestId, type Result } from "@modelcontextprotocol/sdk/types.js";
import {
  CursorError,
  InvalidParameterError,
  LimitError,
  PROTOCOL_VERSION_MISMATCH,
  ProtocolVersionMismatchError,
  RATE_LIMIT_EXCEEDED,
  RESOURCE_NOT_FOUND,
  RateLimitExceededError,
  ResourceNotFoundError,
  SessionSequenceError,
} from "../errors.js";
import type { RateLimiter } from "./rate-limiter.js";

const log = debug("couch-notes:protocol");

export type RequestParams = Record<string, unknown>;

export interface RequestContext {
  sessionId: string;
  requestId: RequestId;
}

export type MethodHandler = (params: RequestParams, context: RequestContext) => Promise<Result>;

export interface JsonRpcErrorBody {
  code: number;
  message: string;
  data?: unknown;
}

interface MethodEntry {
  handler: MethodHandler;
  rateLimited: boolean;
}

/**
 * Method table shared by every session. Each rate-limited method draws from
 * its own bucket, keyed by method name.
 */
export class Dispatcher {
  private readonly methods = new Map<string, MethodEntry>();

  constructor(private readonly rateLimiter?: RateLimiter) {}

  register(method: string, handler: MethodHandler, options: { rateLimited?: boolean } = {}): void {
    if (this.methods.has(method)) throw new Error(`Method already registered: ${method}`);
    this.methods.set(method, { handler, rateLimited: options.rateLimited ?? true });
  }

  has(method: string): boolean {
    return this.methods.has(method);
  }

  methodNames(): string[] {
    return [...this.methods.keys()].sort();
  }

  async dispatch(method: string, params: RequestParams, context: RequestContext): Promise<Result> {
    const entry = this.methods.get(method);
    if (!entry) throw new McpError(ErrorCode.MethodNotFound, `Method not found: ${method}`);

    if (entry.rateLimited && this.rateLimiter && !this.rateLimiter.isAllowed(method)) {
      log("rate limit hit for %s (session %s)", method, context.sessionId);
      throw new RateLimitExceededError(method);
    }
    return entry.handler(params, context);
  }
}

/** The one place where thrown errors become JSON-RPC error objects. */
export function toJsonRpcError(err: unknown): JsonRpcErrorBody {
  if (err instanceof McpError) {
    return err.data === undefined
      ? { code: err.code, message: err.message }
      : { code: err.code, message: err.message, data: err.data };
  }
  if (err instanceof ProtocolVersionMismatchError) {
    return {
      code: PROTOCOL_VERSION_MISMATCH,
      message: err.message,
      data: { requested: err.requested, supported: [...err.supported] },
    };
  }
  if (err instanceof ResourceNotFoundError) {
    return { code: RESOURCE_NOT_FOUND, message: err.message, data: { uri: err.uri } };
  }
  if (err instanceof RateLimitExceededError) {
    return { code: RATE_LIMIT_EXCEEDED, message: err.message };
  }
  if (err instanceof CursorError || err instanceof LimitError || err instanceof InvalidParameterError) {
    return { code: ErrorCode.InvalidParams, message: err.message };
  }
  if (err instanceof SessionSequenceError) {
    return { code: ErrorCode.InvalidRequest, message: err.message };
  }

  const detail = err instanceof Error ? err.message : String(err);
  console.error(`[couch-notes] internal error: ${detail}`);
  return { code: ErrorCode.InternalError, message: `Internal error: ${detail}` };
}
