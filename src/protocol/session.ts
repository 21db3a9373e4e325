import debug from "debug";
import { z } from "zod";
import {
  ErrorCode,
  McpError,
  type Implementation,
  type InitializeResult,
  type JSONRPCMessage,
  type JSONRPCRequest,
  type RequestId,
  type Result,
} from "@modelcontextprotocol/sdk/types.js";
import { InvalidParameterError, ProtocolVersionMismatchError, SessionSequenceError } from "../errors.js";
import { AsyncQueue } from "./async-queue.js";
import { toJsonRpcError, type Dispatcher, type JsonRpcErrorBody } from "./dispatcher.js";
import type { VersionPolicy } from "./version-policy.js";

const log = debug("couch-notes:protocol");

export type SessionState = "new" | "initializing" | "initialized" | "closed";

export interface SessionOptions {
  id: string;
  dispatcher: Dispatcher;
  versionPolicy: VersionPolicy;
  serverInfo: Implementation;
  instructions?: string;
}

const initializeParamsSchema = z.object({
  protocolVersion: z.string(),
  capabilities: z.record(z.string(), z.unknown()).optional(),
  clientInfo: z.object({ name: z.string(), version: z.string() }).optional(),
});

function success(id: RequestId, result: Result): JSONRPCMessage {
  return { jsonrpc: "2.0", id, result };
}

function failure(id: RequestId, error: JsonRpcErrorBody): JSONRPCMessage {
  return { jsonrpc: "2.0", id, error };
}

/**
 * One client conversation. Transports feed `inbound` and drain `outbound`;
 * the dispatch loop started by `start()` handles one request at a time.
 */
export class Session {
  readonly id: string;
  readonly inbound = new AsyncQueue<JSONRPCMessage>();
  readonly outbound = new AsyncQueue<JSONRPCMessage>();
  clientInfo: Implementation | undefined;

  private currentState: SessionState = "new";
  private loop: Promise<void> | undefined;
  private readonly closeListeners: Array<() => void> = [];

  constructor(private readonly options: SessionOptions) {
    this.id = options.id;
  }

  get state(): SessionState {
    return this.currentState;
  }

  get closed(): boolean {
    return this.currentState === "closed";
  }

  onClose(listener: () => void): void {
    this.closeListeners.push(listener);
  }

  /** Starts the dispatch loop; resolves when the session closes. */
  start(): Promise<void> {
    this.loop ??= this.run();
    return this.loop;
  }

  close(): void {
    if (this.currentState === "closed") return;
    this.currentState = "closed";
    this.inbound.close();
    this.outbound.close();
    log("session %s closed", this.id);
    for (const listener of this.closeListeners.splice(0)) listener();
  }

  /** Answer one message. Notifications and client responses yield `undefined`. */
  async handle(message: JSONRPCMessage): Promise<JSONRPCMessage | undefined> {
    if (!("method" in message)) {
      log("session %s: ignoring client response to %s", this.id, String(message.id));
      return undefined;
    }
    if (!("id" in message)) {
      log("session %s: notification %s", this.id, message.method);
      return undefined;
    }
    if (this.currentState === "closed") {
      return failure(message.id, { code: ErrorCode.ConnectionClosed, message: "Session is closed" });
    }

    try {
      return success(message.id, await this.route(message));
    } catch (err) {
      return failure(message.id, toJsonRpcError(err));
    }
  }

  private async run(): Promise<void> {
    for (;;) {
      const message = await this.inbound.next();
      if (message === undefined) break;
      const response = await this.handle(message);
      // A session closed mid-request drops the late result.
      if (response && !this.outbound.push(response)) {
        log("session %s: dropped result after close", this.id);
      }
    }
  }

  private async route(request: JSONRPCRequest): Promise<Result> {
    const params = request.params ?? {};
    switch (request.method) {
      case "initialize":
        return this.initialize(params);
      case "ping":
        return {};
    }
    if (this.currentState !== "initialized") throw new SessionSequenceError(request.method);
    return this.options.dispatcher.dispatch(request.method, params, { sessionId: this.id, requestId: request.id });
  }

  private initialize(params: Record<string, unknown>): InitializeResult {
    if (this.currentState !== "new") {
      throw new McpError(ErrorCode.InvalidRequest, "Session is already initialized");
    }
    const parsed = initializeParamsSchema.safeParse(params);
    if (!parsed.success) throw new InvalidParameterError("initialize requires a string protocolVersion");

    this.currentState = "initializing";
    const { versionPolicy, serverInfo, instructions } = this.options;
    const requested = parsed.data.protocolVersion;
    const negotiated = versionPolicy.negotiate(requested);
    if (negotiated === undefined) {
      this.currentState = "new";
      throw new ProtocolVersionMismatchError(requested, versionPolicy.supported);
    }

    this.currentState = "initialized";
    this.clientInfo = parsed.data.clientInfo;
    log("session %s initialized with protocol %s", this.id, negotiated);

    const result: InitializeResult = {
      protocolVersion: negotiated,
      capabilities: { resources: {}, tools: {} },
      serverInfo,
    };
    if (instructions) result.instructions = instructions;
    return result;
  }
}
