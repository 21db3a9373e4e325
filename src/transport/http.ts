import { timingSafeEqual } from "node:crypto";
import debug from "debug";
import { Hono, type Context } from "hono";
import { streamSSE, type SSEStreamingApi } from "hono/streaming";
import { serve, type ServerType } from "@hono/node-server";
import { ErrorCode, JSONRPCMessageSchema, type JSONRPCMessage } from "@modelcontextprotocol/sdk/types.js";
import type { Session } from "../protocol/session.js";
import type { SessionRegistry } from "../protocol/session-registry.js";

const log = debug("couch-notes:http");

export const SESSION_HEADER = "Mcp-Session-Id";
export const STREAMABLE_PATH = "/mcp";

export interface HttpAppOptions {
  registry: SessionRegistry;
  /** When set, every route requires `Authorization: Bearer <apiKey>`. */
  apiKey?: string;
}

export function verifyBearer(authHeader: string | undefined, expected: string): boolean {
  if (!authHeader?.startsWith("Bearer ")) return false;
  const provided = Buffer.from(authHeader.slice(7));
  const wanted = Buffer.from(expected);
  return provided.length === wanted.length && timingSafeEqual(provided, wanted);
}

function rpcError(code: number, message: string) {
  return { jsonrpc: "2.0", id: null, error: { code, message } };
}

type ParsedBody = { ok: true; message: JSONRPCMessage } | { ok: false; status: 400; body: ReturnType<typeof rpcError> };

async function readMessage(c: Context): Promise<ParsedBody> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch {
    return { ok: false, status: 400, body: rpcError(ErrorCode.ParseError, "Parse error: body is not valid JSON") };
  }
  const parsed = JSONRPCMessageSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, status: 400, body: rpcError(ErrorCode.InvalidRequest, "Invalid Request: not a JSON-RPC message") };
  }
  return { ok: true, message: parsed.data };
}

/** Writes the session's outbound messages as SSE events until the session closes or the client goes away. */
async function drainOutbound(session: Session, stream: SSEStreamingApi, signal: AbortSignal, event?: string): Promise<void> {
  for (;;) {
    const message = await session.outbound.next(signal);
    if (message === undefined) return;
    await stream.writeSSE(event ? { event, data: JSON.stringify(message) } : { data: JSON.stringify(message) });
  }
}

/**
 * Streamable HTTP on `/mcp` (POST in, GET out, DELETE to end) and the
 * older `GET /sse` + `POST /messages` pair. Both feed the same sessions.
 */
export function createHttpApp(options: HttpAppOptions): Hono {
  const { registry, apiKey } = options;
  const app = new Hono();

  if (apiKey) {
    app.use("*", async (c, next) => {
      if (!verifyBearer(c.req.header("Authorization"), apiKey)) {
        return c.json({ error: "Unauthorized" }, 401);
      }
      await next();
    });
  }

  app.post(STREAMABLE_PATH, async (c) => {
    const requestedId = c.req.header(SESSION_HEADER);
    let session: Session | undefined;
    if (requestedId) {
      session = registry.get(requestedId);
      if (!session) return c.json(rpcError(ErrorCode.InvalidRequest, "Unknown session"), 404);
    }

    const body = await readMessage(c);
    if (!body.ok) return c.json(body.body, body.status);
    session ??= registry.create();

    const { message } = body;
    if ("method" in message && "id" in message && message.method === "ping") {
      // Liveness checks skip the dispatch queue.
      session.outbound.push({ jsonrpc: "2.0", id: message.id, result: {} });
    } else {
      session.inbound.push(message);
    }
    return c.body(null, 202, { [SESSION_HEADER]: session.id });
  });

  app.get(STREAMABLE_PATH, (c) => {
    const id = c.req.header(SESSION_HEADER);
    if (!id) return c.json(rpcError(ErrorCode.InvalidRequest, `Missing ${SESSION_HEADER} header`), 400);
    const session = registry.get(id);
    if (!session) return c.json(rpcError(ErrorCode.InvalidRequest, "Unknown session"), 404);
    if (session.outbound.hasConsumer) {
      return c.json(rpcError(ErrorCode.InvalidRequest, "Session already has an open stream"), 409);
    }

    c.header(SESSION_HEADER, session.id);
    return streamSSE(c, async (stream) => {
      const controller = new AbortController();
      stream.onAbort(() => controller.abort());
      log("stream opened for session %s", session.id);
      // Dropping the stream leaves the session open for a later GET.
      await drainOutbound(session, stream, controller.signal);
      log("stream ended for session %s", session.id);
    });
  });

  app.delete(STREAMABLE_PATH, (c) => {
    const id = c.req.header(SESSION_HEADER);
    if (!id) return c.json(rpcError(ErrorCode.InvalidRequest, `Missing ${SESSION_HEADER} header`), 400);
    if (!registry.delete(id)) return c.json(rpcError(ErrorCode.InvalidRequest, "Unknown session"), 404);
    return c.body(null, 204);
  });

  app.get("/sse", (c) => {
    const session = registry.create();
    return streamSSE(c, async (stream) => {
      const controller = new AbortController();
      stream.onAbort(() => {
        controller.abort();
        registry.delete(session.id);
      });
      await stream.writeSSE({ event: "endpoint", data: `/messages?sessionId=${session.id}` });
      await drainOutbound(session, stream, controller.signal, "message");
    });
  });

  app.post("/messages", async (c) => {
    const id = c.req.query("sessionId");
    if (!id) return c.json(rpcError(ErrorCode.InvalidRequest, "Missing sessionId"), 400);
    const session = registry.get(id);
    if (!session) return c.json(rpcError(ErrorCode.InvalidRequest, "Unknown session"), 404);

    const body = await readMessage(c);
    if (!body.ok) return c.json(body.body, body.status);
    session.inbound.push(body.message);
    return c.text("Accepted", 202);
  });

  return app;
}

export function serveHttp(app: Hono, host: string, port: number): ServerType {
  return serve({ fetch: app.fetch, hostname: host, port }, (info) => {
    console.error(`[couch-notes] HTTP transport listening on http://${info.address}:${info.port}`);
  });
}
