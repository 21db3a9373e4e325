import { z } from "zod";
import type {
  CallToolResult,
  Implementation,
  ListResourcesResult,
  ListToolsResult,
  ReadResourceResult,
  Resource,
} from "@modelcontextprotocol/sdk/types.js";
import type { AppConfig } from "./config.js";
import { InvalidParameterError, ResourceNotFoundError } from "./errors.js";
import { Dispatcher, type RequestParams } from "./protocol/dispatcher.js";
import { cursorSkip, encodeCursor, paginate, validateLimit } from "./protocol/pagination.js";
import { RateLimiter } from "./protocol/rate-limiter.js";
import { Session } from "./protocol/session.js";
import { versionPolicyFor, type VersionPolicy } from "./protocol/version-policy.js";
import { CouchStore, type FetchLike } from "./store/couch-store.js";
import { registerFindNotesTool } from "./tools/find-notes-tool.js";
import { registerPingTool } from "./tools/ping-tool.js";
import { ToolRegistry } from "./tools/registry.js";
import { registerSummarizeTool } from "./tools/summarize-tool.js";
import { ContentReconstructor } from "./vault/content.js";
import { NoteProcessor } from "./vault/notes.js";
import { NoteSearch } from "./vault/search.js";
import { NoteUri } from "./vault/uri.js";

export const SERVER_INFO: Implementation = { name: "couch-notes-mcp", version: "0.1.0" };

export const RESOURCES_PAGE_SIZE = 10;
export const TOOLS_PAGE_SIZE = 20;

const INSTRUCTIONS =
  "Read-only access to a CouchDB-synced note vault. Use find_notes to search or browse, " +
  "resources/read with a note URI for full content, and summarise_note for a short preview.";

const listParamsSchema = z.object({
  cursor: z.string().optional(),
  limit: z.unknown().optional(),
});
const readParamsSchema = z.object({ uri: z.string() });
const callParamsSchema = z.object({
  name: z.string(),
  arguments: z.record(z.string(), z.unknown()).optional(),
});

function parseParams<S extends z.ZodType>(schema: S, params: RequestParams, method: string): z.output<S> {
  const parsed = schema.safeParse(params);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new InvalidParameterError(`Invalid params for ${method}: ${detail}`);
  }
  return parsed.data;
}

export interface VaultServerOptions {
  fetch?: FetchLike;
  /** Clock shared by the rate limiter and date filters. */
  now?: () => number;
}

/**
 * Composition root: one store, one vault pipeline, one tool catalog and
 * one method table, shared by every session on every transport.
 */
export class VaultMcpServer {
  readonly store: CouchStore;
  readonly content: ContentReconstructor;
  readonly notes: NoteProcessor;
  readonly search: NoteSearch;
  readonly uris: NoteUri;
  readonly tools = new ToolRegistry();
  readonly dispatcher: Dispatcher;
  readonly versionPolicy: VersionPolicy;

  constructor(config: AppConfig, options: VaultServerOptions = {}) {
    const { couch, vault, scan } = config;
    this.store = new CouchStore({
      baseUrl: couch.url,
      database: couch.database,
      user: couch.user,
      password: couch.password,
      requestTimeoutMs: couch.requestTimeoutMs,
      scanLimit: scan.searchScanLimit,
      scanBatchSize: scan.batchSize,
      fetch: options.fetch,
    });
    this.content = new ContentReconstructor(this.store, {
      passphrase: vault.passphrase,
      usePathObfuscation: vault.usePathObfuscation,
      pathScanLimit: scan.pathScanLimit,
    });
    this.notes = new NoteProcessor(this.content);
    this.search = new NoteSearch(this.store, this.notes, {
      usePathObfuscation: vault.usePathObfuscation,
      encrypted: vault.passphrase !== undefined,
      scanLimit: scan.searchScanLimit,
      pageFactor: scan.searchPageFactor,
      batchSize: scan.batchSize,
    });
    this.uris = new NoteUri(vault.uriScheme, vault.vaultId);
    this.versionPolicy = versionPolicyFor(config.protocolVersionPolicy);
    this.dispatcher = new Dispatcher(new RateLimiter({ ...config.rateLimit, now: options.now }));

    registerPingTool(this.tools);
    registerFindNotesTool(this.tools, {
      search: this.search,
      notes: this.notes,
      uris: this.uris,
      browseOverfetch: scan.browseOverfetch,
      now: options.now,
    });
    registerSummarizeTool(this.tools, { content: this.content, uris: this.uris });

    this.registerResourceMethods();
    this.registerToolMethods();
  }

  createSession(id: string): Session {
    return new Session({
      id,
      dispatcher: this.dispatcher,
      versionPolicy: this.versionPolicy,
      serverInfo: SERVER_INFO,
      instructions: INSTRUCTIONS,
    });
  }

  close(): void {
    this.store.close();
  }

  private registerResourceMethods(): void {
    this.dispatcher.register("resources/list", async (params): Promise<ListResourcesResult> => {
      const { cursor, limit } = parseParams(listParamsSchema, params, "resources/list");
      const pageSize = validateLimit(limit, RESOURCES_PAGE_SIZE);
      const skip = cursorSkip(cursor);

      // One extra document tells whether another page exists.
      const docs = await this.search.list(pageSize + 1, skip);
      const resources: Resource[] = [];
      for (const doc of docs.slice(0, pageSize)) {
        const note = await this.notes.process(doc);
        if (!note) continue;
        resources.push({
          uri: this.uris.encode(note.path),
          name: note.path,
          title: note.title,
          description: `Last modified: ${new Date(note.modified_at).toISOString()}`,
          mimeType: "text/markdown",
        });
      }

      const result: ListResourcesResult = { resources };
      if (docs.length > pageSize) result.nextCursor = encodeCursor({ skip: skip + pageSize });
      return result;
    });

    this.dispatcher.register("resources/read", async (params): Promise<ReadResourceResult> => {
      const { uri } = parseParams(readParamsSchema, params, "resources/read");
      const path = this.uris.decode(uri);
      if (path === undefined) throw new ResourceNotFoundError(uri);

      const text = await this.content.getContent(path);
      if (text === undefined) throw new ResourceNotFoundError(uri);
      return { contents: [{ uri, mimeType: "text/markdown", text }] };
    });
  }

  private registerToolMethods(): void {
    this.dispatcher.register("tools/list", async (params): Promise<ListToolsResult> => {
      const { cursor, limit } = parseParams(listParamsSchema, params, "tools/list");
      const page = paginate(this.tools.list(), cursor, validateLimit(limit, TOOLS_PAGE_SIZE));
      const result: ListToolsResult = { tools: page.items };
      if (page.nextCursor) result.nextCursor = page.nextCursor;
      return result;
    });

    this.dispatcher.register("tools/call", async (params): Promise<CallToolResult> => {
      const call = parseParams(callParamsSchema, params, "tools/call");
      return this.tools.call(call.name, call.arguments ?? {});
    });
  }
}
