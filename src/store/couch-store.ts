import debug from "debug";
import { z } from "zod";
import { NOTE_PATH_REGEX, matchesFilter, parseDocument } from "./documents.js";
import type { DocumentFilter, NoteDocument, QueryOptions, SortField, StoredDocument } from "../types.js";

const log = debug("couch-notes:store");

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface CouchStoreOptions {
  baseUrl: string;
  database: string;
  user: string;
  password: string;
  requestTimeoutMs?: number;
  /** Documents examined at most by a bulk `_all_docs` scan. */
  scanLimit?: number;
  scanBatchSize?: number;
  fetch?: FetchLike;
}

type HttpOutcome = { ok: true; status: number; body: unknown } | { ok: false; reason: string };
type QueryOutcome = { ok: true; docs: NoteDocument[] } | { ok: false; reason: string };

interface QueryStrategy {
  name: string;
  run(filter: DocumentFilter, options: QueryOptions): Promise<QueryOutcome>;
}

const findResponseSchema = z.object({ docs: z.array(z.unknown()) });
const allDocsResponseSchema = z.object({
  rows: z.array(z.object({ doc: z.unknown().optional() })),
});

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function sortValue(doc: NoteDocument, field: SortField): number | string {
  return field === "path" ? doc.path : doc[field];
}

export function sortDocuments(docs: NoteDocument[], field: SortField, order: "asc" | "desc"): NoteDocument[] {
  const direction = order === "asc" ? 1 : -1;
  // Array.prototype.sort is stable, so equal keys keep store order.
  return [...docs].sort((a, b) => {
    const left = sortValue(a, field);
    const right = sortValue(b, field);
    if (left < right) return -1 * direction;
    if (left > right) return 1 * direction;
    return 0;
  });
}

/**
 * HTTP adapter over one CouchDB database. Failures never escape: lookups
 * come back absent and queries come back empty.
 */
export class CouchStore {
  private readonly dbUrl: string;
  private readonly authHeader: string;
  private readonly timeoutMs: number;
  private readonly scanLimit: number;
  private readonly scanBatchSize: number;
  private readonly fetchImpl: FetchLike;
  private readonly lifetime = new AbortController();
  private readonly strategies: QueryStrategy[];

  constructor(options: CouchStoreOptions) {
    this.dbUrl = `${options.baseUrl.replace(/\/+$/, "")}/${encodeURIComponent(options.database)}`;
    this.authHeader = `Basic ${Buffer.from(`${options.user}:${options.password}`).toString("base64")}`;
    this.timeoutMs = options.requestTimeoutMs ?? 30_000;
    this.scanLimit = options.scanLimit ?? 5000;
    this.scanBatchSize = options.scanBatchSize ?? 200;
    this.fetchImpl = options.fetch ?? fetch;
    this.strategies = [
      { name: "_find", run: (filter, opts) => this.findQuery(filter, opts) },
      { name: "_all_docs", run: (filter, opts) => this.scanQuery(filter, opts) },
    ];
  }

  get closed(): boolean {
    return this.lifetime.signal.aborted;
  }

  close(): void {
    if (!this.closed) this.lifetime.abort();
  }

  async probe(): Promise<boolean> {
    const res = await this.request("GET", "");
    return res.ok && res.status === 200;
  }

  async get(id: string): Promise<StoredDocument | undefined> {
    const res = await this.request("GET", `/${encodeURIComponent(id)}`);
    if (!res.ok || res.status !== 200) return undefined;
    return parseDocument(res.body);
  }

  /**
   * Filtered, sorted page of note documents. Tries a Mango query first and
   * falls back to a bulk scan with the same filter applied client-side.
   */
  async query(filter: DocumentFilter, options: QueryOptions): Promise<NoteDocument[]> {
    for (const strategy of this.strategies) {
      const outcome = await strategy.run(filter, options);
      if (outcome.ok) return outcome.docs;
      log("query strategy %s failed: %s", strategy.name, outcome.reason);
    }
    return [];
  }

  /**
   * Server-side case-insensitive match on path or inline data. `undefined`
   * means the backend rejected the query and the caller should scan instead.
   */
  async searchText(filter: DocumentFilter, query: string, limit: number): Promise<NoteDocument[] | undefined> {
    const pattern = `(?i)${escapeRegex(query)}`;
    const selector = {
      ...this.selectorFor(filter),
      $or: [{ path: { $regex: pattern } }, { data: { $regex: pattern } }],
    };
    const outcome = await this.runFind({ selector, limit }, filter);
    if (!outcome.ok) {
      log("server-side search failed: %s", outcome.reason);
      return undefined;
    }
    return outcome.docs;
  }

  private selectorFor(filter: DocumentFilter, sortBy?: SortField): Record<string, unknown> {
    const selector: Record<string, unknown> = {
      type: { $in: [...filter.types] },
      $nor: [{ deleted: true }],
    };
    if (sortBy) selector[sortBy] = { $exists: true };
    if (filter.notePathsOnly && !filter.allowObfuscatedPaths) {
      selector["path"] = { $regex: NOTE_PATH_REGEX };
    }
    return selector;
  }

  private findQuery(filter: DocumentFilter, options: QueryOptions): Promise<QueryOutcome> {
    const body: Record<string, unknown> = {
      selector: this.selectorFor(filter, options.sortBy),
      limit: options.limit,
      skip: options.skip ?? 0,
    };
    if (options.sortBy) body["sort"] = [{ [options.sortBy]: options.order ?? "desc" }];
    return this.runFind(body, filter);
  }

  private async runFind(body: Record<string, unknown>, filter: DocumentFilter): Promise<QueryOutcome> {
    const res = await this.request("POST", "/_find", body);
    if (!res.ok) return res;
    if (res.status !== 200) return { ok: false, reason: `HTTP ${res.status}` };

    const parsed = findResponseSchema.safeParse(res.body);
    if (!parsed.success) return { ok: false, reason: "malformed _find response" };

    const docs = parsed.data.docs.map(parseDocument).filter((doc) => matchesFilter(doc, filter));
    return { ok: true, docs };
  }

  private async scanQuery(filter: DocumentFilter, options: QueryOptions): Promise<QueryOutcome> {
    const matches: NoteDocument[] = [];
    let examined = 0;

    while (examined < this.scanLimit) {
      const batch = Math.min(this.scanBatchSize, this.scanLimit - examined);
      const res = await this.request("GET", `/_all_docs?include_docs=true&limit=${batch}&skip=${examined}`);
      if (!res.ok) return res;
      if (res.status !== 200) return { ok: false, reason: `HTTP ${res.status}` };

      const parsed = allDocsResponseSchema.safeParse(res.body);
      if (!parsed.success) return { ok: false, reason: "malformed _all_docs response" };

      for (const row of parsed.data.rows) {
        if (row.doc === undefined || row.doc === null) continue;
        const doc = parseDocument(row.doc);
        if (matchesFilter(doc, filter)) matches.push(doc);
      }

      examined += parsed.data.rows.length;
      if (parsed.data.rows.length < batch) break;
    }

    const sorted = options.sortBy ? sortDocuments(matches, options.sortBy, options.order ?? "desc") : matches;
    const skip = options.skip ?? 0;
    return { ok: true, docs: sorted.slice(skip, skip + options.limit) };
  }

  private async request(method: "GET" | "POST", path: string, body?: unknown): Promise<HttpOutcome> {
    if (this.closed) return { ok: false, reason: "store is closed" };

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const onClose = () => controller.abort();
    this.lifetime.signal.addEventListener("abort", onClose, { once: true });

    try {
      const res = await this.fetchImpl(`${this.dbUrl}${path}`, {
        method,
        headers: { Authorization: this.authHeader, "Content-Type": "application/json", Accept: "application/json" },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
      let parsed: unknown = null;
      try {
        parsed = await res.json();
      } catch {
        log("%s %s returned a non-JSON body (HTTP %d)", method, path, res.status);
      }
      return { ok: true, status: res.status, body: parsed };
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      log("%s %s failed: %s", method, path, reason);
      return { ok: false, reason };
    } finally {
      clearTimeout(timer);
      this.lifetime.signal.removeEventListener("abort", onClose);
    }
  }
}
