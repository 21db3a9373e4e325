import debug from "debug";
import { NOTE_FILTER } from "./content.js";
import type { NoteProcessor } from "./notes.js";
import type { CouchStore } from "../store/couch-store.js";
import {
  STORED_TYPE_BY_KIND,
  type DocumentFilter,
  type Note,
  type NoteDocument,
  type SearchHit,
  type SortField,
  type SortOrder,
} from "../types.js";

const log = debug("couch-notes:vault");

const DAY_MS = 86_400_000;

export interface SearchOptions {
  usePathObfuscation: boolean;
  /** Whether note content is end-to-end encrypted, which rules out server-side matching. */
  encrypted: boolean;
  /** Documents examined at most by a client-side search. */
  scanLimit: number;
  /** Client-side search pages hold `limit * pageFactor` documents. */
  pageFactor: number;
  /** Page size of the count-only scan. */
  batchSize: number;
}

function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count++;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}

/**
 * Relevance of a note to a query, case-insensitive: +15 for a path match,
 * +10 for a title match, +1 per occurrence in the content, +5 per matching tag.
 */
export function scoreNote(note: Note, query: string): number {
  const q = query.toLowerCase();
  if (q.length === 0) return 0;

  let score = 0;
  if (note.path.toLowerCase().includes(q)) score += 15;
  if (note.title.toLowerCase().includes(q)) score += 10;
  score += countOccurrences(note.content.toLowerCase(), q);
  for (const tag of note.tags) {
    if (tag.toLowerCase().includes(q)) score += 5;
  }
  return score;
}

/** Highest score first; equal scores keep the order they were found in. */
export function rankHits(hits: SearchHit[]): SearchHit[] {
  return [...hits].sort((a, b) => b.score - a.score);
}

export class NoteSearch {
  constructor(
    private readonly store: CouchStore,
    private readonly notes: NoteProcessor,
    private readonly options: SearchOptions,
  ) {}

  private get filter(): DocumentFilter {
    return { ...NOTE_FILTER, allowObfuscatedPaths: this.options.usePathObfuscation };
  }

  /** Only single documents carry their text inline where a server-side `$regex` can see it. */
  private get inlineFilter(): DocumentFilter {
    return { ...this.filter, types: [STORED_TYPE_BY_KIND.single] };
  }

  private get chunkedFilter(): DocumentFilter {
    return { ...this.filter, types: [STORED_TYPE_BY_KIND.chunked, STORED_TYPE_BY_KIND["chunked-encrypted"]] };
  }

  list(limit: number, skip = 0, sortBy: SortField = "mtime", order: SortOrder = "desc"): Promise<NoteDocument[]> {
    return this.listWith(this.filter, limit, skip, sortBy, order);
  }

  private listWith(
    filter: DocumentFilter,
    limit: number,
    skip: number,
    sortBy: SortField = "mtime",
    order: SortOrder = "desc",
  ): Promise<NoteDocument[]> {
    return this.store.query(filter, { limit, skip, sortBy, order });
  }

  async search(query: string, limit: number): Promise<SearchHit[]> {
    const q = query.trim();
    if (q.length === 0 || limit <= 0) return [];

    const serverSide = await this.serverSideCandidates(q, limit);
    if (!serverSide) return rankHits(await this.scanForHits(q, limit, this.filter)).slice(0, limit);

    // Chunk text lives in leaf documents the server query cannot see.
    const inline = await this.scoreAll(serverSide, q);
    const chunked = await this.scanForHits(q, limit, this.chunkedFilter);
    return rankHits([...inline, ...chunked]).slice(0, limit);
  }

  /** Number of notes matching `query` (all notes when empty) modified in the last `sinceDays` days. */
  async count(query: string, sinceDays?: number, now = Date.now()): Promise<number> {
    const threshold = sinceDays ? now - sinceDays * DAY_MS : Number.NEGATIVE_INFINITY;
    const q = query.trim();

    if (q.length > 0) {
      const hits = await this.search(q, this.options.scanLimit);
      return hits.filter((hit) => hit.note.modified_at >= threshold).length;
    }

    let count = 0;
    let skip = 0;
    const pageSize = this.options.batchSize;
    while (skip < this.options.scanLimit) {
      const page = await this.list(Math.min(pageSize, this.options.scanLimit - skip), skip);
      count += page.filter((doc) => doc.mtime >= threshold).length;
      skip += page.length;
      if (page.length < pageSize) break;
    }
    return count;
  }

  private async serverSideCandidates(query: string, limit: number): Promise<NoteDocument[] | undefined> {
    // Obfuscated paths and encrypted content cannot be matched by the server.
    if (this.options.usePathObfuscation || this.options.encrypted) return undefined;
    const candidateLimit = Math.min(this.options.scanLimit, limit * this.options.pageFactor);
    return this.store.searchText(this.inlineFilter, query, candidateLimit);
  }

  private async scoreAll(docs: NoteDocument[], query: string): Promise<SearchHit[]> {
    const hits: SearchHit[] = [];
    for (const doc of docs) {
      const hit = await this.scoreDocument(doc, query);
      if (hit) hits.push(hit);
    }
    return hits;
  }

  private async scanForHits(query: string, limit: number, filter: DocumentFilter): Promise<SearchHit[]> {
    const hits: SearchHit[] = [];
    const pageSize = Math.max(1, limit * this.options.pageFactor);
    let examined = 0;

    while (hits.length < limit && examined < this.options.scanLimit) {
      const size = Math.min(pageSize, this.options.scanLimit - examined);
      const page = await this.listWith(filter, size, examined);
      hits.push(...(await this.scoreAll(page, query)));
      examined += page.length;
      if (page.length < size) break;
    }

    log("client-side search for %j examined %d documents, %d hits", query, examined, hits.length);
    return hits;
  }

  private async scoreDocument(doc: NoteDocument, query: string): Promise<SearchHit | undefined> {
    const note = await this.notes.process(doc);
    if (!note) return undefined;
    const score = scoreNote(note, query);
    return score > 0 ? { note, score } : undefined;
  }
}
