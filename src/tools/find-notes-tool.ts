import { z } from "zod";
import { MAX_LIMIT } from "../protocol/pagination.js";
import type { NoteProcessor } from "../vault/notes.js";
import type { NoteSearch } from "../vault/search.js";
import type { NoteUri } from "../vault/uri.js";
import type { Note } from "../types.js";
import { textResult, type ToolRegistry } from "./registry.js";

const DAY_MS = 86_400_000;
export const CONTENT_PREVIEW_CHARS = 3000;
/** Result sets this small carry note content even when it was not asked for. */
export const AUTO_CONTENT_THRESHOLD = 3;
export const TRUNCATION_NOTICE = "\n\n[Content truncated - use resources/read for full content]";

export interface FindNotesDeps {
  search: NoteSearch;
  notes: NoteProcessor;
  uris: NoteUri;
  /** Browse mode reads `limit * browseOverfetch` documents to survive date filtering. */
  browseOverfetch: number;
  now?: () => number;
}

const findNotesInput = z.object({
  query: z.string().default("").describe("Text to search for in paths, titles, content and tags. Empty to browse."),
  since_days: z.number().int().positive().optional().describe("Only notes modified in the last N days."),
  limit: z.number().int().min(1).max(MAX_LIMIT).default(10).describe(`Maximum results (1-${MAX_LIMIT}).`),
  offset: z.number().int().min(0).default(0).describe("Results to skip, for paging."),
  sort_by: z.enum(["mtime", "ctime", "path"]).default("mtime").describe("Browse order. Searches rank by relevance."),
  sort_order: z.enum(["asc", "desc"]).default("desc"),
  include_content: z.boolean().default(false).describe("Include (truncated) note content."),
  count_only: z.boolean().default(false).describe("Only return the number of matching notes."),
  exists_only: z.boolean().default(false).describe("Only report whether anything matches."),
});

type FindNotesArgs = z.output<typeof findNotesInput>;

interface Match {
  note: Note;
  score?: number;
}

export function previewContent(content: string): string {
  if (content.length <= CONTENT_PREVIEW_CHARS) return content;
  return content.slice(0, CONTENT_PREVIEW_CHARS) + TRUNCATION_NOTICE;
}

export function registerFindNotesTool(tools: ToolRegistry, deps: FindNotesDeps): void {
  const now = deps.now ?? Date.now;

  function withinWindow(note: Note, sinceDays: number | undefined, at: number): boolean {
    return sinceDays === undefined || note.modified_at >= at - sinceDays * DAY_MS;
  }

  async function searchMatches(args: FindNotesArgs, at: number): Promise<Match[]> {
    const hits = await deps.search.search(args.query, args.offset + args.limit * deps.browseOverfetch);
    return hits
      .filter((hit) => withinWindow(hit.note, args.since_days, at))
      .slice(args.offset, args.offset + args.limit)
      .map((hit) => ({ note: hit.note, score: hit.score }));
  }

  async function browseMatches(args: FindNotesArgs, at: number): Promise<Match[]> {
    const docs = await deps.search.list(args.limit * deps.browseOverfetch, args.offset, args.sort_by, args.sort_order);
    const matches: Match[] = [];
    for (const doc of docs) {
      const note = await deps.notes.process(doc);
      if (note && withinWindow(note, args.since_days, at)) matches.push({ note });
    }
    return matches.slice(0, args.limit);
  }

  tools.registerTool(
    "find_notes",
    {
      title: "Find notes",
      description:
        "Search or browse notes in the vault. With a query, results are ranked by relevance; without one, " +
        "notes are listed by modification time (or sort_by). Use count_only or exists_only for quick checks. " +
        `Content is included when include_content is set or when at most ${AUTO_CONTENT_THRESHOLD} notes match.`,
      inputSchema: findNotesInput,
    },
    async (args) => {
      const at = now();
      if (args.count_only) {
        return textResult({ match_count: await deps.search.count(args.query, args.since_days, at) });
      }

      const matches = args.query.trim() ? await searchMatches(args, at) : await browseMatches(args, at);
      if (args.exists_only) {
        return textResult({ exists: matches.length > 0, match_count: matches.length });
      }

      const withContent = args.include_content || matches.length <= AUTO_CONTENT_THRESHOLD;
      const items = matches.map(({ note, score }) => ({
        uri: deps.uris.encode(note.path),
        title: note.title,
        path: note.path,
        mtime: new Date(note.modified_at).toISOString(),
        ctime: new Date(note.created_at).toISOString(),
        tags: note.tags,
        ...(score !== undefined ? { score } : {}),
        ...(withContent ? { content: previewContent(note.content) } : {}),
      }));
      return textResult(items);
    },
  );
}
