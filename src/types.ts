// ---- Stored documents ----

export type DocumentKind = "single" | "chunked" | "chunked-encrypted" | "chunk" | "other";

/** Type tags the sync client writes into the `type` field. */
export const STORED_TYPE_BY_KIND = {
  single: "notes",
  chunked: "newnote",
  "chunked-encrypted": "plain",
  chunk: "leaf",
} as const;

export type StoredType = (typeof STORED_TYPE_BY_KIND)[keyof typeof STORED_TYPE_BY_KIND];

export const NOTE_STORED_TYPES: readonly StoredType[] = ["notes", "newnote", "plain"];

/** Inline chunk map carried on a note document, or its encrypted envelope. */
export type EdenMap = Record<string, unknown>;

interface NoteDocumentBase {
  id: string;
  rev?: string;
  path: string;
  ctime: number;
  mtime: number;
  size: number;
  deleted: boolean;
  eden?: EdenMap;
}

export interface SingleDocument extends NoteDocumentBase {
  kind: "single";
  content: string;
  encrypted: boolean;
}

export interface ChunkedDocument extends NoteDocumentBase {
  kind: "chunked" | "chunked-encrypted";
  chunkIds: string[];
}

export interface ChunkDocument {
  kind: "chunk";
  id: string;
  content: string;
  encrypted: boolean;
  eden?: EdenMap;
}

export interface OtherDocument {
  kind: "other";
  id: string;
  type: string | null;
}

export type NoteDocument = SingleDocument | ChunkedDocument;
export type StoredDocument = NoteDocument | ChunkDocument | OtherDocument;

// ---- Queries ----

export type SortField = "mtime" | "ctime" | "path";
export type SortOrder = "asc" | "desc";

export interface DocumentFilter {
  types: readonly StoredType[];
  /** Keep only `.md` or extensionless paths. */
  notePathsOnly: boolean;
  /** Let encrypted (obfuscated) paths through the note-path check. */
  allowObfuscatedPaths: boolean;
}

export interface QueryOptions {
  limit: number;
  skip?: number;
  sortBy?: SortField;
  order?: SortOrder;
}

// ---- Notes ----

export interface Note {
  path: string;
  title: string;
  content: string;
  created_at: number;
  modified_at: number;
  size: number;
  tags: string[];
  aliases: string[];
  frontmatter: Record<string, unknown>;
}

export interface SearchHit {
  note: Note;
  score: number;
}
