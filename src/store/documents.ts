import { z } from "zod";
import { isPathProbablyObfuscated } from "../crypto/cipher.js";
import type { DocumentFilter, NoteDocument, StoredDocument } from "../types.js";

const edenSchema = z.record(z.string(), z.unknown()).optional();

const noteFields = {
  _id: z.string(),
  _rev: z.string().optional(),
  path: z.string(),
  ctime: z.number().default(0),
  mtime: z.number().default(0),
  size: z.number().default(0),
  deleted: z.boolean().optional(),
  _deleted: z.boolean().optional(),
  eden: edenSchema,
};

const rawDocumentSchema = z.discriminatedUnion("type", [
  z.object({ ...noteFields, type: z.literal("notes"), data: z.string(), e_: z.boolean().optional() }),
  z.object({ ...noteFields, type: z.literal("newnote"), children: z.array(z.string()) }),
  z.object({ ...noteFields, type: z.literal("plain"), children: z.array(z.string()) }),
  z.object({
    _id: z.string(),
    type: z.literal("leaf"),
    data: z.string(),
    e_: z.boolean().optional(),
    eden: edenSchema,
  }),
]);

type RawDocument = z.infer<typeof rawDocumentSchema>;

function readId(raw: unknown): string {
  if (typeof raw === "object" && raw !== null && "_id" in raw && typeof raw._id === "string") {
    return raw._id;
  }
  return "";
}

function readType(raw: unknown): string | null {
  if (typeof raw === "object" && raw !== null && "type" in raw && typeof raw.type === "string") {
    return raw.type;
  }
  return null;
}

function fromRaw(doc: RawDocument): StoredDocument {
  if (doc.type === "leaf") {
    return { kind: "chunk", id: doc._id, content: doc.data, encrypted: doc.e_ ?? false, eden: doc.eden };
  }

  const base = {
    id: doc._id,
    rev: doc._rev,
    path: doc.path,
    ctime: doc.ctime,
    mtime: doc.mtime,
    size: doc.size,
    deleted: doc.deleted === true || doc._deleted === true,
    eden: doc.eden,
  };

  switch (doc.type) {
    case "notes":
      return { ...base, kind: "single", content: doc.data, encrypted: doc.e_ ?? false };
    case "newnote":
      return { ...base, kind: "chunked", chunkIds: doc.children };
    case "plain":
      return { ...base, kind: "chunked-encrypted", chunkIds: doc.children };
  }
}

/**
 * Parse a raw CouchDB document. Unknown types and documents that do not
 * match their type's shape become `other` rather than failing.
 */
export function parseDocument(raw: unknown): StoredDocument {
  const result = rawDocumentSchema.safeParse(raw);
  if (!result.success) {
    return { kind: "other", id: readId(raw), type: readType(raw) };
  }
  return fromRaw(result.data);
}

export function isNoteDocument(doc: StoredDocument): doc is NoteDocument {
  return doc.kind === "single" || doc.kind === "chunked" || doc.kind === "chunked-encrypted";
}

/** `.md` files and files without any extension. */
export function isNotePath(path: string): boolean {
  const basename = path.slice(path.lastIndexOf("/") + 1);
  if (basename.length === 0) return false;
  if (basename.toLowerCase().endsWith(".md")) return true;
  return !basename.includes(".");
}

/** Same pattern as `isNotePath`, for Mango `$regex` selectors. */
export const NOTE_PATH_REGEX = "(?i)^(.*\\.md|(.*/)?[^/.]+)$";

export function storedTypeOf(doc: NoteDocument): "notes" | "newnote" | "plain" {
  switch (doc.kind) {
    case "single":
      return "notes";
    case "chunked":
      return "newnote";
    case "chunked-encrypted":
      return "plain";
  }
}

export function matchesFilter(doc: StoredDocument, filter: DocumentFilter): doc is NoteDocument {
  if (!isNoteDocument(doc)) return false;
  if (doc.deleted) return false;
  if (!filter.types.includes(storedTypeOf(doc))) return false;
  if (!filter.notePathsOnly) return true;
  if (filter.allowObfuscatedPaths && isPathProbablyObfuscated(doc.path)) return true;
  return isNotePath(doc.path);
}
