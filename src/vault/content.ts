import debug from "debug";
import {
  EDEN_ENCRYPTED_KEY,
  decryptEden,
  decryptPath,
  isPathProbablyObfuscated,
  looksEncrypted,
  tryDecrypt,
} from "../crypto/cipher.js";
import { DecryptionError } from "../errors.js";
import { isNoteDocument, isNotePath } from "../store/documents.js";
import type { CouchStore } from "../store/couch-store.js";
import {
  NOTE_STORED_TYPES,
  type ChunkDocument,
  type ChunkedDocument,
  type DocumentFilter,
  type EdenMap,
  type NoteDocument,
  type SingleDocument,
} from "../types.js";

const log = debug("couch-notes:vault");

// ---- Sentinels ----

export const missingChunk = (id: string) => `[MISSING CHUNK: ${id}]`;
export const encryptedContent = (id: string) => `[ENCRYPTED CONTENT: passphrase required (${id})]`;
export const decryptionFailed = (id: string) => `[DECRYPTION FAILED: ${id}]`;
export const NO_READABLE_CHUNKS = "[ENCRYPTED CONTENT: no readable chunks]";

export interface VaultOptions {
  passphrase?: string;
  usePathObfuscation: boolean;
  /** Most-recent documents examined when a path is not a document id. */
  pathScanLimit: number;
}

export const NOTE_FILTER: DocumentFilter = {
  types: NOTE_STORED_TYPES,
  notePathsOnly: true,
  allowObfuscatedPaths: false,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Turns stored documents back into note text. Failures are written into the
 * text as bracketed sentinels at the smallest unit that failed, so the rest
 * of a partially readable vault stays readable.
 */
export class ContentReconstructor {
  constructor(
    private readonly store: CouchStore,
    private readonly options: VaultOptions,
  ) {}

  /** Note text for a logical path, or `undefined` when no document has that path. */
  async getContent(path: string): Promise<string | undefined> {
    const doc = await this.resolve(path);
    if (!doc) return undefined;
    return this.contentOf(doc);
  }

  async resolve(path: string): Promise<NoteDocument | undefined> {
    if (!isNotePath(path)) return undefined;
    if (!this.options.usePathObfuscation) {
      const candidates = path.toLowerCase() === path ? [path] : [path, path.toLowerCase()];
      for (const id of candidates) {
        const doc = await this.store.get(id);
        if (doc && isNoteDocument(doc) && !doc.deleted) return doc;
      }
    }
    return this.scanForPath(path);
  }

  /** Logical path of a document, decrypting obfuscated paths when configured. */
  logicalPath(doc: NoteDocument): string | undefined {
    const { passphrase, usePathObfuscation } = this.options;
    if (!usePathObfuscation || !isPathProbablyObfuscated(doc.path)) return doc.path;
    if (!passphrase) return undefined;
    try {
      return decryptPath(doc.path, passphrase);
    } catch (err) {
      if (err instanceof DecryptionError) {
        log("could not decrypt path of %s: %s", doc.id, err.message);
        return undefined;
      }
      throw err;
    }
  }

  async contentOf(doc: NoteDocument): Promise<string> {
    if (doc.kind === "single") return this.singleContent(doc);
    return this.reassemble(doc);
  }

  private async scanForPath(path: string): Promise<NoteDocument | undefined> {
    const recent = await this.store.query(
      { ...NOTE_FILTER, allowObfuscatedPaths: this.options.usePathObfuscation },
      { limit: this.options.pathScanLimit, sortBy: "mtime", order: "desc" },
    );
    const match = recent.find((doc) => this.logicalPath(doc) === path);
    if (!match) log("no document found for path %s among %d recent documents", path, recent.length);
    return match;
  }

  private singleContent(doc: SingleDocument): string {
    return this.readPiece(doc.id, doc.content, doc.encrypted);
  }

  private async reassemble(doc: ChunkedDocument): Promise<string> {
    if (doc.chunkIds.length === 0) return "";

    const inline = this.inlineChunks(doc);
    const pieces: string[] = [];
    for (const id of doc.chunkIds) {
      const eden = inline.get(id);
      pieces.push(eden !== undefined ? eden : await this.chunkContent(id));
    }

    const content = pieces.join("");
    return content.length === 0 ? NO_READABLE_CHUNKS : content;
  }

  /** Chunks carried inline in the note document's eden map. */
  private inlineChunks(doc: ChunkedDocument): Map<string, string> {
    const chunks = new Map<string, string>();
    if (!doc.eden) return chunks;

    const map = this.openEden(doc.eden, doc.id);
    if (!map) return chunks;
    for (const [id, entry] of Object.entries(map)) {
      const data = isRecord(entry) ? entry["data"] : undefined;
      if (typeof data === "string") chunks.set(id, this.readPiece(id, data, false));
    }
    return chunks;
  }

  private async chunkContent(id: string): Promise<string> {
    const doc = await this.store.get(id);
    if (!doc || doc.kind !== "chunk") return missingChunk(id);
    if (doc.eden) return this.edenChunkContent(doc, doc.eden);
    return this.readPiece(id, doc.content, doc.encrypted);
  }

  private edenChunkContent(chunk: ChunkDocument, eden: EdenMap): string {
    if (!this.options.passphrase) return encryptedContent(chunk.id);
    const payload = this.openEden(eden, chunk.id);
    if (!payload) return decryptionFailed(chunk.id);
    const data = payload["data"];
    return typeof data === "string" ? data : decryptionFailed(chunk.id);
  }

  private openEden(eden: EdenMap, ownerId: string): EdenMap | undefined {
    const { passphrase } = this.options;
    if (!passphrase) return EDEN_ENCRYPTED_KEY in eden ? undefined : eden;
    try {
      return decryptEden(eden, passphrase);
    } catch (err) {
      if (err instanceof DecryptionError) {
        log("eden of %s could not be opened: %s", ownerId, err.message);
        return undefined;
      }
      throw err;
    }
  }

  /**
   * Plaintext passes through untouched; with a passphrase, anything that
   * decrypts is replaced by its plaintext.
   */
  private readPiece(id: string, raw: string, markedEncrypted: boolean): string {
    const { passphrase } = this.options;
    if (!passphrase) return markedEncrypted ? encryptedContent(id) : raw;

    const plaintext = tryDecrypt(raw, passphrase);
    if (plaintext !== undefined) return plaintext;
    if (markedEncrypted || looksEncrypted(raw)) {
      log("decryption failed for %s", id);
      return decryptionFailed(id);
    }
    return raw;
  }
}
