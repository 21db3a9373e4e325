import debug from "debug";
import { parse as parseYaml } from "yaml";
import type { ContentReconstructor } from "./content.js";
import { isNotePath } from "../store/documents.js";
import type { Note, NoteDocument } from "../types.js";

const log = debug("couch-notes:vault");

const FRONTMATTER_RE = /^---\r?\n([\s\S]*?)\r?\n---[ \t]*(?:\r?\n|$)/;
const HASHTAG_RE = /#([A-Za-z0-9_/-]+)/g;

export interface ParsedMarkdown {
  frontmatter: Record<string, unknown>;
  body: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseFrontmatter(content: string): ParsedMarkdown {
  const match = FRONTMATTER_RE.exec(content);
  if (!match) return { frontmatter: {}, body: content };

  try {
    const data: unknown = parseYaml(match[1] ?? "");
    if (data === null || data === undefined) return { frontmatter: {}, body: content.slice(match[0].length) };
    if (!isRecord(data)) return { frontmatter: {}, body: content };
    return { frontmatter: data, body: content.slice(match[0].length) };
  } catch (err) {
    log("ignoring malformed frontmatter: %s", err instanceof Error ? err.message : String(err));
    return { frontmatter: {}, body: content };
  }
}

export function extractTitle(body: string, path: string): string {
  for (const line of body.split("\n")) {
    const trimmed = line.trim();
    if (trimmed.startsWith("# ")) return trimmed.slice(2).trim();
  }
  const filename = path.slice(path.lastIndexOf("/") + 1);
  return filename.endsWith(".md") ? filename.slice(0, -3) : filename;
}

/** Hashtags outside fenced code blocks, without the leading `#`. */
export function extractHashtags(body: string): string[] {
  const tags: string[] = [];
  let inFence = false;
  for (const line of body.split("\n")) {
    if (line.trim().startsWith("```")) {
      inFence = !inFence;
      continue;
    }
    if (inFence) continue;
    for (const match of line.matchAll(HASHTAG_RE)) {
      if (match[1]) tags.push(match[1]);
    }
  }
  return tags;
}

function stringList(value: unknown, separator: RegExp): string[] {
  if (Array.isArray(value)) {
    return value.filter((v) => v !== null && v !== undefined).map((v) => String(v).trim()).filter(Boolean);
  }
  if (typeof value === "string") {
    return value.split(separator).map((v) => v.trim()).filter(Boolean);
  }
  return [];
}

export function frontmatterTags(frontmatter: Record<string, unknown>): string[] {
  return stringList(frontmatter["tags"], /[,\s]+/).map((tag) => tag.replace(/^#/, ""));
}

export function frontmatterAliases(frontmatter: Record<string, unknown>): string[] {
  return stringList(frontmatter["aliases"], /,/);
}

export class NoteProcessor {
  constructor(private readonly content: ContentReconstructor) {}

  /**
   * Build a note record; `undefined` when the document's path cannot be
   * resolved, or resolves to an attachment once decrypted.
   */
  async process(doc: NoteDocument): Promise<Note | undefined> {
    const path = this.content.logicalPath(doc);
    if (path === undefined || !isNotePath(path)) return undefined;

    const content = await this.content.contentOf(doc);
    return buildNote(path, content, doc);
  }
}

export function buildNote(path: string, content: string, doc: Pick<NoteDocument, "ctime" | "mtime" | "size">): Note {
  const { frontmatter, body } = parseFrontmatter(content);
  const tags = new Set([...extractHashtags(body), ...frontmatterTags(frontmatter)]);

  return {
    path,
    title: extractTitle(body, path),
    content,
    created_at: doc.ctime,
    modified_at: doc.mtime,
    size: doc.size,
    tags: [...tags],
    aliases: frontmatterAliases(frontmatter),
    frontmatter,
  };
}
