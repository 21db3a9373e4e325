import { CursorError, LimitError } from "../errors.js";

export const MAX_LIMIT = 50;

export type CursorPayload = Record<string, unknown>;

const BASE64URL_RE = /^[A-Za-z0-9_-]+$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** JSON with object keys sorted at every depth, so equal payloads give equal tokens. */
function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => {
    if (!isRecord(v)) return v;
    return Object.fromEntries(Object.keys(v).sort().map((k) => [k, v[k]]));
  });
}

/** Opaque cursor: unpadded base64url of the canonical JSON payload. */
export function encodeCursor(payload: CursorPayload): string {
  return Buffer.from(canonicalJson(payload), "utf-8").toString("base64url");
}

export function decodeCursor(token: string): CursorPayload {
  // A lone trailing character cannot encode a whole byte.
  if (!BASE64URL_RE.test(token) || token.length % 4 === 1) throw new CursorError();

  let payload: unknown;
  try {
    payload = JSON.parse(Buffer.from(token, "base64url").toString("utf-8"));
  } catch {
    throw new CursorError();
  }
  if (!isRecord(payload)) throw new CursorError("Cursor payload must be a JSON object");
  return payload;
}

/** Offset carried by a list cursor; 0 when there is no cursor. */
export function cursorSkip(token: string | undefined): number {
  if (token === undefined) return 0;
  const skip = decodeCursor(token)["skip"] ?? 0;
  if (typeof skip !== "number" || !Number.isInteger(skip) || skip < 0) {
    throw new CursorError("Cursor skip must be a non-negative integer");
  }
  return skip;
}

export function validateLimit(value: unknown, defaultLimit: number): number {
  const limit = value ?? defaultLimit;
  if (typeof limit !== "number" || !Number.isInteger(limit)) {
    throw new LimitError("limit must be an integer");
  }
  if (limit < 1 || limit > MAX_LIMIT) {
    throw new LimitError(`limit must be between 1 and ${MAX_LIMIT}`);
  }
  return limit;
}

export interface Page<T> {
  items: T[];
  nextCursor?: string;
}

/** Slice a fully known list (e.g. the static tool catalog) into a cursor page. */
export function paginate<T>(all: readonly T[], cursor: string | undefined, limit: number): Page<T> {
  const skip = cursorSkip(cursor);
  const items = all.slice(skip, skip + limit);
  const hasMore = skip + limit < all.length;
  return hasMore ? { items, nextCursor: encodeCursor({ skip: skip + limit }) } : { items };
}
