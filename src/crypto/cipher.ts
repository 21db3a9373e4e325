import { createDecipheriv, createHash, pbkdf2Sync } from "node:crypto";
import { DecryptionError } from "../errors.js";
import type { EdenMap } from "../types.js";

/** Appended to the passphrase for path and eden encryption, as the sync client does. */
export const SALT_OF_PASSPHRASE = "rHGMPtr6oWw7VSa3W3wpa8fT8U";
export const EDEN_ENCRYPTED_KEY = "h:++encrypted";

export const PBKDF2_ITERATIONS = 100_000;
const KEY_LENGTH = 32;
const TAG_LENGTH = 16;

export type BlobEncoding = "v1-json-array" | "v2-pipe-base64" | "v2-percent-hex";

export interface EncryptedBlob {
  encoding: BlobEncoding;
  iv: Buffer;
  salt: Buffer;
  ciphertext: Buffer;
}

type ParseOutcome =
  | { ok: true; blob: EncryptedBlob }
  | { ok: false; reason: string; tryNext: boolean };

interface BlobFormat {
  encoding: BlobEncoding;
  parse(raw: string): ParseOutcome;
}

const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;
const HEX_16_BYTES_RE = /^[0-9a-fA-F]{32}$/;

function decodeBase64(value: string): Buffer | undefined {
  if (value.length % 4 !== 0 || !BASE64_RE.test(value)) return undefined;
  return Buffer.from(value, "base64");
}

function fail(reason: string, tryNext = false): ParseOutcome {
  return { ok: false, reason, tryNext };
}

const pipeBase64: BlobFormat = {
  encoding: "v2-pipe-base64",
  parse(raw) {
    const decoded = decodeBase64(raw.slice(3));
    if (!decoded) return fail("invalid base64 payload after '|%|'");
    if (decoded.length < 64) return fail("payload shorter than IV and salt");
    return {
      ok: true,
      blob: {
        encoding: "v2-pipe-base64",
        iv: decoded.subarray(0, 32),
        salt: decoded.subarray(32, 64),
        ciphertext: decoded.subarray(64),
      },
    };
  },
};

const percentHex: BlobFormat = {
  encoding: "v2-percent-hex",
  parse(raw) {
    if (raw.length < 1 + 32 + 32 + 1) return fail("'%' payload too short");
    const ivHex = raw.slice(1, 33);
    const saltHex = raw.slice(33, 65);
    if (!HEX_16_BYTES_RE.test(ivHex) || !HEX_16_BYTES_RE.test(saltHex)) {
      return fail("invalid hex IV or salt");
    }
    const ciphertext = decodeBase64(raw.slice(65));
    // Old JSON-array blobs can start with '%' too.
    if (!ciphertext) return fail("invalid base64 ciphertext", true);
    return {
      ok: true,
      blob: {
        encoding: "v2-percent-hex",
        iv: Buffer.from(ivHex, "hex"),
        salt: Buffer.from(saltHex, "hex"),
        ciphertext,
      },
    };
  },
};

const jsonArray: BlobFormat = {
  encoding: "v1-json-array",
  parse(raw) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return fail("not a JSON array");
    }
    if (!Array.isArray(parsed) || parsed.length !== 3 || !parsed.every((p) => typeof p === "string")) {
      return fail("expected [ciphertext, iv, salt]");
    }
    const [ciphertext, iv, salt] = parsed.map((part: string) => decodeBase64(part));
    if (!ciphertext || !iv || !salt) return fail("invalid base64 member");
    return { ok: true, blob: { encoding: "v1-json-array", iv, salt, ciphertext } };
  },
};

function formatsFor(raw: string): BlobFormat[] {
  if (raw.startsWith("|%|")) return [pipeBase64];
  if (raw.startsWith("%")) return [percentHex, jsonArray];
  return [jsonArray];
}

export function parseBlob(raw: string): EncryptedBlob {
  const reasons: string[] = [];
  for (const format of formatsFor(raw)) {
    const outcome = format.parse(raw);
    if (outcome.ok) return outcome.blob;
    reasons.push(`${format.encoding}: ${outcome.reason}`);
    if (!outcome.tryNext) break;
  }
  throw new DecryptionError(`unrecognized encrypted format (${reasons.join("; ")})`);
}

// PBKDF2 at 100k iterations dominates decrypt cost; chunks of one vault share salts.
const keyCache = new Map<string, Buffer>();
const KEY_CACHE_SIZE = 64;

export function deriveKey(passphrase: string, salt: Buffer): Buffer {
  const passphraseHash = createHash("sha256").update(passphrase, "utf-8").digest();
  const cacheKey = `${passphraseHash.toString("hex")}:${salt.toString("hex")}`;
  const cached = keyCache.get(cacheKey);
  if (cached) return cached;

  const key = pbkdf2Sync(passphraseHash, salt, PBKDF2_ITERATIONS, KEY_LENGTH, "sha256");
  if (keyCache.size >= KEY_CACHE_SIZE) {
    const oldest = keyCache.keys().next();
    if (!oldest.done) keyCache.delete(oldest.value);
  }
  keyCache.set(cacheKey, key);
  return key;
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

export function decrypt(raw: string, passphrase: string): string {
  const blob = parseBlob(raw);
  if (blob.ciphertext.length < TAG_LENGTH) {
    throw new DecryptionError("ciphertext shorter than the authentication tag");
  }

  const key = deriveKey(passphrase, blob.salt);
  const body = blob.ciphertext.subarray(0, blob.ciphertext.length - TAG_LENGTH);
  const tag = blob.ciphertext.subarray(blob.ciphertext.length - TAG_LENGTH);

  let plaintext: Buffer;
  try {
    const decipher = createDecipheriv("aes-256-gcm", key, blob.iv);
    decipher.setAuthTag(tag);
    plaintext = Buffer.concat([decipher.update(body), decipher.final()]);
  } catch (err) {
    throw new DecryptionError(`authentication failed (${err instanceof Error ? err.message : String(err)})`);
  }

  try {
    return utf8.decode(plaintext);
  } catch {
    throw new DecryptionError("plaintext is not valid UTF-8");
  }
}

export function tryDecrypt(raw: string, passphrase: string): string | undefined {
  try {
    return decrypt(raw, passphrase);
  } catch (err) {
    if (err instanceof DecryptionError) return undefined;
    throw err;
  }
}

export function looksEncrypted(content: string): boolean {
  return content.startsWith("|%|") || content.startsWith("[") || content.startsWith("%");
}

export function isPathProbablyObfuscated(path: string): boolean {
  return path.startsWith("%") || path.startsWith("[");
}

export function decryptPath(path: string, passphrase: string): string {
  if (!isPathProbablyObfuscated(path)) return path;
  return decrypt(path, passphrase + SALT_OF_PASSPHRASE);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Unwrap an eden envelope. Maps without the encrypted key are already
 * plaintext and come back unchanged.
 */
export function decryptEden(eden: EdenMap, passphrase: string): EdenMap {
  if (!(EDEN_ENCRYPTED_KEY in eden)) return eden;

  const wrapped = eden[EDEN_ENCRYPTED_KEY];
  const data = isRecord(wrapped) ? wrapped["data"] : undefined;
  if (typeof data !== "string") {
    throw new DecryptionError("eden envelope has no encrypted data");
  }

  const json = decrypt(data, passphrase + SALT_OF_PASSPHRASE);
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    throw new DecryptionError("decrypted eden payload is not JSON");
  }
  if (!isRecord(parsed)) throw new DecryptionError("decrypted eden payload is not an object");
  return parsed;
}
