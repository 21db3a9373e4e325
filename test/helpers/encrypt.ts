import { createCipheriv, createHash, pbkdf2Sync, randomBytes } from "node:crypto";
import { EDEN_ENCRYPTED_KEY, SALT_OF_PASSPHRASE } from "../../src/crypto/cipher.js";
import type { EdenMap } from "../../src/types.js";

export type TestBlobFormat = "pipe" | "hex" | "json";

const keys = new Map<string, Buffer>();

function keyFor(passphrase: string, salt: Buffer): Buffer {
  const id = `${passphrase}:${salt.toString("hex")}`;
  let key = keys.get(id);
  if (!key) {
    const hashed = createHash("sha256").update(passphrase, "utf-8").digest();
    key = pbkdf2Sync(hashed, salt, 100_000, 32, "sha256");
    keys.set(id, key);
  }
  return key;
}

/** Encrypts like the sync client: AES-256-GCM, tag appended to the ciphertext. */
export function encrypt(plaintext: string, passphrase: string, format: TestBlobFormat = "pipe"): string {
  const size = format === "pipe" ? 32 : 16;
  const iv = randomBytes(size);
  // A fixed salt keeps key derivation to one PBKDF2 run per passphrase.
  const salt = Buffer.alloc(size, 7);

  const cipher = createCipheriv("aes-256-gcm", keyFor(passphrase, salt), iv);
  const ciphertext = Buffer.concat([cipher.update(plaintext, "utf-8"), cipher.final(), cipher.getAuthTag()]);

  switch (format) {
    case "pipe":
      return "|%|" + Buffer.concat([iv, salt, ciphertext]).toString("base64");
    case "hex":
      return "%" + iv.toString("hex") + salt.toString("hex") + ciphertext.toString("base64");
    case "json":
      return JSON.stringify([ciphertext.toString("base64"), iv.toString("base64"), salt.toString("base64")]);
  }
}

export function encryptPath(path: string, passphrase: string, format: TestBlobFormat = "hex"): string {
  return encrypt(path, passphrase + SALT_OF_PASSPHRASE, format);
}

export function encryptEden(map: EdenMap, passphrase: string): EdenMap {
  return { [EDEN_ENCRYPTED_KEY]: { data: encrypt(JSON.stringify(map), passphrase + SALT_OF_PASSPHRASE, "hex") } };
}
