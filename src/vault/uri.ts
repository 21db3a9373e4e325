const LONE_SURROGATE_RE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

/**
 * Note URIs: `scheme://vault-id/percent-encoded/path.md`. Each path segment
 * is percent-encoded on its own so `/` separators stay readable.
 */
export class NoteUri {
  constructor(
    private readonly scheme: string,
    private readonly vaultId: string,
  ) {}

  private get prefix(): string {
    return `${this.scheme}://${encodeURIComponent(this.vaultId)}/`;
  }

  /** Lone surrogates cannot be percent-encoded as UTF-8 and become U+FFFD. */
  encode(path: string): string {
    const wellFormed = path.replace(LONE_SURROGATE_RE, "\uFFFD");
    return this.prefix + wellFormed.split("/").map(encodeURIComponent).join("/");
  }

  /** Path named by a URI, or `undefined` for a foreign scheme, another vault or bad escapes. */
  decode(uri: string): string | undefined {
    if (!uri.startsWith(this.prefix)) return undefined;
    const encoded = uri.slice(this.prefix.length);
    if (encoded.length === 0) return undefined;
    try {
      return decodeURIComponent(encoded);
    } catch {
      return undefined;
    }
  }
}
