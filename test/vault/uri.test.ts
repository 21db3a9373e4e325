import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { NoteUri } from "../../src/vault/uri.js";

describe("NoteUri", () => {
  const uris = new NoteUri("mcp-obsidian", "default");

  it("percent-encodes each path segment", () => {
    assert.equal(uris.encode("Projects/Q3 Plan.md"), "mcp-obsidian://default/Projects/Q3%20Plan.md");
    assert.equal(uris.encode("a#b?c.md"), "mcp-obsidian://default/a%23b%3Fc.md");
  });

  it("decodes back to the original path", () => {
    for (const path of ["Projects/Q3 Plan.md", "Über/naïve ✓.md", "a%b.md", "deep/er/path"]) {
      assert.equal(uris.decode(uris.encode(path)), path);
    }
  });

  it("replaces lone surrogates instead of throwing", () => {
    assert.equal(uris.encode("bad\uD800.md"), "mcp-obsidian://default/bad%EF%BF%BD.md");
    assert.equal(uris.decode(uris.encode("bad\uD800.md")), "bad\uFFFD.md");
    assert.equal(uris.encode("x/\uDC00y.md"), "mcp-obsidian://default/x/%EF%BF%BDy.md");
    assert.equal(uris.encode("\uD83D\uDE00.md"), "mcp-obsidian://default/%F0%9F%98%80.md");
  });

  it("rejects foreign URIs", () => {
    assert.equal(uris.decode("file:///etc/passwd"), undefined);
    assert.equal(uris.decode("mcp-obsidian://other-vault/a.md"), undefined);
    assert.equal(uris.decode("mcp-obsidian://default/"), undefined);
    assert.equal(uris.decode("mcp-obsidian://default/%E0%A4%A"), undefined);
  });

  it("encodes the vault id", () => {
    const spaced = new NoteUri("notes", "my vault");
    assert.equal(spaced.encode("a.md"), "notes://my%20vault/a.md");
    assert.equal(spaced.decode("notes://my%20vault/a.md"), "a.md");
  });
});
