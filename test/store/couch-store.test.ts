import { describe, it, beforeEach } from "node:test";
import assert from "node:assert/strict";
import { CouchStore, sortDocuments } from "../../src/store/couch-store.js";
import { NOTE_STORED_TYPES, type DocumentFilter, type NoteDocument } from "../../src/types.js";
import { COUCH_DB, COUCH_URL, FakeCouch, noteDoc } from "../helpers/fake-couch.js";

const filter: DocumentFilter = { types: NOTE_STORED_TYPES, notePathsOnly: true, allowObfuscatedPaths: false };

function paths(docs: NoteDocument[]): string[] {
  return docs.map((d) => d.path);
}

describe("CouchStore", () => {
  let couch: FakeCouch;
  let store: CouchStore;

  beforeEach(() => {
    couch = new FakeCouch().put(
      noteDoc("alpha.md", "first", { mtime: 300, ctime: 10 }),
      noteDoc("Beta.md", "second", { mtime: 100, ctime: 30 }),
      noteDoc("gamma.md", "third", { mtime: 200, ctime: 20 }),
      noteDoc("photo.png", "binary", { mtime: 400 }),
      noteDoc("gone.md", "deleted", { mtime: 500, deleted: true }),
      { _id: "h:leaf1", type: "leaf", data: "chunk" },
    );
    store = new CouchStore({
      baseUrl: `${COUCH_URL}/`,
      database: COUCH_DB,
      user: "reader",
      password: "test-secret",
      scanBatchSize: 2,
      fetch: couch.fetch,
    });
  });

  it("probes the database", async () => {
    assert.equal(await store.probe(), true);
    couch.down = true;
    assert.equal(await store.probe(), false);
  });

  it("gets documents by id and reports absence", async () => {
    const doc = await store.get("alpha.md");
    assert.equal(doc?.kind, "single");
    assert.equal(await store.get("missing.md"), undefined);
    couch.down = true;
    assert.equal(await store.get("alpha.md"), undefined);
  });

  it("queries through _find with a filtered, sorted selector", async () => {
    const docs = await store.query(filter, { limit: 10, sortBy: "mtime", order: "desc" });
    assert.deepEqual(paths(docs), ["alpha.md", "gamma.md", "Beta.md"]);

    const [request] = couch.requestsTo("/_find");
    assert.deepEqual(request?.body, {
      selector: {
        type: { $in: ["notes", "newnote", "plain"] },
        $nor: [{ deleted: true }],
        mtime: { $exists: true },
        path: { $regex: "(?i)^(.*\\.md|(.*/)?[^/.]+)$" },
      },
      limit: 10,
      skip: 0,
      sort: [{ mtime: "desc" }],
    });
  });

  it("falls back to _all_docs with identical results", async () => {
    const viaFind = await store.query(filter, { limit: 2, skip: 1, sortBy: "ctime", order: "asc" });
    couch.failFind = true;
    const viaScan = await store.query(filter, { limit: 2, skip: 1, sortBy: "ctime", order: "asc" });

    assert.deepEqual(paths(viaFind), ["gamma.md", "Beta.md"]);
    assert.deepEqual(viaScan, viaFind);
    // 6 documents in batches of 2, the last batch comes back short
    assert.equal(couch.requestsTo("/_all_docs").length, 4);
  });

  it("caps the fallback scan", async () => {
    couch.failFind = true;
    const capped = new CouchStore({
      baseUrl: COUCH_URL,
      database: COUCH_DB,
      user: "reader",
      password: "test-secret",
      scanLimit: 2,
      fetch: couch.fetch,
    });
    // _all_docs is in id order: "alpha.md", "beta.md" are the first two
    const docs = await capped.query(filter, { limit: 10, sortBy: "path", order: "asc" });
    assert.deepEqual(paths(docs), ["Beta.md", "alpha.md"]);
  });

  it("returns an empty list when the store is down", async () => {
    couch.down = true;
    assert.deepEqual(await store.query(filter, { limit: 10 }), []);
  });

  it("matches text server-side on path and data", async () => {
    const docs = await store.searchText(filter, "SEC", 10);
    assert.deepEqual(docs && paths(docs), ["Beta.md"]);

    couch.failFind = true;
    assert.equal(await store.searchText(filter, "sec", 10), undefined);
  });

  it("escapes regex characters in the query", async () => {
    couch.put(noteDoc("q.md", "costs (a+b)"));
    const docs = await store.searchText(filter, "(a+b)", 10);
    assert.deepEqual(docs && paths(docs), ["q.md"]);
  });

  it("sends Basic credentials", async () => {
    let auth: string | null = null;
    const spy = new CouchStore({
      baseUrl: COUCH_URL,
      database: COUCH_DB,
      user: "reader",
      password: "test-secret",
      fetch: async (input, init) => {
        auth = new Headers(init?.headers).get("Authorization");
        return couch.fetch(input, init);
      },
    });
    await spy.probe();
    assert.equal(auth, `Basic ${Buffer.from("reader:test-secret").toString("base64")}`);
  });

  it("refuses requests after close", async () => {
    store.close();
    assert.equal(store.closed, true);
    assert.equal(await store.get("alpha.md"), undefined);
    assert.equal(couch.requests.length, 0);
  });
});

describe("sortDocuments", () => {
  it("keeps store order for equal keys", () => {
    const docs = ["b.md", "a.md", "c.md"].map(
      (path): NoteDocument => ({
        kind: "single",
        id: path,
        path,
        ctime: 0,
        mtime: path === "c.md" ? 2 : 1,
        size: 0,
        deleted: false,
        content: "",
        encrypted: false,
      }),
    );
    assert.deepEqual(paths(sortDocuments(docs, "mtime", "desc")), ["c.md", "b.md", "a.md"]);
    assert.deepEqual(paths(sortDocuments(docs, "path", "asc")), ["a.md", "b.md", "c.md"]);
  });
});
