import { describe, it, beforeEach } from "node:test";
import assert from "node:assert/strict";
import { CouchStore } from "../../src/store/couch-store.js";
import { ContentReconstructor } from "../../src/vault/content.js";
import { NoteProcessor, buildNote } from "../../src/vault/notes.js";
import { NoteSearch, rankHits, scoreNote, type SearchOptions } from "../../src/vault/search.js";
import type { SearchHit } from "../../src/types.js";
import { COUCH_DB, COUCH_URL, FakeCouch, chunkedDoc, noteDoc } from "../helpers/fake-couch.js";

const DAY = 86_400_000;
const NOW = 100 * DAY;

function searchFor(couch: FakeCouch, options: Partial<SearchOptions> = {}): NoteSearch {
  const store = new CouchStore({ baseUrl: COUCH_URL, database: COUCH_DB, user: "reader", password: "test-secret", fetch: couch.fetch });
  const notes = new NoteProcessor(new ContentReconstructor(store, { usePathObfuscation: false, pathScanLimit: 100 }));
  return new NoteSearch(store, notes, {
    usePathObfuscation: false,
    encrypted: false,
    scanLimit: 5000,
    pageFactor: 3,
    batchSize: 200,
    ...options,
  });
}

describe("scoreNote", () => {
  it("weights path, title, content occurrences and tags", () => {
    const note = buildNote("Projects/Plan.md", "# Plan\nplan the plan #planning", { ctime: 0, mtime: 0, size: 0 });
    // path 15 + title 10 + 4 content occurrences + 1 matching tag * 5
    assert.equal(scoreNote(note, "PLAN"), 34);
  });

  it("scores an empty query as zero", () => {
    const note = buildNote("a.md", "anything", { ctime: 0, mtime: 0, size: 0 });
    assert.equal(scoreNote(note, ""), 0);
  });

  it("ranks by score, keeping discovery order for ties", () => {
    const hit = (path: string, score: number): SearchHit => ({
      note: buildNote(path, "", { ctime: 0, mtime: 0, size: 0 }),
      score,
    });
    const ranked = rankHits([hit("a.md", 1), hit("b.md", 5), hit("c.md", 1)]);
    assert.deepEqual(
      ranked.map((h) => h.note.path),
      ["b.md", "a.md", "c.md"],
    );
  });
});

describe("NoteSearch", () => {
  let couch: FakeCouch;

  beforeEach(() => {
    couch = new FakeCouch().put(
      noteDoc("alpha.md", "# Alpha\nproject kickoff notes", { mtime: NOW - DAY / 24 }),
      noteDoc("beta.md", "# Beta\nproject project retro #project", { mtime: NOW - 2 * DAY }),
      noteDoc("gamma.md", "# Gamma\nunrelated", { mtime: NOW - 10 * DAY }),
    );
  });

  it("searches server-side for plaintext vaults", async () => {
    const hits = await searchFor(couch).search("project", 10);
    assert.deepEqual(
      hits.map((h) => [h.note.path, h.score]),
      [
        ["beta.md", 8],
        ["alpha.md", 1],
      ],
    );
    const [find] = couch.requestsTo("/_find");
    assert.deepEqual(find?.body, {
      selector: {
        type: { $in: ["notes"] },
        $nor: [{ deleted: true }],
        path: { $regex: "(?i)^(.*\\.md|(.*/)?[^/.]+)$" },
        $or: [{ path: { $regex: "(?i)project" } }, { data: { $regex: "(?i)project" } }],
      },
      limit: 30,
    });
  });

  it("finds text held in the chunks of a chunked note", async () => {
    couch.put(...chunkedDoc("meeting.md", { "h:1": "talked about ", "h:2": "kubernetes" }));
    const found = await searchFor(couch).search("kubernetes", 10);
    assert.deepEqual(
      found.map((h) => [h.note.path, h.score]),
      [["meeting.md", 1]],
    );

    couch.failFind = true;
    const scanned = await searchFor(couch).search("kubernetes", 10);
    assert.deepEqual(
      scanned.map((h) => [h.note.path, h.score]),
      [["meeting.md", 1]],
    );
  });

  it("scores chunked and inline notes alike", async () => {
    couch.put(...chunkedDoc("retro.md", { "h:3": "# Retro\nproject project project" }, { mtime: NOW - 3 * DAY }));
    const hits = await searchFor(couch).search("project", 10);
    assert.deepEqual(
      hits.map((h) => [h.note.path, h.score]),
      [
        ["beta.md", 8],
        ["retro.md", 3],
        ["alpha.md", 1],
      ],
    );
  });

  it("scans client-side when content is encrypted", async () => {
    const hits = await searchFor(couch, { encrypted: true }).search("project", 1);
    assert.deepEqual(
      hits.map((h) => h.note.path),
      ["beta.md"],
    );
    const bodies = couch.requestsTo("/_find").map((r) => JSON.stringify(r.body));
    assert.equal(bodies.some((body) => body.includes("$or")), false);
  });

  it("falls back to scanning when the server rejects the text query", async () => {
    couch.failFind = true;
    const hits = await searchFor(couch).search("project", 10);
    assert.deepEqual(
      hits.map((h) => h.note.path),
      ["beta.md", "alpha.md"],
    );
  });

  it("returns nothing for a blank query", async () => {
    assert.deepEqual(await searchFor(couch).search("   ", 10), []);
    assert.equal(couch.requests.length, 0);
  });

  it("lists with sort, skip and limit", async () => {
    const docs = await searchFor(couch).list(2, 1, "path", "asc");
    assert.deepEqual(
      docs.map((d) => d.path),
      ["beta.md", "gamma.md"],
    );
  });

  it("counts all notes or matches within a time window", async () => {
    const search = searchFor(couch);
    assert.equal(await search.count(""), 3);
    assert.equal(await search.count("", 3, NOW), 2);
    assert.equal(await search.count("project", 1, NOW), 1);
    assert.equal(await search.count("nothing-like-this"), 0);
  });
});
