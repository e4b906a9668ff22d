import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readdirSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { InvalidStatusError, ReviewStateFormatError, ReviewStateNotFoundError } from "../errors.js";
import { makeState } from "../testing/fakes.js";
import { ReviewStateStore, parseReviewState, serializeReviewState } from "./store.js";

let baseDir: string;

beforeEach(() => {
  baseDir = mkdtempSync(join(tmpdir(), "review-store-"));
});

afterEach(() => {
  rmSync(baseDir, { recursive: true, force: true });
});

function rawState(patch: (doc: Record<string, unknown>) => void): string {
  const doc: Record<string, unknown> = JSON.parse(JSON.stringify(serializeReviewState(makeState())));
  patch(doc);
  return JSON.stringify(doc);
}

describe("ReviewStateStore", () => {
  it("keeps one document per PR under the prompts directory", () => {
    const store = new ReviewStateStore(baseDir);
    expect(store.filePath(42)).toBe(join(baseDir, "pull-request-review", "prompts", "42", "review-state.json"));
  });

  it("round-trips a saved state", () => {
    const store = new ReviewStateStore(baseDir);
    const state = makeState();
    state.files["/src/app.ts"].status = "approved";
    state.files["/src/app.ts"].summary = "Adds a cache";

    store.save(state);

    expect(store.exists(42)).toBe(true);
    expect(store.load(42)).toEqual(state);
  });

  it("leaves no temp files behind", () => {
    const store = new ReviewStateStore(baseDir);
    store.save(makeState());
    store.save(makeState());
    expect(readdirSync(dirname(store.filePath(42)))).toEqual(["review-state.json"]);
  });

  it("writes two-space indented JSON", () => {
    const store = new ReviewStateStore(baseDir);
    store.save(makeState());
    const raw = readFileSync(store.filePath(42), "utf-8");
    expect(raw.startsWith('{\n  "prId": 42,\n  "repoId": "repo-1",')).toBe(true);
  });

  it("throws ReviewStateNotFoundError for an unknown PR", () => {
    const store = new ReviewStateStore(baseDir);
    expect(store.exists(7)).toBe(false);
    expect(() => store.load(7)).toThrow(ReviewStateNotFoundError);
  });
});

describe("parseReviewState", () => {
  it("normalizes file keys and folder file lists", () => {
    const raw = rawState((doc) => {
      doc.files = { "src/app.ts": { threadId: 101, commentId: 1010, folder: "src", fileName: "app.ts" } };
      doc.folders = { src: { threadId: 500, commentId: 5000, files: ["src/app.ts"] } };
    });

    const state = parseReviewState(raw);

    expect(Object.keys(state.files)).toEqual(["/src/app.ts"]);
    expect(state.folders.src.files).toEqual(["/src/app.ts"]);
  });

  it("keeps a folder named __proto__ through a save and load", () => {
    const raw = rawState((doc) => {
      doc.files = { "/__proto__/x.ts": { threadId: 101, commentId: 1010, folder: "__proto__", fileName: "x.ts" } };
      doc.folders = JSON.parse('{"__proto__": {"threadId": 500, "commentId": 5000, "files": ["/__proto__/x.ts"]}}');
    });
    const store = new ReviewStateStore(baseDir);

    store.save(parseReviewState(raw));
    const loaded = store.load(42);

    expect(Object.keys(loaded.folders)).toEqual(["__proto__"]);
    expect(Object.hasOwn(loaded.folders, "__proto__")).toBe(true);
    expect(loaded.folders["__proto__"].threadId).toBe(500);
  });

  it("fills defaults for missing optional fields", () => {
    const raw = rawState((doc) => {
      doc.files = { "/src/app.ts": { threadId: 101, commentId: 1010, folder: "src", fileName: "app.ts" } };
    });

    expect(parseReviewState(raw).files["/src/app.ts"]).toEqual({
      threadId: 101,
      commentId: 1010,
      folder: "src",
      fileName: "app.ts",
      status: "unreviewed",
      summary: null,
      changeTrackingId: null,
      suggestions: [],
    });
  });

  it("rejects an unknown status", () => {
    const raw = rawState((doc) => {
      doc.overallSummary = { threadId: 900, commentId: 9000, status: "done" };
    });
    expect(() => parseReviewState(raw)).toThrow(InvalidStatusError);
  });

  it("rejects malformed JSON and wrong field types", () => {
    expect(() => parseReviewState("{not json")).toThrow(ReviewStateFormatError);
    const raw = rawState((doc) => {
      doc.prId = "42";
    });
    expect(() => parseReviewState(raw)).toThrow("reviewState.prId: expected a number");
  });

  it("treats null previousSuggestions as never rotated and keeps an empty list", () => {
    const base = { threadId: 101, commentId: 1010, folder: "src", fileName: "app.ts", status: "approved" };
    const raw = rawState((doc) => {
      doc.files = {
        "/src/app.ts": { ...base, previousSuggestions: null },
        "/src/util.ts": { ...base, threadId: 102, fileName: "util.ts", previousSuggestions: [] },
      };
    });

    const state = parseReviewState(raw);

    expect("previousSuggestions" in state.files["/src/app.ts"]).toBe(false);
    expect(state.files["/src/util.ts"].previousSuggestions).toEqual([]);
  });
});

describe("serializeReviewState", () => {
  it("omits previousSuggestions until a rotation happened", () => {
    const state = makeState();
    state.files["/src/util.ts"].previousSuggestions = [];

    const json = serializeReviewState(state);

    expect(Object.keys(json.files["/src/app.ts"])).not.toContain("previousSuggestions");
    expect(json.files["/src/util.ts"].previousSuggestions).toEqual([]);
  });
});
