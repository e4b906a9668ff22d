import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { FileNotInStateError, InvalidStatusError } from "../errors.js";
import { ReviewMetrics } from "../metrics.js";
import { StatusHistory } from "../state/history.js";
import { ReviewStateStore } from "../state/store.js";
import { BASE_URL, FakeThreadsApi, makeState } from "../testing/fakes.js";
import type { FileReviewContext, SuggestionInput } from "./file-review.js";
import { approveFile, requestChanges, setFileStatus, startFileReview, suggestionLinkText } from "./file-review.js";

const SUGGESTIONS: SuggestionInput[] = [
  { line: 10, severity: "high", content: "Handle the null case" },
  { line: 20, endLine: 24, severity: "low", content: "Rename for clarity", outOfScope: true },
];

let baseDir: string;
let store: ReviewStateStore;
let threads: FakeThreadsApi;
let ctx: FileReviewContext;

beforeEach(() => {
  baseDir = mkdtempSync(join(tmpdir(), "review-file-"));
  store = new ReviewStateStore(baseDir);
  store.save(makeState());
  threads = new FakeThreadsApi();
  ctx = { store, threads, baseUrl: BASE_URL };
});

afterEach(() => {
  rmSync(baseDir, { recursive: true, force: true });
});

describe("suggestionLinkText", () => {
  it("prefers custom text, then a range, then a single line", () => {
    expect(suggestionLinkText({ line: 3, severity: "low", content: "", linkText: "naming" })).toBe("naming");
    expect(suggestionLinkText({ line: 3, endLine: 9, severity: "low", content: "" })).toBe("lines 3 - 9");
    expect(suggestionLinkText({ line: 3, endLine: 3, severity: "low", content: "" })).toBe("line 3");
  });
});

describe("startFileReview", () => {
  it("marks an unreviewed file in progress and cascades", async () => {
    expect(await startFileReview(ctx, 42, "src/app.ts")).toBe(true);

    expect(threads.summary()).toEqual([
      "comment 101",
      "comment 500",
      "status 500 active",
      "comment 900",
      "status 900 active",
    ]);
    expect(threads.commentFor(101)).toContain("*Status:* In Progress");

    const saved = store.load(42);
    expect(saved.files["/src/app.ts"].status).toBe("in-progress");
    expect(saved.folders.src.status).toBe("in-progress");
    expect(saved.overallSummary.status).toBe("in-progress");
  });

  it("is a no-op once the review has started", async () => {
    await startFileReview(ctx, 42, "/src/app.ts");
    const callsAfterFirst = threads.calls.length;

    expect(await startFileReview(ctx, 42, "/src/app.ts")).toBe(false);
    expect(threads.calls).toHaveLength(callsAfterFirst);
  });

  it("is a no-op for untracked files and unknown PRs", async () => {
    expect(await startFileReview(ctx, 42, "/docs/guide.md")).toBe(false);
    expect(await startFileReview(ctx, 99, "/src/app.ts")).toBe(false);
    expect(threads.calls).toEqual([]);
  });
});

describe("approveFile", () => {
  it("closes the file thread and stores the summary", async () => {
    const state = await approveFile(ctx, 42, "src/app.ts", "Adds a cache layer");

    expect(threads.summary()).toEqual([
      "comment 101",
      "status 101 closed",
      "comment 500",
      "status 500 active",
      "comment 900",
      "status 900 active",
    ]);
    expect(state.files["/src/app.ts"].summary).toBe("Adds a cache layer");
    expect(store.load(42)).toEqual(state);
  });

  it("closes the folder thread when its last file is approved", async () => {
    await approveFile(ctx, 42, "/src/app.ts", "ok");
    const state = await approveFile(ctx, 42, "/src/util.ts", "ok");

    expect(state.folders.src.status).toBe("approved");
    expect(state.overallSummary.status).toBe("in-progress");
    expect(threads.summary().slice(-4)).toEqual([
      "comment 500",
      "status 500 closed",
      "comment 900",
      "status 900 active",
    ]);
  });

  it("throws for an untracked file without calling the API", async () => {
    await expect(approveFile(ctx, 42, "/docs/guide.md", "ok")).rejects.toThrow(FileNotInStateError);
    expect(threads.calls).toEqual([]);
  });
});

describe("requestChanges", () => {
  it("creates a line-anchored thread per suggestion and marks the file needs-work", async () => {
    const state = await requestChanges(ctx, 42, "src/app.ts", "Needs null checks", SUGGESTIONS);

    expect(threads.summary()).toEqual([
      "create /src/app.ts",
      "create /src/app.ts",
      "comment 101",
      "status 101 active",
      "comment 500",
      "status 500 active",
      "comment 900",
      "status 900 active",
    ]);
    expect(threads.calls[0]).toEqual({
      kind: "create",
      body: {
        content: "Handle the null case",
        threadContext: {
          filePath: "/src/app.ts",
          rightFileStart: { line: 10, offset: 1 },
          rightFileEnd: { line: 10, offset: 1 },
        },
      },
    });

    const entry = state.files["/src/app.ts"];
    expect(entry.status).toBe("needs-work");
    expect(entry.suggestions).toEqual([
      { threadId: 700, commentId: 7000, line: 10, endLine: 10, severity: "high", outOfScope: false, linkText: "line 10", content: "Handle the null case" },
      { threadId: 701, commentId: 7010, line: 20, endLine: 24, severity: "low", outOfScope: true, linkText: "lines 20 - 24", content: "Rename for clarity" },
    ]);
    expect(entry.previousSuggestions).toBeUndefined();
    expect(threads.commentFor(101)).toContain(`- [line 10](${BASE_URL}?discussionId=700&commentId=7000)`);
    expect(store.load(42).folders.src.status).toBe("in-progress");
  });

  it("rotates earlier suggestions once when a reviewed file is reviewed again", async () => {
    await requestChanges(ctx, 42, "/src/app.ts", "Needs null checks", SUGGESTIONS);
    const approved = await approveFile(ctx, 42, "/src/app.ts", "Fixed");

    expect(approved.files["/src/app.ts"].suggestions).toEqual([]);
    expect(approved.files["/src/app.ts"].previousSuggestions?.map((s) => s.threadId)).toEqual([700, 701]);

    const again = await requestChanges(ctx, 42, "/src/app.ts", "One more thing", [
      { line: 5, severity: "medium", content: "Add a test", linkText: "missing test" },
    ]);

    const entry = again.files["/src/app.ts"];
    expect(entry.previousSuggestions?.map((s) => s.threadId)).toEqual([700, 701]);
    expect(entry.suggestions.map((s) => [s.threadId, s.linkText])).toEqual([[702, "missing test"]]);
  });

  it("keeps the state consistent with sent comments when the cascade fails", async () => {
    threads.failOn = (call) => call.kind === "comment" && call.threadId === 500;

    await expect(requestChanges(ctx, 42, "/src/app.ts", "Needs null checks", SUGGESTIONS)).rejects.toThrow(
      "fake failure on comment",
    );

    const saved = store.load(42);
    expect(saved.files["/src/app.ts"].status).toBe("needs-work");
    expect(saved.files["/src/app.ts"].suggestions).toHaveLength(2);
    expect(saved.folders.src.status).toBe("in-progress");
  });

  it("creates no threads and saves nothing on a dry run", async () => {
    const state = await requestChanges({ ...ctx, dryRun: true }, 42, "/src/app.ts", "Needs null checks", SUGGESTIONS);

    expect(threads.calls.some((c) => c.kind === "create")).toBe(false);
    expect(state.files["/src/app.ts"].suggestions.map((s) => s.threadId)).toEqual([0, 0]);
    expect(store.load(42).files["/src/app.ts"].status).toBe("unreviewed");
  });
});

describe("setFileStatus", () => {
  it("validates the status before doing anything", async () => {
    await expect(setFileStatus(ctx, 42, "/src/app.ts", "done")).rejects.toThrow(InvalidStatusError);
    await expect(setFileStatus(ctx, 42, "/docs/guide.md", "approved")).rejects.toThrow(FileNotInStateError);
    expect(threads.calls).toEqual([]);
  });

  it("sets the file thread status to match", async () => {
    await setFileStatus(ctx, 42, "README.md", "in-progress");

    expect(threads.summary()).toEqual([
      "comment 103",
      "status 103 active",
      "comment 600",
      "status 600 active",
      "comment 900",
      "status 900 active",
    ]);
  });

  it("passes dry runs through to every call and leaves the state alone", async () => {
    await setFileStatus({ ...ctx, dryRun: true }, 42, "/src/app.ts", "approved");

    expect(threads.calls.every((c) => c.kind !== "create" && c.dryRun)).toBe(true);
    expect(threads.summary()[1]).toBe("status 101 closed");
    expect(store.load(42).files["/src/app.ts"].status).toBe("unreviewed");
  });

  it("records every status change in the history", async () => {
    const history = new StatusHistory(":memory:");
    try {
      await setFileStatus({ ...ctx, history }, 42, "/README.md", "approved");

      expect(history.forPr(42).map((r) => `${r.level} ${r.key} ${r.from}->${r.to}`)).toEqual([
        "overall overall unreviewed->in-progress",
        "folder root unreviewed->approved",
        "file /README.md unreviewed->approved",
      ]);
    } finally {
      history.close();
    }
  });

  it("updates the file gauge and cascade counter", async () => {
    const metrics = new ReviewMetrics();
    await setFileStatus({ ...ctx, metrics }, 42, "/README.md", "approved");

    const text = await metrics.render();
    expect(text).toContain("review_cascade_cascades_total 1");
    expect(text).toContain('review_cascade_files{status="approved"} 1');
    expect(text).toContain('review_cascade_files{status="unreviewed"} 2');
  });
});
