import { describe, it, expect } from "vitest";
import { FolderNotInStateError } from "../errors.js";
import { makeState } from "../testing/fakes.js";
import type { ReviewStatus } from "../types.js";
import { aggregateStatuses, deriveFolderStatus, deriveOverallStatus } from "./derivation.js";

describe("aggregateStatuses", () => {
  const cases: Array<[ReviewStatus[], ReviewStatus]> = [
    [[], "unreviewed"],
    [["unreviewed", "unreviewed"], "unreviewed"],
    [["in-progress"], "in-progress"],
    [["needs-work"], "needs-work"],
    [["approved", "unreviewed"], "in-progress"],
    [["approved", "in-progress"], "in-progress"],
    [["needs-work", "unreviewed"], "in-progress"],
    [["approved", "needs-work"], "needs-work"],
    [["approved", "approved"], "approved"],
  ];

  it.each(cases)("%j -> %s", (statuses, expected) => {
    expect(aggregateStatuses(statuses)).toBe(expected);
  });
});

describe("deriveFolderStatus", () => {
  it("aggregates the folder's files", () => {
    const state = makeState();
    state.files["/src/app.ts"].status = "approved";
    state.files["/src/util.ts"].status = "needs-work";
    expect(deriveFolderStatus(state, "src")).toBe("needs-work");
    expect(deriveFolderStatus(state, "root")).toBe("unreviewed");
  });

  it("ignores listed paths that are not tracked", () => {
    const state = makeState();
    state.folders.src.files.push("/src/removed.ts");
    state.files["/src/app.ts"].status = "approved";
    state.files["/src/util.ts"].status = "approved";
    expect(deriveFolderStatus(state, "src")).toBe("approved");
  });

  it("throws for an unknown folder", () => {
    expect(() => deriveFolderStatus(makeState(), "docs")).toThrow(FolderNotInStateError);
  });
});

describe("deriveOverallStatus", () => {
  it("aggregates the stored folder statuses", () => {
    const state = makeState();
    state.folders.src.status = "approved";
    expect(deriveOverallStatus(state)).toBe("in-progress");
    state.folders.root.status = "approved";
    expect(deriveOverallStatus(state)).toBe("approved");
  });
});
