import { FolderNotInStateError } from "../errors.js";
import { getFolderEntry, isTerminalStatus } from "../state/review-state.js";
import type { ReviewState, ReviewStatus } from "../types.js";

/**
 * Aggregate child statuses into a parent status. Rules apply in order:
 *
 * 1. no children, or every child unreviewed → unreviewed
 * 2. anything started but not everything terminal → in-progress
 * 3. everything terminal, any needs-work → needs-work
 * 4. everything terminal → approved
 */
export function aggregateStatuses(statuses: readonly ReviewStatus[]): ReviewStatus {
  if (statuses.every((s) => s === "unreviewed")) return "unreviewed";
  if (!statuses.every(isTerminalStatus)) return "in-progress";
  if (statuses.includes("needs-work")) return "needs-work";
  return "approved";
}

/** Paths listed on the folder but missing from `state.files` are ignored. */
export function deriveFolderStatus(state: ReviewState, folderName: string): ReviewStatus {
  const folder = getFolderEntry(state, folderName);
  if (!folder) {
    throw new FolderNotInStateError(folderName);
  }

  const statuses: ReviewStatus[] = [];
  for (const path of folder.files) {
    const entry = state.files[path];
    if (entry) statuses.push(entry.status);
  }
  return aggregateStatuses(statuses);
}

export function deriveOverallStatus(state: ReviewState): ReviewStatus {
  return aggregateStatuses(Object.values(state.folders).map((f) => f.status));
}
