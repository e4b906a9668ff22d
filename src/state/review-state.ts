import { FileNotInStateError, InvalidStatusError } from "../errors.js";
import { REVIEW_STATUSES } from "../types.js";
import type { FileEntry, FolderEntry, ReviewState, ReviewStatus, SuggestionEntry, TerminalStatus } from "../types.js";

export const ROOT_FOLDER = "root";

const TERMINAL_STATUSES: ReadonlySet<ReviewStatus> = new Set<TerminalStatus>(["approved", "needs-work"]);

export function isReviewStatus(value: unknown): value is ReviewStatus {
  return REVIEW_STATUSES.some((status) => status === value);
}

export function parseReviewStatus(value: unknown): ReviewStatus {
  if (!isReviewStatus(value)) {
    throw new InvalidStatusError(value);
  }
  return value;
}

export function isTerminalStatus(status: ReviewStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

/** Prepend "/" when missing. Keys in `ReviewState.files` always go through this. */
export function normalizeFilePath(filePath: string): string {
  return filePath.startsWith("/") ? filePath : `/${filePath}`;
}

/**
 * Clean up a path as reported by git or the thread API: backslashes become
 * slashes and repeated leading slashes collapse to one. Returns null for
 * blank input.
 */
export function normalizeRepoPath(path: string | null | undefined): string | null {
  if (!path || !path.trim()) return null;
  const withoutLeading = path.trim().replace(/\\/g, "/").replace(/^\/+/, "");
  if (!withoutLeading) return null;
  return `/${withoutLeading}`;
}

/** Top-level folder of a repository path, or "root" for files at the root. */
export function getRootFolder(filePath: string): string {
  const relative = normalizeFilePath(filePath.replace(/\\/g, "/")).slice(1);
  const slash = relative.indexOf("/");
  if (slash <= 0) return ROOT_FOLDER;
  return relative.slice(0, slash);
}

export function getFileName(filePath: string): string {
  const segments = normalizeFilePath(filePath).split("/");
  return segments[segments.length - 1];
}

/**
 * Empty map for `ReviewState.folders`/`files`. Keys come from repository
 * paths, so it has no prototype: "__proto__" is stored like any other name.
 */
export function createEntryMap<T>(): Record<string, T> {
  return Object.create(null);
}

export function getFileEntry(state: ReviewState, filePath: string): FileEntry | undefined {
  return state.files[normalizeFilePath(filePath)];
}

export function getFolderEntry(state: ReviewState, folderName: string): FolderEntry | undefined {
  return Object.hasOwn(state.folders, folderName) ? state.folders[folderName] : undefined;
}

function requireFileEntry(state: ReviewState, filePath: string): FileEntry {
  const normalized = normalizeFilePath(filePath);
  const entry = state.files[normalized];
  if (!entry) {
    throw new FileNotInStateError(normalized);
  }
  return entry;
}

export interface FileStatusUpdate {
  summary?: string;
  suggestions?: SuggestionEntry[];
}

/**
 * Set a file's status and optionally replace its summary and suggestions.
 * The status is checked before anything is touched. Returns the same
 * state instance.
 */
export function updateFileStatus(
  state: ReviewState,
  filePath: string,
  status: string,
  update: FileStatusUpdate = {},
): ReviewState {
  const validStatus = parseReviewStatus(status);
  const entry = requireFileEntry(state, filePath);

  entry.status = validStatus;
  if (update.summary !== undefined) {
    entry.summary = update.summary;
  }
  if (update.suggestions !== undefined) {
    entry.suggestions = update.suggestions;
  }
  return state;
}

export function addSuggestionToFile(state: ReviewState, filePath: string, suggestion: SuggestionEntry): ReviewState {
  requireFileEntry(state, filePath).suggestions.push(suggestion);
  return state;
}

/**
 * Move a reviewed file's suggestions aside before it is reviewed again.
 *
 * Only terminal files rotate, and only once: when `previousSuggestions` is
 * already present (even as an empty list) a prior attempt rotated them and
 * the current `suggestions` may be threads that attempt created, so nothing
 * is touched.
 */
export function clearSuggestionsForReReview(state: ReviewState, filePath: string): ReviewState {
  const entry = requireFileEntry(state, filePath);

  if (!isTerminalStatus(entry.status)) return state;
  if (entry.previousSuggestions !== undefined) return state;

  entry.previousSuggestions = entry.suggestions;
  entry.suggestions = [];
  return state;
}

/** Count files per status, in enum order. */
export function countFilesByStatus(state: ReviewState): Record<ReviewStatus, number> {
  const counts: Record<ReviewStatus, number> = {
    unreviewed: 0,
    "in-progress": 0,
    approved: 0,
    "needs-work": 0,
  };
  for (const entry of Object.values(state.files)) {
    counts[entry.status]++;
  }
  return counts;
}
