import { readFileSync, writeFileSync, mkdirSync, renameSync, existsSync } from "node:fs";
import { randomUUID } from "node:crypto";
import { dirname, join } from "node:path";
import { ReviewStateFormatError, ReviewStateNotFoundError } from "../errors.js";
import { SEVERITIES } from "../types.js";
import type { FileEntry, FolderEntry, OverallSummary, ReviewState, ReviewStatus, Severity, SuggestionEntry } from "../types.js";
import { createEntryMap, normalizeFilePath, parseReviewStatus } from "./review-state.js";

export const REVIEW_STATE_DIR_PARTS = ["pull-request-review", "prompts"] as const;
export const REVIEW_STATE_FILENAME = "review-state.json";

/**
 * One JSON document per pull request under `<baseDir>/pull-request-review/prompts/<prId>/`.
 * Single writer only: there is no locking between processes.
 */
export class ReviewStateStore {
  constructor(private readonly baseDir: string) {}

  filePath(prId: number): string {
    return join(this.baseDir, ...REVIEW_STATE_DIR_PARTS, String(prId), REVIEW_STATE_FILENAME);
  }

  exists(prId: number): boolean {
    return existsSync(this.filePath(prId));
  }

  /** Throws ReviewStateNotFoundError when the PR has never been scaffolded. */
  load(prId: number): ReviewState {
    const filePath = this.filePath(prId);
    let raw: string;
    try {
      raw = readFileSync(filePath, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        throw new ReviewStateNotFoundError(prId, filePath);
      }
      throw err;
    }
    return parseReviewState(raw, filePath);
  }

  save(state: ReviewState): void {
    const filePath = this.filePath(state.prId);
    const dir = dirname(filePath);
    mkdirSync(dir, { recursive: true });

    // Write to a temp file then rename over the target
    const tmpPath = join(dir, `.review-state-${randomUUID()}.tmp`);
    writeFileSync(tmpPath, JSON.stringify(serializeReviewState(state), null, 2), "utf-8");
    renameSync(tmpPath, filePath);
  }
}

export function parseReviewState(raw: string, source: string = "review state"): ReviewState {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ReviewStateFormatError(`Review state is not valid JSON (${source})`, err);
  }
  return deserializeReviewState(parsed);
}

// --- Serialization ---

function serializeSuggestion(s: SuggestionEntry): SuggestionEntry {
  return {
    threadId: s.threadId,
    commentId: s.commentId,
    line: s.line,
    endLine: s.endLine,
    severity: s.severity,
    outOfScope: s.outOfScope,
    linkText: s.linkText,
    content: s.content,
  };
}

function serializeFile(f: FileEntry): FileEntry {
  const out: FileEntry = {
    threadId: f.threadId,
    commentId: f.commentId,
    folder: f.folder,
    fileName: f.fileName,
    status: f.status,
    summary: f.summary,
    changeTrackingId: f.changeTrackingId,
    suggestions: f.suggestions.map(serializeSuggestion),
  };
  if (f.previousSuggestions !== undefined) {
    out.previousSuggestions = f.previousSuggestions.map(serializeSuggestion);
  }
  return out;
}

export function serializeReviewState(state: ReviewState): ReviewState {
  const folders = createEntryMap<FolderEntry>();
  for (const [name, folder] of Object.entries(state.folders)) {
    folders[name] = {
      threadId: folder.threadId,
      commentId: folder.commentId,
      status: folder.status,
      files: [...folder.files],
    };
  }

  const files = createEntryMap<FileEntry>();
  for (const [path, file] of Object.entries(state.files)) {
    files[path] = serializeFile(file);
  }

  return {
    prId: state.prId,
    repoId: state.repoId,
    repoName: state.repoName,
    project: state.project,
    organization: state.organization,
    latestIterationId: state.latestIterationId,
    scaffoldedUtc: state.scaffoldedUtc,
    overallSummary: {
      threadId: state.overallSummary.threadId,
      commentId: state.overallSummary.commentId,
      status: state.overallSummary.status,
    },
    folders,
    files,
  };
}

// --- Deserialization ---

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asObject(value: unknown, where: string): JsonObject {
  if (!isObject(value)) {
    throw new ReviewStateFormatError(`${where}: expected an object`);
  }
  return value;
}

function asArray(value: unknown, where: string): unknown[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new ReviewStateFormatError(`${where}: expected an array`);
  }
  return value;
}

function num(obj: JsonObject, key: string, where: string): number {
  const value = obj[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ReviewStateFormatError(`${where}.${key}: expected a number`);
  }
  return value;
}

function str(obj: JsonObject, key: string, where: string): string {
  const value = obj[key];
  if (typeof value !== "string") {
    throw new ReviewStateFormatError(`${where}.${key}: expected a string`);
  }
  return value;
}

function status(obj: JsonObject): ReviewStatus {
  const value = obj.status;
  return value === undefined ? "unreviewed" : parseReviewStatus(value);
}

function severity(obj: JsonObject, where: string): Severity {
  const value = obj.severity;
  const match = SEVERITIES.find((s) => s === value);
  if (!match) {
    throw new ReviewStateFormatError(`${where}.severity: expected one of ${SEVERITIES.join(", ")}`);
  }
  return match;
}

function deserializeSuggestion(value: unknown, where: string): SuggestionEntry {
  const obj = asObject(value, where);
  return {
    threadId: num(obj, "threadId", where),
    commentId: num(obj, "commentId", where),
    line: num(obj, "line", where),
    endLine: num(obj, "endLine", where),
    severity: severity(obj, where),
    outOfScope: obj.outOfScope === true,
    linkText: str(obj, "linkText", where),
    content: str(obj, "content", where),
  };
}

function deserializeSuggestions(value: unknown, where: string): SuggestionEntry[] {
  return asArray(value, where).map((s, i) => deserializeSuggestion(s, `${where}[${i}]`));
}

function deserializeFile(value: unknown, where: string): FileEntry {
  const obj = asObject(value, where);
  const summary = obj.summary;
  const changeTrackingId = obj.changeTrackingId;

  const entry: FileEntry = {
    threadId: num(obj, "threadId", where),
    commentId: num(obj, "commentId", where),
    folder: str(obj, "folder", where),
    fileName: str(obj, "fileName", where),
    status: status(obj),
    summary: typeof summary === "string" ? summary : null,
    changeTrackingId: typeof changeTrackingId === "number" ? changeTrackingId : null,
    suggestions: deserializeSuggestions(obj.suggestions, `${where}.suggestions`),
  };
  // null and missing both mean "never rotated"
  if (obj.previousSuggestions !== undefined && obj.previousSuggestions !== null) {
    entry.previousSuggestions = deserializeSuggestions(obj.previousSuggestions, `${where}.previousSuggestions`);
  }
  return entry;
}

function deserializeFolder(value: unknown, where: string): FolderEntry {
  const obj = asObject(value, where);
  return {
    threadId: num(obj, "threadId", where),
    commentId: num(obj, "commentId", where),
    status: status(obj),
    files: asArray(obj.files, `${where}.files`).map((f, i) => {
      if (typeof f !== "string") {
        throw new ReviewStateFormatError(`${where}.files[${i}]: expected a string`);
      }
      return normalizeFilePath(f);
    }),
  };
}

function deserializeOverall(value: unknown): OverallSummary {
  const obj = asObject(value, "overallSummary");
  return {
    threadId: num(obj, "threadId", "overallSummary"),
    commentId: num(obj, "commentId", "overallSummary"),
    status: status(obj),
  };
}

/** Validate a parsed document and normalize every file path in it. */
export function deserializeReviewState(value: unknown): ReviewState {
  const obj = asObject(value, "reviewState");

  const folders = createEntryMap<FolderEntry>();
  for (const [name, folder] of Object.entries(asObject(obj.folders ?? {}, "folders"))) {
    folders[name] = deserializeFolder(folder, `folders[${name}]`);
  }

  const files = createEntryMap<FileEntry>();
  for (const [path, file] of Object.entries(asObject(obj.files ?? {}, "files"))) {
    files[normalizeFilePath(path)] = deserializeFile(file, `files[${path}]`);
  }

  return {
    prId: num(obj, "prId", "reviewState"),
    repoId: str(obj, "repoId", "reviewState"),
    repoName: str(obj, "repoName", "reviewState"),
    project: str(obj, "project", "reviewState"),
    organization: str(obj, "organization", "reviewState"),
    latestIterationId: num(obj, "latestIterationId", "reviewState"),
    scaffoldedUtc: str(obj, "scaffoldedUtc", "reviewState"),
    overallSummary: deserializeOverall(obj.overallSummary),
    folders,
    files,
  };
}
