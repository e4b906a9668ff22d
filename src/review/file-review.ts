import type { ThreadsApi } from "../azure/threads.js";
import { buildThreadContext } from "../azure/threads.js";
import { FileNotInStateError, ReviewStateNotFoundError } from "../errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type { ReviewMetrics } from "../metrics.js";
import type { StatusHistory } from "../state/history.js";
import {
  clearSuggestionsForReReview,
  getFileEntry,
  normalizeFilePath,
  parseReviewStatus,
  updateFileStatus,
} from "../state/review-state.js";
import type { ReviewStateStore } from "../state/store.js";
import type { ReviewState, ReviewStatus, Severity, StatusTransition, SuggestionEntry, ThreadStatus } from "../types.js";
import { cascadeWithTransitions, executeCascade, threadStatusFor } from "./cascade.js";
import { renderFileSummary } from "./templates.js";

export interface FileReviewContext {
  store: ReviewStateStore;
  threads: ThreadsApi;
  baseUrl: string;
  dryRun?: boolean;
  logger?: Logger;
  metrics?: ReviewMetrics;
  history?: StatusHistory;
}

export interface SuggestionInput {
  line: number;
  endLine?: number;
  severity: Severity;
  content: string;
  outOfScope?: boolean;
  linkText?: string;
}

/** Custom text wins; otherwise "line 12" or "lines 12 - 18". */
export function suggestionLinkText(s: SuggestionInput): string {
  if (s.linkText) return s.linkText;
  const endLine = s.endLine ?? s.line;
  return endLine !== s.line ? `lines ${s.line} - ${endLine}` : `line ${s.line}`;
}

interface FileChange {
  path: string;
  previous: ReviewStatus;
  /** Omit to leave the file thread's status as it is. */
  fileThreadStatus?: ThreadStatus;
}

/**
 * Push an already-applied file change out: file comment (and optionally its
 * thread status), then the folder/overall cascade. The state is saved even
 * when the cascade fails so it matches the file comment already sent; dry
 * runs never save.
 */
async function publishFileChange(ctx: FileReviewContext, state: ReviewState, change: FileChange): Promise<void> {
  const dryRun = ctx.dryRun ?? false;
  const logger = (ctx.logger ?? silentLogger).child({ prId: state.prId, path: change.path });
  const entry = state.files[change.path];

  await ctx.threads.patchComment(
    entry.threadId,
    entry.commentId,
    renderFileSummary(entry, entry.suggestions, ctx.baseUrl),
    { dryRun },
  );
  if (change.fileThreadStatus) {
    await ctx.threads.patchThreadStatus(entry.threadId, change.fileThreadStatus, { dryRun });
  }

  const transitions: StatusTransition[] = [];
  if (change.previous !== entry.status) {
    transitions.push({ prId: state.prId, level: "file", key: change.path, from: change.previous, to: entry.status });
  }

  try {
    const cascade = cascadeWithTransitions(state, change.path, ctx.baseUrl);
    ctx.metrics?.cascadeComputed();
    transitions.push(...cascade.transitions);
    await executeCascade(cascade.operations, ctx.threads, { dryRun, logger });
  } finally {
    if (!dryRun) {
      ctx.store.save(state);
      ctx.history?.recordMany(transitions);
    }
    ctx.metrics?.observeState(state);
  }

  logger.info("File review published", {
    status: entry.status,
    folderStatus: state.folders[entry.folder]?.status,
    overallStatus: state.overallSummary.status,
    dryRun,
  });
}

function requireTrackedFile(state: ReviewState, filePath: string): { path: string; previous: ReviewStatus } {
  const path = normalizeFilePath(filePath);
  const entry = getFileEntry(state, path);
  if (!entry) {
    throw new FileNotInStateError(path);
  }
  return { path, previous: entry.status };
}

/**
 * Move an unreviewed file to in-progress when its review starts. Any other
 * status, a PR that was never scaffolded, or an untracked file is a no-op;
 * returns whether anything changed.
 */
export async function startFileReview(ctx: FileReviewContext, prId: number, filePath: string): Promise<boolean> {
  let state: ReviewState;
  try {
    state = ctx.store.load(prId);
  } catch (err) {
    if (err instanceof ReviewStateNotFoundError) return false;
    throw err;
  }

  const entry = getFileEntry(state, filePath);
  if (!entry || entry.status !== "unreviewed") return false;

  const path = normalizeFilePath(filePath);
  updateFileStatus(state, path, "in-progress");
  await publishFileChange(ctx, state, { path, previous: "unreviewed" });
  return true;
}

export async function approveFile(
  ctx: FileReviewContext,
  prId: number,
  filePath: string,
  summary: string,
): Promise<ReviewState> {
  const state = ctx.store.load(prId);
  const { path, previous } = requireTrackedFile(state, filePath);

  clearSuggestionsForReReview(state, path);
  updateFileStatus(state, path, "approved", { summary });
  await publishFileChange(ctx, state, { path, previous, fileThreadStatus: threadStatusFor("approved") });
  return state;
}

/**
 * Post one line-anchored thread per suggestion, then mark the file
 * needs-work with the new suggestions. Earlier suggestions of a reviewed
 * file are rotated into `previousSuggestions` and saved before any thread
 * is created, so a retry after a failed post does not rotate again.
 */
export async function requestChanges(
  ctx: FileReviewContext,
  prId: number,
  filePath: string,
  summary: string,
  suggestions: SuggestionInput[],
): Promise<ReviewState> {
  const dryRun = ctx.dryRun ?? false;
  const state = ctx.store.load(prId);
  const { path, previous } = requireTrackedFile(state, filePath);

  clearSuggestionsForReReview(state, path);
  if (!dryRun) {
    ctx.store.save(state);
  }

  const entries: SuggestionEntry[] = [];
  for (const s of suggestions) {
    const endLine = s.endLine ?? s.line;
    const linkText = suggestionLinkText(s);
    let threadId = 0;
    let commentId = 0;
    if (dryRun) {
      (ctx.logger ?? silentLogger).info("[DRY RUN] Would create suggestion thread", { prId, path, linkText });
    } else {
      const created = await ctx.threads.createThread({
        content: s.content,
        threadContext: buildThreadContext(path, s.line, endLine),
      });
      ctx.metrics?.threadCreated("suggestion");
      threadId = created.threadId;
      commentId = created.commentId;
    }
    entries.push({
      threadId,
      commentId,
      line: s.line,
      endLine,
      severity: s.severity,
      outOfScope: s.outOfScope ?? false,
      linkText,
      content: s.content,
    });
  }

  updateFileStatus(state, path, "needs-work", { summary, suggestions: entries });
  await publishFileChange(ctx, state, { path, previous, fileThreadStatus: threadStatusFor("needs-work") });
  return state;
}

/**
 * Set a file to any status. The raw value is validated before the state is
 * loaded or any call is made.
 */
export async function setFileStatus(
  ctx: FileReviewContext,
  prId: number,
  filePath: string,
  rawStatus: string,
): Promise<ReviewState> {
  const status = parseReviewStatus(rawStatus);
  const state = ctx.store.load(prId);
  const { path, previous } = requireTrackedFile(state, filePath);

  updateFileStatus(state, path, status);
  await publishFileChange(ctx, state, { path, previous, fileThreadStatus: threadStatusFor(status) });
  return state;
}
