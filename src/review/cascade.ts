import type { ThreadsApi } from "../azure/threads.js";
import { FileNotInStateError, FolderNotInStateError } from "../errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { getFolderEntry, normalizeFilePath } from "../state/review-state.js";
import type { PatchOperation, ReviewState, ReviewStatus, StatusTransition, ThreadStatus } from "../types.js";
import { deriveFolderStatus, deriveOverallStatus } from "./derivation.js";
import { renderFolderSummary, renderOverallSummary } from "./templates.js";

export const THREAD_STATUS_BY_REVIEW_STATUS: Record<ReviewStatus, ThreadStatus> = {
  unreviewed: "active",
  "in-progress": "active",
  approved: "closed",
  "needs-work": "active",
};

export function threadStatusFor(status: ReviewStatus): ThreadStatus {
  return THREAD_STATUS_BY_REVIEW_STATUS[status];
}

export interface CascadeResult {
  operations: PatchOperation[];
  /** Derived status changes written into the state; unchanged levels are left out. */
  transitions: StatusTransition[];
}

/**
 * Recompute the owning folder and the overall status after one file changed,
 * write both into `state`, and return the folder update followed by the
 * overall update. Nothing is sent; see executeCascade.
 */
export function cascadeStatusUpdate(state: ReviewState, filePath: string, baseUrl: string): PatchOperation[] {
  return cascadeWithTransitions(state, filePath, baseUrl).operations;
}

export function cascadeWithTransitions(state: ReviewState, filePath: string, baseUrl: string): CascadeResult {
  const normalized = normalizeFilePath(filePath);
  const fileEntry = state.files[normalized];
  if (!fileEntry) {
    throw new FileNotInStateError(normalized);
  }

  const folderName = fileEntry.folder;
  const folder = getFolderEntry(state, folderName);
  if (!folder) {
    throw new FolderNotInStateError(folderName);
  }

  const transitions: StatusTransition[] = [];

  const folderStatus = deriveFolderStatus(state, folderName);
  if (folder.status !== folderStatus) {
    transitions.push({ prId: state.prId, level: "folder", key: folderName, from: folder.status, to: folderStatus });
  }
  folder.status = folderStatus;

  const overallStatus = deriveOverallStatus(state);
  if (state.overallSummary.status !== overallStatus) {
    transitions.push({ prId: state.prId, level: "overall", key: "overall", from: state.overallSummary.status, to: overallStatus });
  }
  state.overallSummary.status = overallStatus;

  const operations: PatchOperation[] = [
    {
      threadId: folder.threadId,
      commentId: folder.commentId,
      newContent: renderFolderSummary(folderName, folder, state.files, baseUrl),
      threadStatus: threadStatusFor(folderStatus),
    },
    {
      threadId: state.overallSummary.threadId,
      commentId: state.overallSummary.commentId,
      newContent: renderOverallSummary(state, baseUrl),
      threadStatus: threadStatusFor(overallStatus),
    },
  ];

  return { operations, transitions };
}

export interface ExecuteCascadeOptions {
  dryRun?: boolean;
  logger?: Logger;
}

/** For each operation in order: content first, then thread status. */
export async function executeCascade(
  operations: PatchOperation[],
  threads: ThreadsApi,
  opts: ExecuteCascadeOptions = {},
): Promise<void> {
  const dryRun = opts.dryRun ?? false;
  const logger = opts.logger ?? silentLogger;

  for (const op of operations) {
    await threads.patchComment(op.threadId, op.commentId, op.newContent, { dryRun });
    await threads.patchThreadStatus(op.threadId, op.threadStatus, { dryRun });
    logger.debug("Applied cascade operation", { threadId: op.threadId, status: op.threadStatus, dryRun });
  }
}
