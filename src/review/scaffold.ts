import type { ThreadsApi } from "../azure/threads.js";
import { buildThreadContext } from "../azure/threads.js";
import { ReviewStateNotFoundError } from "../errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type { ReviewMetrics } from "../metrics.js";
import { createEntryMap, getFileName, getRootFolder, normalizeRepoPath } from "../state/review-state.js";
import type { ReviewStateStore } from "../state/store.js";
import type { FileEntry, FolderEntry, ReviewState } from "../types.js";
import { renderFileSummary, renderFolderSummary, renderOverallSummary } from "./templates.js";

export interface ScaffoldPlan {
  files: string[];
  /** folder name -> normalized paths, in first-seen order */
  folders: Map<string, string[]>;
  apiCalls: number;
}

export interface ScaffoldRequest {
  prId: number;
  files: string[];
  repoId: string;
  repoName: string;
  project: string;
  organization: string;
  latestIterationId: number;
  baseUrl: string;
  dryRun?: boolean;
}

export interface ScaffoldDeps {
  store: ReviewStateStore;
  threads: ThreadsApi;
  logger?: Logger;
  metrics?: ReviewMetrics;
  now?: () => Date;
}

/**
 * Group files by top-level folder. Backslashes become slashes, blank paths
 * are dropped and duplicates collapse to one.
 */
export function buildScaffoldPlan(files: string[]): ScaffoldPlan {
  const seen = new Set<string>();
  const normalizedFiles: string[] = [];
  const folders = new Map<string, string[]>();

  for (const file of files) {
    const normalized = normalizeRepoPath(file);
    if (!normalized || seen.has(normalized)) continue;
    seen.add(normalized);
    normalizedFiles.push(normalized);

    const folder = getRootFolder(normalized);
    const group = folders.get(folder);
    if (group) {
      group.push(normalized);
    } else {
      folders.set(folder, [normalized]);
    }
  }

  return {
    files: normalizedFiles,
    folders,
    apiCalls: normalizedFiles.length + folders.size + 1,
  };
}

/** Human-readable plan, one line per thread that would be created. */
export function describeScaffoldPlan(prId: number, plan: ScaffoldPlan): string[] {
  const lines = [`[DRY RUN] Scaffolding plan for PR ${prId}:`];
  for (const file of plan.files) {
    lines.push(`  [DRY RUN] Would create file summary thread for ${file}`);
  }
  for (const folder of plan.folders.keys()) {
    lines.push(`  [DRY RUN] Would create folder summary thread for ${folder}`);
  }
  lines.push("  [DRY RUN] Would create overall PR summary thread");
  lines.push(`  [DRY RUN] Total API calls: ${plan.apiCalls}`);
  return lines;
}

function loadExisting(store: ReviewStateStore, prId: number): ReviewState | null {
  try {
    return store.load(prId);
  } catch (err) {
    if (err instanceof ReviewStateNotFoundError) return null;
    throw err;
  }
}

/**
 * Create every summary thread for a PR before any file is reviewed:
 * one per file (anchored to the file), one per top-level folder and one
 * overall, N + F + 1 calls in total. State is saved after each of the three
 * phases.
 *
 * If a state document already exists it is returned untouched and no call is
 * made. A dry run logs the plan and returns null.
 */
export async function scaffoldReviewThreads(req: ScaffoldRequest, deps: ScaffoldDeps): Promise<ReviewState | null> {
  const logger = (deps.logger ?? silentLogger).child({ prId: req.prId });
  const { store, threads, metrics } = deps;

  const existing = loadExisting(store, req.prId);
  if (existing) {
    logger.info("Scaffolding already exists, skipping", { files: Object.keys(existing.files).length });
    return existing;
  }

  const plan = buildScaffoldPlan(req.files);

  if (req.dryRun) {
    for (const line of describeScaffoldPlan(req.prId, plan)) {
      logger.info(line, { dryRun: true });
    }
    return null;
  }

  const state: ReviewState = {
    prId: req.prId,
    repoId: req.repoId,
    repoName: req.repoName,
    project: req.project,
    organization: req.organization,
    latestIterationId: req.latestIterationId,
    scaffoldedUtc: (deps.now ?? (() => new Date()))().toISOString(),
    overallSummary: { threadId: 0, commentId: 0, status: "unreviewed" },
    folders: createEntryMap<FolderEntry>(),
    files: createEntryMap<FileEntry>(),
  };

  // Phase 1: file threads
  for (const path of plan.files) {
    const entry: FileEntry = {
      threadId: 0,
      commentId: 0,
      folder: getRootFolder(path),
      fileName: getFileName(path),
      status: "unreviewed",
      summary: null,
      changeTrackingId: null,
      suggestions: [],
    };
    logger.info("Creating file summary thread", { phase: "files", path });
    const created = await threads.createThread({
      content: renderFileSummary(entry, [], req.baseUrl),
      threadContext: buildThreadContext(path),
    });
    metrics?.threadCreated("file");
    state.files[path] = { ...entry, threadId: created.threadId, commentId: created.commentId };
  }
  store.save(state);

  // Phase 2: folder threads
  for (const [folderName, folderFiles] of plan.folders) {
    const entry: FolderEntry = { threadId: 0, commentId: 0, status: "unreviewed", files: folderFiles };
    logger.info("Creating folder summary thread", { phase: "folders", folder: folderName });
    const created = await threads.createThread({
      content: renderFolderSummary(folderName, entry, state.files, req.baseUrl),
    });
    metrics?.threadCreated("folder");
    state.folders[folderName] = { ...entry, threadId: created.threadId, commentId: created.commentId };
  }
  store.save(state);

  // Phase 3: overall thread
  logger.info("Creating overall PR summary thread", { phase: "overall" });
  const overall = await threads.createThread({ content: renderOverallSummary(state, req.baseUrl) });
  metrics?.threadCreated("overall");
  state.overallSummary = { threadId: overall.threadId, commentId: overall.commentId, status: "unreviewed" };
  store.save(state);

  logger.info("Scaffolding complete", { threads: plan.apiCalls });
  return state;
}
