// --- Configuration ---

export interface AzureDevOpsConfig {
  organization: string;
  project: string;
  repository: string;
  token: string;
  requestTimeoutMs: number;
}

export interface StateConfig {
  dir: string;
}

export interface HistoryConfig {
  enabled: boolean;
  dbPath: string;
  retentionDays: number;
}

export interface MetricsConfig {
  textfilePath: string;
}

export interface AppConfig {
  azureDevOps: AzureDevOpsConfig;
  state: StateConfig;
  history: HistoryConfig;
  metrics: MetricsConfig;
  dryRun: boolean;
}

// --- Review status ---

export const REVIEW_STATUSES = ["unreviewed", "in-progress", "approved", "needs-work"] as const;

export type ReviewStatus = (typeof REVIEW_STATUSES)[number];

/** Statuses that count as "review complete" for aggregation. */
export type TerminalStatus = Extract<ReviewStatus, "approved" | "needs-work">;

export type ThreadStatus = "active" | "closed";

export const SEVERITIES = ["high", "medium", "low"] as const;

export type Severity = (typeof SEVERITIES)[number];

// --- Review state document ---

export interface SuggestionEntry {
  threadId: number;
  commentId: number;
  line: number;
  endLine: number;
  severity: Severity;
  outOfScope: boolean;
  linkText: string;
  content: string;
}

export interface FileEntry {
  threadId: number;
  commentId: number;
  folder: string;
  fileName: string;
  status: ReviewStatus;
  summary: string | null;
  changeTrackingId: number | null;
  suggestions: SuggestionEntry[];
  // Absent until the first re-review rotation; [] means rotated with nothing to keep
  previousSuggestions?: SuggestionEntry[];
}

export interface FolderEntry {
  threadId: number;
  commentId: number;
  status: ReviewStatus;
  files: string[];
}

export interface OverallSummary {
  threadId: number;
  commentId: number;
  status: ReviewStatus;
}

export interface ReviewState {
  prId: number;
  repoId: string;
  repoName: string;
  project: string;
  organization: string;
  latestIterationId: number;
  scaffoldedUtc: string;
  overallSummary: OverallSummary;
  folders: Record<string, FolderEntry>; // folder name -> entry
  files: Record<string, FileEntry>; // "/normalized/path" -> entry
}

// --- Thread API ---

export interface ThreadContext {
  filePath: string;
  rightFileStart?: { line: number; offset: number };
  rightFileEnd?: { line: number; offset: number };
}

export interface ThreadCreateBody {
  content: string;
  threadContext?: ThreadContext;
}

export interface CreatedThread {
  threadId: number;
  commentId: number;
}

export interface DryRunOption {
  dryRun?: boolean;
}

// --- Cascade ---

export interface PatchOperation {
  threadId: number;
  commentId: number;
  newContent: string;
  threadStatus: ThreadStatus;
}

// --- History ---

export type HistoryLevel = "file" | "folder" | "overall";

export interface StatusTransition {
  prId: number;
  level: HistoryLevel;
  key: string;
  from: ReviewStatus;
  to: ReviewStatus;
}
