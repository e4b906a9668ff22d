import { buildDiscussionUrl } from "../azure/urls.js";
import { ROOT_FOLDER } from "../state/review-state.js";
import { SEVERITIES } from "../types.js";
import type { FileEntry, FolderEntry, ReviewState, ReviewStatus, Severity, SuggestionEntry } from "../types.js";

const STATUS_DISPLAY: Record<ReviewStatus, string> = {
  unreviewed: "Unreviewed",
  "in-progress": "In Progress",
  approved: "Approved",
  "needs-work": "Needs Work",
};

const SEVERITY_LABELS: Record<Severity, string> = {
  high: "Must Fix (High)",
  medium: "Should Fix (Medium)",
  low: "Could Fix (Low)",
};

// Section order in folder and overall summaries
const SECTION_ORDER: ReviewStatus[] = ["needs-work", "approved", "in-progress", "unreviewed"];

export function statusDisplay(status: ReviewStatus): string {
  return STATUS_DISPLAY[status];
}

/** e.g. "/src/app.ts"; root-level files render as "/app.ts". */
export function fileDisplayPath(entry: FileEntry): string {
  if (!entry.folder || entry.folder.toLowerCase() === ROOT_FOLDER) {
    return `/${entry.fileName}`;
  }
  return `/${entry.folder}/${entry.fileName}`;
}

/** "2 High, 1 Medium"; empty when there are no suggestions. */
export function formatSeverityCounts(suggestions: SuggestionEntry[]): string {
  const counts: Record<Severity, number> = { high: 0, medium: 0, low: 0 };
  for (const s of suggestions) {
    counts[s.severity]++;
  }
  return SEVERITIES
    .filter((sev) => counts[sev] > 0)
    .map((sev) => `${counts[sev]} ${sev.charAt(0).toUpperCase()}${sev.slice(1)}`)
    .join(", ");
}

function groupBySeverity(suggestions: SuggestionEntry[]): Array<[Severity, SuggestionEntry[]]> {
  const grouped = new Map<Severity, SuggestionEntry[]>();
  for (const s of suggestions) {
    const group = grouped.get(s.severity);
    if (group) {
      group.push(s);
    } else {
      grouped.set(s.severity, [s]);
    }
  }
  const result: Array<[Severity, SuggestionEntry[]]> = [];
  for (const sev of SEVERITIES) {
    const group = grouped.get(sev);
    if (group) result.push([sev, group]);
  }
  return result;
}

export function renderFileSummary(entry: FileEntry, suggestions: SuggestionEntry[], baseUrl: string): string {
  const parts: string[] = [
    `## File Review Summary: ${entry.fileName}`,
    "",
    `*Complete Path:* ${fileDisplayPath(entry)}`,
    "",
    `*Status:* ${statusDisplay(entry.status)}`,
    "",
    "### Summary of Changes",
  ];

  switch (entry.status) {
    case "unreviewed":
      parts.push("Awaiting review...", "", "### Suggestions", "Awaiting review...");
      break;
    case "in-progress":
      parts.push("Review in progress...", "", "### Suggestions", "Review in progress...");
      break;
    case "approved":
      parts.push(entry.summary ?? "", "", "### Suggestions", "- None");
      break;
    case "needs-work":
      parts.push(entry.summary ?? "", "", "### Suggestions");
      for (const [sev, group] of groupBySeverity(suggestions)) {
        parts.push("", `#### ${SEVERITY_LABELS[sev]}`);
        for (const s of group) {
          const outOfScope = s.outOfScope ? " *(out of scope)*" : "";
          parts.push(`- [${s.linkText}](${buildDiscussionUrl(baseUrl, s.threadId, s.commentId)})${outOfScope}`);
        }
      }
      break;
  }

  return parts.join("\n");
}

export function renderFolderSummary(
  folderName: string,
  folder: FolderEntry,
  files: Record<string, FileEntry>,
  baseUrl: string,
): string {
  const byStatus = new Map<ReviewStatus, FileEntry[]>();
  for (const path of folder.files) {
    const entry = files[path];
    if (!entry) continue;
    const group = byStatus.get(entry.status) ?? [];
    group.push(entry);
    byStatus.set(entry.status, group);
  }

  const parts: string[] = [
    `## Folder Review Summary: ${folderName}`,
    "",
    `*Status:* ${statusDisplay(folder.status)}`,
  ];

  for (const status of SECTION_ORDER) {
    const entries = byStatus.get(status);
    if (!entries) continue;
    parts.push("", `### ${statusDisplay(status)}`);
    for (const entry of entries) {
      let item = `[${fileDisplayPath(entry)}](${buildDiscussionUrl(baseUrl, entry.threadId, entry.commentId)})`;
      if (status === "needs-work") {
        const counts = formatSeverityCounts(entry.suggestions);
        if (counts) item += ` — ${counts}`;
      }
      parts.push(`- ${item}`);
    }
  }

  return parts.join("\n");
}

export function renderOverallSummary(state: ReviewState, baseUrl: string): string {
  const byStatus = new Map<ReviewStatus, string[]>();
  for (const [name, folder] of Object.entries(state.folders)) {
    const group = byStatus.get(folder.status) ?? [];
    group.push(name);
    byStatus.set(folder.status, group);
  }

  const parts: string[] = [
    "## Overall PR Review Summary",
    "",
    `*Status:* ${statusDisplay(state.overallSummary.status)}`,
  ];

  for (const status of SECTION_ORDER) {
    const names = byStatus.get(status);
    if (!names) continue;
    parts.push("", `### ${statusDisplay(status)}`);
    for (const name of names) {
      const folder = state.folders[name];
      parts.push(`- [${name}](${buildDiscussionUrl(baseUrl, folder.threadId, folder.commentId)})`);
    }
  }

  return parts.join("\n");
}
