import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { HistoryLevel, ReviewStatus, StatusTransition } from "../types.js";
import { isReviewStatus } from "./review-state.js";

export interface HistoryRecord extends StatusTransition {
  id: number;
  recordedAt: string;
}

interface HistoryRow {
  id: number;
  recorded_at: string;
  pr_id: number;
  level: string;
  key: string;
  from_status: string;
  to_status: string;
}

const MS_PER_DAY = 24 * 60 * 60 * 1000;

function isHistoryLevel(value: string): value is HistoryLevel {
  return value === "file" || value === "folder" || value === "overall";
}

function toRecord(row: HistoryRow): HistoryRecord | null {
  if (!isHistoryLevel(row.level) || !isReviewStatus(row.from_status) || !isReviewStatus(row.to_status)) {
    return null;
  }
  return {
    id: row.id,
    recordedAt: row.recorded_at,
    prId: row.pr_id,
    level: row.level,
    key: row.key,
    from: row.from_status,
    to: row.to_status,
  };
}

/** Append-only log of review status transitions, one row per change. */
export class StatusHistory {
  private db: Database.Database;
  private insertStmt: Database.Statement<[string, number, string, string, ReviewStatus, ReviewStatus]>;
  private forPrStmt: Database.Statement<[number], HistoryRow>;
  private pruneStmt: Database.Statement<[string]>;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      mkdirSync(dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 5000");

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS status_transitions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        recorded_at TEXT NOT NULL,
        pr_id INTEGER NOT NULL,
        level TEXT NOT NULL,
        key TEXT NOT NULL,
        from_status TEXT NOT NULL,
        to_status TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_transitions_pr ON status_transitions(pr_id);
      CREATE INDEX IF NOT EXISTS idx_transitions_recorded ON status_transitions(recorded_at);
    `);

    this.insertStmt = this.db.prepare<[string, number, string, string, ReviewStatus, ReviewStatus]>(`
      INSERT INTO status_transitions (recorded_at, pr_id, level, key, from_status, to_status)
      VALUES (?, ?, ?, ?, ?, ?)
    `);

    this.forPrStmt = this.db.prepare<[number], HistoryRow>(`
      SELECT id, recorded_at, pr_id, level, key, from_status, to_status
      FROM status_transitions WHERE pr_id = ? ORDER BY id DESC
    `);

    this.pruneStmt = this.db.prepare<[string]>(`DELETE FROM status_transitions WHERE recorded_at < ?`);
  }

  /** No-op when the status did not change. */
  record(transition: StatusTransition, at: Date = new Date()): void {
    if (transition.from === transition.to) return;
    this.insertStmt.run(
      at.toISOString(),
      transition.prId,
      transition.level,
      transition.key,
      transition.from,
      transition.to,
    );
  }

  recordMany(transitions: StatusTransition[], at: Date = new Date()): void {
    const insertAll = this.db.transaction((items: StatusTransition[]) => {
      for (const t of items) this.record(t, at);
    });
    insertAll(transitions);
  }

  /** Newest first. Rows with values outside the known enums are skipped. */
  forPr(prId: number): HistoryRecord[] {
    const records: HistoryRecord[] = [];
    for (const row of this.forPrStmt.all(prId)) {
      const record = toRecord(row);
      if (record) records.push(record);
    }
    return records;
  }

  /** Delete rows older than `retentionDays`; returns how many were removed. */
  prune(retentionDays: number, now: Date = new Date()): number {
    const cutoff = new Date(now.getTime() - retentionDays * MS_PER_DAY).toISOString();
    return this.pruneStmt.run(cutoff).changes;
  }

  close(): void {
    this.db.close();
  }
}
