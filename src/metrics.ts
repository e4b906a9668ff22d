import { Registry, Counter, Gauge } from "prom-client";
import { REVIEW_STATUSES } from "./types.js";
import type { ReviewState, ThreadStatus } from "./types.js";
import { countFilesByStatus } from "./state/review-state.js";

export type ThreadLevel = "file" | "folder" | "overall" | "suggestion";

/**
 * Prometheus counters for thread API traffic. A CLI run is short-lived, so
 * the exposition text is written to a textfile for node_exporter to pick up
 * rather than served.
 */
export class ReviewMetrics {
  readonly registry: Registry;

  private threadsCreated: Counter<"level">;
  private commentPatches: Counter;
  private statusPatches: Counter<"status">;
  private cascades: Counter;
  private files: Gauge<"status">;

  constructor() {
    this.registry = new Registry();

    this.threadsCreated = new Counter({
      name: "review_cascade_threads_created_total",
      help: "Discussion threads created",
      labelNames: ["level"],
      registers: [this.registry],
    });

    this.commentPatches = new Counter({
      name: "review_cascade_comment_patches_total",
      help: "Comment content updates sent",
      registers: [this.registry],
    });

    this.statusPatches = new Counter({
      name: "review_cascade_status_patches_total",
      help: "Thread status updates sent",
      labelNames: ["status"],
      registers: [this.registry],
    });

    this.cascades = new Counter({
      name: "review_cascade_cascades_total",
      help: "Folder/overall cascades computed",
      registers: [this.registry],
    });

    this.files = new Gauge({
      name: "review_cascade_files",
      help: "Files in the last observed review state by status",
      labelNames: ["status"],
      registers: [this.registry],
    });
  }

  threadCreated(level: ThreadLevel): void {
    this.threadsCreated.inc({ level });
  }

  commentPatched(): void {
    this.commentPatches.inc();
  }

  statusPatched(status: ThreadStatus): void {
    this.statusPatches.inc({ status });
  }

  cascadeComputed(): void {
    this.cascades.inc();
  }

  observeState(state: ReviewState): void {
    const counts = countFilesByStatus(state);
    for (const status of REVIEW_STATUSES) {
      this.files.set({ status }, counts[status]);
    }
  }

  async render(): Promise<string> {
    return this.registry.metrics();
  }
}
