import { readFileSync, writeFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { ThreadsApi, ThreadsClientOptions } from "./azure/threads.js";
import { AzureDevOpsThreadsClient } from "./azure/threads.js";
import { buildPrBaseUrl } from "./azure/urls.js";
import { loadConfig } from "./config.js";
import { ReviewCascadeError } from "./errors.js";
import type { Logger } from "./logger.js";
import { createRootLogger } from "./logger.js";
import { ReviewMetrics } from "./metrics.js";
import type { FileReviewContext, SuggestionInput } from "./review/file-review.js";
import { approveFile, requestChanges, setFileStatus, startFileReview } from "./review/file-review.js";
import { scaffoldReviewThreads } from "./review/scaffold.js";
import { StatusHistory } from "./state/history.js";
import { ReviewStateStore } from "./state/store.js";
import { SEVERITIES } from "./types.js";
import type { AppConfig, ReviewState } from "./types.js";

export const USAGE = `Usage: pr-review-cascade <command> [options]

Commands:
  scaffold         --pr <id> --files-json <path> --repo-id <id> [--repo-name <name>] [--iteration <n>]
  start            --pr <id> --file <path>
  approve          --pr <id> --file <path> --summary <text>
  request-changes  --pr <id> --file <path> --summary <text> --suggestions-json <path>
  set-status       --pr <id> --file <path> --status <unreviewed|in-progress|approved|needs-work>
  show             --pr <id>
  history          --pr <id>

Global options:
  --config <path>  Config file (default: config.yaml)
  --dry-run        Log API calls instead of sending them`;

export const COMMANDS = ["scaffold", "start", "approve", "request-changes", "set-status", "show", "history"] as const;

export type Command = (typeof COMMANDS)[number];

export interface ParsedArgs {
  command: Command;
  options: Map<string, string>;
  flags: Set<string>;
}

const FLAGS = new Set(["dry-run", "help"]);

export class UsageError extends ReviewCascadeError {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((c) => c === value);
}

export function parseArgv(argv: string[]): ParsedArgs {
  const [command, ...rest] = argv;
  if (!isCommand(command)) {
    throw new UsageError(command ? `Unknown command "${command}"` : "Missing command");
  }

  const options = new Map<string, string>();
  const flags = new Set<string>();
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (!arg.startsWith("--")) {
      throw new UsageError(`Unexpected argument "${arg}"`);
    }
    const name = arg.slice(2);
    if (FLAGS.has(name)) {
      flags.add(name);
      continue;
    }
    const value = rest[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new UsageError(`--${name} requires a value`);
    }
    options.set(name, value);
    i++;
  }

  return { command, options, flags };
}

function requireOption(args: ParsedArgs, name: string): string {
  const value = args.options.get(name);
  if (value === undefined) {
    throw new UsageError(`${args.command} requires --${name}`);
  }
  return value;
}

function intOption(args: ParsedArgs, name: string, fallback?: number): number {
  const raw = args.options.get(name);
  if (raw === undefined) {
    if (fallback !== undefined) return fallback;
    throw new UsageError(`${args.command} requires --${name}`);
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new UsageError(`--${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function readJsonFile(path: string): unknown {
  try {
    return JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new UsageError(`Failed to read JSON from ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export function parseFileList(value: unknown): string[] {
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
    throw new UsageError("Files JSON must be an array of paths");
  }
  return value;
}

function optionalNumber(obj: Record<string, unknown>, ...keys: string[]): number | undefined {
  for (const key of keys) {
    const value = obj[key];
    if (typeof value === "number") return value;
  }
  return undefined;
}

/** Accepts camelCase or snake_case keys (`endLine`/`end_line` and so on). */
export function parseSuggestionInputs(value: unknown): SuggestionInput[] {
  if (!Array.isArray(value)) {
    throw new UsageError("Suggestions JSON must be an array");
  }
  return value.map((item: unknown, i) => {
    if (typeof item !== "object" || item === null || Array.isArray(item)) {
      throw new UsageError(`Suggestion ${i}: expected an object`);
    }
    const obj: Record<string, unknown> = { ...item };
    const line = optionalNumber(obj, "line");
    const severity = SEVERITIES.find((s) => s === obj.severity);
    if (line === undefined || !severity || typeof obj.content !== "string") {
      throw new UsageError(`Suggestion ${i}: line, severity (high|medium|low) and content are required`);
    }
    const linkText = obj.linkText ?? obj.link_text;
    return {
      line,
      endLine: optionalNumber(obj, "endLine", "end_line"),
      severity,
      content: obj.content,
      outOfScope: (obj.outOfScope ?? obj.out_of_scope) === true,
      linkText: typeof linkText === "string" ? linkText : undefined,
    };
  });
}

export interface CliDeps {
  loadConfig?: (path: string) => AppConfig;
  logger?: Logger;
  createThreads?: (opts: ThreadsClientOptions) => ThreadsApi;
  /** stdout for `show` and `history` output */
  print?: (text: string) => void;
}

interface Runtime {
  config: AppConfig;
  logger: Logger;
  store: ReviewStateStore;
  metrics: ReviewMetrics;
  history: StatusHistory | undefined;
  dryRun: boolean;
  createThreads: (opts: ThreadsClientOptions) => ThreadsApi;
  print: (text: string) => void;
}

function threadsFor(rt: Runtime, prId: number, repoId: string): ThreadsApi {
  return rt.createThreads({
    config: rt.config.azureDevOps,
    repoId,
    prId,
    logger: rt.logger,
    metrics: rt.metrics,
  });
}

function fileReviewContext(rt: Runtime, state: ReviewState): FileReviewContext {
  return {
    store: rt.store,
    threads: threadsFor(rt, state.prId, state.repoId),
    baseUrl: buildPrBaseUrl(rt.config.azureDevOps, state.prId),
    dryRun: rt.dryRun,
    logger: rt.logger,
    metrics: rt.metrics,
    history: rt.history,
  };
}

function summarizeState(state: ReviewState): Record<string, unknown> {
  return {
    prId: state.prId,
    repoName: state.repoName,
    scaffoldedUtc: state.scaffoldedUtc,
    overall: state.overallSummary.status,
    folders: Object.fromEntries(
      Object.entries(state.folders).map(([name, f]) => [name, { status: f.status, files: f.files.length }]),
    ),
    files: Object.fromEntries(Object.entries(state.files).map(([path, f]) => [path, f.status])),
  };
}

async function dispatch(rt: Runtime, args: ParsedArgs): Promise<void> {
  const prId = intOption(args, "pr");

  switch (args.command) {
    case "scaffold": {
      const files = parseFileList(readJsonFile(requireOption(args, "files-json")));
      const ado = rt.config.azureDevOps;
      const repoId = requireOption(args, "repo-id");
      const state = await scaffoldReviewThreads(
        {
          prId,
          files,
          repoId,
          repoName: args.options.get("repo-name") ?? ado.repository,
          project: ado.project,
          organization: ado.organization,
          latestIterationId: intOption(args, "iteration", 1),
          baseUrl: buildPrBaseUrl(ado, prId),
          dryRun: rt.dryRun,
        },
        { store: rt.store, threads: threadsFor(rt, prId, repoId), logger: rt.logger, metrics: rt.metrics },
      );
      if (state) rt.metrics.observeState(state);
      return;
    }
    case "start": {
      const file = requireOption(args, "file");
      if (!rt.store.exists(prId)) {
        rt.logger.info("PR not scaffolded, nothing to do", { prId, path: file });
        return;
      }
      const state = rt.store.load(prId);
      const changed = await startFileReview(fileReviewContext(rt, state), prId, file);
      if (!changed) {
        rt.logger.info("File review already started or not tracked, nothing to do", { prId, path: file });
      }
      return;
    }
    case "approve": {
      const state = rt.store.load(prId);
      await approveFile(fileReviewContext(rt, state), prId, requireOption(args, "file"), requireOption(args, "summary"));
      return;
    }
    case "request-changes": {
      const suggestions = parseSuggestionInputs(readJsonFile(requireOption(args, "suggestions-json")));
      const state = rt.store.load(prId);
      await requestChanges(
        fileReviewContext(rt, state),
        prId,
        requireOption(args, "file"),
        requireOption(args, "summary"),
        suggestions,
      );
      return;
    }
    case "set-status": {
      const file = requireOption(args, "file");
      const status = requireOption(args, "status");
      const state = rt.store.load(prId);
      await setFileStatus(fileReviewContext(rt, state), prId, file, status);
      return;
    }
    case "show": {
      rt.print(JSON.stringify(summarizeState(rt.store.load(prId)), null, 2));
      return;
    }
    case "history": {
      if (!rt.history) {
        throw new UsageError("Status history is disabled; set history.enabled in config.yaml");
      }
      rt.print(JSON.stringify(rt.history.forPr(prId), null, 2));
      return;
    }
  }
}

async function writeMetricsTextfile(rt: Runtime): Promise<void> {
  const path = rt.config.metrics.textfilePath;
  if (!path) return;
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, await rt.metrics.render(), "utf-8");
}

/** Run one command; resolves to the process exit code. */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const logger = deps.logger ?? createRootLogger();
  const print = deps.print ?? ((text: string) => process.stdout.write(text + "\n"));

  if (argv.length === 0 || argv.includes("--help")) {
    print(USAGE);
    return argv.length === 0 ? 1 : 0;
  }

  let args: ParsedArgs;
  try {
    args = parseArgv(argv);
  } catch (err) {
    logger.error(err instanceof Error ? err.message : String(err));
    print(USAGE);
    return 1;
  }

  let history: StatusHistory | undefined;
  try {
    const config = (deps.loadConfig ?? loadConfig)(args.options.get("config") ?? "config.yaml");
    if (config.history.enabled) {
      history = new StatusHistory(config.history.dbPath);
      history.prune(config.history.retentionDays);
    }

    const rt: Runtime = {
      config,
      logger,
      store: new ReviewStateStore(config.state.dir),
      metrics: new ReviewMetrics(),
      history,
      dryRun: config.dryRun || args.flags.has("dry-run"),
      createThreads: deps.createThreads ?? ((opts) => new AzureDevOpsThreadsClient(opts)),
      print,
    };
    if (rt.dryRun) {
      logger.warn("DRY RUN MODE: thread updates will be logged, not sent");
    }

    await dispatch(rt, args);
    await writeMetricsTextfile(rt);
    return 0;
  } catch (err) {
    const ctx: Record<string, unknown> = { command: args.command };
    if (err instanceof Error) {
      ctx.error = err.name;
      if (err.stack && !(err instanceof ReviewCascadeError)) ctx.stack = err.stack;
    }
    logger.error(err instanceof Error ? err.message : String(err), ctx);
    return 1;
  } finally {
    history?.close();
  }
}
