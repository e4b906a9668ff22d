import { request } from "node:https";
import type { Readable } from "node:stream";
import { ThreadApiError } from "../errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type { ReviewMetrics } from "../metrics.js";
import type {
  AzureDevOpsConfig,
  CreatedThread,
  DryRunOption,
  ThreadContext,
  ThreadCreateBody,
  ThreadStatus,
} from "../types.js";
import { buildApiUrl } from "./urls.js";

/** The three thread operations the scaffolder and cascade depend on. */
export interface ThreadsApi {
  createThread(body: ThreadCreateBody): Promise<CreatedThread>;
  patchComment(threadId: number, commentId: number, content: string, opts?: DryRunOption): Promise<void>;
  patchThreadStatus(threadId: number, status: ThreadStatus, opts?: DryRunOption): Promise<void>;
}

export interface HttpRequest {
  method: "POST" | "PATCH";
  url: string;
  headers: Record<string, string>;
  body: string;
  timeoutMs: number;
}

export interface HttpResponse {
  statusCode: number;
  body: string;
}

export type HttpTransport = (req: HttpRequest) => Promise<HttpResponse>;

/** Decode once at the end so multibyte characters split across chunks survive. */
export function readBody(stream: Readable): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    stream.on("data", (chunk: Buffer | string) => {
      chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
    });
    stream.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    stream.on("error", reject);
  });
}

export const httpsTransport: HttpTransport = (req) =>
  new Promise((resolve, reject) => {
    const parsedUrl = new URL(req.url);
    const httpReq = request(
      {
        hostname: parsedUrl.hostname,
        port: parsedUrl.port || 443,
        path: parsedUrl.pathname + parsedUrl.search,
        method: req.method,
        headers: { ...req.headers, "Content-Length": Buffer.byteLength(req.body) },
        timeout: req.timeoutMs,
      },
      (res) => {
        readBody(res).then((body) => resolve({ statusCode: res.statusCode ?? 0, body }), reject);
      },
    );

    httpReq.on("error", (err) => {
      reject(new ThreadApiError(`${req.method} ${req.url} failed: ${err.message}`, null, "", err));
    });
    httpReq.on("timeout", () => {
      httpReq.destroy(new Error(`timed out after ${req.timeoutMs}ms`));
    });
    httpReq.write(req.body);
    httpReq.end();
  });

/**
 * File-anchored context, optionally narrowed to a line range on the right
 * (new) side of the diff.
 */
export function buildThreadContext(filePath: string, line?: number, endLine?: number): ThreadContext {
  const context: ThreadContext = { filePath };
  if (line !== undefined) {
    context.rightFileStart = { line, offset: 1 };
    context.rightFileEnd = { line: endLine ?? line, offset: 1 };
  }
  return context;
}

export interface ThreadsClientOptions {
  config: Pick<AzureDevOpsConfig, "organization" | "project" | "token" | "requestTimeoutMs">;
  repoId: string;
  prId: number;
  logger?: Logger;
  metrics?: ReviewMetrics;
  transport?: HttpTransport;
}

function parseCreatedThread(body: string): CreatedThread {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (err) {
    throw new ThreadApiError(`Failed to parse createThread response: ${body.slice(0, 200)}`, null, body, err);
  }

  if (typeof parsed === "object" && parsed !== null && "id" in parsed && "comments" in parsed) {
    const { id, comments } = parsed;
    if (typeof id === "number" && Array.isArray(comments)) {
      const first: unknown = comments[0];
      if (typeof first === "object" && first !== null && "id" in first && typeof first.id === "number") {
        return { threadId: id, commentId: first.id };
      }
    }
  }
  throw new ThreadApiError(`Unexpected createThread response: ${body.slice(0, 200)}`, null, body);
}

/** Pull request thread API for one repository and PR. */
export class AzureDevOpsThreadsClient implements ThreadsApi {
  private readonly logger: Logger;
  private readonly transport: HttpTransport;
  private readonly headers: Record<string, string>;

  constructor(private readonly opts: ThreadsClientOptions) {
    this.logger = (opts.logger ?? silentLogger).child({ prId: opts.prId });
    this.transport = opts.transport ?? httpsTransport;
    this.headers = {
      Authorization: `Basic ${Buffer.from(`:${opts.config.token}`).toString("base64")}`,
      "Content-Type": "application/json",
      Accept: "application/json",
    };
  }

  private url(...segments: Array<string | number>): string {
    return buildApiUrl(this.opts.config, this.opts.repoId, "pullRequests", this.opts.prId, "threads", ...segments);
  }

  private async send(method: HttpRequest["method"], url: string, payload: unknown): Promise<string> {
    const res = await this.transport({
      method,
      url,
      headers: this.headers,
      body: JSON.stringify(payload),
      timeoutMs: this.opts.config.requestTimeoutMs,
    });
    if (res.statusCode < 200 || res.statusCode >= 300) {
      throw new ThreadApiError(
        `${method} ${url} returned HTTP ${res.statusCode}: ${res.body.slice(0, 200)}`,
        res.statusCode,
        res.body,
      );
    }
    return res.body;
  }

  async createThread(body: ThreadCreateBody): Promise<CreatedThread> {
    const payload: Record<string, unknown> = {
      comments: [{ content: body.content, commentType: "text" }],
      status: "active",
    };
    if (body.threadContext) {
      payload.threadContext = body.threadContext;
    }

    const created = parseCreatedThread(await this.send("POST", this.url(), payload));
    this.logger.debug("Created thread", { threadId: created.threadId, path: body.threadContext?.filePath });
    return created;
  }

  async patchComment(threadId: number, commentId: number, content: string, opts: DryRunOption = {}): Promise<void> {
    if (opts.dryRun) {
      this.logger.info("[DRY RUN] Would update comment", { threadId, commentId, length: content.length });
      return;
    }
    await this.send("PATCH", this.url(threadId, "comments", commentId), { content });
    this.opts.metrics?.commentPatched();
  }

  async patchThreadStatus(threadId: number, status: ThreadStatus, opts: DryRunOption = {}): Promise<void> {
    if (opts.dryRun) {
      this.logger.info("[DRY RUN] Would set thread status", { threadId, status });
      return;
    }
    await this.send("PATCH", this.url(threadId), { status });
    this.opts.metrics?.statusPatched(status);
  }
}
