import { readFileSync } from "node:fs";
import { parse } from "yaml";
import type { AppConfig } from "./types.js";

export interface ConfigError {
  field: string;
  message: string;
  severity: "error" | "warning";
}

export function validateConfig(config: AppConfig): ConfigError[] {
  const errors: ConfigError[] = [];

  if (!config.azureDevOps.organization.trim()) {
    errors.push({ field: "azureDevOps.organization", message: "Required", severity: "error" });
  }
  if (!config.azureDevOps.project.trim()) {
    errors.push({ field: "azureDevOps.project", message: "Required", severity: "error" });
  }
  if (!config.azureDevOps.repository.trim()) {
    errors.push({ field: "azureDevOps.repository", message: "Required", severity: "error" });
  }
  if (config.azureDevOps.requestTimeoutMs < 1_000) {
    errors.push({ field: "azureDevOps.requestTimeoutMs", message: "Must be >= 1000 (1s)", severity: "error" });
  }
  if (!config.state.dir.trim()) {
    errors.push({ field: "state.dir", message: "Required", severity: "error" });
  }

  if (config.history.enabled) {
    if (!config.history.dbPath.trim()) {
      errors.push({ field: "history.dbPath", message: "Required when history.enabled is true", severity: "error" });
    }
    if (config.history.retentionDays < 1) {
      errors.push({ field: "history.retentionDays", message: "Must be >= 1", severity: "warning" });
    }
  }

  return errors;
}

const DEFAULTS: AppConfig = {
  azureDevOps: {
    organization: "",
    project: "",
    repository: "",
    token: "",
    requestTimeoutMs: 30_000,
  },
  state: { dir: "scripts/temp" },
  history: { enabled: false, dbPath: "data/history.db", retentionDays: 90 },
  metrics: { textfilePath: "" },
  dryRun: false,
};

type FileConfig = {
  [K in keyof AppConfig]?: AppConfig[K] extends object ? Partial<AppConfig[K]> : AppConfig[K];
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readFileConfig(path: string): FileConfig {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err) {
    if (!(err instanceof Error && "code" in err && err.code === "ENOENT")) {
      throw err;
    }
    console.warn(`Config file not found at ${path}, using defaults + env vars`);
    return {};
  }

  const parsed: FileConfig | null | undefined = parse(raw);
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new Error(`Invalid config file ${path}: expected a mapping at the top level`);
  }
  return parsed;
}

export function loadConfig(path: string = "config.yaml", env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readFileConfig(path);

  const config: AppConfig = {
    azureDevOps: { ...DEFAULTS.azureDevOps, ...fileConfig.azureDevOps },
    state: { ...DEFAULTS.state, ...fileConfig.state },
    history: { ...DEFAULTS.history, ...fileConfig.history },
    metrics: { ...DEFAULTS.metrics, ...fileConfig.metrics },
    dryRun: fileConfig.dryRun ?? DEFAULTS.dryRun,
  };

  // Environment variable overrides
  if (env.AZURE_DEVOPS_PAT) {
    config.azureDevOps.token = env.AZURE_DEVOPS_PAT;
  }
  if (env.AZURE_DEVOPS_ORGANIZATION) {
    config.azureDevOps.organization = env.AZURE_DEVOPS_ORGANIZATION;
  }
  if (env.AZURE_DEVOPS_PROJECT) {
    config.azureDevOps.project = env.AZURE_DEVOPS_PROJECT;
  }
  if (env.AZURE_DEVOPS_REPOSITORY) {
    config.azureDevOps.repository = env.AZURE_DEVOPS_REPOSITORY;
  }
  if (env.REQUEST_TIMEOUT_MS) {
    const timeout = parseInt(env.REQUEST_TIMEOUT_MS, 10);
    if (Number.isNaN(timeout)) {
      throw new Error(`Invalid REQUEST_TIMEOUT_MS: "${env.REQUEST_TIMEOUT_MS}" (must be a number)`);
    }
    config.azureDevOps.requestTimeoutMs = timeout;
  }
  if (env.STATE_DIR) {
    config.state.dir = env.STATE_DIR;
  }
  if (env.HISTORY_DB_PATH) {
    config.history.dbPath = env.HISTORY_DB_PATH;
    config.history.enabled = true;
  }
  if (env.DRY_RUN) {
    config.dryRun = env.DRY_RUN === "true" || env.DRY_RUN === "1";
  }

  if (!config.azureDevOps.token && !config.dryRun) {
    console.warn("WARNING: No AZURE_DEVOPS_PAT configured. Thread API calls will fail. Set azureDevOps.token in config.yaml or AZURE_DEVOPS_PAT env var.");
  }

  const validationErrors = validateConfig(config);
  const fatalErrors = validationErrors.filter((e) => e.severity === "error");
  const warnings = validationErrors.filter((e) => e.severity === "warning");

  for (const w of warnings) {
    console.warn(`Config warning: ${w.field}: ${w.message}`);
  }
  if (fatalErrors.length > 0) {
    const details = fatalErrors.map((e) => `  ${e.field}: ${e.message}`).join("\n");
    throw new Error(`Invalid configuration:\n${details}`);
  }

  return config;
}
