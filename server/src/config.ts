import path from "path";
import { ConfigurationError } from "./errors.js";
import { DEFAULT_LLM_BASE_URL, DEFAULT_LLM_MODEL, type LlmConfig } from "./llm-client.js";
import { GITHUB_API_BASE } from "./pull-request.js";

/**
 * SDK permission modes that still route file edits through `canUseTool`.
 * `acceptEdits` and `bypassPermissions` skip it, which would bypass the
 * bridge's confirm step and file cap, so they are not accepted.
 */
export type PermissionMode = "default" | "plan";
const PERMISSION_MODES: readonly PermissionMode[] = ["default", "plan"];

export interface EngineConfig {
  model?: string;
  permissionMode: PermissionMode;
}

export interface ServerConfig {
  port: number;
  sharedSecret?: string;
  /** Working copy for agent runs and the engine's root */
  workDir: string;
  /** Scratch working copy for /agent/instruction-test */
  testWorkDir: string;
  repoUrl?: string;
  gitToken?: string;
  githubApiBase: string;
  llm: LlmConfig;
  engine: EngineConfig;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parsePermissionMode(value: string | undefined): PermissionMode {
  if (!value) return "default";
  const mode = PERMISSION_MODES.find((m) => m === value);
  if (!mode) {
    console.error(`[config] ENGINE_PERMISSION_MODE=${value} not supported, using "default"`);
    return "default";
  }
  return mode;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const port = parseInt(env.PORT || "3020", 10);
  return {
    port: Number.isNaN(port) ? 3020 : port,
    sharedSecret: nonEmpty(env.SHARED_SECRET),
    workDir: path.resolve(env.WORK_DIR || "/app"),
    testWorkDir: path.resolve(env.TEST_WORK_DIR || "./temp"),
    repoUrl: nonEmpty(env.REPO_URL),
    gitToken: nonEmpty(env.GITHUB_TOKEN) ?? nonEmpty(env.GIT_TOKEN),
    githubApiBase: nonEmpty(env.GITHUB_API_URL) ?? GITHUB_API_BASE,
    llm: {
      baseUrl: nonEmpty(env.LLM_BASE_URL) ?? DEFAULT_LLM_BASE_URL,
      apiKey: nonEmpty(env.LLM_API_KEY) ?? nonEmpty(env.GROQ_API_KEY) ?? "",
      model: nonEmpty(env.LLM_MODEL) ?? DEFAULT_LLM_MODEL,
    },
    engine: {
      model: nonEmpty(env.ENGINE_MODEL),
      permissionMode: parsePermissionMode(env.ENGINE_PERMISSION_MODE),
    },
  };
}

export function requireRepoUrl(config: ServerConfig): string {
  if (!config.repoUrl) {
    throw new ConfigurationError("Environment variable REPO_URL must be set");
  }
  return config.repoUrl;
}
