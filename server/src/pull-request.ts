/**
 * GitHub pull request publisher.
 *
 * Checks that the pushed branch is visible, opens a PR against `main`, and
 * retries once against `master` when GitHub rejects the base. Host-level
 * rejections come back as an error result; failing to reach the host at all
 * throws TransportError.
 */

import { z } from "zod";
import { TransportError, errorMessage } from "./errors.js";
import { displayTimestamp } from "./timestamps.js";
import type { PullRequestResult } from "./types.js";

export const GITHUB_API_BASE = "https://api.github.com";
const USER_AGENT = "coder-relay";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface PublisherConfig {
  token: string;
  apiBase?: string;
  fetch?: FetchLike;
  now?: () => Date;
}

export interface PublishRequest {
  repoUrl: string;
  branch: string;
  instruction: string;
}

const GitHubErrorSchema = z
  .object({
    message: z.string().optional(),
    errors: z
      .array(
        z.union([
          z.object({ message: z.string().optional(), field: z.string().optional(), code: z.string().optional() }).passthrough(),
          z.string(),
        ])
      )
      .optional(),
  })
  .passthrough();

const CreatedPullSchema = z.object({ html_url: z.string() }).passthrough();

/** "https://github.com/acme/widgets.git" → { owner: "acme", repo: "widgets" } */
export function parseGitHubRepo(repoUrl: string): { owner: string; repo: string } {
  const tail = repoUrl.split("github.com/").pop() ?? "";
  const [owner = "", repo = ""] = tail.replace(/\.git$/, "").split("/");
  if (!owner || !repo) {
    throw new Error(`Cannot determine owner/repo from ${repoUrl}`);
  }
  return { owner, repo };
}

export function isGitHubUrl(repoUrl: string): boolean {
  return repoUrl.includes("github.com");
}

export class GitHubPullRequestPublisher {
  private readonly token: string;
  private readonly apiBase: string;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => Date;

  constructor(config: PublisherConfig) {
    this.token = config.token;
    this.apiBase = config.apiBase ?? GITHUB_API_BASE;
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
    this.now = config.now ?? (() => new Date());
  }

  async publish(request: PublishRequest): Promise<PullRequestResult> {
    const { branch } = request;
    const { owner, repo } = parseGitHubRepo(request.repoUrl);
    console.error(`[publisher] creating PR for ${owner}/${repo} branch=${branch}`);

    const verify = await this.send(`/repos/${owner}/${repo}/branches/${encodeURIComponent(branch)}`, { method: "GET" });
    if (verify.status !== 200) {
      console.error(`[publisher] branch ${branch} not found (${verify.status})`);
      return { status: "error", message: `Branch ${branch} does not exist or is not accessible` };
    }

    const body = {
      title: `Automated changes ${displayTimestamp(this.now())}`,
      body: `Automated pull request created by agent\n\nInstruction: ${request.instruction}`,
      head: branch,
      base: "main",
      maintainer_can_modify: true,
    };

    let response = await this.send(`/repos/${owner}/${repo}/pulls`, { method: "POST", body: JSON.stringify(body) });
    let payload = await readJson(response);

    if (response.status !== 201 && mentionsBase(payload)) {
      console.error("[publisher] base 'main' rejected, retrying with 'master'");
      response = await this.send(`/repos/${owner}/${repo}/pulls`, {
        method: "POST",
        body: JSON.stringify({ ...body, base: "master" }),
      });
      payload = await readJson(response);
    }

    const message = `Repository ready on branch ${branch}`;
    if (response.status === 201) {
      const created = CreatedPullSchema.safeParse(payload);
      if (created.success) {
        console.error(`[publisher] PR created: ${created.data.html_url}`);
        return { status: "success", message, pullRequestUrl: created.data.html_url };
      }
    }

    const errorDetail = describeFailure(payload);
    console.error(`[publisher] PR creation failed (${response.status}): ${errorDetail}`);
    return { status: "error", message, errorDetail };
  }

  private async send(pathname: string, init: { method: string; body?: string }): Promise<Response> {
    try {
      return await this.fetchImpl(`${this.apiBase}${pathname}`, {
        method: init.method,
        headers: {
          Accept: "application/vnd.github.v3+json",
          Authorization: `Bearer ${this.token}`,
          "User-Agent": USER_AGENT,
          ...(init.body ? { "Content-Type": "application/json" } : {}),
        },
        ...(init.body ? { body: init.body } : {}),
      });
    } catch (err: unknown) {
      throw new TransportError(`Failed to create PR due to request error: ${errorMessage(err)}`, err);
    }
  }
}

async function readJson(response: Response): Promise<unknown> {
  try {
    return await response.json();
  } catch {
    return {};
  }
}

function mentionsBase(payload: unknown): boolean {
  const parsed = GitHubErrorSchema.safeParse(payload);
  if (!parsed.success || !parsed.data.errors) return false;
  return JSON.stringify(parsed.data.errors).includes("base");
}

function describeFailure(payload: unknown): string {
  const parsed = GitHubErrorSchema.safeParse(payload);
  const message = (parsed.success && parsed.data.message) || "Unknown error";
  const details = parsed.success
    ? (parsed.data.errors ?? []).map((e) => (typeof e === "string" ? e : e.message ?? "")).join("; ")
    : "";
  return details ? `Failed to create PR: ${message} - Details: ${details}` : `Failed to create PR: ${message}`;
}
