import { vi } from "vitest";
import { mkdir, mkdtemp, rm } from "fs/promises";
import path from "path";
import os from "os";
import type { Request as ExpressRequest, Response as ExpressResponse } from "express";
import { BaseEngine, type ToolIO } from "./engine.js";
import { VersionControlError } from "./errors.js";
import type { GitResult, GitRunner } from "./git.js";
import type { FetchLike } from "./pull-request.js";

/** Create a mock Express Request with configurable body and headers */
export function createMockRequest(
  overrides: {
    body?: unknown;
    headers?: Record<string, string>;
  } = {}
) {
  return {
    query: {},
    body: overrides.body ?? {},
    headers: overrides.headers || {},
  } as unknown as ExpressRequest;
}

/** Create a mock Express Response with spies for status and json */
export function createMockResponse() {
  const res = {
    status: vi.fn().mockReturnThis(),
    json: vi.fn().mockReturnThis(),
  };

  return res as typeof res & ExpressResponse;
}

/** Create a temporary directory for filesystem tests */
export async function createTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), "relay-test-"));
}

/** Remove a temporary directory and all contents */
export async function cleanupTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

// ── Git ─────────────────────────────────────────────────────────────

export type FakeGitResponder = (args: string[], cwd: string) => GitResult | void | Promise<GitResult | void>;

/**
 * In-process GitRunner. Records every call; `init` creates `.git` so the
 * reuse path can be exercised. Unhandled commands succeed with no output.
 */
export function createFakeGit(respond?: FakeGitResponder) {
  const calls: { args: string[]; cwd: string }[] = [];

  const git: GitRunner = async (args, cwd) => {
    calls.push({ args: [...args], cwd });
    if (args[0] === "init") {
      await mkdir(path.join(cwd, ".git"), { recursive: true });
    }
    const result = await respond?.(args, cwd);
    return result ?? { stdout: "", stderr: "" };
  };

  return {
    git,
    calls,
    /** Calls as "git args" strings without the leading "git" */
    commands: () => calls.map((c) => c.args.join(" ")),
  };
}

export function gitFailure(args: string[], stderr: string): VersionControlError {
  return new VersionControlError(`git ${args.join(" ")}`, "", stderr);
}

// ── HTTP ────────────────────────────────────────────────────────────

export function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export type FakeFetchHandler = (url: string, init: RequestInit | undefined) => Response | Promise<Response>;

/** Fetch stand-in that records requests and answers from `handler`. */
export function createFakeFetch(handler: FakeFetchHandler) {
  const requests: { url: string; method: string; body: unknown; headers: Headers }[] = [];

  const fetchImpl: FetchLike = async (url, init) => {
    const raw = typeof init?.body === "string" ? init.body : undefined;
    requests.push({
      url,
      method: init?.method ?? "GET",
      body: raw === undefined ? undefined : JSON.parse(raw),
      headers: new Headers(init?.headers),
    });
    return handler(url, init);
  };

  return { fetch: fetchImpl, requests };
}

// ── Engine ──────────────────────────────────────────────────────────

/** Scriptable engine: records inputs, runs `onRun` against the bridge. */
export class FakeEngine extends BaseEngine {
  editable: string[] = [];
  readOnlyAbs: string[] = [];
  format: string | undefined = "diff";
  readonly received: string[] = [];
  onRun: (message: string, io: ToolIO) => void | Promise<void> = () => {};

  constructor(io: ToolIO, root = "/repo") {
    super(io, root);
  }

  get editFormat(): string | undefined {
    return this.format;
  }

  inChatRelativeFiles(): string[] {
    return [...this.editable];
  }

  absReadOnlyFiles(): string[] {
    return [...this.readOnlyAbs];
  }

  async run(message: string): Promise<void> {
    this.received.push(message);
    await this.onRun(message, this.io);
  }
}
