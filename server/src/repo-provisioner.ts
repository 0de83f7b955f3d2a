/**
 * RepositoryProvisioner: brings a working directory to "feature branch
 * pushed to origin".
 *
 * Stages: initialized → remote-attached → branched → committed (only when
 * the tree is dirty) → pushed → verified. A directory that already holds a
 * repository is reused: no re-init, no second `remote add`, the branch is
 * cut from whatever is checked out. `provisionFresh` wipes the directory
 * first and never takes the reuse path.
 *
 * Git failures surface as VersionControlError; only verification is
 * best-effort.
 */

import fs from "fs/promises";
import path from "path";
import { isDirty, listRemoteBranches, redactUrl, runGit, type GitRunner } from "./git.js";
import { VersionControlError, errorMessage } from "./errors.js";
import { compactTimestamp } from "./timestamps.js";
import type { RepoTask } from "./types.js";

export const BRANCH_PREFIX = "coder-relay";
export const DEFAULT_BRANCHES = ["main", "master"] as const;
export const INITIAL_COMMIT_MESSAGE = "Initial commit";
const REMOTE = "origin";

export type ProvisionStage =
  | "initialized"
  | "remote-attached"
  | "branched"
  | "committed"
  | "pushed"
  | "verified";

export interface ProvisionResult {
  task: RepoTask;
  reused: boolean;
  stages: ProvisionStage[];
  /** Remote-tracking branches seen after the push */
  remoteBranches: string[];
}

export interface ProvisionerOptions {
  git?: GitRunner;
}

/** Second resolution; two runs in the same second get the same name. */
export function generateBranchName(now: Date = new Date()): string {
  return `${BRANCH_PREFIX}-${compactTimestamp(now)}`;
}

export function getRepoUrlWithToken(repoUrl: string, token?: string): string {
  if (!token) return repoUrl;
  return repoUrl.replace("https://", `https://${token}@`);
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

export class RepositoryProvisioner {
  private readonly git: GitRunner;

  constructor(options: ProvisionerOptions = {}) {
    this.git = options.git ?? runGit;
  }

  async provision(task: RepoTask): Promise<ProvisionResult> {
    const dir = task.workingDir;
    const stages: ProvisionStage[] = [];
    console.error(`[provisioner] provisioning ${dir} on branch ${task.branchName}`);

    await fs.mkdir(dir, { recursive: true });
    const reused = await exists(path.join(dir, ".git"));

    if (reused) {
      console.error("[provisioner] existing repository found, reusing it");
      await this.git(["fetch", REMOTE], dir);
      await this.git(["checkout", "-b", task.branchName], dir);
      stages.push("branched");
    } else {
      await this.git(["init"], dir);
      stages.push("initialized");
      await this.attachRemote(task);
      stages.push("remote-attached");
      await this.checkoutFromDefaultBranch(dir, task.branchName);
      stages.push("branched");
    }

    return this.publishBranch(task, reused, stages);
  }

  /** Discard the directory and provision from scratch. */
  async provisionFresh(task: RepoTask): Promise<ProvisionResult> {
    const dir = task.workingDir;
    const stages: ProvisionStage[] = [];

    if (await exists(dir)) {
      console.error(`[provisioner] removing existing directory ${dir}`);
      await fs.rm(dir, { recursive: true, force: true });
    }
    await fs.mkdir(dir, { recursive: true });

    await this.git(["init"], dir);
    stages.push("initialized");
    await this.attachRemote(task);
    stages.push("remote-attached");
    await this.checkoutFromDefaultBranch(dir, task.branchName);
    stages.push("branched");

    return this.publishBranch(task, false, stages);
  }

  /** Push the branch again, e.g. after the agent committed more work. */
  async push(task: RepoTask): Promise<void> {
    await this.git(["push", "--set-upstream", REMOTE, task.branchName], task.workingDir);
    console.error(`[provisioner] pushed ${task.branchName}`);
  }

  private async attachRemote(task: RepoTask): Promise<void> {
    console.error(`[provisioner] adding remote ${REMOTE}: ${redactUrl(task.remoteUrl)}`);
    await this.git(["remote", "add", REMOTE, task.remoteUrl], task.workingDir);
    await this.git(["fetch", REMOTE], task.workingDir);
  }

  private async checkoutFromDefaultBranch(dir: string, branch: string): Promise<void> {
    let lastError: VersionControlError | null = null;
    for (const base of DEFAULT_BRANCHES) {
      try {
        await this.git(["checkout", "-b", branch, `${REMOTE}/${base}`], dir);
        console.error(`[provisioner] created ${branch} from ${REMOTE}/${base}`);
        return;
      } catch (err: unknown) {
        if (!(err instanceof VersionControlError)) throw err;
        console.error(`[provisioner] checkout from ${REMOTE}/${base} failed: ${err.stderr.trim()}`);
        lastError = err;
      }
    }
    if (lastError) throw lastError;
  }

  private async publishBranch(task: RepoTask, reused: boolean, stages: ProvisionStage[]): Promise<ProvisionResult> {
    const dir = task.workingDir;

    if (await isDirty(this.git, dir)) {
      console.error("[provisioner] working tree has uncommitted changes, committing");
      await this.git(["add", "."], dir);
      await this.git(["commit", "-m", INITIAL_COMMIT_MESSAGE], dir);
      stages.push("committed");
    }

    const before = await this.safeRemoteBranches(dir);
    try {
      await this.push(task);
    } catch (err: unknown) {
      if (err instanceof VersionControlError) {
        console.error(`[provisioner] push failed\nstdout: ${err.stdout}\nstderr: ${err.stderr}`);
      }
      throw err;
    }
    stages.push("pushed");

    const remoteBranches = await this.verifyPush(task, before);
    if (remoteBranches.includes(`${REMOTE}/${task.branchName}`)) stages.push("verified");

    return { task, reused, stages, remoteBranches };
  }

  private async verifyPush(task: RepoTask, before: string[]): Promise<string[]> {
    try {
      await this.git(["fetch", REMOTE], task.workingDir);
      const after = await listRemoteBranches(this.git, task.workingDir);
      const added = after.filter((b) => !before.includes(b));
      console.error(`[provisioner] remote branches before=${before.length} after=${after.length} new=[${added.join(", ")}]`);
      return after;
    } catch (err: unknown) {
      console.error(`[provisioner] push verification failed: ${errorMessage(err)}`);
      return [];
    }
  }

  private async safeRemoteBranches(dir: string): Promise<string[]> {
    try {
      return await listRemoteBranches(this.git, dir);
    } catch (err: unknown) {
      console.error(`[provisioner] could not list remote branches: ${errorMessage(err)}`);
      return [];
    }
  }
}
