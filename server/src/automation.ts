/**
 * Automation run: provision a branch → let the agent loop drive the coding
 * engine → push → open a pull request. This module only sequences; each step
 * lives in its own component.
 */

import { runConversation } from "./agent-loop.js";
import { requireRepoUrl, type ServerConfig } from "./config.js";
import type { ChatCompletion } from "./llm-client.js";
import { isGitHubUrl, type PublishRequest } from "./pull-request.js";
import { generateBranchName, getRepoUrlWithToken, type RepositoryProvisioner } from "./repo-provisioner.js";
import type { SessionManager } from "./session.js";
import type { ConversationTurn, PullRequestResult, RepoTask } from "./types.js";

export interface Publisher {
  publish(request: PublishRequest): Promise<PullRequestResult>;
}

export interface AutomationDeps {
  config: ServerConfig;
  sessions: SessionManager;
  provisioner: RepositoryProvisioner;
  complete: ChatCompletion;
  createPublisher: (token: string) => Publisher;
  now?: () => Date;
}

export type ProvisionMode = "reuse" | "fresh";

export interface AutomationRequest {
  instruction: string;
  workingDir: string;
  mode: ProvisionMode;
  /** false: only provision the branch and open the PR */
  runAgent: boolean;
}

export interface AutomationOutcome {
  result: PullRequestResult;
  task: RepoTask;
  transcript: ConversationTurn[];
}

export async function runAutomation(deps: AutomationDeps, request: AutomationRequest): Promise<AutomationOutcome> {
  const { config } = deps;
  const repoUrl = requireRepoUrl(config);
  const token = config.gitToken;

  const task: RepoTask = {
    workingDir: request.workingDir,
    remoteUrl: getRepoUrlWithToken(repoUrl, token),
    branchName: generateBranchName(deps.now?.() ?? new Date()),
  };
  console.error(`[agent] ${request.mode} run on ${task.workingDir} branch=${task.branchName}`);

  if (request.mode === "fresh") {
    await deps.provisioner.provisionFresh(task);
  } else {
    await deps.provisioner.provision(task);
  }

  let transcript: ConversationTurn[] = [];
  if (request.runAgent) {
    await deps.sessions.initialize({ pretty: false, cwd: task.workingDir });
    transcript = await runConversation(request.instruction, {
      complete: deps.complete,
      dispatch: (message) => deps.sessions.dispatch(message),
    });
    await deps.provisioner.push(task);
  }

  if (token && isGitHubUrl(repoUrl)) {
    const result = await deps.createPublisher(token).publish({
      repoUrl,
      branch: task.branchName,
      instruction: request.instruction,
    });
    return { result, task, transcript };
  }

  return {
    result: { status: "success", message: `Repository ready on branch ${task.branchName}` },
    task,
    transcript,
  };
}
