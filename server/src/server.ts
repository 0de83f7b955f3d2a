import "dotenv/config";
import { createApp } from "./app.js";
import { createClaudeEngineFactory } from "./claude-engine.js";
import { loadConfig } from "./config.js";
import { createChatCompletion } from "./llm-client.js";
import { GitHubPullRequestPublisher } from "./pull-request.js";
import { RepositoryProvisioner } from "./repo-provisioner.js";
import { SessionManager } from "./session.js";

// ── Global error handlers ───────────────────────────────────────────
process.on("unhandledRejection", (reason) => {
  console.error("[server] unhandled rejection:", reason);
});
process.on("uncaughtException", (err) => {
  console.error("[server] uncaught exception:", err);
});

const config = loadConfig();

const sessions = new SessionManager(
  createClaudeEngineFactory({
    cwd: config.workDir,
    model: config.engine.model,
    permissionMode: config.engine.permissionMode,
  })
);

const app = createApp({
  config,
  sessions,
  provisioner: new RepositoryProvisioner(),
  complete: createChatCompletion(config.llm),
  createPublisher: (token) => new GitHubPullRequestPublisher({ token, apiBase: config.githubApiBase }),
});

app.listen(config.port, () => {
  console.error(`coder-relay running on http://localhost:${config.port}`);
  console.error(`[server] work dir: ${config.workDir} (test: ${config.testWorkDir})`);
  if (!config.sharedSecret) console.error("[server] SHARED_SECRET not set, /api is open");
  if (!config.llm.apiKey) console.error("[server] no LLM API key, agent routes will fail");
});
