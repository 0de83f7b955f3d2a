/**
 * ClaudeAgentEngine: coding engine backed by the Claude Agent SDK.
 *
 * Slash commands that manage the chat's file set (/add, /read-only, /drop),
 * /commit and /help are handled locally; everything else becomes an SDK
 * query in the engine's root, resumed across turns through the SDK session
 * id. SDK traffic is translated into ToolIO calls:
 *
 *   assistant text   → reportAssistantMessage
 *   tool_use         → reportOutput
 *   result           → reportOutput("Tokens: … Cost: …")
 *   write tool on a file outside the chat → confirm("Add <file> to the chat?")
 */

import { query } from "@anthropic-ai/claude-agent-sdk";
import type { PermissionResult } from "@anthropic-ai/claude-agent-sdk";
import fs from "fs/promises";
import path from "path";
import type { PermissionMode } from "./config.js";
import { BaseEngine, type EngineFactory, type ToolIO } from "./engine.js";
import { VersionControlError, errorMessage } from "./errors.js";
import { isDirty, runGit, type GitRunner } from "./git.js";
import { formatUsageLine, relativeFileName } from "./response-collector.js";

export const DEFAULT_COMMIT_MESSAGE = "Changes from coding assistant session";

const WRITE_TOOLS = new Set(["Edit", "MultiEdit", "Write", "NotebookEdit"]);

export interface ClaudeEngineOptions {
  cwd: string;
  model?: string;
  permissionMode: PermissionMode;
  pretty?: boolean;
  git?: GitRunner;
}

type CommandHandler = (args: string) => Promise<void>;

export class ClaudeAgentEngine extends BaseEngine {
  private readonly options: ClaudeEngineOptions;
  private readonly git: GitRunner;
  private readonly editable = new Set<string>(); // relative to root
  private readonly readOnly = new Set<string>(); // absolute
  private sessionId: string | undefined;
  private sessionCostUsd = 0;

  private readonly commands: Record<string, CommandHandler> = {
    add: (args) => this.cmdAdd(args),
    "read-only": (args) => this.cmdReadOnly(args),
    drop: (args) => this.cmdDrop(args),
    commit: (args) => this.cmdCommit(args),
    web: (args) => this.cmdWeb(args),
    help: async () => this.cmdHelp(),
  };

  constructor(io: ToolIO, options: ClaudeEngineOptions) {
    super(io, path.resolve(options.cwd));
    this.options = options;
    this.git = options.git ?? runGit;
  }

  get editFormat(): string {
    return this.options.permissionMode;
  }

  get sdkSessionId(): string | undefined {
    return this.sessionId;
  }

  inChatRelativeFiles(): string[] {
    return [...this.editable];
  }

  absReadOnlyFiles(): string[] {
    return [...this.readOnly];
  }

  async run(message: string): Promise<void> {
    const trimmed = message.trim();
    if (!trimmed) return;

    const cmdMatch = trimmed.match(/^\/(\S+)\s*(.*)$/s);
    if (cmdMatch) {
      const [, name, args] = cmdMatch;
      const handler = this.commands[name.toLowerCase()];
      if (!handler) {
        this.io.reportError(`Invalid command: /${name}`);
        return;
      }
      await handler(args.trim());
      return;
    }

    await this.ask(trimmed);
  }

  // ── Local commands ──────────────────────────────────────────────────

  private async cmdAdd(args: string): Promise<void> {
    for (const name of splitArgs(args)) {
      const abs = path.resolve(this.root, name);
      const rel = relativeFileName(abs, this.root);

      if (this.editable.has(rel)) {
        this.io.reportError(`${rel} is already in the chat as an editable file`);
        continue;
      }

      if (!(await fileExists(abs))) {
        if (!this.io.confirm(`Do you want to create ${rel}?`, { subject: rel })) continue;
        await fs.mkdir(path.dirname(abs), { recursive: true });
        await fs.writeFile(abs, "", { flag: "a" });
        this.io.reportOutput(`Creating empty file ${rel}`);
      } else if (!this.io.confirm(`Add ${rel} to the chat?`, { subject: rel })) {
        continue;
      }

      this.readOnly.delete(abs);
      this.editable.add(rel);
      this.io.reportOutput(`Added ${rel} to the chat`);
    }
  }

  private async cmdReadOnly(args: string): Promise<void> {
    for (const name of splitArgs(args)) {
      const abs = path.resolve(this.root, name);
      if (!(await fileExists(abs))) {
        this.io.reportError(`No such file: ${name}`);
        continue;
      }
      this.editable.delete(relativeFileName(abs, this.root));
      this.readOnly.add(abs);
      this.io.reportOutput(`Added ${abs} to read-only files.`);
    }
  }

  private async cmdDrop(args: string): Promise<void> {
    const names = splitArgs(args);
    if (names.length === 0) {
      this.editable.clear();
      this.readOnly.clear();
      this.io.reportOutput("Dropping all files from the chat session.");
      return;
    }
    for (const name of names) {
      const abs = path.resolve(this.root, name);
      const rel = relativeFileName(abs, this.root);
      if (this.editable.delete(rel) || this.readOnly.delete(abs)) {
        this.io.reportOutput(`Removed ${rel} from the chat`);
      } else {
        this.io.reportWarning(`${rel} is not in the chat`);
      }
    }
  }

  private async cmdCommit(args: string): Promise<void> {
    const message = args || DEFAULT_COMMIT_MESSAGE;
    try {
      if (!(await isDirty(this.git, this.root))) {
        this.io.reportWarning("No changes to commit.");
        return;
      }
      await this.git(["add", "-A"], this.root);
      await this.git(["commit", "-m", message], this.root);
      const { stdout } = await this.git(["rev-parse", "--short", "HEAD"], this.root);
      this.io.reportOutput(`Commit ${stdout.trim()} ${message}`);
    } catch (err: unknown) {
      if (!(err instanceof VersionControlError)) throw err;
      this.io.reportError(`Unable to commit: ${err.message}`);
    }
  }

  private async cmdWeb(args: string): Promise<void> {
    const url = args.split(/\s+/)[0];
    if (!url) {
      this.io.reportError("Please provide a URL to scrape.");
      return;
    }
    this.io.reportOutput(`Scraping ${url}...`);
    await this.ask(
      `Fetch ${url}, convert the page to markdown and keep it as context for my next requests. ` +
        "Reply with a short summary of what it contains."
    );
  }

  private cmdHelp(): void {
    const lines = [
      "/add <file>...        Add files to the chat so they can be edited",
      "/read-only <file>...  Add files for reference only",
      "/drop [file]...       Remove files from the chat (all when none given)",
      "/commit [message]     Commit all pending changes",
      "/web <url>            Scrape a page and keep it as context",
      "/help                 Show this list",
    ];
    this.io.reportOutput(lines.join("\n"));
  }

  // ── SDK query ───────────────────────────────────────────────────────

  private promptWithFiles(prompt: string): string {
    const header: string[] = [];
    if (this.editable.size > 0) {
      header.push(`Files in the chat (you may edit these): ${[...this.editable].sort().join(", ")}`);
    }
    if (this.readOnly.size > 0) {
      header.push(`Read-only reference files: ${[...this.readOnly].sort().join(", ")}`);
    }
    return header.length > 0 ? `${header.join("\n")}\n\n${prompt}` : prompt;
  }

  private async authorizeTool(toolName: string, input: Record<string, unknown>): Promise<PermissionResult> {
    if (WRITE_TOOLS.has(toolName)) {
      const target = input.file_path ?? input.notebook_path;
      if (typeof target === "string") {
        const rel = relativeFileName(path.resolve(this.root, target), this.root);
        if (!this.editable.has(rel)) {
          if (!this.io.confirm(`Add ${rel} to the chat?`, { subject: rel })) {
            return { behavior: "deny", message: `${rel} is not in the chat and no more files can be added.` };
          }
          this.editable.add(rel);
        }
      }
      return { behavior: "allow", updatedInput: input };
    }

    if (!this.io.confirm(`Allow ${toolName}?`, { subject: toolName })) {
      return { behavior: "deny", message: `${toolName} was not allowed` };
    }
    return { behavior: "allow", updatedInput: input };
  }

  private toolLabel(name: string): string {
    return this.options.pretty ? `Using \`${name}\`` : `Using ${name}`;
  }

  private async ask(prompt: string): Promise<void> {
    const response = query({
      prompt: this.promptWithFiles(prompt),
      options: {
        cwd: this.root,
        ...(this.sessionId ? { resume: this.sessionId } : {}),
        ...(this.options.model ? { model: this.options.model } : {}),
        permissionMode: this.options.permissionMode,
        canUseTool: (toolName, input) => this.authorizeTool(toolName, input),
        stderr: (data: string) => console.error(`[engine][stderr] ${data}`),
      },
    });

    try {
      for await (const msg of response) {
        switch (msg.type) {
          case "system": {
            if (msg.subtype === "init") this.sessionId = msg.session_id;
            break;
          }

          case "assistant": {
            for (const block of msg.message.content) {
              if (block.type === "text") {
                this.io.reportAssistantMessage(block.text);
              } else if (block.type === "tool_use") {
                this.io.reportOutput(this.toolLabel(block.name));
              }
            }
            break;
          }

          case "result": {
            const usage = msg.usage;
            const sent =
              usage.input_tokens + (usage.cache_creation_input_tokens ?? 0) + (usage.cache_read_input_tokens ?? 0);
            this.sessionCostUsd += msg.total_cost_usd;
            this.io.reportOutput(
              formatUsageLine({
                tokensSent: sent,
                tokensReceived: usage.output_tokens,
                costMessage: msg.total_cost_usd,
                costSession: this.sessionCostUsd,
              })
            );
            if (msg.subtype !== "success" || msg.is_error) {
              this.io.reportError(`Run ended with ${msg.subtype}`);
            }
            break;
          }

          default:
            break;
        }
      }
    } catch (err: unknown) {
      console.error(`[engine] query failed: ${errorMessage(err)}`);
      throw err;
    }
  }
}

function splitArgs(args: string): string[] {
  return args.split(/\s+/).filter((a) => a.length > 0);
}

async function fileExists(p: string): Promise<boolean> {
  try {
    const stat = await fs.stat(p);
    return stat.isFile();
  } catch {
    return false;
  }
}

export function createClaudeEngineFactory(options: Omit<ClaudeEngineOptions, "pretty">): EngineFactory {
  return async (io, { pretty, cwd }) => {
    const root = cwd ?? options.cwd;
    await fs.mkdir(root, { recursive: true });
    return new ClaudeAgentEngine(io, { ...options, cwd: root, pretty });
  };
}
