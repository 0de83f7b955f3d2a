import { execFile } from "child_process";
import { promisify } from "util";
import { VersionControlError } from "./errors.js";

const execFileAsync = promisify(execFile);

export interface GitResult {
  stdout: string;
  stderr: string;
}

/** Runs one git command in `cwd`; rejects with VersionControlError on a non-zero exit. */
export type GitRunner = (args: string[], cwd: string) => Promise<GitResult>;

function outputOf(err: unknown, key: "stdout" | "stderr"): string {
  if (err && typeof err === "object" && key in err) {
    const value: unknown = Reflect.get(err, key);
    if (typeof value === "string") return value;
    if (Buffer.isBuffer(value)) return value.toString("utf-8");
  }
  return "";
}

/** Hide credentials embedded in a remote URL (https://<token>@host/...). */
export function redactUrl(text: string): string {
  return text.replace(/(https?:\/\/)[^@\s/]+@/g, "$1***@");
}

export const runGit: GitRunner = async (args, cwd) => {
  const command = `git ${args.join(" ")}`;
  try {
    const { stdout, stderr } = await execFileAsync("git", args, {
      cwd,
      maxBuffer: 10 * 1024 * 1024,
      env: { ...process.env, GIT_TERMINAL_PROMPT: "0" },
    });
    return { stdout, stderr };
  } catch (err: unknown) {
    throw new VersionControlError(
      redactUrl(command),
      redactUrl(outputOf(err, "stdout")),
      redactUrl(outputOf(err, "stderr")),
      err
    );
  }
};

/** Remote-tracking branch names, e.g. ["origin/main", "origin/feature"]. */
export async function listRemoteBranches(git: GitRunner, cwd: string): Promise<string[]> {
  const { stdout } = await git(["branch", "-r", "--format=%(refname:short)"], cwd);
  return stdout
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.includes("/") && !line.endsWith("/HEAD"));
}

export async function isDirty(git: GitRunner, cwd: string): Promise<boolean> {
  const { stdout } = await git(["status", "--porcelain"], cwd);
  return stdout.trim().length > 0;
}
