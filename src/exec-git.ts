/**
 * Synchronous git invocation.
 *
 * Every backend query is a blocking child process. Output is returned as a
 * Buffer so that blob bodies and bundle bytes survive untouched; `execGit`
 * decodes to UTF-8 for the text-only commands.
 */

import { execFileSync } from "node:child_process";
import { loadConfig } from "./config.js";
import { ExternalProcessError } from "./errors.js";
import { createLogger } from "./logger.js";

const log = createLogger("exec-git");

export interface ExecGitOptions {
  cwd?: string;
  /** Written to the child's stdin. */
  input?: string;
  /** Merged over `process.env`. */
  env?: Record<string, string>;
}

export function execGitBuffer(args: string[], options: ExecGitOptions = {}): Buffer {
  const config = loadConfig();
  const cwd = options.cwd ?? process.cwd();
  log.debug({ args, cwd }, "git");

  try {
    return execFileSync(config.gitPath, args, {
      encoding: "buffer",
      cwd,
      // String stdin would be encoded with `encoding`, which is "buffer" here
      input: options.input === undefined ? undefined : Buffer.from(options.input, "utf8"),
      env: options.env ? { ...process.env, ...options.env } : process.env,
      maxBuffer: config.maxBuffer,
      stdio: ["pipe", "pipe", "pipe"],
    });
  } catch (err) {
    throwGitError(err, [config.gitPath, ...args]);
  }
}

export function execGit(args: string[], options: ExecGitOptions = {}): string {
  return execGitBuffer(args, options).toString("utf8");
}

/**
 * Inspect a git failure and throw a descriptive error.
 */
function throwGitError(err: unknown, command: string[]): never {
  if (!(err instanceof Error)) throw err;

  // ENOENT means the git binary was not found
  if ("code" in err && err.code === "ENOENT") {
    throw new Error("git command not found. Please install git.");
  }

  // execFileSync attaches stderr and the exit status when the child fails
  const stderr = "stderr" in err && err.stderr ? String(err.stderr).trim() : "";
  if (stderr.includes("not a git repository")) {
    throw new Error("Not a git repository");
  }

  const status = "status" in err && typeof err.status === "number" ? err.status : null;
  throw new ExternalProcessError(command, status, stderr || err.message);
}
