import fs from "node:fs";
import path from "node:path";
import { err, ok, type Result } from "../result.js";

export type InstalledCommitMsg = "current" | "outdated" | "missing";

export class InstalledCommitMsgError extends Error {
  readonly hookPath: string;

  constructor(hookPath: string, detail: string, cause?: unknown) {
    super(`failed to read commit-msg hook at ${hookPath}: ${detail}`, cause === undefined ? undefined : { cause });
    this.name = "InstalledCommitMsgError";
    this.hookPath = hookPath;
  }
}

export function findGitRoot(startDir: string): string | null {
  let current = path.resolve(startDir);
  for (;;) {
    if (fs.existsSync(path.join(current, ".git"))) return current;
    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

function readTrimmed(file: string): string | null {
  try {
    return fs.readFileSync(file, "utf8").trim();
  } catch {
    return null;
  }
}

/**
 * Directory git keeps hooks in. Worktrees and submodules have a `.git` file
 * with a `gitdir:` pointer; worktrees share hooks with the main checkout
 * through `commondir`.
 */
export function gitHooksDir(repoRoot: string): string {
  const dotGit = path.join(repoRoot, ".git");
  let gitDir = dotGit;
  if (fs.existsSync(dotGit) && !fs.statSync(dotGit).isDirectory()) {
    const pointer = /^gitdir:\s*(.+)$/m.exec(readTrimmed(dotGit) ?? "")?.[1]?.trim();
    if (pointer) gitDir = path.resolve(repoRoot, pointer);
  }
  const commonDir = readTrimmed(path.join(gitDir, "commondir"));
  if (commonDir) gitDir = path.resolve(gitDir, commonDir);
  return path.join(gitDir, "hooks");
}

export function commitMsgHookPath(repoRoot: string): string {
  return path.join(gitHooksDir(repoRoot), "commit-msg");
}

export const BUNDLED_COMMIT_MSG_HOOK = [
  "#!/bin/sh",
  "# xmobile commit-msg hook",
  'subject=$(head -n 1 "$1")',
  'if [ -z "$subject" ]; then',
  '  echo "commit-msg: empty commit subject" >&2',
  "  exit 1",
  "fi",
  'if [ "${#subject}" -gt 72 ]; then',
  '  echo "commit-msg: subject is longer than 72 characters" >&2',
  "  exit 1",
  "fi",
  "",
].join("\n");

function errorCode(e: unknown): string | undefined {
  return e instanceof Error && "code" in e && typeof e.code === "string" ? e.code : undefined;
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function normalizeHook(text: string): string {
  return text.replace(/\r\n/g, "\n").trimEnd();
}

export function checkInstalledCommitMsg(params: {
  repoRoot: string;
  expected: string;
}): Result<InstalledCommitMsg, InstalledCommitMsgError> {
  const hookPath = commitMsgHookPath(params.repoRoot);
  let stat: fs.Stats;
  try {
    stat = fs.statSync(hookPath);
  } catch (e) {
    if (errorCode(e) === "ENOENT") return ok("missing");
    return err(new InstalledCommitMsgError(hookPath, errorMessage(e), e));
  }
  if (!stat.isFile()) return err(new InstalledCommitMsgError(hookPath, "not a regular file"));

  let installed: string;
  try {
    installed = fs.readFileSync(hookPath, "utf8");
  } catch (e) {
    return err(new InstalledCommitMsgError(hookPath, errorMessage(e), e));
  }
  return ok(normalizeHook(installed) === normalizeHook(params.expected) ? "current" : "outdated");
}
