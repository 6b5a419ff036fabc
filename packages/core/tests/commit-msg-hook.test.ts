import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  BUNDLED_COMMIT_MSG_HOOK,
  InstalledCommitMsgError,
  checkInstalledCommitMsg,
  commitMsgHookPath,
  findGitRoot,
  gitHooksDir,
} from "../src/lib/project/commit-msg-hook.js";

describe("commit-msg hook", () => {
  let repoRoot = "";

  beforeEach(() => {
    repoRoot = fs.mkdtempSync(path.join(os.tmpdir(), "xmobile-hook-"));
    fs.mkdirSync(path.join(repoRoot, ".git", "hooks"), { recursive: true });
  });

  afterEach(() => {
    fs.rmSync(repoRoot, { recursive: true, force: true });
  });

  it("finds the repository root from a nested directory", () => {
    const nested = path.join(repoRoot, "app", "src");
    fs.mkdirSync(nested, { recursive: true });
    expect(findGitRoot(nested)).toBe(path.resolve(repoRoot));
  });

  it("resolves hooks for plain checkouts, submodules and worktrees", () => {
    expect(gitHooksDir(repoRoot)).toBe(path.join(repoRoot, ".git", "hooks"));

    const submodule = path.join(repoRoot, "vendor", "sub");
    fs.mkdirSync(submodule, { recursive: true });
    fs.writeFileSync(path.join(submodule, ".git"), "gitdir: ../../.git/modules/sub\n");
    expect(gitHooksDir(submodule)).toBe(path.join(repoRoot, ".git", "modules", "sub", "hooks"));

    const worktreeGitDir = path.join(repoRoot, ".git", "worktrees", "wt");
    fs.mkdirSync(worktreeGitDir, { recursive: true });
    fs.writeFileSync(path.join(worktreeGitDir, "commondir"), "../..\n");
    const worktree = path.join(repoRoot, "wt");
    fs.mkdirSync(worktree);
    fs.writeFileSync(path.join(worktree, ".git"), `gitdir: ${worktreeGitDir}\n`);
    expect(findGitRoot(worktree)).toBe(worktree);
    expect(commitMsgHookPath(worktree)).toBe(path.join(repoRoot, ".git", "hooks", "commit-msg"));
  });

  it("reports a missing hook", () => {
    expect(checkInstalledCommitMsg({ repoRoot, expected: BUNDLED_COMMIT_MSG_HOOK })).toEqual({ ok: true, value: "missing" });
  });

  it("treats line endings and trailing whitespace as equal", () => {
    const crlf = `${BUNDLED_COMMIT_MSG_HOOK.replace(/\n/g, "\r\n")}\n\n`;
    fs.writeFileSync(commitMsgHookPath(repoRoot), crlf);
    expect(checkInstalledCommitMsg({ repoRoot, expected: BUNDLED_COMMIT_MSG_HOOK })).toEqual({ ok: true, value: "current" });
  });

  it("reports a hook with different contents as outdated", () => {
    fs.writeFileSync(commitMsgHookPath(repoRoot), "#!/bin/sh\nexit 0\n");
    expect(checkInstalledCommitMsg({ repoRoot, expected: BUNDLED_COMMIT_MSG_HOOK })).toEqual({ ok: true, value: "outdated" });
  });

  it("fails when the hook path is a directory", () => {
    const hookPath = commitMsgHookPath(repoRoot);
    fs.mkdirSync(hookPath);
    const res = checkInstalledCommitMsg({ repoRoot, expected: BUNDLED_COMMIT_MSG_HOOK });
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error).toBeInstanceOf(InstalledCommitMsgError);
    expect(res.error.message).toBe(`failed to read commit-msg hook at ${hookPath}: not a regular file`);
  });
});
