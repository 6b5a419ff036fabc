import { andThen, err, mapOk, ok, type Result } from "../lib/result.js";
import { runAndSearch, type RunAndSearchError } from "../lib/runtime/search.js";
import { checkInstalledCommitMsg, commitMsgHookPath } from "../lib/project/commit-msg-hook.js";
import { isRustVersionValidForIos, RUSTC_VERSION_RE, RustVersion } from "../lib/toolchain/rust-version.js";
import { DoctorError } from "./errors.js";
import { DoctorItem } from "./item.js";
import { Section } from "./section.js";
import type { DoctorContext } from "./types.js";

export function checkRustVersion(ctx: DoctorContext): Result<RustVersion, RunAndSearchError | DoctorError> {
  const version = mapOk(runAndSearch(ctx.run, "rustc --version", RUSTC_VERSION_RE), RustVersion.fromMatch);
  // Only iOS targets hit the linker bug, and those only build on macOS.
  if (ctx.platform !== "darwin") return version;
  return andThen(version, (v): Result<RustVersion, DoctorError> =>
    isRustVersionValidForIos(v) ? ok(v) : err(new DoctorError({ kind: "rust-version-invalid", version: v })),
  );
}

function commitMsgItem(ctx: DoctorContext): DoctorItem | null {
  if (!ctx.repoRoot) return null;
  const res = checkInstalledCommitMsg({ repoRoot: ctx.repoRoot, expected: ctx.commitMsgHook });
  if (!res.ok) return DoctorItem.fromResult(res);
  const hookPath = commitMsgHookPath(ctx.repoRoot);
  switch (res.value) {
    case "current":
      return DoctorItem.victory(`Commit message hook installed at ${hookPath}`);
    case "missing":
      return DoctorItem.warning(`Commit message hook not installed at ${hookPath}`);
    case "outdated":
      return DoctorItem.warning(`Commit message hook at ${hookPath} is outdated`);
  }
}

export function toolchainSection(ctx: DoctorContext): Section {
  const section = new Section("Rust toolchain");
  section.addItem(DoctorItem.fromResult(mapOk(checkRustVersion(ctx), (v) => `rustc v${v}`)));
  const hook = commitMsgItem(ctx);
  if (hook) section.addItem(hook);
  return section;
}
