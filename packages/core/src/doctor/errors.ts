import { CommandError, InvalidEncodingError } from "../lib/runtime/command.js";
import { EnvVarError } from "../lib/runtime/env.js";
import { RunAndSearchError } from "../lib/runtime/search.js";
import { InstalledCommitMsgError } from "../lib/project/commit-msg-hook.js";
import type { RustVersion } from "../lib/toolchain/rust-version.js";

export type DoctorErrorDetail =
  | { kind: "os-check-failed"; error: CommandError }
  | { kind: "invalid-utf8"; error: InvalidEncodingError }
  | { kind: "env-var-missing"; error: EnvVarError }
  | { kind: "command-search-failed"; error: RunAndSearchError }
  | { kind: "rust-version-invalid"; version: RustVersion }
  | { kind: "commit-msg-failed"; error: InstalledCommitMsgError };

export type DoctorErrorKind = DoctorErrorDetail["kind"];

export function formatDoctorError(detail: DoctorErrorDetail): string {
  switch (detail.kind) {
    case "os-check-failed":
      return "Failed to check installed OS version";
    case "invalid-utf8":
      return `Output contained invalid UTF-8: ${detail.error.message}`;
    case "env-var-missing":
      return `Environment variable not set: ${detail.error.varName}`;
    case "command-search-failed":
      return detail.error.message;
    case "rust-version-invalid":
      return [
        `iOS linking is broken on Rust versions later than 1.45.2 (d3fb005a3 2020-07-31) and earlier than 1.49.0-nightly (ffa2e7ae8 2020-10-24), but you're on ${String(detail.version)}!`,
        "    - Until you can move to Rust 1.49.0, do one of the following:",
        "        A) downgrade to 1.45.2:",
        "           `rustup install stable-2020-08-03 && rustup default stable-2020-08-03`",
        "        B) update to a recent nightly:",
        "           `rustup update nightly && rustup default nightly`",
      ].join("\n");
    case "commit-msg-failed":
      return "Commit message error";
  }
}

export class DoctorError extends Error {
  readonly detail: DoctorErrorDetail;

  constructor(detail: DoctorErrorDetail) {
    super(formatDoctorError(detail), "error" in detail ? { cause: detail.error } : undefined);
    this.name = "DoctorError";
    this.detail = detail;
  }

  get kind(): DoctorErrorKind {
    return this.detail.kind;
  }
}

export type DoctorFailure =
  | DoctorError
  | CommandError
  | InvalidEncodingError
  | EnvVarError
  | RunAndSearchError
  | InstalledCommitMsgError;

export function toDoctorError(failure: DoctorFailure): DoctorError {
  if (failure instanceof DoctorError) return failure;
  if (failure instanceof CommandError) return new DoctorError({ kind: "os-check-failed", error: failure });
  if (failure instanceof InvalidEncodingError) return new DoctorError({ kind: "invalid-utf8", error: failure });
  if (failure instanceof EnvVarError) return new DoctorError({ kind: "env-var-missing", error: failure });
  if (failure instanceof RunAndSearchError) return new DoctorError({ kind: "command-search-failed", error: failure });
  return new DoctorError({ kind: "commit-msg-failed", error: failure });
}
