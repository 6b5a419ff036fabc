import { err, ok, type Result } from "../result.js";
import type { CommandFailure, CommandRunner } from "./command.js";

export class RunAndSearchError extends Error {
  readonly kind: "command-failed" | "no-match";
  readonly commandLine: string;
  readonly output: string;

  constructor(params: { commandLine: string; pattern: RegExp; output?: string; failure?: CommandFailure }) {
    const message = params.failure
      ? `Failed to run \`${params.commandLine}\`: ${params.failure.message}`
      : `Output of \`${params.commandLine}\` didn't match ${String(params.pattern)}`;
    super(message, params.failure ? { cause: params.failure } : undefined);
    this.name = "RunAndSearchError";
    this.kind = params.failure ? "command-failed" : "no-match";
    this.commandLine = params.commandLine;
    this.output = params.output ?? "";
  }
}

export function runAndSearch(
  run: CommandRunner,
  commandLine: string,
  pattern: RegExp,
): Result<RegExpExecArray, RunAndSearchError> {
  const res = run(commandLine);
  if (!res.ok) return err(new RunAndSearchError({ commandLine, pattern, failure: res.error }));
  const match = pattern.exec(res.value);
  if (!match) return err(new RunAndSearchError({ commandLine, pattern, output: res.value }));
  return ok(match);
}
