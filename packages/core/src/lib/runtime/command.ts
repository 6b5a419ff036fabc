import { spawnSync } from "node:child_process";
import type { Logger } from "../logging/logger.js";
import { err, ok, type Result } from "../result.js";

export type CommandErrorKind = "parse" | "spawn" | "exit" | "signal";

export class CommandError extends Error {
  readonly kind: CommandErrorKind;
  readonly commandLine: string;
  readonly status: number | null;
  readonly stderr: string;

  constructor(
    message: string,
    params: { kind: CommandErrorKind; commandLine: string; status?: number | null; stderr?: string; cause?: unknown },
  ) {
    super(message, params.cause === undefined ? undefined : { cause: params.cause });
    this.name = "CommandError";
    this.kind = params.kind;
    this.commandLine = params.commandLine;
    this.status = params.status ?? null;
    this.stderr = params.stderr ?? "";
  }
}

export class InvalidEncodingError extends Error {
  readonly commandLine: string;

  constructor(commandLine: string, detail: string) {
    super(detail);
    this.name = "InvalidEncodingError";
    this.commandLine = commandLine;
  }
}

export type CommandFailure = CommandError | InvalidEncodingError;

export type CommandOpts = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
};

export type CommandRunner = (commandLine: string) => Result<string, CommandFailure>;

const STDERR_TAIL_LINES = 5;

export function splitCommandLine(commandLine: string): string[] {
  const argv: string[] = [];
  let current = "";
  let inToken = false;
  let quote: "'" | '"' | null = null;

  for (let i = 0; i < commandLine.length; i += 1) {
    const ch = commandLine[i] ?? "";
    if (quote === "'") {
      if (ch === "'") quote = null;
      else current += ch;
      continue;
    }
    if (quote === '"') {
      if (ch === '"') {
        quote = null;
      } else if (ch === "\\" && /["\\$`]/.test(commandLine[i + 1] ?? "")) {
        current += commandLine[i + 1];
        i += 1;
      } else {
        current += ch;
      }
      continue;
    }
    if (ch === "'" || ch === '"') {
      quote = ch;
      inToken = true;
      continue;
    }
    if (ch === "\\" && i + 1 < commandLine.length) {
      current += commandLine[i + 1];
      inToken = true;
      i += 1;
      continue;
    }
    if (/\s/.test(ch)) {
      if (inToken) argv.push(current);
      current = "";
      inToken = false;
      continue;
    }
    current += ch;
    inToken = true;
  }

  if (quote) {
    throw new CommandError(`unbalanced ${quote} quote in command: ${commandLine}`, { kind: "parse", commandLine });
  }
  if (inToken) argv.push(current);
  if (argv.length === 0) {
    throw new CommandError("empty command", { kind: "parse", commandLine });
  }
  return argv;
}

export function quoteArg(arg: string): string {
  if (arg !== "" && /^[A-Za-z0-9_@%+=:,./-]+$/.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

function tailLines(text: string, count: number): string {
  const lines = text.trimEnd().split("\n");
  return lines.slice(-count).join("\n");
}

export function captureCommand(commandLine: string, opts: CommandOpts = {}): string {
  const [cmd = "", ...args] = splitCommandLine(commandLine);
  opts.logger?.debug({ cmd: commandLine }, "running command");

  const res = spawnSync(cmd, args, {
    cwd: opts.cwd,
    env: opts.env,
    stdio: ["ignore", "pipe", "pipe"],
  });

  if (res.error) {
    throw new CommandError(`failed to run ${cmd}: ${res.error.message}`, {
      kind: "spawn",
      commandLine,
      cause: res.error,
    });
  }

  const stderr = tailLines(res.stderr ? res.stderr.toString("utf8") : "", STDERR_TAIL_LINES);
  if (res.signal) {
    throw new CommandError(`${cmd} was killed by ${res.signal}`, { kind: "signal", commandLine, stderr });
  }
  if (res.status !== 0) {
    throw new CommandError(`${cmd} exited with code ${res.status ?? "null"}`, {
      kind: "exit",
      commandLine,
      status: res.status,
      stderr,
    });
  }

  let stdout: string;
  try {
    stdout = new TextDecoder("utf-8", { fatal: true }).decode(res.stdout);
  } catch (e) {
    throw new InvalidEncodingError(commandLine, e instanceof Error ? e.message : String(e));
  }
  return stdout.trimEnd();
}

export function isCommandFailure(value: unknown): value is CommandFailure {
  return value instanceof CommandError || value instanceof InvalidEncodingError;
}

export function command(commandLine: string, opts: CommandOpts = {}): Result<string, CommandFailure> {
  try {
    return ok(captureCommand(commandLine, opts));
  } catch (e) {
    if (!isCommandFailure(e)) throw e;
    opts.logger?.debug({ cmd: commandLine, err: e }, "command failed");
    return err(e);
  }
}

export function createCommandRunner(opts: CommandOpts = {}): CommandRunner {
  return (commandLine) => command(commandLine, opts);
}
