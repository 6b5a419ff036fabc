import { err, ok, type Result } from "../result.js";

export type DoctorEnv = Readonly<Record<string, string | undefined>>;

export class EnvVarError extends Error {
  readonly varName: string;

  constructor(varName: string) {
    super(`environment variable not set: ${varName}`);
    this.name = "EnvVarError";
    this.varName = varName;
  }
}

export function readEnvVar(env: DoctorEnv, name: string): Result<string, EnvVarError> {
  const value = String(env[name] ?? "").trim();
  return value ? ok(value) : err(new EnvVarError(name));
}

// First variable that is set wins; the error names the first candidate.
export function readFirstEnvVar(env: DoctorEnv, names: readonly [string, ...string[]]): Result<{ name: string; value: string }, EnvVarError> {
  for (const name of names) {
    const res = readEnvVar(env, name);
    if (res.ok) return ok({ name, value: res.value });
  }
  return err(new EnvVarError(names[0]));
}
