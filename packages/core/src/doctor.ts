import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import dotenv from "dotenv";
import type { Logger } from "./lib/logging/logger.js";
import { BUNDLED_COMMIT_MSG_HOOK, findGitRoot } from "./lib/project/commit-msg-hook.js";
import { createCommandRunner, type CommandRunner } from "./lib/runtime/command.js";
import type { DoctorEnv } from "./lib/runtime/env.js";
import { androidSection } from "./doctor/android-checks.js";
import { appleSection } from "./doctor/apple-checks.js";
import { deviceSection } from "./doctor/device-checks.js";
import { toolchainSection } from "./doctor/toolchain-checks.js";
import type { Section } from "./doctor/section.js";
import type { DoctorContext } from "./doctor/types.js";

export { DoctorItem, type Displayable } from "./doctor/item.js";
export { Section, reportSeverity } from "./doctor/section.js";
export { DoctorError, toDoctorError, formatDoctorError, type DoctorFailure, type DoctorErrorDetail, type DoctorErrorKind } from "./doctor/errors.js";
export { SEVERITIES, maxSeverity, severityRank, titleSymbol, itemSymbol, severityColor, type Severity } from "./doctor/severity.js";
export type { DoctorContext, RenderConfig } from "./doctor/types.js";

export function resolveDoctorEnv(params: { cwd: string; envFile?: string; env?: NodeJS.ProcessEnv }): DoctorEnv {
  const resolvedEnvFile = params.envFile ? path.resolve(params.cwd, params.envFile) : path.join(params.cwd, ".env");
  if (params.envFile && !fs.existsSync(resolvedEnvFile)) {
    throw new Error(`env file not found: ${resolvedEnvFile}`);
  }
  const envFromFile = fs.existsSync(resolvedEnvFile) ? dotenv.parse(fs.readFileSync(resolvedEnvFile, "utf8")) : {};
  return { ...envFromFile, ...(params.env ?? process.env) };
}

export function createDoctorContext(params: {
  cwd: string;
  env: DoctorEnv;
  platform?: NodeJS.Platform;
  run?: CommandRunner;
  logger?: Logger;
}): DoctorContext {
  return {
    cwd: params.cwd,
    platform: params.platform ?? process.platform,
    env: params.env,
    run: params.run ?? createCommandRunner({ cwd: params.cwd, env: { ...params.env }, logger: params.logger }),
    repoRoot: findGitRoot(params.cwd),
    commitMsgHook: BUNDLED_COMMIT_MSG_HOOK,
  };
}

export function collectDoctorSections(ctx: DoctorContext): Section[] {
  const sections = [toolchainSection(ctx)];
  if (ctx.platform === "darwin") sections.push(appleSection(ctx));
  sections.push(androidSection(ctx), deviceSection(ctx));
  return sections;
}
