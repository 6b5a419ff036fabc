import process from "node:process";
import { defineCommand } from "citty";
import { collectDoctorSections, createDoctorContext, reportSeverity, resolveDoctorEnv } from "@xmobile/core/doctor";
import { resolveDoctorSettings, type DoctorSettingsInput } from "@xmobile/core/lib/config";
import { createDoctorLogger } from "@xmobile/core/lib/logging/logger";
import type { CommandRunner } from "@xmobile/core/lib/runtime/command";
import { renderDoctorReport, resolveRenderConfig } from "../../lib/doctor-render.js";

export type RunDoctorParams = {
  args: DoctorSettingsInput & { envFile?: string };
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  run?: CommandRunner;
};

/** Runs every check, prints the report and returns the exit code. */
export function runDoctor(params: RunDoctorParams): number {
  const cwd = params.cwd ?? process.cwd();
  const env = resolveDoctorEnv({ cwd, envFile: params.args.envFile, env: params.env });
  const settings = resolveDoctorSettings({ args: params.args, env });
  const logger = createDoctorLogger({ level: settings.logLevel, logFilePath: settings.logFile, bindings: { command: "doctor" } });

  const ctx = createDoctorContext({ cwd, env, platform: params.platform, run: params.run, logger });
  const sections = collectDoctorSections(ctx);
  const severity = reportSeverity(sections);
  logger.debug({ sections: sections.length, severity }, "doctor checks finished");

  const config = resolveRenderConfig({ out: process.stdout, env, color: settings.color, width: settings.width });
  console.log(renderDoctorReport({ sections, config, showEmpty: settings.showEmpty }));

  if (severity === "error") return 1;
  if (settings.strict && severity === "warning") return 1;
  return 0;
}

export const doctor = defineCommand({
  meta: {
    name: "doctor",
    description: "Check the local toolchain, SDKs and devices for mobile builds.",
  },
  args: {
    envFile: { type: "string", description: "Env file with extra variables (default: ./.env when present)." },
    strict: { type: "boolean", description: "Fail on warnings too.", default: false },
    "show-empty": { type: "boolean", description: "Print sections that have no items.", default: false },
    width: { type: "string", description: "Wrap width (default: terminal width, $COLUMNS or 80)." },
    color: { type: "string", description: "Color output: auto | always | never (default: auto, or $XMOBILE_COLOR)." },
    logLevel: { type: "string", description: "Log level for stderr diagnostics (default: warn, or $XMOBILE_LOG_LEVEL)." },
    logFile: { type: "string", description: "Also write logs to this file (default: $XMOBILE_LOG_FILE)." },
  },
  run({ args }) {
    process.exitCode = runDoctor({
      args: {
        envFile: args.envFile,
        strict: args.strict,
        showEmpty: args["show-empty"],
        width: args.width,
        color: args.color,
        logLevel: args.logLevel,
        logFile: args.logFile,
      },
    });
  },
});
