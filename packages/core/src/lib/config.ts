import { z } from "zod";
import { parseLogLevel, type LogLevel } from "./logging/logger.js";
import type { DoctorEnv } from "./runtime/env.js";

export const COLOR_MODES = ["auto", "always", "never"] as const;
export type ColorMode = (typeof COLOR_MODES)[number];

const blankToUndefined = (value: unknown) => {
  if (value == null) return undefined;
  const trimmed = String(value).trim();
  return trimmed === "" ? undefined : trimmed;
};

export const DoctorSettingsSchema = z.object({
  color: z.preprocess(
    (v) => blankToUndefined(v)?.toLowerCase(),
    z.enum(COLOR_MODES, { message: `color must be one of ${COLOR_MODES.join("|")}` }).default("auto"),
  ),
  width: z.preprocess(blankToUndefined, z.coerce.number().int().min(20, { message: "width must be an integer >= 20" }).optional()),
  logLevel: z.unknown().transform((value, ctx): LogLevel => {
    try {
      return parseLogLevel(value, "warn");
    } catch (e) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: e instanceof Error ? e.message : String(e) });
      return z.NEVER;
    }
  }),
  logFile: z.preprocess(blankToUndefined, z.string().optional()),
  strict: z.boolean().default(false),
  showEmpty: z.boolean().default(false),
});

export type DoctorSettings = z.infer<typeof DoctorSettingsSchema>;

export type DoctorSettingsInput = {
  color?: string;
  width?: string | number;
  logLevel?: string;
  logFile?: string;
  strict?: boolean;
  showEmpty?: boolean;
};

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

// CLI flags win over XMOBILE_* variables.
export function resolveDoctorSettings(params: { args: DoctorSettingsInput; env: DoctorEnv }): DoctorSettings {
  const parsed = DoctorSettingsSchema.safeParse({
    color: params.args.color ?? params.env["XMOBILE_COLOR"],
    width: params.args.width,
    logLevel: params.args.logLevel ?? params.env["XMOBILE_LOG_LEVEL"],
    logFile: params.args.logFile ?? params.env["XMOBILE_LOG_FILE"],
    strict: Boolean(params.args.strict),
    showEmpty: Boolean(params.args.showEmpty),
  });
  if (!parsed.success) throw new Error(`invalid doctor settings: ${formatIssues(parsed.error)}`);
  return parsed.data;
}

export type { LogLevel };
