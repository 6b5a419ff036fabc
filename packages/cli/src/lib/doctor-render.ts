import process from "node:process";
import type { ColorMode } from "@xmobile/core/lib/config";
import type { DoctorEnv } from "@xmobile/core/lib/runtime/env";
import type { RenderConfig, Section } from "@xmobile/core/doctor";

export const DEFAULT_WIDTH = 80;
export const MIN_WIDTH = 20;

type TerminalLike = {
  isTTY?: boolean;
  columns?: number;
};

export function supportsColor(out: TerminalLike, env: DoctorEnv): boolean {
  if (!out.isTTY) return false;
  if (env["NO_COLOR"]) return false;
  if (env["TERM"] === "dumb") return false;
  return true;
}

function positiveInt(value: unknown): number | undefined {
  const n = typeof value === "number" ? Math.trunc(value) : Number.parseInt(String(value ?? ""), 10);
  return Number.isFinite(n) && n > 0 ? n : undefined;
}

export function resolveRenderConfig(params: {
  out?: TerminalLike;
  env?: DoctorEnv;
  color?: ColorMode;
  width?: number;
}): RenderConfig {
  const out = params.out ?? process.stdout;
  const env = params.env ?? process.env;
  const mode = params.color ?? "auto";
  const color = mode === "always" ? true : mode === "never" ? false : supportsColor(out, env);
  const width = params.width ?? (out.isTTY ? positiveInt(out.columns) : undefined) ?? positiveInt(env["COLUMNS"]) ?? DEFAULT_WIDTH;
  return { width: Math.max(MIN_WIDTH, width), color };
}

// Whether empty sections show up is the caller's call, not the section's.
export function renderDoctorReport(params: { sections: readonly Section[]; config: RenderConfig; showEmpty: boolean }): string {
  return params.sections
    .filter((section) => params.showEmpty || !section.isEmpty())
    .map((section) => section.render(params.config))
    .join("\n");
}
