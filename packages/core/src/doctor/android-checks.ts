import fs from "node:fs";
import path from "node:path";
import { readEnvVar, readFirstEnvVar } from "../lib/runtime/env.js";
import { DoctorItem } from "./item.js";
import { Section } from "./section.js";
import type { DoctorContext } from "./types.js";

export const ANDROID_SDK_ENV_VARS = ["ANDROID_HOME", "ANDROID_SDK_ROOT"] as const;
const MIN_NDK_MAJOR = 19;

function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}

export function parseNdkRevision(sourceProperties: string): string | null {
  const m = /^\s*Pkg\.Revision\s*=\s*(\S+)\s*$/m.exec(sourceProperties);
  return m?.[1] ?? null;
}

function sdkItem(ctx: DoctorContext): DoctorItem {
  const res = readFirstEnvVar(ctx.env, ANDROID_SDK_ENV_VARS);
  if (!res.ok) return DoctorItem.fromResult(res);
  const { name, value } = res.value;
  if (!isDirectory(value)) return DoctorItem.warning(`${name} is set to ${value}, which isn't a directory`);
  return DoctorItem.victory(`SDK root set to ${value}`);
}

function ndkItem(ctx: DoctorContext): DoctorItem {
  const res = readEnvVar(ctx.env, "NDK_HOME");
  if (!res.ok) return DoctorItem.fromResult(res);
  const propsPath = path.join(res.value, "source.properties");
  let text: string;
  try {
    text = fs.readFileSync(propsPath, "utf8");
  } catch (e) {
    return DoctorItem.failure(`Failed to read NDK version from ${propsPath}: ${e instanceof Error ? e.message : String(e)}`);
  }
  const revision = parseNdkRevision(text);
  if (!revision) return DoctorItem.failure(`No Pkg.Revision found in ${propsPath}`);
  const major = Number.parseInt(revision, 10);
  if (!Number.isFinite(major) || major < MIN_NDK_MAJOR) {
    return DoctorItem.warning(`NDK v${revision} is older than the minimum supported r${MIN_NDK_MAJOR}`);
  }
  return DoctorItem.victory(`NDK v${revision} at ${res.value}`);
}

export function androidSection(ctx: DoctorContext): Section {
  return new Section("Android developer tools").addItems([sdkItem(ctx), ndkItem(ctx)]);
}
