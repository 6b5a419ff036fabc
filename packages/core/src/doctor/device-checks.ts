import path from "node:path";
import { quoteArg } from "../lib/runtime/command.js";
import { readFirstEnvVar } from "../lib/runtime/env.js";
import { runAndSearch } from "../lib/runtime/search.js";
import { ANDROID_SDK_ENV_VARS } from "./android-checks.js";
import { DoctorItem } from "./item.js";
import { Section } from "./section.js";
import type { DoctorContext } from "./types.js";

const ADB_HEADER_RE = /List of devices attached/;

export type AdbDevice = {
  serial: string;
  state: string;
  model?: string;
};

export function parseAdbDevices(output: string): AdbDevice[] {
  const devices: AdbDevice[] = [];
  for (const raw of output.split("\n")) {
    const line = raw.trim();
    if (!line || line.startsWith("List of devices") || line.startsWith("*")) continue;
    const [serial, state, ...rest] = line.split(/\s+/);
    if (!serial || !state) continue;
    const model = rest.find((field) => field.startsWith("model:"))?.slice("model:".length);
    devices.push(model ? { serial, state, model: model.replace(/_/g, " ") } : { serial, state });
  }
  return devices;
}

export function adbCommandLine(ctx: DoctorContext): string {
  const sdk = readFirstEnvVar(ctx.env, ANDROID_SDK_ENV_VARS);
  const adb = sdk.ok ? path.join(sdk.value.value, "platform-tools", "adb") : "adb";
  return `${quoteArg(adb)} devices -l`;
}

function deviceItem(device: AdbDevice): DoctorItem {
  const label = device.model ? `${device.model} (${device.serial})` : device.serial;
  if (device.state === "device") return DoctorItem.victory(label);
  return DoctorItem.warning(`${label} is ${device.state}`);
}

export function deviceSection(ctx: DoctorContext): Section {
  const section = new Section("Connected devices");
  const res = runAndSearch(ctx.run, adbCommandLine(ctx), ADB_HEADER_RE);
  if (!res.ok) return section.addItem(DoctorItem.fromResult(res));
  const devices = parseAdbDevices(res.value.input);
  if (devices.length === 0) return section.addItem(DoctorItem.warning("No connected Android devices found"));
  return section.addItems(devices.map(deviceItem));
}
