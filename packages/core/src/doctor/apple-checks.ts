import { mapOk } from "../lib/result.js";
import { runAndSearch } from "../lib/runtime/search.js";
import { DoctorItem } from "./item.js";
import { Section } from "./section.js";
import type { DoctorContext } from "./types.js";

const XCODE_VERSION_RE = /Xcode\s+(\d+)(?:\.(\d+))?(?:\.(\d+))?/;
const MIN_XCODE_MAJOR = 12;

function xcodeItem(ctx: DoctorContext): DoctorItem {
  const res = runAndSearch(ctx.run, "xcodebuild -version", XCODE_VERSION_RE);
  if (!res.ok) return DoctorItem.fromResult(res);
  const version = res.value.slice(1).filter(Boolean).join(".");
  const major = Number(res.value[1]);
  if (major < MIN_XCODE_MAJOR) {
    return DoctorItem.warning(`Xcode v${version} is older than the minimum supported version ${MIN_XCODE_MAJOR}.0`);
  }
  return DoctorItem.victory(`Xcode v${version}`);
}

function developerDirItem(ctx: DoctorContext): DoctorItem {
  const res = runAndSearch(ctx.run, "xcode-select -p", /^\S.*$/m);
  if (!res.ok) return DoctorItem.fromResult(res);
  const developerDir = res.value[0];
  if (!developerDir.includes(".app/")) {
    return DoctorItem.warning(
      `Active developer directory is ${developerDir}; select Xcode with \`sudo xcode-select -s /Applications/Xcode.app\``,
    );
  }
  return DoctorItem.victory(`Active developer directory: ${developerDir}`);
}

export function appleSection(ctx: DoctorContext): Section {
  return new Section("Apple developer tools")
    .addItem(DoctorItem.fromResult(mapOk(ctx.run("sw_vers -productVersion"), (v) => `macOS v${v}`)))
    .addItem(xcodeItem(ctx))
    .addItem(developerDirItem(ctx));
}
