#!/usr/bin/env node
import path from "node:path";
import process from "node:process";
import { createRequire } from "node:module";
import { pathToFileURL } from "node:url";
import { defineCommand, runMain } from "citty";
import { baseCommands } from "./commands/registry.js";

// `../package.json` is the cli manifest from both src/ and the bundled dist/.
const require = createRequire(import.meta.url);

export function readCliVersion(): string {
  const manifest: unknown = require("../package.json");
  const version = manifest && typeof manifest === "object" && "version" in manifest ? manifest.version : undefined;
  if (typeof version !== "string" || version === "") throw new Error("cli package.json has no version");
  return version;
}

const main = defineCommand({
  meta: {
    name: "xmobile",
    description: "Cross-compilation helper for mobile apps.",
  },
  subCommands: baseCommands,
});

export async function mainEntry(): Promise<void> {
  const [nodeBin = process.execPath, script = "xmobile", ...rest] = process.argv;
  const normalized = rest.filter((a) => a !== "--");
  if (normalized.includes("--version") || normalized.includes("-v")) {
    console.log(readCliVersion());
    process.exit(0);
    return;
  }
  process.argv = [nodeBin, script, ...normalized];
  await runMain(main);
}

export function reportFatalError(err: unknown, env: NodeJS.ProcessEnv = process.env): void {
  console.error(err instanceof Error ? err.message : String(err));
  if (env["XMOBILE_DEBUG"] === "1" && err instanceof Error && err.stack) {
    console.error(err.stack);
  }
  process.exitCode = 1;
}

function shouldRunMain(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  const entryUrl = pathToFileURL(path.resolve(entry)).href;
  return entryUrl === import.meta.url;
}

if (shouldRunMain()) {
  void mainEntry().catch(reportFatalError);
}
