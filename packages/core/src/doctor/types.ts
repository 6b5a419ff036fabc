import type { CommandRunner } from "../lib/runtime/command.js";
import type { DoctorEnv } from "../lib/runtime/env.js";

export type RenderConfig = {
  width: number;
  color: boolean;
};

export type DoctorContext = {
  cwd: string;
  platform: NodeJS.Platform;
  env: DoctorEnv;
  run: CommandRunner;
  /** Git checkout the commit-msg hook check looks at; null skips the check. */
  repoRoot: string | null;
  commitMsgHook: string;
};
