import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const TEST_TIMEOUT_MS = 15_000;

const runMainMock = vi.fn();
const defineCommandMock = vi.fn((cmd: unknown) => cmd);

vi.mock("citty", () => ({
  runMain: runMainMock,
  defineCommand: defineCommandMock,
}));

describe("cli main", () => {
  const originalArgv = process.argv.slice();
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    vi.resetModules();
    vi.clearAllMocks();
    process.argv = originalArgv.slice();
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.argv = originalArgv.slice();
    process.exitCode = undefined;
  });

  it(
    "prints version and exits",
    async () => {
      process.argv = ["node", "xmobile", "--version"];
      const exitSpy = vi.spyOn(process, "exit").mockImplementation((code) => {
        throw new Error(`exit:${String(code ?? 0)}`);
      });
      const mod = await import("../src/main.js");
      await expect(mod.mainEntry()).rejects.toThrow("exit:0");
      expect(logSpy).toHaveBeenCalledWith("0.1.0");
      expect(exitSpy).toHaveBeenCalledWith(0);
      expect(runMainMock).not.toHaveBeenCalled();
    },
    TEST_TIMEOUT_MS,
  );

  it("reads the version from the cli manifest", async () => {
    const mod = await import("../src/main.js");
    expect(mod.readCliVersion()).toBe("0.1.0");
  });

  it(
    "normalizes args and runs main",
    async () => {
      process.argv = ["node", "xmobile", "--", "doctor", "--strict"];
      const mod = await import("../src/main.js");
      await mod.mainEntry();
      expect(runMainMock).toHaveBeenCalledTimes(1);
      expect(process.argv).toEqual(["node", "xmobile", "doctor", "--strict"]);
    },
    TEST_TIMEOUT_MS,
  );

  it(
    "reports fatal errors with the stack only in debug mode",
    async () => {
      const mod = await import("../src/main.js");
      const failure = new Error("env file not found: /work/missing.env");

      mod.reportFatalError(failure, {});
      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(errorSpy).toHaveBeenCalledWith("env file not found: /work/missing.env");
      expect(process.exitCode).toBe(1);

      errorSpy.mockClear();
      mod.reportFatalError(failure, { XMOBILE_DEBUG: "1" });
      expect(errorSpy).toHaveBeenCalledTimes(2);
      expect(errorSpy).toHaveBeenLastCalledWith(failure.stack);
    },
    TEST_TIMEOUT_MS,
  );
});
