import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { registerStatusCommand } from "../../src/commands/status.js";
import { registerValidateCommand } from "../../src/commands/validate.js";
import { runCommand } from "../helpers.js";

describe("status and validate commands", () => {
  let tmpDir: string;
  let configDir: string;
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  function lastJson(): Record<string, unknown> {
    const calls = logSpy.mock.calls;
    return JSON.parse(String(calls[calls.length - 1][0]));
  }

  async function writeBadTable(): Promise<void> {
    await mkdir(join(configDir, "domains"), { recursive: true });
    await writeFile(join(configDir, "domains", "style.csv"), "Style Category,Keywords\n,orphan\n", "utf-8");
  }

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "swatchbook-status-cmd-test-"));
    configDir = join(tmpDir, ".swatchbook");
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    process.exitCode = undefined;
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("status reports a missing configuration as disabled", async () => {
    await runCommand(registerStatusCommand, ["--json", "--config", configDir, "status"]);
    expect(lastJson()).toMatchObject({ success: true, command: "status", enabled: false, health: "healthy" });
  });

  it("status prints the health line in text mode", async () => {
    await writeBadTable();
    await runCommand(registerStatusCommand, ["--config", configDir, "status"]);
    expect(String(logSpy.mock.calls[0][0])).toContain("Health: error");
    expect(process.exitCode).toBeUndefined();
  });

  it("validate passes a clean configuration", async () => {
    await runCommand(registerValidateCommand, ["--json", "--config", configDir, "validate"]);
    expect(lastJson()).toMatchObject({ success: true, command: "validate", valid: true, errors: [] });
    expect(process.exitCode).toBeUndefined();
  });

  it("validate fails with the offending rows", async () => {
    await writeBadTable();
    await runCommand(registerValidateCommand, ["--json", "--config", configDir, "validate"]);
    const output = lastJson();
    expect(output.valid).toBe(false);
    expect(output.errors).toEqual([
      {
        file: "domains/style.csv",
        row: 1,
        field: "Style Category",
        message: "Skipping row: missing id ('id' or 'Style Category')",
        severity: "error",
      },
    ]);
    expect(process.exitCode).toBe(1);
  });

  it("validate prints a summary in text mode", async () => {
    await writeBadTable();
    await runCommand(registerValidateCommand, ["--config", configDir, "validate"]);
    expect(String(logSpy.mock.calls[0][0])).toContain("1 errors, 1 warnings");
    expect(String(errorSpy.mock.calls[0][0])).toContain(
      "error domains/style.csv:1 [Style Category] - Skipping row: missing id ('id' or 'Style Category')",
    );
  });
});
