/**
 * Tests for shell command execution
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Logger } from "../logging/logger.js";
import { CLogLevel } from "../logging/logger-types.js";
import { CExecutionKind, CExitKind } from "../types/constants.js";
import type { ExecutionResult } from "../types/process.js";
import { executeCommand, ShellProcessRunner, signalNumber } from "./exec.js";

function expectFinished(result: ExecutionResult) {
  if (result.kind !== CExecutionKind.FINISHED) {
    throw new Error(`expected a finished result, got ${result.kind}`);
  }
  return result;
}

describe("executeCommand", () => {
  let workDir: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), "backport-exec-"));
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it("captures stdout and exit code 0", async () => {
    const result = expectFinished(
      await executeCommand({ cwd: workDir, command: "echo hello" }),
    );

    expect(result.status).toEqual({ kind: CExitKind.EXITED, code: 0 });
    expect(result.stdout).toBe("hello\n");
    expect(result.stderr).toBe("");
    expect(result.timedOut).toBe(false);
  });

  it("captures stderr separately", async () => {
    const result = expectFinished(
      await executeCommand({ cwd: workDir, command: "echo oops >&2" }),
    );

    expect(result.stdout).toBe("");
    expect(result.stderr).toBe("oops\n");
  });

  it("reports non-zero exit codes", async () => {
    const result = expectFinished(
      await executeCommand({ cwd: workDir, command: "exit 3" }),
    );

    expect(result.status).toEqual({ kind: CExitKind.EXITED, code: 3 });
  });

  it("runs in the given directory", async () => {
    const result = expectFinished(
      await executeCommand({ cwd: workDir, command: "pwd" }),
    );

    expect(fs.realpathSync(result.stdout.trim())).toBe(
      fs.realpathSync(workDir),
    );
  });

  it("reports signal termination with the signal number", async () => {
    const result = expectFinished(
      await executeCommand({ cwd: workDir, command: "kill -TERM $$" }),
    );

    expect(result.status).toEqual({
      kind: CExitKind.SIGNALED,
      signal: os.constants.signals.SIGTERM,
      name: "SIGTERM",
    });
  });

  it("inherits the parent environment and layers overrides on top", async () => {
    process.env.BACKPORT_TEST_INHERITED = "inherited";
    try {
      const result = expectFinished(
        await executeCommand(
          {
            cwd: workDir,
            command: 'echo "$BACKPORT_TEST_INHERITED $BACKPORT_TEST_EXTRA"',
          },
          { env: { BACKPORT_TEST_EXTRA: "extra" } },
        ),
      );

      expect(result.stdout).toBe("inherited extra\n");
    } finally {
      delete process.env.BACKPORT_TEST_INHERITED;
    }
  });

  it("resolves to an error when the directory does not exist", async () => {
    const result = await executeCommand({
      cwd: path.join(workDir, "missing"),
      command: "echo never",
    });

    expect(result.kind).toBe(CExecutionKind.ERROR);
  });

  it("never changes the process working directory", async () => {
    const before = process.cwd();

    await executeCommand({ cwd: workDir, command: "true" });
    expect(process.cwd()).toBe(before);

    await executeCommand({ cwd: workDir, command: "exit 1" });
    expect(process.cwd()).toBe(before);

    await executeCommand({ cwd: path.join(workDir, "missing"), command: "true" });
    expect(process.cwd()).toBe(before);
  });

  it("terminates commands that exceed their timeout", async () => {
    const result = expectFinished(
      await executeCommand(
        { cwd: workDir, command: "exec sleep 5" },
        { timeoutMs: 50 },
      ),
    );

    expect(result.timedOut).toBe(true);
    expect(result.status).toEqual({
      kind: CExitKind.SIGNALED,
      signal: os.constants.signals.SIGTERM,
      name: "SIGTERM",
    });
  });

  it("stops every process the command started when it times out", async () => {
    const startedAt = Date.now();
    const result = expectFinished(
      await executeCommand(
        { cwd: workDir, command: "sleep 4 | cat" },
        { timeoutMs: 100 },
      ),
    );

    expect(result.timedOut).toBe(true);
    expect(Date.now() - startedAt).toBeLessThan(1500);
  });

  it("appends output to the command log", async () => {
    const logPath = path.join(workDir, "logs", "commands.log");

    await executeCommand({ cwd: workDir, command: "echo one" }, { logPath });
    await executeCommand({ cwd: workDir, command: "echo two >&2" }, { logPath });

    const lines = fs.readFileSync(logPath, "utf-8").split("\n");
    expect(lines).toHaveLength(7);
    expect(lines[0]).toMatch(/^=== \S+ echo one \(in .+\) ===$/);
    expect(lines.slice(1, 3)).toEqual(["one", "=== exit 0 ==="]);
    expect(lines[3]).toMatch(/^=== \S+ echo two >&2 \(in .+\) ===$/);
    expect(lines.slice(4)).toEqual(["two", "=== exit 0 ===", ""]);
  });

  it("logs the command before running it", async () => {
    const consoleWriter = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const logger = new Logger({ logLevel: CLogLevel.DEBUG, consoleWriter });

    await executeCommand({ cwd: workDir, command: "true" }, {}, logger);

    const entry = JSON.parse(String(consoleWriter.log.mock.calls[0]?.[0]));
    expect(entry.event).toBe("command.start");
    expect(entry.message).toBe(`Executing true in ${workDir}`);
  });

  it("logs spawn failures with a stack trace", async () => {
    const consoleWriter = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const logger = new Logger({ logLevel: CLogLevel.INFO, consoleWriter });

    await executeCommand(
      { cwd: path.join(workDir, "missing"), command: "true" },
      {},
      logger,
    );

    const entry = JSON.parse(String(consoleWriter.error.mock.calls[0]?.[0]));
    expect(entry.event).toBe("command.spawn_failed");
    expect(typeof entry.metadata.stack).toBe("string");
  });
});

describe("ShellProcessRunner", () => {
  it("delegates to executeCommand", async () => {
    const runner = new ShellProcessRunner();
    const result = expectFinished(
      await runner.execute({ cwd: os.tmpdir(), command: "printf abc" }),
    );

    expect(result.stdout).toBe("abc");
  });
});

describe("signalNumber", () => {
  it("maps signal names to platform numbers", () => {
    expect(signalNumber("SIGKILL")).toBe(os.constants.signals.SIGKILL);
    expect(signalNumber("NOT_A_SIGNAL")).toBe(0);
  });
});
