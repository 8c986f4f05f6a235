import * as fc from "fast-check";
import { describe, expect, it, vi } from "vitest";
import { BackportError } from "../errors.js";
import { Logger } from "../logging/logger.js";
import {
  exitedWith,
  FakeProcessRunner,
} from "../utils/__fakes__/fake-process-runner.js";
import {
  buildBackportCommands,
  isValidRepoName,
  prepareGitRepo,
  remoteUrl,
  repoPathFor,
} from "./backport-pipeline.js";
import { CommandSequencer } from "./command-sequencer.js";
import type { BackportRepoOptions } from "./pipeline-types.js";

const aliceToBob: BackportRepoOptions = {
  destBranch: "master",
  author: "alice",
  repo: "foo",
  shas: ["abc123", "def456"],
  branchName: "backport-42",
  caller: "bob",
  committerName: "Bob Builder",
  committerEmail: "bob@example.com",
};

describe("remoteUrl", () => {
  it("builds SSH remote URLs", () => {
    expect(remoteUrl("github.com", "alice", "foo")).toBe(
      "git@github.com:alice/foo.git",
    );
  });
});

describe("repoPathFor", () => {
  it("places the clone in the scratch directory", () => {
    expect(repoPathFor("foo")).toBe("/tmp/foo");
    expect(repoPathFor("foo", { scratchDir: "/var/backports" })).toBe(
      "/var/backports/foo",
    );
  });
});

describe("isValidRepoName", () => {
  it("accepts plain repository names", () => {
    expect(isValidRepoName("foo")).toBe(true);
    expect(isValidRepoName("xen-api.libs_2")).toBe(true);
    expect(isValidRepoName("..foo")).toBe(true);
  });

  it("rejects names that leave the scratch directory", () => {
    expect(isValidRepoName("..")).toBe(false);
    expect(isValidRepoName(".")).toBe(false);
    expect(isValidRepoName("../etc")).toBe(false);
    expect(isValidRepoName("/etc")).toBe(false);
  });
});

describe("buildBackportCommands", () => {
  it("builds the full sequence when the caller is not the author", () => {
    expect(buildBackportCommands(aliceToBob)).toEqual([
      { cwd: "/tmp", command: "git clone -b master git@github.com:xen-org/foo.git" },
      { cwd: "/tmp/foo", command: "git remote add bob git@github.com:bob/foo.git" },
      { cwd: "/tmp/foo", command: "git config user.name 'Bob Builder'" },
      { cwd: "/tmp/foo", command: "git config user.email bob@example.com" },
      { cwd: "/tmp/foo", command: "git remote add alice git@github.com:alice/foo.git" },
      { cwd: "/tmp/foo", command: "git fetch alice" },
      { cwd: "/tmp/foo", command: "git checkout -b backport-42" },
      { cwd: "/tmp/foo", command: "git cherry-pick abc123" },
      { cwd: "/tmp/foo", command: "git cherry-pick def456" },
      { cwd: "/tmp/foo", command: "git push bob backport-42" },
    ]);
  });

  it("fetches from and pushes to the author's remote when the caller is the author", () => {
    const lines = buildBackportCommands({ ...aliceToBob, caller: "alice" }).map(
      (command) => command.command,
    );

    expect(lines).toEqual([
      "git clone -b master git@github.com:xen-org/foo.git",
      "git config user.name 'Bob Builder'",
      "git config user.email bob@example.com",
      "git remote add alice git@github.com:alice/foo.git",
      "git fetch alice",
      "git checkout -b backport-42",
      "git cherry-pick abc123",
      "git cherry-pick def456",
      "git push alice backport-42",
    ]);
  });

  it("honors scratch directory, host and upstream owner settings", () => {
    const [clone, addCaller] = buildBackportCommands(aliceToBob, {
      scratchDir: "/work",
      gitHost: "git.example.org",
      upstreamOwner: "platform",
    });

    expect(clone).toEqual({
      cwd: "/work",
      command: "git clone -b master git@git.example.org:platform/foo.git",
    });
    expect(addCaller).toEqual({
      cwd: "/work/foo",
      command: "git remote add bob git@git.example.org:bob/foo.git",
    });
  });

  it("cherry-picks every SHA once, in order, inside the clone", () => {
    fc.assert(
      fc.property(
        fc.array(fc.hexaString({ minLength: 7, maxLength: 40 }), {
          maxLength: 20,
        }),
        (shas) => {
          const picks = buildBackportCommands({ ...aliceToBob, shas }).filter(
            (command) => command.command.startsWith("git cherry-pick "),
          );

          expect(picks).toEqual(
            shas.map((sha) => ({
              cwd: "/tmp/foo",
              command: `git cherry-pick ${sha}`,
            })),
          );
        },
      ),
    );
  });

  it.each(["../etc", "..", ".", "foo/bar", "foo bar", ""])(
    "refuses to plan for repository name %j",
    (repo) => {
      expect(() => buildBackportCommands({ ...aliceToBob, repo })).toThrow(
        new BackportError(`Invalid repository name: ${repo}`),
      );
    },
  );

  it("quotes values the shell would otherwise split", () => {
    const commands = buildBackportCommands({
      ...aliceToBob,
      committerName: "O'Neil",
    });

    expect(commands[2]?.command).toBe("git config user.name 'O'\\''Neil'");
  });
});

describe("prepareGitRepo", () => {
  it("runs every command and reports the pushed branch", async () => {
    const runner = new FakeProcessRunner();
    const sequencer = new CommandSequencer({ runner });

    const result = await prepareGitRepo(sequencer, aliceToBob);

    expect(result).toEqual({
      success: true,
      branch: "backport-42",
      repoPath: "/tmp/foo",
      commandsRun: 10,
    });
    expect(runner.commands()).toEqual(buildBackportCommands(aliceToBob));
  });

  it("stops at a failing cherry-pick and returns the failure", async () => {
    const runner = new FakeProcessRunner().respondTo(
      "git cherry-pick abc123",
      exitedWith(1, "", "error: could not apply abc123"),
    );
    const sequencer = new CommandSequencer({ runner });

    const result = await prepareGitRepo(sequencer, aliceToBob);

    expect(result).toEqual({
      success: false,
      error: "git cherry-pick abc123 : Failed with code 1",
      failedCommand: { cwd: "/tmp/foo", command: "git cherry-pick abc123" },
      repoPath: "/tmp/foo",
      commandsRun: 7,
    });
    expect(runner.commandLines()).not.toContain("git cherry-pick def456");
    expect(runner.commandLines().at(-1)).toBe("git cherry-pick abc123");
  });

  it("logs the failure at error level", async () => {
    const runner = new FakeProcessRunner().respondTo(
      "git fetch alice",
      exitedWith(128),
    );
    const consoleWriter = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const logger = new Logger({ consoleWriter });

    await prepareGitRepo(new CommandSequencer({ runner }), aliceToBob, {}, logger);

    const entry = JSON.parse(String(consoleWriter.error.mock.calls[0]?.[0]));
    expect(entry).toMatchObject({
      level: "error",
      event: "pipeline.failed",
      error: "git fetch alice : Failed with code 128",
      metadata: { repoPath: "/tmp/foo", commandsRun: 5, remaining: 4 },
    });
  });

  it("rejects repository names that escape the scratch directory", async () => {
    const runner = new FakeProcessRunner();

    const result = await prepareGitRepo(new CommandSequencer({ runner }), {
      ...aliceToBob,
      repo: "../etc",
    });

    expect(result.success).toBe(false);
    expect(result.success === false && result.error).toBe(
      "Invalid repository name: ../etc",
    );
    expect(runner.invocations).toHaveLength(0);
  });

  it("propagates errors that are not command failures", async () => {
    const runner = new FakeProcessRunner();
    vi.spyOn(runner, "execute").mockRejectedValue(new Error("runner broke"));

    await expect(
      prepareGitRepo(new CommandSequencer({ runner }), aliceToBob),
    ).rejects.toThrow("runner broke");
  });
});
