/**
 * Command-line interface
 *
 * Parses the backport flags with commander, validates them with zod and
 * runs the orchestrator. {@link runCli} returns the exit code instead of
 * exiting so that it can be driven from tests.
 */

import { Command, CommanderError } from "commander";
import { z } from "zod";
import { type BackportConfig, loadConfig } from "./config.js";
import {
  BackportError,
  CodeHostError,
  ConfigError,
} from "./errors.js";
import { createBackportOrchestrator } from "./factory.js";
import { Logger } from "./logging/logger.js";
import type { BackportOrchestrator } from "./orchestration/backport-orchestrator.js";
import type { BackportResult } from "./orchestration/backport-orchestrator-types.js";
import { isValidRepoName } from "./pipeline/backport-pipeline.js";

/**
 * Output streams of the CLI
 */
export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

/**
 * Injectable collaborators of {@link runCli}
 */
export interface CliDeps {
  io?: CliIo;
  /** Environment read by {@link loadConfig} (default: `process.env`) */
  env?: NodeJS.ProcessEnv;
  createOrchestrator?: (
    config: BackportConfig,
    logger: Logger,
  ) => Pick<BackportOrchestrator, "backportPullRequest">;
}

const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

const nonEmpty = z.string().min(1);

const optionsSchema = z.object({
  username: nonEmpty,
  password: nonEmpty,
  number: z.coerce.number().int().positive(),
  repo: nonEmpty.refine(isValidRepoName, "Invalid repository name"),
  destBranch: nonEmpty,
  branch: nonEmpty,
  committerName: nonEmpty,
  committerEmail: nonEmpty,
  dryRun: z.boolean().optional(),
  upstreamOwner: nonEmpty.optional(),
  timeout: z.coerce.number().int().nonnegative().optional(),
});

type CliOptions = z.infer<typeof optionsSchema>;

/**
 * Build the commander program
 */
export function createProgram(io: CliIo = defaultIo): Command {
  return new Command()
    .name("backport-pr")
    .description(
      "Backport a merged pull request onto another branch and open a pull request for it",
    )
    .version("0.1.0")
    .requiredOption("-u, --username <login>", "your GitHub login")
    .requiredOption("-p, --password <password>", "your GitHub password")
    .requiredOption("-n, --number <number>", "number of the pull request to backport")
    .requiredOption("-r, --repo <name>", "repository name")
    .requiredOption("-d, --dest-branch <branch>", "branch to backport onto")
    .requiredOption("-b, --branch <name>", "name of the branch to create")
    .requiredOption("-g, --committer-name <name>", "committer name for the cherry-picks")
    .requiredOption("-e, --committer-email <email>", "committer email for the cherry-picks")
    .option("-o, --upstream-owner <owner>", "owner of the upstream repository")
    .option("--timeout <ms>", "kill a git command after this many milliseconds")
    .option("--dry-run", "fetch the pull request and print the plan without running it")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
    });
}

/**
 * Run the CLI
 *
 * @param argv - Arguments after the program name
 * @returns Process exit code
 *
 * @remarks
 * A missing or invalid flag prints the usage to stdout and returns 1 before
 * any git command or API call. Failures of the backport itself are reported
 * on stderr.
 */
export async function runCli(
  argv: readonly string[],
  deps: CliDeps = {},
): Promise<number> {
  const io = deps.io ?? defaultIo;
  const program = createProgram(io);

  try {
    program.parse([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version end here too
      if (error.exitCode === 0) {
        return 0;
      }
      io.stdout(program.helpInformation());
      return 1;
    }
    throw error;
  }

  const parsed = optionsSchema.safeParse(program.opts());
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      io.stderr(`error: invalid value for ${flagName(issue.path)}: ${issue.message}\n`);
    }
    io.stdout(program.helpInformation());
    return 1;
  }
  const options = parsed.data;

  let config: BackportConfig;
  try {
    config = withOverrides(loadConfig(deps.env ?? process.env), options);
  } catch (error) {
    if (error instanceof ConfigError) {
      io.stderr(`error: ${error.message}\n`);
      return 1;
    }
    throw error;
  }

  const logger = new Logger({
    logLevel: config.logLevel,
    logFile: config.logFile,
    consoleWriter: {
      log: (line) => io.stderr(`${line}\n`),
      warn: (line) => io.stderr(`${line}\n`),
      error: (line) => io.stderr(`${line}\n`),
    },
  });
  const orchestrator = (deps.createOrchestrator ?? defaultOrchestrator)(
    config,
    logger,
  );

  io.stdout("OK.\n");

  try {
    const result = await orchestrator.backportPullRequest({
      username: options.username,
      password: options.password,
      number: options.number,
      repo: options.repo,
      destBranch: options.destBranch,
      branchName: options.branch,
      committerName: options.committerName,
      committerEmail: options.committerEmail,
      dryRun: options.dryRun,
    });
    io.stdout(formatResult(result, options.repo));
    return 0;
  } catch (error) {
    if (error instanceof BackportError) {
      io.stderr(`error: ${error.message}\n`);
      io.stderr(`Command output was appended to ${config.commandLog}\n`);
      return 1;
    }
    if (error instanceof CodeHostError) {
      io.stderr(`error: ${error.message}\n`);
      return 1;
    }
    throw error;
  }
}

function defaultOrchestrator(
  config: BackportConfig,
  logger: Logger,
): BackportOrchestrator {
  return createBackportOrchestrator(config, { logger });
}

function withOverrides(
  config: BackportConfig,
  options: CliOptions,
): BackportConfig {
  return {
    ...config,
    upstreamOwner: options.upstreamOwner ?? config.upstreamOwner,
    commandTimeoutMs: options.timeout ?? config.commandTimeoutMs,
  };
}

/**
 * `--dest-branch` for the `destBranch` option
 */
function flagName(path: ReadonlyArray<string | number>): string {
  const key = String(path[0] ?? "");
  return `--${key.replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`)}`;
}

function formatResult(result: BackportResult, repo: string): string {
  if (!result.dryRun) {
    return `${result.created.url}\n`;
  }

  const lines = result.commands.map(
    (command) => `(${command.cwd}) ${command.command}`,
  );
  lines.push(
    `Would open a pull request on ${result.owner}/${repo}: ${result.submission.head} -> ${result.submission.base} "${result.submission.title}"`,
  );
  return `${lines.join("\n")}\n`;
}
