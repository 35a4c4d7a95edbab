import { Command, Option } from "commander";
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { DEFAULT_SCAN_CONFIG, type ScanConfig } from "@orgdeps/inventory";
import {
  GitHubClient,
  NpmRegistryClient,
  RegistryRequestError,
  createGitHubClientFromEnvironment,
} from "@orgdeps/registry-client";
import { REPORT_FORMATS, type ReportFormat } from "@orgdeps/reporter";
import { ExecCommandRunner } from "@orgdeps/repo-workspace";
import { formatScanOutput } from "./application/format-scan-output.js";
import { createStderrLogger, parseLogLevel, type LogLevel } from "./application/logger.js";
import { parsePositiveInteger } from "./application/parse-options.js";
import { formatCheckOutput, runCheckCommand } from "./application/run-check-command.js";
import {
  formatPackageInfoOutput,
  runPackageInfoCommand,
} from "./application/run-package-info-command.js";
import { runScanCommand } from "./application/run-scan-command.js";

const readPackageVersion = (): string => {
  const packageJsonPath = resolve(dirname(fileURLToPath(import.meta.url)), "../package.json");
  const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, "utf8"));
  if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
    return parsed.version;
  }
  return "0.0.0";
};

const logLevelOption = (): Option =>
  new Option(
    "--log-level <level>",
    "log verbosity: silent, error, warn, info, debug (logs are written to stderr)",
  )
    .choices(["silent", "error", "warn", "info", "debug"])
    .default(parseLogLevel(process.env["ORGDEPS_LOG_LEVEL"]));

const tokenOption = (): Option =>
  new Option("--token <token>", "GitHub token (defaults to the GITHUB_TOKEN environment variable)");

const program = new Command();

program
  .name("orgdeps")
  .description("Inventory the npm dependencies of every public repository in a GitHub organization")
  .version(readPackageVersion());

program
  .command("scan")
  .argument("<organization>", "GitHub organization to scan")
  .addOption(logLevelOption())
  .addOption(tokenOption())
  .addOption(
    new Option("--format <format>", "report format: html, json, md, text")
      .choices([...REPORT_FORMATS])
      .default("html"),
  )
  .option("--output <path>", "report file path (defaults to dependency-report.<ext>)")
  .option(
    "--concurrency <count>",
    "repositories processed in parallel",
    parsePositiveInteger,
    DEFAULT_SCAN_CONFIG.concurrency,
  )
  .option("--work-dir <path>", "directory for clones (defaults to a temporary directory)")
  .option("--ignore-scripts", "run npm install with --ignore-scripts")
  .option("--skip-checks", "skip the tool and token checks before scanning")
  .action(
    async (
      organization: string,
      options: {
        logLevel: LogLevel;
        token?: string;
        format: ReportFormat;
        output?: string;
        concurrency: number;
        workDir?: string;
        ignoreScripts?: boolean;
        skipChecks?: boolean;
      },
    ) => {
      const logger = createStderrLogger(options.logLevel);

      if (options.skipChecks !== true) {
        const check = await runCheckCommand(
          new ExecCommandRunner(),
          createGitHubClientFromEnvironment(options.token),
          logger,
        );
        if (!check.ok) {
          process.exitCode = 1;
          return;
        }
      }

      const config: Partial<ScanConfig> = {
        concurrency: options.concurrency,
        ignoreScripts: options.ignoreScripts === true,
        ...(options.workDir === undefined ? {} : { workDir: resolve(options.workDir) }),
      };

      try {
        const { report, outputPath } = await runScanCommand(
          organization,
          {
            format: options.format,
            config,
            ...(options.output === undefined ? {} : { outputPath: options.output }),
            ...(options.token === undefined ? {} : { token: options.token }),
          },
          logger,
        );
        process.stdout.write(`${formatScanOutput(report, outputPath)}\n`);
      } catch (error) {
        if (error instanceof RegistryRequestError) {
          logger.error(`${error.message} (${error.url})`);
          process.exitCode = 1;
          return;
        }
        throw error;
      }
    },
  );

program
  .command("check")
  .description("verify node, npm, git and the GitHub token")
  .addOption(logLevelOption())
  .addOption(tokenOption())
  .action(async (options: { logLevel: LogLevel; token?: string }) => {
    const logger = createStderrLogger(options.logLevel);
    const check = await runCheckCommand(
      new ExecCommandRunner(),
      createGitHubClientFromEnvironment(options.token),
      logger,
    );
    process.stdout.write(`${formatCheckOutput(check)}\n`);
    if (!check.ok) {
      process.exitCode = 1;
    }
  });

program
  .command("package-info")
  .argument("<name>", "npm package name")
  .addOption(logLevelOption())
  .addOption(tokenOption())
  .action(async (name: string, options: { logLevel: LogLevel; token?: string }) => {
    const logger = createStderrLogger(options.logLevel);
    const github: GitHubClient = createGitHubClientFromEnvironment(options.token);
    const result = await runPackageInfoCommand(name, { npm: new NpmRegistryClient(), github }, logger);
    process.stdout.write(`${formatPackageInfoOutput(result)}\n`);
    if (!result.found) {
      process.exitCode = 1;
    }
  });

if (process.argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

const executablePath = process.argv[0] ?? "";
const scriptPath = process.argv[1] ?? "";

const argv =
  process.argv[2] === "--"
    ? [executablePath, scriptPath, ...process.argv.slice(3)]
    : process.argv;

if (argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

await program.parseAsync(argv);
