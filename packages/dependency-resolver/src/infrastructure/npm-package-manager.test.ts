import {
  CommandExecutionError,
  type CommandOptions,
  type CommandResult,
  type CommandRunner,
} from "@orgdeps/repo-workspace";
import { describe, expect, it } from "vitest";
import { NpmPackageManager } from "./npm-package-manager.js";

type Invocation = { command: string; args: readonly string[]; cwd: string | undefined };

class ScriptedRunner implements CommandRunner {
  readonly invocations: Invocation[] = [];

  constructor(private readonly results: ReadonlyArray<CommandResult | Error>) {}

  async run(command: string, args: readonly string[], options: CommandOptions = {}): Promise<CommandResult> {
    const next = this.results[this.invocations.length];
    this.invocations.push({ command, args, cwd: options.cwd });
    if (next === undefined) {
      throw new Error("unexpected command");
    }

    if (next instanceof Error) {
      throw next;
    }

    return next;
  }
}

describe("NpmPackageManager", () => {
  it("runs npm install in the repository directory", async () => {
    const runner = new ScriptedRunner([{ exitCode: 0, stdout: "", stderr: "" }]);
    const packageManager = new NpmPackageManager(runner);

    await expect(packageManager.install("/work/web")).resolves.toEqual({ status: "data", value: null });
    expect(runner.invocations).toEqual([{ command: "npm", args: ["install"], cwd: "/work/web" }]);
  });

  it("passes --ignore-scripts when configured", async () => {
    const runner = new ScriptedRunner([{ exitCode: 0, stdout: "", stderr: "" }]);
    const packageManager = new NpmPackageManager(runner, { ignoreScripts: true });

    await packageManager.install("/work/web");
    expect(runner.invocations[0]?.args).toEqual(["install", "--ignore-scripts"]);
  });

  it("reports a failed install for a non-zero exit or a missing npm binary", async () => {
    const runner = new ScriptedRunner([
      { exitCode: 1, stdout: "", stderr: "ERESOLVE" },
      new CommandExecutionError("spawn npm ENOENT", "npm", ["install"]),
    ]);
    const packageManager = new NpmPackageManager(runner);

    await expect(packageManager.install("/work/web")).resolves.toEqual({
      status: "failed",
      reason: "npm install exited with code 1",
    });
    await expect(packageManager.install("/work/web")).resolves.toEqual({
      status: "failed",
      reason: "spawn npm ENOENT",
    });
  });

  it("parses npm ls output even when npm ls exits non-zero", async () => {
    const runner = new ScriptedRunner([
      {
        exitCode: 1,
        stdout: JSON.stringify({ dependencies: { react: { version: "18.2.0" } } }),
        stderr: "npm ERR! code ELSPROBLEMS",
      },
    ]);
    const packageManager = new NpmPackageManager(runner);

    await expect(packageManager.listInstalled("/work/web")).resolves.toEqual({
      status: "data",
      value: { react: { version: "18.2.0" } },
    });
    expect(runner.invocations[0]).toEqual({
      command: "npm",
      args: ["ls", "--json", "--all"],
      cwd: "/work/web",
    });
  });

  it("propagates errors that are not command failures", async () => {
    const packageManager = new NpmPackageManager(new ScriptedRunner([new TypeError("boom")]));

    await expect(packageManager.install("/work/web")).rejects.toThrow("boom");
  });
});
