import type { CommandResult, CommandRunner } from "./command-runner.js";

export interface GitClient {
  shallowClone(repositoryUrl: string, destinationPath: string): Promise<CommandResult>;
}

export class GitCliClient implements GitClient {
  constructor(private readonly runner: CommandRunner) {}

  shallowClone(repositoryUrl: string, destinationPath: string): Promise<CommandResult> {
    return this.runner.run("git", ["clone", "--depth=1", repositoryUrl, destinationPath]);
  }
}
