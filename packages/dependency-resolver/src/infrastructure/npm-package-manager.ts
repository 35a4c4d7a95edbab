import { CommandExecutionError, type CommandRunner } from "@orgdeps/repo-workspace";
import type { InstalledTreeEntries, TierOutcome } from "../domain/tier-outcome.js";
import { parseInstalledTree } from "../parsing/installed-tree-parser.js";

export interface PackageManager {
  install(repositoryPath: string): Promise<TierOutcome<null>>;
  listInstalled(repositoryPath: string): Promise<TierOutcome<InstalledTreeEntries>>;
}

export type NpmPackageManagerOptions = {
  ignoreScripts: boolean;
};

const toFailure = (error: unknown): TierOutcome<never> => {
  if (error instanceof CommandExecutionError) {
    return { status: "failed", reason: error.message };
  }

  throw error;
};

export class NpmPackageManager implements PackageManager {
  constructor(
    private readonly runner: CommandRunner,
    private readonly options: NpmPackageManagerOptions = { ignoreScripts: false },
  ) {}

  async install(repositoryPath: string): Promise<TierOutcome<null>> {
    const args = this.options.ignoreScripts ? ["install", "--ignore-scripts"] : ["install"];
    try {
      const result = await this.runner.run("npm", args, { cwd: repositoryPath });
      if (result.exitCode !== 0) {
        return { status: "failed", reason: `npm install exited with code ${result.exitCode}` };
      }

      return { status: "data", value: null };
    } catch (error) {
      return toFailure(error);
    }
  }

  async listInstalled(repositoryPath: string): Promise<TierOutcome<InstalledTreeEntries>> {
    try {
      // npm ls exits non-zero for peer or extraneous problems but still prints the tree.
      const result = await this.runner.run("npm", ["ls", "--json", "--all"], { cwd: repositoryPath });
      return parseInstalledTree(result.stdout);
    } catch (error) {
      return toFailure(error);
    }
  }
}
