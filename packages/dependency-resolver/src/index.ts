import { ExecCommandRunner, type CommandRunner } from "@orgdeps/repo-workspace";
import {
  NpmPackageManager,
  type NpmPackageManagerOptions,
  type PackageManager,
} from "./infrastructure/npm-package-manager.js";

export {
  decideAfterInstall,
  decideAfterInstalledTree,
  type DeclaredDependencies,
  type DependencyResolution,
  type FallbackReason,
  type InstallDecision,
  type InstalledTreeDecision,
  type InstalledTreeEntries,
  type TierOutcome,
} from "./domain/tier-outcome.js";
export { normalizeDependencyTree } from "./domain/normalize-dependency-tree.js";
export { parseInstalledTree } from "./parsing/installed-tree-parser.js";
export { parseManifestDependencies } from "./parsing/manifest-parser.js";
export {
  readDeclaredDependencies,
  resolveRepositoryDependencies,
  type DependencyResolutionProgressEvent,
} from "./application/resolve-repository-dependencies.js";
export { NpmPackageManager, type NpmPackageManagerOptions, type PackageManager };

export const createNpmPackageManager = (
  options: Partial<NpmPackageManagerOptions> = {},
  runner: CommandRunner = new ExecCommandRunner(),
): PackageManager => new NpmPackageManager(runner, { ignoreScripts: options.ignoreScripts ?? false });
