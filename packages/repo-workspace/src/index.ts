import {
  DEFAULT_CLONE_BASE_URL,
  type RepositoryWorkspace,
  type WorkspaceConfig,
} from "./domain/types.js";
import { GitRepositoryWorkspace } from "./application/git-repository-workspace.js";
import { ExecCommandRunner, type CommandRunner } from "./infrastructure/command-runner.js";
import { GitCliClient } from "./infrastructure/git-client.js";

export {
  DEFAULT_CLONE_BASE_URL,
  LOCKFILE_FILE_NAME,
  MANIFEST_FILE_NAME,
  type CheckoutOutcome,
  type ManifestDetection,
  type RepositoryWorkspace,
  type WorkspaceConfig,
  type WorkspaceProgressEvent,
} from "./domain/types.js";
export {
  CommandExecutionError,
  ExecCommandRunner,
  type CommandOptions,
  type CommandResult,
  type CommandRunner,
} from "./infrastructure/command-runner.js";
export { GitCliClient, type GitClient } from "./infrastructure/git-client.js";
export { detectManifests } from "./infrastructure/manifest-detector.js";
export {
  GitRepositoryWorkspace,
  createWorkDirectory,
  isSafeRepositoryName,
  removeDirectory,
} from "./application/git-repository-workspace.js";

export const createGitRepositoryWorkspace = (
  config: Omit<WorkspaceConfig, "cloneBaseUrl"> & { cloneBaseUrl?: string },
  runner: CommandRunner = new ExecCommandRunner(),
): RepositoryWorkspace =>
  new GitRepositoryWorkspace(new GitCliClient(runner), {
    ...config,
    cloneBaseUrl: config.cloneBaseUrl ?? DEFAULT_CLONE_BASE_URL,
  });
