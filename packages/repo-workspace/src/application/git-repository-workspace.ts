import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type {
  CheckoutOutcome,
  RepositoryWorkspace,
  WorkspaceConfig,
  WorkspaceProgressEvent,
} from "../domain/types.js";
import { CommandExecutionError } from "../infrastructure/command-runner.js";
import type { GitClient } from "../infrastructure/git-client.js";

const INVALID_REPOSITORY_NAMES = new Set(["", ".", ".."]);

export const isSafeRepositoryName = (name: string): boolean =>
  !INVALID_REPOSITORY_NAMES.has(name) && !/[\\/]/.test(name);

export const createWorkDirectory = (): Promise<string> => mkdtemp(join(tmpdir(), "orgdeps-"));

export const removeDirectory = (path: string): Promise<void> =>
  rm(path, { recursive: true, force: true });

export class GitRepositoryWorkspace implements RepositoryWorkspace {
  constructor(
    private readonly git: GitClient,
    private readonly config: WorkspaceConfig,
  ) {}

  private checkoutPath(repositoryName: string): string {
    return join(this.config.workDir, repositoryName);
  }

  repositoryUrl(repositoryName: string): string {
    return `${this.config.cloneBaseUrl}/${this.config.organization}/${repositoryName}.git`;
  }

  async checkout(
    repositoryName: string,
    onProgress?: (event: WorkspaceProgressEvent) => void,
  ): Promise<CheckoutOutcome> {
    const path = this.checkoutPath(repositoryName);
    if (!isSafeRepositoryName(repositoryName)) {
      onProgress?.({ stage: "clone_failed", repository: repositoryName, reason: "invalid_name" });
      return { status: "failed", path, reason: "invalid_name" };
    }

    onProgress?.({ stage: "clone_started", repository: repositoryName, path });
    try {
      const result = await this.git.shallowClone(this.repositoryUrl(repositoryName), path);
      if (result.exitCode !== 0) {
        const reason = `git clone exited with code ${result.exitCode}`;
        onProgress?.({ stage: "clone_failed", repository: repositoryName, reason });
        return { status: "failed", path, reason };
      }
    } catch (error) {
      if (!(error instanceof CommandExecutionError)) {
        throw error;
      }

      onProgress?.({ stage: "clone_failed", repository: repositoryName, reason: error.message });
      return { status: "failed", path, reason: error.message };
    }

    onProgress?.({ stage: "clone_completed", repository: repositoryName, path });
    return { status: "cloned", path };
  }

  async release(
    repositoryName: string,
    onProgress?: (event: WorkspaceProgressEvent) => void,
  ): Promise<void> {
    if (!isSafeRepositoryName(repositoryName)) {
      return;
    }

    const path = this.checkoutPath(repositoryName);
    await removeDirectory(path);
    onProgress?.({ stage: "workspace_removed", repository: repositoryName, path });
  }
}
