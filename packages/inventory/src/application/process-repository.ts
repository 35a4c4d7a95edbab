import { createEmptyRepositoryResult, type RepositoryResult } from "@orgdeps/core";
import {
  resolveRepositoryDependencies,
  type PackageManager,
} from "@orgdeps/dependency-resolver";
import type { RepositoryWorkspace } from "@orgdeps/repo-workspace";
import type { InventoryProgressEvent } from "../domain/types.js";

export type RepositoryProcessingDependencies = {
  workspace: RepositoryWorkspace;
  packageManager: PackageManager;
};

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Clone, resolve and clean up a single repository.
 *
 * Never rejects: a failure anywhere in the unit yields an empty result for this repository.
 */
export const processRepository = async (
  repositoryName: string,
  dependencies: RepositoryProcessingDependencies,
  onProgress?: (event: InventoryProgressEvent) => void,
): Promise<RepositoryResult> => {
  const { workspace, packageManager } = dependencies;
  onProgress?.({ stage: "repository_started", repository: repositoryName });

  try {
    const checkout = await workspace.checkout(repositoryName, (event) =>
      onProgress?.({ stage: "workspace", repository: repositoryName, event }),
    );
    if (checkout.status === "failed") {
      return createEmptyRepositoryResult(repositoryName);
    }

    const resolution = await resolveRepositoryDependencies(checkout.path, packageManager, (event) =>
      onProgress?.({ stage: "resolution", repository: repositoryName, event }),
    );

    return {
      name: repositoryName,
      source: resolution.source,
      dependencies: resolution.dependencies,
    };
  } catch (error) {
    onProgress?.({
      stage: "repository_failed",
      repository: repositoryName,
      message: errorMessage(error),
    });
    return createEmptyRepositoryResult(repositoryName);
  } finally {
    try {
      await workspace.release(repositoryName, (event) =>
        onProgress?.({ stage: "workspace", repository: repositoryName, event }),
      );
    } catch (error) {
      onProgress?.({ stage: "cleanup_failed", repository: repositoryName, message: errorMessage(error) });
    }
  }
};
