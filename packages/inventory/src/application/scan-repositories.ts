import type { RepositoryResult } from "@orgdeps/core";
import type { PackageManager } from "@orgdeps/dependency-resolver";
import type { RepositoryListingProvider } from "@orgdeps/registry-client";
import {
  createWorkDirectory,
  removeDirectory,
  type RepositoryWorkspace,
} from "@orgdeps/repo-workspace";
import {
  withScanDefaults,
  type InventoryProgressEvent,
  type OrganizationScan,
  type ScanConfig,
} from "../domain/types.js";
import { runWorkerPool } from "../domain/worker-pool.js";
import { processRepository, type RepositoryProcessingDependencies } from "./process-repository.js";

export type ScanRepositoriesOptions = {
  concurrency: number;
  onResult?: (result: RepositoryResult) => void;
};

export const scanRepositories = async (
  repositoryNames: readonly string[],
  dependencies: RepositoryProcessingDependencies,
  options: ScanRepositoriesOptions,
  onProgress?: (event: InventoryProgressEvent) => void,
): Promise<readonly RepositoryResult[]> => {
  const total = repositoryNames.length;
  let completed = 0;
  onProgress?.({ stage: "scan_started", total, concurrency: options.concurrency });

  const results = await runWorkerPool(
    repositoryNames,
    options.concurrency,
    (repositoryName) => processRepository(repositoryName, dependencies, onProgress),
    (result) => {
      completed += 1;
      onProgress?.({
        stage: "repository_completed",
        repository: result.name,
        source: result.source,
        directDependencies: Object.keys(result.dependencies).length,
        completed,
        total,
      });
      options.onResult?.(result);
    },
  );

  onProgress?.({ stage: "scan_completed", total: results.length });
  return results;
};

export type ScanOrganizationDependencies = {
  lister: RepositoryListingProvider;
  createWorkspace: (workDir: string) => RepositoryWorkspace;
  packageManager: PackageManager;
};

export type ScanOrganizationInput = {
  organization: string;
  config?: Partial<ScanConfig>;
  onResult?: (result: RepositoryResult) => void;
};

/**
 * Lists the organization's public repositories and scans them.
 *
 * Listing errors propagate; per-repository errors never do. A temporary work directory is
 * created (and removed afterwards) unless one is configured.
 */
export const scanOrganization = async (
  input: ScanOrganizationInput,
  dependencies: ScanOrganizationDependencies,
  onProgress?: (event: InventoryProgressEvent) => void,
): Promise<OrganizationScan> => {
  const config = withScanDefaults(input.config);
  const repositoryNames = await dependencies.lister.listPublicRepositories(
    input.organization,
    (event) => onProgress?.({ stage: "listing", event }),
  );

  const ownsWorkDir = config.workDir === null;
  const workDir = config.workDir ?? (await createWorkDirectory());
  if (ownsWorkDir) {
    onProgress?.({ stage: "work_directory_created", path: workDir });
  }

  try {
    const results = await scanRepositories(
      repositoryNames,
      {
        workspace: dependencies.createWorkspace(workDir),
        packageManager: dependencies.packageManager,
      },
      {
        concurrency: config.concurrency,
        ...(input.onResult === undefined ? {} : { onResult: input.onResult }),
      },
      onProgress,
    );

    return { organization: input.organization, results };
  } finally {
    if (ownsWorkDir) {
      await removeDirectory(workDir);
      onProgress?.({ stage: "work_directory_removed", path: workDir });
    }
  }
};
