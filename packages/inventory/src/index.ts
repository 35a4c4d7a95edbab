import { createNpmPackageManager } from "@orgdeps/dependency-resolver";
import { createGitHubClientFromEnvironment } from "@orgdeps/registry-client";
import { createGitRepositoryWorkspace } from "@orgdeps/repo-workspace";
import {
  scanOrganization,
  type ScanOrganizationInput,
} from "./application/scan-repositories.js";
import {
  withScanDefaults,
  type InventoryProgressEvent,
  type OrganizationScan,
} from "./domain/types.js";

export {
  DEFAULT_SCAN_CONFIG,
  withScanDefaults,
  type InventoryProgressEvent,
  type OrganizationScan,
  type ScanConfig,
} from "./domain/types.js";
export { runWorkerPool } from "./domain/worker-pool.js";
export {
  processRepository,
  type RepositoryProcessingDependencies,
} from "./application/process-repository.js";
export {
  scanOrganization,
  scanRepositories,
  type ScanOrganizationDependencies,
  type ScanOrganizationInput,
  type ScanRepositoriesOptions,
} from "./application/scan-repositories.js";

export const scanOrganizationFromGitHub = async (
  input: ScanOrganizationInput & { token?: string },
  onProgress?: (event: InventoryProgressEvent) => void,
): Promise<OrganizationScan> => {
  const config = withScanDefaults(input.config);

  return scanOrganization(
    { ...input, config },
    {
      lister: createGitHubClientFromEnvironment(input.token),
      createWorkspace: (workDir) =>
        createGitRepositoryWorkspace({ organization: input.organization, workDir }),
      packageManager: createNpmPackageManager({ ignoreScripts: config.ignoreScripts }),
    },
    onProgress,
  );
};
