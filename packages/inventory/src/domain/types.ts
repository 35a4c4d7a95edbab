import { availableParallelism } from "node:os";
import type { DependencySource, RepositoryResult } from "@orgdeps/core";
import type { DependencyResolutionProgressEvent } from "@orgdeps/dependency-resolver";
import type { RepositoryListingProgressEvent } from "@orgdeps/registry-client";
import type { WorkspaceProgressEvent } from "@orgdeps/repo-workspace";

export type ScanConfig = {
  concurrency: number;
  workDir: string | null;
  ignoreScripts: boolean;
};

export const DEFAULT_SCAN_CONFIG: ScanConfig = {
  concurrency: availableParallelism(),
  workDir: null,
  ignoreScripts: false,
};

export const withScanDefaults = (overrides: Partial<ScanConfig> | undefined): ScanConfig => ({
  ...DEFAULT_SCAN_CONFIG,
  ...overrides,
});

export type InventoryProgressEvent =
  | { stage: "listing"; event: RepositoryListingProgressEvent }
  | { stage: "work_directory_created"; path: string }
  | { stage: "work_directory_removed"; path: string }
  | { stage: "scan_started"; total: number; concurrency: number }
  | { stage: "repository_started"; repository: string }
  | { stage: "workspace"; repository: string; event: WorkspaceProgressEvent }
  | { stage: "resolution"; repository: string; event: DependencyResolutionProgressEvent }
  | { stage: "repository_failed"; repository: string; message: string }
  | { stage: "cleanup_failed"; repository: string; message: string }
  | {
      stage: "repository_completed";
      repository: string;
      source: DependencySource;
      directDependencies: number;
      completed: number;
      total: number;
    }
  | { stage: "scan_completed"; total: number };

export type OrganizationScan = {
  organization: string;
  results: readonly RepositoryResult[];
};
