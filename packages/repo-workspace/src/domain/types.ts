export const MANIFEST_FILE_NAME = "package.json";
export const LOCKFILE_FILE_NAME = "package-lock.json";

export type ManifestDetection = {
  hasManifest: boolean;
  hasLockfile: boolean;
};

export type CheckoutOutcome =
  | { status: "cloned"; path: string }
  | { status: "failed"; path: string; reason: string };

export type WorkspaceProgressEvent =
  | { stage: "clone_started"; repository: string; path: string }
  | { stage: "clone_completed"; repository: string; path: string }
  | { stage: "clone_failed"; repository: string; reason: string }
  | { stage: "workspace_removed"; repository: string; path: string };

export interface RepositoryWorkspace {
  checkout(
    repositoryName: string,
    onProgress?: (event: WorkspaceProgressEvent) => void,
  ): Promise<CheckoutOutcome>;
  release(
    repositoryName: string,
    onProgress?: (event: WorkspaceProgressEvent) => void,
  ): Promise<void>;
}

export type WorkspaceConfig = {
  organization: string;
  workDir: string;
  cloneBaseUrl: string;
};

export const DEFAULT_CLONE_BASE_URL = "https://github.com";
