export type RepositoryListingProgressEvent =
  | { stage: "page_requested"; page: number }
  | { stage: "page_received"; page: number; repositories: number; publicRepositories: number }
  | { stage: "listing_completed"; pages: number; publicRepositories: number };

export interface RepositoryListingProvider {
  listPublicRepositories(
    organization: string,
    onProgress?: (event: RepositoryListingProgressEvent) => void,
  ): Promise<readonly string[]>;
}

export type TokenValidation =
  | { valid: true; login: string | null }
  | { valid: false; status: number; reason: string };

export type RepositoryStatus = "Archived" | "Active" | "Unknown";

export type PackageInfo = {
  name: string;
  version: string | null;
  license: string | null;
  unpackedSize: number | null;
  totalFiles: number;
  lastPublish: string | null;
  collaborators: number;
  repositoryUrl: string | null;
};

export type FetchFunction = typeof fetch;
