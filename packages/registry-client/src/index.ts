import { GitHubClient } from "./infrastructure/github-client.js";
import { NpmRegistryClient } from "./infrastructure/npm-registry-client.js";

export { RegistryRequestError } from "./domain/errors.js";
export type {
  FetchFunction,
  PackageInfo,
  RepositoryListingProgressEvent,
  RepositoryListingProvider,
  RepositoryStatus,
  TokenValidation,
} from "./domain/types.js";
export { GITHUB_API_URL, toRepositoryApiUrl, type GitHubClientOptions } from "./infrastructure/github-client.js";
export {
  NPM_DOWNLOADS_URL,
  NPM_REGISTRY_URL,
  type NpmRegistryClientOptions,
} from "./infrastructure/npm-registry-client.js";
export { GitHubClient, NpmRegistryClient };

export const createGitHubClientFromEnvironment = (token?: string): GitHubClient => {
  const effectiveToken = token ?? process.env["GITHUB_TOKEN"];
  return new GitHubClient(effectiveToken === undefined ? {} : { token: effectiveToken });
};
