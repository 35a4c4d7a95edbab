import { isRecord } from "@orgdeps/core";
import { RegistryRequestError } from "../domain/errors.js";
import type {
  FetchFunction,
  RepositoryListingProgressEvent,
  RepositoryListingProvider,
  RepositoryStatus,
  TokenValidation,
} from "../domain/types.js";
import { parseArchivedFlag } from "../parsing/package-payload-parser.js";
import {
  parseRepositoryPage,
  selectPublicRepositoryNames,
} from "../parsing/repository-page-parser.js";
import { fetchJson } from "./fetch-json.js";

export const GITHUB_API_URL = "https://api.github.com";
const GITHUB_WEB_PREFIX = "https://github.com/";
const PAGE_SIZE = 100;

export type GitHubClientOptions = {
  token?: string;
  apiUrl?: string;
  fetch?: FetchFunction;
};

export const toRepositoryApiUrl = (repositoryUrl: string, apiUrl: string): string | null => {
  const normalized = repositoryUrl.replace(/^git\+/, "").replace(/\.git$/, "");
  if (!normalized.startsWith(GITHUB_WEB_PREFIX)) {
    return null;
  }

  return `${apiUrl}/repos/${normalized.slice(GITHUB_WEB_PREFIX.length)}`;
};

export class GitHubClient implements RepositoryListingProvider {
  private readonly apiUrl: string;
  private readonly fetchImpl: FetchFunction;

  constructor(private readonly options: GitHubClientOptions = {}) {
    this.apiUrl = options.apiUrl ?? GITHUB_API_URL;
    this.fetchImpl = options.fetch ?? fetch;
  }

  get authenticated(): boolean {
    return this.options.token !== undefined && this.options.token.length > 0;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      accept: "application/vnd.github+json",
      "user-agent": "orgdeps",
    };
    if (this.authenticated) {
      headers["authorization"] = `token ${this.options.token ?? ""}`;
    }

    return headers;
  }

  async listPublicRepositories(
    organization: string,
    onProgress?: (event: RepositoryListingProgressEvent) => void,
  ): Promise<readonly string[]> {
    const baseUrl = `${this.apiUrl}/orgs/${encodeURIComponent(organization)}/repos`;
    const names: string[] = [];
    let page = 1;

    // Terminates on the first empty page; every other path throws.
    while (true) {
      const url = `${baseUrl}?page=${page}&per_page=${PAGE_SIZE}`;
      onProgress?.({ stage: "page_requested", page });
      const response = await fetchJson(this.fetchImpl, url, this.headers());
      if (!response.ok) {
        throw new RegistryRequestError(
          `Error fetching repos: ${response.status === 0 ? response.reason : response.status}`,
          url,
          response.status,
        );
      }

      const repositories = parseRepositoryPage(response.data);
      if (repositories === null) {
        throw new RegistryRequestError("Unexpected repository listing payload", url, 200);
      }

      if (repositories.length === 0) {
        break;
      }

      const publicNames = selectPublicRepositoryNames(repositories);
      names.push(...publicNames);
      onProgress?.({
        stage: "page_received",
        page,
        repositories: repositories.length,
        publicRepositories: publicNames.length,
      });
      page += 1;
    }

    onProgress?.({ stage: "listing_completed", pages: page - 1, publicRepositories: names.length });
    return names;
  }

  async validateToken(): Promise<TokenValidation> {
    const response = await fetchJson(this.fetchImpl, `${this.apiUrl}/user`, this.headers());
    if (!response.ok) {
      return { valid: false, status: response.status, reason: response.reason };
    }

    const login = isRecord(response.data) ? response.data["login"] : undefined;
    return { valid: true, login: typeof login === "string" ? login : null };
  }

  async getRepositoryStatus(repositoryUrl: string): Promise<RepositoryStatus> {
    const url = toRepositoryApiUrl(repositoryUrl, this.apiUrl);
    if (url === null) {
      return "Unknown";
    }

    const response = await fetchJson(this.fetchImpl, url, this.headers());
    if (!response.ok) {
      return "Unknown";
    }

    return parseArchivedFlag(response.data) ? "Archived" : "Active";
  }
}
