import type { FetchFunction, PackageInfo } from "../domain/types.js";
import { parseDownloadsPayload, parsePackagePayload } from "../parsing/package-payload-parser.js";
import { fetchJson } from "./fetch-json.js";

export const NPM_REGISTRY_URL = "https://registry.npmjs.org";
export const NPM_DOWNLOADS_URL = "https://api.npmjs.org/downloads/point/last-month";

export type NpmRegistryClientOptions = {
  registryUrl?: string;
  downloadsUrl?: string;
  fetch?: FetchFunction;
};

export class NpmRegistryClient {
  private readonly registryUrl: string;
  private readonly downloadsUrl: string;
  private readonly fetchImpl: FetchFunction;

  constructor(options: NpmRegistryClientOptions = {}) {
    this.registryUrl = options.registryUrl ?? NPM_REGISTRY_URL;
    this.downloadsUrl = options.downloadsUrl ?? NPM_DOWNLOADS_URL;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async getPackageInfo(name: string): Promise<PackageInfo | null> {
    const encodedName = encodeURIComponent(name);
    const response = await fetchJson(this.fetchImpl, `${this.registryUrl}/${encodedName}`);
    if (!response.ok) {
      return null;
    }

    return parsePackagePayload(name, response.data);
  }

  async getMonthlyDownloads(name: string): Promise<number> {
    const encodedName = encodeURIComponent(name);
    const response = await fetchJson(this.fetchImpl, `${this.downloadsUrl}/${encodedName}`);
    if (!response.ok) {
      return 0;
    }

    return parseDownloadsPayload(response.data);
  }
}
