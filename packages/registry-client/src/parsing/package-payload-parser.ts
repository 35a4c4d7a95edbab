import { isRecord } from "@orgdeps/core";
import type { PackageInfo } from "../domain/types.js";

const readString = (value: unknown): string | null => (typeof value === "string" ? value : null);

const readRecord = (value: unknown): Record<string, unknown> => (isRecord(value) ? value : {});

const readLicense = (value: unknown): string | null => {
  if (typeof value === "string") {
    return value;
  }

  // Older manifests publish `{ "type": "MIT", "url": "..." }`.
  if (isRecord(value)) {
    return readString(value["type"]);
  }

  return null;
};

const readRepositoryUrl = (value: unknown): string | null => {
  if (typeof value === "string") {
    return value;
  }

  if (isRecord(value)) {
    return readString(value["url"]);
  }

  return null;
};

export const parsePackagePayload = (name: string, payload: unknown): PackageInfo | null => {
  if (!isRecord(payload)) {
    return null;
  }

  const latestVersion = readString(readRecord(payload["dist-tags"])["latest"]);
  const versions = readRecord(payload["versions"]);
  const latest = readRecord(latestVersion === null ? undefined : versions[latestVersion]);
  const dist = readRecord(latest["dist"]);
  const time = readRecord(payload["time"]);
  const unpackedSize = dist["unpackedSize"];
  const files = latest["files"];
  const maintainers = payload["maintainers"];

  return {
    name,
    version: latestVersion,
    license: readLicense(latest["license"]),
    unpackedSize: typeof unpackedSize === "number" ? unpackedSize : null,
    totalFiles: Array.isArray(files) ? files.length : 0,
    lastPublish: latestVersion === null ? null : readString(time[latestVersion]),
    collaborators: Array.isArray(maintainers) ? maintainers.length : 0,
    repositoryUrl: readRepositoryUrl(latest["repository"]),
  };
};

export const parseDownloadsPayload = (payload: unknown): number => {
  if (!isRecord(payload)) {
    return 0;
  }

  const downloads = payload["downloads"];
  if (typeof downloads !== "number" || Number.isNaN(downloads) || downloads < 0) {
    return 0;
  }

  return Math.floor(downloads);
};

export const parseArchivedFlag = (payload: unknown): boolean =>
  isRecord(payload) && payload["archived"] === true;
