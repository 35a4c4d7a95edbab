import type { GitHubClient, NpmRegistryClient, PackageInfo, RepositoryStatus } from "@orgdeps/registry-client";
import { createSilentLogger, type Logger } from "./logger.js";

export type PackageInfoResult =
  | { found: false; name: string }
  | {
      found: true;
      info: PackageInfo;
      monthlyDownloads: number;
      repositoryStatus: RepositoryStatus | "N/A";
    };

export type PackageInfoClients = {
  npm: Pick<NpmRegistryClient, "getPackageInfo" | "getMonthlyDownloads">;
  github: Pick<GitHubClient, "getRepositoryStatus">;
};

export const runPackageInfoCommand = async (
  name: string,
  clients: PackageInfoClients,
  logger: Logger = createSilentLogger(),
): Promise<PackageInfoResult> => {
  logger.info(`fetching package metadata: ${name}`);
  const [info, monthlyDownloads] = await Promise.all([
    clients.npm.getPackageInfo(name),
    clients.npm.getMonthlyDownloads(name),
  ]);

  if (info === null) {
    logger.warn(`package not found in the registry: ${name}`);
    return { found: false, name };
  }

  const repositoryStatus =
    info.repositoryUrl === null ? "N/A" : await clients.github.getRepositoryStatus(info.repositoryUrl);
  logger.debug(`repository status for ${name}: ${repositoryStatus}`);

  return { found: true, info, monthlyDownloads, repositoryStatus };
};

const formatSize = (bytes: number | null): string =>
  bytes === null ? "N/A" : `${(bytes / 1024).toFixed(2)} KB`;

export const formatPackageInfoOutput = (result: PackageInfoResult): string => {
  if (!result.found) {
    return `${result.name}: not found`;
  }

  const { info } = result;
  return [
    `name: ${info.name}`,
    `version: ${info.version ?? "N/A"}`,
    `license: ${info.license ?? "N/A"}`,
    `size: ${formatSize(info.unpackedSize)}`,
    `files: ${info.totalFiles}`,
    `published: ${info.lastPublish ?? "N/A"}`,
    `collaborators: ${info.collaborators}`,
    `downloads (last month): ${result.monthlyDownloads}`,
    `repository: ${info.repositoryUrl ?? "N/A"}`,
    `archived: ${result.repositoryStatus}`,
  ].join("\n");
};
