import { mkdir, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import type { DependencyResolutionProgressEvent } from "@orgdeps/dependency-resolver";
import {
  scanOrganizationFromGitHub,
  type InventoryProgressEvent,
  type ScanConfig,
} from "@orgdeps/inventory";
import {
  createInventoryReport,
  formatInventoryReport,
  reportFileExtension,
  type InventoryReport,
  type ReportFormat,
} from "@orgdeps/reporter";
import type { WorkspaceProgressEvent } from "@orgdeps/repo-workspace";
import { createSilentLogger, type Logger } from "./logger.js";

export type ScanCommandOptions = {
  format: ReportFormat;
  outputPath?: string;
  token?: string;
  config: Partial<ScanConfig>;
};

export type ScanCommandResult = {
  report: InventoryReport;
  outputPath: string;
};

export const defaultReportPath = (format: ReportFormat): string =>
  `dependency-report.${reportFileExtension(format)}`;

const logWorkspaceEvent = (logger: Logger, event: WorkspaceProgressEvent): void => {
  switch (event.stage) {
    case "clone_started":
      logger.debug(`cloning into ${event.path}`);
      break;
    case "clone_completed":
      logger.debug("cloned");
      break;
    case "clone_failed":
      logger.warn(`clone failed (${event.reason})`);
      break;
    case "workspace_removed":
      logger.debug(`removed ${event.path}`);
      break;
  }
};

const logResolutionEvent = (logger: Logger, event: DependencyResolutionProgressEvent): void => {
  switch (event.stage) {
    case "manifest_missing":
      logger.info("no package.json found");
      break;
    case "manifest_found":
      logger.info(`found package.json${event.hasLockfile ? " and package-lock.json" : ""}`);
      break;
    case "install_started":
      logger.debug("running npm install");
      break;
    case "fallback":
      logger.warn(`${event.detail}; using package.json dependencies`);
      break;
    case "manifest_unusable":
      logger.warn(`package.json unusable (${event.reason})`);
      break;
    case "resolved":
      logger.debug(`resolved ${event.directDependencies} direct dependencies from ${event.source}`);
      break;
  }
};

export const createInventoryProgressReporter = (
  logger: Logger,
): ((event: InventoryProgressEvent) => void) => {
  return (event) => {
    switch (event.stage) {
      case "listing": {
        const listing = logger.child("listing");
        if (event.event.stage === "page_requested") {
          listing.debug(`requesting page ${event.event.page}`);
        } else if (event.event.stage === "page_received") {
          listing.debug(
            `page ${event.event.page} returned ${event.event.repositories} repositories (${event.event.publicRepositories} public)`,
          );
        } else {
          listing.info(
            `found ${event.event.publicRepositories} public repositories (${event.event.pages} pages)`,
          );
        }
        break;
      }
      case "work_directory_created":
        logger.debug(`work directory created: ${event.path}`);
        break;
      case "work_directory_removed":
        logger.debug(`work directory removed: ${event.path}`);
        break;
      case "scan_started":
        logger.info(`scanning ${event.total} repositories (concurrency ${event.concurrency})`);
        break;
      case "repository_started":
        logger.child(event.repository).info("checking repository");
        break;
      case "workspace":
        logWorkspaceEvent(logger.child(event.repository), event.event);
        break;
      case "resolution":
        logResolutionEvent(logger.child(event.repository), event.event);
        break;
      case "repository_failed":
        logger.child(event.repository).error(event.message);
        break;
      case "cleanup_failed":
        logger.child(event.repository).warn(`cleanup failed (${event.message})`);
        break;
      case "repository_completed":
        logger
          .child(event.repository)
          .info(
            `done ${event.completed}/${event.total} (${event.directDependencies} direct, ${event.source})`,
          );
        break;
      case "scan_completed":
        logger.info(`scan completed (${event.total} repositories)`);
        break;
    }
  };
};

export const runScanCommand = async (
  organization: string,
  options: ScanCommandOptions,
  logger: Logger = createSilentLogger(),
): Promise<ScanCommandResult> => {
  logger.info(`scanning organization: ${organization}`);
  const scan = await scanOrganizationFromGitHub(
    {
      organization,
      config: options.config,
      ...(options.token === undefined ? {} : { token: options.token }),
    },
    createInventoryProgressReporter(logger),
  );

  const report = createInventoryReport(scan.organization, scan.results);
  const outputPath = resolve(options.outputPath ?? defaultReportPath(options.format));
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, formatInventoryReport(report, options.format), "utf8");
  logger.info(`report written: ${outputPath}`);

  return { report, outputPath };
};
