import type { DependencySource, DependencyTree, InventorySummary } from "@orgdeps/core";

export const REPORT_SCHEMA_VERSION = "orgdeps.report.v1" as const;

export type ReportSchemaVersion = typeof REPORT_SCHEMA_VERSION;

export type ReportFormat = "html" | "json" | "md" | "text";

export const REPORT_FORMATS: readonly ReportFormat[] = ["html", "json", "md", "text"];

export const isReportFormat = (value: string): value is ReportFormat =>
  REPORT_FORMATS.some((format) => format === value);

export const reportFileExtension = (format: ReportFormat): string =>
  format === "text" ? "txt" : format;

export type RepositoryReportItem = {
  name: string;
  source: DependencySource;
  directDependencies: number;
  transitiveDependencies: number;
  dependencies: DependencyTree;
};

export type InventoryReport = {
  schemaVersion: ReportSchemaVersion;
  organization: string;
  generatedAt: string;
  summary: InventorySummary;
  /** Repositories with at least one dependency, most direct dependencies first. */
  repositories: readonly RepositoryReportItem[];
};
