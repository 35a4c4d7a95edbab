import type { InventoryReport } from "@orgdeps/reporter";

export type ScanSummaryOutput = {
  organization: string;
  outputPath: string;
  summary: InventoryReport["summary"];
  topRepositories: ReadonlyArray<{ name: string; directDependencies: number; transitiveDependencies: number }>;
};

export const createScanSummaryOutput = (
  report: InventoryReport,
  outputPath: string,
  top = 10,
): ScanSummaryOutput => ({
  organization: report.organization,
  outputPath,
  summary: report.summary,
  topRepositories: report.repositories.slice(0, top).map((repository) => ({
    name: repository.name,
    directDependencies: repository.directDependencies,
    transitiveDependencies: repository.transitiveDependencies,
  })),
});

export const formatScanOutput = (report: InventoryReport, outputPath: string): string =>
  JSON.stringify(createScanSummaryOutput(report, outputPath), null, 2);
