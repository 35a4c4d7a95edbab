import type { RepositoryResult } from "@orgdeps/core";
import { countDependencies, selectRepositoriesWithDependencies, summarizeInventory } from "./aggregate.js";
import {
  REPORT_SCHEMA_VERSION,
  type InventoryReport,
  type RepositoryReportItem,
} from "./domain.js";

const toReportItem = (result: RepositoryResult): RepositoryReportItem => {
  const counts = countDependencies(result.dependencies);
  return {
    name: result.name,
    source: result.source,
    directDependencies: counts.direct,
    transitiveDependencies: counts.transitive,
    dependencies: result.dependencies,
  };
};

export const createInventoryReport = (
  organization: string,
  results: readonly RepositoryResult[],
  generatedAt: string = new Date().toISOString(),
): InventoryReport => ({
  schemaVersion: REPORT_SCHEMA_VERSION,
  organization,
  generatedAt,
  summary: summarizeInventory(results),
  repositories: selectRepositoriesWithDependencies(results).map(toReportItem),
});
