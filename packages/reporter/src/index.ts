import type { InventoryReport, ReportFormat } from "./domain.js";
import { renderHtmlReport } from "./html-renderer.js";
import { createInventoryReport } from "./report.js";
import { renderMarkdownReport, renderTextReport } from "./renderers.js";

export {
  REPORT_FORMATS,
  REPORT_SCHEMA_VERSION,
  isReportFormat,
  reportFileExtension,
  type InventoryReport,
  type ReportFormat,
  type RepositoryReportItem,
} from "./domain.js";
export {
  countDependencies,
  countDirectDependencies,
  countTransitiveDependencies,
  selectRepositoriesWithDependencies,
  summarizeInventory,
} from "./aggregate.js";
export { buildRepositoryDataBlob, escapeHtml, serializeForScript } from "./html-renderer.js";

export { createInventoryReport };

export const formatInventoryReport = (report: InventoryReport, format: ReportFormat): string => {
  if (format === "json") {
    return JSON.stringify(report, null, 2);
  }

  if (format === "md") {
    return renderMarkdownReport(report);
  }

  if (format === "text") {
    return renderTextReport(report);
  }

  return renderHtmlReport(report);
};
