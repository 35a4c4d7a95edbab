import type { InventoryReport } from "./domain.js";

export const renderTextReport = (report: InventoryReport): string => {
  const lines: string[] = [];
  lines.push("Inventory Summary");
  lines.push(`  organization: ${report.organization}`);
  lines.push(`  totalRepositories: ${report.summary.totalRepositories}`);
  lines.push(`  repositoriesWithDependencies: ${report.summary.repositoriesWithDependencies}`);
  lines.push(`  directDependencies: ${report.summary.directDependencies}`);
  lines.push(`  transitiveDependencies: ${report.summary.transitiveDependencies}`);

  lines.push("");
  lines.push("Repositories");
  if (report.repositories.length === 0) {
    lines.push("  none");
  }
  for (const repository of report.repositories) {
    lines.push(
      `  - ${repository.name} | direct=${repository.directDependencies} transitive=${repository.transitiveDependencies} source=${repository.source}`,
    );
  }

  lines.push("");
  lines.push("Appendix");
  lines.push(`  schemaVersion: ${report.schemaVersion}`);
  lines.push(`  generatedAt: ${report.generatedAt}`);

  return lines.join("\n");
};

const escapeMarkdownCell = (value: string): string => value.replace(/\|/g, "\\|");

export const renderMarkdownReport = (report: InventoryReport): string => {
  const lines: string[] = [];
  lines.push(`# ${report.organization} Dependency Report`);
  lines.push("");
  lines.push("## Summary");
  lines.push(`- total repositories: \`${report.summary.totalRepositories}\``);
  lines.push(`- npm repositories: \`${report.summary.repositoriesWithDependencies}\``);
  lines.push(`- direct dependencies: \`${report.summary.directDependencies}\``);
  lines.push(`- transitive dependencies: \`${report.summary.transitiveDependencies}\``);

  lines.push("");
  lines.push("## Repositories");
  if (report.repositories.length === 0) {
    lines.push("none");
  } else {
    lines.push("| Repository | Direct | Transitive | Source |");
    lines.push("| --- | ---: | ---: | --- |");
    for (const repository of report.repositories) {
      lines.push(
        `| ${escapeMarkdownCell(repository.name)} | ${repository.directDependencies} | ${repository.transitiveDependencies} | \`${repository.source}\` |`,
      );
    }
  }

  lines.push("");
  lines.push("## Appendix");
  lines.push(`- schema: \`${report.schemaVersion}\``);
  lines.push(`- generated at: \`${report.generatedAt}\``);

  return lines.join("\n");
};
