import { createInventoryReport } from "@orgdeps/reporter";
import { describe, expect, it } from "vitest";
import { createScanSummaryOutput } from "./format-scan-output.js";
import { createStderrLogger, type Logger } from "./logger.js";
import { createInventoryProgressReporter, defaultReportPath } from "./run-scan-command.js";

const recordingLogger = (): { logger: Logger; lines: string[] } => {
  const lines: string[] = [];
  return { lines, logger: createStderrLogger("debug", (line) => lines.push(line.trimEnd())) };
};

describe("createInventoryProgressReporter", () => {
  it("maps repository progress to log lines", () => {
    const { logger, lines } = recordingLogger();
    const report = createInventoryProgressReporter(logger);

    report({ stage: "repository_started", repository: "a" });
    report({ stage: "resolution", repository: "a", event: { stage: "manifest_found", hasLockfile: false } });
    report({
      stage: "resolution",
      repository: "a",
      event: { stage: "fallback", reason: "installed_tree_unusable", detail: "npm ls output is not an object" },
    });
    report({ stage: "resolution", repository: "b", event: { stage: "manifest_missing" } });
    report({ stage: "workspace", repository: "c", event: { stage: "clone_failed", repository: "c", reason: "git clone exited with code 128" } });
    report({
      stage: "repository_completed",
      repository: "a",
      source: "manifest",
      directDependencies: 1,
      completed: 1,
      total: 3,
    });

    expect(lines).toEqual([
      "[orgdeps] INFO a: checking repository",
      "[orgdeps] INFO a: found package.json",
      "[orgdeps] WARN a: npm ls output is not an object; using package.json dependencies",
      "[orgdeps] INFO b: no package.json found",
      "[orgdeps] WARN c: clone failed (git clone exited with code 128)",
      "[orgdeps] INFO a: done 1/3 (1 direct, manifest)",
    ]);
  });
});

describe("scan output", () => {
  it("names the default report file after the format", () => {
    expect(defaultReportPath("html")).toBe("dependency-report.html");
    expect(defaultReportPath("text")).toBe("dependency-report.txt");
  });

  it("summarizes the report for stdout", () => {
    const report = createInventoryReport(
      "acme",
      [
        {
          name: "a",
          source: "manifest",
          dependencies: { x: { version: "1.0.0", level: 0, parent: null, dependencies: {} } },
        },
        { name: "b", source: "none", dependencies: {} },
      ],
      "2026-01-01T00:00:00.000Z",
    );

    expect(createScanSummaryOutput(report, "/tmp/out.html")).toEqual({
      organization: "acme",
      outputPath: "/tmp/out.html",
      summary: {
        totalRepositories: 2,
        repositoriesWithDependencies: 1,
        directDependencies: 1,
        transitiveDependencies: 0,
      },
      topRepositories: [{ name: "a", directDependencies: 1, transitiveDependencies: 0 }],
    });
  });
});
