import { isRecord } from "@orgdeps/core";
import type { InstalledTreeEntries, TierOutcome } from "../domain/tier-outcome.js";

export const parseInstalledTree = (stdout: string): TierOutcome<InstalledTreeEntries> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch (error) {
    const message = error instanceof Error ? error.message : "invalid JSON";
    return { status: "failed", reason: `unparsable npm ls output: ${message}` };
  }

  if (!isRecord(parsed)) {
    return { status: "failed", reason: "npm ls output is not an object" };
  }

  const dependencies = parsed["dependencies"];
  if (!isRecord(dependencies) || Object.keys(dependencies).length === 0) {
    return { status: "empty" };
  }

  return { status: "data", value: dependencies };
};
