import { isRecord } from "@orgdeps/core";
import type { DeclaredDependencies, TierOutcome } from "../domain/tier-outcome.js";

const readVersionBlock = (block: unknown): Record<string, string> => {
  if (!isRecord(block)) {
    return {};
  }

  const versions: Record<string, string> = {};
  for (const [name, range] of Object.entries(block)) {
    if (typeof range === "string") {
      versions[name] = range;
    }
  }

  return versions;
};

export const parseManifestDependencies = (raw: string): TierOutcome<DeclaredDependencies> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : "invalid JSON";
    return { status: "failed", reason: `unparsable package.json: ${message}` };
  }

  if (!isRecord(parsed)) {
    return { status: "failed", reason: "package.json is not an object" };
  }

  // A name declared in both blocks keeps its devDependencies range.
  const declared = {
    ...readVersionBlock(parsed["dependencies"]),
    ...readVersionBlock(parsed["devDependencies"]),
  };

  if (Object.keys(declared).length === 0) {
    return { status: "empty" };
  }

  return { status: "data", value: declared };
};
