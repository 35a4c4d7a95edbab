import type { DependencySource, DependencyTree } from "@orgdeps/core";

export type TierOutcome<T> =
  | { status: "data"; value: T }
  | { status: "empty" }
  | { status: "failed"; reason: string };

export type InstalledTreeEntries = Readonly<Record<string, unknown>>;

export type DeclaredDependencies = Readonly<Record<string, string>>;

export type FallbackReason = "install_failed" | "installed_tree_empty" | "installed_tree_unusable";

export type InstallDecision =
  | { action: "query_installed_tree" }
  | { action: "fall_back_to_manifest"; reason: FallbackReason; detail: string };

export type InstalledTreeDecision =
  | { action: "use_installed_tree"; entries: InstalledTreeEntries }
  | { action: "fall_back_to_manifest"; reason: FallbackReason; detail: string };

export type DependencyResolution = {
  source: DependencySource;
  dependencies: DependencyTree;
};

export const decideAfterInstall = (outcome: TierOutcome<null>): InstallDecision => {
  if (outcome.status === "failed") {
    return { action: "fall_back_to_manifest", reason: "install_failed", detail: outcome.reason };
  }

  return { action: "query_installed_tree" };
};

// An empty installed tree is not trusted: it falls back exactly like unparsable output.
export const decideAfterInstalledTree = (
  outcome: TierOutcome<InstalledTreeEntries>,
): InstalledTreeDecision => {
  switch (outcome.status) {
    case "data":
      return { action: "use_installed_tree", entries: outcome.value };
    case "empty":
      return {
        action: "fall_back_to_manifest",
        reason: "installed_tree_empty",
        detail: "installed tree has no dependencies",
      };
    case "failed":
      return {
        action: "fall_back_to_manifest",
        reason: "installed_tree_unusable",
        detail: outcome.reason,
      };
  }
};
