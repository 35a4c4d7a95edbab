import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { detectManifests, MANIFEST_FILE_NAME } from "@orgdeps/repo-workspace";
import { normalizeDependencyTree } from "../domain/normalize-dependency-tree.js";
import {
  decideAfterInstall,
  decideAfterInstalledTree,
  type DeclaredDependencies,
  type DependencyResolution,
  type FallbackReason,
  type TierOutcome,
} from "../domain/tier-outcome.js";
import type { PackageManager } from "../infrastructure/npm-package-manager.js";
import { parseManifestDependencies } from "../parsing/manifest-parser.js";

export type DependencyResolutionProgressEvent =
  | { stage: "manifest_missing" }
  | { stage: "manifest_found"; hasLockfile: boolean }
  | { stage: "install_started" }
  | { stage: "fallback"; reason: FallbackReason; detail: string }
  | { stage: "manifest_unusable"; reason: string }
  | { stage: "resolved"; source: DependencyResolution["source"]; directDependencies: number };

export const readDeclaredDependencies = async (
  repositoryPath: string,
): Promise<TierOutcome<DeclaredDependencies>> => {
  let raw: string;
  try {
    raw = await readFile(join(repositoryPath, MANIFEST_FILE_NAME), "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : "unknown read error";
    return { status: "failed", reason: `cannot read package.json: ${message}` };
  }

  return parseManifestDependencies(raw);
};

const resolveFromManifest = async (
  repositoryPath: string,
  onProgress?: (event: DependencyResolutionProgressEvent) => void,
): Promise<DependencyResolution> => {
  const declared = await readDeclaredDependencies(repositoryPath);
  if (declared.status === "failed") {
    onProgress?.({ stage: "manifest_unusable", reason: declared.reason });
  }

  const dependencies = declared.status === "data" ? normalizeDependencyTree(declared.value) : {};
  return { source: "manifest", dependencies };
};

const finish = (
  resolution: DependencyResolution,
  onProgress?: (event: DependencyResolutionProgressEvent) => void,
): DependencyResolution => {
  onProgress?.({
    stage: "resolved",
    source: resolution.source,
    directDependencies: Object.keys(resolution.dependencies).length,
  });
  return resolution;
};

/**
 * Resolves the dependency tree of a checked-out repository.
 *
 * Tiers: installed tree after `npm install`, then the manifest's declared dependencies.
 * Tool and file failures only move resolution to the next tier.
 */
export const resolveRepositoryDependencies = async (
  repositoryPath: string,
  packageManager: PackageManager,
  onProgress?: (event: DependencyResolutionProgressEvent) => void,
): Promise<DependencyResolution> => {
  const manifests = await detectManifests(repositoryPath);
  if (!manifests.hasManifest) {
    onProgress?.({ stage: "manifest_missing" });
    return finish({ source: "none", dependencies: {} }, onProgress);
  }
  onProgress?.({ stage: "manifest_found", hasLockfile: manifests.hasLockfile });

  onProgress?.({ stage: "install_started" });
  const afterInstall = decideAfterInstall(await packageManager.install(repositoryPath));
  if (afterInstall.action === "fall_back_to_manifest") {
    onProgress?.({ stage: "fallback", reason: afterInstall.reason, detail: afterInstall.detail });
    return finish(await resolveFromManifest(repositoryPath, onProgress), onProgress);
  }

  const afterList = decideAfterInstalledTree(await packageManager.listInstalled(repositoryPath));
  if (afterList.action === "fall_back_to_manifest") {
    onProgress?.({ stage: "fallback", reason: afterList.reason, detail: afterList.detail });
    return finish(await resolveFromManifest(repositoryPath, onProgress), onProgress);
  }

  return finish(
    { source: "installed_tree", dependencies: normalizeDependencyTree(afterList.entries) },
    onProgress,
  );
};
