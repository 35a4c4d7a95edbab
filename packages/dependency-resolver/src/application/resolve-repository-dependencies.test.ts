import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import type { InstalledTreeEntries, TierOutcome } from "../domain/tier-outcome.js";
import type { PackageManager } from "../infrastructure/npm-package-manager.js";
import {
  resolveRepositoryDependencies,
  type DependencyResolutionProgressEvent,
} from "./resolve-repository-dependencies.js";

const cleanupPaths: string[] = [];

const createRepo = async (files: Readonly<Record<string, string>>): Promise<string> => {
  const root = await mkdtemp(join(tmpdir(), "orgdeps-resolver-"));
  cleanupPaths.push(root);

  for (const [relative, content] of Object.entries(files)) {
    const absolute = join(root, relative);
    await mkdir(dirname(absolute), { recursive: true });
    await writeFile(absolute, content, "utf8");
  }

  return root;
};

afterEach(async () => {
  for (const path of cleanupPaths.splice(0, cleanupPaths.length)) {
    await rm(path, { recursive: true, force: true });
  }
});

class StubPackageManager implements PackageManager {
  readonly calls: string[] = [];

  constructor(
    private readonly installOutcome: TierOutcome<null>,
    private readonly listOutcome: TierOutcome<InstalledTreeEntries>,
  ) {}

  async install(_repositoryPath: string): Promise<TierOutcome<null>> {
    this.calls.push("install");
    return this.installOutcome;
  }

  async listInstalled(_repositoryPath: string): Promise<TierOutcome<InstalledTreeEntries>> {
    this.calls.push("list");
    return this.listOutcome;
  }
}

const manifest = JSON.stringify({
  dependencies: { x: "1.0.0" },
  devDependencies: { y: "^2.0.0" },
});

describe("resolveRepositoryDependencies", () => {
  it("returns an empty tree without touching the package manager when no manifest exists", async () => {
    const repo = await createRepo({ "README.md": "# docs\n" });
    const packageManager = new StubPackageManager({ status: "data", value: null }, { status: "empty" });
    const events: DependencyResolutionProgressEvent[] = [];

    const resolution = await resolveRepositoryDependencies(repo, packageManager, (event) =>
      events.push(event),
    );

    expect(resolution).toEqual({ source: "none", dependencies: {} });
    expect(packageManager.calls).toEqual([]);
    expect(events).toEqual([
      { stage: "manifest_missing" },
      { stage: "resolved", source: "none", directDependencies: 0 },
    ]);
  });

  it("uses the installed tree after a successful install", async () => {
    const repo = await createRepo({ "package.json": manifest, "package-lock.json": "{}" });
    const packageManager = new StubPackageManager(
      { status: "data", value: null },
      {
        status: "data",
        value: { x: { version: "1.0.0", dependencies: { z: { version: "0.3.1" } } } },
      },
    );
    const events: DependencyResolutionProgressEvent[] = [];

    const resolution = await resolveRepositoryDependencies(repo, packageManager, (event) =>
      events.push(event),
    );

    expect(resolution).toEqual({
      source: "installed_tree",
      dependencies: {
        x: {
          version: "1.0.0",
          level: 0,
          parent: null,
          dependencies: { z: { version: "0.3.1", level: 1, parent: "x", dependencies: {} } },
        },
      },
    });
    expect(packageManager.calls).toEqual(["install", "list"]);
    expect(events[0]).toEqual({ stage: "manifest_found", hasLockfile: true });
  });

  it("skips the installed tree and reads the manifest when install fails", async () => {
    const repo = await createRepo({ "package.json": manifest });
    const packageManager = new StubPackageManager(
      { status: "failed", reason: "npm install exited with code 1" },
      { status: "empty" },
    );

    const resolution = await resolveRepositoryDependencies(repo, packageManager);

    expect(resolution).toEqual({
      source: "manifest",
      dependencies: {
        x: { version: "1.0.0", level: 0, parent: null, dependencies: {} },
        y: { version: "^2.0.0", level: 0, parent: null, dependencies: {} },
      },
    });
    expect(packageManager.calls).toEqual(["install"]);
  });

  it("falls back to the manifest when the installed tree cannot be parsed", async () => {
    const repo = await createRepo({ "package.json": JSON.stringify({ dependencies: { x: "1.0.0" } }) });
    const packageManager = new StubPackageManager(
      { status: "data", value: null },
      { status: "failed", reason: "unparsable npm ls output" },
    );
    const events: DependencyResolutionProgressEvent[] = [];

    const resolution = await resolveRepositoryDependencies(repo, packageManager, (event) =>
      events.push(event),
    );

    expect(resolution).toEqual({
      source: "manifest",
      dependencies: { x: { version: "1.0.0", level: 0, parent: null, dependencies: {} } },
    });
    expect(events).toContainEqual({
      stage: "fallback",
      reason: "installed_tree_unusable",
      detail: "unparsable npm ls output",
    });
  });

  it("falls back to the manifest when the installed tree is empty", async () => {
    const repo = await createRepo({ "package.json": manifest });
    const packageManager = new StubPackageManager({ status: "data", value: null }, { status: "empty" });

    const resolution = await resolveRepositoryDependencies(repo, packageManager);

    expect(resolution.source).toBe("manifest");
    expect(Object.keys(resolution.dependencies)).toEqual(["x", "y"]);
  });

  it("degrades to an empty manifest tree when package.json is malformed", async () => {
    const repo = await createRepo({ "package.json": "{ broken" });
    const packageManager = new StubPackageManager(
      { status: "failed", reason: "npm install exited with code 1" },
      { status: "empty" },
    );
    const events: DependencyResolutionProgressEvent[] = [];

    const resolution = await resolveRepositoryDependencies(repo, packageManager, (event) =>
      events.push(event),
    );

    expect(resolution).toEqual({ source: "manifest", dependencies: {} });
    expect(events.map((event) => event.stage)).toEqual([
      "manifest_found",
      "install_started",
      "fallback",
      "manifest_unusable",
      "resolved",
    ]);
  });
});
