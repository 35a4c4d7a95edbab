import { mkdir, mkdtemp, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import type { WorkspaceProgressEvent } from "../domain/types.js";
import { CommandExecutionError, type CommandResult } from "../infrastructure/command-runner.js";
import type { GitClient } from "../infrastructure/git-client.js";
import { GitRepositoryWorkspace, isSafeRepositoryName } from "./git-repository-workspace.js";

const cleanupPaths: string[] = [];

const createTempDir = async (): Promise<string> => {
  const root = await mkdtemp(join(tmpdir(), "orgdeps-workspace-"));
  cleanupPaths.push(root);
  return root;
};

afterEach(async () => {
  for (const path of cleanupPaths.splice(0, cleanupPaths.length)) {
    await rm(path, { recursive: true, force: true });
  }
});

class StubGitClient implements GitClient {
  readonly clonedUrls: string[] = [];

  constructor(private readonly behavior: "clone" | "exit_128" | "spawn_error") {}

  async shallowClone(repositoryUrl: string, destinationPath: string): Promise<CommandResult> {
    this.clonedUrls.push(repositoryUrl);
    if (this.behavior === "spawn_error") {
      throw new CommandExecutionError("spawn git ENOENT", "git", ["clone"]);
    }

    if (this.behavior === "exit_128") {
      return { exitCode: 128, stdout: "", stderr: "fatal: repository not found" };
    }

    await mkdir(destinationPath, { recursive: true });
    await writeFile(join(destinationPath, "package.json"), "{}", "utf8");
    return { exitCode: 0, stdout: "", stderr: "" };
  }
}

const exists = async (path: string): Promise<boolean> =>
  stat(path).then(
    () => true,
    () => false,
  );

describe("GitRepositoryWorkspace", () => {
  it("clones into a directory named after the repository and removes it on release", async () => {
    const workDir = await createTempDir();
    const git = new StubGitClient("clone");
    const workspace = new GitRepositoryWorkspace(git, {
      organization: "acme",
      workDir,
      cloneBaseUrl: "https://github.com",
    });
    const events: WorkspaceProgressEvent["stage"][] = [];

    const outcome = await workspace.checkout("web", (event) => events.push(event.stage));

    expect(outcome).toEqual({ status: "cloned", path: join(workDir, "web") });
    expect(git.clonedUrls).toEqual(["https://github.com/acme/web.git"]);
    expect(await exists(join(workDir, "web", "package.json"))).toBe(true);

    await workspace.release("web", (event) => events.push(event.stage));

    expect(await exists(join(workDir, "web"))).toBe(false);
    expect(events).toEqual(["clone_started", "clone_completed", "workspace_removed"]);
  });

  it("reports a failed checkout when git exits non-zero", async () => {
    const workDir = await createTempDir();
    const workspace = new GitRepositoryWorkspace(new StubGitClient("exit_128"), {
      organization: "acme",
      workDir,
      cloneBaseUrl: "https://github.com",
    });

    await expect(workspace.checkout("gone")).resolves.toEqual({
      status: "failed",
      path: join(workDir, "gone"),
      reason: "git clone exited with code 128",
    });
  });

  it("reports a failed checkout when git cannot be started", async () => {
    const workDir = await createTempDir();
    const workspace = new GitRepositoryWorkspace(new StubGitClient("spawn_error"), {
      organization: "acme",
      workDir,
      cloneBaseUrl: "https://github.com",
    });

    await expect(workspace.checkout("web")).resolves.toMatchObject({
      status: "failed",
      reason: "spawn git ENOENT",
    });
  });

  it("refuses names that would escape the work directory", async () => {
    const git = new StubGitClient("clone");
    const workspace = new GitRepositoryWorkspace(git, {
      organization: "acme",
      workDir: "/tmp/unused",
      cloneBaseUrl: "https://github.com",
    });

    expect(isSafeRepositoryName("..")).toBe(false);
    expect(isSafeRepositoryName("a/b")).toBe(false);
    expect(isSafeRepositoryName("my.repo-1")).toBe(true);
    await expect(workspace.checkout("..")).resolves.toMatchObject({
      status: "failed",
      reason: "invalid_name",
    });
    expect(git.clonedUrls).toEqual([]);
  });
});
