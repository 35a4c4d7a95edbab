import { describe, expect, it } from "vitest";
import { decideAfterInstall, decideAfterInstalledTree } from "./tier-outcome.js";

describe("decideAfterInstall", () => {
  it("queries the installed tree after a successful install", () => {
    expect(decideAfterInstall({ status: "data", value: null })).toEqual({
      action: "query_installed_tree",
    });
  });

  it("falls back to the manifest when install fails", () => {
    expect(decideAfterInstall({ status: "failed", reason: "npm install exited with code 1" })).toEqual({
      action: "fall_back_to_manifest",
      reason: "install_failed",
      detail: "npm install exited with code 1",
    });
  });
});

describe("decideAfterInstalledTree", () => {
  it("uses a non-empty installed tree", () => {
    const entries = { left: { version: "1.0.0" } };

    expect(decideAfterInstalledTree({ status: "data", value: entries })).toEqual({
      action: "use_installed_tree",
      entries,
    });
  });

  it("treats an empty installed tree like unusable output", () => {
    expect(decideAfterInstalledTree({ status: "empty" })).toMatchObject({
      action: "fall_back_to_manifest",
      reason: "installed_tree_empty",
    });
    expect(decideAfterInstalledTree({ status: "failed", reason: "bad json" })).toEqual({
      action: "fall_back_to_manifest",
      reason: "installed_tree_unusable",
      detail: "bad json",
    });
  });
});
