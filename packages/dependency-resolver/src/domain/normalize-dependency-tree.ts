import { isRecord, type DependencyNode, type DependencyTree } from "@orgdeps/core";

/**
 * Converts installed-tree entries (version strings or `{ version, dependencies }` objects)
 * and manifest declarations (version strings) into uniform dependency nodes.
 *
 * Children sit one level below their parent and record its name; entries that are
 * neither strings nor objects are dropped.
 */
export const normalizeDependencyTree = (
  entries: Readonly<Record<string, unknown>>,
  level = 0,
  parent: string | null = null,
): DependencyTree => {
  const tree: Record<string, DependencyNode> = {};

  for (const [name, entry] of Object.entries(entries)) {
    if (typeof entry === "string") {
      tree[name] = { version: entry, level, parent, dependencies: {} };
      continue;
    }

    if (!isRecord(entry)) {
      continue;
    }

    const version = entry["version"];
    const nested = entry["dependencies"];
    tree[name] = {
      version: typeof version === "string" ? version : null,
      level,
      parent,
      dependencies: isRecord(nested) ? normalizeDependencyTree(nested, level + 1, name) : {},
    };
  }

  return tree;
};
