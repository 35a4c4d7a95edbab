import {
  isEmptyTree,
  type DependencyCounts,
  type DependencyTree,
  type InventorySummary,
  type RepositoryResult,
} from "@orgdeps/core";

export const countDirectDependencies = (tree: DependencyTree): number => Object.keys(tree).length;

/** Every node below the top level, however deep. */
export const countTransitiveDependencies = (tree: DependencyTree): number =>
  Object.values(tree).reduce(
    (sum, node) =>
      sum + countDirectDependencies(node.dependencies) + countTransitiveDependencies(node.dependencies),
    0,
  );

export const countDependencies = (tree: DependencyTree): DependencyCounts => ({
  direct: countDirectDependencies(tree),
  transitive: countTransitiveDependencies(tree),
});

/** Drops repositories without dependencies and orders the rest by direct count, descending. */
export const selectRepositoriesWithDependencies = (
  results: readonly RepositoryResult[],
): readonly RepositoryResult[] =>
  results
    .filter((result) => !isEmptyTree(result.dependencies))
    .sort(
      (left, right) =>
        countDirectDependencies(right.dependencies) - countDirectDependencies(left.dependencies),
    );

export const summarizeInventory = (results: readonly RepositoryResult[]): InventorySummary => {
  const withDependencies = selectRepositoriesWithDependencies(results);
  let directDependencies = 0;
  let transitiveDependencies = 0;

  for (const result of withDependencies) {
    const counts = countDependencies(result.dependencies);
    directDependencies += counts.direct;
    transitiveDependencies += counts.transitive;
  }

  return {
    totalRepositories: results.length,
    repositoriesWithDependencies: withDependencies.length,
    directDependencies,
    transitiveDependencies,
  };
};
