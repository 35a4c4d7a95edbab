export type DependencyNode = {
  version: string | null;
  level: number;
  parent: string | null;
  dependencies: DependencyTree;
};

export type DependencyTree = Readonly<Record<string, DependencyNode>>;

export type DependencySource = "installed_tree" | "manifest" | "none";

export type RepositoryResult = {
  readonly name: string;
  readonly source: DependencySource;
  readonly dependencies: DependencyTree;
};

export type RepositoryDescriptor = {
  name: string;
  private: boolean;
};

export type DependencyCounts = {
  direct: number;
  transitive: number;
};

export type InventorySummary = {
  totalRepositories: number;
  repositoriesWithDependencies: number;
  directDependencies: number;
  transitiveDependencies: number;
};

export const createEmptyRepositoryResult = (name: string): RepositoryResult => ({
  name,
  source: "none",
  dependencies: {},
});

export const isEmptyTree = (tree: DependencyTree): boolean => Object.keys(tree).length === 0;

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);
