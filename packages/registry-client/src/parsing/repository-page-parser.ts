import { isRecord, type RepositoryDescriptor } from "@orgdeps/core";

export const parseRepositoryPage = (payload: unknown): readonly RepositoryDescriptor[] | null => {
  if (!Array.isArray(payload)) {
    return null;
  }

  const repositories: RepositoryDescriptor[] = [];
  for (const entry of payload) {
    if (!isRecord(entry) || typeof entry["name"] !== "string") {
      continue;
    }

    repositories.push({
      name: entry["name"],
      // Listing entries without a boolean flag are treated as private.
      private: entry["private"] !== false,
    });
  }

  return repositories;
};

export const selectPublicRepositoryNames = (
  repositories: readonly RepositoryDescriptor[],
): readonly string[] =>
  repositories.filter((repository) => !repository.private).map((repository) => repository.name);
