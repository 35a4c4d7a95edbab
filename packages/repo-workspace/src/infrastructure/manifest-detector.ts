import { access } from "node:fs/promises";
import { join } from "node:path";
import {
  LOCKFILE_FILE_NAME,
  MANIFEST_FILE_NAME,
  type ManifestDetection,
} from "../domain/types.js";

const fileExists = async (path: string): Promise<boolean> => {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
};

export const detectManifests = async (repositoryPath: string): Promise<ManifestDetection> => {
  const [hasManifest, hasLockfile] = await Promise.all([
    fileExists(join(repositoryPath, MANIFEST_FILE_NAME)),
    fileExists(join(repositoryPath, LOCKFILE_FILE_NAME)),
  ]);

  return { hasManifest, hasLockfile };
};
