import { mkdir, readdir, readFile, rename, unlink, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { errorMessage, isEnoentError, StorageError } from "./errors.js";

/** Parsed JSON content, or `undefined` when the file does not exist. */
export async function readJsonFile(path: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    if (isEnoentError(error)) {
      return undefined;
    }
    throw new StorageError(`Failed to read ${path}: ${errorMessage(error)}`, error);
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new StorageError(`Invalid JSON in ${path}: ${errorMessage(error)}`, error);
  }
}

export async function writeJsonFileAtomic(path: string, payload: unknown): Promise<void> {
  const tmp = `${path}.tmp`;
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(tmp, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
    await rename(tmp, path);
  } catch (error) {
    throw new StorageError(`Failed to write ${path}: ${errorMessage(error)}`, error);
  }
}

/** Returns false when there was nothing to delete. */
export async function deleteFile(path: string): Promise<boolean> {
  try {
    await unlink(path);
    return true;
  } catch (error) {
    if (isEnoentError(error)) {
      return false;
    }
    throw new StorageError(`Failed to delete ${path}: ${errorMessage(error)}`, error);
  }
}

export async function listJsonFiles(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(".json"))
      .map((entry) => entry.name)
      .sort((a, b) => a.localeCompare(b));
  } catch (error) {
    if (isEnoentError(error)) {
      return [];
    }
    throw new StorageError(`Failed to list ${dir}: ${errorMessage(error)}`, error);
  }
}

export async function ensureDirectory(dir: string): Promise<void> {
  try {
    await mkdir(dir, { recursive: true });
  } catch (error) {
    throw new StorageError(`Failed to create ${dir}: ${errorMessage(error)}`, error);
  }
}
