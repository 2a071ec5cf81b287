import { mkdir, readFile, rm, writeFile } from "fs/promises";
import { join } from "path";
import { z } from "zod";
import type { FileEntry } from "./directory-lister.js";
import { createNoopLogger, type Logger } from "./logger.js";
import { describeError, errorCode } from "./network-errors.js";
import { classifyFile, destinationFor } from "./batch.js";
import { localFileSize } from "./transfer/engine.js";

export const MANIFEST_FILENAME = ".hubget-manifest.json";

const FileEntrySchema = z.object({
  relativePath: z.string().min(1),
  downloadURL: z.string().min(1),
  declaredSize: z.number().int().nonnegative(),
});

export const ManifestSchema = z.object({
  files: z.array(FileEntrySchema),
  saveDirectory: z.string(),
  originalURL: z.string(),
});

export interface Manifest {
  files: FileEntry[];
  saveDirectory: string;
  originalURL: string;
}

export function manifestPath(directory: string): string {
  return join(directory, MANIFEST_FILENAME);
}

/**
 * Write the manifest into its save directory, creating the directory.
 */
export async function saveManifest(manifest: Manifest): Promise<string> {
  const path = manifestPath(manifest.saveDirectory);
  await mkdir(manifest.saveDirectory, { recursive: true });
  await writeFile(path, JSON.stringify(manifest, null, 2) + "\n", "utf-8");
  return path;
}

/**
 * Read the manifest of a directory. A missing file yields undefined; so does
 * an unreadable or malformed one, after a warning.
 */
export async function loadManifest(
  directory: string,
  logger: Logger = createNoopLogger()
): Promise<Manifest | undefined> {
  const path = manifestPath(directory);

  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    if (errorCode(error) !== "ENOENT") {
      logger.warn("Ignoring unreadable manifest", { path, error: describeError(error) });
    }
    return undefined;
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    logger.warn("Ignoring manifest with invalid JSON", { path, error: describeError(error) });
    return undefined;
  }

  const parsed = ManifestSchema.safeParse(json);
  if (!parsed.success) {
    logger.warn("Ignoring manifest with unexpected content", {
      path,
      issues: parsed.error.issues.map((issue) => issue.message),
    });
    return undefined;
  }
  return parsed.data;
}

/**
 * Entries of the manifest that are not fully present on disk. Entries whose
 * local state cannot be read count as remaining.
 */
export async function remainingFiles(manifest: Manifest): Promise<FileEntry[]> {
  const remaining: FileEntry[] = [];
  for (const entry of manifest.files) {
    const destination = destinationFor(manifest.saveDirectory, entry.relativePath);
    if (!destination) continue;
    let size: number;
    try {
      size = await localFileSize(destination);
    } catch {
      // Unreadable locally; the batch reports it when it gets there
      remaining.push(entry);
      continue;
    }
    if (classifyFile(size, entry.declaredSize) !== "complete") {
      remaining.push(entry);
    }
  }
  return remaining;
}

export async function clearManifest(directory: string): Promise<void> {
  await rm(manifestPath(directory), { force: true });
}
