import { z } from "zod";
import type { HttpTransport } from "./ports/http.js";
import { createNoopLogger, type Logger } from "./logger.js";
import { describeError } from "./network-errors.js";
import { buildDownloadUrl, type RepoCoordinates } from "./url-resolver.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface FileEntry {
  /** Path relative to the repository root, also used under the save directory */
  relativePath: string;
  downloadURL: string;
  /** Size announced by the listing, 0 when unknown */
  declaredSize: number;
}

export type ListResult = { ok: true; files: FileEntry[] } | { ok: false; reason: string };

export type ListFiles = (repo: RepoCoordinates) => Promise<ListResult>;

export interface DirectoryListerOptions {
  transport: HttpTransport;
  mirrorHost: string;
  timeoutMs?: number;
  logger?: Logger;
}

export const DEFAULT_LIST_TIMEOUT_MS = 30_000;

const TreeEntrySchema = z.object({
  type: z.string(),
  path: z.string().min(1),
  size: z.number().int().nonnegative().optional(),
});

const TreeListingSchema = z.array(TreeEntrySchema);

// ---------------------------------------------------------------------------
// Lister
// ---------------------------------------------------------------------------

/**
 * Listing endpoint for one level of a repository tree.
 */
export function buildListingUrl(mirrorHost: string, repo: RepoCoordinates): string {
  const base = `https://${mirrorHost}/api/models/${repo.owner}/${repo.name}/tree/${repo.branch}`;
  return repo.subpath ? `${base}/${repo.subpath}` : base;
}

async function readText(body: AsyncIterable<Uint8Array>): Promise<string> {
  const chunks: Uint8Array[] = [];
  for await (const chunk of body) {
    chunks.push(chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}

function formatIssues(error: z.ZodError): string {
  const [first] = error.issues;
  const where = first.path.length > 0 ? ` at ${first.path.join(".")}` : "";
  return `${first.message}${where}`;
}

/**
 * Create a lister for the files directly under a repository path.
 * Sub-directories are not descended into. Any failure yields `ok: false`
 * rather than a partial list.
 */
export function createDirectoryLister({
  transport,
  mirrorHost,
  timeoutMs = DEFAULT_LIST_TIMEOUT_MS,
  logger = createNoopLogger(),
}: DirectoryListerOptions): ListFiles {
  return async (repo) => {
    const url = buildListingUrl(mirrorHost, repo);

    let text: string;
    try {
      const response = await transport.get(url, { timeoutMs });
      if (response.status < 200 || response.status >= 300) {
        response.discard();
        return { ok: false, reason: `HTTP ${response.status}` };
      }
      text = await readText(response.body);
    } catch (error) {
      logger.debug("Listing request failed", { url, error: describeError(error) });
      return { ok: false, reason: describeError(error) };
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      return { ok: false, reason: "Listing response is not valid JSON" };
    }

    const parsed = TreeListingSchema.safeParse(json);
    if (!parsed.success) {
      return { ok: false, reason: `Unexpected listing format: ${formatIssues(parsed.error)}` };
    }

    const files = parsed.data
      .filter((entry) => entry.type === "file")
      .map((entry) => ({
        relativePath: entry.path,
        downloadURL: buildDownloadUrl(mirrorHost, repo, entry.path),
        declaredSize: entry.size ?? 0,
      }));

    logger.debug("Listed repository", {
      url,
      entries: parsed.data.length,
      files: files.length,
    });
    return { ok: true, files };
  };
}
