import { posix } from "path";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RepoCoordinates {
  owner: string;
  name: string;
  /** "main" when the URL names no branch */
  branch: string;
  /** Path inside the repository, "" for the root */
  subpath: string;
}

export type ResolvedUrl =
  | { kind: "file"; downloadURL: string; filename: string }
  | { kind: "directory"; repo: RepoCoordinates }
  | { kind: "unresolved" };

export interface HostConfig {
  /** Host downloads and listings are sent to */
  mirrorHost: string;
  /** Upstream host whose URLs are accepted and rewritten to the mirror */
  canonicalHost: string;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_HOSTS: HostConfig = {
  mirrorHost: "hf-mirror.com",
  canonicalHost: "huggingface.co",
};

export const DEFAULT_BRANCH = "main";

/** Filename used when a plain URL has no basename */
export const FALLBACK_FILENAME = "downloaded_file";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Percent-decode, keeping the input as-is when it holds a malformed escape.
 */
export function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

function uniqueHosts(hosts: HostConfig): string[] {
  return [...new Set([hosts.mirrorHost, hosts.canonicalHost])];
}

function treePattern(host: string): RegExp {
  return new RegExp(`${escapeRegExp(host)}/([^/]+)/([^/]+)/tree(?:/([^/]+))?(?:/(.*))?$`);
}

function filePattern(host: string): RegExp {
  return new RegExp(`${escapeRegExp(host)}/([^/]+)/([^/]+)/(?:resolve|blob)/([^/]+)/(.+)$`);
}

/**
 * Build the direct download URL of a file in a repository on the mirror.
 */
export function buildDownloadUrl(
  mirrorHost: string,
  repo: Pick<RepoCoordinates, "owner" | "name" | "branch">,
  path: string
): string {
  return `https://${mirrorHost}/${repo.owner}/${repo.name}/resolve/${repo.branch}/${path}`;
}

/**
 * Format coordinates as owner/name[@branch][/subpath] for messages.
 */
export function describeRepo(repo: RepoCoordinates): string {
  const branch = repo.branch === DEFAULT_BRANCH ? "" : `@${repo.branch}`;
  const subpath = repo.subpath ? `/${repo.subpath}` : "";
  return `${repo.owner}/${repo.name}${branch}${subpath}`;
}

// ---------------------------------------------------------------------------
// Resolver
// ---------------------------------------------------------------------------

/**
 * Classify a URL as a single file, a repository directory or neither.
 *
 * Directory patterns are tried before file patterns. File URLs from either
 * host are rewritten to the mirror's `resolve` form.
 */
export function resolveUrl(rawURL: string, hosts: HostConfig = DEFAULT_HOSTS): ResolvedUrl {
  const url = rawURL.trim().split("?")[0];

  for (const host of uniqueHosts(hosts)) {
    const match = treePattern(host).exec(url);
    if (match) {
      const [, owner, name, branch, subpath] = match;
      return {
        kind: "directory",
        repo: {
          owner,
          name,
          branch: branch || DEFAULT_BRANCH,
          subpath: (subpath ?? "").replace(/\/+$/, ""),
        },
      };
    }
  }

  for (const host of uniqueHosts(hosts)) {
    const match = filePattern(host).exec(url);
    if (match) {
      const [, owner, name, branch, filePath] = match;
      return {
        kind: "file",
        downloadURL: buildDownloadUrl(hosts.mirrorHost, { owner, name, branch }, filePath),
        filename: posix.basename(safeDecode(filePath)),
      };
    }
  }

  if (url.startsWith("http")) {
    let pathname: string;
    try {
      pathname = new URL(url).pathname;
    } catch {
      return { kind: "unresolved" };
    }
    return {
      kind: "file",
      downloadURL: url,
      filename: posix.basename(safeDecode(pathname)) || FALLBACK_FILENAME,
    };
  }

  return { kind: "unresolved" };
}
