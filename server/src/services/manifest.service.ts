import { ManifestEntry } from "../models/run.model";

export const MANIFEST_SUFFIX = ".tsv";
export const MISSING_CHECKSUM = "NA";

export interface ManifestRow {
  entry: ManifestEntry;
  tags: Record<string, string>;
}

export interface ParsedManifest {
  entries: ManifestRow[];
  /** Data rows dropped for a missing file id or an unusable URL. */
  skipped: number;
}

export function runKeyFor(fileId: string): string {
  return `nemo_manifest_${fileId}`;
}

/**
 * Directory part of a URL's path, without the leading slash:
 * `https://host/a/b/c/file.ext` gives `a/b/c`.
 */
export function parseUrlPathPrefix(url: string): string {
  const { pathname } = new URL(url);
  const lastSlash = pathname.lastIndexOf("/");
  if (lastSlash === -1) {
    return "";
  }
  return pathname.slice(1, lastSlash);
}

function parseSourceUrl(raw: string): URL | null {
  try {
    const url = new URL(raw);
    return url.protocol === "http:" || url.protocol === "https:" ? url : null;
  } catch {
    return null;
  }
}

function parseSize(raw: string | undefined): number {
  if (raw === undefined || !/^\d+$/.test(raw)) {
    return -1;
  }
  return Number(raw);
}

// File ids name the payload inside the worker's workspace.
function isPlainName(fileId: string): boolean {
  return !/[\\/]/.test(fileId) && fileId !== "." && fileId !== "..";
}

/**
 * Parse a tab-separated manifest with a header row. Only `file_id`, `md5`,
 * `size`, `urls` and `sample_id` are read.
 */
export function parseManifest(text: string, manifestKey: string): ParsedManifest {
  const lines = text.split(/\r?\n/).filter((line) => line.trim().length > 0);
  const entries: ManifestRow[] = [];
  let skipped = 0;

  if (lines.length === 0) {
    return { entries, skipped };
  }

  const header = lines[0].split("\t").map((column) => column.trim());

  for (const line of lines.slice(1)) {
    const cells = line.split("\t");
    const row = new Map<string, string>();
    header.forEach((column, index) => {
      const cell = cells[index]?.trim();
      if (cell) {
        row.set(column, cell);
      }
    });

    const fileId = row.get("file_id");
    const rawUrl = row.get("urls");
    const url = rawUrl === undefined ? null : parseSourceUrl(rawUrl);
    if (fileId === undefined || rawUrl === undefined || url === null || !isPlainName(fileId)) {
      skipped++;
      continue;
    }

    const entry: ManifestEntry = {
      fileId,
      sourceUrl: rawUrl,
      expectedChecksum: row.get("md5") ?? MISSING_CHECKSUM,
      expectedSize: parseSize(row.get("size")),
      sampleId: row.get("sample_id") ?? "",
      destinationPrefix: parseUrlPathPrefix(rawUrl),
    };

    entries.push({
      entry,
      tags: {
        manifest: manifestKey,
        file_id: fileId,
        size: String(entry.expectedSize),
        url: rawUrl,
        sample_id: entry.sampleId,
      },
    });
  }

  return { entries, skipped };
}
