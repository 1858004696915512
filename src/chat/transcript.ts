import type { LoggerService } from '@nestjs/common';

export type TranscriptLocation = {
  /** Storage account host, lowercased. */
  host: string;
  container: string;
  /** Folder prefix, ending in `/`, or empty for the container root. */
  prefix: string;
};

export type FragmentReader = (blobName: string) => Promise<string>;

export type MergedTranscript = {
  results: unknown[];
  merged: string[];
  skipped: string[];
};

const CHUNK_START = /chunk_start-(\d+)/;
const SECTION_RULE = '**************';

/**
 * Splits `https://<account host>/<container>/<path>` into host, container
 * and listing prefix. A path ending in a `.json` file lists its folder.
 * Returns null for any other URL shape.
 */
export function parseTranscriptLocation(url: string): TranscriptLocation | null {
  if (!url.startsWith('https://')) return null;

  let segments: string[];
  try {
    segments = url
      .slice('https://'.length)
      .split(/[?#]/)[0]
      .split('/')
      .filter(Boolean)
      .map((segment) => decodeURIComponent(segment));
  } catch {
    return null;
  }

  const [host, container, ...path] = segments;
  if (!host || !container) return null;

  if (path.length > 0 && path[path.length - 1].endsWith('.json')) {
    path.pop();
  }
  return { host: host.toLowerCase(), container, prefix: path.length > 0 ? `${path.join('/')}/` : '' };
}

/** Offset embedded as `chunk_start-<n>`; names without one sort last. */
export function extractChunkStart(blobName: string): number {
  const match = CHUNK_START.exec(blobName);
  return match ? parseInt(match[1], 10) : Number.POSITIVE_INFINITY;
}

export function orderFragments(blobNames: string[]): string[] {
  return [...blobNames].sort((a, b) => {
    const left = extractChunkStart(a);
    const right = extractChunkStart(b);
    return left === right ? 0 : left < right ? -1 : 1;
  });
}

/**
 * Reads every fragment in offset order and concatenates their JSON payloads:
 * arrays are spliced in, anything else is appended. A fragment that cannot be
 * read or parsed is logged and skipped; only an aborted signal stops the fold.
 */
export async function mergeTranscriptFragments(
  blobNames: string[],
  read: FragmentReader,
  logger: LoggerService,
  signal?: AbortSignal,
): Promise<MergedTranscript> {
  const outcome: MergedTranscript = { results: [], merged: [], skipped: [] };

  for (const name of orderFragments(blobNames)) {
    let content: string;
    try {
      content = await read(name);
    } catch (error) {
      signal?.throwIfAborted();
      logger.error(`Error reading ${name}: ${error instanceof Error ? error.message : String(error)}`);
      outcome.skipped.push(name);
      continue;
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      logger.warn(`Skipping invalid JSON in ${name}: ${error instanceof Error ? error.message : String(error)}`);
      outcome.skipped.push(name);
      continue;
    }

    if (Array.isArray(data)) {
      outcome.results.push(...data);
    } else {
      outcome.results.push(data);
    }
    outcome.merged.push(name);
  }

  return outcome;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function render(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value) ?? String(value);
}

/**
 * Flattens merged transcript items into the prompt context, one section per
 * key with keys in sorted order. Items that are not objects contribute nothing.
 */
export function buildVideoContext(results: unknown[]): string {
  let context = '';
  for (const item of results) {
    if (!isRecord(item)) continue;
    for (const key of Object.keys(item).sort()) {
      context += `${SECTION_RULE}${key}${SECTION_RULE}\n${render(item[key])}\n\n`;
    }
  }
  return context;
}
