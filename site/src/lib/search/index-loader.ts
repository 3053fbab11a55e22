/**
 * index-loader.ts — Fetch and validate the build-generated content index.
 *
 * The site build writes index.json as an array of article summaries. Records
 * without a title or permalink are dropped; optional fields are defaulted.
 * Any failure leaves the caller with an empty index rather than an error.
 */

import type { ContentIndexEntry, LoadedIndex } from './types';

const EMPTY: LoadedIndex = { entries: [], source: 'none' };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function text(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function textList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === 'string' && v.length > 0);
}

/** Normalise one raw record, or null if it cannot be linked to. */
export function toEntry(raw: unknown): ContentIndexEntry | null {
  if (!isRecord(raw)) return null;
  const title = text(raw.title).trim();
  const permalink = text(raw.permalink).trim();
  if (!title || !permalink) return null;

  return Object.freeze({
    title,
    summary: text(raw.summary),
    content: text(raw.content),
    tags: Object.freeze(textList(raw.tags)),
    categories: Object.freeze(textList(raw.categories)),
    permalink,
    date: text(raw.date),
  });
}

/** Turn a parsed index document into entries. Throws if it is not an array. */
export function parseIndex(data: unknown): ContentIndexEntry[] {
  if (!Array.isArray(data)) {
    throw new Error(`Search index is malformed: expected an array, got ${data === null ? 'null' : typeof data}`);
  }
  return data
    .map(toEntry)
    .filter((e): e is ContentIndexEntry => e !== null);
}

export async function fetchIndex(url: string): Promise<ContentIndexEntry[]> {
  const resp = await fetch(url, { headers: { Accept: 'application/json' } });
  if (!resp.ok) {
    const body = await resp.text().catch(() => '');
    throw new Error(`Search index fetch failed: HTTP ${resp.status} — ${body}`);
  }
  return parseIndex(await resp.json());
}

/**
 * Load the index for the search widget.
 *
 * Never rejects: network, HTTP and parse failures are logged and produce
 * `{ entries: [], source: 'none' }`.
 */
export async function loadIndex(url: string): Promise<LoadedIndex> {
  try {
    const entries = await fetchIndex(url);
    return { entries: Object.freeze(entries), source: 'index' };
  } catch (err) {
    console.warn(`[search] Could not load search index from ${url}:`, err);
    return EMPTY;
  }
}
