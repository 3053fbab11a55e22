/**
 * types.ts — Shapes shared by the search index loader, matcher and renderer.
 */

/** One article as summarised by the site build in index.json. */
export interface ContentIndexEntry {
  readonly title: string;
  readonly summary: string;
  /** Body text excerpt. */
  readonly content: string;
  readonly tags: readonly string[];
  readonly categories: readonly string[];
  readonly permalink: string;
  /** Publish date as written by the site build (usually ISO 8601). */
  readonly date: string;
}

export interface SearchResult {
  item: ContentIndexEntry;
  /** 0 is a perfect match; higher is less relevant. */
  score: number;
  /** Position of the entry in the loaded index. */
  refIndex: number;
}

export type WidgetState = 'uninitialized' | 'loading' | 'ready';

/** Where the ready state's entries came from. */
export type IndexSource = 'index' | 'none';

export interface LoadedIndex {
  entries: readonly ContentIndexEntry[];
  source: IndexSource;
}
