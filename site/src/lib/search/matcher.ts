/**
 * matcher.ts — Fuse.js over the content index with the site's field weights.
 *
 * A one-word query is a plain Fuse search. Several words become a logical
 * query in which every word has to hit at least one weighted field, so
 * "actor model" finds a post titled "Model" tagged "actor".
 */

import Fuse, { type Expression, type IFuseOptions } from 'fuse.js';
import { SEARCH_FIELDS, type SearchConfig } from '../config';
import type { ContentIndexEntry, SearchResult } from './types';

export function buildFuseOptions(config: SearchConfig): IFuseOptions<ContentIndexEntry> {
  return {
    shouldSort: true,
    includeScore: true,
    includeMatches: true,
    threshold: config.threshold,
    ignoreLocation: true,
    distance: 100,
    minMatchCharLength: 1,
    keys: SEARCH_FIELDS.map((name) => ({ name, weight: config.weights[name] })),
  };
}

/** Split raw input into search tokens, after capping its length. */
export function tokenize(text: string, maxLength: number): string[] {
  // Cut by code point so a surrogate pair is never split
  return Array.from(text.trim())
    .slice(0, maxLength)
    .join('')
    .split(/\s+/)
    .filter((t) => t.length > 0);
}

export function buildQuery(tokens: readonly string[]): string | Expression | null {
  if (tokens.length === 0) return null;
  if (tokens.length === 1) return tokens[0] ?? null;
  return {
    $and: tokens.map((token) => ({
      $or: SEARCH_FIELDS.map((field) => ({ [field]: token })),
    })),
  };
}

export class Matcher {
  private readonly fuse: Fuse<ContentIndexEntry>;
  private readonly maxQueryLength: number;
  private readonly maxResults: number | undefined;

  constructor(entries: readonly ContentIndexEntry[], config: SearchConfig) {
    this.fuse = new Fuse(entries, buildFuseOptions(config));
    this.maxQueryLength = config.max_query_length;
    this.maxResults = config.max_results;
  }

  /** Ranked matches for `text`, most relevant first. Blank text matches nothing. */
  search(text: string): SearchResult[] {
    const query = buildQuery(tokenize(text, this.maxQueryLength));
    if (query === null) return [];

    const hits = this.maxResults === undefined
      ? this.fuse.search(query)
      : this.fuse.search(query, { limit: this.maxResults });

    return hits.map((hit) => ({
      item: hit.item,
      score: hit.score ?? 0,
      refIndex: hit.refIndex,
    }));
  }
}
