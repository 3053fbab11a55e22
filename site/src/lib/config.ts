/**
 * config.ts — Load the theme scripts' configuration from site/site.yaml
 *
 * The YAML file is bundled as raw text and parsed on first use. Each section
 * is merged over DEFAULTS, so a partial file only overrides what it names.
 * A missing, empty or broken file yields the defaults.
 */

import yaml from 'js-yaml';
import rawSiteYaml from '../../site.yaml?raw';

// ── Types ────────────────────────────────────────────────────────────

export type SearchField = 'title' | 'summary' | 'content' | 'tags' | 'categories';

export type FieldWeights = Record<SearchField, number>;

export interface SearchConfig {
  index_url: string;
  input_id: string;
  results_id: string;
  max_query_length: number;
  /** Cap on rendered results; absent means every match is shown. */
  max_results?: number;
  threshold: number;
  weights: FieldWeights;
}

export interface ThemeConfig {
  storage_key: string;
  giscus_origin: string;
}

export interface GoTopConfig {
  target_id: string;
  media_query: string;
}

export interface SiteConfig {
  search: SearchConfig;
  theme: ThemeConfig;
  gotop: GoTopConfig;
}

// ── Defaults ─────────────────────────────────────────────────────────

export const SEARCH_FIELDS: readonly SearchField[] = ['title', 'summary', 'content', 'tags', 'categories'];

// Frozen: parseSiteConfig always builds a fresh object from these values.
export const DEFAULTS: Readonly<SiteConfig> = Object.freeze({
  search: Object.freeze({
    // Relative to the search page (/search/), so sub-path deploys resolve it too
    index_url: '../index.json',
    input_id: 'searchInput',
    results_id: 'searchResults',
    max_query_length: 32,
    threshold: 0.0,
    weights: Object.freeze({ title: 0.8, summary: 0.7, content: 0.5, tags: 0.3, categories: 0.3 }),
  }),
  theme: Object.freeze({
    storage_key: 'theme',
    giscus_origin: 'https://giscus.app',
  }),
  gotop: Object.freeze({
    target_id: 'content-start',
    media_query: '(max-width: 48em)',
  }),
});

// ── Field pickers ────────────────────────────────────────────────────

type Section = Record<string, unknown>;

function isRecord(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(parent: Section, key: string): Section {
  const value = parent[key];
  return isRecord(value) ? value : {};
}

function str(sec: Section, key: string, fallback: string): string {
  const value = sec[key];
  return typeof value === 'string' && value.length > 0 ? value : fallback;
}

function num(sec: Section, key: string, fallback: number): number {
  const value = sec[key];
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : fallback;
}

function positive(sec: Section, key: string, fallback: number): number {
  const value = sec[key];
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : fallback;
}

function parseWeights(sec: Section): FieldWeights {
  const weights = { ...DEFAULTS.search.weights };
  for (const field of SEARCH_FIELDS) {
    weights[field] = positive(sec, field, weights[field]);
  }
  return weights;
}

// ── Parsing ──────────────────────────────────────────────────────────

/** Parse a site.yaml document, falling back to DEFAULTS per field. */
export function parseSiteConfig(raw: string): SiteConfig {
  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (err) {
    console.warn('[config] Could not parse site.yaml, using defaults:', err);
  }
  const root: Section = isRecord(doc) ? doc : {};

  const search = section(root, 'search');
  const theme = section(root, 'theme');
  const gotop = section(root, 'gotop');
  const maxResults = search.max_results;

  return {
    search: {
      index_url: str(search, 'index_url', DEFAULTS.search.index_url),
      input_id: str(search, 'input_id', DEFAULTS.search.input_id),
      results_id: str(search, 'results_id', DEFAULTS.search.results_id),
      max_query_length: Math.max(1, Math.floor(num(search, 'max_query_length', DEFAULTS.search.max_query_length))),
      ...(typeof maxResults === 'number' && Number.isInteger(maxResults) && maxResults > 0
        ? { max_results: maxResults }
        : {}),
      threshold: Math.min(num(search, 'threshold', DEFAULTS.search.threshold), 1),
      weights: parseWeights(section(search, 'weights')),
    },
    theme: {
      storage_key: str(theme, 'storage_key', DEFAULTS.theme.storage_key),
      giscus_origin: str(theme, 'giscus_origin', DEFAULTS.theme.giscus_origin),
    },
    gotop: {
      target_id: str(gotop, 'target_id', DEFAULTS.gotop.target_id),
      media_query: str(gotop, 'media_query', DEFAULTS.gotop.media_query),
    },
  };
}

// ── Loader ───────────────────────────────────────────────────────────

let _cached: SiteConfig | null = null;

export function loadSiteConfig(): SiteConfig {
  if (_cached) return _cached;
  _cached = parseSiteConfig(rawSiteYaml);
  return _cached;
}
