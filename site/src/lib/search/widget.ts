/**
 * widget.ts — The search box on the search page.
 *
 * Lifecycle: uninitialized → loading → ready. The input stays disabled while
 * the index loads, and input events before `ready` render nothing. If the
 * index cannot be loaded the widget still becomes ready, over an empty index,
 * so every query renders an empty list.
 *
 * Each query synchronously replaces the results container, so the last
 * keystroke always wins.
 */

import type { SearchConfig } from '../config';
import { loadIndex } from './index-loader';
import { Matcher } from './matcher';
import { renderResults } from './render';
import type { IndexSource, SearchResult, WidgetState } from './types';

export interface SearchWidgetElements {
  input: HTMLInputElement;
  results: Element;
}

export class SearchWidget {
  private state: WidgetState = 'uninitialized';
  private source: IndexSource = 'none';
  private matcher: Matcher | null = null;
  private initPromise: Promise<void> | null = null;

  private readonly input: HTMLInputElement;
  private readonly results: Element;

  private readonly onInput = (): void => {
    this.query(this.input.value);
  };

  // Enter would submit the surrounding form and navigate away from the page
  private readonly onKeyDown = (e: KeyboardEvent): void => {
    if (e.key === 'Enter') e.preventDefault();
  };

  constructor(elements: SearchWidgetElements, private readonly config: SearchConfig) {
    this.input = elements.input;
    this.results = elements.results;
    this.input.addEventListener('input', this.onInput);
    this.input.addEventListener('keydown', this.onKeyDown);
  }

  /** Find the configured input and results container; null if the page has no search box. */
  static fromDocument(doc: Document, config: SearchConfig): SearchWidget | null {
    const input = doc.getElementById(config.input_id);
    const results = doc.getElementById(config.results_id);
    if (!(input instanceof HTMLInputElement) || !results) return null;
    return new SearchWidget({ input, results }, config);
  }

  get status(): WidgetState {
    return this.state;
  }

  get indexSource(): IndexSource {
    return this.source;
  }

  /** Load the index and build the matcher. Resolves once ready; never rejects. */
  init(): Promise<void> {
    if (!this.initPromise) this.initPromise = this.load();
    return this.initPromise;
  }

  /**
   * Search for `text` and render the matches. Blank text clears the list.
   * Returns the rendered results.
   */
  query(text: string): SearchResult[] {
    if (this.state !== 'ready') return [];
    const found = this.matcher && text.trim() ? this.matcher.search(text) : [];
    renderResults(this.results, found);
    return found;
  }

  dispose(): void {
    this.input.removeEventListener('input', this.onInput);
    this.input.removeEventListener('keydown', this.onKeyDown);
  }

  private async load(): Promise<void> {
    this.state = 'loading';
    this.input.disabled = true;

    try {
      const { entries, source } = await loadIndex(this.config.index_url);
      this.matcher = new Matcher(entries, this.config);
      this.source = source;
    } catch (err) {
      // Ready but empty: every query renders an empty list
      console.warn('[search] Could not build the search matcher:', err);
      this.matcher = null;
      this.source = 'none';
    } finally {
      this.state = 'ready';
      this.input.disabled = false;
    }

    // Text typed (or restored by the browser) before the index arrived
    if (this.input.value.trim()) this.query(this.input.value);
  }
}
