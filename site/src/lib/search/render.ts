/**
 * render.ts — Result list markup for the search box.
 */

import type { SearchResult } from './types';

export function escHtml(s: string): string {
  return s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

const ISO_DAY = /^\d{4}-\d{2}-\d{2}/;

/** "2021-03-04T10:00:00Z" → "2021-03-04"; anything else is shown as given. */
export function displayDate(date: string): string {
  const m = ISO_DAY.exec(date);
  return m ? m[0] : date;
}

export function renderResultItem({ item }: SearchResult): string {
  const date = item.date
    ? `<span class="published"><time class="pull-right post-list" datetime="${escHtml(item.date)}">${escHtml(displayDate(item.date))}</time></span>`
    : '';
  return `<li><span class="title"><a href="${escHtml(item.permalink)}">${escHtml(item.title)}</a></span>${date}</li>`;
}

export function renderResultList(results: readonly SearchResult[]): string {
  if (results.length === 0) return '';
  return `<ul class="entries">${results.map(renderResultItem).join('')}</ul>`;
}

/** Replace whatever the container shows with `results`. */
export function renderResults(container: Element, results: readonly SearchResult[]): void {
  container.innerHTML = renderResultList(results);
}
