/**
 * gotop.ts — On phones, skip the header and land on the article itself.
 */

import type { GoTopConfig } from './config';

/** The slice of `window` this needs. */
export interface ScrollHost {
  document: Document;
  location: { hash: string };
  matchMedia(query: string): { matches: boolean };
}

/** Returns true if the page was scrolled. */
export function scrollToContent(win: ScrollHost, config: GoTopConfig): boolean {
  const target = win.document.getElementById(config.target_id);
  if (!target || win.location.hash) return false;
  if (!win.matchMedia(config.media_query).matches) return false;

  target.scrollIntoView({ behavior: 'smooth', block: 'start', inline: 'nearest' });
  return true;
}
