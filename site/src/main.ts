/**
 * main.ts — Entry point bundled into public/js/site.js.
 *
 * Every feature is optional per page: each one looks for its own elements and
 * stays out of the way if the template did not render them.
 */

import { loadSiteConfig, type SiteConfig } from './lib/config';
import { scrollToContent } from './lib/gotop';
import { SearchWidget } from './lib/search/widget';
import { ThemeToggle } from './lib/theme';

export interface BootedSite {
  search: SearchWidget | null;
  theme: ThemeToggle | null;
}

export function boot(win: Window, config: SiteConfig = loadSiteConfig()): BootedSite {
  const doc = win.document;
  const theme = ThemeToggle.fromDocument(doc, config.theme);
  scrollToContent(win, config.gotop);

  const search = SearchWidget.fromDocument(doc, config.search);
  if (search) {
    search.init().catch((err) => {
      console.error('[boot] Search failed to start:', err);
    });
  }

  return { search, theme };
}

if (typeof window !== 'undefined' && import.meta.env.MODE !== 'test') {
  if (document.readyState === 'loading') {
    document.addEventListener('DOMContentLoaded', () => boot(window), { once: true });
  } else {
    boot(window);
  }
}
