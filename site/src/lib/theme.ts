/**
 * theme.ts — Dark/light toggle in the header.
 *
 * The choice is kept in localStorage. Without a stored choice the page keeps
 * whatever the server rendered (body.dark-theme or not). Embedded comment
 * widgets (Giscus, Remark42) are told about every switch so they follow along.
 */

import type { ThemeConfig } from './config';

export type Theme = 'dark' | 'light';

const DARK_CLASS = 'dark-theme';

interface Remark42Api {
  changeTheme(theme: Theme): void;
}

declare global {
  interface Window {
    REMARK42?: Remark42Api;
  }
}

export interface ThemeElements {
  button: Element;
  moon: HTMLElement;
  sun: HTMLElement;
}

function isTheme(value: unknown): value is Theme {
  return value === 'dark' || value === 'light';
}

export function readStoredTheme(key: string): Theme | null {
  try {
    const stored = localStorage.getItem(key);
    return isTheme(stored) ? stored : null;
  } catch {
    return null; // storage disabled
  }
}

function storeTheme(key: string, theme: Theme): void {
  try {
    localStorage.setItem(key, theme);
  } catch (err) {
    console.warn('[theme] Could not persist theme:', err);
  }
}

/** Stored choice first, then the server-rendered body class, then light. */
export function resolveInitialTheme(doc: Document, key: string): Theme {
  return readStoredTheme(key) ?? (doc.body.classList.contains(DARK_CLASS) ? 'dark' : 'light');
}

export class ThemeToggle {
  private current: Theme;

  private readonly onClick = (): void => {
    this.set(this.current === 'dark' ? 'light' : 'dark');
  };

  constructor(
    private readonly doc: Document,
    private readonly elements: ThemeElements,
    private readonly config: ThemeConfig,
  ) {
    this.current = resolveInitialTheme(doc, config.storage_key);
    this.apply();
    storeTheme(config.storage_key, this.current);
    elements.button.addEventListener('click', this.onClick);
  }

  /** null when the header has no toggle. */
  static fromDocument(doc: Document, config: ThemeConfig): ThemeToggle | null {
    const button = doc.querySelector('.btn-light-dark');
    const moon = doc.querySelector('.moon');
    const sun = doc.querySelector('.sun');
    if (!button || !(moon instanceof HTMLElement) || !(sun instanceof HTMLElement)) return null;
    return new ThemeToggle(doc, { button, moon, sun }, config);
  }

  get theme(): Theme {
    return this.current;
  }

  set(theme: Theme): void {
    this.current = theme;
    this.apply();
    storeTheme(this.config.storage_key, theme);
    this.notifyComments();
  }

  dispose(): void {
    this.elements.button.removeEventListener('click', this.onClick);
  }

  private apply(): void {
    const dark = this.current === 'dark';
    this.doc.body.classList.toggle(DARK_CLASS, dark);
    // The icon shows the theme a click switches to
    this.elements.moon.style.display = dark ? 'none' : 'block';
    this.elements.sun.style.display = dark ? 'block' : 'none';
  }

  private notifyComments(): void {
    const giscus = this.doc.querySelector('iframe.giscus-frame');
    if (giscus instanceof HTMLIFrameElement && giscus.contentWindow) {
      giscus.contentWindow.postMessage(
        { giscus: { setConfig: { theme: this.current } } },
        this.config.giscus_origin,
      );
    }

    const view = this.doc.defaultView;
    if (this.doc.getElementById('remark42') && view?.REMARK42) {
      view.REMARK42.changeTheme(this.current);
    }
  }
}
