import { escapeHtml } from '@/lib/html';
import type { Heading, TocEntry } from '@/types/post';

const FALLBACK_ANCHOR = 'section';

/**
 * Lower-case, collapse whitespace runs to `-`, drop anything outside `[a-z0-9-]`.
 */
export function slugifyHeading(text: string): string {
  return text
    .toLowerCase()
    .trim()
    .replace(/\s+/g, '-')
    .replace(/[^a-z0-9-]/g, '');
}

/**
 * Returns a function handing out unique anchor ids for one document.
 * Repeats of an id get `-2`, `-3`, ... in order of appearance.
 */
export function createAnchorGenerator(): (text: string) => string {
  const used = new Set<string>();
  const counters = new Map<string, number>();

  return (text) => {
    const base = slugifyHeading(text) || FALLBACK_ANCHOR;
    let id = base;
    if (used.has(id)) {
      let n = counters.get(base) ?? 1;
      do {
        n += 1;
        id = `${base}-${n}`;
      } while (used.has(id));
      counters.set(base, n);
    }
    used.add(id);
    return id;
  };
}

/**
 * Nest headings by level: each heading goes under the nearest preceding
 * heading with a lower level, or at the top when there is none.
 */
export function buildToc(headings: Heading[]): TocEntry[] {
  const root: TocEntry[] = [];
  const stack: TocEntry[] = [];

  for (const heading of headings) {
    const entry: TocEntry = { ...heading, children: [] };
    while (stack.length > 0 && stack[stack.length - 1].level >= entry.level) {
      stack.pop();
    }
    const parent = stack[stack.length - 1];
    (parent ? parent.children : root).push(entry);
    stack.push(entry);
  }

  return root;
}

function renderEntries(entries: TocEntry[]): string {
  const items = entries.map((entry) => {
    const link = `<a href="#${entry.anchorId}">${escapeHtml(entry.text)}</a>`;
    const nested = entry.children.length > 0 ? renderEntries(entry.children) : '';
    return `<li>${link}${nested}</li>`;
  });
  return `<ul>${items.join('')}</ul>`;
}

export function renderToc(entries: TocEntry[], options: { sticky?: boolean } = {}): string {
  if (entries.length === 0) return '';
  const className = options.sticky ? 'toc toc--sticky' : 'toc';
  return `<nav class="${className}" aria-label="Table of contents">${renderEntries(entries)}</nav>`;
}
