import type { Plugin } from 'unified';
import type { Root } from 'mdast';
import { visit } from 'unist-util-visit';

// Remark plugin: replace the `{{site.baseurl}}` placeholder in link, image and
// definition URLs and in raw HTML with the configured base path.
// Without a configured base URL the placeholder is left alone.

export interface RemarkBaseUrlOptions {
  baseUrl?: string;
}

export const BASE_URL_PLACEHOLDER = /\{\{\s*site\.baseurl\s*\}\}/g;

export const COMPACT_PLACEHOLDER = '{{site.baseurl}}';

const OPENING_FENCE = /^ {0,3}(`{3,}|~{3,})/;
const CLOSING_FENCE = /^ {0,3}(`{3,}|~{3,})\s*$/;

// An inline code span, or a placeholder opening a link destination
// (`](...)`, `](<...>)`) or a definition (`[ref]: ...`).
const DESTINATION_PLACEHOLDER = /(`+)[\s\S]*?\1|(\]\(\s*<?|^ {0,3}\[[^\]]+\]:[ \t]*<?)\{\{\s*site\.baseurl\s*\}\}/g;

export function substituteBaseUrl(value: string, baseUrl: string): string {
  return value.replace(BASE_URL_PLACEHOLDER, () => baseUrl);
}

/**
 * A link destination cannot contain spaces, so `[a]({{ site.baseurl }}/x)`
 * would never parse as a link. Rewrite placeholders that open a destination
 * to the compact form before parsing. Fenced code and inline code are kept
 * as written.
 */
export function normalizeBaseUrlPlaceholders(markdown: string): string {
  const lines = markdown.split('\n');
  let fence: { char: string; length: number } | undefined;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (fence) {
      const close = CLOSING_FENCE.exec(line);
      if (close && close[1].startsWith(fence.char) && close[1].length >= fence.length) fence = undefined;
      continue;
    }
    const open = OPENING_FENCE.exec(line);
    if (open) {
      fence = { char: open[1].charAt(0), length: open[1].length };
      continue;
    }
    lines[i] = line.replace(DESTINATION_PLACEHOLDER, (match: string, ticks: string | undefined, lead: string | undefined) =>
      ticks === undefined ? `${lead ?? ''}${COMPACT_PLACEHOLDER}` : match,
    );
  }

  return lines.join('\n');
}

const remarkBaseUrl: Plugin<[RemarkBaseUrlOptions?], Root> = (options = {}) => (tree) => {
  const { baseUrl } = options;
  if (baseUrl === undefined) return;
  visit(tree, (node) => {
    switch (node.type) {
      case 'link':
      case 'image':
      case 'definition':
        node.url = substituteBaseUrl(node.url, baseUrl);
        break;
      case 'html':
        node.value = substituteBaseUrl(node.value, baseUrl);
        break;
    }
  });
};

export default remarkBaseUrl;
