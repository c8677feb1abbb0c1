import type { Pluggable, Plugin } from 'unified';
import type { Root } from 'hast';
import { visit } from 'unist-util-visit';

export interface MarkdownOptions {
  baseUrl?: string;
  sanitize?: boolean;
  highlight?: boolean;
  theme?: string;
}

const PLAIN_LANGUAGES = new Set(['text', 'plaintext', 'txt', 'plain', 'ansi']);

// Shiki rejects languages it has no grammar for; fall back to plain text so an
// odd hint like ```console-output does not fail the whole post.
function rehypeKnownLanguages(known: Record<string, unknown>): Plugin<[], Root> {
  return () => (tree) => {
    visit(tree, 'element', (node) => {
      if (node.tagName !== 'code') return;
      const classes = node.properties.className;
      if (!Array.isArray(classes)) return;
      node.properties.className = classes.map((c) => {
        const lang = typeof c === 'string' && c.startsWith('language-') ? c.slice('language-'.length) : null;
        if (lang === null || PLAIN_LANGUAGES.has(lang) || lang in known) return c;
        return 'language-plaintext';
      });
    });
  };
}

const ENCODED_PLACEHOLDER = /%7B%7Bsite\.baseurl%7D%7D/gi;

// remark-rehype percent-encodes the braces of URLs. With no base URL to put in
// their place, turn an unsubstituted placeholder back into its literal form.
function rehypeBaseUrlLiteral(compact: string): Plugin<[], Root> {
  return () => (tree) => {
    visit(tree, 'element', (node) => {
      for (const key of ['href', 'src']) {
        const value = node.properties[key];
        if (typeof value === 'string') node.properties[key] = value.replace(ENCODED_PLACEHOLDER, compact);
      }
    });
  };
}

// Lazy import so that shiki is only loaded when highlighting is on.
export async function getMarkdownOptions(opts: MarkdownOptions = {}): Promise<{ remarkPlugins: Pluggable[]; rehypePlugins: Pluggable[] }> {
  const [remarkGfm, { default: remarkBaseUrl, COMPACT_PLACEHOLDER }, remarkCodeBlocks, rehypeRaw, rehypeSanitize, rehypeHeadingAnchors, rehypeAutolinkHeadings] = await Promise.all([
    import('remark-gfm').then(m => m.default),
    import('./remark-base-url'),
    import('./remark-code-blocks').then(m => m.default),
    import('rehype-raw').then(m => m.default),
    import('rehype-sanitize').then(m => m.default),
    import('./rehype-heading-anchors').then(m => m.default),
    import('rehype-autolink-headings').then(m => m.default),
  ]);

  const highlighting: Pluggable[] = [];
  if (opts.highlight) {
    const [rehypePrettyCode, { bundledLanguages }] = await Promise.all([
      import('rehype-pretty-code').then(m => m.default),
      import('shiki'),
    ]);
    highlighting.push(rehypeKnownLanguages(bundledLanguages), [rehypePrettyCode, {
      theme: opts.theme ?? 'one-dark-pro',
      keepBackground: false,
      onVisitLine(node: { children: Array<{ type: string; value?: string }> }) {
        if (node.children.length === 0) node.children.push({ type: 'text', value: ' ' });
      },
      onVisitHighlightedLine(node: { properties: { className?: string[] } }) {
        node.properties.className = (node.properties.className || []).concat('line--highlight');
      },
      onVisitHighlightedChars(node: { properties: { className?: string[] } }) {
        node.properties.className = (node.properties.className || []).concat('word--highlight');
      },
    }]);
  }

  return {
    remarkPlugins: [remarkGfm, [remarkBaseUrl, { baseUrl: opts.baseUrl }], remarkCodeBlocks],
    rehypePlugins: [
      rehypeRaw,
      ...(opts.sanitize ? [rehypeSanitize] : []),
      rehypeHeadingAnchors,
      ...highlighting,
      [rehypeAutolinkHeadings, { behavior: 'wrap' }],
      ...(opts.baseUrl === undefined ? [rehypeBaseUrlLiteral(COMPACT_PLACEHOLDER)] : []),
    ],
  };
}
