import type { Plugin } from 'unified';
import type { Element, Root } from 'hast';
import { visit } from 'unist-util-visit';
import { createAnchorGenerator } from '@/lib/toc';
import type { Heading } from '@/types/post';

// Rehype plugin: give every h1-h6 an anchor id and list the headings, in
// document order, on `file.data.headings`.

const HEADING_TAG = /^h([1-6])$/;

function textContent(node: Element): string {
  let text = '';
  visit(node, 'text', (child) => {
    text += child.value;
  });
  return text.replace(/\s+/g, ' ').trim();
}

const rehypeHeadingAnchors: Plugin<[], Root> = () => (tree, file) => {
  const nextAnchor = createAnchorGenerator();
  const headings: Heading[] = [];

  visit(tree, 'element', (node) => {
    const m = HEADING_TAG.exec(node.tagName);
    if (!m) return;
    const text = textContent(node);
    const anchorId = nextAnchor(text);
    node.properties.id = anchorId;
    headings.push({ level: Number(m[1]), text, anchorId });
  });

  file.data.headings = headings;
};

export default rehypeHeadingAnchors;
