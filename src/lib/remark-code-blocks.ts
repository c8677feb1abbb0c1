import type { Plugin } from 'unified';
import type { Root } from 'mdast';
import { visit } from 'unist-util-visit';
import type { CodeBlock } from '@/types/post';

// Remark plugin: record every fenced code block with its language hint.
// The content is copied as-is; nothing is executed or checked against the hint.

const remarkCodeBlocks: Plugin<[], Root> = () => (tree, file) => {
  const blocks: CodeBlock[] = [];
  visit(tree, 'code', (node) => {
    blocks.push({
      languageHint: node.lang ?? undefined,
      meta: node.meta ?? undefined,
      content: node.value,
    });
  });
  file.data.codeBlocks = blocks;
};

export default remarkCodeBlocks;
