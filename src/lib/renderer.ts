import { unified } from 'unified';
import remarkParse from 'remark-parse';
import remarkRehype from 'remark-rehype';
import rehypeStringify from 'rehype-stringify';
import { VFile } from 'vfile';
import { getMarkdownOptions, type MarkdownOptions } from '@/lib/markdown';
import { normalizeBaseUrlPlaceholders } from '@/lib/remark-base-url';
import type { RenderedBody } from '@/types/post';

export type RendererOptions = MarkdownOptions;

export interface Renderer {
  render(markdown: string): Promise<RenderedBody>;
}

/**
 * Markdown to HTML. The output depends only on the input text and `options`,
 * so one renderer can be shared by every post in a run.
 */
export async function createRenderer(options: RendererOptions = {}): Promise<Renderer> {
  const { remarkPlugins, rehypePlugins } = await getMarkdownOptions(options);
  const processor = unified()
    .use(remarkParse)
    .use(remarkPlugins)
    .use(remarkRehype, { allowDangerousHtml: true })
    .use(rehypePlugins)
    .use(rehypeStringify)
    .freeze();

  return {
    async render(markdown) {
      const file = await processor.process(new VFile({ value: normalizeBaseUrlPlaceholders(markdown) }));
      return {
        html: String(file),
        headings: file.data.headings ?? [],
        codeBlocks: file.data.codeBlocks ?? [],
      };
    },
  };
}
