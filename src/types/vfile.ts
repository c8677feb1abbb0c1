import type { CodeBlock, Heading } from '@/types/post';

// Data the renderer's plugins attach to the processed file.
declare module 'vfile' {
  interface DataMap {
    headings: Heading[];
    codeBlocks: CodeBlock[];
  }
}
