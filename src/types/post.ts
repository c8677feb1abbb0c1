export type FrontMatterData = Record<string, unknown>;

export type PostMeta = {
  title: string;
  authorName?: string;
  tocEnabled: boolean;
  tocSticky: boolean;
  excerpt?: string;
  date?: string; // YYYY-MM-DD override from front matter
  extra: FrontMatterData; // keys the pipeline does not interpret
};

export type Heading = {
  level: number; // 1-6
  text: string;
  anchorId: string;
};

export type TocEntry = Heading & { children: TocEntry[] };

export type CodeBlock = {
  languageHint?: string;
  meta?: string;
  content: string; // verbatim, never executed
};

export type RenderedBody = {
  html: string;
  headings: Heading[];
  codeBlocks: CodeBlock[];
};

export type Post = {
  slug: string;
  filename: string;
  publishDate: string; // YYYY-MM-DD
  permalink: string;
  title: string;
  authorName?: string;
  tocEnabled: boolean;
  tocSticky: boolean;
  excerpt?: string;
  extra: FrontMatterData;
  body: string; // original markdown
  rendered: RenderedBody;
  toc?: TocEntry[];
};
