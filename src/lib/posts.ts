import { readdir, readFile } from 'fs/promises';
import * as path from 'path';
import { errorMessage, MalformedFrontMatterError } from '@/lib/errors';
import { formatPublishDate, permalinkFor, resolveFilename } from '@/lib/filename';
import { parseFrontMatter, type ParsedDocument } from '@/lib/front-matter';
import type { Logger } from '@/lib/logger';
import { readPostMeta } from '@/lib/post-meta';
import type { Renderer } from '@/lib/renderer';
import { buildToc } from '@/lib/toc';
import type { Post } from '@/types/post';

export interface LoadContext {
  renderer: Renderer;
  logger: Logger;
}

export type LoadFailure = { filename: string; error: Error };

export interface LoadResult {
  posts: Post[];
  failures: LoadFailure[];
}

export async function loadPost(postsDir: string, filename: string, { renderer, logger }: LoadContext): Promise<Post> {
  const { date, slug } = resolveFilename(filename);
  const raw = await readFile(path.join(postsDir, filename), 'utf8');

  let doc: ParsedDocument;
  try {
    doc = parseFrontMatter(raw);
  } catch (error) {
    if (!(error instanceof MalformedFrontMatterError)) throw error;
    logger.warn(`${filename}: ${error.message}; treating the whole file as body`);
    doc = { data: {}, body: raw };
  }

  const { meta, titleMissing } = readPostMeta(doc.data, slug);
  if (titleMissing) logger.warn(`${filename}: no title in front matter, using "${slug}"`);

  const rendered = await renderer.render(doc.body);
  const publishDate = meta.date ?? formatPublishDate(date);

  return Object.freeze({
    slug,
    filename,
    publishDate,
    permalink: permalinkFor(publishDate, slug),
    title: meta.title,
    authorName: meta.authorName,
    tocEnabled: meta.tocEnabled,
    tocSticky: meta.tocSticky,
    excerpt: meta.excerpt,
    extra: meta.extra,
    body: doc.body,
    rendered,
    toc: meta.tocEnabled ? buildToc(rendered.headings) : undefined,
  });
}

/**
 * Load every `.md` file in `postsDir`. Posts are parsed and rendered
 * concurrently; a failing post is logged and reported in `failures` while the
 * rest still load. An unreadable directory rejects.
 */
export async function loadPosts(postsDir: string, context: LoadContext): Promise<LoadResult> {
  const files = (await readdir(postsDir)).filter(f => f.endsWith('.md')).sort();
  context.logger.debug(`Found ${files.length} post file(s) in ${postsDir}`);

  const settled = await Promise.all(
    files.map(filename =>
      loadPost(postsDir, filename, context).then(
        (post): { post: Post } => ({ post }),
        (error: unknown): { failure: LoadFailure } => {
          const err = error instanceof Error ? error : new Error(errorMessage(error));
          context.logger.warn(`Skipping ${filename}: ${err.message}`);
          return { failure: { filename, error: err } };
        }
      )
    )
  );

  const posts: Post[] = [];
  const failures: LoadFailure[] = [];
  for (const outcome of settled) {
    if ('post' in outcome) posts.push(outcome.post);
    else failures.push(outcome.failure);
  }
  return { posts, failures };
}
