import * as path from 'path';
import type { SiteConfig } from '@/lib/config';
import { createScopedLogger, type Logger } from '@/lib/logger';
import { PostIndex } from '@/lib/post-index';
import { loadPosts, type LoadFailure } from '@/lib/posts';
import { createRenderer } from '@/lib/renderer';

export interface PipelineResult {
  index: PostIndex;
  failures: LoadFailure[];
}

/**
 * Discover, parse and render every post under `config.postsDir` (relative to
 * `cwd`) and index the ones that loaded.
 */
export async function runPipeline(config: SiteConfig, logger: Logger, cwd: string = process.cwd()): Promise<PipelineResult> {
  const renderer = await createRenderer({
    baseUrl: config.baseUrl,
    sanitize: config.sanitize,
    highlight: config.highlight,
    theme: config.theme,
  });
  const { posts, failures } = await loadPosts(path.resolve(cwd, config.postsDir), {
    renderer,
    logger: createScopedLogger(logger, 'posts'),
  });
  return { index: new PostIndex(posts, { pageSize: config.pageSize }), failures };
}
