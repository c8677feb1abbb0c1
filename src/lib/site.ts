import { mkdir, writeFile } from 'fs/promises';
import * as path from 'path';
import type { SiteConfig } from '@/lib/config';
import type { Logger } from '@/lib/logger';
import type { PostIndex } from '@/lib/post-index';
import { pagePath, renderListingPage, renderPostPage } from '@/lib/templates';

export interface SkippedPage {
  filename: string;
  permalink: string;
  /** The post already published at `permalink`. */
  conflictsWith: string;
}

export interface BuildSiteResult {
  outDir: string;
  files: string[];
  skipped: SkippedPage[];
}

async function writePage(outDir: string, route: string, html: string): Promise<string> {
  const target = path.join(outDir, ...route.split('/').filter(Boolean), 'index.html');
  await mkdir(path.dirname(target), { recursive: true });
  await writeFile(target, html, 'utf8');
  return target;
}

/**
 * Write one page per post at its permalink plus the paginated listing.
 */
export async function buildSite(index: PostIndex, site: SiteConfig, outDir: string, logger: Logger): Promise<BuildSiteResult> {
  const writes: Promise<string>[] = [];
  const claimed = new Map<string, string>();
  const skipped: SkippedPage[] = [];

  // A `date` override can move a post onto another post's permalink. The
  // first post in listing order keeps the page.
  for (const post of index.all()) {
    const owner = claimed.get(post.permalink);
    if (owner !== undefined) {
      logger.warn(`Skipping ${post.filename}: ${post.permalink} is already taken by ${owner}`);
      skipped.push({ filename: post.filename, permalink: post.permalink, conflictsWith: owner });
      continue;
    }
    claimed.set(post.permalink, post.filename);
    writes.push(writePage(outDir, post.permalink, renderPostPage(site, post, index.adjacent(post))));
  }
  for (let n = 1; n <= index.totalPages; n++) {
    writes.push(writePage(outDir, pagePath(n), renderListingPage(site, index.page(n))));
  }

  const files = await Promise.all(writes);
  logger.debug(`Wrote ${files.length} page(s) to ${outDir}`);
  return { outDir, files, skipped };
}
