import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { resolveSiteConfig } from '@/lib/config';
import { runPipeline } from '@/lib/pipeline';
import { PostIndex } from '@/lib/post-index';
import { buildSite } from '@/lib/site';
import { cleanupTempDir, createTempDir, createTestLogger, makePost, writeFiles } from './helpers';

const NETWORKING = `---
title: Private networking
toc: true
toc_sticky: true
excerpt: Talk over a **private** network.
---
## Enabling it

![Settings]({{site.baseurl}}/assets/settings.png)

## Limits
`;

const PREVIEWS = `---
title: Deploy previews
---
Every pull request gets an environment.
`;

describe('buildSite', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
    await writeFiles(tempDir, {
      'posts/2024-04-23-private-networking.md': NETWORKING,
      'posts/2024-11-12-deploy-previews.md': PREVIEWS,
      'posts/2024-05-01-unterminated.md': '---\ntitle: Oops\n',
      'posts/draft.md': 'not dated',
    });
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  async function build(overrides: Record<string, unknown> = {}) {
    const config = resolveSiteConfig({
      title: 'Test Site',
      baseUrl: '/blog',
      postsDir: 'posts',
      highlight: false,
      pageSize: 2,
      ...overrides,
    });
    const logger = createTestLogger();
    const { index, failures } = await runPipeline(config, logger, tempDir);
    const outDir = path.join(tempDir, 'out');
    const result = await buildSite(index, config, outDir, logger);
    return { index, failures, outDir, result, logger };
  }

  it('should publish every good post despite bad files', async () => {
    const { index, failures } = await build();

    expect(index.all().map((p) => p.slug)).toEqual(['deploy-previews', 'unterminated', 'private-networking']);
    expect(failures.map((f) => f.filename)).toEqual(['draft.md']);
  });

  it('should write posts at their permalinks and paginate the listing', async () => {
    const { outDir, result } = await build();
    const relative = result.files.map((f) => path.relative(outDir, f).split(path.sep).join('/')).sort();

    expect(relative).toEqual([
      '2024/04/23/private-networking/index.html',
      '2024/05/01/unterminated/index.html',
      '2024/11/12/deploy-previews/index.html',
      'index.html',
      'page/2/index.html',
    ]);
  });

  it('should render the post page with metadata, toc and base URL', async () => {
    const { outDir } = await build();
    const html = await fs.readFile(path.join(outDir, '2024/04/23/private-networking/index.html'), 'utf8');

    expect(html).toContain('<title>Private networking · Test Site</title>');
    expect(html).toContain('<nav class="toc toc--sticky" aria-label="Table of contents"><ul><li><a href="#enabling-it">Enabling it</a></li><li><a href="#limits">Limits</a></li></ul></nav>');
    expect(html).toContain('<img src="/blog/assets/settings.png" alt="Settings">');
    expect(html).toContain('<a rel="prev" href="/blog/2024/05/01/unterminated/">unterminated</a>');
  });

  it('should list the newest posts first with rendered excerpts', async () => {
    const { outDir } = await build();
    const html = await fs.readFile(path.join(outDir, 'index.html'), 'utf8');

    expect(html).toContain('<title>Test Site</title>');
    expect(html.indexOf('>Deploy previews</a>')).toBeLessThan(html.indexOf('>unterminated</a>'));
    expect(html).not.toContain('>Private networking</a>');
    expect(html).toContain('<a rel="next" href="/blog/page/2/">Older posts</a>');

    const second = await fs.readFile(path.join(outDir, 'page/2/index.html'), 'utf8');
    expect(second).toContain('<p class="post-excerpt">Talk over a <strong>private</strong> network.</p>');
    expect(second).toContain('<a rel="prev" href="/blog/">Newer posts</a>');
  });

  it('should write a shared permalink once and report the other post', async () => {
    const moved = makePost('x', '2024-03-01', { filename: '2024-01-01-x.md', title: 'Moved by its date' });
    const original = makePost('x', '2024-03-01', { title: 'Original' });
    const config = resolveSiteConfig({ title: 'Test Site', highlight: false });
    const logger = createTestLogger();
    const outDir = path.join(tempDir, 'collide');

    const result = await buildSite(new PostIndex([original, moved]), config, outDir, logger);

    expect(result.skipped).toEqual([{ filename: '2024-03-01-x.md', permalink: '/2024/03/01/x/', conflictsWith: '2024-01-01-x.md' }]);
    expect(result.files).toHaveLength(2);
    expect(logger.warn).toHaveBeenCalledWith('Skipping 2024-03-01-x.md: /2024/03/01/x/ is already taken by 2024-01-01-x.md');
    const html = await fs.readFile(path.join(outDir, '2024/03/01/x/index.html'), 'utf8');
    expect(html).toContain('<h1 class="post-title">Moved by its date</h1>');
  });
});
