import { marked } from 'marked';
import type { SiteConfig } from '@/lib/config';
import { escapeHtml } from '@/lib/html';
import type { PostPage } from '@/lib/post-index';
import { withBaseUrl } from '@/lib/routes';
import { buildMeta, type PageMeta } from '@/lib/seo';
import { renderToc } from '@/lib/toc';
import type { Post } from '@/types/post';

export function pagePath(page: number): string {
  return page === 1 ? '/' : `/page/${page}/`;
}

export function renderExcerpt(excerpt: string): string {
  return marked.parseInline(excerpt, { async: false }) as string;
}

function renderNav(site: SiteConfig): string {
  const links = site.nav.map((r) => `<a href="${escapeHtml(withBaseUrl(site.baseUrl, r.href))}">${escapeHtml(r.label)}</a>`);
  return `<header class="site-header"><a class="site-title" href="${escapeHtml(withBaseUrl(site.baseUrl, '/'))}">${escapeHtml(site.title)}</a><nav>${links.join('')}</nav></header>`;
}

function renderHead(meta: PageMeta): string {
  const tags = [
    '<meta charset="utf-8">',
    '<meta name="viewport" content="width=device-width, initial-scale=1">',
    `<title>${escapeHtml(meta.title)}</title>`,
    meta.description ? `<meta name="description" content="${escapeHtml(meta.description)}">` : '',
    meta.canonical ? `<link rel="canonical" href="${escapeHtml(meta.canonical)}">` : '',
    `<meta property="og:title" content="${escapeHtml(meta.openGraph.title)}">`,
    `<meta property="og:site_name" content="${escapeHtml(meta.openGraph.siteName)}">`,
    `<meta property="og:type" content="${meta.openGraph.type}">`,
  ];
  return `<head>${tags.filter(Boolean).join('')}</head>`;
}

export function renderLayout(site: SiteConfig, meta: PageMeta, main: string): string {
  return `<!doctype html>\n<html lang="en">${renderHead(meta)}<body>${renderNav(site)}<main>${main}</main></body></html>\n`;
}

function renderByline(post: Post): string {
  const author = post.authorName ? ` · ${escapeHtml(post.authorName)}` : '';
  return `<p class="post-meta"><time datetime="${post.publishDate}">${post.publishDate}</time>${author}</p>`;
}

export function renderPostPage(site: SiteConfig, post: Post, neighbours: { newer?: Post; older?: Post } = {}): string {
  const meta = buildMeta(site, { title: post.title, description: post.excerpt, path: post.permalink }, 'article');
  const toc = post.toc ? renderToc(post.toc, { sticky: post.tocSticky }) : '';
  const pager = [
    neighbours.newer ? `<a rel="prev" href="${escapeHtml(withBaseUrl(site.baseUrl, neighbours.newer.permalink))}">${escapeHtml(neighbours.newer.title)}</a>` : '',
    neighbours.older ? `<a rel="next" href="${escapeHtml(withBaseUrl(site.baseUrl, neighbours.older.permalink))}">${escapeHtml(neighbours.older.title)}</a>` : '',
  ].join('');
  const main = [
    '<article class="post">',
    `<h1 class="post-title">${escapeHtml(post.title)}</h1>`,
    renderByline(post),
    toc,
    `<div class="post-body">${post.rendered.html}</div>`,
    '</article>',
    pager ? `<nav class="post-pager">${pager}</nav>` : '',
  ].join('');
  return renderLayout(site, meta, main);
}

export function renderListingPage(site: SiteConfig, page: PostPage): string {
  const meta = buildMeta(site, { title: page.page > 1 ? `Page ${page.page}` : undefined, path: pagePath(page.page) });
  const items = page.posts.map((post) => {
    const href = escapeHtml(withBaseUrl(site.baseUrl, post.permalink));
    const excerpt = post.excerpt ? `<p class="post-excerpt">${renderExcerpt(post.excerpt)}</p>` : '';
    return `<li><h2><a href="${href}">${escapeHtml(post.title)}</a></h2>${renderByline(post)}${excerpt}</li>`;
  });
  const pager = [
    page.previous ? `<a rel="prev" href="${escapeHtml(withBaseUrl(site.baseUrl, pagePath(page.previous)))}">Newer posts</a>` : '',
    page.next ? `<a rel="next" href="${escapeHtml(withBaseUrl(site.baseUrl, pagePath(page.next)))}">Older posts</a>` : '',
  ].join('');
  const main = `<ul class="post-list">${items.join('')}</ul>${pager ? `<nav class="pager">${pager}</nav>` : ''}`;
  return renderLayout(site, meta, main);
}
