import type { SiteConfig } from '@/lib/config';

interface BaseMeta {
  title?: string;
  description?: string;
  path?: string;
}

export interface PageMeta {
  title: string;
  description: string;
  canonical?: string;
  openGraph: { title: string; description: string; siteName: string; type: 'website' | 'article' };
}

export function buildMeta(site: SiteConfig, { title, description, path }: BaseMeta = {}, type: 'website' | 'article' = 'website'): PageMeta {
  const siteName = site.title;
  const fullTitle = title ? `${title} · ${siteName}` : siteName;
  const desc = description || site.description;
  return {
    title: fullTitle,
    description: desc,
    canonical: site.siteUrl && path !== undefined ? `${site.siteUrl}${site.baseUrl}${path}` : undefined,
    openGraph: {
      title: fullTitle,
      description: desc,
      siteName,
      type,
    },
  };
}
