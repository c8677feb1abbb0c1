export type RouteItem = { label: string; href: string };

// Default site navigation; `nav` in site.config.json replaces it.
export const defaultRoutes: RouteItem[] = [
  { label: 'Home', href: '/' },
];

/** Prefix a site-relative href with the base path. External links pass through. */
export function withBaseUrl(baseUrl: string, href: string): string {
  if (!href.startsWith('/')) return href;
  return `${baseUrl}${href}`;
}
