/**
 * Site configuration
 *
 * Read from `site.config.json` and passed explicitly to every stage of the
 * pipeline. Nothing here is module-level state.
 */

import { readFile } from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError, errorMessage } from '@/lib/errors';
import { defaultRoutes } from '@/lib/routes';

export const CONFIG_FILENAME = 'site.config.json';

function trimTrailingSlash(value: string): string {
  return value.replace(/\/+$/, '');
}

const routeSchema = z.object({
  label: z.string().min(1),
  href: z.string().min(1),
});

export const siteConfigSchema = z.object({
  title: z.string().min(1).default('Blog'),
  description: z.string().default(''),
  siteUrl: z.string().url().transform(trimTrailingSlash).optional(),
  baseUrl: z.string().default('').transform(trimTrailingSlash),
  postsDir: z.string().min(1).default('content/posts'),
  outDir: z.string().min(1).default('public'),
  pageSize: z.number().int().positive().default(10),
  highlight: z.boolean().default(true),
  sanitize: z.boolean().default(false),
  theme: z.string().min(1).default('one-dark-pro'),
  nav: z.array(routeSchema).default(defaultRoutes),
});

export type SiteConfig = z.infer<typeof siteConfigSchema>;
export type SiteConfigInput = z.input<typeof siteConfigSchema>;

/**
 * Validate raw config values, filling in defaults
 */
export function resolveSiteConfig(input: unknown): SiteConfig {
  const result = siteConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      'Invalid site configuration',
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Load the config file. A missing file yields the defaults; `overrides`
 * (usually CLI flags) win over file values.
 */
export async function loadSiteConfig(
  configPath: string = path.join(process.cwd(), CONFIG_FILENAME),
  overrides: Partial<SiteConfigInput> = {}
): Promise<SiteConfig> {
  let fileValues: object = {};

  let content: string | null = null;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      throw new ConfigError(`Could not read ${configPath}: ${errorMessage(error)}`);
    }
  }

  if (content !== null) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new ConfigError(`Invalid JSON in ${configPath}: ${errorMessage(error)}`);
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new ConfigError(`${configPath} must contain a JSON object`);
    }
    fileValues = parsed;
  }

  const defined = Object.fromEntries(Object.entries(overrides).filter(([, v]) => v !== undefined));
  return resolveSiteConfig({ ...fileValues, ...defined });
}
