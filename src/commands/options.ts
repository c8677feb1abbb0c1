import * as path from 'path';
import { CONFIG_FILENAME, loadSiteConfig, type SiteConfig, type SiteConfigInput } from '@/lib/config';
import { createConsoleLogger, type Logger } from '@/lib/logger';

export interface CommonOptions {
  config?: string;
  baseUrl?: string;
  verbose?: boolean;
}

export async function setup(options: CommonOptions, overrides: Partial<SiteConfigInput> = {}): Promise<{ config: SiteConfig; logger: Logger; rootDir: string }> {
  const logger = createConsoleLogger({ verbose: options.verbose });
  const configPath = path.resolve(options.config ?? CONFIG_FILENAME);
  const config = await loadSiteConfig(configPath, { ...overrides, baseUrl: options.baseUrl });
  logger.debug(`Loaded config from ${configPath}`, config);
  // postsDir and outDir are relative to the config file
  return { config, logger, rootDir: path.dirname(configPath) };
}
