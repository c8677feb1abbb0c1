/**
 * postpress list
 *
 * Print the post index, newest first.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage } from '@/lib/errors';
import { runPipeline } from '@/lib/pipeline';
import { setup, type CommonOptions } from './options';

export const listCommand = new Command('list')
  .description('List posts in publish order')
  .option('-c, --config <path>', 'Path to site.config.json')
  .option('-v, --verbose', 'Show debug output')
  .action(async (options: CommonOptions) => {
    try {
      const { config, logger, rootDir } = await setup(options, { highlight: false });
      const { index, failures } = await runPipeline(config, logger, rootDir);

      if (index.size === 0) {
        console.log(chalk.yellow('\n  No posts found.\n'));
      } else {
        console.log('');
        for (const post of index.all()) {
          console.log(`  ${chalk.gray(post.publishDate)}  ${chalk.cyan(post.slug)}  ${post.title}`);
        }
        console.log('');
      }
      if (failures.length > 0) {
        console.log(chalk.yellow(`  ${failures.length} file(s) skipped\n`));
      }
    } catch (error) {
      console.log(chalk.red(`\n  ${errorMessage(error)}\n`));
      process.exitCode = 1;
    }
  });
