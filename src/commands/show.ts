/**
 * postpress show <slug>
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage } from '@/lib/errors';
import { runPipeline } from '@/lib/pipeline';
import type { TocEntry } from '@/types/post';
import { setup, type CommonOptions } from './options';

function printToc(entries: TocEntry[], depth = 0): void {
  for (const entry of entries) {
    console.log(`  ${'  '.repeat(depth)}- ${entry.text} ${chalk.gray(`#${entry.anchorId}`)}`);
    printToc(entry.children, depth + 1);
  }
}

export const showCommand = new Command('show')
  .description('Show one post\'s metadata and table of contents')
  .argument('<slug>', 'Post slug')
  .option('-c, --config <path>', 'Path to site.config.json')
  .option('-v, --verbose', 'Show debug output')
  .action(async (slug: string, options: CommonOptions) => {
    try {
      const { config, logger, rootDir } = await setup(options, { highlight: false });
      const { index } = await runPipeline(config, logger, rootDir);

      const result = index.lookup(slug);
      if (!result.found) {
        console.log(chalk.red(`\n  ${result.error.message}\n`));
        process.exitCode = 1;
        return;
      }
      const { post } = result;

      console.log(chalk.bold(`\n  ${post.title}\n`));
      console.log(`  ${chalk.gray('Date:')}      ${post.publishDate}`);
      console.log(`  ${chalk.gray('Permalink:')} ${config.baseUrl}${post.permalink}`);
      if (post.authorName) console.log(`  ${chalk.gray('Author:')}    ${post.authorName}`);
      console.log(`  ${chalk.gray('Code:')}      ${post.rendered.codeBlocks.length} block(s)`);
      if (post.toc) {
        console.log(chalk.gray(`\n  Contents${post.tocSticky ? ' (sticky)' : ''}:`));
        printToc(post.toc);
      }
      console.log('');
    } catch (error) {
      console.log(chalk.red(`\n  ${errorMessage(error)}\n`));
      process.exitCode = 1;
    }
  });
