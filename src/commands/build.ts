/**
 * postpress build
 *
 * Render every post and write the static site.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import * as path from 'path';
import { errorMessage } from '@/lib/errors';
import { runPipeline } from '@/lib/pipeline';
import { buildSite } from '@/lib/site';
import { setup, type CommonOptions } from './options';

interface BuildOptions extends CommonOptions {
  out?: string;
  highlight: boolean;
}

export const buildCommand = new Command('build')
  .description('Render posts and write the static site')
  .option('-c, --config <path>', 'Path to site.config.json')
  .option('-o, --out <dir>', 'Output directory (overrides outDir)')
  .option('--base-url <path>', 'Base path substituted for {{site.baseurl}}')
  .option('--no-highlight', 'Skip syntax highlighting')
  .option('-v, --verbose', 'Show debug output')
  .action(async (options: BuildOptions) => {
    console.log(chalk.bold('\n  postpress build\n'));

    let context: Awaited<ReturnType<typeof setup>>;
    try {
      context = await setup(options, { outDir: options.out ? path.resolve(options.out) : undefined, highlight: options.highlight ? undefined : false });
    } catch (error) {
      console.log(chalk.red(`  ${errorMessage(error)}\n`));
      process.exitCode = 1;
      return;
    }
    const { config, logger, rootDir } = context;

    const spinner = ora('Rendering posts...').start();
    try {
      const { index, failures } = await runPipeline(config, logger, rootDir);
      spinner.text = 'Writing pages...';
      const outDir = path.resolve(rootDir, config.outDir);
      const { files, skipped } = await buildSite(index, config, outDir, logger);
      spinner.succeed(`Built ${index.size} post(s), ${files.length} page(s) in ${path.relative(process.cwd(), outDir) || '.'}`);

      if (failures.length > 0) {
        console.log(chalk.yellow(`\n  ${failures.length} file(s) skipped:`));
        for (const { filename, error } of failures) {
          console.log(chalk.gray(`    - ${filename}: ${error.message}`));
        }
      }
      if (skipped.length > 0) {
        console.log(chalk.yellow(`\n  ${skipped.length} post(s) not written, permalink already taken:`));
        for (const { filename, permalink, conflictsWith } of skipped) {
          console.log(chalk.gray(`    - ${filename}: ${permalink} (${conflictsWith})`));
        }
      }
      console.log('');
    } catch (error) {
      spinner.fail('Build failed');
      console.log(chalk.red(`\n  ${errorMessage(error)}\n`));
      process.exitCode = 1;
    }
  });
