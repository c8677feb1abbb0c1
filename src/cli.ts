/**
 * postpress CLI entry point
 */

import { Command } from 'commander';
import { buildCommand, listCommand, showCommand } from './commands';

const program = new Command();

program
  .name('postpress')
  .description('Build a static site from date-stamped Markdown posts')
  .version('0.1.0');

program.addCommand(buildCommand);
program.addCommand(listCommand);
program.addCommand(showCommand);

await program.parseAsync();
