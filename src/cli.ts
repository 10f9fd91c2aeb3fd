#!/usr/bin/env node

/**
 * comment-ratio CLI
 * Comment-to-code line ratio for a file or a directory tree
 */

import { Command } from 'commander';
import { registerRatioCommand } from './cli/register-ratio.js';
import { failCommand } from './core/index.js';

const program = new Command();

program
  .name('comment-ratio')
  .description('Calculates the ratio of comments to code lines in a project or file.')
  .version('1.0.0');

registerRatioCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  failCommand('Unexpected failure', error);
});
