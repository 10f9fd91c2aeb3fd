import type { Command } from 'commander';
import { withCliErrorHandling } from '../core/index.js';
import { runRatioCommand } from '../commands/ratio.js';

export function registerRatioCommand(program: Command): void {
  program
    .argument('<path>', 'Path to the file or directory to analyze')
    .option(
      '-e, --exclude <extensions>',
      'Comma-separated list of file extensions to exclude (e.g., .txt,.log)',
    )
    .option('-v, --verbose', 'Enable verbose output (debug logging)')
    .option('--json', 'Output as JSON')
    .option('-c, --config <file>', 'Path to a config file')
    .action(withCliErrorHandling('ratio', runRatioCommand));
}
