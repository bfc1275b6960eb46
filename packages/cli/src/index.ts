/**
 * tokenscan CLI - token dumps for DSL sources
 */

import { Command } from 'commander';
import { EXIT_FAILURE, scanCommand } from './commands/scan.js';

const program = new Command();

program
  .name('tokenscan')
  .description('Scan DSL source text and print its tokens')
  .version('0.1.0')
  .exitOverride((error) => {
    process.exit(error.exitCode === 0 ? 0 : EXIT_FAILURE);
  });

program.addCommand(scanCommand);

await program.parseAsync();
