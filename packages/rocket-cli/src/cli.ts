#!/usr/bin/env node
/**
 * Rocket CLI
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { formatError, isRocketError, setLogLevel } from 'rocket-core';
import { build } from './build.js';

interface CliOptions {
  output?: string;
  docVersion?: string;
  maxDepth?: string;
  metadata?: string;
  verbose?: boolean;
}

const program = new Command();

program
  .name('rocket')
  .description('Compile Rocket markup documents to HTML')
  .version('0.1.0')
  .argument('<input>', 'Input document')
  .option('-o, --output <file>', 'Output file (default: stdout)')
  .option('--doc-version <version>', 'Version reported by (:version)')
  .option('--max-depth <n>', 'Maximum nesting of invocations and includes')
  .option('--metadata <file>', 'Write document metadata as JSON')
  .option('-v, --verbose', 'Log progress to stderr')
  .action((input: string, options: CliOptions) => {
    if (options.verbose) {
      setLogLevel(process.env.ROCKET_DEBUG === 'true' ? 'debug' : 'info');
    }

    try {
      build(input, options);
    } catch (error) {
      if (isRocketError(error)) {
        console.error(chalk.red(formatError(error)));
      } else if (error instanceof Error) {
        console.error(chalk.red(`Error: ${error.message}`));
        if (process.env.ROCKET_DEBUG) {
          console.error(error.stack);
        }
      } else {
        console.error(chalk.red(`Error: ${String(error)}`));
      }
      process.exit(1);
    }
  });

program.parse();
