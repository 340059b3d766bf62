/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { createSimulateCommand } from './commands/simulate.js';
import { createInspectCommand } from './commands/inspect.js';
import { createForgetCommand } from './commands/forget.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Per-user adaptive-learning container');

  program.addCommand(createSimulateCommand());
  program.addCommand(createInspectCommand());
  program.addCommand(createForgetCommand());

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`\n  Error: ${error.message}\n`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    }
    process.exitCode = 1;
  }
}
