/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { createReplayCommand } from './commands/replay.js';
import { createRecordsCommand } from './commands/records.js';
import { createInitCommand } from './commands/init.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Reconstruct traced calls as source annotated with their runtime values');

  program.addCommand(createReplayCommand());
  program.addCommand(createRecordsCommand());
  program.addCommand(createInitCommand());

  return program;
}

export async function main(): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`\n${error.message}\n`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    }
    process.exit(1);
  }
}
