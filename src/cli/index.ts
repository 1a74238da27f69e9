/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { createArchFlagsCommand } from './commands/arch-flags.js';
import { createMachinesCommand } from './commands/machines.js';
import { createMachineFlagsCommand } from './commands/machine-flags.js';
import { createRenderCommand } from './commands/render.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Generate architecture-dispatching kernel glue from templates')
    .option('-v, --verbose', 'Enable verbose diagnostics on stderr')
    .option('--source-dir <dir>', 'Source tree holding gen/ and kernels/ (default: search upwards)')
    .option('--config <file>', 'Config file (default: .kernelgen.yaml in the working directory)');

  program.addCommand(createArchFlagsCommand());
  program.addCommand(createMachinesCommand());
  program.addCommand(createMachineFlagsCommand());
  program.addCommand(createRenderCommand());

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    } else {
      console.error(`Error: ${String(error)}`);
    }
    process.exitCode = 1;
  }
}
