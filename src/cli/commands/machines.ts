/**
 * `kernelgen machines`: machines buildable from a set of available
 * architectures, `;`-separated.
 */

import { Command } from 'commander';
import type { MachineCatalog } from '../../catalog/machine.js';
import { loadContext, type GlobalOptions } from '../setup.js';

export function createMachinesCommand(): Command {
  const cmd = new Command('machines');

  cmd
    .description('List machines whose architectures are all available')
    .requiredOption('--archs <list>', 'Available architectures, separated by ";"')
    .action((options: { archs: string }, command: Command) => {
      const ctx = loadContext(command.optsWithGlobals<GlobalOptions>());
      console.log(listMachines(ctx.machines, options.archs.split(';')));
    });

  return cmd;
}

export function listMachines(machines: MachineCatalog, available: Iterable<string>): string {
  return machines
    .satisfiedBy(new Set(available))
    .map(m => m.name)
    .join(';');
}
