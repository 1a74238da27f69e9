/**
 * `kernelgen machine-flags`: every compiler flag a machine needs.
 */

import { Command } from 'commander';
import { getFlags } from '../../catalog/arch.js';
import type { MachineCatalog } from '../../catalog/machine.js';
import { UnknownMachineError } from '../../core/errors.js';
import { loadContext, type GlobalOptions } from '../setup.js';

export function createMachineFlagsCommand(): Command {
  const cmd = new Command('machine-flags');

  cmd
    .alias('machine_flags')
    .description('Print the compiler flags of all architectures in a machine')
    .requiredOption('--machine <name>', 'Machine name')
    .requiredOption('--compiler <name>', 'Compiler identifier')
    .action((options: { machine: string; compiler: string }, command: Command) => {
      const ctx = loadContext(command.optsWithGlobals<GlobalOptions>());
      console.log(machineFlags(ctx.machines, options.machine, options.compiler));
    });

  return cmd;
}

export function machineFlags(machines: MachineCatalog, name: string, compiler: string): string {
  const machine = machines.get(name);
  if (!machine) {
    throw new UnknownMachineError(name);
  }
  const id = compiler.toLowerCase();
  return machine.archs.flatMap(arch => getFlags(arch, id)).join(' ');
}
