/**
 * `kernelgen arch-flags`: architectures usable with a compiler, with that
 * compiler's flags: `name,flag,flag;name,flag;...`
 */

import { Command } from 'commander';
import { getFlags, type ArchitectureCatalog } from '../../catalog/arch.js';
import { loadContext, type GlobalOptions } from '../setup.js';

export function createArchFlagsCommand(): Command {
  const cmd = new Command('arch-flags');

  cmd
    .alias('arch_flags')
    .description('List supported architectures with their flags for a compiler')
    .requiredOption('--compiler <name>', 'Compiler identifier (e.g. gnu, clang, msvc)')
    .action((options: { compiler: string }, command: Command) => {
      const ctx = loadContext(command.optsWithGlobals<GlobalOptions>());
      console.log(archFlags(ctx.archs, options.compiler));
    });

  return cmd;
}

export function archFlags(archs: ArchitectureCatalog, compiler: string): string {
  const id = compiler.toLowerCase();
  return archs
    .supportedBy(id)
    .map(arch => [arch.name, ...getFlags(arch, id)].join(','))
    .join(';');
}
