/**
 * `kernelgen render`: renders a template against the full catalog.
 * Positional arguments are exposed to the template as `args[N]`.
 */

import { Command } from 'commander';
import type { PipelineContext } from '../../core/context.js';
import { readSourceFile, writeOutputFile } from '../../utils/fs.js';
import { loadContext, type GlobalOptions } from '../setup.js';

interface RenderOptions {
  input: string;
  output?: string;
}

export function createRenderCommand(): Command {
  const cmd = new Command('render');

  cmd
    .description('Render a template file')
    .requiredOption('-i, --input <file>', 'Template file')
    .option('-o, --output <file>', 'Output file (default: stdout)')
    .argument('[args...]', 'Positional template arguments, e.g. a machine name')
    .action((args: string[], options: RenderOptions, command: Command) => {
      const ctx = loadContext(command.optsWithGlobals<GlobalOptions>(), { withKernels: true });
      const result = renderTemplateFile(ctx, options.input, args);

      if (options.output) {
        writeOutputFile(options.output, result);
        ctx.logger.debug({ input: options.input, output: options.output }, 'Rendered template');
      } else {
        process.stdout.write(result);
      }
    });

  return cmd;
}

export function renderTemplateFile(ctx: PipelineContext, templatePath: string, args: readonly string[] = []): string {
  return ctx.createEngine().render(readSourceFile(templatePath), args);
}
