import { ConfigManager } from '../core/config.js';
import { PipelineContext, resolveSourceDir, type LoadOptions } from '../core/context.js';
import { createLogger, setLogger } from '../core/logger.js';
import { NAME } from '../version.js';

export type GlobalOptions = {
  sourceDir?: string;
  config?: string;
  verbose?: boolean;
};

/**
 * Load config, install the logger, and build the catalogs for one command.
 */
export function loadContext(globals: GlobalOptions, options: LoadOptions = {}): PipelineContext {
  const manager = new ConfigManager();
  const config = manager.load(
    globals.sourceDir ? { paths: { sourceDir: globals.sourceDir } } : undefined,
    globals.config,
  );

  const verbose = globals.verbose ?? false;
  setLogger(createLogger(NAME, verbose, verbose ? 'debug' : config.logLevel));

  return PipelineContext.load(config, resolveSourceDir(config, manager.getProjectDir()), options);
}
