/**
 * kernelgen: dispatch/glue generator for architecture-specialized kernels
 * Public API for programmatic usage
 *
 * @example
 * ```typescript
 * import { ConfigManager, PipelineContext, resolveSourceDir } from 'kernelgen';
 *
 * const config = new ConfigManager().load();
 * const ctx = PipelineContext.load(config, resolveSourceDir(config), { withKernels: true });
 * const source = ctx.createEngine().render(template, ['generic_orc']);
 * ```
 */

// Core
export { PipelineContext, resolveSourceDir, extractOptions, type LoadOptions, type InlineSources } from './core/context.js';
export { ConfigManager, PROJECT_CONFIG_FILE } from './core/config.js';
export { GeneratorConfigSchema, type GeneratorConfig, type GeneratorConfigInput } from './core/types.js';
export { createLogger, getLogger, setLogger, type LogLevel } from './core/logger.js';
export {
  GeneratorError,
  ConfigError,
  SourceFileError,
  UnknownMachineError,
  KernelSignatureError,
} from './core/errors.js';

// Catalogs
export { ArchitectureCatalog, parseArchitectures, isSupported, getFlags } from './catalog/arch.js';
export { MachineCatalog, expandMachine, parseMachineDefinitions, type MachineDefinition } from './catalog/machine.js';
export { parseElements, stripComments, type Element } from './catalog/elements.js';
export type { Architecture, ArchCheck, Machine } from './catalog/types.js';

// Kernels
export { extractKernel, loadKernels, type ExtractOptions } from './kernels/extractor.js';
export { removeComments } from './kernels/comments.js';
export { parseSections, flattenSections, type Section, type GuardedSection, type TextSection } from './kernels/sections.js';
export { parseSignature, splitParameter } from './kernels/signature.js';
export { getImpls, GENERIC_IMPL, DISPATCHER_IMPL, type Kernel, type Impl, type KernelArg } from './kernels/types.js';

// Templates
export { TemplateEngine, DEFAULT_BANNER, type TemplateOptions } from './template/engine.js';
export { parseStatement, executeStatement, type Statement, type TemplateCatalogs } from './template/statements.js';
export { evaluateCondition, type ConditionEnv } from './template/conditions.js';
export type { RenderScope, Binding } from './template/scope.js';

// Commands
export { archFlags } from './cli/commands/arch-flags.js';
export { listMachines } from './cli/commands/machines.js';
export { machineFlags } from './cli/commands/machine-flags.js';
export { renderTemplateFile } from './cli/commands/render.js';

export { VERSION, NAME } from './version.js';
