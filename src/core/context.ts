import { resolve } from 'path';
import { nanoid } from 'nanoid';
import type pino from 'pino';
import { ArchitectureCatalog } from '../catalog/arch.js';
import { MachineCatalog } from '../catalog/machine.js';
import { extractKernel, loadKernels, type ExtractOptions } from '../kernels/extractor.js';
import type { Kernel } from '../kernels/types.js';
import { TemplateEngine, type TemplateOptions } from '../template/engine.js';
import type { TemplateCatalogs } from '../template/statements.js';
import { findUpwards, readSourceFile } from '../utils/fs.js';
import { getLogger } from './logger.js';
import type { GeneratorConfig } from './types.js';

export interface LoadOptions {
  /** Kernel headers are only needed for rendering. */
  withKernels?: boolean;
}

export interface InlineSources {
  archs: string;
  machines: string;
  /** kernel name -> header text */
  kernels?: Record<string, string>;
}

/**
 * Everything one generator run reads: the catalogs, built once and frozen,
 * plus the configuration they were built with.
 */
export class PipelineContext implements TemplateCatalogs {
  public readonly id: string;
  public readonly logger: pino.Logger;

  private constructor(
    public readonly config: GeneratorConfig,
    public readonly archs: ArchitectureCatalog,
    public readonly machines: MachineCatalog,
    public readonly kernels: readonly Kernel[],
    public readonly sourceDir: string | null,
  ) {
    this.id = nanoid(12);
    this.logger = getLogger().child({ run: this.id });
    Object.freeze(this);
  }

  static load(config: GeneratorConfig, sourceDir: string, options: LoadOptions = {}): PipelineContext {
    const archs = ArchitectureCatalog.parse(readSourceFile(resolve(sourceDir, config.paths.archs)));
    const machines = MachineCatalog.parse(readSourceFile(resolve(sourceDir, config.paths.machines)), archs);
    const kernels = options.withKernels
      ? loadKernels(resolve(sourceDir, config.paths.kernels), extractOptions(config))
      : [];

    const ctx = new PipelineContext(config, archs, machines, Object.freeze(kernels), sourceDir);
    ctx.logger.debug(
      { sourceDir, archs: archs.size, machines: machines.size, kernels: kernels.length },
      'Catalogs loaded',
    );
    return ctx;
  }

  /** Build from in-memory sources, e.g. for embedding or tests. */
  static fromSources(config: GeneratorConfig, sources: InlineSources): PipelineContext {
    const archs = ArchitectureCatalog.parse(sources.archs);
    const machines = MachineCatalog.parse(sources.machines, archs);
    const kernels: Kernel[] = [];
    for (const [name, text] of Object.entries(sources.kernels ?? {}).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      const kernel = extractKernel(name, text, extractOptions(config));
      if (kernel) kernels.push(kernel);
    }
    return new PipelineContext(config, archs, machines, Object.freeze(kernels), null);
  }

  createEngine(symbols?: Record<string, string>): TemplateEngine {
    const options: TemplateOptions = {
      banner: this.config.template.banner,
      maskPrefix: this.config.template.maskPrefix,
      maxRenderDepth: this.config.template.maxRenderDepth,
      deprecatedKernels: this.config.template.deprecatedKernels,
      symbols,
    };
    return new TemplateEngine(this, options);
  }
}

export function extractOptions(config: GeneratorConfig): ExtractOptions {
  return {
    prefix: config.kernels.prefix,
    pnamePrefix: config.kernels.pnamePrefix,
    guardPrefix: config.kernels.guardPrefix,
    maxSectionDepth: config.kernels.maxSectionDepth,
    signatureCheck: config.kernels.signatureCheck,
  };
}

/**
 * Source directory: configured value, else the nearest ancestor of `cwd`
 * holding the architecture description, else `cwd`.
 */
export function resolveSourceDir(config: GeneratorConfig, cwd: string = process.cwd()): string {
  if (config.paths.sourceDir) return resolve(cwd, config.paths.sourceDir);
  return findUpwards(cwd, config.paths.archs) ?? resolve(cwd);
}
