import { describe, it, expect, vi, beforeEach } from 'vitest';
import { fileURLToPath } from 'url';
import { join } from 'path';

const logger = vi.hoisted(() => {
  const l = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(),
  };
  l.child.mockReturnValue(l);
  return l;
});

vi.mock('../../../src/core/logger.js', () => ({
  getLogger: () => logger,
}));

import { PipelineContext, resolveSourceDir } from '../../../src/core/context.js';
import { SourceFileError } from '../../../src/core/errors.js';
import { GeneratorConfigSchema } from '../../../src/core/types.js';
import { ARCHS_XML, MACHINES_XML, kernelHeader } from '../../helpers/catalogs.js';

const SOURCE_DIR = fileURLToPath(new URL('../../fixtures/source', import.meta.url));
const defaults = GeneratorConfigSchema.parse({});

describe('PipelineContext', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should load the catalogs of a source tree', () => {
    const ctx = PipelineContext.load(defaults, SOURCE_DIR, { withKernels: true });

    expect(ctx.archs.list().map(a => a.name)).toEqual(['generic', 'softfp', 'sse', 'avx']);
    expect(ctx.machines.list().map(m => m.name)).toEqual(['generic', 'sse', 'avx_softfp', 'avx']);
    expect(ctx.kernels.map(k => k.name)).toEqual(['volk_32f_x2_add_32f', 'volk_32fc_magnitude_32f']);
    expect(ctx.sourceDir).toBe(SOURCE_DIR);
    expect(Object.isFrozen(ctx)).toBe(true);
    expect(logger.child).toHaveBeenCalledWith({ run: ctx.id });
  });

  it('should skip kernels unless asked for', () => {
    expect(PipelineContext.load(defaults, SOURCE_DIR).kernels).toEqual([]);
  });

  it('should fail when a description file is missing', () => {
    const config = GeneratorConfigSchema.parse({ paths: { archs: 'gen/missing.xml' } });
    expect(() => PipelineContext.load(config, SOURCE_DIR)).toThrow(SourceFileError);
    expect(() => PipelineContext.load(config, SOURCE_DIR)).toThrow(
      `Cannot open file: ${join(SOURCE_DIR, 'gen/missing.xml')}`,
    );
  });

  it('should fail when the kernel directory is missing', () => {
    const config = GeneratorConfigSchema.parse({ paths: { kernels: 'kernels/typo' } });
    expect(() => PipelineContext.load(config, SOURCE_DIR, { withKernels: true })).toThrow(
      `Cannot open directory: ${join(SOURCE_DIR, 'kernels/typo')}`,
    );
    expect(PipelineContext.load(config, SOURCE_DIR).kernels).toEqual([]);
  });

  it('should build from in-memory sources with kernels in name order', () => {
    const ctx = PipelineContext.fromSources(defaults, {
      archs: ARCHS_XML,
      machines: MACHINES_XML,
      kernels: {
        volk_z: kernelHeader('volk_z', [['#ifdef LV_HAVE_GENERIC', 'generic']]),
        volk_y: kernelHeader('volk_y', [['#ifdef LV_HAVE_SSE', 'u_sse']]),
        volk_x: kernelHeader('volk_x', [['#ifdef LV_HAVE_GENERIC', 'generic']]),
      },
    });

    expect(ctx.kernels.map(k => k.name)).toEqual(['volk_x', 'volk_z']);
    expect(ctx.sourceDir).toBeNull();
  });

  it('should pass template settings to the engine', () => {
    const config = GeneratorConfigSchema.parse({ template: { banner: '// gen', maskPrefix: 'CPU_' } });
    const ctx = PipelineContext.fromSources(config, { archs: ARCHS_XML, machines: MACHINES_XML });
    const out = ctx.createEngine({ who: 'me' }).render('<% this_machine = machine_dict[args[0]] %><% make_arch_have_list = x %> ${who}', ['sse']);
    expect(out).toBe('\n// gen\n\n(1 << CPU_GENERIC) | (1 << CPU_SSE) me\n');
  });
});

describe('resolveSourceDir', () => {
  it('should resolve a configured directory against the working directory', () => {
    const config = GeneratorConfigSchema.parse({ paths: { sourceDir: 'tree' } });
    expect(resolveSourceDir(config, '/work')).toBe('/work/tree');
  });

  it('should search upwards for the architecture description', () => {
    expect(resolveSourceDir(defaults, join(SOURCE_DIR, 'kernels', 'volk'))).toBe(SOURCE_DIR);
  });
});
