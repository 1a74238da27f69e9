import { describe, it, expect, beforeAll } from 'vitest';
import { fileURLToPath } from 'url';
import { PipelineContext } from '../../src/core/context.js';
import { GeneratorConfigSchema } from '../../src/core/types.js';
import { DEFAULT_BANNER } from '../../src/template/engine.js';
import { renderTemplateFile } from '../../src/cli/commands/render.js';

const SOURCE_DIR = fileURLToPath(new URL('../fixtures/source', import.meta.url));
const templatePath = (name: string): string => fileURLToPath(new URL(`../fixtures/templates/${name}`, import.meta.url));

const BANNER = `\n${DEFAULT_BANNER}\n\n`;

function lines(...text: string[]): string {
  return text.map(t => t + '\n').join('');
}

describe('rendering against a source tree', () => {
  let ctx: PipelineContext;

  beforeAll(() => {
    ctx = PipelineContext.load(GeneratorConfigSchema.parse({}), SOURCE_DIR, { withKernels: true });
  });

  it('should render function pointer typedefs for every kernel', () => {
    expect(renderTemplateFile(ctx, templatePath('typedefs.tmpl'))).toBe(BANNER + lines(
      '#ifndef INCLUDED_VOLK_TYPEDEFS',
      '#define INCLUDED_VOLK_TYPEDEFS',
      '',
      'typedef void (*p_32f_x2_add_32f)(float* cVector, const float* aVector, const float* bVector, unsigned int num_points);',
      'typedef void (*p_32fc_magnitude_32f)(float* magnitudeVector, const lv_32fc_t* complexVector, unsigned int num_points);',
      '',
      '#endif',
    ));
  });

  it('should render the dispatch table of a machine', () => {
    expect(renderTemplateFile(ctx, templatePath('machine.tmpl'), ['sse'])).toBe(BANNER + lines(
      '',
      '',
      '#define LV_HAVE_GENERIC 1',
      '#define LV_HAVE_SSE 1',
      '',
      'struct volk_machine volk_machine_sse = {',
      '    (1 << LV_GENERIC) | (1 << LV_SSE),',
      '    "sse",',
      '    16,',
      '',
      '    "volk_32f_x2_add_32f",',
      '    {"generic", "u_sse"},',
      '    {(1 << LV_GENERIC), (1 << LV_SSE)},',
      '    {false, false},',
      '    {volk_32f_x2_add_32f_generic, volk_32f_x2_add_32f_u_sse},',
      '    2,',
      '',
      '    "volk_32fc_magnitude_32f",',
      '    {"generic", "a_sse"},',
      '    {(1 << LV_GENERIC), (1 << LV_SSE)},',
      '    {false, true},',
      '    {volk_32fc_magnitude_32f_generic, volk_32fc_magnitude_32f_a_sse},',
      '    2,',
      '};',
    ));
  });

  it('should pick implementations per machine', () => {
    const out = renderTemplateFile(ctx, templatePath('machine.tmpl'), ['avx_softfp']);

    expect(out).toContain('    (1 << LV_GENERIC) | (1 << LV_SOFTFP) | (1 << LV_SSE) | (1 << LV_AVX),\n');
    expect(out).toContain('    {volk_32f_x2_add_32f_generic, volk_32f_x2_add_32f_u_sse, volk_32f_x2_add_32f_a_avx},\n');
    expect(out).toContain('    32,\n');
  });

  it('should render identically on repeated runs', () => {
    const first = renderTemplateFile(ctx, templatePath('machine.tmpl'), ['avx']);
    expect(renderTemplateFile(ctx, templatePath('machine.tmpl'), ['avx'])).toBe(first);
  });
});
