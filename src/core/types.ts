import { z } from 'zod';
import { DEFAULT_MAX_SECTION_DEPTH } from '../kernels/sections.js';
import { DEFAULT_BANNER, DEFAULT_MAX_RENDER_DEPTH } from '../template/engine.js';

// ===== Configuration =====

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const DEFAULT_DEPRECATED_KERNELS = [
  'volk_16i_x5_add_quad_16i_x4',
  'volk_16i_branch_4_state_8',
  'volk_16i_max_star_16i',
  'volk_16i_max_star_horizontal_16i',
  'volk_16i_permute_and_scalar_add',
  'volk_16i_x4_quad_max_star_16i',
  'volk_32fc_s32fc_multiply_32fc',
  'volk_32fc_s32fc_x2_rotator_32fc',
  'volk_32fc_x2_s32fc_multiply_conjugate_add_32fc',
];

export const GeneratorConfigSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).default('warn'),
  paths: z.object({
    sourceDir: z.string().optional(),
    archs: z.string().default('gen/archs.xml'),
    machines: z.string().default('gen/machines.xml'),
    kernels: z.string().default('kernels/volk'),
  }).default({}),
  kernels: z.object({
    /** Leading name segment replaced when deriving `pname`. */
    prefix: z.string().default('volk_'),
    pnamePrefix: z.string().default('p_'),
    guardPrefix: z.string().regex(/^\w+$/, 'guardPrefix must be an identifier').default('LV_HAVE_'),
    maxSectionDepth: z.number().int().min(1).max(200).default(DEFAULT_MAX_SECTION_DEPTH),
    signatureCheck: z.enum(['off', 'warn', 'error']).default('warn'),
  }).default({}),
  template: z.object({
    banner: z.string().default(DEFAULT_BANNER),
    maskPrefix: z.string().default('LV_'),
    maxRenderDepth: z.number().int().min(1).max(100).default(DEFAULT_MAX_RENDER_DEPTH),
    deprecatedKernels: z.array(z.string()).default(DEFAULT_DEPRECATED_KERNELS),
  }).default({}),
});

export type GeneratorConfig = z.infer<typeof GeneratorConfigSchema>;
export type GeneratorConfigInput = z.input<typeof GeneratorConfigSchema>;
export type SignatureCheckMode = GeneratorConfig['kernels']['signatureCheck'];
