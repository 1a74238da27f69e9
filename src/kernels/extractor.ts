/**
 * Kernel Extractor
 *
 * Recovers kernels from header sources. Each header holds one kernel: an
 * include-guard `#ifndef` wrapping one guarded block per implementation,
 * where the guard names the features the implementation needs
 * (`#ifdef LV_HAVE_SSE`, `#if LV_HAVE_AVX && LV_HAVE_FMA`, ...).
 */

import { basename, join } from 'path';
import { globSync } from 'glob';
import { getLogger } from '../core/logger.js';
import { KernelSignatureError, toError } from '../core/errors.js';
import type { SignatureCheckMode } from '../core/types.js';
import { assertDirectory, readSourceFile } from '../utils/fs.js';
import { removeComments } from './comments.js';
import { flattenSections, parseSections, DEFAULT_MAX_SECTION_DEPTH, type Section } from './sections.js';
import { escapeRegExp, parseSignature } from './signature.js';
import { DISPATCHER_IMPL, GENERIC_IMPL, type Impl, type Kernel, type KernelArg } from './types.js';

export interface ExtractOptions {
  /** Kernel name prefix replaced by `pnamePrefix` to form `pname`. */
  prefix?: string;
  pnamePrefix?: string;
  guardPrefix?: string;
  maxSectionDepth?: number;
  signatureCheck?: SignatureCheckMode;
}

const DEFAULTS: Required<ExtractOptions> = {
  prefix: 'volk_',
  pnamePrefix: 'p_',
  guardPrefix: 'LV_HAVE_',
  maxSectionDepth: DEFAULT_MAX_SECTION_DEPTH,
  signatureCheck: 'warn',
};

/**
 * Extract the kernel `name` from header text. Returns null when the header
 * has no usable `generic` implementation.
 */
export function extractKernel(name: string, source: string, options: ExtractOptions = {}): Kernel | null {
  const opts = { ...DEFAULTS, ...options };
  const logger = getLogger();
  const sections = parseSections(removeComments(source), { maxDepth: opts.maxSectionDepth });

  let impls: Impl[] = [];
  for (const section of sections) {
    if (section.kind !== 'guarded' || !section.header.toLowerCase().includes('ifndef')) continue;

    for (const sub of section.children) {
      if (sub.kind !== 'guarded') continue;
      if (!sub.header.toLowerCase().includes('if') || !sub.header.includes(opts.guardPrefix)) continue;

      try {
        const impl = parseImpl(name, sub.header, sub.children, opts.guardPrefix);
        if (impl.name) impls.push(impl);
      } catch (err) {
        logger.warn({ kernel: name, header: sub.header.trim(), error: toError(err).message }, 'Skipping unparseable implementation');
      }
    }
  }

  if (impls.length === 0) {
    logger.warn({ kernel: name }, 'No implementations found, skipping kernel');
    return null;
  }

  if (!impls.some(impl => impl.name === GENERIC_IMPL)) {
    logger.warn({ kernel: name }, `${name} does not have a generic protokernel, skipping`);
    return null;
  }

  const hasDispatcher = impls.some(impl => impl.name === DISPATCHER_IMPL);
  if (hasDispatcher) {
    const index = impls.findIndex(impl => impl.name === DISPATCHER_IMPL);
    impls = [...impls.slice(0, index), ...impls.slice(index + 1)];
  }

  const args = impls[0].args;
  if (opts.signatureCheck !== 'off') {
    checkSignatures(name, impls, opts.signatureCheck);
  }

  return Object.freeze({
    name,
    pname: name.startsWith(opts.prefix) ? opts.pnamePrefix + name.slice(opts.prefix.length) : name,
    impls: Object.freeze(impls),
    args,
    arglistTypes: args.map(a => a.type).join(', '),
    arglistFull: args.map(a => `${a.type} ${a.name}`).join(', '),
    arglistNames: args.map(a => a.name).join(', '),
    hasDispatcher,
  });
}

/**
 * Extract every `*.h` directly inside `dir`, in sorted path order.
 */
export function loadKernels(dir: string, options: ExtractOptions = {}): Kernel[] {
  assertDirectory(dir);
  const files = globSync('*.h', { cwd: dir, nodir: true }).sort();
  const kernels: Kernel[] = [];

  for (const file of files) {
    const kernel = extractKernel(basename(file, '.h'), readSourceFile(join(dir, file)), options);
    if (kernel) kernels.push(kernel);
  }

  getLogger().debug({ dir, headers: files.length, kernels: kernels.length }, 'Loaded kernels');
  return kernels;
}

function parseImpl(kernelName: string, header: string, body: readonly Section[], guardPrefix: string): Impl {
  const guardRe = new RegExp(`${escapeRegExp(guardPrefix)}(\\w+)`, 'g');
  const deps = [...new Set(Array.from(header.matchAll(guardRe), m => m[1].toLowerCase()))].sort();

  const signature = parseSignature(kernelName, flattenSections(body));
  const name = signature.name ?? deps[0] ?? '';

  return Object.freeze({
    name,
    deps: new Set(deps),
    args: signature.args,
    isAligned: name.startsWith('a_'),
  });
}

function normalizeType(type: string): string {
  return type.replace(/\s*\*\s*/g, '*').replace(/\s+/g, ' ').trim();
}

function sameTypes(a: readonly KernelArg[], b: readonly KernelArg[]): boolean {
  return a.length === b.length && a.every((arg, i) => normalizeType(arg.type) === normalizeType(b[i].type));
}

function sameNames(a: readonly KernelArg[], b: readonly KernelArg[]): boolean {
  return a.every((arg, i) => arg.name === b[i].name);
}

/**
 * Differing parameter types follow `mode`; renamed parameters only warn,
 * since generated code uses the first implementation's names.
 */
function checkSignatures(kernelName: string, impls: readonly Impl[], mode: 'warn' | 'error'): void {
  const canonical = impls[0];
  for (const impl of impls.slice(1)) {
    if (impl.args.length === 0) continue;

    const context = { kernel: kernelName, impl: impl.name, expected: canonical.args, actual: impl.args };
    if (!sameTypes(canonical.args, impl.args)) {
      const message = `${kernelName}_${impl.name} has a different argument list than ${kernelName}_${canonical.name}`;
      if (mode === 'error') {
        throw new KernelSignatureError(message, kernelName, impl.name);
      }
      getLogger().warn(context, message);
    } else if (!sameNames(canonical.args, impl.args)) {
      getLogger().warn(context, `${kernelName}_${impl.name} names its parameters differently than ${kernelName}_${canonical.name}`);
    }
  }
}
