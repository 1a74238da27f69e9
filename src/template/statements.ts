/**
 * Inline statements
 *
 * `<% ... %>` blocks are parsed once into a `Statement` and run by
 * `executeStatement`. Only a fixed vocabulary is understood; any other
 * block parses to `noop` and renders as nothing.
 */

import type { ArchitectureCatalog } from '../catalog/arch.js';
import type { MachineCatalog } from '../catalog/machine.js';
import { getImpls, type Kernel } from '../kernels/types.js';
import { withMachine, type RenderScope, type RenderScratch } from './scope.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export type ImplListKind = 'names' | 'deps' | 'alignment' | 'functions';

export type Statement =
  // assignments: change state, emit nothing
  | { kind: 'select-machine'; argIndex: number }
  | { kind: 'derive-arch-names' }
  | { kind: 'reset-parens' }
  | { kind: 'increment-parens' }
  | { kind: 'close-parens' }
  | { kind: 'select-impls' }
  | { kind: 'count-archs' }
  // expressions: emit text
  | { kind: 'arch-mask' }
  | { kind: 'machine-name' }
  | { kind: 'kernel-name' }
  | { kind: 'impl-list'; list: ImplListKind }
  | { kind: 'impl-count' }
  | { kind: 'noop'; source: string };

export interface TemplateCatalogs {
  readonly archs: ArchitectureCatalog;
  readonly machines: MachineCatalog;
  readonly kernels: readonly Kernel[];
}

export interface StatementEnv {
  readonly catalogs: TemplateCatalogs;
  readonly args: readonly string[];
  readonly maskPrefix: string;
  readonly scratch: RenderScratch;
}

export interface StatementResult {
  output: string;
  scope: RenderScope;
}

// ═══════════════════════════════════════════════════════════════
// PARSING
// ═══════════════════════════════════════════════════════════════

/** Tried in order; the first pattern found anywhere in the block wins. */
const PATTERNS: ReadonlyArray<[RegExp, (m: RegExpExecArray) => Statement]> = [
  [/this_machine\s*=\s*machine_dict\[args\[(\d+)\]\]/, m => ({ kind: 'select-machine', argIndex: Number(m[1]) })],
  [/arch_names\s*=\s*this_machine\.arch_names/, () => ({ kind: 'derive-arch-names' })],
  [/num_open_parens\s*=\s*0/, () => ({ kind: 'reset-parens' })],
  [/num_open_parens\s*\+=\s*1/, () => ({ kind: 'increment-parens' })],
  [/end_open_parens\s*=\s*'\)'\*num_open_parens/, () => ({ kind: 'close-parens' })],
  [/impls\s*=\s*kern\.get_impls\(arch_names\)/, () => ({ kind: 'select-impls' })],
  [/make_arch_have_list\s*=/, () => ({ kind: 'arch-mask' })],
  [/this_machine_name\s*=/, () => ({ kind: 'machine-name' })],
  [/kern_name\s*=/, () => ({ kind: 'kernel-name' })],
  [/make_impl_name_list\s*=/, () => ({ kind: 'impl-list', list: 'names' })],
  [/make_impl_deps_list\s*=/, () => ({ kind: 'impl-list', list: 'deps' })],
  [/make_impl_align_list\s*=/, () => ({ kind: 'impl-list', list: 'alignment' })],
  [/make_impl_fcn_list\s*=/, () => ({ kind: 'impl-list', list: 'functions' })],
  [/len_impls\s*=/, () => ({ kind: 'impl-count' })],
  [/len_archs\s*=\s*len\(archs\)/, () => ({ kind: 'count-archs' })],
];

export function parseStatement(code: string): Statement {
  const source = code.trim();
  for (const [pattern, build] of PATTERNS) {
    const match = pattern.exec(source);
    if (match) return build(match);
  }
  return { kind: 'noop', source };
}

// ═══════════════════════════════════════════════════════════════
// EVALUATION
// ═══════════════════════════════════════════════════════════════

export function executeStatement(statement: Statement, scope: RenderScope, env: StatementEnv): StatementResult {
  const { scratch } = env;
  const emit = (output: string): StatementResult => ({ output, scope });

  switch (statement.kind) {
    case 'select-machine': {
      const name = env.args[statement.argIndex];
      const machine = name === undefined ? undefined : env.catalogs.machines.get(name);
      return { output: '', scope: machine ? withMachine(scope, machine) : scope };
    }
    case 'derive-arch-names':
    case 'noop':
      return emit('');
    case 'reset-parens':
      scratch.openParens = 0;
      return emit('');
    case 'increment-parens':
      scratch.openParens++;
      return emit('');
    case 'close-parens':
      scratch.closeParens = ')'.repeat(scratch.openParens);
      return emit('');
    case 'select-impls':
      if (scope.kernel && scope.machine) {
        scratch.impls = getImpls(scope.kernel, new Set(scope.machine.archNames));
      }
      return emit('');
    case 'count-archs':
      scratch.archCount = env.catalogs.archs.size;
      return emit('');
    case 'arch-mask':
      return emit(scope.machine ? scope.machine.archs.map(a => mask(env.maskPrefix, a.name)).join(' | ') : '');
    case 'machine-name':
      return emit(scope.machine ? `"${scope.machine.name}"` : '');
    case 'kernel-name':
      return emit(scope.kernel ? `"${scope.kernel.name}"` : '');
    case 'impl-list':
      return emit(implList(statement.list, scope, env));
    case 'impl-count':
      return emit(String(scratch.impls.length));
  }
}

function mask(prefix: string, name: string): string {
  return `(1 << ${prefix}${name.toUpperCase()})`;
}

function implList(list: ImplListKind, scope: RenderScope, env: StatementEnv): string {
  const items = implItems(list, scope, env);
  return items === null ? '' : `{${items.join(', ')}}`;
}

function implItems(list: ImplListKind, scope: RenderScope, env: StatementEnv): string[] | null {
  const impls = env.scratch.impls;
  switch (list) {
    case 'names':
      return impls.map(impl => `"${impl.name}"`);
    case 'deps':
      return impls.map(impl =>
        impl.deps.size === 0 ? '0' : [...impl.deps].map(d => mask(env.maskPrefix, d)).join(' | '));
    case 'alignment':
      return impls.map(impl => String(impl.isAligned));
    case 'functions': {
      const kernel = scope.kernel;
      return kernel ? impls.map(impl => `${kernel.name}_${impl.name}`) : null;
    }
  }
}
