/**
 * Render scope
 *
 * Selection state is an immutable frame threaded through nested renders:
 * a loop body sees a child frame with one more selection filled in, and the
 * parent frame is untouched when the loop ends. Names a template can refer
 * to (`kern`, `arch`, loop variables, enumerate indices) are bindings that
 * point into the frame.
 */

import type { Architecture, Machine } from '../catalog/types.js';
import type { Impl, Kernel } from '../kernels/types.js';

export type Binding =
  | { kind: 'kernel' }
  | { kind: 'arch' }
  | { kind: 'machine' }
  | { kind: 'arg-type' }
  | { kind: 'arg-name' }
  | { kind: 'check-name' }
  | { kind: 'check-params' }
  | { kind: 'index'; value: number };

export type ElementBinding = Exclude<Binding, { kind: 'index' }>;

export interface RenderScope {
  readonly kernel?: Kernel;
  readonly arch?: Architecture;
  readonly machine?: Machine;
  readonly argIndex?: number;
  readonly checkIndex?: number;
  readonly bindings: ReadonlyMap<string, Binding>;
  /** Nesting level of the render this frame belongs to. */
  readonly depth: number;
}

/** Registers shared by a whole render, nested loop bodies included. */
export interface RenderScratch {
  openParens: number;
  closeParens: string;
  impls: readonly Impl[];
  archCount: number;
}

export interface ResolveEnv {
  readonly scope: RenderScope;
  readonly scratch: RenderScratch;
  readonly symbols: ReadonlyMap<string, string>;
}

const BUILTIN_BINDINGS: ReadonlyArray<[string, Binding]> = [
  ['kern', { kind: 'kernel' }],
  ['arch', { kind: 'arch' }],
  ['this_machine', { kind: 'machine' }],
  ['machine', { kind: 'machine' }],
  ['arg_type', { kind: 'arg-type' }],
  ['arg_name', { kind: 'arg-name' }],
  ['check', { kind: 'check-name' }],
];

export function rootScope(): RenderScope {
  return { bindings: new Map(BUILTIN_BINDINGS), depth: 0 };
}

export function createScratch(): RenderScratch {
  return { openParens: 0, closeParens: '', impls: [], archCount: 0 };
}

export type ScopeSelection = Pick<RenderScope, 'kernel' | 'arch' | 'machine' | 'argIndex' | 'checkIndex'>;

export function childScope(
  parent: RenderScope,
  selection: ScopeSelection,
  bindings: ReadonlyArray<[string, Binding]>,
): RenderScope {
  return {
    ...parent,
    ...selection,
    bindings: new Map([...parent.bindings, ...bindings]),
    depth: parent.depth + 1,
  };
}

export function withMachine(scope: RenderScope, machine: Machine): RenderScope {
  return { ...scope, machine };
}

/**
 * Resolve a `${...}` expression. Anything that does not resolve is the
 * empty string.
 */
export function resolveExpression(expr: string, env: ResolveEnv): string {
  const e = expr.trim();
  const symbol = env.symbols.get(e);
  if (symbol !== undefined) return symbol;

  if (e === 'end_open_parens') return env.scratch.closeParens;
  if (e === 'len_archs') return env.scratch.archCount > 0 ? String(env.scratch.archCount) : '';

  const dot = e.indexOf('.');
  const head = dot === -1 ? e : e.slice(0, dot);
  const field = dot === -1 ? '' : e.slice(dot + 1);
  const binding = env.scope.bindings.get(head);
  if (!binding) return '';

  const { scope } = env;
  switch (binding.kind) {
    case 'kernel':
      return scope.kernel ? kernelField(scope.kernel, field) : '';
    case 'arch':
      return scope.arch ? archField(scope.arch, field) : '';
    case 'machine':
      return scope.machine ? machineField(scope.machine, field) : '';
    case 'arg-type':
    case 'arg-name': {
      const arg = scope.kernel && scope.argIndex !== undefined ? scope.kernel.args[scope.argIndex] : undefined;
      if (!arg || field) return '';
      return binding.kind === 'arg-type' ? arg.type : arg.name;
    }
    case 'check-name':
    case 'check-params': {
      const check = scope.arch && scope.checkIndex !== undefined ? scope.arch.checks[scope.checkIndex] : undefined;
      if (!check || field) return '';
      return binding.kind === 'check-name' ? check.name : check.params.join(', ');
    }
    case 'index':
      return field ? '' : String(binding.value);
  }
}

function kernelField(kernel: Kernel, field: string): string {
  switch (field) {
    case 'name': return kernel.name;
    case 'pname': return kernel.pname;
    case 'arglist_full': return kernel.arglistFull;
    case 'arglist_names': return kernel.arglistNames;
    case 'arglist_types': return kernel.arglistTypes;
    case 'has_dispatcher': return kernel.hasDispatcher ? '1' : '';
    default: return '';
  }
}

function archField(arch: Architecture, field: string): string {
  switch (field) {
    case 'name': return arch.name;
    case 'name.upper()': return arch.name.toUpperCase();
    case 'alignment': return String(arch.alignment);
    case 'environment': return arch.environment;
    case 'include': return arch.include;
    default: return '';
  }
}

function machineField(machine: Machine, field: string): string {
  switch (field) {
    case 'name': return machine.name;
    case 'name.upper()': return machine.name.toUpperCase();
    case 'alignment': return String(machine.alignment);
    default: return '';
  }
}
