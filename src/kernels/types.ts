export interface KernelArg {
  readonly type: string;
  readonly name: string;
}

export interface Impl {
  readonly name: string;
  /** Lowercased feature tokens, iterated in sorted order. */
  readonly deps: ReadonlySet<string>;
  readonly args: readonly KernelArg[];
  readonly isAligned: boolean;
}

export interface Kernel {
  readonly name: string;
  readonly pname: string;
  /** Declaration order; `dispatcher` is never listed. */
  readonly impls: readonly Impl[];
  readonly args: readonly KernelArg[];
  readonly arglistTypes: string;
  readonly arglistFull: string;
  readonly arglistNames: string;
  readonly hasDispatcher: boolean;
}

export const GENERIC_IMPL = 'generic';
export const DISPATCHER_IMPL = 'dispatcher';

/**
 * Implementations whose every dependency is in `archSet`, in declaration
 * order. Implementations without dependencies always apply.
 */
export function getImpls(kernel: Kernel, archSet: ReadonlySet<string>): Impl[] {
  return kernel.impls.filter(impl => [...impl.deps].every(dep => archSet.has(dep)));
}
