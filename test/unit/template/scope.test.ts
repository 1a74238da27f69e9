import { describe, it, expect } from 'vitest';
import {
  childScope,
  createScratch,
  resolveExpression,
  rootScope,
  type RenderScope,
} from '../../../src/template/scope.js';
import { buildCatalogs, buildKernel } from '../../helpers/catalogs.js';

const kernel = buildKernel('volk_k', [
  ['#ifdef LV_HAVE_GENERIC', 'generic'],
  ['#ifdef LV_HAVE_DISPATCHER', 'dispatcher'],
]);
const catalogs = buildCatalogs([kernel]);

function resolveIn(scope: RenderScope, expr: string, symbols: Record<string, string> = {}): string {
  return resolveExpression(expr, { scope, scratch: createScratch(), symbols: new Map(Object.entries(symbols)) });
}

describe('resolveExpression', () => {
  it('should resolve kernel fields', () => {
    const scope: RenderScope = { ...rootScope(), kernel };
    expect(resolveIn(scope, 'kern.name')).toBe('volk_k');
    expect(resolveIn(scope, ' kern.pname ')).toBe('p_k');
    expect(resolveIn(scope, 'kern.arglist_full')).toBe('float* out, const float* in, unsigned int num_points');
    expect(resolveIn(scope, 'kern.arglist_names')).toBe('out, in, num_points');
    expect(resolveIn(scope, 'kern.arglist_types')).toBe('float*, const float*, unsigned int');
    expect(resolveIn(scope, 'kern.has_dispatcher')).toBe('1');
    expect(resolveIn(scope, 'kern.unknown')).toBe('');
  });

  it('should resolve architecture fields', () => {
    const scope: RenderScope = { ...rootScope(), arch: catalogs.archs.get('sse') };
    expect(resolveIn(scope, 'arch.name')).toBe('sse');
    expect(resolveIn(scope, 'arch.name.upper()')).toBe('SSE');
    expect(resolveIn(scope, 'arch.alignment')).toBe('16');
    expect(resolveIn(scope, 'arch.include')).toBe('');
  });

  it('should resolve machine fields under both names', () => {
    const scope: RenderScope = { ...rootScope(), machine: catalogs.machines.get('avx') };
    expect(resolveIn(scope, 'this_machine.name')).toBe('avx');
    expect(resolveIn(scope, 'machine.name.upper()')).toBe('AVX');
    expect(resolveIn(scope, 'this_machine.alignment')).toBe('32');
  });

  it('should resolve nothing for unselected or unknown names', () => {
    expect(resolveIn(rootScope(), 'kern.name')).toBe('');
    expect(resolveIn(rootScope(), 'nobody.name')).toBe('');
    expect(resolveIn(rootScope(), 'len_archs')).toBe('');
  });

  it('should prefer caller symbols', () => {
    const scope: RenderScope = { ...rootScope(), kernel };
    expect(resolveIn(scope, 'kern.name', { 'kern.name': 'fixed' })).toBe('fixed');
  });

  it('should read the shared registers', () => {
    const scratch = createScratch();
    scratch.closeParens = '))';
    scratch.archCount = 3;
    const env = { scope: rootScope(), scratch, symbols: new Map<string, string>() };
    expect(resolveExpression('end_open_parens', env)).toBe('))');
    expect(resolveExpression('len_archs', env)).toBe('3');
  });
});

describe('childScope', () => {
  it('should bind loop names without touching the parent', () => {
    const parent = rootScope();
    const child = childScope(parent, { kernel, argIndex: 1 }, [
      ['t', { kind: 'arg-type' }],
      ['n', { kind: 'arg-name' }],
      ['i', { kind: 'index', value: 4 }],
    ]);

    expect(child.depth).toBe(1);
    expect(resolveIn(child, 't')).toBe('const float*');
    expect(resolveIn(child, 'n')).toBe('in');
    expect(resolveIn(child, 'i')).toBe('4');
    expect(resolveIn(child, 'i.value')).toBe('');
    expect(parent.depth).toBe(0);
    expect(parent.kernel).toBeUndefined();
    expect(parent.bindings.has('t')).toBe(false);
  });

  it('should join check params', () => {
    const child = childScope({ ...rootScope(), arch: catalogs.archs.get('avx') }, { checkIndex: 1 }, [
      ['check', { kind: 'check-name' }],
      ['params', { kind: 'check-params' }],
    ]);
    expect(resolveIn(child, 'check')).toBe('xgetbv');
    expect(resolveIn(child, 'params')).toBe('0, 6');
  });
});
