import { describe, it, expect, vi, beforeEach } from 'vitest';

const logger = vi.hoisted(() => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock('../../../src/core/logger.js', () => ({
  getLogger: () => logger,
}));

import { ArchitectureCatalog, getFlags, isSupported } from '../../../src/catalog/arch.js';

const SOURCE = `
<!-- <arch name="commented"></arch> -->
<arch name="generic">
</arch>
<arch name="sse">
  <check name="sse"></check>
  <flag compiler="gnu">-msse</flag>
  <flag compiler="gnu">-mfpmath=sse</flag>
  <flag compiler="msvc">/arch:SSE</flag>
  <include>xmmintrin.h</include>
  <environment>_MM_SET_FLUSH_ZERO_MODE(_MM_FLUSH_ZERO_ON);</environment>
  <alignment>16</alignment>
</arch>
<arch name="avx">
  <check name="xgetbv">
    <param>0</param>
    <param>6</param>
  </check>
  <flag compiler="gnu">-mavx</flag>
  <alignment>32</alignment>
</arch>
`;

describe('ArchitectureCatalog', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should parse architectures in declaration order', () => {
    const catalog = ArchitectureCatalog.parse(SOURCE);
    expect(catalog.list().map(a => a.name)).toEqual(['generic', 'sse', 'avx']);
    expect(catalog.size).toBe(3);
    expect(catalog.has('commented')).toBe(false);
  });

  it('should read every property of an architecture', () => {
    const sse = ArchitectureCatalog.parse(SOURCE).get('sse');

    expect(sse?.alignment).toBe(16);
    expect(sse?.include).toBe('xmmintrin.h');
    expect(sse?.environment).toBe('_MM_SET_FLUSH_ZERO_MODE(_MM_FLUSH_ZERO_ON);');
    expect(sse?.checks).toEqual([{ name: 'sse', params: [] }]);
    expect(sse?.flags.get('gnu')).toEqual(['-msse', '-mfpmath=sse']);
    expect(sse?.flags.get('msvc')).toEqual(['/arch:SSE']);
  });

  it('should read check params in order', () => {
    const avx = ArchitectureCatalog.parse(SOURCE).get('avx');
    expect(avx?.checks).toEqual([{ name: 'xgetbv', params: ['0', '6'] }]);
  });

  it('should default alignment to 1', () => {
    expect(ArchitectureCatalog.parse(SOURCE).get('generic')?.alignment).toBe(1);
  });

  it('should keep alignment 1 and warn on an invalid value', () => {
    const catalog = ArchitectureCatalog.parse('<arch name="odd"><alignment>wide</alignment></arch>');
    expect(catalog.get('odd')?.alignment).toBe(1);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('should keep the first of duplicate names and warn', () => {
    const catalog = ArchitectureCatalog.parse(
      '<arch name="x"><alignment>8</alignment></arch><arch name="x"><alignment>64</alignment></arch>',
    );
    expect(catalog.size).toBe(1);
    expect(catalog.get('x')?.alignment).toBe(8);
    expect(logger.warn).toHaveBeenCalledWith({ arch: 'x' }, 'Duplicate architecture definition ignored, keeping the first');
  });

  it('should skip unnamed architectures', () => {
    expect(ArchitectureCatalog.parse('<arch><alignment>8</alignment></arch>').size).toBe(0);
  });

  it('should select architectures supported by a compiler', () => {
    const catalog = ArchitectureCatalog.parse(SOURCE);
    expect(catalog.supportedBy('msvc').map(a => a.name)).toEqual(['generic', 'sse']);
    expect(catalog.supportedBy('gnu').map(a => a.name)).toEqual(['generic', 'sse', 'avx']);
  });
});

describe('isSupported / getFlags', () => {
  const catalog = ArchitectureCatalog.parse(SOURCE);

  it('should treat a flagless architecture as supported everywhere', () => {
    const generic = catalog.get('generic');
    expect(generic && isSupported(generic, 'anything')).toBe(true);
    expect(generic && getFlags(generic, 'anything')).toEqual([]);
  });

  it('should return no flags for an unknown compiler', () => {
    const avx = catalog.get('avx');
    expect(avx && isSupported(avx, 'clang')).toBe(false);
    expect(avx && getFlags(avx, 'clang')).toEqual([]);
  });
});
