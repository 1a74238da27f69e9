import { getLogger } from '../core/logger.js';
import { parseElements, stripComments, type Element } from './elements.js';
import type { ArchCheck, Architecture } from './types.js';

/** An architecture with no flags at all is usable with any compiler. */
export function isSupported(arch: Architecture, compiler: string): boolean {
  return arch.flags.size === 0 || arch.flags.has(compiler);
}

export function getFlags(arch: Architecture, compiler: string): readonly string[] {
  return arch.flags.get(compiler) ?? [];
}

/**
 * Read-only, name-indexed collection of architectures in declaration order.
 */
export class ArchitectureCatalog {
  private readonly byName: ReadonlyMap<string, Architecture>;

  constructor(private readonly archs: readonly Architecture[]) {
    this.byName = new Map(archs.map(a => [a.name, a]));
  }

  static parse(source: string): ArchitectureCatalog {
    return new ArchitectureCatalog(parseArchitectures(source));
  }

  list(): readonly Architecture[] {
    return this.archs;
  }

  get(name: string): Architecture | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  get size(): number {
    return this.archs.length;
  }

  supportedBy(compiler: string): Architecture[] {
    return this.archs.filter(a => isSupported(a, compiler));
  }
}

export function parseArchitectures(source: string): Architecture[] {
  const logger = getLogger();
  const archs: Architecture[] = [];
  const seen = new Set<string>();

  for (const elem of parseElements(stripComments(source), 'arch')) {
    const name = elem.attrs.name ?? '';
    if (!name) continue;
    if (seen.has(name)) {
      logger.warn({ arch: name }, 'Duplicate architecture definition ignored, keeping the first');
      continue;
    }
    seen.add(name);
    archs.push(Object.freeze(buildArchitecture(name, elem)));
  }

  return archs;
}

function buildArchitecture(name: string, elem: Element): Architecture {
  const flags = new Map<string, string[]>();
  const checks: ArchCheck[] = [];
  let alignment = 1;
  let environment = '';
  let include = '';

  for (const child of elem.children) {
    switch (child.tag) {
      case 'flag': {
        const compiler = child.attrs.compiler ?? '';
        if (!compiler || !child.text) break;
        const list = flags.get(compiler) ?? [];
        list.push(child.text);
        flags.set(compiler, list);
        break;
      }
      case 'check': {
        const checkName = child.attrs.name ?? '';
        if (!checkName) break;
        const params = child.children
          .filter(p => p.tag === 'param' && p.text)
          .map(p => p.text);
        checks.push({ name: checkName, params });
        break;
      }
      case 'alignment': {
        const value = Number.parseInt(child.text, 10);
        if (Number.isNaN(value) || value < 1) {
          getLogger().warn({ arch: name, alignment: child.text }, 'Invalid alignment, using 1');
        } else {
          alignment = value;
        }
        break;
      }
      case 'environment':
        environment = child.text;
        break;
      case 'include':
        include = child.text;
        break;
    }
  }

  return { name, environment, include, alignment, checks, flags };
}
