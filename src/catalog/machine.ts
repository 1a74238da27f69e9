/**
 * Machine catalog
 *
 * A machine is an ordered combination of architectures. Entries in a
 * machine's `archs` list may use `a|b|c` alternation, which expands into one
 * machine per alternative (`<name>_a`, `<name>_b`, ...). An empty
 * alternative (`|avx` or `sse|`) keeps the base name and drops the slot.
 */

import { parseElements, stripComments } from './elements.js';
import type { ArchitectureCatalog } from './arch.js';
import type { Architecture, Machine } from './types.js';

export interface MachineDefinition {
  name: string;
  archNames: string[];
}

export class MachineCatalog {
  private readonly byName: ReadonlyMap<string, Machine>;

  constructor(private readonly machines: readonly Machine[]) {
    // later registrations win, matching lookup order of expansion
    this.byName = new Map(machines.map(m => [m.name, m]));
  }

  static parse(source: string, archs: ArchitectureCatalog): MachineCatalog {
    const machines: Machine[] = [];
    for (const def of parseMachineDefinitions(source)) {
      machines.push(...expandMachine(def.name, def.archNames, archs));
    }
    return new MachineCatalog(machines);
  }

  list(): readonly Machine[] {
    return this.machines;
  }

  get(name: string): Machine | undefined {
    return this.byName.get(name);
  }

  get size(): number {
    return this.machines.length;
  }

  /** Machines whose every architecture is in `available`. */
  satisfiedBy(available: ReadonlySet<string>): Machine[] {
    return this.machines.filter(m => m.archNames.every(a => available.has(a)));
  }
}

export function parseMachineDefinitions(source: string): MachineDefinition[] {
  const defs: MachineDefinition[] = [];
  for (const elem of parseElements(stripComments(source), 'machine')) {
    const name = elem.attrs.name ?? '';
    if (!name) continue;
    const archsElem = elem.children.find(c => c.tag === 'archs');
    const archNames = archsElem ? archsElem.text.split(/\s+/).filter(Boolean) : [];
    defs.push({ name, archNames });
  }
  return defs;
}

/**
 * Expand alternation in `archNames` and resolve every resulting machine.
 * Machines that reference an unknown architecture, or end up with no
 * architectures, are dropped.
 */
export function expandMachine(name: string, archNames: readonly string[], archs: ArchitectureCatalog): Machine[] {
  const index = archNames.findIndex(a => a.includes('|'));
  if (index === -1) {
    const machine = resolveMachine(name, archNames, archs);
    return machine ? [machine] : [];
  }

  const before = archNames.slice(0, index);
  const after = archNames.slice(index + 1);
  const results: Machine[] = [];

  for (const alternative of archNames[index].split('|')) {
    if (alternative) {
      results.push(...expandMachine(`${name}_${alternative}`, [...before, alternative, ...after], archs));
    } else {
      results.push(...expandMachine(name, [...before, ...after], archs));
    }
  }

  return results;
}

function resolveMachine(name: string, archNames: readonly string[], catalog: ArchitectureCatalog): Machine | null {
  const names: string[] = [];
  const resolved: Architecture[] = [];

  for (const archName of archNames) {
    if (!archName || names.includes(archName)) continue;
    const arch = catalog.get(archName);
    if (!arch) return null;
    names.push(archName);
    resolved.push(arch);
  }

  if (resolved.length === 0) return null;

  const alignment = resolved.reduce((max, a) => Math.max(max, a.alignment), 1);
  return Object.freeze({ name, archNames: names, archs: resolved, alignment });
}
