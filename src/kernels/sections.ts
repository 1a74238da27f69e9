/**
 * Preprocessor guard sectioning
 *
 * Partitions source text into a tree of plain text and conditionally
 * compiled sections. At each level, `#if`/`#ifdef`/`#ifndef` at depth one
 * open a section, `#else`/`#elif` at depth one open a sibling section, and
 * the matching `#endif` closes it. Each guarded body is partitioned again,
 * down to a fixed depth.
 */

import { getLogger } from '../core/logger.js';

export interface TextSection {
  readonly kind: 'text';
  readonly body: string;
}

export interface GuardedSection {
  readonly kind: 'guarded';
  /** The directive line that opened the section, e.g. `#ifdef LV_HAVE_SSE`. */
  readonly header: string;
  readonly body: string;
  readonly children: readonly Section[];
  /** Set when the depth limit stopped partitioning of `body`. */
  readonly truncated: boolean;
}

export type Section = TextSection | GuardedSection;

export interface SectionOptions {
  maxDepth?: number;
}

export const DEFAULT_MAX_SECTION_DEPTH = 50;

type DirectiveKind = 'if' | 'else' | 'end' | 'normal';

const DIRECTIVE_RE = /^\s*#\s*(\w+)/;

export function parseSections(code: string, options: SectionOptions = {}): Section[] {
  return partition(code, 0, options.maxDepth ?? DEFAULT_MAX_SECTION_DEPTH);
}

/** Concatenate the text sections of a subtree, dropping all guard structure. */
export function flattenSections(sections: readonly Section[]): string {
  let result = '';
  for (const section of sections) {
    result += section.kind === 'text' ? section.body : flattenSections(section.children);
  }
  return result;
}

export function directiveKind(line: string): DirectiveKind {
  const match = DIRECTIVE_RE.exec(line);
  if (!match) return 'normal';
  switch (match[1]) {
    case 'if':
    case 'ifdef':
    case 'ifndef':
      return 'if';
    case 'else':
    case 'elif':
      return 'else';
    case 'endif':
      return 'end';
    default:
      return 'normal';
  }
}

function partition(code: string, depth: number, maxDepth: number): Section[] {
  const raw: Array<{ header: string | null; body: string }> = [];
  let header: string | null = null;
  let current = '';
  let level = 0;

  const flush = (): void => {
    if (current.trim()) raw.push({ header, body: current });
    current = '';
  };

  for (const line of code.split('\n')) {
    const kind = directiveKind(line);
    if (kind === 'if') level++;
    if (kind === 'end') level--;

    if (level === 1 && (kind === 'if' || kind === 'else')) {
      flush();
      header = line;
      continue;
    }

    if (level === 0 && kind === 'end') {
      flush();
      header = null;
      continue;
    }

    current += line + '\n';
  }
  flush();

  return raw.map(({ header: h, body }): Section => {
    if (h === null) return { kind: 'text', body };
    if (depth >= maxDepth) {
      getLogger().warn({ header: h.trim(), maxDepth }, 'Guard nesting exceeds maximum depth, section truncated');
      return { kind: 'guarded', header: h, body, children: [], truncated: true };
    }
    return { kind: 'guarded', header: h, body, children: partition(body, depth + 1, maxDepth), truncated: false };
  });
}
