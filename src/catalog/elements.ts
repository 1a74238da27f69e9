/**
 * Declarative element scanner
 *
 * Reads the small element grammar used by the architecture and machine
 * descriptions: `<tag attr="value">text</tag>` elements, self-closing
 * elements, and a fixed set of child tags. Not a general XML parser: no
 * entities, no CDATA, no nesting of an element inside one of the same name.
 */

import { getLogger } from '../core/logger.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface Element {
  tag: string;
  attrs: Record<string, string>;
  text: string;
  children: Element[];
}

// ═══════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════

export const CHILD_TAGS = ['flag', 'check', 'param', 'alignment', 'environment', 'include', 'archs'] as const;

const ATTR_RE = /(\w+)\s*=\s*"([^"]*)"/g;

// ═══════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════

/**
 * Remove `<!-- ... -->` comments. An unclosed comment swallows the rest
 * of the input.
 */
export function stripComments(source: string): string {
  let result = '';
  let pos = 0;
  while (pos < source.length) {
    const start = source.indexOf('<!--', pos);
    if (start === -1) {
      result += source.slice(pos);
      break;
    }
    result += source.slice(pos, start);
    const end = source.indexOf('-->', start);
    if (end === -1) break;
    pos = end + 3;
  }
  return result;
}

/**
 * Collect every `tagName` element in `source`, in document order, with
 * their allow-listed children.
 */
export function parseElements(source: string, tagName: string): Element[] {
  const elements: Element[] = [];
  const openTag = `<${tagName}`;
  const closeTag = `</${tagName}>`;
  const maxIterations = source.length + 1;
  let iterations = 0;
  let pos = 0;

  while ((pos = findOpenTag(source, openTag, pos)) !== -1) {
    if (++iterations > maxIterations) {
      getLogger().error({ tag: tagName, maxIterations }, 'Element scan exceeded maximum iterations');
      break;
    }

    const tagEnd = source.indexOf('>', pos);
    if (tagEnd === -1) break;

    const attrs = parseAttributes(source.slice(pos, tagEnd + 1));

    if (source[tagEnd - 1] === '/') {
      elements.push({ tag: tagName, attrs, text: '', children: [] });
      pos = tagEnd + 1;
      continue;
    }

    const closePos = source.indexOf(closeTag, tagEnd);
    if (closePos === -1) {
      pos = tagEnd + 1;
      continue;
    }

    const inner = source.slice(tagEnd + 1, closePos);
    const children: Element[] = [];
    for (const childTag of CHILD_TAGS) {
      children.push(...parseElements(inner, childTag));
    }

    elements.push({ tag: tagName, attrs, text: inner.trim(), children });
    pos = closePos + closeTag.length;
  }

  return elements;
}

// ═══════════════════════════════════════════════════════════════
// INTERNALS
// ═══════════════════════════════════════════════════════════════

/** `<arch` must not match `<archs`. */
function findOpenTag(source: string, openTag: string, from: number): number {
  let pos = source.indexOf(openTag, from);
  while (pos !== -1) {
    const next = source.charAt(pos + openTag.length);
    if (next === '>' || next === '/' || /\s/.test(next)) return pos;
    pos = source.indexOf(openTag, pos + 1);
  }
  return -1;
}

function parseAttributes(tagContent: string): Record<string, string> {
  const attrs: Record<string, string> = {};
  for (const match of tagContent.matchAll(ATTR_RE)) {
    attrs[match[1]] = match[2];
  }
  return attrs;
}
