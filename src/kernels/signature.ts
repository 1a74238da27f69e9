import type { KernelArg } from './types.js';

export interface Signature {
  /** Suffix after `<kernel>_`, or null when no call-like pattern matched. */
  name: string | null;
  args: KernelArg[];
}

const IDENT_CHAR = /[A-Za-z0-9_]/;

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Recover the implementation suffix and parameter list of the first
 * `<kernel>_<suffix>(...)` declaration in `body`, looking only at the text
 * before the first `{`.
 */
export function parseSignature(kernelName: string, body: string): Signature {
  const brace = body.indexOf('{');
  const preBrace = brace === -1 ? body : body.slice(0, brace);
  const kernel = escapeRegExp(kernelName);

  const nameMatch = new RegExp(`${kernel}_(\\w+)\\s*\\(`).exec(preBrace);
  const argsMatch = new RegExp(`${kernel}\\w*\\s*\\(([^)]*)\\)`).exec(preBrace);

  return {
    name: nameMatch ? nameMatch[1] : null,
    args: argsMatch ? parseParameterList(argsMatch[1]) : [],
  };
}

export function parseParameterList(list: string): KernelArg[] {
  const args: KernelArg[] = [];
  for (const part of splitTopLevel(list)) {
    const arg = splitParameter(part);
    if (arg) args.push(arg);
  }
  return args;
}

/**
 * Split `const float* aVector` into type and name by walking back over the
 * trailing identifier. Declarators such as function pointers are not
 * understood and come out mis-split.
 */
export function splitParameter(param: string): KernelArg | null {
  const trimmed = param.trim();
  if (!trimmed) return null;

  let start = trimmed.length;
  while (start > 0 && IDENT_CHAR.test(trimmed[start - 1])) {
    start--;
  }
  if (start === trimmed.length) return null;

  const type = trimmed.slice(0, start).trim();
  if (!type) return null;
  return { type, name: trimmed.slice(start) };
}

function splitTopLevel(list: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = '';
  for (const c of list) {
    if (c === '(' || c === '[') depth++;
    else if ((c === ')' || c === ']') && depth > 0) depth--;
    if (c === ',' && depth === 0) {
      parts.push(current);
      current = '';
    } else {
      current += c;
    }
  }
  parts.push(current);
  return parts;
}
