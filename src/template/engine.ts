/**
 * Template Engine
 *
 * Renders the line-oriented template language used for generated dispatch
 * sources. One pass, top to bottom:
 *
 * - `% for ... :` / `% endfor` buffer a loop body, then render it once per
 *   element in a child scope;
 * - `% if` / `% elif` / `% else` / `% endif` select lines;
 * - `<% ... %>` runs an inline statement (see statements.ts), possibly
 *   spanning several lines;
 * - `${...}` substitutes an expression;
 * - `##` lines are template comments.
 *
 * Unknown statements and expressions render as nothing.
 */

import { getLogger } from '../core/logger.js';
import { evaluateCondition } from './conditions.js';
import {
  childScope,
  createScratch,
  resolveExpression,
  rootScope,
  type Binding,
  type ElementBinding,
  type RenderScope,
  type RenderScratch,
  type ScopeSelection,
} from './scope.js';
import {
  executeStatement,
  parseStatement,
  type Statement,
  type TemplateCatalogs,
} from './statements.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface TemplateOptions {
  /** Comment line placed once at the top of every rendered file. */
  banner?: string;
  maskPrefix?: string;
  maxRenderDepth?: number;
  deprecatedKernels?: readonly string[];
  /** Caller-set values; looked up before anything else by `${...}`. */
  symbols?: Readonly<Record<string, string>>;
}

type LoopForm = 'each' | 'tuple' | 'enumerate';

interface LoopFrame {
  form: LoopForm;
  names: string[];
  collection: string;
  body: string;
  /** Open `for` lines not yet closed, this loop's own included. */
  depth: number;
}

interface ConditionalFrame {
  /** Whether the enclosing region was emitting when this `if` opened. */
  parentActive: boolean;
  matched: boolean;
  active: boolean;
}

interface BlockState {
  scope: RenderScope;
  loop: LoopFrame | null;
  conditionals: ConditionalFrame[];
  /** Collected text of an unfinished multi-line `<%` block. */
  pending: string | null;
}

interface RenderRun {
  scratch: RenderScratch;
  args: readonly string[];
}

// ═══════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════

export const DEFAULT_BANNER = '/* this file was generated by volk template utils, do not edit! */';
export const DEFAULT_MAX_RENDER_DEPTH = 20;

const FOR_ENUMERATE_RE = /^\s*%\s*for\s+(\w+)\s*,\s*(\w+)\s+in\s+enumerate\(\s*([\w.]+)\s*\)\s*:\s*$/;
const FOR_TUPLE_RE = /^\s*%\s*for\s+(\w+)\s*,\s*(\w+)\s+in\s+([\w.]+)\s*:\s*$/;
const FOR_RE = /^\s*%\s*for\s+(\w+)\s+in\s+([\w.]+)\s*:\s*$/;
const ENDFOR_RE = /^\s*%\s*endfor\s*$/;
const IF_RE = /^\s*%\s*if\s+(.+?)\s*:\s*$/;
const ELIF_RE = /^\s*%\s*elif\s+(.+?)\s*:\s*$/;
const ELSE_RE = /^\s*%\s*else\s*:\s*$/;
const ENDIF_RE = /^\s*%\s*endif\s*$/;
const STATEMENT_RE = /<%(.*?)%>/;
const VARIABLE_RE = /\$\{([^}]+)\}/;

/** What one element of each collection binds to. */
const ELEMENT_BINDINGS: Readonly<Record<string, ElementBinding[]>> = {
  kernels: [{ kind: 'kernel' }],
  archs: [{ kind: 'arch' }],
  'this_machine.archs': [{ kind: 'arch' }],
  machines: [{ kind: 'machine' }],
  'kern.args': [{ kind: 'arg-type' }, { kind: 'arg-name' }],
  'arch.checks': [{ kind: 'check-name' }, { kind: 'check-params' }],
};

// ═══════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════

export class TemplateEngine {
  private readonly banner: string;
  private readonly maskPrefix: string;
  private readonly maxRenderDepth: number;
  private readonly deprecatedKernels: ReadonlySet<string>;
  private readonly symbols: Map<string, string>;
  private readonly statements = new Map<string, Statement>();

  constructor(private readonly catalogs: TemplateCatalogs, options: TemplateOptions = {}) {
    this.banner = options.banner ?? DEFAULT_BANNER;
    this.maskPrefix = options.maskPrefix ?? 'LV_';
    this.maxRenderDepth = options.maxRenderDepth ?? DEFAULT_MAX_RENDER_DEPTH;
    this.deprecatedKernels = new Set(options.deprecatedKernels ?? []);
    this.symbols = new Map(Object.entries(options.symbols ?? {}));
  }

  setSymbol(name: string, value: string): void {
    this.symbols.set(name, value);
  }

  /**
   * Render `template` with positional `args` (read by
   * `machine_dict[args[N]]`). The banner is emitted once, first.
   */
  render(template: string, args: readonly string[] = []): string {
    const run: RenderRun = { scratch: createScratch(), args };
    return `\n${this.banner}\n\n${this.renderBlock(template, rootScope(), run)}`;
  }

  private renderBlock(template: string, scope: RenderScope, run: RenderRun): string {
    const state: BlockState = { scope, loop: null, conditionals: [], pending: null };
    let output = '';

    for (const line of splitLines(template)) {
      output += this.processLine(line, state, run);
    }

    const logger = getLogger();
    if (state.loop) {
      logger.warn({ collection: state.loop.collection }, 'Unterminated loop, body dropped');
    }
    if (state.pending !== null) {
      logger.warn('Unterminated <% block, content dropped');
    }
    if (state.conditionals.length > 0) {
      logger.debug({ open: state.conditionals.length }, 'Unterminated conditional');
    }
    return output;
  }

  private processLine(line: string, state: BlockState, run: RenderRun): string {
    // Loop bodies are buffered verbatim until their own endfor.
    const loop = state.loop;
    if (loop) {
      if (isLoopOpen(line)) {
        loop.depth++;
      } else if (ENDFOR_RE.test(line)) {
        loop.depth--;
        if (loop.depth === 0) {
          state.loop = null;
          return isActive(state) ? this.runLoop(loop, state.scope, run) : '';
        }
      }
      loop.body += line + '\n';
      return '';
    }

    if (state.pending !== null) {
      const end = line.indexOf('%>');
      if (end === -1) {
        state.pending += line + '\n';
        return '';
      }
      const code = state.pending + line.slice(0, end);
      state.pending = null;
      return isActive(state) ? this.execute(code, state, run) : '';
    }

    const blockStart = line.indexOf('<%');
    if (blockStart !== -1 && line.indexOf('%>', blockStart + 2) === -1) {
      state.pending = line.slice(blockStart + 2) + '\n';
      return isActive(state) ? line.slice(0, blockStart) : '';
    }

    const opened = parseLoopOpen(line);
    if (opened) {
      state.loop = opened;
      return '';
    }

    if (ENDFOR_RE.test(line)) {
      getLogger().debug({ line }, 'endfor without an open loop ignored');
      return '';
    }

    if (this.handleConditional(line, state, run)) {
      return '';
    }

    if (!isActive(state) || line.startsWith('##')) {
      return '';
    }

    return this.substitute(line, state, run) + '\n';
  }

  /** Returns true when `line` was a conditional directive. */
  private handleConditional(line: string, state: BlockState, run: RenderRun): boolean {
    const frames = state.conditionals;
    const top = frames.length > 0 ? frames[frames.length - 1] : undefined;

    let m = IF_RE.exec(line);
    if (m) {
      const parentActive = isActive(state);
      const taken = parentActive && this.condition(m[1], state, run);
      frames.push({ parentActive, matched: taken, active: taken });
      return true;
    }

    m = ELIF_RE.exec(line);
    if (m) {
      if (!top) return this.stray(line);
      if (top.parentActive && !top.matched) {
        top.active = this.condition(m[1], state, run);
        top.matched = top.active;
      } else {
        top.active = false;
      }
      return true;
    }

    if (ELSE_RE.test(line)) {
      if (!top) return this.stray(line);
      top.active = top.parentActive && !top.matched;
      top.matched = true;
      return true;
    }

    if (ENDIF_RE.test(line)) {
      if (!top) return this.stray(line);
      frames.pop();
      return true;
    }

    return false;
  }

  private stray(line: string): boolean {
    getLogger().debug({ line }, 'Conditional directive without an open if ignored');
    return true;
  }

  private condition(text: string, state: BlockState, run: RenderRun): boolean {
    return evaluateCondition(text, {
      resolve: expr => this.resolve(expr, state.scope, run),
      deprecatedKernels: this.deprecatedKernels,
    });
  }

  private resolve(expr: string, scope: RenderScope, run: RenderRun): string {
    return resolveExpression(expr, { scope, scratch: run.scratch, symbols: this.symbols });
  }

  private execute(code: string, state: BlockState, run: RenderRun): string {
    let statement = this.statements.get(code);
    if (!statement) {
      statement = parseStatement(code);
      this.statements.set(code, statement);
    }
    const result = executeStatement(statement, state.scope, {
      catalogs: this.catalogs,
      args: run.args,
      maskPrefix: this.maskPrefix,
      scratch: run.scratch,
    });
    state.scope = result.scope;
    return result.output;
  }

  /**
   * Inline statements first, then `${...}`. Each pass repeats until nothing
   * matches, with a bound in case a replacement keeps producing matches.
   */
  private substitute(line: string, state: BlockState, run: RenderRun): string {
    let processed = rewrite(line, STATEMENT_RE, 'Statement', code => this.execute(code, state, run));
    processed = rewrite(processed, VARIABLE_RE, 'Variable', expr => this.resolve(expr, state.scope, run));
    return processed;
  }

  // ─────────────────────────────────────────────────────────────
  // Loops
  // ─────────────────────────────────────────────────────────────

  private runLoop(loop: LoopFrame, scope: RenderScope, run: RenderRun): string {
    const selections = this.elements(loop.collection, scope);
    const elementBindings = ELEMENT_BINDINGS[loop.collection];
    if (selections === null || !elementBindings) {
      getLogger().debug({ collection: loop.collection }, 'Loop over unknown or unavailable collection renders nothing');
      return '';
    }

    let output = '';
    selections.forEach((selection, index) => {
      const bindings = loopBindings(loop, elementBindings, index);
      output += this.renderNested(loop.body, childScope(scope, selection, bindings), run);
    });
    return output;
  }

  private renderNested(body: string, scope: RenderScope, run: RenderRun): string {
    if (scope.depth > this.maxRenderDepth) {
      getLogger().error({ maxRenderDepth: this.maxRenderDepth }, 'Template render depth exceeded maximum');
      return '';
    }
    return this.renderBlock(body, scope, run);
  }

  /** One selection per element, or null when the collection is unavailable. */
  private elements(collection: string, scope: RenderScope): ScopeSelection[] | null {
    switch (collection) {
      case 'kernels':
        return this.catalogs.kernels.map(kernel => ({ kernel }));
      case 'archs':
        return this.catalogs.archs.list().map(arch => ({ arch }));
      case 'machines':
        return this.catalogs.machines.list().map(machine => ({ machine }));
      case 'this_machine.archs':
        return scope.machine ? scope.machine.archs.map(arch => ({ arch })) : null;
      case 'kern.args':
        return scope.kernel ? scope.kernel.args.map((_, argIndex) => ({ argIndex })) : null;
      case 'arch.checks':
        return scope.arch ? scope.arch.checks.map((_, checkIndex) => ({ checkIndex })) : null;
      default:
        return null;
    }
  }
}

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

function isActive(state: BlockState): boolean {
  const frames = state.conditionals;
  return frames.length === 0 || frames[frames.length - 1].active;
}

function isLoopOpen(line: string): boolean {
  return FOR_ENUMERATE_RE.test(line) || FOR_TUPLE_RE.test(line) || FOR_RE.test(line);
}

function parseLoopOpen(line: string): LoopFrame | null {
  let m = FOR_ENUMERATE_RE.exec(line);
  if (m) return { form: 'enumerate', names: [m[1], m[2]], collection: m[3], body: '', depth: 1 };
  m = FOR_TUPLE_RE.exec(line);
  if (m) return { form: 'tuple', names: [m[1], m[2]], collection: m[3], body: '', depth: 1 };
  m = FOR_RE.exec(line);
  if (m) return { form: 'each', names: [m[1]], collection: m[2], body: '', depth: 1 };
  return null;
}

function loopBindings(loop: LoopFrame, element: readonly ElementBinding[], index: number): Array<[string, Binding]> {
  switch (loop.form) {
    case 'each':
      return [[loop.names[0], element[0]]];
    case 'tuple':
      return loop.names.flatMap((name, i): Array<[string, Binding]> => (i < element.length ? [[name, element[i]]] : []));
    case 'enumerate':
      return [[loop.names[0], { kind: 'index', value: index }], [loop.names[1], element[0]]];
  }
}

/** Lines as the template's line reader sees them: no empty trailing line. */
function splitLines(text: string): string[] {
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

function rewrite(line: string, pattern: RegExp, label: string, replace: (inner: string) => string): string {
  const maxIterations = line.length + 100;
  let processed = line;
  let iterations = 0;
  let m: RegExpExecArray | null;

  while ((m = pattern.exec(processed)) !== null) {
    if (++iterations > maxIterations) {
      getLogger().error({ maxIterations }, `${label} substitution exceeded max iterations`);
      break;
    }
    processed = processed.slice(0, m.index) + replace(m[1]) + processed.slice(m.index + m[0].length);
  }
  return processed;
}
