/**
 * Condition evaluation for `% if` / `% elif`.
 *
 * Boolean operators split at their first occurrence and do not honour
 * parentheses: `a or b and c` is `a or (b and c)`, but `(a or b) and c`
 * is `(a` or `b) and c`. Templates rely on this, so it stays.
 */

export interface ConditionEnv {
  resolve(expr: string): string;
  readonly deprecatedKernels: ReadonlySet<string>;
}

const SLICE_EQ_RE = /^(\w+(?:\.\w+)*)\[:(\d+)\]\s*==\s*"([^"]*)"$/;
const SINGLE_QUOTED_IN_RE = /^'([^']+)'\s+in\s+(\w+)$/;
const DOUBLE_QUOTED_IN_RE = /^"([^"]+)"\s+in\s+(\S+)$/;
const EQUALITY_RE = /^(.+?)\s*(==|!=)\s*(.+)$/;
const MEMBERSHIP_RE = /^(\S+)\s+in\s+(\S+)$/;

export function evaluateCondition(condition: string, env: ConditionEnv): boolean {
  const c = condition.trim();

  const or = c.indexOf(' or ');
  if (or !== -1) {
    return evaluateCondition(c.slice(0, or), env) || evaluateCondition(c.slice(or + 4), env);
  }

  const and = c.indexOf(' and ');
  if (and !== -1) {
    return evaluateCondition(c.slice(0, and), env) && evaluateCondition(c.slice(and + 5), env);
  }

  let m = SLICE_EQ_RE.exec(c);
  if (m) {
    return env.resolve(m[1]).slice(0, Number(m[2])) === m[3];
  }

  m = SINGLE_QUOTED_IN_RE.exec(c) ?? DOUBLE_QUOTED_IN_RE.exec(c);
  if (m) {
    return env.resolve(m[2]).includes(m[1]);
  }

  m = EQUALITY_RE.exec(c);
  if (m) {
    const equal = operand(m[1], env) === operand(m[3], env);
    return m[2] === '==' ? equal : !equal;
  }

  m = MEMBERSHIP_RE.exec(c);
  if (m) {
    // deprecated_kernels is the only collection known here
    return m[2] === 'deprecated_kernels' && env.deprecatedKernels.has(env.resolve(m[1]));
  }

  if (c.includes('.')) {
    const value = env.resolve(c);
    return value !== '' && value !== '0' && value !== 'false';
  }

  return false;
}

function operand(text: string, env: ConditionEnv): string {
  const t = text.trim();
  const quoted = /^"([^"]*)"$/.exec(t) ?? /^'([^']*)'$/.exec(t);
  if (quoted) return quoted[1];
  if (/^-?\d+$/.test(t)) return String(Number(t));
  return env.resolve(t);
}
