/**
 * Strip C comments in one pass. String and character literals are copied
 * through untouched (escapes included), so `"//"` inside a literal survives.
 * Line comments keep their terminating newline.
 */
export function removeComments(code: string): string {
  let result = '';
  let inLineComment = false;
  let inBlockComment = false;
  let quote: string | null = null;

  for (let i = 0; i < code.length; i++) {
    const c = code[i];
    const next = code[i + 1];

    if (inLineComment) {
      if (c === '\n') {
        inLineComment = false;
        result += c;
      }
    } else if (inBlockComment) {
      if (c === '*' && next === '/') {
        inBlockComment = false;
        i++;
      }
    } else if (quote !== null) {
      result += c;
      if (c === '\\' && next !== undefined) {
        result += next;
        i++;
      } else if (c === quote) {
        quote = null;
      }
    } else if (c === '"' || c === "'") {
      quote = c;
      result += c;
    } else if (c === '/' && next === '/') {
      inLineComment = true;
      i++;
    } else if (c === '/' && next === '*') {
      inBlockComment = true;
      i++;
    } else {
      result += c;
    }
  }

  return result;
}
