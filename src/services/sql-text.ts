/**
 * Quote- and bracket-aware scanning shared by the SQL sanitizer and the
 * result parser.
 */

export interface ScanOptions {
  /** Treat `\x` inside a quoted string as an escaped character */
  backslashEscapes?: boolean;
}

const OPENERS = new Set(['(', '[', '{']);
const CLOSERS = new Set([')', ']', '}']);

/**
 * Walk `text`, invoking `visit` for every character outside a quoted
 * string together with the bracket depth before that character.
 * `visit` returns `false` to stop early.
 *
 * Both quote characters are recognized; a doubled quote inside a string
 * is an escaped quote.
 *
 * @returns true when the whole text was walked with all quotes closed and
 * brackets balanced (or the walk was stopped before an imbalance)
 */
export function walkTopLevel(
  text: string,
  visit: (char: string, index: number, depth: number) => boolean | void,
  options: ScanOptions = {}
): boolean {
  let depth = 0;
  let quote: string | null = null;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (quote !== null) {
      if (options.backslashEscapes && char === '\\') {
        i++;
      } else if (char === quote) {
        if (text[i + 1] === quote) {
          i++;
        } else {
          quote = null;
        }
      }
      continue;
    }

    if (visit(char, i, depth) === false) {
      return true;
    }

    if (char === "'" || char === '"') {
      quote = char;
    } else if (OPENERS.has(char)) {
      depth++;
    } else if (CLOSERS.has(char)) {
      depth--;
      if (depth < 0) {
        return false;
      }
    }
  }

  return quote === null && depth === 0;
}

/**
 * Split on `separator` where it appears outside quotes and brackets.
 *
 * @returns the parts, untrimmed, or null when quotes or brackets are unbalanced
 */
export function splitTopLevel(
  text: string,
  separator: string,
  options: ScanOptions = {}
): string[] | null {
  const parts: string[] = [];
  let start = 0;

  const balanced = walkTopLevel(
    text,
    (char, index, depth) => {
      if (depth === 0 && char === separator) {
        parts.push(text.slice(start, index));
        start = index + 1;
      }
    },
    options
  );

  if (!balanced) {
    return null;
  }
  parts.push(text.slice(start));
  return parts;
}

/**
 * Index of the first `char` outside quotes and brackets, or -1.
 */
export function indexOfTopLevel(text: string, char: string, options: ScanOptions = {}): number {
  let found = -1;
  walkTopLevel(
    text,
    (c, index, depth) => {
      if (depth === 0 && c === char) {
        found = index;
        return false;
      }
    },
    options
  );
  return found;
}

/**
 * Replace the contents of quoted strings with spaces, keeping the quotes
 * and every offset intact. Keyword checks run on the masked text.
 */
export function maskStringLiterals(sql: string): string {
  const chars = sql.split('');
  let quote: string | null = null;

  for (let i = 0; i < chars.length; i++) {
    const char = chars[i];
    if (quote === null) {
      if (char === "'" || char === '"') {
        quote = char;
      }
      continue;
    }
    if (char === quote) {
      if (chars[i + 1] === quote) {
        chars[i] = ' ';
        chars[i + 1] = ' ';
        i++;
        continue;
      }
      quote = null;
      continue;
    }
    chars[i] = ' ';
  }

  return chars.join('');
}

/**
 * Remove `--` line comments and `/* *\/` block comments outside string literals.
 */
export function stripSqlComments(sql: string): string {
  let out = '';
  let quote: string | null = null;

  for (let i = 0; i < sql.length; i++) {
    const char = sql[i];

    if (quote !== null) {
      out += char;
      if (char === quote) {
        quote = null;
      }
      continue;
    }

    if (char === "'" || char === '"') {
      quote = char;
      out += char;
    } else if (char === '-' && sql[i + 1] === '-') {
      const end = sql.indexOf('\n', i);
      if (end === -1) {
        break;
      }
      i = end - 1;
    } else if (char === '/' && sql[i + 1] === '*') {
      const end = sql.indexOf('*/', i + 2);
      out += ' ';
      if (end === -1) {
        break;
      }
      i = end + 1;
    } else {
      out += char;
    }
  }

  return out;
}
