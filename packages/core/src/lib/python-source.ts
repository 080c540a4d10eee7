/**
 * @file src/lib/python-source.ts
 * @description Finds function and class docstrings in Python source without a Python runtime.
 *              A single character scanner skips comments and string literals, tracks bracket
 *              depth, and looks for a string-literal statement right after each `def`/`class`
 *              header colon. Docstrings are cleaned the way `inspect.cleandoc` does.
 */

export interface DiscoveredDocstring {
  name: string;
  kind: 'function' | 'class';
  /** 1-based line of the `def`/`class` keyword. */
  line: number;
  docstring: string;
}

interface PendingDefinition {
  name: string;
  kind: DiscoveredDocstring['kind'];
  line: number;
}

interface StringLiteral {
  /** Index just past the closing quote. */
  end: number;
  body: string;
  prefix: string;
}

const definitionRegex = /(?:async[ \t]+)?(def|class)[ \t]+([A-Za-z_]\w*)/y;
const literalStartRegex = /([rRuUbBfF]{0,2})('''|"""|'|")/y;

const TAB_SIZE = 8;

const expandTabs = (line: string): string => {
  let column = 0;
  let output = '';
  for (const char of line) {
    if (char === '\t') {
      const spaces = TAB_SIZE - (column % TAB_SIZE);
      output += ' '.repeat(spaces);
      column += spaces;
    } else {
      output += char;
      column += 1;
    }
  }
  return output;
};

/**
 * Dedents a raw docstring body: first line stripped, common indentation of the rest removed,
 * blank lines at both ends dropped.
 */
export const cleanDocstring = (raw: string): string => {
  const lines = raw.replace(/\r\n?/g, '\n').split('\n').map(expandTabs);
  const margin = lines
    .slice(1)
    .filter((line) => line.trim().length)
    .reduce((min, line) => Math.min(min, line.length - line.trimStart().length), Infinity);

  const cleaned = lines.map((line, index) => {
    if (index === 0) return line.trimStart();
    return Number.isFinite(margin) ? line.slice(margin) : line;
  });

  while (cleaned.length && !cleaned[0].trim().length) cleaned.shift();
  while (cleaned.length && !cleaned[cleaned.length - 1].trim().length) cleaned.pop();
  return cleaned.join('\n');
};

const ESCAPES: Record<string, string> = {
  '\\': '\\',
  "'": "'",
  '"': '"',
  n: '\n',
  t: '\t',
  r: '\r',
  '\n': '',
};

const unescape = (body: string): string => body.replace(/\\([\\'"ntr\n])/g, (_, char: string) => ESCAPES[char] ?? char);

/**
 * Reads the string literal starting at `start`, or returns `null` when none starts there.
 */
const readStringLiteral = (source: string, start: number): StringLiteral | null => {
  literalStartRegex.lastIndex = start;
  const match = literalStartRegex.exec(source);
  if (!match) {
    return null;
  }
  const [, prefix, quote] = match;
  const bodyStart = start + match[0].length;
  const triple = quote.length === 3;
  let i = bodyStart;
  while (i < source.length) {
    const char = source[i];
    if (char === '\\') {
      i += 2;
      continue;
    }
    if (!triple && char === '\n') {
      return { end: i, body: source.slice(bodyStart, i), prefix };
    }
    if (source.startsWith(quote, i)) {
      return { end: i + quote.length, body: source.slice(bodyStart, i), prefix };
    }
    i += 1;
  }
  return { end: source.length, body: source.slice(bodyStart), prefix };
};

const isIdentifierChar = (char: string | undefined): boolean =>
  char !== undefined && /\w/.test(char);

/**
 * Skips whitespace, newlines, line continuations and comments.
 */
const skipTrivia = (source: string, start: number): number => {
  let i = start;
  while (i < source.length) {
    const char = source[i];
    if (char === ' ' || char === '\t' || char === '\r' || char === '\n') {
      i += 1;
    } else if (char === '\\' && source[i + 1] === '\n') {
      i += 2;
    } else if (char === '#') {
      while (i < source.length && source[i] !== '\n') i += 1;
    } else {
      break;
    }
  }
  return i;
};

/**
 * A string literal is a docstring only when it forms the whole first statement of the body.
 */
const readDocstringAfter = (source: string, colon: number): string | null => {
  const start = skipTrivia(source, colon + 1);
  const literal = readStringLiteral(source, start);
  if (!literal || /[bBfF]/.test(literal.prefix)) {
    return null;
  }
  let i = literal.end;
  while (i < source.length && (source[i] === ' ' || source[i] === '\t')) i += 1;
  const next = source[i];
  if (next !== undefined && next !== '\n' && next !== '\r' && next !== '#' && next !== ';') {
    return null;
  }
  const raw = /[rR]/.test(literal.prefix) ? literal.body : unescape(literal.body);
  return cleanDocstring(raw);
};

const countNewlines = (text: string): number => text.split('\n').length - 1;

export const extractPythonDocstrings = (source: string): DiscoveredDocstring[] => {
  const text = source.replace(/\r\n?/g, '\n');
  const found: DiscoveredDocstring[] = [];
  let pending: PendingDefinition | null = null;
  let depth = 0;
  let line = 1;
  let atStatementStart = true;
  let i = 0;

  while (i < text.length) {
    const char = text[i];

    if (char === '\n') {
      line += 1;
      i += 1;
      if (depth === 0) atStatementStart = true;
      continue;
    }
    if (char === ' ' || char === '\t') {
      i += 1;
      continue;
    }
    if (char === '\\' && text[i + 1] === '\n') {
      line += 1;
      i += 2;
      continue;
    }
    if (char === '#') {
      while (i < text.length && text[i] !== '\n') i += 1;
      continue;
    }

    if (atStatementStart) {
      atStatementStart = false;
      definitionRegex.lastIndex = i;
      const match = definitionRegex.exec(text);
      if (match) {
        pending = { kind: match[1] === 'class' ? 'class' : 'function', name: match[2], line };
        i += match[0].length;
        continue;
      }
    }

    if (!isIdentifierChar(text[i - 1])) {
      const literal = readStringLiteral(text, i);
      if (literal) {
        line += countNewlines(text.slice(i, literal.end));
        i = literal.end;
        continue;
      }
    }

    if (char === '(' || char === '[' || char === '{') {
      depth += 1;
    } else if (char === ')' || char === ']' || char === '}') {
      depth = Math.max(0, depth - 1);
    } else if (char === ';' && depth === 0) {
      atStatementStart = true;
    } else if (char === ':' && depth === 0 && pending) {
      const docstring = readDocstringAfter(text, i);
      if (docstring !== null) {
        found.push({ ...pending, docstring });
      }
      pending = null;
      atStatementStart = true;
    }
    i += 1;
  }

  return found;
};
