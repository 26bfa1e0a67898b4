// Balanced-delimiter matching and the C/C++ name, signature and call patterns built on it.
//
// Every pattern comes in two forms: a scanner used in process, and a PCRE source
// string (recursive groups via `(?-1)`) handed to external grep tools. Both forms
// accept the same language.

export type Span = {
  start: number;
  end: number; // exclusive
};

export type BalancedPattern = {
  open: string;
  close: string;
  pcre: string;
  /** Index just past the delimiter that closes `text[start]`, or null when it never closes. */
  matchAt(text: string, start: number): number | null;
};

function isWordChar(ch: string | undefined): boolean {
  if (ch === undefined) return false;
  const c = ch.charCodeAt(0);
  return (c >= 48 && c <= 57) || (c >= 65 && c <= 90) || (c >= 97 && c <= 122) || c === 95;
}

function isIdentifierStart(ch: string | undefined): boolean {
  return isWordChar(ch) && !(ch !== undefined && ch >= '0' && ch <= '9');
}

function isWhitespace(ch: string | undefined): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r' || ch === '\f' || ch === '\v';
}

export function skipWhitespace(text: string, start: number): number {
  let i = start;
  while (isWhitespace(text[i])) i += 1;
  return i;
}

function pcreBalanced(open: string, close: string, others: string): string {
  const simpleCase = `${others}${open}${others}${close}${others}`;
  const recursiveCase = `${others}${open}(?-1)*${close}${others}`;
  const nested = `(${recursiveCase}|${simpleCase})`;
  return `(?:${open}${others}${nested}*${others}${close})`;
}

export function balanced(open: string, close: string, pcre: { open: string; close: string; others: string }): BalancedPattern {
  return {
    open,
    close,
    pcre: pcreBalanced(pcre.open, pcre.close, pcre.others),
    matchAt(text: string, start: number): number | null {
      if (text[start] !== open) return null;
      let depth = 0;
      for (let i = start; i < text.length; i += 1) {
        const ch = text[i];
        if (ch === open) depth += 1;
        else if (ch === close) {
          depth -= 1;
          if (depth === 0) return i + 1;
        }
      }
      return null;
    },
  };
}

export const NESTED_PARENS = balanced('(', ')', { open: '\\(', close: '\\)', others: '[^()]*' });
export const NESTED_BRACES = balanced('{', '}', { open: '{', close: '}', others: '[^{}]*' });
export const NESTED_ANGLES = balanced('<', '>', { open: '\\<', close: '\\>', others: '[^><]*' });

const IDENTIFIER_PCRE = '\\b[A-Za-z_]\\w*\\b';
export const QUALIFIED_NAME_PCRE = `(?::{2})?(?:${IDENTIFIER_PCRE}(?::{2}))*${IDENTIFIER_PCRE}`;

/** Line-anchored definition pattern, the form grep tools search the corpus with. */
export const FUNCTION_DEFINITION_PCRE = `^.*?(${QUALIFIED_NAME_PCRE})\\s*${NESTED_PARENS.pcre}\\s*${NESTED_BRACES.pcre}`;

/** `name(` with the argument list left open; nesting is resolved by the callee extraction. */
export const CALL_EXPRESSION = /((?:::)?(?:\b[A-Za-z_]\w*::)*\b[A-Za-z_]\w*)\s*\(/g;

function matchIdentifier(text: string, start: number): number | null {
  if (!isIdentifierStart(text[start])) return null;
  let i = start + 1;
  while (isWordChar(text[i])) i += 1;
  return i;
}

export type NameMatch = {
  name: string;
  start: number;
  end: number;
};

export function matchQualifiedName(text: string, start: number): NameMatch | null {
  let i = start;
  if (text.startsWith('::', i)) {
    i += 2;
  } else if (isWordChar(text[i - 1])) {
    return null;
  }

  for (;;) {
    const identEnd = matchIdentifier(text, i);
    if (identEnd === null) return null;
    if (text.startsWith('::', identEnd) && matchIdentifier(text, identEnd + 2) !== null) {
      i = identEnd + 2;
      continue;
    }
    return { name: text.slice(start, identEnd), start, end: identEnd };
  }
}

/** `: id(args), id(args)` after a constructor's parameter list; returns the index after trailing whitespace. */
export function matchInitializerList(text: string, start: number): number | null {
  let i = skipWhitespace(text, start);
  if (text[i] !== ':' || text[i + 1] === ':') return null;
  i = skipWhitespace(text, i + 1);

  for (;;) {
    const nameEnd = matchIdentifier(text, i);
    if (nameEnd === null) return null;
    const argsEnd = NESTED_PARENS.matchAt(text, skipWhitespace(text, nameEnd));
    if (argsEnd === null) return null;
    const after = skipWhitespace(text, argsEnd);
    if (text[after] !== ',') return after;
    i = skipWhitespace(text, after + 1);
  }
}

export type DefinitionMatch = {
  name: string;
  start: number;
  end: number;
};

export type DefinitionMatchOptions = {
  initializerList?: boolean;
};

export function matchDefinitionAt(text: string, start: number, options: DefinitionMatchOptions = {}): DefinitionMatch | null {
  const name = matchQualifiedName(text, start);
  if (!name) return null;

  const paramsEnd = NESTED_PARENS.matchAt(text, skipWhitespace(text, name.end));
  if (paramsEnd === null) return null;

  let bodyStart = skipWhitespace(text, paramsEnd);
  if (options.initializerList && text[bodyStart] === ':') {
    const listEnd = matchInitializerList(text, paramsEnd);
    if (listEnd !== null) bodyStart = listEnd;
  }

  const bodyEnd = NESTED_BRACES.matchAt(text, bodyStart);
  if (bodyEnd === null) return null;
  return { name: name.name, start, end: bodyEnd };
}

/**
 * Spans matched by FUNCTION_DEFINITION_PCRE in multiline mode: each match starts at a
 * line start, its name starts on that line, and the next search resumes on the line
 * after the match ends.
 */
export function findDefinitionSpans(text: string): Span[] {
  const spans: Span[] = [];
  let lineStart = 0;

  while (lineStart < text.length) {
    const newline = text.indexOf('\n', lineStart);
    const lineEnd = newline === -1 ? text.length : newline;

    let match: DefinitionMatch | null = null;
    for (let p = lineStart; p < lineEnd && !match; p += 1) {
      match = matchDefinitionAt(text, p);
    }

    if (!match) {
      lineStart = lineEnd + 1;
      continue;
    }

    spans.push({ start: lineStart, end: match.end });
    const next = text.indexOf('\n', match.end);
    lineStart = next === -1 ? text.length : next + 1;
  }

  return spans;
}

/** First definition name in a merged span (the capturing form), or null. */
export function captureDefinitionName(text: string): string | null {
  for (let p = 0; p < text.length; p += 1) {
    const match = matchDefinitionAt(text, p, { initializerList: true });
    if (match) return match.name;
  }
  return null;
}

export function simpleNameOf(name: string): string {
  const match = /(\w+)$/.exec(name);
  return match?.[1] ?? name;
}
