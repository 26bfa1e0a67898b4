import { CALL_EXPRESSION, NESTED_PARENS } from '../patterns.js';

/**
 * Names of every call expression in `text`, in source order. Each call's argument list
 * is searched again, so `f(g(h(x)))` gives `f, g, h`; an argument list that never
 * closes runs to the end of the text.
 */
export function extractCallNames(text: string): string[] {
  const names: string[] = [];
  const callRe = new RegExp(CALL_EXPRESSION.source, 'g');
  let pos = 0;

  while (pos < text.length) {
    callRe.lastIndex = pos;
    const match = callRe.exec(text);
    const name = match?.[1];
    if (!match || name === undefined) break;

    const openParen = match.index + match[0].length - 1;
    const close = NESTED_PARENS.matchAt(text, openParen);
    const argsEnd = close === null ? text.length : close - 1;

    names.push(name);
    names.push(...extractCallNames(text.slice(openParen + 1, argsEnd)));
    pos = close ?? text.length;
  }

  return names;
}
