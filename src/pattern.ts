/**
 * OSC address pattern matching
 *
 *   ?         any single character except '/'
 *   *         zero or more characters, never crossing '/'
 *   [abc]     one character from the set; 'a-z' ranges; '!' or '^' negates
 *   {foo,bar} any of the comma-separated alternatives (may nest, may be empty)
 *
 * Everything else matches itself, case-sensitively. The pattern and the path
 * must both be consumed completely.
 *
 * Matching walks the pattern directly with backtracking rather than going
 * through RegExp. Some patterns are exponential in the worst case; recursion
 * is capped at MAX_MATCH_DEPTH and anything deeper counts as a miss.
 */

import { OscError } from './errors';

export const MAX_MATCH_DEPTH = 256;

const SPECIAL_CHARS = /[?*[\]{}]/;

export function matchPattern(pattern: string, path: string): boolean {
  return matchFrom(pattern, 0, path, 0, 0);
}

function matchFrom(pattern: string, pi: number, path: string, si: number, depth: number): boolean {
  if (depth > MAX_MATCH_DEPTH) return false;

  while (pi < pattern.length) {
    const c = pattern[pi];

    switch (c) {
      case '?': {
        if (si >= path.length || path[si] === '/') return false;
        pi++;
        si++;
        break;
      }

      case '*': {
        while (pattern[pi] === '*') pi++;
        // Try every span from empty up to the next '/'
        for (let k = si; ; k++) {
          if (matchFrom(pattern, pi, path, k, depth + 1)) return true;
          if (k >= path.length || path[k] === '/') return false;
        }
      }

      case '[': {
        const negate = pattern[pi + 1] === '!' || pattern[pi + 1] === '^';
        const start = negate ? pi + 2 : pi + 1;
        const end = closingBracket(pattern, pi);
        if (end === -1) return false;
        if (si >= path.length || path[si] === '/') return false;
        if (inCharClass(pattern.slice(start, end), path[si]) === negate) return false;
        pi = end + 1;
        si++;
        break;
      }

      case '{': {
        const end = closingBrace(pattern, pi);
        if (end === -1) return false;
        const rest = pattern.slice(end + 1);
        for (const alternative of splitAlternatives(pattern.slice(pi + 1, end))) {
          if (matchFrom(alternative + rest, 0, path, si, depth + 1)) return true;
        }
        return false;
      }

      default: {
        if (si >= path.length || path[si] !== c) return false;
        pi++;
        si++;
      }
    }
  }

  return si === path.length;
}

function inCharClass(set: string, ch: string): boolean {
  let i = 0;
  while (i < set.length) {
    if (set[i + 1] === '-' && i + 2 < set.length) {
      if (ch >= set[i] && ch <= set[i + 2]) return true;
      i += 3;
    } else {
      if (ch === set[i]) return true;
      i++;
    }
  }
  return false;
}

/** Index of the ']' closing the '[' at `open`, or -1 */
function closingBracket(pattern: string, open: number): number {
  let start = open + 1;
  if (pattern[start] === '!' || pattern[start] === '^') start++;
  return pattern.indexOf(']', start);
}

/** Index of the '}' closing the '{' at `open`, or -1. Classes are skipped whole. */
function closingBrace(pattern: string, open: number): number {
  let depth = 0;
  for (let i = open; i < pattern.length; i++) {
    const c = pattern[i];
    if (c === '[') {
      i = closingBracket(pattern, i);
      if (i === -1) return -1;
    } else if (c === '{') {
      depth++;
    } else if (c === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/** Split on commas outside nested {...} and [...] */
function splitAlternatives(body: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < body.length; i++) {
    const c = body[i];
    if (c === '[') {
      const end = closingBracket(body, i);
      if (end === -1) break;
      i = end;
    } else if (c === '{') {
      depth++;
    } else if (c === '}') {
      depth--;
    } else if (c === ',' && depth === 0) {
      parts.push(body.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(body.slice(start));
  return parts;
}

/** True when the pattern has no wildcard syntax at all */
export function isLiteralPattern(pattern: string): boolean {
  return !SPECIAL_CHARS.test(pattern);
}

/**
 * Reject patterns whose brackets or braces do not balance.
 * Throws PatternError naming the offending position.
 */
export function validatePattern(pattern: string): void {
  let inClass = false;
  let braces = 0;

  for (let i = 0; i < pattern.length; i++) {
    const c = pattern[i];
    if (inClass) {
      if (c === ']') inClass = false;
      continue;
    }
    if (c === '[') {
      inClass = true;
    } else if (c === ']') {
      throw patternError(pattern, `unmatched ']' at ${i}`);
    } else if (c === '{') {
      braces++;
    } else if (c === '}') {
      if (braces === 0) throw patternError(pattern, `unmatched '}' at ${i}`);
      braces--;
    }
  }

  if (inClass) throw patternError(pattern, "unterminated '['");
  if (braces > 0) throw patternError(pattern, "unterminated '{'");
}

function patternError(pattern: string, detail: string): OscError {
  return new OscError('PatternError', `Invalid address pattern ${JSON.stringify(pattern)}: ${detail}`, { pattern });
}

export interface CompiledPattern {
  readonly source: string;
  readonly literal: boolean;
  matches(path: string): boolean;
}

/** Validate once, match many times. Literal patterns skip the matcher. */
export function compilePattern(pattern: string): CompiledPattern {
  validatePattern(pattern);
  const literal = isLiteralPattern(pattern);
  return {
    source: pattern,
    literal,
    matches: literal ? (path) => path === pattern : (path) => matchPattern(pattern, path),
  };
}
