/**
 * Scope list wire format
 *
 * Scope lists travel as a comma separated string. A comma or backslash that
 * belongs to a scope name is preceded by a backslash, so `a\,b,c` carries the
 * two scopes `a,b` and `c`.
 */

import { MalformedEscapeSequenceError } from './errors.js';

export const SCOPE_DELIMITER = ',';
export const SCOPE_ESCAPE = '\\';

const RESERVED_CHARS = /[,\\]/g;

/**
 * Escape the delimiter and the escape character within a single scope name.
 */
export function escapeScope(scope: string): string {
  return scope.replace(RESERVED_CHARS, (ch) => SCOPE_ESCAPE + ch);
}

/**
 * Join scope names into wire text, escaping each one.
 * Names are written in iteration order; pass a ScopeSet for canonical output.
 */
export function encodeScopes(scopes: Iterable<string>): string {
  const parts: string[] = [];
  for (const scope of scopes) {
    parts.push(escapeScope(scope));
  }
  return parts.join(SCOPE_DELIMITER);
}

/**
 * Split wire text on unescaped delimiters and unescape every piece.
 *
 * The pieces are returned raw (not canonicalized). The empty string yields no
 * pieces; any other input yields one more piece than it has unescaped
 * delimiters, so `"a,"` gives `["a", ""]`.
 *
 * @throws MalformedEscapeSequenceError when the input ends in a lone escape
 */
export function splitScopeList(text: string): string[] {
  if (text.length === 0) {
    return [];
  }

  const pieces: string[] = [];
  let current = '';

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === SCOPE_ESCAPE) {
      if (i + 1 >= text.length) {
        throw new MalformedEscapeSequenceError(text, i);
      }
      current += text[i + 1];
      i++;
    } else if (ch === SCOPE_DELIMITER) {
      pieces.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  pieces.push(current);

  return pieces;
}
