/**
 * Token definitions for the Aki scanner.
 */

export type TokenKind =
  // ---- Literals ----
  | 'integer'
  | 'float'
  | 'string'
  | 'bool'
  | 'identifier'

  // ---- Keywords ----
  | 'let'
  | 'func'
  | 'if'
  | 'else'
  | 'while'
  | 'for'
  | 'in'
  | 'return'
  | 'mod'
  | 'pub'
  | 'use'
  | 'struct'
  | 'impl'
  | 'async'
  | 'await'

  // ---- Concurrency ----
  | 'channel'
  | 'send'
  | 'recv'

  // ---- Collections ----
  | 'Vec'
  | 'HashMap'

  // ---- Type keywords ----
  | 'i8'
  | 'i16'
  | 'i32'
  | 'i64'
  | 'u8'
  | 'u16'
  | 'u32'
  | 'u64'
  | 'f32'
  | 'f64'
  | 'type_bool'
  | 'type_string'
  | 'dyn'

  // ---- Ownership and attributes ----
  | 'tilde'
  | 'at'
  | 'attr_weak'
  | 'attr_sync'
  | 'attr_own'
  | 'attr_actor'

  // ---- Operators and delimiters ----
  | '+'
  | '++'
  | '+='
  | '-'
  | '--'
  | '-='
  | '->'
  | '*'
  | '/'
  | '%'
  | '='
  | '=='
  | '!='
  | '<'
  | '>'
  | '<='
  | '>='
  | '&&'
  | '||'
  | '!'
  | '('
  | ')'
  | '{'
  | '}'
  | '['
  | ']'
  | ','
  | '.'
  | ':'
  | '::'
  | ';';

export type Token =
  | { kind: 'integer'; value: number; line: number; column: number }
  | { kind: 'float'; value: number; line: number; column: number }
  | { kind: 'string'; value: string; line: number; column: number }
  | { kind: 'bool'; value: boolean; line: number; column: number }
  | { kind: 'identifier'; value: string; line: number; column: number }
  | { kind: Exclude<TokenKind, 'integer' | 'float' | 'string' | 'bool' | 'identifier'>; line: number; column: number };

/** Token kinds that carry no payload. */
export type PlainTokenKind = Exclude<TokenKind, 'integer' | 'float' | 'string' | 'bool' | 'identifier'>;

/**
 * Reserved words. Anything else matching the identifier pattern is an identifier.
 */
export const KEYWORDS: ReadonlyMap<string, PlainTokenKind> = new Map<string, PlainTokenKind>([
  ['let', 'let'],
  ['func', 'func'],
  ['if', 'if'],
  ['else', 'else'],
  ['while', 'while'],
  ['for', 'for'],
  ['in', 'in'],
  ['return', 'return'],
  ['mod', 'mod'],
  ['pub', 'pub'],
  ['use', 'use'],
  ['struct', 'struct'],
  ['impl', 'impl'],
  ['async', 'async'],
  ['await', 'await'],
  ['channel', 'channel'],
  ['send', 'send'],
  ['recv', 'recv'],
  ['Vec', 'Vec'],
  ['HashMap', 'HashMap'],
  ['i8', 'i8'],
  ['i16', 'i16'],
  ['i32', 'i32'],
  ['i64', 'i64'],
  ['u8', 'u8'],
  ['u16', 'u16'],
  ['u32', 'u32'],
  ['u64', 'u64'],
  ['f32', 'f32'],
  ['f64', 'f64'],
  ['bool', 'type_bool'],
  ['string', 'type_string'],
  ['dyn', 'dyn'],
]);

export const ATTRIBUTES: ReadonlyMap<string, PlainTokenKind> = new Map<string, PlainTokenKind>([
  ['weak', 'attr_weak'],
  ['sync', 'attr_sync'],
  ['own', 'attr_own'],
  ['actor', 'attr_actor'],
]);

/**
 * Render a token the way it appears in source, for error messages.
 */
export function describeToken(token: Token): string {
  switch (token.kind) {
    case 'integer':
    case 'float':
      return String(token.value);
    case 'string':
      return JSON.stringify(token.value);
    case 'bool':
      return String(token.value);
    case 'identifier':
      return `identifier '${token.value}'`;
    case 'type_bool': return "'bool'";
    case 'type_string': return "'string'";
    case 'tilde': return "'~'";
    case 'at': return "'@'";
    case 'attr_weak': return "'#weak'";
    case 'attr_sync': return "'#sync'";
    case 'attr_own': return "'#own'";
    case 'attr_actor': return "'#actor'";
    default:
      return `'${token.kind}'`;
  }
}
