/**
 * Lexer tests: token kinds, payloads, positions and scan errors.
 */

import { tokenize } from '../src/lexer';
import { AkiLexError } from '../src/errors';
import { describeToken, Token } from '../src/tokens';

function kinds(source: string): string[] {
  return tokenize(source).map(t => t.kind);
}

describe('Lexer', () => {
  test('empty input yields no tokens', () => {
    expect(tokenize('')).toEqual([]);
    expect(tokenize('   \n\t  ')).toEqual([]);
  });

  test('variable declaration', () => {
    expect(kinds('let x: i32 = 7;')).toEqual(['let', 'identifier', ':', 'i32', '=', 'integer', ';']);
  });

  test('literal payloads', () => {
    const [int, float, str, t, f] = tokenize('42 3.5 "hi" true false');
    expect(int).toEqual({ kind: 'integer', value: 42, line: 1, column: 1 });
    expect(float).toEqual({ kind: 'float', value: 3.5, line: 1, column: 4 });
    expect(str).toEqual({ kind: 'string', value: 'hi', line: 1, column: 8 });
    expect(t).toEqual({ kind: 'bool', value: true, line: 1, column: 13 });
    expect(f).toEqual({ kind: 'bool', value: false, line: 1, column: 18 });
  });

  test('type keywords bool and string are distinct from literals', () => {
    expect(kinds('bool string dyn')).toEqual(['type_bool', 'type_string', 'dyn']);
  });

  test('operators are matched greedily', () => {
    expect(kinds('-> ++ += -- -= == != <= >= && || ::')).toEqual([
      '->', '++', '+=', '--', '-=', '==', '!=', '<=', '>=', '&&', '||', '::',
    ]);
    expect(kinds('a+b')).toEqual(['identifier', '+', 'identifier']);
  });

  test('ownership markers and attributes', () => {
    expect(kinds('~i32 @string #weak #sync #own #actor')).toEqual([
      'tilde', 'i32', 'at', 'type_string', 'attr_weak', 'attr_sync', 'attr_own', 'attr_actor',
    ]);
  });

  test('concurrency and collection keywords', () => {
    expect(kinds('channel send recv async await Vec HashMap')).toEqual([
      'channel', 'send', 'recv', 'async', 'await', 'Vec', 'HashMap',
    ]);
  });

  test('line comments are skipped', () => {
    expect(kinds('let x = 1; // trailing\n// whole line\nx')).toEqual([
      'let', 'identifier', '=', 'integer', ';', 'identifier',
    ]);
  });

  test('positions track lines and columns', () => {
    const tokens = tokenize('let a = 1;\n  a');
    const last = tokens[tokens.length - 1];
    expect(last).toEqual({ kind: 'identifier', value: 'a', line: 2, column: 3 });
  });

  test('string escapes', () => {
    const [token] = tokenize('"a\\nb\\t\\"c\\\\"');
    expect(token).toEqual({ kind: 'string', value: 'a\nb\t"c\\', line: 1, column: 1 });
  });

  test('identifiers may contain digits and underscores', () => {
    const [token] = tokenize('_foo_2');
    expect(token).toEqual({ kind: 'identifier', value: '_foo_2', line: 1, column: 1 });
  });

  test('integer literal outside i32 is rejected', () => {
    expect(() => tokenize('2147483648')).toThrow(AkiLexError);
    expect(() => tokenize('2147483648')).toThrow(
      'LexError [line 1, col 1]: integer literal 2147483648 does not fit in i32',
    );
    expect(tokenize('2147483647')).toEqual([{ kind: 'integer', value: 2147483647, line: 1, column: 1 }]);
  });

  test('unterminated string', () => {
    expect(() => tokenize('let s = "abc')).toThrow('LexError [line 1, col 9]: unterminated string literal');
  });

  test('invalid character', () => {
    expect(() => tokenize('let $x = 1;')).toThrow("LexError [line 1, col 5]: invalid character '$'");
  });

  test('unknown attribute', () => {
    expect(() => tokenize('#fast func f() {}')).toThrow("LexError [line 1, col 1]: unknown attribute '#fast'");
  });

  test('lex errors expose their position', () => {
    try {
      tokenize('\n\n   ^');
      throw new Error('expected a lex error');
    } catch (e) {
      expect(e).toBeInstanceOf(AkiLexError);
      if (e instanceof AkiLexError) {
        expect(e.line).toBe(3);
        expect(e.column).toBe(4);
      }
    }
  });
});

describe('describeToken', () => {
  test('renders tokens for error messages', () => {
    const first = (source: string): Token => tokenize(source)[0];
    expect(describeToken(first('foo'))).toBe("identifier 'foo'");
    expect(describeToken(first(';'))).toBe("';'");
    expect(describeToken(first('"x"'))).toBe('"x"');
    expect(describeToken(first('12'))).toBe('12');
    expect(describeToken(first('bool'))).toBe("'bool'");
    expect(describeToken(first('~'))).toBe("'~'");
  });
});
