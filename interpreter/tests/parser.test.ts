/**
 * Parser tests. Most assertions go through astToSExpr so that tree shape
 * and precedence read at a glance.
 */

import { MAX_NESTING_DEPTH, parseSource, Parser } from '../src/parser';
import { astToSExpr, AstNode, isNodeKind, typeToString } from '../src/ast';
import { tokenize } from '../src/lexer';
import { AkiSyntaxError } from '../src/errors';

function sexprs(source: string): string[] {
  return parseSource(source).map(astToSExpr);
}

function single(source: string): AstNode {
  const nodes = parseSource(source);
  expect(nodes).toHaveLength(1);
  return nodes[0];
}

describe('Parser', () => {
  // ==================================================================
  // Declarations
  // ==================================================================

  test('empty token list yields an empty program', () => {
    expect(new Parser([]).parse()).toEqual([]);
  });

  test('function declaration followed by a call', () => {
    expect(sexprs('func add(x: i32, y: i32) -> i32 { x + y } add(5, 3);')).toEqual([
      '(func add (x: i32, y: i32) -> i32 (block (+ x y)))',
      '(call add 5 3)',
    ]);
  });

  test('typed variable declaration', () => {
    const node = single('let x: i32 = 7;');
    expect(node).toEqual({
      kind: 'variable_decl',
      name: 'x',
      typeAnnotation: { kind: 'primitive', name: 'i32' },
      initializer: { kind: 'integer', value: 7 },
      ownership: null,
    });
  });

  test('declaration without initializer', () => {
    expect(sexprs('let y;')).toEqual(['(let y)']);
  });

  test('ownership comes from the type annotation', () => {
    const unique = single('let p: ~i32 = 1;');
    const shared = single('let q: @string = "s";');
    expect(isNodeKind(unique, 'variable_decl') && unique.ownership).toBe('unique');
    expect(isNodeKind(shared, 'variable_decl') && shared.ownership).toBe('shared');
  });

  test('collection types', () => {
    expect(sexprs('let m: HashMap<string, Vec<i32>> = hashmap();')).toEqual([
      '(let m : HashMap<string, Vec<i32>> (call hashmap))',
    ]);
  });

  test('modifiers before and after func', () => {
    const [first, second] = parseSource('#sync async func f() {} func #weak g() {}');
    if (!isNodeKind(first, 'function_decl') || !isNodeKind(second, 'function_decl')) {
      throw new Error('expected two function declarations');
    }
    expect(first.attributes).toEqual(['sync']);
    expect(first.isAsync).toBe(true);
    expect(second.attributes).toEqual(['weak']);
    expect(second.isAsync).toBe(false);
  });

  test('function without parameters or return type', () => {
    expect(sexprs('func main() { println("hi"); }')).toEqual(['(func main () (block (call println "hi")))']);
  });

  // ==================================================================
  // Expressions
  // ==================================================================

  test('multiplication binds tighter than addition', () => {
    expect(sexprs('1 + 2 * 3')).toEqual(['(+ 1 (* 2 3))']);
    expect(sexprs('(1 + 2) * 3')).toEqual(['(* (+ 1 2) 3)']);
  });

  test('binary operators are left-associative', () => {
    expect(sexprs('1 - 2 - 3')).toEqual(['(- (- 1 2) 3)']);
    expect(sexprs('8 / 4 % 3')).toEqual(['(% (/ 8 4) 3)']);
  });

  test('full precedence ladder', () => {
    expect(sexprs('a || b && c == d < e + f * -g')).toEqual([
      '(|| a (&& b (== c (< d (+ e (* f (- g)))))))',
    ]);
  });

  test('assignment is right-associative', () => {
    expect(sexprs('a = b = 1')).toEqual(['(= a (= b 1))']);
  });

  test('compound assignment operators', () => {
    expect(sexprs('x += 2; x -= 3;')).toEqual(['(+= x 2)', '(-= x 3)']);
  });

  test('postfix increment and decrement carry an integer one', () => {
    const node = single('x++;');
    expect(node).toEqual({
      kind: 'compound_assign',
      operator: 'Inc',
      target: { kind: 'identifier', name: 'x' },
      value: { kind: 'integer', value: 1 },
    });
    expect(sexprs('x--')).toEqual(['(-- x 1)']);
  });

  test('prefix increment is a unary operator', () => {
    expect(single('++x')).toEqual({ kind: 'unary_op', operator: 'Inc', operand: { kind: 'identifier', name: 'x' } });
    expect(sexprs('!done')).toEqual(['(! done)']);
  });

  test('vector literals and chained indexing', () => {
    expect(sexprs('[1, 2.0, "s"]')).toEqual(['(vec 1 2.0 "s")']);
    expect(sexprs('[]')).toEqual(['(vec)']);
    expect(sexprs('v[0][1]')).toEqual(['(index (index v 0) 1)']);
  });

  test('any identifier followed by ( is a call', () => {
    expect(sexprs('no_such_function(1, true)')).toEqual(['(call no_such_function 1 true)']);
  });

  test('blocks are expressions', () => {
    expect(sexprs('let y = { 1; 2 };')).toEqual(['(let y (block 1 2))']);
  });

  test('if / else if / else', () => {
    expect(sexprs('if x < 1 { 0 } else if x < 2 { 1 } else { 2 }')).toEqual([
      '(if (< x 1) (block 0) (if (< x 2) (block 1) (block 2)))',
    ]);
  });

  test('if as an initializer', () => {
    expect(sexprs('let s = if ok { "y" } else { "n" };')).toEqual(['(let s (if ok (block "y") (block "n")))']);
  });

  test('while loop', () => {
    expect(sexprs('while i < 3 { i += 1; }')).toEqual(['(while (< i 3) (block (+= i 1)))']);
  });

  test('concurrency forms parse', () => {
    expect(sexprs('let ch = channel(); let c2 = channel; send(ch, 1); recv(ch); await f()')).toEqual([
      '(let ch (channel))',
      '(let c2 (channel))',
      '(send ch 1)',
      '(recv ch)',
      '(await (call f))',
    ]);
  });

  test('semicolons after expressions are optional', () => {
    expect(sexprs('1; 2 3')).toEqual(['1', '2', '3']);
  });

  test('nodes are frozen', () => {
    const node = single('let x = [1];');
    expect(Object.isFrozen(node)).toBe(true);
    if (isNodeKind(node, 'variable_decl') && node.initializer !== null) {
      expect(Object.isFrozen(node.initializer)).toBe(true);
    }
  });

  test('parser accepts a pre-scanned token list', () => {
    const nodes = new Parser(tokenize('1 + 1')).parse();
    expect(nodes.map(astToSExpr)).toEqual(['(+ 1 1)']);
  });

  // ==================================================================
  // Errors
  // ==================================================================

  test('missing initializer expression', () => {
    expect(() => parseSource('let x: i32 = ;')).toThrow(AkiSyntaxError);
    expect(() => parseSource('let x: i32 = ;')).toThrow(
      "SyntaxError [line 1, col 14]: unexpected token in expression, got ';'",
    );
  });

  test('missing name after let', () => {
    expect(() => parseSource('let = 5;')).toThrow("SyntaxError [line 1, col 5]: expected identifier after 'let', got '='");
  });

  test('missing semicolon at end of input reports the last token', () => {
    expect(() => parseSource('let x = 1')).toThrow(
      "SyntaxError [line 1, col 9]: expected ';' after variable declaration, got end of input",
    );
  });

  test('unclosed block', () => {
    expect(() => parseSource('{ 1')).toThrow("SyntaxError [line 1, col 3]: expected '}' to close block, got end of input");
  });

  test('parameter without a type', () => {
    expect(() => parseSource('func f(a) {}')).toThrow("SyntaxError [line 1, col 9]: expected ':' after parameter 'a', got ')'");
  });

  test('arguments without a comma', () => {
    expect(() => parseSource('f(1 2)')).toThrow(
      "SyntaxError [line 1, col 5]: expected ',' between arguments in call to 'f', got 2",
    );
  });

  test('modifiers must precede a function', () => {
    expect(() => parseSource('#own let x = 1;')).toThrow(
      "SyntaxError [line 1, col 6]: expected 'func' after modifiers, got 'let'",
    );
  });

  test('nesting past the limit is a syntax error', () => {
    const depth = MAX_NESTING_DEPTH + 1;
    const parens = '('.repeat(depth) + '1' + ')'.repeat(depth);
    expect(() => parseSource(parens)).toThrow(AkiSyntaxError);
    expect(() => parseSource(parens)).toThrow(`nesting deeper than ${MAX_NESTING_DEPTH} levels, got '('`);
    expect(() => parseSource('!'.repeat(depth) + 'true')).toThrow(AkiSyntaxError);
    expect(() => parseSource('{'.repeat(depth) + '}'.repeat(depth))).toThrow(AkiSyntaxError);
  });

  test('moderate nesting parses', () => {
    expect(sexprs('('.repeat(50) + '1' + ')'.repeat(50))).toEqual(['1']);
  });

  test('type annotations are frozen', () => {
    const decl = single('let v: Vec<~i32>;');
    if (!isNodeKind(decl, 'variable_decl') || decl.typeAnnotation === null) {
      throw new Error('expected a typed variable declaration');
    }
    const type = decl.typeAnnotation;
    expect(Object.isFrozen(type)).toBe(true);
    if (type.kind !== 'vec') throw new Error('expected a Vec type');
    expect(Object.isFrozen(type.element)).toBe(true);
  });
});

describe('typeToString', () => {
  test('renders nested types', () => {
    expect(typeToString({ kind: 'unique', inner: { kind: 'primitive', name: 'i32' } })).toBe('~i32');
    expect(typeToString({ kind: 'shared', inner: { kind: 'vec', element: { kind: 'primitive', name: 'f64' } } })).toBe(
      '@Vec<f64>',
    );
  });
});
