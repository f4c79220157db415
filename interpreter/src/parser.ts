/**
 * Parser module: predictive recursive descent over the token list.
 *
 * One token of lookahead, no backtracking and no error recovery. The
 * first mismatch aborts the parse with an AkiSyntaxError naming the
 * offending token.
 *
 * Precedence, lowest first:
 *   assignment (= += -= and postfix ++ --)
 *   ||
 *   &&
 *   == !=
 *   < > <= >=
 *   + -
 *   * / %
 *   prefix - ! ++ -- await
 *   postfix [index]
 *   primary
 */

import {
  AkiType,
  AstNode,
  Attribute,
  Block,
  FunctionDecl,
  Operator,
  Ownership,
  Param,
  PrimitiveTypeName,
  UnaryOperator,
  VariableDecl,
} from './ast';
import { AkiSyntaxError } from './errors';
import { tokenize } from './lexer';
import { PlainTokenKind, Token, TokenKind, describeToken } from './tokens';

const PRIMITIVE_TYPES: ReadonlyMap<TokenKind, PrimitiveTypeName> = new Map<TokenKind, PrimitiveTypeName>([
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
  ['type_bool', 'bool'],
  ['type_string', 'string'],
  ['dyn', 'dyn'],
]);

const MODIFIERS: ReadonlyMap<TokenKind, Attribute | 'async'> = new Map<TokenKind, Attribute | 'async'>([
  ['attr_weak', 'weak'],
  ['attr_sync', 'sync'],
  ['attr_own', 'own'],
  ['attr_actor', 'actor'],
  ['async', 'async'],
]);

const EQUALITY_OPS: ReadonlyMap<TokenKind, Operator> = new Map<TokenKind, Operator>([
  ['==', 'Eq'],
  ['!=', 'NotEq'],
]);

const COMPARISON_OPS: ReadonlyMap<TokenKind, Operator> = new Map<TokenKind, Operator>([
  ['<', 'Lt'],
  ['>', 'Gt'],
  ['<=', 'LtEq'],
  ['>=', 'GtEq'],
]);

const TERM_OPS: ReadonlyMap<TokenKind, Operator> = new Map<TokenKind, Operator>([
  ['+', 'Add'],
  ['-', 'Sub'],
]);

const FACTOR_OPS: ReadonlyMap<TokenKind, Operator> = new Map<TokenKind, Operator>([
  ['*', 'Mul'],
  ['/', 'Div'],
  ['%', 'Mod'],
]);

const PREFIX_OPS: ReadonlyMap<TokenKind, UnaryOperator> = new Map<TokenKind, UnaryOperator>([
  ['-', 'Neg'],
  ['!', 'Not'],
  ['++', 'Inc'],
  ['--', 'Dec'],
]);

function freeze<T extends AstNode>(node: T): T {
  Object.freeze(node);
  return node;
}

/** Deepest nesting of expressions, blocks and types the parser accepts. */
export const MAX_NESTING_DEPTH = 128;

export class Parser {
  private readonly tokens: readonly Token[];
  private current = 0;
  private depth = 0;

  constructor(tokens: readonly Token[]) {
    this.tokens = tokens;
  }

  /**
   * Parse every top-level statement until the tokens run out.
   */
  parse(): AstNode[] {
    const statements: AstNode[] = [];
    while (this.peek() !== undefined) {
      statements.push(this.parseStatement());
    }
    return statements;
  }

  // ==================================================================
  // Token helpers
  // ==================================================================

  private peek(): Token | undefined {
    return this.tokens[this.current];
  }

  private check(kind: TokenKind): boolean {
    return this.peek()?.kind === kind;
  }

  private advance(): Token | undefined {
    const token = this.peek();
    if (token !== undefined) this.current++;
    return token;
  }

  private match(kind: TokenKind): boolean {
    if (!this.check(kind)) return false;
    this.current++;
    return true;
  }

  private expect(kind: PlainTokenKind, context: string): void {
    if (!this.match(kind)) {
      throw this.unexpected(`expected '${kind}' ${context}`);
    }
  }

  private expectIdentifier(context: string): string {
    const token = this.peek();
    if (token?.kind !== 'identifier') {
      throw this.unexpected(`expected identifier ${context}`);
    }
    this.current++;
    return token.value;
  }

  /**
   * Build a syntax error describing the token at the cursor.
   */
  private unexpected(message: string): AkiSyntaxError {
    const token = this.peek();
    if (token === undefined) {
      const last = this.tokens[this.tokens.length - 1];
      return new AkiSyntaxError(`${message}, got end of input`, last?.line, last?.column);
    }
    return new AkiSyntaxError(`${message}, got ${describeToken(token)}`, token.line, token.column);
  }

  private nested<T>(parse: () => T): T {
    if (this.depth >= MAX_NESTING_DEPTH) {
      throw this.unexpected(`nesting deeper than ${MAX_NESTING_DEPTH} levels`);
    }
    this.depth++;
    try {
      return parse();
    } finally {
      this.depth--;
    }
  }

  // ==================================================================
  // Statements
  // ==================================================================

  private parseStatement(): AstNode {
    const token = this.peek();
    let stmt: AstNode;

    switch (token?.kind) {
      case 'let':
        return this.parseVariableDeclaration();
      case 'func':
        stmt = this.parseFunctionDeclaration([]);
        break;
      case 'attr_weak':
      case 'attr_sync':
      case 'attr_own':
      case 'attr_actor':
      case 'async': {
        const modifiers = this.parseModifiers();
        if (!this.check('func')) {
          throw this.unexpected("expected 'func' after modifiers");
        }
        stmt = this.parseFunctionDeclaration(modifiers);
        break;
      }
      case 'if':
        stmt = this.parseIf();
        break;
      case 'while':
        stmt = this.parseWhile();
        break;
      default:
        stmt = this.parseExpression();
    }

    this.match(';');
    return stmt;
  }

  private parseVariableDeclaration(): VariableDecl {
    this.advance(); // 'let'
    const name = this.expectIdentifier("after 'let'");

    let typeAnnotation: AkiType | null = null;
    if (this.match(':')) {
      typeAnnotation = this.parseType();
    }

    let initializer: AstNode | null = null;
    if (this.match('=')) {
      initializer = this.parseExpression();
    }

    this.expect(';', 'after variable declaration');

    let ownership: Ownership | null = null;
    if (typeAnnotation?.kind === 'unique') ownership = 'unique';
    else if (typeAnnotation?.kind === 'shared') ownership = 'shared';

    return freeze<VariableDecl>({ kind: 'variable_decl', name, typeAnnotation, initializer, ownership });
  }

  private parseModifiers(): Array<Attribute | 'async'> {
    const modifiers: Array<Attribute | 'async'> = [];
    for (;;) {
      const token = this.peek();
      const modifier = token !== undefined ? MODIFIERS.get(token.kind) : undefined;
      if (modifier === undefined) break;
      this.current++;
      modifiers.push(modifier);
    }
    return modifiers;
  }

  /**
   * func [modifiers] name(param: Type, ...) [-> Type] { body }
   */
  private parseFunctionDeclaration(leading: Array<Attribute | 'async'>): FunctionDecl {
    this.advance(); // 'func'
    const modifiers = [...leading, ...this.parseModifiers()];
    const name = this.expectIdentifier('as function name');

    this.expect('(', `after function name '${name}'`);
    const params: Param[] = [];
    while (!this.check(')')) {
      if (params.length > 0) {
        this.expect(',', 'between parameters');
      }
      const paramName = this.expectIdentifier('as parameter name');
      this.expect(':', `after parameter '${paramName}'`);
      params.push(Object.freeze({ name: paramName, type: this.parseType() }));
    }
    this.expect(')', 'after parameter list');

    let returnType: AkiType | null = null;
    if (this.match('->')) {
      returnType = this.parseType();
    }

    const body = this.parseBlock();
    const attributes = modifiers.filter((m): m is Attribute => m !== 'async');

    return freeze<FunctionDecl>({
      kind: 'function_decl',
      name,
      params: Object.freeze(params),
      returnType,
      body,
      attributes: Object.freeze(attributes),
      isAsync: modifiers.includes('async'),
    });
  }

  private parseIf(): AstNode {
    this.advance(); // 'if'
    const condition = this.parseExpression();
    const thenBranch = this.parseBlock();

    let elseBranch: AstNode | null = null;
    if (this.match('else')) {
      elseBranch = this.check('if') ? this.parseIf() : this.parseBlock();
    }

    return freeze({ kind: 'if_expr', condition, thenBranch, elseBranch });
  }

  private parseWhile(): AstNode {
    this.advance(); // 'while'
    const condition = this.parseExpression();
    const body = this.parseBlock();
    return freeze({ kind: 'while_loop', condition, body });
  }

  private parseBlock(): Block {
    this.expect('{', 'to open block');
    const statements: AstNode[] = [];
    while (!this.check('}')) {
      if (this.peek() === undefined) {
        throw this.unexpected("expected '}' to close block");
      }
      statements.push(this.nested(() => this.parseStatement()));
    }
    this.advance(); // '}'
    return freeze<Block>({ kind: 'block', statements: Object.freeze(statements) });
  }

  // ==================================================================
  // Types
  // ==================================================================

  private parseType(): AkiType {
    const token = this.peek();
    if (token === undefined) {
      throw this.unexpected('expected type');
    }

    const primitive = PRIMITIVE_TYPES.get(token.kind);
    if (primitive !== undefined) {
      this.current++;
      return Object.freeze({ kind: 'primitive', name: primitive });
    }

    const inner = (): AkiType => this.nested(() => this.parseType());

    switch (token.kind) {
      case 'tilde':
        this.current++;
        return Object.freeze({ kind: 'unique', inner: inner() });
      case 'at':
        this.current++;
        return Object.freeze({ kind: 'shared', inner: inner() });
      case 'Vec': {
        this.current++;
        this.expect('<', "after 'Vec'");
        const element = inner();
        this.expect('>', 'to close Vec type');
        return Object.freeze({ kind: 'vec', element });
      }
      case 'HashMap': {
        this.current++;
        this.expect('<', "after 'HashMap'");
        const key = inner();
        this.expect(',', 'between HashMap key and value types');
        const value = inner();
        this.expect('>', 'to close HashMap type');
        return Object.freeze({ kind: 'hashmap', key, value });
      }
      default:
        throw this.unexpected('expected type');
    }
  }

  // ==================================================================
  // Expressions
  // ==================================================================

  /**
   * Assignment level. The target is whatever the left side reduced to;
   * the interpreter rejects anything that is not an identifier.
   */
  private parseExpression(): AstNode {
    return this.nested(() => this.parseAssignment());
  }

  private parseAssignment(): AstNode {
    const expr = this.parseLogicalOr();
    const token = this.peek();

    switch (token?.kind) {
      case '=':
        this.current++;
        return freeze({ kind: 'compound_assign', operator: 'Assign', target: expr, value: this.parseExpression() });
      case '+=':
        this.current++;
        return freeze({ kind: 'compound_assign', operator: 'SelfAdd', target: expr, value: this.parseExpression() });
      case '-=':
        this.current++;
        return freeze({ kind: 'compound_assign', operator: 'SelfSub', target: expr, value: this.parseExpression() });
      case '++':
        this.current++;
        return freeze({ kind: 'compound_assign', operator: 'Inc', target: expr, value: freeze({ kind: 'integer', value: 1 }) });
      case '--':
        this.current++;
        return freeze({ kind: 'compound_assign', operator: 'Dec', target: expr, value: freeze({ kind: 'integer', value: 1 }) });
      default:
        return expr;
    }
  }

  private parseLogicalOr(): AstNode {
    let left = this.parseLogicalAnd();
    while (this.match('||')) {
      const right = this.parseLogicalAnd();
      left = freeze({ kind: 'binary_op', left, operator: 'Or', right });
    }
    return left;
  }

  private parseLogicalAnd(): AstNode {
    let left = this.parseBinaryLevel(EQUALITY_OPS, () => this.parseComparison());
    while (this.match('&&')) {
      const right = this.parseBinaryLevel(EQUALITY_OPS, () => this.parseComparison());
      left = freeze({ kind: 'binary_op', left, operator: 'And', right });
    }
    return left;
  }

  private parseComparison(): AstNode {
    return this.parseBinaryLevel(COMPARISON_OPS, () => this.parseTerm());
  }

  private parseTerm(): AstNode {
    return this.parseBinaryLevel(TERM_OPS, () => this.parseFactor());
  }

  private parseFactor(): AstNode {
    return this.parseBinaryLevel(FACTOR_OPS, () => this.parseUnary());
  }

  /**
   * One left-associative precedence level.
   */
  private parseBinaryLevel(operators: ReadonlyMap<TokenKind, Operator>, next: () => AstNode): AstNode {
    let left = next();
    for (;;) {
      const token = this.peek();
      const operator = token !== undefined ? operators.get(token.kind) : undefined;
      if (operator === undefined) break;
      this.current++;
      const right = next();
      left = freeze({ kind: 'binary_op', left, operator, right });
    }
    return left;
  }

  private parseUnary(): AstNode {
    const token = this.peek();
    if (token === undefined) {
      throw this.unexpected('expected expression');
    }

    if (token.kind === 'await') {
      this.current++;
      return freeze({ kind: 'await', expression: this.nested(() => this.parseUnary()) });
    }

    const operator = PREFIX_OPS.get(token.kind);
    if (operator !== undefined) {
      this.current++;
      return freeze({ kind: 'unary_op', operator, operand: this.nested(() => this.parseUnary()) });
    }

    return this.parsePostfix();
  }

  private parsePostfix(): AstNode {
    let expr = this.parsePrimary();
    while (this.match('[')) {
      const index = this.parseExpression();
      this.expect(']', 'to close index');
      expr = freeze({ kind: 'index_access', target: expr, index });
    }
    return expr;
  }

  private parsePrimary(): AstNode {
    const token = this.peek();
    if (token === undefined) {
      throw this.unexpected('expected expression');
    }

    switch (token.kind) {
      case 'integer':
        this.current++;
        return freeze({ kind: 'integer', value: token.value });
      case 'float':
        this.current++;
        return freeze({ kind: 'float', value: token.value });
      case 'string':
        this.current++;
        return freeze({ kind: 'string', value: token.value });
      case 'bool':
        this.current++;
        return freeze({ kind: 'boolean', value: token.value });

      case 'identifier': {
        this.current++;
        if (this.check('(')) {
          const args = this.parseArguments(`in call to '${token.value}'`);
          return freeze({ kind: 'function_call', name: token.value, args });
        }
        return freeze({ kind: 'identifier', name: token.value });
      }

      case '[': {
        this.current++;
        const elements: AstNode[] = [];
        while (!this.check(']')) {
          if (elements.length > 0) {
            this.expect(',', 'between vector elements');
          }
          elements.push(this.parseExpression());
        }
        this.advance(); // ']'
        return freeze({ kind: 'vector', elements: Object.freeze(elements) });
      }

      case '(': {
        this.current++;
        const expr = this.parseExpression();
        this.expect(')', 'to close parenthesized expression');
        return expr;
      }

      case '{':
        return this.parseBlock();

      case 'if':
        return this.parseIf();

      // ---- Concurrency forms (parsed, not evaluated) ----

      case 'channel':
        this.current++;
        if (this.match('(')) {
          this.expect(')', "after 'channel('");
        }
        return freeze({ kind: 'channel_create' });

      case 'send': {
        this.current++;
        this.expect('(', "after 'send'");
        const channel = this.parseExpression();
        this.expect(',', "between 'send' arguments");
        const value = this.parseExpression();
        this.expect(')', "to close 'send'");
        return freeze({ kind: 'send', channel, value });
      }

      case 'recv': {
        this.current++;
        this.expect('(', "after 'recv'");
        const channel = this.parseExpression();
        this.expect(')', "to close 'recv'");
        return freeze({ kind: 'receive', channel });
      }

      default:
        throw this.unexpected('unexpected token in expression');
    }
  }

  private parseArguments(context: string): readonly AstNode[] {
    this.expect('(', context);
    const args: AstNode[] = [];
    while (!this.check(')')) {
      if (args.length > 0) {
        this.expect(',', `between arguments ${context}`);
      }
      args.push(this.parseExpression());
    }
    this.advance(); // ')'
    return Object.freeze(args);
  }
}

/**
 * Scan and parse a source unit.
 */
export function parseSource(source: string): AstNode[] {
  return new Parser(tokenize(source)).parse();
}
