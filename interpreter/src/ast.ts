/**
 * AST for Aki programs.
 *
 * Nodes are plain tagged objects with readonly fields. The parser freezes
 * every node it builds; the interpreter only ever reads them.
 */

// ---- Type annotations (parsed, never checked) ----

export type PrimitiveTypeName =
  | 'i8' | 'i16' | 'i32' | 'i64'
  | 'u8' | 'u16' | 'u32' | 'u64'
  | 'f32' | 'f64'
  | 'bool' | 'string' | 'dyn';

export type AkiType =
  | { readonly kind: 'primitive'; readonly name: PrimitiveTypeName }
  | { readonly kind: 'unique'; readonly inner: AkiType }
  | { readonly kind: 'shared'; readonly inner: AkiType }
  | { readonly kind: 'vec'; readonly element: AkiType }
  | { readonly kind: 'hashmap'; readonly key: AkiType; readonly value: AkiType };

export function typeToString(t: AkiType): string {
  switch (t.kind) {
    case 'primitive': return t.name;
    case 'unique': return `~${typeToString(t.inner)}`;
    case 'shared': return `@${typeToString(t.inner)}`;
    case 'vec': return `Vec<${typeToString(t.element)}>`;
    case 'hashmap': return `HashMap<${typeToString(t.key)}, ${typeToString(t.value)}>`;
  }
}

// ---- Operators ----

export type Operator =
  | 'Assign'
  | 'Add'
  | 'SelfAdd'
  | 'Inc'
  | 'Sub'
  | 'SelfSub'
  | 'Dec'
  | 'Mul'
  | 'Div'
  | 'Mod'
  | 'Eq'
  | 'NotEq'
  | 'Lt'
  | 'Gt'
  | 'LtEq'
  | 'GtEq'
  | 'And'
  | 'Or';

export type UnaryOperator = 'Not' | 'Neg' | 'Inc' | 'Dec';

export type Attribute = 'weak' | 'sync' | 'own' | 'actor';

export type Ownership = 'unique' | 'shared' | 'weak';

export interface Param {
  readonly name: string;
  readonly type: AkiType;
}

// ---- Nodes ----

export type AstNode =
  | { readonly kind: 'integer'; readonly value: number }
  | { readonly kind: 'float'; readonly value: number }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'vector'; readonly elements: readonly AstNode[] }
  | { readonly kind: 'identifier'; readonly name: string }
  | VariableDecl
  | FunctionDecl
  | { readonly kind: 'function_call'; readonly name: string; readonly args: readonly AstNode[] }
  | { readonly kind: 'index_access'; readonly target: AstNode; readonly index: AstNode }
  | Block
  | {
      readonly kind: 'if_expr';
      readonly condition: AstNode;
      readonly thenBranch: Block;
      readonly elseBranch: AstNode | null;
    }
  | { readonly kind: 'while_loop'; readonly condition: AstNode; readonly body: Block }
  | { readonly kind: 'binary_op'; readonly left: AstNode; readonly operator: Operator; readonly right: AstNode }
  | { readonly kind: 'unary_op'; readonly operator: UnaryOperator; readonly operand: AstNode }
  | { readonly kind: 'compound_assign'; readonly operator: Operator; readonly target: AstNode; readonly value: AstNode }
  | { readonly kind: 'channel_create' }
  | { readonly kind: 'send'; readonly channel: AstNode; readonly value: AstNode }
  | { readonly kind: 'receive'; readonly channel: AstNode }
  | { readonly kind: 'await'; readonly expression: AstNode };

export interface VariableDecl {
  readonly kind: 'variable_decl';
  readonly name: string;
  readonly typeAnnotation: AkiType | null;
  readonly initializer: AstNode | null;
  readonly ownership: Ownership | null;
}

export interface FunctionDecl {
  readonly kind: 'function_decl';
  readonly name: string;
  readonly params: readonly Param[];
  readonly returnType: AkiType | null;
  readonly body: Block;
  readonly attributes: readonly Attribute[];
  readonly isAsync: boolean;
}

export interface Block {
  readonly kind: 'block';
  readonly statements: readonly AstNode[];
}

export type AstNodeKind = AstNode['kind'];

// ---- Helpers ----

/**
 * Narrow a node to one variant.
 */
export function isNodeKind<K extends AstNodeKind>(
  node: AstNode,
  kind: K,
): node is Extract<AstNode, { kind: K }> {
  return node.kind === kind;
}

/**
 * Render a node as a compact S-expression, e.g. `(call add 5 3)`.
 */
export function astToSExpr(node: AstNode): string {
  switch (node.kind) {
    case 'integer':
    case 'boolean':
      return String(node.value);
    case 'float': {
      const s = String(node.value);
      return Number.isInteger(node.value) ? `${s}.0` : s;
    }
    case 'string':
      return JSON.stringify(node.value);
    case 'vector':
      return `(vec${node.elements.map(e => ' ' + astToSExpr(e)).join('')})`;
    case 'identifier':
      return node.name;
    case 'variable_decl': {
      const type = node.typeAnnotation ? ` : ${typeToString(node.typeAnnotation)}` : '';
      const init = node.initializer ? ` ${astToSExpr(node.initializer)}` : '';
      return `(let ${node.name}${type}${init})`;
    }
    case 'function_decl': {
      const params = node.params.map(p => `${p.name}: ${typeToString(p.type)}`).join(', ');
      const ret = node.returnType ? ` -> ${typeToString(node.returnType)}` : '';
      return `(func ${node.name} (${params})${ret} ${astToSExpr(node.body)})`;
    }
    case 'function_call':
      return `(call ${node.name}${node.args.map(a => ' ' + astToSExpr(a)).join('')})`;
    case 'index_access':
      return `(index ${astToSExpr(node.target)} ${astToSExpr(node.index)})`;
    case 'block':
      return `(block${node.statements.map(s => ' ' + astToSExpr(s)).join('')})`;
    case 'if_expr': {
      const alt = node.elseBranch ? ` ${astToSExpr(node.elseBranch)}` : '';
      return `(if ${astToSExpr(node.condition)} ${astToSExpr(node.thenBranch)}${alt})`;
    }
    case 'while_loop':
      return `(while ${astToSExpr(node.condition)} ${astToSExpr(node.body)})`;
    case 'binary_op':
      return `(${OPERATOR_SYMBOLS[node.operator]} ${astToSExpr(node.left)} ${astToSExpr(node.right)})`;
    case 'unary_op':
      return `(${UNARY_SYMBOLS[node.operator]} ${astToSExpr(node.operand)})`;
    case 'compound_assign':
      return `(${OPERATOR_SYMBOLS[node.operator]} ${astToSExpr(node.target)} ${astToSExpr(node.value)})`;
    case 'channel_create':
      return '(channel)';
    case 'send':
      return `(send ${astToSExpr(node.channel)} ${astToSExpr(node.value)})`;
    case 'receive':
      return `(recv ${astToSExpr(node.channel)})`;
    case 'await':
      return `(await ${astToSExpr(node.expression)})`;
  }
}

export const OPERATOR_SYMBOLS: Record<Operator, string> = {
  Assign: '=',
  Add: '+',
  SelfAdd: '+=',
  Inc: '++',
  Sub: '-',
  SelfSub: '-=',
  Dec: '--',
  Mul: '*',
  Div: '/',
  Mod: '%',
  Eq: '==',
  NotEq: '!=',
  Lt: '<',
  Gt: '>',
  LtEq: '<=',
  GtEq: '>=',
  And: '&&',
  Or: '||',
};

export const UNARY_SYMBOLS: Record<UnaryOperator, string> = {
  Not: '!',
  Neg: '-',
  Inc: '++',
  Dec: '--',
};
