/**
 * Tree-walking interpreter for the Aki programming language.
 *
 * Evaluates the AST by recursively visiting nodes against the current
 * environment. A user call swaps in a child of the callee's captured
 * scope and restores the caller's scope when the body finishes.
 */

import { AstNode, FunctionDecl, Operator, OPERATOR_SYMBOLS, UnaryOperator, isNodeKind } from './ast';
import { Environment } from './environment';
import {
  AkiValue,
  FunctionValue,
  isNumeric,
  mkBool,
  mkFloat,
  mkFunction,
  mkInt,
  mkString,
  mkUnit,
  mkVector,
  typeName,
  valueToString,
  valuesEqual,
} from './values';
import { AkiArityError, AkiRuntimeError, AkiTypeError } from './errors';
import { BuiltinTable, createStdlib } from './builtins';
import { Heap } from './heap';
import { Logger, createLogger } from './logger';

/**
 * How `x = ...`, `x += ...` and `x++` write their result.
 *
 * - `shadow`: define in the innermost scope, shadowing any outer binding.
 * - `outer`: overwrite the nearest binding on the chain, or define locally
 *   when there is none.
 */
export type ScopeWritePolicy = 'shadow' | 'outer';

export interface InterpreterOptions {
  builtins?: BuiltinTable;
  heap?: Heap;
  /** Output sink for the default builtin table. Ignored when `builtins` is given. */
  write?: (text: string) => void;
  scopeWrites?: ScopeWritePolicy;
  /** Call a zero-parameter global `main` as soon as it is declared. */
  autoInvokeMain?: boolean;
  logger?: Logger;
  /** Deepest allowed nesting of user function calls. */
  maxCallDepth?: number;
}

export const DEFAULT_MAX_CALL_DEPTH = 256;

type BinaryHandler = (left: AkiValue, right: AkiValue) => AkiValue | undefined;

function arith(intOp: (a: number, b: number) => number, floatOp: (a: number, b: number) => number): BinaryHandler {
  return (left, right) => {
    if (left.kind === 'int' && right.kind === 'int') return mkInt(intOp(left.value, right.value));
    if (isNumeric(left) && isNumeric(right)) return mkFloat(floatOp(left.value, right.value));
    return undefined;
  };
}

function compare(test: (order: number) => boolean): BinaryHandler {
  return (left, right) => {
    if (isNumeric(left) && isNumeric(right)) {
      const a = left.value;
      const b = right.value;
      // NaN is unordered: every relational test fails.
      return mkBool(test(a < b ? -1 : a > b ? 1 : a === b ? 0 : NaN));
    }
    if (left.kind === 'string' && right.kind === 'string') {
      const a = left.value;
      const b = right.value;
      return mkBool(test(a < b ? -1 : a > b ? 1 : 0));
    }
    return undefined;
  };
}

function logical(op: (a: boolean, b: boolean) => boolean): BinaryHandler {
  return (left, right) => {
    if (left.kind === 'bool' && right.kind === 'bool') return mkBool(op(left.value, right.value));
    return undefined;
  };
}

const addNumbers = arith((a, b) => a + b, (a, b) => a + b);

/**
 * Dispatch table for binary operators. A handler returns undefined for
 * operand types it does not support.
 */
const BINARY_OPS: Partial<Record<Operator, BinaryHandler>> = {
  Add: (left, right) => {
    if (left.kind === 'string' && right.kind === 'string') return mkString(left.value + right.value);
    return addNumbers(left, right);
  },
  Sub: arith((a, b) => a - b, (a, b) => a - b),
  Mul: arith(Math.imul, (a, b) => a * b),
  Div: (left, right) => {
    if (left.kind === 'int' && right.kind === 'int') {
      if (right.value === 0) throw new AkiRuntimeError('DivisionByZero', 'division by zero');
      return mkInt(Math.trunc(left.value / right.value));
    }
    if (isNumeric(left) && isNumeric(right)) return mkFloat(left.value / right.value);
    return undefined;
  },
  Mod: (left, right) => {
    if (left.kind === 'int' && right.kind === 'int') {
      if (right.value === 0) throw new AkiRuntimeError('ModulusByZero', 'modulus by zero');
      return mkInt(left.value % right.value);
    }
    return undefined;
  },
  Eq: (left, right) => mkBool(valuesEqual(left, right)),
  NotEq: (left, right) => mkBool(!valuesEqual(left, right)),
  Lt: compare(o => o < 0),
  Gt: compare(o => o > 0),
  LtEq: compare(o => o <= 0),
  GtEq: compare(o => o >= 0),
  And: logical((a, b) => a && b),
  Or: logical((a, b) => a || b),
};

export class Interpreter {
  private readonly globalEnv: Environment;
  private environment: Environment;
  private readonly heap: Heap;
  private readonly builtins: BuiltinTable;
  private readonly scopeWrites: ScopeWritePolicy;
  private readonly autoInvokeMain: boolean;
  private readonly logger: Logger;
  private readonly maxCallDepth: number;
  private callDepth = 0;

  constructor(options: InterpreterOptions = {}) {
    this.globalEnv = new Environment();
    this.environment = this.globalEnv;
    this.heap = options.heap ?? new Heap();
    this.builtins = options.builtins ?? createStdlib({ write: options.write, heap: this.heap });
    this.scopeWrites = options.scopeWrites ?? 'shadow';
    this.autoInvokeMain = options.autoInvokeMain ?? true;
    this.logger = options.logger ?? createLogger({ level: 'silent' });
    this.maxCallDepth = options.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH;
  }

  /**
   * Evaluate a sequence of top-level nodes and return the last value.
   * The first error stops the sequence.
   */
  run(nodes: readonly AstNode[]): AkiValue {
    let result: AkiValue = mkUnit();
    for (const node of nodes) {
      result = this.interpret(node);
    }
    return result;
  }

  getGlobalEnv(): Environment {
    return this.globalEnv;
  }

  getHeap(): Heap {
    return this.heap;
  }

  getBuiltins(): BuiltinTable {
    return this.builtins;
  }

  /**
   * Main dispatch: evaluate any node in the current environment.
   */
  interpret(node: AstNode): AkiValue {
    switch (node.kind) {
      // ---- Literals ----
      case 'integer':
        return mkInt(node.value);
      case 'float':
        return mkFloat(node.value);
      case 'string':
        return mkString(node.value);
      case 'boolean':
        return mkBool(node.value);
      case 'vector':
        return mkVector(node.elements.map(el => this.interpret(el)));

      // ---- Variables ----
      case 'identifier':
        return this.environment.get(node.name);
      case 'variable_decl': {
        const value = node.initializer !== null ? this.interpret(node.initializer) : mkUnit();
        this.environment.define(node.name, value);
        return value;
      }
      case 'index_access':
        return this.evalIndexAccess(this.interpret(node.target), this.interpret(node.index));

      // ---- Operators ----
      case 'binary_op': {
        const left = this.interpret(node.left);
        const right = this.interpret(node.right);
        return this.evalBinaryOp(node.operator, left, right);
      }
      case 'unary_op':
        return this.evalUnaryOp(node.operator, node.operand);
      case 'compound_assign':
        return this.evalCompoundAssign(node.operator, node.target, node.value);

      // ---- Control flow ----
      case 'block': {
        let result: AkiValue = mkUnit();
        for (const stmt of node.statements) {
          result = this.interpret(stmt);
        }
        return result;
      }
      case 'if_expr': {
        const condition = this.interpret(node.condition);
        if (condition.kind !== 'bool') {
          throw new AkiTypeError(`if condition must be Boolean, got ${typeName(condition)}`);
        }
        if (condition.value) return this.interpret(node.thenBranch);
        return node.elseBranch !== null ? this.interpret(node.elseBranch) : mkUnit();
      }
      case 'while_loop':
        for (;;) {
          const condition = this.interpret(node.condition);
          if (condition.kind !== 'bool') {
            throw new AkiTypeError(`while condition must be Boolean, got ${typeName(condition)}`);
          }
          if (!condition.value) return mkUnit();
          this.interpret(node.body);
        }

      // ---- Functions ----
      case 'function_decl':
        return this.evalFunctionDecl(node);
      case 'function_call': {
        const args = node.args.map(arg => this.interpret(arg));
        return this.callByName(node.name, args);
      }

      // ---- Concurrency (grammar only) ----
      case 'channel_create':
      case 'send':
      case 'receive':
      case 'await':
        throw new AkiRuntimeError('UnimplementedNodeKind', `'${node.kind}' has no runtime semantics`);
    }
  }

  // ==================================================================
  // Operators
  // ==================================================================

  private evalBinaryOp(operator: Operator, left: AkiValue, right: AkiValue): AkiValue {
    const handler = BINARY_OPS[operator];
    const result = handler !== undefined ? handler(left, right) : undefined;
    if (result === undefined) {
      throw new AkiTypeError(
        `unsupported operand types for '${OPERATOR_SYMBOLS[operator]}': ${typeName(left)} and ${typeName(right)}`,
      );
    }
    return result;
  }

  private evalUnaryOp(operator: UnaryOperator, operandNode: AstNode): AkiValue {
    switch (operator) {
      case 'Inc':
        return this.update(operandNode, 'Add', () => mkInt(1), '++');
      case 'Dec':
        return this.update(operandNode, 'Sub', () => mkInt(1), '--');
      case 'Neg': {
        const operand = this.interpret(operandNode);
        if (operand.kind === 'int') return mkInt(-operand.value);
        if (operand.kind === 'float') return mkFloat(-operand.value);
        throw new AkiTypeError(`cannot negate ${typeName(operand)}`);
      }
      case 'Not': {
        const operand = this.interpret(operandNode);
        if (operand.kind === 'bool') return mkBool(!operand.value);
        throw new AkiTypeError(`cannot apply '!' to ${typeName(operand)}`);
      }
    }
  }

  private evalCompoundAssign(operator: Operator, target: AstNode, valueNode: AstNode): AkiValue {
    switch (operator) {
      case 'Assign': {
        const name = this.assignmentTarget(target, '=');
        const value = this.interpret(valueNode);
        this.writeBinding(name, value);
        return value;
      }
      case 'SelfAdd':
        return this.update(target, 'Add', () => this.interpret(valueNode), '+=');
      case 'SelfSub':
        return this.update(target, 'Sub', () => this.interpret(valueNode), '-=');
      case 'Inc':
        return this.update(target, 'Add', () => mkInt(1), '++');
      case 'Dec':
        return this.update(target, 'Sub', () => mkInt(1), '--');
      default:
        throw new AkiTypeError(`'${OPERATOR_SYMBOLS[operator]}' is not an assignment operator`);
    }
  }

  /**
   * Read-modify-write of an identifier: `name = name <op> amount`.
   * The current value is read before `amount` is evaluated.
   */
  private update(target: AstNode, operator: 'Add' | 'Sub', amount: () => AkiValue, symbol: string): AkiValue {
    const name = this.assignmentTarget(target, symbol);
    const current = this.environment.get(name);
    const result = this.evalBinaryOp(operator, current, amount());
    this.writeBinding(name, result);
    return result;
  }

  private assignmentTarget(target: AstNode, symbol: string): string {
    if (isNodeKind(target, 'identifier')) return target.name;
    throw new AkiRuntimeError('InvalidAssignmentTarget', `left side of '${symbol}' must be a variable, got ${target.kind}`);
  }

  private writeBinding(name: string, value: AkiValue): void {
    if (this.scopeWrites === 'outer' && this.environment.assign(name, value)) {
      return;
    }
    this.environment.define(name, value);
  }

  private evalIndexAccess(target: AkiValue, index: AkiValue): AkiValue {
    switch (target.kind) {
      case 'vector': {
        if (index.kind !== 'int') {
          throw new AkiTypeError(`Vector index must be Integer, got ${typeName(index)}`);
        }
        if (index.value < 0 || index.value >= target.elements.length) {
          throw new AkiRuntimeError(
            'IndexOutOfBounds',
            `index ${index.value} out of bounds for Vector of length ${target.elements.length}`,
          );
        }
        return target.elements[index.value];
      }
      case 'map': {
        if (index.kind !== 'string') {
          throw new AkiTypeError(`Map key must be String, got ${typeName(index)}`);
        }
        const value = target.entries.get(index.value);
        if (value === undefined) {
          throw new AkiRuntimeError('KeyNotFound', `key not found: ${index.value}`);
        }
        return value;
      }
      case 'string': {
        if (index.kind !== 'int') {
          throw new AkiTypeError(`String index must be Integer, got ${typeName(index)}`);
        }
        if (index.value < 0 || index.value >= target.value.length) {
          throw new AkiRuntimeError(
            'IndexOutOfBounds',
            `index ${index.value} out of bounds for String of length ${target.value.length}`,
          );
        }
        return mkString(target.value.charAt(index.value));
      }
      default:
        throw new AkiTypeError(`cannot index into ${typeName(target)}`);
    }
  }

  // ==================================================================
  // Functions
  // ==================================================================

  private evalFunctionDecl(node: FunctionDecl): AkiValue {
    const closure = this.environment.snapshot();
    const fn = mkFunction(node.name, node.params, node.body, closure);
    // Bind the function inside its own snapshot so the body can recurse.
    closure.define(node.name, fn);
    this.environment.define(node.name, fn);

    if (this.autoInvokeMain && node.name === 'main' && node.params.length === 0 && this.environment.isGlobal()) {
      this.logger.debug('auto-invoking main');
      return this.callFunction(fn, []);
    }
    return fn;
  }

  /**
   * Resolve a called name: a function bound in scope first, then the
   * builtin table.
   */
  private callByName(name: string, args: AkiValue[]): AkiValue {
    const bound = this.environment.lookup(name);
    if (bound !== undefined && bound.kind === 'function') {
      return this.callFunction(bound, args);
    }
    if (this.builtins.isBuiltin(name)) {
      return this.builtins.call(name, args);
    }
    throw new AkiRuntimeError('UnknownFunction', `no function named '${name}'`);
  }

  callFunction(fn: FunctionValue, args: AkiValue[]): AkiValue {
    if (args.length !== fn.params.length) {
      throw new AkiArityError(fn.name, fn.params.length, args.length);
    }

    const callEnv = fn.closure.child();
    fn.params.forEach((param, i) => callEnv.define(param.name, args[i]));

    if (this.logger.isEnabled('debug')) {
      this.logger.debug(`call ${fn.name}`, { args: args.map(valueToString) });
    }

    if (this.callDepth >= this.maxCallDepth) {
      throw new AkiRuntimeError('StackOverflow', `maximum call depth of ${this.maxCallDepth} exceeded in '${fn.name}'`);
    }

    const previous = this.environment;
    this.environment = callEnv;
    this.callDepth++;
    try {
      return this.interpret(fn.body);
    } catch (e) {
      // The host stack can run out below a large maxCallDepth.
      if (e instanceof RangeError) {
        throw new AkiRuntimeError('StackOverflow', `call stack exhausted in '${fn.name}'`);
      }
      throw e;
    } finally {
      this.callDepth--;
      this.environment = previous;
    }
  }
}
