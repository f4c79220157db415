/**
 * Error types for the Aki lexer, parser and interpreter.
 */

export class AkiError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AkiError';
  }
}

function location(line?: number, column?: number): string {
  return line !== undefined ? ` [line ${line}, col ${column ?? 0}]` : '';
}

export class AkiLexError extends AkiError {
  public readonly line: number;
  public readonly column: number;

  constructor(message: string, line: number, column: number) {
    super(`LexError${location(line, column)}: ${message}`);
    this.name = 'AkiLexError';
    this.line = line;
    this.column = column;
  }
}

export class AkiSyntaxError extends AkiError {
  public readonly line: number | undefined;
  public readonly column: number | undefined;

  constructor(message: string, line?: number, column?: number) {
    super(`SyntaxError${location(line, column)}: ${message}`);
    this.name = 'AkiSyntaxError';
    this.line = line;
    this.column = column;
  }
}

export class AkiConfigError extends AkiError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`ConfigError: ${issues.join('; ')}`);
    this.name = 'AkiConfigError';
    this.issues = issues;
  }
}

export type RuntimeErrorKind =
  | 'UndefinedVariable'
  | 'TypeMismatch'
  | 'DivisionByZero'
  | 'ModulusByZero'
  | 'IndexOutOfBounds'
  | 'KeyNotFound'
  | 'ArityMismatch'
  | 'InvalidAssignmentTarget'
  | 'UnknownFunction'
  | 'UnimplementedNodeKind'
  | 'BuiltinError'
  | 'StackOverflow';

/**
 * Any failure raised while evaluating a node. `kind` is the stable
 * discriminant; the message is for people.
 */
export class AkiRuntimeError extends AkiError {
  public readonly kind: RuntimeErrorKind;

  constructor(kind: RuntimeErrorKind, message: string) {
    super(`${kind}: ${message}`);
    this.name = 'AkiRuntimeError';
    this.kind = kind;
  }
}

export class AkiNameError extends AkiRuntimeError {
  public readonly variable: string;

  constructor(name: string) {
    super('UndefinedVariable', `undefined variable '${name}'`);
    this.name = 'AkiNameError';
    this.variable = name;
  }
}

export class AkiTypeError extends AkiRuntimeError {
  constructor(message: string) {
    super('TypeMismatch', message);
    this.name = 'AkiTypeError';
  }
}

export class AkiArityError extends AkiRuntimeError {
  public readonly expected: number;
  public readonly received: number;

  constructor(fnName: string, expected: number, received: number) {
    super(
      'ArityMismatch',
      `'${fnName}' expects ${expected} argument${expected === 1 ? '' : 's'} but got ${received}`,
    );
    this.name = 'AkiArityError';
    this.expected = expected;
    this.received = received;
  }
}
