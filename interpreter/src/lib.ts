/**
 * Public API of the Aki interpreter package.
 */

export * from './tokens';
export * from './errors';
export { Lexer, tokenize } from './lexer';
export * from './ast';
export { MAX_NESTING_DEPTH, Parser, parseSource } from './parser';
export * from './values';
export { Environment } from './environment';
export { Heap } from './heap';
export * from './builtins';
export { DEFAULT_MAX_CALL_DEPTH, Interpreter, InterpreterOptions, ScopeWritePolicy } from './interpreter';
export { executeSource, ExecuteOptions } from './runner';
export * from './config';
export * from './logger';
export { ReplSession, ReplOptions, startRepl, hasUnclosedDelimiters } from './repl';
