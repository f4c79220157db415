/**
 * Aki REPL — interactive read-eval-print loop.
 *
 * Usage: aki repl
 *
 * Features:
 *   - Persistent interpreter state across inputs
 *   - Multi-line input (detects unclosed braces/parens/brackets)
 *   - Special commands: :help, :quit, :env, :type, :clear, :reset
 *   - Errors are printed and the loop continues
 *   - Prints `=> value` for each non-Unit top-level result
 */

import * as readline from 'readline';
import { Interpreter, InterpreterOptions } from './interpreter';
import { AkiError } from './errors';
import { executeSource } from './runner';
import { valueToString, typeName, AkiValue } from './values';
import { Logger, createLogger } from './logger';

export const VERSION = '0.1.0';
export const PROMPT = 'aki> ';
export const CONTINUATION_PROMPT = '  ... ';

export interface ReplOptions {
  interpreter?: InterpreterOptions;
  /** Where REPL text (results, help, errors) goes. */
  print?: (line: string) => void;
  /** Called by `:clear`. */
  clearScreen?: () => void;
  logger?: Logger;
}

/**
 * Line-driven REPL state, independent of readline so it can be driven
 * directly.
 */
export class ReplSession {
  private interpreter: Interpreter;
  private buffer = '';
  private readonly options: ReplOptions;
  private readonly print: (line: string) => void;
  private readonly logger: Logger;

  constructor(options: ReplOptions = {}) {
    this.options = options;
    this.print = options.print ?? ((line: string) => console.log(line));
    this.logger = options.logger ?? createLogger({ level: 'silent' });
    this.interpreter = new Interpreter(options.interpreter);
  }

  /** True while a multi-line input is being collected. */
  isContinuing(): boolean {
    return this.buffer !== '';
  }

  getInterpreter(): Interpreter {
    return this.interpreter;
  }

  /**
   * Feed one line of input. Returns false once the session should end.
   */
  handleLine(line: string): boolean {
    const trimmed = line.trim();

    if (!this.isContinuing() && trimmed.startsWith(':')) {
      return this.handleCommand(trimmed);
    }

    this.buffer += (this.buffer ? '\n' : '') + line;
    if (hasUnclosedDelimiters(this.buffer)) {
      return true;
    }

    const input = this.buffer.trim();
    this.buffer = '';
    if (input === '') return true;

    this.evaluate(input, value => this.print(`=> ${valueToString(value)}`));
    return true;
  }

  private evaluate(input: string, onResult: (value: AkiValue) => void): void {
    try {
      executeSource(input, this.interpreter, { onResult });
    } catch (e) {
      if (!(e instanceof AkiError)) throw e;
      this.logger.debug('input failed', { input });
      this.print(`  ${e.message}`);
    }
  }

  private handleCommand(cmd: string): boolean {
    const [command, ...rest] = cmd.split(/\s+/);

    switch (command) {
      case ':help':
      case ':h':
        this.printHelp();
        return true;

      case ':quit':
      case ':q':
      case ':exit':
        return false;

      case ':env':
        this.printEnvironment();
        return true;

      case ':type': {
        const expr = rest.join(' ').trim();
        if (!expr) {
          this.print('Usage: :type <expression>');
          return true;
        }
        this.evaluate(expr, value => this.print(typeName(value)));
        return true;
      }

      case ':clear':
        this.options.clearScreen?.();
        return true;

      case ':reset':
        this.interpreter = new Interpreter(this.options.interpreter);
        this.buffer = '';
        this.print('Interpreter state reset.');
        return true;

      default:
        this.print(`Unknown command: ${command}. Type :help for available commands.`);
        return true;
    }
  }

  private printHelp(): void {
    this.print('');
    this.print('REPL Commands:');
    this.print('  :help, :h       Show this help message');
    this.print('  :quit, :q       Exit the REPL');
    this.print('  :env            Show all global bindings');
    this.print('  :type <expr>    Show the runtime type of an expression');
    this.print('  :clear          Clear the screen');
    this.print('  :reset          Reset the interpreter state');
    this.print('');
    this.print('Builtins: ' + this.interpreter.getBuiltins().names().join(', '));
    this.print('');
  }

  private printEnvironment(): void {
    const bindings = [...this.interpreter.getGlobalEnv().entries()];
    if (bindings.length === 0) {
      this.print('  (no variables defined)');
      return;
    }
    for (const [name, value] of bindings) {
      const preview = valueToString(value);
      const truncated = preview.length > 60 ? preview.slice(0, 57) + '...' : preview;
      this.print(`  ${name}: ${typeName(value)} = ${truncated}`);
    }
  }
}

/**
 * Start the Aki REPL on stdin/stdout.
 */
export function startRepl(options: ReplOptions = {}): void {
  const session = new ReplSession({ clearScreen: () => console.clear(), ...options });

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: PROMPT,
    terminal: process.stdin.isTTY === true,
  });

  console.log(`Aki REPL v${VERSION}`);
  console.log('Type :help for commands, :quit to exit.\n');

  rl.prompt();

  rl.on('line', (line: string) => {
    if (!session.handleLine(line)) {
      rl.close();
      return;
    }
    if (session.isContinuing()) {
      process.stdout.write(CONTINUATION_PROMPT);
    } else {
      rl.prompt();
    }
  });

  rl.on('close', () => {
    console.log('\nGoodbye!');
  });
}

/**
 * Check whether the input has unclosed delimiters. String literals and
 * `//` comments are skipped.
 */
export function hasUnclosedDelimiters(input: string): boolean {
  let braces = 0;
  let parens = 0;
  let brackets = 0;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
      continue;
    }

    if (ch === '/' && input[i + 1] === '/') {
      while (i < input.length && input[i] !== '\n') i++;
      continue;
    }

    switch (ch) {
      case '{': braces++; break;
      case '}': braces--; break;
      case '(': parens++; break;
      case ')': parens--; break;
      case '[': brackets++; break;
      case ']': brackets--; break;
    }
  }

  return braces > 0 || parens > 0 || brackets > 0;
}
