/**
 * REPL tests drive ReplSession line by line; readline is not involved.
 */

import { ReplSession, hasUnclosedDelimiters } from '../src/repl';

function repl(): { session: ReplSession; printed: string[]; written: string[]; cleared: number[] } {
  const printed: string[] = [];
  const written: string[] = [];
  const cleared: number[] = [];
  const session = new ReplSession({
    print: line => printed.push(line),
    clearScreen: () => cleared.push(1),
    interpreter: { write: text => written.push(text) },
  });
  return { session, printed, written, cleared };
}

describe('ReplSession', () => {
  test('prints results with =>', () => {
    const { session, printed } = repl();
    session.handleLine('let x = 40;');
    session.handleLine('x + 2');
    expect(printed).toEqual(['=> 40', '=> 42']);
  });

  test('Unit results are not printed, program output goes to the sink', () => {
    const { session, printed, written } = repl();
    session.handleLine('println("hello")');
    expect(printed).toEqual([]);
    expect(written).toEqual(['hello\n']);
  });

  test('multi-line input waits for closing delimiters', () => {
    const { session, printed } = repl();
    expect(session.handleLine('func add(a: i32, b: i32) -> i32 {')).toBe(true);
    expect(session.isContinuing()).toBe(true);
    session.handleLine('  a + b');
    expect(printed).toEqual([]);
    session.handleLine('}');
    expect(session.isContinuing()).toBe(false);
    session.handleLine('add(1, 2)');
    expect(printed).toEqual(['=> <func add/2>', '=> 3']);
  });

  test('errors are printed and the session continues', () => {
    const { session, printed } = repl();
    expect(session.handleLine('1 / 0')).toBe(true);
    session.handleLine('let = 2;');
    session.handleLine('7');
    expect(printed).toEqual([
      '  DivisionByZero: division by zero',
      "  SyntaxError [line 1, col 5]: expected identifier after 'let', got '='",
      '=> 7',
    ]);
  });

  test('runaway recursion is reported and the session continues', () => {
    const { session, printed } = repl();
    session.handleLine('func f(n: i32) -> i32 { f(n + 1) }');
    expect(session.handleLine('f(0)')).toBe(true);
    session.handleLine('1 + 1');
    expect(printed).toEqual([
      '=> <func f/1>',
      "  StackOverflow: maximum call depth of 256 exceeded in 'f'",
      '=> 2',
    ]);
  });

  test('blank lines are ignored', () => {
    const { session, printed } = repl();
    session.handleLine('   ');
    expect(printed).toEqual([]);
  });

  test(':type shows the runtime type', () => {
    const { session, printed } = repl();
    session.handleLine(':type 1.5');
    session.handleLine(':type [1, 2]');
    session.handleLine(':type');
    expect(printed).toEqual(['Float', 'Vector', 'Usage: :type <expression>']);
  });

  test(':env lists global bindings', () => {
    const { session, printed } = repl();
    session.handleLine(':env');
    session.handleLine('let name = "aki";');
    printed.length = 0;
    session.handleLine(':env');
    expect(printed).toEqual(['  name: String = aki']);
  });

  test(':env on a fresh session', () => {
    const { session, printed } = repl();
    session.handleLine(':env');
    expect(printed).toEqual(['  (no variables defined)']);
  });

  test(':reset discards all state', () => {
    const { session, printed } = repl();
    session.handleLine('let x = 1;');
    session.handleLine(':reset');
    session.handleLine('x');
    expect(printed).toEqual(['=> 1', 'Interpreter state reset.', "  UndefinedVariable: undefined variable 'x'"]);
  });

  test(':help lists commands and builtins', () => {
    const { session, printed } = repl();
    session.handleLine(':help');
    expect(printed).toContain('  :quit, :q       Exit the REPL');
    expect(printed).toContain(
      'Builtins: contains_key, deref, hashmap, insert, len, print, println, push, ref, to_bool, to_float, to_int, to_string, vec',
    );
  });

  test(':clear and unknown commands', () => {
    const { session, printed, cleared } = repl();
    session.handleLine(':clear');
    session.handleLine(':bogus');
    expect(cleared).toEqual([1]);
    expect(printed).toEqual(['Unknown command: :bogus. Type :help for available commands.']);
  });

  test(':quit ends the session', () => {
    const { session } = repl();
    expect(session.handleLine(':quit')).toBe(false);
    expect(session.handleLine(':q')).toBe(false);
  });
});

describe('hasUnclosedDelimiters', () => {
  test('counts braces, parens and brackets', () => {
    expect(hasUnclosedDelimiters('func f() {')).toBe(true);
    expect(hasUnclosedDelimiters('f(1,')).toBe(true);
    expect(hasUnclosedDelimiters('[1, 2')).toBe(true);
    expect(hasUnclosedDelimiters('{ [()] }')).toBe(false);
  });

  test('ignores delimiters inside strings and comments', () => {
    expect(hasUnclosedDelimiters('println("{")')).toBe(false);
    expect(hasUnclosedDelimiters('println("\\"{")')).toBe(false);
    expect(hasUnclosedDelimiters('1 // {')).toBe(false);
  });
});
