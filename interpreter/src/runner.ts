/**
 * Runs one source unit: scan, parse, then evaluate the top-level nodes in
 * order. Used by the CLI, the REPL and the tests.
 */

import { parseSource } from './parser';
import { Interpreter } from './interpreter';
import { AkiValue, mkUnit } from './values';

export interface ExecuteOptions {
  /** Called with every non-Unit top-level value, in order. */
  onResult?: (value: AkiValue) => void;
}

/**
 * Execute `source` against an existing interpreter, so state carries over
 * between calls (the REPL relies on this). The first lex, parse or runtime
 * error stops the unit and propagates to the caller.
 */
export function executeSource(source: string, interpreter: Interpreter, options: ExecuteOptions = {}): AkiValue {
  const nodes = parseSource(source);
  let last: AkiValue = mkUnit();
  for (const node of nodes) {
    last = interpreter.interpret(node);
    if (last.kind !== 'unit') {
      options.onResult?.(last);
    }
  }
  return last;
}
