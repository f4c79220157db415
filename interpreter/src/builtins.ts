/**
 * Built-in functions for the Aki interpreter.
 *
 * Builtins live in their own table rather than in the global scope. The
 * interpreter consults the table only after the environment, so a user
 * function with the same name always wins.
 */

import {
  AkiValue,
  mkBool,
  mkFloat,
  mkInt,
  mkMap,
  mkReference,
  mkString,
  mkUnit,
  mkVector,
  typeName,
  valueToString,
} from './values';
import { AkiRuntimeError } from './errors';
import { Heap } from './heap';

export type BuiltinFn = (args: AkiValue[]) => AkiValue;

export interface BuiltinTable {
  isBuiltin(name: string): boolean;
  call(name: string, args: AkiValue[]): AkiValue;
  names(): string[];
}

export interface StdlibOptions {
  /** Where print/println send their text. Defaults to stdout. */
  write?: (text: string) => void;
  /** Heap used by ref/deref. */
  heap?: Heap;
}

export class BuiltinRegistry implements BuiltinTable {
  private readonly fns = new Map<string, BuiltinFn>();

  register(name: string, fn: BuiltinFn): this {
    this.fns.set(name, fn);
    return this;
  }

  isBuiltin(name: string): boolean {
    return this.fns.has(name);
  }

  call(name: string, args: AkiValue[]): AkiValue {
    const fn = this.fns.get(name);
    if (fn === undefined) {
      throw new AkiRuntimeError('UnknownFunction', `no function named '${name}'`);
    }
    return fn(args);
  }

  names(): string[] {
    return [...this.fns.keys()].sort();
  }
}

function builtinError(message: string): AkiRuntimeError {
  return new AkiRuntimeError('BuiltinError', message);
}

const I32_MIN = -2147483648;
const I32_MAX = 2147483647;

/** Float to Integer: truncate, clamp to the i32 range, NaN becomes 0. */
function saturateToInt(n: number): number {
  if (Number.isNaN(n)) return 0;
  return Math.min(I32_MAX, Math.max(I32_MIN, Math.trunc(n)));
}

function expectArgs(name: string, args: AkiValue[], count: number): void {
  if (args.length !== count) {
    const words = ['no arguments', 'exactly one argument', 'exactly two arguments', 'exactly three arguments'];
    throw builtinError(`${name} expects ${words[count] ?? `${count} arguments`}, got ${args.length}`);
  }
}

/**
 * Build the default builtin table.
 */
export function createStdlib(options: StdlibOptions = {}): BuiltinRegistry {
  const write = options.write ?? ((text: string) => { process.stdout.write(text); });
  const heap = options.heap ?? new Heap();
  const registry = new BuiltinRegistry();

  // ---- I/O ----

  registry.register('print', (args) => {
    expectArgs('print', args, 1);
    write(printable('print', args[0]));
    return mkUnit();
  });

  registry.register('println', (args) => {
    expectArgs('println', args, 1);
    write(printable('println', args[0]) + '\n');
    return mkUnit();
  });

  // ---- Conversion ----

  registry.register('to_string', (args) => {
    expectArgs('to_string', args, 1);
    const v = args[0];
    switch (v.kind) {
      case 'int':
      case 'float':
      case 'bool':
      case 'string':
        return mkString(valueToString(v));
      default:
        throw builtinError(`cannot convert ${typeName(v)} to string`);
    }
  });

  registry.register('to_int', (args) => {
    expectArgs('to_int', args, 1);
    const v = args[0];
    switch (v.kind) {
      case 'int': return v;
      case 'float': return mkInt(saturateToInt(v.value));
      case 'string': {
        const n = /^[+-]?\d+$/.test(v.value) ? Number(v.value) : NaN;
        if (Number.isNaN(n) || n > I32_MAX || n < I32_MIN) {
          throw builtinError(`failed to parse '${v.value}' as integer`);
        }
        return mkInt(n);
      }
      default:
        throw builtinError(`cannot convert ${typeName(v)} to integer`);
    }
  });

  registry.register('to_float', (args) => {
    expectArgs('to_float', args, 1);
    const v = args[0];
    switch (v.kind) {
      case 'float': return v;
      case 'int': return mkFloat(v.value);
      case 'string': {
        if (!/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/.test(v.value)) {
          throw builtinError(`failed to parse '${v.value}' as float`);
        }
        return mkFloat(Number(v.value));
      }
      default:
        throw builtinError(`cannot convert ${typeName(v)} to float`);
    }
  });

  registry.register('to_bool', (args) => {
    expectArgs('to_bool', args, 1);
    const v = args[0];
    switch (v.kind) {
      case 'bool': return v;
      case 'int': return mkBool(v.value !== 0);
      case 'string':
        if (v.value === 'true') return mkBool(true);
        if (v.value === 'false') return mkBool(false);
        throw builtinError(`failed to parse '${v.value}' as boolean`);
      default:
        throw builtinError(`cannot convert ${typeName(v)} to boolean`);
    }
  });

  // ---- Collections ----

  registry.register('len', (args) => {
    expectArgs('len', args, 1);
    const v = args[0];
    switch (v.kind) {
      case 'vector': return mkInt(v.elements.length);
      case 'map': return mkInt(v.entries.size);
      case 'string': return mkInt(v.value.length);
      default:
        throw builtinError(`cannot take len of ${typeName(v)}`);
    }
  });

  registry.register('vec', (args) => mkVector([...args]));

  registry.register('push', (args) => {
    expectArgs('push', args, 2);
    const [target, item] = args;
    if (target.kind !== 'vector') {
      throw builtinError(`push expects a Vector, got ${typeName(target)}`);
    }
    return mkVector([...target.elements, item]);
  });

  registry.register('hashmap', (args) => {
    if (args.length % 2 !== 0) {
      throw builtinError('hashmap expects key/value pairs');
    }
    const entries = new Map<string, AkiValue>();
    for (let i = 0; i < args.length; i += 2) {
      entries.set(stringKey('hashmap', args[i]), args[i + 1]);
    }
    return mkMap(entries);
  });

  registry.register('insert', (args) => {
    expectArgs('insert', args, 3);
    const [target, key, value] = args;
    if (target.kind !== 'map') {
      throw builtinError(`insert expects a Map, got ${typeName(target)}`);
    }
    const entries = new Map(target.entries);
    entries.set(stringKey('insert', key), value);
    return mkMap(entries);
  });

  registry.register('contains_key', (args) => {
    expectArgs('contains_key', args, 2);
    const [target, key] = args;
    if (target.kind !== 'map') {
      throw builtinError(`contains_key expects a Map, got ${typeName(target)}`);
    }
    return mkBool(target.entries.has(stringKey('contains_key', key)));
  });

  // ---- Heap ----

  registry.register('ref', (args) => {
    expectArgs('ref', args, 1);
    return mkReference(heap.allocate(args[0]));
  });

  registry.register('deref', (args) => {
    expectArgs('deref', args, 1);
    const r = args[0];
    if (r.kind !== 'reference') {
      throw builtinError(`deref expects a Reference, got ${typeName(r)}`);
    }
    const value = heap.get(r.address);
    if (value === undefined) {
      throw builtinError(`dangling reference #${r.address}`);
    }
    return value;
  });

  return registry;
}

function printable(name: string, v: AkiValue): string {
  if (v.kind === 'function' || v.kind === 'unit') {
    throw builtinError(`unsupported type for ${name}: ${typeName(v)}`);
  }
  return valueToString(v);
}

function stringKey(name: string, key: AkiValue): string {
  if (key.kind !== 'string') {
    throw builtinError(`${name} keys must be String, got ${typeName(key)}`);
  }
  return key.value;
}
