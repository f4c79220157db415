/**
 * Runtime value representations for the Aki interpreter.
 */

import type { Block, Param } from './ast';
import type { Environment } from './environment';

export type AkiValue =
  | { kind: 'int'; value: number }
  | { kind: 'float'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'bool'; value: boolean }
  | { kind: 'vector'; elements: readonly AkiValue[] }
  | { kind: 'map'; entries: ReadonlyMap<string, AkiValue> }
  | { kind: 'unit' }
  | FunctionValue
  | { kind: 'reference'; address: number };

export interface FunctionValue {
  kind: 'function';
  name: string;
  params: readonly Param[];
  body: Block;
  closure: Environment;
}

export type AkiValueKind = AkiValue['kind'];

// ---- Value constructors ----

/**
 * Integers are i32: anything outside the range wraps.
 */
export function mkInt(value: number): AkiValue {
  return { kind: 'int', value: value | 0 };
}

export function mkFloat(value: number): AkiValue {
  return { kind: 'float', value };
}

export function mkString(value: string): AkiValue {
  return { kind: 'string', value };
}

export function mkBool(value: boolean): AkiValue {
  return { kind: 'bool', value };
}

export function mkUnit(): AkiValue {
  return { kind: 'unit' };
}

export function mkVector(elements: readonly AkiValue[]): AkiValue {
  return { kind: 'vector', elements };
}

export function mkMap(entries: ReadonlyMap<string, AkiValue>): AkiValue {
  return { kind: 'map', entries };
}

export function mkFunction(
  name: string,
  params: readonly Param[],
  body: Block,
  closure: Environment,
): FunctionValue {
  return { kind: 'function', name, params, body, closure };
}

export function mkReference(address: number): AkiValue {
  return { kind: 'reference', address };
}

// ---- Value utilities ----

/**
 * Display name of a value's runtime type, as used in error messages.
 */
export function typeName(v: AkiValue): string {
  switch (v.kind) {
    case 'int': return 'Integer';
    case 'float': return 'Float';
    case 'string': return 'String';
    case 'bool': return 'Boolean';
    case 'vector': return 'Vector';
    case 'map': return 'Map';
    case 'unit': return 'Unit';
    case 'function': return 'Function';
    case 'reference': return 'Reference';
  }
}

export function valueToString(v: AkiValue): string {
  switch (v.kind) {
    case 'int': return String(v.value);
    case 'float': return formatFloat(v.value);
    case 'string': return v.value;
    case 'bool': return String(v.value);
    case 'unit': return '()';
    case 'vector': return `[${v.elements.map(valueToString).join(', ')}]`;
    case 'map': {
      const pairs: string[] = [];
      v.entries.forEach((val, key) => {
        pairs.push(`${JSON.stringify(key)}: ${valueToString(val)}`);
      });
      return `{${pairs.join(', ')}}`;
    }
    case 'function': return `<func ${v.name}/${v.params.length}>`;
    case 'reference': return `<ref #${v.address}>`;
  }
}

/**
 * Whole floats keep a trailing `.0` so they read differently from
 * Integers. Non-finite values print as `inf`, `-inf` and `NaN`.
 */
function formatFloat(n: number): string {
  if (Number.isNaN(n)) return 'NaN';
  if (n === Infinity) return 'inf';
  if (n === -Infinity) return '-inf';
  const s = String(n);
  return /^-?\d+$/.test(s) ? s + '.0' : s;
}

export function valuesEqual(a: AkiValue, b: AkiValue): boolean {
  if (isNumeric(a) && isNumeric(b)) {
    return a.value === b.value;
  }
  switch (a.kind) {
    case 'string':
      return b.kind === 'string' && a.value === b.value;
    case 'bool':
      return b.kind === 'bool' && a.value === b.value;
    case 'unit':
      return b.kind === 'unit';
    case 'reference':
      return b.kind === 'reference' && a.address === b.address;
    case 'vector': {
      if (b.kind !== 'vector' || a.elements.length !== b.elements.length) return false;
      return a.elements.every((el, i) => valuesEqual(el, b.elements[i]));
    }
    case 'map': {
      if (b.kind !== 'map' || a.entries.size !== b.entries.size) return false;
      for (const [k, v] of a.entries) {
        const bv = b.entries.get(k);
        if (bv === undefined || !valuesEqual(v, bv)) return false;
      }
      return true;
    }
    default:
      return a === b;
  }
}

export function isNumeric(v: AkiValue): v is Extract<AkiValue, { kind: 'int' | 'float' }> {
  return v.kind === 'int' || v.kind === 'float';
}
