/**
 * Lexical scoping environment for the Aki interpreter.
 *
 * Each environment holds a map of bindings and a link to its parent
 * scope. Closures do not share their defining scope: they hold a
 * snapshot taken with `snapshot()`, a deep copy of the whole chain.
 */

import { AkiValue } from './values';
import { AkiNameError } from './errors';

export class Environment {
  private readonly vars: Map<string, AkiValue>;
  private readonly parent: Environment | null;

  constructor(parent: Environment | null = null) {
    this.vars = new Map();
    this.parent = parent;
  }

  /**
   * Look up a variable by name, traversing the parent chain.
   */
  get(name: string): AkiValue {
    const value = this.lookup(name);
    if (value === undefined) {
      throw new AkiNameError(name);
    }
    return value;
  }

  /**
   * Like `get`, but returns undefined for unbound names.
   */
  lookup(name: string): AkiValue | undefined {
    let env: Environment | null = this;
    while (env !== null) {
      const value = env.vars.get(name);
      if (value !== undefined) return value;
      env = env.parent;
    }
    return undefined;
  }

  has(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  /**
   * Insert or overwrite a binding in this scope only.
   */
  define(name: string, value: AkiValue): void {
    this.vars.set(name, value);
  }

  /**
   * Overwrite the binding in the nearest scope that has one.
   * Returns false when no scope on the chain binds `name`.
   */
  assign(name: string, value: AkiValue): boolean {
    let env: Environment | null = this;
    while (env !== null) {
      if (env.vars.has(name)) {
        env.vars.set(name, value);
        return true;
      }
      env = env.parent;
    }
    return false;
  }

  /**
   * Create a child scope.
   */
  child(): Environment {
    return new Environment(this);
  }

  /**
   * Copy this scope and every ancestor. Bindings added to or replaced in
   * the copy are invisible to the original, and vice versa.
   */
  snapshot(): Environment {
    const copy = new Environment(this.parent !== null ? this.parent.snapshot() : null);
    for (const [name, value] of this.vars) {
      copy.vars.set(name, value);
    }
    return copy;
  }

  /**
   * Bindings defined directly in this scope.
   */
  entries(): IterableIterator<[string, AkiValue]> {
    return this.vars.entries();
  }

  isGlobal(): boolean {
    return this.parent === null;
  }
}
