// src/environment.ts - Variable frames
import { Scope, Value } from './types';

/**
 * One frame of bindings. Lookups fall through to the parent; assignments
 * always bind in this frame.
 */
export class Environment implements Scope {
  private readonly bindings = new Map<string, Value>();

  constructor(private readonly parent?: Scope) {}

  lookup(name: string): Value | undefined {
    return this.bindings.get(name) ?? this.parent?.lookup(name);
  }

  set(name: string, value: Value): void {
    this.bindings.set(name, value);
  }

  has(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  /** Bindings of this frame only, in insertion order. */
  entries(): [string, Value][] {
    return [...this.bindings.entries()];
  }
}
