/**
 * Function Registry
 * Name-to-descriptor lookup for function-call tokens
 */

import type { ResultType } from '../ast-nodes.js';

// ============================================================
// FUNCTION DESCRIPTOR
// ============================================================

export interface FunctionDescriptor {
  /** Canonical name; lookups are case-insensitive */
  readonly name: string;
  readonly minArity: number;
  /** null = variadic */
  readonly maxArity: number | null;
  readonly resultType: ResultType;
  readonly description?: string | undefined;
}

/** Argument counts a descriptor accepts, in the form error messages use */
export function describeArity(fn: FunctionDescriptor): string {
  if (fn.maxArity === null) return `at least ${fn.minArity}`;
  if (fn.maxArity === fn.minArity) return String(fn.minArity);
  const counts: number[] = [];
  for (let n = fn.minArity; n <= fn.maxArity; n++) counts.push(n);
  return counts.join(', ');
}

export function acceptsArity(fn: FunctionDescriptor, count: number): boolean {
  if (count < fn.minArity) return false;
  return fn.maxArity === null || count <= fn.maxArity;
}

// ============================================================
// REGISTRY
// ============================================================

export class FunctionRegistry {
  private readonly byKey = new Map<string, FunctionDescriptor>();

  constructor(descriptors: readonly FunctionDescriptor[] = []) {
    for (const descriptor of descriptors) {
      this.register(descriptor);
    }
  }

  /**
   * Add or replace a function.
   * @throws TypeError when the arity bounds are inconsistent
   */
  register(descriptor: FunctionDescriptor): this {
    if (descriptor.name.trim() === '') {
      throw new TypeError('Function name must not be empty');
    }
    if (!Number.isInteger(descriptor.minArity) || descriptor.minArity < 0) {
      throw new TypeError(
        `Function ${descriptor.name}: minArity must be a non-negative integer`
      );
    }
    if (
      descriptor.maxArity !== null &&
      (!Number.isInteger(descriptor.maxArity) ||
        descriptor.maxArity < descriptor.minArity)
    ) {
      throw new TypeError(
        `Function ${descriptor.name}: maxArity must be an integer >= minArity`
      );
    }

    this.byKey.set(descriptor.name.toLowerCase(), descriptor);
    return this;
  }

  get(name: string): FunctionDescriptor | undefined {
    return this.byKey.get(name.toLowerCase());
  }

  has(name: string): boolean {
    return this.byKey.has(name.toLowerCase());
  }

  names(): string[] {
    return [...this.byKey.values()].map((fn) => fn.name);
  }

  get size(): number {
    return this.byKey.size;
  }
}
