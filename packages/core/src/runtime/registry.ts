/**
 * Function registry: named functions callable from scripts.
 */

import type { SourceLocation } from "../compiler/weft/errors.js";
import type { UDMNode } from "../udm/node.js";
import type { FunctionArgument } from "./values.js";

/** Call site details passed to a registry function */
export interface CallContext {
  readonly name: string;
  readonly location: SourceLocation;
}

export interface FunctionDescriptor {
  readonly name: string;
  readonly minArgs: number;
  /** Omitted means exactly `minArgs`; `Infinity` for variadic functions */
  readonly maxArgs?: number;
  /** e.g. `map(array, fn)` */
  readonly signature: string;
  readonly description: string;
  call(args: readonly FunctionArgument[], context: CallContext): UDMNode;
}

export interface FunctionRegistry {
  lookup(name: string): FunctionDescriptor | undefined;
  names(): string[];
}

export class MapFunctionRegistry implements FunctionRegistry {
  private readonly functions: Map<string, FunctionDescriptor> = new Map();

  constructor(descriptors: Iterable<FunctionDescriptor> = []) {
    for (const descriptor of descriptors) {
      this.register(descriptor);
    }
  }

  /**
   * Register a function. A function with the same name is replaced.
   */
  register(descriptor: FunctionDescriptor): this {
    this.functions.set(descriptor.name, descriptor);
    return this;
  }

  /** Remove a function by name. Returns whether it existed. */
  unregister(name: string): boolean {
    return this.functions.delete(name);
  }

  /** Copy of this registry with `overrides` registered on top */
  extend(overrides: Iterable<FunctionDescriptor>): MapFunctionRegistry {
    const copy = new MapFunctionRegistry(this.functions.values());
    for (const descriptor of overrides) {
      copy.register(descriptor);
    }
    return copy;
  }

  lookup(name: string): FunctionDescriptor | undefined {
    return this.functions.get(name);
  }

  has(name: string): boolean {
    return this.functions.has(name);
  }

  /** Registered names, sorted */
  names(): string[] {
    return Array.from(this.functions.keys()).sort();
  }

  /** Registered descriptors, sorted by name */
  list(): FunctionDescriptor[] {
    return this.names().flatMap((name) => {
      const descriptor = this.functions.get(name);
      return descriptor ? [descriptor] : [];
    });
  }
}

/** Upper arity bound of a descriptor */
export function maxArity(descriptor: FunctionDescriptor): number {
  return descriptor.maxArgs ?? descriptor.minArgs;
}
