/**
 * Lexical environments
 *
 * Frames live in one arena per evaluation and point at their parent by index,
 * so closures hold a number instead of a chain of objects and lookups walk the
 * chain with a loop.
 */

import type { RuntimeValue } from "./values.js";

export type FrameId = number;

const NO_PARENT = -1;

interface Frame {
  readonly parent: FrameId;
  readonly bindings: Map<string, RuntimeValue>;
}

export class Environment {
  private readonly frames: Frame[] = [];

  /** The root frame, created with the arena */
  readonly root: FrameId;

  constructor() {
    this.root = this.push(NO_PARENT);
  }

  /** Create a frame whose parent is `parent` */
  child(parent: FrameId, bindings?: Iterable<readonly [string, RuntimeValue]>): FrameId {
    this.frame(parent);
    const id = this.push(parent);
    if (bindings) {
      for (const [name, value] of bindings) {
        this.define(id, name, value);
      }
    }
    return id;
  }

  /** Bind `name` in `frame`, shadowing outer bindings */
  define(frame: FrameId, name: string, value: RuntimeValue): void {
    this.frame(frame).bindings.set(name, value);
  }

  /** Innermost binding of `name` visible from `frame` */
  lookup(frame: FrameId, name: string): RuntimeValue | undefined {
    let current = frame;
    while (current !== NO_PARENT) {
      const entry = this.frame(current);
      const value = entry.bindings.get(name);
      if (value !== undefined) return value;
      current = entry.parent;
    }
    return undefined;
  }

  /** Every name visible from `frame` */
  visibleNames(frame: FrameId): Set<string> {
    const names = new Set<string>();
    let current = frame;
    while (current !== NO_PARENT) {
      const entry = this.frame(current);
      for (const name of entry.bindings.keys()) names.add(name);
      current = entry.parent;
    }
    return names;
  }

  /** Number of frames allocated so far */
  get size(): number {
    return this.frames.length;
  }

  private push(parent: FrameId): FrameId {
    this.frames.push({ parent, bindings: new Map() });
    return this.frames.length - 1;
  }

  private frame(id: FrameId): Frame {
    const frame = this.frames[id];
    if (!frame) {
      throw new RangeError(`Unknown environment frame ${id}`);
    }
    return frame;
  }
}
