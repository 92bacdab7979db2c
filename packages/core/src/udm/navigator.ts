/**
 * Path navigation over UDM trees
 *
 * Segments are applied left to right to a working set that starts as
 * `[root]`. Selectors that do not fit the node they meet produce nothing.
 * The navigator knows nothing about how predicates are written: the caller
 * supplies `evaluatePredicate` for whatever predicate type `P` it uses.
 */

import { NavigationError, WeftError } from "../compiler/weft/errors.js";
import { type UDMNode, string } from "./node.js";

export type PathSegment<P = never> =
  | { readonly kind: "property"; readonly name: string }
  | { readonly kind: "index"; readonly index: number }
  | { readonly kind: "wildcard" }
  | { readonly kind: "recursive" }
  | { readonly kind: "attribute"; readonly name: string }
  | { readonly kind: "predicate"; readonly predicate: P };

export interface NavigateOptions<P> {
  evaluatePredicate?: (predicate: P, node: UDMNode) => boolean;
}

export function navigate<P = never>(
  root: UDMNode,
  path: readonly PathSegment<P>[],
  options: NavigateOptions<P> = {}
): UDMNode[] {
  let working: UDMNode[] = [root];

  for (const segment of path) {
    const next: UDMNode[] = [];
    for (const node of working) {
      applySegment(node, segment, options, next);
    }
    working = next;
  }

  return working;
}

function applySegment<P>(
  node: UDMNode,
  segment: PathSegment<P>,
  options: NavigateOptions<P>,
  out: UDMNode[]
): void {
  switch (segment.kind) {
    case "property": {
      if (node.kind !== "object") return;
      const value = node.properties.get(segment.name);
      if (value !== undefined) out.push(value);
      return;
    }

    case "index": {
      if (node.kind !== "array") return;
      const length = node.elements.length;
      const resolved = segment.index < 0 ? length + segment.index : segment.index;
      const value = Number.isInteger(resolved) ? node.elements[resolved] : undefined;
      if (value !== undefined) out.push(value);
      return;
    }

    case "attribute": {
      if (node.kind !== "object") return;
      const value = node.metadata.attributes.get(segment.name);
      if (value !== undefined) out.push(string(value));
      return;
    }

    case "wildcard":
      if (node.kind === "array") out.push(...node.elements);
      else if (node.kind === "object") out.push(...node.properties.values());
      return;

    case "recursive":
      collectDescendants(node, out);
      return;

    case "predicate": {
      const candidates = node.kind === "array" ? node.elements : [node];
      for (const candidate of candidates) {
        if (testPredicate(segment.predicate, candidate, options)) out.push(candidate);
      }
      return;
    }
  }
}

/** Node itself, then every descendant in pre-order */
function collectDescendants(root: UDMNode, out: UDMNode[]): void {
  const stack: UDMNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;
    out.push(node);

    const children =
      node.kind === "array"
        ? node.elements
        : node.kind === "object"
          ? [...node.properties.values()]
          : [];
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (child !== undefined) stack.push(child);
    }
  }
}

function testPredicate<P>(predicate: P, node: UDMNode, options: NavigateOptions<P>): boolean {
  const evaluate = options.evaluatePredicate;
  if (!evaluate) {
    throw new NavigationError("Predicate selector used without a predicate evaluator");
  }
  try {
    return evaluate(predicate, node);
  } catch (error) {
    if (error instanceof NavigationError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new NavigationError(`Predicate failed: ${message}`, {
      cause: error,
      location: error instanceof WeftError ? error.location : undefined,
      source: error instanceof WeftError ? error.source : undefined,
    });
  }
}
