/**
 * Hierarchical Key Lookup
 *
 * Partial-path queries over a nested result. A lookup never throws: absent
 * paths and exhausted frontiers answer with an empty result.
 */

import type { BranchNode, NestedNode, NestedResult, Scalar } from './types.js';

/**
 * A single top-level key, or the keys to descend through, outermost first.
 * An empty array addresses the root.
 */
export type KeyPath = Scalar | readonly Scalar[];

function isKeyList(path: KeyPath): path is readonly Scalar[] {
  return Array.isArray(path);
}

function toSegments(path: KeyPath): readonly Scalar[] {
  return isKeyList(path) ? path : [path];
}

/**
 * Follow `path` from the root. Undefined when a segment is absent.
 */
export function locate(result: NestedResult, path: KeyPath): NestedNode | undefined {
  let node: NestedNode = result.root;
  for (const segment of toSegments(path)) {
    if (node.kind !== 'branch') {
      return undefined;
    }
    const child: NestedNode | undefined = node.children.get(segment);
    if (child === undefined) {
      return undefined;
    }
    node = child;
  }
  return node;
}

/**
 * Walk `level - 1` generations breadth-first and return the final frontier.
 */
function frontierAt(start: BranchNode, level: number): BranchNode[] {
  let frontier: BranchNode[] = [start];
  for (let step = 1; step < level && frontier.length > 0; step++) {
    const next: BranchNode[] = [];
    for (const branch of frontier) {
      for (const child of branch.children.values()) {
        if (child.kind === 'branch') {
          next.push(child);
        }
      }
    }
    frontier = next;
  }
  return frontier;
}

function collectKeys(result: NestedResult, path: KeyPath, level: number): Scalar[] {
  const start = locate(result, path);
  if (start === undefined || start.kind !== 'branch') {
    return [];
  }
  const keys: Scalar[] = [];
  for (const branch of frontierAt(start, Math.max(1, Math.floor(level)))) {
    for (const key of branch.children.keys()) {
      keys.push(key);
    }
  }
  return keys;
}

/**
 * Keys `level` generations below the node at `path`, in traversal order.
 * Keys that repeat under different branches are all kept.
 *
 * @example
 * ```typescript
 * keysAt(result, 'North');        // ['Hanoi', 'Haiphong']
 * keysAt(result, [], 2);          // every city, all regions
 * keysAt(result, 'Nowhere', 2);   // []
 * ```
 */
export function keysAt(result: NestedResult, path: KeyPath, level = 1): Scalar[] {
  return collectKeys(result, path, level);
}

/**
 * Union of {@link keysAt} over several start paths, first-seen order.
 */
export function keysAtMany(result: NestedResult, paths: readonly KeyPath[], level = 1): Set<Scalar> {
  const keys = new Set<Scalar>();
  for (const path of paths) {
    for (const key of collectKeys(result, path, level)) {
      keys.add(key);
    }
  }
  return keys;
}
