/**
 * Result inspection and plain-object rendering.
 *
 * Plain objects stringify their keys (`1` and `"1"` collapse) and render
 * tuples as arrays, so they are for display and JSON output only.
 */

import {
  isCellList,
  isTuple,
  type BranchNode,
  type CellValue,
  type NestedNode,
  type NestedResult,
  type PlainNested,
  type PlainValue,
} from './types.js';

function plainValue(value: CellValue): PlainValue {
  if (isTuple(value)) {
    return [...value];
  }
  if (isCellList(value)) {
    return value.map(plainValue);
  }
  return value;
}

function plainNode(node: NestedNode): PlainNested | PlainValue {
  switch (node.kind) {
    case 'branch':
      return plainBranch(node);
    case 'value':
      return plainValue(node.value);
    case 'record': {
      const fields: { [field: string]: PlainValue } = {};
      for (const [name, value] of node.fields) {
        fields[name] = plainValue(value);
      }
      return fields;
    }
    default: {
      const _exhaustiveCheck: never = node;
      throw new Error(`Unhandled node: ${JSON.stringify(_exhaustiveCheck)}`);
    }
  }
}

function plainBranch(branch: BranchNode): PlainNested {
  const out: PlainNested = {};
  for (const [key, child] of branch.children) {
    out[String(key)] = plainNode(child);
  }
  return out;
}

/**
 * Render a result as nested plain objects.
 *
 * @example
 * ```typescript
 * JSON.stringify(toPlainObject(transform(table, { hierarchy: ['G'], valueColumns: 'v' })));
 * // {"A":2,"B":5}
 * ```
 */
export function toPlainObject(result: NestedResult): PlainNested {
  return plainBranch(result.root);
}

/**
 * Number of terminal slots in a result
 */
export function countLeaves(result: NestedResult): number {
  let count = 0;
  const stack: BranchNode[] = [result.root];
  while (stack.length > 0) {
    const branch = stack.pop();
    if (branch === undefined) break;
    for (const child of branch.children.values()) {
      if (child.kind === 'branch') {
        stack.push(child);
      } else {
        count++;
      }
    }
  }
  return count;
}

/**
 * Distinct depths at which terminal slots occur. A well-formed result
 * yields exactly `[result.depth]` (or `[]` when empty).
 */
export function leafDepths(result: NestedResult): number[] {
  const depths = new Set<number>();
  const visit = (branch: BranchNode, depth: number): void => {
    for (const child of branch.children.values()) {
      if (child.kind === 'branch') {
        visit(child, depth + 1);
      } else {
        depths.add(depth);
      }
    }
  };
  visit(result.root, 1);
  return [...depths].sort((a, b) => a - b);
}
