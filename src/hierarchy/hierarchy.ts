/**
 * tierdata — Source hierarchy
 *
 * An ordered forest of source ids. Sibling order is the declaration order;
 * ancestry is answered root-first and subtrees in pre-order.
 */

import type { Hierarchy, HierarchyNode, Result, SourceId } from '../types.js';
import { invalidHierarchy } from '../errors.js';

/** Per-source bookkeeping computed once at construction. */
interface IndexedNode {
  readonly parent: SourceId | undefined;
  readonly depth: number;
  /** Position of the node in the forest's pre-order listing. */
  readonly start: number;
  /** One past the position of the node's last descendant. */
  readonly end: number;
}

/**
 * Build a hierarchy from its declared roots.
 *
 * Fails with INVALID_HIERARCHY when a source id is empty or appears more
 * than once, since a source can have only one parent.
 */
export function createHierarchy(roots: readonly HierarchyNode[]): Result<Hierarchy> {
  const order: SourceId[] = [];
  const index = new Map<SourceId, IndexedNode>();

  function visit(node: HierarchyNode, parent: SourceId | undefined, depth: number): string | null {
    if (node.source === '') {
      return 'source ids must not be empty';
    }
    if (index.has(node.source)) {
      return `source "${node.source}" appears more than once`;
    }
    const start = order.length;
    order.push(node.source);
    // Reserve the id before descending so a repeat below it is caught.
    index.set(node.source, { parent, depth, start, end: start + 1 });
    for (const child of node.children) {
      const failure = visit(child, node.source, depth + 1);
      if (failure !== null) return failure;
    }
    index.set(node.source, { parent, depth, start, end: order.length });
    return null;
  }

  for (const root of roots) {
    const failure = visit(root, undefined, 0);
    if (failure !== null) {
      return { ok: false, error: invalidHierarchy(failure) };
    }
  }

  const frozenOrder: readonly SourceId[] = Object.freeze([...order]);

  return {
    ok: true,
    value: {
      ancestorsOf(source: SourceId): readonly SourceId[] | undefined {
        if (!index.has(source)) return undefined;
        const chain: SourceId[] = [];
        let current: SourceId | undefined = source;
        while (current !== undefined) {
          chain.push(current);
          current = index.get(current)?.parent;
        }
        return chain.reverse();
      },

      descendantsOf(source: SourceId): readonly SourceId[] | undefined {
        const node = index.get(source);
        if (node === undefined) return undefined;
        return frozenOrder.slice(node.start, node.end);
      },

      sources(): readonly SourceId[] {
        return frozenOrder;
      },

      render(): string {
        return frozenOrder
          .map((source) => `${'  '.repeat(index.get(source)?.depth ?? 0)}${source}`)
          .join('\n');
      },
    },
  };
}

/** Convenience constructor for a node. */
export function node(source: SourceId, ...children: HierarchyNode[]): HierarchyNode {
  return { source, children };
}
