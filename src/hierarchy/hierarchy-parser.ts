/**
 * tierdata — Hierarchy parser
 *
 * Turns a parsed YAML/JSON tree into a Hierarchy. Nesting denotes
 * parent/child:
 *
 *   global.yaml:
 *     teams/myteam.yaml:
 *       - teams/myteam/dev.yaml
 *       - teams/myteam/prod.yaml
 *     teams/otherteam.yaml:
 *
 * A string is a leaf, a sequence lists siblings, and a mapping names
 * sources whose values are their children (empty for null).
 */

import type { Hierarchy, HierarchyNode, Result } from '../types.js';
import { invalidHierarchy } from '../errors.js';
import { createHierarchy } from './hierarchy.js';

function entriesOf(raw: unknown): Array<[unknown, unknown]> | undefined {
  if (raw instanceof Map) {
    return [...raw.entries()];
  }
  if (typeof raw === 'object' && raw !== null && !Array.isArray(raw)) {
    return Object.entries(raw);
  }
  return undefined;
}

function toNodes(raw: unknown, path: string): Result<HierarchyNode[]> {
  if (raw === null || raw === undefined) {
    return { ok: true, value: [] };
  }

  if (typeof raw === 'string') {
    return { ok: true, value: [{ source: raw, children: [] }] };
  }

  if (Array.isArray(raw)) {
    const nodes: HierarchyNode[] = [];
    for (let i = 0; i < raw.length; i++) {
      const parsed = toNodes(raw[i], `${path}[${String(i)}]`);
      if (!parsed.ok) return parsed;
      nodes.push(...parsed.value);
    }
    return { ok: true, value: nodes };
  }

  const entries = entriesOf(raw);
  if (entries !== undefined) {
    const nodes: HierarchyNode[] = [];
    for (const [key, value] of entries) {
      if (typeof key !== 'string') {
        return {
          ok: false,
          error: invalidHierarchy(`${path}: source ids must be strings, got ${typeof key}`),
        };
      }
      const children = toNodes(value, `${path}.${key}`);
      if (!children.ok) return children;
      nodes.push({ source: key, children: children.value });
    }
    return { ok: true, value: nodes };
  }

  return {
    ok: false,
    error: invalidHierarchy(`${path}: expected a source id, a list or a mapping, got ${typeof raw === 'bigint' ? 'integer' : typeof raw}`),
  };
}

/**
 * Parse a hierarchy from plain YAML/JSON data.
 *
 * @param raw - The parsed document.
 * @returns The hierarchy, or INVALID_HIERARCHY.
 */
export function parseHierarchy(raw: unknown): Result<Hierarchy> {
  const roots = toNodes(raw, '$');
  if (!roots.ok) return roots;
  if (roots.value.length === 0) {
    return { ok: false, error: invalidHierarchy('hierarchy declares no sources') };
  }
  return createHierarchy(roots.value);
}
