import type { Column, HierarchyNode, NodeKind } from './types.js';
import { ColumnSet, createColumn } from './columns.js';
import { isArrayType } from './type-descriptor.js';

// ── Path helpers ────────────────────────────────────────────────────

export function parentPathOf(path: string): string {
  const idx = path.lastIndexOf('.');
  return idx === -1 ? '' : path.slice(0, idx);
}

export function lastSegmentOf(path: string): string {
  return path.slice(path.lastIndexOf('.') + 1);
}

/** Number of dots in the path; `0` for top-level columns. */
export function pathDepth(path: string): number {
  let depth = 0;
  for (const char of path) {
    if (char === '.') depth += 1;
  }
  return depth;
}

// ── Classification ──────────────────────────────────────────────────

/**
 * `ArrayOfScalar` is an array with exactly one whitespace-free inner type
 * (a bare primitive); any other array is `ArrayOfStruct`. A non-array with
 * registered descendants is a `Struct`.
 */
export function classifyColumn(column: Column, hasChildren: boolean): NodeKind {
  if (isArrayType(column.declaredType)) {
    const [inner] = column.innerTypes;
    return column.innerTypes.length === 1 && !/\s/.test(inner)
      ? 'ArrayOfScalar'
      : 'ArrayOfStruct';
  }
  return hasChildren ? 'Struct' : 'Scalar';
}

// ── buildHierarchy ──────────────────────────────────────────────────

interface Registration {
  column?: Column;
  originalPath: string;
}

/**
 * Build the column tree under a virtual super-root (path `''`).
 *
 * Every prefix of every column path becomes a node; prefixes without a
 * column of their own get a synthesized `STRUCT` column. Parent/child links
 * are pure path relationships held in ordered maps.
 */
export function buildHierarchy(columns: ColumnSet | Iterable<Column>): HierarchyNode {
  const set = columns instanceof ColumnSet ? columns : ColumnSet.from(columns);
  const registry = new Map<string, Registration>();
  const childIndex = new Map<string, Set<string>>([['', new Set()]]);

  for (const column of set) {
    const segments = column.path.split('.');
    const originalSegments = column.originalPath.split('.');

    for (let i = 1; i <= segments.length; i++) {
      const prefix = segments.slice(0, i).join('.');
      const isOwnPath = i === segments.length;
      const existing = registry.get(prefix);

      if (!existing) {
        registry.set(prefix, {
          column: isOwnPath ? column : undefined,
          originalPath: originalSegments.slice(0, i).join('.'),
        });
      } else if (isOwnPath) {
        existing.column = column;
        existing.originalPath = column.originalPath;
      }

      const parent = segments.slice(0, i - 1).join('.');
      let siblings = childIndex.get(parent);
      if (!siblings) {
        siblings = new Set();
        childIndex.set(parent, siblings);
      }
      siblings.add(prefix);
    }
  }

  const buildNode = (path: string): HierarchyNode => {
    const registration = registry.get(path);
    if (!registration) {
      throw new Error(`Hierarchy path '${path}' was never registered`);
    }

    const childPaths = [...(childIndex.get(path) ?? [])].sort();
    const children = new Map<string, HierarchyNode>();
    for (const childPath of childPaths) {
      children.set(lastSegmentOf(childPath), buildNode(childPath));
    }

    const synthesized = registration.column === undefined;
    const column =
      registration.column ??
      createColumn({
        path,
        originalPath: registration.originalPath,
        declaredType: 'STRUCT',
      });

    return {
      path,
      segment: lastSegmentOf(registration.originalPath),
      column,
      kind: synthesized ? 'Struct' : classifyColumn(column, children.size > 0),
      synthesized,
      children,
    };
  };

  const topLevel = new Map<string, HierarchyNode>();
  for (const childPath of [...(childIndex.get('') ?? [])].sort()) {
    topLevel.set(childPath, buildNode(childPath));
  }

  return {
    path: '',
    segment: '',
    column: createColumn({ path: '', declaredType: 'STRUCT' }),
    kind: 'Struct',
    synthesized: true,
    children: topLevel,
  };
}

// ── Traversal ───────────────────────────────────────────────────────

/** Pre-order walk; returning `false` skips the node's descendants. */
export function walkHierarchy(
  root: HierarchyNode,
  callback: (node: HierarchyNode) => void | false,
): void {
  const result = callback(root);
  if (result === false) return;

  for (const child of root.children.values()) {
    walkHierarchy(child, callback);
  }
}

export function findHierarchyNodes(
  root: HierarchyNode,
  predicate: (node: HierarchyNode) => boolean,
): HierarchyNode[] {
  const results: HierarchyNode[] = [];
  walkHierarchy(root, (node) => {
    if (node !== root && predicate(node)) {
      results.push(node);
    }
  });
  return results;
}

/** Look up a node by (case-insensitive) path. */
export function getHierarchyNode(
  root: HierarchyNode,
  path: string,
): HierarchyNode | undefined {
  if (path === '') return root;

  let node: HierarchyNode | undefined = root;
  for (const segment of path.toLowerCase().split('.')) {
    node = node.children.get(segment);
    if (!node) return undefined;
  }
  return node;
}

/** Every descendant that owns a real (non-synthesized) column. */
export function columnsUnder(node: HierarchyNode): Column[] {
  return findHierarchyNodes(node, (n) => !n.synthesized).map((n) => n.column);
}
