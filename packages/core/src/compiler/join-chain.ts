import type { HierarchyNode, JoinSpec, View } from '../core/types.js';
import { HierarchyConsistencyError } from '../core/errors.js';
import { fieldNameOf, relativeSegments } from '../core/naming.js';
import { findHierarchyNodes, getHierarchyNode, parentPathOf, pathDepth } from '../core/hierarchy.js';

function byDepthThenPath(a: HierarchyNode, b: HierarchyNode): number {
  const depth = pathDepth(a.path) - pathDepth(b.path);
  if (depth !== 0) return depth;
  return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
}

/** Nearest proper ancestor that is itself a repeated group, or undefined. */
function repeatedAncestorOf(root: HierarchyNode, path: string): HierarchyNode | undefined {
  for (let current = parentPathOf(path); current !== ''; current = parentPathOf(current)) {
    const ancestor = getHierarchyNode(root, current);
    if (ancestor?.kind === 'ArrayOfStruct') return ancestor;
  }
  return undefined;
}

/**
 * Field in `parent` that carries the repeated group. Its name is what the
 * unnest expression references, including any `_conflict` rename.
 */
function unnestFieldOf(parent: View, node: HierarchyNode, parentPath: string): string {
  const marker = parent.fields.find(
    (field) => field.role === 'repeated-group' && field.column.path === node.path,
  );
  return marker?.name ?? fieldNameOf(relativeSegments(node.column.originalPath, parentPath));
}

/**
 * Ordered unnesting joins, shallowest repeated group first, so a join never
 * references a view introduced by a later one.
 *
 * @throws HierarchyConsistencyError when a repeated group or one of its
 *   repeated ancestors has no view
 */
export function buildJoinChain(
  nestedViews: ReadonlyMap<string, View>,
  root: HierarchyNode,
  rootView: View,
): JoinSpec[] {
  const repeated = findHierarchyNodes(root, (node) => node.kind === 'ArrayOfStruct')
    .sort(byDepthThenPath);

  const joined = new Map<string, View>();
  const joins: JoinSpec[] = [];

  for (const node of repeated) {
    const childView = nestedViews.get(node.path);
    if (!childView) {
      throw new HierarchyConsistencyError(node.path, 'no nested view was built for it');
    }

    const ancestor = repeatedAncestorOf(root, node.path);
    let parentView = rootView;
    let parentPath = '';
    if (ancestor) {
      const ancestorView = joined.get(ancestor.path);
      if (!ancestorView) {
        throw new HierarchyConsistencyError(
          node.path,
          `enclosing repeated group '${ancestor.path}' has no joined view`,
        );
      }
      parentView = ancestorView;
      parentPath = ancestor.column.originalPath;
    }

    joins.push({
      childView: childView.name,
      parentView: parentView.name,
      unnestPath: unnestFieldOf(parentView, node, parentPath),
      depth: pathDepth(node.path),
    });
    joined.set(node.path, childView);
  }

  return joins;
}
