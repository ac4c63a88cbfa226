/**
 * Document Compiler: runs one column set through the full pipeline.
 *
 * Flow: Column[] → HierarchyNode tree → root + nested Views → JoinSpec chain
 *
 * Any fatal error aborts the whole document; nothing partial is returned.
 */
import type {
  Column,
  Diagnostic,
  HierarchyNode,
  JoinSpec,
  NamingOptions,
  View,
} from '../core/types.js';
import type { ColumnSet } from '../core/columns.js';
import { buildHierarchy } from '../core/hierarchy.js';
import { decompose } from './view-decomposer.js';
import { buildJoinChain } from './join-chain.js';

// ── Public API ──────────────────────────────────────────────────────

export interface CompileOptions {
  readonly baseName: string;
  readonly naming?: Partial<NamingOptions>;
}

export interface DocumentResult {
  readonly baseName: string;
  readonly hierarchy: HierarchyNode;
  readonly rootView: View;
  readonly nestedViews: ReadonlyMap<string, View>;
  readonly joins: readonly JoinSpec[];
  readonly diagnostics: readonly Diagnostic[];
}

export function compileDocument(
  columns: ColumnSet | Iterable<Column>,
  options: CompileOptions,
): DocumentResult {
  const hierarchy = buildHierarchy(columns);
  const { rootView, nestedViews } = decompose(hierarchy, options);
  const joins = buildJoinChain(nestedViews, hierarchy, rootView);

  return {
    baseName: options.baseName,
    hierarchy,
    rootView,
    nestedViews,
    joins,
    diagnostics: collectDiagnostics([rootView, ...nestedViews.values()]),
  };
}

// ── Diagnostics ─────────────────────────────────────────────────────

function collectDiagnostics(views: readonly View[]): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];

  for (const view of views) {
    for (const field of view.fields) {
      if (field.renamedFrom !== undefined) {
        diagnostics.push({
          severity: 'warning',
          message: field.note ?? `Renamed '${field.renamedFrom}' to '${field.name}'`,
          path: field.column.path,
          view: view.name,
        });
      }
    }

    for (const group of view.timeBuckets) {
      if (group.renamedFrom !== undefined) {
        diagnostics.push({
          severity: 'info',
          message: `Time-bucket group '${group.renamedFrom}' renamed to '${group.name}'`,
          path: group.column.path,
          view: view.name,
        });
      }
    }

    if (!view.isRoot && view.fields.length === 1) {
      diagnostics.push({
        severity: 'info',
        message: `Repeated group '${view.path}' has no columns of its own`,
        path: view.path,
        view: view.name,
      });
    }
  }

  return diagnostics;
}
