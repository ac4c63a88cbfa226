import { dirname } from 'node:path';
import { canonicalize } from '@lookform/core';
import type { Manifest, ManifestNode } from './schemas.js';

// ── Selection ───────────────────────────────────────────────────────

export interface ModelSelection {
  /** Only the model with this name. */
  readonly select?: string;
  readonly tag?: string;
  readonly includeModels?: readonly string[];
  readonly excludeModels?: readonly string[];
}

/**
 * Models in the manifest that pass every given filter, ordered by name.
 */
export function selectModels(manifest: Manifest, selection: ModelSelection = {}): ManifestNode[] {
  const include = selection.includeModels && selection.includeModels.length > 0
    ? new Set(selection.includeModels)
    : undefined;
  const exclude = new Set(selection.excludeModels ?? []);

  return Object.values(manifest.nodes)
    .filter((node) => node.resource_type === 'model')
    .filter((node) => selection.select === undefined || node.name === selection.select)
    .filter((node) => selection.tag === undefined || node.tags.includes(selection.tag))
    .filter((node) => include === undefined || include.has(node.name))
    .filter((node) => !exclude.has(node.name))
    .sort((a, b) => a.name.localeCompare(b.name));
}

// ── Naming ──────────────────────────────────────────────────────────

/** Last identifier of a relation name, e.g. `` `proj`.`ds`.`orders` `` → `orders`. */
export function tableNameOf(relationName: string): string {
  const parts = relationName.split('.');
  return parts[parts.length - 1].replace(/[`"]/g, '');
}

/**
 * Base view name for a model: the materialized table when `useTableName` is
 * set and the model has a relation, else the model name with `_v<version>`
 * appended for versioned models.
 */
export function baseNameFor(node: ManifestNode, useTableName: boolean): string {
  if (useTableName && node.relation_name) {
    return canonicalize(tableNameOf(node.relation_name));
  }
  const versioned = node.version != null ? `${node.name}_v${node.version}` : node.name;
  return canonicalize(versioned);
}

/** Directory of the model's source file relative to the models root; `''` at top level. */
export function modelDirOf(node: ManifestNode): string {
  const dir = dirname(node.path);
  return dir === '.' ? '' : dir;
}
