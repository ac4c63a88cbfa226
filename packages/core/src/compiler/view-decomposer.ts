/**
 * View Decomposer: partitions a column hierarchy into one root view and one
 * nested view per repeated group (array of structs).
 *
 * Flow: HierarchyNode tree → owner-grouped members → time-bucket groups →
 * draft fields → collision-resolved FieldSpecs per View
 */
import type {
  Column,
  FieldRole,
  FieldSpec,
  HierarchyNode,
  NamingOptions,
  TimeBucketGroup,
  View,
} from '../core/types.js';
import {
  fieldNameOf,
  relativeSegments,
  resolveCollision,
  timeGroupNameOf,
  titleCase,
  viewNameFor,
  canonicalize,
} from '../core/naming.js';
import {
  generatedNamesFor,
  isoFieldNames,
  resolveTimeframes,
  timeBucketKindOf,
} from '../core/timeframes.js';
import { HierarchyConsistencyError } from '../core/errors.js';

// ── Public API ──────────────────────────────────────────────────────

export interface DecomposeOptions {
  /** Name of the root view; nested views are prefixed with it. */
  readonly baseName: string;
  readonly naming?: Partial<NamingOptions>;
}

export interface Decomposition {
  readonly rootView: View;
  /** Nested views keyed by the lower-cased path of their repeated group. */
  readonly nestedViews: ReadonlyMap<string, View>;
}

// ── Ownership ───────────────────────────────────────────────────────

interface Member {
  readonly node: HierarchyNode;
  readonly role: FieldRole;
}

interface Owner {
  readonly node: HierarchyNode;
  readonly members: Member[];
  /** Key of the owner holding this group's marker field; undefined for the root. */
  readonly parent?: string;
}

/**
 * Assign every materialized node to the view that owns it.
 * Keys are repeated-group paths (`''` for the root view), in discovery order.
 */
function collectOwners(root: HierarchyNode): Map<string, Owner> {
  const rootOwner: Owner = { node: root, members: [] };
  const owners = new Map<string, Owner>([['', rootOwner]]);

  const visit = (node: HierarchyNode, key: string, owner: Member[]): void => {
    for (const child of node.children.values()) {
      switch (child.kind) {
        case 'Struct':
          visit(child, key, owner);
          break;
        case 'ArrayOfStruct': {
          owner.push({ node: child, role: 'repeated-group' });
          const nested: Owner = {
            node: child,
            members: [{ node: child, role: 'identity' }],
            parent: key,
          };
          owners.set(child.path, nested);
          visit(child, child.path, nested.members);
          break;
        }
        case 'ArrayOfScalar':
          owner.push({ node: child, role: 'simple-repeated' });
          visit(child, key, owner);
          break;
        case 'Scalar':
          owner.push({ node: child, role: 'dimension' });
          break;
        default: {
          const unreachable: never = child.kind;
          throw new Error(`Unhandled node kind: ${String(unreachable)}`);
        }
      }
    }
  };

  visit(root, '', rootOwner.members);
  return owners;
}

// ── Time-bucket groups ──────────────────────────────────────────────

function labelOf(segments: readonly string[]): string | undefined {
  const init = segments.slice(0, -1);
  return init.length > 0 ? init.map(titleCase).join(' ') : undefined;
}

function buildTimeBuckets(
  members: readonly Member[],
  groupPath: string,
  naming: Partial<NamingOptions>,
): TimeBucketGroup[] {
  const groups: TimeBucketGroup[] = [];
  const taken = new Set<string>();

  for (const { node, role } of members) {
    if (role !== 'dimension') continue;
    const kind = timeBucketKindOf(node.column.declaredType);
    if (!kind) continue;

    const segments = relativeSegments(node.column.originalPath, groupPath);
    const candidate = timeGroupNameOf(segments);
    const name = resolveCollision(candidate, taken);
    const buckets = resolveTimeframes(kind, naming.timeframes);
    const fieldName = fieldNameOf(segments);
    const isoFields = kind === 'date' && naming.includeIsoFields ? isoFieldNames(fieldName) : [];
    const generatedNames = generatedNamesFor(name, buckets, isoFields);

    for (const generated of generatedNames) taken.add(generated);

    groups.push({
      name,
      kind,
      column: node.column,
      fieldName,
      buckets,
      isoFields,
      generatedNames,
      groupLabel: node.column.meta.groupLabel ?? labelOf(segments),
      sqlPath: segments.join('.'),
      renamedFrom: name === candidate ? undefined : candidate,
    });
  }

  return groups;
}

// ── Fields ──────────────────────────────────────────────────────────

function draftField(member: Member, groupPath: string): FieldSpec {
  const { node, role } = member;
  const column: Column = node.column;

  if (role === 'identity') {
    return {
      name: canonicalize(node.segment),
      column,
      role,
      visibility: 'hidden',
      itemLabel: titleCase(node.segment),
      sqlPath: '',
    };
  }

  const segments = relativeSegments(column.originalPath, groupPath);
  const hidden =
    role !== 'dimension' || column.isPrimaryKey || column.meta.hidden === true;

  return {
    name: fieldNameOf(segments),
    column,
    role,
    visibility: hidden ? 'hidden' : 'visible',
    groupLabel: column.meta.groupLabel ?? labelOf(segments),
    itemLabel: titleCase(segments[segments.length - 1]),
    sqlPath: segments.join('.'),
  };
}

/**
 * Rename fields that clash with a time-bucket group's generated names or with
 * an earlier field. Generated names always win; the field is renamed once to
 * `<name>_conflict`, hidden, and annotated with its original name.
 *
 * @throws NameCollisionError when the renamed name is also taken
 */
export function resolveBucketCollisions(
  fields: readonly FieldSpec[],
  groups: readonly TimeBucketGroup[],
): FieldSpec[] {
  const owners = new Map<string, string>();
  for (const group of groups) {
    for (const generated of group.generatedNames) {
      if (!owners.has(generated)) owners.set(generated, group.name);
    }
  }

  const taken = new Set(owners.keys());
  const resolved: FieldSpec[] = [];

  for (const field of fields) {
    const name = resolveCollision(field.name, taken);
    taken.add(name);

    if (name === field.name) {
      resolved.push(field);
      continue;
    }

    const group = owners.get(field.name);
    const reason = group !== undefined
      ? `time-bucket group '${group}'`
      : `field '${field.name}'`;

    resolved.push({
      ...field,
      name,
      visibility: 'hidden',
      renamedFrom: field.name,
      note: `Renamed from '${field.name}' due to conflict with ${reason}`,
    });
  }

  return resolved;
}

function comparePaths(a: Member, b: Member): number {
  if (a.role !== b.role && (a.role === 'identity' || b.role === 'identity')) {
    return a.role === 'identity' ? -1 : 1;
  }
  const left = a.node.path;
  const right = b.node.path;
  return left < right ? -1 : left > right ? 1 : 0;
}

function buildView(
  name: string,
  groupNode: HierarchyNode,
  members: readonly Member[],
  options: DecomposeOptions,
): View {
  const groupPath = groupNode.column.originalPath;
  const naming = options.naming ?? {};

  const ordered = [...members].sort(comparePaths);
  const timeBuckets = buildTimeBuckets(ordered, groupPath, naming);
  const drafts = ordered.map((member) => draftField(member, groupPath));

  return {
    name,
    path: groupNode.path,
    isRoot: groupNode.path === '',
    fields: resolveBucketCollisions(drafts, timeBuckets),
    timeBuckets,
  };
}

/** Name of the parent view's marker field for a repeated group. */
function markerNameIn(parent: View, node: HierarchyNode): string {
  const marker = parent.fields.find(
    (field) => field.role === 'repeated-group' && field.column.path === node.path,
  );
  if (!marker) {
    throw new HierarchyConsistencyError(node.path, `no marker field in view '${parent.name}'`);
  }
  return marker.name;
}

// ── decompose ───────────────────────────────────────────────────────

/**
 * Nested views are named after their parent view and the marker field that
 * carries them, so sibling groups whose paths canonicalize alike follow the
 * marker's `_conflict` rename.
 */
export function decompose(root: HierarchyNode, options: DecomposeOptions): Decomposition {
  const views = new Map<string, View>();
  const issued = new Set<string>();

  for (const [path, owner] of collectOwners(root)) {
    let name = options.baseName;
    if (owner.parent !== undefined) {
      const parent = views.get(owner.parent);
      if (!parent) {
        throw new HierarchyConsistencyError(path, 'enclosing view was not built first');
      }
      name = resolveCollision(viewNameFor(parent.name, markerNameIn(parent, owner.node)), issued);
    }
    issued.add(name);
    views.set(path, buildView(name, owner.node, owner.members, options));
  }

  const rootView = views.get('');
  if (!rootView) {
    throw new Error('Decomposition produced no root view');
  }
  views.delete('');
  return { rootView, nestedViews: views };
}
