/**
 * LookML renderer: turns a compiled document into view and explore text.
 *
 * Flow: DocumentResult → LookmlEntry tree → serialized `.view.lkml` text
 */
import { titleCase } from '@lookform/core';
import type { DocumentResult, FieldSpec, JoinSpec, TimeBucketGroup, View } from '@lookform/core';
import type { Logger } from '../log.js';
import { silentLogger } from '../log.js';
import { dimensionTypeOf, lookmlTypeOf, type TimeDatatype } from './types.js';
import {
  bare,
  block,
  comment,
  list,
  quoted,
  serializeLookml,
  sql,
  yesNo,
  type LookmlEntry,
} from './serialize.js';

// ── Public API ──────────────────────────────────────────────────────

export interface RenderModel {
  /** Fully qualified table, e.g. `` `proj`.`ds`.`orders` ``. */
  readonly relationName?: string | null;
}

export interface RenderOptions {
  readonly logger?: Logger;
}

// ── SQL references ──────────────────────────────────────────────────

const PLAIN_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function quoteIdentifier(segment: string): string {
  return PLAIN_IDENTIFIER.test(segment) ? segment : `\`${segment}\``;
}

/**
 * `${TABLE}` reference for a path relative to its view. Nested views have
 * already dropped the repeated group's own prefix.
 *
 * @example
 * sqlReference('Period.EndDate') // '${TABLE}.Period.EndDate'
 * sqlReference('Line Item.qty')  // '${TABLE}.`Line Item`.qty'
 */
export function sqlReference(sqlPath: string): string {
  if (!sqlPath) return '${TABLE}';
  return `\${TABLE}.${sqlPath.split('.').map(quoteIdentifier).join('.')}`;
}

// ── Dimensions ──────────────────────────────────────────────────────

const REPEATED_ROLES: ReadonlySet<FieldSpec['role']> = new Set([
  'repeated-group',
  'simple-repeated',
  'identity',
]);

function renderDimension(field: FieldSpec, view: View, logger: Logger): LookmlEntry | undefined {
  const { column } = field;
  const dimensionType = dimensionTypeOf(column.declaredType);
  if (!dimensionType) {
    logger.debug(
      `Skipping ${view.name}.${field.name}: no LookML type for '${column.declaredType || '<none>'}'`,
    );
    return undefined;
  }

  const entries: LookmlEntry[] = [];
  if (field.note) entries.push(comment(field.note));
  entries.push(bare('type', dimensionType.type));
  if (dimensionType.datatype) entries.push(bare('datatype', dimensionType.datatype));
  entries.push(sql('sql', sqlReference(field.sqlPath)));
  if (column.description) entries.push(quoted('description', column.description));
  if (column.meta.label) entries.push(quoted('label', column.meta.label));
  if (field.groupLabel) {
    entries.push(quoted('group_label', field.groupLabel));
    entries.push(quoted('group_item_label', field.itemLabel));
  }
  if (column.isPrimaryKey) entries.push(yesNo('primary_key', true));
  if (field.visibility === 'hidden') entries.push(yesNo('hidden', true));
  if (column.meta.valueFormatName) {
    entries.push(bare('value_format_name', column.meta.valueFormatName));
  }
  if (REPEATED_ROLES.has(field.role)) entries.push(list('tags', ['array'], { quoted: true }));

  return block('dimension', field.name, entries);
}

// ── Dimension groups ────────────────────────────────────────────────

function datatypeOf(group: TimeBucketGroup): TimeDatatype {
  const type = lookmlTypeOf(group.column.declaredType);
  if (type === 'timestamp' || type === 'datetime') return type;
  return 'date';
}

function renderTimeGroup(group: TimeBucketGroup): LookmlEntry[] {
  const { column } = group;
  const reference = sqlReference(group.sqlPath);

  const entries: LookmlEntry[] = [
    bare('type', 'time'),
    list('timeframes', group.buckets),
    bare('datatype', datatypeOf(group)),
    yesNo('convert_tz', group.kind === 'time'),
    sql('sql', reference),
  ];
  if (column.description) entries.push(quoted('description', column.description));
  if (column.meta.label) entries.push(quoted('label', column.meta.label));
  if (group.groupLabel) entries.push(quoted('group_label', group.groupLabel));

  const rendered: LookmlEntry[] = [block('dimension_group', group.name, entries)];

  const [isoYear, isoWeek] = group.isoFields;
  if (isoYear !== undefined) {
    rendered.push(renderIsoField(isoYear, `EXTRACT(ISOYEAR FROM ${reference})`, group));
  }
  if (isoWeek !== undefined) {
    rendered.push(renderIsoField(isoWeek, `EXTRACT(ISOWEEK FROM ${reference})`, group));
  }
  return rendered;
}

function renderIsoField(name: string, expression: string, group: TimeBucketGroup): LookmlEntry {
  const entries: LookmlEntry[] = [bare('type', 'number'), sql('sql', expression)];
  if (group.groupLabel) entries.push(quoted('group_label', group.groupLabel));
  return block('dimension', name, entries);
}

// ── Views ───────────────────────────────────────────────────────────

function renderView(view: View, model: RenderModel, logger: Logger): LookmlEntry {
  const entries: LookmlEntry[] = [];

  if (view.isRoot && model.relationName) {
    entries.push(sql('sql_table_name', model.relationName));
  }

  for (const field of view.fields) {
    const dimension = renderDimension(field, view, logger);
    if (dimension) entries.push(dimension);
  }
  for (const group of view.timeBuckets) {
    entries.push(...renderTimeGroup(group));
  }

  return block('view', view.name, entries);
}

// ── Explore ─────────────────────────────────────────────────────────

function renderJoin(join: JoinSpec, rootView: View): LookmlEntry {
  const entries: LookmlEntry[] = [
    bare('relationship', 'one_to_many'),
    sql('sql', `LEFT JOIN UNNEST(\${${join.parentView}.${join.unnestPath}}) AS ${join.childView}`),
    bare('type', 'left_outer'),
  ];
  if (join.parentView !== rootView.name) {
    entries.push(list('required_joins', [join.parentView]));
  }
  return block('join', join.childView, entries);
}

/** The explore is named and sourced from the root view. */
function renderExplore(result: DocumentResult): LookmlEntry {
  const rootName = result.rootView.name;
  const entries: LookmlEntry[] = [
    bare('from', rootName),
    quoted('label', titleCase(rootName)),
    yesNo('hidden', false),
  ];
  for (const join of result.joins) {
    entries.push(renderJoin(join, result.rootView));
  }
  return block('explore', rootName, entries);
}

// ── renderDocument ──────────────────────────────────────────────────

/**
 * LookML for one compiled model: the root view, nested views in join order,
 * and one explore joining them.
 */
export function renderDocument(
  model: RenderModel,
  result: DocumentResult,
  options?: RenderOptions,
): string {
  const logger = options?.logger ?? silentLogger;

  const nested = result.joins.flatMap((join) =>
    [...result.nestedViews.values()].filter((view) => view.name === join.childView),
  );

  return serializeLookml([
    renderView(result.rootView, model, logger),
    ...nested.map((view) => renderView(view, model, logger)),
    renderExplore(result),
  ]);
}
