import { createHash } from 'node:crypto';
import anyAscii from 'any-ascii';
import { NameCollisionError } from './errors.js';

// ── Constants ───────────────────────────────────────────────────────

export const CONFLICT_SUFFIX = '_conflict';
export const PATH_SEPARATOR = '__';

const TIME_MARKER = /(?:_?date|_(?:datetime|timestamp|time))$/i;

// ── canonicalize ────────────────────────────────────────────────────

/**
 * Lower-snake identifier for one path segment.
 *
 * Non-ASCII text is transliterated to ASCII first. CamelCase boundaries
 * become `_`, separators and any other character outside `[0-9a-z]`
 * collapse to a single `_`, and edge underscores are trimmed.
 * Input that cleans to nothing maps to `error_<md5 prefix>` of the raw text.
 *
 * @example
 * canonicalize('ReturnableAssetGRAI') // 'returnable_asset_grai'
 * canonicalize('GTINId')              // 'gtin_id'
 * canonicalize('北京')                // 'bei_jing'
 */
export function canonicalize(raw: string): string {
  const cleaned = anyAscii(raw)
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toLowerCase()
    .replace(/[^0-9a-z]+/g, '_')
    .replace(/^_+|_+$/g, '');

  if (cleaned) return cleaned;

  const digest = createHash('md5').update(raw, 'utf8').digest('hex');
  return `error_${digest.slice(0, 8)}`;
}

// ── resolveCollision ────────────────────────────────────────────────

/**
 * Return `candidate` when free, else `candidate_conflict`.
 * Exactly one rename is attempted; a second clash throws.
 */
export function resolveCollision(candidate: string, taken: ReadonlySet<string>): string {
  if (!taken.has(candidate)) return candidate;

  const renamed = `${candidate}${CONFLICT_SUFFIX}`;
  if (taken.has(renamed)) {
    throw new NameCollisionError(candidate, renamed);
  }
  return renamed;
}

// ── Paths ───────────────────────────────────────────────────────────

/**
 * Segments of `path` relative to a repeated group. Leading segments equal
 * (case-insensitively) to the group's own path are dropped.
 *
 * @example
 * relativeSegments('Format.Period.EndDate', 'format') // ['Period', 'EndDate']
 */
export function relativeSegments(path: string, groupPath: string): string[] {
  const segments = path.split('.');
  if (!groupPath) return segments;

  const groupSegments = groupPath.split('.');
  if (segments.length <= groupSegments.length) return segments;

  const matches = groupSegments.every(
    (segment, i) => segment.toLowerCase() === segments[i].toLowerCase(),
  );
  return matches ? segments.slice(groupSegments.length) : segments;
}

export function fieldNameOf(segments: readonly string[]): string {
  return segments.map(canonicalize).join(PATH_SEPARATOR);
}

/** Nested view name: the parent view's name plus the marker field carrying the group. */
export function viewNameFor(parentView: string, markerField: string): string {
  return `${parentView}${PATH_SEPARATOR}${markerField}`;
}

export function titleCase(segment: string): string {
  return canonicalize(segment)
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

// ── Time markers ────────────────────────────────────────────────────

/**
 * Drop a trailing date/time marker from a canonical name. A name that is
 * nothing but the marker is returned unchanged.
 */
export function stripTimeMarker(name: string): string {
  const stripped = name.replace(TIME_MARKER, '').replace(/_+$/, '');
  return stripped || name;
}

function isTimeMarkerOnly(name: string): boolean {
  return name.replace(TIME_MARKER, '') === '';
}

/**
 * Base name of the time-bucket group derived from a column path.
 * Only the last segment loses its marker; a last segment that is nothing
 * but the marker is dropped when earlier segments remain. Empty segments
 * are skipped.
 *
 * @example
 * timeGroupNameOf(['created_date'])                // 'created'
 * timeGroupNameOf(['Format', 'Period', 'EndDate']) // 'format__period__end'
 * timeGroupNameOf(['Delivery', 'Start', 'Date'])   // 'delivery__start'
 */
export function timeGroupNameOf(segments: readonly string[]): string {
  const canonical = segments.filter((segment) => segment !== '').map(canonicalize);
  const last = canonical.pop() ?? '';
  if (canonical.length > 0 && isTimeMarkerOnly(last)) {
    return canonical.join(PATH_SEPARATOR);
  }
  return [...canonical, stripTimeMarker(last)].join(PATH_SEPARATOR);
}
