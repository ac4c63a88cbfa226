import type { TypeLeaf } from './types.js';

// ── Markers ─────────────────────────────────────────────────────────

const ARRAY_PREFIX = 'ARRAY<';
const STRUCT_PREFIX = 'STRUCT<';

/** Leaf type reported for a struct that is flattened into child paths. */
export const STRUCT_MARKER = 'STRUCT';
/** Leaf type reported for a once-repeated struct; children follow under its path. */
export const REPEATED_STRUCT_MARKER = 'ARRAY';
/** Leaf type reported for a struct repeated more than once. */
export const DOUBLE_ARRAY_MARKER = 'ARRAY<ARRAY<STRUCT>>';

const FIELD_PATTERN = /^([\p{L}\p{N}_]+)\s+([\s\S]+)$/u;

class MalformedDescriptor extends Error {}

// ── Token helpers ───────────────────────────────────────────────────

function hasWrapper(type: string, prefix: string): boolean {
  return type.toUpperCase().startsWith(prefix);
}

function unwrap(type: string, prefix: string): string {
  const trimmed = type.trim();
  if (!trimmed.endsWith('>')) {
    throw new MalformedDescriptor(`Unterminated ${prefix}...> in '${type}'`);
  }
  return trimmed.slice(prefix.length, -1).trim();
}

/** Upper-cased type name before any `<…>` or `(…)` suffix: `NUMERIC(10,2)` → `NUMERIC`. */
export function baseTypeOf(type: string): string {
  return type.split('<')[0].split('(')[0].trim().toUpperCase();
}

export function isArrayType(type: string): boolean {
  return baseTypeOf(type) === 'ARRAY';
}

/**
 * Canonical spelling of a bare or array-wrapped type token.
 * Precision arguments are dropped and array-of-struct collapses to `ARRAY<STRUCT>`.
 */
export function normalizeType(type: string): string {
  const trimmed = type.trim();
  if (hasWrapper(trimmed, ARRAY_PREFIX) && trimmed.endsWith('>')) {
    const inner = trimmed.slice(ARRAY_PREFIX.length, -1).trim();
    if (hasWrapper(inner, STRUCT_PREFIX)) return 'ARRAY<STRUCT>';
    return `ARRAY<${normalizeType(inner)}>`;
  }
  return trimmed.replace(/\s*\([\s\S]*\)\s*$/, '').toUpperCase();
}

// ── Field splitting ─────────────────────────────────────────────────

/**
 * Split struct content on top-level commas. Commas nested in `<…>` or inside a
 * precision argument such as `NUMERIC(10, 2)` are part of the field.
 */
function splitFields(body: string): string[] {
  const fields: string[] = [];
  let depth = 0;
  let inParens = false;
  let current = '';

  for (const char of body) {
    if (char === ',' && depth === 0 && !inParens) {
      fields.push(current.trim());
      current = '';
      continue;
    }

    if (char === '(') {
      if (inParens) throw new MalformedDescriptor(`Nested '(' in '${body}'`);
      inParens = true;
    } else if (char === ')') {
      if (!inParens) throw new MalformedDescriptor(`Unmatched ')' in '${body}'`);
      inParens = false;
    } else if (char === '<') {
      depth += 1;
    } else if (char === '>') {
      depth -= 1;
      if (depth < 0) throw new MalformedDescriptor(`Unmatched '>' in '${body}'`);
    }
    current += char;
  }

  if (depth !== 0 || inParens) {
    throw new MalformedDescriptor(`Unbalanced brackets in '${body}'`);
  }
  fields.push(current.trim());

  return fields.filter((f) => f.length > 0);
}

// ── Flattening ──────────────────────────────────────────────────────

function flattenStruct(
  structType: string,
  prefix: string,
  doubleArray: boolean,
  out: TypeLeaf[],
): void {
  const fields = splitFields(unwrap(structType, STRUCT_PREFIX));
  if (fields.length === 0) {
    throw new MalformedDescriptor(`Struct without fields at '${prefix || '<root>'}'`);
  }

  for (const field of fields) {
    const match = FIELD_PATTERN.exec(field);
    if (!match) {
      throw new MalformedDescriptor(`Field without a type: '${field}'`);
    }
    const [, name, typeDef] = match;
    const path = prefix ? `${prefix}.${name}` : name;
    flattenField(path, typeDef.trim(), doubleArray, out);
  }
}

function flattenField(
  path: string,
  typeDef: string,
  doubleArray: boolean,
  out: TypeLeaf[],
): void {
  if (!typeDef.toUpperCase().includes(STRUCT_PREFIX)) {
    out.push({ path, type: normalizeType(typeDef) });
    return;
  }

  let body = typeDef;
  let arrayDepth = 0;
  while (hasWrapper(body, ARRAY_PREFIX)) {
    body = unwrap(body, ARRAY_PREFIX);
    arrayDepth += 1;
  }

  if (!hasWrapper(body, STRUCT_PREFIX)) {
    out.push({ path, type: normalizeType(typeDef) });
    return;
  }

  if (arrayDepth === 0) {
    out.push({ path, type: STRUCT_MARKER });
  } else if (arrayDepth === 1) {
    out.push({ path, type: REPEATED_STRUCT_MARKER });
  } else {
    out.push({ path, type: DOUBLE_ARRAY_MARKER });
    // Under a doubly repeated descriptor the inner struct is not one join level away.
    if (doubleArray) return;
  }

  flattenStruct(body, path, doubleArray, out);
}

function compareLeaves(a: TypeLeaf, b: TypeLeaf): number {
  if (a.path !== b.path) return a.path < b.path ? -1 : 1;
  if (a.type !== b.type) return a.type < b.type ? -1 : 1;
  return 0;
}

// ── Public API ──────────────────────────────────────────────────────

/**
 * Flatten a composite type descriptor into `(path, type)` leaves sorted by path.
 *
 * Arrays of primitives stay a single leaf. Any malformed descriptor, and any
 * descriptor without struct content, yields an empty list.
 *
 * @example
 * parseTypeDescriptor('ARRAY<STRUCT<a INT64, b ARRAY<STRUCT<c STRING>>>>')
 * // → [{ path: 'a', type: 'INT64' }, { path: 'b', type: 'ARRAY' }, { path: 'b.c', type: 'STRING' }]
 */
export function parseTypeDescriptor(descriptor: string): TypeLeaf[] {
  try {
    let body = descriptor.trim();
    let doubleArray = false;

    if (hasWrapper(body, ARRAY_PREFIX)) {
      body = unwrap(body, ARRAY_PREFIX);
      if (hasWrapper(body, ARRAY_PREFIX)) {
        doubleArray = true;
        body = unwrap(body, ARRAY_PREFIX);
      }
    }

    if (!hasWrapper(body, STRUCT_PREFIX)) return [];

    const leaves: TypeLeaf[] = [];
    flattenStruct(body, '', doubleArray, leaves);
    return leaves.sort(compareLeaves);
  } catch (err) {
    if (err instanceof MalformedDescriptor) return [];
    throw err;
  }
}

export function formatTypeLeaf(leaf: TypeLeaf): string {
  return `${leaf.path} ${leaf.type}`;
}

/**
 * Nested-type fragments of an array or struct type.
 * `ARRAY<STRING>` → `['STRING']`; `ARRAY<STRUCT<a INT64, b STRING>>` → `['a INT64', 'b STRING']`.
 */
export function innerTypesOf(type: string): string[] {
  try {
    let body = type.trim();
    if (hasWrapper(body, ARRAY_PREFIX)) {
      body = unwrap(body, ARRAY_PREFIX);
      if (!hasWrapper(body, STRUCT_PREFIX)) {
        return body ? [normalizeType(body)] : [];
      }
    }
    if (hasWrapper(body, STRUCT_PREFIX)) {
      return splitFields(unwrap(body, STRUCT_PREFIX));
    }
    return [];
  } catch (err) {
    if (err instanceof MalformedDescriptor) return [];
    throw err;
  }
}
