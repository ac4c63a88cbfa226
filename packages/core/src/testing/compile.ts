import type { FieldSpec, NamingOptions, View } from '../core/types.js';
import { compileDocument, type DocumentResult } from '../compiler/document-compiler.js';
import { columns, type ColumnShorthand } from './columns.js';

// ── compile() test helper ────────────────────────────────────────────

export interface CompileTestOptions {
  readonly baseName?: string;
  readonly naming?: Partial<NamingOptions>;
}

/** Compile a `{ path: type }` map under the base name `root`. */
export function compile(
  shape: Readonly<Record<string, ColumnShorthand>>,
  options?: CompileTestOptions,
): DocumentResult {
  return compileDocument(columns(shape), {
    baseName: options?.baseName ?? 'root',
    naming: options?.naming,
  });
}

export function fieldNames(view: View): string[] {
  return view.fields.map((field) => field.name);
}

export function fieldNamed(view: View, name: string): FieldSpec {
  const field = view.fields.find((f) => f.name === name);
  if (!field) {
    throw new Error(`View '${view.name}' has no field '${name}' (has: ${fieldNames(view).join(', ')})`);
  }
  return field;
}

/** Nested view by repeated-group path, failing the test when absent. */
export function nestedView(result: DocumentResult, path: string): View {
  const view = result.nestedViews.get(path.toLowerCase());
  if (!view) {
    throw new Error(`No nested view for '${path}' (has: ${[...result.nestedViews.keys()].join(', ')})`);
  }
  return view;
}
