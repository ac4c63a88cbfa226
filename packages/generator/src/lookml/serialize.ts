// ── LookML entries ──────────────────────────────────────────────────

export type LookmlEntry =
  | { readonly kind: 'quoted'; readonly key: string; readonly value: string }
  | { readonly kind: 'bare'; readonly key: string; readonly value: string }
  | { readonly kind: 'sql'; readonly key: string; readonly value: string }
  | { readonly kind: 'list'; readonly key: string; readonly values: readonly string[]; readonly quoted: boolean }
  | { readonly kind: 'comment'; readonly text: string }
  | {
      readonly kind: 'block';
      readonly key: string;
      readonly name?: string;
      readonly entries: readonly LookmlEntry[];
    };

export const quoted = (key: string, value: string): LookmlEntry => ({ kind: 'quoted', key, value });
export const bare = (key: string, value: string): LookmlEntry => ({ kind: 'bare', key, value });
export const sql = (key: string, value: string): LookmlEntry => ({ kind: 'sql', key, value });
export const yesNo = (key: string, value: boolean): LookmlEntry => bare(key, value ? 'yes' : 'no');
export const comment = (text: string): LookmlEntry => ({ kind: 'comment', text });

export function list(key: string, values: readonly string[], options?: { quoted?: boolean }): LookmlEntry {
  return { kind: 'list', key, values, quoted: options?.quoted ?? false };
}

export function block(key: string, name: string | undefined, entries: readonly LookmlEntry[]): LookmlEntry {
  return { kind: 'block', key, name, entries };
}

// ── Serialization ───────────────────────────────────────────────────

const INDENT = '  ';

export function quoteString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function serializeEntry(entry: LookmlEntry, depth: number, lines: string[]): void {
  const pad = INDENT.repeat(depth);

  switch (entry.kind) {
    case 'quoted':
      lines.push(`${pad}${entry.key}: ${quoteString(entry.value)}`);
      break;
    case 'bare':
      lines.push(`${pad}${entry.key}: ${entry.value}`);
      break;
    case 'sql':
      lines.push(`${pad}${entry.key}: ${entry.value} ;;`);
      break;
    case 'list': {
      const values = entry.quoted ? entry.values.map(quoteString) : entry.values;
      lines.push(`${pad}${entry.key}: [${values.join(', ')}]`);
      break;
    }
    case 'comment':
      lines.push(`${pad}# ${entry.text}`);
      break;
    case 'block': {
      const header = entry.name !== undefined ? `${entry.key}: ${entry.name} {` : `${entry.key}: {`;
      lines.push(`${pad}${header}`);
      serializeEntries(entry.entries, depth + 1, lines);
      lines.push(`${pad}}`);
      break;
    }
  }
}

/** Blocks after the first entry at a level are preceded by a blank line. */
function serializeEntries(entries: readonly LookmlEntry[], depth: number, lines: string[]): void {
  entries.forEach((entry, index) => {
    if (entry.kind === 'block' && index > 0) lines.push('');
    serializeEntry(entry, depth, lines);
  });
}

/** LookML text for top-level entries, ending with a newline. */
export function serializeLookml(entries: readonly LookmlEntry[]): string {
  const lines: string[] = [];
  serializeEntries(entries, 0, lines);
  return `${lines.join('\n')}\n`;
}
