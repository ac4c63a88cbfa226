import { describe, it, expect } from 'vitest';
import { buildJoinChain } from '../../src/compiler/join-chain.js';
import { decompose } from '../../src/compiler/view-decomposer.js';
import { buildHierarchy } from '../../src/core/hierarchy.js';
import { HierarchyConsistencyError } from '../../src/core/errors.js';
import { columns } from '../../src/testing/columns.js';
import { compile } from '../../src/testing/compile.js';

describe('buildJoinChain', () => {
  it('joins a top-level repeated group to the root view', () => {
    const { joins } = compile({ items: 'ARRAY', 'items.code': 'STRING' });

    expect(joins).toEqual([
      { childView: 'root__items', parentView: 'root', unnestPath: 'items', depth: 0 },
    ]);
  });

  it('joins a nested repeated group to its nearest repeated ancestor with a relative path', () => {
    const { joins } = compile({
      items: 'ARRAY',
      'items.details': 'ARRAY',
      'items.details.name': 'STRING',
    });

    expect(joins).toEqual([
      { childView: 'root__items', parentView: 'root', unnestPath: 'items', depth: 0 },
      {
        childView: 'root__items__details',
        parentView: 'root__items',
        unnestPath: 'details',
        depth: 1,
      },
    ]);
  });

  it('orders joins shallow first so no join references a later view', () => {
    const { joins } = compile({
      'a.b.c': 'ARRAY',
      'a.b.c.x': 'STRING',
      'a.e': 'ARRAY',
      'a.e.y': 'STRING',
      a: 'ARRAY',
      'a.b': 'ARRAY',
      d: 'ARRAY',
      'd.z': 'STRING',
    });

    expect(joins.map((join) => [join.childView, join.parentView])).toEqual([
      ['root__a', 'root'],
      ['root__d', 'root'],
      ['root__a__b', 'root__a'],
      ['root__a__e', 'root__a'],
      ['root__a__b__c', 'root__a__b'],
    ]);

    const introduced = new Set(['root']);
    for (const join of joins) {
      expect(introduced.has(join.parentView)).toBe(true);
      introduced.add(join.childView);
    }
  });

  it('unnests a repeated group inside a struct through its flattened field', () => {
    const { joins } = compile({ 'meta.lines': 'ARRAY', 'meta.lines.sku': 'STRING' });

    expect(joins).toEqual([
      { childView: 'root__meta__lines', parentView: 'root', unnestPath: 'meta__lines', depth: 1 },
    ]);
  });

  it('references the renamed marker field when the repeated group was renamed', () => {
    const { joins, rootView } = compile({
      line_items: 'STRING',
      LineItems: 'ARRAY',
      'LineItems.sku': 'STRING',
    });

    expect(rootView.fields.map((field) => field.name)).toEqual(['line_items', 'line_items_conflict']);
    expect(joins).toEqual([
      {
        childView: 'root__line_items_conflict',
        parentView: 'root',
        unnestPath: 'line_items_conflict',
        depth: 0,
      },
    ]);
  });

  it('gives sibling groups that canonicalize alike distinct views and joins', () => {
    const { joins } = compile({
      OrderItems: 'ARRAY',
      'OrderItems.sku': 'STRING',
      order_items: 'ARRAY',
      'order_items.qty': 'STRING',
    });

    expect(joins).toEqual([
      { childView: 'root__order_items', parentView: 'root', unnestPath: 'order_items', depth: 0 },
      {
        childView: 'root__order_items_conflict',
        parentView: 'root',
        unnestPath: 'order_items_conflict',
        depth: 0,
      },
    ]);
  });

  it('throws when a repeated group has no nested view', () => {
    const root = buildHierarchy(columns({ items: 'ARRAY', 'items.code': 'STRING' }));
    const { rootView } = decompose(root, { baseName: 'root' });

    expect(() => buildJoinChain(new Map(), root, rootView)).toThrow(HierarchyConsistencyError);
    expect(() => buildJoinChain(new Map(), root, rootView)).toThrow(
      "Repeated group 'items': no nested view was built for it",
    );
  });
});
