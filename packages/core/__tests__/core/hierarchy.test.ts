import { describe, it, expect } from 'vitest';
import {
  buildHierarchy,
  classifyColumn,
  walkHierarchy,
  findHierarchyNodes,
  getHierarchyNode,
  columnsUnder,
  parentPathOf,
  pathDepth,
} from '../../src/core/hierarchy.js';
import { createColumn } from '../../src/core/columns.js';
import { columns } from '../../src/testing/columns.js';

function makeTree() {
  return buildHierarchy(
    columns({
      id: 'INT64',
      items: 'ARRAY<STRUCT<code STRING>>',
      'items.code': 'STRING',
      tags: 'ARRAY<STRING>',
      'address.city': 'STRING',
    }),
  );
}

describe('buildHierarchy', () => {
  it('roots every top-level segment under a virtual super-root', () => {
    const root = makeTree();

    expect(root.path).toBe('');
    expect(root.synthesized).toBe(true);
    expect([...root.children.keys()]).toEqual(['address', 'id', 'items', 'tags']);
  });

  it('classifies nodes by shape', () => {
    const root = makeTree();
    const kindOf = (path: string) => getHierarchyNode(root, path)?.kind;

    expect(kindOf('id')).toBe('Scalar');
    expect(kindOf('items')).toBe('ArrayOfStruct');
    expect(kindOf('items.code')).toBe('Scalar');
    expect(kindOf('tags')).toBe('ArrayOfScalar');
    expect(kindOf('address')).toBe('Struct');
  });

  it('synthesizes missing intermediate paths with a struct sentinel', () => {
    const root = makeTree();
    const address = getHierarchyNode(root, 'address');

    expect(address?.synthesized).toBe(true);
    expect(address?.column.declaredType).toBe('STRUCT');
    expect(getHierarchyNode(root, 'items')?.synthesized).toBe(false);
  });

  it('keeps source casing for segments while indexing by lower-cased path', () => {
    const root = buildHierarchy([createColumn({ path: 'Items.Code', declaredType: 'STRING' })]);
    const items = getHierarchyNode(root, 'ITEMS');

    expect(items?.path).toBe('items');
    expect(items?.segment).toBe('Items');
    expect(items?.column.originalPath).toBe('Items');
    expect(getHierarchyNode(root, 'items.code')?.segment).toBe('Code');
  });

  it('treats an array without inner types as a repeated group', () => {
    const root = buildHierarchy(columns({ lines: 'ARRAY', 'lines.sku': 'STRING' }));
    expect(getHierarchyNode(root, 'lines')?.kind).toBe('ArrayOfStruct');
  });

  it('classifies a struct column with registered children as Struct', () => {
    const root = buildHierarchy(
      columns({ address: 'STRUCT<city STRING>', 'address.city': 'STRING' }),
    );
    const address = getHierarchyNode(root, 'address');

    expect(address?.kind).toBe('Struct');
    expect(address?.synthesized).toBe(false);
  });
});

describe('classifyColumn', () => {
  it('needs exactly one whitespace-free inner type for an array of scalars', () => {
    expect(classifyColumn(createColumn({ path: 'a', declaredType: 'ARRAY<INT64>' }), false)).toBe(
      'ArrayOfScalar',
    );
    expect(
      classifyColumn(createColumn({ path: 'a', declaredType: 'ARRAY<STRUCT<x INT64>>' }), false),
    ).toBe('ArrayOfStruct');
    expect(classifyColumn(createColumn({ path: 'a', declaredType: 'STRING' }), true)).toBe('Struct');
    expect(classifyColumn(createColumn({ path: 'a', declaredType: 'STRING' }), false)).toBe('Scalar');
  });
});

describe('traversal', () => {
  it('walks pre-order and can skip a subtree', () => {
    const root = makeTree();
    const visited: string[] = [];

    walkHierarchy(root, (node) => {
      visited.push(node.path);
      if (node.path === 'items') return false;
    });

    expect(visited).toEqual(['', 'address', 'address.city', 'id', 'items', 'tags']);
  });

  it('finds nodes by predicate, excluding the super-root', () => {
    const root = makeTree();
    const structs = findHierarchyNodes(root, (node) => node.kind === 'Struct');
    expect(structs.map((node) => node.path)).toEqual(['address']);
  });

  it('lists registered columns under a node', () => {
    const root = makeTree();
    expect(columnsUnder(root).map((c) => c.path)).toEqual([
      'address.city',
      'id',
      'items',
      'items.code',
      'tags',
    ]);
  });

  it('returns undefined for unknown paths', () => {
    expect(getHierarchyNode(makeTree(), 'items.missing')).toBeUndefined();
  });
});

describe('path helpers', () => {
  it('derives parents and depth from the dotted path', () => {
    expect(parentPathOf('a.b.c')).toBe('a.b');
    expect(parentPathOf('a')).toBe('');
    expect(pathDepth('a.b.c')).toBe(2);
    expect(pathDepth('a')).toBe(0);
  });
});
