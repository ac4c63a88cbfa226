import { describe, it, expect } from 'vitest';
import { buildColumnSet } from '../dbt/merge.js';
import { catalogNodeSchema, manifestNodeSchema } from '../dbt/schemas.js';

const orders = manifestNodeSchema.parse({
  unique_id: 'model.shop.orders',
  name: 'orders',
  resource_type: 'model',
  columns: {
    order_id: {
      name: 'order_id',
      data_type: 'string',
      description: 'Order key',
      constraints: [{ type: 'primary_key' }],
    },
    status: {
      name: 'status',
      meta: { looker: { label: 'Order Status', hidden: true, group_label: 'State' } },
    },
  },
});

const catalog = catalogNodeSchema.parse({
  columns: {
    ORDER_ID: { name: 'Order_Id', type: 'STRING', comment: 'Warehouse key' },
    Status: { name: 'Status', type: 'STRING', comment: 'Current status' },
    Items: { name: 'Items', type: 'ARRAY<STRUCT<sku STRING, qty INT64>>' },
    'Items.sku': { name: 'Items.sku', type: 'STRING' },
  },
});

describe('buildColumnSet', () => {
  it('keeps declared columns with their metadata when there is no catalog', () => {
    const { columns, repaired } = buildColumnSet(orders);

    expect(columns.paths()).toEqual(['order_id', 'status']);
    expect(columns.get('order_id')).toMatchObject({
      declaredType: 'string',
      isPrimaryKey: true,
      description: 'Order key',
    });
    expect(columns.get('status')).toMatchObject({
      declaredType: '',
      meta: { label: 'Order Status', hidden: true, groupLabel: 'State' },
    });
    expect(repaired).toEqual([]);
  });

  it('takes types and source casing from the catalog', () => {
    const { columns } = buildColumnSet(orders, catalog);

    expect(columns.get('order_id')).toMatchObject({
      originalPath: 'Order_Id',
      declaredType: 'STRING',
      isPrimaryKey: true,
      description: 'Order key',
    });
    expect(columns.get('status')).toMatchObject({
      originalPath: 'Status',
      description: 'Current status',
      meta: { label: 'Order Status' },
    });
  });

  it('adds catalog-only columns and repairs missing nested paths', () => {
    const { columns, repaired } = buildColumnSet(orders, catalog);

    expect(columns.paths()).toEqual(['order_id', 'status', 'items', 'items.sku', 'items.qty']);
    expect(columns.get('items.qty')).toMatchObject({
      originalPath: 'Items.qty',
      declaredType: 'INT64',
    });
    expect(repaired).toEqual(['items.qty']);
  });

  it('reads primary keys from model constraints and looker meta', () => {
    const node = manifestNodeSchema.parse({
      unique_id: 'model.shop.lines',
      name: 'lines',
      resource_type: 'model',
      constraints: [{ type: 'primary_key', columns: ['Line_Id'] }],
      columns: {
        line_id: { name: 'line_id' },
        sku: { name: 'sku', meta: { looker: { primary_key: true } } },
        qty: { name: 'qty' },
      },
    });
    const { columns } = buildColumnSet(node);

    expect(columns.values().filter((c) => c.isPrimaryKey).map((c) => c.path)).toEqual([
      'line_id',
      'sku',
    ]);
  });
});
