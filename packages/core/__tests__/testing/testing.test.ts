import { describe, it, expect } from 'vitest';
import { columns, compile, fieldNamed, nestedView } from '../../src/testing/index.js';

describe('columns', () => {
  it('expands shorthand types and partial inputs', () => {
    const [id, name] = columns({
      id: { declaredType: 'INT64', isPrimaryKey: true },
      Name: 'STRING',
    });

    expect(id.isPrimaryKey).toBe(true);
    expect(name.path).toBe('name');
    expect(name.originalPath).toBe('Name');
    expect(name.declaredType).toBe('STRING');
  });
});

describe('compile helpers', () => {
  it('fails with the available names when a field is missing', () => {
    const result = compile({ id: 'INT64', status: 'STRING' });

    expect(() => fieldNamed(result.rootView, 'missing')).toThrow(
      "View 'root' has no field 'missing' (has: id, status)",
    );
  });

  it('looks nested views up case-insensitively', () => {
    const result = compile({ Items: 'ARRAY', 'Items.sku': 'STRING' });

    expect(nestedView(result, 'Items').name).toBe('root__items');
    expect(() => nestedView(result, 'other')).toThrow("No nested view for 'other' (has: items)");
  });
});
