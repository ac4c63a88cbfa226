import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ArtifactError, loadArtifacts, loadCatalog, loadManifest } from '../dbt/artifacts.js';

describe('dbt artifacts', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'lookform-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reports a missing file', () => {
    const file = join(dir, 'manifest.json');

    expect(() => loadManifest(file)).toThrow(ArtifactError);
    expect(() => loadManifest(file)).toThrow(`${file}: file not found`);
  });

  it('reports invalid JSON', () => {
    const file = join(dir, 'catalog.json');
    writeFileSync(file, '{ "nodes": ');

    expect(() => loadCatalog(file)).toThrow(/catalog\.json: invalid JSON \(/);
  });

  it('reports the path of a schema violation', () => {
    const file = join(dir, 'manifest.json');
    writeFileSync(file, JSON.stringify({ nodes: { broken: { name: 'orders', resource_type: 'model' } } }));

    let caught: unknown;
    try {
      loadManifest(file);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ArtifactError);
    if (caught instanceof ArtifactError) {
      expect(caught.file).toBe(file);
      expect(caught.code).toBe('INVALID_ARTIFACT');
      expect(caught.message).toMatch(/: failed validation: nodes\.broken\.unique_id: /);
    }
  });

  it('loads both artifacts and fills defaults', () => {
    writeFileSync(
      join(dir, 'manifest.json'),
      JSON.stringify({
        metadata: { dbt_version: '1.8.0' },
        nodes: {
          'model.shop.orders': {
            unique_id: 'model.shop.orders',
            name: 'orders',
            resource_type: 'model',
          },
        },
      }),
    );
    writeFileSync(
      join(dir, 'catalog.json'),
      JSON.stringify({
        nodes: {
          'model.shop.orders': {
            columns: { ID: { name: 'ID', type: 'INT64', index: 1, comment: null } },
          },
        },
      }),
    );

    const { manifest, catalog } = loadArtifacts(dir);
    const orders = manifest.nodes['model.shop.orders'];

    expect(orders.tags).toEqual([]);
    expect(orders.columns).toEqual({});
    expect(orders.path).toBe('');
    expect(catalog.nodes['model.shop.orders'].columns.ID.type).toBe('INT64');
  });
});
