import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import type { z } from 'zod';
import { LookformError } from '@lookform/core';
import { catalogSchema, manifestSchema, type Catalog, type Manifest } from './schemas.js';

// ── ArtifactError ───────────────────────────────────────────────────

export class ArtifactError extends LookformError {
  readonly file: string;

  constructor(file: string, message: string, options?: { cause?: unknown }) {
    super('INVALID_ARTIFACT', `${file}: ${message}`, options);
    this.file = file;
  }
}

// ── Loading ─────────────────────────────────────────────────────────

export interface DbtArtifacts {
  readonly manifest: Manifest;
  readonly catalog: Catalog;
}

export const MANIFEST_FILE = 'manifest.json';
export const CATALOG_FILE = 'catalog.json';

function readJson(file: string): unknown {
  if (!existsSync(file)) {
    throw new ArtifactError(file, 'file not found');
  }

  const raw = readFileSync(file, 'utf-8');
  try {
    return JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ArtifactError(file, `invalid JSON (${reason})`, { cause: err });
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.map(String).join('.') || '<root>'}: ${issue.message}`)
    .join('; ');
}

export function loadManifest(file: string): Manifest {
  const parsed = manifestSchema.safeParse(readJson(file));
  if (!parsed.success) {
    throw new ArtifactError(file, `failed validation: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function loadCatalog(file: string): Catalog {
  const parsed = catalogSchema.safeParse(readJson(file));
  if (!parsed.success) {
    throw new ArtifactError(file, `failed validation: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Read and validate `manifest.json` and `catalog.json` from a dbt target
 * directory.
 */
export function loadArtifacts(targetDir: string): DbtArtifacts {
  const dir = resolve(targetDir);
  return {
    manifest: loadManifest(join(dir, MANIFEST_FILE)),
    catalog: loadCatalog(join(dir, CATALOG_FILE)),
  };
}
