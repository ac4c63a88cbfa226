import { mkdirSync, writeFileSync } from 'node:fs';
import { join, relative, resolve } from 'node:path';
import pc from 'picocolors';
import {
  compileDocument,
  resolveNamingOptions,
  type Diagnostic,
  type LookformConfig,
  type NamingOptions,
} from '@lookform/core';
import { loadConfig } from '../config-loader.js';
import { loadArtifacts } from '../dbt/artifacts.js';
import { buildColumnSet } from '../dbt/merge.js';
import { baseNameFor, modelDirOf, selectModels } from '../dbt/models.js';
import type { CatalogNode, ManifestNode } from '../dbt/schemas.js';
import { renderDocument } from '../lookml/render.js';
import { createLogger, type Logger } from '../log.js';

// ── Types ───────────────────────────────────────────────────────────

export interface GenerateOptions {
  /** Directory holding lookform.config.ts; relative paths resolve against it. */
  readonly projectDir?: string;
  readonly targetDir?: string;
  readonly outputDir?: string;
  readonly select?: string;
  readonly tag?: string;
  readonly includeModels?: readonly string[];
  readonly excludeModels?: readonly string[];
  readonly continueOnError?: boolean;
  readonly naming?: Partial<NamingOptions>;
  readonly logger?: Logger;
}

export type GenerateStatus = 'written' | 'skipped' | 'failed';

export interface GenerateResult {
  readonly model: string;
  readonly uniqueId: string;
  readonly status: GenerateStatus;
  readonly viewName?: string;
  /** Absolute path of the written view file. */
  readonly file?: string;
  readonly error?: string;
  readonly diagnostics: readonly Diagnostic[];
}

export const DEFAULT_TARGET_DIR = 'target';
export const DEFAULT_OUTPUT_DIR = 'lookml';

// ── Generate logic ──────────────────────────────────────────────────

interface ModelContext {
  readonly node: ManifestNode;
  readonly naming: NamingOptions;
  readonly outputDir: string;
  readonly logger: Logger;
}

function resolveNaming(config: LookformConfig | null, overrides?: Partial<NamingOptions>): NamingOptions {
  const base = resolveNamingOptions(config ?? undefined);
  return {
    useTableName: overrides?.useTableName ?? base.useTableName,
    includeIsoFields: overrides?.includeIsoFields ?? base.includeIsoFields,
    timeframes: overrides?.timeframes ?? base.timeframes,
  };
}

export async function runGenerate(opts: GenerateOptions = {}): Promise<GenerateResult[]> {
  const projectDir = opts.projectDir ?? process.cwd();
  const config = await loadConfig(projectDir);
  const settings: NonNullable<LookformConfig['generator']> = config?.generator ?? {};

  const logger = opts.logger ?? createLogger({ level: settings.logLevel });
  const targetDir = resolve(projectDir, opts.targetDir ?? settings.targetDir ?? DEFAULT_TARGET_DIR);
  const outputDir = resolve(projectDir, opts.outputDir ?? settings.outputDir ?? DEFAULT_OUTPUT_DIR);
  const continueOnError = opts.continueOnError ?? settings.continueOnError ?? false;
  const naming = resolveNaming(config, opts.naming);

  const { manifest, catalog } = loadArtifacts(targetDir);
  const models = selectModels(manifest, {
    select: opts.select ?? settings.select,
    tag: opts.tag ?? settings.tag,
    includeModels: opts.includeModels ?? settings.includeModels,
    excludeModels: opts.excludeModels ?? settings.excludeModels,
  });

  if (models.length === 0) {
    logger.warn('No models matched the selection.');
    return [];
  }

  logger.info(pc.dim(`Generating ${models.length} model(s)...`));

  const results: GenerateResult[] = [];

  for (const node of models) {
    try {
      results.push(generateModel({ node, naming, outputDir, logger }, catalog.nodes[node.unique_id]));
    } catch (err) {
      if (!continueOnError) throw err;

      const message = err instanceof Error ? err.message : String(err);
      logger.error(`${node.name}: ${message}`);
      results.push({
        model: node.name,
        uniqueId: node.unique_id,
        status: 'failed',
        error: message,
        diagnostics: [],
      });
    }
  }

  const written = results.filter((r) => r.status === 'written');
  const failed = results.filter((r) => r.status === 'failed');

  if (failed.length > 0) {
    logger.warn(`${failed.length} model(s) failed and were skipped.`);
  }
  logger.success(`Generation complete. ${written.length} view file(s) written.`);
  for (const result of written) {
    if (result.file) {
      logger.info(`  ${pc.cyan(result.model)} ${pc.dim(`→ ${relative(projectDir, result.file)}`)}`);
    }
  }

  return results;
}

// ── Per-model generation ────────────────────────────────────────────

function generateModel(
  context: ModelContext,
  catalogNode: CatalogNode | undefined,
): GenerateResult {
  const { node, naming, outputDir, logger } = context;

  const { columns, repaired } = buildColumnSet(node, catalogNode);
  if (columns.size === 0) {
    logger.warn(`${node.name}: no columns in manifest or catalog, skipped`);
    return { model: node.name, uniqueId: node.unique_id, status: 'skipped', diagnostics: [] };
  }
  if (repaired.length > 0) {
    logger.debug(`${node.name}: added ${repaired.length} nested column(s) from catalog types`);
  }

  const baseName = baseNameFor(node, naming.useTableName);
  const result = compileDocument(columns, { baseName, naming });
  reportDiagnostics(node.name, result.diagnostics, logger);

  const text = renderDocument({ relationName: node.relation_name }, result, { logger });

  const dir = join(outputDir, modelDirOf(node));
  const file = join(dir, `${baseName}.view.lkml`);
  mkdirSync(dir, { recursive: true });
  writeFileSync(file, text, 'utf-8');

  return {
    model: node.name,
    uniqueId: node.unique_id,
    status: 'written',
    viewName: baseName,
    file,
    diagnostics: result.diagnostics,
  };
}

function reportDiagnostics(model: string, diagnostics: readonly Diagnostic[], logger: Logger): void {
  for (const diagnostic of diagnostics) {
    const where = diagnostic.view ? ` [${diagnostic.view}]` : '';
    const line = `${model}${where}: ${diagnostic.message}`;
    if (diagnostic.severity === 'warning') {
      logger.warn(line);
    } else {
      logger.debug(line);
    }
  }
}
