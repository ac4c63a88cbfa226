export { runGenerate, DEFAULT_TARGET_DIR, DEFAULT_OUTPUT_DIR } from './commands/generate.js';
export type { GenerateOptions, GenerateResult, GenerateStatus } from './commands/generate.js';

export { loadConfig, CONFIG_FILE } from './config-loader.js';
export { createLogger, silentLogger } from './log.js';
export type { Logger, LoggerOptions, LogWriter } from './log.js';

export { loadArtifacts, loadManifest, loadCatalog, ArtifactError } from './dbt/artifacts.js';
export type { DbtArtifacts } from './dbt/artifacts.js';
export { selectModels, baseNameFor, tableNameOf, modelDirOf } from './dbt/models.js';
export type { ModelSelection } from './dbt/models.js';
export { buildColumnSet } from './dbt/merge.js';
export type { MergedColumns } from './dbt/merge.js';
export type { Manifest, ManifestNode, ManifestColumn, Catalog, CatalogNode, CatalogColumn } from './dbt/schemas.js';

export { renderDocument, sqlReference, quoteIdentifier } from './lookml/render.js';
export type { RenderModel, RenderOptions } from './lookml/render.js';
export { lookmlTypeOf, dimensionTypeOf } from './lookml/types.js';
export type { LookmlType, DimensionType, TimeDatatype } from './lookml/types.js';
export { serializeLookml } from './lookml/serialize.js';
export type { LookmlEntry } from './lookml/serialize.js';
