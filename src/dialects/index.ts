export type { SourceDialect, SourceConfig, SourceQuery, SourcePage, PageRequest } from './source';
export type { TargetDialect, TargetConfig, TableSpec, TableRow, ColumnSpec } from './target';
export { createSource, listSourceTypes, registerSource } from './source-registry';
export { createTarget, listTargetTypes, registerTarget } from './target-registry';
