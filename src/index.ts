export * from './types/QueryTypes';
export * from './types/QueryErrors';
export { loadRunnerConfig, DEFAULT_SQL_ROOT } from './config/runnerConfig';
export type { RunnerConfig, TemplateVariableConfig } from './config/runnerConfig';
export { Logger } from './services/core/Logger';
export type { LogLevel, LoggerOptions } from './services/core/Logger';
export { SqlTemplateStore } from './services/templates/SqlTemplateStore';
export { CatalogLoader, CATALOG_FILE_NAME } from './services/templates/CatalogLoader';
export type { QueryCatalog } from './services/templates/CatalogLoader';
export {
  render,
  findUnresolvedPlaceholders,
  variablesFromConfig,
  RECOGNIZED_VARIABLES,
} from './services/templates/TemplateRenderer';
export type { TemplateVariable, TemplateVariables } from './services/templates/TemplateRenderer';
export type * from './services/engines/IQueryEngine';
export { AthenaQueryEngine } from './services/engines/AthenaQueryEngine';
export { DuckDbQueryEngine } from './services/engines/DuckDbQueryEngine';
export { NodeDuckDbClient } from './services/engines/DuckDbClient';
export type { DuckDbClient, DuckDbRows } from './services/engines/DuckDbClient';
export { translateAthenaToDuckDb } from './services/engines/SqlDialectTranslator';
export { createQueryEngine } from './services/engines/createQueryEngine';
export { ManifestStore, MANIFEST_FILE_NAME } from './services/evidence/ManifestStore';
export { QueryOrchestrator } from './services/execution/QueryOrchestrator';
export type { QueryOrchestratorDeps, QueryRunner, Sleep } from './services/execution/QueryOrchestrator';
export { createOrchestrator } from './services/execution/createOrchestrator';
