import type { RunnerConfig } from '../../config/runnerConfig';
import { Logger } from '../core/Logger';
import { createQueryEngine } from '../engines/createQueryEngine';
import { ManifestStore } from '../evidence/ManifestStore';
import { SqlTemplateStore } from '../templates/SqlTemplateStore';
import { QueryOrchestrator } from './QueryOrchestrator';

/**
 * Wire the production orchestrator: templates from disk, engine by mode, manifest
 * beside the evidence files
 */
export async function createOrchestrator(config: RunnerConfig, logger: Logger): Promise<QueryOrchestrator> {
  logger.setContext({ mode: config.mode });
  const store = await SqlTemplateStore.load(config.paths.sqlRoot, logger.child('SqlTemplateStore'));

  return new QueryOrchestrator({
    config,
    engine: createQueryEngine(config, logger),
    store,
    manifest: new ManifestStore(logger.child('ManifestStore'), config.paths.evidenceDir),
    logger: logger.child('QueryOrchestrator'),
  });
}
