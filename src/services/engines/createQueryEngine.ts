import type { RunnerConfig } from '../../config/runnerConfig';
import { ConfigurationError } from '../../types/QueryErrors';
import { Logger } from '../core/Logger';
import { AthenaQueryEngine } from './AthenaQueryEngine';
import { DuckDbQueryEngine } from './DuckDbQueryEngine';
import type { QueryEngine } from './IQueryEngine';

/**
 * Pick the engine once, from explicit configuration
 */
export function createQueryEngine(config: RunnerConfig, logger: Logger): QueryEngine {
  if (config.mode === 'CLOUD') {
    if (!config.athena.outputLocation) {
      throw new ConfigurationError('ATHENA_OUTPUT_S3 is required when MODE is CLOUD');
    }
    return new AthenaQueryEngine(logger.child('AthenaQueryEngine'), {
      outputLocation: config.athena.outputLocation,
      workGroup: config.athena.workGroup,
      evidenceDir: config.paths.evidenceDir,
      region: config.region,
    });
  }

  return new DuckDbQueryEngine(logger.child('DuckDbQueryEngine'), {
    database: config.database,
    localDataDir: config.paths.localDataDir,
    evidenceDir: config.paths.evidenceDir,
    export: config.localExport,
  });
}
