/**
 * Query Runner Handler Unit Tests
 */

import { createHandler, parseTrigger } from '../../../handlers/query-runner-handler';
import { Logger } from '../../../services/core/Logger';
import type { QueryRunner } from '../../../services/execution/QueryOrchestrator';
import { QueryExecutionFailedError } from '../../../types/QueryErrors';
import type { ExecutionResult } from '../../../types/QueryTypes';

function result(queryName: string): ExecutionResult {
  return {
    queryName,
    mode: 'CLOUD',
    status: 'SUCCEEDED',
    resultLocation: `/tmp/evidence/athena/${queryName}-qid-${queryName}.csv`,
    executionId: `qid-${queryName}`,
    startedAt: '2024-05-01T10:00:00.000Z',
    endedAt: '2024-05-01T10:00:02.000Z',
    durationMs: 2000,
  };
}

const s3Event = {
  Records: [
    {
      s3: {
        bucket: { name: 'clean-bucket' },
        object: { key: 'clean/who_outbreaks/year%3D2024/part+0.parquet' },
      },
    },
  ],
};

describe('QueryRunnerHandler', () => {
  describe('parseTrigger', () => {
    it('should read a direct S3 notification and decode the key', () => {
      expect(parseTrigger(s3Event)).toEqual({
        source: 's3',
        bucket: 'clean-bucket',
        key: 'clean/who_outbreaks/year=2024/part 0.parquet',
      });
    });

    it('should unwrap an SNS-delivered S3 notification', () => {
      const snsEvent = { Records: [{ Sns: { Message: JSON.stringify(s3Event) } }] };

      expect(parseTrigger(snsEvent)).toEqual({
        source: 'sns',
        bucket: 'clean-bucket',
        key: 'clean/who_outbreaks/year=2024/part 0.parquet',
      });
    });

    it('should fall back to unknown for other payloads', () => {
      const unknown = { source: 'unknown', bucket: 'unknown', key: 'unknown' };

      expect(parseTrigger({ detail: 'scheduled' })).toEqual(unknown);
      expect(parseTrigger(undefined)).toEqual(unknown);
      expect(parseTrigger({ Records: [{ Sns: { Message: 'not json' } }] })).toEqual(unknown);
      expect(parseTrigger({ Records: [] })).toEqual(unknown);
    });
  });

  describe('handler', () => {
    let runner: jest.Mocked<QueryRunner>;
    let logger: Logger;

    beforeEach(() => {
      runner = {
        mode: 'CLOUD',
        runQuery: jest.fn(),
        runAll: jest.fn().mockResolvedValue([result('Query01'), result('Query02')]),
        runDdl: jest.fn().mockResolvedValue({
          ddl: [result('ddl_who_outbreaks')],
          repairs: [result('repair_who_outbreaks')],
        }),
        repairPartitions: jest.fn(),
        settleCatalog: jest.fn().mockResolvedValue(undefined),
      };
      logger = new Logger('QueryRunnerHandlerTest');
    });

    it('should run DDL, then all queries, and summarise', async () => {
      const handler = createHandler(async () => runner, logger);

      const response = await handler(s3Event);

      expect(response).toEqual({
        status: 'ok',
        engine: 'CLOUD',
        ddls_executed: 1,
        queries_executed: 2,
        triggered_by: 's3://clean-bucket/clean/who_outbreaks/year=2024/part 0.parquet',
        ddls: [{ name: 'ddl_who_outbreaks', executionId: 'qid-ddl_who_outbreaks' }],
        repairs: [{ name: 'repair_who_outbreaks', executionId: 'qid-repair_who_outbreaks' }],
        queries: [
          { name: 'Query01', executionId: 'qid-Query01' },
          { name: 'Query02', executionId: 'qid-Query02' },
        ],
      });
    });

    it('should let the catalog settle between DDL and queries', async () => {
      const handler = createHandler(async () => runner, logger);

      await handler(s3Event);

      const [ddlOrder] = runner.runDdl.mock.invocationCallOrder;
      const [settleOrder] = runner.settleCatalog.mock.invocationCallOrder;
      const [queriesOrder] = runner.runAll.mock.invocationCallOrder;
      expect(ddlOrder).toBeLessThan(settleOrder);
      expect(settleOrder).toBeLessThan(queriesOrder);
    });

    it('should skip the settle pause when no DDL ran', async () => {
      runner.runDdl.mockResolvedValueOnce({ ddl: [], repairs: [] });
      const handler = createHandler(async () => runner, logger);

      const response = await handler(s3Event);

      expect(runner.settleCatalog).not.toHaveBeenCalled();
      expect(response.ddls).toEqual([]);
      expect(response.queries_executed).toBe(2);
    });

    it('should run for unexpected events too', async () => {
      const warnSpy = jest.spyOn(logger, 'warn');
      const handler = createHandler(async () => runner, logger);

      const response = await handler({ hello: 'world' });

      expect(response.triggered_by).toBe('s3://unknown/unknown');
      expect(warnSpy).toHaveBeenCalledTimes(1);
      expect(runner.runAll).toHaveBeenCalledTimes(1);
    });

    it('should rethrow failures so the invocation fails', async () => {
      const executionId = 'qid-ddl_who_outbreaks';
      const failure = new QueryExecutionFailedError('Query ddl_who_outbreaks FAILED', {
        queryName: 'ddl_who_outbreaks',
        mode: 'CLOUD',
        executionId,
      });
      runner.runDdl.mockRejectedValueOnce(failure);
      const handler = createHandler(async () => runner, logger);

      await expect(handler(s3Event)).rejects.toBe(failure);
      expect(runner.runAll).not.toHaveBeenCalled();
    });

    it('should fail when the runner cannot be created', async () => {
      const handler = createHandler(async () => {
        throw new Error('Configuration validation failed');
      }, logger);

      await expect(handler(s3Event)).rejects.toThrow('Configuration validation failed');
    });
  });
});
