/**
 * Query Runner Handler
 *
 * Runs every DDL (plus partition repairs) and then every query when new clean data
 * lands in S3. Accepts an SNS-wrapped S3 notification, a direct S3 notification,
 * or any other payload (logged and run anyway).
 *
 * Output: { status, engine, ddls_executed, queries_executed, triggered_by,
 *          ddls, repairs, queries } where each list holds { name, executionId }.
 *
 * Under CLOUD the handler pauses after a non-empty DDL batch so the catalog
 * publishes new tables before queries read them.
 */

import { Handler } from 'aws-lambda';
import { z } from 'zod';
import { loadRunnerConfig } from '../config/runnerConfig';
import { Logger } from '../services/core/Logger';
import { createOrchestrator } from '../services/execution/createOrchestrator';
import type { QueryRunner } from '../services/execution/QueryOrchestrator';
import { QueryRunnerError, errorMessage } from '../types/QueryErrors';
import type { ExecutionMode, ExecutionResult } from '../types/QueryTypes';

const S3RecordSchema = z.object({
  s3: z.object({
    bucket: z.object({ name: z.string() }),
    object: z.object({ key: z.string() }),
  }),
});

const S3NotificationSchema = z.object({
  Records: z.array(S3RecordSchema).min(1),
});

const SnsNotificationSchema = z.object({
  Records: z
    .array(
      z.object({
        Sns: z.object({ Message: z.string() }),
      })
    )
    .min(1),
});

export type TriggerSource = 'sns' | 's3' | 'unknown';

export interface TriggerInfo {
  source: TriggerSource;
  bucket: string;
  key: string;
}

export interface ExecutedStatement {
  name: string;
  /** Athena query execution id; absent for local runs */
  executionId?: string;
}

export interface QueryRunnerResponse {
  status: 'ok';
  engine: ExecutionMode;
  ddls_executed: number;
  queries_executed: number;
  triggered_by: string;
  ddls: ExecutedStatement[];
  repairs: ExecutedStatement[];
  queries: ExecutedStatement[];
}

function executed(results: ExecutionResult[]): ExecutedStatement[] {
  return results.map((result) => ({ name: result.queryName, executionId: result.executionId }));
}

const UNKNOWN_TRIGGER: TriggerInfo = { source: 'unknown', bucket: 'unknown', key: 'unknown' };

/** S3 notifications carry URL-encoded keys with '+' for spaces. */
function decodeS3Key(key: string): string {
  try {
    return decodeURIComponent(key.replace(/\+/g, ' '));
  } catch {
    return key;
  }
}

function fromS3Notification(payload: unknown, source: TriggerSource): TriggerInfo | null {
  const parsed = S3NotificationSchema.safeParse(payload);
  if (!parsed.success) {
    return null;
  }
  const { bucket, object } = parsed.data.Records[0].s3;
  return { source, bucket: bucket.name, key: decodeS3Key(object.key) };
}

/**
 * Identify the object that triggered the run. Never throws: a payload of any
 * other shape yields an 'unknown' trigger.
 */
export function parseTrigger(event: unknown): TriggerInfo {
  const sns = SnsNotificationSchema.safeParse(event);
  if (sns.success) {
    let message: unknown;
    try {
      message = JSON.parse(sns.data.Records[0].Sns.Message);
    } catch {
      return UNKNOWN_TRIGGER;
    }
    return fromS3Notification(message, 'sns') ?? UNKNOWN_TRIGGER;
  }

  return fromS3Notification(event, 's3') ?? UNKNOWN_TRIGGER;
}

export type OrchestratorFactory = () => Promise<QueryRunner>;

export type QueryRunnerHandler = (event: unknown) => Promise<QueryRunnerResponse>;

/**
 * Create handler function with dependency injection for testability
 */
export function createHandler(orchestratorFactory: OrchestratorFactory, logger: Logger): QueryRunnerHandler {
  return async (event: unknown) => {
    const trigger = parseTrigger(event);
    const triggeredBy = `s3://${trigger.bucket}/${trigger.key}`;

    if (trigger.source === 'unknown') {
      logger.warn('Query runner invoked with unexpected event structure, running anyway', {
        event: JSON.stringify(event)?.slice(0, 1000),
      });
    } else {
      logger.info('Query runner triggered', { source: trigger.source, triggeredBy });
    }

    try {
      const orchestrator = await orchestratorFactory();
      const { ddl, repairs } = await orchestrator.runDdl();
      if (ddl.length > 0) {
        await orchestrator.settleCatalog();
      }
      const queries = await orchestrator.runAll();

      logger.info('Query runner completed', {
        engine: orchestrator.mode,
        ddls: ddl.length,
        repairs: repairs.length,
        queries: queries.length,
      });

      return {
        status: 'ok',
        engine: orchestrator.mode,
        ddls_executed: ddl.length,
        queries_executed: queries.length,
        triggered_by: triggeredBy,
        ddls: executed(ddl),
        repairs: executed(repairs),
        queries: executed(queries),
      };
    } catch (error) {
      logger.error('Query runner failed', {
        triggeredBy,
        error: errorMessage(error),
        error_code: error instanceof QueryRunnerError ? error.error_code : undefined,
        stack: error instanceof Error ? error.stack : undefined,
      });
      throw error;
    }
  };
}

// Production handler; configuration is read on each invocation
const logger = new Logger('QueryRunnerHandler');

export const handler: Handler<unknown, QueryRunnerResponse> = createHandler(
  () => createOrchestrator(loadRunnerConfig(process.env), logger),
  logger
);
