import {
  AthenaClient,
  GetQueryExecutionCommand,
  StartQueryExecutionCommand,
  StopQueryExecutionCommand,
} from '@aws-sdk/client-athena';
import { S3Client, GetObjectCommand } from '@aws-sdk/client-s3';
import * as fs from 'fs/promises';
import * as path from 'path';
import { Logger } from '../core/Logger';
import { getAWSClientConfig } from '../../utils/aws-client-config';
import { QueryExecutionFailedError, errorMessage } from '../../types/QueryErrors';
import type {
  AsyncQueryEngine,
  EngineState,
  FetchResult,
  PollResult,
  StatementContext,
} from './IQueryEngine';

export interface AthenaEngineOptions {
  outputLocation: string;
  workGroup: string;
  evidenceDir: string;
  region?: string;
}

export interface S3Location {
  bucket: string;
  key: string;
}

export function parseS3Uri(uri: string): S3Location | null {
  const match = /^s3:\/\/([^/]+)\/(.+)$/.exec(uri);
  if (!match?.[1] || !match[2]) return null;
  return { bucket: match[1], key: match[2] };
}

const ENGINE_STATES: readonly EngineState[] = ['QUEUED', 'RUNNING', 'SUCCEEDED', 'FAILED', 'CANCELLED'];

function toEngineState(state: string | undefined): EngineState {
  return ENGINE_STATES.find((s) => s === state) ?? 'QUEUED';
}

/**
 * AthenaQueryEngine - CLOUD adapter
 *
 * Statements run asynchronously on Athena; results land in the configured S3 output
 * location and fetch() copies them to <evidenceDir>/<queryName>-<executionId>.<ext>.
 */
export class AthenaQueryEngine implements AsyncQueryEngine {
  readonly kind = 'async' as const;
  readonly mode = 'CLOUD' as const;
  readonly outputLocation: string;

  private athenaClient: AthenaClient;
  private s3Client: S3Client;
  private logger: Logger;
  private workGroup: string;
  private evidenceDir: string;

  constructor(logger: Logger, options: AthenaEngineOptions) {
    this.logger = logger;
    this.outputLocation = options.outputLocation;
    this.workGroup = options.workGroup;
    this.evidenceDir = options.evidenceDir;

    const clientConfig = getAWSClientConfig(options.region);
    this.athenaClient = new AthenaClient(clientConfig);
    this.s3Client = new S3Client(clientConfig);
  }

  /**
   * Start the statement and return its QueryExecutionId without waiting
   */
  async submit(sql: string, context: StatementContext): Promise<string> {
    const response = await this.athenaClient.send(new StartQueryExecutionCommand({
      QueryString: sql,
      QueryExecutionContext: { Database: context.database },
      ResultConfiguration: { OutputLocation: this.outputLocation },
      WorkGroup: this.workGroup,
    }));

    if (!response.QueryExecutionId) {
      throw new QueryExecutionFailedError('Athena did not return a QueryExecutionId', {
        queryName: context.queryName,
        mode: this.mode,
      });
    }

    this.logger.debug('Athena query submitted', {
      queryName: context.queryName,
      executionId: response.QueryExecutionId,
      database: context.database,
      workGroup: this.workGroup,
    });
    return response.QueryExecutionId;
  }

  async poll(executionId: string): Promise<PollResult> {
    const response = await this.athenaClient.send(new GetQueryExecutionCommand({
      QueryExecutionId: executionId,
    }));
    const execution = response.QueryExecution;
    const state = toEngineState(execution?.Status?.State);

    if (state !== 'FAILED' && state !== 'CANCELLED') {
      return { state };
    }

    const reasons = [
      execution?.Status?.StateChangeReason,
      execution?.Status?.AthenaError?.ErrorMessage,
    ].filter((r): r is string => typeof r === 'string' && r !== '');
    const errorType = execution?.Status?.AthenaError?.ErrorType;
    const reason = [...new Set(reasons)].join('; ');

    return {
      state,
      reason: errorType !== undefined ? `${reason} (error type ${errorType})` : reason || undefined,
    };
  }

  /**
   * Resolve the output location Athena reports and copy the artifact into the evidence directory
   */
  async fetch(executionId: string, context: StatementContext): Promise<FetchResult> {
    const errorContext = { queryName: context.queryName, mode: this.mode, executionId };

    const response = await this.athenaClient.send(new GetQueryExecutionCommand({
      QueryExecutionId: executionId,
    }));
    const outputUri = response.QueryExecution?.ResultConfiguration?.OutputLocation;
    const location = outputUri ? parseS3Uri(outputUri) : null;
    if (!outputUri || !location) {
      throw new QueryExecutionFailedError(
        'Athena reported no usable result location',
        { ...errorContext, diagnostic: outputUri ?? 'OutputLocation missing' },
        'RESULT_FETCH_FAILED'
      );
    }

    const extension = path.extname(location.key) || '.csv';
    const target = path.join(this.evidenceDir, `${context.queryName}-${executionId}${extension}`);

    try {
      const object = await this.s3Client.send(new GetObjectCommand({
        Bucket: location.bucket,
        Key: location.key,
      }));
      if (!object.Body) {
        throw new Error(`Empty body for ${outputUri}`);
      }
      const bytes = await object.Body.transformToByteArray();

      await fs.mkdir(this.evidenceDir, { recursive: true });
      await fs.writeFile(target, bytes, { flag: 'wx' });
    } catch (error) {
      throw new QueryExecutionFailedError(
        `Failed to copy Athena result for ${context.queryName}`,
        { ...errorContext, diagnostic: errorMessage(error) },
        'RESULT_FETCH_FAILED',
        error
      );
    }

    this.logger.debug('Athena result copied', {
      queryName: context.queryName,
      executionId,
      source: outputUri,
      target,
    });
    return { resultLocation: target };
  }

  async cancel(executionId: string): Promise<void> {
    await this.athenaClient.send(new StopQueryExecutionCommand({ QueryExecutionId: executionId }));
    this.logger.info('Athena query stop requested', { executionId });
  }
}
