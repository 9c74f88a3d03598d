/**
 * Runner configuration, validated with Zod.
 *
 * Entry points call loadRunnerConfig() once and pass the resulting struct down;
 * services never read process.env themselves.
 */

import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../types/QueryErrors';
import type { ExecutionMode } from '../types/QueryTypes';
import type { LogLevel } from '../services/core/Logger';

/** Empty strings from .env files count as unset. */
const blankAsUndefined = (val: unknown): unknown => (typeof val === 'string' && val.trim() === '' ? undefined : val);

const optionalString = z.preprocess(blankAsUndefined, z.string().trim().optional());

const optionalBucket = z.preprocess(blankAsUndefined, z.string().trim().toLowerCase().optional());

const stringWithDefault = (defaultValue: string) =>
  z.preprocess(blankAsUndefined, z.string().trim().min(1).default(defaultValue));

const positiveIntWithDefault = (defaultValue: number) =>
  z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(defaultValue));

const booleanFlag = (defaultValue: boolean) =>
  z.preprocess((val) => {
    if (val === undefined || val === '') return defaultValue;
    if (typeof val === 'string') return val.trim().toLowerCase() === 'true';
    return val;
  }, z.boolean());

const RunnerEnvSchema = z
  .object({
    MODE: z.preprocess(
      (val) => (typeof val === 'string' && val.trim() !== '' ? val.trim().toUpperCase() : 'LOCAL'),
      z.enum(['CLOUD', 'LOCAL'])
    ),
    DATABASE: z.string().trim().min(1, 'DATABASE is required'),
    ATHENA_OUTPUT_S3: z.preprocess(
      blankAsUndefined,
      z.string().trim().startsWith('s3://', 'ATHENA_OUTPUT_S3 must be an s3:// URI').optional()
    ),
    AWS_REGION: stringWithDefault('eu-west-1'),
    ATHENA_WORKGROUP: stringWithDefault('primary'),
    ATHENA_POLL_INTERVAL_MS: positiveIntWithDefault(2000),
    ATHENA_MAX_WAIT_SECONDS: positiveIntWithDefault(120),
    ATHENA_DDL_SETTLE_MS: z.preprocess(blankAsUndefined, z.coerce.number().int().nonnegative().default(3000)),

    SQL_ROOT: optionalString,
    EVIDENCE_DIR: optionalString,
    LOCAL_DATA_DIR: optionalString,
    DUCKDB_EXPORT_JSON: booleanFlag(true),
    DUCKDB_EXPORT_CSV: booleanFlag(true),

    ACCOUNT_ID: optionalString,
    PACKAGING_BUCKET: optionalBucket,
    RAW_BUCKET: optionalBucket,
    CLEAN_BUCKET: optionalBucket,
    ATHENA_RESULTS_BUCKET: optionalBucket,
    RAW_PREFIX: optionalString,
    CLEAN_PREFIX: optionalString,
    PROJECT_NAME: optionalString,

    LOG_LEVEL: z.preprocess(
      (val) => (typeof val === 'string' && val.trim() !== '' ? val.trim().toLowerCase() : 'info'),
      z.enum(['debug', 'info', 'warn', 'error'])
    ),
    AWS_LAMBDA_FUNCTION_NAME: optionalString,
  })
  .superRefine((env, ctx) => {
    if (env.MODE === 'CLOUD' && !env.ATHENA_OUTPUT_S3) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['ATHENA_OUTPUT_S3'],
        message: 'ATHENA_OUTPUT_S3 is required when MODE is CLOUD',
      });
    }
  });

/**
 * Values substituted into SQL templates
 */
export interface TemplateVariableConfig {
  accountId?: string;
  packagingBucket?: string;
  rawBucket?: string;
  cleanBucket?: string;
  athenaResultsBucket?: string;
  rawPrefix?: string;
  cleanPrefix?: string;
  projectName?: string;
}

export interface RunnerConfig {
  mode: ExecutionMode;
  database: string;
  region: string;
  athena: {
    outputLocation?: string;
    workGroup: string;
    pollIntervalMs: number;
    maxWaitSeconds: number;
    /** Pause between a DDL batch and the queries that read it */
    ddlSettleMs: number;
  };
  paths: {
    sqlRoot: string;
    evidenceDir: string;
    localDataDir: string;
  };
  localExport: {
    json: boolean;
    csv: boolean;
  };
  variables: TemplateVariableConfig;
  logLevel: LogLevel;
}

/** Templates shipped with the package: <package>/sql, from both src/ and dist/. */
export const DEFAULT_SQL_ROOT = path.resolve(__dirname, '../../sql');

/**
 * Parse and validate configuration from environment variables
 */
export function loadRunnerConfig(env: NodeJS.ProcessEnv = process.env): RunnerConfig {
  const parsed = RunnerEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Configuration validation failed',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const e = parsed.data;
  const inLambda = e.AWS_LAMBDA_FUNCTION_NAME !== undefined;

  return {
    mode: e.MODE,
    database: e.DATABASE,
    region: e.AWS_REGION,
    athena: {
      outputLocation: e.ATHENA_OUTPUT_S3,
      workGroup: e.ATHENA_WORKGROUP,
      pollIntervalMs: e.ATHENA_POLL_INTERVAL_MS,
      maxWaitSeconds: e.ATHENA_MAX_WAIT_SECONDS,
      ddlSettleMs: e.ATHENA_DDL_SETTLE_MS,
    },
    paths: {
      sqlRoot: path.resolve(e.SQL_ROOT ?? DEFAULT_SQL_ROOT),
      evidenceDir: path.resolve(e.EVIDENCE_DIR ?? (inLambda ? '/tmp/evidence/athena' : 'evidence/athena')),
      localDataDir: path.resolve(e.LOCAL_DATA_DIR ?? 'local_data/clean'),
    },
    localExport: {
      json: e.DUCKDB_EXPORT_JSON,
      csv: e.DUCKDB_EXPORT_CSV,
    },
    variables: {
      accountId: e.ACCOUNT_ID,
      packagingBucket: e.PACKAGING_BUCKET,
      rawBucket: e.RAW_BUCKET,
      cleanBucket: e.CLEAN_BUCKET,
      athenaResultsBucket: e.ATHENA_RESULTS_BUCKET,
      rawPrefix: e.RAW_PREFIX,
      cleanPrefix: e.CLEAN_PREFIX,
      projectName: e.PROJECT_NAME,
    },
    logLevel: e.LOG_LEVEL,
  };
}
