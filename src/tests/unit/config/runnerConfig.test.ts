import * as path from 'path';
import { DEFAULT_SQL_ROOT, loadRunnerConfig } from '../../../config/runnerConfig';
import { ConfigurationError } from '../../../types/QueryErrors';

describe('loadRunnerConfig', () => {
  it('should apply defaults for a minimal LOCAL environment', () => {
    const config = loadRunnerConfig({ DATABASE: 'health_db' });

    expect(config).toEqual({
      mode: 'LOCAL',
      database: 'health_db',
      region: 'eu-west-1',
      athena: {
        outputLocation: undefined,
        workGroup: 'primary',
        pollIntervalMs: 2000,
        maxWaitSeconds: 120,
        ddlSettleMs: 3000,
      },
      paths: {
        sqlRoot: DEFAULT_SQL_ROOT,
        evidenceDir: path.resolve('evidence/athena'),
        localDataDir: path.resolve('local_data/clean'),
      },
      localExport: { json: true, csv: true },
      variables: {
        accountId: undefined,
        packagingBucket: undefined,
        rawBucket: undefined,
        cleanBucket: undefined,
        athenaResultsBucket: undefined,
        rawPrefix: undefined,
        cleanPrefix: undefined,
        projectName: undefined,
      },
      logLevel: 'info',
    });
  });

  it('should parse a full CLOUD environment', () => {
    const config = loadRunnerConfig({
      MODE: 'cloud',
      DATABASE: 'health_db',
      ATHENA_OUTPUT_S3: 's3://results-bucket/athena/',
      AWS_REGION: 'us-east-2',
      ATHENA_WORKGROUP: 'analytics',
      ATHENA_POLL_INTERVAL_MS: '500',
      ATHENA_MAX_WAIT_SECONDS: '30',
      ATHENA_DDL_SETTLE_MS: '0',
      CLEAN_BUCKET: 'My-Clean-Bucket',
      DUCKDB_EXPORT_CSV: 'false',
      LOG_LEVEL: 'DEBUG',
    });

    expect(config.mode).toBe('CLOUD');
    expect(config.region).toBe('us-east-2');
    expect(config.athena).toEqual({
      outputLocation: 's3://results-bucket/athena/',
      workGroup: 'analytics',
      pollIntervalMs: 500,
      maxWaitSeconds: 30,
      ddlSettleMs: 0,
    });
    expect(config.variables.cleanBucket).toBe('my-clean-bucket');
    expect(config.localExport).toEqual({ json: true, csv: false });
    expect(config.logLevel).toBe('debug');
  });

  it('should write evidence under /tmp inside Lambda', () => {
    const config = loadRunnerConfig({ DATABASE: 'health_db', AWS_LAMBDA_FUNCTION_NAME: 'query-runner' });

    expect(config.paths.evidenceDir).toBe('/tmp/evidence/athena');
  });

  it('should treat empty strings as unset', () => {
    const config = loadRunnerConfig({ DATABASE: 'health_db', MODE: '', ATHENA_OUTPUT_S3: '', RAW_PREFIX: '  ' });

    expect(config.mode).toBe('LOCAL');
    expect(config.athena.outputLocation).toBeUndefined();
    expect(config.variables.rawPrefix).toBeUndefined();
  });

  it('should fall back to defaults for blank region, workgroup and timing values', () => {
    const config = loadRunnerConfig({
      MODE: 'LOCAL',
      DATABASE: 'health_db',
      AWS_REGION: '',
      ATHENA_WORKGROUP: ' ',
      ATHENA_POLL_INTERVAL_MS: '',
      ATHENA_MAX_WAIT_SECONDS: '',
      ATHENA_DDL_SETTLE_MS: '',
    });

    expect(config.region).toBe('eu-west-1');
    expect(config.athena).toEqual({
      outputLocation: undefined,
      workGroup: 'primary',
      pollIntervalMs: 2000,
      maxWaitSeconds: 120,
      ddlSettleMs: 3000,
    });
  });

  it('should require ATHENA_OUTPUT_S3 in CLOUD mode', () => {
    expect(() => loadRunnerConfig({ MODE: 'CLOUD', DATABASE: 'health_db' })).toThrow(
      'ATHENA_OUTPUT_S3: ATHENA_OUTPUT_S3 is required when MODE is CLOUD'
    );
  });

  it('should list every issue in one ConfigurationError', () => {
    let caught: unknown;
    try {
      loadRunnerConfig({ MODE: 'REMOTE', ATHENA_POLL_INTERVAL_MS: '-1' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    if (!(caught instanceof ConfigurationError)) return;
    expect(caught.issues).toHaveLength(3);
    expect(caught.issues[0]).toMatch(/^MODE: /);
    expect(caught.issues[1]).toMatch(/^DATABASE: /);
    expect(caught.issues[2]).toMatch(/^ATHENA_POLL_INTERVAL_MS: /);
  });
});
