/**
 * Query Errors - typed errors for the query runner
 *
 * Every error carries error_class, error_code and a retryable flag so that callers
 * (CLI, Lambda) can map failures to exit codes and reports without string matching.
 * Nothing in the runner retries on its own; retryable is informational.
 */

import type { ExecutionMode } from './QueryTypes';

export type QueryErrorClass = 'NOT_FOUND' | 'CONFIGURATION' | 'EXECUTION' | 'TIMEOUT';

/**
 * Base error for the query runner
 */
export class QueryRunnerError extends Error {
  constructor(
    message: string,
    public readonly error_class: QueryErrorClass,
    public readonly error_code: string,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Named query, template or template directory is absent
 */
export class NotFoundError extends QueryRunnerError {
  constructor(message: string, errorCode: 'TEMPLATE_NOT_FOUND' | 'TEMPLATE_DIR_NOT_FOUND' = 'TEMPLATE_NOT_FOUND') {
    super(message, 'NOT_FOUND', errorCode, false);
  }
}

/**
 * A mandatory template variable (DATABASE, ATHENA_OUTPUT_S3) has no value
 */
export class MissingRequiredVariableError extends QueryRunnerError {
  constructor(public readonly variable: string, templateName?: string) {
    super(
      templateName
        ? `Missing required variable ${variable} while rendering ${templateName}`
        : `Missing required variable ${variable}`,
      'CONFIGURATION',
      'MISSING_REQUIRED_VARIABLE',
      false
    );
  }
}

export class ConfigurationError extends QueryRunnerError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(
      issues.length > 0 ? `${message}:\n${issues.map((i) => `  - ${i}`).join('\n')}` : message,
      'CONFIGURATION',
      'INVALID_CONFIGURATION',
      false
    );
  }
}

export interface ExecutionErrorContext {
  queryName: string;
  mode: ExecutionMode;
  executionId?: string;
  diagnostic?: string;
}

export type QueryFailureCode =
  | 'QUERY_FAILED'
  | 'QUERY_CANCELLED'
  | 'LOCAL_EXECUTION_FAILED'
  | 'RESULT_FETCH_FAILED';

/**
 * Engine reported FAILED/CANCELLED, or local execution raised an error
 */
export class QueryExecutionFailedError extends QueryRunnerError {
  public readonly queryName: string;
  public readonly mode: ExecutionMode;
  public readonly executionId?: string;
  public readonly diagnostic?: string;

  constructor(message: string, context: ExecutionErrorContext, errorCode: QueryFailureCode = 'QUERY_FAILED', cause?: unknown) {
    super(
      context.diagnostic ? `${message}: ${context.diagnostic}` : message,
      'EXECUTION',
      errorCode,
      false
    );
    this.queryName = context.queryName;
    this.mode = context.mode;
    this.executionId = context.executionId;
    this.diagnostic = context.diagnostic;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * Poll deadline expired before the engine reached a terminal state
 */
export class QueryTimeoutError extends QueryRunnerError {
  public readonly queryName: string;
  public readonly mode: ExecutionMode;
  public readonly executionId?: string;

  constructor(context: ExecutionErrorContext, public readonly waitedMs: number) {
    super(
      `Query ${context.queryName} (${context.executionId ?? 'no execution id'}) did not finish within ${Math.round(waitedMs / 1000)}s`,
      'TIMEOUT',
      'QUERY_TIMEOUT',
      false
    );
    this.queryName = context.queryName;
    this.mode = context.mode;
    this.executionId = context.executionId;
  }
}

export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
