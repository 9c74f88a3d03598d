/**
 * Template Renderer - substitutes environment-derived variables into SQL templates
 *
 * Only the recognized variables are substituted, in ${NAME}, $NAME or <NAME> form.
 * Anything else that looks like a placeholder is left as written, so a partial
 * configuration shows up as visibly broken SQL instead of a crash.
 */

import type { RunnerConfig } from '../../config/runnerConfig';
import { MissingRequiredVariableError } from '../../types/QueryErrors';

export const RECOGNIZED_VARIABLES = [
  'ACCOUNT_ID',
  'AWS_REGION',
  'REGION',
  'PACKAGING_BUCKET',
  'RAW_BUCKET',
  'CLEAN_BUCKET',
  'ATHENA_RESULTS_BUCKET',
  'RAW_PREFIX',
  'CLEAN_PREFIX',
  'ATHENA_OUTPUT_S3',
  'DATABASE',
  'PROJECT_NAME',
] as const;

export type TemplateVariable = (typeof RECOGNIZED_VARIABLES)[number];

export type TemplateVariables = Partial<Record<TemplateVariable, string>>;

export const REQUIRED_VARIABLES: readonly TemplateVariable[] = ['DATABASE', 'ATHENA_OUTPUT_S3'];

const PLACEHOLDER_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)|<([A-Z_][A-Z0-9_]*)>/g;

const RECOGNIZED_SET: ReadonlySet<string> = new Set<string>(RECOGNIZED_VARIABLES);

function isRecognized(name: string): name is TemplateVariable {
  return RECOGNIZED_SET.has(name);
}

/**
 * Render a template. Throws MissingRequiredVariableError when the template references
 * DATABASE or ATHENA_OUTPUT_S3 and no value is available.
 */
export function render(template: string, variables: TemplateVariables, templateName?: string): string {
  return template.replace(
    PLACEHOLDER_PATTERN,
    (match: string, braced?: string, bare?: string, angled?: string) => {
      const name = braced ?? bare ?? angled ?? '';
      if (!isRecognized(name)) {
        return match;
      }
      const value = variables[name];
      if (value === undefined || value === '') {
        if (REQUIRED_VARIABLES.includes(name)) {
          throw new MissingRequiredVariableError(name, templateName);
        }
        return '';
      }
      return value;
    }
  );
}

/**
 * Recognized placeholders still present in a text, in order of first appearance
 */
export function findUnresolvedPlaceholders(text: string): TemplateVariable[] {
  const found: TemplateVariable[] = [];
  for (const match of text.matchAll(PLACEHOLDER_PATTERN)) {
    const name = match[1] ?? match[2] ?? match[3] ?? '';
    if (isRecognized(name) && !found.includes(name)) {
      found.push(name);
    }
  }
  return found;
}

export function variablesFromConfig(config: RunnerConfig): TemplateVariables {
  const { variables } = config;
  return {
    ACCOUNT_ID: variables.accountId,
    AWS_REGION: config.region,
    REGION: config.region,
    PACKAGING_BUCKET: variables.packagingBucket,
    RAW_BUCKET: variables.rawBucket,
    CLEAN_BUCKET: variables.cleanBucket,
    ATHENA_RESULTS_BUCKET: variables.athenaResultsBucket,
    RAW_PREFIX: variables.rawPrefix,
    CLEAN_PREFIX: variables.cleanPrefix,
    ATHENA_OUTPUT_S3: config.athena.outputLocation,
    DATABASE: config.database,
    PROJECT_NAME: variables.projectName,
  };
}
