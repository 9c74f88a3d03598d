/**
 * AWS Client Configuration Helper
 *
 * Creates AWS SDK client configuration with credentials from environment variables.
 * Static credentials keep Jest away from the SDK's dynamic-import credential chain.
 *
 * Supports:
 * - AWS_ACCESS_KEY_ID / AWS_SECRET_ACCESS_KEY (direct credentials)
 * - AWS_PROFILE (reads ~/.aws/credentials directly)
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

export interface AWSCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
}

export interface AWSClientConfig {
  region?: string;
  credentials?: AWSCredentials;
}

/**
 * Parse one profile out of an ini-style credentials file
 */
export function parseCredentialsProfile(content: string, profileName: string): AWSCredentials | null {
  let inProfile = false;
  let accessKeyId: string | undefined;
  let secretAccessKey: string | undefined;
  let sessionToken: string | undefined;

  for (const line of content.split('\n')) {
    const trimmed = line.trim();

    if (trimmed.startsWith('[') && trimmed.endsWith(']')) {
      if (inProfile) break;
      inProfile = trimmed === `[${profileName}]`;
      continue;
    }

    if (!inProfile) continue;

    const [key, ...rest] = trimmed.split('=');
    const value = rest.join('=').trim();
    switch (key?.trim()) {
      case 'aws_access_key_id':
        accessKeyId = value;
        break;
      case 'aws_secret_access_key':
        secretAccessKey = value;
        break;
      case 'aws_session_token':
        sessionToken = value;
        break;
      default:
        break;
    }
  }

  if (accessKeyId && secretAccessKey) {
    return {
      accessKeyId,
      secretAccessKey,
      ...(sessionToken ? { sessionToken } : {}),
    };
  }
  return null;
}

function readCredentialsFromProfile(profileName: string): AWSCredentials | null {
  const credentialsPath = path.join(os.homedir(), '.aws', 'credentials');
  if (!fs.existsSync(credentialsPath)) {
    return null;
  }
  return parseCredentialsProfile(fs.readFileSync(credentialsPath, 'utf-8'), profileName);
}

/**
 * Get AWS client configuration with credentials from environment
 *
 * Priority:
 * 1. AWS_ACCESS_KEY_ID / AWS_SECRET_ACCESS_KEY
 * 2. AWS_PROFILE (from ~/.aws/credentials)
 * 3. SDK default provider chain (no credentials set here)
 */
export function getAWSClientConfig(region?: string, env: NodeJS.ProcessEnv = process.env): AWSClientConfig {
  const config: AWSClientConfig = { region: region || env.AWS_REGION };

  if (env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) {
    config.credentials = {
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
      ...(env.AWS_SESSION_TOKEN ? { sessionToken: env.AWS_SESSION_TOKEN } : {}),
    };
    return config;
  }

  if (env.AWS_PROFILE) {
    const profileCredentials = readCredentialsFromProfile(env.AWS_PROFILE);
    if (profileCredentials) {
      config.credentials = profileCredentials;
    }
  }

  return config;
}
