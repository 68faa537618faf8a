/**
 * AWS Client Configuration Helper
 *
 * Creates AWS SDK client configuration with credentials from environment variables.
 *
 * Supports:
 * - AWS_ACCESS_KEY_ID / AWS_SECRET_ACCESS_KEY (direct credentials)
 * - AWS_PROFILE (reads from ~/.aws/credentials via a plain ini read)
 * - otherwise the SDK default provider chain (instance/task role)
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
 * Read AWS credentials for a profile from ~/.aws/credentials
 */
function readCredentialsFromProfile(profileName: string): AWSCredentials | null {
  const credentialsPath = path.join(os.homedir(), '.aws', 'credentials');
  let credentialsContent: string;
  try {
    credentialsContent = fs.readFileSync(credentialsPath, 'utf-8');
  } catch {
    // No credentials file: fall through to the default provider chain
    return null;
  }

  let inProfile = false;
  let accessKeyId: string | undefined;
  let secretAccessKey: string | undefined;
  let sessionToken: string | undefined;

  for (const line of credentialsContent.split('\n')) {
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

/**
 * Get AWS client configuration with credentials from environment
 *
 * Priority:
 * 1. AWS_ACCESS_KEY_ID / AWS_SECRET_ACCESS_KEY (direct credentials)
 * 2. AWS_PROFILE (reads from ~/.aws/credentials)
 * 3. Default credential chain
 */
export function getAWSClientConfig(region?: string): AWSClientConfig {
  const config: AWSClientConfig = { region: region || process.env.AWS_REGION };

  if (process.env.AWS_ACCESS_KEY_ID && process.env.AWS_SECRET_ACCESS_KEY) {
    config.credentials = {
      accessKeyId: process.env.AWS_ACCESS_KEY_ID,
      secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY,
      ...(process.env.AWS_SESSION_TOKEN ? { sessionToken: process.env.AWS_SESSION_TOKEN } : {}),
    };
    return config;
  }

  if (process.env.AWS_PROFILE) {
    const profileCredentials = readCredentialsFromProfile(process.env.AWS_PROFILE);
    if (profileCredentials) {
      config.credentials = profileCredentials;
    }
  }

  return config;
}
