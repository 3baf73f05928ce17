import { ConfigurationError } from './errors';
import { ApiCredentials, BucketTarget, R2LogsEnvironment } from './types';

export const ENV_VARS = {
  apiKey: 'CF_API_KEY',
  accessKeyId: 'R2_ACCESS_KEY_ID',
  secretAccessKey: 'R2_SECRET_ACCESS_KEY',
  accountId: 'CF_ACCOUNT_ID',
  bucketName: 'BUCKET_NAME',
  apiBaseUrl: 'CF_API_BASE_URL'
} as const;

type Env = Record<string, string | undefined>;

/**
 * Reads required variables in a single pass, remembering every missing one
 * instead of stopping at the first.
 */
class EnvironmentReader {
  private readonly missing: string[] = [];

  constructor(private readonly env: Env) {}

  require(name: string): string {
    const value = this.env[name];
    if (value === undefined || value === '') {
      this.missing.push(name);
      return '';
    }
    return value;
  }

  optional(name: string): string | undefined {
    const value = this.env[name];
    return value === '' ? undefined : value;
  }

  done<T extends object>(value: T): Readonly<T> {
    if (this.missing.length > 0) {
      throw new ConfigurationError(this.missing);
    }
    return Object.freeze(value);
  }
}

function readCredentials(reader: EnvironmentReader): ApiCredentials {
  return {
    apiKey: reader.require(ENV_VARS.apiKey),
    accessKeyId: reader.require(ENV_VARS.accessKeyId),
    secretAccessKey: reader.require(ENV_VARS.secretAccessKey)
  };
}

function readTarget(reader: EnvironmentReader): BucketTarget {
  return {
    accountId: reader.require(ENV_VARS.accountId),
    bucketName: reader.require(ENV_VARS.bucketName)
  };
}

/**
 * Credentials sent with every request
 */
export function loadApiCredentials(env: Env = process.env): Readonly<ApiCredentials> {
  const reader = new EnvironmentReader(env);
  return reader.done(readCredentials(reader));
}

/**
 * Identifiers used to build the endpoint
 */
export function loadBucketTarget(env: Env = process.env): Readonly<BucketTarget> {
  const reader = new EnvironmentReader(env);
  return reader.done(readTarget(reader));
}

/**
 * Everything the CLI needs. Throws a ConfigurationError listing all missing variables.
 */
export function loadEnvironment(env: Env = process.env): Readonly<R2LogsEnvironment> {
  const reader = new EnvironmentReader(env);
  const credentials = readCredentials(reader);
  const target = readTarget(reader);
  const apiBaseUrl = reader.optional(ENV_VARS.apiBaseUrl);

  return reader.done({
    ...credentials,
    ...target,
    ...(apiBaseUrl ? { apiBaseUrl } : {})
  });
}
