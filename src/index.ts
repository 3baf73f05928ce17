// Main exports for the r2logs library
export { R2LogsClient, responseText } from './r2-logs-client';
export { loadApiCredentials, loadBucketTarget, loadEnvironment, ENV_VARS } from './config';
export { parseTimestamp, formatTimestamp, resolveTimeRange, DEFAULT_WINDOW_MINUTES } from './time-range';
export { buildEndpoint, CLOUDFLARE_API_BASE_URL, DATE_PREFIX_TOKEN } from './endpoint';
export { formatNdjson, printNdjson } from './ndjson-formatter';
export { runLogsCommand, LogsCommandOptions } from './logs-command';
export { createProgram } from './program';
export { ConfigurationError, TransportError } from './errors';
export * from './types';
