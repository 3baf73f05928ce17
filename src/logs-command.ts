import chalk from 'chalk';
import moment from 'moment';
import { loadEnvironment } from './config';
import { buildEndpoint } from './endpoint';
import { printNdjson } from './ndjson-formatter';
import { R2LogsClient } from './r2-logs-client';
import { resolveTimeRange } from './time-range';
import { LogResponse, LogsCommand, ResolvedQuery } from './types';

export interface LogsCommandOptions {
  startTime?: moment.Moment;
  endTime?: moment.Moment;
  verbose?: boolean;
  pretty?: boolean;
}

/**
 * Load config, resolve the window, send the one request and print what came back.
 * Throws ConfigurationError before any request when variables are missing, and
 * TransportError when the API could not be reached.
 */
export async function runLogsCommand(
  command: LogsCommand,
  options: LogsCommandOptions,
  env: Record<string, string | undefined> = process.env
): Promise<LogResponse> {
  const config = loadEnvironment(env);

  const query: ResolvedQuery = {
    ...resolveTimeRange({ start: options.startTime, end: options.endTime }),
    command,
    verbose: options.verbose ?? false
  };

  if (query.verbose) {
    console.error(`Retrieving logs from ${chalk.green(`"${query.startTime}"`)} to ${chalk.green(`"${query.endTime}"`)}`);
  }

  const endpoint = buildEndpoint(query.command, query, config, config.apiBaseUrl);

  if (query.verbose) {
    console.error(`Accessing endpoint: ${chalk.green(endpoint)}`);
  }

  const client = new R2LogsClient(config);
  const response = await client.fetchLogs(endpoint);

  if (response.kind === 'logs') {
    if (options.pretty) {
      printNdjson(response.body, { pretty: true });
    } else {
      console.log(response.body);
    }
  }

  return response;
}
