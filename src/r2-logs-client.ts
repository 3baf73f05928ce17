import axios, { AxiosInstance, AxiosResponse } from 'axios';
import chalk from 'chalk';
import { TransportError } from './errors';
import { ApiCredentials, LogResponse } from './types';

export class R2LogsClient {
  private client: AxiosInstance;

  constructor(credentials: ApiCredentials) {
    this.client = axios.create({
      headers: {
        'Authorization': `Bearer ${credentials.apiKey}`,
        'R2-Access-Key-Id': credentials.accessKeyId,
        'R2-Secret-Access-Key': credentials.secretAccessKey
      },
      // Every HTTP status is a response we report on, not an exception
      validateStatus: () => true,
      responseType: 'text',
      transformResponse: [(data: unknown) => data]
    });
  }

  /**
   * Issue a single GET against a logs endpoint.
   *
   * Non-2xx statuses and empty bodies are reported on stderr and come back as
   * `rejected` / `empty` results. Only failures without any HTTP response throw.
   */
  async fetchLogs(endpoint: string): Promise<LogResponse> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.get<unknown>(endpoint);
    } catch (error) {
      // Node 20 can surface refused dual-stack connects with an empty message and only a code
      const reason = axios.isAxiosError(error)
        ? error.message || error.code || 'network error'
        : String(error);
      throw new TransportError(`Failed to retrieve logs: ${reason}`, { cause: error });
    }

    const body = typeof response.data === 'string' ? response.data : '';

    if (response.status < 200 || response.status >= 300) {
      console.error(chalk.red(`Failed to retrieve logs: ${response.status} ${response.statusText}`.trimEnd()));
      console.error(chalk.red(`Error Detail: ${body}`));
      return {
        kind: 'rejected',
        status: response.status,
        statusText: response.statusText,
        detail: body
      };
    }

    if (body.length === 0) {
      console.error(chalk.yellow('No logs found'));
      console.error(chalk.yellow('Please check time range'));
      return { kind: 'empty' };
    }

    return { kind: 'logs', body };
  }
}

/**
 * The text to print for a response: the raw body, or an empty string for empty/rejected results
 */
export function responseText(response: LogResponse): string {
  return response.kind === 'logs' ? response.body : '';
}
