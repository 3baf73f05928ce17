import { BucketTarget, LogsCommand, TimeRange } from './types';

export const CLOUDFLARE_API_BASE_URL = 'https://api.cloudflare.com/client/v4';

// Expanded by the API, never by us
export const DATE_PREFIX_TOKEN = '{DATE}';

export function buildEndpoint(
  command: LogsCommand,
  range: TimeRange,
  target: BucketTarget,
  baseUrl: string = CLOUDFLARE_API_BASE_URL
): string {
  const root = baseUrl.replace(/\/+$/, '');
  const accountId = encodeURIComponent(target.accountId);
  const bucket = encodeURIComponent(target.bucketName);

  const params = [
    `start=${range.startTime}`,
    `end=${range.endTime}`,
    `bucket=${bucket}`,
    `prefix=${DATE_PREFIX_TOKEN}`
  ].join('&');

  return `${root}/accounts/${accountId}/logs/${command}?${params}`;
}
