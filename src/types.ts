export type LogsCommand = 'retrieve' | 'list';

export interface ApiCredentials {
  apiKey: string;
  accessKeyId: string;
  secretAccessKey: string;
}

export interface BucketTarget {
  accountId: string;
  bucketName: string;
}

export interface R2LogsEnvironment extends ApiCredentials, BucketTarget {
  apiBaseUrl?: string;
}

export interface TimeRange {
  startTime: string;
  endTime: string;
}

export interface ResolvedQuery extends TimeRange {
  command: LogsCommand;
  verbose: boolean;
}

export type LogResponse =
  | { kind: 'logs'; body: string }
  | { kind: 'empty' }
  | { kind: 'rejected'; status: number; statusText: string; detail: string };

export interface FormatOptions {
  pretty?: boolean;
}

export interface LineFailure {
  lineNumber: number;
  line: string;
  reason: string;
}

export interface FormatResult {
  records: string[];
  failures: LineFailure[];
}
