import chalk from 'chalk';
import { FormatOptions, FormatResult, LineFailure } from './types';

/**
 * Re-serialize each NDJSON record. A malformed line is recorded as a failure
 * and the remaining lines are still processed.
 */
export function formatNdjson(body: string, options: FormatOptions = {}): FormatResult {
  const records: string[] = [];
  const failures: LineFailure[] = [];
  const lines = body.split('\n');

  lines.forEach((rawLine, index) => {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    if (line.trim().length === 0) {
      return;
    }

    try {
      const value: unknown = JSON.parse(line);
      records.push(options.pretty ? JSON.stringify(value, null, 2) : JSON.stringify(value));
    } catch (error) {
      failures.push({
        lineNumber: index + 1,
        line,
        reason: error instanceof Error ? error.message : String(error)
      });
    }
  });

  return { records, failures };
}

/**
 * Format and print: records to stdout, skipped lines to stderr
 */
export function printNdjson(body: string, options: FormatOptions = {}): FormatResult {
  const result = formatNdjson(body, options);

  result.records.forEach(record => console.log(record));
  result.failures.forEach(failure => {
    console.error(chalk.yellow(`Skipping line ${failure.lineNumber}: ${failure.reason}`));
  });

  return result;
}
