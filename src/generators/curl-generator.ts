import type { TestCaseRecord } from '../types';
import { ReconstructionError } from '../errors';

/** Replacement for a single quote inside a single-quoted shell word */
export const SHELL_QUOTE_ESCAPE = "'\\''";

/**
 * Wrap a value in single quotes for a POSIX shell
 */
export function shellQuote(value: string): string {
  return `'${value.split("'").join(SHELL_QUOTE_ESCAPE)}'`;
}

/**
 * Build a single-line curl command reproducing the failing request:
 * curl -X <method> '<url>' [-H '<key>: <value>' ...] [-d '<body>']
 * @throws ReconstructionError when the record carries no request URL
 */
export function toCurl(record: Pick<TestCaseRecord, 'request' | 'testName'>): string {
  const { method, url, headers, body } = record.request;
  if (!url) {
    throw new ReconstructionError(`Insufficient data to build a curl command for "${record.testName}": no request URL`);
  }

  const parts = ['curl', '-X', method || 'GET', shellQuote(url)];
  for (const [name, value] of headers) {
    parts.push('-H', shellQuote(`${name}: ${value}`));
  }
  if (body) {
    parts.push('-d', shellQuote(body));
  }
  return parts.join(' ');
}

/**
 * Same as toCurl, but undefined instead of an error so the caller can drop
 * the copy action for this record
 */
export function tryToCurl(record: Pick<TestCaseRecord, 'request' | 'testName'>): string | undefined {
  try {
    return toCurl(record);
  } catch (err) {
    if (err instanceof ReconstructionError) return undefined;
    throw err;
  }
}
