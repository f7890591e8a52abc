import type { EndpointGroup, ReportSummary, TestCaseRecord } from '../types';
import { extractBaseUrl } from '../parsers/failure-text';

/**
 * Groups failures by endpoint and computes the report-wide counters
 */
export class EndpointGrouper {
  /**
   * Partition records by exact endpoint.
   * Groups come largest first; equal sizes keep the order in which their
   * endpoint first appeared, records keep input order.
   */
  group(records: TestCaseRecord[]): EndpointGroup[] {
    const groups = new Map<string, TestCaseRecord[]>();

    for (const record of records) {
      const bucket = groups.get(record.endpoint);
      if (bucket) {
        bucket.push(record);
      } else {
        groups.set(record.endpoint, [record]);
      }
    }

    // Map iteration follows insertion order and Array.prototype.sort is stable
    return Array.from(groups.entries())
      .map(([endpoint, grouped]) => ({ endpoint, records: grouped, count: grouped.length }))
      .sort((a, b) => b.count - a.count);
  }

  summarize(records: TestCaseRecord[]): ReportSummary {
    let count5xx = 0;
    let count4xx = 0;
    let countOther = 0;
    const baseUrls = new Set<string>();

    for (const record of records) {
      if (record.statusCodeClass === '5xx') count5xx++;
      else if (record.statusCodeClass === '4xx') count4xx++;
      else countOther++;

      const baseUrl = extractBaseUrl(record.request.url, record.curl, record.suiteName);
      if (baseUrl) baseUrls.add(baseUrl);
    }

    return {
      totalFailed: records.length,
      count5xx,
      count4xx,
      countOther,
      maxDuration: records.reduce((max, r) => Math.max(max, r.durationSeconds), 0),
      minDuration: records.length > 0 ? records.reduce((min, r) => Math.min(min, r.durationSeconds), Infinity) : 0,
      baseUrls: [...baseUrls].sort(),
    };
  }

  /**
   * Largest groups (endpoints with the most failures)
   */
  getTopEndpoints(groups: EndpointGroup[], limit: number = 5): EndpointGroup[] {
    return groups.slice(0, limit);
  }
}
