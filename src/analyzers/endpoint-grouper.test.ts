import { describe, it, expect } from 'vitest';
import { EndpointGrouper } from './endpoint-grouper';
import type { TestCaseRecord } from '../types';

function createRecord(overrides: Partial<TestCaseRecord> = {}): TestCaseRecord {
  return {
    suiteName: 'schemathesis',
    testName: 'GET /api/items',
    endpoint: 'GET /api/items',
    status: 'failure',
    statusCode: 500,
    statusCodeClass: '5xx',
    durationSeconds: 1,
    message: '[500] Internal Server Error',
    fullText: '[500] Internal Server Error',
    request: { headers: [] },
    ...overrides,
  };
}

describe('EndpointGrouper', () => {
  const grouper = new EndpointGrouper();

  describe('group', () => {
    it('partitions records by endpoint, largest group first', () => {
      const records = [
        createRecord({ endpoint: 'GET /a', testName: 'a1' }),
        createRecord({ endpoint: 'POST /b', testName: 'b1' }),
        createRecord({ endpoint: 'POST /b', testName: 'b2' }),
      ];

      const groups = grouper.group(records);

      expect(groups.map(g => [g.endpoint, g.count])).toEqual([
        ['POST /b', 2],
        ['GET /a', 1],
      ]);
      expect(groups[0].records.map(r => r.testName)).toEqual(['b1', 'b2']);
    });

    it('keeps first-appearance order for groups of equal size', () => {
      const records = [
        createRecord({ endpoint: 'GET /c' }),
        createRecord({ endpoint: 'GET /a' }),
        createRecord({ endpoint: 'GET /b' }),
      ];

      expect(grouper.group(records).map(g => g.endpoint)).toEqual(['GET /c', 'GET /a', 'GET /b']);
    });

    it('accounts for every record exactly once', () => {
      const records = Array.from({ length: 7 }, (_, i) => createRecord({ endpoint: `GET /${i % 3}`, testName: `t${i}` }));

      const groups = grouper.group(records);

      expect(groups.reduce((sum, g) => sum + g.count, 0)).toBe(7);
      expect(groups.flatMap(g => g.records).map(r => r.testName).sort()).toEqual(records.map(r => r.testName).sort());
    });

    it('returns no groups for no records', () => {
      expect(grouper.group([])).toEqual([]);
    });
  });

  describe('summarize', () => {
    it('counts status classes and duration bounds', () => {
      const summary = grouper.summarize([
        createRecord({ durationSeconds: 0.5 }),
        createRecord({ statusCode: 404, statusCodeClass: '4xx', durationSeconds: 2.5 }),
        createRecord({ statusCode: undefined, statusCodeClass: 'other', durationSeconds: 1 }),
      ]);

      expect(summary).toEqual({
        totalFailed: 3,
        count5xx: 1,
        count4xx: 1,
        countOther: 1,
        maxDuration: 2.5,
        minDuration: 0.5,
        baseUrls: [],
      });
    });

    it('collects distinct base urls from requests and curl commands', () => {
      const summary = grouper.summarize([
        createRecord({ request: { url: 'https://b.test/x', headers: [] } }),
        createRecord({ curl: "curl -X GET 'https://a.test:8443/y'" }),
        createRecord({ request: { url: 'https://b.test/z', headers: [] } }),
      ]);

      expect(summary.baseUrls).toEqual(['https://a.test:8443', 'https://b.test']);
    });

    it('returns zeroes for an empty report', () => {
      expect(grouper.summarize([])).toEqual({
        totalFailed: 0,
        count5xx: 0,
        count4xx: 0,
        countOther: 0,
        maxDuration: 0,
        minDuration: 0,
        baseUrls: [],
      });
    });
  });

  describe('getTopEndpoints', () => {
    it('limits to the largest groups', () => {
      const groups = grouper.group([
        createRecord({ endpoint: 'GET /a' }),
        createRecord({ endpoint: 'GET /b' }),
        createRecord({ endpoint: 'GET /b' }),
      ]);

      expect(grouper.getTopEndpoints(groups, 1).map(g => g.endpoint)).toEqual(['GET /b']);
    });
  });
});
