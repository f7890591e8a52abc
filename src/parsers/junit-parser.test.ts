import * as path from 'path';
import { describe, it, expect } from 'vitest';
import { JUnitParser, extract, parseJunitXml } from './junit-parser';
import { ParseError } from '../errors';

const FIXTURE = path.join(__dirname, 'fixtures', 'schemathesis-junit.xml');

describe('extract', () => {
  const records = extract(FIXTURE);

  it('keeps only failed and errored test cases in document order', () => {
    expect(records.map(r => r.testName)).toEqual([
      'POST /api/items',
      'POST /api/items',
      'GET /api/users/{user_id}[P]',
      'DELETE /api/items/{id}',
    ]);
  });

  it('reads status, duration and the request behind a server error', () => {
    const [first] = records;

    expect(first.suiteName).toBe('schemathesis');
    expect(first.endpoint).toBe('POST /api/items');
    expect(first.status).toBe('failure');
    expect(first.statusCode).toBe(500);
    expect(first.statusCodeClass).toBe('5xx');
    expect(first.durationSeconds).toBe(1.25);
    expect(first.kind).toBe('Server error');
    expect(first.message).toBe('[500] Internal Server Error');
    expect(first.curl).toBe(
      `curl -X POST -H 'Content-Type: application/json' -d '{"name": "x"}' http://localhost:8000/api/items`,
    );
    expect(first.request).toEqual({
      method: 'POST',
      url: 'http://localhost:8000/api/items',
      headers: [['Content-Type', 'application/json']],
      body: '{"name": "x"}',
    });
  });

  it('keeps the whole failure body as full text', () => {
    expect(records[0].fullText.startsWith('1. Server error\n\n[500] Internal Server Error:')).toBe(true);
    expect(records[0].fullText.endsWith('http://localhost:8000/api/items')).toBe(true);
  });

  it('reads bulleted failure kinds', () => {
    expect(records[1].kind).toBe('Server error');
    expect(records[1].statusCode).toBe(503);
    expect(records[1].request).toEqual({ method: 'POST', url: 'http://localhost:8000/api/items', headers: [] });
  });

  it('handles <error> elements and missing durations', () => {
    const record = records[2];

    expect(record.status).toBe('error');
    expect(record.endpoint).toBe('GET /api/users/{user_id}');
    expect(record.statusCodeClass).toBe('4xx');
    expect(record.durationSeconds).toBe(0);
    expect(record.kind).toBeUndefined();
    expect(record.message).toBe('[404] Not Found');
    expect(record.request.headers.map(([name]) => name)).toEqual(['Authorization', 'Accept']);
    expect(record.request.url).toBe('http://localhost:8000/api/users/0');
  });

  it('uses the message attribute of a self-closing failure as full text', () => {
    const record = records[3];

    expect(record.fullText).toBe('Response timed out after 3.00s');
    expect(record.message).toBe('Response timed out after 3.00s');
    expect(record.statusCode).toBeUndefined();
    expect(record.statusCodeClass).toBe('other');
    expect(record.durationSeconds).toBe(3);
    expect(record.curl).toBeUndefined();
    expect(record.request).toEqual({ headers: [] });
  });

  it('applies the chosen endpoint strategy', () => {
    const byTestName = extract(FIXTURE, { endpointStrategy: 'test-name' });

    expect(byTestName[2].endpoint).toBe('GET /api/users/{user_id}[P]');
  });

  it('throws ParseError for a missing file', () => {
    const missing = path.join(__dirname, 'fixtures', 'does-not-exist.xml');

    expect(() => extract(missing)).toThrow(ParseError);
  });
});

describe('parseJunitXml', () => {
  it('accepts a single <testsuite> root', () => {
    const xml = `<testsuite name="api">
      <testcase name="GET /ping" time="0.2"><failure message="[500] boom"/></testcase>
    </testsuite>`;

    const records = parseJunitXml(xml);

    expect(records).toHaveLength(1);
    expect(records[0].suiteName).toBe('api');
    expect(records[0].statusCode).toBe(500);
  });

  it('collects nested suites', () => {
    const xml = `<testsuites>
      <testsuite name="outer">
        <testsuite name="inner">
          <testcase name="GET /nested"><error message="[502] Bad Gateway"/></testcase>
        </testsuite>
      </testsuite>
    </testsuites>`;

    const records = parseJunitXml(xml);

    expect(records.map(r => r.suiteName)).toEqual(['inner']);
  });

  it('lists a suite\'s own cases before those of its nested suites', () => {
    const xml = `<testsuite name="outer">
      <testsuite name="inner"><testcase name="GET /first"><failure message="[500] a"/></testcase></testsuite>
      <testcase name="GET /second"><failure message="[500] b"/></testcase>
    </testsuite>`;

    expect(parseJunitXml(xml).map(r => r.testName)).toEqual(['GET /second', 'GET /first']);
  });

  it('prefers <failure> over <error> in the same test case', () => {
    const xml = `<testsuite name="s"><testcase name="t">
      <error message="[500] error"/><failure message="[422] failure"/>
    </testcase></testsuite>`;

    const [record] = parseJunitXml(xml);

    expect(record.status).toBe('failure');
    expect(record.statusCode).toBe(422);
  });

  it('falls back to classname for missing names', () => {
    const xml = '<testsuite><testcase classname="pkg.Api"><failure message="x"/></testcase></testsuite>';

    const [record] = parseJunitXml(xml);

    expect(record.testName).toBe('pkg.Api');
    expect(record.suiteName).toBe('pkg.Api');
  });

  it('returns no records for a report without failures', () => {
    expect(parseJunitXml('<testsuites><testsuite name="s"><testcase name="ok"/></testsuite></testsuites>')).toEqual([]);
    expect(parseJunitXml('<testsuites></testsuites>')).toEqual([]);
  });

  it('shortens long messages to the configured width', () => {
    const xml = `<testsuite name="s"><testcase name="t"><failure message="alpha beta gamma"/></testcase></testsuite>`;

    const [record] = new JUnitParser({ messageMaxLength: 12 }).parseXml(xml);

    expect(record.message).toBe('alpha beta…');
    expect(record.fullText).toBe('alpha beta gamma');
  });

  it('reports malformed XML with its position', () => {
    try {
      parseJunitXml('<testsuites>\n<testsuite name="s">\n</testsuites>', 'broken.xml');
      expect.unreachable('parseJunitXml should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(ParseError);
      if (err instanceof ParseError) {
        expect(err.filePath).toBe('broken.xml');
        expect(err.code).toBe('PARSE_ERROR');
        expect(err.line).toBeGreaterThan(0);
        expect(err.message).toContain('broken.xml');
      }
    }
  });

  it('rejects documents without a JUnit root', () => {
    expect(() => parseJunitXml('<report><item/></report>')).toThrow(/missing <testsuites> or <testsuite> root/);
  });
});
