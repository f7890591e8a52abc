import * as fs from 'fs';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { EndpointStrategyName, FailureStatus, TestCaseRecord } from '../types';
import { ParseError, describeError } from '../errors';
import { stripAnsiCodes } from '../utils/sanitizers';
import {
  classifyStatusCode,
  extractFailureKind,
  extractRequest,
  extractStatusCode,
  shortenText,
  splitReproduceBlock,
} from './failure-text';
import { deriveEndpoint, resolveEndpointStrategy, type EndpointStrategy } from './endpoint-strategy';

export interface JUnitParserOptions {
  endpointStrategy?: EndpointStrategyName | EndpointStrategy;
  messageMaxLength?: number;
}

type XmlNode = Record<string, unknown>;

function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

function scalarToString(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

function attr(node: unknown, name: string): string {
  return isXmlNode(node) ? scalarToString(node[`@_${name}`]).trim() : '';
}

function textOf(node: unknown): string {
  if (isXmlNode(node)) return scalarToString(node['#text']);
  return scalarToString(node);
}

function parseDuration(raw: string): number {
  const value = Number.parseFloat(raw);
  return Number.isFinite(value) && value > 0 ? value : 0;
}

/**
 * Extracts failed and errored test cases from JUnit XML reports
 */
export class JUnitParser {
  private parser: XMLParser;
  private endpointStrategy: EndpointStrategy;
  private messageMaxLength: number;

  constructor(options: JUnitParserOptions = {}) {
    this.parser = new XMLParser({
      ignoreAttributes: false,
      attributeNamePrefix: '@_',
      textNodeName: '#text',
      parseAttributeValue: false,
      parseTagValue: false,
      htmlEntities: true,
    });
    this.endpointStrategy = resolveEndpointStrategy(options.endpointStrategy);
    this.messageMaxLength = options.messageMaxLength ?? 180;
  }

  /**
   * Parse a JUnit XML file
   */
  parseFile(filePath: string): TestCaseRecord[] {
    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf-8');
    } catch (err) {
      throw new ParseError(`Cannot read JUnit report ${filePath}: ${describeError(err)}`, filePath, undefined, undefined, { cause: err });
    }
    return this.parseXml(content, filePath);
  }

  /**
   * Parse JUnit XML content. `source` names the document in error messages.
   */
  parseXml(content: string, source: string = '<input>'): TestCaseRecord[] {
    const validation = XMLValidator.validate(content);
    if (validation !== true) {
      const { msg, line, col } = validation.err;
      throw new ParseError(`Invalid XML in ${source} (line ${line}, column ${col}): ${msg}`, source, line, col);
    }

    const parsed: unknown = this.parser.parse(content);
    if (!isXmlNode(parsed)) {
      throw new ParseError(`Invalid JUnit XML in ${source}: empty document`, source);
    }

    // Handle both <testsuites> and single <testsuite> root elements
    let suites: unknown[];
    if ('testsuites' in parsed) {
      const root = parsed.testsuites;
      suites = isXmlNode(root) ? toArray(root.testsuite) : [];
    } else if ('testsuite' in parsed) {
      suites = toArray(parsed.testsuite);
    } else {
      throw new ParseError(`Invalid JUnit XML in ${source}: missing <testsuites> or <testsuite> root`, source);
    }

    const records: TestCaseRecord[] = [];
    for (const suite of suites) {
      this.collectSuite(suite, records);
    }
    return records;
  }

  private collectSuite(suite: unknown, records: TestCaseRecord[]): void {
    if (!isXmlNode(suite)) return;
    const suiteName = attr(suite, 'name');

    // The parser groups same-named children, so sibling order between <testcase>
    // and nested <testsuite> is lost: a suite's own cases always come first.
    for (const testcase of toArray(suite.testcase)) {
      const record = this.parseTestCase(testcase, suiteName);
      if (record) records.push(record);
    }

    // Nested suites
    for (const child of toArray(suite.testsuite)) {
      this.collectSuite(child, records);
    }
  }

  /**
   * Build a record for a test case, or null when it neither failed nor errored
   */
  private parseTestCase(testcase: unknown, suiteName: string): TestCaseRecord | null {
    if (!isXmlNode(testcase)) return null;

    let status: FailureStatus;
    let outcome: unknown;
    if (testcase.failure !== undefined) {
      status = 'failure';
      outcome = toArray(testcase.failure)[0];
    } else if (testcase.error !== undefined) {
      status = 'error';
      outcome = toArray(testcase.error)[0];
    } else {
      return null;
    }

    const classname = attr(testcase, 'classname');
    const testName = attr(testcase, 'name') || classname || 'unnamed test';
    const resolvedSuite = suiteName || classname || 'unnamed suite';

    const messageAttr = stripAnsiCodes(attr(outcome, 'message')).trim();
    const body = stripAnsiCodes(textOf(outcome)).trim();
    const fullText = body || messageAttr;

    const split = splitReproduceBlock(messageAttr || fullText);
    const curl = splitReproduceBlock(fullText).curl ?? split.curl;
    const statusCode = extractStatusCode(messageAttr, fullText);
    const request = extractRequest(fullText, curl);

    const endpoint = deriveEndpoint({ testName, suiteName: resolvedSuite, request }, this.endpointStrategy);

    return {
      suiteName: resolvedSuite,
      testName,
      endpoint,
      status,
      statusCode,
      statusCodeClass: classifyStatusCode(statusCode),
      durationSeconds: parseDuration(attr(testcase, 'time')),
      kind: extractFailureKind(messageAttr) ?? extractFailureKind(fullText),
      message: shortenText(split.message, this.messageMaxLength),
      fullText,
      curl,
      request,
    };
  }
}

/**
 * Read a JUnit XML file and return its failed and errored test cases in document order
 */
export function extract(xmlPath: string, options: JUnitParserOptions = {}): TestCaseRecord[] {
  return new JUnitParser(options).parseFile(xmlPath);
}

export function parseJunitXml(content: string, source?: string, options: JUnitParserOptions = {}): TestCaseRecord[] {
  return new JUnitParser(options).parseXml(content, source);
}
