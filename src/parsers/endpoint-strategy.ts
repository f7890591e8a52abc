import type { EndpointStrategyName, RequestInfo } from '../types';

export interface EndpointInput {
  testName: string;
  suiteName: string;
  request: RequestInfo;
}

/**
 * Derives the grouping key of a failure. Returning undefined (or an empty string)
 * means "no opinion"; the caller then falls back to the test name.
 */
export type EndpointStrategy = (input: EndpointInput) => string | undefined;

const METHOD_PATH_RE = /\b(GET|POST|PUT|PATCH|DELETE|HEAD|OPTIONS|TRACE)\s+(?:https?:\/\/[^\s/[\]]+)?(\/[^\s[\]?#]*)/i;

const PARAMETER_SUFFIX_RE = /\s*\[[^\]]*\]\s*$/;

/**
 * "METHOD /path" found anywhere in the text, with host, query and
 * bracketed parameterisation removed
 */
export function matchMethodPath(text: string): string | undefined {
  const match = text.match(METHOD_PATH_RE);
  if (!match) return undefined;
  return `${match[1].toUpperCase()} ${match[2]}`;
}

export function stripParameterSuffix(name: string): string {
  return name.replace(PARAMETER_SUFFIX_RE, '');
}

/**
 * Default strategy for Schemathesis reports, whose test names look like
 * "POST /api/items" or "test_api[POST /api/items]"
 */
export const schemathesisStrategy: EndpointStrategy = ({ testName, suiteName }) =>
  matchMethodPath(testName) ?? matchMethodPath(suiteName) ?? stripParameterSuffix(testName);

export const testNameStrategy: EndpointStrategy = ({ testName }) => testName;

/**
 * Method and path of the reconstructed request
 */
export const requestStrategy: EndpointStrategy = ({ request }) => {
  if (!request.url) return undefined;
  try {
    const { pathname } = new URL(request.url);
    return `${request.method ?? 'GET'} ${pathname}`;
  } catch {
    return undefined;
  }
};

export const ENDPOINT_STRATEGIES: Readonly<Record<EndpointStrategyName, EndpointStrategy>> = {
  schemathesis: schemathesisStrategy,
  'test-name': testNameStrategy,
  request: requestStrategy,
};

export function isEndpointStrategyName(value: string): value is EndpointStrategyName {
  return Object.prototype.hasOwnProperty.call(ENDPOINT_STRATEGIES, value);
}

export function resolveEndpointStrategy(strategy: EndpointStrategyName | EndpointStrategy = 'schemathesis'): EndpointStrategy {
  return typeof strategy === 'function' ? strategy : ENDPOINT_STRATEGIES[strategy];
}

export function deriveEndpoint(input: EndpointInput, strategy: EndpointStrategy = schemathesisStrategy): string {
  const derived = strategy(input)?.trim();
  return derived || input.testName;
}
