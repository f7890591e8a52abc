export { convert, buildReportDocument, defaultOutputPath, defaultJsonPath, DEFAULT_OPTIONS } from './converter';
export { extract, parseJunitXml, JUnitParser, type JUnitParserOptions } from './parsers/junit-parser';
export {
  deriveEndpoint,
  resolveEndpointStrategy,
  ENDPOINT_STRATEGIES,
  type EndpointStrategy,
  type EndpointInput,
} from './parsers/endpoint-strategy';
export { parseCurlCommand, extractRequest, extractStatusCode, classifyStatusCode } from './parsers/failure-text';
export { EndpointGrouper } from './analyzers/endpoint-grouper';
export { toCurl, tryToCurl, shellQuote } from './generators/curl-generator';
export { render } from './generators/html-generator';
export { exportJsonData, buildJsonExport, type JsonExportData } from './generators/json-exporter';
export { ConverterError, ParseError, ReconstructionError, WriteError } from './errors';
export type * from './types';
