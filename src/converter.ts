import * as fs from 'fs';
import * as path from 'path';
import type { ConversionResult, ConverterOptions, ReportDocument, TestCaseRecord } from './types';
import { WriteError, describeError } from './errors';
import { JUnitParser } from './parsers/junit-parser';
import { EndpointGrouper } from './analyzers/endpoint-grouper';
import { render } from './generators/html-generator';
import { exportJsonData } from './generators/json-exporter';
import { formatCount } from './utils/formatters';

export const DEFAULT_OPTIONS = {
  title: 'Fuzzing failures',
  endpointStrategy: 'schemathesis',
  theme: 'dark',
  exportJson: false,
  messageMaxLength: 180,
  quiet: false,
} as const satisfies Omit<ConverterOptions, 'inputFile'>;

/**
 * Input path with its extension replaced by .html
 */
export function defaultOutputPath(inputFile: string): string {
  const parsed = path.parse(inputFile);
  return path.join(parsed.dir, `${parsed.name}.html`);
}

export function defaultJsonPath(outputFile: string): string {
  const parsed = path.parse(outputFile);
  return path.join(parsed.dir, `${parsed.name}-data.json`);
}

export function buildReportDocument(
  records: TestCaseRecord[],
  generatedAt: string = new Date().toISOString(),
  meta: { title?: string; sourceFile?: string } = {},
): ReportDocument {
  const grouper = new EndpointGrouper();
  return {
    title: meta.title ?? DEFAULT_OPTIONS.title,
    sourceFile: meta.sourceFile,
    groups: grouper.group(records),
    summary: grouper.summarize(records),
    generatedAt,
  };
}

function writeHtml(outputPath: string, html: string): void {
  try {
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    fs.writeFileSync(outputPath, html, 'utf-8');
  } catch (err) {
    throw new WriteError(`Cannot write report ${outputPath}: ${describeError(err)}`, outputPath, { cause: err });
  }
}

/**
 * Read the JUnit report, render the dashboard and write it to disk
 * @throws ParseError when the input cannot be read or parsed
 * @throws WriteError when an output file cannot be written
 */
export function convert(options: ConverterOptions): ConversionResult {
  const outputPath = path.resolve(options.outputFile ?? defaultOutputPath(options.inputFile));
  const quiet = options.quiet ?? DEFAULT_OPTIONS.quiet;

  const parser = new JUnitParser({
    endpointStrategy: options.endpointStrategy ?? DEFAULT_OPTIONS.endpointStrategy,
    messageMaxLength: options.messageMaxLength ?? DEFAULT_OPTIONS.messageMaxLength,
  });
  const records = parser.parseFile(options.inputFile);

  const document = buildReportDocument(records, new Date().toISOString(), {
    title: options.title ?? DEFAULT_OPTIONS.title,
    sourceFile: path.basename(options.inputFile),
  });

  writeHtml(outputPath, render(document, { theme: options.theme ?? DEFAULT_OPTIONS.theme }));

  let jsonPath: string | undefined;
  if ((options.exportJson ?? DEFAULT_OPTIONS.exportJson) || options.jsonOutputFile) {
    jsonPath = exportJsonData(document, options.jsonOutputFile ?? defaultJsonPath(outputPath));
  }

  if (!quiet) {
    const { summary } = document;
    console.log(`\n📊 Fuzzing report: ${outputPath}`);
    console.log(`   ${formatCount(summary.totalFailed, 'failure')} across ${formatCount(document.groups.length, 'endpoint')} (5xx: ${summary.count5xx}, 4xx: ${summary.count4xx}, other: ${summary.countOther})`);
    for (const group of new EndpointGrouper().getTopEndpoints(document.groups, 3)) {
      console.log(`   • ${group.endpoint}: ${group.count}`);
    }
    if (jsonPath) console.log(`   JSON data: ${jsonPath}`);
  }

  return { outputPath, jsonPath, document };
}
