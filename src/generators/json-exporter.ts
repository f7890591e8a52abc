import * as fs from 'fs';
import * as path from 'path';
import type { HeaderEntry, ReportDocument, ReportSummary } from '../types';
import { WriteError, describeError } from '../errors';

export function getGeneratorVersion(): string {
  try {
    const pkgPath = path.resolve(__dirname, '../../package.json');
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

export interface JsonExportData {
  metadata: {
    generatedAt: string;
    generatorVersion: string;
    title: string;
    sourceFile?: string;
  };
  summary: ReportSummary;
  endpoints: JsonEndpointEntry[];
}

interface JsonEndpointEntry {
  endpoint: string;
  count: number;
  failures: Array<{
    suiteName: string;
    testName: string;
    status: string;
    statusCode?: number;
    statusCodeClass: string;
    durationSeconds: number;
    kind?: string;
    message: string;
    request: {
      method?: string;
      url?: string;
      headers: HeaderEntry[];
      body?: string;
    };
  }>;
}

export function buildJsonExport(document: ReportDocument): JsonExportData {
  return {
    metadata: {
      generatedAt: document.generatedAt,
      generatorVersion: getGeneratorVersion(),
      title: document.title,
      sourceFile: document.sourceFile,
    },
    summary: document.summary,
    endpoints: document.groups.map(group => ({
      endpoint: group.endpoint,
      count: group.count,
      failures: group.records.map(r => ({
        suiteName: r.suiteName,
        testName: r.testName,
        status: r.status,
        statusCode: r.statusCode,
        statusCodeClass: r.statusCodeClass,
        durationSeconds: r.durationSeconds,
        kind: r.kind,
        message: r.message,
        request: r.request,
      })),
    })),
  };
}

/**
 * Write the report document as pretty-printed JSON
 * @returns The absolute path written
 */
export function exportJsonData(document: ReportDocument, outputPath: string): string {
  const resolved = path.resolve(outputPath);
  try {
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    fs.writeFileSync(resolved, JSON.stringify(buildJsonExport(document), null, 2));
  } catch (err) {
    throw new WriteError(`Cannot write JSON export ${resolved}: ${describeError(err)}`, resolved, { cause: err });
  }
  return resolved;
}
