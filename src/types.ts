// ============================================================================
// Configuration
// ============================================================================

export type ThemeName = 'dark' | 'light';

export type EndpointStrategyName = 'schemathesis' | 'test-name' | 'request';

export interface ConverterOptions {
  // Core options
  inputFile: string;
  outputFile?: string;             // Default: input path with a .html extension
  title?: string;                  // Default: 'Fuzzing failures'

  // Endpoint derivation used as the grouping key
  endpointStrategy?: EndpointStrategyName; // Default: 'schemathesis'

  // Initial theme of the produced page (the page remembers the user's choice)
  theme?: ThemeName;               // Default: 'dark'

  // Optional JSON export written next to the HTML
  exportJson?: boolean;            // Default: false
  jsonOutputFile?: string;         // Default: <output basename>-data.json

  // Short message length shown on cards
  messageMaxLength?: number;       // Default: 180

  // Suppress progress output on stdout
  quiet?: boolean;                 // Default: false
}

export interface RenderOptions {
  theme?: ThemeName;
}

// ============================================================================
// Extracted Records
// ============================================================================

export type FailureStatus = 'error' | 'failure';

export type StatusCodeClass = '5xx' | '4xx' | 'other';

/** A request header as [name, value] */
export type HeaderEntry = [name: string, value: string];

/** Request metadata recovered from a failure body. Every field is optional. */
export interface RequestInfo {
  method?: string;
  url?: string;
  headers: HeaderEntry[];          // In command-line order, duplicates kept
  body?: string;
}

export interface TestCaseRecord {
  suiteName: string;
  testName: string;
  endpoint: string;
  status: FailureStatus;
  statusCode?: number;             // Numeric HTTP status when one was found
  statusCodeClass: StatusCodeClass;
  durationSeconds: number;
  kind?: string;                   // e.g. 'Server error', 'Response violates schema'
  message: string;                 // Short message, reproduce block removed
  fullText: string;
  curl?: string;                   // Raw curl line from the reproduce block
  request: RequestInfo;
}

// ============================================================================
// Grouping & Report
// ============================================================================

export interface EndpointGroup {
  endpoint: string;
  records: TestCaseRecord[];
  count: number;
}

export interface ReportSummary {
  totalFailed: number;
  count5xx: number;
  count4xx: number;
  countOther: number;
  maxDuration: number;
  minDuration: number;
  baseUrls: string[];
}

export interface ReportDocument {
  title: string;
  sourceFile?: string;
  groups: EndpointGroup[];
  summary: ReportSummary;
  generatedAt: string;
}

export interface ConversionResult {
  outputPath: string;
  jsonPath?: string;
  document: ReportDocument;
}
