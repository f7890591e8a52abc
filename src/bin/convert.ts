import type { ConverterOptions } from '../types';
import { convert } from '../converter';
import { ConverterError } from '../errors';
import { isEndpointStrategyName } from '../parsers/endpoint-strategy';

export type ConvertArgs =
  | { kind: 'run'; options: ConverterOptions }
  | { kind: 'help' }
  | { kind: 'error'; message: string };

export function printConvertUsage(): void {
  console.log(`
Usage: junit-fuzz-dashboard convert <input.xml> [options]

Convert a JUnit XML report from an API fuzzer into a static HTML dashboard.

Options:
  -o, --output <path>              Output HTML file (default: <input>.html)
  --title <text>                   Page title (default: "Fuzzing failures")
  --endpoint-strategy <name>       schemathesis, test-name or request (default: schemathesis)
  --theme <dark|light>             Initial theme (default: dark)
  --json [path]                    Also write a JSON export (default: <output>-data.json)
  --quiet                          Do not print the summary
  -h, --help                       Show this help message

Examples:
  junit-fuzz-dashboard convert schemathesis-junit.xml
  junit-fuzz-dashboard convert report.xml -o public/failures.html --theme light --json
`);
}

/**
 * Parse the arguments following the "convert" command
 */
export function parseConvertArgs(args: string[]): ConvertArgs {
  if (args.includes('-h') || args.includes('--help')) {
    return { kind: 'help' };
  }

  let inputFile: string | undefined;
  const options: Omit<ConverterOptions, 'inputFile'> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    switch (arg) {
      case '-o':
      case '--output':
        if (next === undefined) return { kind: 'error', message: `${arg} requires a path` };
        options.outputFile = next;
        i++;
        break;
      case '--title':
        if (next === undefined) return { kind: 'error', message: '--title requires a value' };
        options.title = next;
        i++;
        break;
      case '--endpoint-strategy':
        if (next === undefined || !isEndpointStrategyName(next)) {
          return { kind: 'error', message: `Invalid endpoint strategy "${next ?? ''}". Use schemathesis, test-name or request.` };
        }
        options.endpointStrategy = next;
        i++;
        break;
      case '--theme':
        if (next !== 'dark' && next !== 'light') {
          return { kind: 'error', message: `Invalid theme "${next ?? ''}". Use dark or light.` };
        }
        options.theme = next;
        i++;
        break;
      case '--json':
        options.exportJson = true;
        // The path is optional; only a *.json argument is taken as its value
        if (next !== undefined && next.toLowerCase().endsWith('.json')) {
          options.jsonOutputFile = next;
          i++;
        }
        break;
      case '--quiet':
        options.quiet = true;
        break;
      default:
        if (arg.startsWith('-')) return { kind: 'error', message: `Unknown option: ${arg}` };
        if (inputFile !== undefined) return { kind: 'error', message: `Unexpected argument: ${arg}` };
        inputFile = arg;
    }
  }

  if (inputFile === undefined) {
    return { kind: 'error', message: 'An input JUnit XML file is required.' };
  }

  return { kind: 'run', options: { inputFile, ...options } };
}

/**
 * Run the convert command; failures are reported on stderr and through the exit code
 */
export function runConvert(args: string[]): void {
  const parsed = parseConvertArgs(args);

  if (parsed.kind === 'help') {
    printConvertUsage();
    return;
  }

  if (parsed.kind === 'error') {
    console.error(`Error: ${parsed.message}`);
    console.error('Run junit-fuzz-dashboard convert --help for usage.');
    process.exitCode = 1;
    return;
  }

  try {
    convert(parsed.options);
  } catch (err) {
    if (err instanceof ConverterError) {
      console.error(`❌ ${err.message}`);
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}
