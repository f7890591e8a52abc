#!/usr/bin/env node

import { runConvert } from './convert';
import { getGeneratorVersion } from '../generators/json-exporter';

const args = process.argv.slice(2);
const command = args[0];

function printUsage(): void {
  console.log(`
Usage: junit-fuzz-dashboard <command> [options]

Commands:
  convert   Convert a JUnit XML fuzzing report into an HTML dashboard

Run junit-fuzz-dashboard <command> --help for command-specific help.
`);
}

async function main(): Promise<void> {
  switch (command) {
    case 'convert':
      runConvert(args.slice(1));
      break;
    case '--version':
    case '-v':
      console.log(getGeneratorVersion());
      break;
    case '--help':
    case '-h':
    case undefined:
      printUsage();
      break;
    default:
      console.error(`Unknown command: ${command}`);
      printUsage();
      process.exitCode = 1;
  }
}

main().catch(err => {
  console.error('Error:', err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
