/**
 * Error kinds raised by the converter.
 * ParseError and WriteError abort a run; ReconstructionError is recovered per record.
 */

export class ConverterError extends Error {
  constructor(message: string, public code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConverterError';
  }
}

export class ParseError extends ConverterError {
  constructor(
    message: string,
    public filePath: string,
    public line?: number,
    public column?: number,
    options?: { cause?: unknown },
  ) {
    super(message, 'PARSE_ERROR', options);
    this.name = 'ParseError';
  }
}

export class ReconstructionError extends ConverterError {
  constructor(message: string) {
    super(message, 'RECONSTRUCTION_ERROR');
    this.name = 'ReconstructionError';
  }
}

export class WriteError extends ConverterError {
  constructor(message: string, public outputPath: string, options?: { cause?: unknown }) {
    super(message, 'WRITE_ERROR', options);
    this.name = 'WriteError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
