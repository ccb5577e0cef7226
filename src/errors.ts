/**
 * Base class for every error the exporter raises on purpose.
 * `exitCode` is what the CLI exits with when the error is fatal.
 */
export class InlineExportError extends Error {
  constructor(message: string, public readonly exitCode: number = 1) {
    super(message);
    this.name = 'InlineExportError';
  }
}

/**
 * A document is not well-formed XML, or its root is not `<svg>`.
 */
export class ParseError extends InlineExportError {
  constructor(public readonly filePath: string, public readonly detail: string) {
    super(`Failed to parse SVG ${filePath}: ${detail}`);
    this.name = 'ParseError';
  }
}

/**
 * A linked vector document could not be parsed. Recoverable: the reference
 * stays in place with its absolute path.
 */
export class ReferenceParseError extends ParseError {
  constructor(filePath: string, detail: string, public readonly href: string) {
    super(filePath, detail);
    this.name = 'ReferenceParseError';
  }
}

/**
 * A reference points at a file that does not exist. Recoverable.
 */
export class MissingReferenceError extends InlineExportError {
  constructor(public readonly href: string, public readonly filePath: string) {
    super(`Linked file not found: ${filePath} (href "${href}")`);
    this.name = 'MissingReferenceError';
  }
}

/**
 * The external converter is missing or exited non-zero.
 */
export class ExportToolError extends InlineExportError {
  constructor(
    message: string,
    public readonly command: string,
    public readonly status: number | null,
    public readonly diagnostics: string
  ) {
    super(diagnostics ? `${message}\n${diagnostics}` : message);
    this.name = 'ExportToolError';
  }
}

/**
 * The output path cannot be written, or would overwrite the input.
 */
export class OutputPathError extends InlineExportError {
  constructor(message: string, public readonly outputPath: string) {
    super(message);
    this.name = 'OutputPathError';
  }
}

/**
 * Bad command-line arguments.
 */
export class UsageError extends InlineExportError {
  constructor(message: string) {
    super(message, 2);
    this.name = 'UsageError';
  }
}
