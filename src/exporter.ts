import fs from 'fs-extra';
import { spawnSync } from 'node:child_process';
import * as path from 'node:path';
import { ExportToolError } from './errors.js';
import { Logger, silentLogger } from './logger.js';

/**
 * What a finished subprocess reports back
 */
export interface CommandResult {
  /** Exit status; null when the process never ran or was killed by a signal */
  status: number | null;
  stdout: string;
  stderr: string;
  /** Set when the process could not be started at all */
  error?: NodeJS.ErrnoException;
}

/**
 * Runs a command to completion. Swapped out in tests.
 */
export type CommandRunner = (command: string, args: string[]) => CommandResult;

export interface ConverterOptions {
  /** Converter executable, looked up on PATH unless it is a path */
  converter: string;
  runner?: CommandRunner;
  logger?: Logger;
}

const EXPORT_TYPES = new Set(['pdf', 'eps', 'ps', 'png', 'svg', 'emf', 'wmf']);

// Only what is needed to find the executable
const LOOKUP_ENV_KEYS = ['PATH', 'PATHEXT', 'SystemRoot'];

/**
 * Default runner: a blocking subprocess whose environment carries only the
 * executable lookup variables.
 */
export const spawnRunner: CommandRunner = (command, args) => {
  const env: NodeJS.ProcessEnv = {};
  for (const key of LOOKUP_ENV_KEYS) {
    const value = process.env[key];
    if (value !== undefined) env[key] = value;
  }

  const result = spawnSync(command, args, { encoding: 'utf8', env, windowsHide: true });
  return {
    status: result.status,
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
    ...(result.error ? { error: result.error } : {})
  };
};

/**
 * Export type for an output path, from its extension. Defaults to pdf.
 */
export function exportTypeFor(outputPath: string): string {
  const extension = path.extname(outputPath).slice(1).toLowerCase();
  return EXPORT_TYPES.has(extension) ? extension : 'pdf';
}

export function buildExportArgs(inputSvg: string, outputPath: string): string[] {
  return [inputSvg, `--export-type=${exportTypeFor(outputPath)}`, `--export-filename=${outputPath}`];
}

export function buildPlainSvgArgs(inputSvg: string, outputSvg: string): string[] {
  return [inputSvg, '--export-plain-svg', '--export-type=svg', `--export-filename=${outputSvg}`];
}

/**
 * Run the converter and turn a start failure or non-zero exit into ExportToolError.
 */
function runConverter(args: string[], options: ConverterOptions, action: string): CommandResult {
  const { converter, runner = spawnRunner } = options;
  const commandLine = [converter, ...args].join(' ');
  const result = runner(converter, args);

  if (result.error) {
    if (result.error.code === 'ENOENT') {
      throw new ExportToolError(
        `${action} failed: converter '${converter}' not found. Install Inkscape or set INKSCAPE_BIN.`,
        commandLine,
        null,
        ''
      );
    }
    throw new ExportToolError(`${action} failed: ${result.error.message}`, commandLine, result.status, result.stderr.trim());
  }

  if (result.status !== 0) {
    const diagnostics = [result.stderr.trim(), result.stdout.trim()].filter(Boolean).join('\n');
    throw new ExportToolError(`${action} failed: '${converter}' exited with status ${result.status}`, commandLine, result.status, diagnostics);
  }

  return result;
}

/**
 * Convert an SVG file with the external converter.
 */
export function exportWithConverter(inputSvg: string, outputPath: string, options: ConverterOptions): void {
  const logger = options.logger ?? silentLogger;
  logger.info(`Exporting ${exportTypeFor(outputPath).toUpperCase()} with ${options.converter}...`);

  runConverter(buildExportArgs(inputSvg, outputPath), options, 'Export');
  logger.info(`Exported successfully to: ${outputPath}`);
}

/**
 * Rewrite an Inkscape-flavoured SVG as plain SVG.
 */
export async function convertToPlainSvg(inputSvg: string, outputSvg: string, options: ConverterOptions): Promise<void> {
  const logger = options.logger ?? silentLogger;
  logger.info(`${path.basename(inputSvg)} uses Inkscape-specific features. Converting to plain SVG.`);

  runConverter(buildPlainSvgArgs(inputSvg, outputSvg), options, 'Plain SVG conversion');

  const exists = await fs.pathExists(outputSvg);
  const size = exists ? (await fs.stat(outputSvg)).size : 0;
  if (size === 0) {
    throw new ExportToolError('Plain SVG conversion produced no output', [options.converter, ...buildPlainSvgArgs(inputSvg, outputSvg)].join(' '), 0, '');
  }
}
