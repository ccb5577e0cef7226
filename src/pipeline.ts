import fs from 'fs-extra';
import * as path from 'node:path';
import { ExportConfig } from './config.js';
import { OutputPathError } from './errors.js';
import { CommandRunner, ConverterOptions, convertToPlainSvg, exportWithConverter } from './exporter.js';
import { createInlineContext, inlineResolved } from './inliner.js';
import { LoadedSvg, loadSvgDocument, usesEditorNamespaces } from './loader.js';
import { Logger, silentLogger } from './logger.js';
import { resolveReferences } from './resolver.js';
import { withTempWorkspace, writeTempSvg } from './serializer.js';
import { PipelineReport, PipelineStage } from './types.js';

/**
 * Options for one export run
 */
export interface PipelineOptions {
  inputPath: string;
  outputPath: string;
  config: ExportConfig;
  /** Replaces the real subprocess runner (tests) */
  runner?: CommandRunner;
  logger?: Logger;
  /** Called on every state change, `failed` included */
  onStage?: (stage: PipelineStage) => void;
}

const NEXT_STAGE: Partial<Record<PipelineStage, PipelineStage>> = {
  start: 'loaded',
  loaded: 'resolved',
  resolved: 'inlined',
  inlined: 'serialized',
  serialized: 'exported',
  exported: 'done'
};

/**
 * Tracks the state machine of a run:
 * start → loaded → resolved → inlined → serialized → exported → done,
 * with `failed` reachable from any state before `done`.
 */
export class PipelineRun {
  readonly stages: PipelineStage[] = ['start'];

  constructor(private readonly onStage?: (stage: PipelineStage) => void) {}

  get stage(): PipelineStage {
    return this.stages[this.stages.length - 1];
  }

  advance(to: PipelineStage): void {
    if (NEXT_STAGE[this.stage] !== to) {
      throw new Error(`Illegal pipeline transition ${this.stage} -> ${to}`);
    }
    this.enter(to);
  }

  fail(): void {
    if (this.stage === 'done' || this.stage === 'failed') return;
    this.enter('failed');
  }

  private enter(stage: PipelineStage): void {
    this.stages.push(stage);
    this.onStage?.(stage);
  }
}

/**
 * Refuse outputs that would overwrite the input or land in a directory we
 * cannot write to. Runs before anything is created on disk.
 */
export async function checkOutputPath(inputPath: string, outputPath: string): Promise<void> {
  if (path.resolve(inputPath) === path.resolve(outputPath)) {
    throw new OutputPathError(`Output path is the input file: ${outputPath}`, outputPath);
  }

  const dir = path.dirname(path.resolve(outputPath));
  try {
    await fs.access(dir, fs.constants.W_OK);
  } catch {
    throw new OutputPathError(`Output directory is missing or not writable: ${dir}`, outputPath);
  }
}

/**
 * Where the plain-SVG copy of an input goes: beside the input, so that
 * relative links keep resolving the same way for the converter.
 */
export function plainSvgPathFor(inputPath: string): string {
  const { dir, name } = path.parse(inputPath);
  return path.join(dir, `.${name}.${process.pid}-${Date.now()}.plain.svg`);
}

/**
 * Load the host document, converting it to plain SVG first when it carries
 * Inkscape editor namespaces and normalization is enabled.
 */
async function loadHost(
  inputPath: string,
  config: ExportConfig,
  converter: ConverterOptions,
  logger: Logger
): Promise<{ loaded: LoadedSvg; normalized: boolean }> {
  const original = await loadSvgDocument(inputPath);
  if (!config.plainSvg || !usesEditorNamespaces(original.root)) {
    logger.debug(`${path.basename(inputPath)} is already a plain SVG`);
    return { loaded: original, normalized: false };
  }

  const plainPath = plainSvgPathFor(inputPath);
  try {
    await convertToPlainSvg(inputPath, plainPath, converter);
    const plain = await loadSvgDocument(plainPath);
    // References keep resolving against the original file's directory
    return { loaded: { ...plain, filePath: original.filePath, baseDir: original.baseDir }, normalized: true };
  } finally {
    await fs.remove(plainPath);
    logger.debug(`Temporary plain SVG ${plainPath} removed`);
  }
}

/**
 * Inline linked vector images of `inputPath` and export the result to `outputPath`.
 * The input file is only read. Fatal errors propagate after cleanup.
 */
export async function runPipeline(options: PipelineOptions): Promise<PipelineReport> {
  const { config, runner, onStage } = options;
  const logger = options.logger ?? silentLogger;
  const inputPath = path.resolve(options.inputPath);
  const outputPath = path.resolve(options.outputPath);
  const converter: ConverterOptions = {
    converter: config.converter,
    logger: logger.child('export'),
    ...(runner ? { runner } : {})
  };
  const run = new PipelineRun(onStage);

  try {
    await checkOutputPath(inputPath, outputPath);

    const { loaded, normalized } = await loadHost(inputPath, config, converter, logger);
    run.advance('loaded');

    const resolveLogger = logger.child('resolve');
    const items = await resolveReferences(loaded, resolveLogger);
    run.advance('resolved');

    logger.info('Inlining linked vector files...');
    const references = await inlineResolved(items, loaded.document, createInlineContext(inputPath, resolveLogger));
    run.advance('inlined');

    await withTempWorkspace(async dir => {
      const tempSvg = await writeTempSvg(dir, loaded.document);
      logger.debug(`Temporary SVG written: ${tempSvg}`);
      run.advance('serialized');

      exportWithConverter(tempSvg, outputPath, converter);
      run.advance('exported');
    }, config.tempRoot);

    run.advance('done');
    return { inputPath, outputPath, normalized, stages: run.stages, references };
  } catch (err) {
    run.fail();
    throw err;
  }
}
