import { ExportConfig, loadConfig } from './config.js';
import { InlineExportError, UsageError } from './errors.js';
import { CommandRunner } from './exporter.js';
import { createLogger, LogSink } from './logger.js';
import { runPipeline } from './pipeline.js';

export const USAGE = `Usage: svg-inline-export <input.svg> <output.pdf> [options]

Inline linked SVG images and export to a fully vectorized PDF.

Options:
  --verbose           Log per-reference decisions
  --no-plain-svg      Skip converting Inkscape SVG to plain SVG first
  --inkscape=<bin>    Converter executable (default: $INKSCAPE_BIN or inkscape)
  --help              Show this message`;

export interface CliArgs {
  inputPath: string;
  outputPath: string;
  help: boolean;
  verbose: boolean;
  plainSvg?: boolean;
  converter?: string;
}

/**
 * Parse command-line arguments (without the node and script entries).
 */
export function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  const args: CliArgs = { inputPath: '', outputPath: '', help: false, verbose: false };

  for (const arg of argv) {
    if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg === '--verbose' || arg === '-v') {
      args.verbose = true;
    } else if (arg === '--no-plain-svg') {
      args.plainSvg = false;
    } else if (arg.startsWith('--inkscape=')) {
      const converter = arg.slice('--inkscape='.length).trim();
      if (!converter) throw new UsageError('--inkscape needs a value');
      args.converter = converter;
    } else if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  if (args.help) return args;

  if (positional.length !== 2) {
    throw new UsageError(`Expected <input.svg> and <output.pdf>, got ${positional.length} argument(s)`);
  }

  [args.inputPath, args.outputPath] = positional;
  return args;
}

/**
 * Merge parsed flags over the environment configuration.
 */
export function resolveConfig(args: CliArgs, env: NodeJS.ProcessEnv = process.env): ExportConfig {
  const config = loadConfig(env);
  return {
    ...config,
    converter: args.converter ?? config.converter,
    plainSvg: args.plainSvg ?? config.plainSvg,
    verbose: args.verbose
  };
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  sink?: LogSink;
  runner?: CommandRunner;
}

/**
 * Run the command line and return the process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const sink = deps.sink ?? console;

  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    sink.error(`${err.message}\n\n${USAGE}`);
    return err.exitCode;
  }

  if (args.help) {
    sink.log(USAGE);
    return 0;
  }

  const config = resolveConfig(args, deps.env);
  const logger = createLogger({ verbose: config.verbose, sink });

  try {
    const report = await runPipeline({
      inputPath: args.inputPath,
      outputPath: args.outputPath,
      config,
      logger,
      ...(deps.runner ? { runner: deps.runner } : {})
    });

    const inlined = report.references.filter(ref => ref.status === 'inlined').length;
    const problems = report.references.filter(ref => ref.status === 'missing' || ref.status === 'parse-failed').length;
    logger.debug(`Inlined ${inlined} linked SVG(s); ${problems} reference(s) left as links`);
    return 0;
  } catch (err) {
    if (err instanceof InlineExportError) {
      logger.error(`${err.name}: ${err.message}`);
      return err.exitCode;
    }
    logger.error(`Unexpected error: ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
    return 1;
  }
}
