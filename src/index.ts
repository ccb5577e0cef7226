export { loadConfig, type ExportConfig } from './config.js';
export {
  InlineExportError,
  ParseError,
  ReferenceParseError,
  MissingReferenceError,
  ExportToolError,
  OutputPathError,
  UsageError
} from './errors.js';
export {
  exportWithConverter,
  convertToPlainSvg,
  spawnRunner,
  type CommandRunner,
  type CommandResult,
  type ConverterOptions
} from './exporter.js';
export { computeInlineTransform, formatTransform, getIntrinsicSpace, mapPoint, parseLength, parseViewBox } from './geometry.js';
export { createInlineContext, inlineDocument } from './inliner.js';
export { loadSvgDocument, parseSvg, type LoadedSvg } from './loader.js';
export { createLogger, silentLogger, type Logger, type LogSink } from './logger.js';
export { runPipeline, type PipelineOptions } from './pipeline.js';
export { classifyPath, resolveHref, resolveReferences } from './resolver.js';
export { serializeSvg, withTempWorkspace, writeTempSvg } from './serializer.js';
export * from './types.js';
