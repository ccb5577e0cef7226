import type { MissingReferenceError, ReferenceParseError } from './errors.js';

/**
 * Classification of a linked file.
 */
export type ReferenceKind = 'vector' | 'raster' | 'unsupported';

/**
 * Why an href was left alone without touching the filesystem.
 */
export type SkipReason = 'data' | 'remote' | 'fragment' | 'cycle';

/**
 * Declared placement of a reference in host coordinates.
 * Absent attributes stay undefined so the inliner can fall back per axis.
 */
export interface DeclaredBox {
  x: number;
  y: number;
  width?: number;
  height?: number;
}

/**
 * A linked file found on an `<image>` element.
 */
export interface Reference {
  /** The element carrying the link */
  element: Element;

  /** Qualified name of the attribute that held the link (`xlink:href` or `href`) */
  attribute: string;

  /** The attribute value as written in the document */
  href: string;

  /** Absolute filesystem path the href resolves to */
  path: string;

  /** Classification of the linked file */
  kind: ReferenceKind;

  /** Declared x/y/width/height */
  box: DeclaredBox;

  /** The element's own `transform` attribute, if any */
  transform?: string;
}

/**
 * What happened to one reference during a run.
 */
export type ReferenceOutcome =
  | { status: 'inlined'; href: string; path: string; transform: string }
  | { status: 'absolutized'; href: string; path: string; kind: 'raster' | 'unsupported' }
  | { status: 'missing'; href: string; path: string; error: MissingReferenceError }
  | { status: 'parse-failed'; href: string; path: string; error: ReferenceParseError }
  | { status: 'skipped'; href: string; reason: SkipReason };

/**
 * Pipeline states. `failed` is reachable from every other state.
 */
export type PipelineStage =
  | 'start'
  | 'loaded'
  | 'resolved'
  | 'inlined'
  | 'serialized'
  | 'exported'
  | 'done'
  | 'failed';

/**
 * Result of a successful run.
 */
export interface PipelineReport {
  /** Absolute path of the input document */
  inputPath: string;

  /** Absolute path of the exported file */
  outputPath: string;

  /** Whether the input was first normalized to plain SVG */
  normalized: boolean;

  /** Every state the run went through, in order */
  stages: PipelineStage[];

  /** Per-reference outcomes, in document order (nested documents included) */
  references: ReferenceOutcome[];
}
