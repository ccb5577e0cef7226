import fs from 'fs-extra';
import * as path from 'node:path';
import { JSDOM } from 'jsdom';
import { ParseError } from './errors.js';

export const SVG_NS = 'http://www.w3.org/2000/svg';
export const XLINK_NS = 'http://www.w3.org/1999/xlink';

const PARSER_ERROR_NS = 'http://www.mozilla.org/newlayout/xml/parsererror.xml';

/**
 * A parsed SVG file
 */
export interface LoadedSvg {
  /** Absolute path the document was read from */
  filePath: string;
  /** Directory relative references resolve against */
  baseDir: string;
  document: Document;
  root: Element;
}

let sharedWindow: JSDOM['window'] | null = null;

/**
 * The jsdom window shared by every document of the process.
 * Documents must come from one window so nodes can move between them.
 */
export function getWindow(): JSDOM['window'] {
  if (!sharedWindow) {
    sharedWindow = new JSDOM('').window;
  }
  return sharedWindow;
}

/**
 * Parse SVG source text. `origin` names the source in error messages.
 */
export function parseSvg(source: string, origin: string): Document {
  const { DOMParser } = getWindow();
  const document = new DOMParser().parseFromString(source, 'image/svg+xml');
  const root = document.documentElement;

  if (!root || root.namespaceURI === PARSER_ERROR_NS || root.localName === 'parsererror') {
    const detail = root?.textContent?.trim() || 'not well-formed XML';
    throw new ParseError(origin, detail);
  }

  if (root.localName !== 'svg') {
    throw new ParseError(origin, `root element is <${root.localName}>, expected <svg>`);
  }

  return document;
}

/**
 * Read and parse an SVG file. Read failures surface as ParseError too,
 * since the caller cannot do anything different with them.
 */
export async function loadSvgDocument(filePath: string): Promise<LoadedSvg> {
  const absolutePath = path.resolve(filePath);

  let source: string;
  try {
    source = await fs.readFile(absolutePath, 'utf8');
  } catch (err) {
    throw new ParseError(absolutePath, err instanceof Error ? err.message : String(err));
  }

  const document = parseSvg(source, absolutePath);
  return {
    filePath: absolutePath,
    baseDir: path.dirname(absolutePath),
    document,
    root: document.documentElement
  };
}

/**
 * Whether the root declares Inkscape editor namespaces
 * (`xmlns:inkscape` or `xmlns:sodipodi`).
 */
export function usesEditorNamespaces(root: Element): boolean {
  for (const attribute of Array.from(root.attributes)) {
    if (attribute.prefix === 'xmlns' && (attribute.localName === 'inkscape' || attribute.localName === 'sodipodi')) {
      return true;
    }
  }
  return false;
}
