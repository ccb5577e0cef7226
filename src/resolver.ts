import fs from 'fs-extra';
import type { Stats } from 'fs-extra';
import * as path from 'node:path';
import { MissingReferenceError } from './errors.js';
import { getDeclaredBox } from './geometry.js';
import { LoadedSvg, SVG_NS, XLINK_NS } from './loader.js';
import { Logger, silentLogger } from './logger.js';
import { Reference, ReferenceKind, ReferenceOutcome, SkipReason } from './types.js';

const VECTOR_EXTENSIONS = new Set(['.svg']);
const RASTER_EXTENSIONS = new Set(['.png', '.jpg', '.jpeg', '.gif', '.bmp', '.webp']);

// Leading bytes read when a file has no extension
const SNIFF_BYTES = 512;

/**
 * Where an href points: a local file, or something that is left alone.
 */
export type HrefTarget =
  | { type: 'file'; path: string }
  | { type: 'skip'; reason: SkipReason };

/**
 * One `<image>` after resolution: a vector reference still to be inlined,
 * or a final outcome.
 */
export type ResolvedItem =
  | { type: 'vector'; reference: Reference }
  | { type: 'settled'; outcome: ReferenceOutcome };

/**
 * Find the link attribute of an `<image>` element.
 * `xlink:href` wins over the SVG 2 `href` when both are present.
 */
export function getReferenceAttribute(element: Element): { attribute: string; href: string } | null {
  const xlinkHref = element.getAttributeNS(XLINK_NS, 'href');
  if (xlinkHref !== null && xlinkHref.trim()) {
    return { attribute: 'xlink:href', href: xlinkHref.trim() };
  }

  const href = element.getAttributeNS(null, 'href');
  if (href !== null && href.trim()) {
    return { attribute: 'href', href: href.trim() };
  }

  return null;
}

/**
 * Overwrite the link attribute found by getReferenceAttribute().
 */
export function setReferenceAttribute(element: Element, attribute: string, value: string): void {
  if (attribute === 'xlink:href') {
    element.setAttributeNS(XLINK_NS, 'xlink:href', value);
  } else {
    element.setAttributeNS(null, 'href', value);
  }
}

/**
 * Turn an href into an absolute filesystem path.
 * Relative paths resolve against `baseDir`, the directory of the document
 * that contains the href.
 */
export function resolveHref(href: string, baseDir: string): HrefTarget {
  const lower = href.toLowerCase();

  if (lower.startsWith('data:')) return { type: 'skip', reason: 'data' };
  if (lower.startsWith('http:') || lower.startsWith('https:')) return { type: 'skip', reason: 'remote' };
  if (href.startsWith('#')) return { type: 'skip', reason: 'fragment' };

  let filePath = href;
  if (lower.startsWith('file://')) {
    filePath = decodePath(href.slice('file://'.length).replace(/^localhost(?=\/)/i, ''));

    // file:///C:/dir/file.svg
    if (process.platform === 'win32' && /^\/[A-Za-z]:/.test(filePath)) {
      filePath = filePath.slice(1);
    }
  }

  return { type: 'file', path: path.resolve(baseDir, filePath) };
}

function decodePath(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    // Stray '%' that is not an escape: use the text as written
    return value;
  }
}

/**
 * Classify a path by its extension, case-insensitively.
 */
export function classifyPath(filePath: string): ReferenceKind {
  const extension = path.extname(filePath).toLowerCase();
  if (VECTOR_EXTENSIONS.has(extension)) return 'vector';
  if (RASTER_EXTENSIONS.has(extension)) return 'raster';
  return 'unsupported';
}

/**
 * Classify file content by its leading bytes.
 */
export function sniffKind(head: Uint8Array): ReferenceKind {
  const startsWith = (...bytes: number[]) => bytes.every((byte, i) => head[i] === byte);
  const ascii = (start: number, end: number) => String.fromCharCode(...head.subarray(start, end));

  if (startsWith(0x89, 0x50, 0x4e, 0x47)) return 'raster'; // PNG
  if (startsWith(0xff, 0xd8, 0xff)) return 'raster'; // JPEG
  if (ascii(0, 4) === 'GIF8') return 'raster';
  // BMP: full file header with zeroed reserved fields
  if (head.length >= 14 && ascii(0, 2) === 'BM' && head.subarray(6, 10).every(byte => byte === 0)) return 'raster';
  if (ascii(0, 4) === 'RIFF' && ascii(8, 12) === 'WEBP') return 'raster';

  const text = new TextDecoder().decode(head).replace(/^\uFEFF/, '');
  const firstTag = text.replace(/<\?xml[\s\S]*?\?>/, '').replace(/<!--[\s\S]*?-->/g, '').replace(/<!DOCTYPE[^>]*>/i, '').trimStart();
  if (/^<svg[\s>]/.test(firstTag)) return 'vector';

  return 'unsupported';
}

/**
 * Classify an existing file: by extension, or by content when it has none.
 */
export async function classifyFile(filePath: string): Promise<ReferenceKind> {
  if (path.extname(filePath) !== '') {
    return classifyPath(filePath);
  }
  return sniffKind(await readHead(filePath, SNIFF_BYTES));
}

async function readHead(filePath: string, length: number): Promise<Uint8Array> {
  const fd = await fs.open(filePath, 'r');
  try {
    const { bytesRead, buffer } = await fs.read(fd, Buffer.alloc(length), 0, length, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await fs.close(fd);
  }
}

/**
 * Stat a reference target. Null when nothing exists at the path.
 */
async function statTarget(filePath: string): Promise<Stats | null> {
  try {
    return await fs.stat(filePath);
  } catch (err) {
    if (isErrnoCode(err, 'ENOENT') || isErrnoCode(err, 'ENOTDIR')) return null;
    throw err;
  }
}

function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Kind of an existing target. Directories and unreadable files are left in
 * place as unsupported references.
 */
async function classifyTarget(filePath: string, href: string, stats: Stats, logger: Logger): Promise<ReferenceKind> {
  if (!stats.isFile()) {
    logger.warn(`Linked path is not a file: ${filePath} (href "${href}")`);
    return 'unsupported';
  }

  try {
    return await classifyFile(filePath);
  } catch (err) {
    logger.warn(`Cannot read linked file ${filePath} (href "${href}"): ${describeError(err)}`);
    return 'unsupported';
  }
}

/**
 * All `<image>` elements of a document, in document order.
 */
export function findImageElements(document: Document): Element[] {
  return Array.from(document.getElementsByTagNameNS(SVG_NS, 'image'));
}

/**
 * Resolve every `<image>` reference of a loaded document.
 *
 * Every file reference is rewritten to its absolute path, so an element that
 * ends up not inlined still points at the right file. Vector references that
 * exist are handed on to the inliner; everything else is settled here.
 * Items come back in document order.
 */
export async function resolveReferences(loaded: LoadedSvg, logger: Logger = silentLogger): Promise<ResolvedItem[]> {
  const items: ResolvedItem[] = [];
  const settle = (outcome: ReferenceOutcome) => items.push({ type: 'settled', outcome });

  for (const element of findImageElements(loaded.document)) {
    const link = getReferenceAttribute(element);
    if (!link) continue;

    const { attribute, href } = link;
    const target = resolveHref(href, loaded.baseDir);

    if (target.type === 'skip') {
      logger.debug(`Skipping ${target.reason} reference: ${abbreviate(href)}`);
      settle({ status: 'skipped', href, reason: target.reason });
      continue;
    }

    setReferenceAttribute(element, attribute, target.path);

    let stats: Stats | null;
    try {
      stats = await statTarget(target.path);
    } catch (err) {
      logger.warn(`Cannot inspect linked path ${target.path} (href "${href}"): ${describeError(err)}`);
      settle({ status: 'absolutized', href, path: target.path, kind: 'unsupported' });
      continue;
    }
    if (!stats) {
      const error = new MissingReferenceError(href, target.path);
      logger.warn(error.message);
      settle({ status: 'missing', href, path: target.path, error });
      continue;
    }

    const kind = await classifyTarget(target.path, href, stats, logger);
    logger.debug(`Classified ${href} as ${kind}: ${target.path}`);

    switch (kind) {
      case 'vector': {
        const transform = element.getAttribute('transform');
        const reference: Reference = {
          element,
          attribute,
          href,
          path: target.path,
          kind,
          box: getDeclaredBox(element),
          ...(transform !== null ? { transform } : {})
        };
        items.push({ type: 'vector', reference });
        break;
      }
      case 'raster':
        settle({ status: 'absolutized', href, path: target.path, kind });
        break;
      case 'unsupported':
        logger.debug(`Leaving unsupported reference in place: ${target.path}`);
        settle({ status: 'absolutized', href, path: target.path, kind });
        break;
    }
  }

  return items;
}

function abbreviate(href: string): string {
  return href.length > 60 ? `${href.slice(0, 57)}...` : href;
}
