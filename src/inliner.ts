import { ParseError, ReferenceParseError } from './errors.js';
import { computeInlineTransform, formatTransform, getIntrinsicSpace } from './geometry.js';
import { LoadedSvg, loadSvgDocument, SVG_NS } from './loader.js';
import { Logger, silentLogger } from './logger.js';
import { ResolvedItem, resolveReferences } from './resolver.js';
import { Reference, ReferenceOutcome } from './types.js';

/**
 * State shared while inlining one host document and everything it links.
 */
export interface InlineContext {
  /** Documents currently being inlined, outermost first. Guards against link cycles. */
  ancestry: Set<string>;
  logger: Logger;
}

export function createInlineContext(hostPath: string, logger: Logger = silentLogger): InlineContext {
  return { ancestry: new Set([hostPath]), logger };
}

/**
 * Resolve and inline every reference of a loaded document, in place.
 * Linked documents are processed the same way before they are spliced in,
 * with their own directory as the base for relative paths.
 */
export async function inlineDocument(loaded: LoadedSvg, context: InlineContext): Promise<ReferenceOutcome[]> {
  const items = await resolveReferences(loaded, context.logger);
  return inlineResolved(items, loaded.document, context);
}

/**
 * Inline the vector items of an already resolved document.
 * Outcomes keep the order of the items.
 */
export async function inlineResolved(
  items: ResolvedItem[],
  host: Document,
  context: InlineContext
): Promise<ReferenceOutcome[]> {
  const outcomes: ReferenceOutcome[] = [];

  for (const item of items) {
    if (item.type === 'settled') {
      outcomes.push(item.outcome);
    } else {
      outcomes.push(...(await inlineVectorReference(item.reference, host, context)));
    }
  }

  return outcomes;
}

/**
 * Replace one vector reference with a `<g>` holding the linked document's content.
 * Returns the outcome for this reference followed by those of the linked document.
 */
export async function inlineVectorReference(
  reference: Reference,
  host: Document,
  context: InlineContext
): Promise<ReferenceOutcome[]> {
  const { logger } = context;
  const { href, path } = reference;

  if (context.ancestry.has(path)) {
    logger.warn(`Not inlining ${path}: it links back to a document that is already being inlined`);
    return [{ status: 'skipped', href, reason: 'cycle' }];
  }

  let linked: LoadedSvg;
  try {
    linked = await loadSvgDocument(path);
  } catch (err) {
    if (!(err instanceof ParseError)) throw err;
    const error = new ReferenceParseError(path, err.detail, href);
    logger.warn(`${error.message}; keeping the linked reference`);
    return [{ status: 'parse-failed', href, path, error }];
  }

  context.ancestry.add(path);
  let nested: ReferenceOutcome[];
  try {
    nested = await inlineDocument(linked, context);
  } finally {
    context.ancestry.delete(path);
  }

  const space = getIntrinsicSpace(linked.root);
  if (!space.size) {
    logger.debug(`No viewBox or size on ${path}; inlining at 1:1 user units`);
  }

  const transform = formatTransform(computeInlineTransform(reference.box, space, reference.transform));
  replaceWithGroup(reference.element, linked.root, host, transform);
  logger.debug(`Inlined ${path} with transform "${transform}"`);

  return [{ status: 'inlined', href, path, transform }, ...nested];
}

/**
 * Move the children of `sourceRoot` into a new `<g transform>` of `host`
 * and put the group where `target` was.
 */
export function replaceWithGroup(target: Element, sourceRoot: Element, host: Document, transform: string): Element {
  const parent = target.parentNode;
  if (!parent) {
    throw new Error(`Cannot replace detached <${target.localName}> element`);
  }

  const group = host.createElementNS(SVG_NS, 'g');
  group.setAttribute('transform', transform);

  for (const child of Array.from(sourceRoot.childNodes)) {
    group.appendChild(host.adoptNode(child));
  }

  parent.replaceChild(group, target);
  return group;
}
