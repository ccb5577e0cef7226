import { DeclaredBox } from './types.js';

/**
 * Parsed `viewBox` attribute
 */
export interface ViewBox {
  minX: number;
  minY: number;
  width: number;
  height: number;
}

/**
 * Coordinate space a linked document defines for itself.
 * `size` is null when neither a viewBox nor a usable width/height exists.
 */
export interface IntrinsicSpace {
  minX: number;
  minY: number;
  size: { width: number; height: number } | null;
}

/**
 * Transform applied to an inlined group, outermost first:
 * `outer`, then translate(x, y), scale(sx, sy), translate(-minX, -minY).
 */
export interface InlineTransform {
  outer?: string;
  translateX: number;
  translateY: number;
  scaleX: number;
  scaleY: number;
  originX: number;
  originY: number;
}

// User units per unit, at 96 DPI
const UNIT_TO_USER: Record<string, number> = {
  '': 1,
  'px': 1,
  'pt': 96 / 72,
  'pc': 96 / 6,
  'in': 96,
  'cm': 96 / 2.54,
  'mm': 96 / 25.4
};

const LENGTH_PATTERN = /^([+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?)\s*([a-z%]*)$/i;

/**
 * Parse an SVG length into user units.
 * Percentages, font-relative units and garbage give null.
 */
export function parseLength(value: string | null | undefined): number | null {
  if (value == null) return null;
  const match = value.trim().match(LENGTH_PATTERN);
  if (!match) return null;

  const factor = UNIT_TO_USER[match[2].toLowerCase()];
  if (factor === undefined) return null;

  const number = parseFloat(match[1]);
  return Number.isFinite(number) ? number * factor : null;
}

/**
 * Parse a viewBox attribute (comma or space separated).
 * A box without positive width and height is treated as absent.
 */
export function parseViewBox(value: string | null | undefined): ViewBox | null {
  if (!value) return null;

  const parts = value.trim().split(/[\s,]+/).map(Number);
  if (parts.length !== 4 || parts.some(part => !Number.isFinite(part))) {
    return null;
  }

  const [minX, minY, width, height] = parts;
  if (width <= 0 || height <= 0) return null;

  return { minX, minY, width, height };
}

/**
 * Determine the intrinsic space of a root `<svg>` element:
 * viewBox first, then width/height.
 */
export function getIntrinsicSpace(root: Element): IntrinsicSpace {
  const viewBox = parseViewBox(root.getAttribute('viewBox'));
  if (viewBox) {
    return {
      minX: viewBox.minX,
      minY: viewBox.minY,
      size: { width: viewBox.width, height: viewBox.height }
    };
  }

  const width = parseLength(root.getAttribute('width'));
  const height = parseLength(root.getAttribute('height'));
  if (width !== null && height !== null && width > 0 && height > 0) {
    return { minX: 0, minY: 0, size: { width, height } };
  }

  return { minX: 0, minY: 0, size: null };
}

/**
 * Read x/y/width/height off a reference element.
 * An explicit zero size is kept (it scales the content away); negative or
 * unparsable sizes count as undeclared.
 */
export function getDeclaredBox(element: Element): DeclaredBox {
  const box: DeclaredBox = {
    x: parseLength(element.getAttribute('x')) ?? 0,
    y: parseLength(element.getAttribute('y')) ?? 0
  };

  const width = parseLength(element.getAttribute('width'));
  const height = parseLength(element.getAttribute('height'));
  if (width !== null && width >= 0) box.width = width;
  if (height !== null && height >= 0) box.height = height;

  return box;
}

/**
 * Map the intrinsic space onto the declared box.
 * A missing declared width or height keeps the native size on that axis;
 * an unknown intrinsic size keeps 1:1 user units.
 */
export function computeInlineTransform(
  box: DeclaredBox,
  space: IntrinsicSpace,
  outer?: string
): InlineTransform {
  let scaleX = 1;
  let scaleY = 1;

  if (space.size) {
    if (box.width !== undefined) scaleX = box.width / space.size.width;
    if (box.height !== undefined) scaleY = box.height / space.size.height;
  }

  const trimmedOuter = outer?.trim();

  return {
    ...(trimmedOuter ? { outer: trimmedOuter } : {}),
    translateX: box.x,
    translateY: box.y,
    scaleX,
    scaleY,
    originX: space.minX,
    originY: space.minY
  };
}

/**
 * Render a transform as an SVG `transform` attribute value.
 */
export function formatTransform(transform: InlineTransform): string {
  const parts: string[] = [];

  if (transform.outer) parts.push(transform.outer);
  parts.push(`translate(${formatNumber(transform.translateX)},${formatNumber(transform.translateY)})`);

  if (transform.scaleX !== 1 || transform.scaleY !== 1) {
    parts.push(`scale(${formatNumber(transform.scaleX)},${formatNumber(transform.scaleY)})`);
  }

  if (transform.originX !== 0 || transform.originY !== 0) {
    parts.push(`translate(${formatNumber(-transform.originX)},${formatNumber(-transform.originY)})`);
  }

  return parts.join(' ');
}

/**
 * Map a point from the linked document's space into the host space.
 * Ignores `outer`, which the host applied to the original element as well.
 */
export function mapPoint(transform: InlineTransform, x: number, y: number): [number, number] {
  return [
    transform.translateX + transform.scaleX * (x - transform.originX),
    transform.translateY + transform.scaleY * (y - transform.originY)
  ];
}

function formatNumber(value: number): string {
  // -0 prints as "0"
  return String(value === 0 ? 0 : value);
}
