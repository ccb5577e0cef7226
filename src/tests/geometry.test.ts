import * as test from 'node:test';
import * as assert from 'node:assert';
import {
  computeInlineTransform,
  formatTransform,
  getDeclaredBox,
  getIntrinsicSpace,
  mapPoint,
  parseLength,
  parseViewBox
} from '../geometry.js';
import { parseSvg } from '../loader.js';

const { describe, it } = test;

function rootOf(source: string): Element {
  return parseSvg(source, 'test.svg').documentElement;
}

function firstChild(source: string): Element {
  const child = rootOf(source).firstElementChild;
  assert.ok(child);
  return child;
}

describe('parseLength', () => {
  it('should read unitless and px values as user units', () => {
    assert.strictEqual(parseLength('100'), 100);
    assert.strictEqual(parseLength('12.5px'), 12.5);
    assert.strictEqual(parseLength(' 3e2 '), 300);
  });

  it('should convert absolute units at 96 DPI', () => {
    for (const value of ['1in', '72pt', '6pc', '25.4mm', '2.54cm']) {
      const length = parseLength(value);
      assert.ok(length !== null && Math.abs(length - 96) < 1e-9, `${value} -> ${length}`);
    }
  });

  it('should reject percentages, relative units and garbage', () => {
    assert.strictEqual(parseLength('50%'), null);
    assert.strictEqual(parseLength('2em'), null);
    assert.strictEqual(parseLength('wide'), null);
    assert.strictEqual(parseLength(''), null);
    assert.strictEqual(parseLength(null), null);
  });
});

describe('parseViewBox', () => {
  it('should accept space and comma separators', () => {
    assert.deepStrictEqual(parseViewBox('0 0 200 100'), { minX: 0, minY: 0, width: 200, height: 100 });
    assert.deepStrictEqual(parseViewBox('-5,10, 40 ,20'), { minX: -5, minY: 10, width: 40, height: 20 });
  });

  it('should treat malformed or empty boxes as absent', () => {
    assert.strictEqual(parseViewBox('0 0 200'), null);
    assert.strictEqual(parseViewBox('0 0 a 100'), null);
    assert.strictEqual(parseViewBox('0 0 0 100'), null);
    assert.strictEqual(parseViewBox('0 0 100 -1'), null);
    assert.strictEqual(parseViewBox(null), null);
  });
});

describe('getIntrinsicSpace', () => {
  it('should prefer the viewBox', () => {
    const root = rootOf('<svg xmlns="http://www.w3.org/2000/svg" width="10" height="10" viewBox="5 6 200 100"/>');
    assert.deepStrictEqual(getIntrinsicSpace(root), { minX: 5, minY: 6, size: { width: 200, height: 100 } });
  });

  it('should fall back to width and height', () => {
    const root = rootOf('<svg xmlns="http://www.w3.org/2000/svg" width="1in" height="48px"/>');
    assert.deepStrictEqual(getIntrinsicSpace(root), { minX: 0, minY: 0, size: { width: 96, height: 48 } });
  });

  it('should report an unknown size when neither is usable', () => {
    const root = rootOf('<svg xmlns="http://www.w3.org/2000/svg" width="100%" height="100%"/>');
    assert.deepStrictEqual(getIntrinsicSpace(root), { minX: 0, minY: 0, size: null });
  });
});

describe('getDeclaredBox', () => {
  it('should default x and y to 0 and leave missing sizes undefined', () => {
    const image = firstChild('<svg xmlns="http://www.w3.org/2000/svg"><image width="30"/></svg>');
    assert.deepStrictEqual(getDeclaredBox(image), { x: 0, y: 0, width: 30 });
  });

  it('should read all four attributes', () => {
    const image = firstChild('<svg xmlns="http://www.w3.org/2000/svg"><image x="10" y="20" width="100" height="50"/></svg>');
    assert.deepStrictEqual(getDeclaredBox(image), { x: 10, y: 20, width: 100, height: 50 });
  });

  it('should keep an explicit zero size and drop a negative one', () => {
    const hidden = firstChild('<svg xmlns="http://www.w3.org/2000/svg"><image x="10" y="20" width="0" height="0"/></svg>');
    assert.deepStrictEqual(getDeclaredBox(hidden), { x: 10, y: 20, width: 0, height: 0 });

    const negative = firstChild('<svg xmlns="http://www.w3.org/2000/svg"><image width="-5" height="0mm"/></svg>');
    assert.deepStrictEqual(getDeclaredBox(negative), { x: 0, y: 0, height: 0 });
  });
});

describe('computeInlineTransform', () => {
  const space = { minX: 0, minY: 0, size: { width: 200, height: 100 } };

  it('should scale the viewBox onto the declared box', () => {
    const transform = computeInlineTransform({ x: 10, y: 20, width: 100, height: 50 }, space);
    assert.strictEqual(formatTransform(transform), 'translate(10,20) scale(0.5,0.5)');
  });

  it('should put an existing transform outermost', () => {
    const transform = computeInlineTransform({ x: 10, y: 20, width: 100, height: 50 }, space, ' rotate(45) ');
    assert.strictEqual(formatTransform(transform), 'rotate(45) translate(10,20) scale(0.5,0.5)');
  });

  it('should only translate when no size is declared', () => {
    const transform = computeInlineTransform({ x: 3, y: 4 }, space);
    assert.strictEqual(formatTransform(transform), 'translate(3,4)');
  });

  it('should keep the native size on an axis without a declared size', () => {
    const transform = computeInlineTransform({ x: 0, y: 0, width: 400 }, space);
    assert.strictEqual(formatTransform(transform), 'translate(0,0) scale(2,1)');
  });

  it('should scale zero-sized references down to nothing', () => {
    const transform = computeInlineTransform({ x: 10, y: 20, width: 0, height: 0 }, space);
    assert.strictEqual(formatTransform(transform), 'translate(10,20) scale(0,0)');
  });

  it('should use identity scale when the intrinsic size is unknown', () => {
    const transform = computeInlineTransform({ x: 1, y: 2, width: 50, height: 50 }, { minX: 0, minY: 0, size: null });
    assert.strictEqual(formatTransform(transform), 'translate(1,2)');
  });

  it('should shift a viewBox with a non-zero origin', () => {
    const shifted = { minX: -10, minY: 20, size: { width: 100, height: 100 } };
    const transform = computeInlineTransform({ x: 0, y: 0, width: 50, height: 50 }, shifted);
    assert.strictEqual(formatTransform(transform), 'translate(0,0) scale(0.5,0.5) translate(10,-20)');
  });

  it('should map the intrinsic box onto the declared box', () => {
    const cases = [
      { box: { x: 10, y: 20, width: 100, height: 50 }, space },
      { box: { x: -7.5, y: 3, width: 33.3, height: 91 }, space: { minX: 12, minY: -40, size: { width: 17, height: 230 } } },
      { box: { x: 0, y: 0, width: 1, height: 1000 }, space: { minX: 0.5, minY: 0.25, size: { width: 3, height: 7 } } }
    ];

    for (const { box, space: intrinsic } of cases) {
      assert.ok(intrinsic.size);
      const transform = computeInlineTransform(box, intrinsic);
      const [x0, y0] = mapPoint(transform, intrinsic.minX, intrinsic.minY);
      const [x1, y1] = mapPoint(transform, intrinsic.minX + intrinsic.size.width, intrinsic.minY + intrinsic.size.height);

      const close = (a: number, b: number) => Math.abs(a - b) < 1e-9;
      assert.ok(close(x0, box.x) && close(y0, box.y), `top-left ${x0},${y0}`);
      assert.ok(close(x1, box.x + box.width) && close(y1, box.y + box.height), `bottom-right ${x1},${y1}`);
    }
  });
});
