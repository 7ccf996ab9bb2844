import { describe, expect, test } from 'vitest';

import {
  type GraphicsOperatorCodes,
  type TextContentItemLike,
  collectGraphicsBounds,
  collectTextContent,
  mergePageContent,
  multiply,
  transformRect,
} from './marked-content-bounds';

const OPS: GraphicsOperatorCodes = {
  save: 10,
  restore: 11,
  transform: 12,
  constructPath: 91,
  fill: 22,
  eoFill: 23,
  stroke: 20,
  fillStroke: 24,
  eoFillStroke: 25,
  closeStroke: 21,
  closeFillStroke: 26,
  closeEOFillStroke: 27,
  endPath: 28,
  paintImageXObject: 85,
  paintInlineImageXObject: 86,
  paintImageMaskXObject: 83,
  paintFormXObjectBegin: 74,
  paintFormXObjectEnd: 75,
  beginMarkedContent: 69,
  beginMarkedContentProps: 70,
  endMarkedContent: 71,
};

function ops(...entries: Array<[number, unknown]>) {
  return {
    fnArray: entries.map(([fn]) => fn),
    argsArray: entries.map(([, args]) => args),
  };
}

describe('matrix helpers', () => {
  test('multiply applies the left matrix first', () => {
    const scale: [number, number, number, number, number, number] = [2, 0, 0, 2, 0, 0];
    const translate: [number, number, number, number, number, number] = [1, 0, 0, 1, 10, 20];

    expect(multiply(scale, translate)).toEqual([2, 0, 0, 2, 10, 20]);
    expect(multiply(translate, scale)).toEqual([2, 0, 0, 2, 20, 40]);
  });

  test('transformRect bounds all four corners', () => {
    expect(transformRect([0, 1, -1, 0, 0, 0], 0, 0, 10, 5)).toEqual({
      left: -5,
      bottom: 0,
      right: 0,
      top: 10,
    });
  });
});

describe('collectGraphicsBounds', () => {
  test('maps an image to the unit square under the current matrix', () => {
    const bounds = collectGraphicsBounds(
      ops(
        [OPS.beginMarkedContentProps, ['Figure', 3]],
        [OPS.save, null],
        [OPS.transform, [200, 0, 0, 100, 50, 400]],
        [OPS.paintImageXObject, ['img_p0_1', 200, 100]],
        [OPS.restore, null],
        [OPS.endMarkedContent, null],
      ),
      OPS,
    );

    expect(bounds.get(3)).toEqual({ left: 50, bottom: 400, right: 250, top: 500 });
  });

  test('counts painted paths and drops clipping paths', () => {
    const bounds = collectGraphicsBounds(
      ops(
        [OPS.beginMarkedContentProps, ['Artifact', 1]],
        [OPS.constructPath, [[], [], [0, 0, 500, 800]]],
        [OPS.endPath, null],
        [OPS.constructPath, [[], [], [10, 20, 30, 40]]],
        [OPS.fill, null],
        [OPS.endMarkedContent, null],
      ),
      OPS,
    );

    expect(bounds.get(1)).toEqual({ left: 10, bottom: 20, right: 30, top: 40 });
  });

  test('restores the matrix after save/restore', () => {
    const bounds = collectGraphicsBounds(
      ops(
        [OPS.save, null],
        [OPS.transform, [1, 0, 0, 1, 100, 100]],
        [OPS.restore, null],
        [OPS.beginMarkedContentProps, ['P', 0]],
        [OPS.constructPath, [[], [], new Float32Array([0, 0, 10, 10])]],
        [OPS.stroke, null],
        [OPS.endMarkedContent, null],
      ),
      OPS,
    );

    expect(bounds.get(0)).toEqual({ left: 0, bottom: 0, right: 10, top: 10 });
  });

  test('applies form XObject matrices until the form ends', () => {
    const bounds = collectGraphicsBounds(
      ops(
        [OPS.beginMarkedContentProps, ['Figure', 2]],
        [OPS.paintFormXObjectBegin, [[1, 0, 0, 1, 30, 40], [0, 0, 10, 10]]],
        [OPS.constructPath, [[], [], [0, 0, 10, 10]]],
        [OPS.fill, null],
        [OPS.paintFormXObjectEnd, null],
        [OPS.constructPath, [[], [], [0, 0, 5, 5]]],
        [OPS.fill, null],
        [OPS.endMarkedContent, null],
      ),
      OPS,
    );

    expect(bounds.get(2)).toEqual({ left: 0, bottom: 0, right: 40, top: 50 });
  });

  test('attributes content to the innermost sequence with an MCID', () => {
    const bounds = collectGraphicsBounds(
      ops(
        [OPS.beginMarkedContentProps, ['Figure', 5]],
        [OPS.beginMarkedContent, ['Span']],
        [OPS.transform, [10, 0, 0, 10, 0, 0]],
        [OPS.paintInlineImageXObject, [{}]],
        [OPS.endMarkedContent, null],
        [OPS.beginMarkedContentProps, ['Span', 6]],
        [OPS.paintImageMaskXObject, [{}]],
        [OPS.endMarkedContent, null],
        [OPS.endMarkedContent, null],
      ),
      OPS,
    );

    expect(bounds.get(5)).toEqual({ left: 0, bottom: 0, right: 10, top: 10 });
    expect(bounds.get(6)).toEqual({ left: 0, bottom: 0, right: 10, top: 10 });
  });

  test('ignores content outside marked content and empty paths', () => {
    const bounds = collectGraphicsBounds(
      ops(
        [OPS.paintImageXObject, ['img']],
        [OPS.beginMarkedContentProps, ['OC', null]],
        [OPS.paintImageXObject, ['img']],
        [OPS.endMarkedContent, null],
        [OPS.beginMarkedContentProps, ['P', 4]],
        [OPS.constructPath, [[], [], [Infinity, Infinity, -Infinity, -Infinity]]],
        [OPS.fill, null],
        [OPS.endMarkedContent, null],
      ),
      OPS,
    );

    expect(bounds.size).toBe(0);
  });
});

describe('collectTextContent', () => {
  test('collects text and bounds per MCID', () => {
    const items: TextContentItemLike[] = [
      { type: 'beginMarkedContentProps', id: 'p12R_mc0' },
      { str: 'Annual ', transform: [12, 0, 0, 12, 72, 700], width: 40, height: 12 },
      { str: 'report', transform: [12, 0, 0, 12, 112, 700], width: 36, height: 12 },
      { type: 'endMarkedContent' },
      { str: 'untagged', transform: [12, 0, 0, 12, 72, 650], width: 50, height: 12 },
      { type: 'beginMarkedContentProps', id: 'p12R_mc1' },
      { str: 'Figure 1', transform: [10, 0, 0, 10, 72, 300], width: 44, height: 0 },
      { type: 'endMarkedContent' },
    ];

    const content = collectTextContent(items);

    expect(content.get(0)).toEqual({
      text: 'Annual report',
      bounds: { left: 72, bottom: 700, right: 148, top: 712 },
    });
    expect(content.get(1)).toEqual({
      text: 'Figure 1',
      bounds: { left: 72, bottom: 300, right: 116, top: 310 },
    });
    expect(content.size).toBe(2);
  });

  test('keeps whitespace-only pieces out of the bounds', () => {
    const content = collectTextContent([
      { type: 'beginMarkedContentProps', id: 'p3R_mc7' },
      { str: ' ', transform: [12, 0, 0, 12, 0, 0], width: 3, height: 12 },
      { type: 'endMarkedContent' },
    ]);

    expect(content.get(7)).toEqual({ text: ' ', bounds: null });
  });

  test('skips marked content without an MCID', () => {
    const content = collectTextContent([
      { type: 'beginMarkedContent', id: null },
      { str: 'Header', transform: [12, 0, 0, 12, 0, 800], width: 30, height: 12 },
      { type: 'endMarkedContent' },
    ]);

    expect(content.size).toBe(0);
  });
});

describe('mergePageContent', () => {
  test('unions text bounds with graphics bounds', () => {
    const text = new Map([
      [0, { text: 'Caption', bounds: { left: 10, bottom: 10, right: 50, top: 20 } }],
    ]);
    const graphics = new Map([
      [0, { left: 0, bottom: 15, right: 40, top: 60 }],
      [1, { left: 100, bottom: 100, right: 200, top: 200 }],
    ]);

    const merged = mergePageContent(text, graphics);

    expect(merged.get(0)).toEqual({
      text: 'Caption',
      bounds: { left: 0, bottom: 10, right: 50, top: 60 },
    });
    expect(merged.get(1)).toEqual({
      text: '',
      bounds: { left: 100, bottom: 100, right: 200, top: 200 },
    });
  });
});
