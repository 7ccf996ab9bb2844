import type { BoundingBox } from '@tagsense/model';

/**
 * Affine matrix [a, b, c, d, e, f] as used by PDF content streams
 */
export type Matrix = [number, number, number, number, number, number];

const IDENTITY: Matrix = [1, 0, 0, 1, 0, 0];

/**
 * Geometry and text of one marked-content sequence on a page
 */
export interface MarkedContent {
  bounds: BoundingBox | null;
  text: string;
}

/**
 * Operator codes consumed while walking an operator list.
 * pdfjs-dist's `OPS` satisfies this shape.
 */
export type GraphicsOperatorCodes = Record<
  | 'save'
  | 'restore'
  | 'transform'
  | 'constructPath'
  | 'fill'
  | 'eoFill'
  | 'stroke'
  | 'fillStroke'
  | 'eoFillStroke'
  | 'closeStroke'
  | 'closeFillStroke'
  | 'closeEOFillStroke'
  | 'endPath'
  | 'paintImageXObject'
  | 'paintInlineImageXObject'
  | 'paintImageMaskXObject'
  | 'paintFormXObjectBegin'
  | 'paintFormXObjectEnd'
  | 'beginMarkedContent'
  | 'beginMarkedContentProps'
  | 'endMarkedContent',
  number
>;

export interface OperatorListLike {
  fnArray: readonly number[];
  argsArray: readonly unknown[];
}

export interface TextPieceLike {
  str: string;
  transform: readonly number[];
  width: number;
  height: number;
}

export interface MarkedContentItemLike {
  type: string;
  id?: string | null;
}

export type TextContentItemLike = TextPieceLike | MarkedContentItemLike;

export function multiply(m: Matrix, n: Matrix): Matrix {
  return [
    m[0] * n[0] + m[1] * n[2],
    m[0] * n[1] + m[1] * n[3],
    m[2] * n[0] + m[3] * n[2],
    m[2] * n[1] + m[3] * n[3],
    m[4] * n[0] + m[5] * n[2] + n[4],
    m[4] * n[1] + m[5] * n[3] + n[5],
  ];
}

/**
 * Bounds of the rectangle (x0, y0)-(x1, y1) after applying a matrix
 */
export function transformRect(
  m: Matrix,
  x0: number,
  y0: number,
  x1: number,
  y1: number,
): BoundingBox {
  const xs: number[] = [];
  const ys: number[] = [];
  for (const [x, y] of [
    [x0, y0],
    [x1, y0],
    [x0, y1],
    [x1, y1],
  ]) {
    xs.push(m[0] * x + m[2] * y + m[4]);
    ys.push(m[1] * x + m[3] * y + m[5]);
  }
  return {
    left: Math.min(...xs),
    bottom: Math.min(...ys),
    right: Math.max(...xs),
    top: Math.max(...ys),
  };
}

export function unionBox(a: BoundingBox | null, b: BoundingBox): BoundingBox {
  if (!a) return { ...b };
  return {
    left: Math.min(a.left, b.left),
    bottom: Math.min(a.bottom, b.bottom),
    right: Math.max(a.right, b.right),
    top: Math.max(a.top, b.top),
  };
}

function toMatrix(value: unknown): Matrix | null {
  if (!isNumberList(value) || value.length < 6) return null;
  return [value[0], value[1], value[2], value[3], value[4], value[5]];
}

function isNumberList(value: unknown): value is ArrayLike<number> {
  if (value instanceof Float32Array || value instanceof Float64Array) return true;
  return Array.isArray(value) && value.every((item) => typeof item === 'number');
}

/**
 * MCID of the innermost marked-content sequence that has one
 */
function currentMcid(stack: readonly (number | null)[]): number | null {
  for (let index = stack.length - 1; index >= 0; index--) {
    const mcid = stack[index];
    if (mcid !== null) return mcid;
  }
  return null;
}

/**
 * Bounds of painted paths and images per MCID.
 *
 * Walks a pdfjs operator list tracking the current transformation matrix.
 * Path bounds (the min/max of `constructPath`) count once the path is
 * painted; a path that is only used for clipping is dropped. Images fill
 * the unit square under the current matrix.
 */
export function collectGraphicsBounds(
  operators: OperatorListLike,
  codes: GraphicsOperatorCodes,
): Map<number, BoundingBox> {
  const bounds = new Map<number, BoundingBox>();
  const paintOps = new Set([
    codes.fill,
    codes.eoFill,
    codes.stroke,
    codes.fillStroke,
    codes.eoFillStroke,
    codes.closeStroke,
    codes.closeFillStroke,
    codes.closeEOFillStroke,
  ]);
  const imageOps = new Set([
    codes.paintImageXObject,
    codes.paintInlineImageXObject,
    codes.paintImageMaskXObject,
  ]);

  let ctm: Matrix = IDENTITY;
  const ctmStack: Matrix[] = [];
  const markedStack: (number | null)[] = [];
  let pendingPath: BoundingBox | null = null;

  const record = (box: BoundingBox) => {
    const mcid = currentMcid(markedStack);
    if (mcid === null) return;
    bounds.set(mcid, unionBox(bounds.get(mcid) ?? null, box));
  };

  operators.fnArray.forEach((fn, index) => {
    const args = operators.argsArray[index];

    if (fn === codes.save) {
      ctmStack.push(ctm);
    } else if (fn === codes.restore) {
      ctm = ctmStack.pop() ?? IDENTITY;
    } else if (fn === codes.transform) {
      const matrix = toMatrix(args);
      if (matrix) ctm = multiply(matrix, ctm);
    } else if (fn === codes.paintFormXObjectBegin) {
      ctmStack.push(ctm);
      const matrix = Array.isArray(args) ? toMatrix(args[0]) : null;
      if (matrix) ctm = multiply(matrix, ctm);
    } else if (fn === codes.paintFormXObjectEnd) {
      ctm = ctmStack.pop() ?? IDENTITY;
    } else if (fn === codes.constructPath) {
      const minMax = Array.isArray(args) ? args[2] : undefined;
      pendingPath = null;
      if (isNumberList(minMax) && minMax.length >= 4) {
        const [x0, y0, x1, y1] = [minMax[0], minMax[1], minMax[2], minMax[3]];
        if ([x0, y0, x1, y1].every(Number.isFinite) && x0 <= x1 && y0 <= y1) {
          pendingPath = transformRect(ctm, x0, y0, x1, y1);
        }
      }
    } else if (paintOps.has(fn)) {
      if (pendingPath) record(pendingPath);
      pendingPath = null;
    } else if (fn === codes.endPath) {
      pendingPath = null;
    } else if (imageOps.has(fn)) {
      record(transformRect(ctm, 0, 0, 1, 1));
    } else if (fn === codes.beginMarkedContent) {
      markedStack.push(null);
    } else if (fn === codes.beginMarkedContentProps) {
      const mcid = Array.isArray(args) ? args[1] : undefined;
      markedStack.push(typeof mcid === 'number' && Number.isInteger(mcid) ? mcid : null);
    } else if (fn === codes.endMarkedContent) {
      markedStack.pop();
    }
  });

  return bounds;
}

const MCID_SUFFIX = /_mc(\d+)$/;

function isTextPiece(item: TextContentItemLike): item is TextPieceLike {
  return 'str' in item;
}

/**
 * Text and text bounds per MCID from pdfjs text content read with
 * `includeMarkedContent`.
 */
export function collectTextContent(
  items: readonly TextContentItemLike[],
): Map<number, MarkedContent> {
  const result = new Map<number, MarkedContent>();
  const markedStack: (number | null)[] = [];

  for (const item of items) {
    if (!isTextPiece(item)) {
      if (item.type === 'endMarkedContent') {
        markedStack.pop();
      } else if (item.type === 'beginMarkedContentProps') {
        const match = item.id ? MCID_SUFFIX.exec(item.id) : null;
        markedStack.push(match ? Number(match[1]) : null);
      } else if (item.type === 'beginMarkedContent') {
        markedStack.push(null);
      }
      continue;
    }

    const mcid = currentMcid(markedStack);
    if (mcid === null) continue;

    const entry = result.get(mcid) ?? { bounds: null, text: '' };
    entry.text += item.str;

    const [a, b, c, d, x, y] = item.transform;
    if (item.str.trim() && item.transform.length >= 6) {
      const height = item.height || Math.hypot(c, d) || Math.hypot(a, b);
      entry.bounds = unionBox(entry.bounds, {
        left: x,
        bottom: y,
        right: x + item.width,
        top: y + height,
      });
    }
    result.set(mcid, entry);
  }

  return result;
}

/**
 * Merge graphics bounds into the text entries of a page
 */
export function mergePageContent(
  text: Map<number, MarkedContent>,
  graphics: Map<number, BoundingBox>,
): Map<number, MarkedContent> {
  const merged = new Map<number, MarkedContent>();
  for (const [mcid, entry] of text) {
    merged.set(mcid, { ...entry });
  }
  for (const [mcid, box] of graphics) {
    const entry = merged.get(mcid) ?? { bounds: null, text: '' };
    merged.set(mcid, { ...entry, bounds: unionBox(entry.bounds, box) });
  }
  return merged;
}
