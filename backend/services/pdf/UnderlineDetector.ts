/**
 * UnderlineDetector
 * Finds underline strokes among a page's vector graphics and decides which text
 * spans they sit under. Geometry is in PDF user space (y grows upward).
 */

import type { LineSegment, TextSpan } from '../../types/index.js';

export const UNDERLINE_OPEN = '[[u]]';
export const UNDERLINE_CLOSE = '[[/u]]';

const MAX_LINE_SLOPE = 1;      // pt of vertical drift allowed along a stroke
const MAX_RECT_HEIGHT = 2;     // thicker filled boxes are not underlines
const MIN_STROKE_WIDTH = 3;
const MAX_ABOVE_BASELINE = 1;
const MIN_GAP_TOLERANCE = 3;
const GAP_PER_FONT_HEIGHT = 0.4;
const MIN_OVERLAP_RATIO = 0.5;

/** Operator codes needed from the PDF library's OPS table. */
export interface PathOps {
  save: number;
  restore: number;
  transform: number;
  constructPath: number;
  moveTo: number;
  lineTo: number;
  curveTo: number;
  curveTo2: number;
  curveTo3: number;
  closePath: number;
  rectangle: number;
}

export interface OperatorListLike {
  fnArray: readonly number[];
  argsArray: readonly unknown[];
}

type Matrix = [number, number, number, number, number, number];

const IDENTITY: Matrix = [1, 0, 0, 1, 0, 0];

function multiply(m1: Matrix, m2: Matrix): Matrix {
  return [
    m1[0] * m2[0] + m1[2] * m2[1],
    m1[1] * m2[0] + m1[3] * m2[1],
    m1[0] * m2[2] + m1[2] * m2[3],
    m1[1] * m2[2] + m1[3] * m2[3],
    m1[0] * m2[4] + m1[2] * m2[5] + m1[4],
    m1[1] * m2[4] + m1[3] * m2[5] + m1[5]
  ];
}

function apply(m: Matrix, x: number, y: number): [number, number] {
  return [m[0] * x + m[2] * y + m[4], m[1] * x + m[3] * y + m[5]];
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every(item => typeof item === 'number');
}

function toMatrix(value: unknown): Matrix | null {
  if (!isNumberArray(value) || value.length < 6) {
    return null;
  }
  return [value[0], value[1], value[2], value[3], value[4], value[5]];
}

function horizontalSegment(x1: number, y1: number, x2: number, y2: number): LineSegment | null {
  if (Math.abs(y1 - y2) > MAX_LINE_SLOPE || Math.abs(x2 - x1) < MIN_STROKE_WIDTH) {
    return null;
  }
  return { x1: Math.min(x1, x2), x2: Math.max(x1, x2), y: (y1 + y2) / 2 };
}

function thinRectangle(ctm: Matrix, x: number, y: number, w: number, h: number): LineSegment | null {
  const [ax, ay] = apply(ctm, x, y);
  const [bx, by] = apply(ctm, x + w, y + h);
  const width = Math.abs(bx - ax);
  const height = Math.abs(by - ay);
  if (height > MAX_RECT_HEIGHT || width < MIN_STROKE_WIDTH) {
    return null;
  }
  return { x1: Math.min(ax, bx), x2: Math.max(ax, bx), y: (ay + by) / 2 };
}

function readPath(ctm: Matrix, ops: readonly number[], coords: readonly number[], codes: PathOps, into: LineSegment[]): void {
  let k = 0;
  let current: [number, number] | null = null;
  let subpathStart: [number, number] | null = null;

  for (const op of ops) {
    if (op === codes.moveTo) {
      current = apply(ctm, coords[k], coords[k + 1]);
      subpathStart = current;
      k += 2;
    } else if (op === codes.closePath) {
      if (current && subpathStart) {
        const segment = horizontalSegment(current[0], current[1], subpathStart[0], subpathStart[1]);
        if (segment) into.push(segment);
      }
      current = subpathStart;
    } else if (op === codes.lineTo) {
      const next = apply(ctm, coords[k], coords[k + 1]);
      k += 2;
      if (current) {
        const segment = horizontalSegment(current[0], current[1], next[0], next[1]);
        if (segment) into.push(segment);
      }
      current = next;
    } else if (op === codes.rectangle) {
      const segment = thinRectangle(ctm, coords[k], coords[k + 1], coords[k + 2], coords[k + 3]);
      if (segment) into.push(segment);
      current = apply(ctm, coords[k], coords[k + 1]);
      k += 4;
    } else if (op === codes.curveTo) {
      current = apply(ctm, coords[k + 4], coords[k + 5]);
      k += 6;
    } else if (op === codes.curveTo2 || op === codes.curveTo3) {
      current = apply(ctm, coords[k + 2], coords[k + 3]);
      k += 4;
    }
  }
}

/**
 * Horizontal strokes and thin rectangles on a page, in page coordinates.
 */
export function collectUnderlineSegments(operatorList: OperatorListLike, codes: PathOps): LineSegment[] {
  const segments: LineSegment[] = [];
  const stack: Matrix[] = [];
  let ctm: Matrix = IDENTITY;

  operatorList.fnArray.forEach((fn, index) => {
    const args = operatorList.argsArray[index];
    if (fn === codes.save) {
      stack.push(ctm);
    } else if (fn === codes.restore) {
      ctm = stack.pop() ?? IDENTITY;
    } else if (fn === codes.transform) {
      const m = toMatrix(args);
      if (m) ctm = multiply(ctm, m);
    } else if (fn === codes.constructPath && Array.isArray(args)) {
      const [ops, coords] = args;
      if (isNumberArray(ops) && isNumberArray(coords)) {
        readPath(ctm, ops, coords, codes, segments);
      }
    }
  });

  return segments;
}

/**
 * True when `segment` runs just under the span's baseline across more than half its width.
 */
export function isUnderlinedBy(span: TextSpan, segment: LineSegment): boolean {
  if (span.width <= 0) {
    return false;
  }
  const gap = span.y - segment.y;
  const tolerance = Math.max(MIN_GAP_TOLERANCE, span.height * GAP_PER_FONT_HEIGHT);
  if (gap < -MAX_ABOVE_BASELINE || gap > tolerance) {
    return false;
  }
  const overlap = Math.min(segment.x2, span.x + span.width) - Math.max(segment.x1, span.x);
  return overlap > span.width * MIN_OVERLAP_RATIO;
}

export function findUnderlinedSpans(spans: readonly TextSpan[], segments: readonly LineSegment[]): boolean[] {
  return spans.map(span => span.text.trim() !== '' && segments.some(segment => isUnderlinedBy(span, segment)));
}

export function wrapUnderlined(text: string): string {
  return `${UNDERLINE_OPEN}${text}${UNDERLINE_CLOSE}`;
}
