import type { TextSpan } from '../../types/index.js';
import {
  collectUnderlineSegments,
  findUnderlinedSpans,
  isUnderlinedBy,
  PathOps,
  wrapUnderlined
} from './UnderlineDetector.js';

const codes: PathOps = {
  save: 10,
  restore: 11,
  transform: 12,
  constructPath: 91,
  moveTo: 13,
  lineTo: 14,
  curveTo: 15,
  curveTo2: 16,
  curveTo3: 17,
  closePath: 18,
  rectangle: 19
};

const path = (ops: number[], coords: number[]) => [ops, coords];

describe('collectUnderlineSegments', () => {
  it('finds nothing on a page without graphics', () => {
    expect(collectUnderlineSegments({ fnArray: [], argsArray: [] }, codes)).toEqual([]);
  });

  it('collects horizontal strokes', () => {
    const segments = collectUnderlineSegments({
      fnArray: [codes.constructPath],
      argsArray: [path([codes.moveTo, codes.lineTo], [200, 698, 100, 698])]
    }, codes);
    expect(segments).toEqual([{ x1: 100, x2: 200, y: 698 }]);
  });

  it('collects thin rectangles and ignores boxes', () => {
    const segments = collectUnderlineSegments({
      fnArray: [codes.constructPath, codes.constructPath],
      argsArray: [
        path([codes.rectangle], [50, 500, 80, 1]),
        path([codes.rectangle], [50, 400, 80, 20])
      ]
    }, codes);
    expect(segments).toEqual([{ x1: 50, x2: 130, y: 500.5 }]);
  });

  it('ignores vertical and very short strokes', () => {
    const segments = collectUnderlineSegments({
      fnArray: [codes.constructPath],
      argsArray: [path([codes.moveTo, codes.lineTo, codes.moveTo, codes.lineTo], [10, 10, 10, 90, 20, 50, 22, 50])]
    }, codes);
    expect(segments).toEqual([]);
  });

  it('closes a subpath back to its start', () => {
    const segments = collectUnderlineSegments({
      fnArray: [codes.constructPath],
      argsArray: [path(
        [codes.moveTo, codes.lineTo, codes.lineTo, codes.lineTo, codes.closePath],
        [0, 0, 0, 1, 40, 1, 40, 0]
      )]
    }, codes);
    expect(segments).toEqual([
      { x1: 0, x2: 40, y: 1 },
      { x1: 0, x2: 40, y: 0 }
    ]);
  });

  it('applies the transformation matrix and restores it', () => {
    const stroke = path([codes.moveTo, codes.lineTo], [0, 0, 50, 0]);
    const segments = collectUnderlineSegments({
      fnArray: [codes.save, codes.transform, codes.constructPath, codes.restore, codes.constructPath],
      argsArray: [null, [2, 0, 0, 2, 10, 20], stroke, null, stroke]
    }, codes);
    expect(segments).toEqual([
      { x1: 10, x2: 110, y: 20 },
      { x1: 0, x2: 50, y: 0 }
    ]);
  });
});

describe('isUnderlinedBy', () => {
  const span: TextSpan = { text: '중요', x: 100, y: 700, width: 40, height: 10 };

  it('accepts a stroke just below the baseline', () => {
    expect(isUnderlinedBy(span, { x1: 98, x2: 145, y: 698 })).toBe(true);
  });

  it('rejects strokes too far below or above the baseline', () => {
    expect(isUnderlinedBy(span, { x1: 98, x2: 145, y: 690 })).toBe(false);
    expect(isUnderlinedBy(span, { x1: 98, x2: 145, y: 702 })).toBe(false);
  });

  it('requires the stroke to cover more than half the span', () => {
    expect(isUnderlinedBy(span, { x1: 130, x2: 200, y: 698 })).toBe(false);
  });
});

describe('findUnderlinedSpans', () => {
  it('never marks whitespace', () => {
    const spans: TextSpan[] = [
      { text: ' ', x: 100, y: 700, width: 5, height: 10 },
      { text: 'word', x: 105, y: 700, width: 20, height: 10 }
    ];
    expect(findUnderlinedSpans(spans, [{ x1: 95, x2: 130, y: 699 }])).toEqual([false, true]);
  });
});

describe('wrapUnderlined', () => {
  it('wraps text in underline markers', () => {
    expect(wrapUnderlined('not')).toBe('[[u]]not[[/u]]');
  });
});
