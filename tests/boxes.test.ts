import { describe, expect, it } from 'vitest';
import { boxArea, boxToCorners, computeIouMatrix, cornersToBox, IouMatrix } from '../src/evaluation/boxes.js';

describe('BoxConversion', () => {
  it('converts corner boxes to COCO boxes and back', () => {
    expect(cornersToBox([10, 10, 30, 40])).toEqual([10, 10, 20, 30]);
    expect(boxToCorners([10, 10, 20, 30])).toEqual([10, 10, 30, 40]);
    expect(boxArea([10, 10, 20, 30])).toBe(600);
  });
});

describe('IouMatrix', () => {
  it('computes overlap over union for every detection and ground truth', () => {
    const matrix = computeIouMatrix(
      [
        [0, 0, 10, 10],
        [20, 20, 5, 5]
      ],
      [
        [5, 0, 10, 10],
        [0, 0, 10, 10]
      ],
      [false, false]
    );

    expect(matrix.rows).toBe(2);
    expect(matrix.cols).toBe(2);
    expect(matrix.get(0, 0)).toBeCloseTo(1 / 3, 12);
    expect(matrix.get(0, 1)).toBe(1);
    expect(matrix.get(1, 0)).toBe(0);
    expect(matrix.get(1, 1)).toBe(0);
  });

  it('scores boxes that only touch at an edge as zero', () => {
    const matrix = computeIouMatrix([[0, 0, 10, 10]], [[10, 0, 10, 10]], [false]);
    expect(matrix.get(0, 0)).toBe(0);
  });

  it('uses the detection area as union for crowd regions', () => {
    const matrix = computeIouMatrix(
      [
        [0, 0, 10, 10],
        [95, 95, 10, 10]
      ],
      [[0, 0, 100, 100]],
      [true]
    );

    expect(matrix.get(0, 0)).toBe(1);
    expect(matrix.get(1, 0)).toBe(0.25);
  });

  it('returns an empty matrix when either side is empty', () => {
    expect(computeIouMatrix([], [[0, 0, 1, 1]], [false]).isEmpty).toBe(true);
    expect(computeIouMatrix([[0, 0, 1, 1]], [], []).isEmpty).toBe(true);
  });

  it('reorders columns', () => {
    const matrix = new IouMatrix(2, 3, Float64Array.from([1, 2, 3, 4, 5, 6]));
    const selected = matrix.selectColumns([2, 0]);

    expect(selected.cols).toBe(2);
    expect(Array.from(selected.data)).toEqual([3, 1, 6, 4]);
  });
});
