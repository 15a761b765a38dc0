import type { BoundingBox, BoxCorners } from '../types.js';

export function cornersToBox(corners: BoxCorners): BoundingBox {
  const [x1, y1, x2, y2] = corners;
  return [x1, y1, x2 - x1, y2 - y1];
}

export function boxToCorners(box: BoundingBox): BoxCorners {
  const [x, y, width, height] = box;
  return [x, y, x + width, y + height];
}

export function boxArea(box: BoundingBox): number {
  return box[2] * box[3];
}

/**
 * Row-major IoU matrix with one row per detection and one column per ground
 * truth.
 */
export class IouMatrix {
  readonly data: Float64Array;

  constructor(
    readonly rows: number,
    readonly cols: number,
    data?: Float64Array
  ) {
    this.data = data ?? new Float64Array(rows * cols);
  }

  get isEmpty(): boolean {
    return this.rows === 0 || this.cols === 0;
  }

  get(row: number, col: number): number {
    return this.data[row * this.cols + col];
  }

  /** Copy with the columns reordered (or subset) by `order`. */
  selectColumns(order: readonly number[]): IouMatrix {
    const selected = new IouMatrix(this.rows, order.length);
    for (let row = 0; row < this.rows; row += 1) {
      const sourceOffset = row * this.cols;
      const targetOffset = row * order.length;
      order.forEach((col, index) => {
        selected.data[targetOffset + index] = this.data[sourceOffset + col];
      });
    }
    return selected;
  }
}

/**
 * IoU between every detection and every ground-truth box. For a crowd ground
 * truth the union is the detection's own area, so a detection fully inside a
 * crowd region scores 1.
 */
export function computeIouMatrix(
  detections: readonly BoundingBox[],
  groundTruths: readonly BoundingBox[],
  crowd: readonly boolean[]
): IouMatrix {
  const matrix = new IouMatrix(detections.length, groundTruths.length);
  if (matrix.isEmpty) {
    return matrix;
  }

  const gtAreas = groundTruths.map(boxArea);

  detections.forEach((detection, row) => {
    const [dx, dy, dw, dh] = detection;
    const detectionArea = dw * dh;
    const offset = row * groundTruths.length;

    groundTruths.forEach((groundTruth, col) => {
      const [gx, gy, gw, gh] = groundTruth;
      const width = Math.min(dx + dw, gx + gw) - Math.max(dx, gx);
      if (width <= 0) {
        return;
      }
      const height = Math.min(dy + dh, gy + gh) - Math.max(dy, gy);
      if (height <= 0) {
        return;
      }
      const intersection = width * height;
      const union = crowd[col] ? detectionArea : detectionArea + gtAreas[col] - intersection;
      matrix.data[offset + col] = intersection / union;
    });
  });

  return matrix;
}
