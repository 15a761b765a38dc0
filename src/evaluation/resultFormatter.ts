import { InputContractError, UnsupportedIoUTypeError } from '../errors.js';
import type { DetectionRecord, Prediction } from '../types.js';
import { cornersToBox } from './boxes.js';

export type PredictionBatch = ReadonlyMap<number, Prediction>;

export function assertBoxIouType(iouType: string): asserts iouType is 'bbox' {
  if (iouType !== 'bbox') {
    throw new UnsupportedIoUTypeError(iouType);
  }
}

/**
 * Converts model output (corner boxes, contiguous labels) into COCO result
 * records. Label `i` maps to the i-th category id of the ground truth, in the
 * order the store lists them.
 */
export class ResultFormatter {
  readonly contiguousToJsonCategory: readonly number[];

  constructor(categoryIds: readonly number[]) {
    this.contiguousToJsonCategory = Object.freeze([...categoryIds]);
  }

  format(predictions: PredictionBatch, iouType: string = 'bbox'): DetectionRecord[] {
    assertBoxIouType(iouType);
    const records: DetectionRecord[] = [];
    for (const [imageId, prediction] of predictions) {
      records.push(...this.formatPrediction(imageId, prediction));
    }
    return records;
  }

  formatPrediction(imageId: number, prediction: Prediction): DetectionRecord[] {
    const { boxes, scores, labels } = prediction;
    if (boxes.length !== scores.length || boxes.length !== labels.length) {
      throw new InputContractError(
        `Prediction for image ${imageId} has ${boxes.length} boxes, ${scores.length} scores and ${labels.length} labels`
      );
    }

    return boxes.map((corners, index) => {
      const label = labels[index];
      const categoryId = this.contiguousToJsonCategory[label];
      if (!Number.isInteger(label) || typeof categoryId !== 'number') {
        throw new InputContractError(
          `Prediction for image ${imageId} has label ${label} outside [0, ${this.contiguousToJsonCategory.length})`
        );
      }
      return {
        image_id: imageId,
        category_id: categoryId,
        bbox: cornersToBox(corners),
        score: scores[index]
      };
    });
  }
}
