import pino from 'pino';
import { boxToCorners } from '../../src/evaluation/boxes.js';
import type { Logger } from '../../src/logger.js';
import type { Annotation, AnnotationDataset, BoundingBox, Prediction } from '../../src/types.js';

export const CAT = 3;
export const DOG = 1;

/** Contiguous label of each category: the dataset lists cat before dog. */
export const LABELS = { [CAT]: 0, [DOG]: 1 } as const;

export function createDataset(): AnnotationDataset {
  return {
    info: { description: 'test fixture' },
    images: [
      { id: 1, width: 200, height: 200 },
      { id: 2, width: 200, height: 200 },
      { id: 3, width: 200, height: 200 },
      { id: 4, width: 200, height: 200 }
    ],
    categories: [
      { id: CAT, name: 'cat' },
      { id: DOG, name: 'dog' }
    ],
    annotations: [
      { id: 1, image_id: 1, category_id: DOG, bbox: [10, 10, 20, 20], iscrowd: 0 },
      { id: 2, image_id: 1, category_id: CAT, bbox: [50, 50, 30, 30], iscrowd: 0 },
      { id: 3, image_id: 2, category_id: DOG, bbox: [0, 0, 40, 40], iscrowd: 0 },
      { id: 4, image_id: 3, category_id: CAT, bbox: [5, 5, 10, 10], iscrowd: 0 },
      { id: 5, image_id: 4, category_id: DOG, bbox: [100, 100, 50, 50], iscrowd: 0 }
    ]
  };
}

export type Detection = {
  bbox: BoundingBox;
  categoryId: typeof CAT | typeof DOG;
  score: number;
};

export function toPrediction(detections: readonly Detection[]): Prediction {
  return {
    boxes: detections.map(detection => boxToCorners(detection.bbox)),
    scores: detections.map(detection => detection.score),
    labels: detections.map(detection => LABELS[detection.categoryId])
  };
}

/** A prediction that reproduces every ground-truth box of the image. */
export function perfectPrediction(dataset: AnnotationDataset, imageId: number, score = 0.9): Prediction {
  return toPrediction(
    dataset.annotations
      .filter(annotation => annotation.image_id === imageId)
      .map(annotation => ({
        bbox: annotation.bbox,
        categoryId: annotation.category_id === CAT ? CAT : DOG,
        score
      }))
  );
}

export function annotation(id: number, bbox: BoundingBox, extra: Partial<Annotation> = {}): Annotation {
  return {
    id,
    image_id: 1,
    category_id: DOG,
    bbox,
    area: bbox[2] * bbox[3],
    iscrowd: 0,
    ...extra
  };
}

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
