import fs from 'node:fs';
import path from 'node:path';
import { InputContractError } from '../errors.js';
import logger from '../logger.js';
import { boxArea } from '../evaluation/boxes.js';
import { validateAgainstSchema, type JsonSchema } from '../utils/schema.js';
import type {
  Annotation,
  AnnotationCategory,
  AnnotationDataset,
  AnnotationImage,
  AnnotationInput,
  BoundingBox,
  DetectionRecord
} from '../types.js';

const boxSchema: JsonSchema = {
  type: 'array',
  minItems: 4,
  maxItems: 4,
  items: { type: 'number' }
};

const datasetSchema: JsonSchema = {
  type: 'object',
  required: ['images', 'annotations', 'categories'],
  properties: {
    images: {
      type: 'array',
      items: {
        type: 'object',
        required: ['id'],
        properties: {
          id: { type: 'integer' }
        }
      }
    },
    annotations: {
      type: 'array',
      items: {
        type: 'object',
        required: ['id', 'image_id', 'category_id', 'bbox'],
        properties: {
          id: { type: 'integer', minimum: 1 },
          image_id: { type: 'integer' },
          category_id: { type: 'integer' },
          bbox: boxSchema,
          area: { type: 'number', minimum: 0 },
          iscrowd: { type: ['integer', 'boolean'] }
        }
      }
    },
    categories: {
      type: 'array',
      items: {
        type: 'object',
        required: ['id', 'name'],
        properties: {
          id: { type: 'integer' },
          name: { type: 'string' }
        }
      }
    }
  }
};

const EMPTY: readonly Annotation[] = Object.freeze([]);

function cellKey(imageId: number, categoryId: number) {
  return `${imageId}:${categoryId}`;
}

function groupByCell(annotations: readonly Annotation[]): Map<string, Annotation[]> {
  const cells = new Map<string, Annotation[]>();
  for (const annotation of annotations) {
    const key = cellKey(annotation.image_id, annotation.category_id);
    const bucket = cells.get(key);
    if (bucket) {
      bucket.push(annotation);
    } else {
      cells.set(key, [annotation]);
    }
  }
  return cells;
}

function normalizeAnnotation(raw: AnnotationInput): Annotation {
  const bbox: BoundingBox = [raw.bbox[0], raw.bbox[1], raw.bbox[2], raw.bbox[3]];
  return {
    ...raw,
    bbox,
    area: typeof raw.area === 'number' ? raw.area : boxArea(bbox),
    iscrowd: raw.iscrowd ? 1 : 0
  };
}

export function parseAnnotationDataset(contents: string, source = 'annotations'): AnnotationDataset {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InputContractError(`Failed to parse ${source}: ${message}`);
  }
  assertAnnotationDataset(parsed, source);
  return parsed;
}

export function assertAnnotationDataset(
  value: unknown,
  source = 'annotations'
): asserts value is AnnotationDataset {
  const errors = validateAgainstSchema(datasetSchema, value, source);
  if (errors.length > 0) {
    throw new InputContractError(errors.join('; '));
  }
}

/**
 * Detections of one `update` call grouped by (image, category). Built by
 * {@link AnnotationStore.loadResults}; never outlives the call.
 */
export class DetectionIndex {
  private readonly cells: Map<string, Annotation[]>;

  constructor(readonly detections: readonly Annotation[]) {
    this.cells = groupByCell(detections);
  }

  get size(): number {
    return this.detections.length;
  }

  get(imageId: number, categoryId: number): readonly Annotation[] {
    return this.cells.get(cellKey(imageId, categoryId)) ?? EMPTY;
  }
}

/**
 * In-memory COCO ground truth. The dataset handed to the constructor is deep
 * copied so later changes by the caller never reach an evaluation.
 */
export class AnnotationStore {
  private readonly dataset: AnnotationDataset & { annotations: Annotation[] };
  private readonly imageIds: readonly number[];
  private readonly imageIdSet: ReadonlySet<number>;
  private readonly categoryIds: readonly number[];
  private readonly cells: Map<string, Annotation[]>;

  constructor(dataset: AnnotationDataset) {
    assertAnnotationDataset(dataset);
    const copy = structuredClone(dataset);
    const annotations = copy.annotations.map(normalizeAnnotation);

    const seenIds = new Set<number>();
    for (const annotation of annotations) {
      if (seenIds.has(annotation.id)) {
        throw new InputContractError(`Duplicate annotation id ${annotation.id}`);
      }
      seenIds.add(annotation.id);
    }

    this.dataset = { ...copy, annotations };
    this.imageIds = Object.freeze(copy.images.map(image => image.id));
    this.imageIdSet = new Set(this.imageIds);
    this.categoryIds = Object.freeze(copy.categories.map(category => category.id));
    this.cells = groupByCell(annotations);
  }

  static fromFile(filePath: string): AnnotationStore {
    const resolvedPath = path.resolve(filePath);
    logger.debug({ component: 'annotations', path: resolvedPath }, 'Loading annotations into memory');
    const contents = fs.readFileSync(resolvedPath, 'utf-8');
    const store = new AnnotationStore(parseAnnotationDataset(contents, resolvedPath));
    logger.debug(
      {
        component: 'annotations',
        images: store.imageIds.length,
        annotations: store.dataset.annotations.length,
        categories: store.categoryIds.length
      },
      'Annotations loaded'
    );
    return store;
  }

  clone(): AnnotationStore {
    return new AnnotationStore(this.dataset);
  }

  /** Category ids in dataset order. */
  getCategoryIds(): readonly number[] {
    return this.categoryIds;
  }

  getCategories(): readonly AnnotationCategory[] {
    return this.dataset.categories;
  }

  /** Image ids in dataset order. */
  getImageIds(): readonly number[] {
    return this.imageIds;
  }

  getImages(): readonly AnnotationImage[] {
    return this.dataset.images;
  }

  hasImage(imageId: number): boolean {
    return this.imageIdSet.has(imageId);
  }

  get annotationCount(): number {
    return this.dataset.annotations.length;
  }

  getAnnotations(imageId: number, categoryId: number): readonly Annotation[] {
    return this.cells.get(cellKey(imageId, categoryId)) ?? EMPTY;
  }

  toJSON(): AnnotationDataset {
    return structuredClone(this.dataset);
  }

  /**
   * Turns detection records into result annotations against this ground
   * truth: ids 1..n in record order, `area` from the box, never crowd.
   */
  loadResults(records: readonly DetectionRecord[]): DetectionIndex {
    const unknownIds = new Set<number>();
    const detections = records.map((record, index): Annotation => {
      if (!this.hasImage(record.image_id)) {
        unknownIds.add(record.image_id);
      }
      const bbox: BoundingBox = [record.bbox[0], record.bbox[1], record.bbox[2], record.bbox[3]];
      return {
        id: index + 1,
        image_id: record.image_id,
        category_id: record.category_id,
        bbox,
        area: boxArea(bbox),
        iscrowd: 0,
        score: record.score
      };
    });

    if (unknownIds.size > 0) {
      const ids = Array.from(unknownIds).sort((a, b) => a - b).join(', ');
      throw new InputContractError(`Results do not correspond to the annotation set: unknown image ids ${ids}`);
    }

    return new DetectionIndex(detections);
  }
}
