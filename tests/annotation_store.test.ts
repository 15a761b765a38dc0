import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AnnotationStore, parseAnnotationDataset } from '../src/annotations/store.js';
import { InputContractError } from '../src/errors.js';
import { CAT, DOG, createDataset } from './helpers/fixtures.js';

describe('AnnotationStore', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'boxeval-store-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('keeps categories and images in dataset order', () => {
    const store = new AnnotationStore(createDataset());

    expect(store.getCategoryIds()).toEqual([CAT, DOG]);
    expect(store.getImageIds()).toEqual([1, 2, 3, 4]);
    expect(store.annotationCount).toBe(5);
    expect(Object.isFrozen(store.getCategoryIds())).toBe(true);
  });

  it('deep copies the dataset it is given', () => {
    const dataset = createDataset();
    const store = new AnnotationStore(dataset);

    dataset.annotations[0].bbox = [0, 0, 1, 1];
    dataset.categories.push({ id: 9, name: 'bird' });

    expect(store.getAnnotations(1, DOG).map(annotation => annotation.bbox)).toEqual([[10, 10, 20, 20]]);
    expect(store.getCategoryIds()).toEqual([CAT, DOG]);
  });

  it('fills in area from the box and normalizes the crowd flag', () => {
    const dataset = createDataset();
    dataset.annotations.push({ id: 6, image_id: 2, category_id: CAT, bbox: [0, 0, 10, 20], iscrowd: true });
    dataset.annotations.push({ id: 7, image_id: 2, category_id: CAT, bbox: [0, 0, 10, 20], area: 50 });
    const store = new AnnotationStore(dataset);

    const [crowd, explicit] = store.getAnnotations(2, CAT);
    expect(crowd.area).toBe(200);
    expect(crowd.iscrowd).toBe(1);
    expect(explicit.area).toBe(50);
    expect(explicit.iscrowd).toBe(0);
  });

  it('returns no annotations for an empty cell', () => {
    const store = new AnnotationStore(createDataset());
    expect(store.getAnnotations(3, DOG)).toEqual([]);
  });

  it('rejects duplicate annotation ids', () => {
    const dataset = createDataset();
    dataset.annotations.push({ id: 1, image_id: 2, category_id: CAT, bbox: [0, 0, 1, 1] });

    expect(() => new AnnotationStore(dataset)).toThrow(new InputContractError('Duplicate annotation id 1'));
  });

  it('validates the dataset layout when parsing', () => {
    expect(() => parseAnnotationDataset(JSON.stringify({ images: [], annotations: [] }), 'gt.json')).toThrow(
      'gt.json.categories is required'
    );
    expect(() =>
      parseAnnotationDataset(
        JSON.stringify({
          images: [{ id: 1 }],
          categories: [{ id: 1, name: 'dog' }],
          annotations: [{ id: 1, image_id: 1, category_id: 1, bbox: [0, 0, 1] }]
        }),
        'gt.json'
      )
    ).toThrow('gt.json.annotations[0].bbox must contain at least 4 items');
    expect(() => parseAnnotationDataset('{', 'gt.json')).toThrow(InputContractError);
  });

  it('loads a dataset from disk', () => {
    const filePath = path.join(tempDir, 'instances.json');
    fs.writeFileSync(filePath, JSON.stringify(createDataset()));

    const store = AnnotationStore.fromFile(filePath);
    expect(store.getImageIds()).toEqual([1, 2, 3, 4]);
    expect(store.getCategories().map(category => category.name)).toEqual(['cat', 'dog']);
  });

  it('clones into an independent store', () => {
    const store = new AnnotationStore(createDataset());
    const clone = store.clone();

    expect(clone).not.toBe(store);
    expect(clone.toJSON()).toEqual(store.toJSON());
  });

  it('turns detection records into result annotations', () => {
    const store = new AnnotationStore(createDataset());
    const detections = store.loadResults([
      { image_id: 1, category_id: DOG, bbox: [10, 10, 20, 20], score: 0.9 },
      { image_id: 2, category_id: DOG, bbox: [0, 0, 5, 4], score: 0.4 }
    ]);

    expect(detections.size).toBe(2);
    expect(detections.get(2, DOG)).toEqual([
      { id: 2, image_id: 2, category_id: DOG, bbox: [0, 0, 5, 4], area: 20, iscrowd: 0, score: 0.4 }
    ]);
    expect(detections.get(1, CAT)).toEqual([]);
  });

  it('rejects results for images outside the annotation set', () => {
    const store = new AnnotationStore(createDataset());

    expect(() =>
      store.loadResults([
        { image_id: 9, category_id: DOG, bbox: [0, 0, 1, 1], score: 0.5 },
        { image_id: 7, category_id: DOG, bbox: [0, 0, 1, 1], score: 0.5 }
      ])
    ).toThrow('Results do not correspond to the annotation set: unknown image ids 7, 9');
  });
});
