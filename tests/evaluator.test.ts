import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, expect, it, vi } from 'vitest';
import { AnnotationStore } from '../src/annotations/store.js';
import { createLocalCollectiveGroup, type Collective } from '../src/distributed/collective.js';
import { ConfigurationError, InputContractError, UnsupportedIoUTypeError } from '../src/errors.js';
import { DetectionEvaluator, type DetectionEvaluatorOptions } from '../src/evaluation/evaluator.js';
import type { PartialEvaluationState } from '../src/evaluation/merge.js';
import { DEFAULT_EVALUATION_CONFIG } from '../src/evaluation/params.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import type { Prediction, Target } from '../src/types.js';
import { CAT, DOG, createDataset, createSilentLogger, perfectPrediction, toPrediction } from './helpers/fixtures.js';

const dataset = createDataset();

function createEvaluator(options: DetectionEvaluatorOptions = {}) {
  return new DetectionEvaluator(new AnnotationStore(dataset), {
    evaluation: DEFAULT_EVALUATION_CONFIG,
    logger: createSilentLogger(),
    metrics: new MetricsRegistry(),
    ...options
  });
}

function batch(entries: Array<[number, Prediction]>): [Prediction[], Target[]] {
  return [entries.map(([, prediction]) => prediction), entries.map(([imageId]) => ({ imageId }))];
}

const perfect = (imageId: number) => perfectPrediction(dataset, imageId);

/** Perfect boxes everywhere, one confident false positive on image 3 and a low score on image 4. */
const mixed: Record<number, Prediction> = {
  1: perfect(1),
  2: perfect(2),
  3: toPrediction([
    { bbox: [5, 5, 10, 10], categoryId: CAT, score: 0.9 },
    { bbox: [150, 150, 20, 20], categoryId: DOG, score: 0.95 }
  ]),
  4: perfectPrediction(dataset, 4, 0.6)
};

describe('DetectionEvaluator', () => {
  it('maps contiguous labels to dataset category ids', () => {
    expect(createEvaluator().contiguousToJsonCategory).toEqual([CAT, DOG]);
  });

  it('takes its protocol from the application config by default', () => {
    const evaluator = new DetectionEvaluator(new AnnotationStore(dataset), { logger: createSilentLogger() });

    expect(evaluator.params.maxDets).toEqual([1, 10, 100]);
    expect(evaluator.params.areaRangeLabels).toEqual(['all', 'small', 'medium', 'large']);
    expect(evaluator.params.iouThresholds).toHaveLength(10);
  });

  it('copies the ground truth it is given', () => {
    const store = new AnnotationStore(dataset);
    const evaluator = new DetectionEvaluator(store, { evaluation: DEFAULT_EVALUATION_CONFIG });

    expect(evaluator.groundTruth).not.toBe(store);
    expect(evaluator.groundTruth.toJSON()).toEqual(store.toJSON());
  });

  it('loads the ground truth from a file path', () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'boxeval-evaluator-'));
    try {
      const filePath = path.join(tempDir, 'instances.json');
      fs.writeFileSync(filePath, JSON.stringify(dataset));

      const evaluator = new DetectionEvaluator(filePath, { evaluation: DEFAULT_EVALUATION_CONFIG });
      expect(evaluator.groundTruth.getImageIds()).toEqual([1, 2, 3, 4]);
    } finally {
      fs.rmSync(tempDir, { recursive: true, force: true });
    }
  });

  it('rejects unsupported ground-truth sources and iou types', () => {
    const source: unknown = { images: [] };
    expect(() => new DetectionEvaluator(source as string, { evaluation: DEFAULT_EVALUATION_CONFIG })).toThrow(
      new ConfigurationError('Currently not support ground-truth source of type object')
    );
    expect(() => createEvaluator({ iouType: 'segm' })).toThrow(UnsupportedIoUTypeError);
  });

  it('rejects malformed batches', () => {
    const evaluator = createEvaluator();

    expect(() => evaluator.update([perfect(1)], [{ imageId: 1 }, { imageId: 2 }])).toThrow(
      new InputContractError('Received 1 predictions for 2 targets')
    );
    expect(() => evaluator.update(...batch([[1, perfect(1)], [1, perfect(1)]]))).toThrow(
      new InputContractError('Image id 1 appears more than once in the batch')
    );
    expect(() => evaluator.update(...batch([[9, perfect(1)]]))).toThrow(
      new InputContractError('Results do not correspond to the annotation set: unknown image ids 9')
    );
    expect(evaluator.snapshot()).toEqual({ imageIds: [], evaluations: [] });
  });

  it('scores perfect predictions at full precision', async () => {
    const evaluator = createEvaluator();
    evaluator.update(...batch([1, 2, 3, 4].map((imageId): [number, Prediction] => [imageId, perfect(imageId)])));

    const result = await evaluator.compute();

    expect(Object.keys(result.metrics)).toEqual(['AP', 'AP50', 'AP75', 'APs', 'APm', 'APl']);
    expect(result.metrics.AP).toBeCloseTo(100, 10);
    expect(result.metrics.AP50).toBeCloseTo(100, 10);
    expect(result.metrics.AP75).toBeCloseTo(100, 10);
    expect(result.metrics.APs).toBeCloseTo(100, 10);
    expect(result.metrics.APm).toBeCloseTo(100, 10);
    // no ground truth is large enough
    expect(result.metrics.APl).toBeNaN();
    expect(result.stats[11]).toBeNaN();
    expect(result.summaryLines).toHaveLength(12);
  });

  it('returns NaN metrics without failing when nothing was predicted', async () => {
    const logger = createSilentLogger();
    const warn = vi.spyOn(logger, 'warn');
    const evaluator = createEvaluator({ logger });
    const empty: Prediction = { boxes: [], scores: [], labels: [] };
    evaluator.update(...batch([[1, empty], [2, empty]]));

    const result = await evaluator.compute();

    expect(Object.values(result.metrics).every(value => Number.isNaN(value))).toBe(true);
    expect(Object.keys(result.metrics)).toHaveLength(6);
    expect(result.perCategory).toBeNull();
    expect(warn).toHaveBeenCalledWith({ component: 'evaluation' }, 'No predictions from the model!');
  });

  it('reaches the same result across ranks as a single evaluator over every image', async () => {
    const single = createEvaluator();
    single.update(...batch([1, 2, 3, 4].map((imageId): [number, Prediction] => [imageId, mixed[imageId]])));
    const expected = await single.compute();

    const [rankZero, rankOne] = createLocalCollectiveGroup<PartialEvaluationState>(2);
    const first = createEvaluator({ collective: rankZero });
    const second = createEvaluator({ collective: rankOne });
    first.update(...batch([[2, mixed[2]], [1, mixed[1]]]));
    second.update(...batch([[3, mixed[3]]]));
    second.update(...batch([[4, mixed[4]]]));

    const [fromFirst, fromSecond] = await Promise.all([first.compute(), second.compute()]);

    expect(expected.metrics.AP).toBeLessThan(100);
    expect(fromFirst.metrics).toEqual(expected.metrics);
    expect(fromSecond.metrics).toEqual(expected.metrics);
    expect(fromFirst.stats).toEqual(expected.stats);
  });

  it('accepts an empty prediction for an image outside the ground truth', async () => {
    const evaluator = createEvaluator();
    const empty: Prediction = { boxes: [], scores: [], labels: [] };
    evaluator.update(...batch([[1, perfect(1)], [9, empty]]));

    const state = evaluator.snapshot();
    expect(state.imageIds).toEqual([1, 9]);
    expect(state.evaluations[0].cells.every(byArea => byArea.every(byImage => byImage[1] === null))).toBe(true);

    const result = await evaluator.compute();
    expect(result.metrics.AP).toBeCloseTo(100, 10);
  });

  it('fails on every rank when ranks match at different IoU thresholds', async () => {
    const [rankZero, rankOne] = createLocalCollectiveGroup<PartialEvaluationState>(2);
    const first = createEvaluator({ collective: rankZero });
    const second = createEvaluator({
      collective: rankOne,
      evaluation: { ...DEFAULT_EVALUATION_CONFIG, iouThresholds: { start: 0.5, stop: 0.7, count: 5 } }
    });
    first.update(...batch([[1, mixed[1]]]));
    second.update(...batch([[2, mixed[2]]]));

    const outcomes = await Promise.allSettled([first.compute(), second.compute()]);

    expect(outcomes.map(outcome => outcome.status)).toEqual(['rejected', 'rejected']);
    outcomes.forEach(outcome => {
      expect(outcome.status === 'rejected' ? outcome.reason : null).toBeInstanceOf(ConfigurationError);
    });
  });

  it('fails on every rank when ranks keep a different number of detections', async () => {
    const [rankZero, rankOne] = createLocalCollectiveGroup<PartialEvaluationState>(2);
    const first = createEvaluator({ collective: rankZero });
    const second = createEvaluator({
      collective: rankOne,
      evaluation: { ...DEFAULT_EVALUATION_CONFIG, maxDets: [1, 10, 50] }
    });
    first.update(...batch([[1, mixed[1]]]));
    second.update(...batch([[2, mixed[2]]]));

    const outcomes = await Promise.allSettled([first.compute(), second.compute()]);
    const messages = outcomes.map(outcome =>
      outcome.status === 'rejected' && outcome.reason instanceof ConfigurationError ? outcome.reason.message : null
    );

    expect(messages[0]).toMatch(/maxDets 50 but .* maxDets 100 was expected$/);
    expect(messages[1]).toMatch(/maxDets 100 but .* maxDets 50 was expected$/);
  });

  it('keeps the lower rank evaluation of an image seen twice', async () => {
    const single = createEvaluator();
    single.update(...batch([1, 2, 3, 4].map((imageId): [number, Prediction] => [imageId, mixed[imageId]])));
    const expected = await single.compute();

    const [rankZero, rankOne] = createLocalCollectiveGroup<PartialEvaluationState>(2);
    const first = createEvaluator({ collective: rankZero });
    const second = createEvaluator({ collective: rankOne });
    first.update(...batch([[1, mixed[1]], [2, mixed[2]]]));
    const wrong = toPrediction([{ bbox: [150, 150, 10, 10], categoryId: DOG, score: 0.99 }]);
    second.update(...batch([[2, wrong], [3, mixed[3]], [4, mixed[4]]]));

    const [fromFirst, fromSecond] = await Promise.all([first.compute(), second.compute()]);

    expect(fromFirst.metrics).toEqual(expected.metrics);
    expect(fromSecond.metrics).toEqual(expected.metrics);
  });

  it('reports AP per category when given class names', async () => {
    const evaluator = createEvaluator();
    evaluator.update(...batch([1, 2, 3, 4].map((imageId): [number, Prediction] => [imageId, mixed[imageId]])));

    const result = await evaluator.compute({ classNames: ['dog', 'cat'] });

    expect(result.perCategory?.map(entry => [entry.category, entry.categoryId])).toEqual([
      ['dog', DOG],
      ['cat', CAT]
    ]);
    expect(result.metrics['AP-cat']).toBeCloseTo(100, 10);
    expect(result.metrics['AP-dog']).toBe(result.perCategory?.[0].ap);
    expect(result.categoryTable?.split('\n')[0]).toBe('| category   | AP     | category   | AP      |');

    await expect(evaluator.compute({ classNames: ['dog', 'cat', 'bird'] })).rejects.toThrow(
      new InputContractError('Received 3 class names for 2 evaluated categories')
    );
  });

  it('computes repeatably and re-derives results without gathering', async () => {
    const evaluator = createEvaluator();
    evaluator.update(...batch([[3, mixed[3]], [1, mixed[1]]]));

    const first = await evaluator.compute();
    const second = await evaluator.compute();

    expect(second).toEqual(first);
    expect(evaluator.deriveResults()).toEqual(first);
  });

  it('leaves copying to the collective and returns copies from snapshot', async () => {
    const allGather = vi.fn(async (value: PartialEvaluationState) => [value]);
    const collective: Collective<PartialEvaluationState> = { rank: 0, worldSize: 1, allGather };
    const evaluator = createEvaluator({ collective });
    evaluator.update(...batch([[1, perfect(1)]]));

    await evaluator.compute();
    await evaluator.compute();

    expect(allGather).toHaveBeenCalledTimes(2);
    expect(allGather.mock.calls[1][0].evaluations).toBe(allGather.mock.calls[0][0].evaluations);

    const copy = evaluator.snapshot();
    expect(copy).toEqual(allGather.mock.calls[0][0]);
    expect(copy.evaluations).not.toBe(allGather.mock.calls[0][0].evaluations);
    copy.imageIds.push(99);
    expect(evaluator.snapshot().imageIds).toEqual([1]);
  });

  it('forgets every update on reset', async () => {
    const evaluator = createEvaluator();
    evaluator.update(...batch([[1, perfect(1)]]));
    await evaluator.compute();

    evaluator.reset();

    expect(evaluator.snapshot()).toEqual({ imageIds: [], evaluations: [] });
    const result = await evaluator.compute();
    expect(result.metrics.AP).toBeNaN();
  });

  it('records update and compute telemetry', async () => {
    const registry = new MetricsRegistry();
    const evaluator = createEvaluator({ metrics: registry });
    const empty: Prediction = { boxes: [], scores: [], labels: [] };
    evaluator.update(...batch([[1, perfect(1)], [2, perfect(2)], [3, empty]]));
    await evaluator.compute();

    expect(registry.getCounter('evaluator.updates')).toBe(1);
    expect(registry.getCounter('evaluator.images')).toBe(3);
    expect(registry.getCounter('evaluator.detections')).toBe(3);
    expect(registry.getCounter('evaluator.emptyImages')).toBe(1);

    const snapshot = registry.snapshot();
    expect(snapshot.latencies['evaluator.update'].count).toBe(1);
    expect(snapshot.latencies['evaluator.merge'].count).toBe(1);
    expect(snapshot.latencies['evaluator.accumulate'].count).toBe(1);
    expect(snapshot.histograms['evaluator.batch.detections']).toEqual({ '2-5': 1 });
  });
});
