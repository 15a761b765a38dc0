import { AnnotationStore } from '../annotations/store.js';
import { getEvaluationConfig, validateEvaluationConfig, type EvaluationConfig } from '../config/index.js';
import { SingleProcessCollective, type Collective } from '../distributed/collective.js';
import { ConfigurationError, InputContractError } from '../errors.js';
import defaultLogger, { type Logger } from '../logger.js';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import type { Prediction, Target } from '../types.js';
import { evaluateImages, sortedUnique, type EvaluationTensor } from './imageEvaluator.js';
import { mergeEvaluations, type PartialEvaluationState, type TensorLayout } from './merge.js';
import { createEvaluationParams, maxDetectionsPerImage, type EvaluationParams } from './params.js';
import { deriveResults, type SummaryMetrics } from './report.js';
import { assertBoxIouType, ResultFormatter } from './resultFormatter.js';
import { accumulateEvaluations, summarizeEvaluation, type EvaluationSummary } from './statistics.js';

export type GroundTruthSource = string | AnnotationStore;

export type DetectionEvaluatorOptions = {
  iouType?: string;
  /** Evaluation protocol; defaults to the `evaluation` section of the app config. */
  evaluation?: EvaluationConfig;
  collective?: Collective<PartialEvaluationState>;
  logger?: Logger;
  metrics?: MetricsRegistry;
};

export type ComputeOptions = {
  classNames?: readonly string[];
};

function resolveGroundTruth(source: GroundTruthSource): AnnotationStore {
  if (typeof source === 'string') {
    return AnnotationStore.fromFile(source);
  }
  if (source instanceof AnnotationStore) {
    return source.clone();
  }
  throw new ConfigurationError(`Currently not support ground-truth source of type ${typeof source}`);
}

function hasDetections(tensor: EvaluationTensor): boolean {
  return tensor.cells.some(byArea => byArea.some(byImage => byImage.some(cell => (cell?.detectionIds.length ?? 0) > 0)));
}

/**
 * COCO box evaluator that works across processes. Each participant feeds its
 * own batches through `update`; `compute` gathers every participant's
 * partial state, merges it and reports the same metrics on every rank.
 */
export class DetectionEvaluator {
  readonly groundTruth: AnnotationStore;
  readonly params: EvaluationParams;
  readonly iouType: 'bbox';
  private readonly formatter: ResultFormatter;
  private readonly layout: TensorLayout;
  private readonly collective: Collective<PartialEvaluationState>;
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;
  private imageIds: number[] = [];
  private evaluations: EvaluationTensor[] = [];
  private summary: EvaluationSummary | null = null;

  constructor(groundTruth: GroundTruthSource, options: DetectionEvaluatorOptions = {}) {
    const baseConfig = options.evaluation ?? getEvaluationConfig();
    const iouType = options.iouType ?? baseConfig.iouType;
    assertBoxIouType(iouType);
    const evaluation: EvaluationConfig = { ...baseConfig, iouType };
    validateEvaluationConfig(evaluation, 'evaluation');

    this.iouType = iouType;
    this.groundTruth = resolveGroundTruth(groundTruth);
    this.params = createEvaluationParams(evaluation);
    this.formatter = new ResultFormatter(this.groundTruth.getCategoryIds());
    this.layout = {
      categoryIds: sortedUnique(this.groundTruth.getCategoryIds()),
      areaRanges: this.params.areaRanges,
      iouThresholds: this.params.iouThresholds,
      maxDets: maxDetectionsPerImage(this.params)
    };
    this.collective = options.collective ?? new SingleProcessCollective<PartialEvaluationState>();
    this.log = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;
  }

  get contiguousToJsonCategory(): readonly number[] {
    return this.formatter.contiguousToJsonCategory;
  }

  /** Evaluates one batch and keeps the per-cell results for `compute`. */
  update(predictions: readonly Prediction[], targets: readonly Target[]): void {
    if (predictions.length !== targets.length) {
      throw new InputContractError(
        `Received ${predictions.length} predictions for ${targets.length} targets`
      );
    }

    const batch = new Map<number, Prediction>();
    targets.forEach((target, index) => {
      const { imageId } = target;
      if (!Number.isInteger(imageId)) {
        throw new InputContractError(`Target #${index} has a non-integer image id ${imageId}`);
      }
      if (batch.has(imageId)) {
        throw new InputContractError(`Image id ${imageId} appears more than once in the batch`);
      }
      batch.set(imageId, predictions[index]);
    });

    this.metrics.timeSync('evaluator.update', () => {
      const records = this.formatter.format(batch, this.iouType);
      const detections = this.groundTruth.loadResults(records);
      const imageIds = sortedUnique(batch.keys());
      const tensor = evaluateImages({
        groundTruth: this.groundTruth,
        detections,
        imageIds,
        params: this.params
      });

      this.imageIds.push(...imageIds);
      this.evaluations.push(tensor);

      const emptyImages = predictions.filter(prediction => prediction.boxes.length === 0).length;
      this.metrics.incrementCounter('evaluator.updates');
      this.metrics.incrementCounter('evaluator.images', imageIds.length);
      this.metrics.incrementCounter('evaluator.detections', records.length);
      this.metrics.incrementCounter('evaluator.emptyImages', emptyImages);
      this.metrics.observeCount('evaluator.batch.detections', records.length);
      this.log.debug(
        { component: 'evaluator', images: imageIds.length, detections: records.length, emptyImages },
        'Evaluated batch'
      );
    });
  }

  /** A copy of this participant's accumulated state, as exchanged by the gather. */
  snapshot(): PartialEvaluationState {
    return structuredClone({ imageIds: this.imageIds, evaluations: this.evaluations });
  }

  async compute(options: ComputeOptions = {}): Promise<SummaryMetrics> {
    const gathered = await this.metrics.time('evaluator.gather', () =>
      this.collective.allGather({ imageIds: this.imageIds, evaluations: this.evaluations })
    );
    const merged = this.metrics.timeSync('evaluator.merge', () => mergeEvaluations(gathered, this.layout));
    this.log.debug(
      {
        component: 'evaluator',
        participants: gathered.length,
        images: merged.imageIds.length
      },
      'Merged evaluations'
    );

    if (!hasDetections(merged)) {
      this.summary = null;
      return deriveResults(null, { logger: this.log });
    }

    this.summary = this.metrics.timeSync('evaluator.accumulate', () =>
      summarizeEvaluation(accumulateEvaluations(merged, this.params))
    );
    this.log.debug({ component: 'evaluator' }, `Summary:\n${this.summary.lines.join('\n')}`);
    return deriveResults(this.summary, { classNames: options.classNames, logger: this.log });
  }

  /** Re-derives the report from the last `compute` without gathering again. */
  deriveResults(classNames?: readonly string[]): SummaryMetrics {
    return deriveResults(this.summary, { classNames, logger: this.log });
  }

  reset(): void {
    this.imageIds = [];
    this.evaluations = [];
    this.summary = null;
  }
}
