import type { EvaluationConfig, ThresholdRangeConfig } from '../config/index.js';

export type AreaRange = readonly [number, number];

export interface EvaluationParams {
  iouType: 'bbox';
  iouThresholds: readonly number[];
  recallThresholds: readonly number[];
  maxDets: readonly number[];
  areaRanges: readonly AreaRange[];
  areaRangeLabels: readonly string[];
}

/**
 * Evenly spaced samples computed as `index * step + start`, with the last one
 * pinned to `stop` so exact threshold lookups such as 0.75 succeed.
 */
export function linspace(start: number, stop: number, count: number): number[] {
  if (count <= 0) {
    return [];
  }
  if (count === 1) {
    return [start];
  }
  const step = (stop - start) / (count - 1);
  const values: number[] = [];
  for (let index = 0; index < count; index += 1) {
    values.push(index * step + start);
  }
  values[count - 1] = stop;
  return values;
}

function thresholdsFrom(range: ThresholdRangeConfig): number[] {
  return linspace(range.start, range.stop, range.count);
}

export const DEFAULT_EVALUATION_CONFIG: EvaluationConfig = {
  iouType: 'bbox',
  iouThresholds: { start: 0.5, stop: 0.95, count: 10 },
  recallThresholds: { start: 0, stop: 1, count: 101 },
  maxDets: [1, 10, 100],
  areaRanges: [
    { label: 'all', min: 0, max: 1e5 ** 2 },
    { label: 'small', min: 0, max: 32 ** 2 },
    { label: 'medium', min: 32 ** 2, max: 96 ** 2 },
    { label: 'large', min: 96 ** 2, max: 1e5 ** 2 }
  ]
};

export function createEvaluationParams(config: EvaluationConfig = DEFAULT_EVALUATION_CONFIG): EvaluationParams {
  const params: EvaluationParams = {
    iouType: 'bbox',
    iouThresholds: Object.freeze(thresholdsFrom(config.iouThresholds)),
    recallThresholds: Object.freeze(thresholdsFrom(config.recallThresholds)),
    maxDets: Object.freeze([...config.maxDets].sort((a, b) => a - b)),
    areaRanges: Object.freeze(
      config.areaRanges.map((range): AreaRange => Object.freeze([range.min, range.max] as const))
    ),
    areaRangeLabels: Object.freeze(config.areaRanges.map(range => range.label))
  };
  return Object.freeze(params);
}

export function maxDetectionsPerImage(params: EvaluationParams): number {
  return params.maxDets[params.maxDets.length - 1] ?? 0;
}
