import type { EvaluationTensor, ImageEvaluation } from './imageEvaluator.js';
import { UNMATCHED } from './imageEvaluator.js';
import type { EvaluationParams } from './params.js';

/** Machine epsilon, added to the precision denominator. */
const EPSILON = 2.220446049250313e-16;
const PAIRWISE_BLOCK = 128;

/**
 * Precision and score arrays are laid out [iou, recall, category, area,
 * maxDets] and recall [iou, category, area, maxDets], row-major. Entries
 * that could not be computed hold -1.
 */
export type AccumulatedEvaluation = {
  params: EvaluationParams;
  categoryIds: number[];
  imageIds: number[];
  shape: readonly [number, number, number, number, number];
  precision: Float64Array;
  recall: Float64Array;
  scores: Float64Array;
};

export type EvaluationSummary = {
  accumulated: AccumulatedEvaluation;
  stats: number[];
  statNames: string[];
  lines: string[];
};

export function precisionIndex(
  shape: AccumulatedEvaluation['shape'],
  t: number,
  r: number,
  k: number,
  a: number,
  m: number
): number {
  const [, R, K, A, M] = shape;
  return (((t * R + r) * K + k) * A + a) * M + m;
}

export function recallIndex(shape: AccumulatedEvaluation['shape'], t: number, k: number, a: number, m: number): number {
  const [, , K, A, M] = shape;
  return ((t * K + k) * A + a) * M + m;
}

/** First index whose value is >= `target` in an ascending array. */
function searchSortedLeft(values: Float64Array, length: number, target: number): number {
  let low = 0;
  let high = length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (values[mid] < target) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}

/** Blocked pairwise summation: eight running lanes per leaf of at most 128 values. */
export function pairwiseSum(values: ArrayLike<number>, start = 0, count = values.length - start): number {
  if (count < 8) {
    let sum = 0;
    for (let index = 0; index < count; index += 1) {
      sum += values[start + index];
    }
    return sum;
  }
  if (count <= PAIRWISE_BLOCK) {
    const partial = [0, 1, 2, 3, 4, 5, 6, 7].map(offset => values[start + offset]);
    let index = 8;
    for (; index < count - (count % 8); index += 8) {
      for (let lane = 0; lane < 8; lane += 1) {
        partial[lane] += values[start + index + lane];
      }
    }
    let sum = partial[0] + partial[1] + (partial[2] + partial[3]) + (partial[4] + partial[5] + (partial[6] + partial[7]));
    for (; index < count; index += 1) {
      sum += values[start + index];
    }
    return sum;
  }
  let half = Math.floor(count / 2);
  half -= half % 8;
  return pairwiseSum(values, start, half) + pairwiseSum(values, start + half, count - half);
}

/** Mean of the entries above -1, or -1 when there are none. */
export function meanOfValid(values: readonly number[]): number {
  const valid = values.filter(value => value > -1);
  if (valid.length === 0) {
    return -1;
  }
  return pairwiseSum(valid) / valid.length;
}

/**
 * Builds precision/recall curves per (category, area range, detection cap)
 * and IoU threshold from the merged cell evaluations.
 */
export function accumulateEvaluations(tensor: EvaluationTensor, params: EvaluationParams): AccumulatedEvaluation {
  const T = params.iouThresholds.length;
  const R = params.recallThresholds.length;
  const K = tensor.categoryIds.length;
  const A = tensor.areaRanges.length;
  const M = params.maxDets.length;
  const shape = [T, R, K, A, M] as const;

  const precision = new Float64Array(T * R * K * A * M).fill(-1);
  const scores = new Float64Array(T * R * K * A * M).fill(-1);
  const recall = new Float64Array(T * K * A * M).fill(-1);

  for (let k = 0; k < K; k += 1) {
    for (let a = 0; a < A; a += 1) {
      const evaluations = tensor.cells[k][a].filter((cell): cell is ImageEvaluation => cell !== null);
      if (evaluations.length === 0) {
        continue;
      }

      params.maxDets.forEach((maxDet, m) => {
        const detectionScores = evaluations.flatMap(cell => cell.detectionScores.slice(0, maxDet));
        const order = detectionScores.map((_, index) => index).sort((x, y) => detectionScores[y] - detectionScores[x]);
        const sortedScores = order.map(index => detectionScores[index]);

        const nonIgnoredGroundTruths = evaluations.reduce(
          (count, cell) => count + cell.groundTruthIgnore.filter(ignored => !ignored).length,
          0
        );
        if (nonIgnoredGroundTruths === 0) {
          return;
        }

        const detectionCount = order.length;
        const cumulativeRecall = new Float64Array(detectionCount);
        const cumulativePrecision = new Float64Array(detectionCount);

        for (let t = 0; t < T; t += 1) {
          const matches = evaluations.flatMap(cell => cell.detectionMatches[t].slice(0, maxDet));
          const ignored = evaluations.flatMap(cell => cell.detectionIgnore[t].slice(0, maxDet));

          let tp = 0;
          let fp = 0;
          order.forEach((index, position) => {
            if (!ignored[index]) {
              if (matches[index] !== UNMATCHED) {
                tp += 1;
              } else {
                fp += 1;
              }
            }
            cumulativeRecall[position] = tp / nonIgnoredGroundTruths;
            cumulativePrecision[position] = tp / (fp + tp + EPSILON);
          });

          recall[recallIndex(shape, t, k, a, m)] =
            detectionCount > 0 ? cumulativeRecall[detectionCount - 1] : 0;

          for (let index = detectionCount - 1; index > 0; index -= 1) {
            if (cumulativePrecision[index] > cumulativePrecision[index - 1]) {
              cumulativePrecision[index - 1] = cumulativePrecision[index];
            }
          }

          for (let r = 0; r < R; r += 1) {
            const position = searchSortedLeft(cumulativeRecall, detectionCount, params.recallThresholds[r]);
            const offset = precisionIndex(shape, t, r, k, a, m);
            if (position >= detectionCount) {
              // unreachable recall levels keep zero precision
              for (let rest = r; rest < R; rest += 1) {
                const restOffset = precisionIndex(shape, t, rest, k, a, m);
                precision[restOffset] = 0;
                scores[restOffset] = 0;
              }
              break;
            }
            precision[offset] = cumulativePrecision[position];
            scores[offset] = sortedScores[position];
          }
        }
      });
    }
  }

  return {
    params,
    categoryIds: [...tensor.categoryIds],
    imageIds: [...tensor.imageIds],
    shape,
    precision,
    recall,
    scores
  };
}

type SliceSpec = {
  averagePrecision: boolean;
  iouThreshold?: number;
  areaLabel: string;
  maxDets: number;
};

function summarizeSlice(accumulated: AccumulatedEvaluation, spec: SliceSpec): number {
  const { params, shape } = accumulated;
  const [T, R, K] = shape;
  const a = params.areaRangeLabels.indexOf(spec.areaLabel);
  const m = params.maxDets.indexOf(spec.maxDets);
  if (a < 0 || m < 0) {
    return -1;
  }

  const thresholds: number[] = [];
  for (let t = 0; t < T; t += 1) {
    if (spec.iouThreshold === undefined || params.iouThresholds[t] === spec.iouThreshold) {
      thresholds.push(t);
    }
  }

  const values: number[] = [];
  for (const t of thresholds) {
    if (spec.averagePrecision) {
      for (let r = 0; r < R; r += 1) {
        for (let k = 0; k < K; k += 1) {
          values.push(accumulated.precision[precisionIndex(shape, t, r, k, a, m)]);
        }
      }
    } else {
      for (let k = 0; k < K; k += 1) {
        values.push(accumulated.recall[recallIndex(shape, t, k, a, m)]);
      }
    }
  }
  return meanOfValid(values);
}

function formatSummaryLine(params: EvaluationParams, spec: SliceSpec, value: number): string {
  const title = spec.averagePrecision ? 'Average Precision' : 'Average Recall';
  const type = spec.averagePrecision ? '(AP)' : '(AR)';
  const first = params.iouThresholds[0] ?? 0;
  const last = params.iouThresholds[params.iouThresholds.length - 1] ?? 0;
  const iou =
    spec.iouThreshold === undefined
      ? `${first.toFixed(2)}:${last.toFixed(2)}`
      : spec.iouThreshold.toFixed(2);
  return ` ${title.padEnd(18)} ${type} @[ IoU=${iou.padEnd(9)} | area=${spec.areaLabel.padStart(6)} | maxDets=${String(
    spec.maxDets
  ).padStart(3)} ] = ${value.toFixed(3)}`;
}

/**
 * The twelve standard box statistics: AP averaged over IoU thresholds, at
 * 0.50 and 0.75, per object size, then AR per detection cap and object size.
 */
export function summarizeEvaluation(accumulated: AccumulatedEvaluation): EvaluationSummary {
  const { maxDets } = accumulated.params;
  const capAt = (index: number) => maxDets[Math.min(index, maxDets.length - 1)] ?? 0;
  const largest = capAt(maxDets.length - 1);

  const specs: Array<[string, SliceSpec]> = [
    ['AP', { averagePrecision: true, areaLabel: 'all', maxDets: largest }],
    ['AP50', { averagePrecision: true, iouThreshold: 0.5, areaLabel: 'all', maxDets: largest }],
    ['AP75', { averagePrecision: true, iouThreshold: 0.75, areaLabel: 'all', maxDets: largest }],
    ['APs', { averagePrecision: true, areaLabel: 'small', maxDets: largest }],
    ['APm', { averagePrecision: true, areaLabel: 'medium', maxDets: largest }],
    ['APl', { averagePrecision: true, areaLabel: 'large', maxDets: largest }],
    [`AR${capAt(0)}`, { averagePrecision: false, areaLabel: 'all', maxDets: capAt(0) }],
    [`AR${capAt(1)}`, { averagePrecision: false, areaLabel: 'all', maxDets: capAt(1) }],
    [`AR${capAt(2)}`, { averagePrecision: false, areaLabel: 'all', maxDets: capAt(2) }],
    ['ARs', { averagePrecision: false, areaLabel: 'small', maxDets: largest }],
    ['ARm', { averagePrecision: false, areaLabel: 'medium', maxDets: largest }],
    ['ARl', { averagePrecision: false, areaLabel: 'large', maxDets: largest }]
  ];

  const stats = specs.map(([, spec]) => summarizeSlice(accumulated, spec));
  return {
    accumulated,
    stats,
    statNames: specs.map(([name]) => name),
    lines: specs.map(([, spec], index) => formatSummaryLine(accumulated.params, spec, stats[index]))
  };
}

/**
 * AP of one category: precision averaged over IoU thresholds and recall
 * levels at the given area range and the largest detection cap.
 */
export function categoryAveragePrecision(accumulated: AccumulatedEvaluation, k: number, areaLabel = 'all'): number {
  const { params, shape } = accumulated;
  const [T, R] = shape;
  const a = params.areaRangeLabels.indexOf(areaLabel);
  const m = params.maxDets.length - 1;
  if (a < 0 || m < 0) {
    return -1;
  }
  const values: number[] = [];
  for (let t = 0; t < T; t += 1) {
    for (let r = 0; r < R; r += 1) {
      values.push(accumulated.precision[precisionIndex(shape, t, r, k, a, m)]);
    }
  }
  return meanOfValid(values);
}
