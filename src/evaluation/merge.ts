import { ConfigurationError } from '../errors.js';
import type { EvaluationTensor, ImageEvaluation } from './imageEvaluator.js';
import type { AreaRange } from './params.js';

/** What one participant contributes to the gather. */
export type PartialEvaluationState = {
  imageIds: number[];
  evaluations: EvaluationTensor[];
};

export type TensorLayout = {
  categoryIds: readonly number[];
  areaRanges: readonly AreaRange[];
  iouThresholds: readonly number[];
  maxDets: number;
};

function sameNumbers(a: readonly number[], b: readonly number[]) {
  return a.length === b.length && a.every((value, index) => value === b[index]);
}

function describeLayout(layout: TensorLayout) {
  const ranges = layout.areaRanges.map(([min, max]) => `[${min}, ${max}]`).join(', ');
  return (
    `categories [${layout.categoryIds.join(', ')}], area ranges ${ranges}, ` +
    `IoU thresholds [${layout.iouThresholds.join(', ')}], maxDets ${layout.maxDets}`
  );
}

export function assertLayout(tensor: TensorLayout, expected: TensorLayout, label: string) {
  const matches =
    sameNumbers(tensor.categoryIds, expected.categoryIds) &&
    sameNumbers(tensor.iouThresholds, expected.iouThresholds) &&
    tensor.maxDets === expected.maxDets &&
    tensor.areaRanges.length === expected.areaRanges.length &&
    tensor.areaRanges.every((range, index) => sameNumbers(range, expected.areaRanges[index]));
  if (!matches) {
    throw new ConfigurationError(
      `${label} was evaluated with ${describeLayout(tensor)} but ${describeLayout(expected)} was expected`
    );
  }
}

/**
 * Joins tensors along the image axis, keeping their order. Every tensor must
 * share the expected layout: categories, area ranges, IoU thresholds and the
 * detection cap.
 */
export function concatenateEvaluations(tensors: readonly EvaluationTensor[], layout: TensorLayout): EvaluationTensor {
  tensors.forEach((tensor, index) => assertLayout(tensor, layout, `evaluation tensor #${index}`));

  const categoryIds = [...layout.categoryIds];
  const areaRanges = [...layout.areaRanges];
  const cells = categoryIds.map((_, k) =>
    areaRanges.map((__, a) => tensors.flatMap(tensor => tensor.cells[k][a]))
  );

  return {
    categoryIds,
    areaRanges,
    iouThresholds: [...layout.iouThresholds],
    maxDets: layout.maxDets,
    imageIds: tensors.flatMap(tensor => tensor.imageIds),
    cells
  };
}

/**
 * Reassembles the gathered per-participant states into one tensor whose
 * image axis lists every image id once, ascending. When an id appears more
 * than once the first occurrence in participant order wins.
 */
export function mergeEvaluations(states: readonly PartialEvaluationState[], layout: TensorLayout): EvaluationTensor {
  const imageIds = states.flatMap(state => state.imageIds);
  const tensors = states.flatMap((state, rank) => {
    state.evaluations.forEach((tensor, index) =>
      assertLayout(tensor, layout, `participant ${rank} evaluation #${index}`)
    );
    return state.evaluations;
  });
  const concatenated = concatenateEvaluations(tensors, layout);

  if (concatenated.imageIds.length !== imageIds.length) {
    throw new ConfigurationError(
      `Gathered ${imageIds.length} image ids but ${concatenated.imageIds.length} evaluated images`
    );
  }

  const firstOccurrence = new Map<number, number>();
  imageIds.forEach((imageId, index) => {
    if (!firstOccurrence.has(imageId)) {
      firstOccurrence.set(imageId, index);
    }
  });
  const mergedIds = Array.from(firstOccurrence.keys()).sort((a, b) => a - b);
  const selection = mergedIds.map(imageId => firstOccurrence.get(imageId) ?? -1);

  const cells = concatenated.cells.map(byArea =>
    byArea.map(byImage => selection.map((index): ImageEvaluation | null => byImage[index]))
  );

  return {
    categoryIds: concatenated.categoryIds,
    areaRanges: concatenated.areaRanges,
    iouThresholds: concatenated.iouThresholds,
    maxDets: concatenated.maxDets,
    imageIds: mergedIds,
    cells
  };
}
