import type { AnnotationStore, DetectionIndex } from '../annotations/store.js';
import type { Annotation } from '../types.js';
import { computeIouMatrix, type IouMatrix } from './boxes.js';
import { maxDetectionsPerImage, type AreaRange, type EvaluationParams } from './params.js';

/** Match entries hold the partner annotation id; this marks "no partner". */
export const UNMATCHED = 0;

/**
 * Outcome of matching one (image, category, area range) cell. Matches are
 * indexed [iouThreshold][detection] and [iouThreshold][groundTruth].
 */
export type ImageEvaluation = {
  imageId: number;
  categoryId: number;
  areaRange: AreaRange;
  maxDets: number;
  detectionIds: number[];
  groundTruthIds: number[];
  detectionMatches: number[][];
  groundTruthMatches: number[][];
  detectionScores: number[];
  groundTruthIgnore: boolean[];
  detectionIgnore: boolean[][];
};

/**
 * Cells indexed [category][areaRange][image]; `null` marks an empty cell.
 * `iouThresholds` and `maxDets` record the protocol the cells were matched with.
 */
export type EvaluationTensor = {
  categoryIds: number[];
  areaRanges: AreaRange[];
  iouThresholds: number[];
  maxDets: number;
  imageIds: number[];
  cells: Array<Array<Array<ImageEvaluation | null>>>;
};

export function sortedUnique(values: Iterable<number>): number[] {
  return Array.from(new Set(values)).sort((a, b) => a - b);
}

/** Stable sort by descending score, then keep the first `maxDets`. */
export function rankDetections(detections: readonly Annotation[], maxDets: number): Annotation[] {
  return [...detections].sort((a, b) => (b.score ?? 0) - (a.score ?? 0)).slice(0, maxDets);
}

export function computeCellIou(groundTruths: readonly Annotation[], rankedDetections: readonly Annotation[]): IouMatrix {
  return computeIouMatrix(
    rankedDetections.map(detection => detection.bbox),
    groundTruths.map(groundTruth => groundTruth.bbox),
    groundTruths.map(groundTruth => groundTruth.iscrowd === 1)
  );
}

function outsideRange(area: number, [min, max]: AreaRange) {
  return area < min || area > max;
}

export function evaluateImage(
  imageId: number,
  categoryId: number,
  groundTruths: readonly Annotation[],
  rankedDetections: readonly Annotation[],
  ious: IouMatrix,
  areaRange: AreaRange,
  maxDets: number,
  iouThresholds: readonly number[]
): ImageEvaluation | null {
  if (groundTruths.length === 0 && rankedDetections.length === 0) {
    return null;
  }

  const ignoreFlags = groundTruths.map(gt => gt.iscrowd === 1 || outsideRange(gt.area, areaRange));
  const order = groundTruths
    .map((_, index) => index)
    .sort((a, b) => Number(ignoreFlags[a]) - Number(ignoreFlags[b]));
  const gts = order.map(index => groundTruths[index]);
  const gtIgnore = order.map(index => ignoreFlags[index]);
  const crowd = gts.map(gt => gt.iscrowd === 1);
  const dts = rankedDetections.slice(0, maxDets);
  const cellIous = ious.isEmpty ? ious : ious.selectColumns(order);

  const gtMatches = iouThresholds.map(() => new Array<number>(gts.length).fill(UNMATCHED));
  const dtMatches = iouThresholds.map(() => new Array<number>(dts.length).fill(UNMATCHED));
  const dtIgnore = iouThresholds.map(() => new Array<boolean>(dts.length).fill(false));

  if (!cellIous.isEmpty) {
    iouThresholds.forEach((threshold, t) => {
      const gtm = gtMatches[t];
      dts.forEach((dt, d) => {
        let best = Math.min(threshold, 1 - 1e-10);
        let match = -1;
        for (let g = 0; g < gts.length; g += 1) {
          // crowd regions absorb any number of detections
          if (gtm[g] !== UNMATCHED && !crowd[g]) {
            continue;
          }
          // a real match is held and only ignored ground truths remain
          if (match > -1 && !gtIgnore[match] && gtIgnore[g]) {
            break;
          }
          const iou = cellIous.get(d, g);
          if (iou < best) {
            continue;
          }
          best = iou;
          match = g;
        }
        if (match === -1) {
          return;
        }
        dtIgnore[t][d] = gtIgnore[match];
        dtMatches[t][d] = gts[match].id;
        gtm[match] = dt.id;
      });
    });
  }

  const detectionOutside = dts.map(dt => outsideRange(dt.area, areaRange));
  dtIgnore.forEach((row, t) => {
    row.forEach((ignored, d) => {
      row[d] = ignored || (dtMatches[t][d] === UNMATCHED && detectionOutside[d]);
    });
  });

  return {
    imageId,
    categoryId,
    areaRange,
    maxDets,
    detectionIds: dts.map(dt => dt.id),
    groundTruthIds: gts.map(gt => gt.id),
    detectionMatches: dtMatches,
    groundTruthMatches: gtMatches,
    detectionScores: dts.map(dt => dt.score ?? 0),
    groundTruthIgnore: gtIgnore,
    detectionIgnore: dtIgnore
  };
}

export type EvaluateImagesOptions = {
  groundTruth: AnnotationStore;
  detections: DetectionIndex;
  imageIds: Iterable<number>;
  params: EvaluationParams;
};

/**
 * Runs the cell evaluation over images × categories × area ranges at the
 * largest detection cap. IoU matrices are computed once per (image,
 * category) and shared by every area range.
 */
export function evaluateImages({ groundTruth, detections, imageIds, params }: EvaluateImagesOptions): EvaluationTensor {
  const images = sortedUnique(imageIds);
  const categoryIds = sortedUnique(groundTruth.getCategoryIds());
  const maxDets = maxDetectionsPerImage(params);
  const areaRanges = [...params.areaRanges];

  const cells = categoryIds.map(categoryId => {
    const perImage = images.map(imageId => {
      const gts = groundTruth.getAnnotations(imageId, categoryId);
      const dts = rankDetections(detections.get(imageId, categoryId), maxDets);
      return { imageId, gts, dts, ious: computeCellIou(gts, dts) };
    });

    return areaRanges.map(areaRange =>
      perImage.map(({ imageId, gts, dts, ious }) =>
        evaluateImage(imageId, categoryId, gts, dts, ious, areaRange, maxDets, params.iouThresholds)
      )
    );
  });

  return {
    categoryIds,
    areaRanges,
    iouThresholds: [...params.iouThresholds],
    maxDets,
    imageIds: images,
    cells
  };
}
