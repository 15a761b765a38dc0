/** `[x, y, width, height]`, the COCO box convention. */
export type BoundingBox = readonly [number, number, number, number];

/** `[x1, y1, x2, y2]`, the convention of detector output. */
export type BoxCorners = readonly [number, number, number, number];

export type IouType = 'bbox' | 'segm' | 'keypoints';

export interface Prediction {
  boxes: ReadonlyArray<BoxCorners>;
  scores: ArrayLike<number>;
  labels: ArrayLike<number>;
}

export interface Target {
  imageId: number;
}

export interface DetectionRecord {
  image_id: number;
  category_id: number;
  bbox: BoundingBox;
  score: number;
}

export interface AnnotationImage {
  id: number;
  width?: number;
  height?: number;
  file_name?: string;
  [key: string]: unknown;
}

export interface AnnotationCategory {
  id: number;
  name: string;
  supercategory?: string;
  [key: string]: unknown;
}

/** An annotation as it appears in a COCO file. */
export interface AnnotationInput {
  id: number;
  image_id: number;
  category_id: number;
  bbox: BoundingBox;
  area?: number;
  iscrowd?: number | boolean;
  ignore?: number;
  [key: string]: unknown;
}

/** An annotation after loading: area and crowd flag always present. */
export interface Annotation extends AnnotationInput {
  area: number;
  iscrowd: number;
  score?: number;
}

export interface AnnotationDataset {
  info?: Record<string, unknown>;
  licenses?: unknown[];
  images: AnnotationImage[];
  annotations: AnnotationInput[];
  categories: AnnotationCategory[];
}
