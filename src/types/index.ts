/** Bounding box in pixel coordinates (corner + corner) */
export interface BoxBounds {
  x_min: number;
  y_min: number;
  x_max: number;
  y_max: number;
}

/** A named, coloured label category. `id` is its index in the class list. */
export interface ClassDefinition {
  id: number;
  name: string;
  color: string; // RGB hex, e.g. "#FF0000"
}

/** A single bounding box annotation on an image */
export interface Annotation extends BoxBounds {
  id: string;
  class_id: number;
  /** Class name at assignment time; `class_id` is authoritative */
  class_name: string;
  created_at: string;
  modified_at: string;
}

/** An image tracked by the project, with its annotations */
export interface ImageData {
  filename: string;
  filepath: string;
  width: number;
  height: number;
  annotations: Annotation[];
}

/** Root aggregate persisted as a single JSON document */
export interface Project {
  version: string;
  created_at: string;
  modified_at: string;
  image_folder: string;
  classes: ClassDefinition[];
  images: ImageData[];
}

/** Per-image row for image lists */
export interface ImageSummary {
  filename: string;
  width: number;
  height: number;
  annotationCount: number;
  hasAnnotations: boolean;
}

/** Result of syncing the image list with the image folder */
export interface ReconcileResult {
  added: number;
  removed: number;
}

/** Outcome of a class deletion */
export type DeleteClassResult =
  | { ok: true }
  | { ok: false; reason: 'in-use' | 'not-found' | 'last-class' };

/** Supported export formats */
export type ExportFormat = 'coco' | 'pascal-voc' | 'yolo';

/** How existing exports are pulled into unannotated images */
export type ImportPolicy = 'first-match' | 'merge';
