import { randomUUID } from 'node:crypto';
import type { Annotation, BoxBounds, ClassDefinition, ImageData, Project } from '@/types';
import { DEFAULT_CLASS_COLOR, PROJECT_VERSION } from './constants';

type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Current time as an ISO-8601 UTC timestamp */
export function nowIso(): string {
  return new Date().toISOString();
}

function readString(data: JsonRecord, key: string, fallback: () => string): string {
  const value = data[key];
  return typeof value === 'string' ? value : fallback();
}

function readInt(data: JsonRecord, key: string, fallback = 0): number {
  const value = data[key];
  return typeof value === 'number' && Number.isFinite(value) ? Math.trunc(value) : fallback;
}

function readArray(data: JsonRecord, key: string): unknown[] {
  const value = data[key];
  return Array.isArray(value) ? value : [];
}

const empty = (): string => '';

// Geometry

export function isValidBox(box: BoxBounds): boolean {
  return box.x_max > box.x_min && box.y_max > box.y_min;
}

/** True when the box lies inside `[0, width] x [0, height]` */
export function isWithinImage(box: BoxBounds, width: number, height: number): boolean {
  return box.x_min >= 0 && box.y_min >= 0 && box.x_max <= width && box.y_max <= height;
}

/**
 * Force bounds inside the image while keeping a positive width and height.
 * The minimum corner is kept inside `[0, W-1] x [0, H-1]`.
 */
export function clampBox(box: BoxBounds, width: number, height: number): BoxBounds {
  const x_min = Math.max(0, Math.min(box.x_min, width - 1));
  const y_min = Math.max(0, Math.min(box.y_min, height - 1));
  return {
    x_min,
    y_min,
    x_max: Math.max(x_min + 1, Math.min(box.x_max, width)),
    y_max: Math.max(y_min + 1, Math.min(box.y_max, height)),
  };
}

export function clampToBounds(annotation: Annotation, width: number, height: number): void {
  setBounds(annotation, clampBox(annotation, width, height));
}

export function getBounds(box: BoxBounds): BoxBounds {
  return { x_min: box.x_min, y_min: box.y_min, x_max: box.x_max, y_max: box.y_max };
}

export function setBounds(target: BoxBounds, bounds: BoxBounds): void {
  target.x_min = bounds.x_min;
  target.y_min = bounds.y_min;
  target.x_max = bounds.x_max;
  target.y_max = bounds.y_max;
}

// Factories

export interface AnnotationInit extends BoxBounds {
  class_id: number;
  class_name: string;
}

export function createAnnotation(init: AnnotationInit): Annotation {
  const timestamp = nowIso();
  return {
    id: randomUUID(),
    class_id: init.class_id,
    class_name: init.class_name,
    x_min: init.x_min,
    y_min: init.y_min,
    x_max: init.x_max,
    y_max: init.y_max,
    created_at: timestamp,
    modified_at: timestamp,
  };
}

export function createProject(init: Partial<Project> = {}): Project {
  const timestamp = nowIso();
  return {
    version: init.version ?? PROJECT_VERSION,
    created_at: init.created_at ?? timestamp,
    modified_at: init.modified_at ?? timestamp,
    image_folder: init.image_folder ?? '',
    classes: init.classes ?? [],
    images: init.images ?? [],
  };
}

// Serialization

export function annotationToJson(annotation: Annotation): JsonRecord {
  return {
    id: annotation.id,
    class_id: annotation.class_id,
    class_name: annotation.class_name,
    x_min: annotation.x_min,
    y_min: annotation.y_min,
    x_max: annotation.x_max,
    y_max: annotation.y_max,
    created_at: annotation.created_at,
    modified_at: annotation.modified_at,
  };
}

export function annotationFromJson(value: unknown): Annotation {
  const data = isRecord(value) ? value : {};
  return {
    id: readString(data, 'id', randomUUID),
    class_id: readInt(data, 'class_id'),
    class_name: readString(data, 'class_name', empty),
    x_min: readInt(data, 'x_min'),
    y_min: readInt(data, 'y_min'),
    x_max: readInt(data, 'x_max'),
    y_max: readInt(data, 'y_max'),
    created_at: readString(data, 'created_at', nowIso),
    modified_at: readString(data, 'modified_at', nowIso),
  };
}

export function classToJson(cls: ClassDefinition): JsonRecord {
  return { id: cls.id, name: cls.name, color: cls.color };
}

export function classFromJson(value: unknown, index: number): ClassDefinition {
  const data = isRecord(value) ? value : {};
  return {
    id: readInt(data, 'id', index),
    name: readString(data, 'name', empty),
    color: readString(data, 'color', () => DEFAULT_CLASS_COLOR),
  };
}

export function imageToJson(image: ImageData): JsonRecord {
  return {
    filename: image.filename,
    filepath: image.filepath,
    width: image.width,
    height: image.height,
    annotations: image.annotations.map(annotationToJson),
  };
}

export function imageFromJson(value: unknown): ImageData {
  const data = isRecord(value) ? value : {};
  return {
    filename: readString(data, 'filename', empty),
    filepath: readString(data, 'filepath', empty),
    width: readInt(data, 'width'),
    height: readInt(data, 'height'),
    annotations: readArray(data, 'annotations').map(annotationFromJson),
  };
}

export function projectToJson(project: Project): JsonRecord {
  return {
    version: project.version,
    created_at: project.created_at,
    modified_at: project.modified_at,
    image_folder: project.image_folder,
    classes: project.classes.map(classToJson),
    images: project.images.map(imageToJson),
  };
}

export function projectFromJson(value: unknown): Project {
  const data = isRecord(value) ? value : {};
  return {
    version: readString(data, 'version', () => PROJECT_VERSION),
    created_at: readString(data, 'created_at', nowIso),
    modified_at: readString(data, 'modified_at', nowIso),
    image_folder: readString(data, 'image_folder', empty),
    classes: readArray(data, 'classes').map(classFromJson),
    images: readArray(data, 'images').map(imageFromJson),
  };
}
