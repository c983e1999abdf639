import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { ImageData, Project } from '@/types';
import { getOrCreateClass } from '../classes';
import { EXPORT_PATHS } from '../constants';
import { errorMessage } from '../errors';
import { createLogger } from '../logger';
import { clampToBounds, createAnnotation, isRecord, isValidBox, isWithinImage } from '../models';
import { fileExists } from './paths';

const log = createLogger('coco');

export interface CocoImage {
  id: number;
  width: number;
  height: number;
  file_name: string;
}

export interface CocoAnnotation {
  id: number;
  image_id: number;
  category_id: number;
  bbox: [number, number, number, number]; // x, y, width, height
  area: number;
  iscrowd: 0;
}

export interface CocoCategory {
  id: number;
  name: string;
  supercategory: string;
}

export interface CocoDataset {
  info: {
    description: string;
    version: string;
    year: number;
    date_created: string;
  };
  licenses: unknown[];
  images: CocoImage[];
  annotations: CocoAnnotation[];
  categories: CocoCategory[];
}

export function cocoFile(exportsDir: string): string {
  return path.join(exportsDir, ...EXPORT_PATHS.cocoFile);
}

/**
 * Build the COCO document. Every image is listed; boxes that are invalid or
 * fall outside their image are left out.
 */
export function buildCocoDataset(project: Project, now: Date = new Date()): CocoDataset {
  const dataset: CocoDataset = {
    info: {
      description: 'bbox-annotate export',
      version: project.version,
      year: now.getUTCFullYear(),
      date_created: now.toISOString(),
    },
    licenses: [],
    images: [],
    annotations: [],
    categories: project.classes.map((c) => ({ id: c.id, name: c.name, supercategory: 'none' })),
  };

  let annotationId = 1;
  project.images.forEach((image, index) => {
    const imageId = index + 1;
    dataset.images.push({
      id: imageId,
      width: image.width,
      height: image.height,
      file_name: image.filename,
    });

    for (const ann of image.annotations) {
      if (!isValidBox(ann) || !isWithinImage(ann, image.width, image.height)) continue;
      const width = ann.x_max - ann.x_min;
      const height = ann.y_max - ann.y_min;
      const area = width * height;
      if (area <= 0) continue;

      dataset.annotations.push({
        id: annotationId++,
        image_id: imageId,
        category_id: ann.class_id,
        bbox: [ann.x_min, ann.y_min, width, height],
        area,
        iscrowd: 0,
      });
    }
  });

  return dataset;
}

export async function exportCoco(project: Project, exportsDir: string): Promise<void> {
  const file = cocoFile(exportsDir);
  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(file, `${JSON.stringify(buildCocoDataset(project), null, 2)}\n`, 'utf-8');
}

function finiteNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function listOf(data: Record<string, unknown>, key: string): Record<string, unknown>[] {
  const value = data[key];
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

/**
 * Import `coco/annotations.json` into images (matched by exact filename)
 * that currently have no annotations. Unknown categories become classes.
 */
export async function importCoco(project: Project, exportsDir: string): Promise<boolean> {
  const file = cocoFile(exportsDir);
  if (!(await fileExists(file))) return false;

  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(file, 'utf-8'));
  } catch (err) {
    log.warn(`Error importing COCO file: ${errorMessage(err, 'parse failed')}`);
    return false;
  }
  if (!isRecord(parsed)) return false;

  const categories = new Map<unknown, { classId: number; name: string }>();
  for (const category of listOf(parsed, 'categories')) {
    const id = category['id'];
    const rawName = category['name'];
    const name = typeof rawName === 'string' && rawName !== '' ? rawName : `class_${String(id)}`;
    categories.set(id, { classId: getOrCreateClass(project, name), name });
  }

  const byFilename = new Map(project.images.map((img) => [img.filename, img]));
  const targets = new Map<unknown, ImageData>();
  for (const entry of listOf(parsed, 'images')) {
    const fileName = entry['file_name'];
    const image = typeof fileName === 'string' ? byFilename.get(fileName) : undefined;
    if (image && image.annotations.length === 0) targets.set(entry['id'], image);
  }

  let imported = false;
  for (const entry of listOf(parsed, 'annotations')) {
    const image = targets.get(entry['image_id']);
    const category = categories.get(entry['category_id']);
    const bbox = entry['bbox'];
    if (!image || !category || !Array.isArray(bbox) || bbox.length < 4) continue;

    const [x, y, w, h] = bbox.slice(0, 4).map(finiteNumber);
    if (x == null || y == null || w == null || h == null) continue;

    const x_min = Math.round(x);
    const y_min = Math.round(y);
    const annotation = createAnnotation({
      class_id: category.classId,
      class_name: category.name,
      x_min,
      y_min,
      x_max: x_min + Math.round(w),
      y_max: y_min + Math.round(h),
    });
    clampToBounds(annotation, image.width, image.height);
    if (isValidBox(annotation)) {
      image.annotations.push(annotation);
      imported = true;
    }
  }
  return imported;
}
