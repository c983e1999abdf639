import { mkdir, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { BoxBounds, ImageData, Project } from '@/types';
import { getOrCreateClass } from '../classes';
import { EXPORT_PATHS } from '../constants';
import { errorMessage } from '../errors';
import { createLogger } from '../logger';
import { clampToBounds, createAnnotation, isValidBox } from '../models';
import { fileExists, imageStem } from './paths';

const log = createLogger('yolo');

const clamp01 = (v: number): number => Math.max(0, Math.min(1, v));

export function yoloLabelsDir(exportsDir: string): string {
  return path.join(exportsDir, ...EXPORT_PATHS.yoloLabels);
}

export function yoloClassesFile(exportsDir: string): string {
  return path.join(exportsDir, ...EXPORT_PATHS.yoloClasses);
}

/**
 * Standard YOLO line: `class cx cy w h`, normalized and clamped to [0, 1].
 */
export function toYoloLine(classId: number, box: BoxBounds, imgW: number, imgH: number): string {
  const cx = clamp01((box.x_min + box.x_max) / 2 / imgW);
  const cy = clamp01((box.y_min + box.y_max) / 2 / imgH);
  const w = clamp01((box.x_max - box.x_min) / imgW);
  const h = clamp01((box.y_max - box.y_min) / imgH);
  return `${classId} ${cx.toFixed(6)} ${cy.toFixed(6)} ${w.toFixed(6)} ${h.toFixed(6)}`;
}

/** Label file body for an image; empty when nothing is exportable */
export function buildYoloLabels(image: ImageData): string {
  if (image.width <= 0 || image.height <= 0) return '';
  return image.annotations
    .filter(isValidBox)
    .map((a) => `${toYoloLine(a.class_id, a, image.width, image.height)}\n`)
    .join('');
}

/**
 * Write `yolo/classes.txt` and one `yolo/labels/<stem>.txt` per annotated image.
 */
export async function exportYolo(project: Project, exportsDir: string): Promise<void> {
  const labelsDir = yoloLabelsDir(exportsDir);
  await mkdir(labelsDir, { recursive: true });

  const classes = project.classes.map((c) => `${c.name}\n`).join('');
  await writeFile(yoloClassesFile(exportsDir), classes, 'utf-8');

  for (const image of project.images) {
    const file = path.join(labelsDir, `${imageStem(image.filename)}.txt`);
    const body = buildYoloLabels(image);
    if (body === '') {
      await rm(file, { force: true });
      continue;
    }
    await writeFile(file, body, 'utf-8');
  }
}

export interface YoloLine {
  classIndex: number;
  box: BoxBounds;
}

/**
 * Parse one label line back to pixel space, or null when it is malformed.
 * Tokens past the first five (a confidence column, say) are ignored.
 */
export function parseYoloLine(line: string, imgW: number, imgH: number): YoloLine | null {
  const parts = line.trim().split(/\s+/);
  if (parts.length < 5) return null;

  const [classToken, ...geometry] = parts.slice(0, 5);
  if (classToken === undefined || !/^\d+$/.test(classToken)) return null;
  const values = geometry.map(Number);
  if (values.some((v) => !Number.isFinite(v))) return null;
  const [cx = 0, cy = 0, w = 0, h = 0] = values;

  return {
    classIndex: Number(classToken),
    box: {
      x_min: Math.round((cx - w / 2) * imgW),
      y_min: Math.round((cy - h / 2) * imgH),
      x_max: Math.round((cx + w / 2) * imgW),
      y_max: Math.round((cy + h / 2) * imgH),
    },
  };
}

async function readClassNames(exportsDir: string, project: Project): Promise<Map<number, string>> {
  const names = new Map<number, string>();
  const file = yoloClassesFile(exportsDir);
  if (!(await fileExists(file))) return names;

  const lines = (await readFile(file, 'utf-8')).split(/\r?\n/);
  lines.forEach((line, index) => {
    const name = line.trim();
    if (!name) return;
    names.set(index, name);
    getOrCreateClass(project, name);
  });
  return names;
}

function importLabelFile(
  content: string,
  image: ImageData,
  classNames: ReadonlyMap<number, string>,
  project: Project
): number {
  let added = 0;
  for (const line of content.split(/\r?\n/)) {
    if (!line.trim()) continue;
    const parsed = parseYoloLine(line, image.width, image.height);
    if (!parsed) {
      log.debug(`Skipping malformed YOLO line for ${image.filename}: ${line}`);
      continue;
    }
    const className = classNames.get(parsed.classIndex) ?? `class_${parsed.classIndex}`;
    const annotation = createAnnotation({
      class_id: getOrCreateClass(project, className),
      class_name: className,
      ...parsed.box,
    });
    clampToBounds(annotation, image.width, image.height);
    if (isValidBox(annotation)) {
      image.annotations.push(annotation);
      added += 1;
    }
  }
  return added;
}

/**
 * Import `yolo/labels/*.txt` (matched by stem) into images that have no
 * annotations yet, resolving class indices through `yolo/classes.txt`.
 */
export async function importYolo(project: Project, exportsDir: string): Promise<boolean> {
  const labelsDir = yoloLabelsDir(exportsDir);
  if (!(await fileExists(labelsDir))) return false;

  let classNames = new Map<number, string>();
  try {
    classNames = await readClassNames(exportsDir, project);
  } catch (err) {
    log.warn(`Could not read YOLO classes: ${errorMessage(err, 'read failed')}`);
  }

  const byStem = new Map(project.images.map((img) => [imageStem(img.filename), img]));
  const files = (await readdir(labelsDir)).filter((name) => name.toLowerCase().endsWith('.txt')).sort();
  let imported = false;

  for (const name of files) {
    const image = byStem.get(imageStem(name));
    if (!image || image.annotations.length > 0) continue;
    try {
      const content = await readFile(path.join(labelsDir, name), 'utf-8');
      if (importLabelFile(content, image, classNames, project) > 0) imported = true;
    } catch (err) {
      log.warn(`Error importing YOLO file ${name}: ${errorMessage(err, 'read failed')}`);
    }
  }
  return imported;
}
