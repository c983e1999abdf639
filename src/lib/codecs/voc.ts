import { mkdir, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { XMLBuilder, XMLParser } from 'fast-xml-parser';
import type { ImageData, Project } from '@/types';
import { getOrCreateClass } from '../classes';
import { EXPORT_PATHS, VOC_DATABASE } from '../constants';
import { errorMessage } from '../errors';
import { createLogger } from '../logger';
import { clampToBounds, createAnnotation, isRecord, isValidBox } from '../models';
import { fileExists, imageStem } from './paths';

const log = createLogger('voc');

const builder = new XMLBuilder({
  ignoreAttributes: false,
  format: true,
  indentBy: '  ',
});

const parser = new XMLParser({
  ignoreAttributes: true,
  parseTagValue: false,
  isArray: (_name, jpath) => jpath === 'annotation.object',
});

export function vocAnnotationsDir(exportsDir: string): string {
  return path.join(exportsDir, ...EXPORT_PATHS.vocAnnotations);
}

/**
 * Render one image as a Pascal VOC document, or null when it has no valid box.
 */
export function buildVocXml(image: ImageData): string | null {
  const objects = image.annotations.filter(isValidBox).map((annotation) => ({
    name: annotation.class_name,
    pose: 'Unspecified',
    truncated: 0,
    difficult: 0,
    bndbox: {
      xmin: annotation.x_min,
      ymin: annotation.y_min,
      xmax: annotation.x_max,
      ymax: annotation.y_max,
    },
  }));
  if (objects.length === 0) return null;

  return builder.build({
    '?xml': { '@_version': '1.0', '@_encoding': 'utf-8' },
    annotation: {
      folder: path.basename(path.dirname(image.filepath)),
      filename: image.filename,
      source: { database: VOC_DATABASE },
      size: { width: image.width, height: image.height, depth: 3 },
      segmented: 0,
      object: objects,
    },
  });
}

/**
 * Write `voc/Annotations/<stem>.xml` for every image with at least one valid
 * box, and remove the file of any tracked image that no longer has one.
 */
export async function exportVoc(project: Project, exportsDir: string): Promise<void> {
  const dir = vocAnnotationsDir(exportsDir);
  await mkdir(dir, { recursive: true });

  for (const image of project.images) {
    const file = path.join(dir, `${imageStem(image.filename)}.xml`);
    const xml = buildVocXml(image);
    if (xml === null) {
      await rm(file, { force: true });
      continue;
    }
    await writeFile(file, xml, 'utf-8');
  }
}

function text(value: unknown): string | null {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number') return String(value);
  return null;
}

function coordinate(bndbox: Record<string, unknown>, key: string): number | null {
  const raw = text(bndbox[key]);
  if (raw === null || raw === '') return null;
  const value = Number(raw);
  return Number.isFinite(value) ? Math.round(value) : null;
}

/**
 * Parse one VOC file into `image`. Returns the number of boxes added.
 */
function importVocDocument(doc: Record<string, unknown>, image: ImageData, project: Project): number {
  const objects = doc['object'];
  if (!Array.isArray(objects)) return 0;

  let added = 0;
  for (const object of objects) {
    if (!isRecord(object)) continue;
    const name = text(object['name']);
    const bndbox = object['bndbox'];
    if (!name || !isRecord(bndbox)) continue;

    const x_min = coordinate(bndbox, 'xmin');
    const y_min = coordinate(bndbox, 'ymin');
    const x_max = coordinate(bndbox, 'xmax');
    const y_max = coordinate(bndbox, 'ymax');
    if (x_min === null || y_min === null || x_max === null || y_max === null) continue;

    const annotation = createAnnotation({
      class_id: getOrCreateClass(project, name),
      class_name: name,
      x_min,
      y_min,
      x_max,
      y_max,
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
 * Import `voc/Annotations/*.xml` into images that have no annotations yet.
 * Files match by `<filename>` first, then by the XML file's stem.
 */
export async function importVoc(project: Project, exportsDir: string): Promise<boolean> {
  const dir = vocAnnotationsDir(exportsDir);
  if (!(await fileExists(dir))) return false;

  const byFilename = new Map(project.images.map((img) => [img.filename, img]));
  const byStem = new Map(project.images.map((img) => [imageStem(img.filename), img]));

  const files = (await readdir(dir)).filter((name) => name.toLowerCase().endsWith('.xml')).sort();
  let imported = false;

  for (const name of files) {
    try {
      const parsed: unknown = parser.parse(await readFile(path.join(dir, name), 'utf-8'));
      const doc = isRecord(parsed) ? parsed['annotation'] : undefined;
      if (!isRecord(doc)) continue;

      const filename = text(doc['filename']);
      if (filename === null) continue;
      const image = byFilename.get(filename) ?? byStem.get(imageStem(name));
      if (!image || image.annotations.length > 0) continue;

      if (importVocDocument(doc, image, project) > 0) imported = true;
    } catch (err) {
      log.warn(`Error importing VOC file ${name}: ${errorMessage(err, 'parse failed')}`);
    }
  }
  return imported;
}
