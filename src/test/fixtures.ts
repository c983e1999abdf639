import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import type { Annotation, ImageData, Project } from '@/types';
import { createProject } from '@/lib/models';

/**
 * Minimal PNG: signature plus an IHDR chunk, enough for header-based
 * dimension readers.
 */
export function pngHeader(width: number, height: number): Buffer {
  const buffer = Buffer.alloc(33);
  Buffer.from([137, 80, 78, 71, 13, 10, 26, 10]).copy(buffer, 0);
  buffer.writeUInt32BE(13, 8);
  buffer.write('IHDR', 12, 'ascii');
  buffer.writeUInt32BE(width, 16);
  buffer.writeUInt32BE(height, 20);
  buffer.writeUInt8(8, 24); // bit depth
  buffer.writeUInt8(6, 25); // RGBA
  return buffer;
}

export interface TempWorkspace {
  root: string;
  imageDir: string;
  projectPath: string;
  exportsDir: string;
  writeImage: (name: string, width: number, height: number) => Promise<string>;
  cleanup: () => Promise<void>;
}

/**
 * Temporary `<root>/images` folder with the project file at
 * `<root>/project.json`.
 */
export async function createWorkspace(): Promise<TempWorkspace> {
  const root = await mkdtemp(path.join(tmpdir(), 'bbox-annotate-'));
  const imageDir = path.join(root, 'images');
  await mkdir(imageDir);

  return {
    root,
    imageDir,
    projectPath: path.join(root, 'project.json'),
    exportsDir: path.join(root, 'exports'),
    writeImage: async (name, width, height) => {
      const file = path.join(imageDir, name);
      await writeFile(file, pngHeader(width, height));
      return file;
    },
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
}

export function makeAnnotation(overrides: Partial<Annotation> = {}): Annotation {
  return {
    id: 'ann-1',
    class_id: 0,
    class_name: 'cat',
    x_min: 10,
    y_min: 10,
    x_max: 110,
    y_max: 60,
    created_at: '2024-01-01T00:00:00.000Z',
    modified_at: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function makeImage(overrides: Partial<ImageData> = {}): ImageData {
  return {
    filename: 'a.png',
    filepath: '/data/images/a.png',
    width: 400,
    height: 300,
    annotations: [],
    ...overrides,
  };
}

/**
 * Two images, `a.png` 400x300 with one "cat" box (10,10)-(110,60) and
 * `b.png` 200x200 without boxes.
 */
export function makeSampleProject(imageDir = '/data/images'): Project {
  return createProject({
    image_folder: imageDir,
    classes: [{ id: 0, name: 'cat', color: '#FF0000' }],
    images: [
      makeImage({
        filepath: path.join(imageDir, 'a.png'),
        annotations: [makeAnnotation()],
      }),
      makeImage({
        filename: 'b.png',
        filepath: path.join(imageDir, 'b.png'),
        width: 200,
        height: 200,
      }),
    ],
  });
}

/** Same images as `project`, no annotations, only the default class */
export function freshCopy(project: Project): Project {
  return createProject({
    image_folder: project.image_folder,
    classes: [{ id: 0, name: 'object', color: '#FF0000' }],
    images: project.images.map((img) => ({ ...img, annotations: [] })),
  });
}

/** Comparable `(class, box)` tuples per image */
export function boxTuples(project: Project): Record<string, string[]> {
  const result: Record<string, string[]> = {};
  for (const image of project.images) {
    result[image.filename] = image.annotations
      .map((a) => `${a.class_name}:${a.x_min},${a.y_min},${a.x_max},${a.y_max}`)
      .sort();
  }
  return result;
}
