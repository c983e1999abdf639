import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { imageSize } from 'image-size';
import type { ImageData } from '@/types';
import { IMAGE_EXTENSIONS } from './constants';
import { AnnotationError, errorMessage } from './errors';
import { createLogger } from './logger';

const log = createLogger('images');

export function isImageFile(name: string): boolean {
  return IMAGE_EXTENSIONS.includes(path.extname(name).toLowerCase());
}

/**
 * List image files directly inside `folder`, sorted by path.
 */
export async function findImageFiles(folder: string): Promise<string[]> {
  const entries = await readdir(folder, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && isImageFile(entry.name))
    .map((entry) => path.join(folder, entry.name))
    .sort();
}

export interface ImageDimensions {
  width: number;
  height: number;
}

/**
 * Read pixel dimensions from the image header without decoding pixels.
 * Throws a `partial-decode` error when the file is not a readable image.
 */
export async function readImageDimensions(filepath: string): Promise<ImageDimensions> {
  let width: number | undefined;
  let height: number | undefined;
  try {
    const result = imageSize(await readFile(filepath));
    width = result.width;
    height = result.height;
  } catch (err) {
    throw new AnnotationError('partial-decode', errorMessage(err, 'unreadable image'), { cause: err });
  }
  if (!width || !height || width <= 0 || height <= 0) {
    throw new AnnotationError('partial-decode', `no dimensions in ${path.basename(filepath)}`);
  }
  return { width, height };
}

/**
 * Build an ImageData entry for a file, or null when it cannot be decoded.
 */
export async function loadImageData(filepath: string): Promise<ImageData | null> {
  try {
    const { width, height } = await readImageDimensions(filepath);
    const absolute = path.resolve(filepath);
    return {
      filename: path.basename(absolute),
      filepath: absolute,
      width,
      height,
      annotations: [],
    };
  } catch (err) {
    log.debug(`Skipping ${filepath}: ${errorMessage(err, 'decode failed')}`);
    return null;
  }
}

/**
 * Discover every decodable image in a folder. Undecodable files are skipped.
 */
export async function discoverImages(folder: string): Promise<ImageData[]> {
  const images: ImageData[] = [];
  for (const filepath of await findImageFiles(folder)) {
    const image = await loadImageData(filepath);
    if (image) images.push(image);
  }
  return images;
}
