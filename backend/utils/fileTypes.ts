import * as path from 'path';
import fs from 'fs/promises';

export const IMAGE_EXTENSIONS = new Set(['.png', '.jpg', '.jpeg', '.bmp', '.tif', '.tiff', '.webp']);
export const PDF_EXTENSION = '.pdf';

const MIME_BY_EXTENSION: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.webp': 'image/webp',
  '.bmp': 'image/bmp',
  '.gif': 'image/gif',
  '.tif': 'image/tiff',
  '.tiff': 'image/tiff'
};

export function isPdfPath(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === PDF_EXTENSION;
}

export function isImagePath(filePath: string): boolean {
  return IMAGE_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

export function mimeFromPath(filePath: string): string {
  return MIME_BY_EXTENSION[path.extname(filePath).toLowerCase()] ?? 'application/octet-stream';
}

/** File name without its extension. */
export function stemOf(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

export async function pathKind(target: string): Promise<'file' | 'directory' | 'missing' | 'other'> {
  try {
    const stat = await fs.stat(target);
    if (stat.isFile()) return 'file';
    if (stat.isDirectory()) return 'directory';
    return 'other';
  } catch {
    return 'missing';
  }
}

/**
 * Image files directly inside a directory (no recursion), sorted by name.
 */
export async function collectImagesFromDir(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter(entry => entry.isFile() && isImagePath(entry.name))
    .map(entry => entry.name)
    .sort()
    .map(name => path.join(dir, name));
}

/**
 * Every file under a directory whose name ends with the extension, recursively.
 */
export async function collectFilesRecursive(dir: string, extension: string): Promise<string[]> {
  const found: string[] = [];
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      found.push(...await collectFilesRecursive(full, extension));
    } else if (entry.isFile() && entry.name.toLowerCase().endsWith(extension)) {
      found.push(full);
    }
  }
  return found;
}
