import * as path from 'path';
import fs from 'fs/promises';
import { PipelineLogger } from './LoggerUtils.js';

export interface RenameImagesOptions {
  prefix?: string;
  startIndex?: number;
  digits?: number;
  extensions?: string[];
}

const DEFAULT_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.bmp', '.webp'];

/**
 * Rename the images in a directory to <prefix>_<zero-padded index><ext>, in name order.
 * Files are first moved to temporary names so an existing target is never overwritten.
 * @returns number of images renamed
 */
export async function renameImages(folderPath: string, options: RenameImagesOptions = {}): Promise<number> {
  const { prefix = 'img', startIndex = 1, digits = 4, extensions = DEFAULT_EXTENSIONS } = options;
  const wanted = extensions.map(ext => ext.toLowerCase());

  const entries = await fs.readdir(folderPath, { withFileTypes: true });
  const files = entries
    .filter(entry => entry.isFile() && wanted.some(ext => entry.name.toLowerCase().endsWith(ext)))
    .map(entry => entry.name)
    .sort();

  const plan = files.map((name, i) => ({
    from: path.join(folderPath, name),
    temp: path.join(folderPath, `.rename-${process.pid}-${i}${path.extname(name)}`),
    to: path.join(folderPath, `${prefix}_${String(startIndex + i).padStart(digits, '0')}${path.extname(name)}`)
  }));

  for (const step of plan) {
    if (step.from !== step.to) await fs.rename(step.from, step.temp);
  }
  for (const step of plan) {
    if (step.from !== step.to) await fs.rename(step.temp, step.to);
  }

  PipelineLogger.success('RENAME', `Renamed ${files.length} image(s) in ${folderPath}`);
  return files.length;
}
