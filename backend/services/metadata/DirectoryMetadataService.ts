/**
 * DirectoryMetadataService
 * Backfills grade / volume / chapter / section / subject on saved question files from
 * the directory layout of a question bank, e.g. 数学/八年级/上册/第二章 实数/1 认识实数/.
 */

import * as path from 'path';
import fs from 'fs/promises';
import type { JsonValue } from '../../types/index.js';
import { PipelineInputError } from '../../utils/errorHandler.js';
import { collectFilesRecursive, pathKind } from '../../utils/fileTypes.js';
import { PipelineLogger } from '../../utils/LoggerUtils.js';

export interface DirectoryMetadata {
  grade: string;
  volume: string;
  chapter: string;
  section: string;
  subject: string;
}

const GRADE_MAP: Record<string, string> = {
  '七年级': '7',
  '八年级': '8',
  '九年级': '9'
};

const VOLUMES = new Set(['上册', '下册']);
const SUBJECTS = new Set(['数学', '语文', '英语', '物理', '化学', '生物']);

const CHAPTER_PATTERNS = [/^第.+单元/, /^第.+章/, /^Unit\s+/i];
const SECTION_PATTERNS = [/^\d+/, /^Section\s+/i];

export class DirectoryMetadataService {

  /**
   * Derive metadata from the directories containing the file (the file name is ignored).
   * Deeper directories override shallower ones.
   */
  static extractFromPath(jsonPath: string): DirectoryMetadata {
    const meta: DirectoryMetadata = { grade: '', volume: '', chapter: '', section: '', subject: '' };
    const dirParts = path.dirname(path.resolve(jsonPath)).split(path.sep).filter(Boolean);

    for (const part of dirParts) {
      const grade = GRADE_MAP[part];
      if (grade !== undefined) {
        meta.grade = grade;
      } else if (VOLUMES.has(part)) {
        meta.volume = part;
      } else if (CHAPTER_PATTERNS.some(pattern => pattern.test(part))) {
        meta.chapter = part;
      } else if (SECTION_PATTERNS.some(pattern => pattern.test(part))) {
        meta.section = part;
      } else if (SUBJECTS.has(part)) {
        meta.subject = part;
      }
    }
    return meta;
  }

  /**
   * Overwrite the metadata fields of every object in a JSON array file with the
   * non-empty values derived from its directory.
   */
  static async fillJsonFile(jsonFile: string): Promise<void> {
    const data: JsonValue = JSON.parse(await fs.readFile(jsonFile, 'utf-8'));
    if (!Array.isArray(data)) {
      throw new PipelineInputError(`${jsonFile} must be a JSON array`);
    }

    const meta = this.extractFromPath(jsonFile);
    const filled = Object.entries(meta).filter(([, value]) => value !== '');

    for (const item of data) {
      if (item === null || typeof item !== 'object' || Array.isArray(item)) continue;
      for (const [key, value] of filled) {
        item[key] = value;
      }
    }

    await fs.writeFile(jsonFile, JSON.stringify(data, null, 4), 'utf-8');
    PipelineLogger.success('METADATA', `Normalized: ${jsonFile}`);
  }

  /**
   * Fill a single .json file, or every .json file under a directory.
   * @returns the files that were rewritten
   */
  static async fillPath(target: string): Promise<string[]> {
    const kind = await pathKind(target);
    if (kind === 'file' && path.extname(target) === '.json') {
      await this.fillJsonFile(target);
      return [target];
    }
    if (kind === 'directory') {
      const files = await collectFilesRecursive(target, '.json');
      for (const file of files) {
        await this.fillJsonFile(file);
      }
      return files;
    }
    PipelineLogger.warn('METADATA', `Skipping ${target}: not a .json file or directory`);
    return [];
  }
}
