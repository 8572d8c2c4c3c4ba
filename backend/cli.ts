#!/usr/bin/env node
/**
 * Command-line entry point.
 *
 *   parse -i <path...> [-o <dir>]      parse images / a PDF / image folders into one question JSON
 *   separate <path...>                 one JSON per image, written beside each image
 *   fill-meta <path...>                backfill grade/volume/chapter/section/subject from folder names
 *   rename <dir...> [--prefix p] [--start n] [--digits n]
 *   upload-images <in> [out]           swap embedded Base64 images for hosted URLs
 *
 * Log lines go to stderr; stdout carries only the parse result.
 */

import * as path from 'path';
import fs from 'fs/promises';
import { realpathSync } from 'fs';
import * as dotenv from 'dotenv';
import { pathToFileURL } from 'url';
import { loadPipelineConfig } from './config/pipeline.js';
import { ImageHostingService } from './services/images/ImageHostingService.js';
import { DirectoryMetadataService } from './services/metadata/DirectoryMetadataService.js';
import { createDocumentParsePipeline } from './services/pipeline/DocumentParsePipeline.js';
import { ErrorHandler, PipelineInputError } from './utils/errorHandler.js';
import { pathKind } from './utils/fileTypes.js';
import { PipelineLogger } from './utils/LoggerUtils.js';
import { renameImages } from './utils/renameImages.js';

const USAGE = `Usage: exam-paper-parser <command> [options]

Commands:
  parse -i <path...> [-o <dir>]   Parse images, a PDF or image folders into question JSON
  separate <path...>              Parse every image on its own (<stem>.json beside each image)
  fill-meta <path...>             Fill grade/volume/chapter/section/subject from folder names
  rename <dir...> [--prefix img] [--start 1] [--digits 4]
                                  Rename images to <prefix>_<index><ext>
  upload-images <in> [out]        Upload embedded Base64 images and store hosted URLs

Options:
  -h, --help                      Show this help`;

export interface ParsedFlags {
  positional: string[];
  inputs: string[];
  output?: string;
  prefix?: string;
  start?: number;
  digits?: number;
  help: boolean;
}

export function parseFlags(args: string[]): ParsedFlags {
  const flags: ParsedFlags = { positional: [], inputs: [], help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '-i' || arg === '--input') {
      while (i + 1 < args.length && !args[i + 1].startsWith('-')) {
        flags.inputs.push(args[++i]);
      }
    } else if ((arg === '-o' || arg === '--output') && args[i + 1]) {
      flags.output = args[++i];
    } else if (arg === '--prefix' && args[i + 1]) {
      flags.prefix = args[++i];
    } else if (arg === '--start' && args[i + 1]) {
      flags.start = parseInt(args[++i], 10);
    } else if (arg === '--digits' && args[i + 1]) {
      flags.digits = parseInt(args[++i], 10);
    } else if (arg === '-h' || arg === '--help') {
      flags.help = true;
    } else if (!arg.startsWith('-')) {
      flags.positional.push(arg);
    }
  }

  return flags;
}

/**
 * Where `parse` saves its JSON: combined.json in the first directory input (or the
 * first input's folder) for several inputs; <dirname>.json inside a directory input
 * or <stem>.json beside a file input otherwise.
 */
export async function resolveSavePath(inputs: string[]): Promise<string> {
  if (inputs.length > 1) {
    let saveDir = path.dirname(inputs[0]);
    for (const input of inputs) {
      if (await pathKind(input) === 'directory') {
        saveDir = input;
        break;
      }
    }
    return path.join(saveDir, 'combined.json');
  }

  const input = inputs[0];
  if (await pathKind(input) === 'directory') {
    return path.join(input, `${path.basename(path.resolve(input))}.json`);
  }
  return path.join(path.dirname(input), `${path.basename(input, path.extname(input))}.json`);
}

function checkNumber(name: string, value: number | undefined): number | undefined {
  if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
    throw new PipelineInputError(`${name} must be a non-negative integer`);
  }
  return value;
}

async function main(argv: string[]): Promise<void> {
  const [command, ...rest] = argv;
  const flags = parseFlags(rest);

  if (!command || command === '-h' || command === '--help' || flags.help) {
    console.log(USAGE);
    return;
  }

  PipelineLogger.redirectToStderr();
  dotenv.config({ path: '.env.local' });
  dotenv.config();
  const config = loadPipelineConfig();

  switch (command) {
    case 'parse': {
      const inputs = flags.inputs.length > 0 ? flags.inputs : flags.positional;
      if (inputs.length === 0) {
        throw new PipelineInputError('parse needs at least one input: parse -i <path...> [-o <dir>]');
      }
      const pipeline = createDocumentParsePipeline(config);
      const result = await pipeline.runUnified(inputs.length > 1 ? inputs : inputs[0], flags.output ?? config.outputDir);

      try {
        const savePath = await resolveSavePath(inputs);
        await fs.mkdir(path.dirname(savePath), { recursive: true });
        await fs.writeFile(savePath, result.json, 'utf-8');
        PipelineLogger.success('CLI', `Saved ${savePath}`);
      } catch (error) {
        PipelineLogger.warn('CLI', `Could not save result: ${ErrorHandler.getMessage(error)}`);
      }

      process.stdout.write(`${result.json}\n`);
      return;
    }

    case 'separate': {
      requirePositional(flags, 'separate <path...>');
      const pipeline = createDocumentParsePipeline(config);
      let failed = 0;
      for (const target of flags.positional) {
        const result = await pipeline.processSeparately(target);
        failed += result.failed.length;
        PipelineLogger.info('CLI', `${target}: ${result.saved.length} saved, ${result.failed.length} failed`);
      }
      if (failed > 0) process.exitCode = 1;
      return;
    }

    case 'fill-meta': {
      requirePositional(flags, 'fill-meta <path...>');
      for (const target of flags.positional) {
        await DirectoryMetadataService.fillPath(target);
      }
      return;
    }

    case 'rename': {
      requirePositional(flags, 'rename <dir...> [--prefix img] [--start 1] [--digits 4]');
      for (const dir of flags.positional) {
        await renameImages(dir, {
          prefix: flags.prefix,
          startIndex: checkNumber('--start', flags.start),
          digits: checkNumber('--digits', flags.digits)
        });
      }
      return;
    }

    case 'upload-images': {
      const [input, output = input] = flags.positional;
      if (!input) {
        throw new PipelineInputError('Usage: upload-images <in> [out]');
      }
      const hosting = ImageHostingService.fromConfig(config.imageHost);
      if (await pathKind(input) === 'directory') {
        const written = await hosting.processJsonFolder(input, output);
        PipelineLogger.success('CLI', `Processed ${written.length} JSON file(s)`);
      } else {
        await hosting.processJsonFile(input, output);
        PipelineLogger.success('CLI', `Processed ${input}`);
      }
      return;
    }

    default:
      console.error(`Unknown command: ${command}\n`);
      console.error(USAGE);
      process.exitCode = 1;
  }
}

function requirePositional(flags: ParsedFlags, usage: string): void {
  if (flags.positional.length === 0) {
    throw new PipelineInputError(`Usage: ${usage}`);
  }
}

// argv[1] may be the npm bin symlink
if (process.argv[1] && import.meta.url === pathToFileURL(realpathSync(process.argv[1])).href) {
  main(process.argv.slice(2)).catch((err: unknown) => {
    PipelineLogger.error('CLI', 'Command failed', err);
    process.exit(1);
  });
}
