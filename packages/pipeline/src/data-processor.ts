/**
 * Data items: loose files copied into the build output, optionally
 * transformed on the way.
 *
 * Handlers are tried in order and the first that claims an item wins:
 *   1. text replacement (text → text with a `replace` map)
 *   2. VTF export (image or .vtf → .vtf), plus an optional VMT from a template
 *   3. image → image conversion, which is not supported and is reported
 * Anything left is copied. A failing item is logged and the rest continue.
 */

import { copyFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import path from 'node:path';

import { MATERIALS_DIR, writeVmtFromTemplate } from '@assetsmith/materials';

import type { BuildLogger } from './build-logger.js';
import type { DataItem } from './config.js';
import type { TextureEncoder } from './texture-encoder.js';

export const SHARED_ASSET_FOLDER = 'AssetShared';

const TEXT_EXTENSIONS = ['.txt', '.vmt', '.qc', '.qci', '.cfg', '.res', '.json', '.lua', '.nut', '.vdf'];
const IMAGE_EXTENSIONS = ['.png', '.tga', '.jpg', '.jpeg', '.bmp', '.psd', '.tif', '.tiff', '.gif'];

export type DataItemOutcome = 'replaced' | 'exported' | 'unsupported' | 'copied' | 'failed';

export interface DataItemResult {
  input: string;
  output: string;
  outcome: DataItemOutcome;
  /** Files written for the item. */
  written: string[];
}

interface HandlerContext {
  item: DataItem;
  input: string;
  output: string;
}

type DataHandler = (context: HandlerContext) => Omit<DataItemResult, 'input' | 'output'> | null;

function hasExtension(file: string, extensions: readonly string[]): boolean {
  return extensions.includes(path.extname(file).toLowerCase());
}

export function isTextFile(file: string): boolean {
  return hasExtension(file, TEXT_EXTENSIONS);
}

export function isImageFile(file: string): boolean {
  return hasExtension(file, IMAGE_EXTENSIONS);
}

/** Apply every `from → to` replacement, in map order. */
export function applyReplacements(text: string, replacements: Readonly<Record<string, string>>): string {
  let result = text;
  for (const [from, to] of Object.entries(replacements)) {
    if (from !== '') result = result.split(from).join(to);
  }
  return result;
}

export interface DataProcessorOptions {
  /** Build output root; VMT texture paths are relative to its shared materials folder. */
  compileRoot: string;
  /** Null when no vtfcmd is configured. */
  encoder: TextureEncoder | null;
  logger: BuildLogger;
}

export class DataProcessor {
  private readonly handlers: DataHandler[] = [
    (context) => this.replaceText(context),
    (context) => this.exportVtf(context),
    (context) => this.convertImage(context),
  ];

  constructor(private readonly options: DataProcessorOptions) {}

  processItems(items: readonly DataItem[], baseOutput: string): DataItemResult[] {
    return items.map((item) => this.processItem(item, baseOutput));
  }

  processItem(item: DataItem, baseOutput: string): DataItemResult {
    const input = item.input;
    const output = path.join(baseOutput, item.output);
    try {
      if (!existsSync(input)) throw new Error(`input not found: ${input}`);
      mkdirSync(path.dirname(output), { recursive: true });

      const context: HandlerContext = { item, input, output };
      for (const handler of this.handlers) {
        const handled = handler(context);
        if (handled) return { input, output, ...handled };
      }

      copyFileSync(input, output);
      this.options.logger.info(`Copied file: ${path.basename(input)} -> ${path.basename(output)}`);
      return { input, output, outcome: 'copied', written: [output] };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.options.logger.error(`Failed to process item ${input} -> ${output}: ${message}`);
      return { input, output, outcome: 'failed', written: [] };
    }
  }

  private replaceText({ item, input, output }: HandlerContext): Omit<DataItemResult, 'input' | 'output'> | null {
    if (!isTextFile(input) || !isTextFile(output)) return null;
    if (!item.replace || Object.keys(item.replace).length === 0) return null;

    writeFileSync(output, applyReplacements(readFileSync(input, 'utf8'), item.replace));
    this.options.logger.info(`Replaced strings: ${path.basename(input)} -> ${path.basename(output)}`);
    return { outcome: 'replaced', written: [output] };
  }

  private exportVtf({ item, input, output }: HandlerContext): Omit<DataItemResult, 'input' | 'output'> | null {
    const inputIsVtf = path.extname(input).toLowerCase() === '.vtf';
    if (!(isImageFile(input) || inputIsVtf) || path.extname(output).toLowerCase() !== '.vtf') return null;

    const { logger, encoder } = this.options;
    const written: string[] = [];

    if (inputIsVtf) {
      copyFileSync(input, output);
      written.push(output);
    } else if (encoder) {
      encoder.encode(input, output, { flags: item.vtf?.flags, extraArgs: item.vtf?.encoder_args });
      written.push(output);
      logger.info(`VTF export: ${path.basename(input)} -> ${path.basename(output)}`);
    } else {
      logger.warn(`No vtfcmd configured; ${path.basename(input)} was not encoded`);
    }

    const template = item.vtf?.vmt;
    if (template !== undefined) {
      if (!existsSync(template)) {
        logger.warn(`VMT template not found, skipping: ${template}`);
      } else {
        const materialsRoot = path.join(this.options.compileRoot, SHARED_ASSET_FOLDER, MATERIALS_DIR);
        const vmt = writeVmtFromTemplate(template, output, materialsRoot);
        written.push(vmt);
        logger.info(`VMT created: ${path.relative(this.options.compileRoot, vmt).split(path.sep).join('/')}`);
      }
    }

    return { outcome: 'exported', written };
  }

  private convertImage({ input, output }: HandlerContext): Omit<DataItemResult, 'input' | 'output'> | null {
    if (!isImageFile(input) || !isImageFile(output)) return null;
    if (path.extname(input).toLowerCase() === path.extname(output).toLowerCase()) return null;

    this.options.logger.warn(
      `Image conversion ${path.extname(input)} -> ${path.extname(output)} is not supported: ${path.basename(input)}`,
    );
    return { outcome: 'unsupported', written: [] };
  }
}
