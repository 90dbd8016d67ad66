import { createRequire } from 'module';
import * as path from 'path';
import { createWorker, type Worker } from 'tesseract.js';
import type { OcrSettings } from './config.js';
import { logger } from './logger.js';

export interface OcrEngine {
  recognize(image: Buffer): Promise<string>;
  terminate(): Promise<void>;
}

// Layout of the @tesseract.js-data/<lang> packages (LSTM "best_int" models, gzipped)
const LANGUAGE_DATA_DIR = '4.0.0_best_int';

const localRequire = createRequire(import.meta.url);

/** Folder of the npm-installed language data for `language`. */
export const bundledLangPath = (language: string): string =>
  path.join(path.dirname(localRequire.resolve(`@tesseract.js-data/${language}/package.json`)), LANGUAGE_DATA_DIR);

const toError = (value: unknown): Error => (value instanceof Error ? value : new Error(String(value)));

/**
 * tesseract.js engine. The worker (and its language data) is loaded on the
 * first page that needs OCR and kept until `terminate()`.
 *
 * Language data is read from disk and never cached, so the engine neither
 * downloads nor writes files.
 */
export class TesseractOcrEngine implements OcrEngine {
  private worker: Promise<Worker> | null = null;

  constructor(private readonly settings: OcrSettings) {}

  private startWorker(): Promise<Worker> {
    const langPath = this.settings.langPath ?? bundledLangPath(this.settings.language);
    logger.debug({ language: this.settings.language, langPath }, 'starting OCR worker');

    // A failed load is only reported through errorHandler; createWorker itself never settles then
    return new Promise<Worker>((resolve, reject) => {
      createWorker(this.settings.language, undefined, {
        langPath,
        gzip: true,
        cacheMethod: 'none',
        errorHandler: (error: unknown) => reject(toError(error)),
      }).then(resolve, reject);
    });
  }

  private getWorker(): Promise<Worker> {
    if (!this.worker) {
      this.worker = this.startWorker();
    }
    return this.worker;
  }

  async recognize(image: Buffer): Promise<string> {
    const worker = await this.getWorker();
    const { data } = await worker.recognize(image);
    return data.text;
  }

  async terminate(): Promise<void> {
    const pending = this.worker;
    this.worker = null;
    if (!pending) return;

    let worker: Worker;
    try {
      worker = await pending;
    } catch (error) {
      // Never started, nothing to stop
      logger.debug({ err: error }, 'OCR worker failed to start');
      return;
    }
    await worker.terminate();
  }
}
