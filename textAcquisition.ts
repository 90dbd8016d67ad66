import { readFile } from 'fs/promises';
import { createCanvas } from '@napi-rs/canvas';
import { getDocument, type PDFDocumentProxy } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { createDocumentLogger, logger } from './logger.js';
import { TesseractOcrEngine, type OcrEngine } from './ocrService.js';
import type { AcquiredText, AcquisitionSource } from './types.js';

export const DEFAULT_MAX_PAGES = 2;
export const DEFAULT_MIN_TEXT_LENGTH = 50;
export const DEFAULT_RENDER_SCALE = 2;

export interface DirectTextExtractor {
  extract(filePath: string, maxPages: number): Promise<AcquiredText>;
}

export interface OcrTextExtractor {
  recognize(filePath: string, maxPages: number): Promise<AcquiredText>;
}

interface PdfTextRun {
  str: string;
  hasEOL: boolean;
}

const isTextRun = (item: object): item is PdfTextRun => 'str' in item && typeof item.str === 'string';

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const unreadable = (source: AcquisitionSource, error: unknown): AcquiredText => ({
  status: 'unreadable',
  source,
  reason: describeError(error),
});

const fromText = (source: AcquisitionSource, text: string): AcquiredText =>
  text ? { status: 'text', source, text } : { status: 'empty', source };

/** Text of an acquisition result; empty and unreadable both read as "". */
export const textOf = (result: AcquiredText): string => (result.status === 'text' ? result.text : "");

/**
 * Joins the text runs of one page. A run flagged as ending its line
 * contributes a line break; marked-content items carry no text.
 */
export const joinTextRuns = (items: readonly object[]): string => {
  let out = "";
  for (const item of items) {
    if (!isTextRun(item)) continue;
    out += item.str;
    if (item.hasEOL) out += "\n";
  }
  return out;
};

/**
 * Opens a PDF, hands it to `fn`, and always releases the document.
 */
export const withPdfDocument = async <T>(filePath: string, fn: (pdf: PDFDocumentProxy) => Promise<T>): Promise<T> => {
  const data = new Uint8Array(await readFile(filePath));
  const loadingTask = getDocument({ data, isEvalSupported: false, useSystemFonts: true, verbosity: 0 });
  try {
    const pdf = await loadingTask.promise;
    return await fn(pdf);
  } finally {
    await loadingTask.destroy();
  }
};

/**
 * Render a page to PNG on a white background.
 */
export const renderPageToPng = async (pdf: PDFDocumentProxy, pageNumber: number, scale: number): Promise<Buffer> => {
  const page = await pdf.getPage(pageNumber);
  try {
    const viewport = page.getViewport({ scale });
    const canvas = createCanvas(Math.ceil(viewport.width), Math.ceil(viewport.height));
    const context = canvas.getContext('2d');
    context.fillStyle = '#ffffff';
    context.fillRect(0, 0, canvas.width, canvas.height);

    await page.render({ canvasContext: context, viewport }).promise;
    return canvas.toBuffer('image/png');
  } finally {
    page.cleanup();
  }
};

/** Reads the embedded (selectable) text layer with pdfjs. */
export class PdfTextExtractor implements DirectTextExtractor {
  async extract(filePath: string, maxPages: number): Promise<AcquiredText> {
    try {
      const text = await withPdfDocument(filePath, async pdf => {
        const chunks: string[] = [];
        const pageCount = Math.min(pdf.numPages, maxPages);
        for (let pageNumber = 1; pageNumber <= pageCount; pageNumber++) {
          const page = await pdf.getPage(pageNumber);
          const content = await page.getTextContent();
          const pageText = joinTextRuns(content.items);
          if (pageText.trim()) chunks.push(pageText);
          page.cleanup();
        }
        return chunks.join("\n").trim();
      });
      return fromText('direct', text);
    } catch (error) {
      return unreadable('direct', error);
    }
  }
}

/**
 * Renders pages and runs them through an OCR engine. A page that fails to
 * render or recognize is skipped.
 */
export class PdfOcrExtractor implements OcrTextExtractor {
  constructor(
    private readonly engine: OcrEngine,
    private readonly scale: number = DEFAULT_RENDER_SCALE
  ) {}

  async recognize(filePath: string, maxPages: number): Promise<AcquiredText> {
    const log = createDocumentLogger(filePath);
    try {
      const text = await withPdfDocument(filePath, async pdf => {
        const chunks: string[] = [];
        const pageCount = Math.min(pdf.numPages, maxPages);
        for (let pageNumber = 1; pageNumber <= pageCount; pageNumber++) {
          try {
            const image = await renderPageToPng(pdf, pageNumber, this.scale);
            const pageText = await this.engine.recognize(image);
            if (pageText.trim()) chunks.push(pageText);
          } catch (error) {
            log.debug({ err: error, page: pageNumber }, 'OCR skipped page');
          }
        }
        return chunks.join("\n").trim();
      });
      return fromText('ocr', text);
    } catch (error) {
      return unreadable('ocr', error);
    }
  }
}

export interface TextAcquirerOptions {
  direct: DirectTextExtractor;
  ocr: OcrTextExtractor;
  minTextLength?: number;
}

/**
 * Direct extraction first, OCR when the text layer is missing or too short.
 *
 * Neither method rejects: every failure is reported as an `empty` or
 * `unreadable` result, and `acquireText` collapses both to "".
 */
export class TextAcquirer {
  private readonly direct: DirectTextExtractor;
  private readonly ocr: OcrTextExtractor;
  private readonly minTextLength: number;

  constructor(options: TextAcquirerOptions) {
    this.direct = options.direct;
    this.ocr = options.ocr;
    this.minTextLength = options.minTextLength ?? DEFAULT_MIN_TEXT_LENGTH;
  }

  async acquire(filePath: string, maxPages: number = DEFAULT_MAX_PAGES): Promise<AcquiredText> {
    const log = createDocumentLogger(filePath);
    try {
      const direct = await this.direct.extract(filePath, maxPages);
      if (direct.status === 'unreadable') {
        // A page whose text layer fails to parse may still render
        log.debug({ reason: direct.reason }, 'text layer unreadable, running OCR');
      } else if (textOf(direct).length >= this.minTextLength) {
        return direct;
      } else {
        log.debug({ directLength: textOf(direct).length }, 'text layer too short, running OCR');
      }

      const ocr = await this.ocr.recognize(filePath, maxPages);
      if (ocr.status === 'text') return ocr;
      if (ocr.status === 'unreadable') log.debug({ reason: ocr.reason }, 'OCR failed');
      return direct;
    } catch (error) {
      log.warn({ err: error }, 'text acquisition failed');
      return unreadable('direct', error);
    }
  }

  async acquireText(filePath: string, maxPages: number = DEFAULT_MAX_PAGES): Promise<string> {
    return textOf(await this.acquire(filePath, maxPages));
  }
}

export interface AcquireTextOptions {
  engine: OcrEngine;
  minTextLength?: number;
  renderScale?: number;
}

export const createTextAcquirer = (options: AcquireTextOptions): TextAcquirer =>
  new TextAcquirer({
    direct: new PdfTextExtractor(),
    ocr: new PdfOcrExtractor(options.engine, options.renderScale),
    minTextLength: options.minTextLength,
  });

/**
 * One-shot text acquisition with its own OCR engine, released before
 * returning. Resolves to "" when no text is available.
 */
export const acquireText = async (
  filePath: string,
  maxPages: number = DEFAULT_MAX_PAGES,
  engine?: OcrEngine
): Promise<string> => {
  const ocrEngine = engine ?? new TesseractOcrEngine({ language: 'eng' });
  try {
    return await createTextAcquirer({ engine: ocrEngine }).acquireText(filePath, maxPages);
  } finally {
    if (!engine) {
      await ocrEngine.terminate().catch((error: unknown) => logger.debug({ err: error }, 'OCR engine shutdown failed'));
    }
  }
};
