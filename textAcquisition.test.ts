import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterAll, beforeAll, describe, it, expect, vi } from 'vitest';
import type { OcrEngine } from './ocrService.js';
import {
  acquireText,
  joinTextRuns,
  PdfOcrExtractor,
  PdfTextExtractor,
  renderPageToPng,
  TextAcquirer,
  textOf,
  withPdfDocument,
  type DirectTextExtractor,
  type OcrTextExtractor,
} from './textAcquisition.js';
import type { AcquiredText } from './types.js';

const LONG_TEXT = 'NORTHWIND TRADERS SDN BHD\nQuarterly Statement of Account\nPage 1 of 2';
const MISSING_PDF = path.join(os.tmpdir(), 'renamer-does-not-exist', 'missing.pdf');

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

/** Minimal PDF with one Helvetica text line per entry, one page per inner array. */
const buildPdf = (pages: string[][]): string => {
  const pageIds = pages.map((_, i) => 4 + i * 2);
  const objects = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    `<< /Type /Pages /Kids [${pageIds.map(id => `${id} 0 R`).join(' ')}] /Count ${pages.length} >>`,
    '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>',
  ];
  pages.forEach((lines, i) => {
    const stream = `BT /F1 24 Tf 72 720 Td ${lines.map(line => `(${line}) Tj`).join(' 0 -36 Td ')} ET`;
    objects.push(
      `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Resources << /Font << /F1 3 0 R >> >> /Contents ${pageIds[i] + 1} 0 R >>`,
      `<< /Length ${stream.length} >>\nstream\n${stream}\nendstream`
    );
  });

  let pdf = '%PDF-1.4\n';
  const offsets: number[] = [];
  objects.forEach((body, i) => {
    offsets.push(pdf.length);
    pdf += `${i + 1} 0 obj\n${body}\nendobj\n`;
  });
  const xrefOffset = pdf.length;
  pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  pdf += offsets.map(offset => `${String(offset).padStart(10, '0')} 00000 n \n`).join('');
  pdf += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;
  return pdf;
};

const stubDirect = (result: AcquiredText) => ({
  extract: vi.fn<DirectTextExtractor['extract']>().mockResolvedValue(result),
});

const stubOcr = (result: AcquiredText) => ({
  recognize: vi.fn<OcrTextExtractor['recognize']>().mockResolvedValue(result),
});

const fakeEngine = (): OcrEngine => ({
  recognize: vi.fn<OcrEngine['recognize']>().mockResolvedValue('never used'),
  terminate: vi.fn<OcrEngine['terminate']>().mockResolvedValue(undefined),
});

describe('TextAcquirer', () => {
  it('returns direct text without OCR when it is long enough', async () => {
    const direct = stubDirect({ status: 'text', source: 'direct', text: LONG_TEXT });
    const ocr = stubOcr({ status: 'text', source: 'ocr', text: 'ocr text' });
    const acquirer = new TextAcquirer({ direct, ocr });

    expect(await acquirer.acquireText('/docs/native.pdf', 2)).toBe(LONG_TEXT);
    expect(direct.extract).toHaveBeenCalledWith('/docs/native.pdf', 2);
    expect(ocr.recognize).not.toHaveBeenCalled();
  });

  it('falls back to OCR when the text layer is empty', async () => {
    const direct = stubDirect({ status: 'empty', source: 'direct' });
    const ocr = stubOcr({ status: 'text', source: 'ocr', text: 'TENAGA NASIONAL' });
    const acquirer = new TextAcquirer({ direct, ocr });

    const result = await acquirer.acquire('/docs/scan.pdf', 1);
    expect(result).toEqual({ status: 'text', source: 'ocr', text: 'TENAGA NASIONAL' });
    expect(ocr.recognize).toHaveBeenCalledTimes(1);
    expect(ocr.recognize).toHaveBeenCalledWith('/docs/scan.pdf', 1);
  });

  it('falls back to OCR when the text layer is too short', async () => {
    const direct = stubDirect({ status: 'text', source: 'direct', text: 'Page 1' });
    const ocr = stubOcr({ status: 'text', source: 'ocr', text: 'Scanned letterhead' });
    const acquirer = new TextAcquirer({ direct, ocr, minTextLength: 10 });

    expect(await acquirer.acquireText('/docs/a.pdf')).toBe('Scanned letterhead');
  });

  it('keeps the short direct text when OCR finds nothing', async () => {
    const direct = stubDirect({ status: 'text', source: 'direct', text: 'Page 1' });
    const ocr = stubOcr({ status: 'empty', source: 'ocr' });
    const acquirer = new TextAcquirer({ direct, ocr });

    expect(await acquirer.acquire('/docs/a.pdf')).toEqual({ status: 'text', source: 'direct', text: 'Page 1' });
  });

  it('runs OCR when the text layer cannot be parsed', async () => {
    const direct = stubDirect({ status: 'unreadable', source: 'direct', reason: 'Invalid font map.' });
    const ocr = stubOcr({ status: 'text', source: 'ocr', text: 'TENAGA NASIONAL\nMonthly Electricity Bill' });
    const acquirer = new TextAcquirer({ direct, ocr });

    expect(await acquirer.acquireText('/docs/broken-fonts.pdf', 2)).toBe('TENAGA NASIONAL\nMonthly Electricity Bill');
    expect(ocr.recognize).toHaveBeenCalledWith('/docs/broken-fonts.pdf', 2);
  });

  it('returns an empty string when neither step can read the document', async () => {
    const direct = stubDirect({ status: 'unreadable', source: 'direct', reason: 'Invalid PDF structure.' });
    const ocr = stubOcr({ status: 'unreadable', source: 'ocr', reason: 'Invalid PDF structure.' });
    const acquirer = new TextAcquirer({ direct, ocr });

    expect(await acquirer.acquireText('/docs/broken.pdf')).toBe('');
    expect(ocr.recognize).toHaveBeenCalledTimes(1);
  });

  it('returns an empty string when OCR is unavailable', async () => {
    const direct = stubDirect({ status: 'empty', source: 'direct' });
    const ocr = stubOcr({ status: 'unreadable', source: 'ocr', reason: 'no language data' });
    const acquirer = new TextAcquirer({ direct, ocr });

    expect(await acquirer.acquireText('/docs/scan.pdf')).toBe('');
  });

  it('does not reject when an extractor throws', async () => {
    const direct = { extract: vi.fn<DirectTextExtractor['extract']>().mockRejectedValue(new Error('boom')) };
    const ocr = stubOcr({ status: 'empty', source: 'ocr' });
    const acquirer = new TextAcquirer({ direct, ocr });

    expect(await acquirer.acquire('/docs/a.pdf')).toEqual({ status: 'unreadable', source: 'direct', reason: 'boom' });
  });
});

describe('pdfjs extractors', () => {
  let dir: string;
  let billPdf: string;
  let twoPagePdf: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'acquisition-test-'));
    billPdf = path.join(dir, 'bill.pdf');
    twoPagePdf = path.join(dir, 'two-pages.pdf');
    fs.writeFileSync(billPdf, buildPdf([['TENAGA NASIONAL', 'Monthly Electricity Bill']]), 'latin1');
    fs.writeFileSync(twoPagePdf, buildPdf([['First page'], ['Second page']]), 'latin1');
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads the text layer line by line', async () => {
    const result = await new PdfTextExtractor().extract(billPdf, 2);
    expect(result).toEqual({ status: 'text', source: 'direct', text: 'TENAGA NASIONAL\nMonthly Electricity Bill' });
  });

  it('joins pages in order and stops at the page limit', async () => {
    expect(textOf(await new PdfTextExtractor().extract(twoPagePdf, 2))).toBe('First page\nSecond page');
    expect(textOf(await new PdfTextExtractor().extract(twoPagePdf, 1))).toBe('First page');
  });

  it('renders a page to a PNG image', async () => {
    const image = await withPdfDocument(billPdf, pdf => renderPageToPng(pdf, 1, 1));
    expect(image.subarray(0, 8).equals(PNG_SIGNATURE)).toBe(true);
  });

  it('propagates a failure inside the document callback', async () => {
    await expect(
      withPdfDocument(twoPagePdf, async pdf => {
        throw new Error(`gave up after ${pdf.numPages} pages`);
      })
    ).rejects.toThrow('gave up after 2 pages');
  });

  it('skips a page the OCR engine fails on and keeps the others', async () => {
    const recognize = vi
      .fn<OcrEngine['recognize']>()
      .mockRejectedValueOnce(new Error('recognition failed'))
      .mockResolvedValueOnce('Second page\n');
    const engine: OcrEngine = { recognize, terminate: vi.fn<OcrEngine['terminate']>().mockResolvedValue(undefined) };

    const result = await new PdfOcrExtractor(engine, 1).recognize(twoPagePdf, 2);

    expect(result).toEqual({ status: 'text', source: 'ocr', text: 'Second page' });
    expect(recognize).toHaveBeenCalledTimes(2);
    for (const [image] of recognize.mock.calls) {
      expect(image.subarray(0, 8).equals(PNG_SIGNATURE)).toBe(true);
    }
  });

  it('reports a missing file as unreadable', async () => {
    const result = await new PdfTextExtractor().extract(MISSING_PDF, 2);
    expect(result.status).toBe('unreadable');
  });

  it('does not run the OCR engine for a missing file', async () => {
    const engine = fakeEngine();
    const result = await new PdfOcrExtractor(engine).recognize(MISSING_PDF, 2);
    expect(result.status).toBe('unreadable');
    expect(engine.recognize).not.toHaveBeenCalled();
  });

  it('acquireText resolves to an empty string for a missing file', async () => {
    const engine = fakeEngine();
    await expect(acquireText(MISSING_PDF, 2, engine)).resolves.toBe('');
    expect(engine.terminate).not.toHaveBeenCalled();
  });
});

describe('joinTextRuns', () => {
  it('breaks lines at end-of-line runs and ignores marked content', () => {
    const items = [
      { str: 'ACME', hasEOL: false },
      { str: ' LTD', hasEOL: true },
      { type: 'beginMarkedContent' },
      { str: 'Invoice', hasEOL: false },
    ];
    expect(joinTextRuns(items)).toBe('ACME LTD\nInvoice');
  });
});

describe('textOf', () => {
  it('collapses empty and unreadable results to an empty string', () => {
    expect(textOf({ status: 'empty', source: 'ocr' })).toBe('');
    expect(textOf({ status: 'unreadable', source: 'direct', reason: 'x' })).toBe('');
    expect(textOf({ status: 'text', source: 'direct', text: 'abc' })).toBe('abc');
  });
});
