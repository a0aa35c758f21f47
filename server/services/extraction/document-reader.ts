import { DocumentReadError } from '../../errors';
import { extractionLogger } from '../../logger';
import type { PageText, ReportDocument } from './types';

type PdfjsModule = typeof import('pdfjs-dist/legacy/build/pdf.mjs');

let pdfjs: PdfjsModule | null = null;
async function getPdfjs(): Promise<PdfjsModule> {
  if (!pdfjs) {
    pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');
  }
  return pdfjs;
}

interface PositionedText {
  str: string;
  x: number;
  y: number;
  width: number;
  height: number;
}

const PDF_MAGIC = [0x25, 0x50, 0x44, 0x46, 0x2d]; // %PDF-

export function isPdf(bytes: Uint8Array): boolean {
  return PDF_MAGIC.every((byte, index) => bytes[index] === byte);
}

// Two spaces mark a column boundary; the table extractor splits on them.
export const COLUMN_SEPARATOR = '  ';

export function layoutLine(items: PositionedText[]): string {
  const sorted = [...items].sort((a, b) => a.x - b.x);
  let line = '';
  let previous: PositionedText | null = null;

  for (const item of sorted) {
    if (previous) {
      const charWidth = previous.str.length > 0 ? previous.width / previous.str.length : previous.height / 2;
      const gap = item.x - (previous.x + previous.width);
      if (gap > Math.max(charWidth * 2, 4)) {
        line += COLUMN_SEPARATOR;
      } else if (gap > charWidth * 0.25 && !line.endsWith(' ') && !item.str.startsWith(' ')) {
        line += ' ';
      }
    }
    line += item.str;
    previous = item;
  }
  return line.trimEnd();
}

export function groupIntoLines(items: PositionedText[]): string[] {
  const rows: Array<{ y: number; items: PositionedText[] }> = [];
  const sorted = [...items].sort((a, b) => b.y - a.y || a.x - b.x);

  for (const item of sorted) {
    const tolerance = Math.max(item.height * 0.5, 2);
    const row = rows.find(r => Math.abs(r.y - item.y) <= tolerance);
    if (row) {
      row.items.push(item);
    } else {
      rows.push({ y: item.y, items: [item] });
    }
  }

  return rows
    .sort((a, b) => b.y - a.y)
    .map(row => layoutLine(row.items))
    .filter(line => line.trim().length > 0);
}

async function readPdfPages(bytes: Uint8Array): Promise<PageText[]> {
  const pdfjsLib = await getPdfjs();
  const pdf = await pdfjsLib.getDocument({
    data: new Uint8Array(bytes),
    isEvalSupported: false,
    useSystemFonts: false,
  }).promise.catch((error: unknown) => {
    throw new DocumentReadError(`PDF could not be opened: ${error instanceof Error ? error.message : String(error)}`);
  });

  try {
    const pages: PageText[] = [];
    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
      const page = await pdf.getPage(pageNumber);
      const content = await page.getTextContent();
      const items: PositionedText[] = [];
      for (const item of content.items) {
        if (!('str' in item) || item.str.trim().length === 0) continue;
        items.push({
          str: item.str,
          x: item.transform[4],
          y: item.transform[5],
          width: item.width,
          height: item.height || Math.abs(item.transform[3]),
        });
      }
      pages.push({ pageNumber, lines: groupIntoLines(items) });
      page.cleanup();
    }
    return pages;
  } finally {
    await pdf.destroy();
  }
}

function readTextPages(bytes: Uint8Array): PageText[] {
  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    throw new DocumentReadError('Document is neither a PDF nor UTF-8 text');
  }

  return text
    .replace(/^\uFEFF/, '')
    .split('\f')
    .map((pageText, index) => ({
      pageNumber: index + 1,
      lines: pageText
        .split(/\r?\n/)
        .map(line => line.replace(/\t+/g, COLUMN_SEPARATOR).trimEnd())
        .filter(line => line.trim().length > 0),
    }));
}

export async function readDocumentPages(document: ReportDocument): Promise<PageText[]> {
  const startTime = Date.now();
  const format = isPdf(document.bytes) ? 'pdf' : 'text';
  const pages = format === 'pdf' ? await readPdfPages(document.bytes) : readTextPages(document.bytes);

  const lineCount = pages.reduce((sum, page) => sum + page.lines.length, 0);
  const details = { format, pageCount: pages.length, lineCount, processingTimeMs: Date.now() - startTime };
  if (lineCount === 0) {
    // No text layer (e.g. a scan): every field ends up unresolved.
    extractionLogger.warn(details, 'Document has no extractable text');
  } else {
    extractionLogger.debug(details, 'Document text layer read');
  }

  return pages;
}
