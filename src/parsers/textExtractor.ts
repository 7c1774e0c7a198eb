import path from 'path';
import mammoth from 'mammoth';
import { PDFParse } from 'pdf-parse';
import { ExtractionError, UnsupportedFormatError, errorMessage } from '../errors.js';
import type { DocumentFormat } from '../types.js';

const EXTENSION_FORMATS: Record<string, DocumentFormat> = {
  '.pdf': 'pdf',
  '.docx': 'docx',
  '.txt': 'text',
  '.text': 'text',
  '.md': 'text',
};

const MIME_FORMATS: Record<string, DocumentFormat> = {
  'application/pdf': 'pdf',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document': 'docx',
  'text/plain': 'text',
  'text/markdown': 'text',
};

export function resolveFormat(fileName: string, mimeType?: string): DocumentFormat {
  const ext = path.extname(fileName).toLowerCase();
  const byExtension = EXTENSION_FORMATS[ext];
  if (byExtension) return byExtension;

  const mime = (mimeType ?? '').split(';')[0].trim().toLowerCase();
  const byMime = MIME_FORMATS[mime];
  if (byMime) return byMime;

  throw new UnsupportedFormatError(
    `Unsupported file format "${ext || mime || 'unknown'}" (expected pdf, docx or plain text)`,
  );
}

function normalizeText(text: string): string {
  return text
    .replace(/\r\n/g, '\n')
    .replace(/[ \t]+/g, ' ')
    .replace(/ *\n */g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

// pdf-parse puts a "-- 1 of 3 --" line after every page
const PAGE_SEPARATOR = /^[ \t]*-- \d+ of \d+ --[ \t]*$/gm;

async function parsePDF(bytes: Buffer): Promise<string> {
  // pdf.js takes ownership of the array it is given
  const parser = new PDFParse({ data: new Uint8Array(bytes) });
  try {
    const result = await parser.getText();
    return result.text.replace(PAGE_SEPARATOR, '');
  } finally {
    await parser.destroy();
  }
}

async function parseDOCX(bytes: Buffer): Promise<string> {
  const result = await mammoth.extractRawText({ buffer: bytes });
  return result.value;
}

function decodeText(bytes: Buffer): string {
  const decoded = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  return decoded.replace(/^\uFEFF/, '');
}

export async function extractText(bytes: Buffer, format: DocumentFormat): Promise<string> {
  try {
    switch (format) {
      case 'pdf':
        return normalizeText(await parsePDF(bytes));
      case 'docx':
        return normalizeText(await parseDOCX(bytes));
      case 'text':
        return normalizeText(decodeText(bytes));
    }
  } catch (err) {
    throw new ExtractionError(`Could not read ${format} document: ${errorMessage(err)}`, { cause: err });
  }
}
