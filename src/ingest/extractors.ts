import { JSDOM } from 'jsdom';
import { Readability } from '@mozilla/readability';
import { readFile, stat } from 'node:fs/promises';
import { createRequire } from 'node:module';
import type PdfParse from 'pdf-parse';
import path from 'node:path';
import { DocumentRejectedError } from '../errors.js';
import { FileType } from '../types.js';

export interface ExtractedContent {
  filename: string;
  fileType: FileType;
  title?: string;
  text: string;
  metadata: Record<string, unknown>;
}

export interface ExtractionOptions {
  maxFileSizeMb: number;
}

const EXTENSIONS: Record<string, FileType> = {
  '.pdf': 'pdf',
  '.txt': 'txt',
  '.text': 'txt',
  '.md': 'md',
  '.markdown': 'md',
  '.html': 'html',
  '.htm': 'html'
};

export function detectFileType(filename: string): FileType | null {
  return EXTENSIONS[path.extname(filename).toLowerCase()] ?? null;
}

/** UTF-8 when the bytes are valid UTF-8, Latin-1 otherwise. */
export function decodeText(buffer: Uint8Array): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(buffer);
  } catch {
    return new TextDecoder('latin1').decode(buffer);
  }
}

export function extractHtml(html: string): { title?: string; text: string } {
  const dom = new JSDOM(html);
  const document = dom.window.document;
  // Readability rewrites the DOM, so read the fallback values first
  const bodyText = document.body?.textContent || '';
  const documentTitle = document.title;
  const article = new Readability(document).parse();
  const text = (article?.textContent?.trim() || bodyText)
    .split('\n')
    .map((line) => line.replace(/[ \t]+/g, ' ').trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
  const title = article?.title || documentTitle || undefined;
  return { title, text };
}

async function extractPdf(buffer: Buffer): Promise<{ title?: string; text: string; pages: number }> {
  // pdf-parse runs its bundled self-test when loaded without a parent module, so it goes through require
  const pdf: typeof PdfParse = createRequire(import.meta.url)('pdf-parse');
  const parsed = await pdf(buffer);
  const info: unknown = parsed.info;
  const title =
    info && typeof info === 'object' && 'Title' in info && typeof info.Title === 'string' && info.Title.trim()
      ? info.Title.trim()
      : undefined;
  return { title, text: parsed.text.trim(), pages: parsed.numpages };
}

export async function extractFromBuffer(
  buffer: Buffer,
  filename: string,
  options: ExtractionOptions
): Promise<ExtractedContent> {
  const fileType = detectFileType(filename);
  if (!fileType) {
    throw new DocumentRejectedError(
      `Unsupported file type for ${filename}. Supported: ${Object.keys(EXTENSIONS).join(', ')}`
    );
  }

  assertWithinSizeLimit(buffer.byteLength, options.maxFileSizeMb);

  let extracted: { title?: string; text: string; metadata: Record<string, unknown> };
  try {
    if (fileType === 'pdf') {
      const { title, text, pages } = await extractPdf(buffer);
      extracted = { title, text, metadata: { pages } };
    } else if (fileType === 'html') {
      const { title, text } = extractHtml(decodeText(buffer));
      extracted = { title, text, metadata: {} };
    } else {
      extracted = { text: decodeText(buffer).trim(), metadata: {} };
    }
  } catch (error) {
    throw new DocumentRejectedError(
      `Failed to extract text from ${filename}: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }

  if (!extracted.text) {
    throw new DocumentRejectedError(`No text content found in ${filename}`);
  }

  return {
    filename,
    fileType,
    title: extracted.title,
    text: extracted.text,
    metadata: { ...extracted.metadata, sizeBytes: buffer.byteLength }
  };
}

function assertWithinSizeLimit(sizeBytes: number, maxFileSizeMb: number): void {
  const sizeMb = sizeBytes / (1024 * 1024);
  if (sizeMb > maxFileSizeMb) {
    throw new DocumentRejectedError(`File size (${sizeMb.toFixed(2)}MB) exceeds the ${maxFileSizeMb}MB limit`);
  }
}

function unreadable(filePath: string, error: unknown): DocumentRejectedError {
  return new DocumentRejectedError(
    `Cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
    error
  );
}

export async function extractFromFile(filePath: string, options: ExtractionOptions): Promise<ExtractedContent> {
  let sizeBytes: number;
  try {
    const info = await stat(filePath);
    if (!info.isFile()) throw new Error('not a regular file');
    sizeBytes = info.size;
  } catch (error) {
    throw unreadable(filePath, error);
  }
  assertWithinSizeLimit(sizeBytes, options.maxFileSizeMb);

  let buffer: Buffer;
  try {
    buffer = await readFile(filePath);
  } catch (error) {
    throw unreadable(filePath, error);
  }
  return extractFromBuffer(buffer, path.basename(filePath), options);
}
