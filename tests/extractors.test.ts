import { describe, it, expect, vi, afterEach } from 'vitest';
import fs from 'node:fs';
import { readFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { decodeText, detectFileType, extractFromBuffer, extractFromFile, extractHtml } from '../src/ingest/extractors.js';
import { DocumentRejectedError } from '../src/errors.js';

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return { ...actual, readFile: vi.fn(actual.readFile) };
});

const LIMITS = { maxFileSizeMb: 10 };

describe('detectFileType', () => {
  it('maps known extensions case-insensitively', () => {
    expect(detectFileType('report.PDF')).toBe('pdf');
    expect(detectFileType('notes.markdown')).toBe('md');
    expect(detectFileType('page.htm')).toBe('html');
    expect(detectFileType('readme.txt')).toBe('txt');
    expect(detectFileType('sheet.xlsx')).toBeNull();
  });
});

describe('decodeText', () => {
  it('reads UTF-8 and falls back to Latin-1', () => {
    expect(decodeText(Buffer.from('naïve café', 'utf8'))).toBe('naïve café');
    expect(decodeText(Buffer.from([0x63, 0x61, 0x66, 0xe9]))).toBe('café');
  });
});

describe('extractHtml', () => {
  it('returns the page title and readable text', () => {
    const { title, text } = extractHtml(
      '<html><head><title>Care Guide</title></head><body><p>Feed the cat twice a day.</p></body></html>'
    );
    expect(title).toBe('Care Guide');
    expect(text).toContain('Feed the cat twice a day.');
  });
});

describe('extractFromBuffer', () => {
  it('extracts plain text with its size', async () => {
    const extracted = await extractFromBuffer(Buffer.from('  Hello world\n'), 'hello.txt', LIMITS);
    expect(extracted).toEqual({
      filename: 'hello.txt',
      fileType: 'txt',
      title: undefined,
      text: 'Hello world',
      metadata: { sizeBytes: 14 }
    });
  });

  it('rejects unsupported types, oversized files and empty text', async () => {
    await expect(extractFromBuffer(Buffer.from('x'), 'slides.pptx', LIMITS)).rejects.toThrow(
      /^Unsupported file type for slides\.pptx/
    );
    await expect(extractFromBuffer(Buffer.alloc(2 * 1024 * 1024, 97), 'big.txt', { maxFileSizeMb: 1 })).rejects.toThrow(
      'File size (2.00MB) exceeds the 1MB limit'
    );
    await expect(extractFromBuffer(Buffer.from(' \n '), 'blank.md', LIMITS)).rejects.toBeInstanceOf(
      DocumentRejectedError
    );
  });
});

describe('extractFromFile', () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = null;
    vi.mocked(readFile).mockClear();
  });

  it('reads a file from disk', async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'docqa-extract-'));
    const file = path.join(dir, 'hello.txt');
    fs.writeFileSync(file, 'Hello world');

    await expect(extractFromFile(file, LIMITS)).resolves.toMatchObject({ filename: 'hello.txt', text: 'Hello world' });
    expect(vi.mocked(readFile)).toHaveBeenCalledTimes(1);
  });

  it('rejects an oversized file without reading it', async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'docqa-extract-'));
    const file = path.join(dir, 'big.txt');
    fs.writeFileSync(file, Buffer.alloc(2 * 1024 * 1024, 97));

    await expect(extractFromFile(file, { maxFileSizeMb: 1 })).rejects.toThrow('File size (2.00MB) exceeds the 1MB limit');
    expect(vi.mocked(readFile)).not.toHaveBeenCalled();
  });

  it('rejects a missing path as unreadable', async () => {
    await expect(extractFromFile(path.join(os.tmpdir(), 'docqa-missing', 'none.txt'), LIMITS)).rejects.toBeInstanceOf(
      DocumentRejectedError
    );
  });
});
