import { IngestResult } from '../types.js';
import { ExtractedContent } from './extractors.js';

export function buildIngestionSummary(
  result: IngestResult,
  content: Pick<ExtractedContent, 'filename' | 'fileType' | 'title' | 'text'>
): string {
  const preview = (content.text || '').replace(/\s+/g, ' ').trim().slice(0, 280);
  return [
    `✅ Ingested ${result.documentId}`,
    `File: ${content.filename}`,
    content.title ? `Title: ${content.title}` : null,
    `Type: ${content.fileType}`,
    `Chunks: ${result.chunksProcessed}${result.replacedChunks > 0 ? ` (replaced ${result.replacedChunks})` : ''}`,
    preview ? `Preview: ${preview}${preview.length >= 280 ? '…' : ''}` : null
  ]
    .filter(Boolean)
    .join('\n');
}
