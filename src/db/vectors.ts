import { DBContext } from './client.js';
import { IndexWriteFailedError, RetrievalUnavailableError } from '../errors.js';
import { cosineSimilarity } from '../retrieval/embeddings.js';
import {
  Chunk,
  ChunkMetadata,
  DeleteTarget,
  DocumentRecord,
  FileType,
  IndexEntry,
  IndexMatch,
  IndexStats,
  SimilarityIndex
} from '../types.js';

interface ChunkRow {
  id: string;
  document_id: string;
  chunk_index: number;
  text: string;
  token_count: number;
  embedding_json: string;
  metadata_json: string;
}

interface DocumentRow {
  id: string;
  filename: string;
  file_type: FileType;
  collection: string;
  chunk_count: number;
  char_count: number;
  ingested_at: string;
}

function rowToChunk(row: ChunkRow): Chunk {
  const metadata: ChunkMetadata = JSON.parse(row.metadata_json);
  return {
    id: row.id,
    document_id: row.document_id,
    chunk_index: row.chunk_index,
    text: row.text,
    token_count: row.token_count,
    metadata
  };
}

function assertVectors(entries: IndexEntry[]): void {
  const dims = entries[0].vector.length;
  for (const entry of entries) {
    if (entry.vector.length !== dims || dims === 0) {
      throw new IndexWriteFailedError(
        `Vector for ${entry.chunk.id} has ${entry.vector.length} dimensions, expected ${dims}`
      );
    }
    if (!entry.vector.every((x) => Number.isFinite(x))) {
      throw new IndexWriteFailedError(`Vector for ${entry.chunk.id} contains non-finite values`);
    }
  }
}

function groupByDocument(entries: IndexEntry[]): Map<string, IndexEntry[]> {
  const groups = new Map<string, IndexEntry[]>();
  for (const entry of entries) {
    const list = groups.get(entry.chunk.document_id) || [];
    list.push(entry);
    groups.set(entry.chunk.document_id, list);
  }
  return groups;
}

/**
 * Similarity index over the `documents`/`chunks` tables. Vectors are stored
 * as JSON and scored in process with cosine similarity; every write runs in
 * a single transaction.
 */
export function createSqliteIndex(ctx: DBContext): SimilarityIndex {
  const { db } = ctx;

  const countChunksForDoc = db.prepare('SELECT COUNT(*) as c FROM chunks WHERE document_id = ?');
  const deleteDoc = db.prepare('DELETE FROM documents WHERE id = ?');
  const insertDoc = db.prepare(
    `INSERT INTO documents (id, filename, file_type, collection, chunk_count, char_count, ingested_at)
     VALUES (?, ?, ?, ?, ?, ?, ?)`
  );
  const insertChunk = db.prepare(
    `INSERT INTO chunks (id, document_id, chunk_index, text, token_count, embedding_json, dimensions, metadata_json)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
  );

  const replaceDocuments = db.transaction((groups: Map<string, IndexEntry[]>) => {
    let replaced = 0;
    let upserted = 0;
    for (const [documentId, docEntries] of groups) {
      replaced += Number((countChunksForDoc.get(documentId) as { c: number }).c);
      deleteDoc.run(documentId);

      const first = docEntries[0].chunk.metadata;
      const charCount = Math.max(...docEntries.map((e) => e.chunk.metadata.char_end));
      insertDoc.run(documentId, first.filename, first.file_type, first.collection, docEntries.length, charCount, first.ingested_at);

      for (const { chunk, vector } of docEntries) {
        insertChunk.run(
          chunk.id,
          documentId,
          chunk.chunk_index,
          chunk.text,
          chunk.token_count,
          JSON.stringify(vector),
          vector.length,
          JSON.stringify(chunk.metadata)
        );
        upserted++;
      }
    }
    return { upserted, replaced };
  });

  const deleteByIds = db.transaction((ids: string[]) => {
    const placeholders = ids.map(() => '?').join(', ');
    const affectedDocs = db
      .prepare(`SELECT DISTINCT document_id FROM chunks WHERE id IN (${placeholders})`)
      .all(...ids) as Array<{ document_id: string }>;
    const removed = db.prepare(`DELETE FROM chunks WHERE id IN (${placeholders})`).run(...ids).changes;

    for (const { document_id } of affectedDocs) {
      const left = Number((countChunksForDoc.get(document_id) as { c: number }).c);
      if (left === 0) {
        deleteDoc.run(document_id);
      } else {
        db.prepare('UPDATE documents SET chunk_count = ? WHERE id = ?').run(left, document_id);
      }
    }
    return removed;
  });

  const deleteDocument = db.transaction((documentId: string) => {
    const removed = Number((countChunksForDoc.get(documentId) as { c: number }).c);
    deleteDoc.run(documentId);
    return removed;
  });

  const deleteAll = db.transaction((collection?: string) => {
    if (collection) {
      const removed = Number(
        (
          db
            .prepare('SELECT COUNT(*) as c FROM chunks c JOIN documents d ON d.id = c.document_id WHERE d.collection = ?')
            .get(collection) as { c: number }
        ).c
      );
      db.prepare('DELETE FROM documents WHERE collection = ?').run(collection);
      return removed;
    }
    const removed = Number((db.prepare('SELECT COUNT(*) as c FROM chunks').get() as { c: number }).c);
    db.prepare('DELETE FROM documents').run();
    return removed;
  });

  return {
    async upsert(entries) {
      if (entries.length === 0) return { upserted: 0, replaced: 0 };
      assertVectors(entries);
      try {
        return replaceDocuments(groupByDocument(entries));
      } catch (error) {
        throw new IndexWriteFailedError(
          `Index upsert failed: ${error instanceof Error ? error.message : String(error)}`,
          error
        );
      }
    },

    async delete(target: DeleteTarget) {
      try {
        if ('ids' in target) {
          return target.ids.length === 0 ? 0 : deleteByIds(target.ids);
        }
        if ('documentId' in target) {
          return deleteDocument(target.documentId);
        }
        return deleteAll(target.collection);
      } catch (error) {
        throw new IndexWriteFailedError(
          `Index delete failed: ${error instanceof Error ? error.message : String(error)}`,
          error
        );
      }
    },

    async query(vector, topK, options) {
      const whereClause = options?.collection ? 'WHERE d.collection = ?' : '';
      const params = options?.collection ? [options.collection] : [];

      let rows: ChunkRow[];
      try {
        rows = db
          .prepare(
            `SELECT c.id, c.document_id, c.chunk_index, c.text, c.token_count, c.embedding_json, c.metadata_json
             FROM chunks c JOIN documents d ON d.id = c.document_id
             ${whereClause}
             ORDER BY c.seq`
          )
          .all(...params) as ChunkRow[];
      } catch (error) {
        throw new RetrievalUnavailableError(
          `Index query failed: ${error instanceof Error ? error.message : String(error)}`,
          error
        );
      }

      const matches: IndexMatch[] = rows.map((row) => {
        const embedding = JSON.parse(row.embedding_json) as number[];
        return { id: row.id, score: cosineSimilarity(vector, embedding), chunk: rowToChunk(row) };
      });

      return matches.sort((a, b) => b.score - a.score).slice(0, topK);
    },

    async listDocuments(collection) {
      const rows = collection
        ? db.prepare('SELECT * FROM documents WHERE collection = ? ORDER BY ingested_at DESC, id').all(collection)
        : db.prepare('SELECT * FROM documents ORDER BY ingested_at DESC, id').all();
      return (rows as DocumentRow[]).map((row): DocumentRecord => ({ ...row }));
    },

    async stats(): Promise<IndexStats> {
      const documents = Number((db.prepare('SELECT COUNT(*) as c FROM documents').get() as { c: number }).c);
      const chunks = Number((db.prepare('SELECT COUNT(*) as c FROM chunks').get() as { c: number }).c);
      const dimsRow = db.prepare('SELECT dimensions FROM chunks ORDER BY seq DESC LIMIT 1').get() as
        | { dimensions: number }
        | undefined;
      const collections = db
        .prepare(
          `SELECT d.collection AS collection,
                  COUNT(DISTINCT d.id) AS documents,
                  COUNT(c.id) AS chunks
           FROM documents d
           LEFT JOIN chunks c ON c.document_id = d.id
           GROUP BY d.collection
           ORDER BY documents DESC, d.collection`
        )
        .all() as Array<{ collection: string; documents: number; chunks: number }>;
      return { documents, chunks, dimensions: dimsRow?.dimensions ?? null, collections };
    }
  };
}
