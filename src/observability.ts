import { DBContext } from './db/client.js';
import { PipelineErrorKind, PipelinePhase } from './errors.js';
import { QueryState, QueryTiming } from './types.js';

export function logIngestEvent(
  ctx: DBContext,
  params: {
    jobId?: number;
    documentId?: string;
    filename?: string;
    level?: 'info' | 'warn' | 'error';
    eventType: string;
    event?: Record<string, unknown>;
  }
): void {
  ctx.db
    .prepare(
      `INSERT INTO ingest_logs (job_id, document_id, filename, level, event_type, event_json)
       VALUES (?, ?, ?, ?, ?, ?)`
    )
    .run(
      params.jobId || null,
      params.documentId || null,
      params.filename || null,
      params.level || 'info',
      params.eventType,
      JSON.stringify(params.event || {})
    );
}

export function recordJobMetric(
  ctx: DBContext,
  params: { jobId?: number; metricName: string; metricValue: number; labels?: Record<string, unknown> }
): void {
  ctx.db
    .prepare('INSERT INTO job_metrics (job_id, metric_name, metric_value, labels_json) VALUES (?, ?, ?, ?)')
    .run(params.jobId || null, params.metricName, params.metricValue, JSON.stringify(params.labels || {}));
}

export function recordQuery(
  ctx: DBContext,
  params: {
    question: string;
    finalState: QueryState;
    timing: QueryTiming;
    chunksRetrieved: number;
    errorKind?: PipelineErrorKind;
    errorPhase?: PipelinePhase;
  }
): void {
  ctx.db
    .prepare(
      `INSERT INTO query_logs (question, final_state, embedding_ms, retrieval_ms, assembly_ms, generation_ms, total_ms,
                               chunks_retrieved, error_kind, error_phase)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    )
    .run(
      params.question,
      params.finalState,
      params.timing.embedding_ms,
      params.timing.retrieval_ms,
      params.timing.assembly_ms,
      params.timing.generation_ms,
      params.timing.total_ms,
      params.chunksRetrieved,
      params.errorKind || null,
      params.errorPhase || null
    );
}

export function healthStatus(ctx: DBContext): {
  dbOk: boolean;
  documentCount: number;
  chunkCount: number;
  jobs: { running: number; done: number; failed: number };
  recentFailures24h: number;
  queries24h: { completed: number; failed: number; avgTotalMs: number | null };
} {
  const dbOk = Boolean(ctx.db.prepare('SELECT 1 as ok').get());
  const documentCount = Number((ctx.db.prepare('SELECT COUNT(*) as c FROM documents').get() as { c: number }).c);
  const chunkCount = Number((ctx.db.prepare('SELECT COUNT(*) as c FROM chunks').get() as { c: number }).c);
  const jobs = ctx.db
    .prepare(
      `SELECT
         SUM(CASE WHEN status = 'running' THEN 1 ELSE 0 END) as running,
         SUM(CASE WHEN status = 'done' THEN 1 ELSE 0 END) as done,
         SUM(CASE WHEN status = 'failed' THEN 1 ELSE 0 END) as failed
       FROM jobs`
    )
    .get() as { running: number | null; done: number | null; failed: number | null };

  const recentFailures24h = Number(
    (
      ctx.db
        .prepare("SELECT COUNT(*) as c FROM jobs WHERE status = 'failed' AND created_at >= datetime('now', '-1 day')")
        .get() as { c: number }
    ).c
  );

  const queries = ctx.db
    .prepare(
      `SELECT
         SUM(CASE WHEN final_state = 'COMPLETE' THEN 1 ELSE 0 END) as completed,
         SUM(CASE WHEN final_state = 'FAILED' THEN 1 ELSE 0 END) as failed,
         AVG(CASE WHEN final_state = 'COMPLETE' THEN total_ms END) as avg_total_ms
       FROM query_logs
       WHERE created_at >= datetime('now', '-1 day')`
    )
    .get() as { completed: number | null; failed: number | null; avg_total_ms: number | null };

  return {
    dbOk,
    documentCount,
    chunkCount,
    jobs: {
      running: jobs.running || 0,
      done: jobs.done || 0,
      failed: jobs.failed || 0
    },
    recentFailures24h,
    queries24h: {
      completed: queries.completed || 0,
      failed: queries.failed || 0,
      avgTotalMs: queries.avg_total_ms === null ? null : Math.round(queries.avg_total_ms * 100) / 100
    }
  };
}
