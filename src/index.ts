#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig, parseSettingValue } from './config.js';
import { initDB } from './db/client.js';
import { registerCommands, startDiscordBot } from './discord/bot.js';
import { getErrorMessage } from './errors.js';
import { deleteAllDocuments, deleteDocument, ingestFile, listDocuments } from './ingest/pipeline.js';
import { healthStatus } from './observability.js';
import { answerQuestion, formatAnswer, toQueryResponse } from './retrieval/query.js';
import { changeSettings, createServices, currentSettings } from './services.js';

const BOOLEAN_FLAGS = new Set(['json', 'all']);

function parseFlags(args: string[]): { positional: string[]; flags: Record<string, string> } {
  const positional: string[] = [];
  const flags: Record<string, string> = {};
  let i = 0;
  while (i < args.length) {
    const name = args[i].startsWith('--') ? args[i].slice(2) : null;
    if (name && BOOLEAN_FLAGS.has(name)) {
      flags[name] = 'true';
      i++;
    } else if (name && i + 1 < args.length && !args[i + 1].startsWith('--')) {
      flags[name] = args[i + 1];
      i += 2;
    } else {
      positional.push(args[i]);
      i++;
    }
  }
  return { positional, flags };
}

function optionalNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

function printUsage(): void {
  console.log('Usage:');
  console.log('  npm run dev -- ingest <file> [--id <document id>] [--collection <name>]');
  console.log('  npm run dev -- ask "<question>" [--top-k <n>] [--threshold <score>] [--collection <name>] [--json]');
  console.log('  npm run dev -- documents [--collection <name>]');
  console.log('  npm run dev -- delete <document id> | --all [--collection <name>]');
  console.log('  npm run dev -- status');
  console.log('  npm run dev -- collections');
  console.log('  npm run dev -- config set <topK|scoreThreshold|emptyContextPolicy|autoSummaryPostEnabled|summaryChannelId> <value>');
  console.log('  npm run dev -- discord');
}

async function main() {
  const config = loadConfig();
  const ctx = initDB(config.dbPath);
  const services = createServices(ctx, config);

  const rawArgs = process.argv.slice(2);
  const cmd = rawArgs[0];
  const rest = rawArgs.slice(1);

  if (cmd === 'ingest') {
    const { positional, flags } = parseFlags(rest);
    const file = positional[0];
    if (!file) {
      console.error('Error: file path required.\nUsage: npm run dev -- ingest <file> [--id <document id>] [--collection <name>]');
      process.exit(1);
    }
    const result = await ingestFile(services, file, { documentId: flags.id, collection: flags.collection });
    console.log(
      `Ingested ${result.filename} as ${result.documentId}: ${result.chunksProcessed} chunks` +
        `${result.replacedChunks > 0 ? ` (replaced ${result.replacedChunks})` : ''} in ${result.processingTimeMs}ms`
    );
    return;
  }

  if (cmd === 'ask') {
    const { positional, flags } = parseFlags(rest);
    const question = positional.join(' ');
    if (!question) {
      console.error('Error: Question required.\nUsage: npm run dev -- ask "<question>" [--top-k <n>] [--threshold <score>]');
      process.exit(1);
    }

    const controller = new AbortController();
    process.once('SIGINT', () => controller.abort());
    const result = await answerQuestion(
      services,
      {
        question,
        top_k: optionalNumber(flags['top-k']),
        score_threshold: optionalNumber(flags.threshold),
        collection: flags.collection
      },
      { signal: controller.signal }
    );
    console.log(flags.json ? JSON.stringify(toQueryResponse(result), null, 2) : formatAnswer(result));
    return;
  }

  if (cmd === 'documents') {
    const { flags } = parseFlags(rest);
    const docs = await listDocuments(services, flags.collection);
    if (docs.length === 0) {
      console.log('No documents found. Ingest one first:');
      console.log('  npm run dev -- ingest <file>');
      return;
    }
    for (const doc of docs) {
      console.log(
        `${doc.id}  ${doc.filename}  [${doc.file_type}, ${doc.collection}]  ${doc.chunk_count} chunks  ${doc.ingested_at}`
      );
    }
    return;
  }

  if (cmd === 'delete') {
    const { positional, flags } = parseFlags(rest);
    if (flags.all) {
      const removed = await deleteAllDocuments(services, flags.collection);
      console.log(`Deleted ${removed} chunks${flags.collection ? ` from collection "${flags.collection}"` : ''}`);
      return;
    }
    const documentId = positional[0];
    if (!documentId) {
      console.error('Error: document id or --all required.');
      process.exit(1);
    }
    const removed = await deleteDocument(services, documentId);
    console.log(`Deleted ${documentId} (${removed} chunks)`);
    return;
  }

  if (cmd === 'status') {
    console.log(
      JSON.stringify(
        {
          health: healthStatus(ctx),
          index: await services.index.stats(),
          embedder: services.embedder.name,
          generator: services.generator.name,
          settings: currentSettings(services)
        },
        null,
        2
      )
    );
    return;
  }

  if (cmd === 'collections') {
    const { collections } = await services.index.stats();
    if (collections.length === 0) {
      console.log('No collections found. Ingest some content first:');
      console.log('  npm run dev -- ingest <file> --collection <name>');
      return;
    }

    console.log('Collections:\n');
    const maxName = Math.max(10, ...collections.map((r) => r.collection.length));
    console.log(`  ${'Name'.padEnd(maxName)}  Documents  Chunks`);
    console.log(`  ${'─'.repeat(maxName)}  ─────────  ──────`);
    for (const row of collections) {
      console.log(
        `  ${row.collection.padEnd(maxName)}  ${String(row.documents).padStart(9)}  ${String(row.chunks).padStart(6)}`
      );
    }
    return;
  }

  if (cmd === 'config' && rest[0] === 'set' && rest[1] && rest[2] !== undefined) {
    const updated = changeSettings(services, parseSettingValue(rest[1], rest.slice(2).join(' ')));
    console.log(JSON.stringify(updated, null, 2));
    return;
  }

  if (cmd === 'discord') {
    await registerCommands();
    await startDiscordBot(services);
    return;
  }

  printUsage();
}

main().catch((err) => {
  console.error(getErrorMessage(err));
  process.exit(1);
});
