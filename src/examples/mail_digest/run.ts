import 'dotenv/config';
import { readFileSync } from 'node:fs';
import { ChainExecutor } from '../../orchestrator/executor.js';
import { compileChain } from '../../orchestrator/compiler.js';
import { buildOperationRegistry } from '../../operations/registry.js';
import { createConsoleSink } from '../../events/sinks.js';
import { loadEngineConfig } from '../../config.js';
import type { OperationSpec } from '../../types/operations.js';

interface DemoContext { user_id: string }

const inbox = [
  { id: 'm1', subject: 'Quarterly report', from: 'finance@example.test' },
  { id: 'm2', subject: 'Team offsite', from: 'events@example.test' },
  { id: 'm3', subject: 'Report follow-up', from: 'finance@example.test' },
];

// Fails on its first call so the retry shows up in the log.
let uploadCalls = 0;

const operations: OperationSpec<DemoContext>[] = [
  {
    name: 'mail_search_messages',
    input_schema: { query: 'string', max_results: 'number' },
    output_schema: { messages: 'object[]' },
    async invoke(args) {
      const q = String(args.query ?? '').toLowerCase();
      const max = Number(args.max_results ?? 10);
      return { messages: inbox.filter(m => m.subject.toLowerCase().includes(q)).slice(0, max) };
    }
  },
  {
    name: 'summarize_messages',
    input_schema: { messages: 'object[]' },
    output_schema: { summary: 'string' },
    async invoke(args) {
      const messages = Array.isArray(args.messages) ? args.messages : [];
      return { summary: `${messages.length} message(s) matched` };
    }
  },
  {
    name: 'drive_upload_file',
    input_schema: { name: 'string', content: 'string' },
    output_schema: { file_id: 'string' },
    async invoke(args, ctx) {
      uploadCalls++;
      if (uploadCalls === 1) throw new Error('upload timed out');
      return { file_id: `${ctx.user_id}/${String(args.name)}` };
    }
  },
  {
    name: 'notify',
    input_schema: { message: 'string' },
    output_schema: { delivered: 'boolean' },
    async invoke(args) {
      console.log(`  [notify] ${String(args.message)}`);
      return { delivered: true };
    }
  },
];

function getArg(name: string, fallback?: string): string | undefined {
  const ix = process.argv.findIndex(a => a === name || a.startsWith(name + '='));
  if (ix === -1) return fallback;
  const val = process.argv[ix];
  if (val.includes('=')) return val.split('=')[1];
  return process.argv[ix+1] ?? fallback;
}

async function main() {
  const config = loadEngineConfig();
  const raw: unknown = JSON.parse(readFileSync(new URL('./chain.json', import.meta.url), 'utf-8'));
  const { definition } = compileChain(raw);

  const executor = new ChainExecutor<DemoContext>({
    registry: buildOperationRegistry(operations),
    context: { user_id: process.env.DEMO_USER || 'demo-user' },
    chains: { mail_digest: definition },
    sink: config.quiet ? undefined : createConsoleSink({ steps: config.logSteps, events: config.logEvents }),
    config,
  });

  const result = await executor.execute('mail_digest', { search_query: getArg('--query') || 'report' });

  console.log('\n[Final state]');
  for (const [k, v] of Object.entries(result.final_state)) {
    console.log(`• ${k}:`, JSON.stringify(v, null, 2));
  }
  console.log(`\n${result.status}: ${result.steps_succeeded}/${result.steps_executed} steps, ${result.attempts} attempts`);
}

main().catch(e => { console.error(e); process.exit(1); });
