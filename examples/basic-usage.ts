/**
 * @fileoverview Runs one agent invocation end to end without a network.
 *
 * A scripted text-protocol model looks up an invoice, is stopped from
 * calling a denied tool, and then answers. The journal trail is checked
 * against the phase cycle at the end.
 */

import { z } from 'zod';
import {
  BufferedJournal,
  InMemoryKnowledgeStore,
  ReasoningLoopRunner,
  RuleBasedPolicyGate,
  StoreKnowledgeBridge,
  TextProtocolProvider,
  ToolRegistry,
  createAgentId,
  createLogger,
  defineTool,
  denyTools,
  resolveLoopConfig,
  validateToolArguments,
  verifyPhaseOrder,
  type TextCompletionFn,
} from '../src/index.js';

const invoices: Record<string, string> = { 'invoice-7': 'paid', 'invoice-8': 'open' };

const lookupInvoice = defineTool({
  name: 'lookup_invoice',
  description: 'Returns the status of an invoice',
  parameters: { type: 'object', properties: { id: { type: 'string' } }, required: ['id'] },
  input: z.object({ id: z.string() }),
  execute: ({ id }) => invoices[id] ?? `no invoice ${id}`,
});

const cancelInvoice = defineTool({
  name: 'cancel_invoice',
  description: 'Cancels an invoice',
  parameters: { type: 'object', properties: { id: { type: 'string' } }, required: ['id'] },
  input: z.object({ id: z.string() }),
  execute: ({ id }) => `cancelled ${id}`,
});

const replies = [
  '```json\n{"tool_calls":[{"name":"lookup_invoice","arguments":{"id":"invoice-7"}},{"name":"cancel_invoice","arguments":{"id":"invoice-7"}}]}\n```',
  'Invoice invoice-7 is paid, so there is nothing to cancel.',
];
let turn = 0;
const scriptedModel: TextCompletionFn = async () => ({ text: replies[Math.min(turn++, replies.length - 1)], model: 'scripted' });

async function main(): Promise<void> {
  const logger = createLogger('example');
  const registry = new ToolRegistry({ logger }).register(lookupInvoice).register(cancelInvoice);
  const journal = new BufferedJournal();

  const runner = new ReasoningLoopRunner({
    provider: new TextProtocolProvider(scriptedModel),
    invoker: registry,
    policyGate: new RuleBasedPolicyGate([denyTools(['cancel_invoice']), validateToolArguments()]),
    knowledgeBridge: new StoreKnowledgeBridge(new InMemoryKnowledgeStore()),
    journal,
    logger,
  });

  runner.on('loop:phase', (phase, iteration) => logger.info('Phase', { phase, iteration }));
  runner.on('loop:observation', observation =>
    logger.info('Observation', { tool: observation.toolName, status: observation.result.status }),
  );

  const result = await runner.run(
    createAgentId('billing'),
    [
      { role: 'system', content: 'You handle invoice questions.' },
      { role: 'user', content: 'Is invoice-7 paid? Cancel it if it is still open.' },
    ],
    resolveLoopConfig({ maxIterations: 5, tools: registry.definitions() }),
  );

  const report = verifyPhaseOrder(journal.entries());
  logger.info('Run finished', {
    output: result.output,
    reason: result.terminationReason.type,
    iterations: result.iterations,
    journalEntries: journal.size,
    phaseOrderValid: report.valid,
  });
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
