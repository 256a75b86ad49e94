#!/usr/bin/env node

/**
 * Pipeline demo
 *
 * 1. Runs a hand-assembled three behavior chain four times, with and without
 *    a cancelled signal.
 * 2. Builds a two stage pipeline from registrations (ordering constraints,
 *    a replacement, a removal, a connector and a terminator) and runs it.
 */

import 'dotenv/config';

import {
  Behavior,
  CancellationError,
  DefaultBuilder,
  Pipeline,
  PipelineModifications,
  PipelineTerminator,
  StageConnector,
  behaviorContract,
  compileBehaviorChain,
  connectorContract,
  defineContext,
  terminatorContract,
  throwIfCancellationRequested,
  type NextFn,
} from '../index.js';
import { printDivider, printError, printHeader, printInfo, printRaw, printStep, printSuccess } from './utils.js';

interface IncomingMessage {
  messageId: string;
  headers: Record<string, string>;
  body: string;
}

interface LogicalMessage {
  messageId: string;
  headers: Record<string, string>;
  message: { type: string; payload: unknown };
}

const Incoming = defineContext<IncomingMessage>('IncomingMessage');
const Logical = defineContext<LogicalMessage>('LogicalMessage');

class TraceIncoming extends Behavior<IncomingMessage> {
  static readonly contract = behaviorContract(Incoming);

  async handle(context: IncomingMessage, next: () => Promise<void>): Promise<void> {
    printRaw(`  TraceIncoming     ${context.messageId}`);
    await next();
  }
}

class StampHeaders extends Behavior<IncomingMessage> {
  static readonly contract = behaviorContract(Incoming);

  async handle(context: IncomingMessage, next: () => Promise<void>): Promise<void> {
    context.headers['x-received-at'] = new Date().toISOString();
    printRaw(`  StampHeaders      ${Object.keys(context.headers).length} header(s)`);
    await next();
  }
}

class CheckCancellation extends Behavior<IncomingMessage> {
  static readonly contract = behaviorContract(Incoming);

  async handle(_context: IncomingMessage, next: () => Promise<void>, signal: AbortSignal): Promise<void> {
    printRaw('  CheckCancellation');
    throwIfCancellationRequested(signal);
    await next();
  }
}

class AuditIncoming extends Behavior<IncomingMessage> {
  static readonly contract = behaviorContract(Incoming);

  async handle(context: IncomingMessage, next: () => Promise<void>): Promise<void> {
    printRaw(`  AuditIncoming     body=${context.body}`);
    await next();
  }
}

class QuietAudit extends Behavior<IncomingMessage> {
  static readonly contract = behaviorContract(Incoming);

  async handle(_context: IncomingMessage, next: () => Promise<void>): Promise<void> {
    printRaw('  QuietAudit');
    await next();
  }
}

class MeasureIncoming extends Behavior<IncomingMessage> {
  static readonly contract = behaviorContract(Incoming);

  async handle(_context: IncomingMessage, next: () => Promise<void>): Promise<void> {
    printRaw('  MeasureIncoming');
    await next();
  }
}

class Deserialize extends StageConnector<IncomingMessage, LogicalMessage> {
  static readonly contract = connectorContract(Incoming, Logical);

  async invoke(context: IncomingMessage, next: NextFn<LogicalMessage>, signal: AbortSignal): Promise<void> {
    const [type = 'unknown', payload = ''] = context.body.split(':');
    printRaw(`  Deserialize       -> ${type}`);
    await next({ messageId: context.messageId, headers: context.headers, message: { type, payload } }, signal);
  }
}

class TraceLogical extends Behavior<LogicalMessage> {
  static readonly contract = behaviorContract(Logical);

  async handle(context: LogicalMessage, next: () => Promise<void>): Promise<void> {
    printRaw(`  TraceLogical      ${context.message.type}`);
    await next();
  }
}

class Dispatch extends PipelineTerminator<LogicalMessage> {
  static readonly contract = terminatorContract(Logical);

  protected async terminate(context: LogicalMessage): Promise<void> {
    printRaw(`  Dispatch          ${context.message.type}(${String(context.message.payload)})`);
  }
}

function createMessage(body: string): IncomingMessage {
  return { messageId: `msg-${body.length}`, headers: {}, body };
}

async function runAndReport(label: string, run: () => Promise<void>): Promise<void> {
  printInfo(label);
  try {
    await run();
    printSuccess('Completed');
  } catch (error) {
    if (error instanceof CancellationError) {
      printError('Canceled');
      return;
    }
    throw error;
  }
}

async function demoCompiledChain(): Promise<void> {
  printHeader('Compiled chain');

  const chain = compileBehaviorChain<IncomingMessage>([new TraceIncoming(), new StampHeaders(), new CheckCancellation()]);
  const context = createMessage('OrderPlaced:42');

  await runAndReport('Execute 1', () => chain(context, new AbortController().signal));
  await runAndReport('Execute 2 with cancellation', () => chain(context, AbortSignal.abort()));
  await runAndReport('Execute 3 with cancellation', () => chain(context, AbortSignal.abort()));
  await runAndReport('Execute 4', () => chain(context, new AbortController().signal));
}

async function demoStagedPipeline(): Promise<void> {
  printHeader('Staged pipeline');

  const modifications = new PipelineModifications();
  modifications.register('trace-incoming', TraceIncoming, 'Traces every incoming message');
  modifications.register('audit', AuditIncoming, 'Writes the message body to the audit log').insertAfter('trace-incoming');
  modifications.register('stamp-headers', StampHeaders, 'Adds receive headers').insertBefore('trace-incoming');
  modifications.register('measure', MeasureIncoming, 'Measures processing time');
  modifications.register('deserialize', Deserialize, 'Turns the body into a logical message');
  modifications.register('trace-logical', TraceLogical, 'Traces the logical message');
  modifications.register('dispatch', Dispatch, 'Hands the message to its handler');

  modifications.replace('audit', QuietAudit, 'Audits without the body');
  modifications.remove('measure');

  const pipeline = Pipeline.build({ rootContext: Incoming, modifications, builder: new DefaultBuilder() });

  printRaw(pipeline.describe());
  printDivider();

  let step = 1;
  for (const body of ['OrderPlaced:42', 'OrderShipped:7']) {
    printStep(step++, `Executing ${body}`);
    await runAndReport('Execute', () => pipeline.execute(createMessage(body)));
  }
}

async function main(): Promise<void> {
  await demoCompiledChain();
  await demoStagedPipeline();
}

main().catch((error: unknown) => {
  printError(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
