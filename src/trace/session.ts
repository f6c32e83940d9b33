/**
 * TraceSession — drives one traced call at a time.
 *
 * Lifecycle of a run: records are loaded, the debugger is told to interpret
 * the module and break on the function, then every stop event updates the
 * call tree until the traced process exits. The tree is then rendered to
 * the reconstruction document and handed to the display sink.
 *
 * The record store outlives runs; a failed run only discards its tree.
 */

import { nanoid } from 'nanoid';
import { AttachFailureError, BreakpointFailureError, RteError } from '../core/errors.js';
import { EventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import { AsyncMutex } from '../core/mutex.js';
import { RteConfigSchema, type RenderOptions } from '../core/types.js';
import type { CallChannel, DebuggerBackend, ExitAt, StopEvent } from '../debugger/types.js';
import { RecordExpander } from '../records/expand.js';
import { RecordStore } from '../records/store.js';
import type { ModuleCatalog } from '../source/catalog.js';
import { parseExpressions } from '../syntax/parser.js';
import { formatTerm, termFromExpr, type Term } from '../syntax/terms.js';
import { CallTree, type UpdateOutcome } from './call-tree.js';
import { buildDocument } from './document.js';
import { formatKey, type Bindings, type CallKey } from './types.js';

export type SessionState = 'idle' | 'running' | 'exited';

/** Receives each finished reconstruction document. */
export interface DisplaySink {
  show(document: string, run: RunResult): void | Promise<void>;
}

export interface RunResult {
  runId: string;
  entry: CallKey;
  document: string;
  tree: CallTree;
  /** Printed return value, or `class:reason` when the call failed. */
  result: string;
}

export interface TraceSessionOptions {
  backend: DebuggerBackend;
  catalog: ModuleCatalog;
  records?: RecordStore;
  sink?: DisplaySink;
  render?: RenderOptions;
  events?: EventBus;
}

/** Temporaries the compiler introduces for record field access. */
const RECORD_TEMPORARY = /^rec[0-9]+$/;

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * A stop on a record access line is reported twice: first with only a
 * `recN` temporary new, then with the real variable. The first is noise.
 */
export function onlyRecordTemporaryChanged(previous: Bindings, current: Bindings): boolean {
  const changed = [...current].filter(([name, value]) => {
    const before = previous.get(name);
    return before === undefined || formatTerm(before) !== formatTerm(value);
  });
  return changed.length === 1 && RECORD_TEMPORARY.test(changed[0][0]);
}

export function withoutWildcard(bindings: Bindings): Bindings {
  if (!bindings.has('_')) return bindings;
  const result = new Map(bindings);
  result.delete('_');
  return result;
}

export function formatRunResult(exit: ExitAt | null): string {
  if (exit?.result !== undefined) return formatTerm(exit.result);
  return exit?.reason ?? 'normal';
}

export class TraceSession {
  readonly records: RecordStore;
  readonly events: EventBus;

  private readonly backend: DebuggerBackend;
  private readonly catalog: ModuleCatalog;
  private readonly sink?: DisplaySink;
  private readonly render: RenderOptions;
  private readonly mutex = new AsyncMutex();

  private state: SessionState = 'idle';
  private tree: CallTree | null = null;
  private runId: string | null = null;
  private previousBindings: Bindings | null = null;
  private exit: ExitAt | null = null;

  constructor(options: TraceSessionOptions) {
    this.backend = options.backend;
    this.catalog = options.catalog;
    this.records = options.records ?? new RecordStore(options.catalog);
    this.sink = options.sink;
    this.render = options.render ?? RteConfigSchema.parse({}).render;
    this.events = options.events ?? new EventBus();
  }

  get status(): SessionState {
    return this.state;
  }

  /** Tree of the run in progress, or of the last finished run. */
  get currentTree(): CallTree | null {
    return this.tree;
  }

  // ─── Records ───

  async loadRecords(module: string): Promise<string[]> {
    const names = await this.records.load(module);
    this.events.emit('records:loaded', { module, names });
    return names;
  }

  listRecords(): string[] {
    return this.records.list();
  }

  async forgetRecords(name: string | 'all'): Promise<'ok' | 'not_found'> {
    if (name === 'all') {
      const names = this.records.list();
      await this.records.forgetAll();
      this.events.emit('records:forgotten', { names });
      return 'ok';
    }
    const outcome = await this.records.forget(name);
    if (outcome === 'ok') this.events.emit('records:forgotten', { names: [name] });
    return outcome;
  }

  // ─── Runs ───

  /**
   * Trace `module:fn` applied to the comma-separated literal `args`, e.g.
   * `"3, #acc{total = 1}"`. Runs on one session are serialized.
   */
  run(module: string, fn: string, args = ''): Promise<RunResult> {
    return this.mutex.withLock(() => this.execute(module, fn, args));
  }

  /**
   * Apply one stop event. Events outside a running trace, and any event after
   * the exit, are ignored. Returns how the tree changed, if it did.
   */
  async handleEvent(event: StopEvent): Promise<UpdateOutcome | null> {
    const logger = getLogger();
    if (this.state !== 'running' || !this.tree) {
      logger.debug({ type: event.type, state: this.state }, 'Ignoring stop event outside a run');
      return null;
    }

    switch (event.type) {
      case 'idle':
        return null;
      case 'exit_at':
        this.exit = event;
        this.state = 'exited';
        logger.debug({ runId: this.runId, reason: event.reason }, 'Traced call exited');
        return null;
      case 'break_at': {
        const bindings = withoutWildcard(event.bindings);
        const previous = this.previousBindings;
        this.previousBindings = bindings;
        if (previous && onlyRecordTemporaryChanged(previous, bindings)) {
          logger.debug({ line: event.line }, 'Skipping record temporary stop');
          return null;
        }

        const key: CallKey = { module: event.module, function: event.function, arity: event.arity, depth: event.depth };
        this.events.emit('run:stop', {
          runId: this.runId ?? '',
          module: event.module,
          function: event.function,
          line: event.line,
          depth: event.depth,
        });
        const outcome = await this.tree.update(key, event.line, bindings);
        logger.debug({ call: formatKey(key), depth: key.depth, line: event.line, action: outcome.action }, 'Applied stop');
        return outcome;
      }
    }
  }

  private async execute(module: string, fn: string, args: string): Promise<RunResult> {
    const logger = getLogger();
    const runId = nanoid(8);

    await this.loadRecords(module);
    const argTerms = this.parseArgs(args);
    const entry: CallKey = { module, function: fn, arity: argTerms.length, depth: 1 };

    await this.attach(entry);

    const tree = new CallTree((key) => this.catalog.getFunction(key.module, key.function, key.arity));
    this.begin(runId, tree);
    this.events.emit('run:started', { runId, module, function: fn, arity: entry.arity });
    logger.info({ runId, call: formatKey(entry) }, 'Run started');

    try {
      const channel = await this.backend.spawnCall(module, fn, argTerms);
      await this.drain(channel);

      const result = formatRunResult(this.exit);
      const document = buildDocument(tree, { records: this.records, render: this.render, entry, result });
      const run: RunResult = { runId, entry, document, tree, result };

      await this.sink?.show(document, run);
      this.events.emit('run:exited', { runId, nodes: tree.size, reason: this.exit?.reason ?? 'normal' });
      logger.info({ runId, nodes: tree.size, result }, 'Run finished');
      return run;
    } catch (err) {
      this.tree = null;
      this.state = 'idle';
      const error = toError(err);
      this.events.emit('run:failed', {
        runId,
        code: error instanceof RteError ? error.code : 'UNKNOWN',
        message: error.message,
      });
      logger.error({ runId, err: error }, 'Run failed');
      throw error;
    } finally {
      await this.detach(module);
    }
  }

  private begin(runId: string, tree: CallTree): void {
    this.runId = runId;
    this.tree = tree;
    this.previousBindings = null;
    this.exit = null;
    this.state = 'running';
  }

  private async drain(channel: CallChannel): Promise<void> {
    while (this.state === 'running') {
      const event = await channel.next();
      await this.handleEvent(event);
      if (event.type === 'break_at') {
        await channel.step();
      }
    }
  }

  private parseArgs(args: string): Term[] {
    if (args.trim() === '') return [];
    const expander = new RecordExpander(this.records);
    return parseExpressions(args).map((expr) => termFromExpr(expander.expand(expr)));
  }

  private async attach(entry: CallKey): Promise<void> {
    try {
      await this.backend.interpret(entry.module);
    } catch (err) {
      throw new AttachFailureError(`Unable to interpret module '${entry.module}'`, entry.module, toError(err));
    }
    try {
      await this.backend.setBreakpoint(entry.module, entry.function, entry.arity);
    } catch (err) {
      await this.detach(entry.module);
      throw new BreakpointFailureError(entry.module, entry.function, entry.arity, toError(err));
    }
  }

  private async detach(module: string): Promise<void> {
    try {
      await this.backend.uninterpret(module);
    } catch (err) {
      getLogger().warn({ module, err: toError(err) }, 'Unable to uninterpret module');
    }
  }
}
