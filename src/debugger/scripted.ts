import { getLogger } from '../core/logger.js';
import { formatTerm, type Term } from '../syntax/terms.js';
import type { CallChannel, DebuggerBackend, StopEvent } from './types.js';

export interface ScriptedDebuggerOptions {
  /** Modules `interpret` accepts; all when omitted. */
  interpretable?: string[];
  /** `m:f/a` names `setBreakpoint` accepts; all when omitted. */
  breakable?: string[];
}

/**
 * Replays a fixed list of stop events as if a debugger reported them.
 * Enforces the request/response protocol: after a `break_at` the next stop
 * is only delivered once the stop was acknowledged with an advance request.
 */
export class ScriptedDebugger implements DebuggerBackend {
  /** Every backend request, in order, e.g. `interpret shapes`. */
  readonly requests: string[] = [];

  constructor(
    private readonly events: StopEvent[],
    private readonly options: ScriptedDebuggerOptions = {},
  ) {}

  async interpret(module: string): Promise<void> {
    this.requests.push(`interpret ${module}`);
    if (this.options.interpretable && !this.options.interpretable.includes(module)) {
      throw new Error(`Module ${module} cannot be interpreted`);
    }
  }

  async uninterpret(module: string): Promise<void> {
    this.requests.push(`uninterpret ${module}`);
  }

  async setBreakpoint(module: string, fn: string, arity: number): Promise<void> {
    const name = `${module}:${fn}/${arity}`;
    this.requests.push(`break ${name}`);
    if (this.options.breakable && !this.options.breakable.includes(name)) {
      throw new Error(`No function ${name}`);
    }
  }

  async spawnCall(module: string, fn: string, args: Term[]): Promise<CallChannel> {
    this.requests.push(`spawn ${module}:${fn}(${args.map(formatTerm).join(', ')})`);
    return new ScriptedChannel(this.events, this.requests);
  }
}

class ScriptedChannel implements CallChannel {
  private position = 0;
  private halted = false;

  constructor(
    private readonly events: StopEvent[],
    private readonly requests: string[],
  ) {}

  async next(): Promise<StopEvent> {
    if (this.halted) {
      throw new Error('Previous stop was not acknowledged');
    }
    const event = this.events[this.position];
    if (event === undefined) {
      // The script ran out: the process is gone
      return { type: 'exit_at', reason: 'normal' };
    }
    this.position++;
    this.halted = event.type === 'break_at';
    getLogger().trace({ position: this.position, type: event.type }, 'Replaying stop event');
    return event;
  }

  async step(): Promise<void> {
    this.advance('step');
  }

  async continue(): Promise<void> {
    this.advance('continue');
  }

  async stepOut(): Promise<void> {
    this.advance('step_out');
  }

  private advance(request: string): void {
    this.requests.push(request);
    this.halted = false;
  }
}
