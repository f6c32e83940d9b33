import type { Term } from '../syntax/terms.js';
import type { Bindings } from '../trace/types.js';

export interface BreakAt {
  type: 'break_at';
  module: string;
  function: string;
  arity: number;
  line: number;
  depth: number;
  bindings: Bindings;
}

export interface Idle {
  type: 'idle';
}

/**
 * The traced process finished. `reason` is `normal` for a return, otherwise
 * the exit reason as `class:reason` text.
 */
export interface ExitAt {
  type: 'exit_at';
  reason: string;
  result?: Term;
}

export type StopEvent = BreakAt | Idle | ExitAt;

/**
 * One traced call. `next` resolves with the next stop; after a `break_at`
 * the traced process stays halted until one of the advance requests.
 * Only one request may be outstanding.
 */
export interface CallChannel {
  next(): Promise<StopEvent>;
  step(): Promise<void>;
  continue(): Promise<void>;
  stepOut(): Promise<void>;
}

export interface DebuggerBackend {
  /** Prepare `module` for tracing. Rejects when the debugger cannot take it. */
  interpret(module: string): Promise<void>;
  uninterpret(module: string): Promise<void>;
  /** Rejects when the function does not exist. */
  setBreakpoint(module: string, fn: string, arity: number): Promise<void>;
  spawnCall(module: string, fn: string, args: Term[]): Promise<CallChannel>;
}
