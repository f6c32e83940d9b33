/**
 * Recorded stop-event scripts.
 *
 * A script names the traced call and lists the stops a debugger reported
 * for it. Binding values are either term text (`"{ok, [1,2]}"`) or an
 * explicit term object, which is how opaque values are written:
 *
 *   module: shapes
 *   function: area
 *   args: "{square, 3}"
 *   events:
 *     - { type: break_at, module: shapes, function: area, arity: 1, line: 4, depth: 1,
 *         bindings: { Side: "3", Owner: { type: pid, value: "<0.85.0>" } } }
 *     - { type: exit_at, reason: normal, result: "9" }
 */

import { z } from 'zod';
import { parse as parseYaml } from 'yaml';
import { TraceScriptError } from '../core/errors.js';
import { parseExpression } from '../syntax/parser.js';
import { TermSchema, termFromExpr, type Term } from '../syntax/terms.js';
import type { StopEvent } from './types.js';

const TermValueSchema = z.union([z.string(), TermSchema]);

const BreakAtSchema = z.object({
  type: z.literal('break_at'),
  module: z.string().min(1),
  function: z.string().min(1),
  arity: z.number().int().min(0),
  line: z.number().int().min(1),
  depth: z.number().int().min(1),
  bindings: z.record(TermValueSchema).default({}),
});

const IdleSchema = z.object({ type: z.literal('idle') });

const ExitAtSchema = z.object({
  type: z.literal('exit_at'),
  reason: z.string().default('normal'),
  result: TermValueSchema.optional(),
});

export const TraceScriptSchema = z.object({
  module: z.string().min(1),
  function: z.string().min(1),
  args: z.string().default(''),
  events: z.array(z.discriminatedUnion('type', [BreakAtSchema, IdleSchema, ExitAtSchema])),
});

export type TraceScript = z.infer<typeof TraceScriptSchema>;

function toTerm(value: string | Term): Term {
  return typeof value === 'string' ? termFromExpr(parseExpression(value)) : value;
}

/** Stop events of a script with binding values decoded to terms. */
export function scriptEvents(script: TraceScript): StopEvent[] {
  return script.events.map((event): StopEvent => {
    switch (event.type) {
      case 'break_at':
        return {
          ...event,
          bindings: new Map(Object.entries(event.bindings).map(([name, value]): [string, Term] => [name, toTerm(value)])),
        };
      case 'idle':
        return event;
      case 'exit_at':
        return event.result === undefined
          ? { type: 'exit_at', reason: event.reason }
          : { type: 'exit_at', reason: event.reason, result: toTerm(event.result) };
    }
  });
}

/** Parse a YAML (or JSON) trace script. */
export function parseTraceScript(text: string, source?: string): TraceScript {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    throw new TraceScriptError('Unreadable trace script', source, err instanceof Error ? err : undefined);
  }
  const parsed = TraceScriptSchema.safeParse(raw);
  if (!parsed.success) {
    throw new TraceScriptError(`Invalid trace script: ${parsed.error.message}`, source, parsed.error);
  }
  return parsed.data;
}
