import type { FunctionForm } from '../syntax/ast.js';
import type { Term } from '../syntax/terms.js';

/** Identifies one call frame occurrence. Not unique across re-entries. */
export interface CallKey {
  module: string;
  function: string;
  arity: number;
  depth: number;
}

export function keysEqual(a: CallKey, b: CallKey): boolean {
  return a.module === b.module && a.function === b.function && a.arity === b.arity && a.depth === b.depth;
}

export function formatKey(key: CallKey): string {
  return `${key.module}:${key.function}/${key.arity}`;
}

/**
 * One clause of a function or nested choice construct. Each entry of
 * `subClauses` is a group of mutually exclusive alternatives, e.g. the
 * branches of one `case`.
 */
export interface ClauseNode {
  line: number;
  touched: boolean;
  subClauses: ClauseNode[][];
}

/** Variable name to value. `_` is never stored. */
export type Bindings = Map<string, Term>;

export interface TraceNode {
  id: number;
  /** `null` only for the synthetic root. */
  key: CallKey | null;
  /** Furthest line reached so far. */
  line: number;
  bindings: Bindings;
  form: FunctionForm | null;
  clauses: ClauseNode[];
  isCurrent: boolean;
  parent: number | null;
  children: number[];
}

export function nodeDepth(node: TraceNode): number {
  return node.key?.depth ?? 0;
}
