/**
 * Clause-touch tracking.
 *
 * A function is modelled as its list of clauses; every choice construct in a
 * clause body (`case`, `if`, `receive`, the result and catch clauses of
 * `try`) adds a group of alternatives under that clause. Reaching a line
 * touches the clause it falls into and, recursively, the most recently
 * entered construct inside it.
 */

import { forEachChild, type Clause, type Expr } from '../syntax/ast.js';
import { TraceCorruptionError } from '../core/errors.js';
import type { ClauseNode } from './types.js';

// ===== Extraction =====

function clauseNode(clause: Clause): ClauseNode {
  const groups: ClauseNode[][] = [];
  clause.body.forEach((expr) => collectGroups(expr, groups));
  // Stable, so constructs starting on one line keep source order
  groups.sort((a, b) => a[0].line - b[0].line);
  return { line: clause.line, touched: false, subClauses: groups };
}

function pushGroup(groups: ClauseNode[][], clauses: Clause[], extra: ClauseNode[] = []): void {
  const group = [...clauses.map(clauseNode), ...extra];
  if (group.length > 0) groups.push(group);
}

/** The `after` branch of a `receive`, as one more alternative. */
export function afterClause(expr: Extract<Expr, { type: 'receive' }>): Clause | null {
  if (!expr.after) return null;
  return { line: expr.after.timeout.line, patterns: [], guards: [], body: expr.after.body };
}

function collectGroups(expr: Expr, groups: ClauseNode[][]): void {
  switch (expr.type) {
    case 'case':
      collectGroups(expr.subject, groups);
      pushGroup(groups, expr.clauses);
      return;
    case 'if':
      pushGroup(groups, expr.clauses);
      return;
    case 'receive': {
      const after = afterClause(expr);
      pushGroup(groups, expr.clauses, after ? [clauseNode(after)] : []);
      return;
    }
    case 'try':
      expr.body.forEach((e) => collectGroups(e, groups));
      pushGroup(groups, expr.clauses);
      pushGroup(groups, expr.catchClauses);
      expr.after.forEach((e) => collectGroups(e, groups));
      return;
    case 'fun':
      // Anonymous funs run as frames of their own
      return;
    default:
      forEachChild(expr, (child) => collectGroups(child, groups));
  }
}

/** Untouched clause structure of a function or anonymous fun. */
export function extractClauseStructure(form: { clauses: Clause[] }): ClauseNode[] {
  return form.clauses.map(clauseNode);
}

// ===== Touching =====

/** Index of the last leading clause starting at or before `line`, or -1. */
function lastReachedIndex<T>(items: T[], lineOf: (item: T) => number, line: number): number {
  let index = -1;
  while (index + 1 < items.length && lineOf(items[index + 1]) <= line) index++;
  return index;
}

/** The clause a line falls into, if any. */
export function clauseAt(clauses: ClauseNode[], line: number): ClauseNode | undefined {
  const index = lastReachedIndex(clauses, (c) => c.line, line);
  return index < 0 ? undefined : clauses[index];
}

function touchClause(clause: ClauseNode, line: number): ClauseNode {
  const groups = clause.subClauses;
  const index = lastReachedIndex(groups, (g) => g[0].line, line);
  let subClauses = groups;
  if (index >= 0) {
    subClauses = groups.slice();
    subClauses[index] = markReached(groups[index], line);
  }
  return { line: clause.line, touched: true, subClauses };
}

/**
 * Mark the clause `line` falls into as touched, then recurse into the last
 * construct inside it that starts at or before `line`. A clause is never
 * touched when another alternative of its group already is. Pure.
 */
export function markReached(clauses: ClauseNode[], line: number): ClauseNode[] {
  if (clauses.length === 0) return clauses;

  const index = lastReachedIndex(clauses, (c) => c.line, line);
  if (index < 0) return clauses;

  const candidate = clauses[index];
  if (!candidate.touched && clauses.some((c) => c.touched)) return clauses;

  const result = clauses.slice();
  result[index] = touchClause(candidate, line);
  return result;
}

/**
 * Whether a stop at `line`, for the same call key as a node last seen at
 * `previousLine`, starts a new pass through the function (tail call or a
 * second call within one expression) rather than continuing the current one.
 *
 * True when the line falls into a clause not yet touched, or into a touched
 * clause at or before the previous line. This is a heuristic: a loop that
 * returns to an earlier line of the same clause looks like a new pass.
 */
export function isRepeatPass(clauses: ClauseNode[], previousLine: number, line: number): boolean {
  const clause = clauseAt(clauses, line);
  if (!clause) {
    throw new TraceCorruptionError('Line precedes every clause', line);
  }
  if (!clause.touched) return true;
  return previousLine >= line;
}

/** Number of touched clauses at every nesting level. */
export function countTouched(clauses: ClauseNode[]): number {
  let count = 0;
  for (const clause of clauses) {
    if (clause.touched) count++;
    for (const group of clause.subClauses) count += countTouched(group);
  }
  return count;
}
