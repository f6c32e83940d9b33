/**
 * Variable substitution.
 *
 * Rewrites the executed parts of a function with every bound variable
 * replaced by the literal value it held, and record syntax expanded to
 * tuples. Clauses that were never reached are left as written.
 */

import { UnsupportedExpressionError } from '../core/errors.js';
import type { RenderOptions } from '../core/types.js';
import { patternVars, type Clause, type Expr, type FunctionForm } from '../syntax/ast.js';
import { printFunction } from '../syntax/printer.js';
import { termToExpr } from '../syntax/terms.js';
import { RecordExpander, isRecordSyntax } from '../records/expand.js';
import type { RecordLookup } from '../records/store.js';
import { afterClause } from './clauses.js';
import type { Bindings, ClauseNode } from './types.js';

interface Scope {
  bindings: Bindings;
  /** Touch state of the enclosing clause; `null` rewrites everything (fun bodies). */
  clause: ClauseNode | null;
}

function without(bindings: Bindings, names: Iterable<string>): Bindings {
  const result = new Map(bindings);
  for (const name of names) result.delete(name);
  return result;
}

class Substituter {
  private readonly expander: RecordExpander;

  constructor(records: RecordLookup) {
    this.expander = new RecordExpander(records);
  }

  rewriteFunction(form: FunctionForm, structure: ClauseNode[], bindings: Bindings): FunctionForm {
    const clauses = form.clauses.map((clause, i) => {
      const node = structure[i];
      if (!node?.touched) return clause;
      return this.rewriteClause(clause, { bindings, clause: node });
    });
    return { ...form, clauses };
  }

  private rewriteClause(clause: Clause, scope: Scope): Clause {
    return {
      line: clause.line,
      patterns: clause.patterns.map((p) => this.rewrite(p, scope, true)),
      guards: clause.guards.map((conj) => conj.map((g) => this.rewrite(g, scope, false))),
      body: clause.body.map((e) => this.rewrite(e, scope, false)),
    };
  }

  /**
   * The touch group for a construct whose alternatives start at `lines`,
   * or `null` when every alternative is rewritten.
   */
  private groupFor(scope: Scope, lines: number[]): ClauseNode[] | null {
    if (scope.clause === null) return null;
    const group = scope.clause.subClauses.find(
      (g) => g.length === lines.length && g.every((node, i) => node.line === lines[i]),
    );
    // Not tracked: treat as never reached
    return group ?? [];
  }

  private rewriteClauses(clauses: Clause[], scope: Scope, group: ClauseNode[] | null): Clause[] {
    return clauses.map((clause, i) => {
      if (group === null) return this.rewriteClause(clause, { bindings: scope.bindings, clause: null });
      const node = group[i];
      if (!node?.touched) return clause;
      return this.rewriteClause(clause, { bindings: scope.bindings, clause: node });
    });
  }

  private rewrite(expr: Expr, scope: Scope, pattern: boolean): Expr {
    const sub = (e: Expr): Expr => this.rewrite(e, scope, pattern);

    if (isRecordSyntax(expr)) {
      return this.expander.expandNode(expr, sub, pattern);
    }

    const { type, line } = expr;
    switch (expr.type) {
      case 'atom':
      case 'integer':
      case 'float':
      case 'char':
      case 'string':
      case 'nil':
      case 'fun_ref':
        return expr;

      case 'var': {
        if (expr.name === '_') return expr;
        const value = scope.bindings.get(expr.name);
        return value === undefined ? expr : termToExpr(value, expr.line);
      }

      case 'cons':
        return { ...expr, head: sub(expr.head), tail: sub(expr.tail) };
      case 'tuple':
        return { ...expr, elements: expr.elements.map(sub) };
      case 'map':
        return {
          ...expr,
          base: expr.base && sub(expr.base),
          assocs: expr.assocs.map((assoc) => ({ ...assoc, key: sub(assoc.key), value: sub(assoc.value) })),
        };
      case 'bin':
        return {
          ...expr,
          segments: expr.segments.map((segment) => ({
            ...segment,
            value: sub(segment.value),
            size: segment.size && sub(segment.size),
          })),
        };

      case 'match':
        // Outside patterns the left side binds: its variables stay as written
        return pattern
          ? { ...expr, left: sub(expr.left), right: sub(expr.right) }
          : { ...expr, left: this.expander.expand(expr.left, true), right: sub(expr.right) };

      case 'unop':
        return { ...expr, operand: sub(expr.operand) };
      case 'binop':
        return { ...expr, left: sub(expr.left), right: sub(expr.right) };
      case 'call':
        return { ...expr, callee: sub(expr.callee), args: expr.args.map(sub) };
      case 'remote':
        return { ...expr, module: sub(expr.module), fn: sub(expr.fn) };

      case 'case': {
        const group = this.groupFor(scope, expr.clauses.map((c) => c.line));
        return { ...expr, subject: sub(expr.subject), clauses: this.rewriteClauses(expr.clauses, scope, group) };
      }
      case 'if': {
        const group = this.groupFor(scope, expr.clauses.map((c) => c.line));
        return { ...expr, clauses: this.rewriteClauses(expr.clauses, scope, group) };
      }
      case 'receive': {
        const after = afterClause(expr);
        const all = after ? [...expr.clauses, after] : expr.clauses;
        const [rewritten, rewrittenAfter] = this.splitAfter(
          this.rewriteClauses(all, scope, this.groupFor(scope, all.map((c) => c.line))),
          after !== null,
        );
        return {
          ...expr,
          clauses: rewritten,
          after: expr.after && rewrittenAfter
            ? { timeout: sub(expr.after.timeout), body: rewrittenAfter.body }
            : expr.after,
        };
      }
      case 'try':
        return {
          ...expr,
          body: expr.body.map(sub),
          clauses: this.rewriteClauses(expr.clauses, scope, this.groupFor(scope, expr.clauses.map((c) => c.line))),
          catchClauses: this.rewriteClauses(
            expr.catchClauses,
            scope,
            this.groupFor(scope, expr.catchClauses.map((c) => c.line)),
          ),
          after: expr.after.map(sub),
        };

      case 'catch':
        return { ...expr, expr: sub(expr.expr) };
      case 'block':
        return { ...expr, body: expr.body.map(sub) };

      case 'lc':
        return this.rewriteComprehension(expr, scope);
      case 'generate':
        return { ...expr, source: sub(expr.source) };

      case 'fun':
        return {
          ...expr,
          clauses: expr.clauses.map((clause) => {
            const shadowed = new Set<string>();
            clause.patterns.forEach((p) => patternVars(p, shadowed));
            return this.rewriteClause(clause, { bindings: without(scope.bindings, shadowed), clause: null });
          }),
        };

      default:
        throw new UnsupportedExpressionError(type, line);
    }
  }

  private splitAfter(clauses: Clause[], hasAfter: boolean): [Clause[], Clause | undefined] {
    if (!hasAfter) return [clauses, undefined];
    return [clauses.slice(0, -1), clauses[clauses.length - 1]];
  }

  /**
   * Generator patterns bind fresh variables for the qualifiers after them
   * and for the template, so those names are not substituted there.
   */
  private rewriteComprehension(expr: Extract<Expr, { type: 'lc' }>, scope: Scope): Expr {
    const shadowed = new Set<string>();
    const qualifiers = expr.qualifiers.map((q) => {
      const inner: Scope = { bindings: without(scope.bindings, shadowed), clause: scope.clause };
      if (q.type === 'generate') {
        const source = this.rewrite(q.source, inner, false);
        patternVars(q.pattern, shadowed);
        return { ...q, source };
      }
      return this.rewrite(q, inner, false);
    });
    const template = this.rewrite(expr.template, { bindings: without(scope.bindings, shadowed), clause: scope.clause }, false);
    return { ...expr, template, qualifiers };
  }
}

/**
 * Rewrite the touched clauses of `form` against `bindings`.
 * Throws `UnsupportedExpressionError` for constructs outside the rewrite grammar.
 */
export function substituteFunction(
  form: FunctionForm,
  structure: ClauseNode[],
  bindings: Bindings,
  records: RecordLookup,
): FunctionForm {
  return new Substituter(records).rewriteFunction(form, structure, bindings);
}

export interface RenderFunctionOptions {
  records: RecordLookup;
  /** Call depth of the frame; depth 1 is not indented. */
  depth?: number;
  render?: Pick<RenderOptions, 'indentUnit' | 'indentWidth'>;
}

export function indentPrefix(depth: number, render: Pick<RenderOptions, 'indentUnit' | 'indentWidth'>): string {
  return render.indentUnit.repeat(render.indentWidth * Math.max(depth - 1, 0));
}

export function indentBlock(text: string, prefix: string): string {
  return text
    .split('\n')
    .map((line) => prefix + line)
    .join('\n');
}

/** Substitute, pretty-print and indent one function by call depth. */
export function renderFunction(
  form: FunctionForm,
  structure: ClauseNode[],
  bindings: Bindings,
  options: RenderFunctionOptions,
): string {
  const text = printFunction(substituteFunction(form, structure, bindings, options.records));
  const render = options.render ?? { indentUnit: ' ', indentWidth: 4 };
  return indentBlock(text, indentPrefix(options.depth ?? 1, render));
}
