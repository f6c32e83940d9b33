/**
 * Record syntax to positional form.
 *
 *   #r{a = 1}          -> {r, 1, <default of b>}
 *   Base#r{b = 2}      -> setelement(3, Base, 2)
 *   E#r.b              -> element(3, E)
 *   #r.b               -> 3
 *
 * A record or field without a stored definition is left as written.
 */

import { UnresolvedRecordError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import {
  atom,
  call,
  integer,
  mapChildren,
  type Expr,
  type RecordExpr,
  type RecordFieldExpr,
  type RecordIndexExpr,
} from '../syntax/ast.js';
import type { RecordDefinition, RecordLookup } from './store.js';

export type RecordSyntax = RecordExpr | RecordFieldExpr | RecordIndexExpr;

/** Rewrites a child expression; supplied by the caller so substitution can run first. */
export type ChildRewriter = (expr: Expr) => Expr;

export function isRecordSyntax(expr: Expr): expr is RecordSyntax {
  return expr.type === 'record' || expr.type === 'record_field' || expr.type === 'record_index';
}

export class RecordExpander {
  constructor(private readonly records: RecordLookup) {}

  /** Expand every record construct in `expr`. */
  expand(expr: Expr, pattern = false): Expr {
    const rewrite = (e: Expr): Expr => this.expand(e, pattern);
    if (isRecordSyntax(expr)) return this.expandNode(expr, rewrite, pattern);
    return mapChildren(expr, rewrite);
  }

  /**
   * Expand one record node. Subexpressions go through `rewrite`. In
   * patterns, fields that are not mentioned match anything.
   */
  expandNode(expr: RecordSyntax, rewrite: ChildRewriter, pattern: boolean): Expr {
    const def = this.resolve(expr);
    if (!def) return mapChildren(expr, rewrite);

    switch (expr.type) {
      case 'record_index':
        return integer(this.position(def, expr.field), expr.line);
      case 'record_field':
        return call('element', [integer(this.position(def, expr.field), expr.line), rewrite(expr.record)], expr.line);
      case 'record':
        return expr.base ? this.expandUpdate(expr, expr.base, def, rewrite) : this.expandConstruct(expr, def, rewrite, pattern);
    }
  }

  private expandConstruct(expr: RecordExpr, def: RecordDefinition, rewrite: ChildRewriter, pattern: boolean): Expr {
    const wildcard = expr.fields.find((f) => f.field === '_');
    const elements: Expr[] = [atom(def.name, expr.line)];

    for (const field of def.fields) {
      const init = expr.fields.find((f) => f.field === field.name);
      if (init) {
        elements.push(rewrite(init.value));
      } else if (wildcard) {
        elements.push(rewrite(wildcard.value));
      } else if (pattern) {
        elements.push({ type: 'var', line: expr.line, name: '_' });
      } else if (field.default) {
        elements.push(this.expand({ ...field.default, line: expr.line }));
      } else {
        elements.push(atom('undefined', expr.line));
      }
    }
    return { type: 'tuple', line: expr.line, elements };
  }

  private expandUpdate(expr: RecordExpr, base: Expr, def: RecordDefinition, rewrite: ChildRewriter): Expr {
    let result = rewrite(base);
    for (const field of expr.fields) {
      result = call('setelement', [integer(this.position(def, field.field), field.line), result, rewrite(field.value)], expr.line);
    }
    return result;
  }

  /** 1-based tuple position of a field; the record name sits at 1. */
  private position(def: RecordDefinition, field: string): number {
    return def.fields.findIndex((f) => f.name === field) + 2;
  }

  private resolve(expr: RecordSyntax): RecordDefinition | undefined {
    const def = this.records.get(expr.name);
    let missing: UnresolvedRecordError | undefined;
    if (!def) {
      missing = new UnresolvedRecordError(expr.name);
    } else {
      const fields = expr.type === 'record' ? expr.fields.map((f) => f.field).filter((f) => f !== '_') : [expr.field];
      const unknown = fields.find((name) => !def.fields.some((f) => f.name === name));
      if (unknown !== undefined) missing = new UnresolvedRecordError(expr.name, unknown);
    }
    if (missing) {
      getLogger().debug({ record: expr.name, line: expr.line, reason: missing.message }, 'Record left unexpanded');
      return undefined;
    }
    return def;
  }
}
