/**
 * Abstract syntax of the traced clause language.
 *
 * Every expression kind is one variant of the closed `Expr` union, tagged by
 * `type`. Each node carries the source line it starts on.
 */

export type Expr =
  | AtomExpr
  | IntegerExpr
  | FloatExpr
  | CharExpr
  | StringExpr
  | NilExpr
  | VarExpr
  | ConsExpr
  | TupleExpr
  | MapExpr
  | BinaryExpr
  | MatchExpr
  | UnaryOpExpr
  | BinaryOpExpr
  | CallExpr
  | RemoteExpr
  | CaseExpr
  | IfExpr
  | ReceiveExpr
  | TryExpr
  | CatchExpr
  | BlockExpr
  | ListComprehensionExpr
  | GenerateExpr
  | FunExpr
  | FunRefExpr
  | RecordExpr
  | RecordFieldExpr
  | RecordIndexExpr;

export interface AtomExpr { type: 'atom'; line: number; value: string }
/** Integers are unbounded, so they are held as `bigint`. */
export interface IntegerExpr { type: 'integer'; line: number; value: bigint }
export interface FloatExpr { type: 'float'; line: number; value: number }
export interface CharExpr { type: 'char'; line: number; value: string }
export interface StringExpr { type: 'string'; line: number; value: string }
export interface NilExpr { type: 'nil'; line: number }
export interface VarExpr { type: 'var'; line: number; name: string }

export interface ConsExpr { type: 'cons'; line: number; head: Expr; tail: Expr }
export interface TupleExpr { type: 'tuple'; line: number; elements: Expr[] }

export interface MapAssoc { key: Expr; value: Expr; exact: boolean }
export interface MapExpr { type: 'map'; line: number; base?: Expr; assocs: MapAssoc[] }

export interface BinarySegment { value: Expr; size?: Expr; types: string[] }
export interface BinaryExpr { type: 'bin'; line: number; segments: BinarySegment[] }

export interface MatchExpr { type: 'match'; line: number; left: Expr; right: Expr }
export interface UnaryOpExpr { type: 'unop'; line: number; op: string; operand: Expr }
export interface BinaryOpExpr { type: 'binop'; line: number; op: string; left: Expr; right: Expr }

/** Local (`atom` callee), remote (`remote` callee) or dynamic call. */
export interface CallExpr { type: 'call'; line: number; callee: Expr; args: Expr[] }
export interface RemoteExpr { type: 'remote'; line: number; module: Expr; fn: Expr }

export interface CaseExpr { type: 'case'; line: number; subject: Expr; clauses: Clause[] }
export interface IfExpr { type: 'if'; line: number; clauses: Clause[] }
export interface ReceiveAfter { timeout: Expr; body: Expr[] }
export interface ReceiveExpr { type: 'receive'; line: number; clauses: Clause[]; after?: ReceiveAfter }
export interface TryExpr {
  type: 'try';
  line: number;
  body: Expr[];
  clauses: Clause[];
  catchClauses: Clause[];
  after: Expr[];
}
export interface CatchExpr { type: 'catch'; line: number; expr: Expr }
export interface BlockExpr { type: 'block'; line: number; body: Expr[] }

/** Qualifiers are generators or plain filter expressions. */
export interface ListComprehensionExpr { type: 'lc'; line: number; template: Expr; qualifiers: Expr[] }
export interface GenerateExpr { type: 'generate'; line: number; pattern: Expr; source: Expr }

export interface FunExpr { type: 'fun'; line: number; clauses: Clause[] }
export interface FunRefExpr { type: 'fun_ref'; line: number; module?: string; name: string; arity: number }

export interface RecordFieldInit { line: number; field: string; value: Expr }
/** `#name{...}` or, with `base`, the update `Base#name{...}`. */
export interface RecordExpr { type: 'record'; line: number; name: string; base?: Expr; fields: RecordFieldInit[] }
/** `Expr#name.field` */
export interface RecordFieldExpr { type: 'record_field'; line: number; record: Expr; name: string; field: string }
/** `#name.field` */
export interface RecordIndexExpr { type: 'record_index'; line: number; name: string; field: string }

/**
 * One clause of a function, `fun`, or choice construct. `guards` is a
 * disjunction (`;`) of conjunctions (`,`). For `catch` clauses of a `try`
 * the pattern holds a single `class:reason` tuple-like pair encoded as
 * `binop` with op `:`.
 */
export interface Clause {
  line: number;
  patterns: Expr[];
  guards: Expr[][];
  body: Expr[];
}

export interface FunctionForm {
  type: 'function';
  line: number;
  endLine: number;
  name: string;
  arity: number;
  clauses: Clause[];
  /** Source text of the whole definition, as read. */
  text: string;
}

export interface RecordFieldDef {
  name: string;
  line: number;
  default?: Expr;
}

export interface RecordDefForm {
  type: 'record_def';
  line: number;
  name: string;
  fields: RecordFieldDef[];
}

export interface AttributeForm {
  type: 'attribute';
  line: number;
  name: string;
}

export type Form = FunctionForm | RecordDefForm | AttributeForm;

export interface ModuleForms {
  module?: string;
  forms: Form[];
}

export function atom(value: string, line: number): AtomExpr {
  return { type: 'atom', line, value };
}

export function integer(value: number | bigint, line: number): IntegerExpr {
  return { type: 'integer', line, value: BigInt(value) };
}

export function call(name: string, args: Expr[], line: number): CallExpr {
  return { type: 'call', line, callee: atom(name, line), args };
}

/** Build a proper list expression from its elements. */
export function listOf(elements: Expr[], line: number, tail?: Expr): Expr {
  let result: Expr = tail ?? { type: 'nil', line };
  for (let i = elements.length - 1; i >= 0; i--) {
    result = { type: 'cons', line, head: elements[i], tail: result };
  }
  return result;
}

/** Variable names occurring anywhere in a pattern. */
export function patternVars(pattern: Expr, into: Set<string> = new Set()): Set<string> {
  switch (pattern.type) {
    case 'var':
      if (pattern.name !== '_') into.add(pattern.name);
      break;
    case 'cons':
      patternVars(pattern.head, into);
      patternVars(pattern.tail, into);
      break;
    case 'tuple':
      pattern.elements.forEach((e) => patternVars(e, into));
      break;
    case 'match':
      patternVars(pattern.left, into);
      patternVars(pattern.right, into);
      break;
    case 'binop':
      patternVars(pattern.left, into);
      patternVars(pattern.right, into);
      break;
    case 'record':
      pattern.fields.forEach((f) => patternVars(f.value, into));
      break;
    case 'map':
      pattern.assocs.forEach((a) => patternVars(a.value, into));
      break;
    case 'bin':
      pattern.segments.forEach((s) => patternVars(s.value, into));
      break;
    default:
      break;
  }
  return into;
}

function clauseChildren(clauses: Clause[], visit: (e: Expr) => void): void {
  for (const clause of clauses) {
    clause.patterns.forEach(visit);
    clause.guards.forEach((conj) => conj.forEach(visit));
    clause.body.forEach(visit);
  }
}

/** Calls `visit` on each direct subexpression, in source order. */
export function forEachChild(expr: Expr, visit: (e: Expr) => void): void {
  switch (expr.type) {
    case 'cons':
      visit(expr.head);
      visit(expr.tail);
      break;
    case 'tuple':
      expr.elements.forEach(visit);
      break;
    case 'map':
      if (expr.base) visit(expr.base);
      expr.assocs.forEach((a) => {
        visit(a.key);
        visit(a.value);
      });
      break;
    case 'bin':
      expr.segments.forEach((s) => {
        visit(s.value);
        if (s.size) visit(s.size);
      });
      break;
    case 'match':
    case 'binop':
      visit(expr.left);
      visit(expr.right);
      break;
    case 'unop':
      visit(expr.operand);
      break;
    case 'call':
      visit(expr.callee);
      expr.args.forEach(visit);
      break;
    case 'remote':
      visit(expr.module);
      visit(expr.fn);
      break;
    case 'case':
      visit(expr.subject);
      clauseChildren(expr.clauses, visit);
      break;
    case 'if':
    case 'fun':
      clauseChildren(expr.clauses, visit);
      break;
    case 'receive':
      clauseChildren(expr.clauses, visit);
      if (expr.after) {
        visit(expr.after.timeout);
        expr.after.body.forEach(visit);
      }
      break;
    case 'try':
      expr.body.forEach(visit);
      clauseChildren(expr.clauses, visit);
      clauseChildren(expr.catchClauses, visit);
      expr.after.forEach(visit);
      break;
    case 'catch':
      visit(expr.expr);
      break;
    case 'block':
      expr.body.forEach(visit);
      break;
    case 'lc':
      visit(expr.template);
      expr.qualifiers.forEach(visit);
      break;
    case 'generate':
      visit(expr.pattern);
      visit(expr.source);
      break;
    case 'record':
      if (expr.base) visit(expr.base);
      expr.fields.forEach((f) => visit(f.value));
      break;
    case 'record_field':
      visit(expr.record);
      break;
    default:
      break;
  }
}

function mapClauses(clauses: Clause[], f: (e: Expr) => Expr): Clause[] {
  return clauses.map((c) => ({
    line: c.line,
    patterns: c.patterns.map(f),
    guards: c.guards.map((conj) => conj.map(f)),
    body: c.body.map(f),
  }));
}

/** A copy of `expr` with each direct subexpression replaced by `f(child)`. */
export function mapChildren(expr: Expr, f: (e: Expr) => Expr): Expr {
  switch (expr.type) {
    case 'cons':
      return { ...expr, head: f(expr.head), tail: f(expr.tail) };
    case 'tuple':
      return { ...expr, elements: expr.elements.map(f) };
    case 'map':
      return {
        ...expr,
        base: expr.base && f(expr.base),
        assocs: expr.assocs.map((a) => ({ key: f(a.key), value: f(a.value), exact: a.exact })),
      };
    case 'bin':
      return {
        ...expr,
        segments: expr.segments.map((s) => ({ value: f(s.value), size: s.size && f(s.size), types: s.types })),
      };
    case 'match':
    case 'binop':
      return { ...expr, left: f(expr.left), right: f(expr.right) };
    case 'unop':
      return { ...expr, operand: f(expr.operand) };
    case 'call':
      return { ...expr, callee: f(expr.callee), args: expr.args.map(f) };
    case 'remote':
      return { ...expr, module: f(expr.module), fn: f(expr.fn) };
    case 'case':
      return { ...expr, subject: f(expr.subject), clauses: mapClauses(expr.clauses, f) };
    case 'if':
    case 'fun':
      return { ...expr, clauses: mapClauses(expr.clauses, f) };
    case 'receive':
      return {
        ...expr,
        clauses: mapClauses(expr.clauses, f),
        after: expr.after && { timeout: f(expr.after.timeout), body: expr.after.body.map(f) },
      };
    case 'try':
      return {
        ...expr,
        body: expr.body.map(f),
        clauses: mapClauses(expr.clauses, f),
        catchClauses: mapClauses(expr.catchClauses, f),
        after: expr.after.map(f),
      };
    case 'catch':
      return { ...expr, expr: f(expr.expr) };
    case 'block':
      return { ...expr, body: expr.body.map(f) };
    case 'lc':
      return { ...expr, template: f(expr.template), qualifiers: expr.qualifiers.map(f) };
    case 'generate':
      return { ...expr, pattern: f(expr.pattern), source: f(expr.source) };
    case 'record':
      return {
        ...expr,
        base: expr.base && f(expr.base),
        fields: expr.fields.map((fi) => ({ line: fi.line, field: fi.field, value: f(fi.value) })),
      };
    case 'record_field':
      return { ...expr, record: f(expr.record) };
    default:
      return expr;
  }
}
