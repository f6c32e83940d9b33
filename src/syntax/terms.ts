/**
 * Runtime term model.
 *
 * Terms are the values a debugger reports for variable bindings. Everything
 * except pids, ports, references and funs can be written back as a literal;
 * those four are opaque.
 */

import { z } from 'zod';
import { ParseError } from '../core/errors.js';
import type { Expr } from './ast.js';
import { parseExpression } from './parser.js';
import { printAtom, printFloat, printString } from './printer.js';

export type OpaqueKind = 'pid' | 'port' | 'ref' | 'fun';

export type Term =
  | { type: 'atom'; value: string }
  | { type: 'integer'; value: bigint }
  | { type: 'float'; value: number }
  | { type: 'string'; value: string }
  | { type: 'list'; elements: Term[]; tail?: Term }
  | { type: 'tuple'; elements: Term[] }
  | { type: 'binary'; bytes: number[] }
  | { type: OpaqueKind; value: string };

const OPAQUE_KINDS: ReadonlySet<string> = new Set<OpaqueKind>(['pid', 'port', 'ref', 'fun']);

/** Integers arrive as numbers, or as decimal strings when beyond double precision. */
const IntegerValueSchema = z
  .union([z.bigint(), z.number().int(), z.string().regex(/^-?[0-9]+$/, 'Expected a decimal integer')])
  .transform((value) => BigInt(value));

export const TermSchema: z.ZodType<Term, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    z.object({ type: z.literal('atom'), value: z.string() }),
    z.object({ type: z.literal('integer'), value: IntegerValueSchema }),
    z.object({ type: z.literal('float'), value: z.number() }),
    z.object({ type: z.literal('string'), value: z.string() }),
    z.object({ type: z.literal('list'), elements: z.array(TermSchema), tail: TermSchema.optional() }),
    z.object({ type: z.literal('tuple'), elements: z.array(TermSchema) }),
    z.object({ type: z.literal('binary'), bytes: z.array(z.number().int().min(0).max(255)) }),
    z.object({ type: z.enum(['pid', 'port', 'ref', 'fun']), value: z.string() }),
  ]),
);

// ===== Constructors =====

export const atomTerm = (value: string): Term => ({ type: 'atom', value });
export const intTerm = (value: number | bigint): Term => ({ type: 'integer', value: BigInt(value) });
export const tupleTerm = (...elements: Term[]): Term => ({ type: 'tuple', elements });
export const listTerm = (elements: Term[], tail?: Term): Term =>
  tail ? { type: 'list', elements, tail } : { type: 'list', elements };

export function isOpaque(term: Term): boolean {
  return OPAQUE_KINDS.has(term.type);
}

function containsOpaque(term: Term): boolean {
  switch (term.type) {
    case 'list':
      return term.elements.some(containsOpaque) || (term.tail !== undefined && containsOpaque(term.tail));
    case 'tuple':
      return term.elements.some(containsOpaque);
    default:
      return isOpaque(term);
  }
}

// ===== Printing =====

function isPrintableBytes(bytes: number[]): boolean {
  return bytes.length > 0 && bytes.every((b) => b >= 32 && b <= 126);
}

/** Print a term in source syntax. Opaque terms print as the debugger showed them. */
export function formatTerm(term: Term): string {
  switch (term.type) {
    case 'atom':
      return printAtom(term.value);
    case 'integer':
      return String(term.value);
    case 'float':
      return printFloat(term.value);
    case 'string':
      return printString(term.value);
    case 'list': {
      const items = term.elements.map(formatTerm).join(', ');
      return term.tail ? `[${items} | ${formatTerm(term.tail)}]` : `[${items}]`;
    }
    case 'tuple':
      return `{${term.elements.map(formatTerm).join(', ')}}`;
    case 'binary':
      if (isPrintableBytes(term.bytes)) {
        return `<<${printString(String.fromCharCode(...term.bytes))}>>`;
      }
      return `<<${term.bytes.join(', ')}>>`;
    case 'pid':
    case 'port':
    case 'ref':
    case 'fun':
      return term.value;
  }
}

/**
 * Literal syntax for a term, placed at `line`. Opaque values become string
 * literals tagged with their kind, e.g. `"pid: <0.85.0>"`.
 */
export function termToExpr(term: Term, line: number): Expr {
  switch (term.type) {
    case 'pid':
    case 'port':
    case 'ref':
    case 'fun':
      return { type: 'string', line, value: `${term.type}: ${term.value}` };
    case 'tuple':
      if (containsOpaque(term)) {
        return { type: 'tuple', line, elements: term.elements.map((e) => termToExpr(e, line)) };
      }
      break;
    case 'list':
      if (containsOpaque(term)) {
        let result: Expr = term.tail ? termToExpr(term.tail, line) : { type: 'nil', line };
        for (let i = term.elements.length - 1; i >= 0; i--) {
          result = { type: 'cons', line, head: termToExpr(term.elements[i], line), tail: result };
        }
        return result;
      }
      break;
    default:
      break;
  }
  return { ...parseExpression(formatTerm(term)), line };
}

// ===== Evaluation =====

function listFromExpr(expr: Expr): Term {
  const elements: Term[] = [];
  let cur = expr;
  while (cur.type === 'cons') {
    elements.push(termFromExpr(cur.head));
    cur = cur.tail;
  }
  if (cur.type === 'nil') return listTerm(elements);
  return listTerm(elements, termFromExpr(cur));
}

function binaryFromExpr(expr: Extract<Expr, { type: 'bin' }>): Term {
  const bytes: number[] = [];
  for (const segment of expr.segments) {
    const value = termFromExpr(segment.value);
    if (value.type === 'string') {
      for (const ch of value.value) bytes.push((ch.codePointAt(0) ?? 0) & 255);
    } else if (value.type === 'integer') {
      bytes.push(Number(BigInt.asUintN(8, value.value)));
    } else {
      throw new ParseError(`Unsupported binary segment of type ${value.type}`, expr.line);
    }
  }
  return { type: 'binary', bytes };
}

/**
 * Evaluate a literal expression to a term. Records must already be expanded
 * to tuples; anything that needs a runtime (variables, calls) is rejected.
 */
export function termFromExpr(expr: Expr): Term {
  switch (expr.type) {
    case 'atom':
      return atomTerm(expr.value);
    case 'integer':
      return intTerm(expr.value);
    case 'float':
      return { type: 'float', value: expr.value };
    case 'char':
      return intTerm(expr.value.codePointAt(0) ?? 0);
    case 'string':
      return { type: 'string', value: expr.value };
    case 'nil':
    case 'cons':
      return listFromExpr(expr);
    case 'tuple':
      return { type: 'tuple', elements: expr.elements.map(termFromExpr) };
    case 'bin':
      return binaryFromExpr(expr);
    case 'unop': {
      const operand = termFromExpr(expr.operand);
      if (expr.op === '-' || expr.op === '+') {
        if (operand.type === 'integer') return intTerm(expr.op === '-' ? -operand.value : operand.value);
        if (operand.type === 'float') return { type: 'float', value: expr.op === '-' ? -operand.value : operand.value };
      }
      throw new ParseError(`Operator '${expr.op}' is not allowed in a literal term`, expr.line);
    }
    default:
      throw new ParseError(`Expression of type '${expr.type}' is not a literal term`, expr.line);
  }
}
