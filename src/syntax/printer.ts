/**
 * Pretty printer for the clause language.
 *
 * Layout is deterministic: clause heads stay on one line, bodies go one
 * expression per line indented by four spaces, and operators get the
 * parentheses their precedence requires.
 */

import type { Clause, Expr, FunctionForm, RecordDefForm } from './ast.js';
import { BINARY_OPERATORS, PREFIX_PRECEDENCE } from './parser.js';

const INDENT = '    ';

const RESERVED = new Set([
  'after', 'and', 'andalso', 'band', 'begin', 'bnot', 'bor', 'bsl', 'bsr', 'bxor',
  'case', 'catch', 'cond', 'div', 'end', 'fun', 'if', 'let', 'not', 'of', 'or', 'orelse',
  'receive', 'rem', 'try', 'when', 'xor', 'maybe', 'else',
]);

const PRIMARY = 1000;
const POSTFIX = 800;
const CATCH = 50;

export function printAtom(value: string): string {
  if (/^[a-z][A-Za-z0-9_@]*$/.test(value) && !RESERVED.has(value)) return value;
  return `'${escapeChars(value, "'")}'`;
}

export function printString(value: string): string {
  return `"${escapeChars(value, '"')}"`;
}

export function printFloat(value: number): string {
  if (Number.isInteger(value) && Math.abs(value) < 1e21) return value.toFixed(1);
  const text = String(value);
  if (!text.includes('e')) return text;
  const [mantissa, exponent] = text.split('e');
  const withPoint = mantissa.includes('.') ? mantissa : `${mantissa}.0`;
  return `${withPoint}e${exponent.replace('+', '')}`;
}

function escapeChars(value: string, quote: string): string {
  let out = '';
  for (const ch of value) {
    switch (ch) {
      case '\\': out += '\\\\'; break;
      case '\n': out += '\\n'; break;
      case '\t': out += '\\t'; break;
      case '\r': out += '\\r'; break;
      default: {
        if (ch === quote) {
          out += `\\${ch}`;
        } else {
          const cp = ch.codePointAt(0) ?? 0;
          out += cp < 32 || cp === 127 ? `\\x{${cp.toString(16).toUpperCase()}}` : ch;
        }
      }
    }
  }
  return out;
}

function printChar(value: string): string {
  switch (value) {
    case ' ': return '$\\s';
    case '\n': return '$\\n';
    case '\t': return '$\\t';
    case '\\': return '$\\\\';
    default: return `$${value}`;
  }
}

function precedence(expr: Expr): number {
  switch (expr.type) {
    case 'match':
      return 100;
    case 'binop':
      return expr.op === ':' ? POSTFIX : BINARY_OPERATORS[expr.op]?.prec ?? PRIMARY;
    case 'unop':
      return PREFIX_PRECEDENCE;
    case 'catch':
      return CATCH;
    case 'call':
    case 'record_field':
      return POSTFIX;
    case 'record':
      return expr.base ? POSTFIX : PRIMARY;
    case 'map':
      return expr.base ? POSTFIX : PRIMARY;
    case 'integer':
      // Negative numbers print with a sign and bind like a prefix operator
      return expr.value < 0n ? PREFIX_PRECEDENCE : PRIMARY;
    case 'float':
      return expr.value < 0 ? PREFIX_PRECEDENCE : PRIMARY;
    default:
      return PRIMARY;
  }
}

function wrap(expr: Expr, minPrec: number, indent: string): string {
  const text = printExpr(expr, indent);
  return precedence(expr) < minPrec ? `(${text})` : text;
}

function printList(expr: Expr, indent: string): string {
  const items: string[] = [];
  let cur = expr;
  while (cur.type === 'cons') {
    items.push(printExpr(cur.head, indent));
    cur = cur.tail;
  }
  if (cur.type === 'nil') return `[${items.join(', ')}]`;
  return `[${items.join(', ')} | ${printExpr(cur, indent)}]`;
}

function printArgs(args: Expr[], indent: string): string {
  return args.map((a) => printExpr(a, indent)).join(', ');
}

function printGuards(guards: Expr[][], indent: string): string {
  return guards.map((conj) => conj.map((g) => printExpr(g, indent)).join(', ')).join('; ');
}

/** Body expressions, one per line, each prefixed with `indent`. */
export function printBody(body: Expr[], indent: string): string {
  return body.map((e) => indent + printExpr(e, indent)).join(',\n');
}

function printClause(head: string, clause: Clause, indent: string): string {
  const guard = clause.guards.length > 0 ? ` when ${printGuards(clause.guards, indent)}` : '';
  return `${head}${guard} ->\n${printBody(clause.body, indent + INDENT)}`;
}

function printPatternClauses(clauses: Clause[], indent: string): string {
  const inner = indent + INDENT;
  return clauses
    .map((c) => inner + printClause(c.patterns.map((p) => printExpr(p, inner)).join(', '), c, inner))
    .join(';\n');
}

function printIfClauses(clauses: Clause[], indent: string): string {
  const inner = indent + INDENT;
  return clauses
    .map((c) => `${inner}${printGuards(c.guards, inner)} ->\n${printBody(c.body, inner + INDENT)}`)
    .join(';\n');
}

function printFun(clauses: Clause[], indent: string): string {
  if (clauses.length === 1 && clauses[0].guards.length === 0 && clauses[0].body.length === 1) {
    const [clause] = clauses;
    const body = printExpr(clause.body[0], indent);
    if (!body.includes('\n')) {
      return `fun(${printArgs(clause.patterns, indent)}) -> ${body} end`;
    }
  }
  const parts = clauses.map((c, i) => {
    const head = `${i === 0 ? 'fun' : `${indent}   `}(${printArgs(c.patterns, indent)})`;
    return printClause(head, c, indent);
  });
  return `${parts.join(';\n')}\n${indent}end`;
}

function printRecordFields(expr: Extract<Expr, { type: 'record' }>, indent: string): string {
  const fields = expr.fields.map((f) => `${f.field === '_' ? '_' : printAtom(f.field)} = ${printExpr(f.value, indent)}`);
  return `#${printAtom(expr.name)}{${fields.join(', ')}}`;
}

export function printExpr(expr: Expr, indent = ''): string {
  switch (expr.type) {
    case 'atom':
      return printAtom(expr.value);
    case 'integer':
      return String(expr.value);
    case 'float':
      return printFloat(expr.value);
    case 'char':
      return printChar(expr.value);
    case 'string':
      return printString(expr.value);
    case 'nil':
      return '[]';
    case 'var':
      return expr.name;
    case 'cons':
      return printList(expr, indent);
    case 'tuple':
      return `{${printArgs(expr.elements, indent)}}`;
    case 'map': {
      const assocs = expr.assocs.map(
        (a) => `${printExpr(a.key, indent)} ${a.exact ? ':=' : '=>'} ${printExpr(a.value, indent)}`,
      );
      const base = expr.base ? wrap(expr.base, POSTFIX, indent) : '';
      return `${base}#{${assocs.join(', ')}}`;
    }
    case 'bin': {
      const segments = expr.segments.map((s) => {
        // A nested binary is bracketed so `<<` tokens never run together
        let text = s.value.type === 'bin' ? `(${printExpr(s.value, indent)})` : wrap(s.value, PRIMARY, indent);
        if (s.size) text += `:${wrap(s.size, PRIMARY, indent)}`;
        if (s.types.length > 0) text += `/${s.types.join('-')}`;
        return text;
      });
      return `<<${segments.join(', ')}>>`;
    }
    case 'match':
      return `${wrap(expr.left, 101, indent)} = ${wrap(expr.right, 100, indent)}`;
    case 'unop': {
      const operand = wrap(expr.operand, PREFIX_PRECEDENCE, indent);
      // Keeps `- -1` from reading as the `--` operator
      const spaced = /^[a-z]/.test(expr.op) || /^[-+]/.test(operand);
      return spaced ? `${expr.op} ${operand}` : `${expr.op}${operand}`;
    }
    case 'binop': {
      if (expr.op === ':') {
        return `${wrap(expr.left, PRIMARY, indent)}:${wrap(expr.right, PRIMARY, indent)}`;
      }
      const info = BINARY_OPERATORS[expr.op] ?? { prec: 0, right: false };
      const nonAssoc = info.prec === 200;
      const leftMin = info.right || nonAssoc ? info.prec + 1 : info.prec;
      const rightMin = info.right ? info.prec : info.prec + 1;
      return `${wrap(expr.left, leftMin, indent)} ${expr.op} ${wrap(expr.right, rightMin, indent)}`;
    }
    case 'remote':
      return `${wrap(expr.module, PRIMARY, indent)}:${wrap(expr.fn, PRIMARY, indent)}`;
    case 'call': {
      const callee = expr.callee.type === 'atom' || expr.callee.type === 'remote' || expr.callee.type === 'var'
        ? printExpr(expr.callee, indent)
        : `(${printExpr(expr.callee, indent)})`;
      return `${callee}(${printArgs(expr.args, indent)})`;
    }
    case 'case':
      return `case ${printExpr(expr.subject, indent)} of\n${printPatternClauses(expr.clauses, indent)}\n${indent}end`;
    case 'if':
      return `if\n${printIfClauses(expr.clauses, indent)}\n${indent}end`;
    case 'receive': {
      let text = 'receive';
      if (expr.clauses.length > 0) text += `\n${printPatternClauses(expr.clauses, indent)}`;
      if (expr.after) {
        const inner = indent + INDENT;
        text += `\n${indent}after\n${inner}${printExpr(expr.after.timeout, inner)} ->\n`;
        text += printBody(expr.after.body, inner + INDENT);
      }
      return `${text}\n${indent}end`;
    }
    case 'try': {
      let text = `try\n${printBody(expr.body, indent + INDENT)}`;
      if (expr.clauses.length > 0) text += `\n${indent}of\n${printPatternClauses(expr.clauses, indent)}`;
      if (expr.catchClauses.length > 0) text += `\n${indent}catch\n${printPatternClauses(expr.catchClauses, indent)}`;
      if (expr.after.length > 0) text += `\n${indent}after\n${printBody(expr.after, indent + INDENT)}`;
      return `${text}\n${indent}end`;
    }
    case 'catch':
      return `catch ${wrap(expr.expr, CATCH, indent)}`;
    case 'block':
      return `begin\n${printBody(expr.body, indent + INDENT)}\n${indent}end`;
    case 'lc': {
      const qualifiers = expr.qualifiers.map((q) => printExpr(q, indent));
      return `[${printExpr(expr.template, indent)} || ${qualifiers.join(', ')}]`;
    }
    case 'generate':
      return `${printExpr(expr.pattern, indent)} <- ${printExpr(expr.source, indent)}`;
    case 'fun':
      return printFun(expr.clauses, indent);
    case 'fun_ref':
      return `fun ${expr.module ? `${printAtom(expr.module)}:` : ''}${printAtom(expr.name)}/${expr.arity}`;
    case 'record':
      return expr.base ? `${wrap(expr.base, POSTFIX, indent)}${printRecordFields(expr, indent)}` : printRecordFields(expr, indent);
    case 'record_field':
      return `${wrap(expr.record, POSTFIX, indent)}#${printAtom(expr.name)}.${printAtom(expr.field)}`;
    case 'record_index':
      return `#${printAtom(expr.name)}.${printAtom(expr.field)}`;
  }
}

export function printFunction(form: FunctionForm): string {
  const name = printAtom(form.name);
  const clauses = form.clauses.map((c) => printClause(`${name}(${printArgs(c.patterns, '')})`, c, ''));
  return `${clauses.join(';\n')}.`;
}

export function printRecordDefinition(form: RecordDefForm): string {
  const fields = form.fields.map((f) => (f.default ? `${printAtom(f.name)} = ${printExpr(f.default)}` : printAtom(f.name)));
  return `-record(${printAtom(form.name)}, {${fields.join(', ')}}).`;
}
